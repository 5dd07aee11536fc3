import { Effect, Option, Schema } from 'effect';
import { Cursor } from '../Cursor/Cursor.js';
import { type StateStore, StateStoreDocument } from '../Delta/DeltaEngine.js';
import { PersistenceError } from '../errors.js';
import {
  type FailedPageQueue,
  FailedPageQueueDocument,
} from '../FailedPages/FailedPageQueue.js';
import { RunStatus } from './RunStatus.js';
import { type DocumentName, HarvestStorage } from './types.js';

/**
 * The durable state a run starts from and hands to the next one.
 *
 * @group Persistence
 * @public
 */
export interface HarvestSnapshot {
  readonly state: StateStore;
  readonly cursor: Cursor;
  readonly failedPages: FailedPageQueue;
}

export const emptySnapshot = (): HarvestSnapshot => ({
  state: {},
  cursor: Cursor.initial(),
  failedPages: [],
});

const loadDecoded = <A, I>(
  schema: Schema.Schema<A, I>,
  name: DocumentName
): Effect.Effect<Option.Option<A>, PersistenceError, HarvestStorage> =>
  Effect.gen(function* () {
    const backend = yield* HarvestStorage;
    const raw = yield* backend.loadDocument(name);
    if (Option.isNone(raw)) {
      return Option.none();
    }
    const decoded = yield* Schema.decodeUnknown(schema)(raw.value).pipe(
      Effect.mapError((error) => PersistenceError.load(error.message, name))
    );
    return Option.some(decoded);
  });

const saveEncoded = <A, I>(
  schema: Schema.Schema<A, I>,
  name: DocumentName,
  value: A
): Effect.Effect<void, PersistenceError, HarvestStorage> =>
  Effect.gen(function* () {
    const backend = yield* HarvestStorage;
    const encoded = yield* Schema.encode(schema)(value).pipe(
      Effect.mapError((error) => PersistenceError.save(error.message, name))
    );
    yield* backend.saveDocument(name, encoded);
  });

/**
 * Loads the snapshot. Missing documents fall back to their initial value;
 * a document that exists but does not decode is an error.
 *
 * @group Persistence
 * @public
 */
export const loadSnapshot: Effect.Effect<
  HarvestSnapshot,
  PersistenceError,
  HarvestStorage
> = Effect.gen(function* () {
  const backend = yield* HarvestStorage;
  yield* backend.initialize();

  const state = yield* loadDecoded(StateStoreDocument, 'state');
  const cursor = yield* loadDecoded(Cursor, 'cursor');
  const failedPages = yield* loadDecoded(FailedPageQueueDocument, 'failed-pages');

  return {
    state: Option.getOrElse(state, (): StateStore => ({})),
    cursor: Option.getOrElse(cursor, Cursor.initial),
    failedPages: Option.getOrElse(failedPages, (): FailedPageQueue => []),
  };
});

/**
 * Writes every durable document, the run status last.
 *
 * @group Persistence
 * @public
 */
export const saveSnapshot = (
  snapshot: HarvestSnapshot,
  status: RunStatus
): Effect.Effect<void, PersistenceError, HarvestStorage> =>
  Effect.gen(function* () {
    yield* saveEncoded(StateStoreDocument, 'state', snapshot.state);
    yield* saveEncoded(Cursor, 'cursor', snapshot.cursor);
    yield* saveEncoded(FailedPageQueueDocument, 'failed-pages', snapshot.failedPages);
    yield* saveEncoded(RunStatus, 'run-status', status);
  });

/**
 * Status of the last completed run, if any.
 *
 * @group Persistence
 * @public
 */
export const loadRunStatus: Effect.Effect<
  Option.Option<RunStatus>,
  PersistenceError,
  HarvestStorage
> = loadDecoded(RunStatus, 'run-status');
