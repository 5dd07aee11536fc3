import { Effect, Option } from 'effect';
import { PersistenceError, RunLockError } from '../../errors.js';
import type { DocumentName, StorageBackend } from '../types.js';

/**
 * In-process storage backend.
 *
 * Documents are kept as JSON strings so a load always returns a fresh
 * value, the same way a file round trip does. Used by tests and dry runs.
 *
 * @group Backends
 * @public
 */
export class MemoryStorageBackend implements StorageBackend {
  readonly name = 'MemoryStorageBackend';

  private readonly documents = new Map<DocumentName, string>();
  private locked = false;

  initialize = (): Effect.Effect<void, PersistenceError> => Effect.void;

  loadDocument = (
    name: DocumentName
  ): Effect.Effect<Option.Option<unknown>, PersistenceError> =>
    Effect.suspend(() => {
      const stored = this.documents.get(name);
      if (stored === undefined) {
        return Effect.succeed(Option.none());
      }
      return Effect.try({
        try: (): unknown => JSON.parse(stored),
        catch: (error) => PersistenceError.load(error, name),
      }).pipe(Effect.map(Option.some));
    });

  saveDocument = (
    name: DocumentName,
    value: unknown
  ): Effect.Effect<void, PersistenceError> =>
    Effect.try({
      try: () => {
        this.documents.set(name, JSON.stringify(value));
      },
      catch: (error) => PersistenceError.save(error, name),
    });

  deleteDocument = (
    name: DocumentName
  ): Effect.Effect<void, PersistenceError> =>
    Effect.sync(() => {
      this.documents.delete(name);
    });

  withRunLock = <A, E, R>(
    effect: Effect.Effect<A, E, R>
  ): Effect.Effect<A, E | RunLockError | PersistenceError, R> => {
    const acquire = Effect.suspend(() => {
      if (this.locked) {
        return Effect.fail(RunLockError.held('memory'));
      }
      this.locked = true;
      return Effect.void;
    });
    const release = Effect.sync(() => {
      this.locked = false;
    });
    return Effect.scoped(
      Effect.acquireRelease(acquire, () => release).pipe(
        Effect.zipRight(effect)
      )
    );
  };

  /** Names of the documents currently stored */
  documentNames = (): readonly DocumentName[] => [...this.documents.keys()];
}
