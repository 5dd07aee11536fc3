import { Context, Effect, Option } from 'effect';
import type { PersistenceError, RunLockError } from '../errors.js';

/**
 * Names of the durable documents of a harvest.
 *
 * @group Persistence
 * @public
 */
export type DocumentName = 'state' | 'cursor' | 'failed-pages' | 'run-status';

/**
 * Storage backend for harvest documents.
 *
 * Backends store opaque JSON values; encoding and validation happen in
 * {@link HarvestStore}. Each save replaces the whole document atomically.
 *
 * @group Persistence
 * @public
 */
export interface StorageBackend {
  /** Storage backend identifier */
  readonly name: string;

  /** Create directories or tables */
  initialize(): Effect.Effect<void, PersistenceError>;

  loadDocument(
    name: DocumentName
  ): Effect.Effect<Option.Option<unknown>, PersistenceError>;
  saveDocument(
    name: DocumentName,
    value: unknown
  ): Effect.Effect<void, PersistenceError>;
  deleteDocument(name: DocumentName): Effect.Effect<void, PersistenceError>;

  /**
   * Runs `effect` while holding an exclusive lock on this store.
   * Fails with RunLockError when another run holds it.
   */
  withRunLock<A, E, R>(
    effect: Effect.Effect<A, E, R>
  ): Effect.Effect<A, E | RunLockError | PersistenceError, R>;
}

export class HarvestStorage extends Context.Tag('HarvestStorage')<
  HarvestStorage,
  StorageBackend
>() {}
