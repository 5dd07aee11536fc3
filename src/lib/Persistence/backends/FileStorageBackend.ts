import { Clock, Effect, Option, Schema } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PersistenceError, RunLockError } from '../../errors.js';
import type { DocumentName, StorageBackend } from '../types.js';

const errorCode = (error: unknown): string | undefined =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string'
    ? error.code
    : undefined;

const DEFAULT_STALE_LOCK_MS = 60 * 60 * 1000;

const LockFile = Schema.parseJson(
  Schema.Struct({ pid: Schema.Int, acquiredAt: Schema.Date })
);

/**
 * Holder of an existing lock file. A file that does not decode is dated by
 * its modification time and has no pid.
 */
interface LockHolder {
  readonly pid?: number;
  readonly acquiredAt: number;
}

const processAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return errorCode(error) === 'EPERM';
  }
};

export interface FileStorageOptions {
  /**
   * Age after which a lock is considered abandoned and taken over
   * (default: 1 hour). Keep it above the longest expected run.
   */
  readonly staleLockMs?: number;
}

/**
 * File system storage backend.
 *
 * One pretty-printed JSON file per document. Writes go to a temporary file
 * that is then renamed over the target, so a crash never leaves a
 * half-written document behind.
 *
 * Directory structure:
 * ```
 * baseDir/
 *   state.json
 *   cursor.json
 *   failed-pages.json
 *   run-status.json
 *   run.lock          # present while a run holds the lock
 * ```
 *
 * A lock left behind by a crashed run is taken over once its holder process
 * is gone or it is older than `staleLockMs`.
 *
 * @group Backends
 * @public
 */
export class FileStorageBackend implements StorageBackend {
  readonly name = 'FileStorageBackend';

  constructor(
    private readonly baseDir: string,
    private readonly options: FileStorageOptions = {}
  ) {}

  get lockPath(): string {
    return path.join(this.baseDir, 'run.lock');
  }

  initialize = (): Effect.Effect<void, PersistenceError> =>
    Effect.tryPromise({
      try: () => fs.mkdir(this.baseDir, { recursive: true }),
      catch: (error) =>
        new PersistenceError({
          message: `Failed to initialize file storage: ${error}`,
          cause: error,
          operation: 'initialize',
        }),
    }).pipe(Effect.asVoid);

  loadDocument = (
    name: DocumentName
  ): Effect.Effect<Option.Option<unknown>, PersistenceError> => {
    const filePath = this.documentPath(name);
    return Effect.gen(function* () {
      const content = yield* Effect.tryPromise({
        try: () => fs.readFile(filePath, 'utf8'),
        catch: (error) => error,
      }).pipe(
        Effect.map(Option.some),
        Effect.catchAll((error) =>
          errorCode(error) === 'ENOENT'
            ? Effect.succeed(Option.none<string>())
            : Effect.fail(PersistenceError.load(error, name))
        )
      );

      if (Option.isNone(content)) {
        return Option.none();
      }

      const parsed = yield* Effect.try({
        try: (): unknown => JSON.parse(content.value),
        catch: (error) => PersistenceError.load(error, name),
      });
      return Option.some(parsed);
    });
  };

  saveDocument = (
    name: DocumentName,
    value: unknown
  ): Effect.Effect<void, PersistenceError> => {
    const filePath = this.documentPath(name);
    const tmpPath = `${filePath}.tmp`;
    const baseDir = this.baseDir;
    return Effect.tryPromise({
      try: async () => {
        await fs.mkdir(baseDir, { recursive: true });
        await fs.writeFile(tmpPath, JSON.stringify(value, null, 2), 'utf8');
        await fs.rename(tmpPath, filePath);
      },
      catch: (error) => PersistenceError.save(error, name),
    });
  };

  deleteDocument = (
    name: DocumentName
  ): Effect.Effect<void, PersistenceError> =>
    Effect.tryPromise({
      try: () => fs.rm(this.documentPath(name), { force: true }),
      catch: (error) => PersistenceError.delete(error, name),
    });

  withRunLock = <A, E, R>(
    effect: Effect.Effect<A, E, R>
  ): Effect.Effect<A, E | RunLockError | PersistenceError, R> => {
    const self = this;
    const lockPath = this.lockPath;
    const staleLockMs = this.options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    const release = Effect.promise(() => fs.rm(lockPath, { force: true }));

    const create = Effect.tryPromise({
      try: () => fs.open(lockPath, 'wx'),
      catch: (error): RunLockError | PersistenceError =>
        errorCode(error) === 'EEXIST'
          ? RunLockError.held(lockPath, error)
          : PersistenceError.save(error, 'run.lock'),
    });

    const takeOverIfStale = Effect.gen(function* () {
      const holder = yield* self.readLockHolder();
      const now = yield* Clock.currentTimeMillis;
      if (Option.isSome(holder)) {
        const { pid, acquiredAt } = holder.value;
        const stale =
          now - acquiredAt > staleLockMs ||
          (pid !== undefined && !processAlive(pid));
        if (!stale) {
          return yield* Effect.fail(RunLockError.held(lockPath, holder.value));
        }
        yield* Effect.tryPromise({
          try: () => fs.rm(lockPath, { force: true }),
          catch: (error) => PersistenceError.delete(error, 'run.lock'),
        });
      }
      return yield* create;
    });

    const acquire = Effect.gen(function* () {
      yield* self.initialize();
      const handle = yield* create.pipe(
        Effect.catchTag('RunLockError', () => takeOverIfStale)
      );
      const acquiredAt = new Date(yield* Clock.currentTimeMillis);
      yield* Effect.tryPromise({
        try: () =>
          handle.writeFile(
            JSON.stringify({ pid: process.pid, acquiredAt: acquiredAt.toISOString() })
          ),
        catch: (error) => PersistenceError.save(error, 'run.lock'),
      }).pipe(
        Effect.ensuring(Effect.promise(() => handle.close())),
        Effect.onError(() => release)
      );
    });

    return Effect.scoped(
      Effect.acquireRelease(acquire, () => release).pipe(
        Effect.zipRight(effect)
      )
    );
  };

  private readLockHolder(): Effect.Effect<Option.Option<LockHolder>, PersistenceError> {
    const lockPath = this.lockPath;
    return Effect.tryPromise({
      try: async () => {
        const [content, stats] = await Promise.all([
          fs.readFile(lockPath, 'utf8'),
          fs.stat(lockPath),
        ]);
        return { content, modifiedAt: stats.mtimeMs };
      },
      catch: (error) => error,
    }).pipe(
      Effect.map(({ content, modifiedAt }) =>
        Option.some(
          Option.match(Schema.decodeUnknownOption(LockFile)(content), {
            onNone: (): LockHolder => ({ acquiredAt: modifiedAt }),
            onSome: (lock): LockHolder => ({
              pid: lock.pid,
              acquiredAt: lock.acquiredAt.getTime(),
            }),
          })
        )
      ),
      Effect.catchAll((error) =>
        errorCode(error) === 'ENOENT'
          ? Effect.succeed(Option.none<LockHolder>())
          : Effect.fail(PersistenceError.load(error, 'run.lock'))
      )
    );
  }

  private documentPath(name: DocumentName): string {
    return path.join(this.baseDir, `${name}.json`);
  }
}
