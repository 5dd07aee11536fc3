import { Data } from 'effect';

/**
 * Network-level fetch failure (transport error, timeout, non-2xx status).
 * Retried within a run, then deferred to the failed-page queue.
 */
export class TransientFetchError extends Data.TaggedError('TransientFetchError')<{
  readonly page: number;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(page: number, cause: unknown): TransientFetchError {
    return new TransientFetchError({
      page,
      cause,
      message: `Failed to fetch page ${page}: ${cause}`,
    });
  }
}

/**
 * The backend answered, but with a recognised maintenance or error page.
 */
export class BackendUnavailableError extends Data.TaggedError(
  'BackendUnavailableError'
)<{
  readonly page: number;
  readonly message: string;
}> {
  static forPage(page: number): BackendUnavailableError {
    return new BackendUnavailableError({
      page,
      message: `Backend returned an error page for page ${page}`,
    });
  }
}

/**
 * Raised by a record extractor when content cannot be parsed at all.
 * A well-formed page without rows is not an extraction error.
 */
export class ExtractionError extends Data.TaggedError('ExtractionError')<{
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(cause: unknown): ExtractionError {
    return new ExtractionError({
      cause,
      message: `Failed to extract records: ${cause}`,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly message: string;
  readonly details?: unknown;
}> {}

/**
 * Persistence layer errors
 */
export class PersistenceError extends Data.TaggedError('PersistenceError')<{
  readonly operation: 'save' | 'load' | 'delete' | 'initialize';
  readonly document?: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static save(cause: unknown, document?: string): PersistenceError {
    return new PersistenceError({
      operation: 'save',
      document,
      cause,
      message: document
        ? `Failed to save document ${document}: ${cause}`
        : `Failed to save state: ${cause}`,
    });
  }

  static load(cause: unknown, document?: string): PersistenceError {
    return new PersistenceError({
      operation: 'load',
      document,
      cause,
      message: document
        ? `Failed to load document ${document}: ${cause}`
        : `Failed to load state: ${cause}`,
    });
  }

  static delete(cause: unknown, document?: string): PersistenceError {
    return new PersistenceError({
      operation: 'delete',
      document,
      cause,
      message: document
        ? `Failed to delete document ${document}: ${cause}`
        : `Failed to delete state: ${cause}`,
    });
  }
}

/**
 * Another run already holds the lock on the same state directory.
 */
export class RunLockError extends Data.TaggedError('RunLockError')<{
  readonly lockPath: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static held(lockPath: string, cause?: unknown): RunLockError {
    return new RunLockError({
      lockPath,
      cause,
      message: `Another run holds the lock ${lockPath}`,
    });
  }
}

/**
 * A change sink could not deliver the change set.
 */
export class DeliveryError extends Data.TaggedError('DeliveryError')<{
  readonly sink: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(sink: string, cause: unknown): DeliveryError {
    return new DeliveryError({
      sink,
      cause,
      message: `Sink '${sink}' failed to deliver changes: ${cause}`,
    });
  }
}

export type FetchFailure = TransientFetchError | BackendUnavailableError;

export type HarvestError =
  | TransientFetchError
  | BackendUnavailableError
  | ExtractionError
  | ConfigurationError
  | PersistenceError
  | RunLockError
  | DeliveryError;
