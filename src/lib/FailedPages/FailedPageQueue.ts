import { Schema } from 'effect';

/**
 * A page that exhausted its in-run retries, with the number of runs in
 * which it has failed so far.
 *
 * @group Data Types
 * @public
 */
export class FailedPageEntry extends Schema.Class<FailedPageEntry>(
  'FailedPageEntry'
)({
  page: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  attempts: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
}) {}

export const FailedPageQueueDocument = Schema.Array(FailedPageEntry);
export type FailedPageQueue = readonly FailedPageEntry[];

export interface FailedPageLimits {
  readonly pageCeiling: number;
  readonly maxAttempts: number;
}

export interface PushResult {
  readonly queue: FailedPageQueue;
  /** Set when the page reached the attempt ceiling and was dropped */
  readonly abandoned?: FailedPageEntry;
}

/**
 * Records another failure of `page`.
 *
 * The counter starts from the larger of the queued value and
 * `previousAttempts` (the count carried by an entry popped earlier in the
 * run) and is incremented by one. Pages above the ceiling are ignored.
 * An entry whose counter reaches `maxAttempts` is removed and returned as
 * `abandoned`.
 */
export const pushFailedPage = (
  queue: FailedPageQueue,
  page: number,
  limits: FailedPageLimits,
  previousAttempts = 0
): PushResult => {
  if (page > limits.pageCeiling) {
    return { queue };
  }

  const existing = queue.find((entry) => entry.page === page);
  const attempts = Math.max(existing?.attempts ?? 0, previousAttempts) + 1;
  const rest = queue.filter((entry) => entry.page !== page);
  const entry = new FailedPageEntry({ page, attempts });

  if (attempts >= limits.maxAttempts) {
    return { queue: rest, abandoned: entry };
  }

  return { queue: [...rest, entry] };
};

/**
 * Takes up to `limit` entries, fewest attempts first (ties by page).
 * Entries above `pageCeiling`, left behind by a lowered ceiling, are taken
 * out of the queue and returned as `outOfRange`.
 */
export const popFailedBatch = (
  queue: FailedPageQueue,
  limit: number,
  pageCeiling = Number.POSITIVE_INFINITY
): {
  readonly batch: FailedPageQueue;
  readonly rest: FailedPageQueue;
  readonly outOfRange: FailedPageQueue;
} => {
  const ordered = [...queue]
    .filter((entry) => entry.page <= pageCeiling)
    .sort((a, b) => a.attempts - b.attempts || a.page - b.page);
  return {
    batch: ordered.slice(0, Math.max(0, limit)),
    rest: ordered.slice(Math.max(0, limit)),
    outOfRange: queue.filter((entry) => entry.page > pageCeiling),
  };
};

/**
 * Drops the entry of a page that has now been fetched.
 */
export const clearFailedPage = (
  queue: FailedPageQueue,
  page: number
): FailedPageQueue => queue.filter((entry) => entry.page !== page);

/**
 * Puts entries back without touching their counters.
 */
export const restoreFailedPages = (
  queue: FailedPageQueue,
  entries: FailedPageQueue
): FailedPageQueue => {
  const pages = new Set(entries.map((entry) => entry.page));
  return [...queue.filter((entry) => !pages.has(entry.page)), ...entries];
};
