import { Schema } from 'effect';

/**
 * Why a run stopped visiting pages.
 *
 * - `end_of_data`: consecutive empty pages while the baseline was building
 * - `deadline`: the run budget ran out
 * - `circuit_open`: the circuit breaker tripped with no cooldown left
 * - `worklist_exhausted`: every scheduled page was visited
 */
export const StopReason = Schema.Literal(
  'end_of_data',
  'deadline',
  'circuit_open',
  'worklist_exhausted'
);
export type StopReason = typeof StopReason.Type;

const PageList = Schema.Array(Schema.Int);

/**
 * Counters of one crawl.
 *
 * @group Orchestration
 * @public
 */
export class RunStats extends Schema.Class<RunStats>('RunStats')({
  stopReason: StopReason,
  pagesAttempted: Schema.Int,
  pagesSucceeded: Schema.Int,
  errorPages: PageList,
  emptyPages: PageList,
  /** Pages dropped from the failed-page queue this run */
  abandonedPages: PageList,
  /** Pages added to (or kept in) the failed-page queue this run */
  requeuedPages: PageList,
  /** Fetches issued beyond the first attempt of each page */
  retries: Schema.Int,
  cooldownsUsed: Schema.Int,
  recordsExtracted: Schema.Int,
  baselineCompleted: Schema.Boolean,
  elapsedMs: Schema.Number,
}) {}
