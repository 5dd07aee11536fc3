import {
  type CursorLimits,
  type Cursor,
  type PageRange,
  rangePages,
  sequentialWindow,
} from '../Cursor/Cursor.js';
import type { FailedPageQueue } from '../FailedPages/FailedPageQueue.js';

export type WorkSource = 'failed' | 'front' | 'sequential';

/**
 * One page scheduled for this run.
 */
export interface WorkItem {
  readonly page: number;
  readonly source: WorkSource;
  /** Attempt counter carried over from the failed-page queue, else 0 */
  readonly previousAttempts: number;
  /** Whether the page lies inside this run's sequential window */
  readonly inSequentialWindow: boolean;
}

export interface WorklistOptions extends CursorLimits {
  readonly frontRefreshSize: number;
}

export interface Worklist {
  readonly items: readonly WorkItem[];
  readonly window: PageRange;
}

/**
 * Assembles the pages of one run in priority order: the failed batch, then
 * the front window (building only), then the sequential window. A page is
 * scheduled once, under the first set it appears in.
 *
 * @group Orchestration
 * @public
 */
export const buildWorklist = (
  cursor: Cursor,
  failedBatch: FailedPageQueue,
  options: WorklistOptions
): Worklist => {
  const window = sequentialWindow(cursor, options);
  const inWindow = (page: number) =>
    page >= window.first && page <= window.last;

  const front: PageRange | undefined =
    !cursor.baselineComplete && options.frontRefreshSize > 0
      ? { first: 1, last: Math.min(options.frontRefreshSize, options.pageCeiling) }
      : undefined;

  const candidates: WorkItem[] = [
    ...failedBatch.map((entry) => ({
      page: entry.page,
      source: 'failed' as const,
      previousAttempts: entry.attempts,
      inSequentialWindow: inWindow(entry.page),
    })),
    ...(front ? rangePages(front) : []).map((page) => ({
      page,
      source: 'front' as const,
      previousAttempts: 0,
      inSequentialWindow: inWindow(page),
    })),
    ...rangePages(window).map((page) => ({
      page,
      source: 'sequential' as const,
      previousAttempts: 0,
      inSequentialWindow: true,
    })),
  ];

  const seen = new Set<number>();
  const items = candidates.filter((item) => {
    if (seen.has(item.page)) return false;
    seen.add(item.page);
    return true;
  });

  return { items, window };
};
