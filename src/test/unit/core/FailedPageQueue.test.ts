import { describe, expect, it } from 'vitest';
import {
  clearFailedPage,
  FailedPageEntry,
  popFailedBatch,
  pushFailedPage,
  restoreFailedPages,
} from '../../../lib/FailedPages/FailedPageQueue.js';

const limits = { pageCeiling: 10, maxAttempts: 3 };
const entry = (page: number, attempts: number) => new FailedPageEntry({ page, attempts });

describe('FailedPageQueue', () => {
  it('should add a new page with one attempt', () => {
    expect(pushFailedPage([], 4, limits)).toEqual({ queue: [entry(4, 1)] });
  });

  it('should raise the counter of a queued page', () => {
    expect(pushFailedPage([entry(4, 1), entry(5, 1)], 4, limits).queue).toEqual([
      entry(5, 1),
      entry(4, 2),
    ]);
  });

  it('should continue from the counter of a popped entry', () => {
    expect(pushFailedPage([], 7, limits, 1).queue).toEqual([entry(7, 2)]);
  });

  it('should abandon a page when it reaches the attempt ceiling', () => {
    const result = pushFailedPage([entry(4, 2)], 4, limits);

    expect(result.queue).toEqual([]);
    expect(result.abandoned).toEqual(entry(4, 3));
  });

  it('should ignore pages above the ceiling', () => {
    expect(pushFailedPage([], 11, limits)).toEqual({ queue: [] });
  });

  it('should bound the retries of a page that always fails', () => {
    let queue = pushFailedPage([], 2, limits).queue;
    let runs = 1;
    while (queue.length > 0) {
      const { batch, rest } = popFailedBatch(queue, 5);
      const pushed = pushFailedPage(rest, 2, limits, batch[0].attempts);
      queue = pushed.queue;
      runs++;
    }

    expect(runs).toBe(3);
  });

  it('should pop the least-attempted pages first', () => {
    const { batch, rest } = popFailedBatch([entry(9, 2), entry(3, 1), entry(5, 1)], 2);

    expect(batch).toEqual([entry(3, 1), entry(5, 1)]);
    expect(rest).toEqual([entry(9, 2)]);
  });

  it('should set aside entries above the page ceiling when popping', () => {
    const popped = popFailedBatch([entry(12, 1), entry(3, 2), entry(15, 4)], 5, 10);

    expect(popped.batch).toEqual([entry(3, 2)]);
    expect(popped.rest).toEqual([]);
    expect(popped.outOfRange).toEqual([entry(12, 1), entry(15, 4)]);
  });

  it('should restore entries without touching their counters', () => {
    expect(restoreFailedPages([entry(1, 1)], [entry(6, 2)])).toEqual([
      entry(1, 1),
      entry(6, 2),
    ]);
  });

  it('should drop a page once it has been fetched', () => {
    expect(clearFailedPage([entry(1, 1), entry(2, 1)], 1)).toEqual([entry(2, 1)]);
  });
});
