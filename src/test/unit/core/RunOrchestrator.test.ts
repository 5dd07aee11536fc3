import { describe, expect, it } from 'vitest';
import { Effect, Fiber, TestClock, TestContext } from 'effect';
import type { HarvestConfigOptions } from '../../../lib/Config/HarvestConfig.service.js';
import { Cursor } from '../../../lib/Cursor/Cursor.js';
import {
  FailedPageEntry,
  type FailedPageQueue,
} from '../../../lib/FailedPages/FailedPageQueue.js';
import { runCrawl } from '../../../lib/Orchestrator/RunOrchestrator.js';
import {
  crawlLayer,
  empty,
  listingFetcher,
  maintenance,
  makeMemoryLogger,
  makeScriptedFetcher,
  type PageResponse,
  rows,
  runEffect,
  type ScriptedFetcher,
  transport,
} from '../../utils/test-helpers.js';

const entry = (page: number, attempts: number) => new FailedPageEntry({ page, attempts });

const crawl = (
  fetcher: ScriptedFetcher,
  cursor: Cursor = Cursor.initial(),
  failedPages: FailedPageQueue = [],
  options: Partial<HarvestConfigOptions> = {}
) =>
  runEffect(
    runCrawl({ runId: 'test-run', cursor, failedPages }).pipe(
      Effect.provide(crawlLayer(fetcher.service, options))
    )
  );

/** Ten-page listing: five pages of rows, then nothing */
const listing: Record<number, PageResponse> = {
  1: rows('A-1', 'A-2'),
  2: rows('A-3'),
  3: rows('A-4'),
  4: rows('A-5'),
  5: rows('A-6'),
};

describe('runCrawl', () => {
  describe('baseline building', () => {
    it('should scan one window from the cursor and advance past it', async () => {
      const fetcher = listingFetcher(listing);

      const result = await crawl(fetcher);

      expect(fetcher.calls).toEqual([1, 2, 3, 4, 5]);
      expect(result.records.map((record) => record.id)).toEqual([
        'A-1', 'A-2', 'A-3', 'A-4', 'A-5', 'A-6',
      ]);
      expect(result.cursor).toEqual(new Cursor({ nextPage: 6, baselineComplete: false }));
      expect(result.stats.stopReason).toBe('worklist_exhausted');
      expect(result.stats.pagesAttempted).toBe(5);
      expect(result.stats.pagesSucceeded).toBe(5);
      expect(result.stats.baselineCompleted).toBe(false);
    });

    it('should complete the baseline over two runs when the listing ends', async () => {
      const fetcher = listingFetcher(listing);

      const first = await crawl(fetcher);
      const second = await crawl(fetcher, first.cursor, first.failedPages);

      expect(fetcher.calls).toEqual([1, 2, 3, 4, 5, 6, 7]);
      expect(second.stats.stopReason).toBe('end_of_data');
      expect(second.stats.emptyPages).toEqual([6, 7]);
      expect(second.stats.baselineCompleted).toBe(true);
      expect(second.cursor).toEqual(new Cursor({ nextPage: 1, baselineComplete: true }));
    });

    it('should reset the empty streak on an error page', async () => {
      const fetcher = listingFetcher({
        6: empty,
        7: transport,
        8: empty,
        9: rows('B-1'),
        10: empty,
      });

      const result = await crawl(
        fetcher,
        new Cursor({ nextPage: 6, baselineComplete: false }),
        [],
        { pageCeiling: 20 }
      );

      expect(fetcher.calls).toEqual([6, 7, 8, 9, 10]);
      expect(result.stats.stopReason).toBe('worklist_exhausted');
      expect(result.cursor.nextPage).toBe(11);
      expect(result.failedPages).toEqual([entry(7, 1)]);
    });

    it('should move past an error page inside the window and queue it', async () => {
      const fetcher = listingFetcher({ ...listing, 3: transport });

      const result = await crawl(fetcher);

      expect(result.cursor.nextPage).toBe(6);
      expect(result.stats.errorPages).toEqual([3]);
      expect(result.stats.requeuedPages).toEqual([3]);
      expect(result.failedPages).toEqual([entry(3, 1)]);
    });

    it('should complete the baseline when the ceiling page is reached', async () => {
      const fetcher = makeScriptedFetcher((page) => rows(`C-${page}`));

      const result = await crawl(
        fetcher,
        new Cursor({ nextPage: 8, baselineComplete: false })
      );

      expect(fetcher.calls).toEqual([8, 9, 10]);
      expect(result.cursor).toEqual(new Cursor({ nextPage: 1, baselineComplete: true }));
      expect(result.stats.baselineCompleted).toBe(true);
    });

    it('should refresh the front pages without moving the cursor for them', async () => {
      const fetcher = makeScriptedFetcher((page) => (page <= 7 ? rows(`D-${page}`) : empty));

      const result = await crawl(
        fetcher,
        new Cursor({ nextPage: 6, baselineComplete: false }),
        [],
        { frontRefreshSize: 2, pageCeiling: 20 }
      );

      expect(fetcher.calls).toEqual([1, 2, 6, 7, 8, 9]);
      expect(result.stats.stopReason).toBe('end_of_data');
      expect(result.cursor.baselineComplete).toBe(true);
    });
  });

  describe('steady state', () => {
    it('should rescan the delta window and ignore empty pages', async () => {
      const fetcher = listingFetcher({});
      const steady = new Cursor({ nextPage: 1, baselineComplete: true });

      const result = await crawl(fetcher, steady);

      expect(fetcher.calls).toEqual([1, 2, 3]);
      expect(result.stats.stopReason).toBe('worklist_exhausted');
      expect(result.cursor).toBe(steady);
    });
  });

  describe('failed pages', () => {
    it('should replay failed pages first and visit each page once', async () => {
      const fetcher = listingFetcher({ ...listing, 8: rows('E-8') });

      const result = await crawl(fetcher, Cursor.initial(), [entry(2, 2), entry(8, 1)]);

      expect(fetcher.calls).toEqual([8, 2, 1, 3, 4, 5]);
      expect(result.failedPages).toEqual([]);
      expect(result.cursor.nextPage).toBe(6);
    });

    it('should clear a queued page outside the batch once it is fetched', async () => {
      const fetcher = listingFetcher(listing);

      const result = await crawl(fetcher, Cursor.initial(), [entry(3, 1), entry(4, 1)], {
        failedPageBatchSize: 1,
      });

      expect(fetcher.calls).toEqual([3, 1, 2, 4, 5]);
      expect(result.failedPages).toEqual([]);
    });

    it('should abandon a page at the attempt ceiling', async () => {
      const fetcher = listingFetcher({ ...listing, 4: transport });

      const result = await crawl(fetcher, Cursor.initial(), [entry(4, 1)], {
        failedPageMaxAttempts: 2,
      });

      expect(fetcher.calls).toEqual([4, 1, 2, 3, 5]);
      expect(result.stats.abandonedPages).toEqual([4]);
      expect(result.failedPages).toEqual([]);
    });

    it('should abandon queued pages above a lowered ceiling without fetching them', async () => {
      const fetcher = listingFetcher(listing);

      const result = await crawl(fetcher, Cursor.initial(), [entry(14, 2), entry(3, 1)]);

      expect(fetcher.calls).toEqual([3, 1, 2, 4, 5]);
      expect(result.stats.abandonedPages).toEqual([14]);
      expect(result.failedPages).toEqual([]);
    });
  });

  describe('circuit breaker', () => {
    const failing = () => listingFetcher({ ...listing, 1: transport, 2: transport });

    it('should abort the run when no cooldown is left', async () => {
      const fetcher = failing();

      const result = await crawl(fetcher, Cursor.initial(), [], {
        breakerWindowSize: 2,
        breakerErrorThreshold: 0.5,
      });

      expect(fetcher.calls).toEqual([1, 2]);
      expect(result.stats.stopReason).toBe('circuit_open');
      expect(result.failedPages).toEqual([entry(1, 1), entry(2, 1)]);
      expect(result.cursor).toEqual(Cursor.initial());
    });

    it('should cool down, recycle the fetcher and carry on', async () => {
      const fetcher = failing();
      const memory = makeMemoryLogger();

      const result = await runEffect(
        runCrawl({ runId: 'test-run', cursor: Cursor.initial(), failedPages: [] }).pipe(
          Effect.provide(
            crawlLayer(
              fetcher.service,
              { breakerWindowSize: 2, maxCooldownsPerRun: 1 },
              memory.logger
            )
          )
        )
      );

      expect(fetcher.calls).toEqual([1, 2, 3, 4, 5]);
      expect(fetcher.recycles()).toBe(1);
      expect(result.stats.cooldownsUsed).toBe(1);
      expect(result.stats.stopReason).toBe('worklist_exhausted');
      expect(memory.ofType('circuit_breaker').map((event) => event.details?.decision)).toEqual([
        'cooldown',
      ]);
    });

    it('should sleep for the cooldown before recycling the fetcher', async () => {
      const fetcher = failing();

      const progress = await runEffect(
        Effect.gen(function* () {
          const running = yield* Effect.fork(
            runCrawl({ runId: 'test-run', cursor: Cursor.initial(), failedPages: [] }).pipe(
              Effect.provide(
                crawlLayer(fetcher.service, {
                  breakerWindowSize: 2,
                  maxCooldownsPerRun: 1,
                  cooldownMs: 5000,
                })
              )
            )
          );

          yield* TestClock.adjust('4999 millis');
          const duringCooldown = { calls: [...fetcher.calls], recycles: fetcher.recycles() };
          yield* TestClock.adjust('1 millis');
          const result = yield* Fiber.join(running);

          return { duringCooldown, result };
        }).pipe(Effect.provide(TestContext.TestContext))
      );

      expect(progress.duringCooldown).toEqual({ calls: [1, 2], recycles: 0 });
      expect(fetcher.calls).toEqual([1, 2, 3, 4, 5]);
      expect(fetcher.recycles()).toBe(1);
      expect(progress.result.stats.cooldownsUsed).toBe(1);
      expect(progress.result.stats.elapsedMs).toBe(5000);
    });

    it('should abort instead of cooling down when the cooldown would pass the deadline', async () => {
      const fetcher = makeScriptedFetcher(
        (page) => (page <= 2 ? transport : rows(`H-${page}`)),
        () => TestClock.adjust('3 seconds')
      );
      const memory = makeMemoryLogger();

      const result = await runEffect(
        runCrawl({ runId: 'test-run', cursor: Cursor.initial(), failedPages: [] }).pipe(
          Effect.provide(
            crawlLayer(
              fetcher.service,
              {
                breakerWindowSize: 2,
                maxCooldownsPerRun: 1,
                cooldownMs: 5000,
                runBudgetMs: 10_000,
              },
              memory.logger
            )
          ),
          Effect.provide(TestContext.TestContext)
        )
      );

      expect(fetcher.calls).toEqual([1, 2]);
      expect(fetcher.recycles()).toBe(0);
      expect(result.stats.stopReason).toBe('circuit_open');
      expect(result.stats.cooldownsUsed).toBe(0);
      expect(result.stats.elapsedMs).toBe(6000);
      expect(memory.ofType('circuit_breaker').map((event) => event.details?.decision)).toEqual([
        'abort',
      ]);
    });

    it('should weigh backend error pages above transient failures', async () => {
      const options = { breakerWindowSize: 4, breakerErrorThreshold: 0.5 };
      const backendDown = listingFetcher({ ...listing, 1: maintenance });
      const flaky = listingFetcher({ ...listing, 1: transport });

      const tripped = await crawl(backendDown, Cursor.initial(), [], options);
      const carriedOn = await crawl(flaky, Cursor.initial(), [], options);

      expect(backendDown.calls).toEqual([1, 2, 3, 4]);
      expect(tripped.stats.stopReason).toBe('circuit_open');
      expect(flaky.calls).toEqual([1, 2, 3, 4, 5]);
      expect(carriedOn.stats.stopReason).toBe('worklist_exhausted');
    });
  });

  describe('run budget', () => {
    const slowCrawl = (
      fetcher: ScriptedFetcher,
      failedPages: FailedPageQueue,
      runBudgetMs: number
    ) =>
      runEffect(
        runCrawl({ runId: 'test-run', cursor: Cursor.initial(), failedPages }).pipe(
          Effect.provide(crawlLayer(fetcher.service, { runBudgetMs })),
          Effect.provide(TestContext.TestContext)
        )
      );

    it('should stop starting pages once the deadline has passed', async () => {
      const fetcher = makeScriptedFetcher(
        (page) => rows(`F-${page}`),
        () => TestClock.adjust('400 millis')
      );

      const result = await slowCrawl(fetcher, [], 1000);

      expect(fetcher.calls).toEqual([1, 2, 3]);
      expect(result.stats.stopReason).toBe('deadline');
      expect(result.cursor.nextPage).toBe(4);
      expect(result.stats.elapsedMs).toBe(1200);
    });

    it('should give unvisited failed pages back with their counters', async () => {
      const fetcher = makeScriptedFetcher(
        (page) => rows(`G-${page}`),
        () => TestClock.adjust('600 millis')
      );

      const result = await slowCrawl(fetcher, [entry(7, 1), entry(9, 2)], 500);

      expect(fetcher.calls).toEqual([7]);
      expect(result.failedPages).toEqual([entry(9, 2)]);
      expect(result.cursor).toEqual(Cursor.initial());
    });
  });
});
