import { Clock, Duration, Effect } from 'effect';
import { HarvestConfig, type HarvestConfigService } from '../Config/HarvestConfig.service.js';
import { makeCircuitBreaker, signalOf } from '../CircuitBreaker/CircuitBreaker.js';
import { advanceCursor, type Cursor } from '../Cursor/Cursor.js';
import { RecordExtractor } from '../Extractor/RecordExtractor.js';
import {
  clearFailedPage,
  type FailedPageQueue,
  popFailedBatch,
  pushFailedPage,
  restoreFailedPages,
} from '../FailedPages/FailedPageQueue.js';
import { ErrorPageDetector } from '../Fetch/FetchClassifier.js';
import { PageFetcher } from '../Fetch/PageFetcher.js';
import { HarvestLogger } from '../Logging/HarvestLogger.service.js';
import type { HarvestRecord } from '../Record/Record.js';
import { attemptPage } from '../Retry/RetryController.js';
import { RunStats, type StopReason } from './RunStats.js';
import { buildWorklist, type WorkItem } from './Worklist.js';

export interface CrawlInput {
  readonly runId: string;
  readonly cursor: Cursor;
  readonly failedPages: FailedPageQueue;
}

/**
 * Everything a crawl produced. Nothing here has been persisted yet.
 *
 * @group Orchestration
 * @public
 */
export interface CrawlResult {
  readonly records: readonly HarvestRecord[];
  readonly cursor: Cursor;
  readonly failedPages: FailedPageQueue;
  readonly stats: RunStats;
}

export type CrawlRequirements =
  | HarvestConfigService
  | PageFetcher
  | RecordExtractor
  | ErrorPageDetector
  | HarvestLogger;

/**
 * Drives one bounded crawl.
 *
 * Pages are visited strictly one after another in worklist order. Before
 * each page the deadline is checked; after each page the circuit breaker
 * is fed and may force a cooldown or stop the crawl. While the baseline is
 * building, `emptyPageTolerance` consecutive empty sequential pages end it.
 * Failed-batch entries that were never reached go back to the queue with
 * their counters unchanged.
 *
 * The crawl reads no storage and never fails: fetch problems end up in the
 * returned queue and stats.
 *
 * @group Orchestration
 * @public
 */
export const runCrawl = (
  input: CrawlInput
): Effect.Effect<CrawlResult, never, CrawlRequirements> =>
  Effect.gen(function* () {
    const config = yield* HarvestConfig;
    const options = yield* config.getOptions();
    const runBudgetMs = yield* config.getRunBudgetMs();
    const logger = yield* HarvestLogger;
    const fetcher = yield* PageFetcher;

    const startedAt = yield* Clock.currentTimeMillis;
    const deadline = startedAt + runBudgetMs;
    const building = !input.cursor.baselineComplete;

    const { batch, rest, outOfRange } = popFailedBatch(
      input.failedPages,
      options.failedPageBatchSize,
      options.pageCeiling
    );
    const { items, window } = buildWorklist(input.cursor, batch, options);

    if (batch.length > 0) {
      yield* logger.logEvent({
        type: 'failed_pages',
        runId: input.runId,
        message: `Replaying ${batch.length} failed pages`,
        details: { pages: batch.map((entry) => entry.page) },
      });
    }

    if (outOfRange.length > 0) {
      yield* logger.logEvent({
        type: 'failed_pages',
        runId: input.runId,
        message: `Abandoning ${outOfRange.length} failed pages above the page ceiling`,
        details: {
          pages: outOfRange.map((entry) => entry.page),
          pageCeiling: options.pageCeiling,
        },
      });
    }

    const breaker = yield* makeCircuitBreaker({
      windowSize: options.breakerWindowSize,
      errorThreshold: options.breakerErrorThreshold,
      backendWeight: options.backendUnavailableWeight,
    });

    const retryPolicy = {
      maxRetries: options.maxRetries,
      backoffBaseMs: options.backoffBaseMs,
      backoffJitterMs: options.backoffJitterMs,
      fetchTimeoutMs: options.fetchTimeoutMs,
    };
    const queueLimits = {
      pageCeiling: options.pageCeiling,
      maxAttempts: options.failedPageMaxAttempts,
    };

    let queue: FailedPageQueue = rest;
    const visited = new Set<number>();
    const records: HarvestRecord[] = [];
    const errorPages: number[] = [];
    const emptyPages: number[] = [];
    const abandonedPages: number[] = outOfRange.map((entry) => entry.page);
    const requeuedPages: number[] = [];
    let pagesSucceeded = 0;
    let retries = 0;
    let cooldownsUsed = 0;
    let emptyStreak = 0;
    let endOfData = false;
    let highestCompleted: number | undefined;
    let stopReason: StopReason = 'worklist_exhausted';

    const countsTowardEndOfData = (item: WorkItem) =>
      building && item.inSequentialWindow && item.source !== 'failed';

    for (let index = 0; index < items.length; index++) {
      const item = items[index];

      const now = yield* Clock.currentTimeMillis;
      if (now >= deadline) {
        stopReason = 'deadline';
        yield* logger.logEdgeCase('run_budget_exhausted', {
          runId: input.runId,
          nextItem: item.page,
          remainingItems: items.length - index,
        });
        break;
      }

      visited.add(item.page);
      const attempt = yield* attemptPage(item.page, deadline, retryPolicy);
      const outcome = attempt.outcome;
      retries += attempt.attempts - 1;

      switch (outcome._tag) {
        case 'Ok': {
          pagesSucceeded++;
          records.push(...outcome.records);
          queue = clearFailedPage(queue, item.page);
          if (item.inSequentialWindow) {
            highestCompleted = Math.max(highestCompleted ?? 0, item.page);
          }
          if (countsTowardEndOfData(item)) {
            emptyStreak = 0;
          }
          yield* logger.logPageOutcome(item.page, 'ok', {
            source: item.source,
            records: outcome.records.length,
            attempts: attempt.attempts,
          });
          break;
        }
        case 'Empty': {
          emptyPages.push(item.page);
          queue = clearFailedPage(queue, item.page);
          if (item.inSequentialWindow) {
            highestCompleted = Math.max(highestCompleted ?? 0, item.page);
          }
          if (countsTowardEndOfData(item)) {
            emptyStreak++;
            endOfData = emptyStreak >= options.emptyPageTolerance;
          }
          yield* logger.logPageOutcome(item.page, 'empty', {
            source: item.source,
            emptyStreak,
          });
          break;
        }
        case 'Error': {
          errorPages.push(item.page);
          if (countsTowardEndOfData(item)) {
            emptyStreak = 0;
          }
          const pushed = pushFailedPage(
            queue,
            item.page,
            queueLimits,
            item.previousAttempts
          );
          queue = pushed.queue;
          if (pushed.abandoned) {
            abandonedPages.push(item.page);
            yield* logger.logEvent({
              type: 'failed_pages',
              runId: input.runId,
              page: item.page,
              message: `Abandoning page ${item.page} after ${pushed.abandoned.attempts} failed runs`,
              details: { attempts: pushed.abandoned.attempts },
            });
          } else if (item.page <= options.pageCeiling) {
            requeuedPages.push(item.page);
          }
          yield* logger.logPageOutcome(item.page, 'error', {
            source: item.source,
            attempts: attempt.attempts,
            error: outcome.error._tag,
            reason: outcome.error.message,
          });
          break;
        }
      }

      if (endOfData) {
        stopReason = 'end_of_data';
        yield* logger.logBaseline('complete', {
          runId: input.runId,
          lastPage: item.page,
          reason: 'end_of_data',
        });
        break;
      }

      const verdict = yield* breaker.record(signalOf(outcome));
      if (!verdict.tripped || index === items.length - 1) {
        continue;
      }

      const afterPage = yield* Clock.currentTimeMillis;
      const canCoolDown =
        cooldownsUsed < options.maxCooldownsPerRun &&
        afterPage + options.cooldownMs < deadline;

      if (!canCoolDown) {
        yield* logger.logCircuitBreaker('abort', verdict.errorRatio, cooldownsUsed);
        stopReason = 'circuit_open';
        break;
      }

      cooldownsUsed++;
      yield* logger.logCircuitBreaker('cooldown', verdict.errorRatio, cooldownsUsed);
      yield* Effect.sleep(Duration.millis(options.cooldownMs));
      yield* fetcher.recycle();
      yield* breaker.reset();
    }

    const unvisited = batch.filter((entry) => !visited.has(entry.page));
    if (unvisited.length > 0) {
      queue = restoreFailedPages(queue, unvisited);
    }

    const cursor = advanceCursor(
      input.cursor,
      { highestCompleted, endOfData },
      options.pageCeiling
    );
    const baselineCompleted = building && cursor.baselineComplete;

    if (building && !baselineCompleted) {
      yield* logger.logBaseline('progress', {
        runId: input.runId,
        window: [window.first, window.last],
        nextPage: cursor.nextPage,
      });
    } else if (baselineCompleted && !endOfData) {
      yield* logger.logBaseline('complete', {
        runId: input.runId,
        lastPage: highestCompleted,
        reason: 'page_ceiling',
      });
    }

    const finishedAt = yield* Clock.currentTimeMillis;

    return {
      records,
      cursor,
      failedPages: queue,
      stats: new RunStats({
        stopReason,
        pagesAttempted: visited.size,
        pagesSucceeded,
        errorPages,
        emptyPages,
        abandonedPages,
        requeuedPages,
        retries,
        cooldownsUsed,
        recordsExtracted: records.length,
        baselineCompleted,
        elapsedMs: finishedAt - startedAt,
      }),
    };
  });
