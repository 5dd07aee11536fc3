import { Clock, Duration, Effect, Random } from 'effect';
import { HarvestLogger } from '../Logging/HarvestLogger.service.js';
import { PageFetcher, transportFailure } from '../Fetch/PageFetcher.js';
import { RecordExtractor } from '../Extractor/RecordExtractor.js';
import {
  classifyFetch,
  ErrorPageDetector,
  type FetchOutcome,
} from '../Fetch/FetchClassifier.js';

export interface RetryPolicy {
  /** Attempts allowed after the first one */
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  /** Jitter is drawn uniformly from [0, backoffJitterMs) */
  readonly backoffJitterMs: number;
  readonly fetchTimeoutMs: number;
}

/**
 * Final result of driving one page through the retry loop.
 */
export interface PageAttempt {
  readonly page: number;
  readonly outcome: FetchOutcome;
  /** Fetches actually issued for this page, at least 1 */
  readonly attempts: number;
}

/**
 * Delay before retry `retry` (1-based), without jitter.
 */
export const backoffDelayMs = (policy: RetryPolicy, retry: number): number =>
  policy.backoffBaseMs * Math.pow(2, retry - 1);

const jitterMs = (policy: RetryPolicy): Effect.Effect<number> =>
  policy.backoffJitterMs >= 1
    ? Random.nextIntBetween(0, Math.floor(policy.backoffJitterMs))
    : Effect.succeed(0);

/**
 * Fetches and classifies a page, retrying `Error` outcomes with exponential
 * backoff.
 *
 * `Ok` and `Empty` return immediately. After the first failure the fetcher is
 * recycled once. A retry whose backoff would end after `deadline` is not
 * started and the last `Error` is returned.
 *
 * @group Retry
 * @public
 */
export const attemptPage = (
  page: number,
  deadline: number,
  policy: RetryPolicy
): Effect.Effect<
  PageAttempt,
  never,
  PageFetcher | RecordExtractor | ErrorPageDetector | HarvestLogger
> =>
  Effect.gen(function* () {
    const fetcher = yield* PageFetcher;
    const extractor = yield* RecordExtractor;
    const detector = yield* ErrorPageDetector;
    const logger = yield* HarvestLogger;

    const fetchOnce = fetcher.fetchPage(page).pipe(
      Effect.timeoutTo({
        duration: Duration.millis(policy.fetchTimeoutMs),
        onSuccess: (result) => result,
        onTimeout: () =>
          transportFailure(`timed out after ${policy.fetchTimeoutMs}ms`),
      }),
      Effect.flatMap((result) =>
        classifyFetch(page, result, detector, extractor)
      )
    );

    let attempts = 1;
    let outcome = yield* fetchOnce;

    while (outcome._tag === 'Error' && attempts <= policy.maxRetries) {
      const retry = attempts;
      const delay = backoffDelayMs(policy, retry) + (yield* jitterMs(policy));
      const now = yield* Clock.currentTimeMillis;

      if (now + delay > deadline) {
        yield* logger.logEdgeCase('retry_skipped_for_deadline', {
          page,
          attempts,
          delayMs: delay,
        });
        break;
      }

      if (retry === 1) {
        yield* fetcher.recycle();
      }

      yield* logger.logRetry(page, retry, delay, outcome.error.message);
      yield* Effect.sleep(Duration.millis(delay));

      attempts++;
      outcome = yield* fetchOnce;
    }

    return { page, outcome, attempts };
  });
