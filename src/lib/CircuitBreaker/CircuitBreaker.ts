import { Effect, Ref } from 'effect';
import type { FetchOutcome } from '../Fetch/FetchClassifier.js';

/**
 * What the breaker remembers about one page visit.
 */
export type BreakerSignal = 'ok' | 'empty' | 'transient' | 'backend';

export interface CircuitBreakerOptions {
  readonly windowSize: number;
  /** Trip when the weighted error ratio reaches this value */
  readonly errorThreshold: number;
  /** Weight of a backend error page; transient errors weigh 1 */
  readonly backendWeight: number;
}

export interface BreakerVerdict {
  readonly tripped: boolean;
  readonly errorRatio: number;
  readonly windowFull: boolean;
}

/**
 * Sliding window over the most recent page outcomes.
 *
 * @group Circuit Breaker
 * @public
 */
export interface CircuitBreaker {
  /** Push one outcome and evaluate the window */
  readonly record: (signal: BreakerSignal) => Effect.Effect<BreakerVerdict>;
  /** Forget every recorded outcome */
  readonly reset: () => Effect.Effect<void>;
  readonly window: Effect.Effect<readonly BreakerSignal[]>;
}

export const signalOf = (outcome: FetchOutcome): BreakerSignal => {
  switch (outcome._tag) {
    case 'Ok':
      return 'ok';
    case 'Empty':
      return 'empty';
    case 'Error':
      return outcome.error._tag === 'BackendUnavailableError'
        ? 'backend'
        : 'transient';
  }
};

/**
 * Weighted error ratio of a window, capped at 1.
 */
export const errorRatio = (
  window: readonly BreakerSignal[],
  options: CircuitBreakerOptions
): number => {
  const weight = window.reduce(
    (sum, signal) =>
      sum +
      (signal === 'transient' ? 1 : signal === 'backend' ? options.backendWeight : 0),
    0
  );
  return Math.min(1, weight / options.windowSize);
};

/**
 * Creates a breaker. It trips only once the window is full, so with a window
 * of N the earliest trip happens on the N-th recorded outcome.
 *
 * @group Circuit Breaker
 * @public
 */
export const makeCircuitBreaker = (
  options: CircuitBreakerOptions
): Effect.Effect<CircuitBreaker> =>
  Effect.gen(function* () {
    const windowRef = yield* Ref.make<readonly BreakerSignal[]>([]);

    return {
      record: (signal) =>
        Ref.updateAndGet(windowRef, (window) =>
          [...window, signal].slice(-options.windowSize)
        ).pipe(
          Effect.map((window) => {
            const windowFull = window.length >= options.windowSize;
            const ratio = errorRatio(window, options);
            return {
              tripped: windowFull && ratio >= options.errorThreshold,
              errorRatio: ratio,
              windowFull,
            };
          })
        ),
      reset: () => Ref.set(windowRef, []),
      window: Ref.get(windowRef),
    };
  });
