import { Console, Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';

export interface HarvestLogEvent {
  timestamp: string;
  type:
    | 'run_lifecycle'
    | 'page_outcome'
    | 'retry'
    | 'circuit_breaker'
    | 'baseline'
    | 'failed_pages'
    | 'delta'
    | 'persistence'
    | 'edge_case';
  runId?: string;
  page?: number;
  message: string;
  details?: Record<string, unknown>;
}

export interface HarvestLogger {
  readonly logEvent: (
    event: Omit<HarvestLogEvent, 'timestamp'>
  ) => Effect.Effect<void>;
  readonly logRunLifecycle: (
    runId: string,
    event: 'start' | 'complete' | 'error',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logPageOutcome: (
    page: number,
    outcome: 'ok' | 'empty' | 'error',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logRetry: (
    page: number,
    attempt: number,
    delayMs: number,
    reason: string
  ) => Effect.Effect<void>;
  readonly logCircuitBreaker: (
    decision: 'cooldown' | 'abort',
    errorRatio: number,
    cooldownsUsed: number
  ) => Effect.Effect<void>;
  readonly logBaseline: (
    event: 'progress' | 'complete',
    details: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logEdgeCase: (
    caseType: string,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
}

export const HarvestLogger = Context.GenericTag<HarvestLogger>('HarvestLogger');

const CONSOLE_TYPES: ReadonlyArray<HarvestLogEvent['type']> = [
  'run_lifecycle',
  'circuit_breaker',
  'baseline',
];

/**
 * Builds a HarvestLogger on top of a single event writer.
 * All convenience methods funnel into `write`.
 */
export const makeHarvestLoggerWith = (
  write: (event: HarvestLogEvent) => Effect.Effect<void>
): HarvestLogger => {
  const emit = (event: Omit<HarvestLogEvent, 'timestamp'>) =>
    write({ ...event, timestamp: new Date().toISOString() });

  return {
    logEvent: emit,

    logRunLifecycle: (runId, event, details) =>
      emit({
        type: 'run_lifecycle',
        runId,
        message: `Run ${runId} ${event}`,
        details,
      }),

    logPageOutcome: (page, outcome, details) =>
      emit({
        type: 'page_outcome',
        page,
        message: `Page ${page}: ${outcome}`,
        details: { outcome, ...details },
      }),

    logRetry: (page, attempt, delayMs, reason) =>
      emit({
        type: 'retry',
        page,
        message: `Retrying page ${page} (attempt ${attempt}) in ${delayMs}ms: ${reason}`,
        details: { attempt, delayMs, reason },
      }),

    logCircuitBreaker: (decision, errorRatio, cooldownsUsed) =>
      emit({
        type: 'circuit_breaker',
        message: `Circuit breaker tripped at error ratio ${errorRatio.toFixed(2)} -> ${decision}`,
        details: { decision, errorRatio, cooldownsUsed },
      }),

    logBaseline: (event, details) =>
      emit({
        type: 'baseline',
        message: `Baseline ${event}`,
        details,
      }),

    logEdgeCase: (caseType, details) =>
      emit({
        type: 'edge_case',
        message: `[EDGE_CASE] ${caseType}`,
        details: { case: caseType, ...details },
      }),
  };
};

/**
 * File-backed logger: one JSON line per event, plus a summary file holding the
 * last lifecycle event of each run. Lifecycle, breaker and baseline events are
 * echoed to the console.
 */
export const makeHarvestLogger = (logDir = './harvest-logs'): HarvestLogger => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFileName = `harvest-${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
  const logFilePath = path.join(logDir, logFileName);
  const summaryFilePath = path.join(logDir, 'harvest-summary.json');

  const updateSummary = (event: HarvestLogEvent) =>
    Effect.sync(() => {
      let summary: Record<string, unknown> = {};
      if (fs.existsSync(summaryFilePath)) {
        try {
          const parsed: unknown = JSON.parse(
            fs.readFileSync(summaryFilePath, 'utf-8')
          );
          if (typeof parsed === 'object' && parsed !== null) {
            summary = { ...parsed };
          }
        } catch {
          summary = {};
        }
      }
      summary = {
        ...summary,
        lastRunId: event.runId,
        lastEvent: event.message,
        updatedAt: event.timestamp,
        ...(event.details && { lastDetails: event.details }),
      };
      fs.writeFileSync(summaryFilePath, JSON.stringify(summary, null, 2));
    });

  return makeHarvestLoggerWith((event) =>
    Effect.gen(function* () {
      yield* Effect.sync(() =>
        fs.appendFileSync(logFilePath, JSON.stringify(event) + '\n')
      );

      if (CONSOLE_TYPES.includes(event.type)) {
        const pageInfo = event.page !== undefined ? ` [page ${event.page}]` : '';
        yield* Console.log(`[${event.type}]${pageInfo} ${event.message}`);
      }

      if (event.type === 'run_lifecycle') {
        yield* updateSummary(event);
      }
    })
  );
};

export const HarvestLoggerLive = (logDir?: string) =>
  Layer.sync(HarvestLogger, () => makeHarvestLogger(logDir));
