import { Clock, Effect, Layer } from 'effect';
import { HarvestConfig, type HarvestConfigService } from '../Config/HarvestConfig.service.js';
import {
  ChangeRecord,
  computeDelta,
  pruneStaleEntries,
} from '../Delta/DeltaEngine.js';
import type {
  ConfigurationError,
  DeliveryError,
  PersistenceError,
  RunLockError,
} from '../errors.js';
import type { RecordExtractor } from '../Extractor/RecordExtractor.js';
import { ErrorPageDetector } from '../Fetch/FetchClassifier.js';
import type { PageFetcher } from '../Fetch/PageFetcher.js';
import { RecordFilter } from '../Filter/RecordFilter.js';
import {
  HarvestLogger,
  HarvestLoggerLive,
} from '../Logging/HarvestLogger.service.js';
import { ChangeSink } from '../Notify/ChangeSink.js';
import {
  type CrawlRequirements,
  runCrawl,
} from '../Orchestrator/RunOrchestrator.js';
import { loadSnapshot, saveSnapshot } from '../Persistence/HarvestStore.js';
import { RunStatus } from '../Persistence/RunStatus.js';
import { HarvestStorage, type StorageBackend } from '../Persistence/types.js';

/**
 * Result of one harvest run.
 *
 * @group Harvester
 * @public
 */
export interface HarvestReport {
  readonly status: RunStatus;
  /** Changes handed to the sink (empty on quiet baseline runs) */
  readonly changes: readonly ChangeRecord[];
}

export type HarvestRequirements =
  | CrawlRequirements
  | RecordFilter
  | ChangeSink
  | HarvestStorage;

export type HarvestFailure = PersistenceError | DeliveryError | RunLockError;

/**
 * One complete run, without the run lock.
 *
 * Order of effects: load the snapshot, crawl, filter, diff, deliver the
 * changes, then save every document. A failure before the save leaves the
 * stored state untouched, so the next run starts from the same snapshot.
 */
const harvestOnce = (
  runId: string | undefined
): Effect.Effect<
  HarvestReport,
  PersistenceError | DeliveryError,
  HarvestRequirements
> =>
  Effect.gen(function* () {
    const config = yield* HarvestConfig;
    const options = yield* config.getOptions();
    const significantFields = yield* config.getSignificantFields();
    const logger = yield* HarvestLogger;
    const filter = yield* RecordFilter;
    const sink = yield* ChangeSink;

    const startedAt = new Date(yield* Clock.currentTimeMillis);
    const id = runId ?? `run-${startedAt.toISOString()}`;

    return yield* Effect.gen(function* () {
      const snapshot = yield* loadSnapshot;
      yield* logger.logRunLifecycle(id, 'start', {
        nextPage: snapshot.cursor.nextPage,
        baselineComplete: snapshot.cursor.baselineComplete,
        knownRecords: Object.keys(snapshot.state).length,
        failedPages: snapshot.failedPages.length,
      });

      const crawl = yield* runCrawl({
        runId: id,
        cursor: snapshot.cursor,
        failedPages: snapshot.failedPages,
      });

      const accepted = crawl.records.filter(filter.accepts);
      const now = new Date(yield* Clock.currentTimeMillis);
      const delta = computeDelta(snapshot.state, accepted, {
        significantFields,
        now,
      });

      const retention = options.staleEntryRetention;
      const { state, pruned } =
        retention.mode === 'prune'
          ? pruneStaleEntries(delta.state, now, retention.maxAgeMs)
          : { state: delta.state, pruned: [] };

      const quiet =
        delta.isBaselineRun ||
        (options.quietBaseline === 'until-complete' &&
          !snapshot.cursor.baselineComplete);
      const changes = quiet ? [] : delta.changes;

      yield* logger.logEvent({
        type: 'delta',
        runId: id,
        message: quiet
          ? `Recorded ${Object.keys(state).length} records without notifications`
          : `Detected ${changes.length} changes`,
        details: {
          extracted: crawl.records.length,
          accepted: accepted.length,
          new: changes.filter(ChangeRecord.$is('New')).length,
          updated: changes.filter(ChangeRecord.$is('Updated')).length,
          unchanged: delta.unchanged,
          pruned: pruned.length,
          quiet,
        },
      });

      const finishedAt = new Date(yield* Clock.currentTimeMillis);
      const status = new RunStatus({
        runId: id,
        startedAt,
        finishedAt,
        stats: crawl.stats,
        recordsAccepted: accepted.length,
        newRecords: changes.filter(ChangeRecord.$is('New')).length,
        updatedRecords: changes.filter(ChangeRecord.$is('Updated')).length,
        unchangedRecords: delta.unchanged,
        prunedEntries: pruned.length,
        prunedIds: pruned,
        baselineRun: quiet,
        stateSize: Object.keys(state).length,
        failedPagesQueued: crawl.failedPages.length,
        cursor: crawl.cursor,
      });

      yield* sink.deliver(changes, status);

      yield* saveSnapshot(
        { state, cursor: crawl.cursor, failedPages: crawl.failedPages },
        status
      );
      yield* logger.logEvent({
        type: 'persistence',
        runId: id,
        message: 'Saved state, cursor, failed pages and run status',
        details: { stateSize: status.stateSize, cursor: crawl.cursor.nextPage },
      });

      yield* logger.logRunLifecycle(id, 'complete', {
        stopReason: crawl.stats.stopReason,
        pagesAttempted: crawl.stats.pagesAttempted,
        newRecords: status.newRecords,
        updatedRecords: status.updatedRecords,
        elapsedMs: finishedAt.getTime() - startedAt.getTime(),
      });

      return { status, changes };
    }).pipe(
      Effect.tapError((error) =>
        logger.logRunLifecycle(id, 'error', {
          error: error._tag,
          message: error.message,
        })
      )
    );
  });

/**
 * Runs one harvest while holding the store's run lock.
 *
 * @example
 * ```typescript
 * const report = await Effect.runPromise(
 *   runHarvest().pipe(Effect.provide(layer))
 * );
 * console.log(report.status.stats.stopReason);
 * ```
 *
 * @group Harvester
 * @public
 */
export const runHarvest = (
  runId?: string
): Effect.Effect<HarvestReport, HarvestFailure, HarvestRequirements> =>
  Effect.gen(function* () {
    const storage = yield* HarvestStorage;
    return yield* storage.withRunLock(harvestOnce(runId));
  });

/**
 * Harvester service: {@link runHarvest} with its collaborators captured
 * when the layer is built.
 *
 * @group Harvester
 * @public
 */
export class Harvester extends Effect.Service<Harvester>()(
  'delta-harvester/Harvester',
  {
    effect: Effect.gen(function* () {
      const context = yield* Effect.context<HarvestRequirements>();
      return {
        run: (runId?: string) =>
          runHarvest(runId).pipe(Effect.provide(context)),
      };
    }),
  }
) {}

/**
 * Collaborators needed to assemble a harvest environment.
 *
 * @group Harvester
 * @public
 */
export interface HarvestLayerParts {
  readonly config: Layer.Layer<HarvestConfigService, ConfigurationError>;
  readonly fetcher: Layer.Layer<PageFetcher, never, HarvestConfigService>;
  readonly extractor: Layer.Layer<RecordExtractor>;
  readonly storage: StorageBackend;
  readonly filter?: Layer.Layer<RecordFilter>;
  readonly sink?: Layer.Layer<ChangeSink>;
  readonly logger?: Layer.Layer<HarvestLogger>;
  /** Error-page predicate; defaults to the configured markers */
  readonly errorPageDetector?: Layer.Layer<ErrorPageDetector, never, HarvestConfigService>;
}

/**
 * Builds the layer providing every harvest requirement plus the
 * {@link Harvester} service.
 *
 * @group Harvester
 * @public
 */
export const makeHarvestLayer = (parts: HarvestLayerParts) => {
  const configured = Layer.mergeAll(
    parts.fetcher,
    parts.errorPageDetector ?? ErrorPageDetector.Default
  ).pipe(Layer.provideMerge(parts.config));

  const requirements = Layer.mergeAll(
    configured,
    parts.extractor,
    Layer.succeed(HarvestStorage, parts.storage),
    parts.filter ?? RecordFilter.AcceptAll,
    parts.sink ?? ChangeSink.Discard,
    parts.logger ?? HarvestLoggerLive()
  );

  return Harvester.Default.pipe(Layer.provideMerge(requirements));
};
