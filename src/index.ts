// Harvester
export type {
  HarvestFailure,
  HarvestLayerParts,
  HarvestReport,
  HarvestRequirements,
} from './lib/Harvester/Harvester.service.js';
export {
  Harvester,
  makeHarvestLayer,
  runHarvest,
} from './lib/Harvester/Harvester.service.js';

// Configuration
export type {
  HarvestConfigOptions,
  HarvestConfigService,
  StaleEntryRetention,
} from './lib/Config/HarvestConfig.service.js';
export {
  DEFAULT_HARVEST_OPTIONS,
  HarvestConfig,
  loadHarvestOptionsFile,
  makeHarvestConfig,
  validateHarvestOptions,
} from './lib/Config/HarvestConfig.service.js';

// Records and identity
export type { IdentitySpec } from './lib/Record/Record.js';
export {
  HarvestRecord,
  makeRecord,
  recordIdentity,
  RecordFields,
} from './lib/Record/Record.js';

// Fetching and classification
export type {
  FetchResult,
  PageFetcherService,
} from './lib/Fetch/PageFetcher.js';
export { PageFetcher, transportFailure } from './lib/Fetch/PageFetcher.js';
export type { ErrorPageDetectorService } from './lib/Fetch/FetchClassifier.js';
export {
  classifyFetch,
  ErrorPageDetector,
  FetchOutcome,
  isErrorOutcome,
  makeMarkerErrorPageDetector,
} from './lib/Fetch/FetchClassifier.js';
export type { HttpPageFetcherOptions } from './lib/Fetch/HttpPageFetcher.js';
export {
  HttpPageFetcherLive,
  makeHttpPageFetcher,
  pageUrl,
} from './lib/Fetch/HttpPageFetcher.js';

// Extraction
export type { RecordExtractorService } from './lib/Extractor/RecordExtractor.js';
export { RecordExtractor } from './lib/Extractor/RecordExtractor.js';
export type { TableExtractorOptions } from './lib/Extractor/TableExtractor.js';
export {
  columnIndex,
  extractTableRecords,
  makeTableExtractor,
  readLabelledFields,
  TableExtractorLive,
} from './lib/Extractor/TableExtractor.js';

// Failure recovery
export type { PageAttempt, RetryPolicy } from './lib/Retry/RetryController.js';
export { attemptPage, backoffDelayMs } from './lib/Retry/RetryController.js';
export type {
  BreakerSignal,
  BreakerVerdict,
  CircuitBreaker,
  CircuitBreakerOptions,
} from './lib/CircuitBreaker/CircuitBreaker.js';
export {
  errorRatio,
  makeCircuitBreaker,
  signalOf,
} from './lib/CircuitBreaker/CircuitBreaker.js';
export type {
  FailedPageLimits,
  FailedPageQueue,
  PushResult,
} from './lib/FailedPages/FailedPageQueue.js';
export {
  clearFailedPage,
  FailedPageEntry,
  FailedPageQueueDocument,
  popFailedBatch,
  pushFailedPage,
  restoreFailedPages,
} from './lib/FailedPages/FailedPageQueue.js';

// Scheduling
export type {
  BuildingProgress,
  CursorLimits,
  PageRange,
} from './lib/Cursor/Cursor.js';
export {
  advanceCursor,
  Cursor,
  rangePages,
  sequentialWindow,
} from './lib/Cursor/Cursor.js';
export type {
  WorkItem,
  Worklist,
  WorklistOptions,
  WorkSource,
} from './lib/Orchestrator/Worklist.js';
export { buildWorklist } from './lib/Orchestrator/Worklist.js';
export type {
  CrawlInput,
  CrawlRequirements,
  CrawlResult,
} from './lib/Orchestrator/RunOrchestrator.js';
export { runCrawl } from './lib/Orchestrator/RunOrchestrator.js';
export { RunStats, StopReason } from './lib/Orchestrator/RunStats.js';

// Change detection
export type {
  DeltaOptions,
  DeltaResult,
  FieldDiff,
  StateStore,
} from './lib/Delta/DeltaEngine.js';
export {
  ChangeRecord,
  computeDelta,
  dedupeBatch,
  diffFields,
  pruneStaleEntries,
  StateEntry,
  StateStoreDocument,
} from './lib/Delta/DeltaEngine.js';

// Filtering
export type {
  RecordFilterService,
  WhitelistRules,
} from './lib/Filter/RecordFilter.js';
export { makeWhitelistFilter, RecordFilter } from './lib/Filter/RecordFilter.js';

// Notification
export type { ChangeSinkService } from './lib/Notify/ChangeSink.js';
export { ChangeSink, combineSinks } from './lib/Notify/ChangeSink.js';
export type { ChangelogOptions } from './lib/Notify/ChangelogReport.js';
export {
  makeChangelogSink,
  renderChangelog,
} from './lib/Notify/ChangelogReport.js';
export type { ChangeLine } from './lib/Notify/JsonlChangeSink.js';
export { makeJsonlChangeSink, toChangeLine } from './lib/Notify/JsonlChangeSink.js';

// Persistence
export type { DocumentName, StorageBackend } from './lib/Persistence/types.js';
export { HarvestStorage } from './lib/Persistence/types.js';
export type { HarvestSnapshot } from './lib/Persistence/HarvestStore.js';
export {
  emptySnapshot,
  loadRunStatus,
  loadSnapshot,
  saveSnapshot,
} from './lib/Persistence/HarvestStore.js';
export { RunStatus } from './lib/Persistence/RunStatus.js';
export type { FileStorageOptions } from './lib/Persistence/backends/FileStorageBackend.js';
export { FileStorageBackend } from './lib/Persistence/backends/FileStorageBackend.js';
export { MemoryStorageBackend } from './lib/Persistence/backends/MemoryStorageBackend.js';

// Logging
export type { HarvestLogEvent } from './lib/Logging/HarvestLogger.service.js';
export {
  HarvestLogger,
  HarvestLoggerLive,
  makeHarvestLogger,
  makeHarvestLoggerWith,
} from './lib/Logging/HarvestLogger.service.js';

// Errors
export type { FetchFailure, HarvestError } from './lib/errors.js';
export {
  BackendUnavailableError,
  ConfigurationError,
  DeliveryError,
  ExtractionError,
  PersistenceError,
  RunLockError,
  TransientFetchError,
} from './lib/errors.js';
