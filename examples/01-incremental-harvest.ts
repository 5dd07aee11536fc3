/**
 * Example 01: Incremental harvest of a paginated listing
 *
 * Harvests a permit register page by page, keeps its state under
 * `examples/temp/harvest-state`, and writes each run's changes to a
 * Markdown changelog and a JSON-lines feed. Run it repeatedly: the first
 * run records a silent baseline, later runs report only new and updated
 * records.
 */

import { Effect } from 'effect';
import { join } from 'path';
import {
  ChangeSink,
  FileStorageBackend,
  Harvester,
  HarvestConfig,
  HarvestLoggerLive,
  HttpPageFetcherLive,
  makeChangelogSink,
  makeHarvestLayer,
  makeJsonlChangeSink,
  RecordFilter,
  TableExtractorLive,
} from '../src/index.js';

const WORK_DIR = join(process.cwd(), 'examples', 'temp');

const layer = makeHarvestLayer({
  config: HarvestConfig.Live({
    pageCeiling: 200,
    perRunPageLimit: 40,
    deltaWindowSize: 5,
    errorPageMarkers: ['Service temporarily unavailable'],
    significantFields: ['stage', 'address'],
  }),
  fetcher: HttpPageFetcherLive({
    urlTemplate: 'https://registry.example.com/permits?page={page}',
  }),
  extractor: TableExtractorLive({
    columns: {
      case_number: ['Case number', 'Case No.'],
      authority: ['Authority', 'Building board'],
      address: ['Address'],
      stage: ['Stage', 'Status'],
    },
    linkField: 'details_url',
    linkMatch: '/permits/',
    baseUrl: 'https://registry.example.com/',
    identity: { naturalKey: 'case_number', hashFields: ['authority', 'address'] },
  }),
  storage: new FileStorageBackend(join(WORK_DIR, 'harvest-state')),
  filter: RecordFilter.whitelist({ deny: { stage: ['Withdrawn'] } }),
  sink: ChangeSink.of(
    makeChangelogSink(join(WORK_DIR, 'CHANGELOG.md'), {
      title: 'Building permits',
      headlineField: 'authority',
      summaryFields: ['case_number', 'address', 'stage'],
      linkField: 'details_url',
    }),
    makeJsonlChangeSink(join(WORK_DIR, 'changes.jsonl'))
  ),
  logger: HarvestLoggerLive(join(WORK_DIR, 'logs')),
});

const program = Effect.gen(function* () {
  const harvester = yield* Harvester;
  const { status, changes } = yield* harvester.run();

  console.log(`Run ${status.runId} stopped: ${status.stats.stopReason}`);
  console.log(
    `Pages ${status.stats.pagesSucceeded}/${status.stats.pagesAttempted}, ` +
      `${status.recordsAccepted} records, state holds ${status.stateSize}`
  );
  if (status.baselineRun) {
    console.log('Baseline run: nothing reported');
  }
  for (const change of changes) {
    const label = change._tag === 'New' ? 'new' : 'updated';
    console.log(`  ${label}: ${change.record.id}`);
  }
});

Effect.runPromise(program.pipe(Effect.provide(layer))).catch((error: unknown) => {
  console.error('Harvest failed:', error);
  process.exitCode = 1;
});
