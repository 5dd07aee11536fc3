import { describe, expect, it } from 'vitest';
import { Effect, Layer, Option } from 'effect';
import {
  type HarvestConfigOptions,
  HarvestConfig,
} from '../../../lib/Config/HarvestConfig.service.js';
import { type ChangeRecord } from '../../../lib/Delta/DeltaEngine.js';
import { DeliveryError } from '../../../lib/errors.js';
import { RecordExtractor } from '../../../lib/Extractor/RecordExtractor.js';
import { PageFetcher } from '../../../lib/Fetch/PageFetcher.js';
import { RecordFilter } from '../../../lib/Filter/RecordFilter.js';
import { Harvester, makeHarvestLayer } from '../../../lib/Harvester/Harvester.service.js';
import { HarvestLogger } from '../../../lib/Logging/HarvestLogger.service.js';
import { ChangeSink } from '../../../lib/Notify/ChangeSink.js';
import { MemoryStorageBackend } from '../../../lib/Persistence/backends/MemoryStorageBackend.js';
import { loadRunStatus, loadSnapshot } from '../../../lib/Persistence/HarvestStore.js';
import { HarvestStorage } from '../../../lib/Persistence/types.js';
import type { RecordFields } from '../../../lib/Record/Record.js';
import {
  jsonExtractor,
  makeMemoryLogger,
  makeScriptedFetcher,
  type PageResponse,
  runEffect,
  runEffectEither,
  TEST_OPTIONS,
} from '../../utils/test-helpers.js';

const page = (...rows: RecordFields[]): PageResponse => ({ kind: 'rows', rows });

/**
 * A listing the test can edit between runs, with everything it needs to
 * run the harvester against it.
 */
const makeWorld = (
  options: Partial<HarvestConfigOptions> = {},
  extra: { filter?: Layer.Layer<RecordFilter>; failDelivery?: () => boolean } = {}
) => {
  const listing = new Map<number, PageResponse>();
  const fetcher = makeScriptedFetcher((n) => listing.get(n) ?? { kind: 'empty' });
  const storage = new MemoryStorageBackend();
  const memory = makeMemoryLogger();
  const deliveries: (readonly ChangeRecord[])[] = [];

  const layer = makeHarvestLayer({
    config: HarvestConfig.Live({ ...TEST_OPTIONS, ...options }),
    fetcher: Layer.succeed(PageFetcher, fetcher.service),
    extractor: Layer.succeed(RecordExtractor, jsonExtractor),
    storage,
    filter: extra.filter,
    logger: Layer.succeed(HarvestLogger, memory.logger),
    sink: ChangeSink.of({
      name: 'capture',
      deliver: (changes) =>
        extra.failDelivery?.()
          ? Effect.fail(DeliveryError.fromCause('capture', 'unreachable'))
          : Effect.sync(() => {
              deliveries.push(changes);
            }),
    }),
  });

  const run = (runId: string) =>
    Effect.gen(function* () {
      const harvester = yield* Harvester;
      return yield* harvester.run(runId);
    }).pipe(Effect.provide(layer));

  const stored = <A, E>(effect: Effect.Effect<A, E, HarvestStorage>) =>
    runEffect(effect.pipe(Effect.provide(Layer.succeed(HarvestStorage, storage))));

  return { listing, fetcher, storage, memory, deliveries, run, stored };
};

const summary = (changes: readonly ChangeRecord[]) =>
  changes.map((change) =>
    change._tag === 'Updated'
      ? { tag: change._tag, id: change.record.id, diffs: change.diffs }
      : { tag: change._tag, id: change.record.id }
  );

describe('Harvester', () => {
  it('should seed silently, then report changes on the next run', async () => {
    const world = makeWorld();
    world.listing.set(1, page({ id: 'X', phase: 'Planned' }, { id: 'Y', phase: 'Design' }));
    world.listing.set(2, page({ id: 'W', phase: 'Design' }));

    const first = await runEffect(world.run('run-1'));

    expect(first.changes).toEqual([]);
    expect(first.status.baselineRun).toBe(true);
    expect(first.status.stats.stopReason).toBe('end_of_data');
    expect(first.status.stateSize).toBe(3);
    expect(first.status.cursor.baselineComplete).toBe(true);
    expect(world.fetcher.calls).toEqual([1, 2, 3, 4]);

    world.listing.set(1, page({ id: 'X', phase: 'Construction' }, { id: 'Y', phase: 'Design' }));
    world.listing.set(2, page({ id: 'W', phase: 'Design' }, { id: 'Z', phase: 'Planned' }));

    const second = await runEffect(world.run('run-2'));

    expect(world.fetcher.calls.slice(4)).toEqual([1, 2, 3]);
    expect(summary(second.changes)).toEqual([
      {
        tag: 'Updated',
        id: 'X',
        diffs: [{ field: 'phase', before: 'Planned', after: 'Construction' }],
      },
      { tag: 'New', id: 'Z' },
    ]);
    expect(second.status.newRecords).toBe(1);
    expect(second.status.updatedRecords).toBe(1);
    expect(second.status.unchangedRecords).toBe(2);
    expect(world.deliveries.map(summary)).toEqual([[], summary(second.changes)]);

    const snapshot = await world.stored(loadSnapshot);
    expect(Object.keys(snapshot.state).sort()).toEqual(['W', 'X', 'Y', 'Z']);
    expect(snapshot.state['X'].firstSeen.getTime()).toBeLessThanOrEqual(
      snapshot.state['X'].lastSeen.getTime()
    );

    const lastStatus = await world.stored(loadRunStatus);
    expect(Option.map(lastStatus, (status) => status.runId)).toEqual(Option.some('run-2'));
  });

  it('should save nothing when delivery fails', async () => {
    let failing = false;
    const world = makeWorld({}, { failDelivery: () => failing });
    world.listing.set(1, page({ id: 'X', phase: 'Planned' }));

    await runEffect(world.run('run-1'));
    world.listing.set(1, page({ id: 'X', phase: 'Approved' }));
    failing = true;

    const result = await runEffectEither(world.run('run-2'));

    expect(result._tag).toBe('Left');
    if (result._tag === 'Left') {
      expect(result.left._tag).toBe('DeliveryError');
    }
    const snapshot = await world.stored(loadSnapshot);
    expect(snapshot.state['X'].record.fields['phase']).toBe('Planned');
    expect(
      world.memory.ofType('run_lifecycle').map((event) => event.message)
    ).toEqual(['Run run-1 start', 'Run run-1 complete', 'Run run-2 start', 'Run run-2 error']);

    failing = false;
    const retried = await runEffect(world.run('run-3'));
    expect(summary(retried.changes)).toEqual([
      { tag: 'Updated', id: 'X', diffs: [{ field: 'phase', before: 'Planned', after: 'Approved' }] },
    ]);
  });

  it('should keep filtered records out of the state store', async () => {
    const world = makeWorld({}, { filter: RecordFilter.whitelist({ deny: { phase: ['Withdrawn'] } }) });
    world.listing.set(1, page({ id: 'A', phase: 'Design' }, { id: 'B', phase: 'Withdrawn' }));

    const report = await runEffect(world.run('run-1'));

    expect(report.status.recordsAccepted).toBe(1);
    expect(report.status.stats.recordsExtracted).toBe(2);
    const snapshot = await world.stored(loadSnapshot);
    expect(Object.keys(snapshot.state)).toEqual(['A']);
  });

  it('should name the identities it prunes', async () => {
    const world = makeWorld({ staleEntryRetention: { mode: 'prune', maxAgeMs: 1 } });
    world.listing.set(1, page({ id: 'X', phase: 'Design' }, { id: 'Y', phase: 'Design' }));

    await runEffect(world.run('run-1'));
    world.listing.set(1, page({ id: 'X', phase: 'Design' }));
    await new Promise((resolve) => setTimeout(resolve, 10));

    const second = await runEffect(world.run('run-2'));

    expect(second.status.prunedIds).toEqual(['Y']);
    expect(second.status.prunedEntries).toBe(1);
    expect(second.status.stateSize).toBe(1);
    const lastStatus = await world.stored(loadRunStatus);
    expect(Option.map(lastStatus, (status) => status.prunedIds)).toEqual(Option.some(['Y']));
  });

  describe('quietBaseline', () => {
    const seedTwoRuns = async (quietBaseline: HarvestConfigOptions['quietBaseline']) => {
      const world = makeWorld({ perRunPageLimit: 2, quietBaseline });
      for (let n = 1; n <= 4; n++) {
        world.listing.set(n, page({ id: `R-${n}`, phase: 'Design' }));
      }
      await runEffect(world.run('run-1'));
      return runEffect(world.run('run-2'));
    };

    it('should report records found later in the baseline by default', async () => {
      const second = await seedTwoRuns('first-run');

      expect(summary(second.changes)).toEqual([
        { tag: 'New', id: 'R-3' },
        { tag: 'New', id: 'R-4' },
      ]);
      expect(second.status.baselineRun).toBe(false);
    });

    it('should stay silent until the baseline is complete when asked to', async () => {
      const second = await seedTwoRuns('until-complete');

      expect(second.changes).toEqual([]);
      expect(second.status.baselineRun).toBe(true);
      expect(second.status.stateSize).toBe(4);
    });
  });

  it('should not start while another run holds the lock', async () => {
    const world = makeWorld();

    const result = await runEffect(
      world.storage.withRunLock(Effect.either(world.run('run-1')))
    );

    expect(result._tag).toBe('Left');
    if (result._tag === 'Left') {
      expect(result.left._tag).toBe('RunLockError');
    }
    expect(world.fetcher.calls).toEqual([]);
  });
});
