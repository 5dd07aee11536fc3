import { Data, Schema } from 'effect';
import { HarvestRecord } from '../Record/Record.js';

/**
 * Durable snapshot of one identity.
 *
 * `firstSeen` is set once, when the identity first enters the store.
 * `lastSeen` moves forward every run the identity is observed.
 *
 * @group Data Types
 * @public
 */
export class StateEntry extends Schema.Class<StateEntry>('StateEntry')({
  record: HarvestRecord,
  firstSeen: Schema.Date,
  lastSeen: Schema.Date,
}) {}

/**
 * The state store document: identity to snapshot.
 */
export const StateStoreDocument = Schema.Record({
  key: Schema.String,
  value: StateEntry,
});
export type StateStore = typeof StateStoreDocument.Type;

export interface FieldDiff {
  readonly field: string;
  /** Empty string when the field was absent */
  readonly before: string;
  readonly after: string;
}

/**
 * One detected change.
 *
 * @group Delta
 * @public
 */
export type ChangeRecord = Data.TaggedEnum<{
  New: { readonly record: HarvestRecord };
  Updated: {
    readonly record: HarvestRecord;
    readonly diffs: readonly FieldDiff[];
  };
}>;

export const ChangeRecord = Data.taggedEnum<ChangeRecord>();

export interface DeltaOptions {
  /** Fields compared for updates; every field of either side when undefined */
  readonly significantFields?: readonly string[];
  readonly now: Date;
}

export interface DeltaResult {
  readonly changes: readonly ChangeRecord[];
  readonly state: StateStore;
  /** True when the prior store was empty; such runs emit no changes */
  readonly isBaselineRun: boolean;
  readonly unchanged: number;
}

/**
 * Per-field differences between two field maps.
 */
export const diffFields = (
  before: HarvestRecord['fields'],
  after: HarvestRecord['fields'],
  significantFields?: readonly string[]
): FieldDiff[] => {
  const fields =
    significantFields ??
    [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();

  return fields.flatMap((field) => {
    const previous = before[field] ?? '';
    const current = after[field] ?? '';
    return previous === current ? [] : [{ field, before: previous, after: current }];
  });
};

/**
 * Keeps the last record of each identity, in first-seen order.
 */
export const dedupeBatch = (
  batch: readonly HarvestRecord[]
): HarvestRecord[] => {
  const byId = new Map<string, HarvestRecord>();
  for (const record of batch) {
    byId.set(record.id, record);
  }
  return [...byId.values()];
};

/**
 * Own entry of `id`; identities such as `constructor` never resolve to
 * inherited members.
 */
const lookupEntry = (state: StateStore, id: string): StateEntry | undefined =>
  Object.hasOwn(state, id) ? state[id] : undefined;

/**
 * Compares a batch of records with the prior state.
 *
 * Identities absent from the batch are carried over untouched: a partial
 * scan never deletes anything. Running the same batch twice yields no
 * changes the second time.
 *
 * @example
 * ```typescript
 * const { changes, state } = computeDelta(prior, records, {
 *   significantFields: ['stage'],
 *   now: new Date(),
 * });
 * ```
 *
 * @group Delta
 * @public
 */
export const computeDelta = (
  prior: StateStore,
  batch: readonly HarvestRecord[],
  options: DeltaOptions
): DeltaResult => {
  const isBaselineRun = Object.keys(prior).length === 0;
  const state = new Map<string, StateEntry>(Object.entries(prior));
  const changes: ChangeRecord[] = [];
  let unchanged = 0;

  for (const record of dedupeBatch(batch)) {
    const existing = lookupEntry(prior, record.id);

    if (existing === undefined) {
      state.set(
        record.id,
        new StateEntry({ record, firstSeen: options.now, lastSeen: options.now })
      );
      if (!isBaselineRun) {
        changes.push(ChangeRecord.New({ record }));
      }
      continue;
    }

    const diffs = diffFields(
      existing.record.fields,
      record.fields,
      options.significantFields
    );

    if (diffs.length === 0) {
      unchanged++;
      state.set(
        record.id,
        new StateEntry({
          record: existing.record,
          firstSeen: existing.firstSeen,
          lastSeen: options.now,
        })
      );
      continue;
    }

    state.set(
      record.id,
      new StateEntry({ record, firstSeen: existing.firstSeen, lastSeen: options.now })
    );
    changes.push(ChangeRecord.Updated({ record, diffs }));
  }

  return {
    changes,
    state: Object.fromEntries(state),
    isBaselineRun,
    unchanged,
  };
};

/**
 * Removes entries not observed for longer than `maxAgeMs`.
 *
 * @group Delta
 * @public
 */
export const pruneStaleEntries = (
  state: StateStore,
  now: Date,
  maxAgeMs: number
): { readonly state: StateStore; readonly pruned: readonly string[] } => {
  const cutoff = now.getTime() - maxAgeMs;
  const kept: [string, StateEntry][] = [];
  const pruned: string[] = [];

  for (const [id, entry] of Object.entries(state)) {
    if (entry.lastSeen.getTime() < cutoff) {
      pruned.push(id);
    } else {
      kept.push([id, entry]);
    }
  }

  return { state: Object.fromEntries(kept), pruned };
};
