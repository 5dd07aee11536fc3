import { Schema } from 'effect';
import { Cursor } from '../Cursor/Cursor.js';
import { RunStats } from '../Orchestrator/RunStats.js';

/**
 * Machine-readable outcome of one harvest run, written after every run
 * that reaches the save step.
 *
 * @group Persistence
 * @public
 */
export class RunStatus extends Schema.Class<RunStatus>('RunStatus')({
  runId: Schema.String,
  startedAt: Schema.Date,
  finishedAt: Schema.Date,
  stats: RunStats,
  /** Records left after the business filter */
  recordsAccepted: Schema.Int,
  newRecords: Schema.Int,
  updatedRecords: Schema.Int,
  unchangedRecords: Schema.Int,
  prunedEntries: Schema.Int,
  /** Identities removed from the store by stale-entry pruning */
  prunedIds: Schema.optionalWith(Schema.Array(Schema.String), {
    default: () => [],
  }),
  /** The run seeded the store and emitted no changes */
  baselineRun: Schema.Boolean,
  stateSize: Schema.Int,
  failedPagesQueued: Schema.Int,
  cursor: Cursor,
}) {}
