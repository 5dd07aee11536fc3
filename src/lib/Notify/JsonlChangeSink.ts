import { Effect } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ChangeRecord } from '../Delta/DeltaEngine.js';
import { DeliveryError } from '../errors.js';
import type { RunStatus } from '../Persistence/RunStatus.js';
import type { ChangeSinkService } from './ChangeSink.js';

/**
 * One line of the change feed.
 *
 * `changeKey` depends only on the change itself, so a change set delivered
 * again by a later run (after a failed save) repeats the same keys under a
 * new `runId`. Consumers de-duplicate on `changeKey`.
 */
export interface ChangeLine {
  readonly runId: string;
  readonly change: 'new' | 'updated' | 'removed';
  readonly changeKey: string;
  readonly id: string;
  /** Absent on removals */
  readonly fields?: Readonly<Record<string, string>>;
  readonly diffs?: ReadonlyArray<{ field: string; before: string; after: string }>;
  readonly detectedAt: string;
}

const keyOf = (change: ChangeRecord): string =>
  change._tag === 'New'
    ? `new:${change.record.id}`
    : `updated:${change.record.id}:${change.diffs
        .map((diff) => `${diff.field}=${diff.after}`)
        .join('&')}`;

export const toChangeLine = (
  change: ChangeRecord,
  status: RunStatus
): ChangeLine => ({
  runId: status.runId,
  change: change._tag === 'New' ? 'new' : 'updated',
  changeKey: keyOf(change),
  id: change.record.id,
  fields: change.record.fields,
  ...(change._tag === 'Updated' && { diffs: change.diffs }),
  detectedAt: status.finishedAt.toISOString(),
});

const removalLine = (id: string, status: RunStatus): ChangeLine => ({
  runId: status.runId,
  change: 'removed',
  changeKey: `removed:${id}`,
  id,
  detectedAt: status.finishedAt.toISOString(),
});

/**
 * Appends one JSON line per change, then one per pruned identity, to
 * `filePath`.
 *
 * @group Notification
 * @public
 */
export const makeJsonlChangeSink = (filePath: string): ChangeSinkService => ({
  name: 'jsonl',
  deliver: (changes, status) => {
    const lines = [
      ...changes.map((change) => toChangeLine(change, status)),
      ...status.prunedIds.map((id) => removalLine(id, status)),
    ];
    if (lines.length === 0) {
      return Effect.void;
    }
    const content = lines.map((line) => JSON.stringify(line) + '\n').join('');
    return Effect.tryPromise({
      try: async () => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.appendFile(filePath, content, 'utf8');
      },
      catch: (error) => DeliveryError.fromCause('jsonl', error),
    });
  },
});
