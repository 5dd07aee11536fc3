import { Effect } from 'effect';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ChangeRecord } from '../Delta/DeltaEngine.js';
import { DeliveryError } from '../errors.js';
import type { HarvestRecord } from '../Record/Record.js';
import type { RunStatus } from '../Persistence/RunStatus.js';
import type { ChangeSinkService } from './ChangeSink.js';

export interface ChangelogOptions {
  readonly title: string;
  /** Field shown in bold at the start of each entry */
  readonly headlineField?: string;
  /** Further fields listed after the headline */
  readonly summaryFields: readonly string[];
  /** Field holding an absolute link to the record's detail page */
  readonly linkField?: string;
}

const formatTimestamp = (date: Date) =>
  date.toISOString().slice(0, 16).replace('T', ' ');

const describe = (record: HarvestRecord, options: ChangelogOptions): string => {
  const value = (field: string) => record.fields[field] || '?';
  const parts = options.summaryFields.map(value);
  const headline = options.headlineField
    ? [`**${value(options.headlineField)}**`]
    : [];
  const entry = [...headline, ...parts].join(' | ') || record.id;
  const link = options.linkField ? record.fields[options.linkField] : undefined;
  return link ? `${entry} [Link](${link})` : entry;
};

/**
 * Renders a Markdown report of one change set.
 *
 * ```markdown
 * # Permits (2026-01-02 03:04)
 *
 * - New records: 1
 * - Updated records: 1
 *
 * ## New
 * - **North District** | A-1 | 1 Main St
 *
 * ## Updated
 * - **North District** | A-2 | 2 Main St
 *   - stage: `Design` → `Approved`
 * ```
 *
 * A `## Removed` section listing pruned identities follows when the run
 * pruned any.
 *
 * @group Notification
 * @public
 */
export const renderChangelog = (
  changes: readonly ChangeRecord[],
  status: RunStatus,
  options: ChangelogOptions
): string => {
  const created = changes.filter(ChangeRecord.$is('New'));
  const updated = changes.filter(ChangeRecord.$is('Updated'));

  const lines = [
    `# ${options.title} (${formatTimestamp(status.finishedAt)})`,
    '',
    `- New records: ${created.length}`,
    `- Updated records: ${updated.length}`,
  ];

  if (status.baselineRun) {
    lines.push(`- Baseline run: ${status.stateSize} records recorded silently`);
  }

  lines.push('', '## New');
  for (const change of created) {
    lines.push(`- ${describe(change.record, options)}`);
  }

  lines.push('', '## Updated');
  for (const change of updated) {
    lines.push(`- ${describe(change.record, options)}`);
    for (const diff of change.diffs) {
      lines.push(`  - ${diff.field}: \`${diff.before}\` → \`${diff.after}\``);
    }
  }

  if (status.prunedIds.length > 0) {
    lines.push('', '## Removed');
    for (const id of status.prunedIds) {
      lines.push(`- ${id}`);
    }
  }

  return lines.join('\n') + '\n';
};

/**
 * Writes the report of the latest run to `filePath`, replacing the previous
 * one.
 *
 * @group Notification
 * @public
 */
export const makeChangelogSink = (
  filePath: string,
  options: ChangelogOptions
): ChangeSinkService => ({
  name: 'changelog',
  deliver: (changes, status) =>
    Effect.tryPromise({
      try: async () => {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(
          filePath,
          renderChangelog(changes, status, options),
          'utf8'
        );
      },
      catch: (error) => DeliveryError.fromCause('changelog', error),
    }),
});
