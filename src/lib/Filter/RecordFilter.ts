import { Context, Layer } from 'effect';
import type { HarvestRecord } from '../Record/Record.js';

/**
 * Business predicate applied to extracted records before change detection.
 * Rejected records never reach the state store.
 *
 * @group Filtering
 * @public
 */
export interface RecordFilterService {
  readonly accepts: (record: HarvestRecord) => boolean;
}

export class RecordFilter extends Context.Tag('RecordFilter')<
  RecordFilter,
  RecordFilterService
>() {
  /** Accepts every record */
  static AcceptAll = Layer.succeed(RecordFilter, { accepts: () => true });

  static whitelist = (rules: WhitelistRules) =>
    Layer.succeed(RecordFilter, makeWhitelistFilter(rules));
}

/**
 * Field-level whitelist rules. Values are compared after trimming.
 *
 * @example
 * ```typescript
 * const filter = makeWhitelistFilter({
 *   allow: { authority: ['North District', 'Harbour Board'] },
 *   deny: { stage: ['Construction'] },
 *   denyPrefixes: { usage_code: ['2'] },
 * });
 * ```
 */
export interface WhitelistRules {
  /** The field must hold one of the listed values */
  readonly allow?: Readonly<Record<string, readonly string[]>>;
  /** The field must not hold any of the listed values */
  readonly deny?: Readonly<Record<string, readonly string[]>>;
  /** The field must not start with any of the listed prefixes */
  readonly denyPrefixes?: Readonly<Record<string, readonly string[]>>;
}

export const makeWhitelistFilter = (
  rules: WhitelistRules
): RecordFilterService => {
  const value = (record: HarvestRecord, field: string) =>
    (record.fields[field] ?? '').trim();

  return {
    accepts: (record) => {
      for (const [field, allowed] of Object.entries(rules.allow ?? {})) {
        if (!allowed.includes(value(record, field))) return false;
      }
      for (const [field, denied] of Object.entries(rules.deny ?? {})) {
        if (denied.includes(value(record, field))) return false;
      }
      for (const [field, prefixes] of Object.entries(rules.denyPrefixes ?? {})) {
        const current = value(record, field);
        if (prefixes.some((prefix) => current.startsWith(prefix))) return false;
      }
      return true;
    },
  };
};
