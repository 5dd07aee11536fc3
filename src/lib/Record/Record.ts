import { Schema } from 'effect';
import { createHash } from 'node:crypto';

/**
 * Flat field map extracted from one listing row.
 */
export const RecordFields = Schema.Record({
  key: Schema.String,
  value: Schema.String,
});
export type RecordFields = typeof RecordFields.Type;

/**
 * A single listing entry as extracted from a page.
 *
 * Records are ephemeral: a fresh one is produced by every fetch. The `id`
 * is stable across runs for the same real-world entity (see
 * {@link recordIdentity}).
 *
 * @group Data Types
 * @public
 */
export class HarvestRecord extends Schema.Class<HarvestRecord>('HarvestRecord')({
  /** Stable identity key */
  id: Schema.String,
  /** Field name to string value */
  fields: RecordFields,
  /** When the record was extracted */
  extractedAt: Schema.Date,
}) {}

/**
 * How a record's identity is derived.
 *
 * @group Data Types
 * @public
 */
export interface IdentitySpec {
  /** Field holding a natural business key, if the listing has one */
  readonly naturalKey?: string;
  /** Fields hashed when no natural key is available, in order */
  readonly hashFields: readonly string[];
}

/**
 * Derives the identity of a record.
 *
 * Two branches, both total and deterministic:
 * 1. the trimmed natural key when it is present and non-empty;
 * 2. otherwise the first 16 hex characters of the SHA-256 of the trimmed
 *    `hashFields` values joined with `|` (missing fields count as `""`).
 *
 * @group Identity
 * @public
 */
export const recordIdentity = (
  fields: RecordFields,
  identity: IdentitySpec
): string => {
  if (identity.naturalKey !== undefined) {
    const natural = (fields[identity.naturalKey] ?? '').trim();
    if (natural.length > 0) {
      return natural;
    }
  }

  const material = identity.hashFields
    .map((field) => (fields[field] ?? '').trim())
    .join('|');
  return createHash('sha256').update(material, 'utf8').digest('hex').slice(0, 16);
};

/**
 * Builds a record, assigning its identity from the field values.
 *
 * @group Identity
 * @public
 */
export const makeRecord = (
  fields: RecordFields,
  identity: IdentitySpec,
  extractedAt: Date = new Date()
): HarvestRecord =>
  new HarvestRecord({
    id: recordIdentity(fields, identity),
    fields,
    extractedAt,
  });
