import { Context, Effect } from 'effect';
import type { ExtractionError } from '../errors.js';
import type { HarvestRecord } from '../Record/Record.js';

/**
 * Maps raw page content to zero or more records.
 *
 * A well-formed page without rows yields an empty array; only content that
 * cannot be parsed at all fails with {@link ExtractionError}.
 *
 * @group Extraction
 * @public
 */
export interface RecordExtractorService {
  readonly extract: (
    rawContent: string
  ) => Effect.Effect<readonly HarvestRecord[], ExtractionError>;
}

export class RecordExtractor extends Context.Tag('RecordExtractor')<
  RecordExtractor,
  RecordExtractorService
>() {}
