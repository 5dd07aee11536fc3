import { Effect, Layer } from 'effect';
import * as cheerio from 'cheerio';
import { ExtractionError } from '../errors.js';
import {
  type HarvestRecord,
  type IdentitySpec,
  makeRecord,
  type RecordFields,
} from '../Record/Record.js';
import { RecordExtractor, type RecordExtractorService } from './RecordExtractor.js';

/**
 * Options of the HTML table extractor.
 *
 * @group Extraction
 * @public
 */
export interface TableExtractorOptions {
  /** Field name to the header captions that may label its column */
  readonly columns: Readonly<Record<string, readonly string[]>>;
  /** Selector of the listing table (default: the first `table`) */
  readonly tableSelector?: string;
  /** Field receiving the row's detail link */
  readonly linkField?: string;
  /** Only links whose href contains this text are taken */
  readonly linkMatch?: string;
  /** Base for resolving relative links */
  readonly baseUrl?: string;
  /**
   * Selector of listing cards, read when the table yields no rows. Each
   * card's text is scanned for `Label: value` pairs labelled by the column
   * aliases.
   */
  readonly cardSelector?: string;
  readonly identity: IdentitySpec;
}

const normalize = (text: string) => text.replace(/\s+/g, ' ').trim();

const looksLikeMarkup = (raw: string) => /<[a-zA-Z!]/.test(raw);

/**
 * Maps each field to the index of the first header matching one of its
 * aliases, case-insensitively.
 */
export const columnIndex = (
  headers: readonly string[],
  columns: TableExtractorOptions['columns']
): ReadonlyMap<string, number> => {
  const lowered = headers.map((header) => normalize(header).toLowerCase());
  const index = new Map<string, number>();
  for (const [field, aliases] of Object.entries(columns)) {
    for (const alias of aliases) {
      const position = lowered.indexOf(normalize(alias).toLowerCase());
      if (position >= 0) {
        index.set(field, position);
        break;
      }
    }
  }
  return index;
};

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const labelPattern = (aliases: readonly string[]) =>
  aliases
    .map(normalize)
    .filter((alias) => alias !== '')
    .map(escapeRegExp)
    .join('|');

/**
 * Reads `Label: value` pairs out of flattened card text. A value runs up to
 * the next known label, a `|` or the end of the text. Fields without a
 * label in the text are empty.
 */
export const readLabelledFields = (
  text: string,
  columns: TableExtractorOptions['columns']
): Record<string, string> => {
  const anyLabel = labelPattern(Object.values(columns).flat());
  const fields: Record<string, string> = {};
  for (const [field, aliases] of Object.entries(columns)) {
    const labels = labelPattern(aliases);
    const match = labels
      ? new RegExp(
          `(?:${labels})\\s*[:\\-]\\s*(.*?)(?=\\s*(?:\\||$|(?:${anyLabel})\\s*[:\\-]))`,
          'i'
        ).exec(text)
      : null;
    fields[field] = normalize(match?.[1] ?? '');
  }
  return fields;
};

const resolveLink = (href: string, baseUrl?: string): string => {
  if (!baseUrl) return href;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
};

/**
 * Parses listing rows out of an HTML table, falling back to listing cards
 * when `cardSelector` is set and the table yields no rows.
 *
 * A document with neither yields no records (an empty page). Content that is not markup at all fails with
 * ExtractionError.
 *
 * @group Extraction
 * @public
 */
export const extractTableRecords = (
  raw: string,
  options: TableExtractorOptions,
  extractedAt: Date = new Date()
): Effect.Effect<readonly HarvestRecord[], ExtractionError> =>
  Effect.gen(function* () {
    if (!looksLikeMarkup(raw)) {
      return yield* Effect.fail(
        ExtractionError.fromCause('content is not HTML')
      );
    }

    const $ = yield* Effect.try({
      try: () => cheerio.load(raw),
      catch: (error) => ExtractionError.fromCause(error),
    });

    const detailLink = (hrefs: readonly string[]): string => {
      const href = hrefs.find((candidate) =>
        options.linkMatch ? candidate.includes(options.linkMatch) : candidate !== ''
      );
      return href ? resolveLink(href, options.baseUrl) : '';
    };

    const toRecord = (fields: Record<string, string>, hrefs: readonly string[]) => {
      if (options.linkField) {
        fields[options.linkField] = detailLink(hrefs);
      }
      if (Object.values(fields).every((value) => value === '')) return undefined;
      const recordFields: RecordFields = fields;
      return makeRecord(recordFields, options.identity, extractedAt);
    };

    const records: HarvestRecord[] = [];
    const table = $(options.tableSelector ?? 'table').first();

    if (table.length > 0) {
      const headers = table
        .find('th')
        .toArray()
        .map((th) => normalize($(th).text()));
      const index = columnIndex(headers, options.columns);

      table.find('tr').each((_, tr) => {
        const cells = $(tr)
          .find('td')
          .toArray()
          .map((td) => normalize($(td).text()));
        if (cells.length === 0) return;

        const fields: Record<string, string> = {};
        for (const [field, position] of index) {
          fields[field] = cells[position] ?? '';
        }
        const hrefs = $(tr)
          .find('a[href]')
          .toArray()
          .map((a) => $(a).attr('href') ?? '');
        const record = toRecord(fields, hrefs);
        if (record) records.push(record);
      });
    }

    if (records.length > 0 || !options.cardSelector) {
      return records;
    }

    $(options.cardSelector).each((_, card) => {
      const fields = readLabelledFields(normalize($(card).text()), options.columns);
      if (Object.values(fields).every((value) => value === '')) return;
      const hrefs = $(card)
        .find('a[href]')
        .toArray()
        .map((a) => $(a).attr('href') ?? '');
      const record = toRecord(fields, hrefs);
      if (record) records.push(record);
    });

    return records;
  });

export const makeTableExtractor = (
  options: TableExtractorOptions
): RecordExtractorService => ({
  extract: (raw) => extractTableRecords(raw, options),
});

export const TableExtractorLive = (options: TableExtractorOptions) =>
  Layer.succeed(RecordExtractor, makeTableExtractor(options));
