import { Context, Data, Effect, Layer } from 'effect';
import {
  BackendUnavailableError,
  type FetchFailure,
  TransientFetchError,
} from '../errors.js';
import { HarvestConfig } from '../Config/HarvestConfig.service.js';
import type { RecordExtractorService } from '../Extractor/RecordExtractor.js';
import type { HarvestRecord } from '../Record/Record.js';
import type { FetchResult } from './PageFetcher.js';

/**
 * Classified result of visiting one page.
 *
 * - `Ok`: the page parsed and holds at least one record
 * - `Empty`: the page parsed but holds no records (likely past the end)
 * - `Error`: transport failure, timeout, parse failure or a backend error page
 *
 * @group Fetching
 * @public
 */
export type FetchOutcome = Data.TaggedEnum<{
  Ok: { readonly records: readonly HarvestRecord[] };
  Empty: {};
  Error: { readonly error: FetchFailure };
}>;

export const FetchOutcome = Data.taggedEnum<FetchOutcome>();

/**
 * Predicate recognising backend failure pages that arrive with a success status.
 *
 * @group Fetching
 * @public
 */
export interface ErrorPageDetectorService {
  readonly isErrorPage: (rawContent: string) => boolean;
}

export class ErrorPageDetector extends Context.Tag('ErrorPageDetector')<
  ErrorPageDetector,
  ErrorPageDetectorService
>() {
  /** Matches any of the phrases, case-insensitively */
  static fromMarkers = (markers: readonly string[]) =>
    Layer.succeed(ErrorPageDetector, makeMarkerErrorPageDetector(markers));

  /** Uses the `errorPageMarkers` of the harvest configuration */
  static Default = Layer.effect(
    ErrorPageDetector,
    Effect.gen(function* () {
      const config = yield* HarvestConfig;
      const markers = yield* config.getErrorPageMarkers();
      return makeMarkerErrorPageDetector(markers);
    })
  );
}

export const makeMarkerErrorPageDetector = (
  markers: readonly string[]
): ErrorPageDetectorService => {
  const needles = markers
    .map((marker) => marker.trim().toLowerCase())
    .filter((marker) => marker.length > 0);

  return {
    isErrorPage: (rawContent) => {
      if (needles.length === 0) return false;
      const haystack = rawContent.toLowerCase();
      return needles.some((needle) => haystack.includes(needle));
    },
  };
};

/**
 * Classifies a raw fetch result.
 *
 * The error-page predicate runs before extraction, so a maintenance page is
 * never mistaken for an empty listing page.
 *
 * @group Fetching
 * @public
 */
export const classifyFetch = (
  page: number,
  result: FetchResult,
  detector: ErrorPageDetectorService,
  extractor: RecordExtractorService
): Effect.Effect<FetchOutcome> => {
  if (!result.transportOk) {
    return Effect.succeed(
      FetchOutcome.Error({
        error: TransientFetchError.fromCause(
          page,
          result.failure ?? 'transport failure'
        ),
      })
    );
  }

  if (detector.isErrorPage(result.rawContent)) {
    return Effect.succeed(
      FetchOutcome.Error({ error: BackendUnavailableError.forPage(page) })
    );
  }

  return extractor.extract(result.rawContent).pipe(
    Effect.map((records) =>
      records.length === 0
        ? FetchOutcome.Empty()
        : FetchOutcome.Ok({ records })
    ),
    Effect.catchTag('ExtractionError', (error) =>
      Effect.succeed(
        FetchOutcome.Error({
          error: TransientFetchError.fromCause(page, error.message),
        })
      )
    )
  );
};

export const isErrorOutcome = FetchOutcome.$is('Error');
