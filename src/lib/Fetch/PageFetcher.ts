import { Context, Effect } from 'effect';

/**
 * Raw result of fetching one page of the listing.
 *
 * The core never looks past `transportOk` and the content itself.
 *
 * @group Fetching
 * @public
 */
export interface FetchResult {
  readonly rawContent: string;
  readonly transportOk: boolean;
  /** Human-readable transport failure, when `transportOk` is false */
  readonly failure?: string;
}

/**
 * The fetch primitive used by the harvester.
 *
 * Implementations must not fail the Effect for transport problems; they
 * report them through `transportOk: false`. Only one page is ever in
 * flight at a time.
 *
 * @group Fetching
 * @public
 */
export interface PageFetcherService {
  /** Fetch the page with the given 1-based index */
  readonly fetchPage: (page: number) => Effect.Effect<FetchResult>;
  /** Discard the current session or identity and start a fresh one */
  readonly recycle: () => Effect.Effect<void>;
}

export class PageFetcher extends Context.Tag('PageFetcher')<
  PageFetcher,
  PageFetcherService
>() {}

export const transportFailure = (failure: string): FetchResult => ({
  rawContent: '',
  transportOk: false,
  failure,
});
