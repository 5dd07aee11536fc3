import { Effect, Layer, Ref } from 'effect';
import { CookieJar } from 'tough-cookie';
import { HarvestConfig } from '../Config/HarvestConfig.service.js';
import {
  type FetchResult,
  PageFetcher,
  type PageFetcherService,
  transportFailure,
} from './PageFetcher.js';

/**
 * Options of the HTTP page fetcher.
 *
 * @group Fetching
 * @public
 */
export interface HttpPageFetcherOptions {
  /** Listing URL with a `{page}` placeholder, e.g. `https://example.test/list?page={page}` */
  readonly urlTemplate: string;
  /** User agents used in turn; the next one is picked on every recycle */
  readonly userAgents?: readonly string[];
  readonly headers?: Readonly<Record<string, string>>;
  /** Abort a request after this many milliseconds */
  readonly requestTimeoutMs: number;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; DeltaHarvester/0.1)';

export const pageUrl = (urlTemplate: string, page: number): string =>
  urlTemplate.split('{page}').join(String(page));

interface Session {
  readonly jar: CookieJar;
  readonly userAgent: string;
  readonly generation: number;
}

/**
 * Creates a fetcher that issues plain GET requests with one anonymous
 * cookie session. Recycling drops the cookie jar and switches user agent.
 *
 * Transport problems (network errors, timeouts, non-2xx statuses) are
 * reported as `transportOk: false`; the Effect never fails.
 *
 * @group Fetching
 * @public
 */
export const makeHttpPageFetcher = (
  options: HttpPageFetcherOptions
): Effect.Effect<PageFetcherService> =>
  Effect.gen(function* () {
    const userAgents =
      options.userAgents && options.userAgents.length > 0
        ? options.userAgents
        : [DEFAULT_USER_AGENT];

    const newSession = (generation: number): Session => ({
      jar: new CookieJar(),
      userAgent: userAgents[generation % userAgents.length],
      generation,
    });

    const sessionRef = yield* Ref.make(newSession(0));

    const fetchPage = (page: number): Effect.Effect<FetchResult> =>
      Effect.gen(function* () {
        const session = yield* Ref.get(sessionRef);
        const url = pageUrl(options.urlTemplate, page);

        return yield* Effect.tryPromise({
          try: async (signal): Promise<FetchResult> => {
            const controller = new AbortController();
            const onAbort = () => controller.abort();
            signal.addEventListener('abort', onAbort);
            const timeoutId = setTimeout(
              () => controller.abort(),
              options.requestTimeoutMs
            );

            try {
              const cookieHeader = await session.jar.getCookieString(url);
              const headers: Record<string, string> = {
                'User-Agent': session.userAgent,
                ...options.headers,
              };
              if (cookieHeader && !headers['Cookie']) {
                headers['Cookie'] = cookieHeader;
              }

              const response = await fetch(url, {
                method: 'GET',
                headers,
                redirect: 'follow',
                signal: controller.signal,
              });

              for (const cookie of response.headers.getSetCookie()) {
                await session.jar.setCookie(cookie, url, { ignoreError: true });
              }

              const rawContent = await response.text();
              if (!response.ok) {
                return {
                  rawContent,
                  transportOk: false,
                  failure: `HTTP ${response.status} ${response.statusText}`.trim(),
                };
              }
              return { rawContent, transportOk: true };
            } finally {
              clearTimeout(timeoutId);
              signal.removeEventListener('abort', onAbort);
            }
          },
          catch: (error) =>
            describeFailure(error, options.requestTimeoutMs),
        }).pipe(
          Effect.catchAll((failure) => Effect.succeed(transportFailure(failure)))
        );
      });

    return {
      fetchPage,
      recycle: () =>
        Ref.update(sessionRef, (session) => newSession(session.generation + 1)),
    };
  });

const describeFailure = (error: unknown, timeoutMs: number): string =>
  error instanceof Error && error.name === 'AbortError'
    ? `request aborted after ${timeoutMs}ms`
    : String(error);

/**
 * Layer providing an HTTP {@link PageFetcher} whose request timeout is the
 * configured `fetchTimeoutMs`.
 *
 * @group Fetching
 * @public
 */
export const HttpPageFetcherLive = (
  options: Omit<HttpPageFetcherOptions, 'requestTimeoutMs'> &
    Partial<Pick<HttpPageFetcherOptions, 'requestTimeoutMs'>>
) =>
  Layer.effect(
    PageFetcher,
    Effect.gen(function* () {
      const config = yield* HarvestConfig;
      const { fetchTimeoutMs } = yield* config.getOptions();
      return yield* makeHttpPageFetcher({
        ...options,
        requestTimeoutMs: options.requestTimeoutMs ?? fetchTimeoutMs,
      });
    })
  );
