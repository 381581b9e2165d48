import { Duration, Effect, Option } from 'effect';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import { ContentTooLargeError, NetworkError } from '../errors.js';
import { CrawlerLogger } from '../Logging/CrawlerLogger.service.js';

/**
 * A fully downloaded HTTP response.
 *
 * @group Data Types
 * @public
 */
export interface FetchedPage {
  /** Final URL after redirects */
  readonly url: string;
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
  /** Lower-cased Content-Type header, empty when absent */
  readonly contentType: string;
  /** Charset declared in Content-Type, if any */
  readonly encoding: string | null;
  /** Body length in bytes */
  readonly contentLength: number;
}

const ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const ACCEPT_LANGUAGE = 'en-US,en;q=0.5';

export const charsetOf = (contentType: string): string | null => {
  const match = /charset\s*=\s*["']?([^;"'\s]+)/i.exec(contentType);
  return match ? match[1] : null;
};

/**
 * Service performing page retrieval with retry and size guards.
 *
 * Transport failures (connection errors, timeouts, body read errors) are
 * retried with exponential backoff of `2^attempt` seconds; HTTP error
 * statuses are returned as they are. Bodies larger than the configured
 * maximum are dropped after download.
 *
 * @group Services
 * @public
 */
export class FetcherService extends Effect.Service<FetcherService>()(
  'topic-crawler/FetcherService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const logger = yield* CrawlerLogger;
      const userAgent = yield* config.getUserAgent();
      const requestTimeoutMs = yield* config.getRequestTimeout();
      const maxRetries = yield* config.getMaxRetries();
      const maxContentLength = yield* config.getMaxContentLength();
      const attempts = Math.max(1, maxRetries);

      const requestHeaders = {
        'User-Agent': userAgent,
        Accept: ACCEPT,
        'Accept-Language': ACCEPT_LANGUAGE,
      };

      const attemptFetch = (url: string, attempt: number) =>
        Effect.tryPromise({
          try: async () => {
            // AbortSignal keeps the timeout on the wall clock, independent of
            // the Effect Clock used for backoff
            const response = await fetch(url, {
              headers: requestHeaders,
              redirect: 'follow',
              signal: AbortSignal.timeout(requestTimeoutMs),
            });
            const body = new Uint8Array(await response.arrayBuffer());
            return { response, body };
          },
          catch: (error) => NetworkError.fromCause(url, attempt, error),
        });

      const toFetchedPage = (
        url: string,
        response: Response,
        body: Uint8Array
      ): FetchedPage => {
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key] = value;
        });
        const contentType = (
          response.headers.get('content-type') ?? ''
        ).toLowerCase();
        return {
          url: response.url || url,
          statusCode: response.status,
          headers,
          body,
          contentType,
          encoding: charsetOf(contentType),
          contentLength: body.byteLength,
        };
      };

      const fetchFrom = (
        url: string,
        attempt: number
      ): Effect.Effect<Option.Option<FetchedPage>> =>
        attemptFetch(url, attempt).pipe(
          Effect.flatMap(({ response, body }) => {
            if (body.byteLength > maxContentLength) {
              const error = ContentTooLargeError.create(
                url,
                body.byteLength,
                maxContentLength
              );
              return logger
                .logFetchRejected(url, 'content_too_large', {
                  contentLength: error.contentLength,
                  maxContentLength: error.maxContentLength,
                })
                .pipe(Effect.as(Option.none<FetchedPage>()));
            }
            return Effect.succeed(
              Option.some(toFetchedPage(url, response, body))
            );
          }),
          Effect.catchTag('NetworkError', (error) =>
            Effect.gen(function* () {
              const delaySeconds = 2 ** attempt;
              yield* logger.logFetchRetry(
                url,
                attempt,
                delaySeconds,
                error.message
              );
              yield* Effect.sleep(Duration.seconds(delaySeconds));

              if (attempt + 1 >= attempts) {
                yield* logger.logFetchRejected(url, 'retries_exhausted', {
                  attempts: attempt + 1,
                });
                return Option.none<FetchedPage>();
              }
              return yield* fetchFrom(url, attempt + 1);
            })
          )
        );

      return {
        /**
         * GET `url`. `None` after every attempt failed in transport or when
         * the body exceeds the maximum content length.
         */
        fetch: (url: string) => fetchFrom(url, 0),
      };
    }),
  }
) {}
