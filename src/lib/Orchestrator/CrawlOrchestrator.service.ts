import { Cause, Effect, Either, Option, Schema } from 'effect';
import { TopicClassifierService } from '../Classifier/TopicClassifier.service.js';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import {
  type CrawlOptions,
  type CrawlResult,
  CrawlResultSchema,
  type CrawlTarget,
  type ResponseMetadata,
  unsuccessfulResult,
} from '../CrawlResult/CrawlResult.js';
import { ContentTypeError, describeCause } from '../errors.js';
import { ContentExtractorService } from '../Extractor/ContentExtractor.service.js';
import { FetcherService } from '../Fetcher/Fetcher.service.js';
import { CrawlerLogger } from '../Logging/CrawlerLogger.service.js';
import { RobotsService } from '../Robots/Robots.service.js';

/**
 * The per-URL crawl pipeline: robots check, fetch, content-type check,
 * parse, extraction and classification.
 *
 * `crawl` never fails. Every outcome, including unexpected errors and
 * defects, comes back as a {@link CrawlResult}.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const orchestrator = yield* CrawlOrchestratorService;
 *   const result = yield* orchestrator.crawlUrl('https://example.com/a', {
 *     respectRobotsTxt: false,
 *   });
 *   console.log(result.status, result.topics);
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class CrawlOrchestratorService extends Effect.Service<CrawlOrchestratorService>()(
  'topic-crawler/CrawlOrchestratorService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const logger = yield* CrawlerLogger;
      const robots = yield* RobotsService;
      const fetcher = yield* FetcherService;
      const extractor = yield* ContentExtractorService;
      const classifier = yield* TopicClassifierService;
      const respectRobotsByDefault = yield* config.shouldRespectRobotsTxt();

      const runPipeline = ({ url, options }: CrawlTarget) =>
        Effect.gen(function* () {
          if (options.respectRobotsTxt) {
            const allowed = yield* robots.isAllowed(url);
            if (!allowed) {
              return unsuccessfulResult(
                url,
                'blocked',
                'PolicyDenied',
                'Blocked by robots.txt'
              );
            }
          }

          const fetched = yield* fetcher.fetch(url);
          if (Option.isNone(fetched)) {
            return unsuccessfulResult(
              url,
              'failed',
              'TransportFailure',
              'Failed to fetch URL'
            );
          }
          const page = fetched.value;
          const response: ResponseMetadata = {
            statusCode: page.statusCode,
            contentType: page.contentType,
            contentLength: page.contentLength,
            encoding: page.encoding,
            headers: page.headers,
          };

          if (!extractor.isHtmlContentType(page.contentType)) {
            return unsuccessfulResult(
              url,
              'failed',
              'ContentTypeMismatch',
              ContentTypeError.create(url, page.contentType).message,
              response
            );
          }

          const parsed = yield* Effect.either(extractor.parse(page));
          if (Either.isLeft(parsed)) {
            return unsuccessfulResult(
              url,
              'failed',
              'ParseFailure',
              parsed.left.message,
              response
            );
          }

          const fields = yield* extractor.extract(parsed.right);
          const topics = yield* classifier
            .classify(fields.title, fields.description, fields.textContent)
            .pipe(
              Effect.catchAll((error) =>
                logger
                  .logFieldExtractionFailed(url, 'topics', error.message)
                  .pipe(Effect.as<ReadonlyArray<string>>([]))
              )
            );

          const result: CrawlResult = {
            status: 'completed',
            url,
            title: fields.title,
            description: fields.description,
            keywords: fields.keywords,
            author: fields.author,
            language: fields.language,
            content: options.extractContent ? fields.content : null,
            textContent: options.extractContent ? fields.textContent : null,
            topics: options.classifyTopics ? topics : [],
            statusCode: response.statusCode,
            contentType: response.contentType,
            contentLength: response.contentLength,
            encoding: response.encoding,
            headers: { ...response.headers },
            errorMessage: null,
            errorKind: null,
          };
          return result;
        });

      const crawl = (target: CrawlTarget): Effect.Effect<CrawlResult> =>
        Effect.gen(function* () {
          const startMs = Date.now();
          const result = yield* runPipeline(target).pipe(
            Effect.flatMap(Schema.decodeUnknown(CrawlResultSchema)),
            Effect.catchAllCause((cause) =>
              Effect.succeed(
                unsuccessfulResult(
                  target.url,
                  'failed',
                  'Unexpected',
                  describeCause(Cause.squash(cause))
                )
              )
            )
          );
          yield* logger.logCrawlAttempt(target.url, result.status, {
            errorKind: result.errorKind,
            errorMessage: result.errorMessage,
            topics: result.topics,
            durationMs: Date.now() - startMs,
          });
          return result;
        });

      return {
        crawl,

        /**
         * Crawls `url` with content extraction and classification on and the
         * configured robots default, unless overridden.
         */
        crawlUrl: (url: string, options: Partial<CrawlOptions> = {}) =>
          crawl({
            url,
            options: {
              extractContent: options.extractContent ?? true,
              classifyTopics: options.classifyTopics ?? true,
              respectRobotsTxt:
                options.respectRobotsTxt ?? respectRobotsByDefault,
            },
          }),
      };
    }),
    dependencies: [
      RobotsService.Default,
      FetcherService.Default,
      ContentExtractorService.Default,
      TopicClassifierService.Default,
    ],
  }
) {}
