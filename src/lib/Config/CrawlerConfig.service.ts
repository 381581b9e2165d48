import { Config, Effect, Layer } from 'effect';
import {
  DEFAULT_TOPIC_KEYWORDS,
  type TopicKeywordMap,
} from './topic-keywords.js';

/**
 * Retry policy for whole crawl attempts, driven by the job coordinator.
 *
 * @group Configuration
 * @public
 */
export interface PageRetryOptions {
  /** Attempts a Page may fail before it stays failed (default: 3) */
  readonly maxRetries: number;
  /** Base delay in seconds; retry n waits base * 2^n (default: 60) */
  readonly baseDelaySeconds: number;
}

/**
 * Configuration options for the crawl pipeline.
 *
 * Supplied once at construction and never re-read mid-run.
 *
 * @group Configuration
 * @public
 */
export interface CrawlerConfigOptions {
  /** User agent sent with every request and matched against robots.txt groups */
  readonly userAgent: string;
  /** Page request timeout in milliseconds (default: 30000) */
  readonly requestTimeoutMs: number;
  /** Fetch attempts per URL on transport failure (default: 3) */
  readonly maxRetries: number;
  /** Delay before each dispatched attempt in milliseconds (default: 1000) */
  readonly delayBetweenRequestsMs: number;
  /** Default for the per-crawl respectRobotsTxt flag (default: true) */
  readonly respectRobotsTxt: boolean;
  /** Largest accepted body in bytes, checked after download (default: 10MB) */
  readonly maxContentLength: number;
  /** robots.txt request timeout in milliseconds (default: 10000) */
  readonly robotsTimeoutMs: number;
  /** Size of the crawl attempt worker pool (default: 5) */
  readonly maxConcurrentAttempts: number;
  /** Topic name → trigger keywords */
  readonly topicKeywords: TopicKeywordMap;
  /** Coordinator retry policy for failed attempts */
  readonly pageRetry: PageRetryOptions;
}

/**
 * Service interface for accessing crawler configuration.
 *
 * @group Configuration
 * @public
 */
export interface CrawlerConfigService {
  /** Get the complete configuration options */
  getOptions: () => Effect.Effect<CrawlerConfigOptions>;
  getUserAgent: () => Effect.Effect<string>;
  getRequestTimeout: () => Effect.Effect<number>;
  getMaxRetries: () => Effect.Effect<number>;
  getDelayBetweenRequests: () => Effect.Effect<number>;
  shouldRespectRobotsTxt: () => Effect.Effect<boolean>;
  getMaxContentLength: () => Effect.Effect<number>;
  getRobotsTimeout: () => Effect.Effect<number>;
  getMaxConcurrentAttempts: () => Effect.Effect<number>;
  getTopicKeywords: () => Effect.Effect<TopicKeywordMap>;
  getPageRetry: () => Effect.Effect<PageRetryOptions>;
}

export const DEFAULT_CRAWLER_OPTIONS: CrawlerConfigOptions = {
  userAgent: 'TopicCrawler/1.0',
  requestTimeoutMs: 30_000,
  maxRetries: 3,
  delayBetweenRequestsMs: 1000,
  respectRobotsTxt: true,
  maxContentLength: 10 * 1024 * 1024,
  robotsTimeoutMs: 10_000,
  maxConcurrentAttempts: 5,
  topicKeywords: DEFAULT_TOPIC_KEYWORDS,
  pageRetry: {
    maxRetries: 3,
    baseDelaySeconds: 60,
  },
};

/**
 * Creates a CrawlerConfigService with options merged over the defaults.
 *
 * @group Configuration
 * @public
 */
export const makeCrawlerConfig = (
  options: Partial<CrawlerConfigOptions> = {}
): CrawlerConfigService => {
  const config: CrawlerConfigOptions = {
    ...DEFAULT_CRAWLER_OPTIONS,
    ...options,
    pageRetry: {
      ...DEFAULT_CRAWLER_OPTIONS.pageRetry,
      ...options.pageRetry,
    },
  };

  return {
    getOptions: () => Effect.succeed(config),
    getUserAgent: () => Effect.succeed(config.userAgent),
    getRequestTimeout: () => Effect.succeed(config.requestTimeoutMs),
    getMaxRetries: () => Effect.succeed(config.maxRetries),
    getDelayBetweenRequests: () =>
      Effect.succeed(config.delayBetweenRequestsMs),
    shouldRespectRobotsTxt: () => Effect.succeed(config.respectRobotsTxt),
    getMaxContentLength: () => Effect.succeed(config.maxContentLength),
    getRobotsTimeout: () => Effect.succeed(config.robotsTimeoutMs),
    getMaxConcurrentAttempts: () =>
      Effect.succeed(config.maxConcurrentAttempts),
    getTopicKeywords: () => Effect.succeed(config.topicKeywords),
    getPageRetry: () => Effect.succeed(config.pageRetry),
  };
};

/**
 * Reads option overrides from the environment. Unset variables keep the
 * defaults.
 *
 * @group Configuration
 * @public
 */
export const loadCrawlerConfigFromEnv = Effect.gen(function* () {
  const d = DEFAULT_CRAWLER_OPTIONS;
  const userAgent = yield* Config.string('CRAWLER_USER_AGENT').pipe(
    Config.withDefault(d.userAgent)
  );
  const requestTimeoutMs = yield* Config.integer(
    'CRAWLER_REQUEST_TIMEOUT_MS'
  ).pipe(Config.withDefault(d.requestTimeoutMs));
  const maxRetries = yield* Config.integer('CRAWLER_MAX_RETRIES').pipe(
    Config.withDefault(d.maxRetries)
  );
  const delayBetweenRequestsMs = yield* Config.integer(
    'CRAWLER_DELAY_BETWEEN_REQUESTS_MS'
  ).pipe(Config.withDefault(d.delayBetweenRequestsMs));
  const respectRobotsTxt = yield* Config.boolean(
    'CRAWLER_RESPECT_ROBOTS_TXT'
  ).pipe(Config.withDefault(d.respectRobotsTxt));
  const maxContentLength = yield* Config.integer(
    'CRAWLER_MAX_CONTENT_LENGTH'
  ).pipe(Config.withDefault(d.maxContentLength));
  const maxConcurrentAttempts = yield* Config.integer(
    'CRAWLER_MAX_CONCURRENT_ATTEMPTS'
  ).pipe(Config.withDefault(d.maxConcurrentAttempts));

  const options: Partial<CrawlerConfigOptions> = {
    userAgent,
    requestTimeoutMs,
    maxRetries,
    delayBetweenRequestsMs,
    respectRobotsTxt,
    maxContentLength,
    maxConcurrentAttempts,
  };
  return options;
});

/**
 * The CrawlerConfig service for dependency injection.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const config = yield* CrawlerConfig;
 *   const userAgent = yield* config.getUserAgent();
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(CrawlerConfig.Live({ maxRetries: 1 })))
 * );
 * ```
 *
 * @group Configuration
 * @public
 */
export class CrawlerConfig extends Effect.Service<CrawlerConfigService>()(
  'topic-crawler/CrawlerConfig',
  {
    effect: Effect.sync(() => makeCrawlerConfig({})),
  }
) {
  /**
   * Creates a Layer that provides CrawlerConfig with custom options
   * @param config - The configuration options or a pre-made CrawlerConfigService
   */
  static Live = (
    config: Partial<CrawlerConfigOptions> | CrawlerConfigService
  ) =>
    Layer.effect(
      CrawlerConfig,
      Effect.succeed(
        'getOptions' in config ? config : makeCrawlerConfig(config)
      )
    );

  /** Layer built from CRAWLER_* environment variables over the defaults */
  static FromEnv = Layer.effect(
    CrawlerConfig,
    Effect.map(loadCrawlerConfigFromEnv, makeCrawlerConfig)
  );
}
