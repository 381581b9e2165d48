// Configuration
export type {
  CrawlerConfigOptions,
  CrawlerConfigService,
  PageRetryOptions,
} from './lib/Config/CrawlerConfig.service.js';
export {
  CrawlerConfig,
  DEFAULT_CRAWLER_OPTIONS,
  loadCrawlerConfigFromEnv,
  makeCrawlerConfig,
} from './lib/Config/CrawlerConfig.service.js';
export type { TopicKeywordMap } from './lib/Config/topic-keywords.js';
export {
  DEFAULT_TOPIC_KEYWORDS,
  loadTopicKeywords,
  TopicKeywordMapSchema,
} from './lib/Config/topic-keywords.js';

// Logging
export type {
  CrawlerLogEvent,
  CrawlerLogEventType,
  JobCounters,
  JobLifecycleEvent,
} from './lib/Logging/CrawlerLogger.service.js';
export {
  CrawlerLogger,
  CrawlerLoggerLive,
  makeCrawlerLogger,
  makeCrawlerLoggerWith,
} from './lib/Logging/CrawlerLogger.service.js';

// Errors
export * from './lib/errors.js';

// Crawl pipeline
export * from './lib/CrawlResult/CrawlResult.js';
export * from './lib/Robots/Robots.service.js';
export * from './lib/Fetcher/Fetcher.service.js';
export * from './lib/Extractor/ContentExtractor.service.js';
export * from './lib/Classifier/TopicClassifier.service.js';
export * from './lib/Orchestrator/CrawlOrchestrator.service.js';

// Jobs and persistence
export * from './lib/Store/CrawlStore.js';
export * from './lib/Store/InMemoryCrawlStore.js';
export * from './lib/Retry/RetryPolicy.js';
export * from './lib/Jobs/JobCoordinator.service.js';
export * from './lib/Maintenance/Maintenance.service.js';

// Layers
export * from './lib/layers.js';
