/**
 * Crawler Config Tests
 */

import { describe, expect, it } from 'vitest';
import { ConfigProvider, Effect, Layer } from 'effect';
import {
  CrawlerConfig,
  DEFAULT_CRAWLER_OPTIONS,
  loadCrawlerConfigFromEnv,
  makeCrawlerConfig,
} from '../../../lib/Config/CrawlerConfig.service.js';
import { DEFAULT_TOPIC_KEYWORDS } from '../../../lib/Config/topic-keywords.js';

const withEnv = (env: Record<string, string>) =>
  Layer.setConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))));

describe('CrawlerConfig', () => {
  it('uses the defaults', async () => {
    const options = await Effect.runPromise(makeCrawlerConfig().getOptions());
    expect(options).toEqual(DEFAULT_CRAWLER_OPTIONS);
    expect(options.userAgent).toBe('TopicCrawler/1.0');
    expect(options.maxRetries).toBe(3);
    expect(options.pageRetry).toEqual({ maxRetries: 3, baseDelaySeconds: 60 });
  });

  it('merges retry policy overrides field by field', async () => {
    const retry = await Effect.runPromise(
      makeCrawlerConfig({ pageRetry: { maxRetries: 5, baseDelaySeconds: 60 } }).getPageRetry()
    );
    expect(retry).toEqual({ maxRetries: 5, baseDelaySeconds: 60 });
  });

  it('loads the bundled topic table', () => {
    const topics = Object.keys(DEFAULT_TOPIC_KEYWORDS);
    expect(topics).toHaveLength(14);
    expect(topics.slice(0, 3)).toEqual(['technology', 'business', 'health']);
    expect(DEFAULT_TOPIC_KEYWORDS.health).toContain('wellness');
  });

  it('provides custom options through Live', async () => {
    const userAgent = await Effect.runPromise(
      Effect.gen(function* () {
        const config = yield* CrawlerConfig;
        return yield* config.getUserAgent();
      }).pipe(Effect.provide(CrawlerConfig.Live({ userAgent: 'Custom/1.0' })))
    );
    expect(userAgent).toBe('Custom/1.0');
  });

  it('reads overrides from the environment', async () => {
    const options = await Effect.runPromise(
      loadCrawlerConfigFromEnv.pipe(
        Effect.provide(
          withEnv({
            CRAWLER_USER_AGENT: 'EnvBot/2.0',
            CRAWLER_MAX_RETRIES: '5',
            CRAWLER_RESPECT_ROBOTS_TXT: 'false',
          })
        )
      )
    );
    expect(options.userAgent).toBe('EnvBot/2.0');
    expect(options.maxRetries).toBe(5);
    expect(options.respectRobotsTxt).toBe(false);
    expect(options.requestTimeoutMs).toBe(30_000);
  });

  it('rejects malformed environment values', async () => {
    const exit = await Effect.runPromiseExit(
      loadCrawlerConfigFromEnv.pipe(
        Effect.provide(withEnv({ CRAWLER_MAX_RETRIES: 'lots' }))
      )
    );
    expect(exit._tag).toBe('Failure');
  });
});
