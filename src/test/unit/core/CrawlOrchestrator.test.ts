/**
 * Crawl Orchestrator Tests
 * End-to-end tests of the per-URL pipeline against stubbed responses
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { Effect, Layer } from 'effect';
import { CrawlOrchestratorService } from '../../../lib/Orchestrator/CrawlOrchestrator.service.js';
import { TopicClassifierService } from '../../../lib/Classifier/TopicClassifier.service.js';
import { CrawlerConfig, type CrawlerConfigOptions } from '../../../lib/Config/CrawlerConfig.service.js';
import type { CrawlOptions } from '../../../lib/CrawlResult/CrawlResult.js';
import { ClassificationError } from '../../../lib/errors.js';
import { ContentExtractorService } from '../../../lib/Extractor/ContentExtractor.service.js';
import { FetcherService } from '../../../lib/Fetcher/Fetcher.service.js';
import { makePipelineLayer } from '../../../lib/layers.js';
import { RobotsService } from '../../../lib/Robots/Robots.service.js';
import {
  htmlPage,
  htmlResponse,
  makeRecordingClock,
  makeRecordingLogger,
  requestUrl,
} from '../../infrastructure/CrawlerTestKit.js';

afterEach(() => {
  vi.restoreAllMocks();
});

const HEALTH_PAGE = htmlPage(
  'Health Tips',
  '<article><p>Regular exercise supports wellness.</p></article>',
  '<meta name="description" content="How to stay fit">'
);

/** Serves robots.txt and pages from a URL → response table */
const stubSite = (routes: Record<string, () => Response>) =>
  vi.spyOn(globalThis, 'fetch').mockImplementation((input) => {
    const route = routes[requestUrl(input)];
    return route
      ? Promise.resolve(route())
      : Promise.resolve(new Response('Not Found', { status: 404 }));
  });

const crawlUrl = (
  url: string,
  options: Partial<CrawlOptions> = {},
  config: Partial<CrawlerConfigOptions> = {}
) => {
  const logger = makeRecordingLogger();
  const clock = makeRecordingClock();
  const run = Effect.gen(function* () {
    const orchestrator = yield* CrawlOrchestratorService;
    return yield* orchestrator.crawlUrl(url, options);
  }).pipe(
    Effect.provide(makePipelineLayer({ maxRetries: 1, ...config }, logger.layer)),
    Effect.withClock(clock.clock)
  );
  return { logger, result: Effect.runPromise(run) };
};

/** The pipeline with its classifier swapped for `classifier` */
const crawlWithClassifier = (url: string, classifier: TopicClassifierService) => {
  const logger = makeRecordingLogger();
  const layer = CrawlOrchestratorService.DefaultWithoutDependencies.pipe(
    Layer.provide(
      Layer.mergeAll(
        RobotsService.Default,
        FetcherService.Default,
        ContentExtractorService.Default,
        Layer.succeed(TopicClassifierService, classifier)
      )
    ),
    Layer.provide(Layer.mergeAll(CrawlerConfig.Live({ respectRobotsTxt: false }), logger.layer))
  );
  const run = Effect.gen(function* () {
    const orchestrator = yield* CrawlOrchestratorService;
    return yield* orchestrator.crawlUrl(url);
  }).pipe(Effect.provide(layer));
  return { logger, result: Effect.runPromise(run) };
};

describe('CrawlOrchestratorService', () => {
  it('crawls, extracts and classifies an allowed HTML page', async () => {
    stubSite({
      'https://example.com/robots.txt': () =>
        new Response('User-agent: *\nDisallow: /private\n', { status: 200 }),
      'https://example.com/health': () => htmlResponse(HEALTH_PAGE),
    });

    const result = await crawlUrl('https://example.com/health').result;

    expect(result.status).toBe('completed');
    expect(result.title).toBe('Health Tips');
    expect(result.description).toBe('How to stay fit');
    expect(result.topics).toEqual(['health']);
    expect(result.language).toBe('en');
    expect(result.statusCode).toBe(200);
    expect(result.contentType).toBe('text/html; charset=utf-8');
    expect(result.encoding).toBe('utf-8');
    expect(result.errorMessage).toBeNull();
    expect(result.errorKind).toBeNull();
    expect(result.textContent).toBe('Health TipsRegular exercise supports wellness.');
  });

  it('classifies with a custom topic table', async () => {
    stubSite({
      'https://example.com/a': () =>
        htmlResponse('<html><head><title>Health Tips</title></head><body>health fitness doctor</body></html>'),
    });

    const result = await crawlUrl(
      'https://example.com/a',
      { respectRobotsTxt: false },
      { topicKeywords: { health: ['health', 'fitness', 'doctor'] } }
    ).result;

    expect(result.status).toBe('completed');
    expect(result.title).toBe('Health Tips');
    expect(result.topics).toEqual(['health']);
  });

  it('blocks URLs disallowed by robots.txt without fetching them', async () => {
    const fetchSpy = stubSite({
      'https://example.com/robots.txt': () =>
        new Response('User-agent: *\nDisallow: /private\n', { status: 200 }),
      'https://example.com/private/page': () => htmlResponse(HEALTH_PAGE),
    });

    const result = await crawlUrl('https://example.com/private/page').result;

    expect(result).toMatchObject({
      status: 'blocked',
      errorKind: 'PolicyDenied',
      errorMessage: 'Blocked by robots.txt',
      title: null,
      statusCode: null,
      topics: [],
    });
    expect(fetchSpy.mock.calls.map(([input]) => requestUrl(input))).toEqual([
      'https://example.com/robots.txt',
    ]);
  });

  it('skips robots.txt when the crawl does not respect it', async () => {
    const fetchSpy = stubSite({
      'https://example.com/private/page': () => htmlResponse(HEALTH_PAGE),
    });

    const result = await crawlUrl('https://example.com/private/page', {
      respectRobotsTxt: false,
    }).result;

    expect(result.status).toBe('completed');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('fails non-HTML responses but keeps their HTTP metadata', async () => {
    stubSite({
      'https://example.com/data.json': () =>
        new Response('{"a":1}', {
          status: 200,
          headers: { 'content-type': 'application/json' },
        }),
    });

    const result = await crawlUrl('https://example.com/data.json', {
      respectRobotsTxt: false,
    }).result;

    expect(result).toMatchObject({
      status: 'failed',
      errorKind: 'ContentTypeMismatch',
      errorMessage: 'Not an HTML page. Content-Type: application/json',
      statusCode: 200,
      contentType: 'application/json',
      contentLength: 7,
      title: null,
    });
  });

  it('reports transport failures once the fetcher gives up', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    const result = await crawlUrl('https://example.com/down', {
      respectRobotsTxt: false,
    }).result;

    expect(result).toMatchObject({
      status: 'failed',
      errorKind: 'TransportFailure',
      errorMessage: 'Failed to fetch URL',
      statusCode: null,
    });
  });

  it('decodes bodies with an unknown charset as UTF-8', async () => {
    stubSite({
      'https://example.com/odd': () =>
        htmlResponse(htmlPage('Café', '<p>x</p>'), 200, {
          'content-type': 'text/html; charset=no-such-charset',
        }),
    });

    const result = await crawlUrl('https://example.com/odd', {
      respectRobotsTxt: false,
    }).result;

    expect(result.status).toBe('completed');
    expect(result.title).toBe('Café');
    expect(result.encoding).toBe('no-such-charset');
  });

  it('leaves out content and topics when their flags are off', async () => {
    stubSite({
      'https://example.com/health': () => htmlResponse(HEALTH_PAGE),
    });

    const result = await crawlUrl('https://example.com/health', {
      respectRobotsTxt: false,
      extractContent: false,
      classifyTopics: false,
    }).result;

    expect(result.status).toBe('completed');
    expect(result.title).toBe('Health Tips');
    expect(result.content).toBeNull();
    expect(result.textContent).toBeNull();
    expect(result.topics).toEqual([]);
  });

  it('takes the robots default from configuration', async () => {
    const fetchSpy = stubSite({
      'https://example.com/health': () => htmlResponse(HEALTH_PAGE),
    });

    const result = await crawlUrl('https://example.com/health', {}, { respectRobotsTxt: false })
      .result;

    expect(result.status).toBe('completed');
    expect(fetchSpy.mock.calls.map(([input]) => requestUrl(input))).toEqual([
      'https://example.com/health',
    ]);
  });

  it('logs every attempt with its outcome', async () => {
    stubSite({
      'https://example.com/health': () => htmlResponse(HEALTH_PAGE),
    });

    const { logger, result } = crawlUrl('https://example.com/health', {
      respectRobotsTxt: false,
    });
    await result;

    const attempts = logger.events.filter((event) => event.type === 'crawl_attempt');
    expect(attempts).toHaveLength(1);
    expect(attempts[0].url).toBe('https://example.com/health');
    expect(attempts[0].details?.status).toBe('completed');
    expect(attempts[0].details?.topics).toEqual(['health']);
  });

  it('completes with no topics when classification fails', async () => {
    stubSite({
      'https://example.com/health': () => htmlResponse(HEALTH_PAGE),
    });

    const { logger, result } = crawlWithClassifier(
      'https://example.com/health',
      new TopicClassifierService({
        classify: () => Effect.fail(ClassificationError.fromCause(new Error('table missing'))),
      })
    );
    const crawled = await result;

    expect(crawled.status).toBe('completed');
    expect(crawled.title).toBe('Health Tips');
    expect(crawled.topics).toEqual([]);
    const failures = logger.events.filter((event) => event.type === 'field_extraction_failed');
    expect(failures.map((event) => event.details?.field)).toEqual(['topics']);
  });

  it('turns a defect inside the pipeline into an unexpected failure', async () => {
    stubSite({
      'https://example.com/health': () => htmlResponse(HEALTH_PAGE),
    });

    const { logger, result } = crawlWithClassifier(
      'https://example.com/health',
      new TopicClassifierService({
        classify: () => Effect.die(new Error('classifier crashed')),
      })
    );
    const crawled = await result;

    expect(crawled).toMatchObject({
      status: 'failed',
      errorKind: 'Unexpected',
      errorMessage: 'classifier crashed',
      title: null,
      statusCode: null,
      topics: [],
    });
    const attempts = logger.events.filter((event) => event.type === 'crawl_attempt');
    expect(attempts.map((event) => event.details?.status)).toEqual(['failed']);
  });
});
