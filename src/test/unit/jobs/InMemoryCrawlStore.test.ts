/**
 * In-memory Crawl Store Tests
 */

import { describe, expect, it } from 'vitest';
import { Duration, Effect, Either, Option } from 'effect';
import { InMemoryCrawlStore } from '../../../lib/Store/InMemoryCrawlStore.js';
import { computeProgress } from '../../../lib/Store/CrawlStore.js';
import { makeRetryPolicy } from '../../../lib/Retry/RetryPolicy.js';

const OPTIONS = { extractContent: true, classifyTopics: true, respectRobotsTxt: true };

describe('InMemoryCrawlStore', () => {
  it('creates a page once per URL', async () => {
    const store = new InMemoryCrawlStore();
    const [first, second] = await Effect.runPromise(
      Effect.gen(function* () {
        const website = yield* store.getOrCreateWebsite('example.com');
        const a = yield* store.getOrCreatePage('https://example.com/a', website.id);
        const b = yield* store.getOrCreatePage('https://example.com/a', website.id);
        return [a, b] as const;
      })
    );

    expect(first[1]).toBe(true);
    expect(second[1]).toBe(false);
    expect(second[0].id).toBe(first[0].id);
    expect(first[0].crawlStatus).toBe('pending');
  });

  it('keeps one edge per page and topic', async () => {
    const store = new InMemoryCrawlStore();
    const created = await Effect.runPromise(
      Effect.gen(function* () {
        const topic = yield* store.getOrCreateTopic('health', 'health');
        const [, first] = yield* store.upsertPageTopicEdge('page-1', topic.id, 1, 'automatic');
        const [, again] = yield* store.upsertPageTopicEdge('page-1', topic.id, 0.5, 'manual');
        return [first, again];
      })
    );

    expect(created).toEqual([true, false]);
    const edges = await Effect.runPromise(store.listPageTopics());
    expect(edges.map((edge) => [edge.confidence, edge.source])).toEqual([[1, 'automatic']]);
  });

  it('stores job counters with their progress', async () => {
    const store = new InMemoryCrawlStore();
    const job = await Effect.runPromise(
      Effect.gen(function* () {
        const [created] = yield* store.getOrCreateJob(
          'batch',
          ['https://example.com/a', 'https://example.com/b', 'https://example.com/c', 'https://example.com/d'],
          OPTIONS
        );
        return yield* store.updateJobCounters(created.id, 1, 1);
      })
    );

    expect([job.completedUrls, job.failedUrls, job.progress]).toEqual([1, 1, 50]);
    expect(job.status).toBe('pending');
  });

  it('reuses a job only while it is unfinished and covers the same URLs', async () => {
    const store = new InMemoryCrawlStore();
    const urls = ['https://example.com/a', 'https://example.com/b'];
    const [first, again, reordered, other, afterFinish] = await Effect.runPromise(
      Effect.gen(function* () {
        const [job] = yield* store.getOrCreateJob('nightly', urls, OPTIONS);
        const [same, sameCreated] = yield* store.getOrCreateJob('nightly', urls, OPTIONS);
        const [, reorderedCreated] = yield* store.getOrCreateJob(
          'nightly',
          [urls[1], urls[0], urls[1]],
          OPTIONS
        );
        const [, otherCreated] = yield* store.getOrCreateJob('nightly', [urls[0]], OPTIONS);
        yield* store.updateJobStatus(job.id, 'completed');
        const [next, nextCreated] = yield* store.getOrCreateJob('nightly', urls, OPTIONS);
        return [
          job.id,
          [same.id, sameCreated],
          reorderedCreated,
          otherCreated,
          [next.id, nextCreated],
        ] as const;
      })
    );

    expect(again).toEqual([first, false]);
    expect(reordered).toBe(false);
    expect(other).toBe(true);
    expect(afterFinish[1]).toBe(true);
    expect(afterFinish[0]).not.toBe(first);
  });

  it('reads a page by id', async () => {
    const store = new InMemoryCrawlStore();
    const [found, missing] = await Effect.runPromise(
      Effect.gen(function* () {
        const website = yield* store.getOrCreateWebsite('example.com');
        const [page] = yield* store.getOrCreatePage('https://example.com/a', website.id);
        return [yield* store.getPage(page.id), yield* store.getPage('page-404')] as const;
      })
    );

    expect(Option.map(found, (page) => page.url)).toEqual(Option.some('https://example.com/a'));
    expect(Option.isNone(missing)).toBe(true);
  });

  it('fails updates of missing records', async () => {
    const store = new InMemoryCrawlStore();
    const result = await Effect.runPromise(
      Effect.either(store.updatePageFields('page-404', { crawlStatus: 'failed' }))
    );

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isRight(result)) return;
    expect(result.left.operation).toBe('updatePageFields');
    expect(result.left.key).toBe('page-404');
  });

  it('finds nothing for an unknown URL', async () => {
    const store = new InMemoryCrawlStore();
    const found = await Effect.runPromise(store.findPageByUrl('https://example.com/none'));
    expect(Option.isNone(found)).toBe(true);
  });
});

describe('computeProgress', () => {
  it('is zero for an empty job', () => {
    expect(computeProgress(0, 0, 0)).toBe(0);
  });

  it('clamps to [0, 100]', () => {
    expect(computeProgress(2, 3, 1)).toBe(100);
    expect(computeProgress(4, 1, 0)).toBe(25);
  });
});

describe('makeRetryPolicy', () => {
  it('doubles the delay per retry and stops at the ceiling', () => {
    const policy = makeRetryPolicy({ maxRetries: 3, baseDelaySeconds: 60 });
    expect([0, 1, 2].map((i) => Duration.toSeconds(policy.delay(i)))).toEqual([60, 120, 240]);
    expect([0, 1, 2, 3].map(policy.shouldRetry)).toEqual([true, true, true, false]);
  });
});
