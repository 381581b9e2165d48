/**
 * Example 02: Batch Crawl Job
 *
 * This example demonstrates:
 * - Submitting a batch of URLs as one job
 * - Waiting for the job, retries included
 * - Reading stored pages, topics and crawler statistics
 *
 * Retries of failed fetches wait 60s and 120s by default, so this example
 * shortens the page retry delay.
 *
 * Usage: npx tsx examples/02-batch-job.ts
 */

import { Effect } from 'effect';
import {
  CrawlStore,
  JobCoordinatorService,
  MaintenanceService,
  makeCrawlerLayer,
} from '../src/index.js';

const urls = [
  'https://example.com/',
  'https://example.org/',
  'https://example.net/',
];

const program = Effect.gen(function* () {
  yield* Effect.logInfo('Example 02: batch crawl job');

  const jobs = yield* JobCoordinatorService;
  const store = yield* CrawlStore;
  const maintenance = yield* MaintenanceService;

  const jobId = yield* jobs.submitBatch({ name: 'example-batch', urls });
  yield* Effect.logInfo(`Submitted ${jobId} with ${urls.length} URLs`);

  const job = yield* jobs.awaitJob(jobId);
  yield* Effect.logInfo(
    `Job ${job.status}: ${job.completedUrls} completed, ${job.failedUrls} failed (${job.progress.toFixed(0)}%)`
  );

  const pages = yield* store.findPagesByUrls(job.urls);
  for (const page of pages) {
    yield* Effect.logInfo(
      `  ${page.url} [${page.crawlStatus}] ${page.title ?? ''} ${page.topics.join(', ')}`
    );
  }

  yield* maintenance.syncTopicCounts();
  yield* maintenance.updateWebsiteStats();
  const stats = yield* maintenance.getCrawlerStats();
  yield* Effect.logInfo('Crawler stats:', stats);
  return job;
});

const runnable = program.pipe(
  Effect.provide(
    makeCrawlerLayer({
      maxConcurrentAttempts: 2,
      delayBetweenRequestsMs: 500,
      pageRetry: { maxRetries: 2, baseDelaySeconds: 2 },
    })
  ),
  Effect.tapBoth({
    onSuccess: (job) => Effect.logInfo(`Example completed: ${job.status}`),
    onFailure: (error) => Effect.logError(`Example failed: ${String(error)}`),
  })
);

void Effect.runPromiseExit(runnable).then((exit) => {
  process.exit(exit._tag === 'Success' ? 0 : 1);
});
