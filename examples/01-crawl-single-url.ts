/**
 * Example 01: Crawling a Single URL
 *
 * This example demonstrates:
 * - Running the crawl pipeline without jobs or persistence
 * - Per-crawl options overriding configured defaults
 * - Reading the outcome and its error kind
 *
 * Usage: npx tsx examples/01-crawl-single-url.ts [url]
 */

import { Effect } from 'effect';
import { CrawlOrchestratorService, makePipelineLayer } from '../src/index.js';

const url = process.argv[2] ?? 'https://example.com/';

const program = Effect.gen(function* () {
  yield* Effect.logInfo(`Example 01: crawling ${url}`);

  const orchestrator = yield* CrawlOrchestratorService;
  const result = yield* orchestrator.crawlUrl(url, { extractContent: true });

  yield* Effect.logInfo(`Status: ${result.status}`);
  if (result.status !== 'completed') {
    yield* Effect.logWarning(`${result.errorKind}: ${result.errorMessage}`);
    return result;
  }

  yield* Effect.logInfo(`  Title: ${result.title ?? '(no title)'}`);
  yield* Effect.logInfo(`  Description: ${result.description ?? '(none)'}`);
  yield* Effect.logInfo(`  Language: ${result.language}`);
  yield* Effect.logInfo(`  Topics: ${result.topics.join(', ') || '(none)'}`);
  yield* Effect.logInfo(`  Text: ${result.textContent?.length ?? 0} chars`);
  return result;
});

const runnable = program.pipe(
  Effect.provide(
    makePipelineLayer({
      userAgent: 'TopicCrawlerExample/1.0',
      maxRetries: 2,
    })
  ),
  Effect.tapBoth({
    onSuccess: (result) => Effect.logInfo(`Done: ${result.status}`),
    onFailure: (error) => Effect.logError(`Example failed: ${String(error)}`),
  })
);

void Effect.runPromiseExit(runnable).then((exit) => {
  process.exit(exit._tag === 'Success' ? 0 : 1);
});
