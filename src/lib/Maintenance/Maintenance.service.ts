import { Effect, Option } from 'effect';
import { slugify, TopicClassifierService } from '../Classifier/TopicClassifier.service.js';
import { PersistenceError } from '../errors.js';
import { CrawlerLogger } from '../Logging/CrawlerLogger.service.js';
import { JobCoordinatorService } from '../Jobs/JobCoordinator.service.js';
import { CrawlStore, type JobStatus, type PageStatus } from '../Store/CrawlStore.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Aggregate counts over the store.
 *
 * @group Maintenance
 * @public
 */
export interface CrawlerStats {
  readonly totalPages: number;
  readonly pagesByStatus: Readonly<Record<PageStatus, number>>;
  readonly totalTopics: number;
  readonly totalWebsites: number;
  readonly totalJobs: number;
  readonly jobsByStatus: Readonly<Record<JobStatus, number>>;
}

/**
 * Outcome of classifying one stored page.
 *
 * @group Maintenance
 * @public
 */
export interface PageClassification {
  readonly pageId: string;
  readonly topics: ReadonlyArray<string>;
  /** Page-topic edges this run added; existing edges are left as they are */
  readonly edgesCreated: number;
}

/**
 * Housekeeping over stored pages, topics and websites. These tasks read
 * job data but never change the state of a running job.
 *
 * @group Services
 * @public
 */
export class MaintenanceService extends Effect.Service<MaintenanceService>()(
  'topic-crawler/MaintenanceService',
  {
    effect: Effect.gen(function* () {
      const store = yield* CrawlStore;
      const logger = yield* CrawlerLogger;
      const coordinator = yield* JobCoordinatorService;
      const classifier = yield* TopicClassifierService;

      return {
        /**
         * Links a stored page to its topics. Topics already on the page are
         * kept; otherwise they are classified from its title, description
         * and text and saved. A page without text and without topics is
         * left alone.
         */
        classifyPage: (pageId: string) =>
          Effect.gen(function* () {
            const found = yield* store.getPage(pageId);
            if (Option.isNone(found)) {
              return yield* Effect.fail(PersistenceError.notFound('classifyPage', pageId));
            }
            const page = found.value;

            let topics = page.topics;
            if (topics.length === 0) {
              if (!page.textContent) {
                yield* logger.logEdgeCase('classify_page_without_text', { pageId });
                const skipped: PageClassification = { pageId, topics: [], edgesCreated: 0 };
                return skipped;
              }
              topics = yield* classifier.classify(page.title, page.description, page.textContent);
              yield* store.updatePageFields(page.id, { topics });
            }

            let edgesCreated = 0;
            for (const name of topics) {
              const topic = yield* store.getOrCreateTopic(name, slugify(name));
              const [, created] = yield* store.upsertPageTopicEdge(
                page.id,
                topic.id,
                1.0,
                'automatic'
              );
              if (created) edgesCreated += 1;
            }
            yield* logger.logMaintenance('classify_page', { pageId, topics, edgesCreated });
            const classified: PageClassification = { pageId, topics, edgesCreated };
            return classified;
          }),

        /**
         * Resets active failed pages under `maxRetries` failures to pending
         * and submits them as one batch job. Returns how many were queued.
         */
        retryFailedPages: (maxRetries = 3) =>
          Effect.gen(function* () {
            const failed = yield* store.listPages({ status: 'failed', activeOnly: true });
            const eligible = failed.filter((page) => page.retryCount < maxRetries);
            if (eligible.length === 0) {
              yield* logger.logMaintenance('retry_failed_pages', { queued: 0 });
              return 0;
            }

            for (const page of eligible) {
              yield* store.updatePageFields(page.id, {
                crawlStatus: 'pending',
                errorMessage: null,
              });
            }
            const jobId = yield* coordinator.submitBatch({
              name: `retry-failed-${Date.now()}`,
              urls: eligible.map((page) => page.url),
            });
            yield* logger.logMaintenance('retry_failed_pages', {
              queued: eligible.length,
              jobId,
            });
            return eligible.length;
          }),

        /**
         * Soft-deletes active pages created more than `days` days ago.
         * Returns how many were deleted.
         */
        cleanupOldPages: (days = 30) =>
          Effect.gen(function* () {
            const cutoff = Date.now() - days * DAY_MS;
            const pages = yield* store.listPages({ activeOnly: true });
            const old = pages.filter((page) => page.meta.createdAt.getTime() < cutoff);
            for (const page of old) {
              yield* store.softDeletePage(page.id);
            }
            yield* logger.logMaintenance('cleanup_old_pages', { days, deleted: old.length });
            return old.length;
          }),

        /**
         * Recomputes every active topic's page count from edges whose page
         * is still active. Returns the number of topics updated.
         */
        syncTopicCounts: () =>
          Effect.gen(function* () {
            const topics = yield* store.listTopics();
            const edges = yield* store.listPageTopics();
            const activePages = yield* store.listPages({ activeOnly: true });
            const activePageIds = new Set(activePages.map((page) => page.id));

            const active = topics.filter((topic) => topic.meta.isActive);
            for (const topic of active) {
              const pageCount = edges.filter(
                (edge) => edge.topicId === topic.id && activePageIds.has(edge.pageId)
              ).length;
              yield* store.updateTopic(topic.id, { pageCount });
            }
            yield* logger.logMaintenance('sync_topic_counts', { topics: active.length });
            return active.length;
          }),

        /**
         * Sets each active website's page total and the latest crawl time
         * of its completed pages. Returns the number of websites updated.
         */
        updateWebsiteStats: () =>
          Effect.gen(function* () {
            const websites = yield* store.listWebsites();
            const active = websites.filter((website) => website.meta.isActive);
            for (const website of active) {
              const pages = yield* store.listPages({ websiteId: website.id, activeOnly: true });
              const lastCrawledAt = pages
                .filter((page) => page.crawlStatus === 'completed')
                .reduce<Date | null>(
                  (latest, page) =>
                    page.crawledAt !== null &&
                    (latest === null || page.crawledAt.getTime() > latest.getTime())
                      ? page.crawledAt
                      : latest,
                  null
                );
              yield* store.updateWebsite(website.id, {
                totalPages: pages.length,
                lastCrawledAt,
              });
            }
            yield* logger.logMaintenance('update_website_stats', { websites: active.length });
            return active.length;
          }),

        getCrawlerStats: () =>
          Effect.gen(function* () {
            const pages = yield* store.listPages();
            const topics = yield* store.listTopics();
            const websites = yield* store.listWebsites();
            const jobs = yield* store.listJobs();

            const pagesByStatus: Record<PageStatus, number> = {
              pending: 0,
              crawling: 0,
              completed: 0,
              failed: 0,
              blocked: 0,
            };
            for (const page of pages) pagesByStatus[page.crawlStatus] += 1;

            const jobsByStatus: Record<JobStatus, number> = {
              pending: 0,
              running: 0,
              completed: 0,
              failed: 0,
              cancelled: 0,
            };
            for (const job of jobs) jobsByStatus[job.status] += 1;

            const stats: CrawlerStats = {
              totalPages: pages.length,
              pagesByStatus,
              totalTopics: topics.length,
              totalWebsites: websites.length,
              totalJobs: jobs.length,
              jobsByStatus,
            };
            return stats;
          }),
      };
    }),
    dependencies: [TopicClassifierService.Default],
  }
) {}
