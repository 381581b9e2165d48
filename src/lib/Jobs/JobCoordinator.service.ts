import {
  Cause,
  Deferred,
  Duration,
  Effect,
  Fiber,
  MutableHashMap,
  MutableRef,
  Option,
} from 'effect';
import { slugify } from '../Classifier/TopicClassifier.service.js';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import type { CrawlOptions, CrawlResult } from '../CrawlResult/CrawlResult.js';
import { describeCause, JobNotFoundError, PersistenceError } from '../errors.js';
import { CrawlerLogger, type JobCounters } from '../Logging/CrawlerLogger.service.js';
import { CrawlOrchestratorService } from '../Orchestrator/CrawlOrchestrator.service.js';
import { makeRetryPolicy } from '../Retry/RetryPolicy.js';
import {
  CrawlStore,
  type Job,
  type Page,
  TERMINAL_JOB_STATUSES,
  TERMINAL_PAGE_STATUSES,
} from '../Store/CrawlStore.js';

/**
 * A batch of URLs crawled under one job.
 *
 * @group Jobs
 * @public
 */
export interface BatchSubmission {
  readonly name: string;
  readonly urls: ReadonlyArray<string>;
  /** Missing flags default to on; robots default comes from config */
  readonly options?: Partial<CrawlOptions>;
}

/**
 * Caller-supplied counters for the fast path of
 * {@link JobCoordinatorService.recomputeProgress}.
 */
export interface ProgressCounts {
  readonly completed: number;
  readonly failed: number;
}

interface JobRuntime {
  /** Serializes counter and status updates of one job */
  readonly lock: Effect.Semaphore;
  readonly cancelled: MutableRef.MutableRef<boolean>;
  /** Set once every URL has been handed to the worker pool */
  readonly dispatched: MutableRef.MutableRef<boolean>;
  readonly dispatchFiber: MutableRef.MutableRef<
    Option.Option<Fiber.RuntimeFiber<void>>
  >;
}

/** Released once a scheduled retry has claimed its URL or been dropped */
type RetryTicket = Deferred.Deferred<void>;

type SkipReason = 'page_crawling' | 'already_completed' | 'retry_ceiling_reached';

const CONFIDENCE_AUTOMATIC = 1.0;

const hostOf = (url: string) => (URL.canParse(url) ? new URL(url).host : '');

const countersOf = (job: Job): JobCounters => ({
  totalUrls: job.totalUrls,
  completedUrls: job.completedUrls,
  failedUrls: job.failedUrls,
  progress: job.progress,
});

const isRetryable = (result: CrawlResult) =>
  result.status === 'failed' &&
  (result.errorKind === 'TransportFailure' || result.errorKind === 'Unexpected');

/**
 * Fans batches of URLs out to crawl attempts and keeps job counters
 * consistent.
 *
 * - Attempts run on a worker pool of `maxConcurrentAttempts` permits.
 * - A page has at most one attempt in flight in this process; a second
 *   attempt for the same URL is dropped.
 * - Transport failures and crashed attempts mark the page failed and
 *   schedule a delayed retry on a daemon fiber until the retry ceiling.
 * - After every attempt, each job containing the URL rescans its pages.
 *   A job completes once dispatch is done, none of its URLs has an attempt
 *   or retry pending, and every page is terminal.
 * - Per-job state is released when the job reaches a terminal status.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const jobs = yield* JobCoordinatorService;
 *   const jobId = yield* jobs.submitBatch({
 *     name: 'news',
 *     urls: ['https://example.com/a', 'https://example.com/b'],
 *   });
 *   const job = yield* jobs.awaitJob(jobId);
 *   console.log(job.status, job.progress);
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class JobCoordinatorService extends Effect.Service<JobCoordinatorService>()(
  'topic-crawler/JobCoordinatorService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const logger = yield* CrawlerLogger;
      const store = yield* CrawlStore;
      const orchestrator = yield* CrawlOrchestratorService;
      const maxConcurrentAttempts = yield* config.getMaxConcurrentAttempts();
      const delayBetweenRequestsMs = yield* config.getDelayBetweenRequests();
      const respectRobotsTxt = yield* config.shouldRespectRobotsTxt();
      const retryPolicy = makeRetryPolicy(yield* config.getPageRetry());

      const pool = yield* Effect.makeSemaphore(Math.max(1, maxConcurrentAttempts));
      const pageMutex = yield* Effect.makeSemaphore(1);
      const inFlight = MutableHashMap.empty<string, Deferred.Deferred<void>>();
      // Several jobs may each have a retry sleeping for the same URL
      const pendingRetries = MutableHashMap.empty<string, ReadonlyArray<RetryTicket>>();
      const watchers = MutableHashMap.empty<string, Set<string>>();
      const runtimes = MutableHashMap.empty<string, JobRuntime>();

      const runtimeFor = (jobId: string): JobRuntime => {
        const existing = MutableHashMap.get(runtimes, jobId);
        if (Option.isSome(existing)) return existing.value;
        const runtime: JobRuntime = {
          lock: Effect.unsafeMakeSemaphore(1),
          cancelled: MutableRef.make(false),
          dispatched: MutableRef.make(false),
          dispatchFiber: MutableRef.make<Option.Option<Fiber.RuntimeFiber<void>>>(
            Option.none()
          ),
        };
        MutableHashMap.set(runtimes, jobId, runtime);
        return runtime;
      };

      /** Drops the job's runtime; later lookups of a terminal job rebuild and drop it again */
      const release = (jobId: string) =>
        Effect.sync(() => {
          MutableHashMap.remove(runtimes, jobId);
        });

      const isBusy = (url: string) =>
        MutableHashMap.has(inFlight, url) || MutableHashMap.has(pendingRetries, url);

      const addRetryTicket = (url: string, ticket: RetryTicket) => {
        const tickets = Option.getOrElse(MutableHashMap.get(pendingRetries, url), () => []);
        MutableHashMap.set(pendingRetries, url, [...tickets, ticket]);
      };

      const removeRetryTicket = (url: string, ticket: RetryTicket) => {
        const tickets = MutableHashMap.get(pendingRetries, url);
        if (Option.isNone(tickets)) return;
        const remaining = tickets.value.filter((pending) => pending !== ticket);
        if (remaining.length === 0) MutableHashMap.remove(pendingRetries, url);
        else MutableHashMap.set(pendingRetries, url, remaining);
      };

      const watch = (job: Job) =>
        Effect.sync(() => {
          for (const url of job.urls) {
            const jobs = Option.getOrElse(MutableHashMap.get(watchers, url), () => new Set<string>());
            jobs.add(job.id);
            MutableHashMap.set(watchers, url, jobs);
          }
        });

      const unwatch = (job: Job) =>
        Effect.sync(() => {
          for (const url of job.urls) {
            const jobs = MutableHashMap.get(watchers, url);
            if (Option.isNone(jobs)) continue;
            jobs.value.delete(job.id);
            if (jobs.value.size === 0) MutableHashMap.remove(watchers, url);
          }
        });

      const requireJob = (jobId: string) =>
        Effect.gen(function* () {
          const job = yield* store.getJob(jobId);
          if (Option.isNone(job)) {
            return yield* Effect.fail(JobNotFoundError.create(jobId));
          }
          return job.value;
        });

      const isTerminalJob = (job: Job) => TERMINAL_JOB_STATUSES.includes(job.status);

      /**
       * Rescans the job's pages, or stores the caller's counts when given.
       * Serialized per job; terminal jobs are returned unchanged.
       */
      const recomputeProgress = (jobId: string, counts?: ProgressCounts) => {
        const runtime = runtimeFor(jobId);
        return runtime.lock.withPermits(1)(
          Effect.gen(function* () {
            const job = yield* requireJob(jobId);
            if (isTerminalJob(job)) {
              yield* release(jobId);
              return job;
            }

            if (counts) {
              const hinted = yield* store.updateJobCounters(
                jobId,
                Math.max(0, counts.completed),
                Math.max(0, counts.failed)
              );
              yield* logger.logJobProgress(jobId, countersOf(hinted));
              return hinted;
            }

            const pages = yield* store.findPagesByUrls(job.urls);
            const completed = pages.filter((page) => page.crawlStatus === 'completed').length;
            const failed = pages.filter(
              (page) => page.crawlStatus === 'failed' || page.crawlStatus === 'blocked'
            ).length;

            const updated = yield* store.updateJobCounters(jobId, completed, failed);
            yield* logger.logJobProgress(jobId, countersOf(updated));

            const settled =
              MutableRef.get(runtime.dispatched) &&
              pages.length === job.totalUrls &&
              pages.every((page) => TERMINAL_PAGE_STATUSES.includes(page.crawlStatus)) &&
              !job.urls.some(isBusy);
            if (!settled) return updated;

            const finished = yield* store.updateJobStatus(jobId, 'completed', {
              completedAt: new Date(),
            });
            yield* unwatch(finished);
            yield* release(jobId);
            yield* logger.logJobLifecycle(jobId, 'completed', {
              completedUrls: finished.completedUrls,
              failedUrls: finished.failedUrls,
              progress: finished.progress,
            });
            return finished;
          })
        );
      };

      const recomputeWatchers = (url: string) =>
        Effect.gen(function* () {
          const jobIds = Option.match(MutableHashMap.get(watchers, url), {
            onNone: () => [],
            onSome: (jobs) => [...jobs],
          });
          yield* Effect.forEach(
            jobIds,
            (jobId) =>
              recomputeProgress(jobId).pipe(
                Effect.catchAll((error) =>
                  logger.logEdgeCase('progress_recompute_failed', {
                    jobId,
                    url,
                    error: error.message,
                  })
                )
              ),
            { discard: true }
          );
        });

      const skipReason = (page: Page): SkipReason | null => {
        if (page.crawlStatus === 'crawling') return 'page_crawling';
        if (page.crawlStatus === 'completed') return 'already_completed';
        if (page.crawlStatus === 'failed' && !retryPolicy.shouldRetry(page.retryCount)) {
          return 'retry_ceiling_reached';
        }
        return null;
      };

      const persistResult = (page: Page, result: CrawlResult, options: CrawlOptions) =>
        Effect.gen(function* () {
          yield* store.updatePageFields(page.id, {
            crawlStatus: result.status,
            title: result.title,
            description: result.description,
            keywords: result.keywords,
            author: result.author,
            language: result.language,
            content: result.content,
            textContent: result.textContent,
            statusCode: result.statusCode,
            contentType: result.contentType,
            contentLength: result.contentLength,
            encoding: result.encoding,
            headers: result.headers,
            errorMessage: result.errorMessage,
            topics: result.topics,
            crawledAt: result.status === 'completed' ? new Date() : page.crawledAt,
          });

          if (!options.classifyTopics) return;
          for (const name of result.topics) {
            const topic = yield* store.getOrCreateTopic(name, slugify(name));
            yield* store.upsertPageTopicEdge(page.id, topic.id, CONFIDENCE_AUTOMATIC, 'automatic');
          }
        });

      const scheduleRetry = (
        url: string,
        options: CrawlOptions,
        jobId: string,
        retryIndex: number
      ) =>
        Effect.gen(function* () {
          const delay = retryPolicy.delay(retryIndex);
          const ticket = yield* Deferred.make<void>();
          yield* pageMutex.withPermits(1)(Effect.sync(() => addRetryTicket(url, ticket)));
          yield* logger.logRetryScheduled(url, retryIndex + 1, Duration.toSeconds(delay));
          yield* Effect.sleep(delay).pipe(
            Effect.zipRight(runRetry(url, options, jobId, ticket)),
            Effect.ensuring(releaseTicket(url, ticket)),
            Effect.forkDaemon
          );
        });

      /**
       * Counts a failure against the page and schedules the next retry
       * while the page stays under the ceiling.
       */
      const markFailed = (url: string, message: string, options: CrawlOptions, jobId: string) =>
        Effect.gen(function* () {
          const found = yield* store.findPageByUrl(url);
          if (Option.isNone(found)) {
            yield* logger.logEdgeCase('failed_attempt_without_page', { url, error: message });
            return;
          }
          const page = found.value;
          const updated = yield* store.updatePageFields(page.id, {
            crawlStatus: 'failed',
            errorMessage: message,
            retryCount: page.retryCount + 1,
          });

          if (retryPolicy.shouldRetry(updated.retryCount)) {
            yield* scheduleRetry(url, options, jobId, updated.retryCount - 1);
          } else {
            yield* logger.logEdgeCase('retry_ceiling_reached', {
              url,
              retryCount: updated.retryCount,
            });
          }
        }).pipe(
          Effect.catchAllCause((cause) =>
            logger.logEdgeCase('retry_bookkeeping_failed', {
              url,
              error: describeCause(Cause.squash(cause)),
            })
          )
        );

      const runClaimedAttempt = (url: string, options: CrawlOptions, jobId: string) =>
        Effect.gen(function* () {
          const website = yield* store.getOrCreateWebsite(hostOf(url));
          const [page] = yield* store.getOrCreatePage(url, website.id);

          const reason = skipReason(page);
          if (reason !== null) {
            yield* logger.logEdgeCase('attempt_skipped', { url, jobId, reason });
            return;
          }

          yield* store.updatePageFields(page.id, { crawlStatus: 'crawling' });
          const result = yield* orchestrator.crawl({ url, options });
          yield* persistResult(page, result, options);

          if (isRetryable(result)) {
            yield* markFailed(url, result.errorMessage ?? 'Failed to fetch URL', options, jobId);
          }
        }).pipe(
          Effect.catchAllCause((cause) =>
            markFailed(url, describeCause(Cause.squash(cause)), options, jobId)
          )
        );

      const releaseTicket = (url: string, ticket: RetryTicket) =>
        pageMutex
          .withPermits(1)(Effect.sync(() => removeRetryTicket(url, ticket)))
          .pipe(Effect.zipRight(Deferred.succeed(ticket, undefined)));

      /**
       * Registers `done` as the in-flight attempt for `url`. A retry that
       * finds the failed attempt still winding down waits for it and claims
       * afterwards, handing in its ticket in the same step; any other caller
       * gives up.
       */
      const claim = (
        url: string,
        done: Deferred.Deferred<void>,
        ticket: Option.Option<RetryTicket>
      ): Effect.Effect<boolean> =>
        Effect.gen(function* () {
          for (;;) {
            const running = yield* pageMutex.withPermits(1)(
              Effect.sync(() => {
                const current = MutableHashMap.get(inFlight, url);
                if (Option.isSome(current)) return current;
                if (Option.isSome(ticket)) removeRetryTicket(url, ticket.value);
                MutableHashMap.set(inFlight, url, done);
                return Option.none<Deferred.Deferred<void>>();
              })
            );
            if (Option.isNone(running)) {
              if (Option.isSome(ticket)) yield* Deferred.succeed(ticket.value, undefined);
              return true;
            }
            if (Option.isNone(ticket)) return false;
            yield* Deferred.await(running.value);
          }
        });

      /**
       * One crawl attempt for `url`. Dropped when another attempt for the
       * same URL is in flight. Never fails.
       */
      const attempt = (
        url: string,
        options: CrawlOptions,
        jobId: string,
        ticket: Option.Option<RetryTicket>
      ): Effect.Effect<void> =>
        Effect.gen(function* () {
          const done = yield* Deferred.make<void>();
          const claimed = yield* claim(url, done, ticket);
          if (!claimed) {
            yield* logger.logEdgeCase('attempt_deduplicated', { url, jobId });
            return;
          }

          yield* runClaimedAttempt(url, options, jobId).pipe(
            Effect.ensuring(
              pageMutex
                .withPermits(1)(Effect.sync(() => MutableHashMap.remove(inFlight, url)))
                .pipe(Effect.zipRight(Deferred.succeed(done, undefined)))
            )
          );
        }).pipe(
          Effect.zipRight(recomputeWatchers(url)),
          Effect.catchAllCause((cause) =>
            logger.logEdgeCase('attempt_crashed', { url, jobId, error: Cause.pretty(cause) })
          )
        );

      /** The job's runtime may already be released, so the stored status decides */
      const isCancelled = (jobId: string) =>
        store.getJob(jobId).pipe(
          Effect.map(Option.exists((job) => job.status === 'cancelled')),
          Effect.catchAll((error) =>
            logger
              .logEdgeCase('retry_job_lookup_failed', { jobId, error: error.message })
              .pipe(Effect.as(false))
          )
        );

      const runRetry = (
        url: string,
        options: CrawlOptions,
        jobId: string,
        ticket: RetryTicket
      ): Effect.Effect<void> =>
        Effect.gen(function* () {
          if (yield* isCancelled(jobId)) {
            yield* logger.logEdgeCase('retry_dropped_job_cancelled', { url, jobId });
            yield* releaseTicket(url, ticket);
            yield* recomputeWatchers(url);
            return;
          }
          yield* pool.withPermits(1)(attempt(url, options, jobId, Option.some(ticket)));
        });

      const failJob = (jobId: string, cause: Cause.Cause<unknown>) => {
        const runtime = runtimeFor(jobId);
        const error = describeCause(Cause.squash(cause));
        return runtime.lock
          .withPermits(1)(
            Effect.gen(function* () {
              const job = yield* requireJob(jobId);
              if (isTerminalJob(job)) return yield* release(jobId);
              const failed = yield* store.updateJobStatus(jobId, 'failed', {
                completedAt: new Date(),
              });
              yield* unwatch(failed);
              yield* release(jobId);
              yield* logger.logJobLifecycle(jobId, 'failed', { error });
            })
          )
          .pipe(
            Effect.catchAll((bookkeeping) =>
              logger.logEdgeCase('job_failure_not_recorded', {
                jobId,
                error,
                bookkeepingError: bookkeeping.message,
              })
            )
          );
      };

      const dispatch = (job: Job, runtime: JobRuntime) =>
        Effect.gen(function* () {
          const started = yield* runtime.lock.withPermits(1)(
            Effect.gen(function* () {
              const current = yield* requireJob(job.id);
              if (MutableRef.get(runtime.cancelled) || isTerminalJob(current)) return false;
              yield* store.updateJobStatus(job.id, 'running', { startedAt: new Date() });
              yield* logger.logJobLifecycle(job.id, 'started', { totalUrls: job.totalUrls });
              return true;
            })
          );
          if (!started) return;

          yield* Effect.forEach(
            job.urls,
            (url) =>
              pool.withPermits(1)(
                Effect.gen(function* () {
                  if (MutableRef.get(runtime.cancelled)) return;
                  if (delayBetweenRequestsMs > 0) {
                    yield* Effect.sleep(Duration.millis(delayBetweenRequestsMs));
                  }
                  if (MutableRef.get(runtime.cancelled)) return;
                  yield* attempt(url, job.options, job.id, Option.none());
                })
              ),
            { concurrency: 'unbounded', discard: true }
          );

          MutableRef.set(runtime.dispatched, true);
          yield* recomputeProgress(job.id);
        }).pipe(Effect.catchAllCause((cause) => failJob(job.id, cause)));

      /** Waits until no attempt or retry is pending for any of the job's URLs */
      const awaitQuiescence = (urls: ReadonlyArray<string>) =>
        Effect.gen(function* () {
          for (;;) {
            const busy = urls.filter(isBusy);
            if (busy.length === 0) return;
            yield* Effect.forEach(
              busy,
              (url) => {
                const running = MutableHashMap.get(inFlight, url);
                if (Option.isSome(running)) return Deferred.await(running.value);
                const next = Option.flatMap(MutableHashMap.get(pendingRetries, url), (tickets) =>
                  Option.fromNullable(tickets.at(0))
                );
                if (Option.isSome(next)) return Deferred.await(next.value);
                return Effect.yieldNow();
              },
              { concurrency: 'unbounded', discard: true }
            );
          }
        });

      return {
        /**
         * Creates the job and starts dispatch on a daemon fiber. Returns the
         * job id without waiting for any attempt. Submitting a name that
         * already belongs to an active job returns that job's id.
         */
        submitBatch: (submission: BatchSubmission) =>
          Effect.gen(function* () {
            const options: CrawlOptions = {
              extractContent: submission.options?.extractContent ?? true,
              classifyTopics: submission.options?.classifyTopics ?? true,
              respectRobotsTxt: submission.options?.respectRobotsTxt ?? respectRobotsTxt,
            };
            const [job, created] = yield* store.getOrCreateJob(
              submission.name,
              submission.urls,
              options
            );
            if (!created) {
              yield* logger.logEdgeCase('job_already_exists', { jobId: job.id, name: job.name });
              return job.id;
            }

            const runtime = runtimeFor(job.id);
            yield* watch(job);
            yield* logger.logJobLifecycle(job.id, 'submitted', {
              name: job.name,
              totalUrls: job.totalUrls,
            });
            const fiber = yield* Effect.forkDaemon(dispatch(job, runtime));
            MutableRef.set(runtime.dispatchFiber, Option.some(fiber));
            return job.id;
          }),

        recomputeProgress,

        /**
         * Stops further dispatches and freezes the job's counters. Attempts
         * already running finish normally.
         */
        cancelJob: (jobId: string) => {
          const runtime = runtimeFor(jobId);
          return runtime.lock.withPermits(1)(
            Effect.gen(function* () {
              const job = yield* requireJob(jobId);
              if (isTerminalJob(job)) {
                yield* release(jobId);
                return job;
              }
              MutableRef.set(runtime.cancelled, true);
              const cancelled = yield* store.updateJobStatus(jobId, 'cancelled', {
                completedAt: new Date(),
              });
              yield* unwatch(cancelled);
              yield* release(jobId);
              yield* logger.logJobLifecycle(jobId, 'cancelled', {
                completedUrls: cancelled.completedUrls,
                failedUrls: cancelled.failedUrls,
              });
              return cancelled;
            })
          );
        },

        /**
         * Makes a page eligible for crawling again: status back to pending
         * and retry count to zero. A page with an attempt in flight is left
         * as it is.
         */
        requeuePage: (url: string) =>
          Effect.gen(function* () {
            const found = yield* store.findPageByUrl(url);
            if (Option.isNone(found)) {
              return yield* Effect.fail(PersistenceError.notFound('requeuePage', url));
            }
            if (isBusy(url)) {
              yield* logger.logEdgeCase('requeue_while_busy', { url });
              return found.value;
            }
            return yield* store.updatePageFields(found.value.id, {
              crawlStatus: 'pending',
              retryCount: 0,
              errorMessage: null,
            });
          }),

        /**
         * Waits for the job's dispatch and every attempt or retry pending
         * for its URLs, then returns the rescanned job.
         */
        awaitJob: (jobId: string) =>
          Effect.gen(function* () {
            const job = yield* requireJob(jobId);
            const runtime = MutableHashMap.get(runtimes, jobId);
            if (Option.isSome(runtime)) {
              const fiber = MutableRef.get(runtime.value.dispatchFiber);
              if (Option.isSome(fiber)) yield* Fiber.await(fiber.value);
            }
            yield* awaitQuiescence(job.urls);
            return yield* recomputeProgress(jobId);
          }),

        getJob: requireJob,

        /** Ids of jobs whose dispatch state is still held in memory */
        trackedJobs: () => Effect.sync(() => Array.from(runtimes, ([jobId]) => jobId)),
      };
    }),
    dependencies: [CrawlOrchestratorService.Default],
  }
) {}
