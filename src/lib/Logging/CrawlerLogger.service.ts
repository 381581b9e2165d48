import { Console, Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';

export type CrawlerLogEventType =
  | 'crawl_attempt'
  | 'robots_check'
  | 'fetch_retry'
  | 'fetch_rejected'
  | 'field_extraction_failed'
  | 'job_lifecycle'
  | 'job_progress'
  | 'retry_scheduled'
  | 'maintenance'
  | 'edge_case';

export interface CrawlerLogEvent {
  timestamp: string;
  type: CrawlerLogEventType;
  url?: string;
  jobId?: string;
  message: string;
  details?: Record<string, unknown>;
}

export type JobLifecycleEvent =
  | 'submitted'
  | 'started'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface JobCounters {
  readonly totalUrls: number;
  readonly completedUrls: number;
  readonly failedUrls: number;
  readonly progress: number;
}

export interface CrawlerLogger {
  readonly logCrawlAttempt: (
    url: string,
    status: string,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logRobotsCheck: (
    url: string,
    allowed: boolean,
    reason?: string
  ) => Effect.Effect<void>;
  readonly logFetchRetry: (
    url: string,
    attempt: number,
    delaySeconds: number,
    error: string
  ) => Effect.Effect<void>;
  readonly logFetchRejected: (
    url: string,
    reason: string,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logFieldExtractionFailed: (
    url: string,
    field: string,
    error: string
  ) => Effect.Effect<void>;
  readonly logJobLifecycle: (
    jobId: string,
    event: JobLifecycleEvent,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logJobProgress: (
    jobId: string,
    counters: JobCounters
  ) => Effect.Effect<void>;
  readonly logRetryScheduled: (
    url: string,
    retryCount: number,
    delaySeconds: number
  ) => Effect.Effect<void>;
  readonly logMaintenance: (
    task: string,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logEdgeCase: (
    caseType: string,
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
}

export const CrawlerLogger = Context.GenericTag<CrawlerLogger>('CrawlerLogger');

interface JobSummary {
  status: JobLifecycleEvent;
  updatedAt: string;
  counters?: JobCounters;
}

/**
 * Builds a CrawlerLogger around any event sink. The file logger and the
 * test loggers share the message formats defined here.
 */
export const makeCrawlerLoggerWith = (
  write: (event: CrawlerLogEvent) => Effect.Effect<void>
): CrawlerLogger => {
  const emit = (event: Omit<CrawlerLogEvent, 'timestamp'>) =>
    write({ ...event, timestamp: new Date().toISOString() });

  return {
    logCrawlAttempt: (url, status, details) =>
      emit({
        type: 'crawl_attempt',
        url,
        message: `Crawled ${url}: ${status}`,
        details: { status, ...details },
      }),

    logRobotsCheck: (url, allowed, reason) =>
      emit({
        type: 'robots_check',
        url,
        message: `robots.txt ${allowed ? 'allows' : 'disallows'} ${url}${reason ? ` (${reason})` : ''}`,
        details: { allowed, reason },
      }),

    logFetchRetry: (url, attempt, delaySeconds, error) =>
      emit({
        type: 'fetch_retry',
        url,
        message: `Fetch attempt ${attempt + 1} failed for ${url}, waiting ${delaySeconds}s: ${error}`,
        details: { attempt, delaySeconds, error },
      }),

    logFetchRejected: (url, reason, details) =>
      emit({
        type: 'fetch_rejected',
        url,
        message: `Rejected ${url}: ${reason}`,
        details: { reason, ...details },
      }),

    logFieldExtractionFailed: (url, field, error) =>
      emit({
        type: 'field_extraction_failed',
        url,
        message: `Error extracting ${field} from ${url}: ${error}`,
        details: { field, error },
      }),

    logJobLifecycle: (jobId, event, details) =>
      emit({
        type: 'job_lifecycle',
        jobId,
        message: `Job ${jobId} ${event}`,
        details: { event, ...details },
      }),

    logJobProgress: (jobId, counters) =>
      emit({
        type: 'job_progress',
        jobId,
        message: `Job ${jobId}: ${counters.completedUrls} completed, ${counters.failedUrls} failed of ${counters.totalUrls} (${counters.progress.toFixed(1)}%)`,
        details: { ...counters },
      }),

    logRetryScheduled: (url, retryCount, delaySeconds) =>
      emit({
        type: 'retry_scheduled',
        url,
        message: `Retry ${retryCount} for ${url} in ${delaySeconds}s`,
        details: { retryCount, delaySeconds },
      }),

    logMaintenance: (task, details) =>
      emit({
        type: 'maintenance',
        message: `[MAINTENANCE] ${task}`,
        details: { task, ...details },
      }),

    logEdgeCase: (caseType, details) =>
      emit({
        type: 'edge_case',
        message: `[EDGE_CASE] ${caseType}`,
        details: { case: caseType, ...details },
      }),
  };
};

export const makeCrawlerLogger = (logDir = './crawler-logs'): CrawlerLogger => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFileName = `crawler-${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
  const logFilePath = path.join(logDir, logFileName);
  const summaryFilePath = path.join(logDir, 'crawler-summary.json');
  const jobs: Record<string, JobSummary> = {};

  // Only job-level events reach the console; page events stay in the file
  const importantTypes: ReadonlyArray<CrawlerLogEventType> = [
    'job_lifecycle',
    'maintenance',
  ];

  const updateSummary = (event: CrawlerLogEvent) => {
    if (event.jobId === undefined) return;
    const existing = jobs[event.jobId];
    if (event.type === 'job_lifecycle') {
      const lifecycle = event.details?.event;
      jobs[event.jobId] = {
        ...existing,
        status: isJobLifecycleEvent(lifecycle)
          ? lifecycle
          : (existing?.status ?? 'submitted'),
        updatedAt: event.timestamp,
      };
    } else if (event.type === 'job_progress' && existing) {
      jobs[event.jobId] = {
        ...existing,
        updatedAt: event.timestamp,
        counters: readCounters(event.details),
      };
    } else {
      return;
    }
    fs.writeFileSync(summaryFilePath, JSON.stringify({ jobs }, null, 2));
  };

  return makeCrawlerLoggerWith((event) =>
    Effect.gen(function* () {
      yield* Effect.sync(() => {
        fs.appendFileSync(logFilePath, JSON.stringify(event) + '\n');
        updateSummary(event);
      });
      if (importantTypes.includes(event.type)) {
        const jobInfo = event.jobId ? ` [${event.jobId}]` : '';
        yield* Console.log(`[${event.type}]${jobInfo} ${event.message}`);
      }
    })
  );
};

const JOB_LIFECYCLE_EVENTS: ReadonlyArray<string> = [
  'submitted',
  'started',
  'completed',
  'failed',
  'cancelled',
];

const isJobLifecycleEvent = (value: unknown): value is JobLifecycleEvent =>
  typeof value === 'string' && JOB_LIFECYCLE_EVENTS.includes(value);

const readCounters = (
  details: Record<string, unknown> | undefined
): JobCounters => {
  const num = (key: string) => {
    const value = details?.[key];
    return typeof value === 'number' ? value : 0;
  };
  return {
    totalUrls: num('totalUrls'),
    completedUrls: num('completedUrls'),
    failedUrls: num('failedUrls'),
    progress: num('progress'),
  };
};

export const CrawlerLoggerLive = Layer.sync(CrawlerLogger, () =>
  makeCrawlerLogger()
);
