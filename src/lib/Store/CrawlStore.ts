import { Context, Effect, Option } from 'effect';
import type { CrawlOptions } from '../CrawlResult/CrawlResult.js';
import type { PersistenceError } from '../errors.js';

/**
 * Activity flag and timestamps shared by every stored record.
 *
 * @group Storage
 * @public
 */
export interface RecordMeta {
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  /** Set when the record is soft-deleted */
  readonly deletedAt: Date | null;
}

export const makeRecordMeta = (now: Date): RecordMeta => ({
  isActive: true,
  createdAt: now,
  updatedAt: now,
  deletedAt: null,
});

export const touchRecordMeta = (meta: RecordMeta, now: Date): RecordMeta => ({
  ...meta,
  updatedAt: now,
});

export const softDeleteRecordMeta = (meta: RecordMeta, now: Date): RecordMeta => ({
  ...meta,
  isActive: false,
  updatedAt: now,
  deletedAt: now,
});

export interface Website {
  readonly id: string;
  readonly domain: string;
  readonly name: string;
  /** Seconds between requests to this domain */
  readonly crawlDelay: number;
  readonly lastCrawledAt: Date | null;
  readonly totalPages: number;
  readonly meta: RecordMeta;
}

export type WebsiteFields = Partial<
  Pick<Website, 'name' | 'crawlDelay' | 'lastCrawledAt' | 'totalPages'>
>;

export type PageStatus = 'pending' | 'crawling' | 'completed' | 'failed' | 'blocked';

export const TERMINAL_PAGE_STATUSES: ReadonlyArray<PageStatus> = [
  'completed',
  'failed',
  'blocked',
];

export interface Page {
  readonly id: string;
  readonly url: string;
  readonly websiteId: string;
  readonly crawlStatus: PageStatus;
  readonly retryCount: number;
  readonly errorMessage: string | null;
  readonly topics: ReadonlyArray<string>;
  readonly crawledAt: Date | null;
  readonly title: string | null;
  readonly description: string | null;
  readonly keywords: string | null;
  readonly author: string | null;
  readonly language: string | null;
  readonly content: string | null;
  readonly textContent: string | null;
  readonly statusCode: number | null;
  readonly contentType: string | null;
  readonly contentLength: number | null;
  readonly encoding: string | null;
  readonly headers: Readonly<Record<string, string>>;
  readonly meta: RecordMeta;
}

export type PageFields = Partial<Omit<Page, 'id' | 'url' | 'websiteId' | 'meta'>>;

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_JOB_STATUSES: ReadonlyArray<JobStatus> = [
  'completed',
  'failed',
  'cancelled',
];

export interface Job {
  readonly id: string;
  readonly name: string;
  /** Unique URLs in submission order */
  readonly urls: ReadonlyArray<string>;
  readonly totalUrls: number;
  readonly completedUrls: number;
  readonly failedUrls: number;
  /** Percentage in [0, 100] */
  readonly progress: number;
  readonly status: JobStatus;
  readonly options: CrawlOptions;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
  readonly meta: RecordMeta;
}

export interface JobStatusUpdate {
  readonly startedAt?: Date;
  readonly completedAt?: Date;
}

/**
 * `(completed + failed) / total * 100`, clamped to [0, 100]. Zero for an
 * empty job.
 */
export const computeProgress = (
  totalUrls: number,
  completedUrls: number,
  failedUrls: number
): number => {
  if (totalUrls <= 0) return 0;
  const progress = ((completedUrls + failedUrls) / totalUrls) * 100;
  return Math.min(100, Math.max(0, progress));
};

export interface Topic {
  readonly id: string;
  readonly name: string;
  readonly slug: string;
  readonly pageCount: number;
  readonly meta: RecordMeta;
}

export type TopicSource = 'automatic' | 'manual';

export interface PageTopic {
  readonly pageId: string;
  readonly topicId: string;
  readonly confidence: number;
  readonly source: TopicSource;
  readonly meta: RecordMeta;
}

export interface PageQuery {
  readonly status?: PageStatus;
  readonly websiteId?: string;
  readonly activeOnly?: boolean;
}

/**
 * Persistence surface consumed by the job coordinator and maintenance
 * tasks. Operations are atomic per record; implementations enforce unique
 * page URLs, website domains, topic names and (page, topic) pairs.
 *
 * @group Storage
 * @public
 */
export interface CrawlStore {
  readonly name: string;

  getOrCreateWebsite(domain: string): Effect.Effect<Website, PersistenceError>;
  listWebsites(): Effect.Effect<ReadonlyArray<Website>, PersistenceError>;
  updateWebsite(
    id: string,
    fields: WebsiteFields
  ): Effect.Effect<Website, PersistenceError>;

  /** The page for `url` and whether this call created it */
  getOrCreatePage(
    url: string,
    websiteId: string
  ): Effect.Effect<readonly [Page, boolean], PersistenceError>;
  getPage(id: string): Effect.Effect<Option.Option<Page>, PersistenceError>;
  findPageByUrl(url: string): Effect.Effect<Option.Option<Page>, PersistenceError>;
  findPagesByUrls(
    urls: ReadonlyArray<string>
  ): Effect.Effect<ReadonlyArray<Page>, PersistenceError>;
  listPages(query?: PageQuery): Effect.Effect<ReadonlyArray<Page>, PersistenceError>;
  updatePageFields(
    id: string,
    fields: PageFields
  ): Effect.Effect<Page, PersistenceError>;
  softDeletePage(id: string): Effect.Effect<Page, PersistenceError>;

  getOrCreateTopic(name: string, slug: string): Effect.Effect<Topic, PersistenceError>;
  listTopics(): Effect.Effect<ReadonlyArray<Topic>, PersistenceError>;
  updateTopic(
    id: string,
    fields: Partial<Pick<Topic, 'pageCount'>>
  ): Effect.Effect<Topic, PersistenceError>;
  /** The edge for (page, topic) and whether this call created it */
  upsertPageTopicEdge(
    pageId: string,
    topicId: string,
    confidence: number,
    source: TopicSource
  ): Effect.Effect<readonly [PageTopic, boolean], PersistenceError>;
  listPageTopics(): Effect.Effect<ReadonlyArray<PageTopic>, PersistenceError>;

  /**
   * The unfinished job named `name` over the same unique `urls`, or a new
   * pending one. A finished job never absorbs a resubmission. The flag
   * reports whether this call created the job.
   */
  getOrCreateJob(
    name: string,
    urls: ReadonlyArray<string>,
    options: CrawlOptions
  ): Effect.Effect<readonly [Job, boolean], PersistenceError>;
  getJob(id: string): Effect.Effect<Option.Option<Job>, PersistenceError>;
  listJobs(): Effect.Effect<ReadonlyArray<Job>, PersistenceError>;
  /** Stores the counters with their recomputed progress */
  updateJobCounters(
    id: string,
    completedUrls: number,
    failedUrls: number,
    status?: JobStatus
  ): Effect.Effect<Job, PersistenceError>;
  updateJobStatus(
    id: string,
    status: JobStatus,
    timestamps?: JobStatusUpdate
  ): Effect.Effect<Job, PersistenceError>;
}

export const CrawlStore = Context.GenericTag<CrawlStore>('CrawlStore');
