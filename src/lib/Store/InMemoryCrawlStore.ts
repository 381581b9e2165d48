import { Effect, Layer, Option } from 'effect';
import type { CrawlOptions } from '../CrawlResult/CrawlResult.js';
import { PersistenceError } from '../errors.js';
import {
  computeProgress,
  CrawlStore,
  type Job,
  type JobStatus,
  type JobStatusUpdate,
  makeRecordMeta,
  type Page,
  type PageFields,
  type PageQuery,
  type PageTopic,
  softDeleteRecordMeta,
  TERMINAL_JOB_STATUSES,
  type Topic,
  type TopicSource,
  touchRecordMeta,
  type Website,
  type WebsiteFields,
} from './CrawlStore.js';

const hasSameUrls = (job: Job, urls: ReadonlyArray<string>) => {
  const own = new Set(job.urls);
  return own.size === urls.length && urls.every((url) => own.has(url));
};

export interface InMemoryCrawlStoreOptions {
  /** Clock for record timestamps (default: `new Date()`) */
  readonly now?: () => Date;
}

/**
 * Process-local CrawlStore backed by maps.
 *
 * Each operation runs synchronously inside one `Effect.sync`, so updates to
 * a single record never interleave. Good for tests and single-process runs;
 * nothing survives a restart.
 *
 * @group Storage
 * @public
 */
export class InMemoryCrawlStore implements CrawlStore {
  readonly name = 'InMemoryCrawlStore';

  private readonly websites = new Map<string, Website>();
  private readonly websiteIdByDomain = new Map<string, string>();
  private readonly pages = new Map<string, Page>();
  private readonly pageIdByUrl = new Map<string, string>();
  private readonly topics = new Map<string, Topic>();
  private readonly topicIdByName = new Map<string, string>();
  private readonly edges = new Map<string, PageTopic>();
  private readonly jobs = new Map<string, Job>();
  private readonly sequences = new Map<string, number>();
  private readonly now: () => Date;

  constructor(options: InMemoryCrawlStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  static layer = (options: InMemoryCrawlStoreOptions = {}) =>
    Layer.sync(CrawlStore, () => new InMemoryCrawlStore(options));

  private nextId(prefix: string): string {
    const next = (this.sequences.get(prefix) ?? 0) + 1;
    this.sequences.set(prefix, next);
    return `${prefix}-${next}`;
  }

  private require<A>(
    records: Map<string, A>,
    operation: string,
    id: string
  ): Effect.Effect<A, PersistenceError> {
    const record = records.get(id);
    return record === undefined
      ? Effect.fail(PersistenceError.notFound(operation, id))
      : Effect.succeed(record);
  }

  getOrCreateWebsite = (domain: string): Effect.Effect<Website, PersistenceError> =>
    Effect.sync(() => {
      const existingId = this.websiteIdByDomain.get(domain);
      const existing = existingId === undefined ? undefined : this.websites.get(existingId);
      if (existing) return existing;

      const website: Website = {
        id: this.nextId('website'),
        domain,
        name: domain,
        crawlDelay: 1,
        lastCrawledAt: null,
        totalPages: 0,
        meta: makeRecordMeta(this.now()),
      };
      this.websites.set(website.id, website);
      this.websiteIdByDomain.set(domain, website.id);
      return website;
    });

  listWebsites = (): Effect.Effect<ReadonlyArray<Website>, PersistenceError> =>
    Effect.sync(() => [...this.websites.values()]);

  updateWebsite = (
    id: string,
    fields: WebsiteFields
  ): Effect.Effect<Website, PersistenceError> =>
    Effect.map(this.require(this.websites, 'updateWebsite', id), (website) => {
      const updated: Website = {
        ...website,
        ...fields,
        meta: touchRecordMeta(website.meta, this.now()),
      };
      this.websites.set(id, updated);
      return updated;
    });

  getOrCreatePage = (
    url: string,
    websiteId: string
  ): Effect.Effect<readonly [Page, boolean], PersistenceError> =>
    Effect.sync(() => {
      const existingId = this.pageIdByUrl.get(url);
      const existing = existingId === undefined ? undefined : this.pages.get(existingId);
      if (existing) return [existing, false] as const;

      const page: Page = {
        id: this.nextId('page'),
        url,
        websiteId,
        crawlStatus: 'pending',
        retryCount: 0,
        errorMessage: null,
        topics: [],
        crawledAt: null,
        title: null,
        description: null,
        keywords: null,
        author: null,
        language: null,
        content: null,
        textContent: null,
        statusCode: null,
        contentType: null,
        contentLength: null,
        encoding: null,
        headers: {},
        meta: makeRecordMeta(this.now()),
      };
      this.pages.set(page.id, page);
      this.pageIdByUrl.set(url, page.id);
      return [page, true] as const;
    });

  getPage = (id: string): Effect.Effect<Option.Option<Page>, PersistenceError> =>
    Effect.sync(() => Option.fromNullable(this.pages.get(id)));

  findPageByUrl = (url: string): Effect.Effect<Option.Option<Page>, PersistenceError> =>
    Effect.sync(() => {
      const id = this.pageIdByUrl.get(url);
      return Option.fromNullable(id === undefined ? undefined : this.pages.get(id));
    });

  findPagesByUrls = (
    urls: ReadonlyArray<string>
  ): Effect.Effect<ReadonlyArray<Page>, PersistenceError> =>
    Effect.sync(() =>
      urls.flatMap((url) => {
        const id = this.pageIdByUrl.get(url);
        const page = id === undefined ? undefined : this.pages.get(id);
        return page ? [page] : [];
      })
    );

  listPages = (query: PageQuery = {}): Effect.Effect<ReadonlyArray<Page>, PersistenceError> =>
    Effect.sync(() =>
      [...this.pages.values()].filter(
        (page) =>
          (query.status === undefined || page.crawlStatus === query.status) &&
          (query.websiteId === undefined || page.websiteId === query.websiteId) &&
          (!query.activeOnly || page.meta.isActive)
      )
    );

  updatePageFields = (id: string, fields: PageFields): Effect.Effect<Page, PersistenceError> =>
    Effect.map(this.require(this.pages, 'updatePageFields', id), (page) => {
      const updated: Page = {
        ...page,
        ...fields,
        meta: touchRecordMeta(page.meta, this.now()),
      };
      this.pages.set(id, updated);
      return updated;
    });

  softDeletePage = (id: string): Effect.Effect<Page, PersistenceError> =>
    Effect.map(this.require(this.pages, 'softDeletePage', id), (page) => {
      const updated: Page = {
        ...page,
        meta: softDeleteRecordMeta(page.meta, this.now()),
      };
      this.pages.set(id, updated);
      return updated;
    });

  getOrCreateTopic = (name: string, slug: string): Effect.Effect<Topic, PersistenceError> =>
    Effect.sync(() => {
      const existingId = this.topicIdByName.get(name);
      const existing = existingId === undefined ? undefined : this.topics.get(existingId);
      if (existing) return existing;

      const topic: Topic = {
        id: this.nextId('topic'),
        name,
        slug,
        pageCount: 0,
        meta: makeRecordMeta(this.now()),
      };
      this.topics.set(topic.id, topic);
      this.topicIdByName.set(name, topic.id);
      return topic;
    });

  listTopics = (): Effect.Effect<ReadonlyArray<Topic>, PersistenceError> =>
    Effect.sync(() => [...this.topics.values()]);

  updateTopic = (
    id: string,
    fields: Partial<Pick<Topic, 'pageCount'>>
  ): Effect.Effect<Topic, PersistenceError> =>
    Effect.map(this.require(this.topics, 'updateTopic', id), (topic) => {
      const updated: Topic = {
        ...topic,
        ...fields,
        meta: touchRecordMeta(topic.meta, this.now()),
      };
      this.topics.set(id, updated);
      return updated;
    });

  upsertPageTopicEdge = (
    pageId: string,
    topicId: string,
    confidence: number,
    source: TopicSource
  ): Effect.Effect<readonly [PageTopic, boolean], PersistenceError> =>
    Effect.sync(() => {
      const key = `${pageId}:${topicId}`;
      const existing = this.edges.get(key);
      if (existing) return [existing, false] as const;

      const edge: PageTopic = {
        pageId,
        topicId,
        confidence,
        source,
        meta: makeRecordMeta(this.now()),
      };
      this.edges.set(key, edge);
      return [edge, true] as const;
    });

  listPageTopics = (): Effect.Effect<ReadonlyArray<PageTopic>, PersistenceError> =>
    Effect.sync(() => [...this.edges.values()]);

  getOrCreateJob = (
    name: string,
    urls: ReadonlyArray<string>,
    options: CrawlOptions
  ): Effect.Effect<readonly [Job, boolean], PersistenceError> =>
    Effect.sync(() => {
      const uniqueUrls = [...new Set(urls)];
      const existing = [...this.jobs.values()].find(
        (job) =>
          job.name === name &&
          job.meta.isActive &&
          !TERMINAL_JOB_STATUSES.includes(job.status) &&
          hasSameUrls(job, uniqueUrls)
      );
      if (existing) return [existing, false] as const;

      const job: Job = {
        id: this.nextId('job'),
        name,
        urls: uniqueUrls,
        totalUrls: uniqueUrls.length,
        completedUrls: 0,
        failedUrls: 0,
        progress: 0,
        status: 'pending',
        options,
        startedAt: null,
        completedAt: null,
        meta: makeRecordMeta(this.now()),
      };
      this.jobs.set(job.id, job);
      return [job, true] as const;
    });

  getJob = (id: string): Effect.Effect<Option.Option<Job>, PersistenceError> =>
    Effect.sync(() => Option.fromNullable(this.jobs.get(id)));

  listJobs = (): Effect.Effect<ReadonlyArray<Job>, PersistenceError> =>
    Effect.sync(() => [...this.jobs.values()]);

  updateJobCounters = (
    id: string,
    completedUrls: number,
    failedUrls: number,
    status?: JobStatus
  ): Effect.Effect<Job, PersistenceError> =>
    Effect.map(this.require(this.jobs, 'updateJobCounters', id), (job) => {
      const updated: Job = {
        ...job,
        completedUrls,
        failedUrls,
        progress: computeProgress(job.totalUrls, completedUrls, failedUrls),
        status: status ?? job.status,
        meta: touchRecordMeta(job.meta, this.now()),
      };
      this.jobs.set(id, updated);
      return updated;
    });

  updateJobStatus = (
    id: string,
    status: JobStatus,
    timestamps: JobStatusUpdate = {}
  ): Effect.Effect<Job, PersistenceError> =>
    Effect.map(this.require(this.jobs, 'updateJobStatus', id), (job) => {
      const updated: Job = {
        ...job,
        status,
        startedAt: timestamps.startedAt ?? job.startedAt,
        completedAt: timestamps.completedAt ?? job.completedAt,
        meta: touchRecordMeta(job.meta, this.now()),
      };
      this.jobs.set(id, updated);
      return updated;
    });
}
