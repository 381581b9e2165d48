import { Schema } from 'effect';

export const CrawlStatusSchema = Schema.Literal('completed', 'failed', 'blocked');
export type CrawlStatus = Schema.Schema.Type<typeof CrawlStatusSchema>;

/**
 * Why an attempt did not complete.
 */
export const CrawlErrorKindSchema = Schema.Literal(
  'PolicyDenied',
  'TransportFailure',
  'ContentTypeMismatch',
  'ParseFailure',
  'Unexpected'
);
export type CrawlErrorKind = Schema.Schema.Type<typeof CrawlErrorKindSchema>;

export const CrawlOptionsSchema = Schema.Struct({
  extractContent: Schema.Boolean,
  classifyTopics: Schema.Boolean,
  respectRobotsTxt: Schema.Boolean,
});
export type CrawlOptions = Schema.Schema.Type<typeof CrawlOptionsSchema>;

export interface CrawlTarget {
  readonly url: string;
  readonly options: CrawlOptions;
}

const NullableString = Schema.NullOr(Schema.String);

export const CrawlResultSchema = Schema.Struct({
  status: CrawlStatusSchema,
  url: Schema.String,
  title: NullableString,
  description: NullableString,
  keywords: NullableString,
  author: NullableString,
  language: NullableString,
  /** Readability main-content HTML */
  content: NullableString,
  textContent: NullableString,
  topics: Schema.Array(Schema.String).pipe(Schema.maxItems(3)),
  statusCode: Schema.NullOr(
    Schema.Number.pipe(Schema.int(), Schema.between(100, 599))
  ),
  contentType: NullableString,
  contentLength: Schema.NullOr(
    Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(0))
  ),
  encoding: NullableString,
  headers: Schema.Record({ key: Schema.String, value: Schema.String }),
  errorMessage: NullableString,
  errorKind: Schema.NullOr(CrawlErrorKindSchema),
}).pipe(
  Schema.filter(
    (result) =>
      (result.status === 'completed') === (result.errorMessage === null),
    { message: () => 'errorMessage must be set exactly when status is not completed' }
  )
);

export type CrawlResult = Schema.Schema.Type<typeof CrawlResultSchema>;

/**
 * HTTP metadata carried by results once a response was received.
 */
export interface ResponseMetadata {
  readonly statusCode: number;
  readonly contentType: string;
  readonly contentLength: number;
  readonly encoding: string | null;
  readonly headers: Readonly<Record<string, string>>;
}

const EMPTY_FIELDS = {
  title: null,
  description: null,
  keywords: null,
  author: null,
  language: null,
  content: null,
  textContent: null,
  topics: [],
  statusCode: null,
  contentType: null,
  contentLength: null,
  encoding: null,
  headers: {},
} satisfies Omit<
  CrawlResult,
  'status' | 'url' | 'errorMessage' | 'errorKind'
>;

/**
 * Builds a blocked or failed result. Content fields stay empty; HTTP
 * metadata is copied when a response was received.
 */
export const unsuccessfulResult = (
  url: string,
  status: 'failed' | 'blocked',
  errorKind: CrawlErrorKind,
  errorMessage: string,
  response?: ResponseMetadata
): CrawlResult => ({
  ...EMPTY_FIELDS,
  ...(response && {
    statusCode: response.statusCode,
    contentType: response.contentType,
    contentLength: response.contentLength,
    encoding: response.encoding,
    headers: { ...response.headers },
  }),
  status,
  url,
  errorMessage,
  errorKind,
});
