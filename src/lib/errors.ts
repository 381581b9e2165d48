import { Data } from 'effect';

/**
 * Network-related errors (connection failures, timeouts, body read failures).
 * These are the only fetch errors the fetcher retries.
 */
export class NetworkError extends Data.TaggedError('NetworkError')<{
  readonly url: string;
  readonly attempt: number;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(url: string, attempt: number, cause: unknown): NetworkError {
    return new NetworkError({
      url,
      attempt,
      cause,
      message: `Failed to fetch ${url} (attempt ${attempt + 1}): ${describeCause(cause)}`,
    });
  }
}

/**
 * Body exceeded the configured maximum content length after download
 */
export class ContentTooLargeError extends Data.TaggedError('ContentTooLargeError')<{
  readonly url: string;
  readonly contentLength: number;
  readonly maxContentLength: number;
  readonly message: string;
}> {
  static create(
    url: string,
    contentLength: number,
    maxContentLength: number
  ): ContentTooLargeError {
    return new ContentTooLargeError({
      url,
      contentLength,
      maxContentLength,
      message: `Content too large for ${url}: ${contentLength} bytes (limit ${maxContentLength})`,
    });
  }
}

/**
 * Robots.txt fetching errors
 */
export class RobotsTxtError extends Data.TaggedError('RobotsTxtError')<{
  readonly url: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(url: string, cause: unknown): RobotsTxtError {
    return new RobotsTxtError({
      url,
      cause,
      message: `Failed to fetch robots.txt from ${url}: ${describeCause(cause)}`,
    });
  }
}

/**
 * Content type validation errors
 */
export class ContentTypeError extends Data.TaggedError('ContentTypeError')<{
  readonly url: string;
  readonly contentType: string;
  readonly message: string;
}> {
  static create(url: string, contentType: string): ContentTypeError {
    return new ContentTypeError({
      url,
      contentType,
      message: `Not an HTML page. Content-Type: ${contentType}`,
    });
  }
}

/**
 * The body could not be decoded or loaded as an HTML document
 */
export class ParseError extends Data.TaggedError('ParseError')<{
  readonly url: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static html(url: string, cause: unknown): ParseError {
    return new ParseError({
      url,
      cause,
      message: `Error parsing HTML: ${describeCause(cause)}`,
    });
  }
}

/**
 * A single metadata or content field could not be extracted.
 * Always recovered where it is raised.
 */
export class ExtractionError extends Data.TaggedError('ExtractionError')<{
  readonly field: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(field: string, cause: unknown): ExtractionError {
    return new ExtractionError({
      field,
      cause,
      message: `Error extracting ${field}: ${describeCause(cause)}`,
    });
  }
}

export class ClassificationError extends Data.TaggedError('ClassificationError')<{
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(cause: unknown): ClassificationError {
    return new ClassificationError({
      cause,
      message: `Error classifying topics: ${describeCause(cause)}`,
    });
  }
}

/**
 * Persistence collaborator errors
 */
export class PersistenceError extends Data.TaggedError('PersistenceError')<{
  readonly operation: string;
  readonly key?: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(
    operation: string,
    cause: unknown,
    key?: string
  ): PersistenceError {
    return new PersistenceError({
      operation,
      key,
      cause,
      message: key
        ? `Persistence operation '${operation}' failed for ${key}: ${describeCause(cause)}`
        : `Persistence operation '${operation}' failed: ${describeCause(cause)}`,
    });
  }

  static notFound(operation: string, key: string): PersistenceError {
    return new PersistenceError({
      operation,
      key,
      message: `Persistence operation '${operation}' failed: no record for ${key}`,
    });
  }
}

export class JobNotFoundError extends Data.TaggedError('JobNotFoundError')<{
  readonly jobId: string;
  readonly message: string;
}> {
  static create(jobId: string): JobNotFoundError {
    return new JobNotFoundError({ jobId, message: `Job ${jobId} not found` });
  }
}

export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export type CrawlerError =
  | NetworkError
  | ContentTooLargeError
  | RobotsTxtError
  | ContentTypeError
  | ParseError
  | ExtractionError
  | ClassificationError
  | PersistenceError
  | JobNotFoundError;
