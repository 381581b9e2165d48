import { Duration } from 'effect';
import type { PageRetryOptions } from '../Config/CrawlerConfig.service.js';

/**
 * When and how long to wait before re-running a failed crawl attempt.
 *
 * @group Retry
 * @public
 */
export interface RetryPolicy {
  readonly maxRetries: number;
  /** Delay before the retry numbered `retryIndex` (from 0) */
  readonly delay: (retryIndex: number) => Duration.Duration;
  /** Whether a page that has failed `retryCount` times gets another attempt */
  readonly shouldRetry: (retryCount: number) => boolean;
}

/**
 * Exponential policy: retry n waits `baseDelaySeconds * 2^n` seconds, and a
 * page is retried while its failure count stays below `maxRetries`.
 */
export const makeRetryPolicy = ({
  maxRetries,
  baseDelaySeconds,
}: PageRetryOptions): RetryPolicy => ({
  maxRetries,
  delay: (retryIndex) => Duration.seconds(baseDelaySeconds * 2 ** retryIndex),
  shouldRetry: (retryCount) => retryCount < maxRetries,
});
