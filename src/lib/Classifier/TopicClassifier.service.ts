import { Effect } from 'effect';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import type { TopicKeywordMap } from '../Config/topic-keywords.js';
import { ClassificationError } from '../errors.js';

export const MAX_TOPICS = 3;

/**
 * Lower-cases text, turns every character that is neither a word character
 * nor whitespace into a space, and collapses whitespace.
 */
export const preprocessText = (text: string): string =>
  text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Topics whose keyword list shares at least one word with the combined
 * title, description and text. Reported in mapping order, at most three.
 *
 * Matching is per token, so a multi-word keyword such as "machine learning"
 * never matches on its own.
 */
export const classifyTopics = (
  mapping: TopicKeywordMap,
  title: string | null,
  description: string | null,
  text: string | null
): ReadonlyArray<string> => {
  const combined = [title, description, text]
    .filter((part): part is string => Boolean(part))
    .join(' ');
  const processed = preprocessText(combined);
  if (!processed) return [];

  const words = new Set(processed.split(' '));
  const found: string[] = [];
  for (const [topic, keywords] of Object.entries(mapping)) {
    if (keywords.some((keyword) => words.has(keyword))) {
      found.push(topic);
    }
  }
  return found.slice(0, MAX_TOPICS);
};

/**
 * URL-friendly identifier for a topic name: ASCII only, lower case, runs of
 * spaces and hyphens become one hyphen.
 */
export const slugify = (name: string): string =>
  name
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');

/**
 * Keyword-based topic classification over the configured topic table.
 *
 * @group Services
 * @public
 */
export class TopicClassifierService extends Effect.Service<TopicClassifierService>()(
  'topic-crawler/TopicClassifierService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const mapping = yield* config.getTopicKeywords();

      return {
        classify: (
          title: string | null,
          description: string | null,
          text: string | null
        ) =>
          Effect.try({
            try: () => classifyTopics(mapping, title, description, text),
            catch: (error) => ClassificationError.fromCause(error),
          }),
      };
    }),
  }
) {}
