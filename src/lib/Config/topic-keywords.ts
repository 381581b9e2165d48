import { Schema } from 'effect';
import * as fs from 'fs';

/**
 * Topic name → trigger keywords. Declaration order is the order in which
 * qualifying topics are reported.
 */
export type TopicKeywordMap = Readonly<Record<string, ReadonlyArray<string>>>;

export const TopicKeywordMapSchema = Schema.Record({
  key: Schema.String,
  value: Schema.Array(Schema.String),
});

// Resolves to <root>/data from both src/lib/Config and dist/lib/Config
const DEFAULT_KEYWORDS_FILE = new URL(
  '../../../data/topic-keywords.json',
  import.meta.url
);

export const loadTopicKeywords = (
  file: URL | string = DEFAULT_KEYWORDS_FILE
): TopicKeywordMap =>
  Schema.decodeUnknownSync(TopicKeywordMapSchema)(
    JSON.parse(fs.readFileSync(file, 'utf-8'))
  );

export const DEFAULT_TOPIC_KEYWORDS: TopicKeywordMap = loadTopicKeywords();
