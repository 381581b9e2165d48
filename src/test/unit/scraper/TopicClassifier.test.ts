/**
 * Topic Classifier Tests
 */

import { describe, expect, it } from 'vitest';
import { Effect, Layer } from 'effect';
import {
  classifyTopics,
  preprocessText,
  slugify,
  TopicClassifierService,
} from '../../../lib/Classifier/TopicClassifier.service.js';
import { CrawlerConfig } from '../../../lib/Config/CrawlerConfig.service.js';
import { DEFAULT_TOPIC_KEYWORDS } from '../../../lib/Config/topic-keywords.js';

const mapping = {
  alpha: ['apple', 'apricot'],
  beta: ['banana'],
  gamma: ['grape'],
  delta: ['date'],
};

describe('preprocessText', () => {
  it('lower-cases, strips punctuation and collapses whitespace', () => {
    expect(preprocessText('  Hello, WORLD!\n\nFoo_bar-baz  ')).toBe('hello world foo_bar baz');
  });

  it('keeps letters outside ASCII', () => {
    expect(preprocessText('Café déjà-vu')).toBe('café déjà vu');
  });
});

describe('classifyTopics', () => {
  it('matches whole words only', () => {
    expect(classifyTopics(mapping, 'Apples and bananas', null, null)).toEqual([]);
    expect(classifyTopics(mapping, 'An apple.', null, null)).toEqual(['alpha']);
  });

  it('reports topics in mapping order, at most three', () => {
    expect(
      classifyTopics(mapping, 'date', 'grape banana', 'apple')
    ).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('returns no topics for empty input', () => {
    expect(classifyTopics(mapping, null, null, null)).toEqual([]);
    expect(classifyTopics(mapping, '', '   ', '!!!')).toEqual([]);
  });

  it('is deterministic', () => {
    const first = classifyTopics(DEFAULT_TOPIC_KEYWORDS, 'Health Tips', null, 'doctor visits');
    const second = classifyTopics(DEFAULT_TOPIC_KEYWORDS, 'Health Tips', null, 'doctor visits');
    expect(first).toEqual(['health']);
    expect(second).toEqual(first);
  });

  it('never matches multi-word keywords', () => {
    expect(
      classifyTopics({ ml: ['machine learning'] }, 'Machine learning today', null, null)
    ).toEqual([]);
  });
});

describe('slugify', () => {
  it('builds URL-friendly identifiers', () => {
    expect(slugify('real_estate')).toBe('real_estate');
    expect(slugify('Science & Tech')).toBe('science-tech');
    expect(slugify('  Café  Culture ')).toBe('cafe-culture');
  });
});

describe('TopicClassifierService', () => {
  it('classifies with the configured keyword table', async () => {
    const topics = await Effect.runPromise(
      Effect.gen(function* () {
        const classifier = yield* TopicClassifierService;
        return yield* classifier.classify('Banana bread', null, null);
      }).pipe(
        Effect.provide(
          TopicClassifierService.Default.pipe(
            Layer.provide(CrawlerConfig.Live({ topicKeywords: mapping }))
          )
        )
      )
    );

    expect(topics).toEqual(['beta']);
  });
});
