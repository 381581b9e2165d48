/**
 * Shared test doubles for crawler services: a logger that records events,
 * a clock that records sleeps, and canned fetch responses.
 */

import { Clock, Duration, Effect, Layer } from 'effect';
import {
  CrawlerLogger,
  type CrawlerLogEvent,
  makeCrawlerLoggerWith,
} from '../../lib/Logging/CrawlerLogger.service.js';

export interface RecordingLogger {
  readonly events: CrawlerLogEvent[];
  readonly layer: Layer.Layer<CrawlerLogger>;
  /** `details.case` of every edge_case event, in order */
  readonly edgeCases: () => string[];
}

export const makeRecordingLogger = (): RecordingLogger => {
  const events: CrawlerLogEvent[] = [];
  const logger = makeCrawlerLoggerWith((event) =>
    Effect.sync(() => {
      events.push(event);
    })
  );
  return {
    events,
    layer: Layer.succeed(CrawlerLogger, logger),
    edgeCases: () =>
      events.flatMap((event) => {
        const caseType = event.details?.case;
        return event.type === 'edge_case' && typeof caseType === 'string'
          ? [caseType]
          : [];
      }),
  };
};

export const silentLoggerLayer = Layer.succeed(
  CrawlerLogger,
  makeCrawlerLoggerWith(() => Effect.void)
);

export interface RecordingClock {
  readonly clock: Clock.Clock;
  readonly sleeps: Duration.Duration[];
  readonly sleptSeconds: () => number[];
}

/**
 * Real time for timestamps; `sleep` remembers the requested duration and
 * returns at once, unless `hold` hands back a promise to wait for instead.
 * Forked fibers inherit it.
 */
export const makeRecordingClock = (
  hold: (duration: Duration.Duration) => Promise<void> | null = () => null
): RecordingClock => {
  const real = Clock.make();
  const sleeps: Duration.Duration[] = [];
  const clock: Clock.Clock = {
    [Clock.ClockTypeId]: Clock.ClockTypeId,
    unsafeCurrentTimeMillis: () => real.unsafeCurrentTimeMillis(),
    currentTimeMillis: real.currentTimeMillis,
    unsafeCurrentTimeNanos: () => real.unsafeCurrentTimeNanos(),
    currentTimeNanos: real.currentTimeNanos,
    sleep: (duration) =>
      Effect.suspend(() => {
        sleeps.push(duration);
        const held = hold(duration);
        return held === null ? Effect.void : Effect.promise(() => held);
      }),
  };
  return {
    clock,
    sleeps,
    sleptSeconds: () => sleeps.map(Duration.toSeconds),
  };
};

export const htmlResponse = (
  html: string,
  status = 200,
  headers: Record<string, string> = {}
) =>
  new Response(html, {
    status,
    headers: { 'content-type': 'text/html; charset=utf-8', ...headers },
  });

export const htmlPage = (title: string, body: string, head = '') =>
  `<html><head><title>${title}</title>${head}</head><body>${body}</body></html>`;

/** URL string of whatever `fetch` was called with */
export const requestUrl = (input: string | URL | Request): string =>
  typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
