import { Effect, MutableHashMap, Option } from 'effect';
import { CrawlerConfig } from '../Config/CrawlerConfig.service.js';
import { RobotsTxtError } from '../errors.js';
import { CrawlerLogger } from '../Logging/CrawlerLogger.service.js';

/**
 * Rules collected from the robots.txt group that applies to our user agent.
 *
 * @group Data Types
 * @public
 */
export interface RobotsRules {
  readonly disallow: ReadonlyArray<string>;
  readonly allow: ReadonlyArray<string>;
}

const EMPTY_RULES: RobotsRules = { disallow: [], allow: [] };

/**
 * Parses robots.txt content for a user agent.
 *
 * Every `User-agent:` line starts a fresh group and discards the rules
 * gathered so far. A group applies when its value is `*` or appears,
 * case-insensitively, inside `userAgent`. `Allow`/`Disallow` lines outside
 * an applicable group are ignored.
 *
 * @group Robots
 * @public
 */
export const parseRobotsTxt = (
  content: string,
  userAgent: string
): RobotsRules => {
  let disallow: string[] = [];
  let allow: string[] = [];
  let groupApplies = false;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const separator = trimmed.indexOf(':');
    if (separator === -1) continue;

    const directive = trimmed.slice(0, separator).trim().toLowerCase();
    const value = trimmed.slice(separator + 1).trim();

    if (directive === 'user-agent') {
      groupApplies =
        value === '*' ||
        (value !== '' &&
          userAgent.toLowerCase().includes(value.toLowerCase()));
      disallow = [];
      allow = [];
    } else if (groupApplies && directive === 'disallow') {
      disallow.push(value);
    } else if (groupApplies && directive === 'allow') {
      allow.push(value);
    }
  }

  return { disallow, allow };
};

/**
 * Prefix match of a robots.txt rule against a path. `*` matches any run of
 * characters; every other character is literal. Empty rules never match.
 *
 * @group Robots
 * @public
 */
export const pathMatchesRule = (path: string, rule: string): boolean => {
  if (!rule) return false;
  if (!rule.includes('*')) return path.startsWith(rule);

  // Escape regex special characters first, then handle wildcards
  const pattern = rule
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\\\*/g, '.*');
  return new RegExp(`^${pattern}`).test(path);
};

/**
 * A path is denied when some disallow rule matches it and no allow rule does.
 *
 * @group Robots
 * @public
 */
export const isPathAllowed = (path: string, rules: RobotsRules): boolean =>
  !rules.disallow.some((rule) => pathMatchesRule(path, rule)) ||
  rules.allow.some((rule) => pathMatchesRule(path, rule));

/**
 * Service answering robots.txt allow/deny questions for URLs.
 *
 * Fetches `{scheme}://{host}/robots.txt` once per origin and caches the
 * parsed rules for the life of the service. A missing robots.txt (any
 * status other than 200) or a failed fetch allows everything.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const robots = yield* RobotsService;
 *   if (!(yield* robots.isAllowed('https://example.com/admin'))) {
 *     return 'blocked';
 *   }
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class RobotsService extends Effect.Service<RobotsService>()(
  'topic-crawler/RobotsService',
  {
    effect: Effect.gen(function* () {
      const config = yield* CrawlerConfig;
      const logger = yield* CrawlerLogger;
      const userAgent = yield* config.getUserAgent();
      const timeoutMs = yield* config.getRobotsTimeout();

      const robotsCache = MutableHashMap.empty<string, RobotsRules>();

      const fetchRobotsTxt = (robotsUrl: string) =>
        Effect.tryPromise({
          try: async () => {
            const response = await fetch(robotsUrl, {
              headers: { 'User-Agent': userAgent },
              signal: AbortSignal.timeout(timeoutMs),
            });
            if (response.status !== 200) {
              return Option.none<string>();
            }
            return Option.some(await response.text());
          },
          catch: (error) => RobotsTxtError.fromCause(robotsUrl, error),
        });

      const rulesFor = (origin: string) =>
        Effect.gen(function* () {
          const cached = MutableHashMap.get(robotsCache, origin);
          if (Option.isSome(cached)) {
            return cached.value;
          }

          const robotsUrl = `${origin}/robots.txt`;
          const content = yield* fetchRobotsTxt(robotsUrl).pipe(
            Effect.catchAll((error) =>
              logger
                .logEdgeCase('robots_fetch_failed', {
                  url: robotsUrl,
                  error: error.message,
                })
                .pipe(Effect.as(Option.none<string>()))
            )
          );

          const rules = Option.match(content, {
            onNone: () => EMPTY_RULES,
            onSome: (text) => parseRobotsTxt(text, userAgent),
          });
          MutableHashMap.set(robotsCache, origin, rules);
          return rules;
        });

      const isAllowed = (urlString: string) =>
        Effect.gen(function* () {
          let url: URL;
          try {
            url = new URL(urlString);
          } catch (error) {
            yield* logger.logEdgeCase('invalid_url', {
              url: urlString,
              error: error instanceof Error ? error.message : String(error),
            });
            return true;
          }

          const rules = yield* rulesFor(`${url.protocol}//${url.host}`);
          const allowed = isPathAllowed(url.pathname, rules);
          yield* logger.logRobotsCheck(urlString, allowed);
          return allowed;
        });

      return {
        /**
         * Whether the configured user agent may fetch `url`. Never fails.
         */
        isAllowed,

        /**
         * Cached rules for an origin such as `https://example.com`, if
         * that origin has been checked.
         */
        getRules: (origin: string) =>
          Effect.sync(() => MutableHashMap.get(robotsCache, origin)),
      };
    }),
  }
) {}
