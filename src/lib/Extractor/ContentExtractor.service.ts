import { Readability } from '@mozilla/readability';
import * as cheerio from 'cheerio';
import { Effect } from 'effect';
import { JSDOM } from 'jsdom';
import { ExtractionError, ParseError } from '../errors.js';
import type { FetchedPage } from '../Fetcher/Fetcher.service.js';
import { CrawlerLogger } from '../Logging/CrawlerLogger.service.js';

/**
 * A response body decoded and loaded as an HTML document.
 *
 * @group Data Types
 * @public
 */
export interface ParsedDocument {
  readonly url: string;
  /** Charset the body was decoded with */
  readonly encoding: string;
  readonly html: string;
  readonly $: cheerio.CheerioAPI;
}

/**
 * Fields extracted from a parsed document. Each one is extracted on its own
 * and falls back to its default when extraction fails.
 *
 * @group Data Types
 * @public
 */
export interface ExtractedContent {
  readonly title: string | null;
  readonly description: string | null;
  readonly keywords: string | null;
  readonly author: string | null;
  /** Defaults to `"en"` */
  readonly language: string;
  /** Main-content HTML reduced by Readability */
  readonly content: string | null;
  readonly textContent: string | null;
}

const AUTHOR_SELECTORS = [
  'meta[name="author"]',
  'meta[property="article:author"]',
  'meta[name="twitter:creator"]',
] as const;

const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i;

/** How far into the body a `<meta>` charset declaration is looked for */
const META_SCAN_BYTES = 4096;

const isSupportedCharset = (label: string): boolean => {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
};

/** Charset named by a `<meta charset>` or `http-equiv` declaration near the top of the body */
export const sniffMetaCharset = (body: Uint8Array): string | null => {
  // Any ASCII-compatible decoding reads the declaration itself
  const head = new TextDecoder('latin1').decode(body.subarray(0, META_SCAN_BYTES));
  return head.match(META_CHARSET)?.[1] ?? null;
};

/**
 * The first charset the decoder knows out of the response header's and the
 * document's own declaration, falling back to UTF-8.
 */
export const resolveCharset = (declared: string | null, body: Uint8Array): string => {
  const candidates = [declared, sniffMetaCharset(body)];
  for (const candidate of candidates) {
    if (candidate && isSupportedCharset(candidate)) return candidate.toLowerCase();
  }
  return 'utf-8';
};

export const isHtmlContentType = (contentType: string): boolean => {
  const normalized = contentType.toLowerCase();
  return (
    normalized.includes('text/html') ||
    normalized.includes('application/xhtml')
  );
};

/** Collapses every whitespace run to one space. Empty text becomes null. */
export const normalizeText = (text: string): string | null => {
  const normalized = text.replace(/\s+/g, ' ').trim();
  return normalized === '' ? null : normalized;
};

const metaContent = ($: cheerio.CheerioAPI, selector: string) => {
  const tag = $(selector).first();
  return tag.length > 0 ? (tag.attr('content') ?? '').trim() : null;
};

export const extractTitle = ($: cheerio.CheerioAPI): string | null => {
  const title = $('title').first();
  if (title.length > 0) return title.text().trim();

  const h1 = $('h1').first();
  if (h1.length > 0) return h1.text().trim();

  return null;
};

export const extractDescription = ($: cheerio.CheerioAPI): string | null =>
  metaContent($, 'meta[name="description"]') ??
  metaContent($, 'meta[property="og:description"]');

export const extractKeywords = ($: cheerio.CheerioAPI): string | null =>
  metaContent($, 'meta[name="keywords"]');

export const extractAuthor = ($: cheerio.CheerioAPI): string | null => {
  for (const selector of AUTHOR_SELECTORS) {
    const author = metaContent($, selector);
    if (author !== null) return author;
  }
  return null;
};

export const extractLanguage = ($: cheerio.CheerioAPI): string => {
  const lang = $('html').first().attr('lang');
  if (lang) return lang;

  return metaContent($, 'meta[http-equiv="content-language"]') ?? 'en';
};

export const extractMainContent = (url: string, html: string): string | null => {
  const dom = new JSDOM(html, { url });
  const article = new Readability(dom.window.document).parse();
  return article?.content ?? null;
};

export const extractTextContent = (html: string): string | null => {
  // Separate load so removing nodes leaves the shared document untouched
  const $ = cheerio.load(html);
  $('script, style').remove();
  return normalizeText($.root().text());
};

/**
 * Service turning HTML responses into page metadata and text.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const extractor = yield* ContentExtractorService;
 *   const document = yield* extractor.parse(page);
 *   const fields = yield* extractor.extract(document);
 *   return fields.title;
 * });
 * ```
 *
 * @group Services
 * @public
 */
export class ContentExtractorService extends Effect.Service<ContentExtractorService>()(
  'topic-crawler/ContentExtractorService',
  {
    effect: Effect.gen(function* () {
      const logger = yield* CrawlerLogger;

      const field = <A>(url: string, name: string, fallback: A, extract: () => A) =>
        Effect.try({
          try: extract,
          catch: (error) => ExtractionError.fromCause(name, error),
        }).pipe(
          Effect.catchAll((error) =>
            logger
              .logFieldExtractionFailed(url, error.field, error.message)
              .pipe(Effect.as(fallback))
          )
        );

      return {
        isHtmlContentType,

        /**
         * Decodes the body with the charset from {@link resolveCharset} and
         * loads it with cheerio.
         */
        parse: (page: FetchedPage) =>
          Effect.gen(function* () {
            const encoding = resolveCharset(page.encoding, page.body);
            if (page.encoding !== null && page.encoding.toLowerCase() !== encoding) {
              yield* logger.logEdgeCase('charset_fallback', {
                url: page.url,
                declared: page.encoding,
                used: encoding,
              });
            }
            return yield* Effect.try({
              try: (): ParsedDocument => {
                const html = new TextDecoder(encoding).decode(page.body);
                return { url: page.url, encoding, html, $: cheerio.load(html) };
              },
              catch: (error) => ParseError.html(page.url, error),
            });
          }),

        extract: (document: ParsedDocument) =>
          Effect.gen(function* () {
            const { url, html, $ } = document;
            const title = yield* field<string | null>(url, 'title', null, () => extractTitle($));
            const description = yield* field<string | null>(url, 'description', null, () =>
              extractDescription($)
            );
            const keywords = yield* field<string | null>(url, 'keywords', null, () =>
              extractKeywords($)
            );
            const author = yield* field<string | null>(url, 'author', null, () => extractAuthor($));
            const language = yield* field<string>(url, 'language', 'en', () =>
              extractLanguage($)
            );
            const content = yield* field<string | null>(url, 'content', null, () =>
              extractMainContent(url, html)
            );
            const textContent = yield* field<string | null>(url, 'text content', null, () =>
              extractTextContent(html)
            );

            const extracted: ExtractedContent = {
              title,
              description,
              keywords,
              author,
              language,
              content,
              textContent,
            };
            return extracted;
          }),
      };
    }),
  }
) {}
