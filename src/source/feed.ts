import Parser from 'rss-parser';
import { JSDOM } from 'jsdom';
import { buildItem, type Item } from './item.js';
import type { Extractor } from './extract.js';
import { ExtractionError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

interface RawEntry {
  title?: string;
  link?: string;
  published?: string;
}

interface FeedItemFields {
  /** Raw `<guid>` element, kept with its attributes. */
  guidElement?: unknown;
}

const parser = new Parser<Record<string, unknown>, FeedItemFields>({
  customFields: {
    item: [['guid', 'guidElement']],
  },
});

function toIsoDate(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * An RSS guid doubles as the item link when it is an absolute http(s) URL and
 * not marked `isPermaLink="false"`.
 */
export function permalinkGuid(text: string | null | undefined, isPermaLink?: string | null): string | undefined {
  const value = text?.trim();
  if (!value || !/^https?:\/\//i.test(value)) return undefined;
  if (isPermaLink?.trim().toLowerCase() === 'false') return undefined;
  return value;
}

// xml2js yields a plain string for <guid>url</guid> and { _, $ } once the
// element carries attributes.
function guidFromXml(element: unknown): string | undefined {
  if (typeof element === 'string') return permalinkGuid(element);
  if (typeof element !== 'object' || element === null || !('_' in element)) return undefined;

  const text = element._;
  if (typeof text !== 'string') return undefined;

  let isPermaLink: string | undefined;
  const attrs: unknown = '$' in element ? element.$ : undefined;
  if (typeof attrs === 'object' && attrs !== null && 'isPermaLink' in attrs && typeof attrs.isPermaLink === 'string') {
    isPermaLink = attrs.isPermaLink;
  }
  return permalinkGuid(text, isPermaLink);
}

function entryLink(entry: Element): string | undefined {
  const links = Array.from(entry.querySelectorAll('link'));

  const alternate =
    links.find((l) => l.getAttribute('href') && (l.getAttribute('rel') ?? 'alternate') === 'alternate') ??
    links.find((l) => l.getAttribute('href'));
  const href = alternate?.getAttribute('href');
  if (href) return href;

  // An HTML parser treats <link> as a void element, so the RSS link text ends
  // up as the node right after it.
  for (const link of links) {
    const next = link.nextSibling;
    if (next && next.nodeType === next.TEXT_NODE) {
      const value = next.textContent?.trim();
      if (value) return value;
    }
  }
  return undefined;
}

function guidElementLink(entry: Element): string | undefined {
  const guid = entry.querySelector('guid');
  return guid ? permalinkGuid(guid.textContent, guid.getAttribute('isPermaLink')) : undefined;
}

/**
 * Best-effort reading of a feed that is not well-formed XML. The body goes
 * through the HTML parser, which accepts anything; CDATA sections are turned
 * into escaped text first since HTML does not know them.
 */
export function recoverFirstEntry(body: string): RawEntry | null {
  const source = body.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, (_match, inner: string) => escapeText(inner));
  const dom = new JSDOM(source);
  try {
    const doc = dom.window.document;
    if (!doc.querySelector('rss, feed, channel, item, entry')) {
      throw new ExtractionError('Document is not an RSS or Atom feed');
    }

    const entry = doc.querySelector('item, entry');
    if (!entry) return null;

    const published = ['pubdate', 'published', 'dc\\:date', 'updated']
      .map((tag) => entry.querySelector(tag)?.textContent?.trim())
      .find((value) => value);

    return {
      title: entry.querySelector('title')?.textContent ?? undefined,
      link: entryLink(entry) ?? guidElementLink(entry),
      published: toIsoDate(published),
    };
  } finally {
    dom.window.close();
  }
}

async function parseFirstEntry(body: string): Promise<RawEntry | null> {
  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(body);
  } catch (err) {
    logger.debug({ error: errorMessage(err) }, 'Feed is not well-formed, recovering');
    return recoverFirstEntry(body);
  }

  const first = (feed.items ?? [])[0];
  if (!first) return null;

  return {
    title: first.title,
    link: first.link || guidFromXml(first.guidElement),
    published: first.isoDate ?? toIsoDate(first.pubDate),
  };
}

function isSiteRoot(url: string): boolean {
  const parsed = new URL(url);
  return parsed.pathname === '/' && parsed.search === '';
}

/**
 * RSS 2.0 / Atom. The top item is the first entry in document order; entry
 * dates never reorder entries.
 */
export class FeedExtractor implements Extractor {
  readonly kind = 'feed' as const;

  async extract(body: string, pageUrl: string): Promise<Item | null> {
    if (!body.trim()) {
      throw new ExtractionError('Empty feed document', { url: pageUrl });
    }

    const entry = await parseFirstEntry(body);
    if (!entry) return null;

    const item = buildItem(entry.title, entry.link, pageUrl, entry.published);
    if (!item || isSiteRoot(item.url)) return null;
    return item;
  }
}
