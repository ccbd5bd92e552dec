import { JSDOM } from 'jsdom';
import { buildItem, canonicalizeUrl, type Item } from './item.js';
import type { Extractor } from './extract.js';
import { collapseWhitespace } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * One extraction heuristic over a parsed listing page.
 */
export type ListingStrategy = (doc: Document, pageUrl: string) => Item | null;

const YEAR_SEGMENT = /\/(?:19|20)\d{2}\//;
const HEADINGS = 'h1, h2, h3, h4, h5, h6';
const CONTAINERS = 'article, section, div';
const MIN_LOOSE_TITLE_LENGTH = 11;

/**
 * Article links carry their publication year as a path segment, e.g.
 * /2024/05/02/world/some-story.html.
 */
export function isDatedLink(href: string | null, pageUrl: string): boolean {
  if (!href) return false;
  const url = canonicalizeUrl(href, pageUrl);
  if (!url) return false;
  return YEAR_SEGMENT.test(new URL(url).pathname);
}

function datedAnchors(scope: ParentNode, pageUrl: string): Element[] {
  return Array.from(scope.querySelectorAll('a[href]')).filter((a) =>
    isDatedLink(a.getAttribute('href'), pageUrl),
  );
}

function text(el: Element | null): string {
  return el ? collapseWhitespace(el.textContent ?? '') : '';
}

/**
 * Heading inside the anchor, else the heading wrapping it, else the first
 * heading of the entry the anchor belongs to.
 */
function headingTitle(anchor: Element, entry: Element | null): string {
  const inner = text(anchor.querySelector(HEADINGS));
  if (inner) return inner;

  const outer = text(anchor.closest(HEADINGS));
  if (outer) return outer;

  return entry ? text(entry.querySelector(HEADINGS)) : '';
}

function timeValue(scope: Element): string | undefined {
  const value = scope.querySelector('time[datetime]')?.getAttribute('datetime')?.trim();
  return value ? value : undefined;
}

export const orderedListStrategy: ListingStrategy = (doc, pageUrl) => {
  for (const list of Array.from(doc.querySelectorAll('ol'))) {
    for (const anchor of datedAnchors(list, pageUrl)) {
      const li = anchor.closest('li');
      const entry = li && list.contains(li) ? li : null;

      const title = headingTitle(anchor, entry);
      if (!title) continue;

      const time = entry ? timeValue(entry) : undefined;
      const item = buildItem(title, anchor.getAttribute('href') ?? undefined, pageUrl, time);
      if (item) return item;
    }
  }
  return null;
};

export const containerStrategy: ListingStrategy = (doc, pageUrl) => {
  for (const anchor of datedAnchors(doc, pageUrl)) {
    const container = anchor.closest(CONTAINERS);
    if (!container) continue;

    // Heading inside or around the link only.
    const title = headingTitle(anchor, null);
    if (title.length < MIN_LOOSE_TITLE_LENGTH) continue;

    const item = buildItem(title, anchor.getAttribute('href') ?? undefined, pageUrl, timeValue(container));
    if (item) return item;
  }
  return null;
};

// Never reports a timestamp: nothing ties a loose link to a date element.
export const fallbackStrategy: ListingStrategy = (doc, pageUrl) => {
  for (const anchor of datedAnchors(doc, pageUrl)) {
    let title = text(anchor);
    if (title.length < MIN_LOOSE_TITLE_LENGTH) {
      const parent = anchor.closest('div, li, article');
      title = parent ? text(parent.querySelector(HEADINGS)) : '';
    }
    if (title.length < MIN_LOOSE_TITLE_LENGTH) continue;

    const item = buildItem(title, anchor.getAttribute('href') ?? undefined, pageUrl);
    if (item) return item;
  }
  return null;
};

// Undated listings (blogs, newsrooms) whose article URLs carry no year.

const LISTING_CLASS = /post|article|entry/i;
const SKIPPED_HREF = /#|^\s*(?:mailto|javascript):|facebook\.com|twitter\.com|linkedin\.com/i;
const MAX_LINKED_HEADINGS = 10;

/**
 * A link that may point at an article: long enough to be more than a section
 * path, not a fragment, script or share link, and not the site root.
 */
export function isArticleLink(href: string | null, pageUrl: string): boolean {
  if (!href || href.trim().length <= 5 || SKIPPED_HREF.test(href)) return false;
  const url = canonicalizeUrl(href, pageUrl);
  if (!url) return false;
  const { pathname, search } = new URL(url);
  return pathname !== '/' || search !== '';
}

function firstArticleAnchor(scope: ParentNode, pageUrl: string): Element | null {
  return (
    Array.from(scope.querySelectorAll('a[href]')).find((a) => isArticleLink(a.getAttribute('href'), pageUrl)) ?? null
  );
}

function entryTime(anchor: Element, container: Element): string | undefined {
  const entry = anchor.closest('li, article');
  if (entry && container.contains(entry)) return timeValue(entry);
  return container.querySelectorAll('a[href]').length === 1 ? timeValue(container) : undefined;
}

export const classedListingStrategy: ListingStrategy = (doc, pageUrl) => {
  const containers = Array.from(doc.querySelectorAll('ol[class], ul[class], div[class]')).filter((el) =>
    LISTING_CLASS.test(el.getAttribute('class') ?? ''),
  );
  for (const container of containers) {
    const anchor = firstArticleAnchor(container, pageUrl);
    if (!anchor) continue;

    const title = text(anchor.querySelector(HEADINGS)) || text(anchor);
    if (title.length < MIN_LOOSE_TITLE_LENGTH) continue;

    const item = buildItem(title, anchor.getAttribute('href') ?? undefined, pageUrl, entryTime(anchor, container));
    if (item) return item;
  }
  return null;
};

export const articleElementStrategy: ListingStrategy = (doc, pageUrl) => {
  for (const article of Array.from(doc.querySelectorAll('article'))) {
    const anchor = firstArticleAnchor(article, pageUrl);
    if (!anchor) continue;

    const title = text(article.querySelector(HEADINGS));
    if (title.length < MIN_LOOSE_TITLE_LENGTH) continue;

    const item = buildItem(title, anchor.getAttribute('href') ?? undefined, pageUrl, timeValue(article));
    if (item) return item;
  }
  return null;
};

// Never reports a timestamp.
export const linkedHeadingStrategy: ListingStrategy = (doc, pageUrl) => {
  const headings = Array.from(doc.querySelectorAll('h1, h2, h3')).slice(0, MAX_LINKED_HEADINGS);
  for (const heading of headings) {
    const anchor = firstArticleAnchor(heading, pageUrl);
    if (!anchor) continue;

    const title = text(heading);
    if (title.length < MIN_LOOSE_TITLE_LENGTH) continue;

    const item = buildItem(title, anchor.getAttribute('href') ?? undefined, pageUrl);
    if (item) return item;
  }
  return null;
};

/**
 * Dated-link strategies first; the undated ones only run when a page has no
 * usable dated link.
 */
export const LISTING_STRATEGIES: ReadonlyArray<{ name: string; run: ListingStrategy }> = [
  { name: 'ordered-list', run: orderedListStrategy },
  { name: 'container', run: containerStrategy },
  { name: 'fallback', run: fallbackStrategy },
  { name: 'classed-listing', run: classedListingStrategy },
  { name: 'article-element', run: articleElementStrategy },
  { name: 'linked-heading', run: linkedHeadingStrategy },
];

export class HtmlListingExtractor implements Extractor {
  readonly kind = 'html' as const;

  constructor(
    private readonly strategies: ReadonlyArray<{ name: string; run: ListingStrategy }> = LISTING_STRATEGIES,
  ) {}

  async extract(body: string, pageUrl: string): Promise<Item | null> {
    const dom = new JSDOM(body, { url: pageUrl });
    try {
      const doc = dom.window.document;
      for (const strategy of this.strategies) {
        const item = strategy.run(doc, pageUrl);
        if (item) {
          logger.debug({ url: pageUrl, strategy: strategy.name }, 'Listing item extracted');
          return item;
        }
      }
      return null;
    } finally {
      dom.window.close();
    }
  }
}
