import { collapseWhitespace } from '../shared/utils.js';

/**
 * The "top article" of a source. `url` is the identity key: two items are the
 * same item iff their URLs match, whatever their titles or timestamps say.
 */
export interface Item {
  title: string;
  url: string;
  publishedTime?: string;
}

export const MAX_TITLE_LENGTH = 300;

const TRACKING_PARAM = /^(utm_|mc_)|^(fbclid|gclid)$/i;

export function itemsEqual(a: Item, b: Item): boolean {
  return a.url === b.url;
}

/**
 * Collapse whitespace and cap the length of a display title.
 */
export function normalizeTitle(raw: string): string {
  const title = collapseWhitespace(raw);
  if (title.length <= MAX_TITLE_LENGTH) return title;
  return `${title.slice(0, MAX_TITLE_LENGTH - 1).trimEnd()}…`;
}

/**
 * Resolve a link against the page it came from and strip the parts that do not
 * identify the document:
 * - fragment
 * - tracking params (utm_*, mc_*, fbclid, gclid)
 *
 * Scheme and host are lowercased by the URL parser. Returns null for links
 * that do not resolve to an http(s) URL.
 */
export function canonicalizeUrl(raw: string, base?: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim(), base);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (TRACKING_PARAM.test(key)) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }

  url.hash = '';
  return url.toString();
}

/**
 * Build an item from raw extracted values, or null when either the title or
 * the link is unusable.
 */
export function buildItem(
  rawTitle: string | undefined,
  rawUrl: string | undefined,
  base: string,
  publishedTime?: string,
): Item | null {
  if (!rawTitle || !rawUrl) return null;

  const title = normalizeTitle(rawTitle);
  const url = canonicalizeUrl(rawUrl, base);
  if (!title || !url) return null;

  const item: Item = { title, url };
  const time = publishedTime?.trim();
  if (time) {
    item.publishedTime = time;
  }
  return item;
}
