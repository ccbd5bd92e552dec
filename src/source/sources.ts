export type SourceKind = 'feed' | 'html';

const FEED_SEGMENTS = new Set(['rss', 'feed', 'feeds', 'atom']);
const FEED_EXTENSIONS = ['.rss', '.xml', '.atom'];

function pathSegments(url: string): string[] {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  return pathname
    .split('/')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function sanitizeId(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9._-]/g, '')
    .replace(/^[.]+/, '');
}

/**
 * Stable, filesystem-safe id for a source: the last non-empty path segment,
 * lowercased, with everything outside [a-z0-9._-] removed. Falls back to the
 * host name, then to "unknown".
 */
export function deriveSourceId(url: string): string {
  const segments = pathSegments(url);
  const last = segments[segments.length - 1];
  if (last !== undefined) {
    const id = sanitizeId(decodeSegment(last));
    if (id) return id;
  }

  try {
    const host = sanitizeId(new URL(url).hostname);
    if (host) return host;
  } catch {
    // not a URL; fall through
  }
  return 'unknown';
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Feed URLs carry a feed-like path segment (/rss/, /feed/, /atom/) or a feed
 * file extension; everything else is treated as an HTML listing page.
 */
export function classifySource(url: string): SourceKind {
  const segments = pathSegments(url).map((s) => s.toLowerCase());
  if (segments.some((s) => FEED_SEGMENTS.has(s))) return 'feed';

  const last = segments[segments.length - 1] ?? '';
  if (FEED_EXTENSIONS.some((ext) => last.endsWith(ext))) return 'feed';

  return 'html';
}
