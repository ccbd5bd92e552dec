import type { Item } from './item.js';
import { classifySource, type SourceKind } from './sources.js';
import { HtmlListingExtractor } from './htmlListing.js';
import { FeedExtractor } from './feed.js';

/**
 * Turns a fetched document into its top item. Returns null when nothing
 * qualifies; throws ExtractionError only when the document is unusable.
 */
export interface Extractor {
  readonly kind: SourceKind;
  extract(body: string, pageUrl: string): Promise<Item | null>;
}

export function createExtractor(kind: SourceKind): Extractor {
  switch (kind) {
    case 'feed':
      return new FeedExtractor();
    case 'html':
      return new HtmlListingExtractor();
  }
}

export function selectExtractor(url: string): Extractor {
  return createExtractor(classifySource(url));
}
