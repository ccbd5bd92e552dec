import type { DocumentFetcher, FetchResult } from '../source/fetcher.js';
import type { Extractor } from '../source/extract.js';
import { selectExtractor } from '../source/extract.js';
import { classifySource } from '../source/sources.js';
import { itemsEqual, type Item } from '../source/item.js';
import type { SourceCursor } from '../state/cursor.js';
import { FetchError, LedeError, errorMessage } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';

export interface CheckSource {
  sourceId: string;
  url: string;
}

export interface CheckFailure {
  code: string;
  message: string;
  /** Set for fetch failures. */
  kind?: 'transient' | 'permanent';
}

export type Outcome =
  | { type: 'unchanged'; reason: 'cache' | 'same_url' }
  | { type: 'no_item' }
  | { type: 'baseline'; item: Item }
  | { type: 'new_item'; previous: Item; current: Item }
  | { type: 'check_failed'; error: CheckFailure };

export interface CheckResult {
  outcome: Outcome;
  cursor: SourceCursor;
}

export interface ChangeDetectorOptions {
  /** Overrides URL-based extractor selection. */
  extractorFor?: (url: string) => Extractor;
  clock?: () => string;
}

function toFailure(err: unknown): CheckFailure {
  if (err instanceof FetchError) {
    return { code: err.code, message: err.message, kind: err.kind };
  }
  if (err instanceof LedeError) {
    return { code: err.code, message: err.message };
  }
  return { code: 'UNEXPECTED', message: `Unexpected: ${errorMessage(err)}` };
}

export function isSuccess(outcome: Outcome): boolean {
  return outcome.type !== 'check_failed';
}

/**
 * Fetch, extract and compare one source against its prior cursor. Never
 * throws: every failure inside the check becomes a `check_failed` outcome and
 * the prior item and tokens are carried over untouched.
 */
export class ChangeDetector {
  private readonly extractorFor: (url: string) => Extractor;
  private readonly clock: () => string;

  constructor(
    private readonly fetcher: DocumentFetcher,
    options: ChangeDetectorOptions = {},
  ) {
    this.extractorFor = options.extractorFor ?? selectExtractor;
    this.clock = options.clock ?? nowISO;
  }

  async check(source: CheckSource, prior: SourceCursor): Promise<CheckResult> {
    const checkedAt = this.clock();

    try {
      const fetched = await this.fetcher.fetch({
        url: source.url,
        sourceKind: classifySource(source.url),
        cachingToken: prior.cachingToken,
        lastModifiedToken: prior.lastModifiedToken,
      });
      return await this.evaluate(source, prior, fetched, checkedAt);
    } catch (err) {
      const error = toFailure(err);
      const cursor: SourceCursor = {
        ...prior,
        lastCheckedAt: checkedAt,
        errorCount: prior.errorCount + 1,
        lastError: error.message,
      };
      return { outcome: { type: 'check_failed', error }, cursor };
    }
  }

  private async evaluate(
    source: CheckSource,
    prior: SourceCursor,
    fetched: FetchResult,
    checkedAt: string,
  ): Promise<CheckResult> {
    if (fetched.kind === 'not_modified') {
      return {
        outcome: { type: 'unchanged', reason: 'cache' },
        cursor: succeeded(prior, checkedAt),
      };
    }

    const item = await this.extractorFor(source.url).extract(fetched.body, source.url);

    const cursor = succeeded(prior, checkedAt);
    cursor.cachingToken = fetched.cachingToken;
    cursor.lastModifiedToken = fetched.lastModifiedToken;

    if (!item) {
      return { outcome: { type: 'no_item' }, cursor };
    }

    const previous = prior.lastItem;
    cursor.lastItem = item;

    if (!previous) {
      return { outcome: { type: 'baseline', item }, cursor };
    }
    if (itemsEqual(item, previous)) {
      return { outcome: { type: 'unchanged', reason: 'same_url' }, cursor };
    }
    return { outcome: { type: 'new_item', previous, current: item }, cursor };
  }
}

function succeeded(prior: SourceCursor, checkedAt: string): SourceCursor {
  const { lastError: _cleared, ...rest } = prior;
  return { ...rest, lastCheckedAt: checkedAt, errorCount: 0 };
}
