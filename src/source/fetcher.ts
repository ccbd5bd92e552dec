import { FetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';
import type { SourceKind } from './sources.js';

export interface FetchedDocument {
  kind: 'fetched';
  body: string;
  cachingToken?: string;
  lastModifiedToken?: string;
}

export type FetchResult = { kind: 'not_modified' } | FetchedDocument;

export interface FetchRequest {
  url: string;
  sourceKind: SourceKind;
  cachingToken?: string;
  lastModifiedToken?: string;
}

export interface DocumentFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

export interface FetcherOptions {
  /** Per-request timeout. */
  timeoutMs: number;
  /** Pause after every request, whatever its result. */
  delayMs: number;
  userAgent: string;
}

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  timeoutMs: 15000,
  delayMs: 2000,
  userAgent: 'lede-watch/1.0 (+article-change-detection)',
};

const ACCEPT: Record<SourceKind, string> = {
  feed: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
  html: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
};

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/**
 * Conditional GET with a fixed timeout and a politeness delay. One attempt per
 * call; no retries. Holds no state between calls beyond its options, so one
 * instance is shared across a run.
 */
export class Fetcher implements DocumentFetcher {
  private readonly options: FetcherOptions;

  constructor(options: Partial<FetcherOptions> = {}) {
    this.options = { ...DEFAULT_FETCHER_OPTIONS, ...options };
  }

  async fetch(request: FetchRequest): Promise<FetchResult> {
    try {
      return await this.request(request);
    } finally {
      await sleep(this.options.delayMs);
    }
  }

  private async request(request: FetchRequest): Promise<FetchResult> {
    const { url, sourceKind, cachingToken, lastModifiedToken } = request;
    const { timeoutMs, userAgent } = this.options;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const headers: Record<string, string> = {
        'User-Agent': userAgent,
        Accept: ACCEPT[sourceKind],
        'Accept-Language': 'en-US,en;q=0.9',
      };
      if (cachingToken) {
        headers['If-None-Match'] = cachingToken;
      }
      if (lastModifiedToken) {
        headers['If-Modified-Since'] = lastModifiedToken;
      }

      const response = await fetch(url, {
        headers,
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.status === 304) {
        logger.debug({ url }, '304 Not Modified');
        return { kind: 'not_modified' };
      }

      if (!response.ok) {
        throw new FetchError(
          `HTTP ${response.status} from ${url}`,
          isTransientStatus(response.status) ? 'transient' : 'permanent',
          { url, status: response.status },
        );
      }

      const body = await response.text();
      const result: FetchedDocument = { kind: 'fetched', body };
      const etag = response.headers.get('etag');
      const lastModified = response.headers.get('last-modified');
      if (etag) result.cachingToken = etag;
      if (lastModified) result.lastModifiedToken = lastModified;

      logger.debug({ url, status: response.status, bytes: body.length }, 'Fetched');
      return result;
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new FetchError(`Request timed out after ${timeoutMs}ms: ${url}`, 'transient', {
          url,
          timeout: timeoutMs,
        });
      }
      throw new FetchError(`Request failed: ${errorMessage(err)}`, 'transient', { url });
    } finally {
      clearTimeout(timer);
    }
  }
}
