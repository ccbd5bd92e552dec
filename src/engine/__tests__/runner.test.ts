import { describe, it, expect, vi } from 'vitest';
import { runCheck, exitCodeFor, type RunDeps } from '../runner.js';
import { ChangeDetector } from '../detector.js';
import type { DocumentFetcher, FetchRequest, FetchResult } from '../../source/fetcher.js';
import type { Extractor } from '../../source/extract.js';
import type { Item } from '../../source/item.js';
import type { CursorStore } from '../../state/store.js';
import { emptyCursor, type SourceCursor } from '../../state/cursor.js';
import type { Notifier } from '../../push/notifier.js';
import type { EnabledSource } from '../../shared/config.js';
import { FetchError, PersistenceError } from '../../shared/errors.js';

const NOW = '2024-05-02T12:00:00.000Z';

const ALPHA: EnabledSource = { sourceId: 'alpha', url: 'https://www.example.com/by/alpha' };
const BETA: EnabledSource = { sourceId: 'beta', url: 'https://www.example.com/by/beta' };

const OLD: Item = { title: 'Old story title', url: 'https://www.example.com/2024/05/01/old.html' };
const NEW: Item = { title: 'New story title', url: 'https://www.example.com/2024/05/02/new.html' };

class MemoryStore implements CursorStore {
  readonly cursors = new Map<string, SourceCursor>();
  failLoad = false;
  failSave = false;

  async load(sourceId: string): Promise<SourceCursor> {
    if (this.failLoad) throw new PersistenceError(`Could not read cursor for ${sourceId}: EACCES`);
    return this.cursors.get(sourceId) ?? emptyCursor(sourceId);
  }

  async save(cursor: SourceCursor): Promise<void> {
    if (this.failSave) throw new PersistenceError(`Could not save cursor for ${cursor.sourceId}: ENOSPC`);
    this.cursors.set(cursor.sourceId, cursor);
  }
}

/** Serves one scripted response per URL. */
class UrlFetcher implements DocumentFetcher {
  constructor(private readonly responses: Record<string, FetchResult | Error>) {}

  async fetch(request: FetchRequest): Promise<FetchResult> {
    const response = this.responses[request.url];
    if (response === undefined) throw new Error(`unexpected fetch: ${request.url}`);
    if (response instanceof Error) throw response;
    return response;
  }
}

/** Treats the fetched body as the URL of the top item. */
const bodyAsItem: Extractor = {
  kind: 'html',
  async extract(body) {
    if (body === NEW.url) return NEW;
    if (body === OLD.url) return OLD;
    return null;
  },
};

function page(body: string): FetchResult {
  return { kind: 'fetched', body };
}

function fakeNotifier(send: Notifier['send'] = async () => true, enabled = true) {
  return { isEnabled: () => enabled, send: vi.fn(send) };
}

function deps(responses: Record<string, FetchResult | Error>, store: CursorStore, notifier?: Notifier): RunDeps {
  const detector = new ChangeDetector(new UrlFetcher(responses), {
    extractorFor: () => bodyAsItem,
    clock: () => NOW,
  });
  return { detector, store, notifier };
}

function seeded(item: Item, sourceId: string): SourceCursor {
  return { ...emptyCursor(sourceId), lastItem: item, lastCheckedAt: '2024-05-01T12:00:00.000Z' };
}

describe('runCheck', () => {
  it('checks every source, saves cursors and notifies on new items', async () => {
    const store = new MemoryStore();
    store.cursors.set('alpha', seeded(OLD, 'alpha'));
    const notifier = fakeNotifier();

    const summary = await runCheck(
      [ALPHA, BETA],
      deps({ [ALPHA.url]: page(NEW.url), [BETA.url]: page(OLD.url) }, store, notifier),
    );

    expect(summary).toMatchObject({ total: 2, succeeded: 2, failed: 0, newItems: 1 });
    expect(summary.results.map((r) => [r.sourceId, r.outcome.type, r.notified])).toEqual([
      ['alpha', 'new_item', true],
      ['beta', 'baseline', false],
    ]);
    expect(notifier.send).toHaveBeenCalledTimes(1);
    expect(notifier.send).toHaveBeenCalledWith('alpha', NEW, OLD);
    expect(store.cursors.get('alpha')?.lastItem).toEqual(NEW);
    expect(store.cursors.get('beta')?.lastItem).toEqual(OLD);
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('keeps going after a failing source', async () => {
    const store = new MemoryStore();
    const summary = await runCheck(
      [ALPHA, BETA],
      deps({ [ALPHA.url]: new FetchError('HTTP 503 from alpha', 'transient'), [BETA.url]: page(OLD.url) }, store),
    );

    expect(summary).toMatchObject({ total: 2, succeeded: 1, failed: 1, newItems: 0 });
    expect(summary.results[0]?.error).toEqual({
      code: 'FETCH_ERROR',
      message: 'HTTP 503 from alpha',
      kind: 'transient',
    });
    expect(store.cursors.get('alpha')).toEqual({
      sourceId: 'alpha',
      lastItem: null,
      lastCheckedAt: NOW,
      errorCount: 1,
      lastError: 'HTTP 503 from alpha',
    });
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('exits non-zero only when every source failed', async () => {
    const failure = new FetchError('HTTP 500', 'transient');
    const summary = await runCheck([ALPHA, BETA], deps({ [ALPHA.url]: failure, [BETA.url]: failure }, new MemoryStore()));

    expect(summary.failed).toBe(2);
    expect(exitCodeFor(summary)).toBe(1);
  });

  it('returns an empty summary with exit code 0 when nothing is selected', async () => {
    const summary = await runCheck([ALPHA], deps({}, new MemoryStore()), { sourceIds: ['missing'] });

    expect(summary).toMatchObject({ total: 0, succeeded: 0, failed: 0, newItems: 0, results: [] });
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('restricts the run to the requested source ids', async () => {
    const summary = await runCheck([ALPHA, BETA], deps({ [BETA.url]: page(OLD.url) }, new MemoryStore()), {
      sourceIds: ['beta'],
    });

    expect(summary.results.map((r) => r.sourceId)).toEqual(['beta']);
  });

  it('neither saves nor notifies on a dry run', async () => {
    const store = new MemoryStore();
    store.cursors.set('alpha', seeded(OLD, 'alpha'));
    const notifier = fakeNotifier();

    const summary = await runCheck([ALPHA], deps({ [ALPHA.url]: page(NEW.url) }, store, notifier), { dryRun: true });

    expect(summary.results[0]?.outcome.type).toBe('new_item');
    expect(summary.newItems).toBe(1);
    expect(store.cursors.get('alpha')).toEqual(seeded(OLD, 'alpha'));
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('fails the source and skips the notifier when the cursor cannot be saved', async () => {
    const store = new MemoryStore();
    store.cursors.set('alpha', seeded(OLD, 'alpha'));
    store.failSave = true;
    const notifier = fakeNotifier();

    const summary = await runCheck([ALPHA], deps({ [ALPHA.url]: page(NEW.url) }, store, notifier));

    expect(summary.results[0]).toMatchObject({
      ok: false,
      notified: false,
      error: { code: 'PERSISTENCE_ERROR', message: 'Could not save cursor for alpha: ENOSPC' },
    });
    expect(summary.failed).toBe(1);
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('reports a cursor that cannot be loaded as a failed check', async () => {
    const store = new MemoryStore();
    store.failLoad = true;

    const summary = await runCheck([ALPHA], deps({}, store));

    expect(summary.results[0]?.outcome).toEqual({
      type: 'check_failed',
      error: { code: 'PERSISTENCE_ERROR', message: 'Could not read cursor for alpha: EACCES' },
    });
    expect(exitCodeFor(summary)).toBe(1);
  });

  it('keeps the detected change when notification fails', async () => {
    const store = new MemoryStore();
    store.cursors.set('alpha', seeded(OLD, 'alpha'));
    const notifier = fakeNotifier(async () => {
      throw new Error('socket hang up');
    });

    const summary = await runCheck([ALPHA], deps({ [ALPHA.url]: page(NEW.url) }, store, notifier));

    expect(summary.results[0]).toMatchObject({ ok: true, notified: false });
    expect(store.cursors.get('alpha')?.lastItem).toEqual(NEW);
  });

  it('does not call a disabled notifier', async () => {
    const store = new MemoryStore();
    store.cursors.set('alpha', seeded(OLD, 'alpha'));
    const notifier = fakeNotifier(async () => true, false);

    await runCheck([ALPHA], deps({ [ALPHA.url]: page(NEW.url) }, store, notifier));

    expect(notifier.send).not.toHaveBeenCalled();
  });
});
