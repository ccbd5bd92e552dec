import type { Config, EnabledSource } from '../shared/config.js';
import { JsonCursorStore, type CursorStore } from '../state/store.js';
import type { SourceCursor } from '../state/cursor.js';
import { WebhookNotifier, type Notifier } from '../push/notifier.js';
import { Fetcher } from '../source/fetcher.js';
import { ChangeDetector, isSuccess, type CheckFailure, type Outcome } from './detector.js';
import { LedeError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface RunOptions {
  /** Restrict the run to these source ids. */
  sourceIds?: string[];
  /** Check without saving cursors or notifying. */
  dryRun?: boolean;
}

export interface SourceResult {
  sourceId: string;
  url: string;
  outcome: Outcome;
  ok: boolean;
  /** Set when the source failed, including when its cursor could not be saved. */
  error?: CheckFailure;
  notified: boolean;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  newItems: number;
  results: SourceResult[];
  durationMs: number;
}

export interface RunDeps {
  detector: ChangeDetector;
  store: CursorStore;
  notifier?: Notifier;
}

/**
 * Wire the collaborators for one run from configuration.
 */
export function createRunDeps(config: Config): RunDeps {
  const fetcher = new Fetcher({
    timeoutMs: config.fetch.timeout_ms,
    delayMs: config.fetch.delay_ms,
    userAgent: config.fetch.user_agent,
  });
  return {
    detector: new ChangeDetector(fetcher),
    store: new JsonCursorStore(resolvePath(config.state.dir)),
    notifier: new WebhookNotifier({
      webhookUrl: config.notify.webhook_url,
      format: config.notify.format,
      timeoutMs: config.notify.timeout_ms,
    }),
  };
}

function persistenceFailure(err: unknown): CheckFailure {
  if (err instanceof LedeError) return { code: err.code, message: err.message };
  return { code: 'PERSISTENCE_ERROR', message: errorMessage(err) };
}

function logOutcome(sourceId: string, outcome: Outcome): void {
  switch (outcome.type) {
    case 'new_item':
      logger.info(
        { source: sourceId, previous: outcome.previous.url, current: outcome.current.url },
        'New item detected',
      );
      break;
    case 'baseline':
      logger.info({ source: sourceId, url: outcome.item.url }, 'Baseline recorded');
      break;
    case 'unchanged':
      logger.debug({ source: sourceId, reason: outcome.reason }, 'No change');
      break;
    case 'no_item':
      logger.warn({ source: sourceId }, 'No item found in document');
      break;
    case 'check_failed':
      logger.warn({ source: sourceId, ...outcome.error }, 'Check failed');
      break;
  }
}

async function checkOne(source: EnabledSource, deps: RunDeps, dryRun: boolean): Promise<SourceResult> {
  const { detector, store, notifier } = deps;
  const result: Omit<SourceResult, 'outcome' | 'ok'> = { sourceId: source.sourceId, url: source.url, notified: false };

  let prior: SourceCursor;
  try {
    prior = await store.load(source.sourceId);
  } catch (err) {
    const error = persistenceFailure(err);
    logger.error({ source: source.sourceId, error: error.message }, 'Could not load cursor');
    return { ...result, outcome: { type: 'check_failed', error }, ok: false, error };
  }

  const { outcome, cursor } = await detector.check(source, prior);
  logOutcome(source.sourceId, outcome);

  if (dryRun) {
    return { ...result, outcome, ok: isSuccess(outcome), error: failureOf(outcome) };
  }

  try {
    await store.save(cursor);
  } catch (err) {
    const error = persistenceFailure(err);
    logger.error({ source: source.sourceId, error: error.message }, 'Could not save cursor');
    return { ...result, outcome, ok: false, error };
  }

  if (outcome.type === 'new_item' && notifier?.isEnabled()) {
    try {
      result.notified = await notifier.send(source.sourceId, outcome.current, outcome.previous);
    } catch (err) {
      logger.warn({ source: source.sourceId, error: errorMessage(err) }, 'Notifier threw');
    }
  }

  return { ...result, outcome, ok: isSuccess(outcome), error: failureOf(outcome) };
}

function failureOf(outcome: Outcome): CheckFailure | undefined {
  return outcome.type === 'check_failed' ? outcome.error : undefined;
}

/**
 * Check every source in order, one at a time. A source's failure is recorded
 * in its result and never stops the loop.
 */
export async function runCheck(
  sources: EnabledSource[],
  deps: RunDeps,
  options: RunOptions = {},
): Promise<RunSummary> {
  const startTime = Date.now();
  const dryRun = options.dryRun ?? false;

  let selected = sources;
  if (options.sourceIds && options.sourceIds.length > 0) {
    const idSet = new Set(options.sourceIds);
    selected = sources.filter((s) => idSet.has(s.sourceId));
  }

  const summary: RunSummary = {
    total: selected.length,
    succeeded: 0,
    failed: 0,
    newItems: 0,
    results: [],
    durationMs: 0,
  };

  if (selected.length === 0) {
    logger.info('No enabled sources to check');
    return summary;
  }

  for (const source of selected) {
    const result = await checkOne(source, deps, dryRun);
    summary.results.push(result);
    if (result.ok) {
      summary.succeeded++;
    } else {
      summary.failed++;
    }
    if (result.outcome.type === 'new_item') {
      summary.newItems++;
    }
  }

  summary.durationMs = Date.now() - startTime;
  logger.info(
    {
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      newItems: summary.newItems,
      durationMs: summary.durationMs,
    },
    'Check run complete',
  );

  return summary;
}

/**
 * Non-zero only when there was something to check and every source failed.
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.total > 0 && summary.failed === summary.total ? 1 : 0;
}
