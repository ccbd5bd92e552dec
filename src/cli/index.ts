#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import {
  loadConfig,
  enabledSources,
  writeDefaultConfig,
  type Config,
} from '../shared/config.js';
import { LedeError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { JsonCursorStore } from '../state/store.js';
import { createRunDeps, exitCodeFor, runCheck, type RunSummary, type SourceResult } from '../engine/runner.js';
import { startScheduler, stopScheduler } from '../push/scheduler.js';

const program = new Command();

program
  .name('lede')
  .description('Watch author pages and feeds for a new top article')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: search for lede.config.yaml)');

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

async function getConfig(): Promise<Config> {
  const opts = program.opts<{ config?: string }>();
  return loadConfig({ configPath: opts.config });
}

function describeResult(r: SourceResult): string {
  const o = r.outcome;
  switch (o.type) {
    case 'new_item':
      return `NEW        ${o.current.title} <${o.current.url}>${r.notified ? ' (notified)' : ''}`;
    case 'baseline':
      return `baseline   ${o.item.title} <${o.item.url}>`;
    case 'unchanged':
      return o.reason === 'cache' ? 'unchanged  (not modified)' : 'unchanged  (same article)';
    case 'no_item':
      return 'no item    (nothing matched on the page)';
    case 'check_failed':
      return `FAILED     [${o.error.code}] ${o.error.message}`;
  }
}

function printSummary(summary: RunSummary): void {
  for (const r of summary.results) {
    const line = r.ok || r.outcome.type === 'check_failed'
      ? describeResult(r)
      : `FAILED     [${r.error?.code ?? 'ERROR'}] ${r.error?.message ?? ''}`;
    log(`${r.sourceId.padEnd(28)} ${line}`);
  }
  log(
    `\n${summary.total} checked, ${summary.succeeded} ok, ${summary.failed} failed, ` +
      `${summary.newItems} new (${summary.durationMs}ms)`,
  );
}

async function checkOnce(opts: { source?: string[]; dryRun?: boolean }): Promise<RunSummary> {
  const config = await getConfig();
  const sources = enabledSources(config);
  return runCheck(sources, createRunDeps(config), {
    sourceIds: opts.source,
    dryRun: opts.dryRun,
  });
}

function fail(err: unknown): void {
  if (err instanceof LedeError) {
    log(`Error [${err.code}]: ${err.message}`);
    if (err.details) log(JSON.stringify(err.details, null, 2));
  } else {
    log(`Error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
}

// === init ===
program
  .command('init')
  .description('Write a starter lede.config.yaml in the current directory')
  .action(() => {
    const configPath = path.resolve('lede.config.yaml');
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === check ===
program
  .command('check')
  .description('Check every enabled source once')
  .option('-s, --source <id...>', 'Only check these source ids')
  .option('--dry-run', 'Do not save state or send notifications')
  .action(async (opts: { source?: string[]; dryRun?: boolean }) => {
    try {
      const summary = await checkOnce(opts);
      printSummary(summary);
      process.exitCode = exitCodeFor(summary);
    } catch (err) {
      fail(err);
    }
  });

// === status ===
program
  .command('status')
  .description('Show the stored state of every enabled source')
  .action(async () => {
    try {
      const config = await getConfig();
      const store = new JsonCursorStore(resolvePath(config.state.dir));
      const sources = enabledSources(config);
      if (sources.length === 0) {
        log('No enabled sources.');
        return;
      }
      for (const source of sources) {
        const cursor = await store.load(source.sourceId);
        const status = cursor.errorCount > 0 ? `✗ ${cursor.errorCount} failures` : '✓';
        const last = cursor.lastItem ? cursor.lastItem.title : '(no article yet)';
        log(`${source.sourceId.padEnd(28)} ${status.padEnd(14)} ${cursor.lastCheckedAt ?? 'never'}  ${last}`);
        if (cursor.lastError) log(`${''.padEnd(28)} last error: ${cursor.lastError}`);
      }
    } catch (err) {
      fail(err);
    }
  });

// === watch ===
program
  .command('watch')
  .description('Run checks on the configured cron schedule')
  .option('--cron <expression>', 'Override schedule.cron')
  .action(async (opts: { cron?: string }) => {
    try {
      const config = await getConfig();
      const expression = opts.cron ?? config.schedule.cron;
      const started = startScheduler(expression, async () => {
        const summary = await checkOnce({});
        printSummary(summary);
      });
      if (!started) {
        log(`Invalid cron expression: ${expression}`);
        process.exitCode = 1;
        return;
      }
      log(`Watching ${enabledSources(config).length} sources on "${expression}". Ctrl+C to stop.`);
      process.once('SIGINT', () => {
        stopScheduler();
        process.exit(0);
      });
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
