/**
 * Scheduler: runs a check on the configured cron expression for `lede watch`.
 * A tick that fires while the previous run is still going is skipped.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';

let task: ScheduledTask | null = null;
let running = false;

/**
 * Run `job` unless a previous invocation is still in flight. Returns false
 * when the call was skipped.
 */
export async function runExclusive(job: () => Promise<void>): Promise<boolean> {
  if (running) {
    logger.warn('Previous check still running, skipping this tick');
    return false;
  }
  running = true;
  try {
    await job();
  } catch (e) {
    logger.error({ error: errorMessage(e) }, 'Scheduled check failed');
  } finally {
    running = false;
  }
  return true;
}

export function startScheduler(expression: string, job: () => Promise<void>): boolean {
  if (!cron.validate(expression)) {
    logger.warn({ cron: expression }, 'Invalid cron expression, scheduler not started');
    return false;
  }

  task = cron.schedule(expression, () => {
    void runExclusive(job);
  });

  logger.info({ cron: expression }, 'Scheduler started');
  return true;
}

export function stopScheduler(): void {
  task?.stop();
  task = null;
  logger.info('Scheduler stopped');
}
