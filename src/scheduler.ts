/**
 * Scheduler
 *
 * Runs the nightly incremental review update on a cron schedule
 */

import cron from 'node-cron';
import { config } from './config/index.js';
import { ConcurrentRunRejectedError } from './utils/errors.js';
import { componentLogger } from './utils/logger.js';
import type { RunSupervisor } from './state/run-supervisor.js';

const logger = componentLogger('scheduler');

export interface SchedulerOptions {
  cronExpression?: string;
  timezone?: string;
}

/**
 * Start one scheduled incremental run. An overlapping tick is refused by the
 * supervisor and only logged.
 */
export function triggerScheduledRun(supervisor: RunSupervisor): boolean {
  try {
    supervisor.start({ mode: 'incremental' });
    logger.info('Scheduled incremental update started');
    return true;
  } catch (error) {
    if (error instanceof ConcurrentRunRejectedError) {
      logger.warn({ activeMode: error.activeMode }, 'Run already in progress, skipping scheduled update');
      return false;
    }
    throw error;
  }
}

export function startScheduler(
  supervisor: RunSupervisor,
  options: SchedulerOptions = {}
): cron.ScheduledTask {
  const cronExpression = options.cronExpression ?? config.scheduler.cronExpression;
  const timezone = options.timezone ?? config.scheduler.timezone;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Starting scheduler');

  return cron.schedule(cronExpression, () => triggerScheduledRun(supervisor), { timezone });
}
