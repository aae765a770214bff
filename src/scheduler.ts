/**
 * Scheduler
 *
 * Runs pipeline cycles on a cron schedule
 */

import cron from 'node-cron';
import { runPipeline, type PipelineOptions } from './pipeline.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import type { PipelineResult } from './types/index.js';

export type PipelineRunner = () => Promise<PipelineResult>;

/**
 * Scheduler state
 */
let scheduledTask: cron.ScheduledTask | null = null;
let isRunning = false;

/**
 * Execute one cycle unless the previous one is still going.
 * Resolves to null when skipped or failed.
 */
export async function executePipeline(run: PipelineRunner = () => runPipeline()): Promise<PipelineResult | null> {
  if (isRunning) {
    logger.warn('Pipeline already running, skipping this execution');
    return null;
  }

  isRunning = true;
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled pipeline starting');

  try {
    const result = await run();
    logger.info(
      {
        startTime: startTime.toISOString(),
        endTime: new Date().toISOString(),
        result,
      },
      'Scheduled pipeline completed'
    );
    return result;
  } catch (error) {
    logger.error({ error }, 'Scheduled pipeline failed');
    return null;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler
 */
export function startScheduler(
  cronExpression: string = config.scheduler.cronExpression,
  run?: PipelineRunner
): void {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }
  if (scheduledTask) {
    throw new Error('Scheduler already started');
  }

  logger.info({ cronExpression, timezone: config.scheduler.timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      void executePipeline(run);
    },
    { timezone: config.scheduler.timezone }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

export function isSchedulerRunning(): boolean {
  return scheduledTask !== null;
}

/**
 * Service mode: one cycle now, then on schedule until a signal arrives
 */
export async function runService(options: PipelineOptions = {}): Promise<void> {
  const run: PipelineRunner = () => runPipeline({ trigger: 'scheduled', ...options });

  logger.info(
    { cron: config.scheduler.cronExpression, timezone: config.scheduler.timezone },
    'Running initial pipeline...'
  );
  await executePipeline(run);

  startScheduler(config.scheduler.cronExpression, run);
  logger.info('Scheduler running. Press Ctrl+C to stop.');

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    stopScheduler();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
