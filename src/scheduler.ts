/**
 * Scheduler
 *
 * Runs the pipeline on a cron schedule
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { runPipeline } from './pipeline.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import type { PipelineResult } from './types/index.js';

/**
 * Scheduler state
 */
let scheduledTask: ScheduledTask | null = null;
let isRunning = false;

/**
 * Execute pipeline with lock to prevent overlapping runs
 */
export async function executeScheduledRun(
  run: () => Promise<PipelineResult> = () => runPipeline()
): Promise<PipelineResult | null> {
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
        status: result.status,
        downloaded: result.downloaded.length,
      },
      'Scheduled pipeline completed'
    );
    return result;
  } catch (error) {
    logger.error({ err: error }, 'Scheduled pipeline failed');
    return null;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler
 */
export function startScheduler(cronExpression: string = config.scheduler.cronExpression): void {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone: config.scheduler.timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      void executeScheduledRun();
    },
    {
      timezone: config.scheduler.timezone,
    }
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

/**
 * Check if scheduler is running
 */
export function isSchedulerRunning(): boolean {
  return scheduledTask !== null;
}
