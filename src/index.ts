/**
 * Daily Front Pages Collector
 *
 * Collects today's Greek newspaper front pages:
 * 1. Reads the wanted papers from newspapers.csv
 * 2. Looks each one up on frontpages.gr, falling back to zougla.gr
 * 3. Downloads the full-size front page if it is dated today
 * 4. Combines everything into Papers_YYYY-MM-DD.pdf
 *
 * Usage:
 *   node dist/index.js --run      - Run once and exit (default)
 *   node dist/index.js --service  - Run once, then on CRON_SCHEDULE
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { runPipeline } from './pipeline.js';
import { executeScheduledRun, startScheduler, stopScheduler } from './scheduler.js';

// Parse command line arguments
const args = process.argv.slice(2);
const isService = args.includes('--service');

async function runOnce(): Promise<void> {
  const result = await runPipeline();

  logger.info('');
  logger.info('Run Complete:');
  logger.info(`  ✓ Targets:    ${result.targets}`);
  logger.info(`  ✓ Downloaded: ${result.downloaded.length}`);
  if (result.missing.length > 0) {
    logger.info(`  ⚠ Missing:    ${result.missing.join(', ')}`);
  }
  logger.info(`  ✓ PDF:        ${result.documentPath ?? 'not written'}`);
  logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
  logger.info({ env: config.app.env, mode: isService ? 'service' : 'run-once' }, 'Starting application');

  if (!isService) {
    await runOnce();
    return;
  }

  await executeScheduledRun();
  startScheduler();

  logger.info('Scheduler running. Press Ctrl+C to stop.');

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    stopScheduler();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Application failed');
  process.exit(1);
});
