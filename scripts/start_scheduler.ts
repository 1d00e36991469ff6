/**
 * Scheduler Script
 * Runs the analysis at the configured times of day until interrupted
 *
 * Usage: npx tsx scripts/start_scheduler.ts [--run-now] [--excel]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { loadConfig } from '../src/core/config';
import { loadEnvConfig } from '../src/core/env';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { executeRun } from '../src/run/pipeline';
import { createRuntime } from '../src/run/runtime';
import { CalculationScheduler } from '../src/scheduler/scheduler';
import { createChildLogger, setLogLevel } from '../src/utils/logger';
import { errorMessage } from '../src/utils/errors';

const logger = createChildLogger('start_scheduler');

async function main(): Promise<void> {
  const runNow = process.argv.includes('--run-now');
  const excel = process.argv.includes('--excel');
  setLogLevel(loadEnvConfig().logLevel);

  const config = loadConfig();
  initializeDatabase(config.storage.databasePath);
  const runtime = createRuntime(config);

  const scheduler = new CalculationScheduler(
    () => executeRun(runtime, { refreshData: true, excel }),
    config.scheduler
  );

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down scheduler');
    scheduler.stop();
    closeDatabase();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  scheduler.start();
  logger.info({ expressions: scheduler.expressions }, 'Waiting for scheduled runs');

  if (runNow) {
    await scheduler.trigger();
  }
}

main().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Scheduler failed to start');
  closeDatabase();
  process.exitCode = 1;
});
