/**
 * Analysis Run Script
 * Calculates both composites, stores them and writes the exports
 *
 * Usage:
 *   npx tsx scripts/run_analysis.ts [--excel] [--no-refresh] [--verbose]
 *   npx tsx scripts/run_analysis.ts --status
 *   npx tsx scripts/run_analysis.ts --cleanup=90
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { loadConfig } from '../src/core/config';
import { loadEnvConfig } from '../src/core/env';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import {
  cleanupOldData,
  getDatabaseStats,
  getLatestDataSourceStatus,
  getRecentCalculations,
} from '../src/data/repositories/calculation_repo';
import { executeRun } from '../src/run/pipeline';
import { parseAnalysisArgs } from '../src/run/cli_args';
import { createRuntime, type Runtime } from '../src/run/runtime';
import { createChildLogger, setLogLevel } from '../src/utils/logger';
import { errorMessage } from '../src/utils/errors';

const logger = createChildLogger('run_analysis');

function printStatus(runtime: Runtime): void {
  const stats = getDatabaseStats();
  const recent = getRecentCalculations(24);

  console.log('\n' + '='.repeat(50));
  console.log('SYSTEM STATUS');
  console.log('='.repeat(50));
  console.log(`Symbol:                 ${runtime.config.symbol}`);
  console.log(`Provider:               ${runtime.provider.name}`);
  console.log(`Calculations stored:    ${stats.calculations}`);
  console.log(`Indicator results:      ${stats.indicatorResults}`);
  console.log(`Calculations (24h):     ${stats.recentCalculations24h}`);
  if (stats.fileSizeBytes !== null) {
    console.log(`Database size:          ${(stats.fileSizeBytes / 1024 / 1024).toFixed(2)} MB`);
  }

  console.log('\nLatest calculations:');
  for (const row of recent.slice(0, 6)) {
    const score = row.compositeScore === null ? 'n/a' : row.compositeScore.toFixed(4);
    console.log(`  ${row.timestamp}  ${row.calculationType.padEnd(6)}  ${score}  ${row.signalStrength ?? row.status}`);
  }

  console.log('\nData sources:');
  for (const source of getLatestDataSourceStatus()) {
    console.log(`  ${source.sourceName} ${source.timeframe.padEnd(3)} ${source.status.padEnd(6)} ${source.lastUpdate}`);
  }

  console.log('\nCache (this process):');
  for (const [timeframe, entry] of Object.entries(runtime.coordinator.cacheStatus())) {
    console.log(`  ${timeframe.padEnd(3)} cached=${entry.cached} valid=${entry.valid}`);
  }
  console.log('='.repeat(50) + '\n');
}

async function main(): Promise<number> {
  const args = parseAnalysisArgs(process.argv.slice(2));
  // The logger is created before dotenv runs, so apply LOG_LEVEL here.
  setLogLevel(args.verbose ? 'debug' : loadEnvConfig().logLevel);

  const config = loadConfig();
  initializeDatabase(config.storage.databasePath);

  try {
    const runtime = createRuntime(config);

    if (args.status) {
      printStatus(runtime);
      return 0;
    }

    if (args.cleanupDays !== null) {
      const removed = cleanupOldData(args.cleanupDays);
      console.log(`Removed data older than ${args.cleanupDays} days:`, removed);
      return 0;
    }

    const success = await executeRun(runtime, { refreshData: args.refresh, excel: args.excel });
    if (success) {
      console.log(`\nAnalysis complete. Outputs in ${config.storage.outputDir}\n`);
    }
    return success ? 0 : 1;
  } finally {
    closeDatabase();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, 'Analysis run failed');
    console.error('Analysis run failed:', errorMessage(error));
    process.exitCode = 1;
  });
