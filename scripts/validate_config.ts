/**
 * Validates config/app.json and config/indicators.json against their schemas
 * and checks that every indicator in both rosters has bounds and a weight.
 *
 * Usage: npx tsx scripts/validate_config.ts
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { loadConfig, type AppConfig } from '../src/core/config';
import { findMissingIndicatorConfig } from '../src/run/config_check';
import { errorMessage } from '../src/utils/errors';

function main(): number {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(`Invalid configuration: ${errorMessage(error)}`);
    return 1;
  }

  const missing = findMissingIndicatorConfig(config);
  if (missing.length > 0) {
    for (const entry of missing) {
      console.error(`Missing ${entry.side} config for indicator ${entry.name}`);
    }
    return 1;
  }

  console.log(`Configuration valid for ${config.symbol} (${config.timeframes.join(', ')})`);
  return 0;
}

process.exitCode = main();
