/**
 * Application configuration loaded from JSON files
 *
 * `loadConfig` reads config/app.json and config/indicators.json, validates both
 * against their schemas, applies environment overrides and returns one frozen
 * value. Components receive it through their constructors.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { loadEnvConfig, type EnvConfig, type ProviderType } from './env';
import { IndicatorConfigError } from '@/indicators/errors';
import type { Bounds, IndicatorConfig, IndicatorSpec, Side } from '@/indicators/types';
import type { Timeframe } from '@/market/types';
import type {
  AppConfigFile,
  IndicatorEntryFile,
  IndicatorsFile,
  ZeroWeightFailurePolicy,
} from '@/types/config_files';
import { validateAppConfig, validateIndicatorsConfig } from '@/validation/ajv_instance';
import { schemasDir } from '@/validation/schema_loader';

export const DEFAULT_BAR_COUNT: Readonly<Record<Timeframe, number>> = {
  '1D': 600,
  '3D': 300,
  '5D': 200,
  '1W': 200,
  '1M': 100,
};

const DEFAULT_PROVIDER = {
  baseUrl: 'https://api.binance.com',
  minRequestIntervalMs: 250,
  maxRetries: 3,
  initialBackoffMs: 1000,
  dataDir: 'data/market',
};

export interface ProviderSettings {
  type: ProviderType;
  baseUrl: string;
  minRequestIntervalMs: number;
  maxRetries: number;
  initialBackoffMs: number;
  dataDir: string;
}

export interface AppConfig {
  projectRoot: string;
  symbol: string;
  timeframes: readonly Timeframe[];
  barCount: Readonly<Record<Timeframe, number>>;
  cache: { maxAgeMinutes: number };
  marketContext: { timeframe: Timeframe; lookbackPeriods: number };
  composer: { zeroWeightFailures: ZeroWeightFailurePolicy };
  provider: ProviderSettings;
  scheduler: { times: readonly string[]; timezone: string };
  storage: { databasePath: string; outputDir: string };
  indicators: IndicatorConfig;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    public readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

function readJson(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError('Config file not found', path);
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      'Config file is not valid JSON',
      path,
      [error instanceof Error ? error.message : String(error)]
    );
  }
}

function resolveFromRoot(path: string, projectRoot: string): string {
  if (path === ':memory:' || isAbsolute(path)) return path;
  return join(projectRoot, path);
}

/**
 * Bounds and weights keyed by side and indicator name.
 */
export function createIndicatorConfig(file: IndicatorsFile): IndicatorConfig {
  const entry = (side: Side, name: string): IndicatorEntryFile => {
    const found: IndicatorEntryFile | undefined = Object.prototype.hasOwnProperty.call(
      file[side],
      name
    )
      ? file[side][name]
      : undefined;
    if (!found) {
      throw new IndicatorConfigError(`No ${side} config for indicator ${name}`, side, name);
    }
    return found;
  };

  return Object.freeze({
    bounds(side: Side, name: string): Bounds {
      const { lower, upper } = entry(side, name);
      return { lower, upper };
    },
    weight(side: Side, name: string): number {
      return entry(side, name).weight;
    },
    spec(side: Side, name: string): IndicatorSpec {
      const { lower, upper, weight } = entry(side, name);
      return { name, side, bounds: { lower, upper }, weight };
    },
    names(side: Side): string[] {
      return Object.keys(file[side]);
    },
  });
}

/** Entries whose lower bound sits above the upper one. Equal bounds pass and score as failures. */
function invertedBounds(file: IndicatorsFile): string[] {
  const problems: string[] = [];
  for (const side of ['bottom', 'top'] as const) {
    for (const [name, entry] of Object.entries(file[side])) {
      if (entry.lower > entry.upper) {
        problems.push(`/${side}/${name}: lower ${entry.lower} is above upper ${entry.upper}`);
      }
    }
  }
  return problems;
}

/**
 * Assemble the runtime config from already-validated file contents.
 */
export function buildConfig(
  app: AppConfigFile,
  indicators: IndicatorsFile,
  projectRoot: string,
  env: Pick<EnvConfig, 'marketProvider' | 'marketDataDir' | 'databasePath'> = {
    marketProvider: null,
    marketDataDir: null,
    databasePath: null,
  }
): AppConfig {
  if (!app.timeframes.includes(app.market_context.timeframe)) {
    throw new ConfigError('Invalid app config', 'app.json', [
      `market_context.timeframe ${app.market_context.timeframe} is not listed in timeframes`,
    ]);
  }

  const inverted = invertedBounds(indicators);
  if (inverted.length > 0) {
    throw new ConfigError('Invalid indicator config', 'indicators.json', inverted);
  }

  const barCount: Record<Timeframe, number> = { ...DEFAULT_BAR_COUNT, ...app.bar_count };

  const provider: ProviderSettings = {
    type: env.marketProvider ?? app.provider.type,
    baseUrl: app.provider.base_url ?? DEFAULT_PROVIDER.baseUrl,
    minRequestIntervalMs: app.provider.min_request_interval_ms ?? DEFAULT_PROVIDER.minRequestIntervalMs,
    maxRetries: app.provider.max_retries ?? DEFAULT_PROVIDER.maxRetries,
    initialBackoffMs: app.provider.initial_backoff_ms ?? DEFAULT_PROVIDER.initialBackoffMs,
    dataDir:
      env.marketDataDir ?? resolveFromRoot(app.provider.data_dir ?? DEFAULT_PROVIDER.dataDir, projectRoot),
  };

  return Object.freeze({
    projectRoot,
    symbol: app.symbol,
    timeframes: Object.freeze([...app.timeframes]),
    barCount: Object.freeze(barCount),
    cache: Object.freeze({ maxAgeMinutes: app.cache.max_age_minutes }),
    marketContext: Object.freeze({
      timeframe: app.market_context.timeframe,
      lookbackPeriods: app.market_context.lookback_periods,
    }),
    composer: Object.freeze({ zeroWeightFailures: app.composer.zero_weight_failures }),
    provider: Object.freeze(provider),
    scheduler: Object.freeze({
      times: Object.freeze([...app.scheduler.times]),
      timezone: app.scheduler.timezone,
    }),
    storage: Object.freeze({
      databasePath:
        env.databasePath ?? resolveFromRoot(app.storage.database_path, projectRoot),
      outputDir: resolveFromRoot(app.storage.output_dir, projectRoot),
    }),
    indicators: createIndicatorConfig(indicators),
  });
}

export interface LoadConfigOptions {
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const projectRoot = options.projectRoot ?? process.cwd();
  const envConfig = loadEnvConfig(options.env ?? process.env, projectRoot);
  const schemas = schemasDir(projectRoot);

  const appPath = join(envConfig.configDir, 'app.json');
  const appResult = validateAppConfig(readJson(appPath), schemas);
  if (!appResult.data) {
    throw new ConfigError('Invalid app config', appPath, appResult.errors ?? []);
  }

  const indicatorsPath = join(envConfig.configDir, 'indicators.json');
  const indicatorsResult = validateIndicatorsConfig(readJson(indicatorsPath), schemas);
  if (!indicatorsResult.data) {
    throw new ConfigError('Invalid indicator config', indicatorsPath, indicatorsResult.errors ?? []);
  }

  return buildConfig(appResult.data, indicatorsResult.data, projectRoot, envConfig);
}
