/**
 * Environment variable handling with validation
 */

import { isAbsolute, join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type NodeEnv = 'development' | 'production' | 'test';
export type ProviderType = 'binance' | 'file';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
  configDir: string;
  marketProvider: ProviderType | null;
  marketDataDir: string | null;
  databasePath: string | null;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const PROVIDER_TYPES: readonly ProviderType[] = ['binance', 'file'];

function pick<T extends string>(allowed: readonly T[], raw: string | undefined): T | null {
  return allowed.find((value) => value === raw) ?? null;
}

function resolvePath(raw: string | undefined, projectRoot: string): string | null {
  if (!raw) return null;
  return raw === ':memory:' || isAbsolute(raw) ? raw : join(projectRoot, raw);
}

export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
  projectRoot: string = process.cwd()
): EnvConfig {
  const marketProviderRaw = env.MARKET_PROVIDER;
  const marketProvider = pick(PROVIDER_TYPES, marketProviderRaw);
  if (marketProviderRaw && !marketProvider) {
    throw new Error(
      `Invalid MARKET_PROVIDER "${marketProviderRaw}" (expected ${PROVIDER_TYPES.join(' | ')})`
    );
  }

  return {
    logLevel: pick(LOG_LEVELS, env.LOG_LEVEL) ?? 'info',
    nodeEnv: pick(NODE_ENVS, env.NODE_ENV) ?? 'development',
    configDir: resolvePath(env.CONFIG_DIR, projectRoot) ?? join(projectRoot, 'config'),
    marketProvider,
    marketDataDir: resolvePath(env.MARKET_DATA_DIR, projectRoot),
    databasePath: resolvePath(env.DATABASE_PATH, projectRoot),
  };
}
