import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigError, buildConfig, createIndicatorConfig, loadConfig } from '@/core/config';
import { loadEnvConfig } from '@/core/env';
import { IndicatorConfigError } from '@/indicators/errors';
import { findMissingIndicatorConfig } from '@/run/config_check';
import type { AppConfigFile, IndicatorsFile } from '@/types/config_files';

const projectRoot = process.cwd();

function readConfigFile(name: string): unknown {
  return JSON.parse(readFileSync(join(projectRoot, 'config', name), 'utf-8'));
}

function appFile(): AppConfigFile {
  return JSON.parse(readFileSync(join(projectRoot, 'config', 'app.json'), 'utf-8'));
}

function indicatorsFile(): IndicatorsFile {
  return JSON.parse(readFileSync(join(projectRoot, 'config', 'indicators.json'), 'utf-8'));
}

describe('loadConfig', () => {
  it('loads the shipped configuration', () => {
    const config = loadConfig({ projectRoot, env: {} });

    expect(config.symbol).toBe('BTCUSDT');
    expect(config.timeframes).toEqual(['1D', '3D', '5D', '1W', '1M']);
    expect(config.barCount['1D']).toBe(600);
    expect(config.cache.maxAgeMinutes).toBe(60);
    expect(config.marketContext).toEqual({ timeframe: '1D', lookbackPeriods: 30 });
    expect(config.composer.zeroWeightFailures).toBe('count');
    expect(config.provider).toEqual({
      type: 'binance',
      baseUrl: 'https://api.binance.com',
      minRequestIntervalMs: 250,
      maxRetries: 3,
      initialBackoffMs: 1000,
      dataDir: join(projectRoot, 'data/market'),
    });
    expect(config.scheduler).toEqual({ times: ['08:00', '20:00'], timezone: 'UTC' });
    expect(config.storage.databasePath).toBe(join(projectRoot, 'data/cycle_scores.db'));
    expect(config.indicators.weight('bottom', 'pi_cycle_low')).toBe(2);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies environment overrides', () => {
    const config = loadConfig({
      projectRoot,
      env: { MARKET_PROVIDER: 'file', MARKET_DATA_DIR: '/srv/market', DATABASE_PATH: ':memory:' },
    });

    expect(config.provider.type).toBe('file');
    expect(config.provider.dataDir).toBe('/srv/market');
    expect(config.storage.databasePath).toBe(':memory:');
  });

  it('has a bounds and weight entry for every roster indicator', () => {
    expect(findMissingIndicatorConfig(loadConfig({ projectRoot, env: {} }))).toEqual([]);
  });

  describe('with a custom config directory', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cycle-config-'));
      writeFileSync(join(dir, 'indicators.json'), JSON.stringify(readConfigFile('indicators.json')));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function load() {
      return loadConfig({ projectRoot, env: { CONFIG_DIR: dir } });
    }

    it('rejects an app config that fails the schema', () => {
      const app: Partial<AppConfigFile> = appFile();
      delete app.symbol;
      writeFileSync(join(dir, 'app.json'), JSON.stringify(app));

      expect(load).toThrow(ConfigError);
      expect(load).toThrow("root: must have required property 'symbol'");
    });

    it('rejects a negative indicator weight', () => {
      writeFileSync(join(dir, 'app.json'), JSON.stringify(appFile()));
      writeFileSync(
        join(dir, 'indicators.json'),
        JSON.stringify({ bottom: { a: { lower: 0, upper: 1, weight: -1 } }, top: {} })
      );

      expect(load).toThrow('Invalid indicator config: /bottom/a/weight: must be >= 0');
    });

    it('reports a missing file', () => {
      expect(load).toThrow('Config file not found');
    });

    it('reports malformed JSON', () => {
      writeFileSync(join(dir, 'app.json'), '{ "symbol": ');
      expect(load).toThrow('Config file is not valid JSON');
    });
  });
});

describe('buildConfig', () => {
  it('requires the market context timeframe to be configured', () => {
    const app = { ...appFile(), timeframes: ['1W' as const] };

    expect(() => buildConfig(app, indicatorsFile(), projectRoot)).toThrow(
      'market_context.timeframe 1D is not listed in timeframes'
    );
  });

  it('rejects bounds whose lower edge is above the upper edge', () => {
    const indicators = {
      bottom: { a: { lower: 3, upper: -2, weight: 1 } },
      top: { b: { lower: 1, upper: 1, weight: 1 } },
    };

    expect(() => buildConfig(appFile(), indicators, projectRoot)).toThrow(
      'Invalid indicator config: /bottom/a: lower 3 is above upper -2'
    );
  });

  it('accepts equal bounds', () => {
    const indicators = { bottom: {}, top: { b: { lower: 1, upper: 1, weight: 1 } } };
    const config = buildConfig(appFile(), indicators, projectRoot);

    expect(config.indicators.bounds('top', 'b')).toEqual({ lower: 1, upper: 1 });
  });

  it('fills missing bar counts with defaults', () => {
    const app = { ...appFile(), bar_count: { '1D': 50 } };
    const config = buildConfig(app, indicatorsFile(), projectRoot);

    expect(config.barCount).toEqual({ '1D': 50, '3D': 300, '5D': 200, '1W': 200, '1M': 100 });
  });
});

describe('createIndicatorConfig', () => {
  const config = createIndicatorConfig({
    bottom: { a: { lower: 1, upper: 2, weight: 3 } },
    top: {},
  });

  it('looks up bounds, weight and spec by side', () => {
    expect(config.bounds('bottom', 'a')).toEqual({ lower: 1, upper: 2 });
    expect(config.weight('bottom', 'a')).toBe(3);
    expect(config.spec('bottom', 'a')).toEqual({
      name: 'a',
      side: 'bottom',
      bounds: { lower: 1, upper: 2 },
      weight: 3,
    });
    expect(config.names('bottom')).toEqual(['a']);
    expect(config.names('top')).toEqual([]);
  });

  it('throws for an unknown indicator', () => {
    expect(() => config.weight('top', 'a')).toThrow(IndicatorConfigError);
    expect(() => config.bounds('bottom', 'toString')).toThrow('No bottom config for indicator toString');
  });
});

describe('loadEnvConfig', () => {
  it('defaults every setting', () => {
    expect(loadEnvConfig({}, '/project')).toEqual({
      logLevel: 'info',
      nodeEnv: 'development',
      configDir: join('/project', 'config'),
      marketProvider: null,
      marketDataDir: null,
      databasePath: null,
    });
  });

  it('rejects an unknown market provider', () => {
    expect(() => loadEnvConfig({ MARKET_PROVIDER: 'kraken' }, '/project')).toThrow(
      'Invalid MARKET_PROVIDER "kraken" (expected binance | file)'
    );
  });
});
