import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { AnalysisCoordinator } from '@/analysis/coordinator';
import { Composer } from '@/composer/composer';
import type { SideAnalysis } from '@/composer/types';
import { buildConfig, type AppConfig } from '@/core/config';
import { closeDatabase, getDatabase, initializeDatabase, MEMORY_DATABASE } from '@/data/db';
import {
  getLatestDataSourceStatus,
  getRecentCalculations,
} from '@/data/repositories/calculation_repo';
import { getRecentSystemEvents } from '@/data/repositories/system_log_repo';
import { executeRun } from '@/run/pipeline';
import { createRuntime, type Runtime } from '@/run/runtime';
import type { AppConfigFile, IndicatorsFile } from '@/types/config_files';
import {
  BASE_TIME,
  FakeProvider,
  FixedIndicator,
  ManualClock,
  barsFromCloses,
  plainDataset,
} from '../helpers/fixtures';

class CrashingComposer extends Composer {
  async calculateCompleteAnalysis(): Promise<SideAnalysis> {
    throw new Error('composer crashed');
  }
}

function readJson<T>(name: string): T {
  return JSON.parse(readFileSync(join(process.cwd(), 'config', name), 'utf-8'));
}

describe('executeRun', () => {
  let outputDir: string;
  let config: AppConfig;
  let clock: ManualClock;
  let runtime: Runtime;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'cycle-pipeline-'));
    const app = readJson<AppConfigFile>('app.json');
    config = buildConfig(
      { ...app, timeframes: ['1D', '1W'], storage: { database_path: MEMORY_DATABASE, output_dir: outputDir } },
      readJson<IndicatorsFile>('indicators.json'),
      process.cwd()
    );
    clock = new ManualClock();
    runtime = createRuntime(config, {
      provider: new FakeProvider({ '1D': plainDataset('1D', barsFromCloses([100, 105])) }),
      clock: clock.clock,
      bottomRoster: () => [new FixedIndicator('a', 'bottom', 0.8, 1)],
      topRoster: () => [new FixedIndicator('b', 'top', 0.1, 1)],
    });
    initializeDatabase(MEMORY_DATABASE);
  });

  afterEach(() => {
    closeDatabase();
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('analyses, stores and exports a run', async () => {
    expect(await executeRun(runtime)).toBe(true);

    const rows = getRecentCalculations(24, undefined, new Date(BASE_TIME));
    expect(rows.map((row) => [row.calculationType, row.compositeScore, row.signalStrength])).toEqual([
      ['top', 0.1, 'Very Weak'],
      ['bottom', 0.8, 'Very Strong'],
    ]);
    expect(getLatestDataSourceStatus().map((row) => [row.timeframe, row.status])).toEqual([
      ['1D', 'ok'],
      ['1W', 'failed'],
    ]);
    expect(readdirSync(join(outputDir, 'json'))).toHaveLength(1);
    expect(readdirSync(join(outputDir, 'csv'))).toHaveLength(5);
    expect(existsSync(join(outputDir, 'excel'))).toBe(false);
    expect(getRecentSystemEvents(10).map((event) => event.message)).toEqual([
      'Calculation completed',
      'Calculation started',
    ]);
  });

  it('writes the Excel report when asked', async () => {
    expect(await executeRun(runtime, { excel: true })).toBe(true);
    expect(readdirSync(join(outputDir, 'excel'))).toHaveLength(1);
  });

  it('records no data source status without a refresh', async () => {
    expect(await executeRun(runtime, { refreshData: false })).toBe(true);
    expect(getLatestDataSourceStatus()).toEqual([]);
  });

  it('fails when the analysis fails', async () => {
    const broken: Runtime = {
      ...runtime,
      coordinator: new AnalysisCoordinator({
        symbol: config.symbol,
        cache: runtime.cache,
        provider: runtime.provider,
        bottom: runtime.bottom,
        top: new CrashingComposer('top', [], config.indicators),
        marketContext: config.marketContext,
        clock: clock.clock,
      }),
    };

    expect(await executeRun(broken)).toBe(false);
    expect(getRecentSystemEvents(1)[0]).toMatchObject({
      level: 'ERROR',
      message: 'Calculation failed',
      details: { error: 'composer crashed' },
    });
    expect(getRecentCalculations(24, undefined, new Date(BASE_TIME))).toEqual([]);
  });

  it('fails when the run cannot be stored', async () => {
    getDatabase().exec('DROP TABLE indicator_results; DROP TABLE calculations;');

    expect(await executeRun(runtime)).toBe(false);
    expect(getRecentSystemEvents(1)[0].message).toBe('Storing calculation failed');
  });

  it('keeps the run when an export fails', async () => {
    rmSync(outputDir, { recursive: true, force: true });
    writeFileSync(outputDir, 'not a directory');

    expect(await executeRun(runtime)).toBe(true);
    expect(
      getRecentSystemEvents(10)
        .filter((event) => event.level === 'WARNING')
        .map((event) => event.message)
    ).toEqual(['csv export failed', 'json export failed']);

    rmSync(outputDir, { force: true });
  });
});
