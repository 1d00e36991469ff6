/**
 * Offline provider reading bar arrays from `<dir>/<symbol>_<timeframe>.json`.
 * A missing 5D file is resampled from the daily one.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { createDataset, isOhlcvBar } from '@/market/dataset';
import { resampleBars } from '@/market/resample';
import { latest, tail } from '@/market/series';
import type { OhlcvBar, Timeframe, TimeframeDataset } from '@/market/types';
import { ProviderError, type MarketDataProvider } from '../types';

const logger = createChildLogger('file_provider');

export class FileMarketDataProvider implements MarketDataProvider {
  readonly name = 'file';
  private requestCount = 0;

  constructor(
    private readonly dataDir: string,
    private readonly symbol: string
  ) {}

  getRequestCount(): number {
    return this.requestCount;
  }

  filePath(timeframe: Timeframe): string {
    return join(this.dataDir, `${this.symbol}_${timeframe}.json`);
  }

  private readBars(timeframe: Timeframe): OhlcvBar[] | null {
    const path = this.filePath(timeframe);
    if (!existsSync(path)) {
      return null;
    }
    this.requestCount++;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ProviderError(
        `Unreadable bar file ${path}: ${errorMessage(error)}`,
        this.name,
        timeframe,
        'fetch',
        error instanceof Error ? error : undefined
      );
    }

    if (!Array.isArray(parsed) || !parsed.every(isOhlcvBar)) {
      throw new ProviderError(`Malformed bar file ${path}`, this.name, timeframe, 'fetch');
    }
    return parsed;
  }

  async fetch(timeframe: Timeframe, barCount: number): Promise<TimeframeDataset | null> {
    let bars = this.readBars(timeframe);
    if (!bars && timeframe === '5D') {
      const daily = this.readBars('1D');
      bars = daily ? resampleBars(daily, 5) : null;
    }

    if (!bars || bars.length === 0) {
      logger.warn({ symbol: this.symbol, timeframe, dir: this.dataDir }, 'No bar file for timeframe');
      return null;
    }

    return createDataset(timeframe, this.symbol, tail(bars, barCount));
  }

  async currentPrice(): Promise<number | null> {
    const daily = this.readBars('1D');
    return daily ? latest(daily)?.close ?? null : null;
  }
}
