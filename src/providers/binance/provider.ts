/**
 * Binance-backed market data provider
 */

import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { createDataset } from '@/market/dataset';
import { resampleBars } from '@/market/resample';
import { tail } from '@/market/series';
import type { Timeframe, TimeframeDataset } from '@/market/types';
import { ProviderError, type MarketDataProvider } from '../types';
import { BinanceClient, MAX_KLINE_LIMIT } from './client';
import type { BinanceInterval } from './types';

const logger = createChildLogger('binance_provider');

const NATIVE_INTERVALS: Record<Exclude<Timeframe, '5D'>, BinanceInterval> = {
  '1D': '1d',
  '3D': '3d',
  '1W': '1w',
  '1M': '1M',
};

const FIVE_DAY = 5;

export class BinanceMarketDataProvider implements MarketDataProvider {
  readonly name = 'binance';

  constructor(
    private readonly client: BinanceClient,
    private readonly symbol: string
  ) {}

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  async fetch(timeframe: Timeframe, barCount: number): Promise<TimeframeDataset | null> {
    try {
      const bars =
        timeframe === '5D'
          ? tail(
              resampleBars(
                await this.client.fetchKlines(
                  this.symbol,
                  '1d',
                  Math.min(barCount * FIVE_DAY, MAX_KLINE_LIMIT)
                ),
                FIVE_DAY
              ),
              barCount
            )
          : await this.client.fetchKlines(this.symbol, NATIVE_INTERVALS[timeframe], barCount);

      if (bars.length === 0) {
        logger.warn({ symbol: this.symbol, timeframe }, 'No bars returned');
        return null;
      }

      logger.debug({ symbol: this.symbol, timeframe, bars: bars.length }, 'Fetched klines');
      return createDataset(timeframe, this.symbol, bars);
    } catch (error) {
      throw new ProviderError(
        `Failed to fetch ${timeframe} klines for ${this.symbol}: ${errorMessage(error)}`,
        this.name,
        timeframe,
        'fetch',
        error instanceof Error ? error : undefined
      );
    }
  }

  async currentPrice(): Promise<number | null> {
    try {
      return await this.client.fetchTickerPrice(this.symbol);
    } catch (error) {
      throw new ProviderError(
        `Failed to fetch current price for ${this.symbol}: ${errorMessage(error)}`,
        this.name,
        null,
        'currentPrice',
        error instanceof Error ? error : undefined
      );
    }
  }
}
