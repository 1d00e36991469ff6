/**
 * Shared types and interfaces for market data providers.
 *
 * Providers supply the timeframe cache with OHLCV datasets (derived series
 * already attached) while hiding the underlying source (exchange REST API
 * vs. JSON files on disk).
 */

import type { Timeframe, TimeframeDataset } from '@/market/types';

export interface MarketDataProvider {
  readonly name: string;
  /**
   * Fetch the most recent `barCount` bars. Resolves null when the source has
   * nothing for the timeframe; rejects with ProviderError on transport failure.
   */
  fetch(timeframe: Timeframe, barCount: number): Promise<TimeframeDataset | null>;
  currentPrice(): Promise<number | null>;
  getRequestCount(): number;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public timeframe: string | null,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
