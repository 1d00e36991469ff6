import { createIndicatorConfig } from '@/core/config';
import type { IndicatorEntryFile } from '@/types/config_files';
import type {
  Indicator,
  IndicatorConfig,
  IndicatorResult,
  Side,
} from '@/indicators/types';
import { freezeDataset, type OhlcvBar, type Timeframe, type TimeframeDataset } from '@/market/types';
import { ProviderError, type MarketDataProvider } from '@/providers/types';

export const SYMBOL = 'TESTUSDT';
export const DAY_MS = 24 * 60 * 60 * 1000;
export const BASE_TIME = Date.UTC(2024, 0, 1);

export function barsFromCloses(closes: readonly number[], volumes?: readonly number[]): OhlcvBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(BASE_TIME + i * DAY_MS).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: volumes ? volumes[i] : 1000,
  }));
}

export function plainDataset(
  timeframe: Timeframe,
  bars: readonly OhlcvBar[],
  series: Record<string, (number | null)[]> = {}
): TimeframeDataset {
  return freezeDataset({ timeframe, symbol: SYMBOL, bars, series });
}

export class ManualClock {
  constructor(public now: number = BASE_TIME) {}

  readonly clock = (): number => this.now;

  advanceMinutes(minutes: number): void {
    this.now += minutes * 60 * 1000;
  }
}

/**
 * In-process provider: serves the datasets it was given and counts calls.
 */
export class FakeProvider implements MarketDataProvider {
  readonly name = 'fake';
  readonly calls: Timeframe[] = [];
  readonly failing = new Set<Timeframe>();
  price: number | null = 100;
  priceError: string | null = null;

  constructor(private readonly datasets: Partial<Record<Timeframe, TimeframeDataset>> = {}) {}

  set(timeframe: Timeframe, dataset: TimeframeDataset): void {
    this.datasets[timeframe] = dataset;
  }

  callsFor(timeframe: Timeframe): number {
    return this.calls.filter((tf) => tf === timeframe).length;
  }

  getRequestCount(): number {
    return this.calls.length;
  }

  async fetch(timeframe: Timeframe): Promise<TimeframeDataset | null> {
    this.calls.push(timeframe);
    if (this.failing.has(timeframe)) {
      throw new ProviderError('upstream unavailable', this.name, timeframe, 'fetch');
    }
    return this.datasets[timeframe] ?? null;
  }

  async currentPrice(): Promise<number | null> {
    if (this.priceError) {
      throw new ProviderError(this.priceError, this.name, null, 'currentPrice');
    }
    return this.price;
  }
}

export function indicatorConfig(
  bottom: Record<string, IndicatorEntryFile> = {},
  top: Record<string, IndicatorEntryFile> = {}
): IndicatorConfig {
  return createIndicatorConfig({ bottom, top });
}

/**
 * Indicator with a preset normalized score; null stands for a failed calculation.
 */
export class FixedIndicator implements Indicator {
  constructor(
    readonly name: string,
    readonly side: Side,
    private readonly score: number | null,
    private readonly weight: number
  ) {}

  async rawValue(): Promise<number | null> {
    return this.score;
  }

  async fullResult(): Promise<IndicatorResult> {
    return {
      name: this.name,
      side: this.side,
      rawValue: this.score,
      normalizedScore: this.score,
      weight: this.weight,
      bounds: { lower: 0, upper: 1 },
      timestamp: new Date(BASE_TIME).toISOString(),
      ...(this.score === null ? { error: 'data unavailable: 1D' } : {}),
    };
  }
}

export class ThrowingIndicator implements Indicator {
  constructor(
    readonly name: string,
    readonly side: Side
  ) {}

  async rawValue(): Promise<number | null> {
    throw new Error('formula exploded');
  }

  async fullResult(): Promise<IndicatorResult> {
    throw new Error('formula exploded');
  }
}
