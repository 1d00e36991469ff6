/**
 * Market data shapes shared by providers, the timeframe cache and indicators.
 */

export const TIMEFRAMES = ['1D', '3D', '5D', '1W', '1M'] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export function isTimeframe(value: unknown): value is Timeframe {
  return typeof value === 'string' && TIMEFRAMES.some((tf) => tf === value);
}

export interface OhlcvBar {
  /** ISO-8601 open time of the bar */
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** One value per bar; null where the series is still warming up. */
export type Series = readonly (number | null)[];

export interface TimeframeDataset {
  readonly timeframe: Timeframe;
  readonly symbol: string;
  readonly bars: readonly OhlcvBar[];
  readonly series: Readonly<Record<string, Series>>;
}

export interface CacheEntry {
  dataset: TimeframeDataset;
  /** epoch ms */
  fetchedAt: number;
}

export interface CacheStatusEntry {
  cached: boolean;
  lastUpdate: string | null;
  ageMinutes: number | null;
  valid: boolean;
}

export interface RefreshReport {
  refreshed: Timeframe[];
  failed: Timeframe[];
  success: boolean;
}

export interface VolumeStatistics {
  current: number;
  mean: number;
  std: number;
  zScore: number | null;
  percentile: number;
}

export interface PriceStatistics {
  current: number;
  mean: number;
  std: number;
  high: number;
  low: number;
  changePct: number;
}

/**
 * Freeze a dataset and its arrays so cache readers can share it safely.
 */
export function freezeDataset(dataset: TimeframeDataset): TimeframeDataset {
  const series: Record<string, Series> = {};
  for (const [name, values] of Object.entries(dataset.series)) {
    if (values.length !== dataset.bars.length) {
      throw new Error(
        `Series ${name} has ${values.length} values for ${dataset.bars.length} bars`
      );
    }
    series[name] = Object.freeze([...values]);
  }
  return Object.freeze({
    timeframe: dataset.timeframe,
    symbol: dataset.symbol,
    bars: Object.freeze(dataset.bars.map((bar) => Object.freeze({ ...bar }))),
    series: Object.freeze(series),
  });
}
