/**
 * Pure helpers over timeframe datasets: column extraction, windows and
 * summary statistics. Nothing here touches the cache or a provider.
 */

import type {
  PriceStatistics,
  Series,
  TimeframeDataset,
  VolumeStatistics,
} from './types';

export function closes(dataset: TimeframeDataset): number[] {
  return dataset.bars.map((bar) => bar.close);
}

export function highs(dataset: TimeframeDataset): number[] {
  return dataset.bars.map((bar) => bar.high);
}

export function lows(dataset: TimeframeDataset): number[] {
  return dataset.bars.map((bar) => bar.low);
}

export function volumes(dataset: TimeframeDataset): number[] {
  return dataset.bars.map((bar) => bar.volume);
}

/** Value `lookback` positions before the last one (0 = latest). */
export function latest<T>(values: readonly T[], lookback: number = 0): T | null {
  const index = values.length - 1 - lookback;
  return index >= 0 ? values[index] : null;
}

export function tail<T>(values: readonly T[], count: number): T[] {
  return count <= 0 ? [] : values.slice(Math.max(0, values.length - count));
}

export function seriesValue(
  dataset: TimeframeDataset,
  name: string,
  lookback: number = 0
): number | null {
  const series: Series | undefined = dataset.series[name];
  if (!series) return null;
  return latest(series, lookback);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function populationStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/** n-1 denominator. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/** Simple moving average of the last `period` values, null when too short. */
export function sma(values: readonly number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  return mean(tail(values, period));
}

/** Percent change over `periods` bars. */
export function percentChange(values: readonly number[], periods: number): number | null {
  const current = latest(values);
  const past = latest(values, periods);
  if (current === null || past === null || periods <= 0 || past === 0) return null;
  return ((current - past) / past) * 100;
}

export function momentum(dataset: TimeframeDataset, periods: number = 14): number | null {
  return percentChange(closes(dataset), periods);
}

export function volumeStatistics(
  dataset: TimeframeDataset,
  periods: number = 30
): VolumeStatistics | null {
  const window = tail(volumes(dataset), periods);
  if (window.length < 2) return null;

  const current = window[window.length - 1];
  const avg = mean(window);
  const std = sampleStd(window);
  const below = window.filter((value) => value < current).length;

  return {
    current,
    mean: avg,
    std,
    zScore: std > 0 ? (current - avg) / std : null,
    percentile: (below / window.length) * 100,
  };
}

export function priceStatistics(
  dataset: TimeframeDataset,
  periods: number = 30
): PriceStatistics | null {
  const bars = tail(dataset.bars, periods);
  if (bars.length < 2) return null;

  const closeWindow = bars.map((bar) => bar.close);
  const first = closeWindow[0];
  const current = closeWindow[closeWindow.length - 1];

  return {
    current,
    mean: mean(closeWindow),
    std: sampleStd(closeWindow),
    high: Math.max(...bars.map((bar) => bar.high)),
    low: Math.min(...bars.map((bar) => bar.low)),
    changePct: first !== 0 ? ((current - first) / first) * 100 : 0,
  };
}

/**
 * Exponentially weighted mean with span smoothing, every point weighted
 * from the start of the series (no recursive seed). Returns one value per input.
 */
export function ewmMean(values: readonly number[], span: number): number[] {
  const decay = 1 - 2 / (span + 1);
  const result: number[] = [];
  let current = 0;
  let totalWeight = 0;
  for (const value of values) {
    // incremental form of sum(decay^i * x) / sum(decay^i); exact on constant input
    totalWeight = 1 + decay * totalWeight;
    current += (value - current) / totalWeight;
    result.push(current);
  }
  return result;
}

/** Least-squares slope of the values against their index. */
export function linearSlope(values: readonly number[]): number | null {
  const n = values.length;
  if (n < 2) return null;
  const xMean = (n - 1) / 2;
  const yMean = mean(values);
  let covariance = 0;
  let variance = 0;
  values.forEach((value, i) => {
    covariance += (i - xMean) * (value - yMean);
    variance += (i - xMean) ** 2;
  });
  return covariance / variance;
}

/** Bar-over-bar fractional returns; bars after a zero close are skipped. */
export function pctReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    if (values[i - 1] !== 0) {
      returns.push(values[i] / values[i - 1] - 1);
    }
  }
  return returns;
}

/**
 * Spread of the last `recent` returns over the spread of the last
 * `historical` ones. Null when the historical spread is zero.
 */
export function volatilityRatio(
  values: readonly number[],
  recent: number = 10,
  historical: number = 30
): number | null {
  const returns = pctReturns(values);
  const historicalStd = sampleStd(tail(returns, historical));
  if (historicalStd === 0) return null;
  return sampleStd(tail(returns, recent)) / historicalStd;
}
