import { describe, expect, it } from 'vitest';
import {
  ewmMean,
  latest,
  linearSlope,
  mean,
  momentum,
  pctReturns,
  percentChange,
  populationStd,
  priceStatistics,
  sampleStd,
  seriesValue,
  sma,
  tail,
  volatilityRatio,
  volumeStatistics,
} from '@/market/series';
import { barsFromCloses, plainDataset } from '../helpers/fixtures';

describe('series helpers', () => {
  it('reads values from the end', () => {
    expect(latest([1, 2, 3])).toBe(3);
    expect(latest([1, 2, 3], 2)).toBe(1);
    expect(latest([1, 2, 3], 3)).toBeNull();
    expect(tail([1, 2, 3, 4], 2)).toEqual([3, 4]);
    expect(tail([1, 2], 5)).toEqual([1, 2]);
  });

  it('computes mean and both standard deviations', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(mean(values)).toBe(5);
    expect(populationStd(values)).toBe(2);
    expect(sampleStd(values)).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(populationStd([3])).toBe(0);
    expect(sampleStd([])).toBe(0);
  });

  it('computes a trailing simple moving average', () => {
    expect(sma([1, 2, 3, 4, 5], 2)).toBe(4.5);
    expect(sma([1, 2, 3, 4, 5], 5)).toBe(3);
    expect(sma([1, 2], 3)).toBeNull();
  });

  it('computes percent change over a number of bars', () => {
    expect(percentChange([100, 110, 121], 1)).toBeCloseTo(10, 10);
    expect(percentChange([100, 110, 121], 2)).toBeCloseTo(21, 10);
    expect(percentChange([100, 110], 2)).toBeNull();
    expect(percentChange([0, 5], 1)).toBeNull();
  });

  it('computes momentum from closes', () => {
    const dataset = plainDataset('1D', barsFromCloses([50, 60, 75]));
    expect(momentum(dataset, 2)).toBeCloseTo(50, 10);
  });

  it('reads the latest value of a derived series', () => {
    const dataset = plainDataset('1D', barsFromCloses([1, 2, 3]), { rsi_14: [null, 40, 55] });
    expect(seriesValue(dataset, 'rsi_14')).toBe(55);
    expect(seriesValue(dataset, 'rsi_14', 2)).toBeNull();
    expect(seriesValue(dataset, 'missing')).toBeNull();
  });
});

describe('volumeStatistics', () => {
  it('summarises the trailing volume window', () => {
    const dataset = plainDataset('1D', barsFromCloses([1, 1, 1, 1, 1], [999, 10, 20, 30, 40]));
    const stats = volumeStatistics(dataset, 4);

    const std = Math.sqrt(500 / 3);
    expect(stats).not.toBeNull();
    expect(stats?.current).toBe(40);
    expect(stats?.mean).toBe(25);
    expect(stats?.std).toBeCloseTo(std, 10);
    expect(stats?.zScore).toBeCloseTo(15 / std, 10);
    expect(stats?.percentile).toBe(75);
  });

  it('reports a null z-score for flat volume', () => {
    const dataset = plainDataset('1D', barsFromCloses([1, 1, 1], [5, 5, 5]));
    expect(volumeStatistics(dataset, 3)?.zScore).toBeNull();
  });

  it('returns null with fewer than two bars', () => {
    const dataset = plainDataset('1D', barsFromCloses([1]));
    expect(volumeStatistics(dataset, 30)).toBeNull();
  });
});

describe('priceStatistics', () => {
  it('summarises the trailing price window', () => {
    const dataset = plainDataset('1D', barsFromCloses([50, 100, 110, 120]));
    const stats = priceStatistics(dataset, 3);

    expect(stats).toEqual({
      current: 120,
      mean: 110,
      std: 10,
      high: 120,
      low: 100,
      changePct: 20,
    });
  });
});

describe('trend and smoothing helpers', () => {
  it('weights every point of an exponential mean from the start', () => {
    expect(ewmMean([2, 2, 2], 5)).toEqual([2, 2, 2]);
    const smoothed = ewmMean([0, 3], 2);
    expect(smoothed[0]).toBe(0);
    expect(smoothed[1]).toBeCloseTo(2.25, 12);
  });

  it('fits a least-squares slope', () => {
    expect(linearSlope([1, 3, 5])).toBe(2);
    expect(linearSlope([4, 4, 4, 4])).toBe(0);
    expect(linearSlope([5])).toBeNull();
  });

  it('skips returns after a zero close', () => {
    expect(pctReturns([100, 150, 0, 5])).toEqual([0.5, -1]);
  });

  it('compares recent and historical return spread', () => {
    const alternating = Array.from({ length: 31 }, (_, i) => (i % 2 === 0 ? 100 : 110));

    expect(volatilityRatio(alternating)).toBeCloseTo(Math.sqrt(290 / 270), 10);
    expect(volatilityRatio(new Array<number>(31).fill(100))).toBeNull();
  });
});
