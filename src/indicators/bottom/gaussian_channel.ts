import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, latest, populationStd, tail } from '@/market/series';
import type { Timeframe } from '@/market/types';

const PERIOD = 20;
const SIGMA = 2;
const MIN_BARS = 30;

/** Gaussian kernel centred on the middle of the window, summing to 1. */
const KERNEL: readonly number[] = (() => {
  const raw = Array.from({ length: PERIOD }, (_, i) =>
    Math.exp(-((i - PERIOD / 2) ** 2) / (2 * SIGMA ** 2))
  );
  const sum = raw.reduce((total, weight) => total + weight, 0);
  return raw.map((weight) => weight / sum);
})();

/**
 * Depth of the daily close below a Gaussian-weighted moving average, in
 * standard deviations of the same window. Positive below the channel mid.
 */
export class GaussianChannelIndicator extends BaseIndicator {
  readonly name = 'gaussian_channel';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const values = closes(inputs.dataset('1D'));
    if (values.length < MIN_BARS) return null;

    const window = tail(values, PERIOD);
    const average = window.reduce((sum, value, i) => sum + value * KERNEL[i], 0);
    const std = populationStd(window);
    if (std === 0) {
      throw new Error('flat price window');
    }

    const close = latest(values);
    return close === null ? null : (average - close) / std;
  }
}
