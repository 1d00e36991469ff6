import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, latest, seriesValue, tail } from '@/market/series';
import type { Timeframe } from '@/market/types';

const LOOKBACK = 100;
const MIN_LOOKBACK = 20;
const EXTREME = 80;

/**
 * Bollinger Band Width Percentile: where the current band width sits among
 * the last 100 widths (0-100). Boosted in an uptrend, damped when an
 * extreme reading comes with a downtrend.
 */
export class BbwpIndicator extends BaseIndicator {
  readonly name = 'bbwp';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];
  protected readonly requiredSeries = { '1D': ['bb_width', 'sma_20'] };

  protected compute(inputs: IndicatorInputs): number | null {
    const dataset = inputs.dataset('1D');
    const widths = dataset.series.bb_width.filter((value): value is number => value !== null);
    const lookback = Math.min(LOOKBACK, widths.length);
    if (lookback < MIN_LOOKBACK) return null;

    const window = tail(widths, lookback);
    const current = window[window.length - 1];
    const percentile = (window.filter((width) => width <= current).length / window.length) * 100;

    const close = latest(closes(dataset));
    const average = seriesValue(dataset, 'sma_20');
    if (close === null || average === null) return percentile;

    if (close > average) {
      return Math.min(100, percentile * 1.2);
    }
    return percentile > EXTREME ? percentile * 0.8 : percentile;
  }
}
