import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, latest, seriesValue } from '@/market/series';
import type { Timeframe } from '@/market/types';

/** Percent distance of the 5-day close above its 20-bar SMA. */
export class Extension5DIndicator extends BaseIndicator {
  readonly name = '5d_extension';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['5D'];
  protected readonly requiredSeries = { '5D': ['sma_20'] };

  protected compute(inputs: IndicatorInputs): number | null {
    const dataset = inputs.dataset('5D');
    const close = latest(closes(dataset));
    const average = seriesValue(dataset, 'sma_20');
    if (close === null || average === null || average === 0) return null;
    return ((close - average) / average) * 100;
  }
}
