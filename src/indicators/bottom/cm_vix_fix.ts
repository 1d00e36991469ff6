import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, lows, mean } from '@/market/series';
import type { Timeframe } from '@/market/types';

const LOOKBACK = 22;
const SMOOTHING = 3;

/**
 * Williams VIX Fix: percent drop of the low from the highest close of the
 * lookback window, averaged over the last three bars.
 */
export class CmVixFixIndicator extends BaseIndicator {
  readonly name = 'cm_vix_fix';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const dataset = inputs.dataset('1D');
    const closeValues = closes(dataset);
    const lowValues = lows(dataset);
    if (closeValues.length < LOOKBACK + SMOOTHING - 1) return null;

    const fixes: number[] = [];
    for (let i = closeValues.length - SMOOTHING; i < closeValues.length; i++) {
      const highestClose = Math.max(...closeValues.slice(i - LOOKBACK + 1, i + 1));
      if (highestClose <= 0) return null;
      fixes.push(((highestClose - lowValues[i]) / highestClose) * 100);
    }
    return mean(fixes);
  }
}
