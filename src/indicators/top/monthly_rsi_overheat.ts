import { BaseIndicator, type IndicatorInputs } from '../base';
import { seriesValue } from '@/market/series';
import type { Timeframe } from '@/market/types';

/** RSI(14) on monthly bars. */
export class MonthlyRsiOverheatIndicator extends BaseIndicator {
  readonly name = 'm_rsi_overheat';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1M'];
  protected readonly requiredSeries = { '1M': ['rsi_14'] };

  protected compute(inputs: IndicatorInputs): number | null {
    return seriesValue(inputs.dataset('1M'), 'rsi_14');
  }
}
