import { BaseIndicator, type IndicatorInputs } from '../base';
import { seriesValue } from '@/market/series';
import type { Timeframe } from '@/market/types';

/** 100 - RSI(14) on weekly bars. */
export class WeeklyRsiOversoldIndicator extends BaseIndicator {
  readonly name = 'w_rsi_oversold';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1W'];
  protected readonly requiredSeries = { '1W': ['rsi_14'] };

  protected compute(inputs: IndicatorInputs): number | null {
    const rsi = seriesValue(inputs.dataset('1W'), 'rsi_14');
    return rsi === null ? null : 100 - rsi;
  }
}
