import { BaseIndicator, type IndicatorInputs } from '../base';
import { momentum } from '@/market/series';
import type { Timeframe } from '@/market/types';

const PERIODS = 14;

/** Upside momentum on daily bars, in percent. */
export class MmdIndicator extends BaseIndicator {
  readonly name = 'mmd';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    return momentum(inputs.dataset('1D'), PERIODS);
  }
}
