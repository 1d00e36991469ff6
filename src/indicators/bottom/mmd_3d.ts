import { BaseIndicator, type IndicatorInputs } from '../base';
import { momentum } from '@/market/series';
import type { Timeframe } from '@/market/types';

const PERIODS = 14;

/** Downside momentum on the 3-day chart, in percent (positive = falling). */
export class Mmd3DIndicator extends BaseIndicator {
  readonly name = '3d_mmd';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['3D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const change = momentum(inputs.dataset('3D'), PERIODS);
    return change === null ? null : -change;
  }
}
