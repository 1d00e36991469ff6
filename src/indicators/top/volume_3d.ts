import { BaseIndicator, type IndicatorInputs } from '../base';
import { mean, populationStd, volumes } from '@/market/series';
import type { Timeframe } from '@/market/types';

const BASELINE_BARS = 20;

/** Z-score of the latest 3-day volume against the 20 bars before it. */
export class Volume3DIndicator extends BaseIndicator {
  readonly name = '3d_volume';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['3D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const values = volumes(inputs.dataset('3D'));
    if (values.length < BASELINE_BARS + 1) return null;

    const current = values[values.length - 1];
    const baseline = values.slice(-(BASELINE_BARS + 1), -1);
    const std = populationStd(baseline);
    if (std === 0) return 0;

    return (current - mean(baseline)) / std;
  }
}
