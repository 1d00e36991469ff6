import { BaseIndicator, type IndicatorInputs } from '../base';
import { mean, populationStd, volumes } from '@/market/series';
import type { Timeframe } from '@/market/types';

const BURST_BARS = 2;
const BASELINE_BARS = 20;

/**
 * Z-score of the last two daily volumes against the 20 bars before them.
 * Capitulation bottoms tend to print a volume burst.
 */
export class VolumeBurst2DIndicator extends BaseIndicator {
  readonly name = '2d_volume_burst';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const values = volumes(inputs.dataset('1D'));
    if (values.length < BURST_BARS + BASELINE_BARS) return null;

    const burst = mean(values.slice(-BURST_BARS));
    const baseline = values.slice(-(BURST_BARS + BASELINE_BARS), -BURST_BARS);
    const std = populationStd(baseline);
    if (std === 0) return 0;

    return (burst - mean(baseline)) / std;
  }
}
