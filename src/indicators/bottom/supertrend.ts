import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, latest, seriesValue } from '@/market/series';
import type { Timeframe } from '@/market/types';
import { clamp } from '@/utils/number';

const FLIP_WINDOW = 5;
const MAX_DISTANCE_PCT = 20;

/**
 * Scores SuperTrend state on a 0-100 scale. Deep below the line in a
 * downtrend scores high; a fresh flip to uptrend scores as confirmation.
 */
export class SupertrendIndicator extends BaseIndicator {
  readonly name = 'supertrend';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];
  protected readonly requiredSeries = { '1D': ['supertrend', 'supertrend_direction'] };

  protected compute(inputs: IndicatorInputs): number | null {
    const dataset = inputs.dataset('1D');
    const close = latest(closes(dataset));
    const line = seriesValue(dataset, 'supertrend');
    const direction = seriesValue(dataset, 'supertrend_direction');
    if (close === null || line === null || direction === null || close <= 0) return null;

    const distancePct = Math.min((Math.abs(close - line) / close) * 100, MAX_DISTANCE_PCT);

    if (direction < 0) {
      return clamp(50 + distancePct * 2.5, 0, 100);
    }

    const directions = dataset.series.supertrend_direction;
    const recent = directions.slice(-(FLIP_WINDOW + 1));
    const flippedUp = recent.some((value) => value !== null && value < 0);
    if (flippedUp) return 70;

    return clamp(20 - distancePct, 0, 100);
  }
}
