import { BaseIndicator, type IndicatorInputs } from '../base';
import { timeOfDayWeight, weightedComponents } from '../timing';
import {
  closes,
  momentum,
  seriesValue,
  volatilityRatio,
  volumeStatistics,
} from '@/market/series';
import type { Timeframe, TimeframeDataset } from '@/market/types';

const MIN_DAILY_BARS = 30;

function momentumScore(monthly: TimeframeDataset): number | null {
  const change = momentum(monthly, 3);
  return change === null ? null : (Math.tanh(-change / 20) + 1) / 2;
}

/** Elevated short-term volatility reads as capitulation, up to a point. */
function volatilityScore(daily: TimeframeDataset): number | null {
  const values = closes(daily);
  if (values.length < MIN_DAILY_BARS) return null;
  const ratio = volatilityRatio(values);
  if (ratio === null) return 0.5;
  if (ratio <= 1.5) return ratio / 1.5;
  if (ratio <= 3) return 1;
  return Math.max(0.5, 1 - (ratio - 3) / 5);
}

function volumeScore(daily: TimeframeDataset): number | null {
  const z = volumeStatistics(daily, 20)?.zScore ?? null;
  if (z === null) return null;
  if (z >= 2) return 1;
  if (z >= 1) return 0.8;
  if (z >= 0) return 0.6;
  return Math.max(0.2, 0.6 + z * 0.2);
}

function oversoldScore(daily: TimeframeDataset): number {
  const rsi = seriesValue(daily, 'rsi_14');
  if (rsi === null) return 0.5;
  if (rsi <= 30) return 1;
  if (rsi <= 40) return 0.8;
  if (rsi <= 50) return 0.6;
  return Math.max(0.2, (100 - rsi) / 50);
}

/**
 * Monthly momentum, daily volatility, daily volume and daily RSI blended
 * 35/25/25/15, then scaled by how close the reading is to a scheduled run
 * time (floor 0.5).
 */
export class TimedBottomScoreIndicator extends BaseIndicator {
  readonly name = 'm_timed_bottom_score';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1M', '1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const daily = inputs.dataset('1D');
    const base = weightedComponents([
      { value: momentumScore(inputs.dataset('1M')), weight: 0.35 },
      { value: volatilityScore(daily), weight: 0.25 },
      { value: volumeScore(daily), weight: 0.25 },
      { value: oversoldScore(daily), weight: 0.15 },
    ]);
    return base === null ? null : base * timeOfDayWeight(this.now(), 0.5);
  }
}
