import { BaseIndicator, type IndicatorInputs } from '../base';
import { timeOfDayWeight, weightedComponents } from '../timing';
import {
  closes,
  linearSlope,
  momentum,
  seriesValue,
  tail,
  volatilityRatio,
  volumes,
} from '@/market/series';
import type { Timeframe, TimeframeDataset } from '@/market/types';

const MIN_MONTHLY_BARS = 10;
const DISTRIBUTION_BARS = 6;
const MIN_DAILY_BARS = 30;

/** Rising prices on falling volume over the last six months read as distribution. */
function distributionScore(monthly: TimeframeDataset): number | null {
  if (monthly.bars.length < MIN_MONTHLY_BARS) return null;
  const priceTrend = linearSlope(tail(closes(monthly), DISTRIBUTION_BARS)) ?? 0;
  const volumeTrend = linearSlope(tail(volumes(monthly), DISTRIBUTION_BARS)) ?? 0;

  if (priceTrend > 0 && volumeTrend < 0) return 0.9;
  if (priceTrend > 0 && volumeTrend > 0) return 0.4;
  if (priceTrend < 0 && volumeTrend > 0) return 0.7;
  return 0.5;
}

function exhaustionScore(daily: TimeframeDataset, weekly: TimeframeDataset): number | null {
  const scores: number[] = [];

  const dailyChange = momentum(daily, 14);
  if (dailyChange !== null) {
    if (dailyChange < -10) scores.push(0.8);
    else if (dailyChange < 5) scores.push(0.6);
    else if (dailyChange < 15) scores.push(0.4);
    else scores.push(0.2);
  }

  const weeklyChange = momentum(weekly, 4);
  if (weeklyChange !== null) {
    if (weeklyChange < -5) scores.push(0.9);
    else if (weeklyChange < 10) scores.push(0.6);
    else scores.push(0.3);
  }

  if (scores.length === 0) return null;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

function euphoriaScore(daily: TimeframeDataset): number {
  const rsi = seriesValue(daily, 'rsi_14');
  if (rsi === null) return 0.5;
  if (rsi >= 80) return 1;
  if (rsi >= 70) return 0.8;
  if (rsi >= 60) return 0.6;
  if (rsi >= 50) return 0.4;
  return 0.2;
}

function expansionScore(daily: TimeframeDataset): number | null {
  const values = closes(daily);
  if (values.length < MIN_DAILY_BARS) return null;
  const ratio = volatilityRatio(values);
  if (ratio === null) return 0.5;
  if (ratio >= 2) return 0.8;
  if (ratio >= 1.5) return 0.6;
  if (ratio >= 1.2) return 0.5;
  return 0.3;
}

/**
 * Monthly distribution, daily and weekly momentum exhaustion, daily RSI
 * euphoria and volatility expansion blended 30/30/25/15, then scaled by
 * proximity to a scheduled run time (floor 0.7).
 */
export class TimedTopScoreIndicator extends BaseIndicator {
  readonly name = 'm_timed_top_score';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1M', '1D', '1W'];

  protected compute(inputs: IndicatorInputs): number | null {
    const daily = inputs.dataset('1D');
    const base = weightedComponents([
      { value: distributionScore(inputs.dataset('1M')), weight: 0.3 },
      { value: exhaustionScore(daily, inputs.dataset('1W')), weight: 0.3 },
      { value: euphoriaScore(daily), weight: 0.25 },
      { value: expansionScore(daily), weight: 0.15 },
    ]);
    return base === null ? null : base * timeOfDayWeight(this.now(), 0.7);
  }
}
