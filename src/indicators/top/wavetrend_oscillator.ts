import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, ewmMean, latest, linearSlope, tail } from '@/market/series';
import type { Timeframe } from '@/market/types';

const CHANNEL_LENGTH = 10;
const AVERAGE_LENGTH = 21;
const MIN_BARS = 50;
const DIVERGENCE_BARS = 10;
const DIVERGENCE_BOOST = 1.2;

/** WaveTrend (channel index smoothed twice) over daily closes. */
export function wavetrend(values: readonly number[]): number[] {
  const esa = ewmMean(values, CHANNEL_LENGTH);
  const deviation = ewmMean(
    values.map((value, i) => Math.abs(value - esa[i])),
    CHANNEL_LENGTH
  );
  const channelIndex = values.map((value, i) => {
    const ci = (value - esa[i]) / (0.015 * deviation[i]);
    return Number.isFinite(ci) ? ci : 0;
  });
  return ewmMean(channelIndex, AVERAGE_LENGTH);
}

/**
 * WaveTrend oscillator, roughly -100..100. Boosted by 20% on a bearish
 * divergence: price trending up over the last ten bars while WaveTrend
 * trends down.
 */
export class WavetrendOscillatorIndicator extends BaseIndicator {
  readonly name = 'wavetrend_oscillator';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const values = closes(inputs.dataset('1D'));
    if (values.length < MIN_BARS) return null;

    const wave = wavetrend(values);
    const current = latest(wave);
    if (current === null) return null;

    const priceSlope = linearSlope(tail(values, DIVERGENCE_BARS)) ?? 0;
    const waveSlope = linearSlope(tail(wave, DIVERGENCE_BARS)) ?? 0;
    if (priceSlope > 0 && waveSlope < 0) {
      this.logger.debug({ current }, 'Bearish divergence');
      return current * DIVERGENCE_BOOST;
    }
    return current;
  }
}
