import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, sma } from '@/market/series';
import type { Timeframe } from '@/market/types';

const LONG_PERIOD = 471;
const SHORT_PERIOD = 150;
const SHORT_MULTIPLIER = 0.745;
const MIN_LONG_PERIOD = 50;

/**
 * Pi Cycle Low: long SMA over 0.745x the short SMA. Crosses 1 when the
 * scaled short average dips under the long one. Windows shrink
 * proportionally when history is shorter than 471 bars.
 */
export class PiCycleLowIndicator extends BaseIndicator {
  readonly name = 'pi_cycle_low';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const values = closes(inputs.dataset('1D'));
    const longPeriod = Math.min(LONG_PERIOD, values.length);
    if (longPeriod < MIN_LONG_PERIOD) return null;
    const shortPeriod = Math.round((SHORT_PERIOD * longPeriod) / LONG_PERIOD);

    const longSma = sma(values, longPeriod);
    const shortSma = sma(values, shortPeriod);
    if (longSma === null || shortSma === null || shortSma === 0) return null;

    return longSma / (SHORT_MULTIPLIER * shortSma);
  }
}
