import { BaseIndicator, type IndicatorInputs } from '../base';
import { closes, sma } from '@/market/series';
import type { Timeframe } from '@/market/types';

const SHORT_PERIOD = 111;
const LONG_PERIOD = 350;
const LONG_MULTIPLIER = 2;
const MIN_LONG_PERIOD = 100;

/**
 * Pi Cycle Top: SMA(111) over 2x SMA(350). Reaches 1 at the classic top
 * cross. Windows shrink proportionally on shorter history.
 */
export class PiCycleIndicator extends BaseIndicator {
  readonly name = 'pi_cycle';
  readonly side = 'top' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1D'];

  protected compute(inputs: IndicatorInputs): number | null {
    const values = closes(inputs.dataset('1D'));
    const longPeriod = Math.min(LONG_PERIOD, values.length);
    if (longPeriod < MIN_LONG_PERIOD) return null;
    const shortPeriod = Math.round((SHORT_PERIOD * longPeriod) / LONG_PERIOD);

    const shortSma = sma(values, shortPeriod);
    const longSma = sma(values, longPeriod);
    if (shortSma === null || longSma === null || longSma === 0) return null;

    return shortSma / (LONG_MULTIPLIER * longSma);
  }
}
