/**
 * Derived indicator series computed once per dataset at fetch time.
 * technicalindicators returns arrays shorter than the input (warm-up is
 * dropped), so every output is left-padded with null to align with bars.
 */

import { ATR, BollingerBands, MACD, RSI, SMA } from 'technicalindicators';
import type { OhlcvBar, Series } from './types';

export const SUPERTREND_PERIOD = 10;
export const SUPERTREND_MULTIPLIER = 3;

function alignToBars(values: readonly (number | undefined)[], length: number): (number | null)[] {
  const padding = Math.max(0, length - values.length);
  const aligned: (number | null)[] = new Array<number | null>(padding).fill(null);
  return aligned.concat(
    values.slice(Math.max(0, values.length - length)).map((value) => value ?? null)
  );
}

export interface SupertrendSeries {
  line: (number | null)[];
  direction: (number | null)[];
}

/**
 * SuperTrend over ATR bands. Direction is 1 in an uptrend, -1 in a downtrend.
 */
export function supertrend(
  bars: readonly OhlcvBar[],
  period: number = SUPERTREND_PERIOD,
  multiplier: number = SUPERTREND_MULTIPLIER
): SupertrendSeries {
  const length = bars.length;
  const atr = alignToBars(
    ATR.calculate({
      high: bars.map((b) => b.high),
      low: bars.map((b) => b.low),
      close: bars.map((b) => b.close),
      period,
    }),
    length
  );

  const line: (number | null)[] = new Array<number | null>(length).fill(null);
  const direction: (number | null)[] = new Array<number | null>(length).fill(null);

  let finalUpper = 0;
  let finalLower = 0;
  let prevDirection = 1;
  let started = false;

  for (let i = 0; i < length; i++) {
    const range = atr[i];
    if (range === null) continue;

    const bar = bars[i];
    const hl2 = (bar.high + bar.low) / 2;
    const basicUpper = hl2 + multiplier * range;
    const basicLower = hl2 - multiplier * range;

    if (!started) {
      finalUpper = basicUpper;
      finalLower = basicLower;
      prevDirection = bar.close >= hl2 ? 1 : -1;
      started = true;
    } else {
      const prevClose = bars[i - 1].close;
      finalUpper = basicUpper < finalUpper || prevClose > finalUpper ? basicUpper : finalUpper;
      finalLower = basicLower > finalLower || prevClose < finalLower ? basicLower : finalLower;
      if (prevDirection === 1 && bar.close < finalLower) {
        prevDirection = -1;
      } else if (prevDirection === -1 && bar.close > finalUpper) {
        prevDirection = 1;
      }
    }

    direction[i] = prevDirection;
    line[i] = prevDirection === 1 ? finalLower : finalUpper;
  }

  return { line, direction };
}

/**
 * Standard derived series attached to every dataset a provider returns.
 */
export function buildDerivedSeries(bars: readonly OhlcvBar[]): Record<string, Series> {
  const length = bars.length;
  const closeValues = bars.map((b) => b.close);

  const bands = BollingerBands.calculate({ period: 20, values: closeValues, stdDev: 2 });
  const trend = supertrend(bars);

  return {
    sma_20: alignToBars(SMA.calculate({ period: 20, values: closeValues }), length),
    rsi_14: alignToBars(RSI.calculate({ period: 14, values: closeValues }), length),
    bb_upper: alignToBars(bands.map((b) => b.upper), length),
    bb_middle: alignToBars(bands.map((b) => b.middle), length),
    bb_lower: alignToBars(bands.map((b) => b.lower), length),
    bb_width: alignToBars(
      bands.map((b) => (b.middle !== 0 ? (b.upper - b.lower) / b.middle : 0)),
      length
    ),
    atr_10: alignToBars(
      ATR.calculate({
        high: bars.map((b) => b.high),
        low: bars.map((b) => b.low),
        close: closeValues,
        period: SUPERTREND_PERIOD,
      }),
      length
    ),
    // MACD(12, 26, 9); the histogram stays null until the signal line exists
    macd_histogram: alignToBars(
      MACD.calculate({
        values: closeValues,
        fastPeriod: 12,
        slowPeriod: 26,
        signalPeriod: 9,
        SimpleMAOscillator: false,
        SimpleMASignal: false,
      }).map((point) => point.histogram),
      length
    ),
    supertrend: trend.line,
    supertrend_direction: trend.direction,
  };
}
