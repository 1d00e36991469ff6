import { BaseIndicator, type IndicatorInputs } from '../base';
import { weightedComponents } from '../timing';
import { ewmMean, latest, sampleStd, tail } from '@/market/series';
import type { OhlcvBar, Timeframe, TimeframeDataset } from '@/market/types';

const STOCH_PERIOD = 14;
const AD_MIN_BARS = 20;
const AD_LOOKBACK = 10;
const MACD_WINDOW = 20;

function definedValues(dataset: TimeframeDataset, name: string): number[] {
  return (dataset.series[name] ?? []).filter((value): value is number => value !== null);
}

function stochasticRsi(rsi: readonly number[]): number | null {
  if (rsi.length < STOCH_PERIOD) return null;
  const window = tail(rsi, STOCH_PERIOD);
  const low = Math.min(...window);
  const high = Math.max(...window);
  if (high === low) return 0.5;
  return (window[window.length - 1] - low) / (high - low);
}

function smoothedRsi(rsi: readonly number[]): number | null {
  if (rsi.length < 10) return null;
  return (latest(ewmMean(rsi, 9)) ?? 0) / 100;
}

/** TDI green line: RSI smoothed twice. */
function tdiGreen(rsi: readonly number[]): number | null {
  if (rsi.length < 20) return null;
  return (latest(ewmMean(ewmMean(rsi, 13), 8)) ?? 0) / 100;
}

function accumulationDistribution(bars: readonly OhlcvBar[]): number | null {
  if (bars.length < AD_MIN_BARS) return null;

  const line: number[] = [];
  let running = 0;
  for (const bar of bars) {
    const range = bar.high - bar.low;
    const multiplier = range === 0 ? 0 : (bar.close - bar.low - (bar.high - bar.close)) / range;
    running += multiplier * bar.volume;
    line.push(running);
  }

  const current = line[line.length - 1];
  const past = line[line.length - AD_LOOKBACK];
  const change = past !== 0 ? (current - past) / Math.abs(past) : 0;
  return (Math.tanh(change / 10) + 1) / 2;
}

function macdPressure(histogram: readonly number[]): number | null {
  const current = latest(histogram);
  if (current === null) return null;
  const std = sampleStd(tail(histogram, MACD_WINDOW));
  if (std === 0) return null;
  return (Math.tanh(current / std) + 1) / 2;
}

/**
 * Blend of five oscillators, each scaled to [0, 1]: monthly stochastic RSI,
 * smoothed RSI, TDI green line and accumulation/distribution, plus the
 * daily MACD histogram. Components without enough history are left out.
 * Reported as 1 minus the blend, so a washed-out market scores high.
 */
export class WavefrontIndicator extends BaseIndicator {
  readonly name = 'w_wavefront';
  readonly side = 'bottom' as const;
  protected readonly timeframes: readonly Timeframe[] = ['1M', '1D'];
  protected readonly requiredSeries = { '1M': ['rsi_14'] };

  protected compute(inputs: IndicatorInputs): number | null {
    const monthly = inputs.dataset('1M');
    const rsi = definedValues(monthly, 'rsi_14');

    const components = [
      stochasticRsi(rsi),
      smoothedRsi(rsi),
      macdPressure(definedValues(inputs.dataset('1D'), 'macd_histogram')),
      tdiGreen(rsi),
      accumulationDistribution(monthly.bars),
    ].map((value) => ({ value, weight: 0.2 }));

    const blend = weightedComponents(components);
    if (blend === null) return null;

    this.logger.debug({ components: components.map((c) => c.value) }, 'Wavefront components');
    return 1 - blend;
  }
}
