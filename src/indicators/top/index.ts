import type { IndicatorContext } from '../base';
import type { Indicator } from '../types';
import { BbwpIndicator } from './bbwp';
import { Extension5DIndicator } from './extension_5d';
import { MmdIndicator } from './mmd';
import { MonthlyRsiOverheatIndicator } from './monthly_rsi_overheat';
import { PiCycleIndicator } from './pi_cycle';
import { TimedTopScoreIndicator } from './timed_top_score';
import { Volume3DIndicator } from './volume_3d';
import { WavetrendOscillatorIndicator } from './wavetrend_oscillator';

export function createTopRoster(context: IndicatorContext): Indicator[] {
  return [
    new PiCycleIndicator(context),
    new BbwpIndicator(context),
    new Volume3DIndicator(context),
    new MmdIndicator(context),
    new MonthlyRsiOverheatIndicator(context),
    new Extension5DIndicator(context),
    new WavetrendOscillatorIndicator(context),
    new TimedTopScoreIndicator(context),
  ];
}
