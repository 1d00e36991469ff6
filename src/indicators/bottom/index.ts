import type { IndicatorContext } from '../base';
import type { Indicator } from '../types';
import { CmVixFixIndicator } from './cm_vix_fix';
import { GaussianChannelIndicator } from './gaussian_channel';
import { Mmd3DIndicator } from './mmd_3d';
import { PiCycleLowIndicator } from './pi_cycle_low';
import { SupertrendIndicator } from './supertrend';
import { TimedBottomScoreIndicator } from './timed_bottom_score';
import { VolumeBurst2DIndicator } from './volume_burst_2d';
import { WavefrontIndicator } from './wavefront';
import { WeeklyRsiOversoldIndicator } from './weekly_rsi_oversold';

export function createBottomRoster(context: IndicatorContext): Indicator[] {
  return [
    new VolumeBurst2DIndicator(context),
    new CmVixFixIndicator(context),
    new PiCycleLowIndicator(context),
    new SupertrendIndicator(context),
    new Mmd3DIndicator(context),
    new WeeklyRsiOversoldIndicator(context),
    new GaussianChannelIndicator(context),
    new WavefrontIndicator(context),
    new TimedBottomScoreIndicator(context),
  ];
}
