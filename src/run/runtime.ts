/**
 * Wires one process worth of collaborators from an AppConfig:
 * provider -> cache -> rosters -> composers -> coordinator.
 */

import type { AppConfig } from '@/core/config';
import { systemClock, type Clock } from '@/core/time';
import { AnalysisCoordinator } from '@/analysis/coordinator';
import { Composer } from '@/composer/composer';
import type { IndicatorContext } from '@/indicators/base';
import { createBottomRoster } from '@/indicators/bottom';
import { createTopRoster } from '@/indicators/top';
import type { Indicator } from '@/indicators/types';
import { TimeframeCache } from '@/market/timeframe_cache';
import { createProvider } from '@/providers/registry';
import type { MarketDataProvider } from '@/providers/types';

export interface Runtime {
  config: AppConfig;
  provider: MarketDataProvider;
  cache: TimeframeCache;
  bottom: Composer;
  top: Composer;
  coordinator: AnalysisCoordinator;
}

export interface RuntimeOverrides {
  provider?: MarketDataProvider;
  clock?: Clock;
  bottomRoster?: (context: IndicatorContext) => Indicator[];
  topRoster?: (context: IndicatorContext) => Indicator[];
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const clock = overrides.clock ?? systemClock;
  const provider = overrides.provider ?? createProvider(config);

  const cache = new TimeframeCache(provider, {
    timeframes: config.timeframes,
    barCount: config.barCount,
    maxAgeMinutes: config.cache.maxAgeMinutes,
    clock,
  });

  const context: IndicatorContext = { cache, config: config.indicators, clock };
  const composerOptions = { zeroWeightFailures: config.composer.zeroWeightFailures, clock };

  const bottom = new Composer(
    'bottom',
    (overrides.bottomRoster ?? createBottomRoster)(context),
    config.indicators,
    composerOptions
  );
  const top = new Composer(
    'top',
    (overrides.topRoster ?? createTopRoster)(context),
    config.indicators,
    composerOptions
  );

  const coordinator = new AnalysisCoordinator({
    symbol: config.symbol,
    cache,
    provider,
    bottom,
    top,
    marketContext: config.marketContext,
    clock,
  });

  return { config, provider, cache, bottom, top, coordinator };
}
