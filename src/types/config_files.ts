/**
 * On-disk shapes of config/app.json and config/indicators.json.
 * Keep in sync with schemas/app.schema.json and schemas/indicators.schema.json.
 */

import type { ProviderType } from '@/core/env';
import type { Timeframe } from '@/market/types';

export type ZeroWeightFailurePolicy = 'count' | 'exclude';

export interface AppConfigFile {
  symbol: string;
  timeframes: Timeframe[];
  bar_count: Partial<Record<Timeframe, number>>;
  cache: {
    max_age_minutes: number;
  };
  market_context: {
    timeframe: Timeframe;
    lookback_periods: number;
  };
  composer: {
    zero_weight_failures: ZeroWeightFailurePolicy;
  };
  provider: {
    type: ProviderType;
    base_url?: string;
    min_request_interval_ms?: number;
    max_retries?: number;
    initial_backoff_ms?: number;
    data_dir?: string;
  };
  scheduler: {
    times: string[];
    timezone: string;
  };
  storage: {
    database_path: string;
    output_dir: string;
  };
}

export interface IndicatorEntryFile {
  lower: number;
  upper: number;
  weight: number;
}

export interface IndicatorsFile {
  bottom: Record<string, IndicatorEntryFile>;
  top: Record<string, IndicatorEntryFile>;
}
