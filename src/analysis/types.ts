import type { SideAnalysis } from '@/composer/types';
import type {
  CacheStatusEntry,
  PriceStatistics,
  RefreshReport,
  Timeframe,
  VolumeStatistics,
} from '@/market/types';

export interface MarketContext {
  timeframe: Timeframe;
  lookbackPeriods: number;
  currentPrice: number | null;
  priceStatistics: PriceStatistics | null;
  volumeStatistics: VolumeStatistics | null;
  error?: string;
}

export interface CalculationInfo {
  startTime: string;
  endTime: string;
  durationSeconds: number;
  /** whether a refresh of all timeframes was requested for this run */
  dataRefreshed: boolean;
  refresh: RefreshReport | null;
}

export interface AnalysisRun {
  status: 'complete';
  runId: string;
  symbol: string;
  calculation: CalculationInfo;
  bottom: SideAnalysis;
  top: SideAnalysis;
  marketContext: MarketContext;
  cacheStatus: Record<string, CacheStatusEntry>;
}

export interface AnalysisRunFailure {
  status: 'failed';
  runId: string;
  symbol: string;
  error: string;
  calculation: CalculationInfo;
}

export type AnalysisOutcome = AnalysisRun | AnalysisRunFailure;

export function isRunFailure(outcome: AnalysisOutcome): outcome is AnalysisRunFailure {
  return outcome.status === 'failed';
}
