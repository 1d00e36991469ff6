/**
 * Runs one complete analysis: optional refresh, both composers, market
 * context and cache status, packaged as a single AnalysisRun.
 */

import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { roundTo } from '@/utils/number';
import { contentHash } from '@/core/hash';
import { getRunId, systemClock, toIsoTimestamp, type Clock } from '@/core/time';
import type { Composer } from '@/composer/composer';
import { isCompositeFailure, type SideAnalysis } from '@/composer/types';
import { priceStatistics, volumeStatistics } from '@/market/series';
import type { TimeframeCache } from '@/market/timeframe_cache';
import type { CacheStatusEntry, RefreshReport, Timeframe } from '@/market/types';
import type { MarketDataProvider } from '@/providers/types';
import type { AnalysisOutcome, CalculationInfo, MarketContext } from './types';

const logger = createChildLogger('analysis_coordinator');

export interface CoordinatorDependencies {
  symbol: string;
  cache: TimeframeCache;
  provider: MarketDataProvider;
  bottom: Composer;
  top: Composer;
  marketContext: { timeframe: Timeframe; lookbackPeriods: number };
  clock?: Clock;
}

export interface RunOptions {
  refreshData?: boolean;
}

function summarize(analysis: SideAnalysis): Record<string, unknown> {
  if (isCompositeFailure(analysis)) {
    return { status: analysis.status, error: analysis.error };
  }
  return {
    status: analysis.status,
    score: analysis.compositeScore === null ? null : roundTo(analysis.compositeScore, 3),
    strength: analysis.interpretation?.strength ?? null,
    successRate: roundTo(analysis.dataQuality.successRate, 3),
  };
}

export class AnalysisCoordinator {
  private readonly clock: Clock;

  constructor(private readonly deps: CoordinatorDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  cacheStatus(): Record<string, CacheStatusEntry> {
    return this.deps.cache.status();
  }

  /**
   * Never rejects; an unexpected error yields an AnalysisRunFailure.
   */
  async run(options: RunOptions = {}): Promise<AnalysisOutcome> {
    const refreshData = options.refreshData ?? true;
    const start = this.clock();
    const runId = getRunId(new Date(start), contentHash({ symbol: this.deps.symbol, start }));
    let refresh: RefreshReport | null = null;

    const calculation = (): CalculationInfo => {
      const end = this.clock();
      return {
        startTime: toIsoTimestamp(start),
        endTime: toIsoTimestamp(end),
        durationSeconds: (end - start) / 1000,
        dataRefreshed: refreshData,
        refresh,
      };
    };

    logger.info({ runId, symbol: this.deps.symbol, refreshData }, 'Starting analysis run');

    try {
      if (refreshData) {
        refresh = await this.refresh();
      }

      const bottom = await this.deps.bottom.calculateCompleteAnalysis();
      const top = await this.deps.top.calculateCompleteAnalysis();
      const marketContext = await this.marketContext();
      const cacheStatus = this.deps.cache.status();
      const info = calculation();

      logger.info(
        {
          runId,
          durationSeconds: info.durationSeconds,
          bottom: summarize(bottom),
          top: summarize(top),
          currentPrice: marketContext.currentPrice,
        },
        'Analysis run complete'
      );

      return {
        status: 'complete',
        runId,
        symbol: this.deps.symbol,
        calculation: info,
        bottom,
        top,
        marketContext,
        cacheStatus,
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ runId, error: message }, 'Analysis run failed');
      return {
        status: 'failed',
        runId,
        symbol: this.deps.symbol,
        error: message,
        calculation: calculation(),
      };
    }
  }

  private async refresh(): Promise<RefreshReport | null> {
    try {
      const report = await this.deps.cache.refreshAll();
      if (!report.success) {
        logger.warn({ failed: report.failed }, 'Continuing with cached data for failed timeframes');
      }
      return report;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Data refresh failed, continuing with cached data');
      return null;
    }
  }

  private async marketContext(): Promise<MarketContext> {
    const { timeframe, lookbackPeriods } = this.deps.marketContext;
    const context: MarketContext = {
      timeframe,
      lookbackPeriods,
      currentPrice: null,
      priceStatistics: null,
      volumeStatistics: null,
    };
    const errors: string[] = [];

    try {
      context.currentPrice = await this.deps.provider.currentPrice();
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ error: message }, 'Current price unavailable');
      errors.push(message);
    }

    try {
      const dataset = await this.deps.cache.get(timeframe);
      if (dataset) {
        context.priceStatistics = priceStatistics(dataset, lookbackPeriods);
        context.volumeStatistics = volumeStatistics(dataset, lookbackPeriods);
      } else {
        errors.push(`data unavailable: ${timeframe}`);
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ error: message }, 'Market statistics unavailable');
      errors.push(message);
    }

    return errors.length > 0 ? { ...context, error: errors.join('; ') } : context;
  }
}
