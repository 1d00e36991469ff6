/**
 * In-memory per-timeframe dataset cache with age-based expiry.
 *
 * Entries are replaced whole on refresh and never mutated. A failed refresh
 * leaves the previous entry in place and serves it. Concurrent refreshes of
 * the same timeframe share one provider call.
 */

import { createChildLogger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { roundTo } from '@/utils/number';
import {
  ageInMinutes,
  isWithinMaxAge,
  minutesToMs,
  systemClock,
  toIsoTimestamp,
  type Clock,
} from '@/core/time';
import type { MarketDataProvider } from '@/providers/types';
import type {
  CacheEntry,
  CacheStatusEntry,
  RefreshReport,
  Timeframe,
  TimeframeDataset,
} from './types';

const logger = createChildLogger('timeframe_cache');

export interface TimeframeCacheOptions {
  timeframes: readonly Timeframe[];
  barCount: Readonly<Record<Timeframe, number>>;
  maxAgeMinutes: number;
  clock?: Clock;
}

interface RefreshOutcome {
  dataset: TimeframeDataset | null;
  refreshed: boolean;
}

export class TimeframeCache {
  private readonly entries = new Map<Timeframe, CacheEntry>();
  private readonly inflight = new Map<Timeframe, Promise<RefreshOutcome>>();
  private readonly clock: Clock;
  private readonly maxAgeMs: number;

  constructor(
    private readonly provider: MarketDataProvider,
    private readonly options: TimeframeCacheOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.maxAgeMs = minutesToMs(options.maxAgeMinutes);
  }

  get timeframes(): readonly Timeframe[] {
    return this.options.timeframes;
  }

  /**
   * Return the dataset for `timeframe`, fetching when the entry is missing,
   * expired or `forceRefresh` is set. Resolves null when nothing is available.
   */
  async get(timeframe: Timeframe, forceRefresh: boolean = false): Promise<TimeframeDataset | null> {
    if (!forceRefresh) {
      const entry = this.entries.get(timeframe);
      if (entry && isWithinMaxAge(entry.fetchedAt, this.maxAgeMs, this.clock())) {
        logger.debug({ timeframe }, 'Cache hit');
        return entry.dataset;
      }
    }

    const outcome = await this.refresh(timeframe);
    return outcome.dataset;
  }

  fetchedAt(timeframe: Timeframe): number | null {
    return this.entries.get(timeframe)?.fetchedAt ?? null;
  }

  /**
   * Force-refresh every configured timeframe, one after another.
   * Timeframes whose fetch failed keep serving their previous entry.
   */
  async refreshAll(): Promise<RefreshReport> {
    const refreshed: Timeframe[] = [];
    const failed: Timeframe[] = [];

    for (const timeframe of this.options.timeframes) {
      const outcome = await this.refresh(timeframe);
      if (outcome.refreshed) {
        refreshed.push(timeframe);
      } else {
        failed.push(timeframe);
      }
    }

    const report: RefreshReport = { refreshed, failed, success: failed.length === 0 };
    if (report.success) {
      logger.info({ refreshed }, 'All timeframes refreshed');
    } else {
      logger.warn({ refreshed, failed }, 'Some timeframes failed to refresh');
    }
    return report;
  }

  status(): Record<string, CacheStatusEntry> {
    const now = this.clock();
    const status: Record<string, CacheStatusEntry> = {};

    for (const timeframe of this.options.timeframes) {
      const entry = this.entries.get(timeframe);
      status[timeframe] = entry
        ? {
            cached: true,
            lastUpdate: toIsoTimestamp(entry.fetchedAt),
            ageMinutes: roundTo(ageInMinutes(entry.fetchedAt, now), 1),
            valid: isWithinMaxAge(entry.fetchedAt, this.maxAgeMs, now),
          }
        : { cached: false, lastUpdate: null, ageMinutes: null, valid: false };
    }

    return status;
  }

  private refresh(timeframe: Timeframe): Promise<RefreshOutcome> {
    const pending = this.inflight.get(timeframe);
    if (pending) {
      logger.debug({ timeframe }, 'Joining in-flight refresh');
      return pending;
    }

    const task = this.fetchAndStore(timeframe).finally(() => {
      this.inflight.delete(timeframe);
    });
    this.inflight.set(timeframe, task);
    return task;
  }

  private async fetchAndStore(timeframe: Timeframe): Promise<RefreshOutcome> {
    let dataset: TimeframeDataset | null = null;
    let failure: string;

    try {
      dataset = await this.provider.fetch(timeframe, this.options.barCount[timeframe]);
      failure = dataset ? '' : 'provider returned no data';
      if (dataset && dataset.timeframe !== timeframe) {
        failure = `provider returned ${dataset.timeframe} data for ${timeframe}`;
        dataset = null;
      }
    } catch (error) {
      failure = errorMessage(error);
    }

    if (dataset) {
      const fetchedAt = this.clock();
      this.entries.set(timeframe, { dataset, fetchedAt });
      logger.info(
        { timeframe, bars: dataset.bars.length, fetchedAt: toIsoTimestamp(fetchedAt) },
        'Timeframe refreshed'
      );
      return { dataset, refreshed: true };
    }

    const stale = this.entries.get(timeframe);
    if (stale && this.clock() >= stale.fetchedAt) {
      logger.warn(
        { timeframe, error: failure, fetchedAt: toIsoTimestamp(stale.fetchedAt) },
        'Refresh failed, serving previous entry'
      );
      return { dataset: stale.dataset, refreshed: false };
    }

    logger.warn({ timeframe, error: failure }, 'Refresh failed, no data available');
    return { dataset: null, refreshed: false };
  }
}
