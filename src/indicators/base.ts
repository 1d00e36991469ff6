/**
 * Base class for concrete indicators.
 *
 * Subclasses declare the timeframes and derived series they read and
 * implement `compute` as a pure function of those datasets. Loading,
 * normalization and failure capture live here so every indicator reports
 * the same way.
 */

import { createChildLogger, type Logger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { isFiniteNumber } from '@/utils/number';
import { systemClock, toIsoTimestamp, type Clock } from '@/core/time';
import type { Timeframe, TimeframeDataset } from '@/market/types';
import { DataUnavailableError } from './errors';
import { isDegenerate, normalize } from './normalize';
import type { Indicator, IndicatorConfig, IndicatorResult, IndicatorSpec, Side } from './types';

/** What an indicator needs from the timeframe cache. */
export interface DatasetSource {
  get(timeframe: Timeframe): Promise<TimeframeDataset | null>;
  fetchedAt(timeframe: Timeframe): number | null;
}

export interface IndicatorContext {
  cache: DatasetSource;
  config: IndicatorConfig;
  clock?: Clock;
}

export class IndicatorInputs {
  constructor(private readonly datasets: ReadonlyMap<Timeframe, TimeframeDataset>) {}

  dataset(timeframe: Timeframe): TimeframeDataset {
    const dataset = this.datasets.get(timeframe);
    if (!dataset) {
      throw new DataUnavailableError(`data unavailable: ${timeframe}`, timeframe);
    }
    return dataset;
  }
}

interface LoadedInputs {
  inputs: IndicatorInputs;
  freshestAt: number | null;
}

export abstract class BaseIndicator implements Indicator {
  abstract readonly name: string;
  abstract readonly side: Side;
  protected abstract readonly timeframes: readonly Timeframe[];
  protected readonly requiredSeries: Partial<Record<Timeframe, readonly string[]>> = {};

  private cachedLogger: Logger | null = null;

  constructor(protected readonly context: IndicatorContext) {}

  /**
   * Raw formula value, or null when a dataset is shorter than the lookback.
   */
  protected abstract compute(inputs: IndicatorInputs): number | null;

  protected get logger(): Logger {
    if (!this.cachedLogger) {
      this.cachedLogger = createChildLogger(`indicator:${this.side}:${this.name}`);
    }
    return this.cachedLogger;
  }

  protected now(): number {
    return (this.context.clock ?? systemClock)();
  }

  async rawValue(): Promise<number | null> {
    let loaded: LoadedInputs;
    try {
      loaded = await this.loadInputs();
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        return null;
      }
      throw error;
    }
    return this.computeChecked(loaded.inputs);
  }

  async fullResult(): Promise<IndicatorResult> {
    const now = this.now();

    let spec: IndicatorSpec;
    try {
      spec = this.context.config.spec(this.side, this.name);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ error: message }, 'Indicator is misconfigured');
      return this.failure(message, 0, null, now);
    }

    let loaded: LoadedInputs | null = null;
    try {
      loaded = await this.loadInputs();
      const raw = this.computeChecked(loaded.inputs);
      const timestamp = toIsoTimestamp(loaded.freshestAt ?? now);

      if (raw === null) {
        return this.failure('insufficient data for lookback window', spec.weight, spec.bounds, now, timestamp);
      }

      const normalizedScore = normalize(raw, spec.bounds);
      const result: IndicatorResult = {
        name: this.name,
        side: this.side,
        rawValue: raw,
        normalizedScore,
        weight: spec.weight,
        bounds: spec.bounds,
        timestamp,
      };
      if (normalizedScore === null && isDegenerate(spec.bounds)) {
        result.error = 'degenerate bounds';
      }

      this.logger.debug({ raw, normalizedScore, weight: spec.weight }, 'Indicator calculated');
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ error: message }, 'Indicator calculation failed');
      const timestamp = loaded?.freshestAt != null ? toIsoTimestamp(loaded.freshestAt) : undefined;
      return this.failure(message, spec.weight, spec.bounds, now, timestamp);
    }
  }

  private computeChecked(inputs: IndicatorInputs): number | null {
    const raw = this.compute(inputs);
    if (raw !== null && !isFiniteNumber(raw)) {
      throw new Error(`non-finite raw value: ${raw}`);
    }
    return raw;
  }

  private async loadInputs(): Promise<LoadedInputs> {
    const datasets = new Map<Timeframe, TimeframeDataset>();
    let freshestAt: number | null = null;

    for (const timeframe of this.timeframes) {
      const dataset = await this.context.cache.get(timeframe);
      if (!dataset) {
        throw new DataUnavailableError(`data unavailable: ${timeframe}`, timeframe);
      }

      for (const series of this.requiredSeries[timeframe] ?? []) {
        if (!Object.prototype.hasOwnProperty.call(dataset.series, series)) {
          throw new DataUnavailableError(`missing derived series ${series} on ${timeframe}`, timeframe);
        }
      }

      datasets.set(timeframe, dataset);
      const fetchedAt = this.context.cache.fetchedAt(timeframe);
      if (fetchedAt !== null && (freshestAt === null || fetchedAt > freshestAt)) {
        freshestAt = fetchedAt;
      }
    }

    return { inputs: new IndicatorInputs(datasets), freshestAt };
  }

  private failure(
    error: string,
    weight: number,
    bounds: IndicatorResult['bounds'],
    now: number,
    timestamp: string = toIsoTimestamp(now)
  ): IndicatorResult {
    return {
      name: this.name,
      side: this.side,
      rawValue: null,
      normalizedScore: null,
      weight,
      bounds,
      timestamp,
      error,
    };
  }
}
