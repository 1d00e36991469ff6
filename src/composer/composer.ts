/**
 * Per-side composite engine: evaluates a roster of indicators in order,
 * aggregates the valid normalized scores by weight and interprets the result.
 */

import { createChildLogger, type Logger } from '@/utils/logger';
import { errorMessage } from '@/utils/errors';
import { systemClock, toIsoTimestamp, type Clock } from '@/core/time';
import { mean, populationStd } from '@/market/series';
import type { Indicator, IndicatorConfig, IndicatorResult, Side } from '@/indicators/types';
import type { ZeroWeightFailurePolicy } from '@/types/config_files';
import { interpretScore } from './interpretation';
import type {
  DataQuality,
  Interpretation,
  ScoreStatistics,
  SideAnalysis,
  ValidIndicatorScore,
  WeightedScore,
} from './types';

export const NO_VALID_INDICATORS = 'No valid indicators';

export interface ComposerOptions {
  /** Whether failed zero-weight indicators count against the success rate. */
  zeroWeightFailures?: ZeroWeightFailurePolicy;
  clock?: Clock;
}

export class Composer {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly zeroWeightFailures: ZeroWeightFailurePolicy;

  constructor(
    readonly side: Side,
    private readonly roster: readonly Indicator[],
    private readonly config: IndicatorConfig,
    options: ComposerOptions = {}
  ) {
    this.logger = createChildLogger(`${side}_composer`);
    this.clock = options.clock ?? systemClock;
    this.zeroWeightFailures = options.zeroWeightFailures ?? 'count';
  }

  get indicatorNames(): string[] {
    return this.roster.map((indicator) => indicator.name);
  }

  /**
   * Evaluate every indicator in roster order. A failure in one never stops
   * the rest.
   */
  async calculateIndividualScores(): Promise<IndicatorResult[]> {
    const results: IndicatorResult[] = [];
    for (const indicator of this.roster) {
      results.push(await this.evaluate(indicator));
    }
    return results;
  }

  calculateWeightedScore(results: readonly IndicatorResult[]): WeightedScore {
    const validIndicators: ValidIndicatorScore[] = [];
    const failedIndicators: string[] = [];

    for (const result of results) {
      if (result.normalizedScore === null) {
        failedIndicators.push(result.name);
        continue;
      }
      validIndicators.push({
        name: result.name,
        normalizedScore: result.normalizedScore,
        weight: result.weight,
        contribution: result.normalizedScore * result.weight,
      });
    }

    const totalWeight = validIndicators.reduce((sum, item) => sum + item.weight, 0);
    if (totalWeight <= 0) {
      return {
        compositeScore: null,
        totalWeight: 0,
        validIndicators,
        failedIndicators,
        statistics: null,
        error: NO_VALID_INDICATORS,
      };
    }

    const weightedSum = validIndicators.reduce((sum, item) => sum + item.contribution, 0);
    const scores = validIndicators.map((item) => item.normalizedScore);

    return {
      compositeScore: weightedSum / totalWeight,
      totalWeight,
      validIndicators,
      failedIndicators,
      statistics: scoreStatistics(scores),
    };
  }

  interpret(score: number): Interpretation {
    return interpretScore(this.side, score);
  }

  /**
   * Full per-side analysis. Resolves a CompositeFailure instead of rejecting.
   */
  async calculateCompleteAnalysis(): Promise<SideAnalysis> {
    try {
      const indicators = await this.calculateIndividualScores();
      const composition = this.calculateWeightedScore(indicators);
      const dataQuality = this.dataQuality(indicators, composition);
      const timestamp = toIsoTimestamp(this.clock());

      if (composition.compositeScore === null) {
        this.logger.warn(
          { failed: composition.failedIndicators },
          'No valid indicators, composite unavailable'
        );
        return {
          status: 'no_valid_indicators',
          side: this.side,
          compositeScore: null,
          totalWeight: 0,
          indicators,
          composition,
          interpretation: null,
          dataQuality,
          timestamp,
          error: composition.error ?? NO_VALID_INDICATORS,
        };
      }

      const interpretation = this.interpret(composition.compositeScore);
      this.logger.info(
        {
          compositeScore: composition.compositeScore,
          strength: interpretation.strength,
          valid: composition.validIndicators.length,
          failed: composition.failedIndicators,
        },
        'Composite calculated'
      );

      return {
        status: 'complete',
        side: this.side,
        compositeScore: composition.compositeScore,
        totalWeight: composition.totalWeight,
        indicators,
        composition,
        interpretation,
        dataQuality,
        timestamp,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ error: message }, 'Composite analysis failed');
      return {
        status: 'failed',
        side: this.side,
        error: message,
        timestamp: toIsoTimestamp(this.clock()),
      };
    }
  }

  private async evaluate(indicator: Indicator): Promise<IndicatorResult> {
    try {
      return await indicator.fullResult();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ indicator: indicator.name, error: message }, 'Indicator threw');
      return {
        name: indicator.name,
        side: this.side,
        rawValue: null,
        normalizedScore: null,
        weight: this.configuredWeight(indicator.name),
        bounds: this.configuredBounds(indicator.name),
        timestamp: toIsoTimestamp(this.clock()),
        error: message,
      };
    }
  }

  private configuredWeight(name: string): number {
    try {
      return this.config.weight(this.side, name);
    } catch {
      return 0;
    }
  }

  private configuredBounds(name: string): IndicatorResult['bounds'] {
    try {
      return this.config.bounds(this.side, name);
    } catch {
      return null;
    }
  }

  private dataQuality(indicators: readonly IndicatorResult[], composition: WeightedScore): DataQuality {
    const total = indicators.length;
    const successful = composition.validIndicators.length;
    const failed = total - successful;
    const excluded =
      this.zeroWeightFailures === 'exclude'
        ? indicators.filter((result) => result.normalizedScore === null && result.weight === 0).length
        : 0;
    const denominator = total - excluded;

    return {
      totalIndicators: total,
      successfulCalculations: successful,
      failedCalculations: failed,
      successRate: denominator > 0 ? successful / denominator : 0,
    };
  }
}

export function scoreStatistics(scores: readonly number[]): ScoreStatistics {
  return {
    mean: mean(scores),
    min: Math.min(...scores),
    max: Math.max(...scores),
    std: populationStd(scores),
  };
}
