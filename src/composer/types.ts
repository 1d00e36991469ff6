import type { IndicatorResult, Side } from '@/indicators/types';

export type SignalStrength = 'Very Strong' | 'Strong' | 'Moderate' | 'Weak' | 'Very Weak';

export interface Interpretation {
  strength: SignalStrength;
  description: string;
  color: string;
  score: number;
  /** score x 100, one decimal */
  percentage: number;
}

export interface ValidIndicatorScore {
  name: string;
  normalizedScore: number;
  weight: number;
  contribution: number;
}

export interface ScoreStatistics {
  mean: number;
  min: number;
  max: number;
  /** population standard deviation; 0 below two scores */
  std: number;
}

export interface WeightedScore {
  compositeScore: number | null;
  totalWeight: number;
  validIndicators: ValidIndicatorScore[];
  failedIndicators: string[];
  statistics: ScoreStatistics | null;
  error?: string;
}

export interface DataQuality {
  totalIndicators: number;
  successfulCalculations: number;
  failedCalculations: number;
  /** fraction in [0, 1] */
  successRate: number;
}

export type CompositeStatus = 'complete' | 'no_valid_indicators';

export interface CompositeResult {
  status: CompositeStatus;
  side: Side;
  compositeScore: number | null;
  totalWeight: number;
  indicators: IndicatorResult[];
  composition: WeightedScore;
  interpretation: Interpretation | null;
  dataQuality: DataQuality;
  timestamp: string;
  error?: string;
}

export interface CompositeFailure {
  status: 'failed';
  side: Side;
  error: string;
  timestamp: string;
}

export type SideAnalysis = CompositeResult | CompositeFailure;

export function isCompositeFailure(analysis: SideAnalysis): analysis is CompositeFailure {
  return analysis.status === 'failed';
}
