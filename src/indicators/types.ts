/**
 * Indicator contract shared by every concrete indicator and the composers.
 */

export type Side = 'bottom' | 'top';

export const SIDES: readonly Side[] = ['bottom', 'top'];

export interface Bounds {
  lower: number;
  upper: number;
}

export interface IndicatorSpec {
  name: string;
  side: Side;
  bounds: Bounds;
  weight: number;
}

export interface IndicatorResult {
  name: string;
  side: Side;
  rawValue: number | null;
  /** In [0, 1]; null whenever rawValue is null or the bounds are degenerate. */
  normalizedScore: number | null;
  weight: number;
  bounds: Bounds | null;
  /** ISO-8601 freshness of the data the value was computed from. */
  timestamp: string;
  error?: string;
}

export interface Indicator {
  readonly name: string;
  readonly side: Side;
  rawValue(): Promise<number | null>;
  /** Never rejects for data or formula problems; those land in `error`. */
  fullResult(): Promise<IndicatorResult>;
}

/**
 * Read-only lookup of per-indicator bounds and weights.
 * Lookups for unknown indicators throw IndicatorConfigError.
 */
export interface IndicatorConfig {
  bounds(side: Side, name: string): Bounds;
  weight(side: Side, name: string): number;
  spec(side: Side, name: string): IndicatorSpec;
  names(side: Side): string[];
}
