/**
 * Bounds normalization for indicator raw values
 */

import { clamp, isFiniteNumber } from '@/utils/number';
import type { Bounds } from './types';

export function isDegenerate(bounds: Bounds): boolean {
  return bounds.upper === bounds.lower;
}

/**
 * Map `raw` linearly so `lower` -> 0 and `upper` -> 1, clamped to [0, 1].
 * Returns null for degenerate bounds or non-finite input. Config loading
 * rejects lower > upper.
 */
export function normalize(raw: number, bounds: Bounds): number | null {
  const { lower, upper } = bounds;
  if (!isFiniteNumber(raw) || !isFiniteNumber(lower) || !isFiniteNumber(upper)) {
    return null;
  }
  if (isDegenerate(bounds)) {
    return null;
  }
  return clamp((raw - lower) / (upper - lower), 0, 1);
}
