/**
 * Aggregate consecutive bars into wider ones (e.g. daily to 5-day).
 */

import type { OhlcvBar } from './types';

/**
 * Groups `bars` into chunks of `size`, anchored so the newest chunk is
 * complete. Leading bars that do not fill a chunk are dropped.
 */
export function resampleBars(bars: readonly OhlcvBar[], size: number): OhlcvBar[] {
  if (size < 1) {
    throw new Error(`Resample size must be at least 1, got ${size}`);
  }
  const offset = bars.length % size;
  const result: OhlcvBar[] = [];

  for (let start = offset; start + size <= bars.length; start += size) {
    const chunk = bars.slice(start, start + size);
    result.push({
      timestamp: chunk[0].timestamp,
      open: chunk[0].open,
      high: Math.max(...chunk.map((b) => b.high)),
      low: Math.min(...chunk.map((b) => b.low)),
      close: chunk[chunk.length - 1].close,
      volume: chunk.reduce((sum, b) => sum + b.volume, 0),
    });
  }

  return result;
}
