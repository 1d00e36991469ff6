import { buildDerivedSeries } from './derived';
import { freezeDataset, type OhlcvBar, type Timeframe, type TimeframeDataset } from './types';

/**
 * Build a frozen dataset with the standard derived series attached.
 */
export function createDataset(
  timeframe: Timeframe,
  symbol: string,
  bars: readonly OhlcvBar[]
): TimeframeDataset {
  return freezeDataset({
    timeframe,
    symbol,
    bars,
    series: buildDerivedSeries(bars),
  });
}

export function isOhlcvBar(value: unknown): value is OhlcvBar {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.timestamp === 'string' &&
    ['open', 'high', 'low', 'close', 'volume'].every(
      (key) => typeof candidate[key] === 'number' && Number.isFinite(candidate[key])
    )
  );
}
