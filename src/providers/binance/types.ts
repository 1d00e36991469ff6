/**
 * Binance public market data payloads
 */

import type { OhlcvBar } from '@/market/types';

/**
 * Kline rows arrive as positional arrays:
 * [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, ...]
 * with prices and volumes encoded as strings.
 */
export type BinanceKlineRow = unknown[];

export interface BinanceTickerPrice {
  symbol: string;
  price: string;
}

export type BinanceInterval = '1d' | '3d' | '1w' | '1M';

export function parseKlineRow(row: unknown): OhlcvBar | null {
  if (!Array.isArray(row) || row.length < 6) return null;
  const openTime = Number(row[0]);
  const [open, high, low, close, volume] = row.slice(1, 6).map((value) => Number(value));
  const values = [openTime, open, high, low, close, volume];
  if (values.some((value) => !Number.isFinite(value))) return null;

  return {
    timestamp: new Date(openTime).toISOString(),
    open,
    high,
    low,
    close,
    volume,
  };
}

export function isTickerPrice(value: unknown): value is BinanceTickerPrice {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return typeof candidate.symbol === 'string' && typeof candidate.price === 'string';
}
