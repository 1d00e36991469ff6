/**
 * Binance REST client for public market data
 * Throttled with a minimum request interval and exponential backoff
 */

import { createChildLogger } from '@/utils/logger';
import { RequestThrottler, sleep } from '@/utils/throttler';
import { errorMessage } from '@/utils/errors';
import type { OhlcvBar } from '@/market/types';
import { isTickerPrice, parseKlineRow, type BinanceInterval } from './types';

const logger = createChildLogger('binance');

/** Binance caps klines per request at 1000. */
export const MAX_KLINE_LIMIT = 1000;

export type FetchLike = (url: string) => Promise<Response>;

export interface BinanceClientOptions {
  baseUrl: string;
  minRequestIntervalMs?: number;
  maxRetries?: number;
  initialBackoffMs?: number;
  fetchImpl?: FetchLike;
  sleepImpl?: (ms: number) => Promise<void>;
}

export class BinanceClient {
  private requestCount = 0;
  private readonly throttler: RequestThrottler;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;

  constructor(private readonly options: BinanceClientOptions) {
    this.throttler = new RequestThrottler(options.minRequestIntervalMs ?? 0);
    this.fetchImpl = options.fetchImpl ?? ((url) => fetch(url));
    this.sleep = options.sleepImpl ?? sleep;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry(
    endpoint: string,
    params: Record<string, string | number> = {}
  ): Promise<unknown> {
    const url = new URL(endpoint, this.options.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      let response: Response;
      try {
        response = await this.throttler.schedule(() => this.fetchImpl(url.toString()));
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(errorMessage(error));
        await this.backoff(attempt, { endpoint, error: lastError.message }, 'Binance request failed, retrying');
        continue;
      }
      this.requestCount++;

      if (response.status === 429 || response.status === 418) {
        lastError = new Error(`Binance API rate limit: ${response.status}`);
        await this.backoff(attempt, { endpoint, status: response.status }, 'Rate limited by Binance, backing off');
        continue;
      }

      if (response.status >= 500) {
        lastError = new Error(`Binance API error: ${response.status} ${response.statusText}`);
        await this.backoff(attempt, { endpoint, status: response.status }, 'Binance server error, retrying');
        continue;
      }

      if (!response.ok) {
        throw new Error(`Binance API error: ${response.status} ${response.statusText}`);
      }

      return await response.json();
    }

    throw lastError ?? new Error('Binance request failed after retries');
  }

  /** Sleeps before the next attempt; no sleep once the retries are spent. */
  private async backoff(attempt: number, details: Record<string, unknown>, message: string): Promise<void> {
    if (attempt >= this.maxRetries) return;
    const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
    logger.warn({ ...details, attempt, backoffMs }, message);
    await this.sleep(backoffMs);
  }

  async fetchKlines(symbol: string, interval: BinanceInterval, limit: number): Promise<OhlcvBar[]> {
    const payload = await this.fetchWithRetry('/api/v3/klines', {
      symbol,
      interval,
      limit: Math.min(Math.max(1, limit), MAX_KLINE_LIMIT),
    });

    if (!Array.isArray(payload)) {
      throw new Error('Unexpected klines payload');
    }

    const bars: OhlcvBar[] = [];
    for (const row of payload) {
      const bar = parseKlineRow(row);
      if (bar) {
        bars.push(bar);
      } else {
        logger.debug({ symbol, interval }, 'Skipping malformed kline row');
      }
    }
    return bars;
  }

  async fetchTickerPrice(symbol: string): Promise<number> {
    const payload = await this.fetchWithRetry('/api/v3/ticker/price', { symbol });
    if (!isTickerPrice(payload)) {
      throw new Error('Unexpected ticker payload');
    }
    const price = Number(payload.price);
    if (!Number.isFinite(price)) {
      throw new Error(`Invalid ticker price: ${payload.price}`);
    }
    return price;
  }
}
