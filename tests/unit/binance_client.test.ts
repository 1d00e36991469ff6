import { describe, expect, it } from 'vitest';
import { BinanceClient, type FetchLike } from '@/providers/binance/client';
import { BinanceMarketDataProvider } from '@/providers/binance/provider';
import { parseKlineRow } from '@/providers/binance/types';
import { ProviderError } from '@/providers/types';
import { BASE_TIME, DAY_MS } from '../helpers/fixtures';

function kline(index: number, close: number, volume: number = 10): unknown[] {
  const openTime = BASE_TIME + index * DAY_MS;
  return [
    openTime,
    String(close),
    String(close + 1),
    String(close - 1),
    String(close),
    String(volume),
    openTime + DAY_MS - 1,
    '0',
    12,
  ];
}

function json(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

/** Replays queued responses and records requested URLs. */
function scriptedFetch(responses: Response[]): { fetchImpl: FetchLike; urls: URL[] } {
  const urls: URL[] = [];
  const fetchImpl: FetchLike = async (url) => {
    urls.push(new URL(url));
    const next = responses.shift();
    if (!next) throw new Error('no scripted response left');
    return next;
  };
  return { fetchImpl, urls };
}

function client(fetchImpl: FetchLike, sleeps: number[] = [], maxRetries: number = 2): BinanceClient {
  return new BinanceClient({
    baseUrl: 'https://api.example.test',
    maxRetries,
    initialBackoffMs: 100,
    fetchImpl,
    sleepImpl: async (ms) => {
      sleeps.push(ms);
    },
  });
}

describe('parseKlineRow', () => {
  it('parses a positional kline row', () => {
    expect(parseKlineRow(kline(0, 100, 5))).toEqual({
      timestamp: '2024-01-01T00:00:00.000Z',
      open: 100,
      high: 101,
      low: 99,
      close: 100,
      volume: 5,
    });
  });

  it('rejects short or non-numeric rows', () => {
    expect(parseKlineRow([1, '2', '3'])).toBeNull();
    expect(parseKlineRow([BASE_TIME, 'x', '1', '1', '1', '1'])).toBeNull();
    expect(parseKlineRow({ open: 1 })).toBeNull();
  });
});

describe('BinanceClient', () => {
  it('requests klines with a capped limit and skips malformed rows', async () => {
    const { fetchImpl, urls } = scriptedFetch([json([kline(0, 100), ['bad'], kline(1, 110)])]);
    const bars = await client(fetchImpl).fetchKlines('TESTUSDT', '1d', 5000);

    expect(bars.map((bar) => bar.close)).toEqual([100, 110]);
    expect(urls[0].pathname).toBe('/api/v3/klines');
    expect(urls[0].searchParams.get('symbol')).toBe('TESTUSDT');
    expect(urls[0].searchParams.get('interval')).toBe('1d');
    expect(urls[0].searchParams.get('limit')).toBe('1000');
  });

  it('backs off when rate limited', async () => {
    const sleeps: number[] = [];
    const { fetchImpl } = scriptedFetch([json({}, 429), json({}, 418), json([kline(0, 100)])]);
    const binance = client(fetchImpl, sleeps);

    expect(await binance.fetchKlines('TESTUSDT', '1w', 10)).toHaveLength(1);
    expect(sleeps).toEqual([100, 200]);
    expect(binance.getRequestCount()).toBe(3);
  });

  it('gives up after the configured retries', async () => {
    const sleeps: number[] = [];
    const failure = () => new Response('', { status: 500, statusText: 'Internal Server Error' });
    const { fetchImpl, urls } = scriptedFetch([failure(), failure(), failure()]);

    await expect(client(fetchImpl, sleeps).fetchKlines('TESTUSDT', '1d', 10)).rejects.toThrow(
      'Binance API error: 500 Internal Server Error'
    );
    expect(urls).toHaveLength(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('does not retry a client error', async () => {
    const sleeps: number[] = [];
    const { fetchImpl, urls } = scriptedFetch([
      new Response('', { status: 400, statusText: 'Bad Request' }),
      json([kline(0, 100)]),
    ]);

    await expect(client(fetchImpl, sleeps).fetchKlines('NOPE', '1d', 10)).rejects.toThrow(
      'Binance API error: 400 Bad Request'
    );
    expect(urls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it('stops without sleeping when the last attempt is rate limited', async () => {
    const sleeps: number[] = [];
    const { fetchImpl, urls } = scriptedFetch([json({}, 429), json({}, 429), json({}, 429)]);

    await expect(client(fetchImpl, sleeps).fetchKlines('TESTUSDT', '1d', 10)).rejects.toThrow(
      'Binance API rate limit: 429'
    );
    expect(urls).toHaveLength(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('retries network errors', async () => {
    const sleeps: number[] = [];
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls++;
      if (calls === 1) throw new Error('socket hang up');
      return json([kline(0, 100)]);
    };

    expect(await client(fetchImpl, sleeps).fetchKlines('TESTUSDT', '1d', 10)).toHaveLength(1);
    expect(sleeps).toEqual([100]);
  });

  it('rejects a payload that is not a kline array', async () => {
    const { fetchImpl } = scriptedFetch([json({ code: -1121 })]);
    await expect(client(fetchImpl).fetchKlines('TESTUSDT', '1d', 10)).rejects.toThrow(
      'Unexpected klines payload'
    );
  });

  it('reads the ticker price', async () => {
    const { fetchImpl, urls } = scriptedFetch([json({ symbol: 'TESTUSDT', price: '42000.50' })]);

    expect(await client(fetchImpl).fetchTickerPrice('TESTUSDT')).toBe(42000.5);
    expect(urls[0].pathname).toBe('/api/v3/ticker/price');
  });

  it('rejects a malformed ticker payload', async () => {
    const { fetchImpl } = scriptedFetch([json({ price: 1 })]);
    await expect(client(fetchImpl).fetchTickerPrice('TESTUSDT')).rejects.toThrow(
      'Unexpected ticker payload'
    );
  });
});

describe('BinanceMarketDataProvider', () => {
  it('builds a dataset with derived series for a native interval', async () => {
    const rows = Array.from({ length: 30 }, (_, i) => kline(i, 100 + i));
    const { fetchImpl, urls } = scriptedFetch([json(rows)]);
    const provider = new BinanceMarketDataProvider(client(fetchImpl), 'TESTUSDT');

    const dataset = await provider.fetch('1W', 30);
    expect(dataset?.timeframe).toBe('1W');
    expect(dataset?.symbol).toBe('TESTUSDT');
    expect(dataset?.bars).toHaveLength(30);
    expect(dataset?.series.sma_20).toHaveLength(30);
    expect(urls[0].searchParams.get('interval')).toBe('1w');
    expect(provider.getRequestCount()).toBe(1);
  });

  it('resamples daily klines into five-day bars', async () => {
    const rows = Array.from({ length: 10 }, (_, i) => kline(i, 100 + i, 1));
    const { fetchImpl, urls } = scriptedFetch([json(rows)]);
    const provider = new BinanceMarketDataProvider(client(fetchImpl), 'TESTUSDT');

    const dataset = await provider.fetch('5D', 2);
    expect(urls[0].searchParams.get('interval')).toBe('1d');
    expect(urls[0].searchParams.get('limit')).toBe('10');
    expect(dataset?.bars.map((bar) => [bar.open, bar.close, bar.volume])).toEqual([
      [100, 104, 5],
      [105, 109, 5],
    ]);
  });

  it('returns null when no bars come back', async () => {
    const { fetchImpl } = scriptedFetch([json([])]);
    const provider = new BinanceMarketDataProvider(client(fetchImpl), 'TESTUSDT');

    expect(await provider.fetch('1D', 10)).toBeNull();
  });

  it('wraps transport failures in a ProviderError', async () => {
    const { fetchImpl } = scriptedFetch([new Response('', { status: 503, statusText: 'Unavailable' })]);
    const provider = new BinanceMarketDataProvider(client(fetchImpl, [], 0), 'TESTUSDT');

    const error = await provider.fetch('1M', 10).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'Failed to fetch 1M klines for TESTUSDT: Binance API error: 503 Unavailable',
      provider: 'binance',
      timeframe: '1M',
      method: 'fetch',
    });
  });

  it('wraps ticker failures in a ProviderError', async () => {
    const { fetchImpl } = scriptedFetch([json({})]);
    const provider = new BinanceMarketDataProvider(client(fetchImpl, [], 0), 'TESTUSDT');

    await expect(provider.currentPrice()).rejects.toThrow(
      'Failed to fetch current price for TESTUSDT: Unexpected ticker payload'
    );
  });
});
