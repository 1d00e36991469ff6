import type { AppConfig } from '@/core/config';
import { BinanceClient } from './binance/client';
import { BinanceMarketDataProvider } from './binance/provider';
import { FileMarketDataProvider } from './file/provider';
import type { MarketDataProvider } from './types';

/**
 * Create the market data provider named by `provider.type`
 * (MARKET_PROVIDER overrides it at config load).
 */
export function createProvider(config: AppConfig): MarketDataProvider {
  const settings = config.provider;

  switch (settings.type) {
    case 'binance':
      return new BinanceMarketDataProvider(
        new BinanceClient({
          baseUrl: settings.baseUrl,
          minRequestIntervalMs: settings.minRequestIntervalMs,
          maxRetries: settings.maxRetries,
          initialBackoffMs: settings.initialBackoffMs,
        }),
        config.symbol
      );
    case 'file':
      return new FileMarketDataProvider(settings.dataDir, config.symbol);
    default: {
      const unknownType: never = settings.type;
      throw new Error(`Unknown provider type: ${String(unknownType)}`);
    }
  }
}
