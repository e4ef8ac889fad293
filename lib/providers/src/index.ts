/**
 * @niftywatch/providers - Market data collaborators for the screener
 *
 * Canonical exports for Yahoo Finance data fetching, response caching,
 * ticker universe management, and shared market data types.
 */

// Types
export type {
  PricePoint,
  PriceSeries,
  Fundamentals,
  MarketBundle,
  MarketDataProvider,
  TickerUniverseSource,
} from './types.ts';
export { emptyBundle } from './types.ts';

// Errors
export { TransportError, errorMessage } from './errors.ts';

// Yahoo Finance
export { YahooProvider, isRateLimitError, isNotFoundError } from './yahoo.ts';
export type {
  YahooProviderOptions,
  YahooClient,
  YahooSummary,
  YahooQuote,
} from './yahoo.ts';

// Caching
export {
  CachedMarketDataProvider,
  DEFAULT_CACHE_TTL_MS,
} from './cache.ts';
export type { CacheOptions, CacheStats } from './cache.ts';

// Ticker universe
export {
  CsvTickerFile,
  refreshNifty50,
  parseTickerList,
  parseNseConstituents,
  toYahooSymbol,
  NIFTY50_CSV_URL,
} from './tickers.ts';
export type { RefreshResult } from './tickers.ts';

// Logger
export { ConsoleLogger, silentLogger } from './logger.ts';
export type { ProviderLogger } from './logger.ts';
