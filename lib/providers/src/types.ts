/**
 * Shared market data types used by the screener engine.
 * These are the canonical shapes every MarketDataProvider returns.
 */

// ============================================================================
// PRICE SERIES
// ============================================================================

/**
 * One trading-day bar.
 */
export interface PricePoint {
  date: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Chronological bars for a single ticker, oldest first, no duplicate dates.
 */
export type PriceSeries = PricePoint[];

// ============================================================================
// FUNDAMENTALS
// ============================================================================

/**
 * Fundamental ratios used by the screen. `null` means the upstream source
 * did not report the value.
 */
export interface Fundamentals {
  trailingPE: number | null;
  /** Ratio, not percent (0.2 = 20%) */
  returnOnEquity: number | null;
}

export interface MarketBundle {
  ticker: string;
  fundamentals: Fundamentals;
  series: PriceSeries;
}

// ============================================================================
// COLLABORATOR CONTRACTS
// ============================================================================

/**
 * Source of fundamentals and price history for a ticker.
 *
 * "Not found" conditions resolve with null fundamentals or an empty series.
 * Transport-level failures reject with a TransportError.
 */
export interface MarketDataProvider {
  getBundle(ticker: string): Promise<MarketBundle>;
}

/**
 * Supplies the ordered list of tickers to screen.
 */
export interface TickerUniverseSource {
  loadTickers(): Promise<string[]>;
}

export function emptyBundle(ticker: string): MarketBundle {
  return {
    ticker,
    fundamentals: { trailingPE: null, returnOnEquity: null },
    series: [],
  };
}
