import {
  emptyBundle,
  type Fundamentals,
  type MarketBundle,
  type MarketDataProvider,
  type PricePoint,
} from '@niftywatch/providers';

const DAY_MS = 86_400_000;
const START = Date.UTC(2024, 0, 1);

/**
 * Build daily bars from closes, one day apart starting 2024-01-01
 */
export function createSeries(
  closes: number[],
  volumes: number[] = []
): PricePoint[] {
  return closes.map((close, i) => ({
    date: new Date(START + i * DAY_MS),
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume: volumes[i] ?? 1_000_000,
  }));
}

export function risingCloses(count: number, start = 100, step = 1): number[] {
  return Array.from({ length: count }, (_, i) => start + i * step);
}

export function fundamentals(
  trailingPE: number | null,
  returnOnEquity: number | null
): Fundamentals {
  return { trailingPE, returnOnEquity };
}

export function bundle(
  ticker: string,
  pe: number | null,
  roe: number | null,
  closes: number[],
  volumes?: number[]
): MarketBundle {
  return {
    ticker,
    fundamentals: fundamentals(pe, roe),
    series: createSeries(closes, volumes),
  };
}

/**
 * In-memory provider. An Error entry makes getBundle reject with it;
 * unknown tickers resolve with an empty bundle.
 */
export class FakeProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(private readonly data: Record<string, MarketBundle | Error>) {}

  async getBundle(ticker: string): Promise<MarketBundle> {
    this.calls.push(ticker);
    const entry = this.data[ticker];
    if (entry instanceof Error) throw entry;
    return entry ?? emptyBundle(ticker);
  }
}
