import YahooFinance from 'yahoo-finance2';
import type {
  Fundamentals,
  MarketBundle,
  MarketDataProvider,
  PricePoint,
} from './types.ts';
import { TransportError, errorMessage } from './errors.ts';
import { silentLogger, type ProviderLogger } from './logger.ts';

/**
 * Retry configuration for rate-limited requests
 */
const RETRY = {
  maxRetries: 3,
  baseDelay: 500, // ms
  backoffMultiplier: 2,
};

/**
 * The slice of quoteSummary the screen reads
 */
export interface YahooSummary {
  summaryDetail?: { trailingPE?: number | null };
  financialData?: { returnOnEquity?: number | null };
}

/**
 * One chart quote. Yahoo leaves fields null for halted or partial sessions.
 */
export interface YahooQuote {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
}

/**
 * The two Yahoo Finance calls the provider makes
 */
export interface YahooClient {
  summary(symbol: string): Promise<YahooSummary>;
  dailyQuotes(symbol: string, period1: Date): Promise<YahooQuote[]>;
}

function createYahooClient(): YahooClient {
  // Suppress notices and validation logging for cleaner output during scans
  const yahooFinance = new YahooFinance({
    suppressNotices: ['yahooSurvey'],
    validation: {
      logErrors: false,
      logOptionsErrors: false,
    },
  });

  return {
    summary: (symbol) =>
      yahooFinance.quoteSummary(symbol, {
        modules: ['summaryDetail', 'financialData'],
      }),
    dailyQuotes: async (symbol, period1) => {
      const chart = await yahooFinance.chart(symbol, {
        period1,
        interval: '1d',
      });
      return chart.quotes;
    },
  };
}

export interface YahooProviderOptions {
  /** Months of daily history to request */
  historyMonths?: number;
  /** Defaults to a live yahoo-finance2 client */
  client?: YahooClient;
  logger?: ProviderLogger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Check if error is a rate limit error
 */
export function isRateLimitError(error: unknown): boolean {
  const errorStr = String(error);
  return (
    errorStr.includes('Too Many Requests') ||
    errorStr.includes('429') ||
    errorStr.includes('rate limit')
  );
}

/**
 * Yahoo answers unknown or delisted symbols with errors rather than
 * empty payloads. Those are "not found", not transport failures.
 */
export function isNotFoundError(error: unknown): boolean {
  const errorStr = String(error);
  return (
    errorStr.includes('Not Found') ||
    errorStr.includes('No data found') ||
    errorStr.includes('delisted') ||
    errorStr.includes('No fundamentals data found')
  );
}

function isValidationError(error: unknown): boolean {
  const errorStr = String(error);
  return (
    errorStr.includes('FailedYahooValidationError') ||
    errorStr.includes('Failed Yahoo Schema validation')
  );
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Yahoo Finance data provider.
 *
 * Fetches trailing PE and ROE from quoteSummary and daily bars from chart.
 * No caching here: wrap in CachedMarketDataProvider for that.
 */
export class YahooProvider implements MarketDataProvider {
  private readonly client: YahooClient;
  private readonly historyMonths: number;
  private readonly logger: ProviderLogger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: YahooProviderOptions = {}) {
    this.client = options.client ?? createYahooClient();
    this.historyMonths = options.historyMonths ?? 6;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Execute request with retry on rate limits.
   * Resolves null for "not found", throws TransportError otherwise.
   */
  private async withRetry<T>(
    fn: () => Promise<T>,
    symbol: string,
    requestType: string
  ): Promise<T | null> {
    let lastError: unknown;

    for (let attempt = 0; attempt < RETRY.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        if (isNotFoundError(error)) {
          this.logger.debug(`${symbol} ${requestType}: not found`);
          return null;
        }

        if (!isRateLimitError(error) || attempt === RETRY.maxRetries - 1) {
          break;
        }

        const backoff =
          RETRY.baseDelay * Math.pow(RETRY.backoffMultiplier, attempt + 1);
        this.logger.debug(
          `Retry ${attempt + 1}/${RETRY.maxRetries} ` +
            `for ${symbol} ${requestType} after ${backoff}ms`
        );
        await this.sleep(backoff);
      }
    }

    if (isValidationError(lastError)) {
      this.logger.debug(`${symbol} ${requestType}: schema validation failed`);
    } else {
      this.logger.warn(
        `Failed ${requestType} for ${symbol}: ${errorMessage(lastError)}`
      );
    }
    throw new TransportError(symbol, `${requestType} request failed`, {
      cause: lastError,
    });
  }

  private async getFundamentals(symbol: string): Promise<Fundamentals> {
    const summary = await this.withRetry(
      () => this.client.summary(symbol),
      symbol,
      'summary'
    );

    return {
      trailingPE: finiteOrNull(summary?.summaryDetail?.trailingPE),
      returnOnEquity: finiteOrNull(summary?.financialData?.returnOnEquity),
    };
  }

  private async getHistorical(symbol: string): Promise<PricePoint[]> {
    const period1 = new Date(this.now());
    period1.setMonth(period1.getMonth() - this.historyMonths);

    const quotes = await this.withRetry(
      () => this.client.dailyQuotes(symbol, period1),
      symbol,
      'chart'
    );
    if (!quotes) return [];

    const bars: PricePoint[] = [];
    for (const q of quotes) {
      const open = finiteOrNull(q.open);
      const high = finiteOrNull(q.high);
      const low = finiteOrNull(q.low);
      const close = finiteOrNull(q.close);
      const volume = finiteOrNull(q.volume);
      if (
        open === null ||
        high === null ||
        low === null ||
        close === null ||
        volume === null
      ) {
        continue;
      }
      bars.push({ date: new Date(q.date), open, high, low, close, volume });
    }
    return bars;
  }

  async getBundle(ticker: string): Promise<MarketBundle> {
    const [fundamentals, series] = await Promise.all([
      this.getFundamentals(ticker),
      this.getHistorical(ticker),
    ]);

    this.logger.debug(
      `${ticker}: ${series.length} bars, PE ${fundamentals.trailingPE ?? 'n/a'}`
    );
    return { ticker, fundamentals, series };
  }
}
