import {
  errorMessage,
  type MarketBundle,
  type MarketDataProvider,
  type ProviderLogger,
} from '@niftywatch/providers';
import type {
  ExclusionReason,
  RowOutcome,
  ScreenOptions,
  ScreenResult,
  ScreenRow,
} from '../types/index.ts';
import {
  DEFAULT_PACING_MS,
  defaultClassifierThresholds,
  defaultFilterBounds,
  defaultIndicatorSettings,
} from '../config/thresholds.ts';
import { assertValidBounds } from '../config/schema.ts';
import { computeRow, type RowSettings } from './row.ts';
import { applyFilters } from './view.ts';
import { Pacer } from '../utils/pacer.ts';
import { logger as defaultLogger } from '../utils/logger.ts';

export interface ScreenContext {
  provider: MarketDataProvider;
  logger?: ProviderLogger;
  /** Verbose mode promotes skip messages from debug to warn */
  verbose?: boolean;
  rowSettings?: RowSettings;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const SKIP_LABELS: Record<ExclusionReason, string> = {
  'missing-fundamentals': 'missing fundamentals',
  'empty-series': 'no price history',
  'insufficient-history': 'insufficient history',
  'undefined-indicators': 'indicators undefined',
  'malformed-data': 'malformed data',
  'transport-error': 'fetch failed',
};

/**
 * Screen tickers one at a time, in input order.
 *
 * Per-ticker failures (fetch errors, missing or malformed data, short
 * history) drop the ticker and the batch continues. Invalid bounds throw ConfigurationError
 * before anything is fetched.
 */
export async function screen(
  tickers: readonly string[],
  options: ScreenOptions,
  context: ScreenContext
): Promise<ScreenResult> {
  const bounds = assertValidBounds({
    maxPE: options.maxPE ?? defaultFilterBounds.maxPE,
    minROE: options.minROE ?? defaultFilterBounds.minROE,
  });
  const log = context.logger ?? defaultLogger;
  const plotSet = new Set(
    [...(options.plotTickers ?? [])].map((t) => t.toUpperCase())
  );
  const rowSettings: RowSettings = context.rowSettings ?? {
    indicators: defaultIndicatorSettings,
    thresholds: defaultClassifierThresholds,
  };
  const pacer = new Pacer({
    intervalMs: options.pacingMs ?? DEFAULT_PACING_MS,
    now: context.now,
    sleep: context.sleep,
  });

  const skip = (outcome: Extract<RowOutcome, { ok: false }>) => {
    const message =
      `Skipping ${outcome.ticker}: ${SKIP_LABELS[outcome.reason]}` +
      (outcome.detail ? ` (${outcome.detail})` : '');
    if (context.verbose) {
      log.warn(message);
    } else {
      log.debug(message);
    }
  };

  const fullTable: ScreenRow[] = [];

  for (const ticker of tickers) {
    await pacer.wait();

    let bundle: MarketBundle;
    try {
      bundle = await context.provider.getBundle(ticker);
    } catch (error) {
      skip({
        ok: false,
        ticker,
        reason: 'transport-error',
        detail: errorMessage(error),
      });
      continue;
    }
    pacer.mark();

    let outcome: RowOutcome;
    try {
      outcome = computeRow(
        ticker,
        bundle.fundamentals,
        bundle.series,
        rowSettings
      );
    } catch (error) {
      outcome = {
        ok: false,
        ticker,
        reason: 'malformed-data',
        detail: errorMessage(error),
      };
    }
    if (!outcome.ok) {
      skip(outcome);
      continue;
    }

    if (options.onChart && plotSet.has(ticker.toUpperCase())) {
      try {
        options.onChart(ticker, outcome.frame);
      } catch (error) {
        log.warn(`Chart for ${ticker} failed: ${errorMessage(error)}`);
      }
    }

    fullTable.push(outcome.row);
  }

  const skipped = tickers.length - fullTable.length;
  log.success(
    `Screened ${fullTable.length}/${tickers.length} tickers` +
      (skipped > 0 ? ` (${skipped} skipped)` : '')
  );

  return Object.freeze({
    fullTable: Object.freeze(fullTable),
    filteredTable: Object.freeze(applyFilters(fullTable, bounds)),
  });
}
