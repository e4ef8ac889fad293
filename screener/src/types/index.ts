import type { PricePoint } from '@niftywatch/providers';

// ============================================================================
// SIGNALS
// ============================================================================

export type Signal = 'Buy' | 'Sell' | 'Hold';

export type SignalFilter = 'All' | Signal;

export type SortKey = 'None' | 'PE Ratio' | 'ROE%' | 'RSI';

export const SIGNALS: readonly Signal[] = ['Buy', 'Sell', 'Hold'];
export const SIGNAL_FILTERS: readonly SignalFilter[] = ['All', ...SIGNALS];
export const SORT_KEYS: readonly SortKey[] = ['None', 'PE Ratio', 'ROE%', 'RSI'];

// ============================================================================
// INDICATORS
// ============================================================================

/**
 * A bar annotated with derived indicators.
 * Indicator fields are null during their warm-up period.
 */
export interface IndicatorBar extends PricePoint {
  rsi: number | null;
  sma20: number | null;
  volumeSpike: boolean | null;
}

export type IndicatorFrame = IndicatorBar[];

export interface IndicatorSettings {
  rsiPeriod: number;
  smaPeriod: number;
  volumePeriod: number;
  volumeSpikeMultiplier: number;
}

export interface ClassifierThresholds {
  rsiOversold: number;
  rsiOverbought: number;
}

// ============================================================================
// SCREEN RESULTS
// ============================================================================

export interface ScreenRow {
  ticker: string;
  peRatio: number;
  roePercent: number;
  rsi: number;
  volumeSpikeToday: boolean;
  signal: Signal;
}

export interface ScreenResult {
  fullTable: readonly ScreenRow[];
  filteredTable: readonly ScreenRow[];
}

/**
 * Why a ticker produced no row
 */
export type ExclusionReason =
  | 'missing-fundamentals'
  | 'empty-series'
  | 'insufficient-history'
  | 'undefined-indicators'
  | 'malformed-data'
  | 'transport-error';

export type RowOutcome =
  | { ok: true; row: ScreenRow; frame: IndicatorFrame }
  | { ok: false; ticker: string; reason: ExclusionReason; detail?: string };

// ============================================================================
// OPTIONS
// ============================================================================

export interface FilterBounds {
  maxPE: number;
  minROE: number;
}

export interface ViewOptions {
  signalFilter: SignalFilter;
  sortBy: SortKey;
}

/**
 * Receives chart requests for tickers in the plot set
 */
export type ChartSink = (ticker: string, frame: IndicatorFrame) => void;

export interface ScreenOptions extends Partial<FilterBounds> {
  plotTickers?: ReadonlySet<string>;
  /** Minimum interval after each successful fetch, ms */
  pacingMs?: number;
  onChart?: ChartSink;
}
