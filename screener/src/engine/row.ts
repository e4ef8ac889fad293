import type { Fundamentals, PriceSeries } from '@niftywatch/providers';
import type {
  ClassifierThresholds,
  ExclusionReason,
  IndicatorSettings,
  RowOutcome,
} from '../types/index.ts';
import {
  defaultClassifierThresholds,
  defaultIndicatorSettings,
} from '../config/thresholds.ts';
import { buildIndicatorFrame } from '../signals/indicators.ts';
import { classifySignal } from '../signals/classifier.ts';

export interface RowSettings {
  indicators: IndicatorSettings;
  thresholds: ClassifierThresholds;
}

const defaultRowSettings: RowSettings = {
  indicators: defaultIndicatorSettings,
  thresholds: defaultClassifierThresholds,
};

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Bars needed before the latest bar can carry both RSI and SMA
 */
export function minimumHistory(settings: IndicatorSettings): number {
  return Math.max(settings.rsiPeriod + 1, settings.smaPeriod);
}

/**
 * Providers outside this repo may leave a ratio undefined or NaN
 */
function isReported(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function excluded(
  ticker: string,
  reason: ExclusionReason,
  detail?: string
): RowOutcome {
  return { ok: false, ticker, reason, detail };
}

/**
 * Turn one ticker's inputs into a screen row, or say why it has none.
 * Pure: no I/O, no logging.
 */
export function computeRow(
  ticker: string,
  fundamentals: Partial<Fundamentals>,
  series: PriceSeries,
  settings: RowSettings = defaultRowSettings
): RowOutcome {
  const { trailingPE, returnOnEquity } = fundamentals;
  if (!isReported(trailingPE)) {
    return excluded(ticker, 'missing-fundamentals', 'no trailing PE');
  }
  if (!isReported(returnOnEquity)) {
    return excluded(ticker, 'missing-fundamentals', 'no return on equity');
  }

  if (series.length === 0) {
    return excluded(ticker, 'empty-series');
  }

  const required = minimumHistory(settings.indicators);
  if (series.length < required) {
    return excluded(
      ticker,
      'insufficient-history',
      `${series.length}/${required} bars`
    );
  }

  const frame = buildIndicatorFrame(series, settings.indicators);
  const latest = frame.at(-1);
  if (
    !latest ||
    latest.rsi === null ||
    latest.sma20 === null ||
    !Number.isFinite(latest.rsi) ||
    !Number.isFinite(latest.sma20)
  ) {
    return excluded(ticker, 'undefined-indicators', 'RSI or SMA undefined on latest bar');
  }

  const signal = classifySignal(
    { rsi: latest.rsi, close: latest.close, sma20: latest.sma20 },
    settings.thresholds
  );

  return {
    ok: true,
    frame,
    row: Object.freeze({
      ticker,
      peRatio: round2(trailingPE),
      roePercent: round2(returnOnEquity * 100),
      rsi: round2(latest.rsi),
      volumeSpikeToday: latest.volumeSpike === true,
      signal,
    }),
  };
}
