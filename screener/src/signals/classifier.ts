import type { ClassifierThresholds, Signal } from '../types/index.ts';
import { defaultClassifierThresholds } from '../config/thresholds.ts';

export interface LatestIndicators {
  rsi: number | null;
  close: number;
  sma20: number | null;
}

/**
 * Three-way decision over the latest bar only:
 * - Buy: oversold RSI while price holds above its 20-day SMA
 * - Sell: overbought RSI while price sits below its 20-day SMA
 * - Hold: everything else, including missing indicators
 */
export function classifySignal(
  { rsi, close, sma20 }: LatestIndicators,
  thresholds: ClassifierThresholds = defaultClassifierThresholds
): Signal {
  if (rsi === null || sma20 === null) return 'Hold';

  if (rsi < thresholds.rsiOversold && close > sma20) return 'Buy';
  if (rsi > thresholds.rsiOverbought && close < sma20) return 'Sell';
  return 'Hold';
}
