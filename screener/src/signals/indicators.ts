import { SMA } from 'technicalindicators';
import type { PriceSeries } from '@niftywatch/providers';
import type { IndicatorFrame, IndicatorSettings } from '../types/index.ts';
import { defaultIndicatorSettings } from '../config/thresholds.ts';

function nulls(length: number): (number | null)[] {
  return new Array<number | null>(length).fill(null);
}

/**
 * Trailing simple moving average aligned to the input.
 * The first `period - 1` entries are null.
 */
export function rollingMean(
  values: number[],
  period: number
): (number | null)[] {
  const out = nulls(values.length);
  if (period <= 0 || values.length < period) return out;

  const means = SMA.calculate({ values, period });
  means.forEach((mean, i) => {
    out[i + period - 1] = mean;
  });
  return out;
}

/**
 * RSI from average gain and average loss.
 * No losses in the window means RSI 100; no movement at all has no RSI.
 */
export function rsiFromAverages(
  avgGain: number,
  avgLoss: number
): number | null {
  if (avgLoss === 0) {
    return avgGain > 0 ? 100 : null;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * RSI over simple (not Wilder-smoothed) averages of gains and losses.
 *
 * Bar t needs `period` deltas ending at t, so values start at index `period`.
 * Each window is summed on its own so a flat window is exactly zero.
 */
export function computeRSI(
  closes: number[],
  period: number = defaultIndicatorSettings.rsiPeriod
): (number | null)[] {
  const out = nulls(closes.length);
  if (period <= 0 || closes.length <= period) return out;

  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let t = 1; t < closes.length; t++) {
    const delta = closes[t] - closes[t - 1];
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));
  }

  for (let t = period; t < closes.length; t++) {
    let gainSum = 0;
    let lossSum = 0;
    for (let k = t - period + 1; k <= t; k++) {
      gainSum += gains[k];
      lossSum += losses[k];
    }
    out[t] = rsiFromAverages(gainSum / period, lossSum / period);
  }
  return out;
}

/**
 * Flags bars whose volume exceeds `multiplier` times the trailing average.
 * The average window includes the bar itself.
 */
export function computeVolumeSpikes(
  volumes: number[],
  period: number = defaultIndicatorSettings.volumePeriod,
  multiplier: number = defaultIndicatorSettings.volumeSpikeMultiplier
): (boolean | null)[] {
  return rollingMean(volumes, period).map((mean, i) =>
    mean === null ? null : volumes[i] > multiplier * mean
  );
}

/**
 * Annotate a price series with RSI, SMA and the volume-spike flag.
 * Pure: never throws, warm-up values are null.
 */
export function buildIndicatorFrame(
  series: PriceSeries,
  settings: IndicatorSettings = defaultIndicatorSettings
): IndicatorFrame {
  const closes = series.map((bar) => bar.close);
  const volumes = series.map((bar) => bar.volume);

  const rsi = computeRSI(closes, settings.rsiPeriod);
  const sma = rollingMean(closes, settings.smaPeriod);
  const spikes = computeVolumeSpikes(
    volumes,
    settings.volumePeriod,
    settings.volumeSpikeMultiplier
  );

  return series.map((bar, i) => ({
    ...bar,
    rsi: rsi[i],
    sma20: sma[i],
    volumeSpike: spikes[i],
  }));
}
