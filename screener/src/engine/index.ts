/**
 * @niftywatch/screener - signal engine
 *
 * Indicators, classification, per-ticker rows and the screen aggregator,
 * usable without the CLI.
 */

export type * from '../types/index.ts';
export { SIGNALS, SIGNAL_FILTERS, SORT_KEYS } from '../types/index.ts';

export {
  buildIndicatorFrame,
  computeRSI,
  computeVolumeSpikes,
  rollingMean,
  rsiFromAverages,
} from '../signals/indicators.ts';
export { classifySignal } from '../signals/classifier.ts';
export type { LatestIndicators } from '../signals/classifier.ts';

export { computeRow, minimumHistory, round2 } from './row.ts';
export type { RowSettings } from './row.ts';
export { screen } from './screener.ts';
export type { ScreenContext } from './screener.ts';
export { applyFilters, applyView } from './view.ts';

export {
  defaultClassifierThresholds,
  defaultFilterBounds,
  defaultIndicatorSettings,
  defaultViewOptions,
  DEFAULT_PACING_MS,
} from '../config/thresholds.ts';
export { loadScreenerConfig, defaultConfig } from '../config/settings.ts';
export type { ScreenerConfig } from '../config/schema.ts';
export { ConfigurationError, UniverseUnavailableError } from '../utils/errors.ts';
