import type {
  ClassifierThresholds,
  FilterBounds,
  IndicatorSettings,
  ViewOptions,
} from '../types/index.ts';

/**
 * Indicator windows. The volume average includes the current bar.
 */
export const defaultIndicatorSettings: IndicatorSettings = {
  rsiPeriod: 14,
  smaPeriod: 20,
  volumePeriod: 20,
  volumeSpikeMultiplier: 1.5,
};

export const defaultClassifierThresholds: ClassifierThresholds = {
  rsiOversold: 30,
  rsiOverbought: 70,
};

export const defaultFilterBounds: FilterBounds = {
  maxPE: 30,
  minROE: 15,
};

export const defaultViewOptions: ViewOptions = {
  signalFilter: 'All',
  sortBy: 'None',
};

// Upstream allows roughly one request per second
export const DEFAULT_PACING_MS = 1100;
