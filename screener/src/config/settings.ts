/**
 * Screener Configuration Loader
 *
 * Merges, lowest to highest precedence:
 *   defaults < niftywatch.config.yaml < NIFTYWATCH_* env vars < CLI flags
 * and validates the result with the zod schema.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_CACHE_TTL_MS, errorMessage } from '@niftywatch/providers';
import {
  DEFAULT_PACING_MS,
  defaultFilterBounds,
  defaultViewOptions,
} from './thresholds.ts';
import {
  assertValidConfig,
  signalFilterSchema,
  sortKeySchema,
  type ScreenerConfig,
} from './schema.ts';
import { ConfigurationError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

export const CONFIG_FILE_NAME = 'niftywatch.config.yaml';

export const defaultConfig: ScreenerConfig = {
  ...defaultFilterBounds,
  ...defaultViewOptions,
  plotTickers: [],
  pacingMs: DEFAULT_PACING_MS,
  cacheTtlMs: DEFAULT_CACHE_TTL_MS,
  historyMonths: 6,
  tickersFile: 'tickers.csv',
  exportDir: 'exports',
  chartDir: 'screenshots',
};

const yamlFileSchema = z
  .object({
    max_pe: z.number(),
    min_roe: z.number(),
    signal_filter: signalFilterSchema,
    sort_by: sortKeySchema,
    plot_tickers: z.array(z.string()),
    pacing_ms: z.number(),
    cache_ttl_ms: z.number(),
    history_months: z.number(),
    tickers_file: z.string(),
    export_dir: z.string(),
    chart_dir: z.string(),
  })
  .partial()
  .strict();

export interface ConfigSources {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit YAML path; otherwise cwd and its parent are searched */
  configPath?: string;
  overrides?: Partial<ScreenerConfig>;
}

/**
 * Later layers win; undefined values never mask an earlier layer
 */
function mergeLayers(
  base: ScreenerConfig,
  layers: Partial<ScreenerConfig>[]
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

function findConfigFile(cwd: string, configPath?: string): string | null {
  if (configPath) {
    const explicit = resolve(cwd, configPath);
    if (!existsSync(explicit)) {
      throw new ConfigurationError([`config file not found: ${explicit}`]);
    }
    return explicit;
  }

  const candidates = [
    join(cwd, CONFIG_FILE_NAME),
    join(cwd, '..', CONFIG_FILE_NAME),
  ];
  return candidates.find((path) => existsSync(path)) ?? null;
}

/**
 * Read the YAML config file, if any, into camelCase settings
 */
export function readYamlConfig(
  cwd: string,
  configPath?: string
): Partial<ScreenerConfig> {
  const path = findConfigFile(cwd, configPath);
  if (!path) {
    logger.debug(`${CONFIG_FILE_NAME} not found, using defaults`);
    return {};
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError([`${path}: ${errorMessage(error)}`]);
  }

  // An empty file parses to null
  const parsed = yamlFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw ConfigurationError.fromZodIssues(parsed.error.issues);
  }

  logger.debug(`Loaded screener config from ${path}`);
  const y = parsed.data;
  return {
    maxPE: y.max_pe,
    minROE: y.min_roe,
    signalFilter: y.signal_filter,
    sortBy: y.sort_by,
    plotTickers: y.plot_tickers,
    pacingMs: y.pacing_ms,
    cacheTtlMs: y.cache_ttl_ms,
    historyMonths: y.history_months,
    tickersFile: y.tickers_file,
    exportDir: y.export_dir,
    chartDir: y.chart_dir,
  };
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Read NIFTYWATCH_* environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): Partial<ScreenerConfig> {
  return {
    maxPE: envNumber(env, 'NIFTYWATCH_MAX_PE'),
    minROE: envNumber(env, 'NIFTYWATCH_MIN_ROE'),
    pacingMs: envNumber(env, 'NIFTYWATCH_PACING_MS'),
    cacheTtlMs: envNumber(env, 'NIFTYWATCH_CACHE_TTL_MS'),
    historyMonths: envNumber(env, 'NIFTYWATCH_HISTORY_MONTHS'),
    tickersFile: envString(env, 'NIFTYWATCH_TICKERS_FILE'),
    exportDir: envString(env, 'NIFTYWATCH_EXPORT_DIR'),
    chartDir: envString(env, 'NIFTYWATCH_CHART_DIR'),
  };
}

/**
 * Build the effective configuration.
 *
 * @throws {ConfigurationError} when any layer holds an invalid value
 */
export function loadScreenerConfig(sources: ConfigSources = {}): ScreenerConfig {
  const cwd = sources.cwd ?? process.cwd();

  const merged = mergeLayers(defaultConfig, [
    readYamlConfig(cwd, sources.configPath),
    readEnvConfig(sources.env ?? process.env),
    sources.overrides ?? {},
  ]);

  const config = assertValidConfig(merged);
  return {
    ...config,
    plotTickers: config.plotTickers.map((t) => t.trim().toUpperCase()),
    tickersFile: resolve(cwd, config.tickersFile),
    exportDir: resolve(cwd, config.exportDir),
    chartDir: resolve(cwd, config.chartDir),
  };
}
