/**
 * Screener Configuration Zod Schema
 *
 * Runtime validation for filter bounds and the merged CLI/env/YAML settings.
 * Bad values are rejected before the first ticker is fetched.
 */

import { z } from 'zod';
import type { FilterBounds, SignalFilter, SortKey } from '../types/index.ts';
import { ConfigurationError } from '../utils/errors.ts';

export const signalFilterSchema = z.enum(['All', 'Buy', 'Sell', 'Hold']);
export const sortKeySchema = z.enum(['None', 'PE Ratio', 'ROE%', 'RSI']);

export const filterBoundsSchema = z.object({
  maxPE: z.number().finite().min(0, 'max PE must not be negative'),
  minROE: z.number().finite(),
});

export const screenerConfigSchema = z.object({
  maxPE: filterBoundsSchema.shape.maxPE,
  minROE: filterBoundsSchema.shape.minROE,
  signalFilter: signalFilterSchema,
  sortBy: sortKeySchema,
  plotTickers: z.array(z.string().min(1)),
  pacingMs: z.number().int().min(0),
  cacheTtlMs: z.number().int().positive(),
  historyMonths: z.number().int().min(1).max(120),
  tickersFile: z.string().min(1),
  exportDir: z.string().min(1),
  chartDir: z.string().min(1),
});

export type ScreenerConfig = z.infer<typeof screenerConfigSchema>;

/**
 * Validate a fully merged config.
 *
 * @throws {ConfigurationError} listing every offending field
 */
export function assertValidConfig(config: unknown): ScreenerConfig {
  const result = screenerConfigSchema.safeParse(config);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues(result.error.issues);
  }
  return result.data;
}

/**
 * @throws {ConfigurationError} for negative PE thresholds or non-finite bounds
 */
export function assertValidBounds(bounds: FilterBounds): FilterBounds {
  const result = filterBoundsSchema.safeParse(bounds);
  if (!result.success) {
    throw ConfigurationError.fromZodIssues(result.error.issues);
  }
  return result.data;
}

function parseChoice<T extends string>(
  schema: z.ZodType<T>,
  flag: string,
  value: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${flag}: ${issue.message}`)
    );
  }
  return result.data;
}

export function parseSignalFilter(value: string): SignalFilter {
  return parseChoice(signalFilterSchema, 'signal', value);
}

export function parseSortKey(value: string): SortKey {
  return parseChoice(sortKeySchema, 'sort', value);
}
