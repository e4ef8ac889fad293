/**
 * Report export
 *
 * Writes the full and filtered tables as CSV and plotted tickers as
 * plain-text charts.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify } from 'csv-stringify/sync';
import type {
  IndicatorFrame,
  ScreenResult,
  ScreenRow,
} from '../types/index.ts';
import { chartLegend, generatePriceChart } from '../utils/terminal-chart.ts';

export const EXPORT_COLUMNS = [
  'Ticker',
  'PE Ratio',
  'ROE (%)',
  'RSI',
  'Volume Spike Today',
  'Signal',
];

export function toRecord(row: ScreenRow): Array<string | number> {
  return [
    row.ticker,
    row.peRatio,
    row.roePercent,
    row.rsi,
    row.volumeSpikeToday ? 'Yes' : 'No',
    row.signal,
  ];
}

export function rowsToCsv(rows: readonly ScreenRow[]): string {
  return stringify(rows.map(toRecord), {
    header: true,
    columns: EXPORT_COLUMNS,
  });
}

export interface ExportPaths {
  all: string;
  filtered: string;
}

export function exportResults(result: ScreenResult, dir: string): ExportPaths {
  mkdirSync(dir, { recursive: true });

  const paths: ExportPaths = {
    all: join(dir, 'all_results.csv'),
    filtered: join(dir, 'filtered_results.csv'),
  };
  writeFileSync(paths.all, rowsToCsv(result.fullTable));
  writeFileSync(paths.filtered, rowsToCsv(result.filteredTable));
  return paths;
}

export function chartPath(dir: string, ticker: string): string {
  return join(dir, `${ticker}_chart.txt`);
}

export function writeChart(
  dir: string,
  ticker: string,
  frame: IndicatorFrame
): string {
  mkdirSync(dir, { recursive: true });
  const path = chartPath(dir, ticker);
  const lines = [
    ...generatePriceChart(frame, { color: false }),
    chartLegend(ticker, false),
  ];
  writeFileSync(path, `${lines.join('\n')}\n`);
  return path;
}
