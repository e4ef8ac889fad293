/**
 * Scan Command
 *
 * Screens the ticker universe, prints the filtered shortlist, writes the
 * CSV exports and a chart for every plotted ticker.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  CachedMarketDataProvider,
  CsvTickerFile,
  YahooProvider,
  errorMessage,
  parseTickerList,
  type MarketDataProvider,
} from '@niftywatch/providers';
import { loadScreenerConfig } from '../config/settings.ts';
import { parseSignalFilter, parseSortKey } from '../config/schema.ts';
import { screen } from '../engine/screener.ts';
import { applyView } from '../engine/view.ts';
import { exportResults, writeChart, type ExportPaths } from '../storage/export.ts';
import { chartLegend, generatePriceChart } from '../utils/terminal-chart.ts';
import { UniverseUnavailableError } from '../utils/errors.ts';
import { colorSignal, logger } from '../utils/logger.ts';
import type {
  IndicatorFrame,
  ScreenResult,
  ScreenRow,
} from '../types/index.ts';

export interface ScanOptions {
  tickers?: string;
  plot?: string;
  maxPe?: number;
  minRoe?: number;
  signal?: string;
  sort?: string;
  config?: string;
  export: boolean;
  verbose: boolean;
}

export interface ScanReport {
  result: ScreenResult;
  view: ScreenRow[];
  exports: ExportPaths | null;
  charts: string[];
}

export interface ScanDependencies {
  provider?: MarketDataProvider;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
}

function renderTable(rows: readonly ScreenRow[]): string {
  const table = new Table({
    head: [
      chalk.magenta('Ticker'),
      chalk.magenta('PE Ratio'),
      chalk.magenta('ROE (%)'),
      chalk.magenta('RSI'),
      chalk.magenta('Vol Spike'),
      chalk.magenta('Signal'),
    ],
    colWidths: [16, 10, 10, 8, 11, 8],
    style: { head: [], border: ['gray'] },
  });

  for (const row of rows) {
    table.push([
      chalk.bold(row.ticker),
      row.peRatio.toFixed(2),
      row.roePercent.toFixed(2),
      row.rsi.toFixed(2),
      row.volumeSpikeToday ? chalk.yellow('Yes') : chalk.gray('No'),
      colorSignal(row.signal),
    ]);
  }

  return table.toString();
}

export async function runScan(
  options: ScanOptions,
  deps: ScanDependencies = {}
): Promise<ScanReport> {
  logger.setVerbose(options.verbose);

  const config = loadScreenerConfig({
    cwd: deps.cwd,
    env: deps.env,
    configPath: options.config,
    overrides: {
      maxPE: options.maxPe,
      minROE: options.minRoe,
      signalFilter:
        options.signal === undefined
          ? undefined
          : parseSignalFilter(options.signal),
      sortBy: options.sort === undefined ? undefined : parseSortKey(options.sort),
      plotTickers:
        options.plot === undefined ? undefined : parseTickerList(options.plot),
    },
  });

  let tickers: string[];
  if (options.tickers) {
    tickers = parseTickerList(options.tickers);
  } else {
    try {
      tickers = await new CsvTickerFile(config.tickersFile).loadTickers();
    } catch (error) {
      throw new UniverseUnavailableError(
        `Could not load ticker list: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  const provider =
    deps.provider ??
    new CachedMarketDataProvider(
      new YahooProvider({ historyMonths: config.historyMonths, logger }),
      { ttlMs: config.cacheTtlMs, logger }
    );

  logger.header('NiftyWatch Screener');
  logger.info(`Tickers to scan: ${tickers.length}`);
  logger.info(
    `Max PE: ${config.maxPE} | Min ROE: ${config.minROE}% | ` +
      `Signal: ${config.signalFilter} | Sort: ${config.sortBy}`
  );
  if (config.plotTickers.length > 0) {
    logger.info(`Charts: ${config.plotTickers.join(', ')}`);
  }
  logger.divider();

  const frames = new Map<string, IndicatorFrame>();
  const charts: string[] = [];

  const result = await screen(
    tickers,
    {
      maxPE: config.maxPE,
      minROE: config.minROE,
      plotTickers: new Set(config.plotTickers),
      pacingMs: config.pacingMs,
      onChart: (ticker, frame) => {
        charts.push(writeChart(config.chartDir, ticker, frame));
        frames.set(ticker, frame);
      },
    },
    { provider, logger, verbose: options.verbose, sleep: deps.sleep }
  );

  for (const row of result.fullTable) {
    logger.ticker(row.ticker, row.rsi, row.signal);
  }

  const view = applyView(result.filteredTable, config);

  console.log();
  if (view.length === 0) {
    console.log(chalk.yellow('  No stocks meet the screen criteria'));
  } else {
    console.log(chalk.bold.green(`\n  Filtered Results (${view.length}):\n`));
    console.log(renderTable(view));
  }

  for (const [ticker, frame] of frames) {
    console.log();
    console.log(generatePriceChart(frame).join('\n'));
    console.log(chartLegend(ticker));
  }

  let exports: ExportPaths | null = null;
  if (options.export) {
    exports = exportResults(result, config.exportDir);
    logger.success(`Exported ${exports.all} and ${exports.filtered}`);
  }

  console.log();
  return { result, view, exports, charts };
}
