#!/usr/bin/env tsx
/**
 * NiftyWatch CLI
 *
 * Technical + fundamental screener: RSI, 20-day SMA and volume spikes
 * combined with PE and ROE filters.
 *
 * Usage: niftywatch <command> [options]
 */

import { config } from 'dotenv';
import { Command, Option } from 'commander';
import { errorMessage } from '@niftywatch/providers';
import { runScan, type ScanOptions } from './commands/scan.ts';
import {
  runRefreshTickers,
  type RefreshOptions,
} from './commands/refresh-tickers.ts';
import { SIGNAL_FILTERS, SORT_KEYS } from './types/index.ts';
import { logger } from './utils/logger.ts';

config();

const program = new Command();

program
  .name('niftywatch')
  .description('RSI / SMA / PE / ROE stock screener')
  .version('1.0.0');

// ============================================================================
// SCAN: Screen the ticker universe
// ============================================================================
program
  .command('scan')
  .description('Screen tickers and print the filtered shortlist')
  .option('--tickers <symbols>', 'Comma-separated tickers (default: ticker file)')
  .option('--plot <symbols>', 'Comma-separated tickers to chart')
  .option('--max-pe <n>', 'Maximum PE ratio', (v: string) => Number(v))
  .option('--min-roe <pct>', 'Minimum ROE (%)', (v: string) => Number(v))
  .addOption(
    new Option('--signal <signal>', 'Show only this signal').choices([
      ...SIGNAL_FILTERS,
    ])
  )
  .addOption(
    new Option('--sort <column>', 'Sort results by').choices([...SORT_KEYS])
  )
  .option('--config <path>', 'Path to niftywatch.config.yaml')
  .option('--no-export', 'Skip writing CSV exports')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: ScanOptions) => {
    await runScan(opts);
  });

// ============================================================================
// REFRESH-TICKERS: Rebuild the ticker file from NSE
// ============================================================================
program
  .command('refresh-tickers')
  .description('Download the NIFTY 50 list from NSE into the ticker file')
  .option('--config <path>', 'Path to niftywatch.config.yaml')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: RefreshOptions) => {
    const result = await runRefreshTickers(opts);
    if (!result.ok) process.exitCode = 1;
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  logger.error(errorMessage(error));
  process.exitCode = 1;
}
