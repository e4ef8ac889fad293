/**
 * Refresh Tickers Command
 *
 * Rebuilds the ticker file from the NSE NIFTY 50 constituents list.
 *
 * Usage:
 *   niftywatch refresh-tickers
 */

import chalk from 'chalk';
import {
  CsvTickerFile,
  refreshNifty50,
  type RefreshResult,
} from '@niftywatch/providers';
import { loadScreenerConfig } from '../config/settings.ts';
import { logger } from '../utils/logger.ts';

export interface RefreshOptions {
  config?: string;
  verbose: boolean;
}

export interface RefreshDependencies {
  fetchImpl?: typeof fetch;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export async function runRefreshTickers(
  options: RefreshOptions,
  deps: RefreshDependencies = {}
): Promise<RefreshResult> {
  logger.setVerbose(options.verbose);
  const config = loadScreenerConfig({
    cwd: deps.cwd,
    env: deps.env,
    configPath: options.config,
  });
  const file = new CsvTickerFile(config.tickersFile);

  const previous = file.lastModified();
  if (previous) {
    logger.info(
      `Last updated from file: ${chalk.gray(formatTimestamp(previous))}`
    );
  }

  const result = await refreshNifty50(file, {
    fetchImpl: deps.fetchImpl,
    logger,
  });

  if (result.ok) {
    logger.success(result.message);
    logger.info(`Updated at: ${formatTimestamp(result.fetchedAt)}`);
  } else {
    logger.error(result.message);
  }
  return result;
}
