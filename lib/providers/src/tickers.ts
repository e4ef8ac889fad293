/**
 * Ticker universe management
 *
 * The screen reads its universe from a one-column CSV (`Ticker` header).
 * `refreshNifty50` rebuilds that file from the NSE index constituents list.
 */

import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { TickerUniverseSource } from './types.ts';
import { errorMessage } from './errors.ts';
import { silentLogger, type ProviderLogger } from './logger.ts';

export const NIFTY50_CSV_URL =
  'https://archives.nseindia.com/content/indices/ind_nifty50list.csv';

const FETCH_TIMEOUT_MS = 10_000;

/**
 * Normalize a user-supplied list ("tcs.ns, infy.ns") into upper-case symbols.
 * Blank entries are dropped, duplicates keep their first position.
 */
export function parseTickerList(input: string): string[] {
  const seen = new Set<string>();
  for (const raw of input.split(',')) {
    const symbol = raw.trim().toUpperCase();
    if (symbol) seen.add(symbol);
  }
  return [...seen];
}

/**
 * Convert an NSE symbol to its Yahoo Finance form (RELIANCE -> RELIANCE.NS)
 */
export function toYahooSymbol(nseSymbol: string): string {
  return `${nseSymbol.trim().toUpperCase()}.NS`;
}

/**
 * Read one named column out of a CSV document with a header row.
 * Rows missing the column are skipped.
 */
function readColumn(csv: string, column: string): string[] {
  const records: unknown = parse(csv, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  if (!Array.isArray(records)) return [];

  const values: string[] = [];
  for (const row of records) {
    if (typeof row !== 'object' || row === null) continue;
    const value: unknown = Reflect.get(row, column);
    if (typeof value === 'string' && value.length > 0) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Extract symbols from the NSE constituents CSV (column `Symbol`)
 */
export function parseNseConstituents(csv: string): string[] {
  return readColumn(csv, 'Symbol').map(toYahooSymbol);
}

/**
 * Tickers persisted in a CSV file with a `Ticker` column.
 * A missing or unreadable file is a fatal error for the whole screen.
 */
export class CsvTickerFile implements TickerUniverseSource {
  constructor(readonly path: string) {}

  async loadTickers(): Promise<string[]> {
    if (!existsSync(this.path)) {
      throw new Error(
        `Ticker file not found: ${this.path}. Run "refresh-tickers" first.`
      );
    }

    return readColumn(readFileSync(this.path, 'utf-8'), 'Ticker').map(
      (ticker) => ticker.toUpperCase()
    );
  }

  save(tickers: string[]): void {
    writeFileSync(
      this.path,
      stringify(
        tickers.map((ticker) => [ticker]),
        { header: true, columns: ['Ticker'] }
      )
    );
  }

  lastModified(): Date | null {
    return existsSync(this.path) ? statSync(this.path).mtime : null;
  }
}

export interface RefreshResult {
  ok: boolean;
  message: string;
  count: number;
  fetchedAt: Date;
}

/**
 * Download the NIFTY 50 list from NSE and overwrite the ticker file.
 * Failures are reported in the result rather than thrown.
 */
export async function refreshNifty50(
  file: CsvTickerFile,
  options: {
    url?: string;
    fetchImpl?: typeof fetch;
    logger?: ProviderLogger;
  } = {}
): Promise<RefreshResult> {
  const url = options.url ?? NIFTY50_CSV_URL;
  const fetchImpl = options.fetchImpl ?? fetch;
  const log = options.logger ?? silentLogger;
  const fetchedAt = new Date();

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  try {
    log.debug(`Fetching NIFTY 50 constituents from ${url}`);
    const response = await fetchImpl(url, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`NSE responded ${response.status}`);
    }

    const tickers = parseNseConstituents(await response.text());
    if (tickers.length === 0) {
      throw new Error('constituents list was empty');
    }

    file.save(tickers);
    return {
      ok: true,
      message: `Updated ${tickers.length} NIFTY 50 tickers`,
      count: tickers.length,
      fetchedAt,
    };
  } catch (error) {
    return {
      ok: false,
      message: `Failed to update: ${errorMessage(error)}`,
      count: 0,
      fetchedAt,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
