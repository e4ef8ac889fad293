import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  chartPath,
  exportResults,
  rowsToCsv,
  writeChart,
} from '../src/storage/export.ts';
import { chartLegend, generatePriceChart } from '../src/utils/terminal-chart.ts';
import { buildIndicatorFrame } from '../src/signals/indicators.ts';
import { defaultIndicatorSettings } from '../src/config/thresholds.ts';
import type { ScreenRow } from '../src/types/index.ts';
import { createSeries, risingCloses } from './helpers.ts';

const HEADER = 'Ticker,PE Ratio,ROE (%),RSI,Volume Spike Today,Signal';

const ROW_A: ScreenRow = {
  ticker: 'A',
  peRatio: 10,
  roePercent: 20,
  rsi: 100,
  volumeSpikeToday: false,
  signal: 'Hold',
};

const ROW_B: ScreenRow = {
  ticker: 'B',
  peRatio: 50,
  roePercent: 25.5,
  rsi: 28.31,
  volumeSpikeToday: true,
  signal: 'Buy',
};

function risingFrame(count: number) {
  return buildIndicatorFrame(
    createSeries(risingCloses(count)),
    defaultIndicatorSettings
  );
}

describe('rowsToCsv', () => {
  it('writes the header and one line per row', () => {
    expect(rowsToCsv([ROW_A, ROW_B])).toBe(
      `${HEADER}\nA,10,20,100,No,Hold\nB,50,25.5,28.31,Yes,Buy\n`
    );
  });
});

describe('exportResults', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'niftywatch-export-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes both tables into a created directory', () => {
    const target = join(dir, 'nested', 'exports');
    const paths = exportResults(
      { fullTable: [ROW_A, ROW_B], filteredTable: [ROW_A] },
      target
    );

    expect(paths).toEqual({
      all: join(target, 'all_results.csv'),
      filtered: join(target, 'filtered_results.csv'),
    });
    expect(readFileSync(paths.all, 'utf-8')).toBe(
      `${HEADER}\nA,10,20,100,No,Hold\nB,50,25.5,28.31,Yes,Buy\n`
    );
    expect(readFileSync(paths.filtered, 'utf-8')).toBe(
      `${HEADER}\nA,10,20,100,No,Hold\n`
    );
  });

  it('writes a chart file with its legend', () => {
    const path = writeChart(dir, 'TCS.NS', risingFrame(25));

    expect(path).toBe(chartPath(dir, 'TCS.NS'));
    expect(path.endsWith('TCS.NS_chart.txt')).toBe(true);

    const lines = readFileSync(path, 'utf-8').split('\n');
    // 15 chart lines, the legend, then the trailing newline
    expect(lines).toHaveLength(17);
    expect(lines[15]).toBe(chartLegend('TCS.NS', false));
    expect(lines[16]).toBe('');
  });
});

describe('generatePriceChart', () => {
  it('frames the grid with price labels and a date axis', () => {
    const lines = generatePriceChart(risingFrame(25), { color: false });

    expect(lines).toHaveLength(15);
    expect(lines[0]).toBe(`     124.25 ┌${'─'.repeat(70)}┐`);
    expect(lines[13]).toBe(`      99.80 └${'─'.repeat(70)}┘`);
    expect(lines[14]).toBe(
      `            2024-01-01${' '.repeat(52)}2024-01-25`
    );
  });

  it('draws one price cell per bar', () => {
    const lines = generatePriceChart(risingFrame(25), { color: false });
    const cells = lines.join('').split('').filter((c) => c === '█');
    expect(cells).toHaveLength(25);
  });

  it('honours a custom height', () => {
    const lines = generatePriceChart(risingFrame(30), {
      color: false,
      height: 6,
    });
    expect(lines).toHaveLength(9);
  });

  it('reports short series instead of drawing', () => {
    expect(generatePriceChart(risingFrame(19), { color: false })).toEqual([
      'Insufficient data for chart',
    ]);
  });
});

describe('chartLegend', () => {
  it('names the ticker', () => {
    expect(chartLegend('INFY.NS', false)).toBe(
      '  INFY.NS - Price vs SMA   █ close   ─ SMA20'
    );
  });
});
