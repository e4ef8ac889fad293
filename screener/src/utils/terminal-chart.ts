import chalk from 'chalk';
import type { IndicatorFrame } from '../types/index.ts';

interface ChartConfig {
  width: number;
  height: number;
  /** Off for charts written to files */
  color: boolean;
}

const DEFAULT_CONFIG: ChartConfig = {
  width: 70,
  height: 12,
  color: true,
};

const MIN_BARS = 20;

const identity = (text: string) => text;

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Close vs 20-day SMA as a character chart.
 * Price bars are drawn first; the SMA only fills empty cells.
 */
export function generatePriceChart(
  frame: IndicatorFrame,
  config: Partial<ChartConfig> = {}
): string[] {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const up = cfg.color ? chalk.green : identity;
  const down = cfg.color ? chalk.red : identity;
  const sma = cfg.color ? chalk.cyan : identity;
  const dim = cfg.color ? chalk.gray : identity;

  if (frame.length < MIN_BARS) {
    return [dim('Insufficient data for chart')];
  }

  const chartData = frame.slice(-cfg.width);
  const closes = chartData.map((bar) => bar.close);
  const averages = chartData
    .map((bar) => bar.sma20)
    .filter((value): value is number => value !== null);

  const minPrice = Math.min(...closes, ...averages) * 0.998;
  const maxPrice = Math.max(...closes, ...averages) * 1.002;
  const priceRange = maxPrice - minPrice || 1;

  const toRow = (price: number) =>
    cfg.height -
    1 -
    Math.round(((price - minPrice) / priceRange) * (cfg.height - 1));

  const grid: string[][] = Array.from({ length: cfg.height }, () =>
    Array<string>(cfg.width).fill(' ')
  );

  chartData.forEach((bar, x) => {
    const row = grid[toRow(bar.close)];
    if (!row) return;
    const prevClose = x > 0 ? closes[x - 1] : bar.close;
    row[x] = bar.close >= prevClose ? up('█') : down('█');
  });

  chartData.forEach((bar, x) => {
    if (bar.sma20 === null) return;
    const row = grid[toRow(bar.sma20)];
    if (row && row[x] === ' ') {
      row[x] = sma('─');
    }
  });

  const priceLabels = [
    maxPrice.toFixed(2),
    ((maxPrice + minPrice) / 2).toFixed(2),
    minPrice.toFixed(2),
  ];

  const lines: string[] = [];
  lines.push(dim(`  ${priceLabels[0].padStart(9)} ┌${'─'.repeat(cfg.width)}┐`));

  grid.forEach((cells, row) => {
    const label =
      row === Math.floor(cfg.height / 2)
        ? dim(`  ${priceLabels[1].padStart(9)}`)
        : ' '.repeat(11);
    lines.push(`${label} ${dim('│')}${cells.join('')}${dim('│')}`);
  });

  lines.push(dim(`  ${priceLabels[2].padStart(9)} └${'─'.repeat(cfg.width)}┘`));

  const first = chartData[0];
  const last = chartData[chartData.length - 1];
  const start = formatDay(first.date);
  const end = formatDay(last.date);
  const gap = Math.max(1, cfg.width + 2 - start.length - end.length);
  lines.push(dim(`            ${start}${' '.repeat(gap)}${end}`));

  return lines;
}

/**
 * Legend line shown under a chart
 */
export function chartLegend(ticker: string, color = true): string {
  const sma = color ? chalk.cyan('─') : '─';
  const price = color ? chalk.green('█') : '█';
  return `  ${ticker} - Price vs SMA   ${price} close   ${sma} SMA20`;
}
