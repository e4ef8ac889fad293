import type {
  FilterBounds,
  ScreenRow,
  SortKey,
  ViewOptions,
} from '../types/index.ts';

const SORT_FIELDS: Record<
  Exclude<SortKey, 'None'>,
  (row: ScreenRow) => number
> = {
  'PE Ratio': (row) => row.peRatio,
  'ROE%': (row) => row.roePercent,
  RSI: (row) => row.rsi,
};

/**
 * Rows passing both fundamental bounds, in their original order
 */
export function applyFilters(
  rows: readonly ScreenRow[],
  { maxPE, minROE }: FilterBounds
): ScreenRow[] {
  return rows.filter((row) => row.peRatio <= maxPE && row.roePercent >= minROE);
}

/**
 * Presentation view over a table: optional signal filter, then an
 * ascending stable sort on the chosen column.
 */
export function applyView(
  rows: readonly ScreenRow[],
  { signalFilter, sortBy }: ViewOptions
): ScreenRow[] {
  const selected =
    signalFilter === 'All'
      ? [...rows]
      : rows.filter((row) => row.signal === signalFilter);

  if (sortBy === 'None') return selected;

  const field = SORT_FIELDS[sortBy];
  return selected.sort((a, b) => field(a) - field(b));
}
