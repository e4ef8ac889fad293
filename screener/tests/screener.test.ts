/**
 * Tests for the screen aggregator
 */
import { describe, it, expect, vi } from 'vitest';
import { TransportError, silentLogger } from '@niftywatch/providers';
import { ConfigurationError, screen } from '../src/engine/index.ts';
import type { ScreenContext } from '../src/engine/index.ts';
import type { PricePoint } from '@niftywatch/providers';
import { FakeProvider, bundle, createSeries, risingCloses } from './helpers.ts';

function context(provider: FakeProvider): ScreenContext {
  return {
    provider,
    logger: silentLogger,
    sleep: async () => {},
  };
}

const RISING = risingCloses(25);

describe('screen', () => {
  it('builds the full and filtered tables for two tickers', async () => {
    const provider = new FakeProvider({
      A: bundle('A', 10, 0.2, RISING),
      B: bundle('B', 50, 0.25, RISING),
    });

    const result = await screen(['A', 'B'], {}, context(provider));

    expect(result.fullTable.map((r) => r.ticker)).toEqual(['A', 'B']);
    expect(result.fullTable[0]).toEqual({
      ticker: 'A',
      peRatio: 10,
      roePercent: 20,
      rsi: 100,
      volumeSpikeToday: false,
      signal: 'Hold',
    });
    expect(result.filteredTable.map((r) => r.ticker)).toEqual(['A']);
  });

  it('skips failing tickers and keeps input order', async () => {
    const provider = new FakeProvider({
      NOPE: bundle('NOPE', null, 0.2, RISING),
      A: bundle('A', 10, 0.2, RISING),
      ERR: new TransportError('ERR', 'summary request failed'),
      SHORT: bundle('SHORT', 10, 0.2, risingCloses(19)),
      B: bundle('B', 12, 0.3, RISING),
    });

    const result = await screen(
      ['NOPE', 'A', 'ERR', 'SHORT', 'MISSING', 'B'],
      {},
      context(provider)
    );

    expect(provider.calls).toEqual(['NOPE', 'A', 'ERR', 'SHORT', 'MISSING', 'B']);
    expect(result.fullTable.map((r) => r.ticker)).toEqual(['A', 'B']);
  });

  it('skips a ticker whose bars cannot be read and keeps the rest', async () => {
    const broken: PricePoint = {
      date: new Date(Date.UTC(2024, 0, 25)),
      open: 1,
      high: 1,
      low: 1,
      get close(): number {
        throw new TypeError('close is not readable');
      },
      volume: 1,
    };
    const provider = new FakeProvider({
      BAD: {
        ticker: 'BAD',
        fundamentals: { trailingPE: 10, returnOnEquity: 0.2 },
        series: [...createSeries(risingCloses(24)), broken],
      },
      GOOD: bundle('GOOD', 10, 0.2, RISING),
    });
    const log = { ...silentLogger, debug: vi.fn() };

    const result = await screen(['BAD', 'GOOD'], {}, {
      provider,
      logger: log,
      sleep: async () => {},
    });

    expect(result.fullTable.map((r) => r.ticker)).toEqual(['GOOD']);
    expect(log.debug).toHaveBeenCalledWith(
      'Skipping BAD: malformed data (close is not readable)'
    );
  });

  it('never includes a ticker with absent fundamentals', async () => {
    const provider = new FakeProvider({
      X: bundle('X', 10, null, risingCloses(120)),
    });

    const result = await screen(['X'], {}, context(provider));
    expect(result.fullTable).toEqual([]);
  });

  it('returns two empty tables when nothing qualifies', async () => {
    const provider = new FakeProvider({});

    const empty = await screen([], {}, context(provider));
    const skipped = await screen(['MISSING'], {}, context(provider));

    expect(empty).toEqual({ fullTable: [], filteredTable: [] });
    expect(skipped).toEqual({ fullTable: [], filteredTable: [] });
  });

  it('applies custom bounds inclusively', async () => {
    const provider = new FakeProvider({
      A: bundle('A', 20, 0.1, RISING),
      B: bundle('B', 20.01, 0.5, RISING),
      C: bundle('C', 5, 0.0999, RISING),
    });

    const result = await screen(
      ['A', 'B', 'C'],
      { maxPE: 20, minROE: 10 },
      context(provider)
    );

    expect(result.filteredTable.map((r) => r.ticker)).toEqual(['A']);
  });

  it('keeps filtered rows a subset of the full table that satisfies the bounds', async () => {
    const data: Record<string, ReturnType<typeof bundle>> = {};
    const tickers: string[] = [];
    [8, 15, 29.99, 30, 31, 45].forEach((pe, i) => {
      [0.05, 0.15, 0.3].forEach((roe, j) => {
        const ticker = `T${i}${j}`;
        tickers.push(ticker);
        data[ticker] = bundle(ticker, pe, roe, RISING);
      });
    });

    const result = await screen(tickers, {}, context(new FakeProvider(data)));
    const full = new Set(result.fullTable.map((r) => r.ticker));

    expect(result.fullTable).toHaveLength(18);
    expect(result.filteredTable).toHaveLength(8);
    for (const row of result.filteredTable) {
      expect(full.has(row.ticker)).toBe(true);
      expect(row.peRatio).toBeLessThanOrEqual(30);
      expect(row.roePercent).toBeGreaterThanOrEqual(15);
    }
  });

  it('is idempotent for identical inputs', async () => {
    const provider = new FakeProvider({
      A: bundle('A', 10, 0.2, RISING),
      B: bundle('B', 50, 0.25, risingCloses(25, 300, -3)),
    });

    const first = await screen(['A', 'B'], {}, context(provider));
    const second = await screen(['A', 'B'], {}, context(provider));

    expect(second).toEqual(first);
  });

  it('returns frozen tables', async () => {
    const provider = new FakeProvider({ A: bundle('A', 10, 0.2, RISING) });
    const result = await screen(['A'], {}, context(provider));

    expect(Object.isFrozen(result.fullTable)).toBe(true);
    expect(Object.isFrozen(result.filteredTable)).toBe(true);
  });

  it('rejects a negative PE bound before fetching anything', async () => {
    const provider = new FakeProvider({ A: bundle('A', 10, 0.2, RISING) });

    await expect(
      screen(['A'], { maxPE: -1 }, context(provider))
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(provider.calls).toEqual([]);
  });

  describe('charts', () => {
    it('requests a chart only for tickers in the plot set', async () => {
      const provider = new FakeProvider({
        A: bundle('A', 10, 0.2, RISING),
        B: bundle('B', 10, 0.2, RISING),
      });
      const onChart = vi.fn();

      await screen(
        ['A', 'B'],
        { plotTickers: new Set(['a']), onChart },
        context(provider)
      );

      expect(onChart).toHaveBeenCalledTimes(1);
      expect(onChart.mock.calls[0]?.[0]).toBe('A');
      expect(onChart.mock.calls[0]?.[1]).toHaveLength(25);
    });

    it('does not chart excluded tickers', async () => {
      const provider = new FakeProvider({
        A: bundle('A', null, 0.2, RISING),
      });
      const onChart = vi.fn();

      await screen(
        ['A'],
        { plotTickers: new Set(['A']), onChart },
        context(provider)
      );

      expect(onChart).not.toHaveBeenCalled();
    });

    it('keeps the row when the chart sink throws', async () => {
      const provider = new FakeProvider({ A: bundle('A', 10, 0.2, RISING) });

      const result = await screen(
        ['A'],
        {
          plotTickers: new Set(['A']),
          onChart: () => {
            throw new Error('disk full');
          },
        },
        context(provider)
      );

      expect(result.fullTable.map((r) => r.ticker)).toEqual(['A']);
    });
  });

  describe('pacing', () => {
    function clock() {
      let now = 0;
      const sleeps: number[] = [];
      return {
        sleeps,
        now: () => now,
        sleep: async (ms: number) => {
          sleeps.push(ms);
          now += ms;
        },
      };
    }

    it('waits the full interval between successful fetches', async () => {
      const provider = new FakeProvider({
        A: bundle('A', 10, 0.2, RISING),
        B: bundle('B', 10, 0.2, RISING),
        C: bundle('C', 10, 0.2, RISING),
      });
      const c = clock();

      await screen(['A', 'B', 'C'], {}, {
        provider,
        logger: silentLogger,
        now: c.now,
        sleep: c.sleep,
      });

      expect(c.sleeps).toEqual([1100, 1100]);
    });

    it('measures the interval from the last successful fetch', async () => {
      const provider = new FakeProvider({
        A: bundle('A', 10, 0.2, RISING),
        ERR: new Error('socket hang up'),
        B: bundle('B', 10, 0.2, RISING),
      });
      const c = clock();

      await screen(['A', 'ERR', 'B'], {}, {
        provider,
        logger: silentLogger,
        now: c.now,
        sleep: c.sleep,
      });

      expect(c.sleeps).toEqual([1100]);
    });

    it('honours a custom interval', async () => {
      const provider = new FakeProvider({
        A: bundle('A', 10, 0.2, RISING),
        B: bundle('B', 10, 0.2, RISING),
      });
      const c = clock();

      await screen(['A', 'B'], { pacingMs: 250 }, {
        provider,
        logger: silentLogger,
        now: c.now,
        sleep: c.sleep,
      });

      expect(c.sleeps).toEqual([250]);
    });
  });

  describe('logging', () => {
    it('logs skips at debug level by default', async () => {
      const provider = new FakeProvider({});
      const log = { ...silentLogger, debug: vi.fn(), warn: vi.fn() };

      await screen(['MISSING'], {}, { provider, logger: log, sleep: async () => {} });

      expect(log.debug).toHaveBeenCalledWith(
        'Skipping MISSING: missing fundamentals (no trailing PE)'
      );
      expect(log.warn).not.toHaveBeenCalled();
    });

    it('logs skips as warnings in verbose mode', async () => {
      const provider = new FakeProvider({
        ERR: new TransportError('ERR', 'chart request failed'),
      });
      const log = { ...silentLogger, warn: vi.fn() };

      await screen(['ERR'], {}, {
        provider,
        logger: log,
        verbose: true,
        sleep: async () => {},
      });

      expect(log.warn).toHaveBeenCalledWith(
        'Skipping ERR: fetch failed (ERR: chart request failed)'
      );
    });
  });
});
