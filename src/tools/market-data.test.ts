import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestContext, removeDir, type TestContext } from '../test-support/context.js';
import { formatBars, formatQuote, getStockBars, getStockQuote, getStockQuotes, parseSymbolList } from './market-data.js';

describe('parseSymbolList', () => {
  it('trims, uppercases and de-duplicates', () => {
    expect(parseSymbolList(' aapl, MSFT,aapl,, goog ')).toEqual(['AAPL', 'MSFT', 'GOOG']);
  });
});

describe('formatQuote', () => {
  it('shows the change against the previous close', () => {
    expect(
      formatQuote({ symbol: 'AAPL', lastPrice: 105, bid: 104.9, ask: 105.1, volume: 1_234_567, previousClose: 100 }),
    ).toBe(
      'Symbol: AAPL\nLast Price: 105.00\nChange: 5.00 (5.00%)\nBid: 104.90  |  Ask: 105.10\n' +
        'Volume: 1,234,567\nPrev Close: 100.00',
    );
  });

  it('prints N/A for missing values', () => {
    const text = formatQuote({ symbol: 'ZZZZ', lastPrice: null, bid: null, ask: null, volume: null, previousClose: null });
    expect(text.split('\n').slice(1)).toEqual([
      'Last Price: N/A',
      'Change: N/A (N/A)',
      'Bid: N/A  |  Ask: N/A',
      'Volume: N/A',
      'Prev Close: N/A',
    ]);
  });
});

describe('formatBars', () => {
  it('renders one row per bar', () => {
    const lines = formatBars('AAPL', [{ time: '2026-03-09', open: 10, high: 11, low: 9, close: 10.5, volume: 1500 }]).split(
      '\n',
    );
    expect(lines[0]).toBe('Historical Bars for AAPL');
    expect(lines[4]).toBe(
      '2026-03-09  ' + ' ' + '     10.00' + ' ' + '     11.00' + ' ' + '      9.00' + ' ' + '     10.50' + ' ' +
        '         1,500',
    );
  });
});

describe('market data tools', () => {
  let t: TestContext;

  beforeEach(() => {
    t = createTestContext();
  });

  afterEach(() => {
    removeDir(t.dir);
  });

  it('normalises the symbol of a single quote', async () => {
    t.broker.setQuote('AAPL', 150, 148);
    expect((await getStockQuote(t.ctx, { symbol: ' aapl ' })).split('\n')[0]).toBe('Symbol: AAPL');
  });

  it('rejects an empty symbol', async () => {
    expect(await getStockQuote(t.ctx, { symbol: ' ' })).toBe('Error: Symbol must not be empty.');
  });

  it('joins several quotes with separators', async () => {
    t.broker.setQuote('AAPL', 150);
    t.broker.setQuote('MSFT', 400);
    const blocks = (await getStockQuotes(t.ctx, { symbols: 'aapl,msft' })).split('\n\n---\n\n');
    expect(blocks.map(b => b.split('\n')[0])).toEqual(['Symbol: AAPL', 'Symbol: MSFT']);
  });

  it('caps the number of symbols', async () => {
    const symbols = Array.from({ length: 51 }, (_, i) => `S${i}`).join(',');
    expect(await getStockQuotes(t.ctx, { symbols })).toBe('Error: Too many symbols (51). Maximum is 50.');
    expect(await getStockQuotes(t.ctx, { symbols: ' , ' })).toBe('Error: Symbols list must not be empty.');
  });

  it('maps the period to a bar timeframe', async () => {
    await getStockBars(t.ctx, { symbol: 'aapl', period: '1y', limit: 5 });
    await getStockBars(t.ctx, { symbol: 'AAPL', period: '3m', limit: 20 });
    expect(t.broker.barRequests).toEqual([
      { symbol: 'AAPL', timeframe: '12Month', limit: 5 },
      { symbol: 'AAPL', timeframe: '1Month', limit: 20 },
    ]);
  });

  it('says so when there are no bars', async () => {
    expect(await getStockBars(t.ctx, { symbol: 'AAPL', period: '1d', limit: 10 })).toBe(
      'No bar data available for AAPL.',
    );
  });

  it('validates period and limit', async () => {
    expect(await getStockBars(t.ctx, { symbol: 'AAPL', period: '2d', limit: 10 })).toBe(
      "Error: Invalid period '2d'. Allowed period values: 1d, 1w, 1m, 3m, 6m, 1y",
    );
    expect(await getStockBars(t.ctx, { symbol: 'AAPL', period: '1d', limit: 0 })).toBe(
      'Error: Invalid limit: 0. Must be a positive integer.',
    );
  });

  it('returns broker failures as text', async () => {
    t.broker.failWith = new Error('Alpaca API 429: slow down');
    expect(await getStockQuote(t.ctx, { symbol: 'AAPL' })).toBe(
      'Error retrieving quote for AAPL: Alpaca API 429: slow down',
    );
  });
});
