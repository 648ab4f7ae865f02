import { afterEach, describe, expect, it, vi } from 'vitest';
import { AlpacaClient, QUOTE_CACHE_TTL_MS } from './alpaca-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function makeClient(fetchImpl: typeof fetch): AlpacaClient {
  return new AlpacaClient({
    apiKey: 'test-key',
    secretKey: 'test-secret',
    baseUrl: 'https://paper.test',
    dataUrl: 'https://data.test',
    fetch: fetchImpl,
  });
}

const alpacaOrder = {
  id: 'abc-123',
  symbol: 'AAPL',
  side: 'buy',
  type: 'limit',
  qty: '10',
  filled_qty: '0',
  filled_avg_price: null,
  limit_price: '150',
  stop_price: null,
  trail_price: null,
  status: 'accepted',
  submitted_at: '2026-03-10T14:30:00Z',
};

const snapshot = {
  AAPL: {
    latestTrade: { p: 150.25 },
    latestQuote: { ap: 150.3, bp: 150.2 },
    dailyBar: { v: 1_200_000 },
    prevDailyBar: { c: 148 },
  },
};

describe('AlpacaClient', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('parses the account and sends the key headers', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ cash: '1000.50', buying_power: '2000', equity: '1500', last_equity: '1400' }),
    );
    const account = await makeClient(fetchMock).getAccount();

    expect(account).toEqual({ cash: 1000.5, buyingPower: 2000, equity: 1500, lastEquity: 1400 });
    const url = fetchMock.mock.calls[0]?.[0];
    const init = fetchMock.mock.calls[0]?.[1];
    expect(url).toBe('https://paper.test/v2/account');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toMatchObject({ 'APCA-API-KEY-ID': 'test-key', 'APCA-API-SECRET-KEY': 'test-secret' });
  });

  it('maps positions', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse([
        { symbol: 'MSFT', qty: '5', avg_entry_price: '400', market_value: '2100', unrealized_pl: '100' },
      ]),
    );
    expect(await makeClient(fetchMock).getPositions()).toEqual([
      { symbol: 'MSFT', quantity: 5, averageCost: 400, marketValue: 2100, unrealizedPnl: 100 },
    ]);
  });

  it('builds quotes from snapshots on the data host', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(snapshot));
    const quote = await makeClient(fetchMock).getQuote('AAPL');

    expect(quote).toEqual({
      symbol: 'AAPL',
      lastPrice: 150.25,
      bid: 150.2,
      ask: 150.3,
      volume: 1_200_000,
      previousClose: 148,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://data.test/v2/stocks/snapshots?symbols=AAPL&feed=iex');
  });

  it('returns an empty quote for a symbol without a snapshot', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({}));
    expect(await makeClient(fetchMock).getQuote('ZZZZ')).toEqual({
      symbol: 'ZZZZ',
      lastPrice: null,
      bid: null,
      ask: null,
      volume: null,
      previousClose: null,
    });
  });

  it('caches quotes for the TTL', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 2, 10, 10, 0, 0));
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(snapshot));
    const client = makeClient(fetchMock);

    await client.getQuote('AAPL');
    vi.setSystemTime(new Date(2026, 2, 10, 10, 0, 0).getTime() + QUOTE_CACHE_TTL_MS);
    await client.getQuote('AAPL');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    vi.setSystemTime(new Date(2026, 2, 10, 10, 0, 0).getTime() + QUOTE_CACHE_TTL_MS + 1);
    await client.getQuote('AAPL');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('keys the multi-symbol cache on the sorted symbol set', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const client = makeClient(fetchMock);

    await client.getQuotes(['MSFT', 'AAPL']);
    await client.getQuotes(['AAPL', 'MSFT']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('drops expired symbol sets from the quote cache', async () => {
    const start = new Date(2026, 2, 10, 10, 0, 0).getTime();
    vi.useFakeTimers();
    vi.setSystemTime(start);
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const client = makeClient(fetchMock);

    await client.getQuotes(['AAPL']);
    await client.getQuotes(['MSFT']);
    expect(client.cachedQuoteSets).toBe(2);

    vi.setSystemTime(start + QUOTE_CACHE_TTL_MS + 1);
    await client.getQuotes(['GOOG']);
    expect(client.cachedQuoteSets).toBe(1);

    await client.getQuotes(['GOOG']);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('returns bars oldest first', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        bars: [
          { t: '2026-03-10T04:00:00Z', o: 11, h: 12, l: 10, c: 11.5, v: 200 },
          { t: '2026-03-09T04:00:00Z', o: 10, h: 11, l: 9, c: 10.5, v: 100 },
        ],
      }),
    );
    const bars = await makeClient(fetchMock).getBars('AAPL', '1Day', 2);

    expect(bars.map(b => b.time)).toEqual(['2026-03-09', '2026-03-10']);
    expect(bars[0]).toEqual({ time: '2026-03-09', open: 10, high: 11, low: 9, close: 10.5, volume: 100 });
  });

  it('sends a limit order with prices as two-decimal strings', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(alpacaOrder));
    const placed = await makeClient(fetchMock).placeOrder({
      symbol: 'AAPL',
      action: 'BUY',
      quantity: 10,
      orderType: 'LMT',
      limitPrice: 150,
      stopPrice: null,
    });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      symbol: 'AAPL',
      qty: '10',
      side: 'buy',
      type: 'limit',
      time_in_force: 'day',
      limit_price: '150.00',
    });
    expect(placed).toMatchObject({ orderId: 'abc-123', orderType: 'LMT', action: 'BUY', limitPrice: 150, quantity: 10 });
  });

  it('sends the stop price as the trail amount for trailing stops', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ ...alpacaOrder, side: 'sell', type: 'trailing_stop', limit_price: null, trail_price: '2.5' }),
    );
    const placed = await makeClient(fetchMock).placeOrder({
      symbol: 'AAPL',
      action: 'SELL',
      quantity: 10,
      orderType: 'TRAIL',
      limitPrice: null,
      stopPrice: 2.5,
    });

    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toMatchObject({
      type: 'trailing_stop',
      side: 'sell',
      trail_price: '2.50',
    });
    expect(placed.orderType).toBe('TRAIL');
    expect(placed.stopPrice).toBe(2.5);
  });

  it('rejects a trailing stop without a trail amount before calling the API', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(alpacaOrder));
    await expect(
      makeClient(fetchMock).placeOrder({
        symbol: 'AAPL',
        action: 'SELL',
        quantity: 1,
        orderType: 'TRAIL',
        limitPrice: null,
        stopPrice: null,
      }),
    ).rejects.toThrow('TRAIL orders need stop_price as the trail amount');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('patches a replacement and returns the new order', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (_url, init) =>
      init?.method === 'PATCH'
        ? jsonResponse({ ...alpacaOrder, id: 'def-456', qty: '20' })
        : jsonResponse(alpacaOrder),
    );
    const replaced = await makeClient(fetchMock).replaceOrder('abc-123', { quantity: 20 });

    const patch = fetchMock.mock.calls[1];
    expect(patch?.[0]).toBe('https://paper.test/v2/orders/abc-123');
    expect(JSON.parse(String(patch?.[1]?.body))).toEqual({ qty: '20' });
    expect(replaced.orderId).toBe('def-456');
    expect(replaced.quantity).toBe(20);
  });

  it('accepts an empty 204 on cancel', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 204 }));
    await expect(makeClient(fetchMock).cancelOrder('abc-123')).resolves.toBeUndefined();
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('DELETE');
  });

  it('returns the ids cancelled by cancel-all', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse([{ id: 'a', status: 200 }, { id: 'b', status: 200 }], 207),
    );
    expect(await makeClient(fetchMock).cancelAllOrders()).toEqual(['a', 'b']);
  });

  it('leaves out orders whose cancel failed', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse([{ id: 'a', status: 200 }, { id: 'b', status: 500 }], 207),
    );
    expect(await makeClient(fetchMock).cancelAllOrders()).toEqual(['a']);
  });

  it('raises the status and body of a failed call', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('forbidden', { status: 403 }));
    await expect(makeClient(fetchMock).getAccount()).rejects.toThrow('Alpaca API 403: forbidden');
  });
});
