/**
 * alpaca-client.ts: Alpaca REST implementation of BrokerClient.
 * Trading calls go to the base URL, market data to the data URL. Responses are parsed
 * with zod so the rest of the app only sees typed, numeric values.
 */

import { z } from 'zod';
import type {
  Bar,
  BarTimeframe,
  BrokerAccount,
  BrokerClient,
  BrokerOrder,
  BrokerPosition,
  Fill,
  FillQuery,
  OrderChanges,
  OrderRequest,
  Quote,
} from '../types/broker.js';
import type { OrderAction, OrderType } from '../types/safety.js';

export interface AlpacaConfig {
  apiKey: string;
  secretKey: string;
  baseUrl: string;
  dataUrl: string;
  fetch?: typeof fetch;
}

type Params = Record<string, string | number | undefined>;

export const QUOTE_CACHE_TTL_MS = 30_000;

const ALPACA_TYPES: Record<OrderType, string> = {
  MKT: 'market',
  LMT: 'limit',
  STP: 'stop',
  STP_LMT: 'stop_limit',
  TRAIL: 'trailing_stop',
};

const ORDER_TYPES_BY_ALPACA: Record<string, OrderType> = {
  market: 'MKT',
  limit: 'LMT',
  stop: 'STP',
  stop_limit: 'STP_LMT',
  trailing_stop: 'TRAIL',
};

// Alpaca sends most numbers as strings.
const amount = z.union([z.string(), z.number()]).transform(Number);
const maybeAmount = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(v => (v === null || v === undefined ? null : Number(v)));
const side = z.string().transform((s): OrderAction => (s === 'buy' ? 'BUY' : 'SELL'));

const accountSchema = z.object({
  cash: amount,
  buying_power: amount,
  equity: amount,
  last_equity: amount,
});

const positionSchema = z.object({
  symbol: z.string(),
  qty: amount,
  avg_entry_price: amount,
  market_value: maybeAmount,
  unrealized_pl: maybeAmount,
});

const snapshotSchema = z.object({
  latestTrade: z.object({ p: z.number() }).nullish(),
  latestQuote: z.object({ ap: z.number(), bp: z.number() }).nullish(),
  dailyBar: z.object({ v: z.number() }).nullish(),
  prevDailyBar: z.object({ c: z.number() }).nullish(),
});

const barsSchema = z.object({
  bars: z
    .array(z.object({ t: z.string(), o: z.number(), h: z.number(), l: z.number(), c: z.number(), v: z.number() }))
    .nullable(),
});

const fillSchema = z.object({
  symbol: z.string(),
  side,
  qty: amount,
  price: amount,
  transaction_time: z.string(),
  order_id: z.string(),
});

const orderSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side,
  type: z.string(),
  qty: maybeAmount,
  filled_qty: amount,
  filled_avg_price: maybeAmount,
  limit_price: maybeAmount,
  stop_price: maybeAmount,
  trail_price: maybeAmount,
  status: z.string(),
  submitted_at: z.string().nullish(),
});

// DELETE /v2/orders answers 207 with one HTTP status per order; only 200 means cancelled.
const cancelAllSchema = z.array(z.object({ id: z.string(), status: z.number() }));

type SnapshotData = z.infer<typeof snapshotSchema>;

function toQuote(symbol: string, snap: SnapshotData | undefined): Quote {
  return {
    symbol,
    lastPrice: snap?.latestTrade?.p ?? null,
    bid: snap?.latestQuote?.bp ?? null,
    ask: snap?.latestQuote?.ap ?? null,
    volume: snap?.dailyBar?.v ?? null,
    previousClose: snap?.prevDailyBar?.c ?? null,
  };
}

function toOrder(o: z.infer<typeof orderSchema>): BrokerOrder {
  const orderType = ORDER_TYPES_BY_ALPACA[o.type] ?? 'MKT';
  return {
    orderId: o.id,
    symbol: o.symbol,
    action: o.side,
    orderType,
    quantity: o.qty ?? 0,
    filledQuantity: o.filled_qty,
    avgFillPrice: o.filled_avg_price,
    limitPrice: o.limit_price,
    stopPrice: orderType === 'TRAIL' ? o.trail_price : o.stop_price,
    status: o.status,
    submittedAt: o.submitted_at ?? null,
  };
}

/** Calendar days one bar of each timeframe spans, padded for weekends and holidays. */
const LOOKBACK_DAYS: Record<BarTimeframe, number> = {
  '1Day': 1.6,
  '1Week': 7,
  '1Month': 31,
  '12Month': 366,
};

export class AlpacaClient implements BrokerClient {
  private headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private quoteCache = new Map<string, { value: Quote[]; at: number }>();

  constructor(private cfg: AlpacaConfig) {
    this.headers = {
      'APCA-API-KEY-ID': cfg.apiKey,
      'APCA-API-SECRET-KEY': cfg.secretKey,
      'Content-Type': 'application/json',
    };
    this.fetchImpl = cfg.fetch ?? fetch;
  }

  // ── Account ─────────────────────────────────────────────────────────────

  async getAccount(): Promise<BrokerAccount> {
    const a = accountSchema.parse(await this.request('GET', 'base', '/v2/account'));
    return { cash: a.cash, buyingPower: a.buying_power, equity: a.equity, lastEquity: a.last_equity };
  }

  async getPositions(): Promise<BrokerPosition[]> {
    const list = z.array(positionSchema).parse(await this.request('GET', 'base', '/v2/positions'));
    return list.map(p => ({
      symbol: p.symbol,
      quantity: p.qty,
      averageCost: p.avg_entry_price,
      marketValue: p.market_value ?? 0,
      unrealizedPnl: p.unrealized_pl ?? 0,
    }));
  }

  async getFills(query: FillQuery): Promise<Fill[]> {
    const raw = await this.request('GET', 'base', '/v2/account/activities/FILL', {
      params: { after: query.after, until: query.until, page_size: query.limit, direction: 'desc' },
    });
    const fills = z.array(fillSchema).parse(raw).map(f => ({
      symbol: f.symbol,
      action: f.side,
      quantity: f.qty,
      price: f.price,
      time: f.transaction_time,
      orderId: f.order_id,
    }));
    return query.symbol ? fills.filter(f => f.symbol === query.symbol) : fills;
  }

  // ── Market data ─────────────────────────────────────────────────────────

  async getQuote(symbol: string): Promise<Quote> {
    const [quote] = await this.getQuotes([symbol]);
    return quote ?? toQuote(symbol, undefined);
  }

  /** Cached for QUOTE_CACHE_TTL_MS per distinct symbol set. */
  async getQuotes(symbols: string[]): Promise<Quote[]> {
    const key = [...symbols].sort().join(',');
    const cached = this.quoteCache.get(key);
    if (cached && Date.now() - cached.at <= QUOTE_CACHE_TTL_MS) return cached.value;
    if (cached) this.quoteCache.delete(key);

    const raw = await this.request('GET', 'data', '/v2/stocks/snapshots', {
      params: { symbols: symbols.join(','), feed: 'iex' },
    });
    const snapshots = z.record(snapshotSchema.nullable()).parse(raw);
    const quotes = symbols.map(s => toQuote(s, snapshots[s] ?? undefined));
    this.sweepQuoteCache();
    this.quoteCache.set(key, { value: quotes, at: Date.now() });
    return quotes;
  }

  /** Number of symbol sets currently held in the quote cache. */
  get cachedQuoteSets(): number {
    return this.quoteCache.size;
  }

  private sweepQuoteCache(): void {
    const now = Date.now();
    for (const [key, entry] of this.quoteCache) {
      if (now - entry.at > QUOTE_CACHE_TTL_MS) this.quoteCache.delete(key);
    }
  }

  async getBars(symbol: string, timeframe: BarTimeframe, limit: number): Promise<Bar[]> {
    const start = new Date(Date.now() - Math.ceil(limit * LOOKBACK_DAYS[timeframe]) * 86_400_000);
    const raw = await this.request('GET', 'data', `/v2/stocks/${encodeURIComponent(symbol)}/bars`, {
      params: {
        timeframe,
        limit,
        start: start.toISOString(),
        adjustment: 'raw',
        feed: 'iex',
        sort: 'desc',
      },
    });
    const { bars } = barsSchema.parse(raw);
    return (bars ?? [])
      .map(b => ({ time: b.t.slice(0, 10), open: b.o, high: b.h, low: b.l, close: b.c, volume: b.v }))
      .reverse();
  }

  // ── Orders ──────────────────────────────────────────────────────────────

  async placeOrder(req: OrderRequest): Promise<BrokerOrder> {
    const body: Record<string, string> = {
      symbol: req.symbol,
      qty: String(req.quantity),
      side: req.action === 'BUY' ? 'buy' : 'sell',
      type: ALPACA_TYPES[req.orderType],
      time_in_force: 'day',
    };
    if (req.limitPrice !== null) body['limit_price'] = req.limitPrice.toFixed(2);
    if (req.orderType === 'TRAIL') {
      if (req.stopPrice === null) throw new Error('TRAIL orders need stop_price as the trail amount');
      body['trail_price'] = req.stopPrice.toFixed(2);
    } else if (req.stopPrice !== null) {
      body['stop_price'] = req.stopPrice.toFixed(2);
    }

    return toOrder(orderSchema.parse(await this.request('POST', 'base', '/v2/orders', { body })));
  }

  async getOrder(orderId: string): Promise<BrokerOrder> {
    const raw = await this.request('GET', 'base', `/v2/orders/${encodeURIComponent(orderId)}`);
    return toOrder(orderSchema.parse(raw));
  }

  async getOpenOrders(symbol?: string): Promise<BrokerOrder[]> {
    const raw = await this.request('GET', 'base', '/v2/orders', {
      params: { status: 'open', symbols: symbol, limit: 500 },
    });
    return z.array(orderSchema).parse(raw).map(toOrder);
  }

  /** Alpaca replaces the order, so the returned order carries a new id. */
  async replaceOrder(orderId: string, changes: OrderChanges): Promise<BrokerOrder> {
    const current = await this.getOrder(orderId);
    const body: Record<string, string> = {};
    if (changes.quantity !== undefined) body['qty'] = String(changes.quantity);
    if (changes.limitPrice !== undefined) body['limit_price'] = changes.limitPrice.toFixed(2);
    if (changes.stopPrice !== undefined) {
      body[current.orderType === 'TRAIL' ? 'trail' : 'stop_price'] = changes.stopPrice.toFixed(2);
    }

    const raw = await this.request('PATCH', 'base', `/v2/orders/${encodeURIComponent(orderId)}`, { body });
    return toOrder(orderSchema.parse(raw));
  }

  async cancelOrder(orderId: string): Promise<void> {
    await this.request('DELETE', 'base', `/v2/orders/${encodeURIComponent(orderId)}`);
  }

  async cancelAllOrders(): Promise<string[]> {
    const raw = await this.request('DELETE', 'base', '/v2/orders');
    return cancelAllSchema
      .parse(raw ?? [])
      .filter(o => o.status === 200)
      .map(o => o.id);
  }

  // ── Transport ───────────────────────────────────────────────────────────

  private async request(
    method: 'GET' | 'POST' | 'PATCH' | 'DELETE',
    base: 'base' | 'data',
    path: string,
    opts: { params?: Params; body?: unknown } = {},
  ): Promise<unknown> {
    const url = new URL(`${base === 'data' ? this.cfg.dataUrl : this.cfg.baseUrl}${path}`);
    for (const [k, v] of Object.entries(opts.params ?? {})) {
      if (v !== undefined && v !== '') url.searchParams.set(k, String(v));
    }

    const res = await this.fetchImpl(url.toString(), {
      method,
      headers: this.headers,
      body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Alpaca API ${res.status}: ${text}`);
    }

    // DELETE /v2/orders/{id} answers 204 with no body
    const ct = res.headers.get('content-type') ?? '';
    if (res.status === 204 || !ct.includes('application/json')) return null;
    return res.json();
  }
}

export function createAlpacaClient(cfg: {
  ALPACA_API_KEY: string;
  ALPACA_SECRET_KEY: string;
  ALPACA_BASE_URL: string;
  ALPACA_DATA_URL: string;
}): AlpacaClient {
  return new AlpacaClient({
    apiKey: cfg.ALPACA_API_KEY,
    secretKey: cfg.ALPACA_SECRET_KEY,
    baseUrl: cfg.ALPACA_BASE_URL,
    dataUrl: cfg.ALPACA_DATA_URL,
  });
}
