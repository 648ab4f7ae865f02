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

const CLOSED_STATUSES = new Set(['canceled', 'filled', 'replaced']);

/** In-memory BrokerClient. Order ids are `ord-1`, `ord-2`, ... in placement order. */
export class FakeBroker implements BrokerClient {
  account: BrokerAccount = { cash: 100_000, buyingPower: 200_000, equity: 100_000, lastEquity: 99_000 };
  positions: BrokerPosition[] = [];
  quotes = new Map<string, Quote>();
  bars: Bar[] = [];
  fills: Fill[] = [];
  orders = new Map<string, BrokerOrder>();
  placed: OrderRequest[] = [];
  replacements: Array<{ orderId: string; changes: OrderChanges }> = [];
  cancelled: string[] = [];
  barRequests: Array<{ symbol: string; timeframe: BarTimeframe; limit: number }> = [];
  /** Every call rejects with this while set. */
  failWith: Error | null = null;
  private seq = 0;

  setQuote(symbol: string, lastPrice: number, previousClose: number | null = null): void {
    this.quotes.set(symbol, { symbol, lastPrice, bid: null, ask: null, volume: null, previousClose });
  }

  async getAccount(): Promise<BrokerAccount> {
    this.check();
    return { ...this.account };
  }

  async getPositions(): Promise<BrokerPosition[]> {
    this.check();
    return [...this.positions];
  }

  async getQuote(symbol: string): Promise<Quote> {
    this.check();
    return (
      this.quotes.get(symbol) ?? { symbol, lastPrice: null, bid: null, ask: null, volume: null, previousClose: null }
    );
  }

  async getQuotes(symbols: string[]): Promise<Quote[]> {
    return Promise.all(symbols.map(s => this.getQuote(s)));
  }

  async getBars(symbol: string, timeframe: BarTimeframe, limit: number): Promise<Bar[]> {
    this.check();
    this.barRequests.push({ symbol, timeframe, limit });
    return this.bars.slice(-limit);
  }

  async getFills(query: FillQuery): Promise<Fill[]> {
    this.check();
    return this.fills.filter(f => !query.symbol || f.symbol === query.symbol).slice(0, query.limit);
  }

  async placeOrder(request: OrderRequest): Promise<BrokerOrder> {
    this.check();
    this.placed.push(request);
    const order: BrokerOrder = {
      orderId: this.nextId(),
      symbol: request.symbol,
      action: request.action,
      orderType: request.orderType,
      quantity: request.quantity,
      filledQuantity: 0,
      avgFillPrice: null,
      limitPrice: request.limitPrice,
      stopPrice: request.stopPrice,
      status: 'accepted',
      submittedAt: '2026-03-10T14:30:00Z',
    };
    this.orders.set(order.orderId, order);
    return { ...order };
  }

  async getOrder(orderId: string): Promise<BrokerOrder> {
    this.check();
    const order = this.orders.get(orderId);
    if (!order) throw new Error(`Alpaca API 404: order ${orderId} not found`);
    return { ...order };
  }

  async getOpenOrders(symbol?: string): Promise<BrokerOrder[]> {
    this.check();
    return [...this.orders.values()]
      .filter(o => !CLOSED_STATUSES.has(o.status) && (!symbol || o.symbol === symbol))
      .map(o => ({ ...o }));
  }

  /** Replaces under a fresh id, as Alpaca does. */
  async replaceOrder(orderId: string, changes: OrderChanges): Promise<BrokerOrder> {
    const current = await this.getOrder(orderId);
    this.replacements.push({ orderId, changes });
    this.orders.set(orderId, { ...current, status: 'replaced' });
    const replacement: BrokerOrder = {
      ...current,
      orderId: this.nextId(),
      quantity: changes.quantity ?? current.quantity,
      limitPrice: changes.limitPrice ?? current.limitPrice,
      stopPrice: changes.stopPrice ?? current.stopPrice,
      status: 'accepted',
    };
    this.orders.set(replacement.orderId, replacement);
    return { ...replacement };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const current = await this.getOrder(orderId);
    this.orders.set(orderId, { ...current, status: 'canceled' });
    this.cancelled.push(orderId);
  }

  async cancelAllOrders(): Promise<string[]> {
    const open = await this.getOpenOrders();
    for (const order of open) await this.cancelOrder(order.orderId);
    return open.map(o => o.orderId);
  }

  private nextId(): string {
    this.seq += 1;
    return `ord-${this.seq}`;
  }

  private check(): void {
    if (this.failWith) throw this.failWith;
  }
}
