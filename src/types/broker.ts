import type { OrderAction, OrderType } from './safety.js';

export interface BrokerAccount {
  cash: number;
  buyingPower: number;
  equity: number;
  lastEquity: number;
}

export interface BrokerPosition {
  symbol: string;
  quantity: number;
  averageCost: number;
  marketValue: number;
  unrealizedPnl: number;
}

export interface Quote {
  symbol: string;
  lastPrice: number | null;
  bid: number | null;
  ask: number | null;
  volume: number | null;
  previousClose: number | null;
}

export interface Bar {
  time: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type BarTimeframe = '1Day' | '1Week' | '1Month' | '12Month';

export interface Fill {
  symbol: string;
  action: OrderAction;
  quantity: number;
  price: number;
  time: string;
  orderId: string;
}

export interface FillQuery {
  symbol?: string;
  after?: string;
  until?: string;
  limit: number;
}

export interface OrderRequest {
  symbol: string;
  action: OrderAction;
  quantity: number;
  orderType: OrderType;
  limitPrice: number | null;
  stopPrice: number | null;
}

export interface OrderChanges {
  quantity?: number;
  limitPrice?: number;
  stopPrice?: number;
}

export interface BrokerOrder {
  orderId: string;
  symbol: string;
  action: OrderAction;
  orderType: OrderType;
  quantity: number;
  filledQuantity: number;
  avgFillPrice: number | null;
  limitPrice: number | null;
  stopPrice: number | null;
  status: string;
  submittedAt: string | null;
}

/** Everything the tool layer asks of the brokerage. */
export interface BrokerClient {
  getAccount(): Promise<BrokerAccount>;
  getPositions(): Promise<BrokerPosition[]>;
  getQuote(symbol: string): Promise<Quote>;
  getQuotes(symbols: string[]): Promise<Quote[]>;
  getBars(symbol: string, timeframe: BarTimeframe, limit: number): Promise<Bar[]>;
  getFills(query: FillQuery): Promise<Fill[]>;
  placeOrder(request: OrderRequest): Promise<BrokerOrder>;
  getOrder(orderId: string): Promise<BrokerOrder>;
  getOpenOrders(symbol?: string): Promise<BrokerOrder[]>;
  replaceOrder(orderId: string, changes: OrderChanges): Promise<BrokerOrder>;
  cancelOrder(orderId: string): Promise<void>;
  cancelAllOrders(): Promise<string[]>;
}
