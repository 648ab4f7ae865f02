export type OrderAction = 'BUY' | 'SELL';
export type OrderType = 'MKT' | 'LMT' | 'STP' | 'STP_LMT' | 'TRAIL';

export const ORDER_ACTIONS: readonly OrderAction[] = ['BUY', 'SELL'];
export const ORDER_TYPES: readonly OrderType[] = ['MKT', 'LMT', 'STP', 'STP_LMT', 'TRAIL'];

/** An order under evaluation. Built fresh for every safety run. */
export interface OrderIntent {
  readonly symbol: string;
  readonly action: OrderAction;
  readonly quantity: number;
  readonly orderType: OrderType;
  readonly limitPrice: number | null;
  readonly stopPrice: number | null;
  /** Latest traded price, used when there is no limit price to size the order. */
  readonly lastPrice: number | null;
}

export interface AccountSnapshot {
  readonly cashBalance: number;
  readonly netLiquidation: number;
}

export interface PositionSnapshot {
  readonly symbol: string;
  readonly quantity: number;
}

/** Risk thresholds. 0 disables the corresponding check. */
export interface SafetyLimits {
  readonly maxOrderValue: number;
  readonly dailyLossLimit: number;
  readonly maxPositionPct: number;
}

export interface SafetyResult {
  readonly passed: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

/** The slice of the daily state tracker the safety checks read. */
export interface DailyStateReader {
  getDailyPnl(): number;
  hasRecentOrder(fingerprint: string, windowSeconds?: number): boolean;
}
