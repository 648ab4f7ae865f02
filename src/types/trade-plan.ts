import type { OrderAction, OrderType } from './safety.js';

export type PlanStatus = 'active' | 'archived';

export type ModificationValue = string | number | boolean | null;

export interface Modification {
  timestamp: string;
  changes: Record<string, ModificationValue>;
  reason: string;
}

export interface TradePlan {
  orderId: string;
  symbol: string;
  action: OrderAction;
  quantity: number;
  orderType: OrderType;
  limitPrice: number | null;
  stopPrice: number | null;
  reason: string;
  status: PlanStatus;
  createdAt: string;
  modifiedAt: string | null;
  archivedAt: string | null;
  archiveReason: string | null;
  modifications: Modification[];
}

export interface NewTradePlan {
  orderId: string;
  symbol: string;
  action: OrderAction;
  quantity: number;
  orderType: OrderType;
  reason: string;
  limitPrice?: number | null;
  stopPrice?: number | null;
}
