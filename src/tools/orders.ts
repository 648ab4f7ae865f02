/**
 * Order execution tools: preview and place.
 *
 * Both validate parameters, fetch one quote/account/positions snapshot and run the
 * safety gate against it. Place submits only when the gate reports no errors, then
 * records the order fingerprint for duplicate detection and writes the trade plan.
 */

import { formatSafetyResult, estimatePrice, runSafetyChecks } from '../safety/checks.js';
import { DailyState } from '../safety/daily-state.js';
import type { BrokerOrder, OrderRequest } from '../types/broker.js';
import {
  ORDER_ACTIONS,
  ORDER_TYPES,
  type OrderAction,
  type OrderIntent,
  type OrderType,
  type SafetyResult,
} from '../types/safety.js';
import { formatUsd } from '../utils/format.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext } from './context.js';

export interface OrderArgs {
  symbol: string;
  action: string;
  quantity: number;
  order_type: string;
  limit_price?: number;
  stop_price?: number;
}

type Validated = { ok: true; order: OrderRequest } | { ok: false; error: string };

function isOrderAction(value: string): value is OrderAction {
  return ORDER_ACTIONS.some(a => a === value);
}

function isOrderType(value: string): value is OrderType {
  return ORDER_TYPES.some(t => t === value);
}

export function validateOrderParams(args: OrderArgs): Validated {
  const { symbol, action, quantity, order_type: orderType } = args;
  const limitPrice = args.limit_price ?? null;
  const stopPrice = args.stop_price ?? null;

  if (!symbol.trim()) return { ok: false, error: 'Invalid symbol: symbol must be non-empty.' };
  if (symbol !== symbol.toUpperCase()) return { ok: false, error: 'Invalid symbol: symbol must be uppercase.' };
  if (!isOrderAction(action)) return { ok: false, error: `Invalid action: '${action}'. Must be BUY or SELL.` };
  if (!Number.isInteger(quantity) || quantity <= 0) {
    return { ok: false, error: `Invalid quantity: ${quantity}. Must be a positive integer.` };
  }
  if (!isOrderType(orderType)) {
    return {
      ok: false,
      error: `Invalid order_type: '${orderType}'. Must be one of: ${[...ORDER_TYPES].sort().join(', ')}.`,
    };
  }
  if ((orderType === 'LMT' || orderType === 'STP_LMT') && limitPrice === null) {
    return { ok: false, error: `limit_price is required for ${orderType} orders.` };
  }
  if ((orderType === 'STP' || orderType === 'STP_LMT') && stopPrice === null) {
    return { ok: false, error: `stop_price is required for ${orderType} orders.` };
  }

  return { ok: true, order: { symbol, action, quantity, orderType, limitPrice, stopPrice } };
}

/**
 * Fetches quote, account and positions once and evaluates the order against that
 * single snapshot. Broker failures propagate to the caller.
 */
export async function evaluateOrder(
  ctx: ToolContext,
  order: OrderRequest,
): Promise<{ result: SafetyResult; intent: OrderIntent }> {
  const [quote, account, positions] = await Promise.all([
    ctx.broker.getQuote(order.symbol),
    ctx.broker.getAccount(),
    ctx.broker.getPositions(),
  ]);

  const intent: OrderIntent = { ...order, lastPrice: quote.lastPrice };
  const result = runSafetyChecks({
    order: intent,
    account: { cashBalance: account.cash, netLiquidation: account.equity },
    positions: positions.map(p => ({ symbol: p.symbol, quantity: p.quantity })),
    limits: ctx.limits,
    state: ctx.state,
  });
  return { result, intent };
}

function withSafetyText(lines: string[], result: SafetyResult): string {
  const safetyText = formatSafetyResult(result);
  if (safetyText) lines.push('', safetyText);
  return lines.join('\n');
}

export async function previewStockOrder(ctx: ToolContext, args: OrderArgs): Promise<string> {
  const validated = validateOrderParams(args);
  if (!validated.ok) return `Error: ${validated.error}`;
  const { order } = validated;

  let evaluation: Awaited<ReturnType<typeof evaluateOrder>>;
  try {
    evaluation = await evaluateOrder(ctx, order);
  } catch (err) {
    return `Error fetching market data: ${errorMessage(err)}`;
  }
  const { result, intent } = evaluation;

  const lines = [
    'Order Preview',
    '=============',
    `  Symbol:          ${order.symbol}`,
    `  Action:          ${order.action}`,
    `  Quantity:        ${order.quantity}`,
    `  Order Type:      ${order.orderType}`,
  ];
  if (order.limitPrice !== null) lines.push(`  Limit Price:     ${formatUsd(order.limitPrice)}`);
  if (order.stopPrice !== null) lines.push(`  Stop Price:      ${formatUsd(order.stopPrice)}`);
  if (intent.lastPrice !== null) lines.push(`  Last Price:      ${formatUsd(intent.lastPrice)}`);
  lines.push('');

  const price = estimatePrice(intent);
  lines.push(`  Estimated Value: ${price === null ? 'N/A' : formatUsd(order.quantity * price)}`);
  lines.push(`  Safety Check:    ${result.passed ? 'PASSED' : 'BLOCKED'}`);

  return withSafetyText(lines, result);
}

export async function placeStockOrder(ctx: ToolContext, args: OrderArgs & { reason: string }): Promise<string> {
  const validated = validateOrderParams(args);
  if (!validated.ok) return `Error: ${validated.error}`;
  const { order } = validated;

  let result: SafetyResult;
  try {
    ({ result } = await evaluateOrder(ctx, order));
  } catch (err) {
    return `Error fetching market data: ${errorMessage(err)}`;
  }

  if (!result.passed) {
    return withSafetyText(['Order BLOCKED by safety checks', '=============================='], result);
  }

  let placed: BrokerOrder;
  try {
    placed = await ctx.broker.placeOrder(order);
  } catch (err) {
    return `Error placing order: ${errorMessage(err)}`;
  }

  // The order is live at the broker from here on; a failed local write must not hide that.
  try {
    ctx.state.recordOrder(
      DailyState.makeFingerprint(order.symbol, order.action, order.quantity, order.orderType, order.limitPrice),
    );
  } catch (err) {
    console.error(`[Orders] Order ${placed.orderId} placed but fingerprint not recorded:`, errorMessage(err));
  }

  try {
    ctx.tradePlans.create({
      orderId: placed.orderId,
      symbol: order.symbol,
      action: order.action,
      quantity: order.quantity,
      orderType: order.orderType,
      reason: args.reason,
      limitPrice: order.limitPrice,
      stopPrice: order.stopPrice,
    });
  } catch (err) {
    console.error(`[Orders] Order ${placed.orderId} placed but trade plan not saved:`, errorMessage(err));
  }

  const lines = [
    'Order Placed Successfully',
    '=========================',
    `  Order ID:    ${placed.orderId}`,
    `  Symbol:      ${placed.symbol}`,
    `  Action:      ${placed.action}`,
    `  Quantity:    ${placed.quantity}`,
    `  Order Type:  ${placed.orderType}`,
    `  Status:      ${placed.status}`,
    `  Reason:      ${args.reason}`,
  ];
  return withSafetyText(lines, result);
}
