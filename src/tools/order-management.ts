/**
 * Order management tools: modify, cancel, cancel all.
 *
 * A modification that adds risk (more shares, or a higher limit on a BUY) goes back
 * through the safety gate with the modified terms and is refused on any error; its
 * warnings are appended to the confirmation. Changes are mirrored into the trade plan
 * store, and a failed plan write after the broker call is logged, not returned.
 */

import { formatSafetyResult } from '../safety/checks.js';
import type { BrokerOrder, OrderChanges } from '../types/broker.js';
import type { SafetyResult } from '../types/safety.js';
import type { ModificationValue } from '../types/trade-plan.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext } from './context.js';
import { evaluateOrder } from './orders.js';

export interface ModifyArgs {
  order_id: string;
  quantity?: number;
  limit_price?: number;
  stop_price?: number;
  reason?: string;
}

export function formatOrderSummary(order: BrokerOrder): string {
  const fields: Array<[string, string | number | null]> = [
    ['Order ID', order.orderId],
    ['Symbol', order.symbol],
    ['Action', order.action],
    ['Order Type', order.orderType],
    ['Quantity', order.quantity],
    ['Filled', order.filledQuantity],
    ['Limit Price', order.limitPrice],
    ['Stop Price', order.stopPrice],
    ['Status', order.status],
  ];
  return fields
    .filter(([, value]) => value !== null)
    .map(([label, value]) => `  ${label}: ${value}`)
    .join('\n');
}

export function increasesRisk(current: BrokerOrder, changes: OrderChanges): boolean {
  if (changes.quantity !== undefined && changes.quantity > current.quantity) return true;
  return (
    current.action === 'BUY' &&
    changes.limitPrice !== undefined &&
    current.limitPrice !== null &&
    changes.limitPrice > current.limitPrice
  );
}

function invalidChange(args: ModifyArgs): string | null {
  if (args.quantity !== undefined && (!Number.isInteger(args.quantity) || args.quantity <= 0)) {
    return `Invalid quantity: ${args.quantity}. Must be a positive integer.`;
  }
  if (args.limit_price !== undefined && !(args.limit_price > 0)) {
    return `Invalid limit_price: ${args.limit_price}. Must be positive.`;
  }
  if (args.stop_price !== undefined && !(args.stop_price > 0)) {
    return `Invalid stop_price: ${args.stop_price}. Must be positive.`;
  }
  return null;
}

export async function modifyOrder(ctx: ToolContext, args: ModifyArgs): Promise<string> {
  const { order_id: orderId } = args;
  if (args.quantity === undefined && args.limit_price === undefined && args.stop_price === undefined) {
    return (
      'Error: No modification parameters provided. ' +
      'Specify at least one of: quantity, limit_price, stop_price.'
    );
  }
  const invalid = invalidChange(args);
  if (invalid) return `Error: ${invalid}`;

  let current: BrokerOrder;
  try {
    current = await ctx.broker.getOrder(orderId);
  } catch {
    return `Error: Could not retrieve order ${orderId}. Please verify the order ID is correct.`;
  }

  const changes: OrderChanges = {
    quantity: args.quantity,
    limitPrice: args.limit_price,
    stopPrice: args.stop_price,
  };

  let checked: SafetyResult | null = null;
  if (increasesRisk(current, changes)) {
    try {
      const { result } = await evaluateOrder(ctx, {
        symbol: current.symbol,
        action: current.action,
        orderType: current.orderType,
        quantity: changes.quantity ?? current.quantity,
        limitPrice: changes.limitPrice ?? current.limitPrice,
        stopPrice: changes.stopPrice ?? current.stopPrice,
      });
      if (!result.passed) {
        return [
          'Modification BLOCKED by safety checks',
          '=====================================',
          '',
          formatSafetyResult(result),
        ].join('\n');
      }
      checked = result;
    } catch (err) {
      return `Error fetching market data: ${errorMessage(err)}`;
    }
  }

  let replaced: BrokerOrder;
  try {
    replaced = await ctx.broker.replaceOrder(orderId, changes);
  } catch (err) {
    return `Error: Failed to modify order ${orderId}. The order may no longer be modifiable. (${errorMessage(err)})`;
  }

  const recorded: Record<string, ModificationValue> = {};
  if (args.quantity !== undefined) recorded['quantity'] = args.quantity;
  if (args.limit_price !== undefined) recorded['limit_price'] = args.limit_price;
  if (args.stop_price !== undefined) recorded['stop_price'] = args.stop_price;
  const summary = Object.entries(recorded).map(([k, v]) => `${k}=${v}`).join(', ');
  if (replaced.orderId !== orderId) recorded['replaced_by_order_id'] = replaced.orderId;

  try {
    ctx.tradePlans.recordModification(orderId, recorded, args.reason ?? '');
    ctx.tradePlans.relink(orderId, replaced.orderId);
  } catch (err) {
    console.error(`[Orders] Order ${orderId} modified but trade plan not updated:`, errorMessage(err));
  }

  const lines = [
    'Order Modified Successfully',
    '===========================',
    `  Order ID: ${orderId}`,
  ];
  if (replaced.orderId !== orderId) lines.push(`  New Order ID: ${replaced.orderId}`);
  lines.push(`  Symbol: ${current.symbol}`, `  Changes: ${summary}`, '', 'Original Order:', formatOrderSummary(current));

  const safetyText = checked ? formatSafetyResult(checked) : '';
  if (safetyText) lines.push('', safetyText);
  return lines.join('\n');
}

function archivePlan(ctx: ToolContext, orderId: string, reason: string): void {
  try {
    ctx.tradePlans.archive(orderId, reason);
  } catch (err) {
    console.error(`[Orders] Order ${orderId} cancelled but trade plan not archived:`, errorMessage(err));
  }
}

export async function cancelOrder(ctx: ToolContext, args: { order_id: string; reason?: string }): Promise<string> {
  const { order_id: orderId } = args;

  let detail: BrokerOrder;
  try {
    detail = await ctx.broker.getOrder(orderId);
  } catch {
    return `Error: Could not retrieve order ${orderId}. Please verify the order ID is correct.`;
  }

  try {
    await ctx.broker.cancelOrder(orderId);
  } catch {
    return `Error: Failed to cancel order ${orderId}. The order may already be cancelled or filled.`;
  }

  archivePlan(ctx, orderId, args.reason || 'cancelled');

  return [
    'Order Cancelled Successfully',
    '============================',
    `  Order ID: ${orderId}`,
    `  Symbol: ${detail.symbol}`,
    `  Action: ${detail.action}`,
    `  Quantity: ${detail.quantity}`,
    `  Order Type: ${detail.orderType}`,
  ].join('\n');
}

export async function cancelAllOrders(ctx: ToolContext, args: { reason?: string }): Promise<string> {
  let cancelled: string[];
  try {
    cancelled = await ctx.broker.cancelAllOrders();
  } catch {
    return 'Error: Failed to cancel orders. Please try again.';
  }
  if (cancelled.length === 0) return 'No open orders to cancel.';

  for (const orderId of cancelled) {
    archivePlan(ctx, orderId, args.reason || 'cancelled');
  }

  return [
    'All Orders Cancelled',
    '====================',
    `  Cancelled: ${cancelled.length} order(s)`,
    `  Order IDs: ${cancelled.join(', ')}`,
  ].join('\n');
}
