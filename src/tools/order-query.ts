import type { BrokerOrder } from '../types/broker.js';
import { formatUsd } from '../utils/format.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext } from './context.js';

function formatOrderLines(order: BrokerOrder): string[] {
  const lines = [
    `  ${order.orderId}  ${order.action} ${order.quantity} ${order.symbol} ${order.orderType}`,
    `    Status:      ${order.status}`,
    `    Filled:      ${order.filledQuantity}/${order.quantity}`,
  ];
  if (order.limitPrice !== null) lines.push(`    Limit Price: ${formatUsd(order.limitPrice)}`);
  if (order.stopPrice !== null) lines.push(`    Stop Price:  ${formatUsd(order.stopPrice)}`);
  return lines;
}

export async function getOpenOrders(ctx: ToolContext, args: { symbol?: string }): Promise<string> {
  const symbol = args.symbol?.trim().toUpperCase() || undefined;

  let orders: BrokerOrder[];
  try {
    orders = await ctx.broker.getOpenOrders(symbol);
  } catch (err) {
    return `Error retrieving open orders: ${errorMessage(err)}`;
  }
  if (orders.length === 0) {
    return symbol ? `No open orders for ${symbol}.` : 'No open orders.';
  }

  const lines = [`Open Orders (${orders.length})`, '==============='];
  for (const order of orders) {
    lines.push('', ...formatOrderLines(order));
  }
  return lines.join('\n');
}

export async function getOrderDetail(ctx: ToolContext, args: { order_id: string }): Promise<string> {
  let order: BrokerOrder;
  try {
    order = await ctx.broker.getOrder(args.order_id);
  } catch (err) {
    return `Error retrieving order ${args.order_id}: ${errorMessage(err)}`;
  }

  const lines = [
    'Order Detail',
    '============',
    `  Order ID:        ${order.orderId}`,
    `  Symbol:          ${order.symbol}`,
    `  Action:          ${order.action}`,
    `  Order Type:      ${order.orderType}`,
    `  Quantity:        ${order.quantity}`,
    `  Filled Quantity: ${order.filledQuantity}`,
    `  Status:          ${order.status}`,
  ];
  if (order.limitPrice !== null) lines.push(`  Limit Price:     ${formatUsd(order.limitPrice)}`);
  if (order.stopPrice !== null) lines.push(`  Stop Price:      ${formatUsd(order.stopPrice)}`);
  if (order.avgFillPrice !== null) lines.push(`  Avg Fill Price:  ${formatUsd(order.avgFillPrice)}`);
  if (order.submittedAt !== null) lines.push(`  Submitted At:    ${order.submittedAt}`);

  const plan = ctx.tradePlans.getPlan(order.orderId);
  if (plan) lines.push('', `  Trade Plan Reason: ${plan.reason}`);
  return lines.join('\n');
}
