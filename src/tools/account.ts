import type { BrokerAccount, BrokerPosition, Fill } from '../types/broker.js';
import { formatUsd } from '../utils/format.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext } from './context.js';

export async function getAccountSummary(ctx: ToolContext): Promise<string> {
  let account: BrokerAccount;
  try {
    account = await ctx.broker.getAccount();
  } catch (err) {
    return `Error retrieving account summary: ${errorMessage(err)}`;
  }

  return [
    'Account Summary',
    '===============',
    `  Cash Balance:       ${formatUsd(account.cash)}`,
    `  Buying Power:       ${formatUsd(account.buyingPower)}`,
    `  Net Liquidation:    ${formatUsd(account.equity)}`,
    `  Day Change:         ${formatUsd(account.equity - account.lastEquity)}`,
    `  Realized P&L Today: ${formatUsd(ctx.state.getDailyPnl())}`,
  ].join('\n');
}

export async function getBuyingPower(ctx: ToolContext): Promise<string> {
  let account: BrokerAccount;
  try {
    account = await ctx.broker.getAccount();
  } catch (err) {
    return `Error retrieving buying power: ${errorMessage(err)}`;
  }

  return [
    'Buying Power',
    '============',
    `  Available Buying Power:  ${formatUsd(account.buyingPower)}`,
    `  Cash Balance:            ${formatUsd(account.cash)}`,
  ].join('\n');
}

export async function getPositions(ctx: ToolContext): Promise<string> {
  let positions: BrokerPosition[];
  try {
    positions = await ctx.broker.getPositions();
  } catch (err) {
    return `Error retrieving positions: ${errorMessage(err)}`;
  }
  if (positions.length === 0) return 'No positions found.';

  const lines = ['Current Positions', '================='];
  for (const pos of positions) {
    const costBasis = pos.averageCost * pos.quantity;
    const pnlPct = costBasis !== 0 ? (pos.unrealizedPnl / costBasis) * 100 : 0;
    lines.push(
      '',
      `  ${pos.symbol}`,
      `    Quantity:        ${pos.quantity}`,
      `    Avg Cost:        ${formatUsd(pos.averageCost)}`,
      `    Market Value:    ${formatUsd(pos.marketValue)}`,
      `    Unrealized P&L:  ${formatUsd(pos.unrealizedPnl)} (${pnlPct.toFixed(2)}%)`,
    );
  }
  return lines.join('\n');
}

export async function getTransactionHistory(
  ctx: ToolContext,
  args: { symbol?: string; start_date?: string; end_date?: string; limit: number },
): Promise<string> {
  const symbol = args.symbol?.trim().toUpperCase() || undefined;

  let fills: Fill[];
  try {
    fills = await ctx.broker.getFills({ symbol, after: args.start_date, until: args.end_date, limit: args.limit });
  } catch (err) {
    return `Error retrieving transaction history: ${errorMessage(err)}`;
  }
  if (fills.length === 0) return 'No transactions found.';

  const lines = ['Transaction History', '==================='];
  for (const fill of fills) {
    lines.push(
      '',
      `  ${fill.symbol} - ${fill.action}`,
      `    Quantity:    ${fill.quantity}`,
      `    Fill Price:  ${formatUsd(fill.price)}`,
      `    Time:        ${fill.time}`,
      `    Order ID:    ${fill.orderId}`,
    );
  }
  return lines.join('\n');
}
