/**
 * Trade plan tools. Plans are written by place/modify/cancel; these expose them to the
 * agent and let it close plans whose orders filled.
 */

import type { TradePlan } from '../types/trade-plan.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext } from './context.js';

export function formatPlan(plan: TradePlan): string {
  const lines = [
    `  Order ${plan.orderId}: ${plan.action} ${plan.quantity} ${plan.symbol} ${plan.orderType}`,
    `    Status:   ${plan.status}`,
    `    Reason:   ${plan.reason}`,
    `    Created:  ${plan.createdAt}`,
  ];
  if (plan.limitPrice !== null) lines.push(`    Limit:    ${plan.limitPrice.toFixed(2)}`);
  if (plan.stopPrice !== null) lines.push(`    Stop:     ${plan.stopPrice.toFixed(2)}`);
  if (plan.archivedAt !== null) {
    lines.push(`    Archived: ${plan.archivedAt} (${plan.archiveReason ?? ''})`);
  }
  if (plan.modifications.length > 0) {
    lines.push('    Modifications:');
    for (const mod of plan.modifications) {
      const changes = Object.entries(mod.changes).map(([k, v]) => `${k}=${v}`).join(', ');
      lines.push(`      ${mod.timestamp}: ${changes}${mod.reason ? ` (${mod.reason})` : ''}`);
    }
  }
  return lines.join('\n');
}

export async function getTradePlans(ctx: ToolContext): Promise<string> {
  const plans = [...ctx.tradePlans.getActivePlans().values()];
  if (plans.length === 0) return 'No active trade plans.';

  const lines = [`Active Trade Plans (${plans.length})`, '=================='];
  for (const plan of plans) lines.push('', formatPlan(plan));
  return lines.join('\n');
}

export async function getTradePlan(ctx: ToolContext, args: { order_id: string }): Promise<string> {
  const plan = ctx.tradePlans.getPlan(args.order_id);
  if (!plan) return `Error: No trade plan found for order ${args.order_id}.`;
  return ['Trade Plan', '==========', formatPlan(plan)].join('\n');
}

export async function markOrderFilled(ctx: ToolContext, args: { order_id: string; reason?: string }): Promise<string> {
  const plan = ctx.tradePlans.getPlan(args.order_id);
  if (!plan) return `Error: No trade plan found for order ${args.order_id}.`;
  if (plan.status === 'archived') {
    return `Trade plan for order ${args.order_id} is already archived (${plan.archiveReason ?? ''}).`;
  }

  try {
    ctx.tradePlans.archive(args.order_id, args.reason || 'filled');
  } catch (err) {
    return `Error: Could not save trade plans: ${errorMessage(err)}`;
  }
  return `Trade plan for order ${args.order_id} archived as filled.`;
}

export async function archiveAllTradePlans(ctx: ToolContext, args: { reason?: string }): Promise<string> {
  let count: number;
  try {
    count = ctx.tradePlans.archiveAll(args.reason || 'end of day');
  } catch (err) {
    return `Error: Could not save trade plans: ${errorMessage(err)}`;
  }
  return count === 0 ? 'No active trade plans to archive.' : `Archived ${count} trade plan(s).`;
}
