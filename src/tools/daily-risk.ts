import { errorMessage } from '../utils/errors.js';
import { formatUsd } from '../utils/format.js';
import type { ToolContext } from './context.js';

export async function recordRealizedPnl(ctx: ToolContext, args: { amount: number; note?: string }): Promise<string> {
  if (!Number.isFinite(args.amount)) {
    return `Error: Invalid amount: ${args.amount}. Must be a finite number.`;
  }

  try {
    ctx.state.recordPnl(args.amount);
  } catch (err) {
    return `Error: Could not save realized P&L: ${errorMessage(err)}`;
  }

  const lines = [
    `Recorded realized P&L of ${formatUsd(args.amount)}.`,
    `Realized P&L today: ${formatUsd(ctx.state.getDailyPnl())}`,
  ];
  if (args.note) lines.push(`Note: ${args.note}`);
  return lines.join('\n');
}

function limitText(value: number, format: (v: number) => string): string {
  return value > 0 ? format(value) : 'disabled';
}

export async function getDailyRiskStatus(ctx: ToolContext): Promise<string> {
  const { limits, state } = ctx;
  const pnl = state.getDailyPnl();
  const blocked = limits.dailyLossLimit > 0 && pnl < -limits.dailyLossLimit;

  return [
    'Daily Risk Status',
    '=================',
    `  Date:               ${state.currentDate}`,
    `  Realized P&L:       ${formatUsd(pnl)}`,
    `  Daily Loss Limit:   ${limitText(limits.dailyLossLimit, formatUsd)}`,
    `  Max Order Value:    ${limitText(limits.maxOrderValue, formatUsd)}`,
    `  Max Position:       ${limitText(limits.maxPositionPct, v => `${(v * 100).toFixed(1)}%`)}`,
    `  New Orders:         ${blocked ? 'BLOCKED (daily loss limit exceeded)' : 'allowed'}`,
  ].join('\n');
}
