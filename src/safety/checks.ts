/**
 * Pre-trade safety gate.
 *
 * Six independent checks run against every order, in order:
 *   1. Short selling            (error)
 *   2. Buying power             (error)
 *   3. Max order value          (error)
 *   4. Position concentration   (warning)
 *   5. Daily loss limit         (error)
 *   6. Duplicate order          (warning)
 *
 * Every check always runs so the caller sees the whole picture in one pass.
 * Nothing here throws for a bad order; problems come back as messages.
 */

import { DailyState } from './daily-state.js';
import { formatUsd } from '../utils/format.js';
import type {
  AccountSnapshot,
  DailyStateReader,
  OrderIntent,
  PositionSnapshot,
  SafetyLimits,
  SafetyResult,
} from '../types/safety.js';

/** 1% headroom on the buying-power estimate for slippage and fees. */
export const BUYING_POWER_BUFFER = 1.01;

/** Limit price when set, otherwise the last traded price; null when neither is known. */
export function estimatePrice(order: OrderIntent): number | null {
  return order.limitPrice ?? order.lastPrice;
}

// ── Checks ────────────────────────────────────────────────────────────────────

function checkShortSelling(order: OrderIntent, positions: readonly PositionSnapshot[], errors: string[]): void {
  if (order.action !== 'SELL') return;

  const held = positions.find(p => p.symbol === order.symbol)?.quantity ?? 0;
  if (held <= 0) {
    errors.push(`Short selling blocked: no position in ${order.symbol}`);
  } else if (order.quantity > held) {
    errors.push(
      `Short selling blocked: order quantity ${order.quantity} exceeds held shares ${held} for ${order.symbol}`,
    );
  }
}

function checkBuyingPower(order: OrderIntent, account: AccountSnapshot, errors: string[]): void {
  if (order.action !== 'BUY') return;
  const price = estimatePrice(order);
  if (price === null) return;

  const cost = order.quantity * price * BUYING_POWER_BUFFER;
  if (cost > account.cashBalance) {
    errors.push(
      `Insufficient buying power: estimated cost ${formatUsd(cost)} (incl. 1% buffer) ` +
      `exceeds cash balance ${formatUsd(account.cashBalance)}`,
    );
  }
}

function checkMaxOrderValue(order: OrderIntent, limits: SafetyLimits, errors: string[]): void {
  if (limits.maxOrderValue <= 0) return;
  const price = estimatePrice(order);
  if (price === null) return;

  const orderValue = order.quantity * price;
  if (orderValue > limits.maxOrderValue) {
    errors.push(`Max order value exceeded: ${formatUsd(orderValue)} > limit ${formatUsd(limits.maxOrderValue)}`);
  }
}

function checkPositionConcentration(
  order: OrderIntent,
  account: AccountSnapshot,
  limits: SafetyLimits,
  warnings: string[],
): void {
  if (limits.maxPositionPct <= 0) return;
  const price = estimatePrice(order);
  if (price === null) return;

  const orderValue = order.quantity * price;
  const cap = limits.maxPositionPct * account.netLiquidation;
  if (orderValue > cap) {
    warnings.push(
      `Position concentration warning: order value ${formatUsd(orderValue)} exceeds ` +
      `${(limits.maxPositionPct * 100).toFixed(1)}% of net liquidation (${formatUsd(cap)})`,
    );
  }
}

/** Strictly below -limit trips; sitting exactly on the limit does not. Applies to SELLs too. */
function checkDailyLossLimit(limits: SafetyLimits, state: DailyStateReader, errors: string[]): void {
  if (limits.dailyLossLimit <= 0) return;

  const dailyPnl = state.getDailyPnl();
  if (dailyPnl < -limits.dailyLossLimit) {
    errors.push(
      `Daily loss limit exceeded: realized P&L ${formatUsd(dailyPnl)} breaches ` +
      `-${formatUsd(limits.dailyLossLimit)} limit`,
    );
  }
}

function checkDuplicateOrder(order: OrderIntent, state: DailyStateReader, warnings: string[]): void {
  const fingerprint = DailyState.makeFingerprint(
    order.symbol,
    order.action,
    order.quantity,
    order.orderType,
    order.limitPrice,
  );
  if (state.hasRecentOrder(fingerprint)) {
    warnings.push(
      `Duplicate order detected: a similar ${order.action} order for ${order.quantity} ${order.symbol} ` +
      `was submitted recently`,
    );
  }
}

// ── Entry point ───────────────────────────────────────────────────────────────

export function runSafetyChecks(params: {
  order: OrderIntent;
  account: AccountSnapshot;
  positions: readonly PositionSnapshot[];
  limits: SafetyLimits;
  state: DailyStateReader;
}): SafetyResult {
  const { order, account, positions, limits, state } = params;
  const errors: string[] = [];
  const warnings: string[] = [];

  checkShortSelling(order, positions, errors);
  checkBuyingPower(order, account, errors);
  checkMaxOrderValue(order, limits, errors);
  checkPositionConcentration(order, account, limits, warnings);
  checkDailyLossLimit(limits, state, errors);
  checkDuplicateOrder(order, state, warnings);

  return Object.freeze({
    passed: errors.length === 0,
    errors: Object.freeze(errors),
    warnings: Object.freeze(warnings),
  });
}

/** Message block for tool responses; empty when there is nothing to report. */
export function formatSafetyResult(result: SafetyResult): string {
  const lines: string[] = [];
  if (result.errors.length > 0) {
    lines.push('SAFETY ERRORS:');
    for (const err of result.errors) lines.push(`  - ${err}`);
  }
  if (result.warnings.length > 0) {
    lines.push('SAFETY WARNINGS:');
    for (const warning of result.warnings) lines.push(`  - ${warning}`);
  }
  return lines.join('\n');
}
