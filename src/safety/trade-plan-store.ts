/**
 * trade-plan-store.ts: Durable rationale and audit trail for placed orders.
 *
 * Two files under the state directory:
 *   trade_plans.json          active plans, keyed by order id
 *   trade_plans_archive.json  archived plans (filled / cancelled), same shape
 *
 * Every save writes the whole mapping to a temp file in the same directory and renames
 * it over the target, so a reader only ever sees a complete file. Archiving writes the
 * archive file before the active one. Unreadable files are logged and treated as empty;
 * plans are audit data, not trading state.
 */

import { existsSync, mkdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { errorMessage } from '../utils/errors.js';
import type { Modification, ModificationValue, NewTradePlan, TradePlan } from '../types/trade-plan.js';

export const ACTIVE_PLANS_FILE = 'trade_plans.json';
export const ARCHIVED_PLANS_FILE = 'trade_plans_archive.json';

// ── On-disk shape ─────────────────────────────────────────────────────────────

const modificationSchema = z.object({
  timestamp: z.string(),
  changes: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  reason: z.string(),
});

const storedPlanSchema = z.object({
  order_id: z.union([z.string(), z.number()]).transform(String),
  symbol: z.string(),
  action: z.enum(['BUY', 'SELL']),
  quantity: z.number(),
  order_type: z.enum(['MKT', 'LMT', 'STP', 'STP_LMT', 'TRAIL']),
  limit_price: z.number().nullable(),
  stop_price: z.number().nullable(),
  reason: z.string(),
  status: z.enum(['active', 'archived']),
  created_at: z.string(),
  modified_at: z.string().nullable(),
  archived_at: z.string().nullable(),
  archive_reason: z.string().nullable(),
  modifications: z.array(modificationSchema).default([]),
});

const storedFileSchema = z.record(storedPlanSchema);

type StoredPlan = z.input<typeof storedPlanSchema>;

function toStored(plan: TradePlan): StoredPlan {
  return {
    order_id: plan.orderId,
    symbol: plan.symbol,
    action: plan.action,
    quantity: plan.quantity,
    order_type: plan.orderType,
    limit_price: plan.limitPrice,
    stop_price: plan.stopPrice,
    reason: plan.reason,
    status: plan.status,
    created_at: plan.createdAt,
    modified_at: plan.modifiedAt,
    archived_at: plan.archivedAt,
    archive_reason: plan.archiveReason,
    modifications: plan.modifications.map(m => ({ timestamp: m.timestamp, changes: m.changes, reason: m.reason })),
  };
}

function fromStored(data: z.output<typeof storedPlanSchema>): TradePlan {
  return {
    orderId: data.order_id,
    symbol: data.symbol,
    action: data.action,
    quantity: data.quantity,
    orderType: data.order_type,
    limitPrice: data.limit_price,
    stopPrice: data.stop_price,
    reason: data.reason,
    status: data.status,
    createdAt: data.created_at,
    modifiedAt: data.modified_at,
    archivedAt: data.archived_at,
    archiveReason: data.archive_reason,
    modifications: data.modifications,
  };
}

// ── Store ─────────────────────────────────────────────────────────────────────

export class TradePlanStore {
  private readonly activeFile: string;
  private readonly archiveFile: string;
  private plans = new Map<string, TradePlan>();
  private archived = new Map<string, TradePlan>();

  constructor(private readonly stateDir: string) {
    this.activeFile = join(stateDir, ACTIVE_PLANS_FILE);
    this.archiveFile = join(stateDir, ARCHIVED_PLANS_FILE);
    mkdirSync(stateDir, { recursive: true });
    this.plans = this.loadFile(this.activeFile, 'active plans');
    this.archived = this.loadFile(this.archiveFile, 'archive');
    // Archive is saved before active; an id in both files is archived.
    for (const orderId of this.archived.keys()) {
      this.plans.delete(orderId);
    }
  }

  create(input: NewTradePlan): TradePlan {
    if (this.getPlan(input.orderId)) {
      throw new Error(`Trade plan already exists for order ${input.orderId}`);
    }

    const plan: TradePlan = {
      orderId: input.orderId,
      symbol: input.symbol,
      action: input.action,
      quantity: input.quantity,
      orderType: input.orderType,
      limitPrice: input.limitPrice ?? null,
      stopPrice: input.stopPrice ?? null,
      reason: input.reason,
      status: 'active',
      createdAt: new Date().toISOString(),
      modifiedAt: null,
      archivedAt: null,
      archiveReason: null,
      modifications: [],
    };
    this.plans.set(plan.orderId, plan);
    this.saveActive();
    return plan;
  }

  /** Appends a modification to an active plan. Unknown or archived ids are ignored. */
  recordModification(orderId: string, changes: Record<string, ModificationValue>, reason = ''): void {
    const plan = this.plans.get(orderId);
    if (!plan) return;

    const modification: Modification = {
      timestamp: new Date().toISOString(),
      changes: { ...changes },
      reason,
    };
    plan.modifications.push(modification);
    plan.modifiedAt = modification.timestamp;
    this.saveActive();
  }

  /**
   * Moves an active plan to the id the broker gave its replacement order.
   * No-op when the old id has no active plan or the new id is already taken.
   */
  relink(orderId: string, newOrderId: string): void {
    const plan = this.plans.get(orderId);
    if (!plan || orderId === newOrderId || this.getPlan(newOrderId)) return;

    this.plans.delete(orderId);
    plan.orderId = newOrderId;
    this.plans.set(newOrderId, plan);
    this.saveActive();
  }

  archive(orderId: string, archiveReason = ''): void {
    const plan = this.plans.get(orderId);
    if (!plan) return;

    this.plans.delete(orderId);
    this.markArchived(plan, archiveReason, new Date().toISOString());
    this.saveArchive();
    this.saveActive();
  }

  /** Archives every active plan with the same reason and saves once. Returns how many moved. */
  archiveAll(reason = ''): number {
    const now = new Date().toISOString();
    const plans = [...this.plans.values()];
    for (const plan of plans) {
      this.markArchived(plan, reason, now);
    }
    this.plans.clear();
    this.saveArchive();
    this.saveActive();
    return plans.length;
  }

  getActivePlans(): Map<string, TradePlan> {
    return new Map(this.plans);
  }

  getPlan(orderId: string): TradePlan | undefined {
    return this.plans.get(orderId) ?? this.archived.get(orderId);
  }

  private markArchived(plan: TradePlan, reason: string, at: string): void {
    plan.status = 'archived';
    plan.archivedAt = at;
    plan.archiveReason = reason;
    this.archived.set(plan.orderId, plan);
  }

  private saveActive(): void {
    this.saveFile(this.activeFile, this.plans);
  }

  private saveArchive(): void {
    this.saveFile(this.archiveFile, this.archived);
  }

  private saveFile(target: string, plans: Map<string, TradePlan>): void {
    mkdirSync(this.stateDir, { recursive: true });
    const payload: Record<string, StoredPlan> = {};
    for (const [orderId, plan] of plans) {
      payload[orderId] = toStored(plan);
    }
    writeFileAtomic(target, JSON.stringify(payload, null, 2), this.stateDir);
  }

  private loadFile(path: string, label: string): Map<string, TradePlan> {
    const plans = new Map<string, TradePlan>();
    if (!existsSync(path)) return plans;

    try {
      const data = storedFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
      for (const [orderId, stored] of Object.entries(data)) {
        plans.set(orderId, fromStored(stored));
      }
      return plans;
    } catch (err) {
      console.warn(`[TradePlanStore] Failed to load ${path}, starting with empty ${label}:`, errorMessage(err));
      return new Map();
    }
  }
}
