/**
 * daily-state.ts: Per-day realized P&L and recent-order fingerprints.
 *
 * State lives in `<stateDir>/YYYY-MM-DD.json` (local calendar day) and is rewritten
 * atomically after every mutation. The first access after midnight starts a fresh,
 * empty day in memory; the previous day's file is left on disk untouched.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { errorMessage } from '../utils/errors.js';
import type { DailyStateReader } from '../types/safety.js';

export const DEFAULT_DEDUP_WINDOW_SECONDS = 60;

const recentOrderSchema = z.object({
  fingerprint: z.string(),
  timestamp: z.number(),
});

const stateFileSchema = z.object({
  date: z.string(),
  realized_pnl: z.number(),
  recent_orders: z.array(recentOrderSchema),
});

type RecentOrder = z.infer<typeof recentOrderSchema>;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar day as YYYY-MM-DD. */
export function localDate(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

function nowSeconds(): number {
  return Date.now() / 1000;
}

export class DailyState implements DailyStateReader {
  private date: string;
  private realizedPnl = 0;
  private recentOrders: RecentOrder[] = [];

  constructor(private readonly stateDir: string) {
    this.date = localDate();
    this.load();
  }

  /**
   * SHA-256 over `symbol|action|quantity|orderType|limitPrice`. A missing limit price
   * renders as `null`, so it never collides with a limit price of 0.
   */
  static makeFingerprint(
    symbol: string,
    action: string,
    quantity: number,
    orderType: string,
    limitPrice: number | null,
  ): string {
    const raw = `${symbol}|${action}|${quantity}|${orderType}|${limitPrice === null ? 'null' : String(limitPrice)}`;
    return createHash('sha256').update(raw).digest('hex');
  }

  get currentDate(): string {
    this.ensureToday();
    return this.date;
  }

  recordPnl(amount: number): void {
    this.ensureToday();
    this.realizedPnl += amount;
    this.save();
  }

  recordOrder(fingerprint: string): void {
    this.ensureToday();
    this.recentOrders.push({ fingerprint, timestamp: nowSeconds() });
    this.save();
  }

  /** Drops entries older than the window (in memory) before looking the fingerprint up. */
  hasRecentOrder(fingerprint: string, windowSeconds = DEFAULT_DEDUP_WINDOW_SECONDS): boolean {
    this.ensureToday();
    const cutoff = nowSeconds() - windowSeconds;
    this.recentOrders = this.recentOrders.filter(entry => entry.timestamp >= cutoff);
    return this.recentOrders.some(entry => entry.fingerprint === fingerprint);
  }

  getDailyPnl(): number {
    this.ensureToday();
    return this.realizedPnl;
  }

  private ensureToday(): void {
    const today = localDate();
    if (this.date === today) return;
    this.date = today;
    this.realizedPnl = 0;
    this.recentOrders = [];
  }

  private filePath(): string {
    return join(this.stateDir, `${this.date}.json`);
  }

  private save(): void {
    mkdirSync(this.stateDir, { recursive: true });
    const payload = {
      date: this.date,
      realized_pnl: this.realizedPnl,
      recent_orders: this.recentOrders,
    };
    writeFileAtomic(this.filePath(), JSON.stringify(payload), this.stateDir);
  }

  private load(): void {
    const path = this.filePath();
    if (!existsSync(path)) return;

    try {
      const data = stateFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
      this.date = data.date;
      this.realizedPnl = data.realized_pnl;
      this.recentOrders = data.recent_orders;
    } catch (err) {
      console.warn(`[DailyState] Could not load ${path}, starting the day empty:`, errorMessage(err));
    }
  }
}
