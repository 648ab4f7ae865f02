import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DISABLED_LIMITS } from '../config.js';
import { DailyState } from '../safety/daily-state.js';
import { TradePlanStore } from '../safety/trade-plan-store.js';
import type { ToolContext } from '../tools/context.js';
import type { SafetyLimits } from '../types/safety.js';
import { FakeBroker } from './fake-broker.js';

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'guarded-broker-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** A path beneath a regular file: creating or writing anything under it fails. */
export function unwritablePath(dir: string): string {
  const blocker = join(dir, 'blocker');
  writeFileSync(blocker, '');
  return join(blocker, 'state');
}

/** Puts a directory where a state file goes, so the next rename onto it fails. */
export function blockFile(path: string): void {
  rmSync(path, { force: true });
  mkdirSync(path);
}

export interface TestContext {
  ctx: ToolContext;
  broker: FakeBroker;
  dir: string;
}

/** Fresh fake broker and state stores under a new temp directory. */
export function createTestContext(limits: SafetyLimits = DISABLED_LIMITS): TestContext {
  const dir = makeTempDir();
  const broker = new FakeBroker();
  const ctx: ToolContext = {
    broker,
    state: new DailyState(dir),
    tradePlans: new TradePlanStore(dir),
    limits,
  };
  return { ctx, broker, dir };
}
