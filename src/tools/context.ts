import type { DailyState } from '../safety/daily-state.js';
import type { TradePlanStore } from '../safety/trade-plan-store.js';
import type { BrokerClient } from '../types/broker.js';
import type { SafetyLimits } from '../types/safety.js';

/** Built once at start-up and handed to every tool; there are no module-level singletons. */
export interface ToolContext {
  broker: BrokerClient;
  state: DailyState;
  tradePlans: TradePlanStore;
  limits: SafetyLimits;
}
