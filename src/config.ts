import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { SafetyLimits } from './types/safety.js';

const limit = z.coerce.number().finite().min(0).default(0);

const configSchema = z.object({
  // Alpaca
  ALPACA_API_KEY: z.string().min(1),
  ALPACA_SECRET_KEY: z.string().min(1),
  ALPACA_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),

  // Safety limits (0 disables the check)
  MAX_ORDER_VALUE: limit,     // USD per order
  DAILY_LOSS_LIMIT: limit,    // USD of realized loss per day
  MAX_POSITION_PCT: limit,    // fraction of net liquidation, e.g. 0.05

  // Persistence
  STATE_DIR: z.string().min(1).default(join(homedir(), '.guarded-broker-mcp', 'state')),

  // MCP transport
  MCP_TRANSPORT: z.enum(['stdio', 'streamable-http']).default('stdio'),
  MCP_HOST: z.string().min(1).default('0.0.0.0'),
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type Config = z.infer<typeof configSchema>;

/** Empty strings count as unset so `FOO=` in a .env file falls back to the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    const problems = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${problems}`);
  }
  return result.data;
}

/** All checks off. Meant for tests and explicit opt-outs, never as a silent fallback. */
export const DISABLED_LIMITS: SafetyLimits = Object.freeze({
  maxOrderValue: 0,
  dailyLossLimit: 0,
  maxPositionPct: 0,
});

export function createSafetyLimits(values: SafetyLimits): SafetyLimits {
  for (const [name, value] of Object.entries(values)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`${name} must be a finite number, got ${String(value)}`);
    }
    if (value < 0) {
      throw new Error(`${name} must be non-negative, got ${value}`);
    }
  }
  return Object.freeze({
    maxOrderValue: values.maxOrderValue,
    dailyLossLimit: values.dailyLossLimit,
    maxPositionPct: values.maxPositionPct,
  });
}

export function limitsFromConfig(config: Config): SafetyLimits {
  return createSafetyLimits({
    maxOrderValue: config.MAX_ORDER_VALUE,
    dailyLossLimit: config.DAILY_LOSS_LIMIT,
    maxPositionPct: config.MAX_POSITION_PCT,
  });
}

export type { Config };
