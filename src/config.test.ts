import { describe, it, expect } from 'vitest';
import { createSafetyLimits, DISABLED_LIMITS, limitsFromConfig, loadConfig } from './config.js';

const baseEnv = { ALPACA_API_KEY: 'test-key', ALPACA_SECRET_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv);
    expect(config.ALPACA_BASE_URL).toBe('https://paper-api.alpaca.markets');
    expect(config.ALPACA_DATA_URL).toBe('https://data.alpaca.markets');
    expect(config.MAX_ORDER_VALUE).toBe(0);
    expect(config.DAILY_LOSS_LIMIT).toBe(0);
    expect(config.MAX_POSITION_PCT).toBe(0);
    expect(config.MCP_TRANSPORT).toBe('stdio');
    expect(config.MCP_PORT).toBe(8000);
    expect(config.STATE_DIR.endsWith('state')).toBe(true);
  });

  it('coerces numeric strings', () => {
    const config = loadConfig({
      ...baseEnv,
      MAX_ORDER_VALUE: '5000',
      DAILY_LOSS_LIMIT: '750.5',
      MAX_POSITION_PCT: '0.05',
      MCP_PORT: '9100',
    });
    expect(config.MAX_ORDER_VALUE).toBe(5000);
    expect(config.DAILY_LOSS_LIMIT).toBe(750.5);
    expect(config.MAX_POSITION_PCT).toBe(0.05);
    expect(config.MCP_PORT).toBe(9100);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ ...baseEnv, MAX_ORDER_VALUE: '', MCP_TRANSPORT: '  ' });
    expect(config.MAX_ORDER_VALUE).toBe(0);
    expect(config.MCP_TRANSPORT).toBe('stdio');
  });

  it('rejects a negative limit', () => {
    expect(() => loadConfig({ ...baseEnv, DAILY_LOSS_LIMIT: '-100' })).toThrow(
      /^Invalid configuration:\n {2}DAILY_LOSS_LIMIT: /,
    );
  });

  it('lists every problem in one error', () => {
    let message = '';
    try {
      loadConfig({ MCP_TRANSPORT: 'websocket' });
    } catch (err) {
      message = err instanceof Error ? err.message : '';
    }
    expect(message).toContain('ALPACA_API_KEY: ');
    expect(message).toContain('ALPACA_SECRET_KEY: ');
    expect(message).toContain('MCP_TRANSPORT: ');
  });
});

describe('createSafetyLimits', () => {
  it('returns a frozen copy', () => {
    const limits = createSafetyLimits({ maxOrderValue: 5000, dailyLossLimit: 500, maxPositionPct: 0.1 });
    expect(limits).toEqual({ maxOrderValue: 5000, dailyLossLimit: 500, maxPositionPct: 0.1 });
    expect(Object.isFrozen(limits)).toBe(true);
  });

  it('rejects negative values', () => {
    expect(() => createSafetyLimits({ maxOrderValue: -1, dailyLossLimit: 0, maxPositionPct: 0 })).toThrow(
      'maxOrderValue must be non-negative, got -1',
    );
  });

  it('rejects non-finite values', () => {
    expect(() => createSafetyLimits({ maxOrderValue: 0, dailyLossLimit: NaN, maxPositionPct: 0 })).toThrow(
      'dailyLossLimit must be a finite number, got NaN',
    );
    expect(() => createSafetyLimits({ maxOrderValue: 0, dailyLossLimit: 0, maxPositionPct: Infinity })).toThrow(
      'maxPositionPct must be a finite number, got Infinity',
    );
  });

  it('disabled limits are all zero', () => {
    expect(DISABLED_LIMITS).toEqual({ maxOrderValue: 0, dailyLossLimit: 0, maxPositionPct: 0 });
  });
});

describe('limitsFromConfig', () => {
  it('maps the limit variables', () => {
    const config = loadConfig({ ...baseEnv, MAX_ORDER_VALUE: '2500', DAILY_LOSS_LIMIT: '300', MAX_POSITION_PCT: '0.2' });
    expect(limitsFromConfig(config)).toEqual({ maxOrderValue: 2500, dailyLossLimit: 300, maxPositionPct: 0.2 });
  });
});
