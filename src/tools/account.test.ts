import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestContext, removeDir, type TestContext } from '../test-support/context.js';
import { getAccountSummary, getBuyingPower, getPositions, getTransactionHistory } from './account.js';

describe('account tools', () => {
  let t: TestContext;

  beforeEach(() => {
    t = createTestContext();
  });

  afterEach(() => {
    removeDir(t.dir);
  });

  it('summarises the account with today\'s realized P&L', async () => {
    t.ctx.state.recordPnl(-50);
    expect(await getAccountSummary(t.ctx)).toBe(
      [
        'Account Summary',
        '===============',
        '  Cash Balance:       $100,000.00',
        '  Buying Power:       $200,000.00',
        '  Net Liquidation:    $100,000.00',
        '  Day Change:         $1,000.00',
        '  Realized P&L Today: -$50.00',
      ].join('\n'),
    );
  });

  it('reports buying power', async () => {
    expect((await getBuyingPower(t.ctx)).split('\n')[2]).toBe('  Available Buying Power:  $200,000.00');
  });

  it('shows unrealized P&L against cost basis', async () => {
    t.broker.positions = [{ symbol: 'AAPL', quantity: 10, averageCost: 100, marketValue: 1050, unrealizedPnl: 50 }];
    const lines = (await getPositions(t.ctx)).split('\n');
    expect(lines).toContain('  AAPL');
    expect(lines).toContain('    Unrealized P&L:  $50.00 (5.00%)');
  });

  it('says so when flat', async () => {
    expect(await getPositions(t.ctx)).toBe('No positions found.');
  });

  it('filters fills by symbol', async () => {
    t.broker.fills = [
      { symbol: 'AAPL', action: 'BUY', quantity: 10, price: 150, time: '2026-03-10T14:31:00Z', orderId: 'ord-1' },
      { symbol: 'MSFT', action: 'SELL', quantity: 2, price: 400, time: '2026-03-10T15:00:00Z', orderId: 'ord-2' },
    ];
    const text = await getTransactionHistory(t.ctx, { symbol: 'aapl', limit: 50 });
    expect(text).toContain('  AAPL - BUY');
    expect(text).not.toContain('MSFT');
  });

  it('says so when there is no history', async () => {
    expect(await getTransactionHistory(t.ctx, { limit: 50 })).toBe('No transactions found.');
  });

  it('returns broker failures as text', async () => {
    t.broker.failWith = new Error('Alpaca API 401: unauthorized');
    expect(await getAccountSummary(t.ctx)).toBe('Error retrieving account summary: Alpaca API 401: unauthorized');
  });
});
