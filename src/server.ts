import express, { type Express } from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import { getAccountSummary, getBuyingPower, getPositions, getTransactionHistory } from './tools/account.js';
import type { ToolContext } from './tools/context.js';
import { getDailyRiskStatus, recordRealizedPnl } from './tools/daily-risk.js';
import { getStockBars, getStockQuote, getStockQuotes } from './tools/market-data.js';
import { cancelAllOrders, cancelOrder, modifyOrder } from './tools/order-management.js';
import { getOpenOrders, getOrderDetail } from './tools/order-query.js';
import { placeStockOrder, previewStockOrder } from './tools/orders.js';
import { archiveAllTradePlans, getTradePlan, getTradePlans, markOrderFilled } from './tools/trade-plans.js';
import { errorMessage } from './utils/errors.js';

export const SERVER_NAME = 'guarded-broker-mcp';
export const SERVER_VERSION = '1.0.0';

function reply(text: string) {
  return { content: [{ type: 'text' as const, text }], isError: text.startsWith('Error') };
}

// Action and order type stay plain strings here so the order validator produces the messages.
const orderShape = {
  symbol: z.string().describe('Stock ticker symbol, uppercase, e.g. AAPL'),
  action: z.string().describe('BUY or SELL'),
  quantity: z.number().describe('Number of shares (positive integer)'),
  order_type: z.string().default('LMT').describe('MKT, LMT, STP, STP_LMT or TRAIL'),
  limit_price: z.number().optional().describe('Limit price, required for LMT and STP_LMT'),
  stop_price: z.number().optional().describe('Stop price (trail amount for TRAIL), required for STP and STP_LMT'),
};

export function createMcpServer(ctx: ToolContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  // ── Account ─────────────────────────────────────────────────────────────────
  server.tool('get_account_summary', 'Cash, buying power, net liquidation and today\'s realized P&L', {}, async () =>
    reply(await getAccountSummary(ctx)),
  );

  server.tool('get_buying_power', 'Available buying power and cash balance', {}, async () =>
    reply(await getBuyingPower(ctx)),
  );

  server.tool('get_positions', 'Current stock positions with unrealized P&L', {}, async () =>
    reply(await getPositions(ctx)),
  );

  server.tool(
    'get_transaction_history',
    'Filled executions, optionally filtered by symbol and date range',
    {
      symbol: z.string().optional().describe('Filter by symbol'),
      start_date: z.string().optional().describe('Start date YYYY-MM-DD'),
      end_date: z.string().optional().describe('End date YYYY-MM-DD'),
      limit: z.number().default(50).describe('Maximum number of records'),
    },
    async args => reply(await getTransactionHistory(ctx, args)),
  );

  // ── Market data ─────────────────────────────────────────────────────────────
  server.tool(
    'get_stock_quote',
    'Latest quote for one symbol',
    { symbol: z.string().describe('Stock ticker symbol, e.g. AAPL') },
    async args => reply(await getStockQuote(ctx, args)),
  );

  server.tool(
    'get_stock_quotes',
    'Latest quotes for up to 50 symbols',
    { symbols: z.string().describe('Comma-separated symbols, e.g. "AAPL,MSFT,GOOG"') },
    async args => reply(await getStockQuotes(ctx, args)),
  );

  server.tool(
    'get_stock_bars',
    'Historical OHLCV bars',
    {
      symbol: z.string().describe('Stock ticker symbol'),
      period: z.string().default('1d').describe('Bar period: 1d, 1w, 1m, 3m, 6m, 1y'),
      limit: z.number().default(100).describe('Number of bars'),
    },
    async args => reply(await getStockBars(ctx, args)),
  );

  // ── Execution ───────────────────────────────────────────────────────────────
  server.tool(
    'preview_stock_order',
    'Run the safety checks on an order without submitting it',
    orderShape,
    async args => reply(await previewStockOrder(ctx, args)),
  );

  server.tool(
    'place_stock_order',
    'Submit an order after the safety checks pass; records a trade plan with the reason',
    { ...orderShape, reason: z.string().describe('Why this trade is being placed') },
    async args => reply(await placeStockOrder(ctx, args)),
  );

  // ── Management ──────────────────────────────────────────────────────────────
  server.tool(
    'modify_order',
    'Change quantity, limit price or stop price of an open order',
    {
      order_id: z.string().describe('Order id'),
      quantity: z.number().optional().describe('New quantity'),
      limit_price: z.number().optional().describe('New limit price'),
      stop_price: z.number().optional().describe('New stop price'),
      reason: z.string().optional().describe('Why the order is being changed'),
    },
    async args => reply(await modifyOrder(ctx, args)),
  );

  server.tool(
    'cancel_order',
    'Cancel one open order and archive its trade plan',
    {
      order_id: z.string().describe('Order id'),
      reason: z.string().optional().describe('Why the order is being cancelled'),
    },
    async args => reply(await cancelOrder(ctx, args)),
  );

  server.tool(
    'cancel_all_orders',
    'Cancel every open order',
    { reason: z.string().optional().describe('Why the orders are being cancelled') },
    async args => reply(await cancelAllOrders(ctx, args)),
  );

  // ── Query ───────────────────────────────────────────────────────────────────
  server.tool(
    'get_open_orders',
    'Open orders, optionally for one symbol',
    { symbol: z.string().optional().describe('Filter by symbol') },
    async args => reply(await getOpenOrders(ctx, args)),
  );

  server.tool(
    'get_order_detail',
    'Full detail for one order',
    { order_id: z.string().describe('Order id') },
    async args => reply(await getOrderDetail(ctx, args)),
  );

  // ── Trade plans ─────────────────────────────────────────────────────────────
  server.tool('get_trade_plans', 'Active trade plans with modification history', {}, async () =>
    reply(await getTradePlans(ctx)),
  );

  server.tool(
    'get_trade_plan',
    'Trade plan for one order, active or archived',
    { order_id: z.string().describe('Order id') },
    async args => reply(await getTradePlan(ctx, args)),
  );

  server.tool(
    'mark_order_filled',
    'Archive the trade plan of a filled order',
    {
      order_id: z.string().describe('Order id'),
      reason: z.string().optional().describe('Fill note'),
    },
    async args => reply(await markOrderFilled(ctx, args)),
  );

  server.tool(
    'archive_all_trade_plans',
    'Archive every active trade plan',
    { reason: z.string().optional().describe('Archive reason, defaults to "end of day"') },
    async args => reply(await archiveAllTradePlans(ctx, args)),
  );

  // ── Daily risk ──────────────────────────────────────────────────────────────
  server.tool(
    'record_realized_pnl',
    'Add a realized gain (positive) or loss (negative) to today\'s P&L',
    {
      amount: z.number().describe('Realized P&L in dollars'),
      note: z.string().optional().describe('What the P&L came from'),
    },
    async args => reply(await recordRealizedPnl(ctx, args)),
  );

  server.tool('get_daily_risk_status', 'Today\'s realized P&L against the configured limits', {}, async () =>
    reply(await getDailyRiskStatus(ctx)),
  );

  return server;
}

const methodNotAllowed = {
  jsonrpc: '2.0',
  error: { code: -32000, message: 'Method not allowed.' },
  id: null,
};

/** Stateless streamable-HTTP app: a fresh server and transport per POST. */
export function createHttpApp(ctx: ToolContext): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/mcp', async (req, res) => {
    const server = createMcpServer(ctx);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch(err => console.error('[Http] Transport close error:', errorMessage(err)));
      server.close().catch(err => console.error('[Http] Server close error:', errorMessage(err)));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error('[Http] Error handling MCP request:', errorMessage(err));
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  app.all('/mcp', (_req, res) => {
    res.status(405).json(methodNotAllowed);
  });

  return app;
}
