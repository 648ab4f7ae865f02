#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'http';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, limitsFromConfig } from './config.js';
import { createAlpacaClient } from './lib/alpaca-client.js';
import { DailyState } from './safety/daily-state.js';
import { TradePlanStore } from './safety/trade-plan-store.js';
import { createHttpApp, createMcpServer, SERVER_NAME } from './server.js';
import type { ToolContext } from './tools/context.js';
import { errorMessage } from './utils/errors.js';

// stdout carries the MCP stream in stdio mode, so every log line here goes to stderr.

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  console.error(`[Boot] ${SERVER_NAME} starting (${config.NODE_ENV}, ${config.MCP_TRANSPORT})`);

  // ── Context ─────────────────────────────────────────────────────────────
  const ctx: ToolContext = {
    broker: createAlpacaClient(config),
    state: new DailyState(config.STATE_DIR),
    tradePlans: new TradePlanStore(config.STATE_DIR),
    limits: limitsFromConfig(config),
  };
  console.error(
    `[Boot] State dir ${config.STATE_DIR}; limits: max order ${ctx.limits.maxOrderValue}, ` +
    `daily loss ${ctx.limits.dailyLossLimit}, max position ${ctx.limits.maxPositionPct}`,
  );

  // ── Transport ───────────────────────────────────────────────────────────
  let close: () => Promise<void>;
  if (config.MCP_TRANSPORT === 'streamable-http') {
    const app = createHttpApp(ctx);
    const httpServer: Server = app.listen(config.MCP_PORT, config.MCP_HOST, () => {
      console.error(`[Boot] Listening on http://${config.MCP_HOST}:${config.MCP_PORT}/mcp`);
    });
    close = () => new Promise((resolve, reject) => httpServer.close(err => (err ? reject(err) : resolve())));
  } else {
    const server = createMcpServer(ctx);
    await server.connect(new StdioServerTransport());
    console.error('[Boot] Serving MCP over stdio');
    close = () => server.close();
  }

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    console.error(`[Boot] ${signal} received, shutting down`);
    try {
      await close();
      process.exit(0);
    } catch (err) {
      console.error('[Boot] Shutdown error:', errorMessage(err));
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
