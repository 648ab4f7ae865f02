import type { Bar, BarTimeframe, Quote } from '../types/broker.js';
import { formatCount, formatPrice } from '../utils/format.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolContext } from './context.js';

export const MAX_QUOTE_SYMBOLS = 50;

export const BAR_PERIODS = ['1d', '1w', '1m', '3m', '6m', '1y'] as const;
export type BarPeriod = (typeof BAR_PERIODS)[number];

const PERIOD_TIMEFRAMES: Record<BarPeriod, BarTimeframe> = {
  '1d': '1Day',
  '1w': '1Week',
  '1m': '1Month',
  '3m': '1Month',
  '6m': '1Month',
  '1y': '12Month',
};

function isBarPeriod(value: string): value is BarPeriod {
  return BAR_PERIODS.some(p => p === value);
}

export function formatQuote(q: Quote): string {
  const change = q.lastPrice !== null && q.previousClose !== null ? q.lastPrice - q.previousClose : null;
  const changePct =
    change !== null && q.previousClose !== null && q.previousClose !== 0
      ? `${((change / q.previousClose) * 100).toFixed(2)}%`
      : 'N/A';

  return [
    `Symbol: ${q.symbol}`,
    `Last Price: ${formatPrice(q.lastPrice)}`,
    `Change: ${formatPrice(change)} (${changePct})`,
    `Bid: ${formatPrice(q.bid)}  |  Ask: ${formatPrice(q.ask)}`,
    `Volume: ${formatCount(q.volume)}`,
    `Prev Close: ${formatPrice(q.previousClose)}`,
  ].join('\n');
}

export function formatBars(symbol: string, bars: Bar[]): string {
  if (bars.length === 0) return `No bar data available for ${symbol}.`;

  const header =
    `${'Date'.padEnd(12)} ${'Open'.padStart(10)} ${'High'.padStart(10)} ` +
    `${'Low'.padStart(10)} ${'Close'.padStart(10)} ${'Volume'.padStart(14)}`;
  const lines = [`Historical Bars for ${symbol}`, '', header, '-'.repeat(header.length)];

  for (const b of bars) {
    lines.push(
      `${b.time.padEnd(12)} ${b.open.toFixed(2).padStart(10)} ${b.high.toFixed(2).padStart(10)} ` +
      `${b.low.toFixed(2).padStart(10)} ${b.close.toFixed(2).padStart(10)} ${formatCount(b.volume).padStart(14)}`,
    );
  }
  return lines.join('\n');
}

/** Trims, uppercases and de-duplicates a comma-separated symbol list, keeping first-seen order. */
export function parseSymbolList(raw: string): string[] {
  const seen = new Set<string>();
  for (const part of raw.split(',')) {
    const s = part.trim().toUpperCase();
    if (s) seen.add(s);
  }
  return [...seen];
}

export async function getStockQuote(ctx: ToolContext, args: { symbol: string }): Promise<string> {
  const symbol = args.symbol.trim().toUpperCase();
  if (!symbol) return 'Error: Symbol must not be empty.';

  try {
    return formatQuote(await ctx.broker.getQuote(symbol));
  } catch (err) {
    return `Error retrieving quote for ${symbol}: ${errorMessage(err)}`;
  }
}

export async function getStockQuotes(ctx: ToolContext, args: { symbols: string }): Promise<string> {
  const symbols = parseSymbolList(args.symbols);
  if (symbols.length === 0) return 'Error: Symbols list must not be empty.';
  if (symbols.length > MAX_QUOTE_SYMBOLS) {
    return `Error: Too many symbols (${symbols.length}). Maximum is ${MAX_QUOTE_SYMBOLS}.`;
  }

  try {
    const quotes = await ctx.broker.getQuotes(symbols);
    return quotes.map(formatQuote).join('\n\n---\n\n');
  } catch (err) {
    return `Error retrieving quotes: ${errorMessage(err)}`;
  }
}

export async function getStockBars(
  ctx: ToolContext,
  args: { symbol: string; period: string; limit: number },
): Promise<string> {
  const symbol = args.symbol.trim().toUpperCase();
  if (!symbol) return 'Error: Symbol must not be empty.';
  if (!isBarPeriod(args.period)) {
    return `Error: Invalid period '${args.period}'. Allowed period values: ${BAR_PERIODS.join(', ')}`;
  }
  if (!Number.isInteger(args.limit) || args.limit <= 0) {
    return `Error: Invalid limit: ${args.limit}. Must be a positive integer.`;
  }

  try {
    const bars = await ctx.broker.getBars(symbol, PERIOD_TIMEFRAMES[args.period], args.limit);
    return formatBars(symbol, bars);
  } catch (err) {
    return `Error retrieving bars for ${symbol}: ${errorMessage(err)}`;
  }
}
