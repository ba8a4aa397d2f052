/**
 * ORACLE — Prompt templates
 *
 * Each record kind pins the model to a one-line answer grammar that the
 * extractor understands:
 *   TREND: <bullish|bearish|consolidation>
 *   LIMIT: $<number>
 */

import {
  LIMIT_MARKER,
  TREND_LABELS,
  TREND_MARKER,
  type AnalysisKind,
} from '../analysis/analysis.types.js';
import type { GatheredData, MarketSnapshot, SearchResult } from './oracle.types.js';

// ═══════════════════════════════════════════════════════════════
// SYSTEM PROMPTS
// ═══════════════════════════════════════════════════════════════

function trendPrompt(symbol: string): string {
  return `You are a ${symbol} market trend specialist.

Read the market data, news and search results below and decide the ${symbol} trend for THIS WEEK.

Answer in EXACTLY this format:
${TREND_MARKER} [${TREND_LABELS.join('|')}]

Labels:
- bullish: positive momentum
- bearish: negative momentum, risk-off sentiment
- consolidation: range-bound price, mixed signals, low volatility

Reply with the line above and nothing else.`;
}

function lowerLimitPrompt(symbol: string): string {
  return `You are a ${symbol} support level specialist.

From the data below, find the nearest SUPPORT LEVEL where ${symbol} is likely to reverse after a move down THIS WEEK.

Answer in EXACTLY this format:
${LIMIT_MARKER} $XXXX.XX

Weigh:
- volume clusters around support zones
- correlation with related markets

Pick the single most likely level to hold before any retracement. Reply with the line above and nothing else.`;
}

function upperLimitPrompt(symbol: string): string {
  return `You are a ${symbol} resistance level specialist.

From the data below, find the nearest RESISTANCE LEVEL where ${symbol} is likely to reverse after a move up THIS WEEK.

Answer in EXACTLY this format:
${LIMIT_MARKER} $XXXX.XX

Weigh:
- volume clusters around resistance zones
- major psychological levels

Pick the single most likely level to cap moves this week before any retracement. Reply with the line above and nothing else.`;
}

function generalPrompt(symbol: string): string {
  return `You are a ${symbol} market analyst with deep knowledge of:
- trend analysis and technical indicators
- strong support and resistance levels
- fundamental drivers of ${symbol} prices

Use the gathered data to give a complete answer about ${symbol}.

You can:
1. Classify the market phase (bullish/bearish/consolidation)
2. Locate the strongest downside support (lower limit)
3. Locate the strongest upside resistance (upper limit)

Give clear, practical insight grounded in technical and fundamental analysis.`;
}

export function buildSystemPrompt(kind: AnalysisKind, symbol: string): string {
  switch (kind) {
    case 'trend':
      return trendPrompt(symbol);
    case 'lowerLimit':
      return lowerLimitPrompt(symbol);
    case 'upperLimit':
      return upperLimitPrompt(symbol);
    case 'general':
      return generalPrompt(symbol);
  }
}

// ═══════════════════════════════════════════════════════════════
// SEARCH QUERIES
// ═══════════════════════════════════════════════════════════════

export function buildSearchQuery(kind: AnalysisKind, symbol: string, question?: string): string {
  switch (kind) {
    case 'trend':
      return `What is the current ${symbol} market trend likely to continue today? Is sentiment bullish, bearish or consolidating?`;
    case 'lowerLimit':
      return `Below which price could ${symbol} fall further today? What is the first support level ${symbol} should respect today?`;
    case 'upperLimit':
      return `Above which price would ${symbol} meet heavy selling today? What is the first resistance level ${symbol} should respect today?`;
    case 'general':
      return question?.trim() || `${symbol} market analysis`;
  }
}

export function buildMarketDataQuery(symbol: string): string {
  return `What is the current ${symbol} price right now, including post/pre market hours? Provide:
1. Current price for ${symbol}, including post/pre market hours.
2. Key support levels below which ${symbol} can go down.
3. Key resistance levels where ${symbol} can meet selling pressure.
4. Recent volume trend (higher/lower than average).
5. Overall sentiment (bullish/bearish/consolidation) for the active week.

Format the response as structured data with clear labels.`;
}

export function buildProviderSystemPrompt(symbol: string): string {
  return `You are a real-time financial data provider. Extract the current ${symbol} market data and technical levels, including post/pre market hours. Give precise numbers. Keep the response concise, factual and up to date.`;
}

// ═══════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════

function describeSnapshot(snapshot: MarketSnapshot): string {
  if (snapshot.status === 'error') return JSON.stringify({ error: snapshot.error, status: 'error' });
  return snapshot.rawAnalysis ?? 'N/A';
}

function describeSearch(result: SearchResult): string {
  if (result.status === 'error') return JSON.stringify({ query: result.query, error: result.error, status: 'error' });
  return result.answer ?? 'N/A';
}

export function buildContext(data: GatheredData): string {
  return `
DATA GATHERED:

Market Data:
${describeSnapshot(data.marketData)}


Market Intelligence:
${describeSearch(data.search)}

Based on this data, provide your analysis.
`;
}
