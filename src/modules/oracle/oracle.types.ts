/**
 * ORACLE — Contracts
 * ==================
 * The cache only ever sees MarketOracle. Everything behind it (search,
 * market data, the reasoning model) is reached through the narrower
 * ports below so each can be swapped or faked on its own.
 */

import type { AnalysisKind, RecordKind } from '../analysis/analysis.types.js';

// ═══════════════════════════════════════════════════════════════
// CAPABILITY
// ═══════════════════════════════════════════════════════════════

export interface MarketOracle {
  trend(symbol: string): Promise<string>;
  lowerLimit(symbol: string): Promise<string>;
  upperLimit(symbol: string): Promise<string>;
  general(symbol: string, question: string): Promise<string>;
}

/**
 * Dispatch one of the record kinds to its oracle method.
 */
export function askOracle(oracle: MarketOracle, kind: RecordKind, symbol: string): Promise<string> {
  switch (kind) {
    case 'trend':
      return oracle.trend(symbol);
    case 'lowerLimit':
      return oracle.lowerLimit(symbol);
    case 'upperLimit':
      return oracle.upperLimit(symbol);
  }
}

// ═══════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════

export type SourceStatus = 'success' | 'error';

export interface MarketSnapshot {
  symbol: string;
  status: SourceStatus;
  rawAnalysis?: string;
  dataSource?: string;
  timestamp?: string;
  error?: string;
}

export interface SearchResult {
  symbol: string;
  query: string;
  status: SourceStatus;
  answer?: string;
  error?: string;
}

export interface MarketDataSource {
  getMarketData(symbol: string): Promise<MarketSnapshot>;
}

export interface IntelligenceSearch {
  search(query: string, symbol: string): Promise<SearchResult>;
}

export interface ReasoningModel {
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface GatheredData {
  marketData: MarketSnapshot;
  search: SearchResult;
}

export interface OracleRequest {
  kind: AnalysisKind;
  symbol: string;
  question?: string;
}
