/**
 * ANALYSIS — Types
 * ================
 * Records, the persisted cache document, and the constants every part of
 * the cache agrees on.
 */

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_SYMBOL = 'GOLDUSD';

export const CACHE_TTL_MS = 60 * 60 * 1000; // 1 hour

export const TREND_MARKER = 'TREND:';
export const LIMIT_MARKER = 'LIMIT:';

export const UNKNOWN_TREND = 'unknown';
export const MISSING_LIMIT = 'N/A';

// ═══════════════════════════════════════════════════════════════
// ANALYSIS KINDS
// ═══════════════════════════════════════════════════════════════

export const ANALYSIS_KINDS = ['trend', 'lowerLimit', 'upperLimit', 'general'] as const;

export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

/** Kinds that make up a cached record, in the order they are fetched. */
export const RECORD_KINDS = ['trend', 'lowerLimit', 'upperLimit'] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

export const TREND_LABELS = ['bullish', 'bearish', 'consolidation'] as const;

// ═══════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════

export type RawResponses = Record<RecordKind, string>;

export interface AnalysisRecord {
  symbol: string;
  timestamp: string;          // ISO-8601
  trend: string;              // bullish | bearish | consolidation | unknown
  lowerLimit: string;         // e.g. "$1234.56" or "N/A"
  upperLimit: string;
  rawResponses: RawResponses;
}

export interface CacheDocument {
  lastUpdated: string | null;
  symbols: Record<string, AnalysisRecord>;
}

export function emptyDocument(): CacheDocument {
  return { lastUpdated: null, symbols: {} };
}

/**
 * Trim + uppercase; blank input falls back to the default symbol.
 */
export function normalizeSymbol(symbol: string | undefined | null): string {
  const s = (symbol ?? '').trim().toUpperCase();
  return s || DEFAULT_SYMBOL;
}
