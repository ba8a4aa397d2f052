/**
 * ANALYSIS — Result Extractor
 *
 * Pulls the structured field out of an oracle answer using the fixed
 * line-prefix grammar (`TREND: bullish`, `LIMIT: $1234.56`).
 * A missing marker is a normal outcome and yields the sentinel.
 */

import {
  LIMIT_MARKER,
  MISSING_LIMIT,
  TREND_MARKER,
  UNKNOWN_TREND,
  type AnalysisKind,
} from './analysis.types.js';

/**
 * First whitespace-delimited token after `marker` on the first line that
 * contains it, or null when no line has the marker or nothing follows it.
 */
export function tokenAfterMarker(rawText: string, marker: string): string | null {
  const line = rawText.split(/\r?\n/).find((l) => l.includes(marker));
  if (line === undefined) return null;

  const rest = line.slice(line.indexOf(marker) + marker.length);
  const token = rest.trim().split(/\s+/)[0];
  return token ? token : null;
}

export function extractTrend(rawText: string): string {
  return tokenAfterMarker(rawText, TREND_MARKER)?.toLowerCase() ?? UNKNOWN_TREND;
}

export function extractLimit(rawText: string): string {
  return tokenAfterMarker(rawText, LIMIT_MARKER) ?? MISSING_LIMIT;
}

export function extract(kind: AnalysisKind, rawText: string): string {
  switch (kind) {
    case 'trend':
      return extractTrend(rawText);
    case 'lowerLimit':
    case 'upperLimit':
      return extractLimit(rawText);
    case 'general':
      return rawText.trim();
  }
}
