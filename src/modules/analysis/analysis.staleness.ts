/**
 * ANALYSIS — Staleness Policy
 *
 * The only freshness rule in the system: a record is usable while it is
 * younger than one hour. Exactly one hour old is stale.
 */

import { CACHE_TTL_MS } from './analysis.types.js';

export interface Timestamped {
  timestamp?: unknown;
}

/**
 * Parse an ISO-8601 timestamp to epoch ms, or null if it is not one.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

export function isValid(record: Timestamped | null | undefined, now: number): boolean {
  if (!record) return false;
  const ts = parseTimestamp(record.timestamp);
  if (ts === null) return false;
  return now - ts < CACHE_TTL_MS;
}

/**
 * Whole minutes since the record was produced (0 for unparsable timestamps).
 */
export function ageMinutes(record: Timestamped, now: number): number {
  const ts = parseTimestamp(record.timestamp);
  if (ts === null) return 0;
  return Math.floor((now - ts) / 60_000);
}
