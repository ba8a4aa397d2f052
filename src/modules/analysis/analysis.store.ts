/**
 * ANALYSIS — Symbol Cache Store
 * =============================
 *
 * File-backed cache document: one JSON file holding the latest record of
 * every tracked symbol plus the time of the last write.
 *
 * - The document is always read in full and written in full.
 * - Writes go through a single-slot limiter (the write lock) and replace
 *   the file atomically (temp file + rename).
 * - A missing or corrupt file reads as an empty document.
 * - Legacy single-symbol files are migrated under GOLDUSD on load.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import Bottleneck from 'bottleneck';
import { systemClock, type Clock } from '../../common/clock.js';
import { createLogger, errorMessage, type Logger } from '../../common/logger.js';
import {
  DEFAULT_SYMBOL,
  MISSING_LIMIT,
  UNKNOWN_TREND,
  emptyDocument,
  normalizeSymbol,
  type AnalysisRecord,
  type CacheDocument,
} from './analysis.types.js';

export interface SymbolCacheStoreOptions {
  filePath: string;
  clock?: Clock;
  logger?: Logger;
}

interface ReadResult {
  doc: CacheDocument;
  migrated: boolean;
}

// ═══════════════════════════════════════════════════════════════
// DOCUMENT PARSING
// ═══════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Accepts both the camelCase layout and the snake_case one written by
 * earlier versions of the service.
 */
export function normalizeRecord(key: string, raw: Record<string, unknown>): AnalysisRecord {
  const responses = isPlainObject(raw.rawResponses)
    ? raw.rawResponses
    : isPlainObject(raw.raw_responses)
      ? raw.raw_responses
      : {};

  return {
    symbol: str(raw.symbol) ?? key,
    timestamp: str(raw.timestamp) ?? '',
    trend: str(raw.trend) ?? UNKNOWN_TREND,
    lowerLimit: str(raw.lowerLimit) ?? str(raw.lower_limit) ?? MISSING_LIMIT,
    upperLimit: str(raw.upperLimit) ?? str(raw.upper_limit) ?? MISSING_LIMIT,
    rawResponses: {
      trend: str(responses.trend) ?? '',
      lowerLimit: str(responses.lowerLimit) ?? str(responses.lower_limit) ?? '',
      upperLimit: str(responses.upperLimit) ?? str(responses.upper_limit) ?? '',
    },
  };
}

/**
 * Turn parsed JSON into a cache document. Returns null for shapes that
 * are neither the current layout nor the legacy single-symbol one.
 */
export function parseDocument(raw: unknown): ReadResult | null {
  if (!isPlainObject(raw)) return null;

  if (!('symbols' in raw)) {
    // Legacy layout: the file *is* the GOLDUSD record
    if (str(raw.timestamp) === undefined) return null;
    return {
      doc: {
        lastUpdated: str(raw.timestamp) ?? null,
        symbols: { [DEFAULT_SYMBOL]: normalizeRecord(DEFAULT_SYMBOL, raw) },
      },
      migrated: true,
    };
  }

  if (!isPlainObject(raw.symbols)) return null;

  const symbols: Record<string, AnalysisRecord> = {};
  for (const [key, entry] of Object.entries(raw.symbols)) {
    if (isPlainObject(entry)) {
      symbols[key] = normalizeRecord(key, entry);
    }
  }

  return {
    doc: {
      lastUpdated: str(raw.lastUpdated) ?? str(raw.last_updated) ?? null,
      symbols,
    },
    migrated: false,
  };
}

function isMissingFile(err: unknown): boolean {
  return isPlainObject(err) && err.code === 'ENOENT';
}

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export class SymbolCacheStore {
  readonly filePath: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly writeLock = new Bottleneck({ maxConcurrent: 1 });

  constructor(options: SymbolCacheStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('SymbolCacheStore');
  }

  /**
   * Read the whole document. Never rejects: unreadable content is an
   * empty cache. A migrated legacy file is written back straight away.
   */
  async load(): Promise<CacheDocument> {
    const { doc, migrated } = await this.readDocument();
    if (!migrated) return doc;

    try {
      return await this.migrateUnderLock();
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, 'Failed to persist migrated cache');
      return doc;
    }
  }

  /**
   * Stamp lastUpdated and replace the file contents under the write lock.
   * Rejects when the file cannot be written.
   */
  async save(doc: CacheDocument): Promise<void> {
    await this.writeLock.schedule(() => this.writeDocument(doc));
  }

  async getSymbol(symbol: string): Promise<AnalysisRecord | undefined> {
    const doc = await this.load();
    return doc.symbols[normalizeSymbol(symbol)];
  }

  /**
   * Load → set → save of the whole document. The lock spans all three
   * steps, so concurrent upserts of different symbols do not drop each
   * other's entries.
   */
  async upsertSymbol(symbol: string, record: AnalysisRecord): Promise<void> {
    await this.writeLock.schedule(async () => {
      const { doc } = await this.readDocument();
      doc.symbols[normalizeSymbol(symbol)] = record;
      await this.writeDocument(doc);
    });
  }

  /**
   * Re-read under the write lock and rewrite only if the file is still in
   * the legacy layout. An upsert that got the lock first has already
   * migrated it, together with its own symbol.
   */
  private migrateUnderLock(): Promise<CacheDocument> {
    return this.writeLock.schedule(async () => {
      const { doc, migrated } = await this.readDocument();
      if (migrated) {
        this.logger.info({ file: this.filePath }, 'Migrating legacy cache file');
        await this.writeDocument(doc);
      }
      return doc;
    });
  }

  private async readDocument(): Promise<ReadResult> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn({ file: this.filePath, error: errorMessage(err) }, 'Cache file unreadable, starting empty');
      }
      return { doc: emptyDocument(), migrated: false };
    }

    let parsed: ReadResult | null = null;
    try {
      parsed = parseDocument(JSON.parse(text));
    } catch (err) {
      this.logger.warn({ file: this.filePath, error: errorMessage(err) }, 'Cache file is not valid JSON, starting empty');
      return { doc: emptyDocument(), migrated: false };
    }

    if (!parsed) {
      this.logger.warn({ file: this.filePath }, 'Cache file has an unknown layout, starting empty');
      return { doc: emptyDocument(), migrated: false };
    }

    return parsed;
  }

  private async writeDocument(doc: CacheDocument): Promise<void> {
    doc.lastUpdated = this.clock.toISOString(this.clock.now());

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await writeFile(tmpPath, JSON.stringify(doc, null, 2), 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }

    this.logger.info({ symbols: Object.keys(doc.symbols).length, at: doc.lastUpdated }, 'Cache updated');
  }
}
