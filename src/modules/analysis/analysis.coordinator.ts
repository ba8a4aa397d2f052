/**
 * ANALYSIS — Cache Coordinator
 * ============================
 *
 * Read-through entry point used by request handlers and the background
 * refresher.
 *
 * getOrRefresh: valid cached record → return it; otherwise refresh.
 * refresh:      three sequential oracle calls (trend, lower, upper),
 *               extraction, one new record, write-through.
 *
 * A failing oracle call only degrades its own field. A failing cache
 * write is logged and the fresh record is still returned.
 */

import { systemClock, type Clock } from '../../common/clock.js';
import { createLogger, errorMessage, type Logger } from '../../common/logger.js';
import { askOracle, type MarketOracle } from '../oracle/oracle.types.js';
import { extract } from './analysis.extractor.js';
import { isValid } from './analysis.staleness.js';
import type { SymbolCacheStore } from './analysis.store.js';
import {
  MISSING_LIMIT,
  RECORD_KINDS,
  UNKNOWN_TREND,
  normalizeSymbol,
  type AnalysisRecord,
  type CacheDocument,
  type RawResponses,
  type RecordKind,
} from './analysis.types.js';

export interface CacheCoordinatorDeps {
  store: SymbolCacheStore;
  oracle: MarketOracle;
  clock?: Clock;
  logger?: Logger;
}

const SENTINELS: Record<RecordKind, string> = {
  trend: UNKNOWN_TREND,
  lowerLimit: MISSING_LIMIT,
  upperLimit: MISSING_LIMIT,
};

const LABELS: Record<RecordKind, string> = {
  trend: 'trend',
  lowerLimit: 'lower limit',
  upperLimit: 'upper limit',
};

export class CacheCoordinator {
  private readonly store: SymbolCacheStore;
  private readonly oracle: MarketOracle;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: CacheCoordinatorDeps) {
    this.store = deps.store;
    this.oracle = deps.oracle;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('CacheCoordinator');
  }

  async getOrRefresh(symbol: string): Promise<AnalysisRecord> {
    const key = normalizeSymbol(symbol);
    const cached = await this.store.getSymbol(key);

    if (cached && isValid(cached, this.clock.now())) {
      this.logger.info({ symbol: key, timestamp: cached.timestamp }, 'Cache hit');
      return cached;
    }

    this.logger.info({ symbol: key }, cached ? 'Cache stale, refreshing' : 'Cache miss, refreshing');
    return this.refresh(key);
  }

  /**
   * Recompute a symbol unconditionally and write it through the store.
   */
  async refresh(symbol: string): Promise<AnalysisRecord> {
    const key = normalizeSymbol(symbol);
    this.logger.info({ symbol: key }, 'Refreshing analysis');

    const fields: Record<RecordKind, string> = { ...SENTINELS };
    const rawResponses: RawResponses = { trend: '', lowerLimit: '', upperLimit: '' };

    for (const kind of RECORD_KINDS) {
      try {
        const raw = await askOracle(this.oracle, kind, key);
        rawResponses[kind] = raw;
        fields[kind] = extract(kind, raw);
      } catch (err) {
        const message = errorMessage(err);
        this.logger.error({ symbol: key, kind, error: message }, `Oracle failed for ${LABELS[kind]}`);
        rawResponses[kind] = `Error: ${message}`;
      }
    }

    const record: AnalysisRecord = {
      symbol: key,
      timestamp: this.clock.toISOString(this.clock.now()),
      trend: fields.trend,
      lowerLimit: fields.lowerLimit,
      upperLimit: fields.upperLimit,
      rawResponses,
    };

    try {
      await this.store.upsertSymbol(key, record);
    } catch (err) {
      this.logger.error({ symbol: key, error: errorMessage(err) }, 'Failed to persist refreshed record');
    }

    this.logger.info(
      { symbol: key, trend: record.trend, lowerLimit: record.lowerLimit, upperLimit: record.upperLimit },
      'Refresh complete'
    );
    return record;
  }

  /**
   * Start tracking a symbol: always recomputes, even when a valid record exists.
   */
  addSymbol(symbol: string): Promise<AnalysisRecord> {
    this.logger.info({ symbol: normalizeSymbol(symbol) }, 'Adding symbol');
    return this.refresh(symbol);
  }

  listAll(): Promise<CacheDocument> {
    return this.store.load();
  }
}
