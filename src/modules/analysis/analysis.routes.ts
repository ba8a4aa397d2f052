/**
 * ANALYSIS ROUTES — HTTP Endpoints
 *
 * Thin request/response mapping over the coordinator (cached) and the
 * oracle (live). Symbol defaults to GOLDUSD.
 */

import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { systemClock, type Clock } from '../../common/clock.js';
import { BadRequestError, ServiceUnavailableError, UpstreamError } from '../../common/errors.js';
import { errorMessage } from '../../common/logger.js';
import type { MarketOracle } from '../oracle/oracle.types.js';
import type { CacheCoordinator } from './analysis.coordinator.js';
import { extractLimit, extractTrend } from './analysis.extractor.js';
import { ageMinutes } from './analysis.staleness.js';
import { DEFAULT_SYMBOL, normalizeSymbol, type AnalysisRecord } from './analysis.types.js';

export interface AnalysisRouteDeps {
  coordinator: Pick<CacheCoordinator, 'getOrRefresh' | 'addSymbol' | 'listAll'>;
  oracle: MarketOracle;
  clock?: Clock;
}

interface SymbolQuery {
  symbol?: string;
}

interface QueryBody {
  query: string;
  symbol?: string;
}

const queryBodySchema = {
  type: 'object',
  required: ['query'],
  properties: {
    query: { type: 'string' },
    symbol: { type: 'string' },
  },
} as const;

export function toSymbolData(record: AnalysisRecord, now: number) {
  return {
    symbol: record.symbol,
    trend: record.trend,
    lowerLimit: record.lowerLimit,
    upperLimit: record.upperLimit,
    timestamp: record.timestamp,
    cacheAgeMinutes: ageMinutes(record, now),
  };
}

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerAnalysisRoutes(app: FastifyInstance, deps: AnalysisRouteDeps): Promise<void> {
  const { coordinator, oracle } = deps;
  const clock = deps.clock ?? systemClock;

  async function live(label: string, call: () => Promise<string>): Promise<string> {
    try {
      return await call();
    } catch (err) {
      throw new UpstreamError(`Error analyzing ${label}: ${errorMessage(err)}`);
    }
  }

  async function symbolData(log: FastifyBaseLogger, symbol: string) {
    try {
      const record = await coordinator.getOrRefresh(symbol);
      return toSymbolData(record, clock.now());
    } catch (err) {
      log.error({ symbol, error: errorMessage(err) }, 'Symbol data unavailable');
      throw new ServiceUnavailableError('Cache data unavailable', 'CACHE_UNAVAILABLE');
    }
  }

  /**
   * GET /trend?symbol=
   *
   * Live trend call, bypasses the cache
   */
  app.get('/trend', async (
    request: FastifyRequest<{ Querystring: SymbolQuery }>,
    reply: FastifyReply
  ) => {
    const symbol = normalizeSymbol(request.query.symbol);
    const rawResponse = await live('trend', () => oracle.trend(symbol));

    return reply.send({
      ok: true,
      data: { symbol, trend: extractTrend(rawResponse), rawResponse },
    });
  });

  /**
   * GET /lower-limit?symbol=
   *
   * Live support level call
   */
  app.get('/lower-limit', async (
    request: FastifyRequest<{ Querystring: SymbolQuery }>,
    reply: FastifyReply
  ) => {
    const symbol = normalizeSymbol(request.query.symbol);
    const rawResponse = await live('lower limit', () => oracle.lowerLimit(symbol));

    return reply.send({
      ok: true,
      data: { symbol, limit: extractLimit(rawResponse), rawResponse },
    });
  });

  /**
   * GET /upper-limit?symbol=
   *
   * Live resistance level call
   */
  app.get('/upper-limit', async (
    request: FastifyRequest<{ Querystring: SymbolQuery }>,
    reply: FastifyReply
  ) => {
    const symbol = normalizeSymbol(request.query.symbol);
    const rawResponse = await live('upper limit', () => oracle.upperLimit(symbol));

    return reply.send({
      ok: true,
      data: { symbol, limit: extractLimit(rawResponse), rawResponse },
    });
  });

  /**
   * GET /getSymbolData?symbol=
   *
   * Cached bundle; refreshed first when missing or older than an hour
   */
  app.get('/getSymbolData', async (
    request: FastifyRequest<{ Querystring: SymbolQuery }>,
    reply: FastifyReply
  ) => {
    const symbol = normalizeSymbol(request.query.symbol);
    return reply.send({ ok: true, data: await symbolData(request.log, symbol) });
  });

  // Kept for clients of the single-symbol API
  app.get('/getGoldData', async (request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ ok: true, data: await symbolData(request.log, DEFAULT_SYMBOL) });
  });

  /**
   * GET /getAllSymbols
   *
   * Whole cache document, stale entries included
   */
  app.get('/getAllSymbols', async (_request: FastifyRequest, reply: FastifyReply) => {
    const doc = await coordinator.listAll();
    return reply.send({ ok: true, data: doc });
  });

  /**
   * POST /addSymbol?symbol=
   *
   * Start tracking a symbol (always recomputes)
   */
  app.post('/addSymbol', async (
    request: FastifyRequest<{ Querystring: SymbolQuery }>,
    reply: FastifyReply
  ) => {
    const symbol = normalizeSymbol(request.query.symbol);
    const record = await coordinator.addSymbol(symbol);
    return reply.send({ ok: true, data: record });
  });

  /**
   * POST /query
   *
   * Free-form question, always answered live
   */
  app.post('/query', { schema: { body: queryBodySchema } }, async (
    request: FastifyRequest<{ Body: QueryBody }>,
    reply: FastifyReply
  ) => {
    const question = request.body.query.trim();
    if (!question) {
      throw new BadRequestError('Query cannot be empty', 'EMPTY_QUERY');
    }

    const symbol = normalizeSymbol(request.body.symbol);
    const answer = await live('query', () => oracle.general(symbol, question));

    return reply.send({ ok: true, data: { symbol, answer } });
  });
}
