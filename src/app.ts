import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env as defaultEnv, type Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { registerAnalysisRoutes, type AnalysisRouteDeps } from './modules/analysis/analysis.routes.js';
import type { RefresherStatus } from './modules/analysis/analysis.refresher.js';

const SERVICE_NAME = 'Market Levels Oracle';
const SERVICE_VERSION = '1.0.0';

export interface AppDeps extends AnalysisRouteDeps {
  refresher?: { getStatus(): RefresherStatus };
  env?: Readonly<Env>;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const env = deps.env ?? defaultEnv;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(',').map((o) => o.trim()),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/', async () => ({
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    description: 'Market trend and strong support/resistance levels per trading symbol',
    endpoints: {
      'GET /trend?symbol=': 'Current trend for this week (live)',
      'GET /lower-limit?symbol=': 'Strong lower limit / support for this week (live)',
      'GET /upper-limit?symbol=': 'Strong upper limit / resistance for this week (live)',
      'GET /getSymbolData?symbol=': 'Trend and limits from the hourly cache',
      'GET /getAllSymbols': 'Every tracked symbol in the cache',
      'POST /addSymbol?symbol=': 'Start tracking a symbol',
      'POST /query': 'Ask any market question (live)',
    },
  }));

  app.get('/health', async () => ({
    ok: true,
    status: 'healthy',
    service: SERVICE_NAME,
    timestamp: new Date().toISOString(),
    refresher: deps.refresher?.getStatus() ?? null,
  }));

  app.register(async (fastify) => {
    await registerAnalysisRoutes(fastify, deps);
  });

  return app;
}
