/**
 * MARKET LEVELS ORACLE — Entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';
import { createMarketOracle } from './modules/oracle/index.js';
import {
  BackgroundRefresher,
  CacheCoordinator,
  SymbolCacheStore,
} from './modules/analysis/index.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  Market Levels Oracle');
  console.log('═══════════════════════════════════════════════════════════════');

  // One store (and one write lock) shared by requests and the refresher
  const store = new SymbolCacheStore({ filePath: env.CACHE_FILE });
  const oracle = createMarketOracle(env);
  const coordinator = new CacheCoordinator({ store, oracle });
  const refresher = new BackgroundRefresher({
    store,
    coordinator,
    intervalMs: env.REFRESH_INTERVAL_MS,
    cooldownMs: env.REFRESH_COOLDOWN_MS,
    stopTimeoutMs: env.REFRESH_STOP_TIMEOUT_MS,
  });

  const app = buildApp({ coordinator, oracle, refresher, env });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    await refresher.stop();
    await app.close();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  if (env.REFRESHER_ENABLED) {
    console.log('[Server] Starting background refresher...');
    refresher.start();
  } else {
    console.log('[Server] Background refresher disabled (REFRESHER_ENABLED=false)');
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Server] ✅ Listening on http://${env.HOST}:${env.PORT} (cache: ${store.filePath})`);
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
