/**
 * ANALYSIS — Background Refresher
 * ===============================
 *
 * Keeps tracked symbols warm independently of request traffic.
 *
 * Warm-up (once, on start):
 *   - no tracked symbols → refresh GOLDUSD
 *   - otherwise          → refresh every symbol that is not valid
 *
 * Steady state (every intervalMs):
 *   - reload the document; tracked symbols default to {GOLDUSD}
 *   - any symbol stale → refresh ALL tracked symbols
 *   - none stale       → skip the cycle
 *
 * A failed sweep is logged, the loop waits cooldownMs and carries on.
 * Only stop() ends the loop. Oracle calls cannot be cancelled, so stop()
 * waits at most stopTimeoutMs for an in-flight pass before returning.
 */

import { systemClock, type Clock } from '../../common/clock.js';
import { createLogger, errorMessage, type Logger } from '../../common/logger.js';
import type { CacheCoordinator } from './analysis.coordinator.js';
import { isValid } from './analysis.staleness.js';
import type { SymbolCacheStore } from './analysis.store.js';
import { CACHE_TTL_MS, DEFAULT_SYMBOL } from './analysis.types.js';

export interface BackgroundRefresherConfig {
  store: Pick<SymbolCacheStore, 'load'>;
  coordinator: Pick<CacheCoordinator, 'refresh'>;
  intervalMs?: number;   // Sweep interval
  cooldownMs?: number;   // Pause after a failed sweep
  stopTimeoutMs?: number; // Longest stop() waits for an in-flight pass
  clock?: Clock;
  logger?: Logger;
}

export interface SweepResult {
  checked: string[];
  stale: string[];
  refreshed: string[];
  skipped: boolean;
}

export interface RefresherStatus {
  running: boolean;
  intervalMs: number;
  cooldownMs: number;
  lastWarmUpAt: string | null;
  lastSweepAt: string | null;
  lastSweep: SweepResult | null;
  lastError: string | null;
}

const DEFAULT_COOLDOWN_MS = 60 * 1000; // 1 minute
const DEFAULT_STOP_TIMEOUT_MS = 10 * 1000;

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const done = () => {
      if (timer) clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export class BackgroundRefresher {
  private readonly store: Pick<SymbolCacheStore, 'load'>;
  private readonly coordinator: Pick<CacheCoordinator, 'refresh'>;
  private readonly intervalMs: number;
  private readonly cooldownMs: number;
  private readonly stopTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  private lastWarmUpAt: string | null = null;
  private lastSweepAt: string | null = null;
  private lastSweep: SweepResult | null = null;
  private lastError: string | null = null;

  constructor(config: BackgroundRefresherConfig) {
    this.store = config.store;
    this.coordinator = config.coordinator;
    this.intervalMs = config.intervalMs ?? CACHE_TTL_MS;
    this.cooldownMs = config.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.stopTimeoutMs = config.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? createLogger('BackgroundRefresher');
  }

  /**
   * Run warm-up, then the periodic loop, in the background.
   */
  start(): void {
    if (this.controller) {
      this.logger.info({}, 'Already running');
      return;
    }

    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
    this.logger.info({ intervalMin: this.intervalMs / 1000 / 60 }, 'Started');
  }

  /**
   * Cancel pending waits and give an in-flight warm-up or sweep up to
   * stopTimeoutMs to finish.
   */
  async stop(): Promise<void> {
    if (!this.controller) return;

    this.controller.abort();
    const loop = this.loop;
    this.controller = null;
    this.loop = null;

    if (loop && !(await this.settlesWithin(loop, this.stopTimeoutMs))) {
      this.logger.warn({ stopTimeoutMs: this.stopTimeoutMs }, 'Refresh still in flight, stopping without it');
    }
    this.logger.info({}, 'Stopped');
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  getStatus(): RefresherStatus {
    return {
      running: this.isRunning(),
      intervalMs: this.intervalMs,
      cooldownMs: this.cooldownMs,
      lastWarmUpAt: this.lastWarmUpAt,
      lastSweepAt: this.lastSweepAt,
      lastSweep: this.lastSweep,
      lastError: this.lastError,
    };
  }

  /**
   * Startup pass. Returns the symbols that were refreshed.
   */
  async warmUp(): Promise<string[]> {
    const doc = await this.store.load();
    const tracked = Object.keys(doc.symbols);
    const refreshed: string[] = [];

    if (tracked.length === 0) {
      this.logger.info({ symbol: DEFAULT_SYMBOL }, 'No tracked symbols, performing initial refresh');
      await this.coordinator.refresh(DEFAULT_SYMBOL);
      refreshed.push(DEFAULT_SYMBOL);
    } else {
      const now = this.clock.now();
      for (const symbol of tracked) {
        if (isValid(doc.symbols[symbol], now)) continue;
        this.logger.info({ symbol }, 'Cache expired at startup, refreshing');
        await this.coordinator.refresh(symbol);
        refreshed.push(symbol);
      }
    }

    this.lastWarmUpAt = this.clock.toISOString(this.clock.now());
    return refreshed;
  }

  /**
   * One steady-state tick: full sweep if any tracked symbol is stale.
   */
  async sweep(): Promise<SweepResult> {
    const doc = await this.store.load();
    const tracked = Object.keys(doc.symbols);
    const checked = tracked.length > 0 ? tracked : [DEFAULT_SYMBOL];

    const now = this.clock.now();
    const stale = checked.filter((symbol) => !isValid(doc.symbols[symbol], now));

    const result: SweepResult = { checked, stale, refreshed: [], skipped: stale.length === 0 };

    if (result.skipped) {
      this.logger.info({ symbols: checked.length }, 'All symbols still valid, skipping sweep');
    } else {
      this.logger.info({ stale, symbols: checked }, 'Stale symbols found, refreshing all');
      for (const symbol of checked) {
        await this.coordinator.refresh(symbol);
        result.refreshed.push(symbol);
      }
    }

    this.lastSweepAt = this.clock.toISOString(this.clock.now());
    this.lastSweep = result;
    return result;
  }

  private settlesWithin(task: Promise<void>, ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      task.then(
        () => {
          clearTimeout(timer);
          resolve(true);
        },
        (err: unknown) => {
          clearTimeout(timer);
          this.logger.error({ error: errorMessage(err) }, 'Refresher loop failed');
          resolve(true);
        }
      );
    });
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      await this.warmUp();
    } catch (err) {
      this.lastError = errorMessage(err);
      this.logger.error({ error: this.lastError }, 'Warm-up failed');
    }

    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;

      try {
        await this.sweep();
      } catch (err) {
        this.lastError = errorMessage(err);
        this.logger.error({ error: this.lastError, cooldownMs: this.cooldownMs }, 'Sweep failed, cooling down');
        await sleep(this.cooldownMs, signal);
      }
    }
  }
}
