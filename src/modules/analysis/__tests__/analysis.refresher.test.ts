import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import path from 'path';
import { ManualClock } from '../../../common/clock.js';
import { CacheCoordinator } from '../analysis.coordinator.js';
import { BackgroundRefresher } from '../analysis.refresher.js';
import { SymbolCacheStore } from '../analysis.store.js';
import type { AnalysisRecord, CacheDocument } from '../analysis.types.js';
import { FakeOracle, HOUR, MINUTE, T0, makeRecord, makeTempDir, mockLogger, removeDir } from './fakes.js';

describe('BackgroundRefresher', () => {
  describe('with a file-backed store', () => {
    let dir: string;
    let clock: ManualClock;
    let oracle: FakeOracle;
    let store: SymbolCacheStore;
    let refresher: BackgroundRefresher;

    beforeEach(async () => {
      dir = await makeTempDir();
      clock = new ManualClock(T0);
      oracle = new FakeOracle();
      store = new SymbolCacheStore({ filePath: path.join(dir, 'cache.json'), clock, logger: mockLogger() });
      const coordinator = new CacheCoordinator({ store, oracle, clock, logger: mockLogger() });
      refresher = new BackgroundRefresher({ store, coordinator, clock, logger: mockLogger() });
    });

    afterEach(async () => {
      await refresher.stop();
      await removeDir(dir);
    });

    describe('warmUp', () => {
      it('should refresh GOLDUSD when nothing is tracked', async () => {
        const refreshed = await refresher.warmUp();

        expect(refreshed).toEqual(['GOLDUSD']);
        expect(oracle.callsFor('GOLDUSD')).toEqual(['trend', 'lowerLimit', 'upperLimit']);
        expect(Object.keys((await store.load()).symbols)).toEqual(['GOLDUSD']);
      });

      it('should refresh only the symbols that are not valid', async () => {
        await store.upsertSymbol('AAA', makeRecord('AAA', T0 - 10 * MINUTE));
        await store.upsertSymbol('BBB', makeRecord('BBB', T0 - 2 * HOUR));

        const refreshed = await refresher.warmUp();

        expect(refreshed).toEqual(['BBB']);
        expect(oracle.callsFor('AAA')).toEqual([]);
        expect(oracle.callsFor('BBB')).toEqual(['trend', 'lowerLimit', 'upperLimit']);
      });
    });

    describe('sweep', () => {
      it('should refresh every tracked symbol when any one is stale', async () => {
        await store.upsertSymbol('AAA', makeRecord('AAA', T0 - 10 * MINUTE));
        await store.upsertSymbol('BBB', makeRecord('BBB', T0 - 2 * HOUR));

        const result = await refresher.sweep();

        expect(result).toEqual({
          checked: ['AAA', 'BBB'],
          stale: ['BBB'],
          refreshed: ['AAA', 'BBB'],
          skipped: false,
        });
        expect(oracle.callsFor('AAA')).toEqual(['trend', 'lowerLimit', 'upperLimit']);
        expect(oracle.callsFor('BBB')).toEqual(['trend', 'lowerLimit', 'upperLimit']);
      });

      it('should skip the cycle when everything is valid', async () => {
        await store.upsertSymbol('AAA', makeRecord('AAA', T0 - 10 * MINUTE));
        await store.upsertSymbol('BBB', makeRecord('BBB', T0 - 20 * MINUTE));

        const result = await refresher.sweep();

        expect(result.skipped).toBe(true);
        expect(result.refreshed).toEqual([]);
        expect(oracle.calls).toHaveLength(0);
      });

      it('should fall back to GOLDUSD when nothing is tracked', async () => {
        const result = await refresher.sweep();

        expect(result).toEqual({
          checked: ['GOLDUSD'],
          stale: ['GOLDUSD'],
          refreshed: ['GOLDUSD'],
          skipped: false,
        });
      });

      it('should record the last sweep in its status', async () => {
        await refresher.sweep();

        const status = refresher.getStatus();
        expect(status.running).toBe(false);
        expect(status.lastSweepAt).toBe('2026-03-02T10:00:00.000Z');
        expect(status.lastSweep?.refreshed).toEqual(['GOLDUSD']);
      });
    });
  });

  describe('loop', () => {
    const INTERVAL = HOUR;
    const COOLDOWN = MINUTE;
    const STOP_TIMEOUT = 10 * 1000;

    let clock: ManualClock;
    let load: Mock<() => Promise<CacheDocument>>;
    let refresh: Mock<(symbol: string) => Promise<AnalysisRecord>>;
    let logger: ReturnType<typeof mockLogger>;
    let refresher: BackgroundRefresher;

    const docWith = (record: AnalysisRecord): CacheDocument => ({
      lastUpdated: record.timestamp,
      symbols: { [record.symbol]: record },
    });

    beforeEach(() => {
      vi.useFakeTimers();
      clock = new ManualClock(T0);
      load = vi.fn<() => Promise<CacheDocument>>();
      refresh = vi.fn(async (symbol: string) => makeRecord(symbol, clock.now()));
      logger = mockLogger();
      refresher = new BackgroundRefresher({
        store: { load },
        coordinator: { refresh },
        intervalMs: INTERVAL,
        cooldownMs: COOLDOWN,
        stopTimeoutMs: STOP_TIMEOUT,
        clock,
        logger,
      });
    });

    afterEach(async () => {
      await refresher.stop();
      vi.useRealTimers();
    });

    it('should warm up on start and sweep once per interval', async () => {
      load.mockResolvedValue(docWith(makeRecord('GOLDUSD', T0 - 2 * HOUR)));

      refresher.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(refresher.isRunning()).toBe(true);
      expect(load).toHaveBeenCalledTimes(1);
      expect(refresh).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(INTERVAL - 1);
      expect(load).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(load).toHaveBeenCalledTimes(2);
      expect(refresh).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(INTERVAL);
      expect(load).toHaveBeenCalledTimes(3);
    });

    it('should cool down after a failed sweep and keep going', async () => {
      load
        .mockResolvedValueOnce(docWith(makeRecord('GOLDUSD', T0)))
        .mockRejectedValueOnce(new Error('disk gone'))
        .mockResolvedValue(docWith(makeRecord('GOLDUSD', T0)));

      refresher.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(refresh).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(INTERVAL);
      expect(load).toHaveBeenCalledTimes(2);
      expect(refresher.getStatus().lastError).toBe('disk gone');
      expect(logger.error).toHaveBeenCalledWith(
        { error: 'disk gone', cooldownMs: COOLDOWN },
        'Sweep failed, cooling down'
      );

      await vi.advanceTimersByTimeAsync(COOLDOWN + INTERVAL - 1);
      expect(load).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1);
      expect(load).toHaveBeenCalledTimes(3);
      expect(refresher.isRunning()).toBe(true);
    });

    it('should keep running when warm-up fails', async () => {
      load
        .mockRejectedValueOnce(new Error('cold disk'))
        .mockResolvedValue(docWith(makeRecord('GOLDUSD', T0)));

      refresher.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(refresher.getStatus().lastError).toBe('cold disk');

      await vi.advanceTimersByTimeAsync(INTERVAL);
      expect(load).toHaveBeenCalledTimes(2);
    });

    it('should stop waiting as soon as it is stopped', async () => {
      load.mockResolvedValue(docWith(makeRecord('GOLDUSD', T0)));

      refresher.start();
      await vi.advanceTimersByTimeAsync(0);
      await refresher.stop();

      expect(refresher.isRunning()).toBe(false);
      expect(logger.warn).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(3 * INTERVAL);
      expect(load).toHaveBeenCalledTimes(1);
    });

    it('should not wait past the stop timeout for an in-flight refresh', async () => {
      load.mockResolvedValue(docWith(makeRecord('GOLDUSD', T0 - 2 * HOUR)));
      refresh.mockImplementationOnce(() => new Promise<AnalysisRecord>(() => undefined));

      refresher.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(refresh).toHaveBeenCalledTimes(1);

      let stopped = false;
      const stopping = refresher.stop().then(() => {
        stopped = true;
      });

      await vi.advanceTimersByTimeAsync(STOP_TIMEOUT - 1);
      expect(stopped).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await stopping;

      expect(stopped).toBe(true);
      expect(refresher.isRunning()).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        { stopTimeoutMs: STOP_TIMEOUT },
        'Refresh still in flight, stopping without it'
      );
    });

    it('should ignore a second start', async () => {
      load.mockResolvedValue(docWith(makeRecord('GOLDUSD', T0)));

      refresher.start();
      refresher.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(load).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenCalledWith({}, 'Already running');
    });
  });
});
