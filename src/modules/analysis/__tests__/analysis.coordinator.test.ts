import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import { ManualClock } from '../../../common/clock.js';
import { CacheCoordinator } from '../analysis.coordinator.js';
import { SymbolCacheStore } from '../analysis.store.js';
import { FakeOracle, HOUR, MINUTE, T0, makeRecord, makeTempDir, mockLogger, removeDir } from './fakes.js';

describe('CacheCoordinator', () => {
  let dir: string;
  let clock: ManualClock;
  let oracle: FakeOracle;
  let store: SymbolCacheStore;
  let logger: ReturnType<typeof mockLogger>;
  let coordinator: CacheCoordinator;

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = new ManualClock(T0);
    oracle = new FakeOracle();
    logger = mockLogger();
    store = new SymbolCacheStore({ filePath: path.join(dir, 'cache.json'), clock, logger: mockLogger() });
    coordinator = new CacheCoordinator({ store, oracle, clock, logger });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('getOrRefresh', () => {
    it('should call the oracle once per kind on an empty store', async () => {
      const record = await coordinator.getOrRefresh('eurusd');

      expect(oracle.calls).toEqual([
        { kind: 'trend', symbol: 'EURUSD' },
        { kind: 'lowerLimit', symbol: 'EURUSD' },
        { kind: 'upperLimit', symbol: 'EURUSD' },
      ]);
      expect(record).toEqual({
        symbol: 'EURUSD',
        timestamp: '2026-03-02T10:00:00.000Z',
        trend: 'bullish',
        lowerLimit: '$1900.50',
        upperLimit: '$2100.00',
        rawResponses: {
          trend: 'TREND: Bullish',
          lowerLimit: 'LIMIT: $1900.50',
          upperLimit: 'LIMIT: $2100.00',
        },
      });
      expect(await store.getSymbol('EURUSD')).toEqual(record);
    });

    it('should serve a valid record without calling the oracle', async () => {
      const cached = makeRecord('GOLDUSD', T0 - 30 * MINUTE);
      await store.upsertSymbol('GOLDUSD', cached);

      const record = await coordinator.getOrRefresh('goldusd');

      expect(record).toEqual(cached);
      expect(oracle.calls).toHaveLength(0);
      expect(logger.info).toHaveBeenCalledWith({ symbol: 'GOLDUSD', timestamp: cached.timestamp }, 'Cache hit');
    });

    it('should still serve a record at 59m59s', async () => {
      await store.upsertSymbol('GOLDUSD', makeRecord('GOLDUSD', T0));
      clock.advance(59 * MINUTE + 59 * 1000);

      await coordinator.getOrRefresh('GOLDUSD');

      expect(oracle.calls).toHaveLength(0);
    });

    it('should refresh a record that is two hours old', async () => {
      await store.upsertSymbol('GOLDUSD', makeRecord('GOLDUSD', T0 - 2 * HOUR));
      const callTime = clock.now();

      const record = await coordinator.getOrRefresh('GOLDUSD');

      expect(oracle.callsFor('GOLDUSD')).toEqual(['trend', 'lowerLimit', 'upperLimit']);
      expect(Date.parse(record.timestamp)).toBeGreaterThanOrEqual(callTime);
      expect(record.trend).toBe('bullish');
      expect((await store.getSymbol('GOLDUSD'))?.timestamp).toBe(record.timestamp);
    });

    it('should default a blank symbol to GOLDUSD', async () => {
      const record = await coordinator.getOrRefresh('  ');

      expect(record.symbol).toBe('GOLDUSD');
    });
  });

  describe('refresh', () => {
    it('should degrade only the field whose oracle call failed', async () => {
      oracle.failures.lowerLimit = new Error('search backend down');

      const record = await coordinator.refresh('GOLDUSD');

      expect(record.trend).toBe('bullish');
      expect(record.upperLimit).toBe('$2100.00');
      expect(record.lowerLimit).toBe('N/A');
      expect(record.rawResponses.lowerLimit).toBe('Error: search backend down');
      expect(oracle.calls).toHaveLength(3);
      expect(await store.getSymbol('GOLDUSD')).toEqual(record);
    });

    it('should still produce a record when every call fails', async () => {
      const down = new Error('model offline');
      oracle.failures = { trend: down, lowerLimit: down, upperLimit: down };

      const record = await coordinator.refresh('BTCUSD');

      expect(record).toMatchObject({
        symbol: 'BTCUSD',
        trend: 'unknown',
        lowerLimit: 'N/A',
        upperLimit: 'N/A',
        rawResponses: {
          trend: 'Error: model offline',
          lowerLimit: 'Error: model offline',
          upperLimit: 'Error: model offline',
        },
      });
      expect(logger.error).toHaveBeenCalledTimes(3);
    });

    it('should store sentinels when answers have no markers', async () => {
      oracle.answers.trend = 'Hard to say this week.';
      oracle.answers.upperLimit = 'Resistance is somewhere above 2400';

      const record = await coordinator.refresh('GOLDUSD');

      expect(record.trend).toBe('unknown');
      expect(record.upperLimit).toBe('N/A');
      expect(record.rawResponses.trend).toBe('Hard to say this week.');
    });

    it('should return the record when the store cannot persist it', async () => {
      vi.spyOn(store, 'upsertSymbol').mockRejectedValue(new Error('disk full'));

      const record = await coordinator.refresh('GOLDUSD');

      expect(record.trend).toBe('bullish');
      expect(logger.error).toHaveBeenCalledWith(
        { symbol: 'GOLDUSD', error: 'disk full' },
        'Failed to persist refreshed record'
      );
    });
  });

  describe('addSymbol', () => {
    it('should refresh even when a valid record exists', async () => {
      await store.upsertSymbol('XAGUSD', makeRecord('XAGUSD', T0));

      const record = await coordinator.addSymbol('xagusd');

      expect(oracle.callsFor('XAGUSD')).toEqual(['trend', 'lowerLimit', 'upperLimit']);
      expect(record.trend).toBe('bullish');
    });
  });

  describe('listAll', () => {
    it('should return the whole document including stale records', async () => {
      const stale = makeRecord('EURUSD', T0 - 3 * HOUR);
      const fresh = makeRecord('GOLDUSD', T0);
      await store.upsertSymbol('EURUSD', stale);
      await store.upsertSymbol('GOLDUSD', fresh);

      const doc = await coordinator.listAll();

      expect(doc).toEqual({
        lastUpdated: '2026-03-02T10:00:00.000Z',
        symbols: { EURUSD: stale, GOLDUSD: fresh },
      });
    });
  });
});
