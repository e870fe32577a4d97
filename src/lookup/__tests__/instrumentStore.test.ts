/**
 * Unit tests for the instrument lookup store and caches
 */

import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, vi } from 'vitest';
import {
  InstrumentStore,
  matchStaticInstruments,
  sanitizeInstrumentScores,
  type FetchInstruments,
} from '../instrumentStore.js';
import { MemoryInstrumentCache, isExpired, type InstrumentCacheEntry } from '../instrumentCache.js';
import { SqliteInstrumentCache } from '../sqliteCache.js';
import type { InstrumentScores } from '../../domain/types.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const T0 = new Date('2025-01-01T00:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;

function createClock(start: Date = T0) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advanceHours: (hours: number) => {
      current += hours * HOUR_MS;
    },
  };
}

function createDeferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function createMockEntry(overrides: Partial<InstrumentCacheEntry> = {}): InstrumentCacheEntry {
  return {
    disease_key: 'lupus',
    disease_name: 'Lupus',
    instruments: { sledai: 10 },
    source: 'llm',
    created_at: T0.toISOString(),
    expires_at: new Date(T0.getTime() + 24 * HOUR_MS).toISOString(),
    ...overrides,
  };
}

// ============================================================================
// Static matching
// ============================================================================

describe('matchStaticInstruments', () => {
  it('should match named instruments only', () => {
    expect(matchStaticInstruments(['ACR50 at week 24', 'HAQ-DI', 'Clinical remission'])).toEqual({
      acr50: 10,
      'haq-di': 9,
    });
  });

  it('should return an empty map when nothing matches', () => {
    expect(matchStaticInstruments(['Mystery index'])).toEqual({});
  });
});

describe('sanitizeInstrumentScores', () => {
  it('should lower-case names, clamp scores and drop invalid entries', () => {
    const raw: InstrumentScores = { ' SLEDAI ': 12, Bad: Number.NaN, '': 5, 'Low Score': 0 };
    expect(sanitizeInstrumentScores(raw)).toEqual({ sledai: 10, 'low score': 1 });
  });
});

// ============================================================================
// Lookup state machine
// ============================================================================

describe('InstrumentStore.lookup', () => {
  it('should resolve from the static table when enough labels match', async () => {
    const fetcher = vi.fn<FetchInstruments>();
    const store = new InstrumentStore({ cache: new MemoryInstrumentCache(), fetch_instruments: fetcher });

    const result = await store.lookup('Rheumatoid Arthritis', ['ACR50 at week 24', 'HAQ-DI']);

    expect(result.source).toBe('static');
    expect(result.disease_key).toBe('rheumatoid_arthritis');
    expect(result.instruments).toEqual({ acr50: 10, 'haq-di': 9 });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('should fetch, cache and then serve from cache', async () => {
    const cache = new MemoryInstrumentCache();
    const clock = createClock();
    const fetcher = vi.fn<FetchInstruments>().mockResolvedValue({ 'Mystery Index': 8 });
    const store = new InstrumentStore({ cache, fetch_instruments: fetcher, ttl_days: 1, now: clock.now });

    const first = await store.lookup('Rare Disease', ['Mystery Index response']);
    expect(first.source).toBe('fetch');
    expect(first.instruments).toEqual({ 'mystery index': 8 });

    const stored = cache.get('rare_disease');
    expect(stored?.source).toBe('llm');
    expect(stored?.disease_name).toBe('Rare Disease');
    expect(stored?.created_at).toBe('2025-01-01T00:00:00.000Z');
    expect(stored?.expires_at).toBe('2025-01-02T00:00:00.000Z');

    clock.advanceHours(12);
    const second = await store.lookup('rare disease', ['Mystery Index response']);
    expect(second.source).toBe('cache');
    expect(second.instruments).toEqual({ 'mystery index': 8 });
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('should refetch once the cache entry expires', async () => {
    const clock = createClock();
    const fetcher = vi.fn<FetchInstruments>().mockResolvedValue({ sledai: 10 });
    const store = new InstrumentStore({
      cache: new MemoryInstrumentCache(),
      fetch_instruments: fetcher,
      ttl_days: 1,
      now: clock.now,
    });

    await store.lookup('Lupus');
    clock.advanceHours(24);
    const result = await store.lookup('Lupus');

    expect(result.source).toBe('fetch');
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should merge cached instruments over static matches', async () => {
    const cache = new MemoryInstrumentCache();
    cache.set(
      createMockEntry({
        disease_key: 'rheumatoid_arthritis',
        instruments: { acr50: 8, 'custom index': 6 },
      })
    );
    const store = new InstrumentStore({ cache, now: () => T0 });

    const result = await store.lookup('Rheumatoid arthritis', ['ACR50 at week 24']);

    expect(result.source).toBe('cache');
    expect(result.static_matches).toEqual({ acr50: 10 });
    expect(result.instruments).toEqual({ acr50: 8, 'custom index': 6 });
  });

  it('should fall back to static matches without a fetcher', async () => {
    const store = new InstrumentStore({ cache: new MemoryInstrumentCache() });

    const result = await store.lookup('Rare Disease', ['PASI75 at week 16']);

    expect(result.source).toBe('fallback');
    expect(result.instruments).toEqual({ pasi75: 10 });
  });

  it('should fall back for a blank disease name without fetching', async () => {
    const fetcher = vi.fn<FetchInstruments>();
    const store = new InstrumentStore({ cache: new MemoryInstrumentCache(), fetch_instruments: fetcher });

    const result = await store.lookup('  ', []);

    expect(result.source).toBe('fallback');
    expect(result.disease_key).toBe('');
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('should cache a failed fetch as a short-lived empty entry', async () => {
    const cache = new MemoryInstrumentCache();
    const clock = createClock();
    const fetcher = vi
      .fn<FetchInstruments>()
      .mockRejectedValueOnce(new Error('upstream unavailable'))
      .mockResolvedValueOnce({ sledai: 10 });
    const store = new InstrumentStore({
      cache,
      fetch_instruments: fetcher,
      failure_ttl_days: 1,
      now: clock.now,
    });

    const failed = await store.lookup('Lupus');
    expect(failed.source).toBe('fallback');
    expect(failed.instruments).toEqual({});

    const stored = cache.get('lupus');
    expect(stored?.source).toBe('failed');
    expect(stored?.instruments).toEqual({});
    expect(stored?.expires_at).toBe('2025-01-02T00:00:00.000Z');

    clock.advanceHours(6);
    const suppressed = await store.lookup('Lupus');
    expect(suppressed.source).toBe('fallback');
    expect(fetcher).toHaveBeenCalledTimes(1);

    clock.advanceHours(18);
    const retried = await store.lookup('Lupus');
    expect(retried.source).toBe('fetch');
    expect(retried.instruments).toEqual({ sledai: 10 });
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should keep static matches when the cache holds a failed entry', async () => {
    const cache = new MemoryInstrumentCache();
    cache.set(createMockEntry({ source: 'failed', instruments: {} }));
    const fetcher = vi.fn<FetchInstruments>();
    const store = new InstrumentStore({ cache, fetch_instruments: fetcher, now: () => T0 });

    const result = await store.lookup('Lupus', ['SLEDAI-2K reduction']);

    expect(result.source).toBe('fallback');
    expect(result.instruments).toEqual({ 'sledai-2k': 10 });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('should treat a cache read error as a miss', async () => {
    const cache = new MemoryInstrumentCache();
    vi.spyOn(cache, 'get').mockImplementation(() => {
      throw new Error('disk I/O error');
    });
    const store = new InstrumentStore({ cache });

    const result = await store.lookup('Lupus', ['PASI75 at week 16']);

    expect(result.source).toBe('fallback');
    expect(result.instruments).toEqual({ pasi75: 10 });
  });

  it('should share one in-flight fetch between concurrent lookups', async () => {
    const deferred = createDeferred<InstrumentScores>();
    const fetcher = vi.fn<FetchInstruments>().mockReturnValue(deferred.promise);
    const store = new InstrumentStore({ cache: new MemoryInstrumentCache(), fetch_instruments: fetcher });

    const first = store.lookup('Lupus');
    const second = store.lookup('LUPUS');
    expect(store.pendingFetches()).toBe(1);

    deferred.resolve({ sledai: 10 });
    const results = await Promise.all([first, second]);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(results.map((r) => r.source)).toEqual(['fetch', 'fetch']);
    expect(store.pendingFetches()).toBe(0);
  });
});

// ============================================================================
// Caches
// ============================================================================

describe('isExpired', () => {
  it('should treat the expiry instant itself as expired', () => {
    const entry = createMockEntry();
    expect(isExpired(entry.expires_at, new Date(T0.getTime() + 24 * HOUR_MS))).toBe(true);
    expect(isExpired(entry.expires_at, new Date(T0.getTime() + 23 * HOUR_MS))).toBe(false);
  });
});

describe('MemoryInstrumentCache', () => {
  it('should report stats by source and expiry', () => {
    const cache = new MemoryInstrumentCache();
    cache.set(createMockEntry());
    cache.set(
      createMockEntry({
        disease_key: 'psoriasis',
        source: 'manual',
        expires_at: '2024-12-31T00:00:00.000Z',
      })
    );

    expect(cache.stats(T0)).toEqual({
      total_entries: 2,
      expired_entries: 1,
      by_source: { llm: 1, manual: 1 },
    });
  });
});

describe('SqliteInstrumentCache', () => {
  it('should round-trip entries and replace on the same key', () => {
    const cache = new SqliteInstrumentCache(':memory:');
    try {
      cache.set(createMockEntry());
      cache.set(createMockEntry({ instruments: { sledai: 10, bilag: 9 } }));

      expect(cache.get('lupus')).toEqual(createMockEntry({ instruments: { sledai: 10, bilag: 9 } }));
      expect(cache.get('unknown')).toBeNull();
    } finally {
      cache.close();
    }
  });

  it('should count expired entries and clear', () => {
    const cache = new SqliteInstrumentCache(':memory:');
    try {
      cache.set(createMockEntry());
      cache.set(
        createMockEntry({
          disease_key: 'psoriasis',
          source: 'manual',
          expires_at: '2024-12-31T00:00:00.000Z',
        })
      );

      expect(cache.stats(T0)).toEqual({
        total_entries: 2,
        expired_entries: 1,
        by_source: { llm: 1, manual: 1 },
      });

      cache.clear();
      expect(cache.stats(T0).total_entries).toBe(0);
    } finally {
      cache.close();
    }
  });

  it('should refetch past a corrupt row instead of failing the lookup', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'instrument-cache-'));
    const db_path = join(dir, 'cache.db');
    const cache = new SqliteInstrumentCache(db_path);
    const raw = new Database(db_path);
    try {
      raw
        .prepare(
          `INSERT INTO instrument_cache
           (disease_key, disease_name, instruments_json, source, created_at, expires_at)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run('lupus', 'Lupus', '{not json', 'llm', T0.toISOString(), '2099-01-01T00:00:00.000Z');
      expect(() => cache.get('lupus')).toThrow();

      const fetcher = vi.fn<FetchInstruments>().mockResolvedValue({ sledai: 10 });
      const store = new InstrumentStore({ cache, fetch_instruments: fetcher, now: () => T0 });

      const result = await store.lookup('Lupus');

      expect(result.source).toBe('fetch');
      expect(result.instruments).toEqual({ sledai: 10 });
      expect(cache.get('lupus')?.instruments).toEqual({ sledai: 10 });
    } finally {
      raw.close();
      cache.close();
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should back an instrument store', async () => {
    const cache = new SqliteInstrumentCache(':memory:');
    try {
      const fetcher = vi.fn<FetchInstruments>().mockResolvedValue({ easi75: 10 });
      const store = new InstrumentStore({ cache, fetch_instruments: fetcher, now: () => T0 });

      await store.lookup('Atopic dermatitis');
      const cached = await store.lookup('Atopic dermatitis');

      expect(cached.source).toBe('cache');
      expect(cached.instruments).toEqual({ easi75: 10 });
      expect(fetcher).toHaveBeenCalledTimes(1);
    } finally {
      cache.close();
    }
  });
});
