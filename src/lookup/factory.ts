/**
 * Wiring for the instrument store used by the CLI and API
 */

import { CACHE_CONFIG } from '../config/defaults.js';
import { LLMClient } from '../llm/client.js';
import { createLlmInstrumentFetcher } from '../llm/instrumentFetcher.js';
import { createLogger } from '../utils/log.js';
import { MemoryInstrumentCache, type InstrumentCache } from './instrumentCache.js';
import { InstrumentStore, type FetchInstruments } from './instrumentStore.js';
import { SqliteInstrumentCache } from './sqliteCache.js';

const logger = createLogger('store-factory');

export interface StoreFactoryOptions {
  /** SQLite file path; omit for an in-memory cache */
  cache_path?: string | null;
  /** Fetch unknown diseases from the LLM when OPENAI_API_KEY is set */
  use_llm?: boolean;
  ttl_days?: number;
}

export function openInstrumentCache(cache_path?: string | null): InstrumentCache {
  return cache_path ? new SqliteInstrumentCache(cache_path) : new MemoryInstrumentCache();
}

export function createInstrumentStore(options: StoreFactoryOptions = {}): {
  store: InstrumentStore;
  cache: InstrumentCache;
} {
  const cache = openInstrumentCache(options.cache_path);

  let fetch_instruments: FetchInstruments | null = null;
  if (options.use_llm) {
    if (process.env.OPENAI_API_KEY) {
      fetch_instruments = createLlmInstrumentFetcher(new LLMClient());
    } else {
      logger.warn('OPENAI_API_KEY not set, instrument lookup limited to static table and cache');
    }
  }

  const store = new InstrumentStore({
    cache,
    fetch_instruments,
    ttl_days: options.ttl_days ?? CACHE_CONFIG.TTL_DAYS,
  });
  return { store, cache };
}
