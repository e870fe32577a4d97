/**
 * Instrument lookup store
 *
 * Resolves a disease to a map of validated outcome instruments and their
 * quality scores. Resolution is a small state machine:
 *
 *   static   -> the static instrument table matched >= 2 endpoint labels
 *   cache    -> an unexpired cache entry for the normalized disease key
 *   fetch    -> the injected fetcher answered; the answer is cached
 *   fallback -> no fetcher, or the fetch failed; static matches only
 *
 * At most one fetch per disease key is in flight at any time. A failed fetch
 * is cached as an empty entry for a shorter TTL so the fetcher is not retried
 * on every lookup. An unreadable cache entry counts as a miss.
 */

import { CACHE_CONFIG } from '../config/defaults.js';
import { normalizeDiseaseKey } from '../domain/ids.js';
import type { InstrumentScores } from '../domain/types.js';
import { matchInstrument } from '../taxonomy/classifier.js';
import { INSTRUMENTS } from '../taxonomy/tables.js';
import { clampScore } from '../utils/math.js';
import { createLogger } from '../utils/log.js';
import {
  isExpired,
  type InstrumentCache,
  type InstrumentCacheEntry,
  type InstrumentSource,
} from './instrumentCache.js';

const logger = createLogger('instrument-store');

const DAY_MS = 24 * 60 * 60 * 1000;

export type LookupState = 'static' | 'cache' | 'fetch' | 'fallback';

export type FetchInstruments = (disease: string) => Promise<InstrumentScores>;

export interface InstrumentLookupResult {
  disease_key: string;
  source: LookupState;
  instruments: InstrumentScores;
  static_matches: InstrumentScores;
}

export interface InstrumentStoreOptions {
  cache: InstrumentCache;
  fetch_instruments?: FetchInstruments | null;
  ttl_days?: number;
  /** How long a failed fetch suppresses retries for the same disease */
  failure_ttl_days?: number;
  /** Static matches needed to skip the cache and fetcher */
  min_static_matches?: number;
  now?: () => Date;
}

/**
 * Named (non-generic) instruments from the static table that appear in the
 * labels. Each label contributes at most its first match.
 */
export function matchStaticInstruments(endpoint_labels: string[]): InstrumentScores {
  const named = INSTRUMENTS.filter((entry) => !entry.generic);
  const matches: InstrumentScores = {};
  for (const label of endpoint_labels) {
    const entry = matchInstrument(label, named);
    if (entry) matches[entry.instrument] = entry.score;
  }
  return matches;
}

/**
 * Lower-case names, clamp scores to [1,10], drop non-finite scores and blank names.
 */
export function sanitizeInstrumentScores(raw: InstrumentScores): InstrumentScores {
  const clean: InstrumentScores = {};
  for (const [name, score] of Object.entries(raw)) {
    const key = name.trim().toLowerCase();
    if (!key || !Number.isFinite(score)) continue;
    clean[key] = clampScore(score);
  }
  return clean;
}

export class InstrumentStore {
  private cache: InstrumentCache;
  private fetch_instruments: FetchInstruments | null;
  private ttl_ms: number;
  private failure_ttl_ms: number;
  private min_static_matches: number;
  private now: () => Date;
  private inFlight = new Map<string, Promise<InstrumentScores | null>>();

  constructor(options: InstrumentStoreOptions) {
    this.cache = options.cache;
    this.fetch_instruments = options.fetch_instruments ?? null;
    this.ttl_ms = (options.ttl_days ?? CACHE_CONFIG.TTL_DAYS) * DAY_MS;
    this.failure_ttl_ms = (options.failure_ttl_days ?? CACHE_CONFIG.FAILURE_TTL_DAYS) * DAY_MS;
    this.min_static_matches = options.min_static_matches ?? 2;
    this.now = options.now ?? (() => new Date());
  }

  async lookup(disease: string, endpoint_labels: string[] = []): Promise<InstrumentLookupResult> {
    const disease_key = normalizeDiseaseKey(disease);
    const static_matches = matchStaticInstruments(endpoint_labels);

    const resolve = (source: LookupState, dynamic: InstrumentScores = {}): InstrumentLookupResult => {
      logger.debug({ disease_key, source }, 'Instruments resolved');
      return {
        disease_key,
        source,
        instruments: { ...static_matches, ...dynamic },
        static_matches,
      };
    };

    if (Object.keys(static_matches).length >= this.min_static_matches) {
      return resolve('static');
    }

    if (!disease_key) {
      return resolve('fallback');
    }

    const cached = this.readCache(disease_key);
    if (cached && !isExpired(cached.expires_at, this.now())) {
      return cached.source === 'failed' ? resolve('fallback') : resolve('cache', cached.instruments);
    }

    if (!this.fetch_instruments) {
      return resolve('fallback');
    }

    const fetched = await this.fetchOnce(disease_key, disease, this.fetch_instruments);
    return fetched ? resolve('fetch', fetched) : resolve('fallback');
  }

  /** Number of fetches currently in flight */
  pendingFetches(): number {
    return this.inFlight.size;
  }

  private fetchOnce(
    disease_key: string,
    disease: string,
    fetch_instruments: FetchInstruments
  ): Promise<InstrumentScores | null> {
    const existing = this.inFlight.get(disease_key);
    if (existing) {
      logger.debug({ disease_key }, 'Joining in-flight instrument fetch');
      return existing;
    }

    const pending = this.fetchAndCache(disease_key, disease, fetch_instruments).finally(() => {
      this.inFlight.delete(disease_key);
    });
    this.inFlight.set(disease_key, pending);
    return pending;
  }

  private readCache(disease_key: string): InstrumentCacheEntry | null {
    try {
      return this.cache.get(disease_key);
    } catch (error) {
      logger.warn({ error, disease_key }, 'Unreadable instrument cache entry, treating as a miss');
      return null;
    }
  }

  private writeCache(
    disease_key: string,
    disease: string,
    instruments: InstrumentScores,
    source: InstrumentSource,
    ttl_ms: number
  ): void {
    const created = this.now();
    try {
      this.cache.set({
        disease_key,
        disease_name: disease,
        instruments,
        source,
        created_at: created.toISOString(),
        expires_at: new Date(created.getTime() + ttl_ms).toISOString(),
      });
    } catch (error) {
      logger.warn({ error, disease_key }, 'Failed to write instrument cache entry');
    }
  }

  private async fetchAndCache(
    disease_key: string,
    disease: string,
    fetch_instruments: FetchInstruments
  ): Promise<InstrumentScores | null> {
    let instruments: InstrumentScores;
    try {
      instruments = sanitizeInstrumentScores(await fetch_instruments(disease));
    } catch (error) {
      logger.warn({ error, disease_key }, 'Instrument fetch failed, continuing without dynamic instruments');
      this.writeCache(disease_key, disease, {}, 'failed', this.failure_ttl_ms);
      return null;
    }

    this.writeCache(disease_key, disease, instruments, 'llm', this.ttl_ms);
    logger.info(
      { disease_key, instrument_count: Object.keys(instruments).length },
      'Fetched instruments'
    );
    return instruments;
  }
}
