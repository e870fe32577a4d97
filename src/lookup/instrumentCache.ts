/**
 * Instrument cache contract and in-memory implementation
 */

import type { InstrumentScores } from '../domain/types.js';

/** `failed` marks a negative entry left by a fetch that errored */
export type InstrumentSource = 'llm' | 'manual' | 'failed';

export interface InstrumentCacheEntry {
  disease_key: string;
  disease_name: string;
  instruments: InstrumentScores;
  source: InstrumentSource;
  created_at: string;
  expires_at: string;
}

export interface InstrumentCacheStats {
  total_entries: number;
  expired_entries: number;
  by_source: Record<string, number>;
}

/**
 * Expiry is the caller's concern: `get` returns whatever is stored and the
 * store compares `expires_at` against its own clock.
 */
export interface InstrumentCache {
  get(disease_key: string): InstrumentCacheEntry | null;
  set(entry: InstrumentCacheEntry): void;
  clear(): void;
  stats(now?: Date): InstrumentCacheStats;
  close(): void;
}

export class MemoryInstrumentCache implements InstrumentCache {
  private entries = new Map<string, InstrumentCacheEntry>();

  public get(disease_key: string): InstrumentCacheEntry | null {
    return this.entries.get(disease_key) ?? null;
  }

  public set(entry: InstrumentCacheEntry): void {
    this.entries.set(entry.disease_key, { ...entry, instruments: { ...entry.instruments } });
  }

  public clear(): void {
    this.entries.clear();
  }

  public stats(now: Date = new Date()): InstrumentCacheStats {
    const by_source: Record<string, number> = {};
    let expired_entries = 0;
    for (const entry of this.entries.values()) {
      by_source[entry.source] = (by_source[entry.source] ?? 0) + 1;
      if (isExpired(entry.expires_at, now)) expired_entries++;
    }
    return { total_entries: this.entries.size, expired_entries, by_source };
  }

  public close(): void {
    this.entries.clear();
  }
}

export function isExpired(expires_at: string, now: Date): boolean {
  return new Date(expires_at).getTime() <= now.getTime();
}
