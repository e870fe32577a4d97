/**
 * SQLite-backed instrument cache
 */

import Database from 'better-sqlite3';
import { join } from 'path';
import { z } from 'zod';
import { resolveCachePath } from '../config/defaults.js';
import { createLogger } from '../utils/log.js';
import type {
  InstrumentCache,
  InstrumentCacheEntry,
  InstrumentCacheStats,
} from './instrumentCache.js';

const logger = createLogger('instrument-cache');

const CacheRowSchema = z.object({
  disease_key: z.string(),
  disease_name: z.string(),
  instruments_json: z.string(),
  source: z.enum(['llm', 'manual', 'failed']),
  created_at: z.string(),
  expires_at: z.string(),
});

const InstrumentScoresSchema = z.record(z.string(), z.number());

const CountRowSchema = z.object({ count: z.number() });
const SourceCountRowSchema = z.object({ source: z.string(), count: z.number() });

export class SqliteInstrumentCache implements InstrumentCache {
  private db: Database.Database;

  constructor(db_path: string = join(process.cwd(), resolveCachePath())) {
    this.db = new Database(db_path);
    this.initializeTables();
  }

  private initializeTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS instrument_cache (
        disease_key TEXT PRIMARY KEY,
        disease_name TEXT NOT NULL,
        instruments_json TEXT NOT NULL,
        source TEXT NOT NULL,
        created_at TEXT NOT NULL,
        expires_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_expires_at ON instrument_cache(expires_at);
    `);
    logger.debug('Instrument cache tables initialized');
  }

  public get(disease_key: string): InstrumentCacheEntry | null {
    const row: unknown = this.db
      .prepare('SELECT * FROM instrument_cache WHERE disease_key = ?')
      .get(disease_key);

    if (!row) {
      logger.debug({ disease_key }, 'Cache miss');
      return null;
    }

    const parsed = CacheRowSchema.parse(row);
    logger.debug({ disease_key }, 'Cache hit');
    return {
      disease_key: parsed.disease_key,
      disease_name: parsed.disease_name,
      instruments: InstrumentScoresSchema.parse(JSON.parse(parsed.instruments_json)),
      source: parsed.source,
      created_at: parsed.created_at,
      expires_at: parsed.expires_at,
    };
  }

  public set(entry: InstrumentCacheEntry): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO instrument_cache
      (disease_key, disease_name, instruments_json, source, created_at, expires_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      entry.disease_key,
      entry.disease_name,
      JSON.stringify(entry.instruments),
      entry.source,
      entry.created_at,
      entry.expires_at
    );

    logger.debug({ disease_key: entry.disease_key }, 'Cache entry saved');
  }

  public clear(): void {
    this.db.exec('DELETE FROM instrument_cache');
    logger.info('Instrument cache cleared');
  }

  public close(): void {
    this.db.close();
  }

  public stats(now: Date = new Date()): InstrumentCacheStats {
    const total = CountRowSchema.parse(
      this.db.prepare('SELECT COUNT(*) as count FROM instrument_cache').get()
    );

    const source_rows = z
      .array(SourceCountRowSchema)
      .parse(
        this.db
          .prepare('SELECT source, COUNT(*) as count FROM instrument_cache GROUP BY source')
          .all()
      );

    const by_source: Record<string, number> = {};
    for (const row of source_rows) {
      by_source[row.source] = row.count;
    }

    // ISO-8601 timestamps compare lexicographically
    const expired = CountRowSchema.parse(
      this.db
        .prepare('SELECT COUNT(*) as count FROM instrument_cache WHERE expires_at <= ?')
        .get(now.toISOString())
    );

    return {
      total_entries: total.count,
      expired_entries: expired.count,
      by_source,
    };
  }
}
