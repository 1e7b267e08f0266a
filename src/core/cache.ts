import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { dirname } from 'node:path';
import { mkdirSync, unlinkSync } from 'node:fs';

/**
 * SQLite cache for upstream API responses.
 * Caches at the HTTP response level to avoid redundant API calls.
 *
 * Resilient to corruption: if the DB can't be opened, it's deleted
 * and recreated. Losing the cache just means re-fetching.
 */

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

const MEM_CACHE_MAX = 100;

export interface CacheStats {
  entries: number;
  sizeBytes: number;
}

export interface CacheOptions {
  /** Clock override, mostly for expiry tests */
  now?: () => number;
  memCacheMax?: number;
}

export class ResponseCache {
  private db: Database.Database | null = null;
  /** In-memory FIFO for hot-path hits within a session */
  private readonly memCache = new Map<string, { body: string; expiresAt: number }>();
  private readonly now: () => number;
  private readonly memCacheMax: number;

  constructor(private readonly dbPath: string, options: CacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.memCacheMax = options.memCacheMax ?? MEM_CACHE_MAX;
  }

  private getDb(): Database.Database {
    if (this.db) return this.db;

    if (this.dbPath !== ':memory:') {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }

    try {
      this.db = this.open();
    } catch {
      // Corrupted file: delete and recreate
      for (const suffix of ['', '-wal', '-shm']) {
        try { unlinkSync(this.dbPath + suffix); } catch { /* already gone */ }
      }
      this.db = this.open();
    }

    return this.db;
  }

  private open(): Database.Database {
    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 3000');
    db.exec(SCHEMA);
    return db;
  }

  /** Get cached response if still valid */
  get(url: string): string | null {
    const hash = hashUrl(url);
    const now = this.now();

    const mem = this.memCache.get(hash);
    if (mem && mem.expiresAt > now) return mem.body;

    const row = this.getDb().prepare<[string, string], { response_body: string; expires_at: string }>(
      'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
    ).get(hash, new Date(now).toISOString());

    if (row) {
      this.setMem(hash, row.response_body, new Date(row.expires_at).getTime());
      return row.response_body;
    }

    return null;
  }

  /** Store response in cache */
  set(url: string, body: string, ttlHours: number = 24): void {
    const hash = hashUrl(url);
    const now = this.now();
    const expiresAt = now + ttlHours * 60 * 60 * 1000;

    this.setMem(hash, body, expiresAt);

    this.getDb().prepare(`
      INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(hash, url, body, new Date(now).toISOString(), new Date(expiresAt).toISOString());
  }

  private setMem(hash: string, body: string, expiresAt: number): void {
    if (this.memCache.size >= this.memCacheMax) {
      const firstKey = this.memCache.keys().next().value;
      if (firstKey !== undefined) this.memCache.delete(firstKey);
    }
    this.memCache.set(hash, { body, expiresAt });
  }

  clear(): void {
    this.memCache.clear();
    this.getDb().exec('DELETE FROM http_cache');
  }

  stats(): CacheStats {
    const row = this.getDb().prepare<[], { count: number; size: number }>(
      'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
    ).get();
    return { entries: row?.count ?? 0, sizeBytes: row?.size ?? 0 };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}
