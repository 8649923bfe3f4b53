// src/cache/sqlite.ts
import { createHash } from 'node:crypto'
import type Database from 'better-sqlite3'
import { openDatabase } from './database.js'
import { isSensitiveQuery, sanitizeRecords } from './privacy.js'
import { CacheError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import { isPackageRecord, normalizeQuery } from '../core/types.js'
import type { PackageRecord, SourceName } from '../core/types.js'

export interface CacheStats {
  enabled: boolean
  path: string
  totalEntries: number
  liveEntries: number
  totalAccesses: number
  sizeBytes: number
  bySource: Partial<Record<SourceName, number>>
  ttlSec: number
  maxEntries: number
}

export interface ResultCache {
  get(query: string, source: SourceName): Promise<PackageRecord[] | null>
  /** Resolves false when nothing was written (disabled, empty, sensitive, or failed) */
  set(query: string, source: SourceName, results: readonly PackageRecord[], ttlSec?: number): Promise<boolean>
  invalidate(query: string, source?: SourceName): Promise<number>
  clear(source?: SourceName): Promise<number>
  sweep(): Promise<number>
  stats(): Promise<CacheStats>
  close(): void
}

export interface SqliteCacheOptions {
  path: string
  enabled?: boolean
  ttlSec: number
  maxEntries: number
  sweepIntervalSec: number
  /** Epoch milliseconds; injectable for tests */
  now?: () => number
}

interface CacheRow {
  value: string
  expires_at: number
  access_count: number
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cache_entries (
    key           TEXT PRIMARY KEY,
    query_hash    TEXT NOT NULL,
    source        TEXT NOT NULL,
    value         TEXT NOT NULL,
    created_at    INTEGER NOT NULL,
    expires_at    INTEGER NOT NULL,
    access_count  INTEGER NOT NULL DEFAULT 1,
    last_accessed INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_cache_expires_at ON cache_entries(expires_at);
  CREATE INDEX IF NOT EXISTS idx_cache_query_source ON cache_entries(query_hash, source);
  CREATE INDEX IF NOT EXISTS idx_cache_last_accessed ON cache_entries(last_accessed);
`

export function cacheKey(query: string, source: SourceName): string {
  return createHash('sha256').update(`${normalizeQuery(query)}:${source}`).digest('hex')
}

/** Short digest used to find every source's entry for one query */
export function queryHash(query: string): string {
  return createHash('sha256').update(normalizeQuery(query)).digest('hex').slice(0, 16)
}

/**
 * Per-(query, source) result cache on SQLite.
 *
 * Entries expire `ttlSec` after being written; expired rows are purged when
 * read and by a sweep that piggybacks on writes at most once per
 * `sweepIntervalSec`. The table never holds more than `maxEntries` rows: the
 * least recently accessed go first. Each write, with its sweep and eviction,
 * is one transaction.
 *
 * Storage problems never reach callers: a broken database reads as a miss and
 * writes as a no-op.
 */
export class SqliteResultCache implements ResultCache {
  private db: Database.Database | null
  private readonly now: () => number
  private lastSweep: number

  constructor(
    private readonly opts: SqliteCacheOptions,
    private readonly log: Logger,
  ) {
    this.now = opts.now ?? Date.now
    this.lastSweep = this.now()
    this.db = opts.enabled === false ? null : openDatabase(opts.path, SCHEMA, log)
    if (this.db) log.debug({ path: opts.path }, 'result cache ready')
  }

  get enabled(): boolean {
    return this.db !== null
  }

  async get(query: string, source: SourceName): Promise<PackageRecord[] | null> {
    const db = this.db
    if (!db) return null
    const key = cacheKey(query, source)
    const now = this.now()

    try {
      const row = db
        .prepare<[string], CacheRow>('SELECT value, expires_at, access_count FROM cache_entries WHERE key = ?')
        .get(key)
      if (!row) {
        this.log.debug({ source }, 'cache MISS')
        return null
      }
      if (row.expires_at <= now) {
        db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key)
        this.log.debug({ source }, 'cache EXPIRED')
        return null
      }

      let records: PackageRecord[]
      try {
        records = decodePayload(row.value)
      } catch (err: unknown) {
        this.log.warn({ source, err }, 'discarding unreadable cache entry')
        db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key)
        return null
      }

      db.prepare('UPDATE cache_entries SET access_count = access_count + 1, last_accessed = ? WHERE key = ?')
        .run(now, key)
      this.log.debug({ source, accessCount: row.access_count + 1 }, 'cache HIT')
      return records
    } catch (err: unknown) {
      this.log.warn({ source, err }, 'cache read failed, treating as miss')
      return null
    }
  }

  async set(
    query: string,
    source: SourceName,
    results: readonly PackageRecord[],
    ttlSec: number = this.opts.ttlSec,
  ): Promise<boolean> {
    const db = this.db
    if (!db || results.length === 0) return false
    if (isSensitiveQuery(query)) {
      this.log.debug({ source }, 'not caching potentially sensitive query')
      return false
    }

    const now = this.now()
    const value = JSON.stringify(sanitizeRecords(results))
    try {
      db.transaction(() => {
        db.prepare(
          `INSERT INTO cache_entries
             (key, query_hash, source, value, created_at, expires_at, access_count, last_accessed)
           VALUES (?, ?, ?, ?, ?, ?, 1, ?)
           ON CONFLICT(key) DO UPDATE SET
             value = excluded.value,
             created_at = excluded.created_at,
             expires_at = excluded.expires_at,
             access_count = 1,
             last_accessed = excluded.last_accessed`,
        ).run(cacheKey(query, source), queryHash(query), source, value, now, now + ttlSec * 1000, now)

        if (now - this.lastSweep > this.opts.sweepIntervalSec * 1000) {
          this.deleteExpired(db, now)
          this.lastSweep = now
        }
        this.enforceCapacity(db, now)
      })()
      this.log.debug({ source, count: results.length, ttlSec }, 'cached results')
      return true
    } catch (err: unknown) {
      this.log.warn({ source, err }, 'cache write failed, results not cached')
      return false
    }
  }

  async invalidate(query: string, source?: SourceName): Promise<number> {
    return this.mutate('invalidate', (db) => {
      const hash = queryHash(query)
      const result = source
        ? db.prepare('DELETE FROM cache_entries WHERE query_hash = ? AND source = ?').run(hash, source)
        : db.prepare('DELETE FROM cache_entries WHERE query_hash = ?').run(hash)
      return result.changes
    })
  }

  async clear(source?: SourceName): Promise<number> {
    return this.mutate('clear', (db) => {
      const result = source
        ? db.prepare('DELETE FROM cache_entries WHERE source = ?').run(source)
        : db.prepare('DELETE FROM cache_entries').run()
      return result.changes
    })
  }

  async sweep(): Promise<number> {
    return this.mutate('sweep', (db) => {
      const now = this.now()
      const removed = this.deleteExpired(db, now)
      this.lastSweep = now
      return removed
    })
  }

  async stats(): Promise<CacheStats> {
    const base: CacheStats = {
      enabled: this.db !== null,
      path: this.opts.path,
      totalEntries: 0,
      liveEntries: 0,
      totalAccesses: 0,
      sizeBytes: 0,
      bySource: {},
      ttlSec: this.opts.ttlSec,
      maxEntries: this.opts.maxEntries,
    }
    const db = this.db
    if (!db) return base

    try {
      const now = this.now()
      const totals = db
        .prepare<[number], { total: number; live: number; accesses: number | null }>(
          `SELECT COUNT(*) AS total,
                  COUNT(CASE WHEN expires_at > ? THEN 1 END) AS live,
                  SUM(access_count) AS accesses
           FROM cache_entries`,
        )
        .get(now)
      const perSource = db
        .prepare<[number], { source: SourceName; count: number }>(
          'SELECT source, COUNT(*) AS count FROM cache_entries WHERE expires_at > ? GROUP BY source',
        )
        .all(now)
      const size = db
        .prepare<[], { size: number }>(
          'SELECT page_count * page_size AS size FROM pragma_page_count(), pragma_page_size()',
        )
        .get()

      const bySource: Partial<Record<SourceName, number>> = {}
      for (const row of perSource) bySource[row.source] = row.count

      return {
        ...base,
        totalEntries: totals?.total ?? 0,
        liveEntries: totals?.live ?? 0,
        totalAccesses: totals?.accesses ?? 0,
        sizeBytes: size?.size ?? 0,
        bySource,
      }
    } catch (err: unknown) {
      this.log.warn({ err }, 'cache stats unavailable')
      return base
    }
  }

  close(): void {
    this.db?.close()
    this.db = null
  }

  private deleteExpired(db: Database.Database, now: number): number {
    const removed = db.prepare('DELETE FROM cache_entries WHERE expires_at <= ?').run(now).changes
    if (removed > 0) this.log.debug({ removed }, 'swept expired cache entries')
    return removed
  }

  /** Bounds the live rows; expired rows go first so they never displace a live one. */
  private enforceCapacity(db: Database.Database, now: number): number {
    const count = (): number =>
      db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM cache_entries').get()?.count ?? 0
    if (count() <= this.opts.maxEntries) return 0
    this.deleteExpired(db, now)
    const excess = count() - this.opts.maxEntries
    if (excess <= 0) return 0
    const removed = db
      .prepare(
        `DELETE FROM cache_entries WHERE key IN (
           SELECT key FROM cache_entries ORDER BY last_accessed ASC, rowid ASC LIMIT ?
         )`,
      )
      .run(excess).changes
    this.log.debug({ removed }, 'evicted least recently used cache entries')
    return removed
  }

  private mutate(op: string, fn: (db: Database.Database) => number): number {
    const db = this.db
    if (!db) return 0
    try {
      return db.transaction(fn)(db)
    } catch (err: unknown) {
      this.log.warn({ op, err }, 'cache maintenance failed')
      return 0
    }
  }
}

function decodePayload(value: string): PackageRecord[] {
  const parsed: unknown = JSON.parse(value)
  if (!Array.isArray(parsed) || !parsed.every(isPackageRecord)) {
    throw new CacheError('cached payload is not a package list')
  }
  return parsed
}
