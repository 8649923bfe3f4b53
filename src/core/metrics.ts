// src/core/metrics.ts
import type Database from 'better-sqlite3'
import { openDatabase } from '../cache/database.js'
import { queryHash } from '../cache/sqlite.js'
import type { Logger } from './logger.js'
import type { FailureKind, SourceName } from './types.js'

export interface MetricRecord {
  source: SourceName
  query?: string
  cacheHit: boolean
  results?: number
  elapsedMs?: number
  failure?: FailureKind
}

export interface SourceStats {
  source: SourceName
  requests: number
  failures: number
  p50: number
  p95: number
  p99: number
  cacheHitRate: number
}

export interface MetricsSink {
  record(m: MetricRecord): Promise<void>
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS metrics (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    ts         INTEGER NOT NULL,
    source     TEXT NOT NULL,
    query_hash TEXT,
    cache_hit  INTEGER NOT NULL,
    results    INTEGER,
    elapsed_ms INTEGER,
    failure    TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_metrics_ts ON metrics(ts);
`

export class SqliteMetrics implements MetricsSink {
  private db: Database.Database | null

  constructor(dbPath: string, private readonly log: Logger) {
    this.db = openDatabase(dbPath, SCHEMA, log)
  }

  // Only a hash of the query is kept, never the text
  async record(m: MetricRecord): Promise<void> {
    if (!this.db) return
    try {
      this.db
        .prepare(
          'INSERT INTO metrics (ts, source, query_hash, cache_hit, results, elapsed_ms, failure) VALUES (?, ?, ?, ?, ?, ?, ?)',
        )
        .run(
          Math.floor(Date.now() / 1000),
          m.source,
          m.query ? queryHash(m.query) : null,
          m.cacheHit ? 1 : 0,
          m.results ?? null,
          m.elapsedMs ?? null,
          m.failure ?? null,
        )
    } catch (err: unknown) {
      this.log.debug({ err }, 'metrics write failed')
    }
  }

  close(): void {
    this.db?.close()
    this.db = null
  }

  async stats(sinceSec = 86400): Promise<SourceStats[]> {
    if (!this.db) return []
    const since = Math.floor(Date.now() / 1000) - sinceSec
    const rows = this.db
      .prepare<[number], {
        source: SourceName
        requests: number
        failures: number
        hits: number
        latencies: string | null
      }>(
        `SELECT source,
                COUNT(*) as requests,
                SUM(CASE WHEN failure IS NOT NULL THEN 1 ELSE 0 END) as failures,
                SUM(cache_hit) as hits,
                GROUP_CONCAT(elapsed_ms) as latencies
         FROM metrics
         WHERE ts >= ?
         GROUP BY source
         ORDER BY source`,
      )
      .all(since)

    return rows.map((r) => {
      const lats = r.latencies
        ? r.latencies
            .split(',')
            .map(Number)
            .filter((n) => !isNaN(n))
            .sort((a, b) => a - b)
        : []
      return {
        source: r.source,
        requests: r.requests,
        failures: r.failures,
        p50: percentile(lats, 0.5),
        p95: percentile(lats, 0.95),
        p99: percentile(lats, 0.99),
        cacheHitRate: r.requests > 0 ? r.hits / r.requests : 0,
      }
    })
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0
  const idx = Math.ceil(sorted.length * p) - 1
  return sorted[Math.max(0, Math.min(idx, sorted.length - 1))] ?? 0
}
