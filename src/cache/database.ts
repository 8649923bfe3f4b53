// src/cache/database.ts
import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Logger } from '../core/logger.js'

/**
 * Open (or create) a SQLite file and apply `schema`. Returns null when the
 * file cannot be created, is not a database, or the schema cannot be applied;
 * callers then run without persistence.
 */
export function openDatabase(path: string, schema: string, log: Logger): Database.Database | null {
  let db: Database.Database | undefined
  try {
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true })
    db = new Database(path, { timeout: 5_000 })
    db.pragma('journal_mode = WAL')
    db.pragma('synchronous = NORMAL')
    db.exec(schema)
    return db
  } catch (err: unknown) {
    log.warn({ path, err }, 'database unavailable, continuing without it')
    db?.close()
    return null
  }
}
