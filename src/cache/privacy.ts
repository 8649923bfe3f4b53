// src/cache/privacy.ts
import { normalizeQuery, truncate } from '../core/types.js'
import type { PackageRecord } from '../core/types.js'

/** Queries containing any of these are never written to disk. */
export const SENSITIVE_QUERY_TERMS: readonly string[] = [
  'password', 'secret', 'key', 'token', 'private',
  'credential', 'auth', 'login', 'admin', 'root',
]

/** Records whose description mentions these are dropped before caching. */
export const SENSITIVE_DESCRIPTION_TERMS: readonly string[] = ['password', 'secret', 'private']

export const MAX_CACHED_DESCRIPTION = 500

export function isSensitiveQuery(query: string): boolean {
  const q = normalizeQuery(query)
  return SENSITIVE_QUERY_TERMS.some((term) => q.includes(term))
}

export function sanitizeRecords(
  records: readonly PackageRecord[],
  maxDescription = MAX_CACHED_DESCRIPTION,
): PackageRecord[] {
  const out: PackageRecord[] = []
  for (const record of records) {
    const description = truncate(record.description, maxDescription)
    const lower = description.toLowerCase()
    if (SENSITIVE_DESCRIPTION_TERMS.some((term) => lower.includes(term))) continue
    out.push({ name: record.name, description, source: record.source })
  }
  return out
}
