// src/core/errors.ts
import type { FailureKind, SourceName } from './types.js'

export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

// Raised inside the cache layer only; callers see a miss or a no-op instead.
export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CacheError'
  }
}

export class SourceError extends Error {
  constructor(
    public readonly source: SourceName,
    public readonly kind: FailureKind,
    message: string,
  ) {
    super(message)
    this.name = 'SourceError'
  }
}

const ERRNO_KINDS: Record<string, FailureKind> = {
  ENOENT: 'not-found',
  EACCES: 'permission',
  EPERM: 'permission',
  ETIMEDOUT: 'timeout',
  ECONNREFUSED: 'network',
  ECONNRESET: 'network',
  ENOTFOUND: 'network',
  EAI_AGAIN: 'network',
  ENETUNREACH: 'network',
  EHOSTUNREACH: 'network',
}

/** Map anything thrown by Node, got or an adapter onto a failure kind */
export function classifyError(err: unknown): FailureKind {
  if (err instanceof SourceError) return err.kind
  if (err == null || typeof err !== 'object') return 'generic'

  if ('name' in err && (err.name === 'TimeoutError' || err.name === 'AbortError')) return 'timeout'
  if ('code' in err && typeof err.code === 'string') {
    const kind = ERRNO_KINDS[err.code]
    if (kind) return kind
  }

  const text = String('message' in err ? err.message : err).toLowerCase()
  if (text.includes('connection') || text.includes('network')) return 'network'
  if (text.includes('timeout') || text.includes('timed out')) return 'timeout'
  if (text.includes('not found')) return 'not-found'
  if (text.includes('permission')) return 'permission'
  return 'generic'
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
