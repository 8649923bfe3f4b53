// src/sources/base.ts
import type { FailureKind, PackageRecord, SourceName, SourceOutcome } from '../core/types.js'

export interface SourceAdapter {
  readonly name: SourceName
  /** Budget for one query; the engine aborts the signal when it runs out */
  readonly timeoutMs: number
  query(term: string, signal: AbortSignal): Promise<SourceOutcome>
}

export function ok(records: PackageRecord[]): SourceOutcome {
  return { status: 'ok', records }
}

export function failed(kind: FailureKind, message: string): SourceOutcome {
  return { status: 'failed', kind, message }
}
