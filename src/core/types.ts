// src/core/types.ts

export const SOURCE_NAMES = ['pacman', 'aur', 'flatpak', 'snap', 'apt', 'dnf'] as const

export type SourceName = (typeof SOURCE_NAMES)[number]

export type PlatformFamily = 'arch' | 'debian' | 'fedora' | 'unknown'

export type FailureKind = 'not-found' | 'network' | 'timeout' | 'permission' | 'generic'

export interface PackageRecord {
  readonly name: string
  readonly description: string
  readonly source: SourceName
}

export interface ScoredCandidate {
  record: PackageRecord
  score: number
}

export interface SourceFailure {
  source: SourceName
  kind: FailureKind
  message: string
}

/** What an adapter hands back: never thrown, always tagged. */
export type SourceOutcome =
  | { status: 'ok'; records: PackageRecord[] }
  | { status: 'failed'; kind: FailureKind; message: string }

export interface SearchOptions {
  preferSource?: SourceName
  limit?: number
  useCache?: boolean
  signal?: AbortSignal
}

export interface SearchResponse {
  query: string
  results: ScoredCandidate[]
  total: number
  candidates: number        // records seen before dedupe/ranking
  failedSources: SourceFailure[]
  cachedSources: SourceName[]
  elapsed_ms: number
}

export type CompletionContext = 'install' | 'remove' | 'search'

export interface CompletionEntry {
  name: string
  description: string
  source: SourceName
}

export interface CompletionResult {
  name: string
  description: string
  source?: SourceName
  score: number
  alias?: string            // set when an alias resolved to this name
}

export interface SuggestedApp {
  name: string
  description: string       // empty when the app is not in the completion catalog
  source?: SourceName
}

export interface PurposeSuggestion {
  purpose: string
  score: number
  apps: SuggestedApp[]
}

export interface SuggestResponse {
  query: string
  normalized: string
  suggestions: PurposeSuggestion[]
  available?: string[]      // every known purpose, listed when nothing matched
}

/** Trim, lower-case and collapse inner whitespace for stable cache keys and scoring */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ')
}

/** First `max` code points of `text`; never splits a surrogate pair */
export function truncate(text: string, max: number): string {
  return text.length <= max ? text : Array.from(text).slice(0, max).join('')
}

export function isSourceName(value: unknown): value is SourceName {
  return typeof value === 'string' && (SOURCE_NAMES as readonly string[]).includes(value)
}

export function isPackageRecord(value: unknown): value is PackageRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'description' in value &&
    typeof value.description === 'string' &&
    'source' in value &&
    isSourceName(value.source)
  )
}
