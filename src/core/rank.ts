// src/core/rank.ts
import { DEFAULT_SCORING, type ScoringPolicy } from './scoring.js'
import { normalizeQuery } from './types.js'
import type { PackageRecord, ScoredCandidate } from './types.js'

export function isJunk(record: PackageRecord, policy: ScoringPolicy = DEFAULT_SCORING): boolean {
  const desc = record.description.toLowerCase()
  return policy.junkTerms.some((term) => desc.includes(term))
}

/** Score one candidate. Callers are expected to have dropped junk already. */
export function scoreRecord(
  query: string,
  record: PackageRecord,
  policy: ScoringPolicy = DEFAULT_SCORING,
): number {
  const q = normalizeQuery(query)
  const name = record.name.toLowerCase()
  const desc = record.description.toLowerCase()
  let score = 0

  if (name === q) score += policy.exactNameBonus
  else if (name.includes(q)) score += policy.nameContainsBonus

  const nameTokens = new Set(name.split('-').filter(Boolean))
  const descTokens = new Set(desc.split(/\s+/).filter(Boolean))
  for (const token of new Set(q.split(' '))) {
    for (const t of nameTokens) if (t.startsWith(token)) score += policy.nameTokenPrefixBonus
    for (const t of descTokens) if (t.startsWith(token)) score += policy.descriptionTokenPrefixBonus
  }

  for (const term of policy.boostTerms) {
    if (name.includes(term) || desc.includes(term)) score += policy.boostTermBonus
  }
  for (const term of policy.lowPriorityTerms) {
    if (name.includes(term) || desc.includes(term)) score -= policy.lowPriorityPenalty
  }

  if (name.endsWith(policy.binarySuffix)) score += policy.binarySuffixBonus
  score += policy.sourceBonus[record.source]

  return score
}

/**
 * Junk-filter, score, stable-sort descending and cut to `limit`.
 * Candidates scoring zero or below never appear.
 */
export function scoreCandidates(
  query: string,
  records: readonly PackageRecord[],
  limit: number,
  policy: ScoringPolicy = DEFAULT_SCORING,
): ScoredCandidate[] {
  if (limit <= 0) return []
  return records
    .filter((record) => !isJunk(record, policy))
    .map((record) => ({ record, score: scoreRecord(query, record, policy) }))
    .filter((c) => c.score > 0)
    // Array.prototype.sort is stable, so equal scores keep dedupe order
    .sort((a, b) => b.score - a.score)
    .slice(0, limit)
}

export function rank(
  query: string,
  records: readonly PackageRecord[],
  limit: number,
  policy: ScoringPolicy = DEFAULT_SCORING,
): PackageRecord[] {
  return scoreCandidates(query, records, limit, policy).map((c) => c.record)
}
