// src/suggest/suggester.ts
import { loadPurposeMapping, type PurposeMapping } from './mapping.js'
import { loadCatalog } from '../completion/catalog.js'
import type { Logger } from '../core/logger.js'
import type { CompletionEntry, PurposeSuggestion, SuggestResponse } from '../core/types.js'

export const SUGGEST_SCORING = {
  exactPurpose: 100,
  containedInPurpose: 80,
  perSharedWord: 20,
} as const

/**
 * Maps what the user wants to do ("apps to edit videos") onto purposes from the
 * bundled mapping and the apps listed under each.
 */
export class PurposeSuggester {
  private readonly stopWords: ReadonlySet<string>
  private readonly catalog: ReadonlyMap<string, CompletionEntry>

  constructor(
    private readonly mapping: PurposeMapping,
    catalog: readonly CompletionEntry[],
    private readonly log: Logger,
  ) {
    this.stopWords = new Set(mapping.stopWords)
    this.catalog = new Map(catalog.map((e) => [e.name, e]))
  }

  /** A known phrase maps straight to its purpose; otherwise stop words are dropped. */
  normalize(query: string): string {
    const lower = query.toLowerCase().trim()
    for (const [phrase, purpose] of Object.entries(this.mapping.phrases)) {
      if (lower.includes(phrase)) return purpose
    }
    return lower
      .split(/\s+/)
      .filter((w) => w !== '' && !this.stopWords.has(w))
      .join(' ')
  }

  suggest(query: string, limit = 5): SuggestResponse {
    const normalized = this.normalize(query)
    const suggestions = normalized ? this.match(normalized).slice(0, limit) : []
    this.log.debug({ normalized, matches: suggestions.length }, 'purpose suggestions')

    const response: SuggestResponse = { query, normalized, suggestions }
    if (suggestions.length === 0) response.available = this.purposes()
    return response
  }

  purposes(): string[] {
    return Object.keys(this.mapping.purposes)
  }

  private match(normalized: string): PurposeSuggestion[] {
    const queryWords = new Set(normalized.split(' '))
    const synonyms = [...queryWords].flatMap((w) => this.mapping.synonyms[w] ?? [])

    const matches: PurposeSuggestion[] = []
    for (const [purpose, apps] of Object.entries(this.mapping.purposes)) {
      const p = purpose.toLowerCase()
      const shared = p.split(' ').filter((w) => queryWords.has(w)).length
      const matched = p.includes(normalized) || shared > 0 || synonyms.some((s) => p.includes(s))
      if (!matched) continue

      let score = shared * SUGGEST_SCORING.perSharedWord
      if (p === normalized) score = SUGGEST_SCORING.exactPurpose
      else if (p.includes(normalized)) score = SUGGEST_SCORING.containedInPurpose

      matches.push({
        purpose,
        score,
        apps: apps.map((name) => {
          const entry = this.catalog.get(name)
          return { name, description: entry?.description ?? '', source: entry?.source }
        }),
      })
    }

    // stable: equal scores keep mapping order
    return matches.sort((a, b) => b.score - a.score)
  }
}

export function buildSuggester(log: Logger): PurposeSuggester {
  return new PurposeSuggester(loadPurposeMapping(), loadCatalog(), log)
}
