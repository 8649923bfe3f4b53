// src/completion/engine.ts
import { PackageTrie, abbreviation } from './trie.js'
import { FrequencyStore } from './frequency.js'
import { loadAliases, loadCatalog } from './catalog.js'
import { COMPLETION_SCORING } from '../core/scoring.js'
import type { CompletionConfig } from '../core/config.js'
import type { Logger } from '../core/logger.js'
import { normalizeQuery } from '../core/types.js'
import type { CompletionContext, CompletionEntry, CompletionResult } from '../core/types.js'

export interface CompletionEngineOptions {
  entries: readonly CompletionEntry[]
  aliases: ReadonlyMap<string, string>
  frequency: FrequencyStore
}

export class CompletionEngine {
  private readonly trie = new PackageTrie()
  private readonly aliases: ReadonlyMap<string, string>
  private readonly frequency: FrequencyStore

  constructor(opts: CompletionEngineOptions, log: Logger) {
    this.aliases = opts.aliases
    this.frequency = opts.frequency
    this.index(opts.entries)
    log.debug({ packages: this.trie.size, aliases: this.aliases.size }, 'completion index ready')
  }

  index(entries: readonly CompletionEntry[]): void {
    for (const entry of entries) this.trie.insert(entry)
  }

  complete(prefix: string, context: CompletionContext = 'install', limit = 10): CompletionResult[] {
    const query = normalizeQuery(prefix)
    if (!query) return []

    const canonical = this.aliases.get(query)
    if (canonical !== undefined) {
      const entry = this.trie.get(canonical)
      return [{
        name: canonical,
        description: entry?.description ?? '',
        source: entry?.source,
        score: COMPLETION_SCORING.aliasScore,
        alias: query,
      }]
    }

    const names = new Set([...this.trie.searchPrefix(query), ...this.trie.searchAbbreviation(query)])
    const results: CompletionResult[] = []
    for (const name of names) {
      const entry = this.trie.get(name)
      if (!entry) continue
      results.push({
        name,
        description: entry.description,
        source: entry.source,
        score: this.score(query, entry, context),
      })
    }

    results.sort((a, b) => b.score - a.score)
    return results.slice(0, limit)
  }

  /** Newline-separated names for shell completion scripts */
  completionText(prefix: string, context: CompletionContext = 'install', limit = 10): string {
    return this.complete(prefix, context, limit).map((r) => r.name).join('\n')
  }

  recordUsage(name: string): void {
    this.frequency.record(name)
  }

  flush(): boolean {
    return this.frequency.flush()
  }

  private score(query: string, entry: CompletionEntry, context: CompletionContext): number {
    const s = COMPLETION_SCORING
    const name = entry.name.toLowerCase()
    const description = entry.description.toLowerCase()
    let score = 0

    if (name === query) score += s.exactName
    else if (name.startsWith(query)) score += s.namePrefix
    else if (name.includes(query)) score += s.nameContains

    if (abbreviation(name).includes(query)) score += s.abbreviation
    if (description.includes(query)) score += s.descriptionContains

    const nameWords = new Set(name.split(/[-_]/))
    const descriptionWords = new Set(description.split(/\s+/).filter((w) => w !== ''))
    for (const word of new Set(query.split(' '))) {
      for (const w of nameWords) if (w.startsWith(word)) score += s.nameWordPrefix
      for (const w of descriptionWords) if (w.startsWith(word)) score += s.descriptionWordPrefix
    }

    score += Math.min(this.frequency.count(entry.name) * s.frequencyPerUse, s.frequencyCap)

    const recency = this.frequency.recencyIndex(entry.name)
    if (recency >= 0) {
      score += Math.max(s.recencyMax - recency, 0)
      if (context === 'remove') score += s.removeContextRecentBonus
    }

    score += s.sourceBonus[entry.source]
    return score
  }
}

/** Engine over the bundled catalog and aliases, with usage data at `config.frequencyPath` */
export function buildCompletionEngine(config: CompletionConfig, log: Logger): CompletionEngine {
  const frequency = new FrequencyStore(
    { path: config.frequencyPath, maxRecent: config.maxRecent, flushEvery: config.flushEvery },
    log,
  )
  return new CompletionEngine({ entries: loadCatalog(), aliases: loadAliases(), frequency }, log)
}
