// src/completion/trie.ts
import type { CompletionEntry } from '../core/types.js'

interface TrieNode {
  children: Map<string, TrieNode>
  names: Set<string>
}

function node(): TrieNode {
  return { children: new Map(), names: new Set() }
}

/** First letter of every `-`/`_` separated word: `visual-studio-code` → `vsc` */
export function abbreviation(name: string): string {
  return name
    .toLowerCase()
    .split(/[-_]/)
    .filter((word) => word !== '')
    .map((word) => word[0])
    .join('')
}

/**
 * Prefix index over lower-cased package names. Every node keeps the set of
 * names reachable through it, so a prefix lookup is one walk.
 */
export class PackageTrie {
  private readonly root = node()
  private readonly entries = new Map<string, CompletionEntry>()
  private readonly abbreviations = new Map<string, string>()

  get size(): number {
    return this.entries.size
  }

  insert(entry: CompletionEntry): void {
    this.entries.set(entry.name, entry)
    this.abbreviations.set(entry.name, abbreviation(entry.name))
    let current = this.root
    for (const char of entry.name.toLowerCase()) {
      let next = current.children.get(char)
      if (!next) {
        next = node()
        current.children.set(char, next)
      }
      next.names.add(entry.name)
      current = next
    }
  }

  get(name: string): CompletionEntry | undefined {
    return this.entries.get(name)
  }

  searchPrefix(prefix: string): Set<string> {
    let current = this.root
    for (const char of prefix.toLowerCase()) {
      const next = current.children.get(char)
      if (!next) return new Set()
      current = next
    }
    return new Set(current.names)
  }

  searchAbbreviation(query: string): Set<string> {
    const q = query.toLowerCase()
    const matches = new Set<string>()
    for (const [name, abbrev] of this.abbreviations) {
      if (abbrev.includes(q)) matches.add(name)
    }
    return matches
  }
}
