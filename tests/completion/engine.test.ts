// tests/completion/engine.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { CompletionEngine, buildCompletionEngine } from '../../src/completion/engine.js'
import { FrequencyStore } from '../../src/completion/frequency.js'
import { loadAliases, loadCatalog } from '../../src/completion/catalog.js'
import { silentLogger } from '../../src/core/logger.js'
import type { CompletionEntry } from '../../src/core/types.js'

const ENTRIES: CompletionEntry[] = [
  { name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur' },
  { name: 'vim', description: 'Text editor', source: 'pacman' },
  { name: 'vivaldi', description: 'Web browser', source: 'aur' },
  { name: 'neovim', description: 'Vim-based text editor', source: 'pacman' },
]

function engine(
  entries: readonly CompletionEntry[] = ENTRIES,
  aliases: Record<string, string> = {},
): CompletionEngine {
  const frequency = new FrequencyStore({ maxRecent: 50, flushEvery: 10 }, silentLogger)
  return new CompletionEngine({ entries, aliases: new Map(Object.entries(aliases)), frequency }, silentLogger)
}

describe('CompletionEngine', () => {
  it('returns nothing for a blank prefix', () => {
    expect(engine().complete('   ')).toEqual([])
  })

  it('scores prefix matches', () => {
    // vim: 80 prefix + 10 word + 10 pacman; the others: 80 + 10 + 8 aur
    expect(engine().complete('vi').map((r) => [r.name, r.score])).toEqual([
      ['vim', 100],
      ['visual-studio-code', 98],
      ['vivaldi', 98],
    ])
  })

  it('finds names by abbreviation', () => {
    // 70 abbreviation + 8 aur
    expect(engine().complete('vsc')).toEqual([
      { name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur', score: 78 },
    ])
  })

  it('gives an exact name its full bonus', () => {
    const [top] = engine().complete('vim')
    // 100 exact + 10 word + 10 pacman
    expect(top).toEqual({ name: 'vim', description: 'Text editor', source: 'pacman', score: 120 })
  })

  it('short-circuits on an exact alias', () => {
    const e = engine(ENTRIES, { vscode: 'visual-studio-code', vim: 'gvim' })
    expect(e.complete('VSCode')).toEqual([
      { name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur', score: 100, alias: 'vscode' },
    ])
    // the canonical name need not be indexed
    expect(e.complete('vim')).toEqual([{ name: 'gvim', description: '', source: undefined, score: 100, alias: 'vim' }])
  })

  it('applies the limit', () => {
    expect(engine().complete('vi', 'install', 2)).toHaveLength(2)
  })

  it('ranks a used package above an equally matching unused one', () => {
    const e = engine([
      { name: 'falkon', description: 'Web browser', source: 'pacman' },
      { name: 'firefox', description: 'Web browser', source: 'pacman' },
    ])
    expect(e.complete('f').map((r) => r.name)).toEqual(['falkon', 'firefox'])

    e.recordUsage('firefox')
    e.recordUsage('firefox')
    // 80 prefix + 70 abbreviation + 10 word + 10 pacman + 4 frequency + 10 recency
    expect(e.complete('f').map((r) => [r.name, r.score])).toEqual([
      ['firefox', 184],
      ['falkon', 170],
    ])
  })

  it('boosts recently used packages when removing', () => {
    const e = engine()
    e.recordUsage('vivaldi')
    e.recordUsage('vim')
    const install = e.complete('vi', 'install')
    const remove = e.complete('vi', 'remove')
    // vivaldi: 98 + 2 frequency + 9 recency (index 1)
    expect(install.find((r) => r.name === 'vivaldi')?.score).toBe(109)
    expect(remove.find((r) => r.name === 'vivaldi')?.score).toBe(124)
    expect(remove.find((r) => r.name === 'visual-studio-code')?.score).toBe(98)
  })

  it('caps the frequency bonus at 20', () => {
    const e = engine()
    for (let i = 0; i < 15; i++) e.recordUsage('vivaldi')
    // 80 prefix + 10 word + 8 aur + 20 frequency + 10 recency
    expect(e.complete('viv')[0]?.score).toBe(128)
  })

  it('renders newline-separated names for shells', () => {
    expect(engine().completionText('vi')).toBe('vim\nvisual-studio-code\nvivaldi')
    expect(engine().completionText('zzz')).toBe('')
  })

  it('indexes entries added later', () => {
    const e = engine()
    e.index([{ name: 'vifm', description: 'File manager', source: 'pacman' }])
    expect(e.complete('vif').map((r) => r.name)).toEqual(['vifm'])
  })
})

describe('bundled catalog', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pkgscout-complete-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true })
  })

  it('loads the shipped catalog and aliases', () => {
    expect(loadCatalog()).toContainEqual({ name: 'firefox', description: 'Web browser', source: 'pacman' })
    expect(loadAliases().get('vscode')).toBe('visual-studio-code')
  })

  it('points every alias at an indexed package', () => {
    const names = new Set(loadCatalog().map((e) => e.name))
    const dangling = [...loadAliases()].filter(([, target]) => !names.has(target))
    expect(dangling).toEqual([])
  })

  it('never lets an alias hide a different package of the same name', () => {
    const names = new Set(loadCatalog().map((e) => e.name))
    const shadowing = [...loadAliases()].filter(([alias, target]) => names.has(alias) && alias !== target)
    expect(shadowing).toEqual([])
  })

  it('completes vim to itself', () => {
    const e = buildCompletionEngine({ frequencyPath: join(dir, 'frequency.json'), maxRecent: 50, flushEvery: 10 }, silentLogger)
    // 100 exact + 10 word + 10 pacman
    expect(e.complete('vim')[0]).toEqual({ name: 'vim', description: 'Text editor', source: 'pacman', score: 120 })
  })

  it('resolves the vscode alias', () => {
    const frequencyPath = join(dir, 'frequency.json')
    const e = buildCompletionEngine({ frequencyPath, maxRecent: 50, flushEvery: 10 }, silentLogger)
    expect(e.complete('vscode')).toEqual([
      { name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur', score: 100, alias: 'vscode' },
    ])
    e.recordUsage('visual-studio-code')
    expect(e.flush()).toBe(true)
    expect(existsSync(frequencyPath)).toBe(true)
  })
})
