// tests/mcp/handlers.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createHandlers, type ToolHandlers } from '../../src/mcp/handlers.js'
import { SearchPackagesInput, CompletePackageInput, tools } from '../../src/mcp/tools.js'
import { loadConfig } from '../../src/core/config.js'
import { SearchEngine } from '../../src/core/engine.js'
import { SqliteMetrics } from '../../src/core/metrics.js'
import { SqliteResultCache } from '../../src/cache/sqlite.js'
import { CompletionEngine } from '../../src/completion/engine.js'
import { FrequencyStore } from '../../src/completion/frequency.js'
import { PurposeSuggester } from '../../src/suggest/suggester.js'
import { silentLogger } from '../../src/core/logger.js'
import { ok, type SourceAdapter } from '../../src/sources/base.js'
import type { Runtime } from '../../src/core/engine-factory.js'

const AUR: SourceAdapter = {
  name: 'aur',
  timeoutMs: 1_000,
  query: async () =>
    ok([{ name: 'firefox-bin', description: 'Standalone web browser from mozilla.org', source: 'aur' }]),
}

describe('MCP tool handlers', () => {
  let rt: Runtime
  let handlers: ToolHandlers

  beforeEach(() => {
    const config = loadConfig({ PKGSCOUT_CACHE_DIR: '/nonexistent', PKGSCOUT_AUR_HELPER: 'paru' })
    const cache = new SqliteResultCache({ ...config.cache, path: ':memory:' }, silentLogger)
    const metrics = new SqliteMetrics(':memory:', silentLogger)
    const engine = new SearchEngine(
      { aur: AUR },
      cache,
      metrics,
      { platform: () => 'arch', defaultLimit: 5 },
      silentLogger,
    )
    rt = { config, log: silentLogger, engine, cache, metrics, close: vi.fn() }
    const completion = new CompletionEngine(
      {
        entries: [{ name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur' }],
        aliases: new Map(),
        frequency: new FrequencyStore({ maxRecent: 50, flushEvery: 10 }, silentLogger),
      },
      silentLogger,
    )
    const suggester = new PurposeSuggester(
      {
        purposes: { coding: ['visual-studio-code', 'neovim'] },
        phrases: { 'code editor': 'coding' },
        synonyms: {},
        stopWords: ['a'],
      },
      [{ name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur' }],
      silentLogger,
    )
    handlers = createHandlers(rt, completion, suggester)
  })

  afterEach(() => {
    rt.cache.close()
    rt.metrics.close()
  })

  it('search_packages returns scored results with install commands', async () => {
    const out: unknown = JSON.parse(await handlers.searchPackages({ query: 'Firefox' }))
    expect(out).toMatchObject({
      query: 'firefox',
      total: 1,
      results: [
        {
          name: 'firefox-bin',
          source: 'aur',
          description: 'Standalone web browser from mozilla.org',
          score: 112,
          install: 'paru -S firefox-bin',
        },
      ],
      failedSources: [],
    })
  })

  it('complete_package returns ranked completions', async () => {
    const out: unknown = JSON.parse(await handlers.completePackage({ prefix: 'vsc' }))
    expect(out).toEqual({
      prefix: 'vsc',
      results: [{ name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur', score: 78 }],
    })
  })

  it('search_packages links a GitHub search when nothing matched', async () => {
    rt.engine = new SearchEngine(
      { aur: { name: 'aur', timeoutMs: 1_000, query: async () => ok([]) } },
      rt.cache,
      rt.metrics,
      { platform: () => 'arch', defaultLimit: 5 },
      silentLogger,
    )
    const out: unknown = JSON.parse(await handlers.searchPackages({ query: 'obscure tool' }))
    expect(out).toMatchObject({
      results: [],
      githubSearch: 'https://github.com/search?q=obscure+tool&type=repositories',
    })
  })

  it('suggest_packages maps a purpose to apps', async () => {
    const out: unknown = JSON.parse(await handlers.suggestPackages({ purpose: 'a code editor' }))
    expect(out).toEqual({
      query: 'a code editor',
      normalized: 'coding',
      suggestions: [
        {
          purpose: 'coding',
          score: 100,
          apps: [
            { name: 'visual-studio-code', description: 'Code editor by Microsoft', source: 'aur' },
            { name: 'neovim', description: '' },
          ],
        },
      ],
    })
  })

  it('cache_stats and cache_clear reflect cached searches', async () => {
    await handlers.searchPackages({ query: 'firefox' })
    const stats: unknown = JSON.parse(await handlers.cacheStats())
    expect(stats).toMatchObject({
      cache: { enabled: true, totalEntries: 1, bySource: { aur: 1 } },
      metrics: [{ source: 'aur', requests: 1, failures: 0 }],
    })
    expect(JSON.parse(await handlers.cacheClear({ source: 'pacman' }))).toEqual({ deleted: 0 })
    expect(JSON.parse(await handlers.cacheClear({}))).toEqual({ deleted: 1 })
  })
})

describe('MCP tool schemas', () => {
  it('lists every tool once', () => {
    expect(tools.map((t) => t.name)).toEqual([
      'search_packages',
      'complete_package',
      'suggest_packages',
      'cache_stats',
      'cache_clear',
    ])
  })

  it('validates search input', () => {
    expect(SearchPackagesInput.safeParse({ query: '' }).success).toBe(false)
    expect(SearchPackagesInput.safeParse({ query: 'gimp', limit: 51 }).success).toBe(false)
    expect(SearchPackagesInput.safeParse({ query: 'gimp', prefer_source: 'brew' }).success).toBe(false)
    expect(SearchPackagesInput.parse({ query: 'gimp', prefer_source: 'flatpak', limit: 3 })).toEqual({
      query: 'gimp',
      prefer_source: 'flatpak',
      limit: 3,
    })
  })

  it('validates completion context', () => {
    expect(CompletePackageInput.safeParse({ prefix: 'fi', context: 'upgrade' }).success).toBe(false)
  })
})
