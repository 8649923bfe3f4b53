// src/cli/index.ts
import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { Command, InvalidArgumentError, Option } from 'commander'
import { loadConfig, type Config } from '../core/config.js'
import { buildEngine, type Runtime } from '../core/engine-factory.js'
import { createLogger } from '../core/logger.js'
import { buildCompletionEngine, type CompletionEngine } from '../completion/engine.js'
import { buildSuggester, type PurposeSuggester } from '../suggest/suggester.js'
import { completionScript, SHELLS, type Shell } from './completion-scripts.js'
import { JsonFormatter } from '../results/json.js'
import { MarkdownFormatter } from '../results/markdown.js'
import { SOURCE_NAMES, isSourceName } from '../core/types.js'
import type { CompletionContext, SourceName } from '../core/types.js'

interface CliDeps {
  config?: Config
  runtime?: (config: Config) => Runtime
  completion?: (config: Config) => CompletionEngine
  suggester?: (config: Config) => PurposeSuggester
  write?: (s: string) => void
}

interface SearchCliOptions {
  prefer?: SourceName
  limit?: number
  output: 'json' | 'markdown'
  cache: boolean
}

interface CompleteCliOptions {
  context: CompletionContext
  limit: number
}

export function buildCli(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((s: string) => process.stdout.write(s + '\n'))
  const config = (): Config => deps.config ?? loadConfig()
  const openRuntime = (): Runtime => (deps.runtime ?? ((cfg: Config) => buildEngine(cfg)))(config())
  const openCompletion = (): CompletionEngine => {
    const cfg = config()
    return deps.completion
      ? deps.completion(cfg)
      : buildCompletionEngine(cfg.completion, createLogger({ level: cfg.logLevel, file: cfg.logFile }))
  }

  const openSuggester = (): PurposeSuggester => {
    const cfg = config()
    return deps.suggester
      ? deps.suggester(cfg)
      : buildSuggester(createLogger({ level: cfg.logLevel, file: cfg.logFile }))
  }

  const withRuntime = async (fn: (rt: Runtime) => Promise<void>): Promise<void> => {
    const rt = openRuntime()
    try {
      await fn(rt)
    } finally {
      rt.close()
    }
  }

  const program = new Command()
  program
    .name('pkgscout')
    .description('Find packages across pacman, the AUR, apt, dnf, Flatpak and Snap')
    .version('0.1.0')

  // ---- search command ----
  program
    .command('search <query...>')
    .description('Search every package source available on this system')
    .option('-p, --prefer <source>', `source that wins duplicate names (${SOURCE_NAMES.join(', ')})`, parseSource)
    .option('-l, --limit <n>', 'max results', parsePositiveInt)
    .addOption(new Option('-o, --output <fmt>', 'output format').choices(['json', 'markdown']).default('json'))
    .option('--no-cache', 'bypass the result cache for this query')
    .action(async (words: string[], opts: SearchCliOptions) => {
      await withRuntime(async (rt) => {
        // Ctrl-C abandons sources still running; the others are still reported
        const controller = new AbortController()
        const onInterrupt = (): void => controller.abort()
        process.once('SIGINT', onInterrupt)
        try {
          const response = await rt.engine.search(words.join(' '), {
            preferSource: opts.prefer,
            limit: opts.limit,
            useCache: opts.cache,
            signal: controller.signal,
          })
          const formatter = opts.output === 'markdown'
            ? new MarkdownFormatter({ aurHelper: rt.config.aurHelper })
            : new JsonFormatter({ aurHelper: rt.config.aurHelper })
          write(formatter.format(response))
        } finally {
          process.off('SIGINT', onInterrupt)
        }
      })
    })

  // ---- suggestion commands ----
  program
    .command('suggest <purpose...>')
    .description('Suggest apps for what you want to do, e.g. "edit videos"')
    .option('-l, --limit <n>', 'max purposes', parsePositiveInt, 5)
    .action((words: string[], opts: { limit: number }) => {
      write(JSON.stringify(openSuggester().suggest(words.join(' '), opts.limit), null, 2))
    })

  program
    .command('purposes')
    .description('List the purposes that suggest understands')
    .action(() => {
      write(openSuggester().purposes().join('\n'))
    })

  // ---- completion commands ----
  program
    .command('complete <prefix>')
    .description('Print package name completions, one per line')
    .addOption(
      new Option('-c, --context <context>', 'what the name is being completed for')
        .choices(['install', 'remove', 'search'])
        .default('install'),
    )
    .option('-l, --limit <n>', 'max completions', parsePositiveInt, 10)
    .action((prefix: string, opts: CompleteCliOptions) => {
      const text = openCompletion().completionText(prefix, opts.context, opts.limit)
      if (text) write(text)
    })

  program
    .command('record <name>')
    .description('Record that a package was used, to rank it higher in completions')
    .action((name: string) => {
      const completion = openCompletion()
      completion.recordUsage(name)
      completion.flush()
    })

  program
    .command('completion')
    .description('Print a shell completion script')
    .addArgument(program.createArgument('<shell>', 'bash or zsh').choices(SHELLS))
    .action((shell: Shell) => {
      write(completionScript(shell))
    })

  // ---- cache sub-commands ----
  const cacheCmd = program.command('cache').description('Manage the result cache')

  cacheCmd
    .command('stats')
    .description('Show cache statistics')
    .action(async () => {
      await withRuntime(async (rt) => {
        write(JSON.stringify(await rt.cache.stats(), null, 2))
      })
    })

  cacheCmd
    .command('clear')
    .description('Remove cached results')
    .option('-s, --source <source>', 'only entries from this source', parseSource)
    .action(async (opts: { source?: SourceName }) => {
      await withRuntime(async (rt) => {
        write(JSON.stringify({ deleted: await rt.cache.clear(opts.source) }, null, 2))
      })
    })

  cacheCmd
    .command('invalidate <query...>')
    .description('Remove cached results for one query')
    .option('-s, --source <source>', 'only the entry from this source', parseSource)
    .action(async (words: string[], opts: { source?: SourceName }) => {
      await withRuntime(async (rt) => {
        write(JSON.stringify({ deleted: await rt.cache.invalidate(words.join(' '), opts.source) }, null, 2))
      })
    })

  cacheCmd
    .command('sweep')
    .description('Remove expired entries now')
    .action(async () => {
      await withRuntime(async (rt) => {
        write(JSON.stringify({ removed: await rt.cache.sweep() }, null, 2))
      })
    })

  // ---- stats command ----
  program
    .command('stats')
    .description('Show per-source request metrics')
    .option('--since <hours>', 'hours to look back', parsePositiveInt, 24)
    .action(async (opts: { since: number }) => {
      await withRuntime(async (rt) => {
        const stats = await rt.metrics.stats(opts.since * 3600)
        const formatted = stats.map((s) => ({
          ...s,
          cacheHitRate: `${(s.cacheHitRate * 100).toFixed(0)}%`,
          p50: `${s.p50}ms`,
          p95: `${s.p95}ms`,
          p99: `${s.p99}ms`,
        }))
        write(JSON.stringify(formatted, null, 2))
      })
    })

  // ---- mcp-serve command ----
  program
    .command('mcp-serve')
    .description('Start MCP server (stdio transport)')
    .action(async () => {
      const { startMcpServer } = await import('../mcp/server.js')
      await startMcpServer(config())
    })

  return program
}

function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.')
  return n
}

function parseSource(value: string): SourceName {
  if (!isSourceName(value)) throw new InvalidArgumentError(`Expected one of: ${SOURCE_NAMES.join(', ')}.`)
  return value
}

function isMain(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

// Direct entrypoint - only runs when file is executed directly
if (isMain()) {
  buildCli()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      process.stderr.write(`pkgscout: ${e instanceof Error ? e.message : String(e)}\n`)
      process.exit(1)
    })
}
