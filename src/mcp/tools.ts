// src/mcp/tools.ts
import { z } from 'zod'
import { SOURCE_NAMES } from '../core/types.js'

export const SearchPackagesInput = z.object({
  query: z.string().min(1).describe(
    'Software to look for, by name or purpose keywords. Examples: "firefox", "video editor", "visual studio code".',
  ),
  prefer_source: z
    .enum(SOURCE_NAMES)
    .optional()
    .describe('When the same package name comes from several sources, keep the one from this source.'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(50)
    .optional()
    .describe('Max results to return (default: 5).'),
  use_cache: z.boolean().optional().describe('Set false to bypass cached results. Default: true.'),
})

export const CompletePackageInput = z.object({
  prefix: z.string().describe('Partial package name, abbreviation ("vsc") or alias ("vscode").'),
  context: z
    .enum(['install', 'remove', 'search'])
    .optional()
    .describe('What the name is for; "remove" favours recently used packages. Default: "install".'),
  limit: z.number().int().min(1).max(50).optional().describe('Max completions (default: 10).'),
})

export const SuggestPackagesInput = z.object({
  purpose: z.string().min(1).describe('What the user wants to do. Examples: "edit videos", "office work", "play games".'),
  limit: z.number().int().min(1).max(20).optional().describe('Max purposes to return (default: 5).'),
})

export const CacheClearInput = z.object({
  source: z.enum(SOURCE_NAMES).optional().describe('Only clear entries from this source. Omit to clear all.'),
})

export const tools = [
  {
    name: 'search_packages',
    description:
      'Search the package sources available on this machine (pacman, AUR, apt, dnf, Flatpak, Snap) and return ' +
      'the best matches, each with name, source, description, relevance score and the command that would install it. ' +
      'failedSources lists sources that could not be queried and why; results from the others are still returned.',
    inputSchema: SearchPackagesInput,
  },
  {
    name: 'complete_package',
    description:
      'Complete a partial package name from the bundled catalog. Understands aliases ("vscode" → visual-studio-code) ' +
      'and abbreviations, and ranks frequently used packages higher.',
    inputSchema: CompletePackageInput,
  },
  {
    name: 'suggest_packages',
    description:
      'Suggest apps for a purpose ("video editing", "coding") from a curated mapping. Use when the user describes ' +
      'a task rather than naming software; available lists the known purposes when nothing matched.',
    inputSchema: SuggestPackagesInput,
  },
  {
    name: 'cache_stats',
    description:
      'Return result-cache statistics (entries, accesses, size, per-source counts) and per-source request metrics ' +
      '(P50/P95/P99 latency, failures, cache hit rate).',
    inputSchema: z.object({}),
  },
  {
    name: 'cache_clear',
    description: 'Clear cached search results, optionally for one source only.',
    inputSchema: CacheClearInput,
  },
] as const
