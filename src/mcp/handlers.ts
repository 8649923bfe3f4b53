// src/mcp/handlers.ts
import type { z } from 'zod'
import type { Runtime } from '../core/engine-factory.js'
import type { CompletionEngine } from '../completion/engine.js'
import { JsonFormatter } from '../results/json.js'
import type { PurposeSuggester } from '../suggest/suggester.js'
import type { SearchPackagesInput, CompletePackageInput, SuggestPackagesInput, CacheClearInput } from './tools.js'

export interface ToolHandlers {
  searchPackages(input: z.infer<typeof SearchPackagesInput>): Promise<string>
  completePackage(input: z.infer<typeof CompletePackageInput>): Promise<string>
  suggestPackages(input: z.infer<typeof SuggestPackagesInput>): Promise<string>
  cacheStats(): Promise<string>
  cacheClear(input: z.infer<typeof CacheClearInput>): Promise<string>
}

export function createHandlers(
  runtime: Runtime,
  completion: CompletionEngine,
  suggester: PurposeSuggester,
): ToolHandlers {
  const formatter = new JsonFormatter({ aurHelper: runtime.config.aurHelper })
  return {
    async searchPackages(input) {
      const response = await runtime.engine.search(input.query, {
        preferSource: input.prefer_source,
        limit: input.limit,
        useCache: input.use_cache,
      })
      return formatter.format(response)
    },

    async completePackage(input) {
      const results = completion.complete(input.prefix, input.context, input.limit)
      return JSON.stringify({ prefix: input.prefix, results }, null, 2)
    },

    async suggestPackages(input) {
      return JSON.stringify(suggester.suggest(input.purpose, input.limit), null, 2)
    },

    async cacheStats() {
      const [cache, metrics] = await Promise.all([runtime.cache.stats(), runtime.metrics.stats()])
      return JSON.stringify({ cache, metrics }, null, 2)
    },

    async cacheClear(input) {
      const deleted = await runtime.cache.clear(input.source)
      return JSON.stringify({ deleted })
    },
  }
}
