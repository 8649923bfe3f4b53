// src/mcp/server.ts
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js'
import { zodToJsonSchema } from 'zod-to-json-schema'
import { tools, SearchPackagesInput, CompletePackageInput, SuggestPackagesInput, CacheClearInput } from './tools.js'
import { createHandlers, type ToolHandlers } from './handlers.js'
import { loadConfig, type Config } from '../core/config.js'
import { buildEngine } from '../core/engine-factory.js'
import { buildCompletionEngine } from '../completion/engine.js'
import { buildSuggester } from '../suggest/suggester.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/logger.js'

export function createMcpServer(handlers: ToolHandlers, log: Logger): Server {
  const server = new Server(
    { name: 'pkgscout', version: '0.1.0' },
    { capabilities: { tools: {} } },
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: { ...zodToJsonSchema(t.inputSchema), type: 'object' as const },
    })),
  }))

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params
    log.info({ tool: name }, 'MCP tool call')

    try {
      let result: string
      switch (name) {
        case 'search_packages':
          result = await handlers.searchPackages(SearchPackagesInput.parse(args))
          break
        case 'complete_package':
          result = await handlers.completePackage(CompletePackageInput.parse(args))
          break
        case 'suggest_packages':
          result = await handlers.suggestPackages(SuggestPackagesInput.parse(args))
          break
        case 'cache_stats':
          result = await handlers.cacheStats()
          break
        case 'cache_clear':
          result = await handlers.cacheClear(CacheClearInput.parse(args ?? {}))
          break
        default:
          throw new Error(`Unknown tool: ${name}`)
      }
      return { content: [{ type: 'text' as const, text: result }] }
    } catch (err: unknown) {
      log.error({ tool: name, error: errorMessage(err) }, 'tool error')
      return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
        isError: true,
      }
    }
  })

  return server
}

export async function startMcpServer(config: Config = loadConfig()): Promise<void> {
  const runtime = buildEngine(config)
  const completion = buildCompletionEngine(config.completion, runtime.log)
  const suggester = buildSuggester(runtime.log)
  const server = createMcpServer(createHandlers(runtime, completion, suggester), runtime.log)

  server.onclose = () => {
    completion.flush()
    runtime.close()
  }

  const transport = new StdioServerTransport()
  await server.connect(transport)
  runtime.log.info('MCP server running on stdio')
}
