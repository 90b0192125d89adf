/**
 * MCP server: exposes the workspace tools to AI coding agents over stdio.
 *
 * Usage:
 *   agent-workspace mcp --root /path/to/workspace
 *
 * or in an agent's MCP configuration:
 *   { "command": "agent-workspace", "args": ["mcp"] }
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import type { ToolRegistry } from '../core/registry.js'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'

const log = createLogger('mcp')

export interface ServerInfo {
  name: string
  version: string
}

export function createMcpServer(registry: ToolRegistry, info: ServerInfo): McpServer {
  const server = new McpServer(info, { capabilities: { tools: {} } })

  for (const tool of registry.getAll()) {
    server.registerTool(
      tool.name,
      {
        description: `[${tool.category}] ${tool.description}`,
        inputSchema: tool.schema,
      },
      async (args) => {
        try {
          const text = await registry.execute(tool.name, args)
          return { content: [{ type: 'text', text }] }
        } catch (error) {
          return { content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }], isError: true }
        }
      },
    )
  }
  return server
}

export async function startMcpServer(registry: ToolRegistry, info: ServerInfo): Promise<void> {
  const stats = registry.getStats()
  log.info(`Serving ${stats.total} tools`, { categories: stats.categories })

  const server = createMcpServer(registry, info)
  await server.connect(new StdioServerTransport())
  log.info('Running on stdio')
}
