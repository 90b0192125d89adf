/**
 * Tool definitions shared by the MCP server and the `tools` command.
 * Arguments are described and validated with zod.
 */

import type * as z from 'zod'
import type { WorkspaceConfig } from '../config/workspace-config.js'
import type { GitFactory } from '../git/client.js'
import type { SkillScanner } from '../skills/scanner.js'

/**
 * Execution context handed to every tool.
 */
export interface ToolContext {
  config: WorkspaceConfig
  scanner: SkillScanner
  gitFactory?: GitFactory
}

export type ToolCategory = 'skill' | 'mise' | 'lint' | 'memory' | 'repos'

export interface Tool {
  /** Unique name */
  name: string
  description: string
  /** Argument schema */
  schema: z.ZodType
  /** Arguments are parsed against `schema` before the handler sees them */
  execute: (args: unknown, context: ToolContext) => Promise<string>
  category: ToolCategory
  enabled?: boolean
}

/**
 * Define a tool with a typed handler. The returned tool parses its arguments with the
 * schema, so a bad call fails with the schema's issues before the handler runs.
 */
export function defineTool<T extends z.ZodType>(config: {
  name: string
  description: string
  category: ToolCategory
  schema: T
  enabled?: boolean
  execute: (args: z.output<T>, context: ToolContext) => Promise<string>
}): Tool {
  const { execute, ...rest } = config
  return {
    ...rest,
    execute: (args, context) => execute(config.schema.parse(args), context),
  }
}
