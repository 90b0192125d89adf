/**
 * Tool registry: registration, validation-aware execution, and usage metrics.
 */

import * as z from 'zod'
import { createLogger } from '../infra/logger.js'
import type { Tool, ToolContext } from './types.js'

const log = createLogger('registry')

/* ------------------------------------------------------------------ */
/*  Tool metrics                                                       */
/* ------------------------------------------------------------------ */

export interface ToolMetricsEntry {
  calls: number
  errors: number
  totalDurationMs: number
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map()
  private metrics: Map<string, ToolMetricsEntry> = new Map()

  constructor(private context: ToolContext) {}

  /* ---------------------------------------------------------------- */
  /*  Registration                                                     */
  /* ---------------------------------------------------------------- */

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      log.warn(`Tool "${tool.name}" is already registered, overwriting`)
    }
    this.tools.set(tool.name, tool)
    log.debug(`Registered tool: ${tool.name}`)
  }

  registerMany(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool)
    }
  }

  /* ---------------------------------------------------------------- */
  /*  Retrieval                                                        */
  /* ---------------------------------------------------------------- */

  get(name: string): Tool | undefined {
    return this.tools.get(name)
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values()).filter((t) => t.enabled !== false)
  }

  getByCategory(category: string): Tool[] {
    return this.getAll().filter((t) => t.category === category)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  /* ---------------------------------------------------------------- */
  /*  Execution                                                        */
  /* ---------------------------------------------------------------- */

  /**
   * @throws when the tool is unknown or disabled, when the arguments fail validation
   *         (one line per issue), or when the tool itself fails
   */
  async execute(name: string, args: unknown): Promise<string> {
    const tool = this.get(name)
    if (!tool || tool.enabled === false) {
      throw new Error(`Tool "${name}" not found`)
    }

    log.debug(`Executing: ${name}`, { args: JSON.stringify(args ?? {}).slice(0, 100) })

    const start = Date.now()
    try {
      const result = await tool.execute(args ?? {}, this.context)
      this.recordMetrics(name, Date.now() - start, false)
      return result
    } catch (error) {
      this.recordMetrics(name, Date.now() - start, true)
      if (error instanceof z.ZodError) {
        const issues = error.issues
          .map((i) => `  - ${i.path.length > 0 ? i.path.join('.') : '(args)'}: ${i.message}`)
          .join('\n')
        log.warn(`Invalid arguments for ${name}`)
        throw new Error(`Invalid arguments for ${name}:\n${issues}`)
      }
      const message = error instanceof Error ? error.message : String(error)
      log.error(`Error executing ${name}: ${message}`)
      throw error
    }
  }

  /* ---------------------------------------------------------------- */
  /*  Metrics                                                          */
  /* ---------------------------------------------------------------- */

  private recordMetrics(name: string, durationMs: number, isError: boolean): void {
    const entry = this.metrics.get(name) ?? { calls: 0, errors: 0, totalDurationMs: 0 }
    entry.calls++
    if (isError) entry.errors++
    entry.totalDurationMs += durationMs
    this.metrics.set(name, entry)
  }

  /**
   * Usage metrics for all tools, or for one.
   */
  getMetrics(name?: string): Record<string, ToolMetricsEntry> {
    if (name) {
      const entry = this.metrics.get(name)
      return entry ? { [name]: { ...entry } } : {}
    }
    return Object.fromEntries([...this.metrics].map(([key, entry]) => [key, { ...entry }]))
  }

  /* ---------------------------------------------------------------- */
  /*  Context & stats                                                  */
  /* ---------------------------------------------------------------- */

  getContext(): ToolContext {
    return { ...this.context }
  }

  getStats(): { total: number; categories: Record<string, number> } {
    const tools = this.getAll()
    const categories: Record<string, number> = {}

    for (const tool of tools) {
      categories[tool.category] = (categories[tool.category] ?? 0) + 1
    }

    return { total: tools.length, categories }
  }
}
