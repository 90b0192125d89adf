import { afterEach, describe, expect, it } from 'vitest'
import * as z from 'zod'
import { loadWorkspaceConfig } from '../config/workspace-config.js'
import { SkillScanner } from '../skills/scanner.js'
import { cleanupWorkspaces, makeWorkspace } from '../testing/workspace.js'
import { ToolRegistry } from './registry.js'
import { defineTool } from './types.js'

afterEach(() => {
  cleanupWorkspaces()
})

const repeatTool = defineTool({
  name: 'repeat',
  category: 'skill',
  description: 'Repeat a word',
  schema: z.object({ word: z.string(), times: z.number().int().min(1) }),
  async execute({ word, times }) {
    return Array.from({ length: times }, () => word).join(' ')
  },
})

const failingTool = defineTool({
  name: 'fail',
  category: 'lint',
  description: 'Always fails',
  schema: z.object({}),
  async execute() {
    throw new Error('nothing to see')
  },
})

const hiddenTool = defineTool({
  name: 'hidden',
  category: 'lint',
  description: 'Disabled',
  schema: z.object({}),
  enabled: false,
  async execute() {
    return 'never'
  },
})

function createRegistry(): ToolRegistry {
  const config = loadWorkspaceConfig(makeWorkspace(), {})
  const registry = new ToolRegistry({ config, scanner: new SkillScanner() })
  registry.registerMany([repeatTool, failingTool, hiddenTool])
  return registry
}

describe('ToolRegistry', () => {
  it('executes tools with parsed arguments', async () => {
    await expect(createRegistry().execute('repeat', { word: 'hi', times: 3 })).resolves.toBe('hi hi hi')
  })

  it('reports argument errors per field', async () => {
    await expect(createRegistry().execute('repeat', { word: 'hi', times: 0 })).rejects.toThrow(
      /^Invalid arguments for repeat:\n {2}- times: /,
    )
  })

  it('treats disabled tools as unknown', async () => {
    const registry = createRegistry()

    expect(registry.has('hidden')).toBe(true)
    expect(registry.getAll().map((t) => t.name)).toEqual(['repeat', 'fail'])
    await expect(registry.execute('hidden', {})).rejects.toThrow('Tool "hidden" not found')
    await expect(registry.execute('nope', {})).rejects.toThrow('Tool "nope" not found')
  })

  it('records calls and errors', async () => {
    const registry = createRegistry()
    await registry.execute('repeat', { word: 'a', times: 1 })
    await expect(registry.execute('fail', {})).rejects.toThrow('nothing to see')
    await expect(registry.execute('repeat', {})).rejects.toThrow()

    const metrics = registry.getMetrics()
    expect(metrics.repeat).toMatchObject({ calls: 2, errors: 1 })
    expect(metrics.fail).toMatchObject({ calls: 1, errors: 1 })
    expect(registry.getMetrics('hidden')).toEqual({})
  })

  it('groups enabled tools by category', () => {
    const registry = createRegistry()

    expect(registry.getStats()).toEqual({ total: 2, categories: { skill: 1, lint: 1 } })
    expect(registry.getByCategory('lint').map((t) => t.name)).toEqual(['fail'])
  })
})
