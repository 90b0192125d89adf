import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { afterEach, describe, expect, it } from 'vitest'
import { loadWorkspaceConfig } from '../config/workspace-config.js'
import { ToolRegistry } from '../core/registry.js'
import { SkillScanner } from '../skills/scanner.js'
import { cleanupWorkspaces, makeWorkspace, skillMd } from '../testing/workspace.js'
import { getAllTools } from '../tools/index.js'
import { createMcpServer } from './server.js'

afterEach(() => {
  cleanupWorkspaces()
})

async function connect(): Promise<Client> {
  const root = makeWorkspace({ '.github/skills/deploy/SKILL.md': skillMd('deploy', 'Ship the API to staging') })
  const registry = new ToolRegistry({ config: loadWorkspaceConfig(root, {}), scanner: new SkillScanner() })
  registry.registerMany(getAllTools())

  const server = createMcpServer(registry, { name: 'agent-workspace', version: '0.0.0-test' })
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
  const client = new Client({ name: 'test-client', version: '0.0.0' })
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)])
  return client
}

describe('createMcpServer', () => {
  it('lists every registered tool', async () => {
    const client = await connect()
    const { tools } = await client.listTools()

    expect(tools.map((t) => t.name)).toEqual([
      'list_skills',
      'read_skill',
      'find_skills',
      'create_skill',
      'list_tasks',
      'check_workspace',
      'list_memories',
      'repo_status',
    ])
    expect(tools[0]?.description).toBe('[skill] List the Agent Skills defined in the workspace with their descriptions.')
    await client.close()
  })

  it('calls tools and returns their text', async () => {
    const client = await connect()
    const result = await client.callTool({ name: 'list_skills', arguments: {} })

    expect(result).toMatchObject({
      content: [{ type: 'text', text: 'Skills (1):\n\n- **deploy**: Ship the API to staging' }],
    })
    await client.close()
  })

  it('returns tool failures as error results', async () => {
    const client = await connect()
    const result = await client.callTool({ name: 'read_skill', arguments: { name: 'missing' } })

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: 'text', text: 'Error: Skill "missing" not found' }],
    })
    await client.close()
  })
})
