/**
 * Workspace tools: mise tasks, hygiene checks, memory notes and sibling repo status.
 */

import * as z from 'zod'
import { type Tool, defineTool } from '../core/types.js'
import { formatReport, loadWorkspace, mergePolicies, runChecks } from '../lint/index.js'
import { listMemories } from '../memory/memories.js'
import { loadMiseConfig } from '../mise/catalogue.js'
import { collectRepoStatus } from '../repos/status.js'
import { formatRepoStatus, formatTaskList } from './format.js'

// ============ Schemas ============

const listTasksSchema = z.object({
  includeHidden: z.boolean().optional().describe('Include tasks marked hide = true'),
})

const checkWorkspaceSchema = z.object({
  only: z.array(z.string()).optional().describe('Rule ids, "group:<category>" or "skill/*" to run'),
  skip: z.array(z.string()).optional().describe('Rule ids or groups to skip'),
  format: z.enum(['text', 'json']).optional().describe('Report format (default: text)'),
})

const listMemoriesSchema = z.object({})

const repoStatusSchema = z.object({
  fetch: z.boolean().optional().describe('Run git fetch before reading status'),
})

// ============ Tools ============

export const listTasksTool = defineTool({
  name: 'list_tasks',
  category: 'mise',
  description: 'List the mise tasks of the workspace with descriptions and dependencies.',
  schema: listTasksSchema,
  async execute(args, { config }) {
    const mise = loadMiseConfig(config.root, config.miseFile, config.miseTaskDirs)
    if (mise.exists && mise.error) {
      throw new Error(`Cannot parse ${config.miseFile}: ${mise.error.message}`)
    }
    const tasks = args.includeHidden ? mise.tasks : mise.tasks.filter((t) => !t.hide)
    return formatTaskList(tasks)
  },
})

export const checkWorkspaceTool = defineTool({
  name: 'check_workspace',
  category: 'lint',
  description:
    'Run the workspace hygiene checks (skill front matter, mise task references, git hooks, doc links, memory files).',
  schema: checkWorkspaceSchema,
  async execute(args, { config, scanner, gitFactory }) {
    scanner.invalidateCache()
    const workspace = await loadWorkspace(config, {
      scanner,
      ...(gitFactory ? { git: gitFactory(config.root) } : {}),
    })
    const diagnostics = runChecks(workspace, {
      policy: mergePolicies(config.rules, { allow: args.only ?? [], deny: args.skip ?? [] }),
      severity: config.rules.severity,
    })
    return formatReport(diagnostics, args.format ?? 'text')
  },
})

export const listMemoriesTool = defineTool({
  name: 'list_memories',
  category: 'memory',
  description: 'List the assistant memory notes kept in the workspace.',
  schema: listMemoriesSchema,
  async execute(_args, { config }) {
    const memories = listMemories(config.root, config.memoryDirs)
    if (memories.length === 0) {
      return `No memory files in ${config.memoryDirs.join(', ')}.`
    }
    return memories
      .map((m) =>
        m.error !== undefined
          ? `- ${m.name} (${m.path}, unreadable: ${m.error})`
          : `- ${m.name}${m.title ? `: ${m.title}` : ''} (${m.path}, ${m.size} bytes)`,
      )
      .join('\n')
  },
})

export const repoStatusTool = defineTool({
  name: 'repo_status',
  category: 'repos',
  description: 'Git branch, ahead/behind and working-tree state of the sibling repositories.',
  schema: repoStatusSchema,
  async execute(args, { config, gitFactory }) {
    if (config.repos.length === 0) {
      return 'No repositories configured (add "repos" to workspace.config.json).'
    }
    const statuses = await collectRepoStatus(config.repos, {
      fetch: args.fetch ?? false,
      ...(gitFactory ? { gitFactory } : {}),
    })
    return formatRepoStatus(statuses)
  },
})

export const workspaceTools: Tool[] = [listTasksTool, checkWorkspaceTool, listMemoriesTool, repoStatusTool]
