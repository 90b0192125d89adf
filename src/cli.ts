/**
 * Command-line parsing and command implementations. The entry point (index.ts) loads
 * the environment and maps the returned exit code onto the process.
 */

import { readFile } from 'node:fs/promises'
import { type WorkspaceConfig, loadWorkspaceConfig } from './config/workspace-config.js'
import { ToolRegistry } from './core/registry.js'
import type { GitFactory } from './git/client.js'
import { inspectHooks } from './hooks/inspector.js'
import { UsageError } from './infra/errors.js'
import { setLogLevel } from './infra/logger.js'
import {
  ALL_RULES,
  type ReportFormat,
  type SnapshotOptions,
  formatReport,
  isReportFormat,
  loadWorkspace,
  mergePolicies,
  runChecks,
  summarize,
  toRelative,
  unknownRuleEntries,
} from './lint/index.js'
import { startMcpServer } from './mcp/server.js'
import { listMemories } from './memory/memories.js'
import { loadMiseConfig } from './mise/index.js'
import { collectRepoStatus } from './repos/status.js'
import { SkillScanner, createSkill, findSkills } from './skills/index.js'
import { getAllTools } from './tools/index.js'
import { formatHooks, formatRepoStatus, formatTaskList } from './tools/format.js'

export const VERSION = '1.0.0'
export const NAME = 'agent-workspace'

export interface CLIOptions {
  root?: string
  format?: ReportFormat
  only?: string[]
  skip?: string[]
  strict?: boolean
  fetch?: boolean
  description?: string
  license?: string
  limit?: number
  verbose?: boolean
  quiet?: boolean
  help?: boolean
  version?: boolean
}

export interface ParsedArgs {
  command: string
  positionals: string[]
  options: CLIOptions
}

const COMMANDS = new Set([
  'check',
  'skills',
  'skill',
  'new-skill',
  'tasks',
  'hooks',
  'memories',
  'status',
  'tools',
  'mcp',
  'help',
])

const splitList = (value: string): string[] =>
  value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)

export function parseArgs(args: string[]): ParsedArgs {
  const options: CLIOptions = {}
  const positionals: string[] = []
  let command: string | undefined

  const valueOf = (flag: string, index: number): string => {
    const value = args[index]
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`Option ${flag} needs a value`)
    }
    return value
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''

    if (arg === '-h' || arg === '--help') {
      options.help = true
    } else if (arg === '-v' || arg === '--version') {
      options.version = true
    } else if (arg === '--root') {
      options.root = valueOf(arg, ++i)
    } else if (arg === '--format') {
      const format = valueOf(arg, ++i)
      if (!isReportFormat(format)) throw new UsageError(`Unknown format "${format}" (text, json)`)
      options.format = format
    } else if (arg === '--only') {
      options.only = [...(options.only ?? []), ...splitList(valueOf(arg, ++i))]
    } else if (arg === '--skip') {
      options.skip = [...(options.skip ?? []), ...splitList(valueOf(arg, ++i))]
    } else if (arg === '--strict') {
      options.strict = true
    } else if (arg === '--fetch') {
      options.fetch = true
    } else if (arg === '-d' || arg === '--description') {
      options.description = valueOf(arg, ++i)
    } else if (arg === '--license') {
      options.license = valueOf(arg, ++i)
    } else if (arg === '-n' || arg === '--limit') {
      const raw = valueOf(arg, ++i)
      const limit = Number.parseInt(raw, 10)
      if (!Number.isFinite(limit) || limit < 1) throw new UsageError(`Invalid limit "${raw}"`)
      options.limit = limit
    } else if (arg === '--verbose') {
      options.verbose = true
    } else if (arg === '--quiet') {
      options.quiet = true
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`)
    } else if (command === undefined) {
      command = arg
    } else {
      positionals.push(arg)
    }
  }

  const resolved = command ?? 'check'
  if (!COMMANDS.has(resolved)) throw new UsageError(`Unknown command: ${resolved}`)
  return { command: resolved, positionals, options }
}

export function helpText(): string {
  return `
${NAME} v${VERSION}
Hygiene checks, skill discovery and an MCP server for agent workspaces

Usage:
  ${NAME} [command] [options]

Commands:
  check                     Run workspace checks (default)
  skills [query]            List skills, or rank them for a task description
  skill <name>              Print a skill's SKILL.md
  new-skill <name> -d <text>  Scaffold a skill in the first skills directory
  tasks                     List mise tasks
  hooks                     Show git hook status
  memories                  List assistant memory files
  status [--fetch]          Git status of the sibling repositories
  tools                     List MCP tools
  mcp                       Start the MCP server (stdio)

Options:
  --root <path>             Workspace root (default: $WORKSPACE_ROOT or cwd)
  --format <text|json>      Report format for check
  --only <rules>            Comma-separated rule ids, group:<category> or prefix*
  --skip <rules>            Rules to skip (same syntax)
  --strict                  Warnings fail the check too
  --fetch                   git fetch before status
  -d, --description <text>  Description for new-skill
  --license <name>          License for new-skill
  -n, --limit <n>           Maximum skills for a query (default: 5)
  --verbose | --quiet       Log level debug | error
  -h, --help                Show this help message
  -v, --version             Show version

Environment Variables:
  WORKSPACE_ROOT            Workspace root
  WORKSPACE_SKILLS_DIRS     Comma-separated skills directories
  WORKSPACE_HOOK_COMMAND    Command the git hooks must run (default: drift)
  SKILL_MAX_BODY_LINES      skill/body-length limit (default: 500)
  SKILL_DESCRIPTION_MAX     Description length limit (default: 1024)
  LOG_LEVEL                 debug | info | warn | error (default: info)
  LOG_FILE                  false disables ~/.agent-workspace/logs

Configuration:
  workspace.config.json at the workspace root (skillsDirs, miseFile, hooksDir,
  requiredHooks, hookCommand, memoryDirs, docs, repos, rules)
`
}

/* ------------------------------------------------------------------ */
/*  Commands                                                           */
/* ------------------------------------------------------------------ */

export interface CommandIO {
  out: (text: string) => void
  env?: Record<string, string | undefined>
  cwd?: string
  /** Git access for hooks-path checks and repo status; defaults to simple-git */
  gitFactory?: GitFactory
}

/**
 * Run a parsed command. Returns the process exit code.
 */
export async function runCommand(parsed: ParsedArgs, io: CommandIO): Promise<number> {
  const { command, positionals, options } = parsed

  if (options.verbose) setLogLevel('debug')
  if (options.quiet) setLogLevel('error')

  if (options.version) {
    io.out(`${NAME} v${VERSION}`)
    return 0
  }
  if (options.help || command === 'help') {
    io.out(helpText())
    return 0
  }

  const env = io.env ?? process.env
  const config = loadWorkspaceConfig(options.root ?? env.WORKSPACE_ROOT ?? io.cwd ?? process.cwd(), env)
  const scanner = new SkillScanner({ descriptionMax: config.skillDescriptionMax })

  switch (command) {
    case 'check':
      return check(config, scanner, options, io)

    case 'skills': {
      const { skills } = scanner.scan(config.root, config.skillsDirs)
      const query = positionals.join(' ').trim()
      if (!query) {
        io.out(
          skills.length === 0
            ? `No skills found in ${config.skillsDirs.join(', ')}`
            : skills.map((s) => `${s.name}  ${s.description}`).join('\n'),
        )
        return 0
      }
      const matches = findSkills(query, skills, options.limit ? { limit: options.limit } : {})
      io.out(
        matches.length === 0
          ? `No skills match "${query}"`
          : matches
              .map((m) => `${m.skill.name}  (${m.explicit ? 'explicit' : m.score})  ${m.skill.description}`)
              .join('\n'),
      )
      return 0
    }

    case 'skill': {
      const name = requirePositional(positionals, 'skill <name>')
      const skill = scanner.getSkill(config.root, config.skillsDirs, name)
      io.out(await readFile(skill.location, 'utf-8'))
      return 0
    }

    case 'new-skill': {
      const name = requirePositional(positionals, 'new-skill <name>')
      if (!options.description) throw new UsageError('new-skill needs --description')
      const skillsDir = config.skillsDirs[0]
      if (!skillsDir) throw new UsageError('No skills directory configured')
      const path = createSkill(
        config.root,
        skillsDir,
        {
          name,
          description: options.description,
          ...(options.license ? { license: options.license } : {}),
        },
        { descriptionMax: config.skillDescriptionMax },
      )
      io.out(`Created ${toRelative(config.root, path)}`)
      return 0
    }

    case 'tasks': {
      const mise = loadMiseConfig(config.root, config.miseFile, config.miseTaskDirs)
      if (mise.exists && mise.error) {
        io.out(`Cannot parse ${config.miseFile}: ${mise.error.message}`)
        return 1
      }
      io.out(formatTaskList(mise.tasks.filter((t) => !t.hide)))
      return 0
    }

    case 'hooks':
      io.out(formatHooks(inspectHooks(config.root, config.hooksDir, config.requiredHooks, config.hookCommand)))
      return 0

    case 'memories': {
      const memories = listMemories(config.root, config.memoryDirs)
      io.out(
        memories.length === 0
          ? `No memory files in ${config.memoryDirs.join(', ')}`
          : memories
              .map((m) => `${m.name}  ${m.error !== undefined ? `(unreadable: ${m.error})` : (m.title ?? '')}`.trimEnd())
              .join('\n'),
      )
      return 0
    }

    case 'status': {
      if (config.repos.length === 0) {
        io.out('No repositories configured (add "repos" to workspace.config.json)')
        return 0
      }
      const statuses = await collectRepoStatus(config.repos, {
        fetch: options.fetch ?? false,
        ...(io.gitFactory ? { gitFactory: io.gitFactory } : {}),
      })
      io.out(formatRepoStatus(statuses))
      return statuses.some((s) => s.state === 'error') ? 1 : 0
    }

    case 'tools': {
      const registry = createToolRegistry(config, scanner, io.gitFactory)
      const stats = registry.getStats()
      const lines: string[] = []
      for (const category of Object.keys(stats.categories)) {
        lines.push(`[${category.toUpperCase()}]`)
        for (const tool of registry.getByCategory(category)) {
          lines.push(`  ${tool.name}  ${tool.description}`)
        }
      }
      lines.push('', `Total: ${stats.total} tools`)
      io.out(lines.join('\n'))
      return 0
    }

    case 'mcp':
      await startMcpServer(createToolRegistry(config, scanner, io.gitFactory), { name: NAME, version: VERSION })
      return 0

    default:
      throw new UsageError(`Unknown command: ${command}`)
  }
}

async function check(
  config: WorkspaceConfig,
  scanner: SkillScanner,
  options: CLIOptions,
  io: CommandIO,
): Promise<number> {
  const unknown = unknownRuleEntries(ALL_RULES, [...(options.only ?? []), ...(options.skip ?? [])])
  if (unknown.length > 0) throw new UsageError(`Unknown rule: ${unknown.join(', ')}`)

  const snapshotOptions: SnapshotOptions = { scanner }
  if (io.gitFactory) snapshotOptions.git = io.gitFactory(config.root)

  const workspace = await loadWorkspace(config, snapshotOptions)
  const diagnostics = runChecks(workspace, {
    policy: mergePolicies(config.rules, { allow: options.only ?? [], deny: options.skip ?? [] }),
    severity: config.rules.severity,
  })
  io.out(formatReport(diagnostics, options.format ?? 'text'))

  const { errors, warnings } = summarize(diagnostics)
  return errors > 0 || (options.strict && warnings > 0) ? 1 : 0
}

export function createToolRegistry(
  config: WorkspaceConfig,
  scanner: SkillScanner,
  gitFactory?: GitFactory,
): ToolRegistry {
  const registry = new ToolRegistry({ config, scanner, ...(gitFactory ? { gitFactory } : {}) })
  registry.registerMany(getAllTools())
  return registry
}

function requirePositional(positionals: string[], usage: string): string {
  const value = positionals[0]
  if (!value) throw new UsageError(`Usage: ${NAME} ${usage}`)
  return value
}
