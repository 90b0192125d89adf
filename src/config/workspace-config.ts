/**
 * Workspace configuration.
 *
 * Sources, lowest to highest priority:
 *   1. Built-in defaults (the conventional layout of an agent workspace)
 *   2. workspace.config.json at the workspace root (validated with zod)
 *   3. Environment variables (WORKSPACE_SKILLS_DIRS, WORKSPACE_HOOK_COMMAND, ...)
 */

import { readFileSync } from 'node:fs'
import { isAbsolute, join, resolve } from 'node:path'
import * as z from 'zod'
import { ConfigError, errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'

const log = createLogger('config')

export const CONFIG_FILE_NAME = 'workspace.config.json'

/* ------------------------------------------------------------------ */
/*  Schema                                                             */
/* ------------------------------------------------------------------ */

const severitySettingSchema = z.enum(['error', 'warning', 'off'])

const repoSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1).optional(),
})

const rulesSchema = z.object({
  allow: z.array(z.string()).optional(),
  deny: z.array(z.string()).optional(),
  severity: z.record(z.string(), severitySettingSchema).optional(),
})

const configFileSchema = z.strictObject({
  $schema: z.string().optional(),
  skillsDirs: z.array(z.string().min(1)).optional(),
  miseFile: z.string().min(1).optional(),
  miseTaskDirs: z.array(z.string().min(1)).optional(),
  hooksDir: z.string().min(1).optional(),
  requiredHooks: z.array(z.string().min(1)).optional(),
  hookCommand: z.string().min(1).optional(),
  memoryDirs: z.array(z.string().min(1)).optional(),
  docs: z.array(z.string().min(1)).optional(),
  docsIgnore: z.array(z.string()).optional(),
  repos: z.array(repoSchema).optional(),
  rules: rulesSchema.optional(),
})

export type SeveritySetting = z.infer<typeof severitySettingSchema>
export type ConfigFile = z.infer<typeof configFileSchema>

export interface RepoConfig {
  name: string
  /** Absolute path of the repository checkout */
  path: string
}

export interface RulesConfig {
  allow: string[]
  deny: string[]
  severity: Record<string, SeveritySetting>
}

export interface WorkspaceConfig {
  /** Absolute workspace root */
  root: string
  skillsDirs: string[]
  miseFile: string
  miseTaskDirs: string[]
  hooksDir: string
  requiredHooks: string[]
  hookCommand: string
  memoryDirs: string[]
  docs: string[]
  docsIgnore: string[]
  repos: RepoConfig[]
  rules: RulesConfig
  skillMaxBodyLines: number
  skillDescriptionMax: number
  /** Path of the config file that was loaded, if any */
  configFile: string | null
}

export const DEFAULTS = {
  skillsDirs: ['.github/skills'],
  miseFile: 'mise.toml',
  miseTaskDirs: ['.mise/tasks', 'mise-tasks'],
  hooksDir: '.githooks',
  requiredHooks: ['pre-commit', 'pre-push'],
  hookCommand: 'drift',
  memoryDirs: ['.serena/memories'],
  docs: ['*.md', 'docs/**/*.md', '.github/**/*.md'],
  docsIgnore: ['node_modules/**', '**/node_modules/**'],
  skillMaxBodyLines: 500,
  skillDescriptionMax: 1024,
} as const

/* ------------------------------------------------------------------ */
/*  Environment helpers                                                */
/* ------------------------------------------------------------------ */

type Env = Record<string, string | undefined>

function parseIntEnv(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]
  if (!raw) return fallback
  const value = Number.parseInt(raw, 10)
  if (!Number.isFinite(value)) return fallback
  return Math.max(min, value)
}

function parseListEnv(env: Env, name: string): string[] | undefined {
  const raw = env[name]
  if (!raw) return undefined
  const items = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
  return items.length > 0 ? items : undefined
}

/* ------------------------------------------------------------------ */
/*  Loading                                                            */
/* ------------------------------------------------------------------ */

/**
 * Read and validate workspace.config.json. Returns null when the file does not exist.
 */
export function readConfigFile(root: string): { file: string; data: ConfigFile } | null {
  const file = join(root, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = readFileSync(file, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
    throw new ConfigError(`Cannot read ${file}: ${errorMessage(err)}`, file)
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${file}: ${errorMessage(err)}`, file)
  }

  const result = configFileSchema.safeParse(json)
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`,
    )
    throw new ConfigError(`Invalid configuration in ${file}`, file, issues)
  }
  return { file, data: result.data }
}

/**
 * Resolve the effective configuration for a workspace root.
 */
export function loadWorkspaceConfig(root: string, env: Env = process.env): WorkspaceConfig {
  const absRoot = resolve(root)
  const loaded = readConfigFile(absRoot)
  const file = loaded?.data ?? {}

  if (loaded) log.debug(`Loaded ${loaded.file}`)

  const repos = (file.repos ?? []).map((repo) => ({
    name: repo.name,
    path: resolveRepoPath(absRoot, repo.name, repo.path),
  }))

  return {
    root: absRoot,
    skillsDirs: parseListEnv(env, 'WORKSPACE_SKILLS_DIRS') ?? file.skillsDirs ?? [...DEFAULTS.skillsDirs],
    miseFile: file.miseFile ?? DEFAULTS.miseFile,
    miseTaskDirs: file.miseTaskDirs ?? [...DEFAULTS.miseTaskDirs],
    hooksDir: file.hooksDir ?? DEFAULTS.hooksDir,
    requiredHooks: file.requiredHooks ?? [...DEFAULTS.requiredHooks],
    hookCommand: env.WORKSPACE_HOOK_COMMAND?.trim() || file.hookCommand || DEFAULTS.hookCommand,
    memoryDirs: file.memoryDirs ?? [...DEFAULTS.memoryDirs],
    docs: file.docs ?? [...DEFAULTS.docs],
    docsIgnore: file.docsIgnore ?? [...DEFAULTS.docsIgnore],
    repos,
    rules: {
      allow: file.rules?.allow ?? [],
      deny: file.rules?.deny ?? [],
      severity: file.rules?.severity ?? {},
    },
    skillMaxBodyLines: parseIntEnv(env, 'SKILL_MAX_BODY_LINES', DEFAULTS.skillMaxBodyLines, 1),
    skillDescriptionMax: parseIntEnv(env, 'SKILL_DESCRIPTION_MAX', DEFAULTS.skillDescriptionMax, 1),
    configFile: loaded?.file ?? null,
  }
}

/** Sibling repositories live next to the workspace unless a path is given. */
function resolveRepoPath(root: string, name: string, path: string | undefined): string {
  if (!path) return resolve(root, '..', name)
  return isAbsolute(path) ? path : resolve(root, path)
}
