/**
 * Git hook inspection: the workspace's hooks directory, the hooks it must provide, and
 * whether each hook runs the configured pattern checker.
 */

import fs from 'node:fs'
import { join, resolve } from 'node:path'
import type { GitClient } from '../git/client.js'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'

const log = createLogger('hooks')

export interface HookFile {
  name: string
  /** Absolute path */
  path: string
  required: boolean
  exists: boolean
  executable: boolean
  shebang: string | null
  invokesCommand: boolean
}

export interface HookInspection {
  dir: string
  dirExists: boolean
  command: string
  hooks: HookFile[]
}

export function inspectHooks(
  root: string,
  hooksDir: string,
  requiredHooks: string[],
  command: string,
): HookInspection {
  const dir = resolve(root, hooksDir)

  let present: string[] = []
  let dirExists = false
  try {
    present = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isFile() && !e.name.startsWith('.') && !e.name.endsWith('.sample'))
      .map((e) => e.name)
    dirExists = true
  } catch (err) {
    log.debug(`Hooks directory not readable: ${dir}`, { error: errorMessage(err) })
  }

  const names = [...new Set([...requiredHooks, ...present])].sort()
  const hooks = names.map((name) =>
    inspectHookFile(join(dir, name), name, requiredHooks.includes(name), command),
  )

  return { dir, dirExists, command, hooks }
}

function inspectHookFile(path: string, name: string, required: boolean, command: string): HookFile {
  let stat: fs.Stats
  let content: string
  try {
    stat = fs.statSync(path)
    content = fs.readFileSync(path, 'utf-8')
  } catch {
    return { name, path, required, exists: false, executable: false, shebang: null, invokesCommand: false }
  }

  const firstLine = content.split(/\r?\n/, 1)[0] ?? ''
  return {
    name,
    path,
    required,
    exists: true,
    executable: (stat.mode & 0o111) !== 0,
    shebang: firstLine.startsWith('#!') ? firstLine.slice(2).trim() : null,
    invokesCommand: invokesCommand(content, command),
  }
}

/** Word-boundary match of `command` on a line that is not a shell comment. */
export function invokesCommand(script: string, command: string): boolean {
  const pattern = new RegExp(`(^|[^\\w./-])${escapeRegExp(command)}($|[^\\w-])`)
  return script
    .split(/\r?\n/)
    .some((line) => !line.trimStart().startsWith('#') && pattern.test(line))
}

/**
 * The repository's core.hooksPath: null when unset, undefined outside a git repository.
 */
export async function readHooksPath(
  git: Pick<GitClient, 'checkIsRepo' | 'getConfig'>,
): Promise<string | null | undefined> {
  if (!(await git.checkIsRepo())) return undefined
  const config = await git.getConfig('core.hooksPath')
  return config.value
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
