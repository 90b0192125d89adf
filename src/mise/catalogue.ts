/**
 * mise task catalogue: tasks declared in mise.toml plus file tasks from the task directories.
 */

import fs from 'node:fs'
import { basename, extname, join, relative, resolve, sep } from 'node:path'
import { TomlError, parse } from 'smol-toml'
import * as z from 'zod'
import { isRecord } from '../skills/frontmatter.js'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'
import type { MiseConfig, MiseTask, TaskError } from './types.js'

const log = createLogger('mise')

/* ------------------------------------------------------------------ */
/*  Schemas                                                            */
/* ------------------------------------------------------------------ */

const stringOrList = z.union([z.string(), z.array(z.string())])

const taskTableSchema = z.object({
  run: stringOrList.optional(),
  file: z.string().optional(),
  description: z.string().optional(),
  depends: stringOrList.optional(),
  depends_post: stringOrList.optional(),
  wait_for: stringOrList.optional(),
  alias: stringOrList.optional(),
  dir: z.string().optional(),
  hide: z.boolean().optional(),
})

type TaskTable = z.infer<typeof taskTableSchema>

const toList = (value: string | string[] | undefined): string[] =>
  value === undefined ? [] : Array.isArray(value) ? value : [value]

/* ------------------------------------------------------------------ */
/*  Loading                                                            */
/* ------------------------------------------------------------------ */

export function loadMiseConfig(root: string, miseFile: string, taskDirs: string[]): MiseConfig {
  const file = resolve(root, miseFile)
  const taskErrors: TaskError[] = []
  const fileTasks = taskDirs.flatMap((dir) => loadFileTasks(resolve(root, dir), taskErrors))

  let raw: string
  try {
    raw = fs.readFileSync(file, 'utf-8')
  } catch (err) {
    log.debug(`No mise config at ${file}`, { error: errorMessage(err) })
    return { exists: false, file, tasks: sortTasks(fileTasks), taskErrors }
  }

  let doc: Record<string, unknown>
  try {
    doc = parse(raw)
  } catch (err) {
    const error =
      err instanceof TomlError
        ? { message: err.message.split('\n')[0] ?? err.message, line: err.line }
        : { message: errorMessage(err) }
    log.warn(`Cannot parse ${file}`, { error: error.message })
    return { exists: true, file, error, tasks: sortTasks(fileTasks), taskErrors }
  }

  const tomlTasks = parseTaskTables(doc.tasks, file, taskErrors)
  log.debug(`Loaded ${tomlTasks.length} toml task(s), ${fileTasks.length} file task(s)`)

  // toml definitions win over file tasks of the same name
  const names = new Set(tomlTasks.map((t) => t.name))
  const tasks = [...tomlTasks, ...fileTasks.filter((t) => !names.has(t.name))]
  return { exists: true, file, tasks: sortTasks(tasks), taskErrors }
}

export function parseTaskTables(tasks: unknown, file: string, errors: TaskError[]): MiseTask[] {
  if (tasks === undefined) return []
  if (!isRecord(tasks)) {
    errors.push({ task: '(tasks)', message: '[tasks] must be a table', location: file })
    return []
  }

  const result: MiseTask[] = []
  for (const [name, value] of Object.entries(tasks)) {
    const shorthand = stringOrList.safeParse(value)
    if (shorthand.success) {
      result.push(buildTask(name, { run: shorthand.data }, file))
      continue
    }

    const table = taskTableSchema.safeParse(value)
    if (!table.success) {
      const details = table.error.issues
        .map((i) => `${i.path.length > 0 ? i.path.join('.') : name}: ${i.message}`)
        .join('; ')
      errors.push({ task: name, message: `invalid task definition (${details})`, location: file })
      continue
    }
    result.push(buildTask(name, table.data, file))
  }
  return result
}

function buildTask(name: string, table: TaskTable, location: string): MiseTask {
  return {
    name,
    description: table.description ?? '',
    run: table.file ? [table.file] : toList(table.run),
    depends: toList(table.depends),
    dependsPost: toList(table.depends_post),
    waitFor: toList(table.wait_for),
    aliases: toList(table.alias),
    ...(table.dir ? { dir: table.dir } : {}),
    hide: table.hide ?? false,
    source: 'toml',
    location,
  }
}

/* ------------------------------------------------------------------ */
/*  File tasks                                                          */
/* ------------------------------------------------------------------ */

const MISE_DIRECTIVE = /^#\s*\[?mise\]?\s+([\w-]+)\s*=\s*(.+)$/i

/**
 * Files under a task directory, named by their relative path with `:` separators and
 * the extension dropped (`lint/docs.sh` -> `lint:docs`). `_default` names its directory.
 */
export function loadFileTasks(dir: string, errors: TaskError[]): MiseTask[] {
  const files = listFiles(dir)
  const tasks: MiseTask[] = []

  for (const file of files) {
    const rel = relative(dir, file)
    const segments = rel.split(sep)
    const last = segments.pop() ?? ''
    const stem = basename(last, extname(last))
    if (stem !== '_default') segments.push(stem)
    const name = segments.join(':')
    if (!name) continue

    let content: string
    try {
      content = fs.readFileSync(file, 'utf-8')
    } catch (err) {
      errors.push({ task: name, message: `cannot read file task: ${errorMessage(err)}`, location: file })
      continue
    }

    const table: TaskTable = {}
    for (const line of content.split(/\r?\n/)) {
      const match = line.match(MISE_DIRECTIVE)
      if (!match?.[1] || !match[2]) continue
      const directive = parseDirective(match[1], match[2])
      if (directive === undefined) {
        errors.push({ task: name, message: `unparseable directive: ${line.trim()}`, location: file })
        continue
      }
      Object.assign(table, directive)
    }

    const task = buildTask(name, table, file)
    tasks.push({ ...task, run: [], source: 'file' })
  }
  return tasks
}

function parseDirective(key: string, value: string): Partial<TaskTable> | undefined {
  let parsed: Record<string, unknown>
  try {
    parsed = parse(`${key} = ${value}`)
  } catch {
    return undefined
  }
  const result = taskTableSchema.partial().safeParse(parsed)
  return result.success ? result.data : undefined
}

function listFiles(dir: string): string[] {
  let entries: fs.Dirent[]
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true })
  } catch {
    return []
  }

  const files: string[] = []
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue
    const full = join(dir, entry.name)
    if (entry.isDirectory()) files.push(...listFiles(full))
    else if (entry.isFile()) files.push(full)
  }
  return files.sort()
}

function sortTasks(tasks: MiseTask[]): MiseTask[] {
  return [...tasks].sort((a, b) => a.name.localeCompare(b.name))
}
