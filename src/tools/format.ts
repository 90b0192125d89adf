/**
 * Plain-text renderings shared by the CLI and the MCP tools.
 */

import type { HookInspection } from '../hooks/inspector.js'
import type { MiseTask } from '../mise/types.js'
import type { RepoStatus } from '../repos/status.js'

export function formatTaskList(tasks: MiseTask[]): string {
  if (tasks.length === 0) return 'No mise tasks defined.'

  const width = Math.max(...tasks.map((t) => t.name.length))
  return tasks
    .map((task) => {
      const parts = [task.name.padEnd(width), task.description || '-']
      if (task.aliases.length > 0) parts.push(`(alias: ${task.aliases.join(', ')})`)
      if (task.depends.length > 0) parts.push(`[depends: ${task.depends.join(', ')}]`)
      return parts.join('  ')
    })
    .join('\n')
}

export function formatRepoStatus(statuses: RepoStatus[]): string {
  return statuses
    .map((s) => {
      switch (s.state) {
        case 'missing':
          return `${s.name}: missing (${s.path})`
        case 'not-a-repo':
          return `${s.name}: not a git repository (${s.path})`
        case 'error':
          return `${s.name}: error: ${s.error}`
        case 'ok': {
          const sync = s.tracking ? `ahead ${s.ahead}, behind ${s.behind}` : 'no upstream'
          const tree = s.clean
            ? 'clean'
            : `${s.staged} staged, ${s.modified} modified, ${s.untracked} untracked, ${s.conflicted} conflicted`
          const fetch = s.fetchError ? ` (fetch failed: ${s.fetchError})` : ''
          return `${s.name}: ${s.branch ?? '(detached)'}  ${sync}  ${tree}${fetch}`
        }
      }
    })
    .join('\n')
}

export function formatHooks(inspection: HookInspection): string {
  if (!inspection.dirExists) return `Hooks directory not found: ${inspection.dir}`
  if (inspection.hooks.length === 0) return `No hooks in ${inspection.dir}`

  const yes = (flag: boolean) => (flag ? 'yes' : 'no')
  const width = Math.max(...inspection.hooks.map((h) => h.name.length))
  const lines = [
    `${'hook'.padEnd(width)}  required  exists  executable  runs ${inspection.command}`,
    ...inspection.hooks.map(
      (h) =>
        `${h.name.padEnd(width)}  ${yes(h.required).padEnd(8)}  ${yes(h.exists).padEnd(6)}  ${yes(h.executable).padEnd(10)}  ${yes(h.invokesCommand)}`,
    ),
  ]
  return lines.join('\n')
}
