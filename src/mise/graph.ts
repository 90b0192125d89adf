/**
 * Task name resolution, dependency checks and `mise run <task>` references in prose.
 */

import type { DependencyIssue, MiseTask, TaskReference } from './types.js'

/** Resolve a task name or alias. Trailing `*` matches by prefix. */
export function resolveTaskName(name: string, tasks: MiseTask[]): MiseTask[] {
  if (name.endsWith('*')) {
    const prefix = name.slice(0, -1)
    return tasks.filter((t) => t.name.startsWith(prefix))
  }
  const task = tasks.find((t) => t.name === name || t.aliases.includes(name))
  return task ? [task] : []
}

/** `"build --release"` depends on `build`. */
export function dependencyName(entry: string): string {
  return entry.trim().split(/\s+/)[0] ?? ''
}

export function findDependencyIssues(tasks: MiseTask[]): DependencyIssue[] {
  const issues: DependencyIssue[] = []

  for (const task of tasks) {
    const edges: [string, string[]][] = [
      ['depends', task.depends],
      ['depends_post', task.dependsPost],
      ['wait_for', task.waitFor],
    ]
    for (const [field, entries] of edges) {
      for (const entry of entries) {
        const name = dependencyName(entry)
        if (!name || resolveTaskName(name, tasks).length > 0) continue
        issues.push({
          kind: 'unknown',
          task: task.name,
          message: `task "${task.name}" ${field} on unknown task "${name}"`,
        })
      }
    }
  }

  for (const cycle of findCycles(tasks)) {
    issues.push({
      kind: 'cycle',
      task: cycle[0] ?? '',
      message: `dependency cycle: ${cycle.join(' -> ')}`,
    })
  }

  return issues
}

/**
 * Elementary cycles through `depends` edges, each reported once, starting at its
 * alphabetically first task and closed (`a -> b -> a`). Overlapping cycles are all
 * listed: a search from each task only walks tasks that sort after it.
 */
export function findCycles(tasks: MiseTask[]): string[][] {
  const graph = new Map<string, string[]>()
  for (const task of tasks) {
    const targets = task.depends
      .flatMap((entry) => resolveTaskName(dependencyName(entry), tasks))
      .map((t) => t.name)
    graph.set(task.name, [...new Set(targets)])
  }

  const seen = new Set<string>()
  const cycles: string[][] = []

  for (const start of [...graph.keys()].sort()) {
    const path = [start]
    const onPath = new Set(path)

    const walk = (node: string): void => {
      for (const next of graph.get(node) ?? []) {
        if (next === start) {
          const cycle = [...path, start]
          const key = cycle.join('\0')
          if (!seen.has(key)) {
            seen.add(key)
            cycles.push(cycle)
          }
        } else if (next > start && !onPath.has(next)) {
          path.push(next)
          onPath.add(next)
          walk(next)
          onPath.delete(next)
          path.pop()
        }
      }
    }

    walk(start)
  }
  return cycles
}

// `mise run` flags that take a separate value: -j/--jobs, -C/--cd, -o/--output, -t/--tool
const VALUE_FLAG = String.raw`(?:-[jCot]|--(?:jobs|cd|output|tool))\s+[^\s-]\S*`
const FLAG = String.raw`--?[\w-]+(?:=\S+)?`
const REFERENCE_PATTERN = new RegExp(
  String.raw`\bmise\s+(?:run|r)((?:\s+(?:${VALUE_FLAG}|${FLAG}))*)\s+([A-Za-z0-9_][\w:.*/-]*)`,
  'g',
)

/** `mise run <task>` / `mise r <task>` occurrences, with 1-based lines. */
export function findTaskReferences(text: string): TaskReference[] {
  const refs: TaskReference[] = []
  const lines = text.split(/\r?\n/)

  lines.forEach((line, index) => {
    for (const match of line.matchAll(REFERENCE_PATTERN)) {
      const name = (match[2] ?? '').replace(/[.,:;)]+$/, '')
      if (name) refs.push({ name, line: index + 1 })
    }
  })
  return refs
}
