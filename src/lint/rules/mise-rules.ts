import { findDependencyIssues, findTaskReferences, resolveTaskName } from '../../mise/graph.js'
import { toRelative } from '../snapshot.js'
import type { Finding, Rule } from '../types.js'

export const miseConfig: Rule = {
  id: 'mise/config',
  category: 'mise',
  description: 'The mise task file exists and parses',
  defaultSeverity: 'error',
  check(ws) {
    const file = toRelative(ws.config.root, ws.mise.file)
    const findings: Finding[] = []

    if (!ws.mise.exists) {
      findings.push({ message: `${file} not found`, severity: 'warning' })
    } else if (ws.mise.error) {
      findings.push({
        message: `cannot parse ${file}: ${ws.mise.error.message}`,
        file,
        ...(ws.mise.error.line !== undefined ? { line: ws.mise.error.line } : {}),
      })
    }

    for (const error of ws.mise.taskErrors) {
      findings.push({
        message: `task "${error.task}": ${error.message}`,
        file: toRelative(ws.config.root, error.location),
      })
    }
    return findings
  },
}

export const miseUnknownReference: Rule = {
  id: 'mise/unknown-reference',
  category: 'mise',
  description: 'Every `mise run <task>` in docs, hooks and skills names a defined task',
  defaultSeverity: 'error',
  check(ws) {
    // Without a readable task file every reference would be reported; mise/config covers it
    const { mise } = ws
    if ((mise.exists && mise.error) || (!mise.exists && mise.tasks.length === 0)) return []

    const findings: Finding[] = []
    for (const file of ws.textFiles) {
      for (const ref of findTaskReferences(file.content)) {
        if (resolveTaskName(ref.name, mise.tasks).length > 0) continue
        findings.push({
          message: `"mise run ${ref.name}" references an undefined task`,
          file: file.path,
          line: ref.line,
        })
      }
    }
    return findings
  },
}

export const miseUnknownDependency: Rule = {
  id: 'mise/unknown-dependency',
  category: 'mise',
  description: 'Task dependencies name defined tasks',
  defaultSeverity: 'error',
  check(ws) {
    return findDependencyIssues(ws.mise.tasks)
      .filter((issue) => issue.kind === 'unknown')
      .map((issue) => ({ message: issue.message, file: taskFile(ws.config.root, ws.mise.tasks, issue.task) }))
  },
}

export const miseDependencyCycle: Rule = {
  id: 'mise/dependency-cycle',
  category: 'mise',
  description: 'Task dependencies do not form a cycle',
  defaultSeverity: 'error',
  check(ws) {
    return findDependencyIssues(ws.mise.tasks)
      .filter((issue) => issue.kind === 'cycle')
      .map((issue) => ({ message: issue.message, file: taskFile(ws.config.root, ws.mise.tasks, issue.task) }))
  },
}

function taskFile(root: string, tasks: { name: string; location: string }[], name: string): string | undefined {
  const task = tasks.find((t) => t.name === name)
  return task ? toRelative(root, task.location) : undefined
}

export const miseRules: Rule[] = [miseConfig, miseUnknownReference, miseUnknownDependency, miseDependencyCycle]
