import { resolve } from 'node:path'
import { toRelative } from '../snapshot.js'
import type { Rule } from '../types.js'

export const hookMissing: Rule = {
  id: 'hook/missing',
  category: 'hook',
  description: 'The hooks directory and every required hook exist',
  defaultSeverity: 'error',
  check(ws) {
    const { hooks, config } = ws
    if (config.requiredHooks.length === 0) return []
    if (!hooks.dirExists) {
      return [{ message: `hooks directory ${config.hooksDir} not found` }]
    }
    return hooks.hooks
      .filter((hook) => hook.required && !hook.exists)
      .map((hook) => ({
        message: `required hook "${hook.name}" is missing`,
        file: toRelative(config.root, hook.path),
      }))
  },
}

export const hookNotExecutable: Rule = {
  id: 'hook/not-executable',
  category: 'hook',
  description: 'Hook scripts are executable, git skips them otherwise',
  defaultSeverity: 'error',
  check(ws) {
    return ws.hooks.hooks
      .filter((hook) => hook.exists && !hook.executable)
      .map((hook) => ({
        message: `hook "${hook.name}" is not executable (chmod +x)`,
        file: toRelative(ws.config.root, hook.path),
      }))
  },
}

export const hookNoShebang: Rule = {
  id: 'hook/no-shebang',
  category: 'hook',
  description: 'Hook scripts start with a #! interpreter line',
  defaultSeverity: 'warning',
  check(ws) {
    return ws.hooks.hooks
      .filter((hook) => hook.exists && hook.shebang === null)
      .map((hook) => ({
        message: `hook "${hook.name}" has no #! line`,
        file: toRelative(ws.config.root, hook.path),
        line: 1,
      }))
  },
}

export const hookCommand: Rule = {
  id: 'hook/command',
  category: 'hook',
  description: 'Required hooks run the configured pattern checker',
  defaultSeverity: 'warning',
  check(ws) {
    return ws.hooks.hooks
      .filter((hook) => hook.required && hook.exists && !hook.invokesCommand)
      .map((hook) => ({
        message: `hook "${hook.name}" does not run "${ws.hooks.command}"`,
        file: toRelative(ws.config.root, hook.path),
      }))
  },
}

export const hookHooksPath: Rule = {
  id: 'hook/hooks-path',
  category: 'hook',
  description: 'git core.hooksPath points at the workspace hooks directory',
  defaultSeverity: 'warning',
  check(ws) {
    const { hooksPath, config } = ws
    if (hooksPath === undefined || !ws.hooks.dirExists) return []
    if (hooksPath !== null && resolve(config.root, hooksPath) === ws.hooks.dir) return []
    const current = hooksPath === null ? 'unset' : `"${hooksPath}"`
    return [
      {
        message: `core.hooksPath is ${current}; run: git config core.hooksPath ${config.hooksDir}`,
      },
    ]
  },
}

export const hookRules: Rule[] = [hookMissing, hookNotExecutable, hookNoShebang, hookCommand, hookHooksPath]
