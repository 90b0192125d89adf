import type { Rule } from '../types.js'

export const memoryEmpty: Rule = {
  id: 'memory/empty',
  category: 'memory',
  description: 'Assistant memory files have content',
  defaultSeverity: 'warning',
  check(ws) {
    return ws.memories
      .filter((memory) => memory.empty)
      .map((memory) => ({ message: `memory "${memory.name}" is empty`, file: memory.path }))
  },
}

export const memoryUnreadable: Rule = {
  id: 'memory/unreadable',
  category: 'memory',
  description: 'Assistant memory files can be read',
  defaultSeverity: 'error',
  check(ws) {
    return ws.memories.flatMap((memory) =>
      memory.error !== undefined
        ? [{ message: `cannot read memory "${memory.name}": ${memory.error}`, file: memory.path }]
        : [],
    )
  },
}

export const memoryRules: Rule[] = [memoryEmpty, memoryUnreadable]
