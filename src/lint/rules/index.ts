import type { Rule } from '../types.js'
import { docRules } from './doc-rules.js'
import { hookRules } from './hook-rules.js'
import { memoryRules } from './memory-rules.js'
import { miseRules } from './mise-rules.js'
import { skillRules } from './skill-rules.js'

export const ALL_RULES: readonly Rule[] = [
  ...skillRules,
  ...miseRules,
  ...hookRules,
  ...docRules,
  ...memoryRules,
]

export { docRules, hookRules, memoryRules, miseRules, skillRules }
