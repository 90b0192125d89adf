import type { WorkspaceConfig } from '../config/workspace-config.js'
import type { HookInspection } from '../hooks/inspector.js'
import type { MemoryFile } from '../memory/memories.js'
import type { MiseConfig } from '../mise/types.js'
import type { SkillScan } from '../skills/types.js'

export type Severity = 'error' | 'warning'

export type RuleCategory = 'skill' | 'mise' | 'hook' | 'doc' | 'memory'

export interface Diagnostic {
  rule: string
  severity: Severity
  message: string
  /** Relative to the workspace root, `/`-separated */
  file?: string
  line?: number
}

/** What a rule reports; the runner fills in rule id and effective severity. */
export interface Finding {
  message: string
  file?: string
  line?: number
  /** Overrides the rule's default severity for this finding */
  severity?: Severity
}

export interface TextFile {
  /** Relative to the workspace root, `/`-separated */
  path: string
  content: string
}

export interface WorkspaceSnapshot {
  config: WorkspaceConfig
  skills: SkillScan
  mise: MiseConfig
  hooks: HookInspection
  /** core.hooksPath; undefined when not checked (no git access or not a repository) */
  hooksPath: string | null | undefined
  docs: TextFile[]
  /** Docs, hook scripts and SKILL.md files, de-duplicated by path */
  textFiles: TextFile[]
  memories: MemoryFile[]
}

export interface Rule {
  id: string
  category: RuleCategory
  description: string
  defaultSeverity: Severity
  check(workspace: WorkspaceSnapshot): Finding[]
}

export interface CheckSummary {
  errors: number
  warnings: number
}
