import type { FrontmatterResult } from './frontmatter.js'
import type { MetadataValidation } from './schema.js'

export interface SkillEntry {
  /** Front matter name, or the directory name when absent */
  name: string
  /** Front matter description, "" when absent */
  description: string
  /** Directory holding SKILL.md */
  dirName: string
  /** Absolute path to SKILL.md */
  location: string
  /** Skills directory (as configured, relative to the workspace root) */
  sourceDir: string
  frontmatter: FrontmatterResult
  /** YAML source of the front matter block, null when there is none */
  rawFrontmatter: string | null
  /** Markdown after the front matter (the whole file when there is none) */
  body: string
  /** 1-based file line where the body starts */
  bodyStartLine: number
  bodyLines: number
  /** null when the front matter could not be parsed */
  metadata: MetadataValidation | null
}

export interface SkillScan {
  /** Active skills, one per name, sorted by name */
  skills: SkillEntry[]
  /** Entries hidden by a same-named skill in a higher-priority directory */
  shadowed: SkillEntry[]
  /** Skill directories without a SKILL.md (absolute paths) */
  orphanDirs: string[]
  /** SKILL.md files that could not be read */
  errors: { location: string; message: string }[]
  /** Skills directories that exist (as configured) */
  scannedDirs: string[]
}

export interface SkillMatch {
  skill: SkillEntry
  score: number
  /** Selected by a `$name` mention rather than by score */
  explicit: boolean
}
