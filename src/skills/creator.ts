/**
 * Scaffold a new skill directory with a SKILL.md that passes the metadata rules.
 */

import fs from 'node:fs'
import { join, resolve } from 'node:path'
import YAML from 'yaml'
import { createLogger } from '../infra/logger.js'
import { SKILL_FILE_NAME } from './scanner.js'
import { type MetadataOptions, validateSkillMetadata } from './schema.js'

const log = createLogger('skills')

export interface NewSkill {
  name: string
  description: string
  body?: string
  license?: string
  metadata?: Record<string, string>
}

const PLACEHOLDER_BODY =
  'Describe when this skill applies, the steps to follow, and the pitfalls to avoid.'

/**
 * Create `<root>/<skillsDir>/<name>/SKILL.md`.
 *
 * @returns Absolute path of the written SKILL.md
 * @throws  when the metadata is invalid or the skill directory already exists
 */
export function createSkill(
  root: string,
  skillsDir: string,
  skill: NewSkill,
  options: MetadataOptions = {},
): string {
  const frontmatter: Record<string, unknown> = {
    name: skill.name,
    description: skill.description,
    ...(skill.license ? { license: skill.license } : {}),
    ...(skill.metadata && Object.keys(skill.metadata).length > 0 ? { metadata: skill.metadata } : {}),
  }

  const validation = validateSkillMetadata(frontmatter, options)
  if (!validation.ok) {
    const details = validation.issues.map((i) => `${i.path}: ${i.message}`).join('; ')
    throw new Error(`Invalid skill "${skill.name}": ${details}`)
  }

  const targetDir = join(resolve(root, skillsDir), skill.name)
  if (fs.existsSync(targetDir)) {
    throw new Error(`Skill "${skill.name}" already exists at ${targetDir}`)
  }

  const skillMdPath = join(targetDir, SKILL_FILE_NAME)
  fs.mkdirSync(targetDir, { recursive: true })
  fs.writeFileSync(skillMdPath, buildSkillMarkdown(frontmatter, skill.name, skill.body), 'utf-8')

  log.info('Skill created', { name: skill.name, path: skillMdPath })
  return skillMdPath
}

export function buildSkillMarkdown(
  frontmatter: Record<string, unknown>,
  name: string,
  body?: string,
): string {
  const lines = [
    '---',
    YAML.stringify(frontmatter, { lineWidth: 0 }).trimEnd(),
    '---',
    '',
    `# ${toTitleCase(name)}`,
    '',
    body?.trim() || PLACEHOLDER_BODY,
    '',
  ]
  return lines.join('\n')
}

/**
 * Convert kebab-case to Title Case
 */
export function toTitleCase(str: string): string {
  return str
    .split('-')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}
