/**
 * Agent Skill front matter schema.
 *
 * Agents read `name` and `description` to decide when to surface a skill, so both are
 * required; the remaining fields are optional but typed.
 */

import * as z from 'zod'

export const SKILL_NAME_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/
export const SKILL_NAME_MAX = 64
export const COMPATIBILITY_MAX = 500

export interface SkillMetadata {
  name: string
  description: string
  license?: string
  compatibility?: string
  metadata?: Record<string, string>
  'allowed-tools'?: string
}

export interface MetadataIssue {
  /** Dotted field path, "(root)" for the mapping itself */
  path: string
  message: string
}

export type MetadataValidation =
  | { ok: true; metadata: SkillMetadata }
  | { ok: false; issues: MetadataIssue[] }

export interface MetadataOptions {
  descriptionMax?: number
}

const requiredString = (field: string) =>
  z.string({
    error: (issue) => (issue.input === undefined ? `${field} is required` : `${field} must be a string`),
  })

export function createSkillMetadataSchema(options: MetadataOptions = {}) {
  const descriptionMax = options.descriptionMax ?? 1024

  return z.strictObject({
    name: requiredString('name')
      .min(1, 'name must not be empty')
      .max(SKILL_NAME_MAX, `name must be at most ${SKILL_NAME_MAX} characters`)
      .regex(
        SKILL_NAME_PATTERN,
        'name must use lowercase letters, digits and single hyphens, without leading or trailing hyphen',
      ),
    description: requiredString('description')
      .refine((value) => value.trim().length > 0, 'description must not be empty')
      .refine(
        (value) => value.length <= descriptionMax,
        `description must be at most ${descriptionMax} characters`,
      ),
    license: z.string('license must be a string').optional(),
    compatibility: z
      .string('compatibility must be a string')
      .max(COMPATIBILITY_MAX, `compatibility must be at most ${COMPATIBILITY_MAX} characters`)
      .optional(),
    metadata: z
      .record(z.string(), z.string('metadata values must be strings'), 'metadata must be a mapping')
      .optional(),
    'allowed-tools': z.string('allowed-tools must be a string').optional(),
  })
}

export function validateSkillMetadata(
  data: Record<string, unknown>,
  options: MetadataOptions = {},
): MetadataValidation {
  const result = createSkillMetadataSchema(options).safeParse(data)
  if (result.success) return { ok: true, metadata: result.data }

  const issues: MetadataIssue[] = []
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)'
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        issues.push({ path: key, message: `unknown field "${key}"` })
      }
      continue
    }
    issues.push({ path, message: issue.message })
  }
  return { ok: false, issues }
}

export function isValidSkillName(name: string): boolean {
  return name.length <= SKILL_NAME_MAX && SKILL_NAME_PATTERN.test(name)
}
