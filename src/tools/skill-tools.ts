/**
 * Skill discovery tools: list, read, rank and scaffold Agent Skills.
 */

import { readFile } from 'node:fs/promises'
import * as z from 'zod'
import { type Tool, defineTool } from '../core/types.js'
import { createSkill } from '../skills/creator.js'
import { findSkills } from '../skills/matcher.js'
import { toRelative } from '../lint/snapshot.js'

// ============ Schemas ============

const listSkillsSchema = z.object({})

const readSkillSchema = z.object({
  name: z.string().min(1).describe('Skill name (front matter name)'),
})

const findSkillsSchema = z.object({
  query: z
    .string()
    .min(1)
    .describe('What the agent is about to do (e.g., "add a rate limiter to the API"); $name selects a skill'),
  limit: z.number().int().min(1).max(20).optional().describe('Maximum results (default: 5)'),
})

const createSkillSchema = z.object({
  name: z.string().describe('Skill name in kebab-case; also the directory name'),
  description: z.string().describe('What the skill covers and when an agent should load it'),
  body: z.string().optional().describe('Markdown instructions (placeholder when omitted)'),
  license: z.string().optional(),
})

// ============ Tools ============

export const listSkillsTool = defineTool({
  name: 'list_skills',
  category: 'skill',
  description: 'List the Agent Skills defined in the workspace with their descriptions.',
  schema: listSkillsSchema,
  async execute(_args, { config, scanner }) {
    const { skills } = scanner.scan(config.root, config.skillsDirs)
    if (skills.length === 0) {
      return `No skills found in ${config.skillsDirs.join(', ')}.`
    }

    const lines = [`Skills (${skills.length}):`, '']
    for (const skill of skills) {
      lines.push(`- **${skill.name}**: ${skill.description || '(no description)'}`)
    }
    return lines.join('\n')
  },
})

export const readSkillTool = defineTool({
  name: 'read_skill',
  category: 'skill',
  description: 'Return the full SKILL.md of a skill, front matter included.',
  schema: readSkillSchema,
  async execute(args, { config, scanner }) {
    const skill = scanner.getSkill(config.root, config.skillsDirs, args.name)
    return readFile(skill.location, 'utf-8')
  },
})

export const findSkillsTool = defineTool({
  name: 'find_skills',
  category: 'skill',
  description:
    'Rank workspace skills for a task description. Use before starting work to find the guides that apply.',
  schema: findSkillsSchema,
  async execute(args, { config, scanner }) {
    const { skills } = scanner.scan(config.root, config.skillsDirs)
    const matches = findSkills(args.query, skills, { limit: args.limit })
    if (matches.length === 0) {
      return `No skills match "${args.query}".`
    }

    return matches
      .map((m) => {
        const score = m.explicit ? 'explicit' : `score ${m.score}`
        return `- **${m.skill.name}** (${score}): ${m.skill.description}\n  ${toRelative(config.root, m.skill.location)}`
      })
      .join('\n')
  },
})

export const createSkillTool = defineTool({
  name: 'create_skill',
  category: 'skill',
  description:
    'Scaffold a new skill in the first skills directory. Only call with a kebab-case name and a description that says WHAT and WHEN.',
  schema: createSkillSchema,
  async execute(args, { config, scanner }) {
    const skillsDir = config.skillsDirs[0]
    if (!skillsDir) throw new Error('No skills directory configured')

    const path = createSkill(
      config.root,
      skillsDir,
      {
        name: args.name,
        description: args.description,
        ...(args.body !== undefined ? { body: args.body } : {}),
        ...(args.license !== undefined ? { license: args.license } : {}),
      },
      { descriptionMax: config.skillDescriptionMax },
    )
    scanner.invalidateCache()
    return `Created ${toRelative(config.root, path)}`
  },
})

export const skillTools: Tool[] = [listSkillsTool, readSkillTool, findSkillsTool, createSkillTool]
