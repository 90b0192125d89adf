import type { SkillEntry, SkillMatch } from './types.js'

const DEFAULT_LIMIT = 5
const NAME_IN_QUERY_POINTS = 12
const NAME_TOKEN_POINTS = 4
const MAX_DESCRIPTION_POINTS = 6
const STOP_WORDS = new Set([
  'a',
  'an',
  'and',
  'as',
  'at',
  'be',
  'by',
  'for',
  'from',
  'how',
  'if',
  'in',
  'into',
  'is',
  'it',
  'of',
  'on',
  'or',
  'the',
  'this',
  'to',
  'use',
  'when',
  'with',
  'you',
  'your',
])

const SKILL_MENTION_PATTERN = /(^|[^\w$])\$([a-zA-Z0-9][a-zA-Z0-9._:-]*)/g

/** `$skill-name` mentions, lowercased, de-duplicated, in order of appearance. */
export function parseSkillMentions(query: string): string[] {
  const mentions: string[] = []
  const seen = new Set<string>()

  for (const match of query.matchAll(SKILL_MENTION_PATTERN)) {
    const name = normalizeMentionToken(match[2] ?? '')
    if (!name || /^\d+$/.test(name) || seen.has(name)) continue
    mentions.push(name)
    seen.add(name)
  }

  return mentions
}

/**
 * Rank skills for a free-text query. Explicit `$name` mentions come first, then
 * scored matches (highest first, ties by name).
 */
export function findSkills(
  query: string,
  skills: SkillEntry[],
  options: { limit?: number } = {},
): SkillMatch[] {
  const limit = options.limit ?? DEFAULT_LIMIT
  const byName = new Map(skills.map((skill) => [skill.name.toLowerCase(), skill]))

  const explicit: SkillMatch[] = []
  for (const mention of parseSkillMentions(query)) {
    const skill = byName.get(mention)
    if (skill) explicit.push({ skill, score: Number.POSITIVE_INFINITY, explicit: true })
  }
  const explicitNames = new Set(explicit.map((m) => m.skill.name))

  const queryLower = query.toLowerCase()
  const queryTokens = new Set(tokenize(queryLower))

  const scored = skills
    .filter((skill) => !explicitNames.has(skill.name))
    .map((skill) => ({ skill, score: scoreSkill(skill, queryLower, queryTokens), explicit: false }))
    .filter((row) => row.score >= 1)
    .sort((left, right) => right.score - left.score || left.skill.name.localeCompare(right.skill.name))

  return [...explicit, ...scored].slice(0, Math.max(limit, explicit.length))
}

export function scoreSkill(skill: SkillEntry, queryLower: string, queryTokens: Set<string>): number {
  const nameLower = skill.name.toLowerCase()
  let score = 0

  if (queryLower.includes(nameLower)) {
    score += NAME_IN_QUERY_POINTS
  }

  for (const token of new Set(tokenize(nameLower))) {
    if (token.length >= 2 && queryTokens.has(token)) {
      score += NAME_TOKEN_POINTS
    }
  }

  let descriptionPoints = 0
  for (const token of new Set(tokenize(skill.description))) {
    if (token.length < 4 || STOP_WORDS.has(token)) continue
    if (queryTokens.has(token)) {
      descriptionPoints += 1
      if (descriptionPoints >= MAX_DESCRIPTION_POINTS) break
    }
  }

  return score + descriptionPoints
}

function tokenize(value: string): string[] {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
}

function normalizeMentionToken(raw: string): string {
  return raw
    .trim()
    .replace(/[.,!?;:]+$/g, '')
    .toLowerCase()
}
