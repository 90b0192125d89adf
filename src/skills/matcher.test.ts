import { describe, expect, it } from 'vitest'
import { skillMd } from '../testing/workspace.js'
import { findSkills, parseSkillMentions } from './matcher.js'
import { buildEntry } from './scanner.js'
import type { SkillEntry } from './types.js'

function skill(name: string, description: string): SkillEntry {
  return buildEntry(skillMd(name, description), name, `/w/skills/${name}/SKILL.md`, 'skills')
}

const skills = [
  skill('api-rate-limit', 'Add rate limiting middleware to HTTP endpoints'),
  skill('db-migrations', 'Write and review database migrations safely'),
  skill('release', 'Cut a release and publish packages'),
]

describe('parseSkillMentions', () => {
  it('extracts $name mentions in order, without duplicates or trailing punctuation', () => {
    expect(parseSkillMentions('use $Release, then $db-migrations. $release again, $42 costs')).toEqual([
      'release',
      'db-migrations',
    ])
  })

  it('ignores dollar signs inside words', () => {
    expect(parseSkillMentions('price$tag and a$b')).toEqual([])
  })
})

describe('findSkills', () => {
  it('scores name tokens and description words', () => {
    const matches = findSkills('add rate limiting to the api', skills)

    expect(matches.map((m) => [m.skill.name, m.score])).toEqual([['api-rate-limit', 10]])
  })

  it('rewards the full name appearing in the query', () => {
    const [match] = findSkills('run release checks', skills)

    expect(match?.skill.name).toBe('release')
    expect(match?.score).toBe(17)
  })

  it('puts explicit mentions first and keeps them past the limit', () => {
    const matches = findSkills('$release $db-migrations and add api rate limits', skills, { limit: 1 })

    expect(matches.map((m) => m.skill.name)).toEqual(['release', 'db-migrations'])
    expect(matches.every((m) => m.explicit && m.score === Number.POSITIVE_INFINITY)).toBe(true)
  })

  it('orders ties by name', () => {
    const tied = [skill('zeta-review', 'Review pull requests'), skill('alpha-review', 'Review pull requests')]
    expect(findSkills('review this', tied).map((m) => m.skill.name)).toEqual(['alpha-review', 'zeta-review'])
  })

  it('returns nothing when no skill scores', () => {
    expect(findSkills('tune the kubernetes autoscaler', skills)).toEqual([])
  })
})
