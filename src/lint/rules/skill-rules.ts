import type { SkillEntry } from '../../skills/types.js'
import { toRelative } from '../snapshot.js'
import type { Finding, Rule, WorkspaceSnapshot } from '../types.js'

/** Every parsed SKILL.md, active and shadowed. */
function allSkills(ws: WorkspaceSnapshot): SkillEntry[] {
  return [...ws.skills.skills, ...ws.skills.shadowed]
}

/** 1-based file line of a top-level front matter key; 1 when not found. */
export function frontmatterKeyLine(skill: SkillEntry, key: string): number {
  const lines = skill.rawFrontmatter?.split(/\r?\n/) ?? []
  const index = lines.findIndex((line) => line.match(/^([\w-]+)\s*:/)?.[1] === key)
  return index === -1 ? 1 : index + 2
}

export const skillMissingFile: Rule = {
  id: 'skill/missing-file',
  category: 'skill',
  description: 'Every directory in a skills directory holds a SKILL.md',
  defaultSeverity: 'warning',
  check(ws) {
    return ws.skills.orphanDirs.map((dir) => ({
      message: 'skill directory has no SKILL.md',
      file: toRelative(ws.config.root, dir),
    }))
  },
}

export const skillFrontmatter: Rule = {
  id: 'skill/frontmatter',
  category: 'skill',
  description: 'SKILL.md starts with a readable YAML front matter block',
  defaultSeverity: 'error',
  check(ws) {
    const findings: Finding[] = ws.skills.errors.map((e) => ({
      message: `cannot read SKILL.md: ${e.message}`,
      file: toRelative(ws.config.root, e.location),
    }))

    for (const skill of allSkills(ws)) {
      const file = toRelative(ws.config.root, skill.location)
      if (skill.frontmatter.kind === 'missing') {
        findings.push({ message: 'missing YAML front matter (--- block)', file, line: 1 })
      } else if (skill.frontmatter.kind === 'invalid') {
        findings.push({
          message: `invalid front matter: ${skill.frontmatter.message}`,
          file,
          line: skill.frontmatter.line ?? 1,
        })
      }
    }
    return findings
  },
}

export const skillMetadata: Rule = {
  id: 'skill/metadata',
  category: 'skill',
  description: 'Front matter fields follow the Agent Skill metadata schema',
  defaultSeverity: 'error',
  check(ws) {
    const findings: Finding[] = []
    for (const skill of allSkills(ws)) {
      if (!skill.metadata || skill.metadata.ok) continue
      const file = toRelative(ws.config.root, skill.location)
      for (const issue of skill.metadata.issues) {
        const key = issue.path.split('.')[0] ?? issue.path
        findings.push({
          message: issue.path === '(root)' ? issue.message : `${issue.path}: ${issue.message}`,
          file,
          line: frontmatterKeyLine(skill, key),
        })
      }
    }
    return findings
  },
}

export const skillNameMatchesDirectory: Rule = {
  id: 'skill/name-matches-directory',
  category: 'skill',
  description: 'The front matter name equals the skill directory name',
  defaultSeverity: 'error',
  check(ws) {
    return allSkills(ws)
      .filter((skill) => skill.frontmatter.kind === 'ok' && typeof skill.frontmatter.data.name === 'string')
      .filter((skill) => skill.name !== skill.dirName)
      .map((skill) => ({
        message: `name "${skill.name}" does not match directory "${skill.dirName}"`,
        file: toRelative(ws.config.root, skill.location),
        line: frontmatterKeyLine(skill, 'name'),
      }))
  },
}

export const skillDuplicateName: Rule = {
  id: 'skill/duplicate-name',
  category: 'skill',
  description: 'A skill name is defined in one place only',
  defaultSeverity: 'warning',
  check(ws) {
    return ws.skills.shadowed.map((hidden) => {
      const winner = ws.skills.skills.find((s) => s.name === hidden.name)
      const where = winner ? toRelative(ws.config.root, winner.location) : 'another skill'
      return {
        message: `skill "${hidden.name}" is shadowed by ${where}`,
        file: toRelative(ws.config.root, hidden.location),
        line: frontmatterKeyLine(hidden, 'name'),
      }
    })
  },
}

export const skillEmptyBody: Rule = {
  id: 'skill/empty-body',
  category: 'skill',
  description: 'SKILL.md has instructions after the front matter',
  defaultSeverity: 'warning',
  check(ws) {
    return allSkills(ws)
      .filter((skill) => skill.frontmatter.kind === 'ok' && skill.bodyLines === 0)
      .map((skill) => ({
        message: 'skill has no instructions after the front matter',
        file: toRelative(ws.config.root, skill.location),
        line: skill.bodyStartLine,
      }))
  },
}

export const skillBodyLength: Rule = {
  id: 'skill/body-length',
  category: 'skill',
  description: 'SKILL.md bodies stay short enough to load into an agent context',
  defaultSeverity: 'warning',
  check(ws) {
    const max = ws.config.skillMaxBodyLines
    return allSkills(ws)
      .filter((skill) => skill.bodyLines > max)
      .map((skill) => ({
        message: `skill body has ${skill.bodyLines} lines (max ${max}); move detail into referenced files`,
        file: toRelative(ws.config.root, skill.location),
        line: skill.bodyStartLine,
      }))
  },
}

export const skillNoSkills: Rule = {
  id: 'skill/no-skills',
  category: 'skill',
  description: 'The workspace defines at least one skill',
  defaultSeverity: 'warning',
  check(ws) {
    if (ws.skills.skills.length > 0 || ws.skills.errors.length > 0) return []
    return [{ message: `no skills found in ${ws.config.skillsDirs.join(', ')}` }]
  },
}

export const skillRules: Rule[] = [
  skillMissingFile,
  skillFrontmatter,
  skillMetadata,
  skillNameMatchesDirectory,
  skillDuplicateName,
  skillEmptyBody,
  skillBodyLength,
  skillNoSkills,
]
