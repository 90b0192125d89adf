/**
 * Skill Scanner: discovers Agent Skills (`<skillsDir>/<name>/SKILL.md`) in a workspace.
 *
 * Scans every configured skills directory with priority-based merging: when the same
 * skill name exists in several directories, the one listed last wins and the others
 * are kept as shadowed entries so the linter can report them.
 */

import fs from 'node:fs'
import { join, resolve } from 'node:path'
import { createLogger } from '../infra/logger.js'
import { errorMessage } from '../infra/errors.js'
import { parseFrontmatter, splitFrontmatter } from './frontmatter.js'
import { type MetadataOptions, validateSkillMetadata } from './schema.js'
import type { SkillEntry, SkillScan } from './types.js'

const log = createLogger('skills')

export const SKILL_FILE_NAME = 'SKILL.md'

export class SkillScanner {
  private cache = new Map<string, SkillScan>()

  constructor(private readonly options: MetadataOptions = {}) {}

  /**
   * @param root        Workspace root
   * @param skillsDirs  Skills directories relative to root, lowest priority first
   */
  scan(root: string, skillsDirs: string[]): SkillScan {
    const key = `${resolve(root)}\0${skillsDirs.join('\0')}`
    const cached = this.cache.get(key)
    if (cached) return cached

    const merged = new Map<string, SkillEntry>()
    const shadowed: SkillEntry[] = []
    const orphanDirs: string[] = []
    const errors: SkillScan['errors'] = []
    const scannedDirs: string[] = []

    for (const dir of skillsDirs) {
      const absDir = resolve(root, dir)
      const result = scanDir(absDir, dir, this.options)
      if (!result) continue

      scannedDirs.push(dir)
      orphanDirs.push(...result.orphanDirs)
      errors.push(...result.errors)

      for (const entry of result.entries) {
        const previous = merged.get(entry.name)
        if (previous) {
          log.debug(`Skill "${entry.name}" in ${dir} shadows ${previous.location}`)
          shadowed.push(previous)
        }
        merged.set(entry.name, entry)
      }
    }

    const scan: SkillScan = {
      skills: [...merged.values()].sort((a, b) => a.name.localeCompare(b.name)),
      shadowed,
      orphanDirs,
      errors,
      scannedDirs,
    }
    this.cache.set(key, scan)

    log.info(`Loaded ${scan.skills.length} skill(s) from ${scannedDirs.length} skills dir(s)`)
    return scan
  }

  /**
   * Find an active skill by name.
   * @throws when no skill has that name
   */
  getSkill(root: string, skillsDirs: string[], name: string): SkillEntry {
    const skill = this.scan(root, skillsDirs).skills.find((s) => s.name === name)
    if (!skill) throw new Error(`Skill "${name}" not found`)
    return skill
  }

  invalidateCache(): void {
    this.cache.clear()
  }
}

/* ------------------------------------------------------------------ */
/*  Directory scanner                                                   */
/* ------------------------------------------------------------------ */

interface DirScan {
  entries: SkillEntry[]
  orphanDirs: string[]
  errors: SkillScan['errors']
}

function scanDir(absDir: string, sourceDir: string, options: MetadataOptions): DirScan | null {
  let dirs: fs.Dirent[]
  try {
    dirs = fs
      .readdirSync(absDir, { withFileTypes: true })
      .filter((d) => d.isDirectory() && !d.name.startsWith('.'))
      .sort((a, b) => a.name.localeCompare(b.name))
  } catch (err) {
    log.debug(`Skills directory not readable: ${absDir}`, { error: errorMessage(err) })
    return null
  }

  const scan: DirScan = { entries: [], orphanDirs: [], errors: [] }

  for (const dir of dirs) {
    const skillDir = join(absDir, dir.name)
    const location = join(skillDir, SKILL_FILE_NAME)

    if (!fs.existsSync(location)) {
      scan.orphanDirs.push(skillDir)
      continue
    }

    let content: string
    try {
      content = fs.readFileSync(location, 'utf-8')
    } catch (err) {
      log.warn(`Cannot read ${location}`, { error: errorMessage(err) })
      scan.errors.push({ location, message: errorMessage(err) })
      continue
    }

    scan.entries.push(buildEntry(content, dir.name, location, sourceDir, options))
  }

  return scan
}

export function buildEntry(
  content: string,
  dirName: string,
  location: string,
  sourceDir: string,
  options: MetadataOptions = {},
): SkillEntry {
  const frontmatter = parseFrontmatter(content)

  const data = frontmatter.kind === 'ok' ? frontmatter.data : {}
  const body = frontmatter.kind === 'ok' ? frontmatter.body : content
  const bodyStartLine = frontmatter.kind === 'ok' ? frontmatter.bodyStartLine : 1
  const trimmedBody = body.trim()

  return {
    name: typeof data.name === 'string' && data.name.trim() ? data.name.trim() : dirName,
    description: typeof data.description === 'string' ? data.description.trim() : '',
    dirName,
    location,
    sourceDir,
    frontmatter,
    rawFrontmatter: splitFrontmatter(content)?.raw ?? null,
    body,
    bodyStartLine,
    bodyLines: trimmedBody ? trimmedBody.split(/\r?\n/).length : 0,
    metadata: frontmatter.kind === 'ok' ? validateSkillMetadata(frontmatter.data, options) : null,
  }
}
