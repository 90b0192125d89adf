/**
 * Memory notes kept for AI coding assistants (for example `.serena/memories/*.md`).
 */

import fs from 'node:fs'
import { join, relative, resolve } from 'node:path'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'

const log = createLogger('memory')

export interface MemoryFile {
  /** Path inside its memory directory without the .md extension */
  name: string
  /** Relative to the workspace root, `/`-separated */
  path: string
  size: number
  /** First Markdown heading, or null */
  title: string | null
  empty: boolean
  /** Set when the file could not be read */
  error?: string
}

export function listMemories(root: string, memoryDirs: string[]): MemoryFile[] {
  const memories: MemoryFile[] = []

  for (const dir of memoryDirs) {
    const absDir = resolve(root, dir)
    for (const file of listMarkdown(absDir)) {
      const name = toPosix(relative(absDir, file)).replace(/\.md$/, '')
      const path = toPosix(relative(root, file))
      let content: string
      try {
        content = fs.readFileSync(file, 'utf-8')
      } catch (err) {
        const error = errorMessage(err)
        log.warn(`Cannot read memory file ${path}`, { error })
        memories.push({ name, path, size: 0, title: null, empty: false, error })
        continue
      }
      memories.push({
        name,
        path,
        size: Buffer.byteLength(content),
        title: firstHeading(content),
        empty: content.trim().length === 0,
      })
    }
  }
  return memories
}

/** First ATX heading outside fenced code. */
export function firstHeading(markdown: string): string | null {
  let fence: string | null = null
  for (const line of markdown.split(/\r?\n/)) {
    const fenceMatch = line.match(/^\s{0,3}(```|~~~)/)
    if (fenceMatch?.[1]) {
      if (fence === null) fence = fenceMatch[1]
      else if (fence === fenceMatch[1]) fence = null
      continue
    }
    if (fence !== null) continue
    const heading = line.match(/^#{1,6}[ \t]+(.+?)[ \t]*#*[ \t]*$/)
    if (heading?.[1]) return heading[1]
  }
  return null
}

function listMarkdown(dir: string): string[] {
  let entries: fs.Dirent[]
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true })
  } catch {
    return []
  }

  const files: string[] = []
  for (const entry of entries) {
    const full = join(dir, entry.name)
    if (entry.isDirectory()) files.push(...listMarkdown(full))
    else if (entry.isFile() && entry.name.endsWith('.md')) files.push(full)
  }
  return files.sort()
}

function toPosix(path: string): string {
  return path.split('\\').join('/')
}
