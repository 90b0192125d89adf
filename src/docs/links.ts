/**
 * Markdown documentation files and their local links.
 */

import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { glob } from 'glob'

export interface DocLink {
  target: string
  line: number
}

export interface BrokenLink extends DocLink {
  /** Absolute path the link resolved to */
  resolved: string
}

const INLINE_LINK = /!?\[[^\]]*\]\(\s*<?([^)\s>]+)>?(?:\s+(?:"[^"]*"|'[^']*'))?\s*\)/g
// `[^label]:` is a footnote, not a link
const REFERENCE_DEFINITION = /^\s{0,3}\[(?!\^)[^\]]+\]:\s*<?(\S+?)>?(?:\s+.*)?$/
const FENCE = /^\s{0,3}(```|~~~)/
const INLINE_CODE = /`[^`]*`/g
const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/

/** Markdown files matched by the patterns, relative to root, sorted. */
export async function collectDocs(root: string, patterns: string[], ignore: string[]): Promise<string[]> {
  const files = await glob(patterns, { cwd: root, ignore, nodir: true, dot: true, posix: true })
  return [...new Set(files)].sort()
}

/** Inline links, images and reference definitions outside code. */
export function extractLinks(markdown: string): DocLink[] {
  const links: DocLink[] = []
  let fence: string | null = null

  markdown.split(/\r?\n/).forEach((rawLine, index) => {
    const fenceMatch = rawLine.match(FENCE)
    if (fenceMatch?.[1]) {
      if (fence === null) fence = fenceMatch[1]
      else if (fence === fenceMatch[1]) fence = null
      return
    }
    if (fence !== null) return

    const line = rawLine.replace(INLINE_CODE, '')
    const definition = line.match(REFERENCE_DEFINITION)
    if (definition?.[1]) {
      links.push({ target: definition[1], line: index + 1 })
      return
    }
    for (const match of line.matchAll(INLINE_LINK)) {
      if (match[1]) links.push({ target: match[1], line: index + 1 })
    }
  })
  return links
}

export function isLocalLink(target: string): boolean {
  return !SCHEME.test(target) && !target.startsWith('#') && !target.startsWith('//')
}

/**
 * Absolute path a local link points at: anchor and query dropped, percent-escapes
 * decoded, `/`-rooted links resolved against the workspace root.
 */
export function resolveLink(root: string, docFile: string, target: string): string {
  const path = target.replace(/[#?].*$/, '')
  let decoded: string
  try {
    decoded = decodeURIComponent(path)
  } catch {
    // not valid percent-encoding: use as written
    decoded = path
  }
  if (decoded.startsWith('/')) return resolve(root, `.${decoded}`)
  return resolve(dirname(resolve(root, docFile)), decoded)
}

export function findBrokenLinks(root: string, docFile: string, markdown: string): BrokenLink[] {
  return extractLinks(markdown)
    .filter((link) => isLocalLink(link.target))
    .map((link) => ({ ...link, resolved: resolveLink(root, docFile, link.target) }))
    .filter((link) => !fs.existsSync(link.resolved))
}
