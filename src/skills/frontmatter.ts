/**
 * YAML front matter (--- delimited) at the top of SKILL.md and other Markdown files.
 */

import YAML from 'yaml'

export interface FrontmatterBlock {
  /** YAML source between the delimiters */
  raw: string
  /** Markdown after the closing delimiter */
  body: string
  /** 1-based line of the first body line */
  bodyStartLine: number
}

export type FrontmatterResult =
  | { kind: 'missing' }
  | { kind: 'invalid'; message: string; line?: number }
  | { kind: 'ok'; data: Record<string, unknown>; body: string; bodyStartLine: number }

const DELIMITER = '---'

export function splitFrontmatter(content: string): FrontmatterBlock | null {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/)
  if (lines[0]?.trimEnd() !== DELIMITER) return null

  const closing = lines.findIndex((line, i) => i > 0 && line.trimEnd() === DELIMITER)
  if (closing === -1) return null

  return {
    raw: lines.slice(1, closing).join('\n'),
    body: lines.slice(closing + 1).join('\n'),
    bodyStartLine: closing + 2,
  }
}

export function parseFrontmatter(content: string): FrontmatterResult {
  const block = splitFrontmatter(content)
  if (!block) return { kind: 'missing' }

  const doc = YAML.parseDocument(block.raw)
  const firstError = doc.errors[0]
  if (firstError) {
    const line = firstError.linePos?.[0]?.line
    return {
      kind: 'invalid',
      message: firstError.message.split('\n')[0] ?? 'invalid YAML',
      ...(line !== undefined ? { line: line + 1 } : {}),
    }
  }

  const data: unknown = doc.toJS()
  if (!isRecord(data)) {
    return { kind: 'invalid', message: 'front matter must be a YAML mapping', line: 1 }
  }
  return { kind: 'ok', data, body: block.body, bodyStartLine: block.bodyStartLine }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
