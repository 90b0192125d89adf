import { describe, expect, it } from 'vitest'
import { parseFrontmatter, splitFrontmatter } from './frontmatter.js'

describe('splitFrontmatter', () => {
  it('separates the YAML block from the body', () => {
    expect(splitFrontmatter('---\nname: pdf-tools\n---\n# PDF\n')).toEqual({
      raw: 'name: pdf-tools',
      body: '# PDF\n',
      bodyStartLine: 4,
    })
  })

  it('ignores a byte order mark and CRLF line endings', () => {
    expect(splitFrontmatter('\uFEFF---\r\nname: a\r\n---\r\nbody')).toEqual({
      raw: 'name: a',
      body: 'body',
      bodyStartLine: 4,
    })
  })

  it('returns null without an opening or closing delimiter', () => {
    expect(splitFrontmatter('# Title\n---\n')).toBeNull()
    expect(splitFrontmatter('---\nname: a\n')).toBeNull()
  })
})

describe('parseFrontmatter', () => {
  it('parses a mapping', () => {
    const result = parseFrontmatter('---\nname: a\ndescription: Does things\n---\n\nBody\n')
    expect(result).toEqual({
      kind: 'ok',
      data: { name: 'a', description: 'Does things' },
      body: '\nBody\n',
      bodyStartLine: 5,
    })
  })

  it('reports a missing block', () => {
    expect(parseFrontmatter('# No front matter')).toEqual({ kind: 'missing' })
  })

  it('rejects front matter that is not a mapping', () => {
    expect(parseFrontmatter('---\n- a\n- b\n---\n')).toEqual({
      kind: 'invalid',
      message: 'front matter must be a YAML mapping',
      line: 1,
    })
    expect(parseFrontmatter('---\n---\nbody')).toMatchObject({ kind: 'invalid' })
  })

  it('reports YAML syntax errors', () => {
    const result = parseFrontmatter('---\nname: a\ndescription: [unclosed\n---\n')
    expect(result.kind).toBe('invalid')
  })
})
