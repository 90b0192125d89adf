import { describe, expect, it } from 'vitest'
import { formatJson, formatReport, formatText, isReportFormat } from './reporter.js'
import type { Diagnostic } from './types.js'

const diagnostics: Diagnostic[] = [
  { rule: 'skill/no-skills', severity: 'warning', message: 'no skills found in .github/skills' },
  { rule: 'hook/missing', severity: 'error', message: 'required hook "pre-push" is missing', file: '.githooks/pre-push' },
  { rule: 'doc/broken-link', severity: 'error', message: 'broken link: x.md', file: 'README.md', line: 3 },
]

describe('formatText', () => {
  it('prints one line per diagnostic and a summary', () => {
    expect(formatText(diagnostics)).toBe(
      [
        '(workspace)  warning  no skills found in .github/skills  [skill/no-skills]',
        '.githooks/pre-push  error  required hook "pre-push" is missing  [hook/missing]',
        'README.md:3  error  broken link: x.md  [doc/broken-link]',
        '',
        '2 error(s), 1 warning(s)',
      ].join('\n'),
    )
  })

  it('says so when there is nothing to report', () => {
    expect(formatText([])).toBe('No problems found.')
  })
})

describe('formatJson', () => {
  it('includes diagnostics and summary', () => {
    expect(JSON.parse(formatJson(diagnostics))).toEqual({ diagnostics, summary: { errors: 2, warnings: 1 } })
  })
})

describe('formatReport', () => {
  it('dispatches on the format', () => {
    expect(formatReport([], 'json')).toBe(JSON.stringify({ diagnostics: [], summary: { errors: 0, warnings: 0 } }, null, 2))
    expect(formatReport([], 'text')).toBe('No problems found.')
    expect(isReportFormat('json')).toBe(true)
    expect(isReportFormat('sarif')).toBe(false)
  })
})
