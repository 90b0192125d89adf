import { summarize } from './runner.js'
import type { Diagnostic } from './types.js'

export type ReportFormat = 'text' | 'json'

export function isReportFormat(value: string): value is ReportFormat {
  return value === 'text' || value === 'json'
}

export function formatText(diagnostics: Diagnostic[]): string {
  if (diagnostics.length === 0) return 'No problems found.'

  const lines = diagnostics.map((d) => {
    const location = d.file ? (d.line !== undefined ? `${d.file}:${d.line}` : d.file) : '(workspace)'
    return `${location}  ${d.severity}  ${d.message}  [${d.rule}]`
  })

  const { errors, warnings } = summarize(diagnostics)
  lines.push('', `${errors} error(s), ${warnings} warning(s)`)
  return lines.join('\n')
}

export function formatJson(diagnostics: Diagnostic[]): string {
  return JSON.stringify({ diagnostics, summary: summarize(diagnostics) }, null, 2)
}

export function formatReport(diagnostics: Diagnostic[], format: ReportFormat): string {
  return format === 'json' ? formatJson(diagnostics) : formatText(diagnostics)
}
