/**
 * Run lint rules over a workspace snapshot.
 */

import type { SeveritySetting } from '../config/workspace-config.js'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'
import { type RulePolicy, filterRules } from './policy.js'
import { ALL_RULES } from './rules/index.js'
import type { CheckSummary, Diagnostic, Finding, Rule, WorkspaceSnapshot } from './types.js'

const log = createLogger('lint')

export interface RunOptions {
  rules?: readonly Rule[]
  policy?: RulePolicy
  severity?: Record<string, SeveritySetting>
}

export function runChecks(workspace: WorkspaceSnapshot, options: RunOptions = {}): Diagnostic[] {
  const selected = filterRules(options.rules ?? ALL_RULES, options.policy ?? {})
  const overrides = options.severity ?? {}
  const diagnostics: Diagnostic[] = []

  for (const rule of selected) {
    const override = overrides[rule.id]
    if (override === 'off') continue

    let findings: Finding[]
    try {
      findings = rule.check(workspace)
    } catch (err) {
      throw new Error(`Rule ${rule.id} failed: ${errorMessage(err)}`)
    }

    for (const finding of findings) {
      diagnostics.push({
        rule: rule.id,
        severity: override ?? finding.severity ?? rule.defaultSeverity,
        message: finding.message,
        ...(finding.file !== undefined ? { file: finding.file } : {}),
        ...(finding.line !== undefined ? { line: finding.line } : {}),
      })
    }
    log.debug(`${rule.id}: ${findings.length} finding(s)`)
  }

  return diagnostics.sort(compareDiagnostics)
}

export function summarize(diagnostics: Diagnostic[]): CheckSummary {
  return {
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
  }
}

/** Workspace-level diagnostics (no file) first, then by file, line and rule. */
function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileA = a.file ?? ''
  const fileB = b.file ?? ''
  if (fileA !== fileB) return fileA < fileB ? -1 : 1
  const lineDiff = (a.line ?? 0) - (b.line ?? 0)
  if (lineDiff !== 0) return lineDiff
  return a.rule < b.rule ? -1 : a.rule > b.rule ? 1 : 0
}
