export { filterRules, mergePolicies, unknownRuleEntries, type RulePolicy } from './policy.js'
export { formatJson, formatReport, formatText, isReportFormat, type ReportFormat } from './reporter.js'
export { ALL_RULES } from './rules/index.js'
export { runChecks, summarize, type RunOptions } from './runner.js'
export { loadWorkspace, toRelative, type SnapshotOptions } from './snapshot.js'
export type {
  CheckSummary,
  Diagnostic,
  Finding,
  Rule,
  RuleCategory,
  Severity,
  TextFile,
  WorkspaceSnapshot,
} from './types.js'
