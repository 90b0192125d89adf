/**
 * Rule Policy: allow/deny filtering for lint rules.
 *
 * Resolution rules:
 *   1. Deny always wins: a rule matching any deny entry is skipped
 *   2. If allow is non-empty, only matching rules run
 *   3. Empty allow = run everything (except denied)
 *   4. Entries are rule ids, "group:<category>", or a `*` suffix wildcard ("skill/*")
 *   5. Unknown ids and groups select nothing and are logged
 */

import { createLogger } from '../infra/logger.js'
import type { Rule, RuleCategory } from './types.js'

const log = createLogger('policy')

export interface RulePolicy {
  allow?: string[]
  deny?: string[]
}

const CATEGORIES: readonly RuleCategory[] = ['skill', 'mise', 'hook', 'doc', 'memory']

/**
 * Filter rules through a policy.
 */
export function filterRules(rules: readonly Rule[], policy: RulePolicy): Rule[] {
  const allow = expandEntries(policy.allow)
  const deny = expandEntries(policy.deny)

  for (const entries of [allow, deny]) {
    for (const id of entries?.ids ?? []) {
      if (!rules.some((rule) => rule.id === id)) log.warn(`Unknown rule: ${id}`)
    }
  }

  return rules.filter((rule) => {
    if (deny && matchesRule(rule, deny)) return false
    if (allow && !matchesRule(rule, allow)) return false
    return true
  })
}

/**
 * Entries that select nothing: unknown ids and groups, and prefixes no rule id starts with.
 */
export function unknownRuleEntries(rules: readonly Rule[], entries: string[]): string[] {
  return entries
    .map((raw) => raw.trim())
    .filter((entry) => {
      if (!entry) return false
      if (entry.startsWith('group:')) return !isCategory(entry.slice(6))
      if (entry.endsWith('*')) return !rules.some((rule) => rule.id.startsWith(entry.slice(0, -1)))
      return !rules.some((rule) => rule.id === entry)
    })
}

/**
 * Merge policies. Deny entries are unioned; the last policy with a non-empty allow wins.
 */
export function mergePolicies(...policies: RulePolicy[]): RulePolicy {
  const merged: RulePolicy = {}
  const allDeny: string[] = []

  for (const p of policies) {
    if (p.allow && p.allow.length > 0) merged.allow = p.allow
    if (p.deny) allDeny.push(...p.deny)
  }

  if (allDeny.length > 0) merged.deny = [...new Set(allDeny)]
  return merged
}

/* ------------------------------------------------------------------ */
/*  Internal helpers                                                   */
/* ------------------------------------------------------------------ */

interface ExpandedEntries {
  ids: Set<string>
  categories: Set<RuleCategory>
  prefixes: string[]
}

function isCategory(value: string): value is RuleCategory {
  return CATEGORIES.some((c) => c === value)
}

function expandEntries(entries: string[] | undefined): ExpandedEntries | null {
  if (!entries || entries.length === 0) return null

  const expanded: ExpandedEntries = { ids: new Set(), categories: new Set(), prefixes: [] }
  for (const raw of entries) {
    const entry = raw.trim()
    if (!entry) continue
    if (entry.startsWith('group:')) {
      const group = entry.slice(6)
      if (isCategory(group)) expanded.categories.add(group)
      else log.warn(`Unknown rule group: ${group}`)
    } else if (entry.endsWith('*')) {
      expanded.prefixes.push(entry.slice(0, -1))
    } else {
      expanded.ids.add(entry)
    }
  }
  return expanded
}

function matchesRule(rule: Rule, entries: ExpandedEntries): boolean {
  return (
    entries.ids.has(rule.id) ||
    entries.categories.has(rule.category) ||
    entries.prefixes.some((prefix) => rule.id.startsWith(prefix))
  )
}
