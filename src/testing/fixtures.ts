/**
 * A workspace with one problem of most kinds, shared by the lint and CLI tests.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { GitClient } from '../git/client.js'
import { makeWorkspace, skillMd } from './workspace.js'

export function messyWorkspace(): string {
  const root = makeWorkspace({
    '.github/skills/deploy/SKILL.md': skillMd(
      'deploy',
      'Ship to staging',
      'Run `mise run deploy:staging` then `mise run smoke`.',
    ),
    '.github/skills/review/SKILL.md': '---\nname: code-review\ndescription: Review changes\nowner: me\n---\n',
    '.github/skills/broken/SKILL.md': '# Broken\n',
    '.github/skills/orphan/notes.md': 'draft\n',
    'mise.toml': [
      '[tasks.build]',
      'run = "tsc"',
      'depends = ["gen"]',
      '',
      '[tasks.a]',
      'depends = ["b"]',
      '',
      '[tasks.b]',
      'depends = ["a"]',
      '',
    ].join('\n'),
    '.mise/tasks/deploy/staging': '#!/bin/sh\necho staging\n',
    '.githooks/pre-commit': '#!/bin/sh\nmise run build\n',
    '.githooks/post-checkout': 'echo checked out\n',
    'README.md': '# Workspace\n\nSee [guide](docs/guide.md) and [missing](docs/missing.md).\n\nRun `mise run build`.\n',
    'docs/guide.md': 'Guide\n',
    '.serena/memories/empty.md': '',
  })
  fs.chmodSync(path.join(root, '.githooks/pre-commit'), 0o755)
  fs.chmodSync(path.join(root, '.githooks/post-checkout'), 0o644)
  return root
}

/** A repository whose core.hooksPath is unset. */
export function repoWithoutHooksPath(): Pick<GitClient, 'checkIsRepo' | 'getConfig'> {
  return {
    checkIsRepo: async () => true,
    getConfig: async () => ({ value: null }),
  }
}

/** Diagnostics `agent-workspace check` reports for messyWorkspace(). */
export const MESSY_DIAGNOSTICS = [
  {
    rule: 'hook/hooks-path',
    severity: 'warning',
    message: 'core.hooksPath is unset; run: git config core.hooksPath .githooks',
  },
  {
    rule: 'hook/not-executable',
    severity: 'error',
    message: 'hook "post-checkout" is not executable (chmod +x)',
    file: '.githooks/post-checkout',
  },
  {
    rule: 'hook/no-shebang',
    severity: 'warning',
    message: 'hook "post-checkout" has no #! line',
    file: '.githooks/post-checkout',
    line: 1,
  },
  {
    rule: 'hook/command',
    severity: 'warning',
    message: 'hook "pre-commit" does not run "drift"',
    file: '.githooks/pre-commit',
  },
  {
    rule: 'hook/missing',
    severity: 'error',
    message: 'required hook "pre-push" is missing',
    file: '.githooks/pre-push',
  },
  {
    rule: 'skill/frontmatter',
    severity: 'error',
    message: 'missing YAML front matter (--- block)',
    file: '.github/skills/broken/SKILL.md',
    line: 1,
  },
  {
    rule: 'mise/unknown-reference',
    severity: 'error',
    message: '"mise run smoke" references an undefined task',
    file: '.github/skills/deploy/SKILL.md',
    line: 6,
  },
  {
    rule: 'skill/missing-file',
    severity: 'warning',
    message: 'skill directory has no SKILL.md',
    file: '.github/skills/orphan',
  },
  {
    rule: 'skill/name-matches-directory',
    severity: 'error',
    message: 'name "code-review" does not match directory "review"',
    file: '.github/skills/review/SKILL.md',
    line: 2,
  },
  {
    rule: 'skill/metadata',
    severity: 'error',
    message: 'owner: unknown field "owner"',
    file: '.github/skills/review/SKILL.md',
    line: 4,
  },
  {
    rule: 'skill/empty-body',
    severity: 'warning',
    message: 'skill has no instructions after the front matter',
    file: '.github/skills/review/SKILL.md',
    line: 6,
  },
  {
    rule: 'memory/empty',
    severity: 'warning',
    message: 'memory "empty" is empty',
    file: '.serena/memories/empty.md',
  },
  {
    rule: 'doc/broken-link',
    severity: 'error',
    message: 'broken link: docs/missing.md',
    file: 'README.md',
    line: 3,
  },
  {
    rule: 'mise/dependency-cycle',
    severity: 'error',
    message: 'dependency cycle: a -> b -> a',
    file: 'mise.toml',
  },
  {
    rule: 'mise/unknown-dependency',
    severity: 'error',
    message: 'task "build" depends on unknown task "gen"',
    file: 'mise.toml',
  },
]
