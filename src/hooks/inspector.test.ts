import fs from 'node:fs'
import path from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { cleanupWorkspaces, makeWorkspace } from '../testing/workspace.js'
import { inspectHooks, invokesCommand, readHooksPath } from './inspector.js'

afterEach(() => {
  cleanupWorkspaces()
})

describe('inspectHooks', () => {
  it('inspects required and present hooks', () => {
    const root = makeWorkspace({
      '.githooks/pre-commit': '#!/bin/sh\n# runs drift on staged files\ndrift check --staged\n',
      '.githooks/post-merge': 'echo merged\n',
      '.githooks/commit-msg.sample': '#!/bin/sh\n',
    })
    fs.chmodSync(path.join(root, '.githooks/pre-commit'), 0o755)
    fs.chmodSync(path.join(root, '.githooks/post-merge'), 0o644)

    const inspection = inspectHooks(root, '.githooks', ['pre-commit', 'pre-push'], 'drift')
    const dir = path.join(root, '.githooks')

    expect(inspection.dir).toBe(dir)
    expect(inspection.dirExists).toBe(true)
    expect(inspection.hooks).toEqual([
      {
        name: 'post-merge',
        path: path.join(dir, 'post-merge'),
        required: false,
        exists: true,
        executable: false,
        shebang: null,
        invokesCommand: false,
      },
      {
        name: 'pre-commit',
        path: path.join(dir, 'pre-commit'),
        required: true,
        exists: true,
        executable: true,
        shebang: '/bin/sh',
        invokesCommand: true,
      },
      {
        name: 'pre-push',
        path: path.join(dir, 'pre-push'),
        required: true,
        exists: false,
        executable: false,
        shebang: null,
        invokesCommand: false,
      },
    ])
  })

  it('reports a missing hooks directory', () => {
    const inspection = inspectHooks(makeWorkspace(), '.githooks', ['pre-commit'], 'drift')

    expect(inspection.dirExists).toBe(false)
    expect(inspection.hooks.map((h) => [h.name, h.exists])).toEqual([['pre-commit', false]])
  })
})

describe('invokesCommand', () => {
  it.each([
    ['drift check', true],
    ['npx drift --staged', true],
    ['exec drift', true],
    ['# drift check', false],
    ['drifter check', false],
    ['echo no-drift', false],
  ])('%s -> %s', (script, expected) => {
    expect(invokesCommand(script, 'drift')).toBe(expected)
  })

  it('escapes regular expression characters in the command', () => {
    expect(invokesCommand('npm run check.all', 'check.all')).toBe(true)
    expect(invokesCommand('npm run checkXall', 'check.all')).toBe(false)
  })
})

describe('readHooksPath', () => {
  it('is undefined outside a git repository', async () => {
    const getConfig = vi.fn()
    await expect(readHooksPath({ checkIsRepo: async () => false, getConfig })).resolves.toBeUndefined()
    expect(getConfig).not.toHaveBeenCalled()
  })

  it('returns core.hooksPath or null', async () => {
    const git = {
      checkIsRepo: async () => true,
      getConfig: vi.fn(async (key: string) => ({ value: key === 'core.hooksPath' ? '.githooks' : null })),
    }
    await expect(readHooksPath(git)).resolves.toBe('.githooks')

    git.getConfig.mockResolvedValueOnce({ value: null })
    await expect(readHooksPath(git)).resolves.toBeNull()
  })
})
