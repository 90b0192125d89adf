import fs from 'node:fs'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { cleanupWorkspaces, makeWorkspace } from '../testing/workspace.js'
import { firstHeading, listMemories } from './memories.js'

afterEach(() => {
  cleanupWorkspaces()
  vi.restoreAllMocks()
})

describe('listMemories', () => {
  it('lists Markdown files in every memory directory', () => {
    const root = makeWorkspace({
      '.serena/memories/architecture.md': '# Architecture\n\nNotes',
      '.serena/memories/team/oncall.md': '',
      '.serena/memories/scratch.txt': 'ignored',
      'notes/memories/style.md': 'Use tabs',
    })

    expect(listMemories(root, ['.serena/memories', 'notes/memories', 'absent'])).toEqual([
      {
        name: 'architecture',
        path: '.serena/memories/architecture.md',
        size: 21,
        title: 'Architecture',
        empty: false,
      },
      { name: 'team/oncall', path: '.serena/memories/team/oncall.md', size: 0, title: null, empty: true },
      { name: 'style', path: 'notes/memories/style.md', size: 8, title: null, empty: false },
    ])
  })

  it('records unreadable files and keeps listing the rest', () => {
    const root = makeWorkspace({
      '.serena/memories/a-locked.md': '# Locked\n',
      '.serena/memories/b-open.md': '# Open\n',
    })
    vi.spyOn(fs, 'readFileSync').mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied')
    })

    expect(listMemories(root, ['.serena/memories'])).toEqual([
      {
        name: 'a-locked',
        path: '.serena/memories/a-locked.md',
        size: 0,
        title: null,
        empty: false,
        error: 'EACCES: permission denied',
      },
      { name: 'b-open', path: '.serena/memories/b-open.md', size: 7, title: 'Open', empty: false },
    ])
  })
})

describe('firstHeading', () => {
  it('returns the first ATX heading without closing hashes', () => {
    expect(firstHeading('Intro text\n## Setup ##\n# Later\n')).toBe('Setup')
    expect(firstHeading('no headings')).toBeNull()
  })

  it('skips comment lines inside code fences', () => {
    expect(firstHeading('```sh\n# install deps\nnpm ci\n```\n\n# Build notes\n')).toBe('Build notes')
  })

  it('does not join a bare hash with the next line', () => {
    expect(firstHeading('#\nText below\n')).toBeNull()
  })
})
