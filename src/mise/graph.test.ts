import { describe, expect, it } from 'vitest'
import { dependencyName, findCycles, findDependencyIssues, findTaskReferences, resolveTaskName } from './graph.js'
import type { MiseTask } from './types.js'

function task(name: string, fields: Partial<MiseTask> = {}): MiseTask {
  return {
    name,
    description: '',
    run: [],
    depends: [],
    dependsPost: [],
    waitFor: [],
    aliases: [],
    hide: false,
    source: 'toml',
    location: '/w/mise.toml',
    ...fields,
  }
}

describe('resolveTaskName', () => {
  const tasks = [task('build', { aliases: ['b'] }), task('test:unit'), task('test:e2e')]

  it('matches names and aliases', () => {
    expect(resolveTaskName('build', tasks).map((t) => t.name)).toEqual(['build'])
    expect(resolveTaskName('b', tasks).map((t) => t.name)).toEqual(['build'])
    expect(resolveTaskName('deploy', tasks)).toEqual([])
  })

  it('expands a trailing wildcard', () => {
    expect(resolveTaskName('test:*', tasks).map((t) => t.name)).toEqual(['test:unit', 'test:e2e'])
  })
})

describe('dependencyName', () => {
  it('drops task arguments', () => {
    expect(dependencyName('  build --release ')).toBe('build')
  })
})

describe('findDependencyIssues', () => {
  it('reports unknown dependencies per field', () => {
    const tasks = [
      task('build'),
      task('test', { depends: ['build', 'gen'] }),
      task('deploy', { dependsPost: ['notify --slack'], waitFor: ['te*'] }),
    ]

    expect(findDependencyIssues(tasks)).toEqual([
      { kind: 'unknown', task: 'test', message: 'task "test" depends on unknown task "gen"' },
      { kind: 'unknown', task: 'deploy', message: 'task "deploy" depends_post on unknown task "notify"' },
    ])
  })

  it('reports each cycle once', () => {
    const tasks = [
      task('test', { depends: ['build'] }),
      task('lint', { depends: ['test'] }),
      task('build', { depends: ['lint'] }),
      task('loop', { depends: ['loop'] }),
    ]

    expect(findDependencyIssues(tasks)).toEqual([
      { kind: 'cycle', task: 'build', message: 'dependency cycle: build -> lint -> test -> build' },
      { kind: 'cycle', task: 'loop', message: 'dependency cycle: loop -> loop' },
    ])
  })

  it('reports a wildcard that matches no task', () => {
    const tasks = [task('build', { depends: ['gen:*'] }), task('generate')]

    expect(findDependencyIssues(tasks)).toEqual([
      { kind: 'unknown', task: 'build', message: 'task "build" depends on unknown task "gen:*"' },
    ])
  })
})

describe('findCycles', () => {
  it('ignores depends_post and wait_for edges', () => {
    const tasks = [task('a', { depends: ['b'] }), task('b', { dependsPost: ['a'], waitFor: ['a'] })]
    expect(findCycles(tasks)).toEqual([])
  })

  it('lists overlapping cycles that share tasks', () => {
    const tasks = [task('a', { depends: ['b', 'c'] }), task('b', { depends: ['c'] }), task('c', { depends: ['a'] })]

    expect(findCycles(tasks)).toEqual([
      ['a', 'b', 'c', 'a'],
      ['a', 'c', 'a'],
    ])
  })

  it('lists every cycle through a shared hub', () => {
    const tasks = [
      task('hub', { depends: ['x', 'y'] }),
      task('x', { depends: ['hub'] }),
      task('y', { depends: ['hub', 'x'] }),
    ]

    expect(findCycles(tasks)).toEqual([
      ['hub', 'x', 'hub'],
      ['hub', 'y', 'hub'],
      ['hub', 'y', 'x', 'hub'],
    ])
  })
})

describe('findTaskReferences', () => {
  it('finds mise run and mise r invocations with their lines', () => {
    const text = [
      'Run `mise run build` first.',
      'Then mise r --force test:unit, and mise run lint.',
      'mise install does not count',
    ].join('\n')

    expect(findTaskReferences(text)).toEqual([
      { name: 'build', line: 1 },
      { name: 'test:unit', line: 2 },
      { name: 'lint', line: 2 },
    ])
  })

  it('skips the values of flags that take one', () => {
    const text = ['mise run -j 4 build', 'mise run --jobs 2 lint', 'mise run --cd sub -t node@20 test', 'mise run --jobs=3 e2e'].join(
      '\n',
    )

    expect(findTaskReferences(text)).toEqual([
      { name: 'build', line: 1 },
      { name: 'lint', line: 2 },
      { name: 'test', line: 3 },
      { name: 'e2e', line: 4 },
    ])
  })
})
