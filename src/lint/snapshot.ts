/**
 * Load everything the lint rules look at in one pass.
 */

import fs from 'node:fs'
import { join, relative } from 'node:path'
import type { WorkspaceConfig } from '../config/workspace-config.js'
import { collectDocs } from '../docs/links.js'
import { type GitClient, createGitClient } from '../git/client.js'
import { inspectHooks, readHooksPath } from '../hooks/inspector.js'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'
import { listMemories } from '../memory/memories.js'
import { loadMiseConfig } from '../mise/catalogue.js'
import { SkillScanner } from '../skills/scanner.js'
import type { TextFile, WorkspaceSnapshot } from './types.js'

const log = createLogger('lint')

export interface SnapshotOptions {
  scanner?: SkillScanner
  /** Git access for the hooks-path check; null skips it */
  git?: Pick<GitClient, 'checkIsRepo' | 'getConfig'> | null
}

export async function loadWorkspace(
  config: WorkspaceConfig,
  options: SnapshotOptions = {},
): Promise<WorkspaceSnapshot> {
  const { root } = config
  const scanner =
    options.scanner ?? new SkillScanner({ descriptionMax: config.skillDescriptionMax })

  const skills = scanner.scan(root, config.skillsDirs)
  const mise = loadMiseConfig(root, config.miseFile, config.miseTaskDirs)
  const hooks = inspectHooks(root, config.hooksDir, config.requiredHooks, config.hookCommand)
  const memories = listMemories(root, config.memoryDirs)

  const docPaths = await collectDocs(root, config.docs, config.docsIgnore)
  const docs = docPaths.flatMap((path) => readText(root, join(root, path)))

  const textFiles = new Map<string, TextFile>()
  for (const doc of docs) textFiles.set(doc.path, doc)
  for (const hook of hooks.hooks) {
    if (!hook.exists) continue
    for (const file of readText(root, hook.path)) textFiles.set(file.path, file)
  }
  for (const skill of skills.skills) {
    for (const file of readText(root, skill.location)) textFiles.set(file.path, file)
  }

  return {
    config,
    skills,
    mise,
    hooks,
    hooksPath: await loadHooksPath(root, options.git),
    docs,
    textFiles: [...textFiles.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
    memories,
  }
}

async function loadHooksPath(
  root: string,
  git: SnapshotOptions['git'],
): Promise<string | null | undefined> {
  if (git === null) return undefined
  try {
    return await readHooksPath(git ?? createGitClient(root))
  } catch (err) {
    log.warn('Cannot read core.hooksPath', { error: errorMessage(err) })
    return undefined
  }
}

function readText(root: string, absPath: string): TextFile[] {
  try {
    return [{ path: toRelative(root, absPath), content: fs.readFileSync(absPath, 'utf-8') }]
  } catch (err) {
    log.warn(`Cannot read ${absPath}`, { error: errorMessage(err) })
    return []
  }
}

export function toRelative(root: string, absPath: string): string {
  return relative(root, absPath).split('\\').join('/')
}
