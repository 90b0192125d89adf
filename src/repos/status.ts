/**
 * Git status of the sibling repositories a workspace coordinates.
 */

import fs from 'node:fs'
import type { RepoConfig } from '../config/workspace-config.js'
import { type GitFactory, createGitClient } from '../git/client.js'
import { errorMessage } from '../infra/errors.js'
import { createLogger } from '../infra/logger.js'
import { type RetryOptions, retry } from '../infra/retry.js'

const log = createLogger('repos')

export type RepoStatus =
  | { name: string; path: string; state: 'missing' }
  | { name: string; path: string; state: 'not-a-repo' }
  | { name: string; path: string; state: 'error'; error: string }
  | {
      name: string
      path: string
      state: 'ok'
      branch: string | null
      tracking: string | null
      ahead: number
      behind: number
      staged: number
      modified: number
      untracked: number
      conflicted: number
      clean: boolean
      fetchError?: string
    }

export interface RepoStatusOptions {
  fetch?: boolean
  gitFactory?: GitFactory
  retry?: RetryOptions
}

/** Status for every repo, concurrently; results follow configuration order. */
export async function collectRepoStatus(
  repos: RepoConfig[],
  options: RepoStatusOptions = {},
): Promise<RepoStatus[]> {
  return Promise.all(repos.map((repo) => repoStatus(repo, options)))
}

export async function repoStatus(repo: RepoConfig, options: RepoStatusOptions = {}): Promise<RepoStatus> {
  const { name, path } = repo
  if (!fs.existsSync(path)) return { name, path, state: 'missing' }

  try {
    // simple-git throws synchronously for a path that is not a directory
    const git = (options.gitFactory ?? createGitClient)(path)
    if (!(await git.checkIsRepo())) return { name, path, state: 'not-a-repo' }

    let fetchError: string | undefined
    if (options.fetch) {
      try {
        await retry(() => git.fetch(), {
          ...options.retry,
          onRetry: (error, attempt, delayMs) =>
            log.warn(`git fetch failed for ${name}, retrying`, {
              attempt,
              delayMs,
              error: errorMessage(error),
            }),
        })
      } catch (err) {
        fetchError = errorMessage(err)
        log.error(`git fetch failed for ${name}`, { error: fetchError })
      }
    }

    const status = await git.status()
    return {
      name,
      path,
      state: 'ok',
      branch: status.current,
      tracking: status.tracking,
      ahead: status.ahead,
      behind: status.behind,
      staged: status.staged.length,
      modified: status.modified.length,
      untracked: status.not_added.length,
      conflicted: status.conflicted.length,
      clean: status.isClean(),
      ...(fetchError !== undefined ? { fetchError } : {}),
    }
  } catch (err) {
    log.error(`git status failed for ${name}`, { error: errorMessage(err) })
    return { name, path, state: 'error', error: errorMessage(err) }
  }
}
