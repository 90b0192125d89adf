/**
 * The slice of simple-git the workspace needs. Kept as an interface so callers can be
 * handed an in-process fake.
 */

import { simpleGit } from 'simple-git'

export interface GitStatusSummary {
  current: string | null
  tracking: string | null
  ahead: number
  behind: number
  staged: string[]
  modified: string[]
  not_added: string[]
  conflicted: string[]
  isClean(): boolean
}

export interface GitClient {
  checkIsRepo(): Promise<boolean>
  status(): Promise<GitStatusSummary>
  fetch(): Promise<unknown>
  getConfig(key: string): Promise<{ value: string | null }>
}

export type GitFactory = (dir: string) => GitClient

export const createGitClient: GitFactory = (dir) => simpleGit(dir)
