export interface MiseTask {
  name: string
  description: string
  /** Commands; empty for file tasks and tasks that only aggregate dependencies */
  run: string[]
  depends: string[]
  dependsPost: string[]
  waitFor: string[]
  aliases: string[]
  dir?: string
  hide: boolean
  source: 'toml' | 'file'
  /** Absolute path of the defining file */
  location: string
}

export interface MiseParseError {
  message: string
  line?: number
}

export type MiseConfig =
  | { exists: false; file: string; tasks: MiseTask[]; taskErrors: TaskError[] }
  | {
      exists: true
      file: string
      error?: MiseParseError
      tasks: MiseTask[]
      taskErrors: TaskError[]
    }

export interface TaskError {
  task: string
  message: string
  location: string
}

export interface DependencyIssue {
  kind: 'unknown' | 'cycle'
  task: string
  message: string
}

export interface TaskReference {
  name: string
  line: number
}
