export { loadFileTasks, loadMiseConfig, parseTaskTables } from './catalogue.js'
export {
  dependencyName,
  findCycles,
  findDependencyIssues,
  findTaskReferences,
  resolveTaskName,
} from './graph.js'
export type {
  DependencyIssue,
  MiseConfig,
  MiseParseError,
  MiseTask,
  TaskError,
  TaskReference,
} from './types.js'
