/**
 * All tools, in registration order.
 */

import type { Tool } from '../core/types.js'
import { skillTools } from './skill-tools.js'
import { workspaceTools } from './workspace-tools.js'

export function getAllTools(): Tool[] {
  return [...skillTools, ...workspaceTools]
}

export * from './skill-tools.js'
export * from './workspace-tools.js'
