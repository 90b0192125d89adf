#!/usr/bin/env node
/**
 * agent-workspace CLI
 *
 * Checks the hygiene of an agent workspace (skills, mise tasks, git hooks, docs and
 * memory notes), helps agents find the right skill, and serves the same tools over MCP.
 *
 * Usage:
 *   agent-workspace              # Run checks (default)
 *   agent-workspace skills api   # Rank skills for a task
 *   agent-workspace --help       # Show help
 */

import dotenv from 'dotenv'
import { helpText, parseArgs, runCommand } from './cli.js'
import { ConfigError, UsageError, errorMessage } from './infra/errors.js'

dotenv.config({ path: ['.env.local', '.env'] })

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2))
  return runCommand(parsed, { out: (text) => console.log(text) })
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`❌ ${error.message}`)
      console.error(helpText())
      process.exitCode = 2
    } else if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`)
      process.exitCode = 2
    } else {
      console.error('❌ Error:', errorMessage(error))
      process.exitCode = 1
    }
  })
