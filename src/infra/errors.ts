/**
 * Error types shared by the CLI, the lint runner and the MCP tools.
 */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** A workspace.config.json that cannot be read or does not validate. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message)
    this.name = 'ConfigError'
  }
}

/** Bad command-line input. The CLI exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
