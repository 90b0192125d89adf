/**
 * Structured logging with subsystem loggers, level control, and file output.
 *
 * Usage:
 *   import { createLogger } from '../infra/logger.js'
 *   const log = createLogger('skills')
 *   log.info('Scanned skills directory')
 *   log.warn('Unreadable SKILL.md', { path, error: err.message })
 *
 * Configuration via environment:
 *   LOG_LEVEL=debug|info|warn|error  (default: info)
 *   LOG_FILE=true|false              (default: true, writes to ~/.agent-workspace/logs/)
 *
 * Everything goes to stderr: stdout carries reports and the MCP stdio transport.
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { errorMessage } from './errors.js'

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

export interface LogEntry {
  ts: string
  level: LogLevel
  sys: string
  msg: string
  data?: Record<string, unknown>
}

/* ------------------------------------------------------------------ */
/*  Level management                                                   */
/* ------------------------------------------------------------------ */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase()
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

/**
 * Change the global log level at runtime.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

/* ------------------------------------------------------------------ */
/*  File output                                                        */
/* ------------------------------------------------------------------ */

const LOG_DIR = join(homedir(), '.agent-workspace', 'logs')
const logFileEnabled = process.env.LOG_FILE !== 'false'

let logDirReady = false
function ensureLogDir(): boolean {
  if (logDirReady) return true
  try {
    mkdirSync(LOG_DIR, { recursive: true })
    logDirReady = true
  } catch (err) {
    console.error(`[logger] cannot create ${LOG_DIR}: ${errorMessage(err)}`)
  }
  return logDirReady
}

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0]
  return join(LOG_DIR, `agent-workspace-${date}.log`)
}

let fileWriteFailed = false
function writeToFile(entry: LogEntry): void {
  if (!logFileEnabled || fileWriteFailed) return
  if (!ensureLogDir()) {
    fileWriteFailed = true
    return
  }
  try {
    appendFileSync(getLogFilePath(), `${JSON.stringify(entry)}\n`)
  } catch (err) {
    // Reported once, then file output stays off for this process
    fileWriteFailed = true
    console.error(`[logger] file output disabled: ${errorMessage(err)}`)
  }
}

/* ------------------------------------------------------------------ */
/*  Console output                                                     */
/* ------------------------------------------------------------------ */

const isTTY = process.stderr.isTTY

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // grey
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
}
const RESET = '\x1b[0m'

export function formatConsole(entry: LogEntry, color = isTTY): string {
  const time = entry.ts.split('T')[1]?.slice(0, 8) || entry.ts
  const lvl = entry.level.toUpperCase().padEnd(5)
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : ''

  if (color) {
    return `${LEVEL_COLORS[entry.level]}${time} ${lvl}${RESET} [${entry.sys}] ${entry.msg}${dataStr}`
  }
  return `${time} ${lvl} [${entry.sys}] ${entry.msg}${dataStr}`
}

/* ------------------------------------------------------------------ */
/*  Logger factory                                                     */
/* ------------------------------------------------------------------ */

/**
 * Create a logger for a specific subsystem.
 *
 * @param subsystem  Short identifier (e.g., 'skills', 'mise', 'mcp')
 */
export function createLogger(subsystem: string): Logger {
  function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      sys: subsystem,
      msg: message,
      ...(data && Object.keys(data).length > 0 ? { data } : {}),
    }

    const consoleFn = level === 'warn' ? console.warn : console.error
    consoleFn(formatConsole(entry))

    writeToFile(entry)
  }

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  }
}
