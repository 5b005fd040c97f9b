/**
 * Scoped, levelled logger
 *
 * - levels: debug/info/warn/error/silent
 * - foreground (terse) vs background (includes scope) output, picked from the environment
 * - `logError` attaches structured context and a short stack
 *
 * Usage:
 * - const logger = createLogger('memory-store')
 * - setLogLevel('debug')
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

type ActiveLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<ActiveLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<ActiveLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.NPCMEM_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: ActiveLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatClock(): string {
  const now = new Date()
  const pad = (n: number) => n.toString().padStart(2, '0')
  return chalk.dim(`${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`)
}

function formatMessage(level: ActiveLevel, scope: string, message: string, mode: LogMode): string {
  const label = LEVEL_COLORS[level](LEVEL_LABELS[level])
  if (mode === 'foreground') {
    return `${formatClock()} ${label} ${message}`
  }
  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatClock()} ${label} ${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function write(level: ActiveLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return
    const output = formatMessage(level, scope, message, currentMode)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      write('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      write('error', message, args)
    },
  }
}

// ============ Error logging ============

/** Extra diagnostic fields attached to an error log line */
export interface ErrorContext {
  memoryId?: string
  ownerId?: string
  filePath?: string
  operation?: string
  [key: string]: unknown
}

/**
 * Log an error with context and the first lines of its stack.
 *
 * @example
 * logError(logger, 'Persist failed', err, { filePath, operation: 'persist' })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: Error | string,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : error
  const data: Record<string, unknown> = {}

  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) data[key] = value
    }
  }

  if (error instanceof Error && error.stack) {
    data.stack = error.stack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(`${message}: ${errorMessage}`, data)
  } else {
    loggerInstance.error(`${message}: ${errorMessage}`)
  }
}
