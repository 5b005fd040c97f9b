/**
 * Unified error model
 * Error codes, categories, context and a fix suggestion
 */

import chalk from 'chalk'
import { getErrorCode, getErrorMessage } from './assertError.js'

// ============ Categories ============

export type ErrorCategory =
  | 'CONFIG' // configuration
  | 'MEMORY' // memory store contract violations
  | 'PERSISTENCE' // disk I/O
  | 'EMBEDDING' // embedding provider
  | 'VALIDATION' // malformed input
  | 'TIMEOUT'
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'DUPLICATE_ID'
  | 'INVALID_RECORD'
  | 'PERSIST_FAILED'
  | 'LOAD_FAILED'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMBEDDING_TIMEOUT'
  | 'UNKNOWN'

// ============ Error class ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** Terminal rendering */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(`${chalk.red('✗')} ${chalk.bold('Error')} [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(`${chalk.dim('    →')} ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ Factories ============

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Check .npc-memory.yaml against the documented keys'
    )
  }

  static duplicateId(id: string): AppError {
    return new AppError(
      'DUPLICATE_ID',
      `Memory already exists: ${id}`,
      'MEMORY',
      undefined,
      'Use a new id, or remove the existing memory first'
    )
  }

  static invalidRecord(reason: string): AppError {
    return new AppError('INVALID_RECORD', `Invalid memory record: ${reason}`, 'VALIDATION')
  }

  static persistFailed(filePath: string, cause: unknown): AppError {
    return new AppError(
      'PERSIST_FAILED',
      `Failed to save memories to ${filePath}: ${getErrorMessage(cause)}`,
      'PERSISTENCE',
      cause,
      ioSuggestion(cause)
    )
  }

  static loadFailed(filePath: string, reason: string, cause?: unknown): AppError {
    return new AppError(
      'LOAD_FAILED',
      `Failed to load memories from ${filePath}: ${reason}`,
      'PERSISTENCE',
      cause,
      cause === undefined ? 'The memory file is not a valid save; restore a backup' : ioSuggestion(cause)
    )
  }

  static embeddingUnavailable(provider: string, cause?: unknown): AppError {
    const detail = cause === undefined ? '' : `: ${getErrorMessage(cause)}`
    return new AppError(
      'EMBEDDING_UNAVAILABLE',
      `Embedding provider "${provider}" unavailable${detail}`,
      'EMBEDDING',
      cause,
      'Retrieval falls back to recency ordering until the provider recovers'
    )
  }

  static embeddingTimeout(provider: string, timeoutMs: number): AppError {
    return new AppError(
      'EMBEDDING_TIMEOUT',
      `Embedding provider "${provider}" timed out after ${timeoutMs}ms`,
      'TIMEOUT',
      undefined,
      'Raise embedding.timeoutMs or check the embedding server'
    )
  }
}

// Suggestions for Node filesystem error codes
const IO_SUGGESTIONS: Record<string, string> = {
  ENOSPC: 'Free disk space and save again',
  EACCES: 'Check write permission on the data directory',
  EPERM: 'Check write permission on the data directory',
  EROFS: 'The data directory is on a read-only filesystem',
  ENOENT: 'Check that the data directory exists',
}

function ioSuggestion(cause: unknown): string | undefined {
  const code = getErrorCode(cause)
  return code ? IO_SUGGESTIONS[code] : undefined
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  MEMORY: chalk.red,
  PERSISTENCE: chalk.red,
  EMBEDDING: chalk.magenta,
  VALIDATION: chalk.yellow,
  TIMEOUT: chalk.magenta,
  UNKNOWN: chalk.gray,
}

/** Narrow an unknown value to AppError, optionally with a specific code */
export function isAppError(value: unknown, code?: ErrorCode): value is AppError {
  return value instanceof AppError && (code === undefined || value.code === code)
}
