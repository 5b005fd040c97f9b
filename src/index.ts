export * from './memory/index.js'
export { loadConfig, resolveConfig, clearConfigCache, memoryConfigSchema } from './config/index.js'
export type { MemoryConfig, MemoryConfigInput } from './config/index.js'
export { AppError, isAppError } from './shared/error.js'
export type { ErrorCode, ErrorCategory } from './shared/error.js'
export type { Result } from './shared/result.js'
export { createLogger, setLogLevel } from './shared/logger.js'
export type { Logger, LogLevel } from './shared/logger.js'
