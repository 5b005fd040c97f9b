/**
 * Helpers for values caught from `catch (e)`.
 */

export function isError(value: unknown): value is Error {
  return value instanceof Error
}

/** Message of an unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/** Node system error code (ENOENT, EACCES, ENOSPC...) if present */
export function getErrorCode(error: unknown): string | undefined {
  if (!isError(error) || !('code' in error)) return undefined
  return typeof error.code === 'string' ? error.code : undefined
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}
