/**
 * JSON file I/O
 *
 * Writes are atomic: content goes to a sibling temp file, is flushed to disk,
 * then renamed over the target. A crash mid-write leaves the previous file intact.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeSync,
} from 'fs'
import { basename, dirname, join } from 'path'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('json-io')

export interface JsonWriteOptions {
  /** Indent, default 2 */
  indent?: number
}

/** Read raw file content, null if the file does not exist. Other I/O errors throw. */
export function readTextIfExists(filepath: string): string | null {
  if (!existsSync(filepath)) return null
  return readFileSync(filepath, 'utf-8')
}

/** Temp file beside the target, so the final rename stays on one filesystem */
export function tempPathFor(filepath: string): string {
  return join(dirname(filepath), `.${basename(filepath)}.${process.pid}.${Date.now()}.tmp`)
}

/**
 * Atomically write JSON. Throws on I/O failure, after removing the temp file;
 * the previous content of `filepath` is left untouched.
 */
export function writeJsonAtomic(filepath: string, data: unknown, options?: JsonWriteOptions): void {
  const content = JSON.stringify(data, null, options?.indent ?? 2)
  ensureDir(dirname(filepath))

  const tempPath = tempPathFor(filepath)
  try {
    const fd = openSync(tempPath, 'w')
    try {
      writeSync(fd, content, null, 'utf-8')
      fsyncSync(fd)
    } finally {
      closeSync(fd)
    }
    renameSync(tempPath, filepath)
  } catch (e) {
    removeQuietly(tempPath)
    throw e
  }
}

function removeQuietly(filepath: string): void {
  try {
    if (existsSync(filepath)) unlinkSync(filepath)
  } catch (e) {
    logger.debug(`Could not remove temp file ${filepath}: ${getErrorMessage(e)}`)
  }
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
