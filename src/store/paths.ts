/**
 * Storage path constants
 *
 * Data directory priority:
 * 1. NPCMEM_DATA_DIR env var
 * 2. .npc-memory under the working directory
 */

import { isAbsolute, join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.npc-memory'

export function getDataDir(): string {
  const envDir = process.env.NPCMEM_DATA_DIR
  if (envDir) {
    return isAbsolute(envDir) ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

/** Resolve the memory file path; relative paths land in the data directory */
export function resolveMemoryFile(file: string, dataDir: string = getDataDir()): string {
  return isAbsolute(file) ? file : join(dataDir, file)
}
