/**
 * Vitest global setup
 * Removes save files written to the default data directory after all tests.
 *
 * NPCMEM_DATA_DIR is set to a temp dir by vitest.config.ts, so a real save
 * is never touched.
 */

import { rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { afterAll } from 'vitest'
import { setLogLevel } from '../src/shared/logger.js'

const DATA_DIR = process.env.NPCMEM_DATA_DIR || join(tmpdir(), 'npc-memory-test-data')

// Refuse to clean anything outside the temp dir
const isSafeDir = DATA_DIR.startsWith(tmpdir()) || DATA_DIR.includes('npc-memory-test')

setLogLevel('silent')

afterAll(() => {
  if (!isSafeDir) {
    console.warn(`[setup] Refusing to clean non-temp data dir: ${DATA_DIR}`)
    return
  }
  if (existsSync(DATA_DIR)) {
    rmSync(DATA_DIR, { recursive: true, force: true })
  }
})
