/**
 * ID generation based on crypto.randomUUID
 */

import { randomUUID } from 'crypto'

const MEMORY_ID_PATTERN = /^mem_[0-9a-f]{8}$/

/** Memory id in the form `mem_1a2b3c4d` */
export function createMemoryId(): string {
  return `mem_${randomUUID().replace(/-/g, '').slice(0, 8)}`
}

export function isGeneratedMemoryId(id: string): boolean {
  return MEMORY_ID_PATTERN.test(id)
}
