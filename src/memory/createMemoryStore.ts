/**
 * Session bootstrap: config → embedding provider → MemoryStore
 */

import { loadConfig } from '../config/loadConfig.js'
import { MemoryStore } from '../store/MemoryStore.js'
import { createEmbeddingProvider, type EmbeddingProvider } from './embeddingProvider.js'
import type { MemoryConfig } from '../config/schema.js'

export interface CreateMemoryStoreOptions {
  cwd?: string
  /** Skip config file lookup */
  config?: MemoryConfig
  /** Skip provider construction */
  provider?: EmbeddingProvider
  filePath?: string
}

export async function createMemoryStore(options: CreateMemoryStoreOptions = {}): Promise<MemoryStore> {
  const config = options.config ?? (await loadConfig({ cwd: options.cwd }))
  const provider = options.provider ?? createEmbeddingProvider(config.embedding)
  return new MemoryStore({ config, provider, filePath: options.filePath })
}
