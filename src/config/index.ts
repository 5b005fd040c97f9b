export {
  loadConfig,
  resolveConfig,
  applyEnvOverrides,
  getDefaultConfig,
  clearConfigCache,
  CONFIG_FILENAME,
} from './loadConfig.js'
export type { MemoryConfigInput } from './loadConfig.js'
export { memoryConfigSchema } from './schema.js'
export type {
  MemoryConfig,
  DecayConfig,
  RetrievalConfig,
  EmbeddingConfig,
  PersistenceConfig,
  MaintenanceConfig,
} from './schema.js'
