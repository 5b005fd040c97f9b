/**
 * @entry Memory module
 *
 * Decay-weighted, similarity-ranked memory for non-player characters.
 *
 * Main API:
 * - createMemoryStore(): build a session store from config
 * - MemoryStore.add / retrieveBySimilarity / retrieveByImportance / decayAndPrune / listAll
 * - MemoryStore.persist / load: atomic JSON save file
 * - createEpisodicMemory() / createSemanticMemory(): record factories
 * - calculateStrength(): current strength of a record
 * - createMaintenanceScheduler(): decay and save every N turns
 */

// Types
export { ALL_AGENTS, EMOTIONS, FACT_TYPES } from './types.js'
export type {
  Emotion,
  FactType,
  MemoryKind,
  EpisodicMemory,
  SemanticMemory,
  MemoryRecord,
  MemoryState,
  RetrievedMemory,
  RetrievedEpisodic,
  RetrievedSemantic,
  RankingBasis,
  MemoryHealth,
  MemoryStats,
} from './types.js'

// Record factories
export { createEpisodicMemory, createSemanticMemory, normalizeRecord } from './createMemory.js'
export type { EpisodicInput, SemanticInput } from './createMemory.js'

// Decay engine
export {
  DECAY_TIME_SCALE_HOURS,
  calculateStrength,
  decayedStrength,
  elapsedHours,
  memoryState,
  hoursUntilFade,
  clampUnit,
} from './decayEngine.js'

// Similarity index
export { SimilarityIndex, cosineSimilarity } from './similarityIndex.js'
export type { IndexHit, IndexQueryResult } from './similarityIndex.js'

// Embedding capability
export {
  NullEmbeddingProvider,
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
} from './embeddingProvider.js'
export type { EmbeddingProvider, EmbedOptions, OpenAIEmbeddingOptions } from './embeddingProvider.js'
export { Embedder } from './embedder.js'

// Store
export { MemoryStore } from '../store/MemoryStore.js'
export type {
  MemoryStoreOptions,
  SimilarityQueryOptions,
  SimilarityRetrieval,
  DecayReport,
  PersistSummary,
  LoadSummary,
} from '../store/MemoryStore.js'
export { createMemoryStore } from './createMemoryStore.js'
export type { CreateMemoryStoreOptions } from './createMemoryStore.js'

// Maintenance
export { createMaintenanceScheduler } from './maintenance.js'
export type { MaintenanceScheduler, TurnMaintenance } from './maintenance.js'
