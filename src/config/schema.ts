import { z } from 'zod'

export const decayConfigSchema = z.object({
  /** Episodic memories below this strength are removed by decayAndPrune */
  pruneThreshold: z.number().default(0.1),
  /** Below this strength (but above pruneThreshold) an episodic memory is "weak" */
  weakThreshold: z.number().default(0.3),
})

export const retrievalConfigSchema = z.object({
  /** Combined score = similarity * similarityWeight + strength * strengthWeight */
  similarityWeight: z.number().min(0).default(0.6),
  strengthWeight: z.number().min(0).default(0.4),
})

export const embeddingConfigSchema = z.object({
  /** openai: any OpenAI-compatible embeddings endpoint; none: recency fallback only */
  provider: z.enum(['openai', 'none']).default('none'),
  model: z.string().default('text-embedding-3-small'),
  baseURL: z.string().optional(),
  apiKey: z.string().optional(),
  /** Fixed vector length; inferred from the first embedding when absent */
  dimensions: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(5000),
  /** Stop calling the provider for the rest of the session after the first failure */
  cacheUnavailable: z.boolean().default(false),
})

export const persistenceConfigSchema = z.object({
  /** Relative paths resolve against the data directory */
  file: z.string().default('memories.json'),
  includeEmbeddings: z.boolean().default(true),
})

export const maintenanceConfigSchema = z.object({
  decayEveryNTurns: z.number().int().positive().default(5),
  persistEveryNTurns: z.number().int().positive().default(10),
})

export const memoryConfigSchema = z.object({
  decay: decayConfigSchema.default({}),
  retrieval: retrievalConfigSchema.default({}),
  embedding: embeddingConfigSchema.default({}),
  persistence: persistenceConfigSchema.default({}),
  maintenance: maintenanceConfigSchema.default({}),
})

export type MemoryConfig = z.infer<typeof memoryConfigSchema>
export type DecayConfig = z.infer<typeof decayConfigSchema>
export type RetrievalConfig = z.infer<typeof retrievalConfigSchema>
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>
export type PersistenceConfig = z.infer<typeof persistenceConfigSchema>
export type MaintenanceConfig = z.infer<typeof maintenanceConfigSchema>
