/**
 * Memory record model
 *
 * A record is either episodic (an event that fades) or semantic (a fact that
 * does not). Kind-specific logic switches on `kind`, never on field presence.
 */

/** Owner id meaning "every agent can recall this" */
export const ALL_AGENTS = 'all'

export const EMOTIONS = ['gratitude', 'fear', 'anger', 'joy', 'neutral', 'sadness'] as const
export type Emotion = (typeof EMOTIONS)[number]

export const FACT_TYPES = ['profession', 'relationship', 'reputation', 'quest_status', 'general'] as const
export type FactType = (typeof FACT_TYPES)[number]

export type MemoryKind = 'episodic' | 'semantic'

interface MemoryHeader {
  id: string
  text: string
  /** Agent the memory belongs to, or ALL_AGENTS */
  ownerId: string
  createdAt: Date
  embedding?: number[]
}

export interface EpisodicMemory extends MemoryHeader {
  kind: 'episodic'
  importance: number // 0-1
  emotion: Emotion
  location: string
  participants: string[]
  decayRate: number // 0-1, 0 = never fades
}

export interface SemanticMemory extends MemoryHeader {
  kind: 'semantic'
  factType: FactType
  /** Id of the agent or thing the fact is about */
  subject: string
  confidence: number // 0-1
  source: string
}

export type MemoryRecord = EpisodicMemory | SemanticMemory

/** Lifecycle of an episodic record at a given time */
export type MemoryState = 'active' | 'weak' | 'pruned'

// ============ Retrieval output ============

interface RetrievedHeader {
  id: string
  text: string
  ownerId: string
  createdAt: Date
  /**
   * Display weight: current strength for episodic records, confidence for semantic ones.
   */
  strength: number
  /** Ranking score the result was ordered by */
  score: number
  record: MemoryRecord
}

export interface RetrievedEpisodic extends RetrievedHeader {
  kind: 'episodic'
  emotion: Emotion
  importance: number
  location: string
}

export interface RetrievedSemantic extends RetrievedHeader {
  kind: 'semantic'
  factType: FactType
  subject: string
}

export type RetrievedMemory = RetrievedEpisodic | RetrievedSemantic

/** How a similarity retrieval was ranked */
export type RankingBasis = 'similarity' | 'recency'

export interface MemoryHealth {
  id: string
  title: string
  kind: MemoryKind
  strength: number
  state: MemoryState
  /** Infinity for records that never fade */
  hoursUntilFade: number
}

export interface MemoryStats {
  total: number
  episodic: number
  semantic: number
  withEmbedding: number
  embeddingAvailable: boolean
  dimensions: number | null
}
