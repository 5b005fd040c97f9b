/**
 * Record factories used by the event classifier.
 *
 * Fill defaults, generate ids and clamp unit fields. Significance
 * (importance, emotion, decay rate) is whatever the caller decided.
 */

import { createMemoryId } from '../shared/generateId.js'
import { clampUnit } from './decayEngine.js'
import type { Emotion, EpisodicMemory, FactType, MemoryRecord, SemanticMemory } from './types.js'

interface HeaderInput {
  id?: string
  text: string
  ownerId: string
  createdAt?: Date
  embedding?: number[]
}

export interface EpisodicInput extends HeaderInput {
  importance?: number
  emotion?: Emotion
  location?: string
  participants?: string[]
  decayRate?: number
}

export interface SemanticInput extends HeaderInput {
  factType?: FactType
  subject?: string
  confidence?: number
  source?: string
}

export function createEpisodicMemory(input: EpisodicInput): EpisodicMemory {
  return {
    kind: 'episodic',
    id: input.id ?? createMemoryId(),
    text: input.text,
    ownerId: input.ownerId,
    createdAt: input.createdAt ?? new Date(),
    embedding: input.embedding,
    importance: clampUnit(input.importance ?? 0.5),
    emotion: input.emotion ?? 'neutral',
    location: input.location ?? '',
    participants: [...new Set(input.participants ?? [])],
    decayRate: clampUnit(input.decayRate ?? 0.1),
  }
}

export function createSemanticMemory(input: SemanticInput): SemanticMemory {
  return {
    kind: 'semantic',
    id: input.id ?? createMemoryId(),
    text: input.text,
    ownerId: input.ownerId,
    createdAt: input.createdAt ?? new Date(),
    embedding: input.embedding,
    factType: input.factType ?? 'general',
    subject: input.subject ?? '',
    confidence: clampUnit(input.confidence ?? 1),
    source: input.source ?? '',
  }
}

/**
 * Copy of a record with unit fields clamped to [0, 1] and participants deduplicated.
 * Applied by MemoryStore.add to records built outside the factories.
 */
export function normalizeRecord(record: MemoryRecord): MemoryRecord {
  switch (record.kind) {
    case 'episodic':
      return {
        ...record,
        importance: clampUnit(record.importance),
        decayRate: clampUnit(record.decayRate),
        participants: [...new Set(record.participants)],
      }
    case 'semantic':
      return { ...record, confidence: clampUnit(record.confidence) }
  }
}
