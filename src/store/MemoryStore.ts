/**
 * Memory store for one game session
 *
 * Owns the record table and the similarity index, ranks retrievals and saves
 * to a single JSON file. Construct one per session and pass it to whatever
 * needs it.
 *
 * Only `add`, `remove`, `decayAndPrune` and `load` change state. Strength is
 * never stored: retrievals recompute it for the `now` they are given.
 */

import { createLogger, logError } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import { ok, err, type Result } from '../shared/result.js'
import { resolveConfig } from '../config/loadConfig.js'
import type { MemoryConfig } from '../config/schema.js'
import { SimilarityIndex } from '../memory/similarityIndex.js'
import { Embedder } from '../memory/embedder.js'
import { NullEmbeddingProvider, type EmbeddingProvider } from '../memory/embeddingProvider.js'
import { normalizeRecord } from '../memory/createMemory.js'
import {
  calculateStrength,
  evaluateDecay,
  hoursUntilFade,
  memoryState,
  normalizeThresholds,
  type StateThresholds,
} from '../memory/decayEngine.js'
import {
  ALL_AGENTS,
  EMOTIONS,
  FACT_TYPES,
  type MemoryHealth,
  type MemoryKind,
  type MemoryRecord,
  type MemoryStats,
  type RankingBasis,
  type RetrievedMemory,
} from '../memory/types.js'
import { decodeMemoryFile, encodeMemoryFile, type SkippedEntry } from './memoryFile.js'
import { readTextIfExists, writeJsonAtomic } from './readWriteJson.js'
import { resolveMemoryFile } from './paths.js'

const logger = createLogger('memory-store')

export interface MemoryStoreOptions {
  config?: MemoryConfig
  /** Defaults to a provider that is never available (recency ranking only) */
  provider?: EmbeddingProvider
  /** Save file; defaults to config.persistence.file under the data directory */
  filePath?: string
  /** Source of "now" when a call does not pass one */
  clock?: () => Date
}

export interface SimilarityQueryOptions {
  kind?: MemoryKind
  now?: Date
}

export interface SimilarityRetrieval {
  basis: RankingBasis
  memories: RetrievedMemory[]
}

export interface DecayReport {
  /** Episodic records evaluated */
  checked: number
  pruned: string[]
  weak: number
  remaining: number
}

export interface PersistSummary {
  filePath: string
  count: number
  savedAt: string
}

export interface LoadSummary {
  filePath: string
  found: boolean
  loaded: number
  skipped: SkippedEntry[]
  /** Records whose vector was missing or unusable and was recomputed */
  reembedded: number
}

function inScope(record: MemoryRecord, ownerId: string): boolean {
  return record.ownerId === ownerId || record.ownerId === ALL_AGENTS
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

/** Frozen copy with its own createdAt, so stored records cannot be edited from outside */
function freezeRecord(record: MemoryRecord): MemoryRecord {
  if (record.embedding) Object.freeze(record.embedding)
  if (record.kind === 'episodic') Object.freeze(record.participants)
  return Object.freeze({ ...record, createdAt: new Date(record.createdAt.getTime()) })
}

/** Copy handed to callers; Date is the one field freezing does not protect */
function detach(record: MemoryRecord): MemoryRecord {
  return Object.freeze({ ...record, createdAt: new Date(record.createdAt.getTime()) })
}

export class MemoryStore {
  readonly filePath: string
  private records = new Map<string, MemoryRecord>()
  private index: SimilarityIndex
  private readonly embedder: Embedder
  private readonly config: MemoryConfig
  private readonly thresholds: StateThresholds
  private readonly clock: () => Date

  constructor(options: MemoryStoreOptions = {}) {
    this.config = options.config ?? resolveConfig()
    this.clock = options.clock ?? (() => new Date())
    this.filePath = options.filePath ?? resolveMemoryFile(this.config.persistence.file)

    const provider: EmbeddingProvider = options.provider ?? new NullEmbeddingProvider()
    this.embedder = new Embedder(provider, {
      timeoutMs: this.config.embedding.timeoutMs,
      cacheUnavailable: this.config.embedding.cacheUnavailable,
    })
    this.index = new SimilarityIndex(this.config.embedding.dimensions ?? provider.dimensions)

    const { adjusted, ...thresholds } = normalizeThresholds(this.config.decay)
    if (adjusted) {
      logger.warn(
        `Decay thresholds clamped: prune ${this.config.decay.pruneThreshold} → ${thresholds.pruneThreshold}, ` +
          `weak ${this.config.decay.weakThreshold} → ${thresholds.weakThreshold}`
      )
    }
    this.thresholds = thresholds
  }

  get size(): number {
    return this.records.size
  }

  /** Effective (clamped) thresholds */
  get pruneThreshold(): number {
    return this.thresholds.pruneThreshold
  }

  get weakThreshold(): number {
    return this.thresholds.weakThreshold
  }

  get(id: string): MemoryRecord | null {
    const record = this.records.get(id)
    return record ? detach(record) : null
  }

  has(id: string): boolean {
    return this.records.has(id)
  }

  // ============ Mutations ============

  /**
   * Insert a record. Throws AppError DUPLICATE_ID if the id is taken
   * (nothing is replaced) and INVALID_RECORD for malformed input.
   *
   * Embedding is best-effort: a usable `record.embedding` is kept as is,
   * otherwise the text is embedded; on failure the record is stored without a
   * vector and only shows up in recency-ranked retrievals.
   */
  async add(record: MemoryRecord): Promise<MemoryRecord> {
    this.validate(record)
    if (this.records.has(record.id)) {
      throw AppError.duplicateId(record.id)
    }

    const normalized = normalizeRecord(record)
    let embedding = this.index.accepts(normalized.embedding) ? normalized.embedding : undefined
    if (!embedding) {
      const vector = await this.embedder.embedOne(normalized.text)
      embedding = this.index.accepts(vector) ? vector : undefined
      if (vector && !embedding) {
        logger.debug(`Dropped embedding for ${record.id}: dimension ${vector.length} ≠ ${this.index.dimensions}`)
      }
    }

    // Another add may have claimed the id while embedding was in flight
    if (this.records.has(record.id)) {
      throw AppError.duplicateId(record.id)
    }

    const stored = freezeRecord({ ...normalized, embedding: embedding ? [...embedding] : undefined })
    this.records.set(stored.id, stored)
    this.index.insert(stored.id, stored.embedding, stored.ownerId, stored.createdAt)
    logger.debug(`Added ${stored.kind} memory ${stored.id} for ${stored.ownerId}`)
    return detach(stored)
  }

  /** Explicit deletion from table and index */
  remove(id: string): boolean {
    const existed = this.records.delete(id)
    this.index.remove(id)
    return existed
  }

  /**
   * Recompute strength of every episodic record at `currentTime` and delete
   * those below the prune threshold. Semantic records are never touched.
   */
  decayAndPrune(currentTime: Date = this.clock()): DecayReport {
    const outcomes = evaluateDecay(this.records.values(), currentTime, this.thresholds)
    const pruned: string[] = []
    let weak = 0

    for (const outcome of outcomes) {
      if (outcome.state === 'pruned') {
        this.remove(outcome.id)
        pruned.push(outcome.id)
      } else if (outcome.state === 'weak') {
        weak++
      }
    }

    if (pruned.length > 0) {
      logger.info(`Pruned ${pruned.length} weak memories (threshold ${this.thresholds.pruneThreshold})`)
    }

    return { checked: outcomes.length, pruned, weak, remaining: this.records.size }
  }

  // ============ Retrieval ============

  /**
   * Memories most relevant to `queryText` for `ownerId`, best first.
   *
   * Similarity ranking: score = similarity * similarityWeight + strength * strengthWeight
   * (semantic records count strength 1), ties to the most recent record.
   * Without a query vector the ranking basis is recency: newest first.
   * Episodic records below the prune threshold are left out in both cases.
   */
  async retrieveBySimilarity(
    queryText: string,
    ownerId: string,
    n: number,
    options: SimilarityQueryOptions = {}
  ): Promise<RetrievedMemory[]> {
    const { memories } = await this.retrieveWithBasis(queryText, ownerId, n, options)
    return memories
  }

  /** retrieveBySimilarity, also reporting which ranking basis was used */
  async retrieveWithBasis(
    queryText: string,
    ownerId: string,
    n: number,
    options: SimilarityQueryOptions = {}
  ): Promise<SimilarityRetrieval> {
    const limit = Math.floor(n)
    if (limit <= 0 || this.records.size === 0) {
      return { basis: this.embedder.isAvailable() ? 'similarity' : 'recency', memories: [] }
    }

    const now = options.now ?? this.clock()
    const queryVector = this.index.dimensions === null ? null : await this.embedder.embedOne(queryText)
    const { basis, hits } = this.index.query(queryVector, ownerId, this.index.size)
    const { similarityWeight, strengthWeight } = this.config.retrieval

    const ranked: Array<{ record: MemoryRecord; strength: number; score: number }> = []
    for (const hit of hits) {
      const record = this.records.get(hit.id)
      if (!record) continue
      if (options.kind && record.kind !== options.kind) continue

      const strength = calculateStrength(record, now)
      if (record.kind === 'episodic' && strength < this.thresholds.pruneThreshold) continue

      const score = basis === 'similarity' ? hit.score * similarityWeight + strength * strengthWeight : 0
      ranked.push({ record, strength, score })
    }

    if (basis === 'similarity') {
      // Stable sort: equal scores keep the index order (similarity, then recency)
      ranked.sort(
        (a, b) => b.score - a.score || b.record.createdAt.getTime() - a.record.createdAt.getTime()
      )
    }

    return {
      basis,
      memories: ranked.slice(0, limit).map(({ record, strength, score }) => this.toRetrieved(record, strength, score)),
    }
  }

  /**
   * Episodic records with importance ≥ minImportance and semantic records with
   * confidence ≥ minImportance, ordered by that value, ties to the most recent.
   * Episodic records below the prune threshold are left out.
   */
  retrieveByImportance(
    ownerId: string,
    minImportance: number,
    n: number,
    options: { now?: Date } = {}
  ): RetrievedMemory[] {
    const limit = Math.floor(n)
    if (limit <= 0) return []
    const now = options.now ?? this.clock()

    const eligible: Array<{ record: MemoryRecord; strength: number; weight: number }> = []
    for (const record of this.records.values()) {
      if (!inScope(record, ownerId)) continue

      switch (record.kind) {
        case 'episodic': {
          if (record.importance < minImportance) break
          const strength = calculateStrength(record, now)
          if (strength < this.thresholds.pruneThreshold) break
          eligible.push({ record, strength, weight: record.importance })
          break
        }
        case 'semantic':
          if (record.confidence < minImportance) break
          eligible.push({ record, strength: 1, weight: record.confidence })
          break
      }
    }

    eligible.sort(
      (a, b) => b.weight - a.weight || b.record.createdAt.getTime() - a.record.createdAt.getTime()
    )

    return eligible
      .slice(0, limit)
      .map(({ record, strength, weight }) => this.toRetrieved(record, strength, weight))
  }

  /** Every stored record visible to `ownerId` (own + shared), in insertion order */
  listAll(ownerId: string): MemoryRecord[] {
    return [...this.records.values()].filter(record => inScope(record, ownerId)).map(detach)
  }

  // ============ Inspection ============

  stats(): MemoryStats {
    let episodic = 0
    let withEmbedding = 0
    for (const record of this.records.values()) {
      if (record.kind === 'episodic') episodic++
      if (record.embedding) withEmbedding++
    }
    return {
      total: this.records.size,
      episodic,
      semantic: this.records.size - episodic,
      withEmbedding,
      embeddingAvailable: this.embedder.isAvailable(),
      dimensions: this.index.dimensions,
    }
  }

  /** Strength, state and time left before pruning, for every record */
  health(now: Date = this.clock()): MemoryHealth[] {
    return [...this.records.values()].map(record => ({
      id: record.id,
      title: (record.text.split('\n')[0] ?? '').slice(0, 60),
      kind: record.kind,
      strength: calculateStrength(record, now),
      state: memoryState(record, now, this.thresholds),
      hoursUntilFade: hoursUntilFade(record, now, this.thresholds.pruneThreshold),
    }))
  }

  /** Let a provider marked unavailable be tried again */
  resetEmbeddingProvider(): void {
    this.embedder.reset()
  }

  // ============ Persistence ============

  /**
   * Atomically write every record to the save file. On failure the previous
   * file and the in-memory state are left as they were.
   */
  persist(): Result<PersistSummary, AppError> {
    const savedAt = this.clock()
    const file = encodeMemoryFile(this.records.values(), {
      includeEmbeddings: this.config.persistence.includeEmbeddings,
      dimensions: this.index.dimensions,
      savedAt,
    })

    try {
      writeJsonAtomic(this.filePath, file)
    } catch (e) {
      logError(logger, 'Failed to persist memories', ensureError(e), {
        filePath: this.filePath,
        operation: 'persist',
      })
      return err(AppError.persistFailed(this.filePath, e))
    }

    logger.debug(`Saved ${file.memories.length} memories to ${this.filePath}`)
    return ok({ filePath: this.filePath, count: file.memories.length, savedAt: file.savedAt })
  }

  /**
   * Replace the in-memory state with the save file's content.
   *
   * Invalid entries are skipped and reported. Missing or unusable vectors are
   * recomputed when the provider is available; no other field changes. A
   * missing file leaves the store as it is; an unreadable or corrupt file
   * returns LOAD_FAILED and also leaves it as it is.
   */
  async load(): Promise<Result<LoadSummary, AppError>> {
    let content: string | null
    try {
      content = readTextIfExists(this.filePath)
    } catch (e) {
      return err(AppError.loadFailed(this.filePath, getErrorMessage(e), e))
    }

    if (content === null) {
      logger.debug(`No memory file at ${this.filePath}`)
      return ok({ filePath: this.filePath, found: false, loaded: 0, skipped: [], reembedded: 0 })
    }

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (e) {
      return err(AppError.loadFailed(this.filePath, `invalid JSON (${getErrorMessage(e)})`))
    }

    const decoded = decodeMemoryFile(raw)
    if (!decoded) {
      return err(AppError.loadFailed(this.filePath, 'expected an object with a "memories" array'))
    }

    const index = new SimilarityIndex(
      this.config.embedding.dimensions ?? this.index.dimensions ?? decoded.dimensions ?? undefined
    )
    const records = new Map<string, MemoryRecord>()
    const missingVectors: MemoryRecord[] = []

    for (const loaded of decoded.records) {
      const record = normalizeRecord(loaded)
      if (index.accepts(record.embedding)) {
        index.insert(record.id, record.embedding, record.ownerId, record.createdAt)
      } else {
        index.insert(record.id, undefined, record.ownerId, record.createdAt)
        missingVectors.push(record)
      }
      records.set(record.id, { ...record, embedding: index.hasVector(record.id) ? record.embedding : undefined })
    }

    let reembedded = 0
    if (missingVectors.length > 0 && this.embedder.isAvailable()) {
      const vectors = await this.embedder.embedMany(missingVectors.map(record => record.text))
      missingVectors.forEach((record, i) => {
        const vector = vectors?.[i]
        if (!vector || !index.insert(record.id, vector, record.ownerId, record.createdAt)) return
        records.set(record.id, { ...record, embedding: [...vector] })
        reembedded++
      })
    }

    for (const skipped of decoded.skipped) {
      logger.warn(`Skipped memory #${skipped.index}${skipped.id ? ` (${skipped.id})` : ''}: ${skipped.reason}`)
    }

    this.records = new Map([...records].map(([id, record]) => [id, freezeRecord(record)]))
    this.index = index

    logger.info(
      `Loaded ${records.size} memories from ${this.filePath}` +
        (decoded.skipped.length > 0 ? `, skipped ${decoded.skipped.length}` : '')
    )
    return ok({
      filePath: this.filePath,
      found: true,
      loaded: records.size,
      skipped: decoded.skipped,
      reembedded,
    })
  }

  // ============ Internals ============

  private validate(record: MemoryRecord): void {
    if (!record.id) throw AppError.invalidRecord('id is required')
    if (!record.ownerId) throw AppError.invalidRecord(`ownerId is required (${record.id})`)
    if (typeof record.text !== 'string') throw AppError.invalidRecord(`text must be a string (${record.id})`)
    if (!isValidDate(record.createdAt)) {
      throw AppError.invalidRecord(`createdAt must be a valid Date (${record.id})`)
    }

    const kind: unknown = record.kind
    if (kind !== 'episodic' && kind !== 'semantic') {
      throw AppError.invalidRecord(`unknown kind "${String(kind)}" (${record.id})`)
    }
    if (record.kind === 'episodic' && !EMOTIONS.includes(record.emotion)) {
      throw AppError.invalidRecord(`unknown emotion "${record.emotion}" (${record.id})`)
    }
    if (record.kind === 'semantic' && !FACT_TYPES.includes(record.factType)) {
      throw AppError.invalidRecord(`unknown factType "${record.factType}" (${record.id})`)
    }
  }

  private toRetrieved(stored: MemoryRecord, strength: number, score: number): RetrievedMemory {
    const record = detach(stored)
    const header = {
      id: record.id,
      text: record.text,
      ownerId: record.ownerId,
      createdAt: record.createdAt,
      score,
      record,
    }
    switch (record.kind) {
      case 'episodic':
        return {
          ...header,
          kind: 'episodic',
          strength,
          emotion: record.emotion,
          importance: record.importance,
          location: record.location,
        }
      case 'semantic':
        return {
          ...header,
          kind: 'semantic',
          strength: record.confidence,
          factType: record.factType,
          subject: record.subject,
        }
    }
  }
}
