/**
 * In-memory similarity index
 *
 * Holds (id → vector) pairs scoped by owner. With a usable query vector,
 * entries are ranked by cosine similarity; without one (no embedding
 * capability, or no in-scope entry has a vector), every in-scope entry is
 * returned newest first. Either way the
 * best match comes first and ties go to the most recent entry.
 */

import { ALL_AGENTS, type RankingBasis } from './types.js'

export interface IndexEntry {
  id: string
  ownerId: string
  createdAt: Date
  /** Absent when the record could not be embedded or had the wrong dimension */
  vector?: number[]
  /** Monotonic insertion counter, last tie-breaker */
  seq: number
}

export interface IndexHit {
  id: string
  /** Cosine similarity in similarity mode, 0 in recency mode */
  score: number
}

export interface IndexQueryResult {
  basis: RankingBasis
  hits: IndexHit[]
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    dot += x * y
    normA += x * x
    normB += y * y
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

function isUsableVector(vector: number[] | undefined | null): vector is number[] {
  return Array.isArray(vector) && vector.length > 0 && vector.every(Number.isFinite)
}

/** Newest first, then latest inserted first */
function byRecency(a: IndexEntry, b: IndexEntry): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.seq - a.seq
}

export class SimilarityIndex {
  private entries = new Map<string, IndexEntry>()
  private dims: number | null
  private seq = 0

  /** @param dimensions fixed vector length; inferred from the first vector when omitted */
  constructor(dimensions?: number) {
    this.dims = dimensions ?? null
  }

  get dimensions(): number | null {
    return this.dims
  }

  get size(): number {
    return this.entries.size
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  /** Whether `vector` can take part in similarity ranking */
  accepts(vector: number[] | undefined | null): vector is number[] {
    if (!isUsableVector(vector)) return false
    return this.dims === null || vector.length === this.dims
  }

  /**
   * Insert or replace an entry (a replaced entry keeps its insertion slot).
   * A missing or mismatched vector is dropped: the entry is then only
   * reachable through recency ranking.
   * Returns whether the vector was kept.
   */
  insert(id: string, vector: number[] | undefined | null, ownerId: string, createdAt: Date): boolean {
    const keep = this.accepts(vector)
    if (keep && this.dims === null) {
      this.dims = vector.length
    }
    const existing = this.entries.get(id)
    this.entries.set(id, {
      id,
      ownerId,
      createdAt: new Date(createdAt.getTime()),
      vector: keep ? [...vector] : undefined,
      seq: existing?.seq ?? this.seq++,
    })
    return keep
  }

  remove(id: string): boolean {
    return this.entries.delete(id)
  }

  clear(): void {
    this.entries.clear()
    this.seq = 0
  }

  hasVector(id: string): boolean {
    return this.entries.get(id)?.vector !== undefined
  }

  /**
   * Top-k query.
   *
   * @param vector query vector; null (or unusable) switches to recency ranking
   * @param ownerId restrict to this owner plus ALL_AGENTS entries; null for every owner
   */
  query(vector: number[] | null, ownerId: string | null, k: number): IndexQueryResult {
    const limit = Math.max(0, Math.floor(k))
    const scoped = [...this.entries.values()].filter(
      entry => ownerId === null || entry.ownerId === ownerId || entry.ownerId === ALL_AGENTS
    )

    // Similarity ranking needs a usable query vector and at least one in-scope vector
    const canRank =
      this.dims !== null && this.accepts(vector) && scoped.some(entry => entry.vector !== undefined)
    if (!canRank) {
      return {
        basis: 'recency',
        hits: scoped
          .sort(byRecency)
          .slice(0, limit)
          .map(entry => ({ id: entry.id, score: 0 })),
      }
    }

    const scored: Array<{ entry: IndexEntry; score: number }> = []
    for (const entry of scoped) {
      if (!entry.vector || !vector) continue
      scored.push({ entry, score: cosineSimilarity(vector, entry.vector) })
    }
    scored.sort((a, b) => b.score - a.score || byRecency(a.entry, b.entry))

    return {
      basis: 'similarity',
      hits: scored.slice(0, limit).map(({ entry, score }) => ({ id: entry.id, score })),
    }
  }
}
