/**
 * Memory save-file codec
 *
 * Envelope: { version, savedAt, dimensions, memories: [...] }.
 * Each memory entry is validated on its own; a bad entry is skipped with a
 * diagnostic instead of failing the whole file.
 */

import { z } from 'zod'
import { EMOTIONS, FACT_TYPES, type MemoryRecord } from '../memory/types.js'

export const MEMORY_FILE_VERSION = 1

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/

const isoDate = z
  .string()
  .refine(value => ISO_DATE_TIME.test(value) && !Number.isNaN(Date.parse(value)), {
    message: 'not an ISO-8601 timestamp',
  })

const headerShape = {
  id: z.string().min(1),
  text: z.string(),
  ownerId: z.string().min(1),
  createdAt: isoDate,
  embedding: z.array(z.number()).nullish(),
}

const episodicEntrySchema = z.object({
  ...headerShape,
  kind: z.literal('episodic'),
  importance: z.number(),
  emotion: z.enum(EMOTIONS),
  location: z.string(),
  participants: z.array(z.string()),
  decayRate: z.number(),
})

const semanticEntrySchema = z.object({
  ...headerShape,
  kind: z.literal('semantic'),
  factType: z.enum(FACT_TYPES),
  subject: z.string(),
  confidence: z.number(),
  source: z.string(),
})

export type PersistedEpisodic = z.infer<typeof episodicEntrySchema>
export type PersistedSemantic = z.infer<typeof semanticEntrySchema>
export type PersistedMemory = PersistedEpisodic | PersistedSemantic

const envelopeSchema = z.object({
  version: z.number().int().optional(),
  savedAt: z.string().optional(),
  dimensions: z.number().int().positive().nullish(),
  memories: z.array(z.unknown()),
})

export interface MemoryFile {
  version: number
  savedAt: string
  dimensions: number | null
  memories: PersistedMemory[]
}

export interface SkippedEntry {
  index: number
  id?: string
  reason: string
}

export interface DecodedMemoryFile {
  dimensions: number | null
  records: MemoryRecord[]
  skipped: SkippedEntry[]
}

export function encodeRecord(record: MemoryRecord, includeEmbedding: boolean): PersistedMemory {
  const header = {
    id: record.id,
    text: record.text,
    ownerId: record.ownerId,
    createdAt: record.createdAt.toISOString(),
    ...(includeEmbedding && record.embedding ? { embedding: record.embedding } : {}),
  }

  switch (record.kind) {
    case 'episodic':
      return {
        ...header,
        kind: 'episodic',
        importance: record.importance,
        emotion: record.emotion,
        location: record.location,
        participants: record.participants,
        decayRate: record.decayRate,
      }
    case 'semantic':
      return {
        ...header,
        kind: 'semantic',
        factType: record.factType,
        subject: record.subject,
        confidence: record.confidence,
        source: record.source,
      }
  }
}

export function encodeMemoryFile(
  records: Iterable<MemoryRecord>,
  options: { includeEmbeddings: boolean; dimensions: number | null; savedAt?: Date }
): MemoryFile {
  const memories: PersistedMemory[] = []
  for (const record of records) {
    memories.push(encodeRecord(record, options.includeEmbeddings))
  }
  return {
    version: MEMORY_FILE_VERSION,
    savedAt: (options.savedAt ?? new Date()).toISOString(),
    dimensions: options.includeEmbeddings ? options.dimensions : null,
    memories,
  }
}

function decodeEntry(entry: PersistedMemory): MemoryRecord {
  const header = {
    id: entry.id,
    text: entry.text,
    ownerId: entry.ownerId,
    createdAt: new Date(entry.createdAt),
    embedding: entry.embedding ?? undefined,
  }

  switch (entry.kind) {
    case 'episodic':
      return {
        ...header,
        kind: 'episodic',
        importance: entry.importance,
        emotion: entry.emotion,
        location: entry.location,
        participants: entry.participants,
        decayRate: entry.decayRate,
      }
    case 'semantic':
      return {
        ...header,
        kind: 'semantic',
        factType: entry.factType,
        subject: entry.subject,
        confidence: entry.confidence,
        source: entry.source,
      }
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(entry)'}: ${issue.message}`).join('; ')
}

function entryId(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) return undefined
  return typeof raw.id === 'string' ? raw.id : undefined
}

function entryKind(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || !('kind' in raw)) return undefined
  return raw.kind
}

/** Validate one raw entry */
export function decodeEntryResult(
  raw: unknown
): { ok: true; record: MemoryRecord } | { ok: false; reason: string } {
  const kind = entryKind(raw)
  if (kind === 'episodic') {
    return toEntryResult(episodicEntrySchema.safeParse(raw))
  }
  if (kind === 'semantic') {
    return toEntryResult(semanticEntrySchema.safeParse(raw))
  }
  const shown = kind === undefined ? 'missing' : JSON.stringify(kind)
  return { ok: false, reason: `unrecognized kind: ${shown}` }
}

function toEntryResult<T extends PersistedMemory>(
  parsed: { success: true; data: T } | { success: false; error: z.ZodError }
): { ok: true; record: MemoryRecord } | { ok: false; reason: string } {
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) }
  }
  return { ok: true, record: decodeEntry(parsed.data) }
}

/**
 * Decode a parsed save file. Returns null when the envelope itself is invalid
 * (not an object, no `memories` array).
 */
export function decodeMemoryFile(raw: unknown): DecodedMemoryFile | null {
  const envelope = envelopeSchema.safeParse(raw)
  if (!envelope.success) return null

  const records: MemoryRecord[] = []
  const skipped: SkippedEntry[] = []
  const seen = new Set<string>()

  envelope.data.memories.forEach((entry, index) => {
    const result = decodeEntryResult(entry)
    if (!result.ok) {
      skipped.push({ index, id: entryId(entry), reason: result.reason })
      return
    }
    if (seen.has(result.record.id)) {
      skipped.push({ index, id: result.record.id, reason: 'duplicate id' })
      return
    }
    seen.add(result.record.id)
    records.push(result.record)
  })

  return { dimensions: envelope.data.dimensions ?? null, records, skipped }
}
