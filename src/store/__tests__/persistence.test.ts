/**
 * MemoryStore persist / load
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { MemoryStore } from '../MemoryStore.js'
import { resolveConfig, type MemoryConfigInput } from '../../config/loadConfig.js'
import { ALL_AGENTS } from '../../memory/types.js'
import type { EmbeddingProvider } from '../../memory/embeddingProvider.js'
import { FailingEmbeddingProvider, KeywordEmbeddingProvider } from '../../../tests/helpers/embedding.js'
import { episode, fact, hoursAfter, T0 } from '../../../tests/helpers/records.js'

const VOCABULARY = ['sword', 'bandit', 'village', 'gold', 'dragon']

let testDir: string
let filePath: string

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'npc-memory-persist-'))
  filePath = join(testDir, 'memories.json')
})

afterEach(() => {
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true })
  }
})

function createStore(
  options: { provider?: EmbeddingProvider; file?: string; config?: MemoryConfigInput } = {}
): MemoryStore {
  return new MemoryStore({
    config: resolveConfig(options.config ?? {}),
    provider: options.provider ?? new KeywordEmbeddingProvider(VOCABULARY),
    filePath: options.file ?? filePath,
    clock: () => hoursAfter(5),
  })
}

async function seed(store: MemoryStore): Promise<void> {
  await store.add(
    episode({
      id: 'evt_rescue',
      text: 'The player drove a bandit out of the village',
      importance: 0.9,
      emotion: 'gratitude',
      location: 'village_square',
      participants: ['player'],
      decayRate: 0.05,
    })
  )
  await store.add(fact({ id: 'fact_smith', text: 'Bram sells a sword', factType: 'profession', subject: 'npc_bram' }))
  await store.add(fact({ id: 'fact_dragon', text: 'A dragon sleeps in the hills', ownerId: ALL_AGENTS }))
}

function writeSave(memories: unknown[], extra: Record<string, unknown> = {}): void {
  writeFileSync(filePath, JSON.stringify({ version: 1, savedAt: T0.toISOString(), memories, ...extra }))
}

const validEntry = {
  kind: 'episodic',
  id: 'evt_ok',
  text: 'A bandit stole gold',
  ownerId: 'npc_guard',
  createdAt: '2025-03-01T12:00:00.000Z',
  importance: 0.6,
  emotion: 'anger',
  location: 'market',
  participants: ['bandit_1'],
  decayRate: 0.2,
}

describe('persist', () => {
  it('writes a versioned save file', async () => {
    const store = createStore()
    await seed(store)

    const result = store.persist()

    expect(result).toEqual({
      ok: true,
      value: { filePath, count: 3, savedAt: hoursAfter(5).toISOString() },
    })
    const saved: unknown = JSON.parse(readFileSync(filePath, 'utf-8'))
    expect(saved).toMatchObject({ version: 1, savedAt: hoursAfter(5).toISOString(), dimensions: 5 })
    expect(saved).toHaveProperty('memories.0', {
      kind: 'episodic',
      id: 'evt_rescue',
      text: 'The player drove a bandit out of the village',
      ownerId: 'npc_blacksmith',
      createdAt: '2025-03-01T12:00:00.000Z',
      embedding: [0, 1, 1, 0, 0],
      importance: 0.9,
      emotion: 'gratitude',
      location: 'village_square',
      participants: ['player'],
      decayRate: 0.05,
    })
  })

  it('leaves only the target file in the directory', async () => {
    const store = createStore()
    await seed(store)
    store.persist()
    store.persist()

    expect(readdirSync(testDir)).toEqual(['memories.json'])
  })

  it('creates the parent directory', async () => {
    const nested = join(testDir, 'saves', 'slot1', 'memories.json')
    const store = createStore({ file: nested })
    await seed(store)

    expect(store.persist().ok).toBe(true)
    expect(existsSync(nested)).toBe(true)
  })

  it('omits vectors when includeEmbeddings is off', async () => {
    const store = createStore({ config: { persistence: { includeEmbeddings: false } } })
    await seed(store)
    store.persist()

    const saved = readFileSync(filePath, 'utf-8')
    expect(saved).not.toContain('"embedding"')
    expect(JSON.parse(saved)).toMatchObject({ dimensions: null })
  })

  it('reports PERSIST_FAILED and keeps state when the file cannot be written', async () => {
    // A regular file where the parent directory should be
    const blocker = join(testDir, 'blocker')
    writeFileSync(blocker, 'not a directory')
    const store = createStore({ file: join(blocker, 'memories.json') })
    await seed(store)

    const result = store.persist()

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('PERSIST_FAILED')
      expect(result.error.category).toBe('PERSISTENCE')
    }
    expect(store.size).toBe(3)
    expect(readFileSync(blocker, 'utf-8')).toBe('not a directory')
  })

  it('removes the temp file when the final rename fails', async () => {
    // Target path is an existing directory, so the rename cannot replace it
    const target = join(testDir, 'memories.json')
    mkdirSync(target)
    const store = createStore({ file: target })
    await seed(store)

    expect(store.persist().ok).toBe(false)
    expect(readdirSync(testDir)).toEqual(['memories.json'])
    expect(statSync(target).isDirectory()).toBe(true)
  })
})

describe('load', () => {
  it('restores every field of every record', async () => {
    const original = createStore()
    await seed(original)
    original.persist()

    const restored = createStore()
    const result = await restored.load()

    expect(result).toEqual({
      ok: true,
      value: { filePath, found: true, loaded: 3, skipped: [], reembedded: 0 },
    })
    for (const id of ['evt_rescue', 'fact_smith', 'fact_dragon']) {
      expect(restored.get(id)).toEqual(original.get(id))
    }
    expect(restored.get('evt_rescue')?.createdAt).toEqual(T0)
  })

  it('ranks the same after a round trip', async () => {
    const original = createStore()
    await seed(original)
    original.persist()
    const restored = createStore()
    await restored.load()

    const before = await original.retrieveBySimilarity('bandit in the village', 'npc_blacksmith', 3)
    const after = await restored.retrieveBySimilarity('bandit in the village', 'npc_blacksmith', 3)

    expect(after.map(r => [r.id, r.score])).toEqual(before.map(r => [r.id, r.score]))
  })

  it('replaces the current contents', async () => {
    const original = createStore()
    await seed(original)
    original.persist()

    const other = createStore()
    await other.add(episode({ id: 'unsaved' }))
    await other.load()

    expect(other.has('unsaved')).toBe(false)
    expect(other.size).toBe(3)
  })

  it('recomputes missing vectors when the provider is available', async () => {
    const original = createStore({ config: { persistence: { includeEmbeddings: false } } })
    await seed(original)
    original.persist()

    const restored = createStore()
    const result = await restored.load()

    expect(result.ok && result.value.reembedded).toBe(3)
    expect(restored.get('fact_smith')?.embedding).toEqual([1, 0, 0, 0, 0])
  })

  it('loads without vectors when the provider is unavailable', async () => {
    const original = createStore({ config: { persistence: { includeEmbeddings: false } } })
    await seed(original)
    original.persist()

    const restored = createStore({ provider: new FailingEmbeddingProvider() })
    const result = await restored.load()

    expect(result.ok && result.value.loaded).toBe(3)
    expect(result.ok && result.value.reembedded).toBe(0)
    expect(restored.get('fact_smith')?.embedding).toBeUndefined()
    const { basis } = await restored.retrieveWithBasis('sword', 'npc_blacksmith', 3)
    expect(basis).toBe('recency')
  })

  it('skips malformed entries and reports them', async () => {
    const withoutText = {
      kind: 'episodic',
      id: 'evt_no_text',
      ownerId: 'npc_guard',
      createdAt: '2025-03-01T12:00:00.000Z',
      importance: 0.6,
      emotion: 'anger',
      location: 'market',
      participants: [],
      decayRate: 0.2,
    }
    writeSave([validEntry, { ...validEntry, id: 'evt_dream', kind: 'dream' }, withoutText, validEntry, 42])

    const store = createStore()
    const result = await store.load()

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.loaded).toBe(1)
    expect(result.value.skipped).toEqual([
      { index: 1, id: 'evt_dream', reason: 'unrecognized kind: "dream"' },
      { index: 2, id: 'evt_no_text', reason: 'text: Required' },
      { index: 3, id: 'evt_ok', reason: 'duplicate id' },
      { index: 4, id: undefined, reason: 'unrecognized kind: missing' },
    ])
    expect(store.get('evt_ok')?.text).toBe('A bandit stole gold')
  })

  it('clamps out-of-range values read from disk', async () => {
    writeSave([{ ...validEntry, importance: 7 }])

    const store = createStore()
    await store.load()

    expect(store.get('evt_ok')).toMatchObject({ importance: 1 })
  })

  it('reports a missing file without touching the store', async () => {
    const store = createStore()
    await store.add(episode({ id: 'kept' }))

    const result = await store.load()

    expect(result).toEqual({
      ok: true,
      value: { filePath, found: false, loaded: 0, skipped: [], reembedded: 0 },
    })
    expect(store.has('kept')).toBe(true)
  })

  it('fails with LOAD_FAILED on invalid JSON and keeps the current state', async () => {
    writeFileSync(filePath, '{"memories": [')
    const store = createStore()
    await store.add(episode({ id: 'kept' }))

    const result = await store.load()

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('LOAD_FAILED')
    expect(store.size).toBe(1)
    expect(store.has('kept')).toBe(true)
  })

  it('fails with LOAD_FAILED when there is no memories array', async () => {
    writeFileSync(filePath, JSON.stringify({ version: 1, records: [] }))
    const store = createStore()

    const result = await store.load()

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        `Failed to load memories from ${filePath}: expected an object with a "memories" array`
      )
    }
  })

  it('drops stored vectors of the wrong dimension and recomputes them', async () => {
    writeSave([{ ...validEntry, embedding: [1, 2, 3] }], { dimensions: 3 })

    const store = createStore()
    const result = await store.load()

    expect(result.ok && result.value.reembedded).toBe(1)
    // "A bandit stole gold"
    expect(store.get('evt_ok')?.embedding).toEqual([0, 1, 0, 1, 0])
  })

  it('does not freeze vectors a provider keeps for itself', async () => {
    const cached = [0, 0, 1, 0, 0]
    const caching: EmbeddingProvider = {
      name: 'caching',
      isAvailable: () => true,
      embed: async texts => texts.map(() => cached),
    }
    writeSave([validEntry])

    const store = createStore({ provider: caching })
    const result = await store.load()

    expect(result.ok && result.value.reembedded).toBe(1)
    expect(store.get('evt_ok')?.embedding).toEqual([0, 0, 1, 0, 0])
    expect(Object.isFrozen(cached)).toBe(false)
  })
})
