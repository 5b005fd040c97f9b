import { describe, it, expect, vi, afterEach } from 'vitest'
import { Embedder } from '../embedder.js'
import { NullEmbeddingProvider, createEmbeddingProvider } from '../embeddingProvider.js'
import { setLogLevel } from '../../shared/logger.js'
import { resolveConfig } from '../../config/loadConfig.js'
import {
  FailingEmbeddingProvider,
  FixedEmbeddingProvider,
  HangingEmbeddingProvider,
  KeywordEmbeddingProvider,
} from '../../../tests/helpers/embedding.js'

const options = { timeoutMs: 1000, cacheUnavailable: false }

afterEach(() => {
  setLogLevel('silent')
  vi.restoreAllMocks()
})

describe('Embedder', () => {
  it('returns one vector per text', async () => {
    const embedder = new Embedder(new KeywordEmbeddingProvider(['sword', 'gold']), options)

    expect(await embedder.embedMany(['a sword', 'gold and gold'])).toEqual([
      [1, 0],
      [0, 2],
    ])
    expect(await embedder.embedOne('sword for gold')).toEqual([1, 1])
    expect(embedder.getLastError()).toBeNull()
  })

  it('skips the provider for an empty batch', async () => {
    const provider = new KeywordEmbeddingProvider(['sword'])
    const embedder = new Embedder(provider, options)
    expect(await embedder.embedMany([])).toEqual([])
    expect(provider.calls).toBe(0)
  })

  it('returns null when the provider fails, and keeps trying on later calls', async () => {
    const provider = new FailingEmbeddingProvider()
    const embedder = new Embedder(provider, options)

    expect(await embedder.embedOne('hello')).toBeNull()
    expect(await embedder.embedOne('again')).toBeNull()
    expect(provider.calls).toBe(2)
    expect(embedder.isAvailable()).toBe(true)
    expect(embedder.getLastError()?.code).toBe('EMBEDDING_UNAVAILABLE')
    expect(embedder.getLastError()?.message).toBe('Embedding provider "failing" unavailable: connection refused')
  })

  it('stops calling a failed provider when cacheUnavailable is set, until reset', async () => {
    const provider = new FailingEmbeddingProvider()
    const embedder = new Embedder(provider, { ...options, cacheUnavailable: true })

    await embedder.embedOne('hello')
    await embedder.embedOne('again')
    expect(provider.calls).toBe(1)
    expect(embedder.isAvailable()).toBe(false)

    embedder.reset()
    expect(embedder.isAvailable()).toBe(true)
    expect(embedder.getLastError()).toBeNull()
    await embedder.embedOne('third')
    expect(provider.calls).toBe(2)
  })

  it('gives up after timeoutMs and aborts the call', async () => {
    const provider = new HangingEmbeddingProvider()
    const embedder = new Embedder(provider, { ...options, timeoutMs: 20 })

    expect(await embedder.embedOne('hello')).toBeNull()
    expect(provider.aborted).toBe(1)
    expect(embedder.getLastError()?.code).toBe('EMBEDDING_TIMEOUT')
  })

  it('rejects a batch with the wrong number of vectors', async () => {
    const provider = new FixedEmbeddingProvider([1, 0])
    provider.embed = async () => [[1, 0]]
    const embedder = new Embedder(provider, options)

    expect(await embedder.embedMany(['a', 'b'])).toBeNull()
    expect(embedder.getLastError()?.message).toBe(
      'Embedding provider "fixed" unavailable: expected 2 vectors, got 1'
    )
  })

  it('returns null for a provider that is never available', async () => {
    const embedder = new Embedder(new NullEmbeddingProvider(), options)
    expect(embedder.isAvailable()).toBe(false)
    expect(await embedder.embedOne('hello')).toBeNull()
    expect(embedder.getLastError()?.code).toBe('EMBEDDING_UNAVAILABLE')
  })

  it('warns once per session, and again after reset', async () => {
    setLogLevel('warn')
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const embedder = new Embedder(new FailingEmbeddingProvider(), options)

    await embedder.embedOne('a')
    await embedder.embedOne('b')
    await embedder.embedOne('c')
    expect(warn).toHaveBeenCalledTimes(1)

    embedder.reset()
    await embedder.embedOne('d')
    expect(warn).toHaveBeenCalledTimes(2)
  })
})

describe('createEmbeddingProvider', () => {
  it('returns an unavailable provider for "none"', () => {
    const provider = createEmbeddingProvider(resolveConfig().embedding)
    expect(provider.name).toBe('none')
    expect(provider.isAvailable()).toBe(false)
  })

  it('builds an OpenAI-compatible provider with the configured model', () => {
    const config = resolveConfig({
      embedding: { provider: 'openai', model: 'nomic-embed-text', apiKey: 'test-secret', dimensions: 8 },
    }).embedding
    const provider = createEmbeddingProvider(config)
    expect(provider.name).toBe('openai:nomic-embed-text')
    expect(provider.dimensions).toBe(8)
    expect(provider.isAvailable()).toBe(true)
  })
})
