/**
 * Embedding capability
 *
 * The store only asks "is this provider available?"; it never checks which
 * implementation it holds. `createEmbeddingProvider` picks one at construction
 * time from config.
 */

import OpenAI from 'openai'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { EmbeddingConfig } from '../config/schema.js'

const logger = createLogger('embedding')

export interface EmbedOptions {
  signal?: AbortSignal
}

export interface EmbeddingProvider {
  readonly name: string
  /** Fixed output length, when known up front */
  readonly dimensions?: number
  isAvailable(): boolean
  /** One vector per input text, in input order */
  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>
}

/** Provider used when no embedding service is configured */
export class NullEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'none'

  constructor(private readonly reason: string = 'no embedding provider configured') {}

  isAvailable(): boolean {
    return false
  }

  async embed(): Promise<number[][]> {
    throw new Error(`Embeddings disabled: ${this.reason}`)
  }
}

export interface OpenAIEmbeddingOptions {
  model: string
  apiKey?: string
  baseURL?: string
  dimensions?: number
  timeoutMs?: number
}

/**
 * Embeddings through the openai SDK. Works with any OpenAI-compatible server
 * (LM Studio, Ollama, vLLM...) via `baseURL`.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string
  readonly dimensions?: number
  private client: OpenAI
  private model: string

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model
    this.dimensions = options.dimensions
    this.name = `openai:${options.model}`
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    })
  }

  isAvailable(): boolean {
    return true
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return []

    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: texts,
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      },
      options?.signal ? { signal: options.signal } : undefined
    )

    const vectors: number[][] = new Array<number[]>(texts.length)
    for (const item of response.data) {
      vectors[item.index] = item.embedding
    }
    for (let i = 0; i < texts.length; i++) {
      if (!vectors[i]) {
        throw new Error(`Embedding response missing vector for input ${i}`)
      }
    }
    return vectors
  }
}

/**
 * Build the configured provider. A provider that cannot be constructed
 * (e.g. missing API key) degrades to NullEmbeddingProvider.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  if (config.provider === 'none') {
    return new NullEmbeddingProvider()
  }

  try {
    return new OpenAIEmbeddingProvider({
      model: config.model,
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      dimensions: config.dimensions,
      timeoutMs: config.timeoutMs,
    })
  } catch (e) {
    const reason = getErrorMessage(e)
    logger.warn(`Embedding provider "${config.provider}" could not be created, using recency fallback: ${reason}`)
    return new NullEmbeddingProvider(reason)
  }
}
