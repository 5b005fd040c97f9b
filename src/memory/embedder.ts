/**
 * Best-effort embedding for the memory store.
 *
 * Wraps an EmbeddingProvider with a per-call timeout. A failure or timeout
 * yields `null` for that call only; the degradation is logged once per
 * session. With `cacheUnavailable`, the first failure also stops further
 * calls until `reset()`.
 */

import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import type { EmbeddingProvider } from './embeddingProvider.js'

const logger = createLogger('embedder')

export interface EmbedderOptions {
  timeoutMs: number
  cacheUnavailable: boolean
}

export class Embedder {
  private warned = false
  private disabled = false
  private lastError: AppError | null = null

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbedderOptions
  ) {}

  /** Whether an embed call would be attempted right now */
  isAvailable(): boolean {
    return !this.disabled && this.provider.isAvailable()
  }

  /** Most recent degradation, for diagnostics */
  getLastError(): AppError | null {
    return this.lastError
  }

  async embedOne(text: string): Promise<number[] | null> {
    const vectors = await this.embedMany([text])
    return vectors?.[0] ?? null
  }

  /** All-or-nothing batch; null when the provider is unavailable or fails */
  async embedMany(texts: string[]): Promise<number[][] | null> {
    if (texts.length === 0) return []
    if (!this.isAvailable()) {
      this.degrade(AppError.embeddingUnavailable(this.provider.name))
      return null
    }

    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.options.timeoutMs)

    try {
      const vectors = await Promise.race([
        this.provider.embed(texts, { signal: controller.signal }),
        new Promise<never>((_, reject) => {
          controller.signal.addEventListener('abort', () =>
            reject(AppError.embeddingTimeout(this.provider.name, this.options.timeoutMs))
          )
        }),
      ])
      if (vectors.length !== texts.length) {
        throw new Error(`expected ${texts.length} vectors, got ${vectors.length}`)
      }
      return vectors
    } catch (e) {
      this.degrade(
        timedOut
          ? AppError.embeddingTimeout(this.provider.name, this.options.timeoutMs)
          : AppError.embeddingUnavailable(this.provider.name, e)
      )
      return null
    } finally {
      clearTimeout(timer)
    }
  }

  /** Forget a cached "unavailable" verdict and re-arm the session warning */
  reset(): void {
    this.disabled = false
    this.warned = false
    this.lastError = null
  }

  private degrade(error: AppError): void {
    this.lastError = error
    if (this.options.cacheUnavailable) {
      this.disabled = true
    }
    if (!this.warned) {
      this.warned = true
      logger.warn(`${error.message}; using recency ranking`)
    } else {
      logger.debug(error.message)
    }
  }
}
