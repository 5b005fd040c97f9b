import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { memoryConfigSchema, type MemoryConfig } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.npc-memory.yaml'

export type MemoryConfigInput = z.input<typeof memoryConfigSchema>

let cachedConfig: MemoryConfig | null = null

/**
 * Locate config files (global + project).
 * Global is the base, project overrides it.
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // Same directory: load once
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load the memory subsystem config.
 * Lookup order: project dir → ~/.npc-memory.yaml → defaults.
 * Invalid files log a warning and fall back to defaults.
 */
export async function loadConfig(options?: { cwd?: string }): Promise<MemoryConfig> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options?.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = memoryConfigSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

/**
 * Build a config from a partial object, filling defaults.
 * Throws CONFIG_INVALID when the input does not match the schema.
 */
export function resolveConfig(input: MemoryConfigInput = {}): MemoryConfig {
  const result = memoryConfigSchema.safeParse(input)
  if (!result.success) {
    const reason = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw AppError.configInvalid(reason)
  }
  return result.data
}

/** Empty or comment-only files parse to {} */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isPlainObject(parsed) ? parsed : {}
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Project fields override global fields; nested objects merge, arrays are replaced.
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const existing = result[key]
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMergeConfig(existing, val) : val
  }
  return result
}

/**
 * Environment overrides, applied after schema validation.
 */
export function applyEnvOverrides(config: MemoryConfig): MemoryConfig {
  const env = process.env
  let next = config

  const provider = env.NPCMEM_EMBEDDING_PROVIDER
  if (provider === 'openai' || provider === 'none') {
    next = { ...next, embedding: { ...next.embedding, provider } }
  } else if (provider) {
    logger.warn(`Ignoring NPCMEM_EMBEDDING_PROVIDER="${provider}" (expected openai or none)`)
  }

  const apiKey = env.NPCMEM_EMBEDDING_API_KEY ?? env.OPENAI_API_KEY
  if (env.NPCMEM_EMBEDDING_MODEL || env.NPCMEM_EMBEDDING_BASE_URL || apiKey) {
    const embedding = { ...next.embedding }
    if (env.NPCMEM_EMBEDDING_MODEL) embedding.model = env.NPCMEM_EMBEDDING_MODEL
    if (env.NPCMEM_EMBEDDING_BASE_URL) embedding.baseURL = env.NPCMEM_EMBEDDING_BASE_URL
    if (apiKey && !embedding.apiKey) embedding.apiKey = apiKey
    next = { ...next, embedding }
  }

  if (env.NPCMEM_PRUNE_THRESHOLD) {
    const threshold = Number(env.NPCMEM_PRUNE_THRESHOLD)
    if (Number.isFinite(threshold)) {
      next = { ...next, decay: { ...next.decay, pruneThreshold: threshold } }
    } else {
      logger.warn(`Ignoring non-numeric NPCMEM_PRUNE_THRESHOLD="${env.NPCMEM_PRUNE_THRESHOLD}"`)
    }
  }

  return next
}

export function getDefaultConfig(): MemoryConfig {
  return memoryConfigSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
