/**
 * Decay engine: exponential strength decay of episodic memories
 *
 * Core formula: S = importance * e^(-decayRate * t / K)
 * where t = hours since creation and K = DECAY_TIME_SCALE_HOURS.
 *
 * With K = 100, a record with decayRate 0.05 keeps e^(-0.05) ≈ 95% of its
 * importance after 100 hours, and a decayRate of 1.0 loses ~63% in the same window.
 */

import type { MemoryRecord, MemoryState } from './types.js'

/** Time-unit scale K of the decay exponent, in hours */
export const DECAY_TIME_SCALE_HOURS = 100

const MS_PER_HOUR = 3_600_000

/** Clamp to [0, 1]; NaN becomes 0 */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0
  return Math.min(1, Math.max(0, value))
}

/**
 * Hours between creation and `now`. Negative or invalid spans count as 0
 * ("just created").
 */
export function elapsedHours(createdAt: Date, now: Date): number {
  const ms = now.getTime() - createdAt.getTime()
  if (!Number.isFinite(ms) || ms <= 0) return 0
  return ms / MS_PER_HOUR
}

/** Pure decay curve for already-clamped inputs */
export function decayedStrength(importance: number, decayRate: number, hours: number): number {
  const t = Number.isFinite(hours) && hours > 0 ? hours : 0
  if (decayRate === 0 || t === 0) return importance
  return importance * Math.exp((-decayRate * t) / DECAY_TIME_SCALE_HOURS)
}

/**
 * Current strength of a record. Pure: nothing is written back.
 * Semantic records never decay and always report 1.
 */
export function calculateStrength(record: MemoryRecord, now: Date): number {
  switch (record.kind) {
    case 'semantic':
      return 1
    case 'episodic':
      return decayedStrength(record.importance, record.decayRate, elapsedHours(record.createdAt, now))
  }
}

export interface StateThresholds {
  pruneThreshold: number
  weakThreshold: number
}

/**
 * Clamp thresholds into range: prune to [0, 1], weak to [prune, 1].
 * Returns the fixed values plus whether anything was adjusted.
 */
export function normalizeThresholds(input: StateThresholds): StateThresholds & { adjusted: boolean } {
  const pruneThreshold = clampUnit(input.pruneThreshold)
  const weakThreshold = Math.max(pruneThreshold, clampUnit(input.weakThreshold))
  return {
    pruneThreshold,
    weakThreshold,
    adjusted: pruneThreshold !== input.pruneThreshold || weakThreshold !== input.weakThreshold,
  }
}

export function classifyStrength(strength: number, thresholds: StateThresholds): MemoryState {
  if (strength < thresholds.pruneThreshold) return 'pruned'
  if (strength < thresholds.weakThreshold) return 'weak'
  return 'active'
}

/** Classify a record; semantic records are always active */
export function memoryState(record: MemoryRecord, now: Date, thresholds: StateThresholds): MemoryState {
  if (record.kind === 'semantic') return 'active'
  return classifyStrength(calculateStrength(record, now), thresholds)
}

/**
 * Hours left until an episodic record drops below `threshold`.
 *
 * From S(t) = I * e^(-r t / K), solving S(t) = threshold:
 * t = K * ln(I / threshold) / r
 */
export function hoursUntilFade(record: MemoryRecord, now: Date, threshold: number): number {
  if (record.kind === 'semantic' || record.decayRate === 0) {
    return record.kind === 'episodic' && record.importance < threshold ? 0 : Infinity
  }
  if (threshold <= 0) return Infinity
  if (record.importance < threshold) return 0

  const fadeAt = (DECAY_TIME_SCALE_HOURS * Math.log(record.importance / threshold)) / record.decayRate
  return Math.max(0, fadeAt - elapsedHours(record.createdAt, now))
}

export interface DecayOutcome {
  id: string
  strength: number
  state: MemoryState
}

/**
 * Evaluate every episodic record at `now`. Semantic records are skipped.
 * Used by MemoryStore.decayAndPrune; does not mutate its input.
 */
export function evaluateDecay(
  records: Iterable<MemoryRecord>,
  now: Date,
  thresholds: StateThresholds
): DecayOutcome[] {
  const outcomes: DecayOutcome[] = []
  for (const record of records) {
    if (record.kind !== 'episodic') continue
    const strength = calculateStrength(record, now)
    outcomes.push({ id: record.id, strength, state: classifyStrength(strength, thresholds) })
  }
  return outcomes
}
