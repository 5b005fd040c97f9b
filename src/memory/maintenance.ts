/**
 * Turn-based maintenance
 *
 * Decay and saving are batched every N turns instead of every turn. Running
 * them more often does not change results.
 */

import { createLogger } from '../shared/logger.js'
import type { AppError } from '../shared/error.js'
import type { MaintenanceConfig } from '../config/schema.js'
import type { DecayReport, MemoryStore, PersistSummary } from '../store/MemoryStore.js'

const logger = createLogger('maintenance')

export interface TurnMaintenance {
  turn: number
  decay: DecayReport | null
  persisted: PersistSummary | null
  /** Set when a due save failed; the session continues unsaved */
  persistError: AppError | null
}

export interface MaintenanceScheduler {
  /** Call once per game turn */
  onTurn(turn: number, now: Date): TurnMaintenance
  /** Run decay and save immediately, e.g. before exit */
  flush(now: Date): TurnMaintenance
}

function isDue(turn: number, every: number): boolean {
  return turn > 0 && turn % every === 0
}

export function createMaintenanceScheduler(
  store: MemoryStore,
  options: MaintenanceConfig
): MaintenanceScheduler {
  function run(turn: number, now: Date, decayDue: boolean, persistDue: boolean): TurnMaintenance {
    const result: TurnMaintenance = { turn, decay: null, persisted: null, persistError: null }

    if (decayDue) {
      result.decay = store.decayAndPrune(now)
    }

    if (persistDue) {
      const saved = store.persist()
      if (saved.ok) {
        result.persisted = saved.value
      } else {
        result.persistError = saved.error
        logger.warn(`Turn ${turn}: memories not saved (${saved.error.message})`)
      }
    }

    return result
  }

  return {
    onTurn(turn, now) {
      return run(
        turn,
        now,
        isDue(turn, options.decayEveryNTurns),
        isDue(turn, options.persistEveryNTurns)
      )
    },
    flush(now) {
      return run(-1, now, true, true)
    },
  }
}
