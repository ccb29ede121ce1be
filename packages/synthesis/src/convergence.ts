import type { ParseFailureReason } from './fragment-parser'
import { z } from 'zod/v4'

export const ConvergenceState = {
  Continue: 'CONTINUE',
  Converged: 'CONVERGED',
  Stalled: 'STALLED',
  MaxIterReached: 'MAX_ITER_REACHED',
} as const

export type ConvergenceState = (typeof ConvergenceState)[keyof typeof ConvergenceState]

export const ConvergenceStateSchema = z.enum(['CONTINUE', 'CONVERGED', 'STALLED', 'MAX_ITER_REACHED'])

export interface ConvergenceConfig {
  maxIterations: number
  /** K */
  stableIterations: number
  /** M */
  stallIterations: number
}

/**
 * What one iteration produced, as far as the monitor cares
 */
export type IterationObservation =
  | { kind: 'merged', added: number, reparented: number }
  | { kind: 'parse-failure', reason: ParseFailureReason }
  | { kind: 'transport-failure', message: string }

export interface MonitorState {
  /** Completed iterations */
  readonly iteration: number
  /** Consecutive merges that added and moved nothing */
  readonly stableStreak: number
  readonly failureReason: ParseFailureReason | null
  /** Consecutive parse failures sharing `failureReason` */
  readonly failureStreak: number
  readonly verdict: ConvergenceState
}

export function initialMonitorState(): MonitorState {
  return Object.freeze({
    iteration: 0,
    stableStreak: 0,
    failureReason: null,
    failureStreak: 0,
    verdict: ConvergenceState.Continue,
  })
}

export function isTerminal(verdict: ConvergenceState): boolean {
  return verdict !== ConvergenceState.Continue
}

/**
 * Fold one observation into the monitor state.
 *
 * Checked in order: the iteration bound, K stable merges, then STALLED for
 * M identical parse failures in a row or exhausted transport retries.
 * A terminal state is returned unchanged.
 */
export function advance(state: MonitorState, observation: IterationObservation, config: ConvergenceConfig): MonitorState {
  if (isTerminal(state.verdict))
    return state

  const iteration = state.iteration + 1
  let stableStreak = 0
  let failureReason: ParseFailureReason | null = null
  let failureStreak = 0

  switch (observation.kind) {
    case 'merged':
      stableStreak = observation.added === 0 && observation.reparented === 0 ? state.stableStreak + 1 : 0
      break
    case 'parse-failure':
      failureReason = observation.reason
      failureStreak = state.failureReason === observation.reason ? state.failureStreak + 1 : 1
      break
    case 'transport-failure':
      break
  }

  let verdict: ConvergenceState = ConvergenceState.Continue
  if (iteration >= config.maxIterations)
    verdict = ConvergenceState.MaxIterReached
  else if (stableStreak >= config.stableIterations)
    verdict = ConvergenceState.Converged
  else if (observation.kind === 'transport-failure' || failureStreak >= config.stallIterations)
    verdict = ConvergenceState.Stalled

  return Object.freeze({ iteration, stableStreak, failureReason, failureStreak, verdict })
}
