/**
 * Update State Machine
 *
 * Pure transition table for applying remote changes to the tracked
 * repository. The operation layer performs the git calls and asks this
 * module whether each step may follow the previous one.
 *
 * Failures before `applying` end the attempt without touching history;
 * a failure while applying always passes through `rolling-back`.
 */

import { AppError } from '../shared/errors'

export type UpdatePhase =
  | 'idle'
  | 'resolving-branch'
  | 'saving-rollback-point'
  | 'checking-working-tree'
  | 'fetching'
  | 'applying'
  | 'rolling-back'
  | 'succeeded'
  | 'failed'
  | 'rollback-failed'

const TRANSITIONS: Record<UpdatePhase, readonly UpdatePhase[]> = {
  idle: ['resolving-branch'],
  'resolving-branch': ['saving-rollback-point', 'failed'],
  'saving-rollback-point': ['checking-working-tree', 'failed'],
  'checking-working-tree': ['fetching', 'failed'],
  fetching: ['applying', 'failed'],
  applying: ['succeeded', 'rolling-back'],
  'rolling-back': ['failed', 'rollback-failed'],
  succeeded: ['idle'],
  failed: ['idle'],
  'rollback-failed': ['idle']
}

export class UpdateStateMachine {
  private constructor() {
    // Static-only class
  }

  static canTransition(from: UpdatePhase, to: UpdatePhase): boolean {
    return TRANSITIONS[from].includes(to)
  }

  /**
   * Returns `to` when the step is legal, throws otherwise.
   */
  static transition(from: UpdatePhase, to: UpdatePhase): UpdatePhase {
    if (!UpdateStateMachine.canTransition(from, to)) {
      throw new AppError(`Illegal update transition: ${from} -> ${to}`)
    }
    return to
  }
}
