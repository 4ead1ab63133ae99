/**
 * UpdateOutcomeClassifier - reads git's merge/pull output.
 *
 * git does not reliably exit non-zero on every failed merge, so the text
 * itself decides: any known failure marker means the update failed.
 */

import { DEFAULT_REMOTE, UPDATE_FAILURE_PATTERNS } from '../shared/constants'

export type ApplyOutcome =
  | { kind: 'output'; text: string }
  | { kind: 'error'; text: string }
  | { kind: 'timeout'; step: 'pull' | 'merge' }

export class UpdateOutcomeClassifier {
  private constructor() {
    // Static-only class
  }

  /**
   * The first failure marker found in `output`, or null when there is none.
   */
  static detectFailure(output: string): string | null {
    return UPDATE_FAILURE_PATTERNS.find((pattern) => output.includes(pattern)) ?? null
  }

  static isFailure(outcome: ApplyOutcome): boolean {
    return outcome.kind !== 'output' || UpdateOutcomeClassifier.detectFailure(outcome.text) !== null
  }

  static successMessage(output: string, branch: string, mainBranch: string): string {
    const upstream = `${DEFAULT_REMOTE}/${mainBranch}`
    if (output.includes('Already up to date') || output.includes('Already up-to-date')) {
      return `Already up to date with ${upstream}`
    }
    if (branch === mainBranch) {
      return `Successfully pulled changes from ${upstream}`
    }
    return `Successfully merged ${upstream} into ${branch}`
  }

  static failureMessage(outcome: ApplyOutcome): string {
    if (outcome.kind === 'timeout') {
      return `Git ${outcome.step} operation timed out`
    }
    if (outcome.text.includes('CONFLICT')) {
      return 'Merge conflict detected. Your branch has been restored to its previous state.'
    }
    if (outcome.kind === 'error') {
      return `Failed to update: ${outcome.text}`
    }
    return 'Merge conflict or error detected. Rolling back to previous state.'
  }

  static rollbackFailedMessage(failure: string, reason: string): string {
    return `${failure} Rollback also failed: ${reason}`
  }
}
