/**
 * UpdaterSession - owns the mutable UpdaterState for one tracked repository.
 *
 * Operations read and patch the state through the session and claim one of
 * the operation flags for their whole duration. A caller finding its own flag
 * or one of its blockers set gets the `busy` result back immediately instead
 * of queueing.
 */

import { log } from '@shared/logger'
import { createInitialUpdaterState, type OperationFlag, type UpdaterState } from '@shared/types'

/**
 * Every operation touching the working tree, including the refresh that
 * fetches into it. An update, switch or plugin restore waits for none of them.
 */
export const WORKING_TREE_FLAGS: readonly OperationFlag[] = [
  'isUpdating',
  'isSwitchingVersion',
  'isInstallingPlugins',
  'isRefreshing'
]

/**
 * Operations that move HEAD. Refreshes and background checks back off while
 * one runs.
 */
export const HEAD_MOVING_FLAGS: readonly OperationFlag[] = ['isUpdating', 'isSwitchingVersion']

export class UpdaterSession {
  private current: UpdaterState

  constructor(initial: UpdaterState = createInitialUpdaterState()) {
    this.current = initial
  }

  get state(): Readonly<UpdaterState> {
    return this.current
  }

  /**
   * Copy of the state safe to hand to consumers.
   */
  snapshot(): UpdaterState {
    return structuredClone(this.current)
  }

  patch(changes: Partial<UpdaterState>): void {
    this.current = { ...this.current, ...changes }
  }

  isBusy(flag: OperationFlag): boolean {
    return this.current[flag]
  }

  isAnyBusy(flags: readonly OperationFlag[]): boolean {
    return flags.some((flag) => this.current[flag])
  }

  /**
   * Runs `run` with `flag` set, clearing it again however `run` ends.
   * Returns `busy` without running when `flag` or any of `blockers` is set.
   */
  async withExclusiveFlag<T>(
    flag: OperationFlag,
    blockers: readonly OperationFlag[],
    busy: T,
    run: () => Promise<T>
  ): Promise<T> {
    const holder = [flag, ...blockers].find((held) => this.current[held])
    if (holder) {
      log.debug(`[UpdaterSession] ${holder} set, skipping ${flag}`)
      return busy
    }

    this.setFlag(flag, true)
    try {
      return await run()
    } finally {
      this.setFlag(flag, false)
    }
  }

  private setFlag(flag: OperationFlag, value: boolean): void {
    const next = { ...this.current }
    next[flag] = value
    this.current = next
  }

  clearRecentUpdates(): void {
    this.patch({ recentlyUpdatedRepo: false, recentlyUpdatedPlugins: false })
  }
}
