/**
 * PluginDriftClassifier - decides whether an installed plugin is newer or
 * older than the commit its lockfile pins.
 */

import type { PluginDirection, PluginDriftReport, PluginUpdate } from '@shared/types'

export class PluginDriftClassifier {
  private constructor() {
    // Static-only class
  }

  /**
   * Ahead only when the installed commit is strictly newer. A missing
   * timestamp on either side counts as behind, which offers a restore.
   */
  static direction(installedTimestamp: number | null, lockfileTimestamp: number | null): PluginDirection {
    if (installedTimestamp === null || lockfileTimestamp === null) {
      return 'behind'
    }
    return installedTimestamp > lockfileTimestamp ? 'ahead' : 'behind'
  }

  static partition(updates: PluginUpdate[]): PluginDriftReport {
    return {
      all: updates,
      behind: updates.filter((update) => update.direction === 'behind'),
      ahead: updates.filter((update) => update.direction === 'ahead')
    }
  }
}
