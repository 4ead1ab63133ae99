/**
 * StatusSummary - derives counts and display strings from the updater state.
 */

import type { UpdateTextFormat, UpdaterState, UpdaterStatus } from '@shared/types'
import { UPDATE_ICONS } from '../shared/constants'

type SummaryState = Pick<
  UpdaterState,
  'needsUpdate' | 'hasPluginUpdates' | 'behindCount' | 'pluginsBehind'
>

export type NotifyTexts = {
  outdated: string
  upToDate: string
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}

export class StatusSummary {
  private constructor() {
    // Static-only class
  }

  static hasUpdates(state: Pick<UpdaterState, 'needsUpdate' | 'hasPluginUpdates'>): boolean {
    return state.needsUpdate || state.hasPluginUpdates
  }

  /**
   * Pending repository commits plus plugins behind their lockfile. Plugins
   * ahead of the lockfile are local work, not updates.
   */
  static updateCount(state: SummaryState): number {
    let count = 0
    if (state.needsUpdate) count += state.behindCount
    if (state.hasPluginUpdates) count += state.pluginsBehind.length
    return count
  }

  static updateText(state: SummaryState, format: UpdateTextFormat = 'default'): string {
    if (!StatusSummary.hasUpdates(state)) return ''

    const parts: string[] = []
    const pluginCount = state.pluginsBehind.length

    if (state.needsUpdate) {
      if (format === 'short') parts.push(`${state.behindCount}d`)
      else if (format === 'icon') parts.push(`${UPDATE_ICONS.repo} ${state.behindCount}`)
      else parts.push(plural(state.behindCount, 'dotfile'))
    }

    if (state.hasPluginUpdates && pluginCount > 0) {
      if (format === 'short') parts.push(`${pluginCount}p`)
      else if (format === 'icon') parts.push(`${UPDATE_ICONS.plugins} ${pluginCount}`)
      else parts.push(plural(pluginCount, 'plugin'))
    }

    if (parts.length === 0) return ''
    if (format !== 'default') return parts.join(' ')

    const total = StatusSummary.updateCount(state)
    return `${parts.join(', ')} update${total === 1 ? '' : 's'}`
  }

  static outdatedMessage(texts: NotifyTexts, ahead: number, behind: number): string {
    if (ahead > 0) {
      return `Your branch is ahead by ${ahead} commit(s) and behind by ${behind} commit(s). ${texts.outdated}`
    }
    return texts.outdated
  }

  static upToDateMessage(texts: NotifyTexts, ahead: number): string {
    if (ahead > 0) {
      return `Your dotfiles are up to date and ahead by ${ahead} commit(s).`
    }
    return texts.upToDate
  }

  static toStatus(state: UpdaterState): UpdaterStatus {
    return {
      needsUpdate: state.needsUpdate,
      behindCount: state.behindCount,
      aheadCount: state.aheadCount,
      hasPluginUpdates: state.hasPluginUpdates,
      pluginUpdateCount: state.pluginsBehind.length,
      currentBranch: state.branch,
      lastCheckTime: state.lastCheckTime,
      isUpdating: state.isUpdating,
      isInstallingPlugins: state.isInstallingPlugins,
      isRefreshing: state.isRefreshing,
      isSwitchingVersion: state.isSwitchingVersion
    }
  }
}
