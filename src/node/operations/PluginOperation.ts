/**
 * PluginOperation - Plugin drift checks and restores from the lockfile
 */

import { log } from '@shared/logger'
import type { PluginDriftReport, PluginInstallResult } from '@shared/types'
import { WORKING_TREE_FLAGS } from '../services/UpdaterSession'
import { errorMessage } from '../shared/errors'
import type { UpdaterContext } from './context'

const IN_PROGRESS: PluginInstallResult = {
  status: 'in-progress',
  message: 'Plugin installation already in progress'
}

export class PluginOperation {
  private constructor() {
    // Static-only class
  }

  /**
   * Reconciles the lockfile and stores the drift in the session.
   */
  static async checkDrift(ctx: UpdaterContext): Promise<PluginDriftReport> {
    const report = await ctx.lockfile.reconcile()
    ctx.session.patch({
      pluginUpdates: report.all,
      pluginsBehind: report.behind,
      pluginsAhead: report.ahead,
      hasPluginUpdates: report.all.length > 0
    })
    return report
  }

  /**
   * Restores every plugin to its lockfile commit, then re-checks drift.
   */
  static async install(ctx: UpdaterContext): Promise<PluginInstallResult> {
    return ctx.session.withExclusiveFlag('isInstallingPlugins', WORKING_TREE_FLAGS, IN_PROGRESS, async () => {
      if (!(await ctx.plugins.isAvailable())) {
        return {
          status: 'unavailable',
          message: `Cannot install plugin updates: ${ctx.plugins.name} not found`
        }
      }

      log.info('[PluginOperation] Restoring plugins from lockfile')
      const outcome = await ctx.plugins
        .restore()
        .catch((error: unknown) => ({ ok: false, output: errorMessage(error) }))

      if (!outcome.ok) {
        return { status: 'error', message: `Failed to install plugin updates: ${outcome.output.trim()}` }
      }

      await this.checkDrift(ctx)
      ctx.session.patch({ recentlyUpdatedPlugins: true })
      return { status: 'success', message: 'Successfully restored plugins from lockfile!' }
    })
  }
}
