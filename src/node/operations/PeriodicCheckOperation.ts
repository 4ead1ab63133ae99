/**
 * PeriodicCheckOperation - Lightweight background checks
 *
 * Background checks only compare branch status and plugin drift (plus the
 * release position when following releases) and skip git entirely while the
 * status cache is fresh.
 */

import { log } from '@shared/logger'
import type { CacheEntry } from '@shared/types'
import { StatusSummary } from '../domain/StatusSummary'
import { StatusCacheService } from '../services/StatusCacheService'
import { HEAD_MOVING_FLAGS, WORKING_TREE_FLAGS } from '../services/UpdaterSession'
import type { UpdaterContext } from './context'
import { PluginOperation } from './PluginOperation'
import { unknownStatusPatch } from './RefreshOperation'
import { VersionOperation } from './VersionOperation'

export type CheckOutcome =
  | { kind: 'disabled' }
  | { kind: 'busy' }
  | { kind: 'fresh' }
  | { kind: 'cached'; hasUpdates: boolean }
  | { kind: 'checked'; hasUpdates: boolean }

export class PeriodicCheckOperation {
  private constructor() {
    // Static-only class
  }

  /**
   * Branch status and plugin drift only; writes the cache. Returns whether
   * any update is pending. Holds the refresh flag, and answers from the
   * session without asking git while a refresh, an update or a version
   * switch runs.
   */
  static async checkUpdatesSilent(ctx: UpdaterContext): Promise<boolean> {
    const busy = StatusSummary.hasUpdates(ctx.session.state)
    return ctx.session.withExclusiveFlag('isRefreshing', HEAD_MOVING_FLAGS, busy, () => this.check(ctx))
  }

  private static async check(ctx: UpdaterContext): Promise<boolean> {
    const { queries, session, config } = ctx

    const status = await queries.repoStatus()
    if (status.error) {
      session.patch(unknownStatusPatch())
      return false
    }

    session.patch({
      branch: status.branch,
      currentCommit: status.currentCommit,
      aheadCount: status.aheadCount,
      behindCount: status.behindCount,
      hasLocalChanges: status.hasLocalChanges,
      needsUpdate: status.behindCount > 0
    })

    await PluginOperation.checkDrift(ctx)

    if (config.versionedReleasesOnly) {
      await VersionOperation.loadReleasePosition(ctx)
      session.patch({ needsUpdate: session.state.hasNewRelease })
    }

    session.patch({ lastCheckTime: Date.now() })
    await ctx.cache.updateAfterCheck(config.repoPath, session.state)
    return StatusSummary.hasUpdates(session.state)
  }

  /**
   * One timer tick: skipped while another check runs or the cache is fresh.
   */
  static async tick(ctx: UpdaterContext): Promise<CheckOutcome> {
    const { config, session } = ctx
    if (!config.periodicCheck.enabled) {
      return { kind: 'disabled' }
    }
    if (session.isAnyBusy(WORKING_TREE_FLAGS)) {
      return { kind: 'busy' }
    }
    if (await ctx.cache.isFresh(config.repoPath, config.periodicCheck.frequencyMinutes)) {
      log.debug('[PeriodicCheckOperation] Cache is fresh, skipping check')
      return { kind: 'fresh' }
    }

    const hasUpdates = await this.checkUpdatesSilent(ctx)
    return { kind: 'checked', hasUpdates }
  }

  /**
   * First check after the host starts. A fresh cache answers without git.
   */
  static async startup(ctx: UpdaterContext): Promise<CheckOutcome> {
    const { config } = ctx
    if (!config.checkOnStartup) {
      return { kind: 'disabled' }
    }

    const cached = await ctx.cache.read(config.repoPath)
    if (cached && StatusCacheService.isEntryFresh(cached, config.periodicCheck.frequencyMinutes)) {
      this.restoreFromCache(ctx, cached)
      return { kind: 'cached', hasUpdates: cached.needsUpdate || cached.hasPluginUpdates }
    }

    const hasUpdates = await this.checkUpdatesSilent(ctx)
    return { kind: 'checked', hasUpdates }
  }

  private static restoreFromCache(ctx: UpdaterContext, entry: CacheEntry): void {
    ctx.session.patch({
      branch: entry.branch,
      currentCommit: entry.lastCommitHash,
      aheadCount: entry.aheadCount,
      behindCount: entry.behindCount,
      needsUpdate: entry.needsUpdate,
      hasPluginUpdates: entry.hasPluginUpdates,
      lastCheckTime: entry.lastCheckTime
    })
  }
}
