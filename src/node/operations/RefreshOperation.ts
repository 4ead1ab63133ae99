/**
 * RefreshOperation - Rebuilds the session state from the repository
 *
 * A full refresh gathers, in order:
 * - The remote URL and current commit
 * - The version mode and release position
 * - Branch status against origin/<main> (a failed fetch ends the refresh)
 * - Remote commits, the commit log and plugin drift
 *
 * GitHub release metadata is requested at the start and joined at the end,
 * so the network round trip overlaps the git queries.
 */

import { log } from '@shared/logger'
import { createDefaultRepoStatus, type RefreshResult, type UpdaterState } from '@shared/types'
import { StatusSummary } from '../domain/StatusSummary'
import { HEAD_MOVING_FLAGS } from '../services/UpdaterSession'
import type { UpdaterContext } from './context'
import { PluginOperation } from './PluginOperation'
import { VersionOperation } from './VersionOperation'

const IN_PROGRESS: RefreshResult = { status: 'in-progress', hasUpdates: false }

/**
 * Session fields cleared when the repository status cannot be determined, so
 * no stale branch or counts survive a failed check.
 */
export function unknownStatusPatch(): Partial<UpdaterState> {
  const status = createDefaultRepoStatus()
  return {
    branch: status.branch,
    aheadCount: status.aheadCount,
    behindCount: status.behindCount,
    hasLocalChanges: status.hasLocalChanges,
    needsUpdate: false,
    hasPluginUpdates: false,
    pluginUpdates: [],
    pluginsBehind: [],
    pluginsAhead: []
  }
}

export class RefreshOperation {
  private constructor() {
    // Static-only class
  }

  /**
   * Returns `in-progress` while another refresh, an update or a version
   * switch runs.
   */
  static async refresh(ctx: UpdaterContext): Promise<RefreshResult> {
    return ctx.session.withExclusiveFlag('isRefreshing', HEAD_MOVING_FLAGS, IN_PROGRESS, () => this.run(ctx))
  }

  private static async run(ctx: UpdaterContext): Promise<RefreshResult> {
    const { queries, session, config } = ctx

    if (!(await queries.validateRepository())) {
      session.patch({ ...unknownStatusPatch(), lastCheckTime: Date.now() })
      return { status: 'error', hasUpdates: false }
    }

    const remoteUrl = await queries.remoteUrl()
    const currentCommit = await queries.currentCommit()
    session.patch({ remoteUrl, currentCommit })

    const releases = ctx.releases.releasesFor(remoteUrl).then((githubReleases) => {
      session.patch({ githubReleases })
    })

    try {
      await VersionOperation.detectVersionMode(ctx)
      if (config.versionedReleasesOnly) {
        await VersionOperation.loadReleasePosition(ctx)
      }

      const status = await queries.repoStatus()
      if (status.error) {
        log.warn('[RefreshOperation] Could not determine repository status')
        session.patch({ ...unknownStatusPatch(), lastCheckTime: Date.now() })
        return { status: 'error', hasUpdates: false }
      }

      session.patch({
        branch: status.branch,
        currentCommit: status.currentCommit || currentCommit,
        aheadCount: status.aheadCount,
        behindCount: status.behindCount,
        hasLocalChanges: status.hasLocalChanges
      })

      const remoteCommits = await queries.remoteCommitsNotInLocal(status.branch)
      const commitsInBranch = await queries.commitsInBranch(remoteCommits)
      session.patch({
        remoteCommits,
        commitsInBranch,
        needsUpdate: config.versionedReleasesOnly ? session.state.hasNewRelease : remoteCommits.length > 0
      })

      const commitLog = await queries.commitLog(status.branch, {
        ahead: status.aheadCount,
        behind: status.behindCount
      })
      session.patch({ commits: commitLog.commits, logOrigin: commitLog.origin })

      await PluginOperation.checkDrift(ctx)
      session.patch({ lastCheckTime: Date.now() })
      await ctx.cache.updateAfterCheck(config.repoPath, session.state)

      log.debug(
        `[RefreshOperation] ${status.branch}: ahead ${status.aheadCount}, behind ${status.behindCount}, ` +
          `plugins ${session.state.pluginUpdates.length}`
      )
      return { status: 'success', hasUpdates: StatusSummary.hasUpdates(session.state) }
    } finally {
      await releases
    }
  }
}
