/**
 * VersionOperation - Release tags: listing, positioning and switching
 *
 * Switching checks a release tag out as a detached HEAD and then asks the
 * plugin manager and tool restorer to follow the lockfiles of that release.
 * Restore problems are reported as warnings; the checkout itself decides
 * whether the switch succeeded.
 */

import { log } from '@shared/logger'
import type { ReleaseTag, VersionMode, VersionSwitchResult } from '@shared/types'
import { timeoutMs } from '../core/config'
import { ReleaseResolver, type ResolvedVersionMode } from '../domain/ReleaseResolver'
import { ReleaseMetadataService } from '../services/ReleaseMetadataService'
import { WORKING_TREE_FLAGS } from '../services/UpdaterSession'
import { AVAILABLE_VERSIONS_PREVIEW } from '../shared/constants'
import { errorMessage } from '../shared/errors'
import type { UpdaterContext } from './context'

export const DIRTY_TREE_MESSAGE =
  'Cannot switch: uncommitted changes exist. Commit or stash your changes first.'

const IN_PROGRESS: VersionSwitchResult = {
  status: 'in-progress',
  message: 'Version switch already in progress',
  warnings: []
}

type TargetChoice = { tag: string } | { error: string }

function failure(message: string): VersionSwitchResult {
  return { status: 'error', message, warnings: [] }
}

/**
 * `YYYY-MM-DD` of a unix timestamp, empty when unknown.
 */
export function isoDate(timestamp: number): string {
  if (timestamp <= 0) return ''
  return new Date(timestamp * 1000).toISOString().slice(0, 10)
}

export class VersionOperation {
  private constructor() {
    // Static-only class
  }

  // ============================================================================
  // Listing
  // ============================================================================

  /**
   * Release tags, newest first, with their commits and any GitHub release
   * metadata already loaded into the session. Tag commits are looked up one
   * at a time.
   */
  static async getAvailableVersions(ctx: UpdaterContext): Promise<ReleaseTag[]> {
    const tags = await ctx.queries.versionTags()
    const releases = ctx.session.state.githubReleases

    const versions: ReleaseTag[] = []
    for (const name of tags) {
      const commit = await ctx.queries.tagCommitInfo(name)
      const release = releases[name]
      versions.push({
        name,
        commit,
        date: commit ? isoDate(commit.timestamp) : '',
        ...(release ? { githubMetadata: ReleaseMetadataService.toMetadata(release) } : {})
      })
    }
    return versions
  }

  /**
   * Known tags starting with `prefix`, from the last listing only.
   */
  static completions(ctx: UpdaterContext, prefix = ''): string[] {
    return ctx.queries.cachedVersionTags().filter((tag) => tag.startsWith(prefix))
  }

  // ============================================================================
  // Positioning
  // ============================================================================

  /**
   * Derives pinned/latest from the tag HEAD sits on and stores the result.
   */
  static async detectVersionMode(ctx: UpdaterContext): Promise<ResolvedVersionMode> {
    const headTag = await ctx.queries.headTag()
    const { versionMode, pinnedVersion } = ctx.session.state
    const resolved = ReleaseResolver.resolveMode(headTag, { versionMode, pinnedVersion })
    ctx.session.patch(resolved)
    return resolved
  }

  /**
   * Places HEAD within the release list: the release it descends from, newer
   * and older releases, and the commits made since.
   */
  static async loadReleasePosition(ctx: UpdaterContext): Promise<void> {
    const { queries, session, config } = ctx

    const [isDetachedHead, currentRelease, headTag, tags] = await Promise.all([
      queries.isDetachedHead(),
      queries.latestReleaseForRef('HEAD'),
      queries.headTag(),
      queries.versionTags()
    ])

    const releasesSinceCurrent = ReleaseResolver.releasesSince(currentRelease, tags)
    const onRelease = currentRelease !== null && headTag === currentRelease

    const [commitsSinceRelease, commitsSinceReleaseList, releaseCommit] = await Promise.all([
      currentRelease && !onRelease ? queries.commitsSinceTag(currentRelease) : Promise.resolve(0),
      currentRelease && !onRelease ? queries.commitsSinceTagList(currentRelease) : Promise.resolve([]),
      currentRelease ? queries.tagCommitInfo(currentRelease) : Promise.resolve(null)
    ])

    session.patch({
      isDetachedHead,
      currentRelease,
      latestRelease: tags[0] ?? null,
      releasesSinceCurrent,
      releasesBeforeCurrent: ReleaseResolver.releasesBefore(currentRelease, tags, config.maxReleaseItems),
      hasNewRelease: releasesSinceCurrent.length > 0,
      commitsSinceRelease,
      commitsSinceReleaseList,
      releaseCommit
    })
  }

  // ============================================================================
  // Switching
  // ============================================================================

  static async switchToVersion(ctx: UpdaterContext, tag: string): Promise<VersionSwitchResult> {
    return this.switchTo(ctx, 'pinned', (tags) => {
      if (tags.includes(tag)) {
        return { tag }
      }
      const available = tags.slice(0, AVAILABLE_VERSIONS_PREVIEW).join(', ')
      return { error: `Version ${tag} not found. Available: ${available}` }
    })
  }

  static async switchToLatest(ctx: UpdaterContext): Promise<VersionSwitchResult> {
    return this.switchTo(ctx, 'latest', (tags) => {
      const latest = tags[0]
      return latest ? { tag: latest } : { error: 'No release tags found' }
    })
  }

  private static async switchTo(
    ctx: UpdaterContext,
    mode: VersionMode,
    choose: (tags: string[]) => TargetChoice
  ): Promise<VersionSwitchResult> {
    return ctx.session.withExclusiveFlag('isSwitchingVersion', WORKING_TREE_FLAGS, IN_PROGRESS, async () => {
      const { queries, config } = ctx

      let dirty: boolean
      try {
        dirty = await queries.hasUncommittedChanges()
      } catch (error) {
        return failure(`Failed to check for changes: ${errorMessage(error)}`)
      }
      if (dirty) {
        return failure(DIRTY_TREE_MESSAGE)
      }

      let tags: string[]
      try {
        tags = await queries.loadVersionTags()
      } catch (error) {
        return failure(`Failed to fetch versions: ${errorMessage(error)}`)
      }

      const choice = choose(tags)
      if ('error' in choice) {
        return failure(choice.error)
      }

      try {
        await ctx.git.checkoutDetached(config.repoPath, choice.tag, {
          timeoutMs: timeoutMs(config, 'default')
        })
      } catch (error) {
        return failure(`Failed to checkout ${choice.tag}: ${errorMessage(error)}`)
      }
      log.info(`[VersionOperation] Checked out ${choice.tag}`)

      const warnings = await this.restoreLockfiles(ctx)

      ctx.session.patch({
        versionMode: mode,
        pinnedVersion: mode === 'pinned' ? choice.tag : null,
        currentTag: choice.tag
      })

      return { status: 'success', message: `Switched to ${choice.tag}`, warnings, tag: choice.tag }
    })
  }

  /**
   * Restores plugins, then tools. Each failure becomes a warning telling the
   * user which command to run by hand.
   */
  private static async restoreLockfiles(ctx: UpdaterContext): Promise<string[]> {
    const warnings: string[] = []

    const pluginProblem = await this.restorePlugins(ctx)
    if (pluginProblem) {
      warnings.push(`Warning: ${pluginProblem}. Run :Lazy restore manually.`)
    }

    const toolProblem = await this.restoreTools(ctx)
    if (toolProblem) {
      const command = ctx.config.toolRestoreCommand ?? 'MasonLockRestore'
      warnings.push(`Warning: ${toolProblem}. Run :${command} manually.`)
    }

    for (const warning of warnings) {
      log.warn(`[VersionOperation] ${warning}`)
    }
    return warnings
  }

  private static async restorePlugins(ctx: UpdaterContext): Promise<string | null> {
    try {
      if (!(await ctx.plugins.isAvailable())) {
        return `${ctx.plugins.name} not available`
      }
      const outcome = await ctx.plugins.restore()
      return outcome.ok ? null : `Failed to restore plugins: ${outcome.output.trim()}`
    } catch (error) {
      return `Failed to restore plugins: ${errorMessage(error)}`
    }
  }

  private static async restoreTools(ctx: UpdaterContext): Promise<string | null> {
    try {
      const outcome = await ctx.tools.restore()
      return outcome.ok ? null : `Failed to restore tools: ${outcome.output.trim()}`
    } catch (error) {
      return `Failed to restore tools: ${errorMessage(error)}`
    }
  }
}
