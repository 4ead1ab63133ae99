/**
 * RepositoryQueryService - read-side git queries against the tracked repository.
 *
 * Every query runs under its own timeout bucket from the configuration.
 * Read-only failures degrade to a safe default (empty list, zero counts, null)
 * and are logged at debug level; the few queries whose failure must stop an
 * update (`resolveBranch`, `resolveHead`, `hasUncommittedChanges`) throw.
 */

import { log } from '@shared/logger'
import {
  UNKNOWN_BRANCH,
  createDefaultRepoStatus,
  type AheadBehind,
  type Commit,
  type CommitInfo,
  type CommitLog,
  type DiffStat,
  type LineCounts,
  type RepoStatus
} from '@shared/types'
import type { GitAdapter } from '../adapters/git'
import { timeoutMs, type TimeoutKey, type UpdaterConfig } from '../core/config'
import { CommitLogPlanner } from '../domain/CommitLogPlanner'
import { VersionComparator } from '../domain/VersionComparator'
import { DEFAULT_REMOTE, TIME } from '../shared/constants'
import { errorMessage } from '../shared/errors'

export type ReleaseDiff = {
  stat: DiffStat
  pluginLockfile: LineCounts
  toolLockfile: LineCounts
}

type TagCache = {
  tags: string[]
  fetchedAt: number
}

export class RepositoryQueryService {
  private tagCache: TagCache | null = null
  private repositoryValid: boolean | null = null

  constructor(
    private readonly git: GitAdapter,
    private readonly config: UpdaterConfig
  ) {}

  get repoPath(): string {
    return this.config.repoPath
  }

  get upstream(): string {
    return `${DEFAULT_REMOTE}/${this.config.mainBranch}`
  }

  private opts(key: TimeoutKey): { timeoutMs: number } {
    return { timeoutMs: timeoutMs(this.config, key) }
  }

  private async safely<T>(label: string, fallback: T, query: () => Promise<T>): Promise<T> {
    try {
      return await query()
    } catch (error) {
      log.debug(`[RepositoryQueryService.${label}] falling back:`, errorMessage(error))
      return fallback
    }
  }

  // ============================================================================
  // Repository
  // ============================================================================

  /**
   * Whether the configured path is a git work tree. The answer is cached for
   * the lifetime of the service.
   */
  async validateRepository(): Promise<boolean> {
    if (this.repositoryValid === null) {
      this.repositoryValid = await this.git.isRepository(this.repoPath, this.opts('status'))
      if (!this.repositoryValid) {
        log.warn(`[RepositoryQueryService] ${this.repoPath} is not a git repository`)
      }
    }
    return this.repositoryValid
  }

  async resolveHead(): Promise<string> {
    return this.git.resolveRef(this.repoPath, 'HEAD', this.opts('status'))
  }

  async currentCommit(): Promise<string> {
    return this.safely('currentCommit', '', () => this.resolveHead())
  }

  async resolveBranch(): Promise<string> {
    const branch = await this.git.currentBranch(this.repoPath, this.opts('status'))
    if (!branch) {
      throw new Error('git reported an empty branch name')
    }
    return branch
  }

  async currentBranch(): Promise<string> {
    return this.safely('currentBranch', UNKNOWN_BRANCH, () => this.resolveBranch())
  }

  async isDetachedHead(): Promise<boolean> {
    return this.safely('isDetachedHead', false, () =>
      this.git.isDetachedHead(this.repoPath, this.opts('status'))
    )
  }

  async remoteUrl(): Promise<string | null> {
    return this.safely<string | null>('remoteUrl', null, async () => {
      const url = await this.git.remoteUrl(this.repoPath, DEFAULT_REMOTE, this.opts('default'))
      return url || null
    })
  }

  // ============================================================================
  // Working Tree
  // ============================================================================

  /**
   * True when the working tree has changes outside the lockfiles. Changes
   * confined to lockfiles are discarded and reported as clean, since the
   * editor rewrites those files on its own. Throws when git status fails.
   */
  async hasUncommittedChanges(): Promise<boolean> {
    const paths = await this.git.changedPaths(this.repoPath, this.opts('status'))
    if (paths.length === 0) {
      return false
    }

    if (!this.onlyLockfiles(paths)) {
      return true
    }

    try {
      await this.git.checkoutPaths(this.repoPath, paths, this.opts('status'))
      log.info(`[RepositoryQueryService] Discarded lockfile changes: ${paths.join(', ')}`)
      return false
    } catch (error) {
      log.warn('[RepositoryQueryService] Could not discard lockfile changes:', errorMessage(error))
      return true
    }
  }

  /**
   * Whether anything at all is modified. Never discards.
   */
  async hasLocalChanges(): Promise<boolean> {
    return this.safely('hasLocalChanges', false, async () => {
      const paths = await this.git.changedPaths(this.repoPath, this.opts('status'))
      return paths.length > 0
    })
  }

  private onlyLockfiles(paths: string[]): boolean {
    return paths.every((p) => this.config.lockfilePaths.includes(p))
  }

  // ============================================================================
  // Branch Comparison
  // ============================================================================

  async aheadBehind(branch: string, upstream: string = this.upstream): Promise<AheadBehind> {
    return this.safely('aheadBehind', { ahead: 0, behind: 0 }, () =>
      this.git.aheadBehind(this.repoPath, branch, upstream, this.opts('status'))
    )
  }

  async commitLog(branch: string, counts: AheadBehind): Promise<CommitLog> {
    const plan = CommitLogPlanner.plan(branch, this.config.mainBranch, counts)
    const commits = await this.safely<Commit[]>('commitLog', [], () =>
      this.git.log(this.repoPath, {
        revisions: plan.revisions,
        maxCount: this.config.logCount,
        ...this.opts('log')
      })
    )
    return { commits, origin: plan.origin }
  }

  /**
   * Newest `logCount` commits on origin/<main> that the branch lacks.
   */
  async remoteCommitsNotInLocal(branch: string): Promise<Commit[]> {
    return this.safely<Commit[]>('remoteCommitsNotInLocal', [], () =>
      this.git.log(this.repoPath, {
        revisions: CommitLogPlanner.remoteOnly(branch, this.config.mainBranch),
        maxCount: this.config.logCount,
        ...this.opts('log')
      })
    )
  }

  /**
   * Maps each commit hash to whether HEAD already contains it. Runs one
   * `git merge-base` at a time.
   */
  async commitsInBranch(commits: Commit[]): Promise<Record<string, boolean>> {
    const contained: Record<string, boolean> = {}
    for (const commit of commits) {
      contained[commit.hash] = await this.safely('commitsInBranch', false, () =>
        this.git.isAncestor(this.repoPath, commit.hash, 'HEAD', this.opts('default'))
      )
    }
    return contained
  }

  /**
   * Fetches the main branch and compares the current branch against it.
   * A failed fetch or branch lookup yields the error status.
   */
  async repoStatus(): Promise<RepoStatus> {
    try {
      await this.git.fetch(this.repoPath, DEFAULT_REMOTE, this.config.mainBranch, this.opts('fetch'))
    } catch (error) {
      log.debug('[RepositoryQueryService.repoStatus] fetch failed:', errorMessage(error))
      return createDefaultRepoStatus()
    }

    const branch = await this.currentBranch()
    if (branch === UNKNOWN_BRANCH) {
      return createDefaultRepoStatus()
    }

    const [counts, currentCommit, hasLocalChanges] = await Promise.all([
      this.aheadBehind(branch),
      this.currentCommit(),
      this.hasLocalChanges()
    ])

    return {
      branch,
      currentCommit,
      aheadCount: counts.ahead,
      behindCount: counts.behind,
      isMainBranch: branch === this.config.mainBranch,
      hasLocalChanges,
      upToDate: counts.behind === 0,
      error: false
    }
  }

  // ============================================================================
  // Tags
  // ============================================================================

  /**
   * Release tags matching the configured pattern, newest commit first.
   * A non-empty list is cached for `versionCacheTtlSeconds`. Throws when git
   * cannot list tags.
   */
  async loadVersionTags(): Promise<string[]> {
    const ttl = this.config.versionCacheTtlSeconds * TIME.SECOND
    if (this.tagCache && Date.now() - this.tagCache.fetchedAt < ttl) {
      return this.tagCache.tags
    }

    const entries = await this.git.listTags(this.repoPath, this.config.tagPattern, this.opts('default'))
    const tags = VersionComparator.sortByRecency(entries)
    this.tagCache = tags.length > 0 ? { tags, fetchedAt: Date.now() } : null
    return tags
  }

  async versionTags(): Promise<string[]> {
    return this.safely<string[]>('versionTags', [], () => this.loadVersionTags())
  }

  /**
   * Tags from the last successful listing, without asking git.
   */
  cachedVersionTags(): string[] {
    return this.tagCache?.tags ?? []
  }

  invalidateTags(): void {
    this.tagCache = null
  }

  /**
   * Nearest release tag reachable from `ref`.
   */
  async latestReleaseForRef(ref = 'HEAD'): Promise<string | null> {
    return this.describe(ref, false)
  }

  /**
   * Release tag pointing exactly at HEAD.
   */
  async headTag(): Promise<string | null> {
    return this.describe('HEAD', true)
  }

  private async describe(ref: string, exact: boolean): Promise<string | null> {
    return this.safely<string | null>(exact ? 'headTag' : 'latestReleaseForRef', null, async () => {
      const tag = await this.git.describeTag(this.repoPath, ref, {
        pattern: this.config.tagPattern,
        exact,
        ...this.opts('default')
      })
      return tag || null
    })
  }

  async commitsSinceTag(tag: string): Promise<number> {
    return this.safely('commitsSinceTag', 0, () =>
      this.git.countCommits(this.repoPath, `${tag}..HEAD`, this.opts('default'))
    )
  }

  async commitsSinceTagList(tag: string): Promise<Commit[]> {
    return this.safely<Commit[]>('commitsSinceTagList', [], () =>
      this.git.log(this.repoPath, {
        revisions: [`${tag}..HEAD`],
        maxCount: this.config.logCount,
        ...this.opts('log')
      })
    )
  }

  async tagCommitInfo(tag: string): Promise<CommitInfo | null> {
    return this.safely<CommitInfo | null>('tagCommitInfo', null, () =>
      this.git.commitInfo(this.repoPath, tag, this.opts('default'))
    )
  }

  /**
   * What changed between two release tags, overall and in each lockfile.
   */
  async releaseDiff(tag: string, previousTag: string): Promise<ReleaseDiff> {
    const none: LineCounts = { linesAdded: 0, linesDeleted: 0 }
    const options = this.opts('default')

    const [stat, pluginLockfile, toolLockfile] = await Promise.all([
      this.safely<DiffStat>('releaseDiff', { ...none, filesChanged: 0 }, () =>
        this.git.diffShortStat(this.repoPath, previousTag, tag, options)
      ),
      this.safely('releaseDiff', none, () =>
        this.git.diffNumStat(this.repoPath, previousTag, tag, [this.config.pluginLockfile], options)
      ),
      this.safely('releaseDiff', none, () =>
        this.git.diffNumStat(this.repoPath, previousTag, tag, [this.config.toolLockfile], options)
      )
    ])

    return { stat, pluginLockfile, toolLockfile }
  }
}
