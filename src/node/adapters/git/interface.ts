/**
 * Git Adapter Interface
 *
 * The set of git invocations the updater performs, each bounded by its own
 * timeout. Implementations throw GitError when git reports a failure and
 * TimeoutError when the deadline passes; callers decide whether a failure
 * degrades to a default or aborts the operation.
 */

import type { AheadBehind, Commit, CommitInfo, DiffStat, LineCounts, TagEntry } from '@shared/types'

export type GitCallOptions = {
  timeoutMs: number
}

export type PullOptions = GitCallOptions & {
  rebase: boolean
  autostash: boolean
}

export type LogQuery = GitCallOptions & {
  /** Revisions passed verbatim, e.g. ['origin/main', '^HEAD']. */
  revisions: string[]
  maxCount?: number
}

export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  isRepository(dir: string, options: GitCallOptions): Promise<boolean>

  /**
   * Full hash of a revision.
   */
  resolveRef(dir: string, ref: string, options: GitCallOptions): Promise<string>

  /**
   * Short name of the checked out branch; `HEAD` when detached.
   */
  currentBranch(dir: string, options: GitCallOptions): Promise<string>

  isDetachedHead(dir: string, options: GitCallOptions): Promise<boolean>

  remoteUrl(dir: string, remote: string, options: GitCallOptions): Promise<string>

  /**
   * Commits only in `left` (ahead) and only in `right` (behind).
   */
  aheadBehind(dir: string, left: string, right: string, options: GitCallOptions): Promise<AheadBehind>

  log(dir: string, query: LogQuery): Promise<Commit[]>

  countCommits(dir: string, range: string, options: GitCallOptions): Promise<number>

  /**
   * Paths with staged, unstaged or untracked changes.
   */
  changedPaths(dir: string, options: GitCallOptions): Promise<string[]>

  isAncestor(dir: string, ancestor: string, descendant: string, options: GitCallOptions): Promise<boolean>

  // ============================================================================
  // Tags
  // ============================================================================

  listTags(dir: string, pattern: string, options: GitCallOptions): Promise<TagEntry[]>

  /**
   * Nearest tag matching `pattern` reachable from `ref`, or only a tag
   * pointing exactly at `ref` when `exact` is set.
   */
  describeTag(
    dir: string,
    ref: string,
    options: GitCallOptions & { pattern: string; exact: boolean }
  ): Promise<string>

  commitInfo(dir: string, ref: string, options: GitCallOptions): Promise<CommitInfo | null>

  /**
   * Committer time of `ref` in unix seconds.
   */
  commitTimestamp(dir: string, ref: string, options: GitCallOptions): Promise<number | null>

  diffShortStat(dir: string, from: string, to: string, options: GitCallOptions): Promise<DiffStat>

  /**
   * Lines added and deleted in `paths` between two revisions.
   */
  diffNumStat(
    dir: string,
    from: string,
    to: string,
    paths: string[],
    options: GitCallOptions
  ): Promise<LineCounts>

  // ============================================================================
  // Mutations
  // ============================================================================

  fetch(dir: string, remote: string, ref: string | undefined, options: GitCallOptions): Promise<void>

  /**
   * Returns git's combined output so callers can inspect it for conflict text.
   */
  pull(dir: string, remote: string, branch: string, options: PullOptions): Promise<string>

  merge(dir: string, ref: string, options: GitCallOptions): Promise<string>

  stashPush(dir: string, message: string, options: GitCallOptions): Promise<string>

  stashPop(dir: string, options: GitCallOptions): Promise<string>

  mergeAbort(dir: string, options: GitCallOptions): Promise<void>

  rebaseAbort(dir: string, options: GitCallOptions): Promise<void>

  resetHard(dir: string, ref: string, options: GitCallOptions): Promise<void>

  /**
   * Discards working tree changes to the given paths.
   */
  checkoutPaths(dir: string, paths: string[], options: GitCallOptions): Promise<void>

  checkoutDetached(dir: string, ref: string, options: GitCallOptions): Promise<void>
}
