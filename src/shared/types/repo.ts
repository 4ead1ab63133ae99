export type Commit = {
  /** Abbreviated hash as printed by `%h`. */
  hash: string
  /** First line of the subject, truncated for display. */
  message: string
  author: string
  /** Relative date as printed by `%ar`, e.g. "3 days ago". */
  date: string
}

export type CommitInfo = Commit & {
  fullHash: string
  /** Committer time in unix seconds. */
  timestamp: number
}

/**
 * Which side of the comparison a commit log describes.
 * `remote` lists commits the local branch does not have yet.
 */
export type LogOrigin = 'local' | 'remote'

export type CommitLog = {
  commits: Commit[]
  origin: LogOrigin
}

export type AheadBehind = {
  ahead: number
  behind: number
}

export type RepoStatus = {
  branch: string
  currentCommit: string
  aheadCount: number
  behindCount: number
  isMainBranch: boolean
  hasLocalChanges: boolean
  /** behindCount === 0 and no error. */
  upToDate: boolean
  /** When true every other field holds its default. */
  error: boolean
}

export type LineCounts = {
  linesAdded: number
  linesDeleted: number
}

export type DiffStat = LineCounts & {
  filesChanged: number
}

export type TagEntry = {
  name: string
  /** Commit time of the tagged commit in unix seconds, 0 when unknown. */
  timestamp: number
}

export const UNKNOWN_BRANCH = 'unknown'

export function createDefaultRepoStatus(): RepoStatus {
  return {
    branch: UNKNOWN_BRANCH,
    currentCommit: '',
    aheadCount: 0,
    behindCount: 0,
    isMainBranch: false,
    hasLocalChanges: false,
    upToDate: false,
    error: true
  }
}
