import type { CommitInfo } from './repo'

export type GitHubRelease = {
  tag: string
  name: string
  body: string
  prerelease: boolean
  draft: boolean
  htmlUrl: string
  publishedAt: string
  author: string
}

export type ReleaseMetadata = {
  title: string
  body: string
  prerelease: boolean
  htmlUrl: string
  publishedAt: string
}

export type ReleaseTag = {
  name: string
  commit: CommitInfo | null
  date: string
  githubMetadata?: ReleaseMetadata
}

/**
 * Summary of what changed between a release tag and the one before it.
 */
export type ReleaseDetails = {
  tag: string
  commit: string
  date: string
  url: string | null
  title: string | null
  description: string | null
  linesAdded: number
  linesDeleted: number
  filesChanged: number
  /** Lockfile lines the release added, one per plugin bumped or introduced. */
  pluginChanges: number
  toolChanges: number
}

export type VersionMode = 'latest' | 'pinned'

export type VersionSwitchResult = {
  status: 'success' | 'error' | 'in-progress'
  message: string
  /** Restore steps that failed without failing the switch. */
  warnings: string[]
  tag?: string
}
