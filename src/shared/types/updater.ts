import type { PluginUpdate } from './plugins'
import type { GitHubRelease, VersionMode } from './release'
import { UNKNOWN_BRANCH, type Commit, type CommitInfo, type LogOrigin } from './repo'

/**
 * Session-owned snapshot of everything the updater knows about the tracked
 * repository. Mutated by the refresh, update and version operations.
 */
export type UpdaterState = {
  branch: string
  currentCommit: string
  aheadCount: number
  behindCount: number
  hasLocalChanges: boolean

  commits: Commit[]
  logOrigin: LogOrigin
  remoteCommits: Commit[]
  /** Remote commit hash mapped to whether the current branch already contains it. */
  commitsInBranch: Record<string, boolean>

  remoteUrl: string | null
  currentTag: string | null
  currentRelease: string | null
  latestRelease: string | null
  releasesSinceCurrent: string[]
  releasesBeforeCurrent: string[]
  commitsSinceRelease: number
  commitsSinceReleaseList: Commit[]
  releaseCommit: CommitInfo | null
  isDetachedHead: boolean
  hasNewRelease: boolean
  versionMode: VersionMode
  pinnedVersion: string | null
  githubReleases: Record<string, GitHubRelease>

  pluginUpdates: PluginUpdate[]
  pluginsBehind: PluginUpdate[]
  pluginsAhead: PluginUpdate[]

  needsUpdate: boolean
  hasPluginUpdates: boolean
  /** Epoch milliseconds of the last completed check, null before the first. */
  lastCheckTime: number | null

  recentlyUpdatedRepo: boolean
  recentlyUpdatedPlugins: boolean

  isRefreshing: boolean
  isUpdating: boolean
  isInstallingPlugins: boolean
  isSwitchingVersion: boolean
}

export type OperationFlag = 'isRefreshing' | 'isUpdating' | 'isInstallingPlugins' | 'isSwitchingVersion'

export type UpdateResult = {
  status: 'success' | 'failed' | 'rollback-failed' | 'in-progress'
  message: string
  /** True when the repository was reset to the commit recorded before the update. */
  rolledBack: boolean
  previousCommit?: string
  currentCommit?: string
  /** The conflict or rollback error behind a failed update. */
  cause?: Error
}

export type RefreshResult = {
  status: 'success' | 'error' | 'in-progress'
  hasUpdates: boolean
}

export type UpdateTextFormat = 'default' | 'short' | 'icon'

/**
 * Read-only status handed to status-line style consumers.
 */
export type UpdaterStatus = {
  needsUpdate: boolean
  behindCount: number
  aheadCount: number
  hasPluginUpdates: boolean
  pluginUpdateCount: number
  currentBranch: string
  lastCheckTime: number | null
  isUpdating: boolean
  isInstallingPlugins: boolean
  isRefreshing: boolean
  isSwitchingVersion: boolean
}

export type NotificationLevel = 'info' | 'warn' | 'error'

export type Notification = {
  level: NotificationLevel
  title: string
  message: string
}

export function createInitialUpdaterState(): UpdaterState {
  return {
    branch: UNKNOWN_BRANCH,
    currentCommit: '',
    aheadCount: 0,
    behindCount: 0,
    hasLocalChanges: false,
    commits: [],
    logOrigin: 'local',
    remoteCommits: [],
    commitsInBranch: {},
    remoteUrl: null,
    currentTag: null,
    currentRelease: null,
    latestRelease: null,
    releasesSinceCurrent: [],
    releasesBeforeCurrent: [],
    commitsSinceRelease: 0,
    commitsSinceReleaseList: [],
    releaseCommit: null,
    isDetachedHead: false,
    hasNewRelease: false,
    versionMode: 'latest',
    pinnedVersion: null,
    githubReleases: {},
    pluginUpdates: [],
    pluginsBehind: [],
    pluginsAhead: [],
    needsUpdate: false,
    hasPluginUpdates: false,
    lastCheckTime: null,
    recentlyUpdatedRepo: false,
    recentlyUpdatedPlugins: false,
    isRefreshing: false,
    isUpdating: false,
    isInstallingPlugins: false,
    isSwitchingVersion: false
  }
}
