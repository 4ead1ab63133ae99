export type { CacheData, CacheEntry } from './cache'
export type {
  LockfileData,
  LockfileEntry,
  PluginDirection,
  PluginDriftReport,
  PluginInstallResult,
  PluginUpdate
} from './plugins'
export { createEmptyDriftReport } from './plugins'
export type {
  GitHubRelease,
  ReleaseDetails,
  ReleaseMetadata,
  ReleaseTag,
  VersionMode,
  VersionSwitchResult
} from './release'
export type {
  AheadBehind,
  Commit,
  CommitInfo,
  CommitLog,
  DiffStat,
  LineCounts,
  LogOrigin,
  RepoStatus,
  TagEntry
} from './repo'
export { UNKNOWN_BRANCH, createDefaultRepoStatus } from './repo'
export type {
  Notification,
  NotificationLevel,
  OperationFlag,
  RefreshResult,
  UpdateResult,
  UpdateTextFormat,
  UpdaterState,
  UpdaterStatus
} from './updater'
export { createInitialUpdaterState } from './updater'
