/**
 * Persisted per-repository status. One JSON file per tracked repository.
 */
export type CacheEntry = {
  version: number
  repoPath: string
  /** Epoch milliseconds. */
  lastCheckTime: number
  lastCommitHash: string
  branch: string
  behindCount: number
  aheadCount: number
  needsUpdate: boolean
  hasPluginUpdates: boolean
}

export type CacheData = Omit<CacheEntry, 'version' | 'repoPath'>
