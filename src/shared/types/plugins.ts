export type PluginDirection = 'behind' | 'ahead'

/**
 * Entry of the plugin lockfile: plugin name mapped to the pinned commit.
 */
export type LockfileEntry = {
  commit: string
  branch?: string
}

export type LockfileData = Record<string, LockfileEntry>

export type PluginUpdate = {
  name: string
  /** Installed commit, shortened for display. */
  installedCommit: string
  /** Lockfile commit, shortened for display. */
  lockfileCommit: string
  branch: string
  direction: PluginDirection
}

export type PluginDriftReport = {
  all: PluginUpdate[]
  behind: PluginUpdate[]
  ahead: PluginUpdate[]
}

export type PluginInstallResult = {
  status: 'success' | 'error' | 'in-progress' | 'unavailable'
  message: string
}

export function createEmptyDriftReport(): PluginDriftReport {
  return { all: [], behind: [], ahead: [] }
}
