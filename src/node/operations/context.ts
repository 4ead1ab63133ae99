import type { GitAdapter } from '../adapters/git'
import type { PluginManager, ToolRestorer } from '../adapters/plugins'
import type { UpdaterConfig } from '../core/config'
import type { PluginLockfileService } from '../services/PluginLockfileService'
import type { ReleaseMetadataService } from '../services/ReleaseMetadataService'
import type { RepositoryQueryService } from '../services/RepositoryQueryService'
import type { StatusCacheService } from '../services/StatusCacheService'
import type { UpdaterSession } from '../services/UpdaterSession'

/**
 * Everything an operation needs for one tracked repository.
 */
export type UpdaterContext = {
  config: UpdaterConfig
  git: GitAdapter
  session: UpdaterSession
  queries: RepositoryQueryService
  cache: StatusCacheService
  lockfile: PluginLockfileService
  releases: ReleaseMetadataService
  plugins: PluginManager
  tools: ToolRestorer
}
