export { PluginLockfileService } from './PluginLockfileService'
export { ReleaseMetadataService } from './ReleaseMetadataService'
export { RepositoryQueryService } from './RepositoryQueryService'
export type { ReleaseDiff } from './RepositoryQueryService'
export { StatusCacheService, cacheKey } from './StatusCacheService'
export { UpdateCheckScheduler } from './UpdateCheckScheduler'
export { UpdaterSession } from './UpdaterSession'
