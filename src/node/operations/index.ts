/**
 * Operations Layer - Orchestrates services, adapters and domain logic.
 *
 * Each operation takes the UpdaterContext of one tracked repository and
 * returns a result object; none of them notifies the user.
 */

export type { UpdaterContext } from './context'
export { PeriodicCheckOperation } from './PeriodicCheckOperation'
export type { CheckOutcome } from './PeriodicCheckOperation'
export { PluginOperation } from './PluginOperation'
export { RefreshOperation } from './RefreshOperation'
export { ReleaseOperation } from './ReleaseOperation'
export { UpdateOperation } from './UpdateOperation'
export { DIRTY_TREE_MESSAGE, VersionOperation, isoDate } from './VersionOperation'
