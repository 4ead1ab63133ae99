export type { PluginManager, RestoreOutcome, ToolRestorer } from './interface'
export { outputReportsError } from './interface'
export { LazyPluginManager } from './LazyPluginManager'
export type { LazyPluginManagerOptions } from './LazyPluginManager'
export { EditorCommandToolRestorer, NullToolRestorer } from './ToolRestorer'
