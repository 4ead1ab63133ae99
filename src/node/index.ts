/**
 * Repository updater entry point.
 *
 * `createUpdater` wires the adapters, services and operations of one tracked
 * repository behind the Updater handlers. Hosts pass configuration overrides
 * and, optionally, their own notifier or process runner.
 */

import { setDebugLogging } from '@shared/logger'
import { createGitAdapter, type GitAdapter } from './adapters/git'
import { GhCliReleaseSource, HttpReleaseSource, type ReleaseSource } from './adapters/forge'
import {
  EditorCommandToolRestorer,
  LazyPluginManager,
  NullToolRestorer,
  type PluginManager,
  type ToolRestorer
} from './adapters/plugins'
import { NodeProcessRunner, type ProcessRunner } from './adapters/process'
import { loadConfiguration, type ConfigOverrides, type UpdaterConfig } from './core/config'
import { LogNotifier, Updater, type Notifier } from './handlers'
import type { UpdaterContext } from './operations'
import {
  PluginLockfileService,
  ReleaseMetadataService,
  RepositoryQueryService,
  StatusCacheService,
  UpdaterSession
} from './services'

export type UpdaterDependencies = {
  git?: GitAdapter
  runner?: ProcessRunner
  notifier?: Notifier
  plugins?: PluginManager
  tools?: ToolRestorer
  releaseSources?: ReleaseSource[]
}

function defaultReleaseSources(config: UpdaterConfig, runner: ProcessRunner): ReleaseSource[] {
  const sources: ReleaseSource[] = []
  if (config.github.useCli) {
    sources.push(new GhCliReleaseSource(runner, config.repoPath))
  }
  sources.push(new HttpReleaseSource(config.github.token))
  return sources
}

export function createContext(config: UpdaterConfig, deps: UpdaterDependencies = {}): UpdaterContext {
  const git = deps.git ?? createGitAdapter({ verbose: config.debug })
  const runner = deps.runner ?? new NodeProcessRunner()

  const plugins =
    deps.plugins ??
    new LazyPluginManager(git, runner, {
      pluginRoot: config.pluginRoot,
      repoPath: config.repoPath,
      editorCommand: config.editorCommand
    })
  const tools =
    deps.tools ??
    (config.toolRestoreCommand
      ? new EditorCommandToolRestorer(runner, config.editorCommand, config.toolRestoreCommand, config.repoPath)
      : new NullToolRestorer())

  return {
    config,
    git,
    session: new UpdaterSession(),
    queries: new RepositoryQueryService(git, config),
    cache: new StatusCacheService(config.cacheDir),
    lockfile: new PluginLockfileService(git, plugins, config),
    releases: new ReleaseMetadataService(
      deps.releaseSources ?? defaultReleaseSources(config, runner),
      config.releaseCacheTtlSeconds
    ),
    plugins,
    tools
  }
}

/**
 * Loads and validates configuration, then builds an Updater for it.
 * Throws a ValidationError when the configuration is invalid.
 */
export function createUpdater(overrides: ConfigOverrides = {}, deps: UpdaterDependencies = {}): Updater {
  const config = loadConfiguration(overrides)
  setDebugLogging(config.debug)
  return new Updater(createContext(config, deps), deps.notifier ?? new LogNotifier())
}

export { createDefaultConfig, loadConfiguration, validateConfig } from './core/config'
export type { ConfigOverrides, UpdaterConfig } from './core/config'
export { LogNotifier, Updater } from './handlers'
export type { Notifier } from './handlers'
export type { CheckOutcome, UpdaterContext } from './operations'
export {
  AppError,
  ConflictDetectedError,
  GitError,
  ProcessError,
  RollbackFailedError,
  SpawnError,
  TimeoutError,
  ValidationError
} from './shared/errors'
export type * from '@shared/types'
