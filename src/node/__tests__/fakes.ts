/**
 * In-process stand-ins for the git binary, subprocesses and the editor's
 * plugin manager. Every method is a vi.fn with a benign default, so a test
 * only scripts the calls it cares about.
 */

import type { CacheData, CacheEntry } from '@shared/types'
import { vi } from 'vitest'
import type { GitAdapter } from '../adapters/git'
import type { PluginManager, RestoreOutcome, ToolRestorer } from '../adapters/plugins'
import type { ProcessResult, ProcessRunner } from '../adapters/process'
import type { ReleaseSource } from '../adapters/forge'
import { createDefaultConfig, mergeConfig, type ConfigOverrides, type UpdaterConfig } from '../core/config'
import type { Notifier } from '../handlers/notifier'
import type { UpdaterContext } from '../operations/context'
import { PluginLockfileService } from '../services/PluginLockfileService'
import { ReleaseMetadataService } from '../services/ReleaseMetadataService'
import { RepositoryQueryService } from '../services/RepositoryQueryService'
import { StatusCacheService } from '../services/StatusCacheService'
import { UpdaterSession } from '../services/UpdaterSession'

export const TEST_REPO = '/tmp/test-dotfiles'

export function createTestConfig(overrides: ConfigOverrides = {}): UpdaterConfig {
  return mergeConfig(
    { ...createDefaultConfig({}), repoPath: TEST_REPO, cacheDir: '/tmp/test-cache', pluginRoot: '/tmp/test-lazy' },
    overrides
  )
}

export class FakeGitAdapter implements GitAdapter {
  readonly name = 'fake'

  isRepository = vi.fn<GitAdapter['isRepository']>(async () => true)
  resolveRef = vi.fn<GitAdapter['resolveRef']>(async () => 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa')
  currentBranch = vi.fn<GitAdapter['currentBranch']>(async () => 'main')
  isDetachedHead = vi.fn<GitAdapter['isDetachedHead']>(async () => false)
  remoteUrl = vi.fn<GitAdapter['remoteUrl']>(async () => 'git@github.com:octo/dotfiles.git')
  aheadBehind = vi.fn<GitAdapter['aheadBehind']>(async () => ({ ahead: 0, behind: 0 }))
  log = vi.fn<GitAdapter['log']>(async () => [])
  countCommits = vi.fn<GitAdapter['countCommits']>(async () => 0)
  changedPaths = vi.fn<GitAdapter['changedPaths']>(async () => [])
  isAncestor = vi.fn<GitAdapter['isAncestor']>(async () => false)

  listTags = vi.fn<GitAdapter['listTags']>(async () => [])
  describeTag = vi.fn<GitAdapter['describeTag']>(async () => {
    throw new Error('fatal: No names found, cannot describe anything.')
  })
  commitInfo = vi.fn<GitAdapter['commitInfo']>(async () => null)
  commitTimestamp = vi.fn<GitAdapter['commitTimestamp']>(async () => null)
  diffShortStat = vi.fn<GitAdapter['diffShortStat']>(async () => ({
    filesChanged: 0,
    linesAdded: 0,
    linesDeleted: 0
  }))
  diffNumStat = vi.fn<GitAdapter['diffNumStat']>(async () => ({ linesAdded: 0, linesDeleted: 0 }))

  fetch = vi.fn<GitAdapter['fetch']>(async () => undefined)
  pull = vi.fn<GitAdapter['pull']>(async () => 'Already up to date.')
  merge = vi.fn<GitAdapter['merge']>(async () => 'Already up to date.')
  stashPush = vi.fn<GitAdapter['stashPush']>(async () => 'Saved working directory')
  stashPop = vi.fn<GitAdapter['stashPop']>(async () => '')
  mergeAbort = vi.fn<GitAdapter['mergeAbort']>(async () => undefined)
  rebaseAbort = vi.fn<GitAdapter['rebaseAbort']>(async () => undefined)
  resetHard = vi.fn<GitAdapter['resetHard']>(async () => undefined)
  checkoutPaths = vi.fn<GitAdapter['checkoutPaths']>(async () => undefined)
  checkoutDetached = vi.fn<GitAdapter['checkoutDetached']>(async () => undefined)
}

export function processResult(stdout: string, exitCode: number | null = 0, stderr = ''): ProcessResult {
  return { stdout, stderr, exitCode }
}

export class FakeProcessRunner implements ProcessRunner {
  run = vi.fn<ProcessRunner['run']>(async () => processResult(''))
}

export class FakePluginManager implements PluginManager {
  readonly name = 'fake-plugins'

  isAvailable = vi.fn<PluginManager['isAvailable']>(async () => true)
  installedCommit = vi.fn<PluginManager['installedCommit']>(async () => null)
  restore = vi.fn<() => Promise<RestoreOutcome>>(async () => ({ ok: true, output: '' }))

  pluginDir(name: string): string {
    return `/tmp/test-lazy/${name}`
  }
}

export class FakeToolRestorer implements ToolRestorer {
  readonly name = 'fake-tools'

  restore = vi.fn<() => Promise<RestoreOutcome>>(async () => ({ ok: true, output: '' }))
}

export class FakeReleaseSource implements ReleaseSource {
  readonly name = 'fake-releases'

  isAvailable = vi.fn<ReleaseSource['isAvailable']>(async () => true)
  listReleases = vi.fn<ReleaseSource['listReleases']>(async () => [])
}

export class RecordingNotifier implements Notifier {
  notify = vi.fn<Notifier['notify']>()
}

/**
 * Status cache kept in memory instead of on disk.
 */
export class MemoryStatusCache extends StatusCacheService {
  readonly entries = new Map<string, CacheEntry>()

  constructor() {
    super('/tmp/test-cache')
  }

  async read(repoPath: string): Promise<CacheEntry | null> {
    return this.entries.get(repoPath) ?? null
  }

  async write(repoPath: string, data: CacheData): Promise<boolean> {
    this.entries.set(repoPath, { version: 1, repoPath, ...data })
    return true
  }
}

export type TestContext = UpdaterContext & {
  git: FakeGitAdapter
  cache: MemoryStatusCache
  plugins: FakePluginManager
  tools: FakeToolRestorer
  releaseSource: FakeReleaseSource
}

/**
 * Real services over fake adapters.
 */
export function createTestContext(overrides: ConfigOverrides = {}): TestContext {
  const config = createTestConfig(overrides)
  const git = new FakeGitAdapter()
  const plugins = new FakePluginManager()
  const releaseSource = new FakeReleaseSource()

  return {
    config,
    git,
    session: new UpdaterSession(),
    queries: new RepositoryQueryService(git, config),
    cache: new MemoryStatusCache(),
    lockfile: new PluginLockfileService(git, plugins, config),
    releases: new ReleaseMetadataService([releaseSource], config.releaseCacheTtlSeconds),
    plugins,
    tools: new FakeToolRestorer(),
    releaseSource
  }
}
