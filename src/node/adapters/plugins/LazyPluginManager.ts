import { log } from '@shared/logger'
import fs from 'fs'
import path from 'path'
import { RESTORE_TIMEOUT_MS } from '../../shared/constants'
import { errorMessage } from '../../shared/errors'
import type { GitAdapter } from '../git'
import { combinedOutput, type ProcessRunner } from '../process'
import { outputReportsError, type PluginManager, type RestoreOutcome } from './interface'

const MANAGER_DIR = 'lazy.nvim'
const REVISION_TIMEOUT_MS = 5_000

export type LazyPluginManagerOptions = {
  /** Directory holding one checkout per plugin. */
  pluginRoot: string
  /** Directory the editor is started in for restores. */
  repoPath: string
  editorCommand: string
}

/**
 * lazy.nvim keeps every plugin as a git checkout under its root directory and
 * restores them from `lazy-lock.json` when asked headlessly.
 */
export class LazyPluginManager implements PluginManager {
  readonly name = 'lazy.nvim'

  constructor(
    private readonly git: GitAdapter,
    private readonly runner: ProcessRunner,
    private readonly options: LazyPluginManagerOptions
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      await fs.promises.access(path.join(this.options.pluginRoot, MANAGER_DIR))
      return true
    } catch {
      return false
    }
  }

  pluginDir(name: string): string {
    return path.join(this.options.pluginRoot, name)
  }

  async installedCommit(name: string): Promise<string | null> {
    const dir = this.pluginDir(name)
    if (!fs.existsSync(dir)) {
      return null
    }
    try {
      return await this.git.resolveRef(dir, 'HEAD', { timeoutMs: REVISION_TIMEOUT_MS })
    } catch (error) {
      log.debug(`[LazyPluginManager] No revision for ${name}:`, errorMessage(error))
      return null
    }
  }

  async restore(): Promise<RestoreOutcome> {
    log.info('[LazyPluginManager] Restoring plugins from lockfile')
    const result = await this.runner.run(
      this.options.editorCommand,
      ['--headless', "+lua require('lazy').restore({wait=true})", '+qa'],
      { cwd: this.options.repoPath, timeoutMs: RESTORE_TIMEOUT_MS }
    )
    const output = combinedOutput(result)
    return { ok: result.exitCode === 0 && !outputReportsError(output), output }
  }
}
