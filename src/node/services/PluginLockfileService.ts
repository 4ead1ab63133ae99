/**
 * PluginLockfileService - compares the plugin lockfile against installed plugins.
 *
 * A plugin drifts when its checkout sits on a different commit than the
 * lockfile pins. Drifted plugins are classified by commit time, looked up in
 * each plugin's own checkout, all at once.
 */

import { log } from '@shared/logger'
import {
  createEmptyDriftReport,
  type LockfileData,
  type PluginDriftReport,
  type PluginUpdate
} from '@shared/types'
import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import type { GitAdapter } from '../adapters/git'
import type { PluginManager } from '../adapters/plugins'
import { timeoutMs, type UpdaterConfig } from '../core/config'
import { PluginDriftClassifier } from '../domain/PluginDriftClassifier'
import { SHORT_HASH_LENGTH } from '../shared/constants'
import { errorMessage } from '../shared/errors'

const lockfileEntrySchema = z.object({
  commit: z.string(),
  branch: z.string().optional()
})

const lockfileSchema = z.record(z.unknown())

type DriftCandidate = {
  name: string
  installed: string
  locked: string
  branch: string
}

export class PluginLockfileService {
  constructor(
    private readonly git: GitAdapter,
    private readonly manager: PluginManager,
    private readonly config: UpdaterConfig
  ) {}

  get lockfilePath(): string {
    return path.join(this.config.repoPath, this.config.pluginLockfile)
  }

  /**
   * Reads the lockfile. Missing, empty or malformed files yield no entries;
   * entries without a string commit are skipped.
   */
  async readLockfile(): Promise<LockfileData> {
    let raw: string
    try {
      raw = await fs.promises.readFile(this.lockfilePath, 'utf8')
    } catch {
      return {}
    }
    if (raw.trim() === '') {
      return {}
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      log.warn(`[PluginLockfileService] Could not parse ${this.config.pluginLockfile}: ${errorMessage(error)}`)
      return {}
    }

    const table = lockfileSchema.safeParse(json)
    if (!table.success || Array.isArray(json)) {
      log.warn(`[PluginLockfileService] ${this.config.pluginLockfile} does not contain expected format`)
      return {}
    }

    const data: LockfileData = {}
    for (const [name, value] of Object.entries(table.data)) {
      const entry = lockfileEntrySchema.safeParse(value)
      if (entry.success) {
        data[name] = entry.data
      }
    }
    return data
  }

  async reconcile(): Promise<PluginDriftReport> {
    const lockfile = await this.readLockfile()
    const names = Object.keys(lockfile)
    if (names.length === 0) {
      return createEmptyDriftReport()
    }

    if (!(await this.manager.isAvailable())) {
      log.debug(`[PluginLockfileService] ${this.manager.name} unavailable, skipping plugin check`)
      return createEmptyDriftReport()
    }

    const installed = await Promise.all(names.map((name) => this.manager.installedCommit(name)))

    const candidates: DriftCandidate[] = []
    names.forEach((name, index) => {
      const entry = lockfile[name]
      const commit = installed[index]
      if (entry && commit && commit !== entry.commit) {
        candidates.push({ name, installed: commit, locked: entry.commit, branch: entry.branch ?? 'main' })
      }
    })

    const updates = await Promise.all(candidates.map((candidate) => this.classify(candidate)))
    return PluginDriftClassifier.partition(updates)
  }

  private async classify(candidate: DriftCandidate): Promise<PluginUpdate> {
    const dir = this.manager.pluginDir(candidate.name)
    const [installedTs, lockedTs] = await Promise.all([
      this.timestamp(dir, candidate.installed),
      this.timestamp(dir, candidate.locked)
    ])

    return {
      name: candidate.name,
      installedCommit: candidate.installed.slice(0, SHORT_HASH_LENGTH),
      lockfileCommit: candidate.locked.slice(0, SHORT_HASH_LENGTH),
      branch: candidate.branch,
      direction: PluginDriftClassifier.direction(installedTs, lockedTs)
    }
  }

  private async timestamp(dir: string, commit: string): Promise<number | null> {
    try {
      return await this.git.commitTimestamp(dir, commit, { timeoutMs: timeoutMs(this.config, 'default') })
    } catch (error) {
      log.debug(`[PluginLockfileService] No timestamp for ${commit} in ${dir}:`, errorMessage(error))
      return null
    }
  }
}
