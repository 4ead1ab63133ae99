/**
 * StatusCacheService - persists the last check result per repository.
 *
 * One JSON file per repository, named after a hash of its path, lets the
 * periodic and startup checks skip git entirely while the last result is
 * still fresh. Anything unreadable is treated as absent.
 */

import { log } from '@shared/logger'
import type { CacheData, CacheEntry, UpdaterState } from '@shared/types'
import { createHash } from 'crypto'
import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { CACHE_KEY_LENGTH, CACHE_VERSION, TIME } from '../shared/constants'
import { errorMessage } from '../shared/errors'

const cacheEntrySchema = z.object({
  version: z.number(),
  repoPath: z.string(),
  lastCheckTime: z.number(),
  lastCommitHash: z.string(),
  branch: z.string(),
  behindCount: z.number().int().min(0),
  aheadCount: z.number().int().min(0),
  needsUpdate: z.boolean(),
  hasPluginUpdates: z.boolean()
})

export function cacheKey(repoPath: string): string {
  return createHash('sha256').update(repoPath).digest('hex').slice(0, CACHE_KEY_LENGTH)
}

export class StatusCacheService {
  constructor(private readonly cacheDir: string) {}

  filePath(repoPath: string): string {
    return path.join(this.cacheDir, `${cacheKey(repoPath)}.json`)
  }

  async read(repoPath: string): Promise<CacheEntry | null> {
    let raw: string
    try {
      raw = await fs.promises.readFile(this.filePath(repoPath), 'utf8')
    } catch {
      return null
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      log.debug('[StatusCacheService] Ignoring unreadable cache file:', errorMessage(error))
      return null
    }

    const parsed = cacheEntrySchema.safeParse(json)
    if (!parsed.success) {
      log.debug('[StatusCacheService] Ignoring cache file with unexpected shape')
      return null
    }
    if (parsed.data.version !== CACHE_VERSION || parsed.data.repoPath !== repoPath) {
      return null
    }
    return parsed.data
  }

  /**
   * Atomic write (temp file + rename). Returns false instead of throwing so a
   * read-only cache directory never breaks a check.
   */
  async write(repoPath: string, data: CacheData): Promise<boolean> {
    const entry: CacheEntry = { version: CACHE_VERSION, repoPath, ...data }
    const filePath = this.filePath(repoPath)
    const tempPath = `${filePath}.${process.pid}.tmp`

    try {
      await fs.promises.mkdir(this.cacheDir, { recursive: true })
      await fs.promises.writeFile(tempPath, JSON.stringify(entry, null, 2))
      await fs.promises.rename(tempPath, filePath)
      return true
    } catch (error) {
      log.warn('[StatusCacheService] Failed to write cache:', errorMessage(error))
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.debug('[StatusCacheService] Could not remove temp file:', errorMessage(cleanupError))
      })
      return false
    }
  }

  /**
   * Whether the last check happened less than `frequencyMinutes` ago.
   */
  async isFresh(repoPath: string, frequencyMinutes: number): Promise<boolean> {
    const entry = await this.read(repoPath)
    return entry !== null && StatusCacheService.isEntryFresh(entry, frequencyMinutes)
  }

  static isEntryFresh(entry: CacheEntry, frequencyMinutes: number): boolean {
    return Date.now() - entry.lastCheckTime < frequencyMinutes * TIME.MINUTE
  }

  async updateAfterCheck(repoPath: string, state: UpdaterState): Promise<boolean> {
    return this.write(repoPath, {
      lastCheckTime: state.lastCheckTime ?? Date.now(),
      lastCommitHash: state.currentCommit,
      branch: state.branch,
      behindCount: state.behindCount,
      aheadCount: state.aheadCount,
      needsUpdate: state.needsUpdate,
      hasPluginUpdates: state.hasPluginUpdates
    })
  }
}
