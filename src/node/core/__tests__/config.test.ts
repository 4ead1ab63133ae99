import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ValidationError } from '../../shared/errors'
import {
  createDefaultConfig,
  loadConfiguration,
  mergeConfig,
  timeoutMs,
  validateConfig
} from '../config'

describe('config', () => {
  let repoPath: string

  beforeEach(async () => {
    repoPath = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'updater-config-'))
  })

  afterEach(async () => {
    await fs.promises.rm(repoPath, { recursive: true, force: true })
  })

  describe('createDefaultConfig', () => {
    it('uses the documented defaults', () => {
      const config = createDefaultConfig({})

      expect(config.mainBranch).toBe('main')
      expect(config.logCount).toBe(15)
      expect(config.timeouts).toEqual({
        fetch: 30,
        pull: 30,
        merge: 30,
        log: 15,
        status: 10,
        default: 20
      })
      expect(config.periodicCheck).toEqual({ enabled: true, frequencyMinutes: 20 })
      expect(config.lockfilePaths).toEqual(['lazy-lock.json', 'mason-lock.json'])
    })

    it('places the cache under XDG_CACHE_HOME when set', () => {
      const config = createDefaultConfig({ XDG_CACHE_HOME: '/tmp/xdg-cache' })
      expect(config.cacheDir).toBe(path.join('/tmp/xdg-cache', 'repo-updater'))
    })
  })

  describe('mergeConfig', () => {
    it('merges nested sections key by key', () => {
      const merged = mergeConfig(createDefaultConfig({}), { timeouts: { fetch: 5 } })

      expect(merged.timeouts.fetch).toBe(5)
      expect(merged.timeouts.pull).toBe(30)
    })
  })

  describe('loadConfiguration', () => {
    it('reads the repository path from the environment', () => {
      const config = loadConfiguration({}, { UPDATER_REPO_PATH: repoPath })
      expect(config.repoPath).toBe(repoPath)
    })

    it('lets explicit overrides win over the environment', () => {
      const config = loadConfiguration(
        { repoPath, mainBranch: 'trunk' },
        { UPDATER_REPO_PATH: '/does/not/matter', UPDATER_MAIN_BRANCH: 'develop' }
      )

      expect(config.repoPath).toBe(repoPath)
      expect(config.mainBranch).toBe('trunk')
    })

    it('parses UPDATER_DEBUG', () => {
      expect(loadConfiguration({ repoPath }, { UPDATER_DEBUG: '1' }).debug).toBe(true)
      expect(loadConfiguration({ repoPath }, { UPDATER_DEBUG: 'no' }).debug).toBe(false)
    })

    it('rejects a missing repository path', () => {
      expect(() => loadConfiguration({}, {})).toThrow(ValidationError)
    })

    it('rejects repository paths containing shell metacharacters', () => {
      try {
        loadConfiguration({ repoPath: `${repoPath};rm -rf` }, {})
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError)
        if (error instanceof ValidationError) {
          expect(error.field).toBe('repoPath')
          expect(error.message).toContain('contains shell metacharacters')
        }
      }
    })

    it('rejects repository paths that do not exist', () => {
      const missing = path.join(repoPath, 'missing')
      expect(() => loadConfiguration({ repoPath: missing }, {})).toThrow(
        `Repository path does not exist: ${missing}`
      )
    })
  })

  describe('validateConfig', () => {
    it('reports every invalid field', () => {
      const candidate = mergeConfig(createDefaultConfig({}), {
        repoPath,
        logCount: 0,
        timeouts: { fetch: 301 }
      })

      try {
        validateConfig(candidate)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError)
        const message = error instanceof Error ? error.message : ''
        expect(message).toContain('logCount')
        expect(message).toContain('timeouts.fetch')
      }
    })

    it('rejects a periodic frequency below one minute', () => {
      const candidate = mergeConfig(createDefaultConfig({}), {
        repoPath,
        periodicCheck: { frequencyMinutes: 0.5 }
      })
      expect(() => validateConfig(candidate)).toThrow(ValidationError)
    })
  })

  describe('timeoutMs', () => {
    it('converts the configured seconds to milliseconds', () => {
      const config = createDefaultConfig({})
      expect(timeoutMs(config, 'status')).toBe(10_000)
      expect(timeoutMs(config, 'fetch')).toBe(30_000)
    })
  })
})
