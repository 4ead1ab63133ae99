/**
 * Updater configuration.
 *
 * Values are layered defaults → environment (.env via dotenv) → explicit
 * overrides, then validated as a whole so every problem is reported at once.
 */

import dotenv from 'dotenv'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { CACHE_DIR_NAME, DANGEROUS_PATH_CHARS } from '../shared/constants'
import { ValidationError } from '../shared/errors'

dotenv.config()

const timeoutSeconds = z.number().positive().max(300)

export const timeoutsSchema = z.object({
  fetch: timeoutSeconds,
  pull: timeoutSeconds,
  merge: timeoutSeconds,
  log: timeoutSeconds,
  status: timeoutSeconds,
  default: timeoutSeconds
})

export const updaterConfigSchema = z.object({
  repoPath: z
    .string()
    .min(1, 'is required')
    .refine((p) => !DANGEROUS_PATH_CHARS.test(p), 'contains shell metacharacters'),
  mainBranch: z.string().regex(/^[\w./-]+$/, 'is not a valid branch name'),
  logCount: z.number().int().min(1).max(100),
  timeouts: timeoutsSchema,
  periodicCheck: z.object({
    enabled: z.boolean(),
    frequencyMinutes: z.number().min(1)
  }),
  checkOnStartup: z.boolean(),
  versionedReleasesOnly: z.boolean(),
  tagPattern: z.string().min(1),
  git: z.object({
    rebase: z.boolean(),
    autostash: z.boolean()
  }),
  pluginLockfile: z.string().min(1),
  toolLockfile: z.string().min(1),
  /** Paths whose local modifications are discarded before updates and switches. */
  lockfilePaths: z.array(z.string().min(1)),
  /** Directory holding one checkout per installed plugin. */
  pluginRoot: z.string().min(1),
  /** Editor binary used for headless plugin and tool restores. */
  editorCommand: z.string().min(1),
  /** Editor command restoring tools from the tool lockfile; null disables it. */
  toolRestoreCommand: z.string().min(1).nullable(),
  cacheDir: z.string().min(1),
  maxReleaseItems: z.number().int().min(1),
  versionCacheTtlSeconds: z.number().int().min(0),
  releaseCacheTtlSeconds: z.number().int().min(0),
  github: z.object({
    useCli: z.boolean(),
    token: z.string().min(1).nullable()
  }),
  notify: z.object({
    title: z.string(),
    upToDate: z.string(),
    outdated: z.string(),
    error: z.string(),
    timeout: z.string()
  }),
  debug: z.boolean()
})

export type UpdaterConfig = z.infer<typeof updaterConfigSchema>
export type TimeoutKey = keyof UpdaterConfig['timeouts']

type NestedKey = 'timeouts' | 'periodicCheck' | 'git' | 'github' | 'notify'

export type ConfigOverrides = Partial<Omit<UpdaterConfig, NestedKey>> & {
  [K in NestedKey]?: Partial<UpdaterConfig[K]>
}

export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache')
  return path.join(base, CACHE_DIR_NAME)
}

export function defaultPluginRoot(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share')
  return path.join(base, 'nvim', 'lazy')
}

export function createDefaultConfig(env: NodeJS.ProcessEnv = process.env): UpdaterConfig {
  return {
    repoPath: '',
    mainBranch: 'main',
    logCount: 15,
    timeouts: {
      fetch: 30,
      pull: 30,
      merge: 30,
      log: 15,
      status: 10,
      default: 20
    },
    periodicCheck: {
      enabled: true,
      frequencyMinutes: 20
    },
    checkOnStartup: true,
    versionedReleasesOnly: false,
    tagPattern: 'v*',
    git: {
      rebase: false,
      autostash: false
    },
    pluginLockfile: 'lazy-lock.json',
    toolLockfile: 'mason-lock.json',
    lockfilePaths: ['lazy-lock.json', 'mason-lock.json'],
    pluginRoot: defaultPluginRoot(env),
    editorCommand: 'nvim',
    toolRestoreCommand: 'MasonLockRestore',
    cacheDir: defaultCacheDir(env),
    maxReleaseItems: 10,
    versionCacheTtlSeconds: 60,
    releaseCacheTtlSeconds: 300,
    github: {
      useCli: true,
      token: null
    },
    notify: {
      title: 'Dotfiles Updater',
      upToDate: 'Your dotfiles are up to date!',
      outdated: 'Updates available! Open the updater to review them.',
      error: 'Error checking for updates',
      timeout: 'Git operation timed out'
    },
    debug: false
  }
}

function expandHome(p: string): string {
  if (p === '~') return os.homedir()
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2))
  return p
}

function fromEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {}
  if (env.UPDATER_REPO_PATH) overrides.repoPath = env.UPDATER_REPO_PATH
  if (env.UPDATER_MAIN_BRANCH) overrides.mainBranch = env.UPDATER_MAIN_BRANCH
  if (env.UPDATER_CACHE_DIR) overrides.cacheDir = env.UPDATER_CACHE_DIR
  if (env.UPDATER_DEBUG) overrides.debug = env.UPDATER_DEBUG === '1' || env.UPDATER_DEBUG === 'true'
  if (env.GITHUB_TOKEN) overrides.github = { token: env.GITHUB_TOKEN }
  return overrides
}

export function mergeConfig(base: UpdaterConfig, overrides: ConfigOverrides): UpdaterConfig {
  return {
    ...base,
    ...overrides,
    timeouts: { ...base.timeouts, ...overrides.timeouts },
    periodicCheck: { ...base.periodicCheck, ...overrides.periodicCheck },
    git: { ...base.git, ...overrides.git },
    github: { ...base.github, ...overrides.github },
    notify: { ...base.notify, ...overrides.notify }
  }
}

/**
 * Validates a fully merged configuration. Throws a ValidationError naming
 * every offending field.
 */
export function validateConfig(candidate: unknown): UpdaterConfig {
  const result = updaterConfigSchema.safeParse(candidate)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    const field = result.error.issues[0]?.path.join('.')
    throw new ValidationError(`Invalid updater configuration: ${problems.join('; ')}`, field)
  }
  return result.data
}

export function loadConfiguration(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): UpdaterConfig {
  const merged = mergeConfig(
    mergeConfig(createDefaultConfig(env), fromEnvironment(env)),
    overrides
  )
  const config = validateConfig({
    ...merged,
    repoPath: expandHome(merged.repoPath),
    cacheDir: expandHome(merged.cacheDir),
    pluginRoot: expandHome(merged.pluginRoot)
  })

  if (!fs.existsSync(config.repoPath)) {
    throw new ValidationError(`Repository path does not exist: ${config.repoPath}`, 'repoPath')
  }

  return config
}

export function timeoutMs(config: UpdaterConfig, key: TimeoutKey): number {
  return config.timeouts[key] * 1000
}
