/**
 * Node-specific constants for the backend.
 */

export const TIME = {
  SECOND: 1000,
  MINUTE: 60 * 1000,
  HOUR: 60 * 60 * 1000,
  DAY: 24 * 60 * 60 * 1000
} as const

/**
 * Remote every comparison is made against.
 */
export const DEFAULT_REMOTE = 'origin'

/**
 * Commit subjects longer than this are cut to `MAX_COMMIT_MESSAGE_LENGTH - 3`
 * characters followed by an ellipsis.
 */
export const MAX_COMMIT_MESSAGE_LENGTH = 80

/**
 * Display length of plugin commit hashes.
 */
export const SHORT_HASH_LENGTH = 7

/**
 * `git log` format consumed by the commit parser. Fields are hash, subject,
 * author and relative date.
 */
export const COMMIT_LOG_FORMAT = '%h|%s|%an|%ar'

/**
 * Format for tag commit lookups: short hash, full hash, subject, author,
 * relative date, committer unix time.
 */
export const TAG_COMMIT_FORMAT = '%h|%H|%s|%an|%ar|%ct'

/**
 * Stash message used when merging into a branch other than main.
 */
export const AUTO_STASH_MESSAGE = 'updater-auto-stash'

/**
 * Output fragments that mark a merge or pull as failed even when git exited 0.
 */
export const UPDATE_FAILURE_PATTERNS = [
  'CONFLICT',
  'Automatic merge failed',
  'merge failed',
  'could not apply',
  'error:',
  'fatal:',
  'Cannot merge',
  'Merge conflict',
  'rebase failed'
] as const

/**
 * Characters refused in repository paths.
 */
export const DANGEROUS_PATH_CHARS = /[;&|`$(){}*?]/

export const CACHE_VERSION = 1
export const CACHE_KEY_LENGTH = 16
export const CACHE_DIR_NAME = 'repo-updater'

/**
 * Number of tag names listed when a requested version does not exist.
 */
export const AVAILABLE_VERSIONS_PREVIEW = 5

/**
 * Glyphs used by the `icon` update text format.
 */
export const UPDATE_ICONS = {
  repo: '\u{F06B0}',
  plugins: '\u{F03D6}'
} as const

/**
 * Upper bound for a headless editor run restoring plugins or tools.
 */
export const RESTORE_TIMEOUT_MS = 5 * TIME.MINUTE

/**
 * Reply to pull-style updates while only tagged releases are followed.
 */
export const VERSIONED_UPDATE_REFUSAL = "Use 'switch to latest' or select a release to update."
