/**
 * Git Adapter Module
 *
 * Usage:
 * ```typescript
 * import { createGitAdapter } from './adapters/git'
 *
 * const git = createGitAdapter()
 * const branch = await git.currentBranch(repoPath, { timeoutMs: 10_000 })
 * ```
 */

export { createGitAdapter } from './factory'
export type { GitAdapterConfig } from './factory'

export type { GitAdapter, GitCallOptions, LogQuery, PullOptions } from './interface'

export {
  parseAheadBehind,
  parseCommitInfo,
  parseCommitLine,
  parseCommitLog,
  parseNumStat,
  parsePorcelainPaths,
  parseShortStat,
  parseTagList,
  truncateMessage
} from './parsers'

// Adapter implementations (for testing)
export { SimpleGitAdapter } from './SimpleGitAdapter'
