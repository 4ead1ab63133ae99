/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood. Every call gets its own
 * simple-git instance bound to an abort signal, so a git process that
 * outlives its deadline is killed rather than left running.
 */

import type { AheadBehind, Commit, CommitInfo, DiffStat, LineCounts, TagEntry } from '@shared/types'
import { log } from '@shared/logger'
import { execFile } from 'child_process'
import simpleGit, { GitPluginError, type SimpleGit } from 'simple-git'
import { promisify } from 'util'
import { COMMIT_LOG_FORMAT, TAG_COMMIT_FORMAT } from '../../shared/constants'
import { GitError, TimeoutError, errorMessage } from '../../shared/errors'
import type { GitAdapter, GitCallOptions, LogQuery, PullOptions } from './interface'
import {
  parseAheadBehind,
  parseCommitInfo,
  parseCommitLog,
  parseNumStat,
  parsePorcelainPaths,
  parseShortStat,
  parseTagList
} from './parsers'

const execFileAsync = promisify(execFile)

const TAG_LIST_FORMAT = '--format=%(refname:short)|%(*committerdate:unix)|%(committerdate:unix)'

type ExecFailure = {
  code?: unknown
  killed?: boolean
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error && ('code' in error || 'killed' in error)
}

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir: string, timeoutMs: number): SimpleGit {
    return simpleGit({ baseDir: dir, abort: AbortSignal.timeout(timeoutMs) })
  }

  /**
   * Runs a raw git command, translating aborts into TimeoutError and
   * everything else into GitError.
   */
  private async run(dir: string, args: string[], operation: string, options: GitCallOptions): Promise<string> {
    log.debug(`[SimpleGitAdapter] git ${args.join(' ')}`)
    try {
      return await this.createGit(dir, options.timeoutMs).raw(args)
    } catch (error) {
      throw this.createError(operation, error, options.timeoutMs)
    }
  }

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async isRepository(dir: string, options: GitCallOptions): Promise<boolean> {
    try {
      const output = await this.run(dir, ['rev-parse', '--is-inside-work-tree'], 'isRepository', options)
      return output.trim() === 'true'
    } catch (error) {
      log.debug(`[SimpleGitAdapter] ${dir} is not a repository:`, errorMessage(error))
      return false
    }
  }

  async resolveRef(dir: string, ref: string, options: GitCallOptions): Promise<string> {
    const output = await this.run(dir, ['rev-parse', ref], 'resolveRef', options)
    return output.trim()
  }

  async currentBranch(dir: string, options: GitCallOptions): Promise<string> {
    const output = await this.run(dir, ['rev-parse', '--abbrev-ref', 'HEAD'], 'currentBranch', options)
    return output.trim()
  }

  async isDetachedHead(dir: string, options: GitCallOptions): Promise<boolean> {
    // `symbolic-ref -q` exits 1 silently when detached, which simple-git resolves as empty output
    const output = await this.run(dir, ['symbolic-ref', '-q', 'HEAD'], 'isDetachedHead', options)
    return output.trim() === ''
  }

  async remoteUrl(dir: string, remote: string, options: GitCallOptions): Promise<string> {
    const output = await this.run(dir, ['remote', 'get-url', remote], 'remoteUrl', options)
    return output.trim()
  }

  async aheadBehind(
    dir: string,
    left: string,
    right: string,
    options: GitCallOptions
  ): Promise<AheadBehind> {
    const output = await this.run(
      dir,
      ['rev-list', '--left-right', '--count', `${left}...${right}`],
      'aheadBehind',
      options
    )
    return parseAheadBehind(output)
  }

  async log(dir: string, query: LogQuery): Promise<Commit[]> {
    const args = ['log', `--format=${COMMIT_LOG_FORMAT}`]
    if (query.maxCount !== undefined) {
      args.push('-n', String(query.maxCount))
    }
    args.push(...query.revisions, '--')
    const output = await this.run(dir, args, 'log', query)
    return parseCommitLog(output)
  }

  async countCommits(dir: string, range: string, options: GitCallOptions): Promise<number> {
    const output = await this.run(dir, ['rev-list', '--count', range], 'countCommits', options)
    const count = Number.parseInt(output.trim(), 10)
    return Number.isNaN(count) ? 0 : count
  }

  async changedPaths(dir: string, options: GitCallOptions): Promise<string[]> {
    const output = await this.run(dir, ['status', '--porcelain'], 'changedPaths', options)
    return parsePorcelainPaths(output)
  }

  /**
   * Note: We use execFile here instead of simple-git because simple-git's raw()
   * resolves both exit code 0 and a silent exit code 1 with empty output.
   */
  async isAncestor(
    dir: string,
    ancestor: string,
    descendant: string,
    options: GitCallOptions
  ): Promise<boolean> {
    try {
      await execFileAsync('git', ['merge-base', '--is-ancestor', ancestor, descendant], {
        cwd: dir,
        timeout: options.timeoutMs
      })
      return true
    } catch (error) {
      if (isExecFailure(error)) {
        if (error.killed) {
          throw new TimeoutError(`git merge-base timed out after ${options.timeoutMs}ms`, options.timeoutMs)
        }
        if (error.code === 1) {
          return false
        }
      }
      throw this.createError('isAncestor', error, options.timeoutMs)
    }
  }

  // ============================================================================
  // Tags
  // ============================================================================

  async listTags(dir: string, pattern: string, options: GitCallOptions): Promise<TagEntry[]> {
    const output = await this.run(dir, ['tag', '-l', pattern, TAG_LIST_FORMAT], 'listTags', options)
    return parseTagList(output)
  }

  async describeTag(
    dir: string,
    ref: string,
    options: GitCallOptions & { pattern: string; exact: boolean }
  ): Promise<string> {
    const args = ['describe', '--tags', options.exact ? '--exact-match' : '--abbrev=0']
    args.push('--match', options.pattern, ref)
    const output = await this.run(dir, args, 'describeTag', options)
    return output.trim()
  }

  async commitInfo(dir: string, ref: string, options: GitCallOptions): Promise<CommitInfo | null> {
    const output = await this.run(
      dir,
      ['show', '-s', `--format=${TAG_COMMIT_FORMAT}`, `${ref}^{commit}`],
      'commitInfo',
      options
    )
    return parseCommitInfo(output)
  }

  async commitTimestamp(dir: string, ref: string, options: GitCallOptions): Promise<number | null> {
    const output = await this.run(dir, ['show', '-s', '--format=%ct', ref], 'commitTimestamp', options)
    const timestamp = Number.parseInt(output.trim(), 10)
    return Number.isNaN(timestamp) ? null : timestamp
  }

  async diffShortStat(dir: string, from: string, to: string, options: GitCallOptions): Promise<DiffStat> {
    const output = await this.run(dir, ['diff', '--shortstat', from, to], 'diffShortStat', options)
    return parseShortStat(output)
  }

  async diffNumStat(
    dir: string,
    from: string,
    to: string,
    paths: string[],
    options: GitCallOptions
  ): Promise<LineCounts> {
    const output = await this.run(
      dir,
      ['diff', '--numstat', from, to, '--', ...paths],
      'diffNumStat',
      options
    )
    return parseNumStat(output)
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  async fetch(
    dir: string,
    remote: string,
    ref: string | undefined,
    options: GitCallOptions
  ): Promise<void> {
    const args = ['fetch', remote]
    if (ref) args.push(ref)
    await this.run(dir, args, 'fetch', options)
  }

  async pull(dir: string, remote: string, branch: string, options: PullOptions): Promise<string> {
    const args = ['pull']
    if (options.rebase) args.push('--rebase')
    if (options.autostash) args.push('--autostash')
    args.push(remote, branch)
    return this.run(dir, args, 'pull', options)
  }

  async merge(dir: string, ref: string, options: GitCallOptions): Promise<string> {
    return this.run(dir, ['merge', ref, '--no-edit'], 'merge', options)
  }

  async stashPush(dir: string, message: string, options: GitCallOptions): Promise<string> {
    return this.run(dir, ['stash', 'push', '-m', message], 'stashPush', options)
  }

  async stashPop(dir: string, options: GitCallOptions): Promise<string> {
    return this.run(dir, ['stash', 'pop'], 'stashPop', options)
  }

  async mergeAbort(dir: string, options: GitCallOptions): Promise<void> {
    await this.run(dir, ['merge', '--abort'], 'mergeAbort', options)
  }

  async rebaseAbort(dir: string, options: GitCallOptions): Promise<void> {
    await this.run(dir, ['rebase', '--abort'], 'rebaseAbort', options)
  }

  async resetHard(dir: string, ref: string, options: GitCallOptions): Promise<void> {
    await this.run(dir, ['reset', '--hard', ref], 'resetHard', options)
  }

  async checkoutPaths(dir: string, paths: string[], options: GitCallOptions): Promise<void> {
    if (paths.length === 0) return
    await this.run(dir, ['checkout', '--', ...paths], 'checkoutPaths', options)
  }

  async checkoutDetached(dir: string, ref: string, options: GitCallOptions): Promise<void> {
    await this.run(dir, ['checkout', '--detach', ref], 'checkoutDetached', options)
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private createError(operation: string, originalError: unknown, timeoutMs: number): Error {
    if (originalError instanceof GitPluginError && originalError.plugin === 'abort') {
      return new TimeoutError(`git ${operation} timed out after ${timeoutMs}ms`, timeoutMs)
    }
    return new GitError(
      `[SimpleGitAdapter] ${operation} failed: ${errorMessage(originalError)}`,
      operation,
      originalError
    )
  }
}
