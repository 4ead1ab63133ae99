/**
 * UpdateOperation - Brings the tracked repository up to date with origin/<main>
 *
 * Drives the UpdateStateMachine through:
 * - Resolving the current branch and recording HEAD as the rollback point
 * - Checking the working tree (lockfile-only changes are discarded)
 * - Fetching origin/<main>
 * - Pulling (on main) or merging origin/<main> with an auto-stash (elsewhere)
 *
 * A failed apply is always rolled back to the recorded commit. Nothing is
 * notified from here; callers turn the returned UpdateResult into messages.
 */

import { log } from '@shared/logger'
import type { UpdateResult } from '@shared/types'
import { timeoutMs } from '../core/config'
import { UpdateOutcomeClassifier, type ApplyOutcome } from '../domain/UpdateOutcomeClassifier'
import { UpdateStateMachine, type UpdatePhase } from '../domain/UpdateStateMachine'
import { WORKING_TREE_FLAGS } from '../services/UpdaterSession'
import { AUTO_STASH_MESSAGE, DEFAULT_REMOTE, VERSIONED_UPDATE_REFUSAL } from '../shared/constants'
import {
  ConflictDetectedError,
  RollbackFailedError,
  TimeoutError,
  errorMessage
} from '../shared/errors'
import type { UpdaterContext } from './context'

const IN_PROGRESS: UpdateResult = {
  status: 'in-progress',
  message: 'Update already in progress',
  rolledBack: false
}

type AppliedChanges = {
  outcome: ApplyOutcome
  /** True while an auto-stash is waiting to be popped. */
  stashPending: boolean
}

/**
 * Tracks the current phase and refuses illegal steps.
 */
class PhaseTracker {
  private phase: UpdatePhase = 'idle'

  to(next: UpdatePhase): void {
    this.phase = UpdateStateMachine.transition(this.phase, next)
    log.debug(`[UpdateOperation] phase -> ${this.phase}`)
  }
}

export class UpdateOperation {
  private constructor() {
    // Static-only class
  }

  /**
   * Pulls or merges origin/<main>. Returns `in-progress` without touching the
   * repository while another update, a version switch, a plugin restore or a
   * refresh runs.
   */
  static async updateRepo(ctx: UpdaterContext): Promise<UpdateResult> {
    if (ctx.config.versionedReleasesOnly) {
      return { status: 'failed', message: VERSIONED_UPDATE_REFUSAL, rolledBack: false }
    }

    return ctx.session.withExclusiveFlag('isUpdating', WORKING_TREE_FLAGS, IN_PROGRESS, () => this.apply(ctx))
  }

  private static async apply(ctx: UpdaterContext): Promise<UpdateResult> {
    const { queries } = ctx
    const phase = new PhaseTracker()
    const fail = (message: string): UpdateResult => {
      phase.to('failed')
      log.warn(`[UpdateOperation] ${message}`)
      return { status: 'failed', message, rolledBack: false }
    }

    phase.to('resolving-branch')
    let branch: string
    try {
      branch = await queries.resolveBranch()
    } catch (error) {
      return fail(`Failed to get current branch: ${errorMessage(error)}`)
    }

    phase.to('saving-rollback-point')
    let rollbackPoint: string
    try {
      rollbackPoint = await queries.resolveHead()
    } catch (error) {
      return fail(`Failed to save current state: ${errorMessage(error)}`)
    }

    phase.to('checking-working-tree')
    let dirty: boolean
    try {
      dirty = await queries.hasUncommittedChanges()
    } catch (error) {
      return fail(`Failed to check working directory status: ${errorMessage(error)}`)
    }

    phase.to('fetching')
    try {
      await ctx.git.fetch(ctx.config.repoPath, DEFAULT_REMOTE, ctx.config.mainBranch, {
        timeoutMs: timeoutMs(ctx.config, 'fetch')
      })
    } catch (error) {
      if (error instanceof TimeoutError) {
        return fail('Git fetch operation timed out')
      }
      return fail(`Failed to fetch updates: ${errorMessage(error)}`)
    }

    phase.to('applying')
    log.info(`[UpdateOperation] Updating ${branch} from ${DEFAULT_REMOTE}/${ctx.config.mainBranch}`)
    const applied = await this.applyChanges(ctx, branch, dirty)

    if (!UpdateOutcomeClassifier.isFailure(applied.outcome)) {
      phase.to('succeeded')
      const currentCommit = await queries.currentCommit()
      // the pull may have brought new release tags along
      queries.invalidateTags()
      ctx.session.patch({ needsUpdate: false, recentlyUpdatedRepo: true, currentCommit })
      return {
        status: 'success',
        message: UpdateOutcomeClassifier.successMessage(
          applied.outcome.kind === 'output' ? applied.outcome.text : '',
          branch,
          ctx.config.mainBranch
        ),
        rolledBack: false,
        previousCommit: rollbackPoint,
        currentCommit
      }
    }

    phase.to('rolling-back')
    const failure = UpdateOutcomeClassifier.failureMessage(applied.outcome)
    log.warn(`[UpdateOperation] ${failure}`)

    try {
      await this.rollback(ctx, rollbackPoint, applied.stashPending)
    } catch (error) {
      phase.to('rollback-failed')
      const message = UpdateOutcomeClassifier.rollbackFailedMessage(failure, errorMessage(error))
      log.error(`[UpdateOperation] ${message}`)
      return {
        status: 'rollback-failed',
        message,
        rolledBack: false,
        previousCommit: rollbackPoint,
        cause: new RollbackFailedError(message, rollbackPoint, error)
      }
    }

    phase.to('failed')
    return {
      status: 'failed',
      message: failure,
      rolledBack: true,
      previousCommit: rollbackPoint,
      currentCommit: rollbackPoint,
      cause: this.conflictError(failure, applied.outcome)
    }
  }

  private static async applyChanges(
    ctx: UpdaterContext,
    branch: string,
    dirty: boolean
  ): Promise<AppliedChanges> {
    const { config, git } = ctx
    const repo = config.repoPath

    if (branch === config.mainBranch) {
      try {
        const text = await git.pull(repo, DEFAULT_REMOTE, config.mainBranch, {
          rebase: config.git.rebase,
          autostash: config.git.autostash,
          timeoutMs: timeoutMs(config, 'pull')
        })
        return { outcome: { kind: 'output', text }, stashPending: false }
      } catch (error) {
        return { outcome: this.errorOutcome(error, 'pull'), stashPending: false }
      }
    }

    const mergeOptions = { timeoutMs: timeoutMs(config, 'merge') }
    let stashPending = false
    const output: string[] = []

    try {
      if (dirty) {
        const stashed = await git.stashPush(repo, AUTO_STASH_MESSAGE, mergeOptions)
        output.push(stashed)
        // untracked-only changes leave nothing to stash
        stashPending = !stashed.includes('No local changes to save')
      }

      output.push(await git.merge(repo, `${DEFAULT_REMOTE}/${config.mainBranch}`, mergeOptions))

      // A merge that reports a failure marker keeps the stash for the rollback to restore
      const merged = output.join('\n')
      if (stashPending && UpdateOutcomeClassifier.detectFailure(merged) === null) {
        output.push(await git.stashPop(repo, mergeOptions))
        stashPending = false
      }

      return { outcome: { kind: 'output', text: output.join('\n') }, stashPending }
    } catch (error) {
      return { outcome: this.errorOutcome(error, 'merge'), stashPending }
    }
  }

  private static errorOutcome(error: unknown, step: 'pull' | 'merge'): ApplyOutcome {
    if (error instanceof TimeoutError) {
      return { kind: 'timeout', step }
    }
    return { kind: 'error', text: errorMessage(error) }
  }

  /**
   * Aborts any half-finished merge or rebase, resets to the saved commit and
   * restores a pending auto-stash. Only the reset decides success.
   */
  private static async rollback(
    ctx: UpdaterContext,
    commit: string,
    stashPending: boolean
  ): Promise<void> {
    const { config, git } = ctx
    const options = { timeoutMs: timeoutMs(config, 'default') }

    await git.mergeAbort(config.repoPath, options).catch((error: unknown) => {
      log.debug('[UpdateOperation] merge --abort:', errorMessage(error))
    })
    await git.rebaseAbort(config.repoPath, options).catch((error: unknown) => {
      log.debug('[UpdateOperation] rebase --abort:', errorMessage(error))
    })

    await git.resetHard(config.repoPath, commit, options)
    log.info(`[UpdateOperation] Rolled back to ${commit}`)

    if (stashPending) {
      await git.stashPop(config.repoPath, options).catch((error: unknown) => {
        log.warn('[UpdateOperation] Could not restore auto-stash:', errorMessage(error))
      })
    }
  }

  private static conflictError(message: string, outcome: ApplyOutcome): ConflictDetectedError | undefined {
    if (outcome.kind === 'timeout') return undefined
    const marker = UpdateOutcomeClassifier.detectFailure(outcome.text)
    return marker ? new ConflictDetectedError(message, marker) : undefined
  }
}
