/**
 * Updater Handlers - Host-facing entry points
 *
 * Turns operation results into notifications and chains the follow-up
 * refreshes. Never contains business logic - delegates to the operations
 * layer. Every finished operation notifies at most once; restore warnings
 * after a version switch are the only extra messages.
 */

import { log } from '@shared/logger'
import type {
  NotificationLevel,
  PluginInstallResult,
  RefreshResult,
  ReleaseDetails,
  ReleaseTag,
  UpdateResult,
  UpdateTextFormat,
  UpdaterState,
  UpdaterStatus,
  VersionSwitchResult
} from '@shared/types'
import { StatusSummary } from '../domain/StatusSummary'
import {
  PeriodicCheckOperation,
  PluginOperation,
  RefreshOperation,
  ReleaseOperation,
  UpdateOperation,
  VersionOperation,
  type CheckOutcome,
  type UpdaterContext
} from '../operations'
import { UpdateCheckScheduler } from '../services/UpdateCheckScheduler'
import { TIME, VERSIONED_UPDATE_REFUSAL } from '../shared/constants'
import type { Notifier } from './notifier'

const UPDATE_LEVELS: Record<UpdateResult['status'], NotificationLevel> = {
  success: 'info',
  failed: 'error',
  'rollback-failed': 'error',
  'in-progress': 'warn'
}

const SWITCH_LEVELS: Record<VersionSwitchResult['status'], NotificationLevel> = {
  success: 'info',
  error: 'error',
  'in-progress': 'warn'
}

const INSTALL_LEVELS: Record<PluginInstallResult['status'], NotificationLevel> = {
  success: 'info',
  error: 'error',
  unavailable: 'error',
  'in-progress': 'warn'
}

export class Updater {
  private readonly scheduler = new UpdateCheckScheduler()

  constructor(
    private readonly ctx: UpdaterContext,
    private readonly notifier: Notifier
  ) {}

  private notify(level: NotificationLevel, message: string): void {
    this.notifier.notify({ level, title: this.ctx.config.notify.title, message })
  }

  // ============================================================================
  // Checks
  // ============================================================================

  /**
   * Full refresh. A failed status lookup is notified unless `silent`.
   */
  async refresh(options: { silent?: boolean } = {}): Promise<RefreshResult> {
    const result = await RefreshOperation.refresh(this.ctx)
    if (result.status === 'error' && !options.silent) {
      this.notify('error', this.ctx.config.notify.error)
    }
    return result
  }

  async refreshSilent(): Promise<RefreshResult> {
    return this.refresh({ silent: true })
  }

  async checkUpdatesSilent(): Promise<boolean> {
    return PeriodicCheckOperation.checkUpdatesSilent(this.ctx)
  }

  /**
   * Startup check, then the periodic timer when enabled.
   */
  async start(): Promise<CheckOutcome> {
    const outcome = await PeriodicCheckOperation.startup(this.ctx)
    this.announce(outcome)
    if (this.ctx.config.periodicCheck.enabled) {
      this.startPeriodicCheck()
    }
    return outcome
  }

  startPeriodicCheck(): void {
    const intervalMs = this.ctx.config.periodicCheck.frequencyMinutes * TIME.MINUTE
    this.scheduler.start(intervalMs, async () => {
      this.announce(await PeriodicCheckOperation.tick(this.ctx))
    })
  }

  stopPeriodicCheck(): void {
    this.scheduler.stop()
  }

  get isPeriodicCheckActive(): boolean {
    return this.scheduler.isActive
  }

  private announce(outcome: CheckOutcome): void {
    if ((outcome.kind === 'checked' || outcome.kind === 'cached') && outcome.hasUpdates) {
      const { aheadCount, behindCount } = this.ctx.session.state
      this.notify('info', this.outdatedMessage(aheadCount, behindCount))
    }
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  async updateRepo(): Promise<UpdateResult> {
    const result = await UpdateOperation.updateRepo(this.ctx)
    this.notify(UPDATE_LEVELS[result.status], result.message)
    if (result.status === 'success') {
      await this.refresh({ silent: true })
    }
    return result
  }

  /**
   * Updates the repository, then restores plugins when the refreshed state
   * reports plugin drift.
   */
  async updateAll(): Promise<{ update: UpdateResult; plugins: PluginInstallResult | null }> {
    if (this.ctx.config.versionedReleasesOnly) {
      this.notify('warn', VERSIONED_UPDATE_REFUSAL)
      return {
        update: { status: 'failed', message: VERSIONED_UPDATE_REFUSAL, rolledBack: false },
        plugins: null
      }
    }

    const update = await this.updateRepo()
    if (update.status !== 'success' || !this.ctx.session.state.hasPluginUpdates) {
      return { update, plugins: null }
    }
    return { update, plugins: await this.installPlugins() }
  }

  async installPlugins(): Promise<PluginInstallResult> {
    const result = await PluginOperation.install(this.ctx)
    this.notify(INSTALL_LEVELS[result.status], result.message)
    return result
  }

  async switchToVersion(tag: string): Promise<VersionSwitchResult> {
    return this.afterSwitch(await VersionOperation.switchToVersion(this.ctx, tag))
  }

  async switchToLatest(): Promise<VersionSwitchResult> {
    return this.afterSwitch(await VersionOperation.switchToLatest(this.ctx))
  }

  private async afterSwitch(result: VersionSwitchResult): Promise<VersionSwitchResult> {
    for (const warning of result.warnings) {
      this.notify('warn', warning)
    }
    this.notify(SWITCH_LEVELS[result.status], result.message)
    if (result.status === 'success') {
      await this.refresh({ silent: true })
    }
    return result
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async getAvailableVersions(): Promise<ReleaseTag[]> {
    return VersionOperation.getAvailableVersions(this.ctx)
  }

  versionCompletions(prefix = ''): string[] {
    return VersionOperation.completions(this.ctx, prefix)
  }

  async releaseDetails(tag: string): Promise<ReleaseDetails | null> {
    return ReleaseOperation.details(this.ctx, tag)
  }

  getState(): UpdaterState {
    return this.ctx.session.snapshot()
  }

  getStatus(): UpdaterStatus {
    return StatusSummary.toStatus(this.ctx.session.state)
  }

  hasUpdates(): boolean {
    return StatusSummary.hasUpdates(this.ctx.session.state)
  }

  updateCount(): number {
    return StatusSummary.updateCount(this.ctx.session.state)
  }

  updateText(format: UpdateTextFormat = 'default'): string {
    return StatusSummary.updateText(this.ctx.session.state, format)
  }

  clearRecentUpdates(): void {
    this.ctx.session.clearRecentUpdates()
  }

  outdatedMessage(ahead: number, behind: number): string {
    return StatusSummary.outdatedMessage(this.ctx.config.notify, ahead, behind)
  }

  upToDateMessage(ahead: number): string {
    return StatusSummary.upToDateMessage(this.ctx.config.notify, ahead)
  }

  /**
   * Stops background work. Safe to call more than once.
   */
  dispose(): void {
    this.stopPeriodicCheck()
    log.debug('[Updater] Disposed')
  }
}
