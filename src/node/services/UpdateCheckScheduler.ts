/**
 * UpdateCheckScheduler - runs a background check on a fixed interval.
 *
 * The timer is unref'd so a pending check never keeps the host process alive,
 * and a tick that is still running when the next one fires is skipped.
 */

import { log } from '@shared/logger'
import { errorMessage } from '../shared/errors'

export class UpdateCheckScheduler {
  private timer: NodeJS.Timeout | null = null
  private running = false

  get isActive(): boolean {
    return this.timer !== null
  }

  start(intervalMs: number, tick: () => Promise<void>): void {
    this.stop()
    this.timer = setInterval(() => {
      void this.runTick(tick)
    }, intervalMs)
    this.timer.unref()
    log.debug(`[UpdateCheckScheduler] Checking every ${intervalMs}ms`)
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  private async runTick(tick: () => Promise<void>): Promise<void> {
    if (this.running) {
      return
    }
    this.running = true
    try {
      await tick()
    } catch (error) {
      log.error('[UpdateCheckScheduler] Background check failed:', errorMessage(error))
    } finally {
      this.running = false
    }
  }
}
