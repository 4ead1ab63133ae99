import { log } from '@shared/logger'
import type { Notification } from '@shared/types'

/**
 * Delivers user-facing messages to the host. The updater calls it at most
 * once per finished operation.
 */
export interface Notifier {
  notify(notification: Notification): void
}

/**
 * Default notifier for hosts without a UI of their own: writes through the logger.
 */
export class LogNotifier implements Notifier {
  notify({ level, title, message }: Notification): void {
    log[level](`[${title}] ${message}`)
  }
}
