export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

const styles: Record<LogLevel, { label: string; ansi: string }> = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

let debugEnabled = process.env.UPDATER_DEBUG === '1' || process.env.UPDATER_DEBUG === 'true'

/**
 * Debug output is off unless UPDATER_DEBUG is set or the host turns it on
 * through configuration.
 */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    console.error(...format('error', message, args))
  },
  debug: (message: unknown, ...args: unknown[]) => {
    if (!debugEnabled) return
    console.debug(...format('debug', message, args))
  }
}
