/**
 * Plugin manager and tool restorer capabilities.
 *
 * The updater never talks to the editor's plugin manager directly; it asks
 * these interfaces which commit a plugin has checked out and to restore
 * everything from the lockfiles.
 */

export type RestoreOutcome = {
  ok: boolean
  /** Combined stdout/stderr of the restore run. */
  output: string
}

export interface PluginManager {
  /**
   * Get the manager name for logging/debugging
   */
  readonly name: string

  isAvailable(): Promise<boolean>

  /**
   * Commit checked out in the plugin's directory, or null when the plugin is
   * not installed.
   */
  installedCommit(name: string): Promise<string | null>

  pluginDir(name: string): string

  /**
   * Checks every plugin out at the commit its lockfile pins.
   */
  restore(): Promise<RestoreOutcome>
}

export interface ToolRestorer {
  readonly name: string

  restore(): Promise<RestoreOutcome>
}

/**
 * Restore output mentioning an error counts as a failed restore even when the
 * editor exits 0.
 */
export function outputReportsError(output: string): boolean {
  return output.includes('error') || output.includes('Error')
}
