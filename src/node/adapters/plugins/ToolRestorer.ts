import { log } from '@shared/logger'
import { RESTORE_TIMEOUT_MS } from '../../shared/constants'
import { combinedOutput, type ProcessRunner } from '../process'
import { outputReportsError, type RestoreOutcome, type ToolRestorer } from './interface'

/**
 * Runs an editor command (e.g. `MasonLockRestore`) headlessly to restore
 * tools from their lockfile.
 */
export class EditorCommandToolRestorer implements ToolRestorer {
  readonly name: string

  constructor(
    private readonly runner: ProcessRunner,
    private readonly editorCommand: string,
    private readonly command: string,
    private readonly cwd: string
  ) {
    this.name = command
  }

  async restore(): Promise<RestoreOutcome> {
    log.info(`[ToolRestorer] Running ${this.command}`)
    const result = await this.runner.run(this.editorCommand, ['--headless', `+${this.command}`, '+qa'], {
      cwd: this.cwd,
      timeoutMs: RESTORE_TIMEOUT_MS
    })
    const output = combinedOutput(result)
    return { ok: result.exitCode === 0 && !outputReportsError(output), output }
  }
}

/**
 * Used when no tool lockfile restore is configured.
 */
export class NullToolRestorer implements ToolRestorer {
  readonly name = 'none'

  async restore(): Promise<RestoreOutcome> {
    return { ok: true, output: '' }
  }
}
