export type ProcessResult = {
  stdout: string
  stderr: string
  /** null when the process was terminated by a signal. */
  exitCode: number | null
}

export type RunOptions = {
  /** Working directory. Never inherited implicitly from the host process. */
  cwd: string
  timeoutMs: number
  env?: Record<string, string | undefined>
}

/**
 * Runs an executable with an argv array (no shell) and collects its output.
 *
 * A non-zero exit status resolves normally; callers decide what it means.
 * Rejects with TimeoutError when the deadline passes (the process is killed)
 * and with SpawnError when the executable cannot be started.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ProcessResult>
}

export function combinedOutput(result: ProcessResult): string {
  return [result.stdout, result.stderr].filter((part) => part.length > 0).join('\n')
}
