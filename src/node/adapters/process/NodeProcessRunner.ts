/**
 * child_process implementation of the ProcessRunner.
 */

import { log } from '@shared/logger'
import { spawn } from 'child_process'
import { SpawnError, TimeoutError } from '../../shared/errors'
import type { ProcessResult, ProcessRunner, RunOptions } from './interface'

/** Time between SIGTERM and SIGKILL once a deadline has passed. */
const KILL_GRACE_MS = 2000

export class NodeProcessRunner implements ProcessRunner {
  async run(command: string, args: string[], options: RunOptions): Promise<ProcessResult> {
    const display = [command, ...args].join(' ')
    log.debug(`[NodeProcessRunner] ${display} (cwd: ${options.cwd})`)

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe']
      })
      let stdout = ''
      let stderr = ''
      let timedOut = false
      let killTimer: NodeJS.Timeout | undefined

      const deadline = setTimeout(() => {
        timedOut = true
        child.kill('SIGTERM')
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS)
      }, options.timeoutMs)

      const clearTimers = () => {
        clearTimeout(deadline)
        if (killTimer) clearTimeout(killTimer)
      }

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString()
      })
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      child.on('error', (error) => {
        clearTimers()
        reject(new SpawnError(`Failed to start ${command}: ${error.message}`, command, error))
      })

      child.on('close', (code) => {
        clearTimers()
        if (timedOut) {
          reject(new TimeoutError(`${display} timed out after ${options.timeoutMs}ms`, options.timeoutMs))
          return
        }
        resolve({ stdout, stderr, exitCode: code })
      })
    })
  }
}
