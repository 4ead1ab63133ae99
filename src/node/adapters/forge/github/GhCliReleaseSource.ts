import { log } from '@shared/logger'
import type { GitHubRelease } from '@shared/types'
import { ProcessError, SpawnError, errorMessage } from '../../../shared/errors'
import type { ProcessRunner } from '../../process'
import type { ReleaseSource } from '../interface'
import { parseReleasePayload } from './release-schema'

const GH_TIMEOUT_MS = 15_000

/**
 * Lists releases through an authenticated GitHub CLI (`gh api`).
 */
export class GhCliReleaseSource implements ReleaseSource {
  readonly name = 'gh-cli'

  constructor(
    private readonly runner: ProcessRunner,
    private readonly cwd: string
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.run('gh', ['--version'], { cwd: this.cwd, timeoutMs: GH_TIMEOUT_MS })
      return result.exitCode === 0
    } catch (error) {
      if (error instanceof SpawnError) {
        log.debug('[GhCliReleaseSource] gh is not installed')
        return false
      }
      throw error
    }
  }

  async listReleases(owner: string, repo: string): Promise<GitHubRelease[]> {
    const endpoint = `repos/${owner}/${repo}/releases`
    const result = await this.runner.run('gh', ['api', endpoint], {
      cwd: this.cwd,
      timeoutMs: GH_TIMEOUT_MS
    })

    if (result.exitCode !== 0) {
      throw new ProcessError(
        `gh api ${endpoint} exited with ${result.exitCode}`,
        'gh',
        result.exitCode,
        result.stderr.trim()
      )
    }

    let payload: unknown
    try {
      payload = JSON.parse(result.stdout)
    } catch (error) {
      throw new Error(`Could not parse gh api output: ${errorMessage(error)}`)
    }
    return parseReleasePayload(payload)
  }
}
