import type { GitHubRelease } from '@shared/types'
import { Agent, request } from 'undici'
import type { ReleaseSource } from '../interface'
import { parseReleasePayload } from './release-schema'

/**
 * Shared HTTP agent with timeout configuration for GitHub API requests.
 * Prevents indefinite hangs on network issues.
 */
const githubAgent = new Agent({
  connectTimeout: 10_000,
  headersTimeout: 15_000,
  bodyTimeout: 15_000
})

/** Per-request timeout for GitHub API calls */
const REQUEST_TIMEOUT_MS = 15_000

export const GITHUB_API_URL = 'https://api.github.com'

/**
 * Lists releases through the GitHub REST API. Works anonymously within the
 * unauthenticated rate limit; a token raises it.
 */
export class HttpReleaseSource implements ReleaseSource {
  readonly name = 'github-http'

  constructor(
    private readonly token: string | null,
    private readonly baseUrl: string = GITHUB_API_URL
  ) {}

  async isAvailable(): Promise<boolean> {
    return true
  }

  async listReleases(owner: string, repo: string): Promise<GitHubRelease[]> {
    const url = `${this.baseUrl}/repos/${owner}/${repo}/releases`

    const headers: Record<string, string> = {
      'User-Agent': 'repo-updater',
      Accept: 'application/vnd.github.v3+json'
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    const { body, statusCode } = await request(url, {
      dispatcher: githubAgent,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      headers
    })

    if (statusCode !== 200) {
      const text = await body.text()
      throw new Error(`GitHub API failed with status ${statusCode}: ${text}`)
    }

    return parseReleasePayload(await body.json())
  }
}
