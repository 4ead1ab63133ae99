/**
 * Release metadata sources.
 *
 * A source lists the published releases of a GitHub repository. Sources are
 * tried in order; the first available one answers.
 */

import type { GitHubRelease } from '@shared/types'

export interface ReleaseSource {
  /**
   * Get the source name for logging/debugging
   */
  readonly name: string

  isAvailable(): Promise<boolean>

  listReleases(owner: string, repo: string): Promise<GitHubRelease[]>
}
