/**
 * ReleaseMetadataService - GitHub release titles and notes for release tags.
 *
 * Metadata is decoration: every failure is logged at debug level and turns
 * into an empty result, and results are cached per repository.
 */

import { parseGitHubRepo } from '@shared/git-url'
import { log } from '@shared/logger'
import type { GitHubRelease, ReleaseMetadata } from '@shared/types'
import type { ReleaseSource } from '../adapters/forge'
import { TIME } from '../shared/constants'
import { errorMessage } from '../shared/errors'

type CachedReleases = {
  releases: Record<string, GitHubRelease>
  fetchedAt: number
}

export class ReleaseMetadataService {
  private cache = new Map<string, CachedReleases>()

  constructor(
    private readonly sources: ReleaseSource[],
    private readonly ttlSeconds: number
  ) {}

  /**
   * Releases of the GitHub repository behind `remoteUrl`, keyed by tag.
   * Empty for non-GitHub remotes and on any failure.
   */
  async releasesFor(remoteUrl: string | null): Promise<Record<string, GitHubRelease>> {
    const repo = remoteUrl ? parseGitHubRepo(remoteUrl) : null
    if (!repo) {
      return {}
    }

    const key = `${repo.owner}/${repo.repo}`
    const cached = this.cache.get(key)
    if (cached && Date.now() - cached.fetchedAt < this.ttlSeconds * TIME.SECOND) {
      return cached.releases
    }

    const releases = await this.fetch(repo.owner, repo.repo)
    if (releases) {
      this.cache.set(key, { releases, fetchedAt: Date.now() })
    }
    return releases ?? {}
  }

  static toMetadata(release: GitHubRelease): ReleaseMetadata {
    return {
      title: release.name,
      body: release.body,
      prerelease: release.prerelease,
      htmlUrl: release.htmlUrl,
      publishedAt: release.publishedAt
    }
  }

  private async fetch(owner: string, repo: string): Promise<Record<string, GitHubRelease> | null> {
    for (const source of this.sources) {
      try {
        if (!(await source.isAvailable())) {
          continue
        }
        const list = await source.listReleases(owner, repo)
        log.debug(`[ReleaseMetadataService] ${list.length} releases from ${source.name}`)
        const byTag: Record<string, GitHubRelease> = {}
        for (const release of list) {
          if (!release.draft) {
            byTag[release.tag] = release
          }
        }
        return byTag
      } catch (error) {
        log.debug(`[ReleaseMetadataService] ${source.name} failed:`, errorMessage(error))
      }
    }
    return null
  }
}
