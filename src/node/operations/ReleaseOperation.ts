/**
 * ReleaseOperation - Per-release change summaries
 */

import { toBrowserUrl } from '@shared/git-url'
import type { ReleaseDetails } from '@shared/types'
import { ReleaseResolver } from '../domain/ReleaseResolver'
import type { UpdaterContext } from './context'
import { isoDate } from './VersionOperation'

export class ReleaseOperation {
  private constructor() {
    // Static-only class
  }

  /**
   * Summarises `tag` against the release before it. Returns null when the tag
   * does not resolve to a commit. The oldest release has nothing to diff
   * against and reports zero changes.
   */
  static async details(ctx: UpdaterContext, tag: string): Promise<ReleaseDetails | null> {
    const { queries, session } = ctx

    const [tags, commit] = await Promise.all([queries.versionTags(), queries.tagCommitInfo(tag)])
    if (!commit) {
      return null
    }

    const previous = ReleaseResolver.previousTag(tag, tags)
    const diff = previous ? await queries.releaseDiff(tag, previous) : null
    const release = session.state.githubReleases[tag]
    const remoteUrl = session.state.remoteUrl

    let url: string | null = null
    if (release?.htmlUrl) {
      url = release.htmlUrl
    } else if (remoteUrl) {
      url = `${toBrowserUrl(remoteUrl)}/releases/tag/${tag}`
    }

    return {
      tag,
      commit: commit.hash,
      date: isoDate(commit.timestamp),
      url,
      title: release?.name ?? null,
      description: release?.body ? release.body.trim() : null,
      linesAdded: diff?.stat.linesAdded ?? 0,
      linesDeleted: diff?.stat.linesDeleted ?? 0,
      filesChanged: diff?.stat.filesChanged ?? 0,
      pluginChanges: diff?.pluginLockfile.linesAdded ?? 0,
      toolChanges: diff?.toolLockfile.linesAdded ?? 0
    }
  }
}
