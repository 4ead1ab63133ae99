/**
 * ReleaseResolver - positions the checkout within the newest-first tag list.
 */

import type { VersionMode } from '@shared/types'

export type VersionModeState = {
  versionMode: VersionMode
  pinnedVersion: string | null
}

export type ResolvedVersionMode = VersionModeState & {
  currentTag: string | null
}

export class ReleaseResolver {
  private constructor() {
    // Static-only class
  }

  /**
   * Tags newer than `current`. Every tag when there is no current release,
   * none when `current` is not in the list.
   */
  static releasesSince(current: string | null, tags: string[]): string[] {
    if (current === null) return [...tags]
    const index = tags.indexOf(current)
    if (index === -1) return []
    return tags.slice(0, index)
  }

  /**
   * Up to `max` tags older than `current`.
   */
  static releasesBefore(current: string | null, tags: string[], max: number): string[] {
    if (current === null) return []
    const index = tags.indexOf(current)
    if (index === -1) return []
    return tags.slice(index + 1, index + 1 + max)
  }

  /**
   * The release directly preceding `tag`, used as the diff base for release details.
   */
  static previousTag(tag: string, tags: string[]): string | null {
    const index = tags.indexOf(tag)
    if (index === -1) return null
    return tags[index + 1] ?? null
  }

  /**
   * Derives the version mode from the tag HEAD sits on. Being on a tag means
   * pinned unless the session explicitly followed latest; being off every tag
   * means latest unless the session pinned a version.
   */
  static resolveMode(headTag: string | null, state: VersionModeState): ResolvedVersionMode {
    if (headTag) {
      if (state.versionMode !== 'latest' || state.pinnedVersion === headTag) {
        return { currentTag: headTag, versionMode: 'pinned', pinnedVersion: headTag }
      }
      return { currentTag: headTag, versionMode: state.versionMode, pinnedVersion: state.pinnedVersion }
    }

    if (state.versionMode !== 'pinned') {
      return { currentTag: null, versionMode: 'latest', pinnedVersion: null }
    }
    return { currentTag: null, versionMode: state.versionMode, pinnedVersion: state.pinnedVersion }
  }
}
