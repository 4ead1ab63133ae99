/**
 * VersionComparator - ordering for release tag names.
 *
 * Tags look like `v1.2.3` or `v1.2.3-beta1`. Cores compare numerically, a
 * release ranks above any prerelease of the same core, and two prereleases
 * compare as plain strings (so `pre10` sorts before `pre9`).
 */

import type { TagEntry } from '@shared/types'

export type ParsedVersion = {
  major: number
  minor: number
  patch: number
  prerelease: string | null
}

const VERSION_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)(?:-(.+))?$/

export class VersionComparator {
  private constructor() {
    // Static-only class
  }

  static parse(name: string): ParsedVersion | null {
    const match = VERSION_PATTERN.exec(name.trim())
    if (!match) return null
    return {
      major: Number(match[1]),
      minor: Number(match[2]),
      patch: Number(match[3]),
      prerelease: match[4] ?? null
    }
  }

  /**
   * Negative when `a` is older than `b`, positive when newer, 0 when equal.
   * Names that do not parse rank below every parseable one.
   */
  static compare(a: string, b: string): number {
    const va = VersionComparator.parse(a)
    const vb = VersionComparator.parse(b)

    if (!va && !vb) return a < b ? -1 : a > b ? 1 : 0
    if (!va) return -1
    if (!vb) return 1

    if (va.major !== vb.major) return va.major - vb.major
    if (va.minor !== vb.minor) return va.minor - vb.minor
    if (va.patch !== vb.patch) return va.patch - vb.patch

    if (va.prerelease === vb.prerelease) return 0
    if (va.prerelease === null) return 1
    if (vb.prerelease === null) return -1
    return va.prerelease < vb.prerelease ? -1 : 1
  }

  /**
   * Newest first by commit time. Equal timestamps fall back to version order.
   */
  static sortByRecency(tags: TagEntry[]): string[] {
    return [...tags]
      .sort((a, b) => {
        if (a.timestamp !== b.timestamp) return b.timestamp - a.timestamp
        return VersionComparator.compare(b.name, a.name)
      })
      .map((tag) => tag.name)
  }
}
