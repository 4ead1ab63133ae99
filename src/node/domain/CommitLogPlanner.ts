/**
 * CommitLogPlanner - decides which commit range the updater shows.
 *
 * On main the interesting commits are the incoming ones when behind, and the
 * recent local history otherwise. On any other branch they are the branch's
 * own commits when it is ahead of main, and main's commits it lacks otherwise.
 */

import type { AheadBehind, LogOrigin } from '@shared/types'
import { DEFAULT_REMOTE } from '../shared/constants'

export type LogPlan = {
  revisions: string[]
  origin: LogOrigin
}

export class CommitLogPlanner {
  private constructor() {
    // Static-only class
  }

  static plan(branch: string, mainBranch: string, counts: AheadBehind): LogPlan {
    if (branch === mainBranch) {
      if (counts.behind > 0) {
        return { revisions: [`${DEFAULT_REMOTE}/${mainBranch}`, '^HEAD'], origin: 'remote' }
      }
      return { revisions: ['HEAD'], origin: 'local' }
    }

    if (counts.ahead > 0) {
      return { revisions: [branch, `^${mainBranch}`], origin: 'local' }
    }
    return { revisions: [mainBranch, `^${branch}`], origin: 'remote' }
  }

  /**
   * Commits on the remote main that `branch` does not contain.
   */
  static remoteOnly(branch: string, mainBranch: string): string[] {
    return [`${DEFAULT_REMOTE}/${mainBranch}`, `^${branch}`]
  }
}
