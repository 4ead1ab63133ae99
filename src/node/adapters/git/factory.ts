/**
 * Git Adapter Factory
 *
 * The adapter holds no per-repository state, so one instance can serve every
 * tracked repository in the process.
 */

import { log } from '@shared/logger'
import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

export interface GitAdapterConfig {
  /** Log which backend was created. */
  verbose?: boolean
}

export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (config.verbose) {
    log.debug('[GitAdapter] Creating simple-git adapter')
  }
  return new SimpleGitAdapter()
}
