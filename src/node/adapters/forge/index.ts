/**
 * Forge Adapter Module
 *
 * Release metadata sources for GitHub-hosted repositories.
 *
 * Usage:
 * ```typescript
 * import { GhCliReleaseSource, HttpReleaseSource } from '../adapters/forge'
 *
 * const sources = [new GhCliReleaseSource(runner, repoPath), new HttpReleaseSource(token)]
 * ```
 */

export type { ReleaseSource } from './interface'
export { GhCliReleaseSource } from './github/GhCliReleaseSource'
export { GITHUB_API_URL, HttpReleaseSource } from './github/HttpReleaseSource'
export { mapRelease, parseReleasePayload } from './github/release-schema'
