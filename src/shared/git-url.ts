/**
 * Shared Git URL utilities
 */

export type GitHubRepoRef = {
  owner: string
  repo: string
}

/**
 * Extracts owner and repository from a GitHub remote.
 *
 * Handles URLs like:
 * - https://github.com/user/repo.git
 * - https://github.com/user/repo
 * - git@github.com:user/repo.git
 * - ssh://git@github.com/user/repo.git
 *
 * @returns null for non-GitHub remotes
 */
export function parseGitHubRepo(url: string): GitHubRepoRef | null {
  const trimmed = url.trim()
  if (!trimmed) {
    return null
  }

  const match =
    /^https?:\/\/(?:[^@/]+@)?github\.com\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/.exec(trimmed) ??
    /^git@github\.com:([^/]+)\/([^/]+?)(?:\.git)?$/.exec(trimmed) ??
    /^ssh:\/\/git@github\.com\/([^/]+)\/([^/]+?)(?:\.git)?$/.exec(trimmed)

  if (!match || !match[1] || !match[2]) {
    return null
  }

  return { owner: match[1], repo: match[2] }
}

/**
 * Converts a remote URL into one a browser can open.
 * `git@host:path.git` becomes `https://host/path`.
 */
export function toBrowserUrl(url: string): string {
  const trimmed = url.trim()
  const ssh = /^git@([^:]+):(.+)$/.exec(trimmed)
  const https = ssh ? `https://${ssh[1]}/${ssh[2]}` : trimmed
  return https.replace(/\.git$/, '')
}
