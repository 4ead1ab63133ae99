/**
 * Pure parsers for the git output formats the updater consumes.
 */

import type { AheadBehind, Commit, CommitInfo, DiffStat, LineCounts, TagEntry } from '@shared/types'
import { MAX_COMMIT_MESSAGE_LENGTH } from '../../shared/constants'

function splitLines(output: string): string[] {
  return output.split('\n').filter((line) => line.trim().length > 0)
}

/**
 * Keeps the first line only and caps it at MAX_COMMIT_MESSAGE_LENGTH,
 * replacing the overflow with an ellipsis.
 */
export function truncateMessage(message: string): string {
  const firstLine = message.replace(/\r/g, '').split('\n')[0] ?? ''
  if (firstLine.length <= MAX_COMMIT_MESSAGE_LENGTH) {
    return firstLine
  }
  return `${firstLine.slice(0, MAX_COMMIT_MESSAGE_LENGTH - 3)}...`
}

/**
 * Parses one `%h|%s|%an|%ar` line. The subject may itself contain `|`, so the
 * hash is taken from the front and author/date from the back.
 */
export function parseCommitLine(line: string): Commit | null {
  const parts = line.split('|')
  if (parts.length < 4) return null

  const hash = parts[0]?.trim() ?? ''
  if (!hash) return null

  const date = parts[parts.length - 1] ?? ''
  const author = parts[parts.length - 2] ?? ''
  const subject = parts.slice(1, parts.length - 2).join('|')

  return {
    hash,
    message: truncateMessage(subject),
    author: author.trim(),
    date: date.trim()
  }
}

export function parseCommitLog(output: string): Commit[] {
  const commits: Commit[] = []
  for (const line of splitLines(output)) {
    const commit = parseCommitLine(line)
    if (commit) commits.push(commit)
  }
  return commits
}

/**
 * Parses `%h|%H|%s|%an|%ar|%ct`.
 */
export function parseCommitInfo(output: string): CommitInfo | null {
  const line = splitLines(output)[0]
  if (!line) return null

  const parts = line.split('|')
  if (parts.length < 6) return null

  const hash = parts[0]?.trim() ?? ''
  const fullHash = parts[1]?.trim() ?? ''
  if (!hash || !fullHash) return null

  const timestamp = Number.parseInt(parts[parts.length - 1] ?? '', 10)
  return {
    hash,
    fullHash,
    message: truncateMessage(parts.slice(2, parts.length - 3).join('|')),
    author: (parts[parts.length - 3] ?? '').trim(),
    date: (parts[parts.length - 2] ?? '').trim(),
    timestamp: Number.isNaN(timestamp) ? 0 : timestamp
  }
}

/**
 * Parses `git rev-list --left-right --count A...B`. Left is ahead, right is
 * behind. Anything unparseable counts as level.
 */
export function parseAheadBehind(output: string): AheadBehind {
  const match = output.match(/(\d+)\s+(\d+)/)
  if (!match) {
    return { ahead: 0, behind: 0 }
  }
  return {
    ahead: Number.parseInt(match[1] ?? '0', 10),
    behind: Number.parseInt(match[2] ?? '0', 10)
  }
}

/**
 * Paths from `git status --porcelain` (v1). Renames report the new path.
 */
export function parsePorcelainPaths(output: string): string[] {
  const paths: string[] = []
  for (const line of splitLines(output)) {
    if (line.length < 4) continue
    let entry = line.slice(3)
    const arrow = entry.indexOf(' -> ')
    if (arrow !== -1) {
      entry = entry.slice(arrow + 4)
    }
    if (entry.startsWith('"') && entry.endsWith('"')) {
      entry = entry.slice(1, -1)
    }
    paths.push(entry)
  }
  return paths
}

/**
 * Parses `git tag -l --format=%(refname:short)|%(*committerdate:unix)|%(committerdate:unix)`.
 * Annotated tags carry the date on the peeled commit, lightweight tags on the ref itself.
 */
export function parseTagList(output: string): TagEntry[] {
  const tags: TagEntry[] = []
  for (const line of splitLines(output)) {
    const [name = '', peeled = '', own = ''] = line.trim().split('|')
    if (!name) continue
    const timestamp = Number.parseInt(peeled || own, 10)
    tags.push({ name, timestamp: Number.isNaN(timestamp) ? 0 : timestamp })
  }
  return tags
}

/**
 * Parses the summary line of `git diff --shortstat`.
 */
export function parseShortStat(output: string): DiffStat {
  const read = (pattern: RegExp): number => {
    const match = output.match(pattern)
    return match ? Number.parseInt(match[1] ?? '0', 10) : 0
  }
  return {
    filesChanged: read(/(\d+) files? changed/),
    linesAdded: read(/(\d+) insertions?\(\+\)/),
    linesDeleted: read(/(\d+) deletions?\(-\)/)
  }
}

/**
 * Sums `git diff --numstat` output. Binary entries (`-`) count as zero.
 */
export function parseNumStat(output: string): LineCounts {
  const counts: LineCounts = { linesAdded: 0, linesDeleted: 0 }
  for (const line of splitLines(output)) {
    const [added = '', deleted = ''] = line.split('\t')
    const a = Number.parseInt(added, 10)
    const d = Number.parseInt(deleted, 10)
    counts.linesAdded += Number.isNaN(a) ? 0 : a
    counts.linesDeleted += Number.isNaN(d) ? 0 : d
  }
  return counts
}
