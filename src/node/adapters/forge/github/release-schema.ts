import type { GitHubRelease } from '@shared/types'
import { z } from 'zod'

/**
 * Shape of one entry of `GET /repos/{owner}/{repo}/releases`. Only the fields
 * the updater reads are declared; everything else is ignored.
 */
const releaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullable().optional(),
  body: z.string().nullable().optional(),
  prerelease: z.boolean().optional(),
  draft: z.boolean().optional(),
  html_url: z.string().optional(),
  published_at: z.string().nullable().optional(),
  author: z.object({ login: z.string() }).nullable().optional()
})

export const releaseListSchema = z.array(releaseSchema)

const errorSchema = z.object({ message: z.string() })

type RawRelease = z.infer<typeof releaseSchema>

export function mapRelease(raw: RawRelease): GitHubRelease {
  return {
    tag: raw.tag_name,
    name: raw.name || raw.tag_name,
    body: raw.body ?? '',
    prerelease: raw.prerelease ?? false,
    draft: raw.draft ?? false,
    htmlUrl: raw.html_url ?? '',
    publishedAt: raw.published_at ?? '',
    author: raw.author?.login ?? ''
  }
}

/**
 * Parses a releases payload. GitHub reports errors as `{ message }`, which is
 * surfaced as the thrown error's message.
 */
export function parseReleasePayload(payload: unknown): GitHubRelease[] {
  const list = releaseListSchema.safeParse(payload)
  if (list.success) {
    return list.data.map(mapRelease)
  }

  const error = errorSchema.safeParse(payload)
  if (error.success) {
    throw new Error(`GitHub API error: ${error.data.message}`)
  }
  throw new Error('GitHub API returned an unexpected releases payload')
}
