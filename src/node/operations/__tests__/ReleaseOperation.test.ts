import { beforeEach, describe, expect, it } from 'vitest'
import type { CommitInfo } from '@shared/types'
import { TEST_REPO, createTestContext, type TestContext } from '../../__tests__/fakes'
import { ReleaseOperation } from '../ReleaseOperation'

const RELEASE_TIME = Date.parse('2024-04-10T08:30:00Z') / 1000

const COMMIT: CommitInfo = {
  hash: 'abc1234',
  fullHash: 'abc1234'.padEnd(40, '0'),
  message: 'Release v1.1.0',
  author: 'Test User',
  date: '3 days ago',
  timestamp: RELEASE_TIME
}

describe('ReleaseOperation.details', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
    ctx.git.listTags.mockResolvedValue([
      { name: 'v1.0.0', timestamp: 100 },
      { name: 'v1.1.0', timestamp: 200 },
      { name: 'v1.2.0', timestamp: 300 }
    ])
    ctx.git.commitInfo.mockResolvedValue(COMMIT)
    ctx.git.diffShortStat.mockResolvedValue({ filesChanged: 4, linesAdded: 30, linesDeleted: 12 })
    ctx.git.diffNumStat.mockImplementation(async (_dir, _from, _to, paths) =>
      paths[0] === 'lazy-lock.json' ? { linesAdded: 3, linesDeleted: 3 } : { linesAdded: 1, linesDeleted: 1 }
    )
    ctx.session.patch({ remoteUrl: 'git@github.com:octo/dotfiles.git' })
  })

  it('summarises a release against the one before it', async () => {
    const details = await ReleaseOperation.details(ctx, 'v1.1.0')

    expect(details).toEqual({
      tag: 'v1.1.0',
      commit: 'abc1234',
      date: '2024-04-10',
      url: 'https://github.com/octo/dotfiles/releases/tag/v1.1.0',
      title: null,
      description: null,
      linesAdded: 30,
      linesDeleted: 12,
      filesChanged: 4,
      pluginChanges: 3,
      toolChanges: 1
    })
    expect(ctx.git.diffShortStat).toHaveBeenCalledWith(TEST_REPO, 'v1.0.0', 'v1.1.0', expect.anything())
  })

  it('prefers GitHub release data', async () => {
    ctx.session.patch({
      githubReleases: {
        'v1.1.0': {
          tag: 'v1.1.0',
          name: 'Better completion',
          body: '  Switched completion engines.\n',
          prerelease: false,
          draft: false,
          htmlUrl: 'https://github.com/octo/dotfiles/releases/tag/v1.1.0-notes',
          publishedAt: '2024-04-10T09:00:00Z',
          author: 'octocat'
        }
      }
    })

    const details = await ReleaseOperation.details(ctx, 'v1.1.0')

    expect(details?.title).toBe('Better completion')
    expect(details?.description).toBe('Switched completion engines.')
    expect(details?.url).toBe('https://github.com/octo/dotfiles/releases/tag/v1.1.0-notes')
  })

  it('reports zero changes for the oldest release', async () => {
    const details = await ReleaseOperation.details(ctx, 'v1.0.0')

    expect(details?.linesAdded).toBe(0)
    expect(details?.pluginChanges).toBe(0)
    expect(ctx.git.diffShortStat).not.toHaveBeenCalled()
  })

  it('has no URL without a remote', async () => {
    ctx.session.patch({ remoteUrl: null })

    expect((await ReleaseOperation.details(ctx, 'v1.2.0'))?.url).toBeNull()
  })

  it('returns null for an unknown tag', async () => {
    ctx.git.commitInfo.mockResolvedValue(null)

    expect(await ReleaseOperation.details(ctx, 'v9.9.9')).toBeNull()
  })
})
