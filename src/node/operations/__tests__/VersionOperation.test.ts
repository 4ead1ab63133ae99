import { beforeEach, describe, expect, it } from 'vitest'
import type { CommitInfo, GitHubRelease, TagEntry } from '@shared/types'
import { TEST_REPO, createTestContext, type TestContext } from '../../__tests__/fakes'
import { DIRTY_TREE_MESSAGE, VersionOperation, isoDate } from '../VersionOperation'

const TAGS: TagEntry[] = [
  { name: 'v1.0.0', timestamp: 100 },
  { name: 'v1.1.0', timestamp: 200 },
  { name: 'v1.2.0', timestamp: 300 },
  { name: 'v1.3.0', timestamp: 400 },
  { name: 'v1.4.0', timestamp: 500 },
  { name: 'v1.5.0', timestamp: 600 },
  { name: 'v1.6.0', timestamp: 700 }
]

const MARCH_5 = Date.parse('2024-03-05T10:00:00Z') / 1000

function info(ref: string, timestamp = MARCH_5): CommitInfo {
  return {
    hash: 'abc1234',
    fullHash: 'abc1234'.padEnd(40, '0'),
    message: `Release ${ref}`,
    author: 'Test User',
    date: '2 weeks ago',
    timestamp
  }
}

describe('VersionOperation', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
    ctx.git.listTags.mockResolvedValue(TAGS)
  })

  describe('isoDate', () => {
    it('formats unix seconds as a calendar date', () => {
      expect(isoDate(MARCH_5)).toBe('2024-03-05')
    })

    it('is empty for unknown timestamps', () => {
      expect(isoDate(0)).toBe('')
    })
  })

  describe('switchToVersion', () => {
    it('checks out the tag, restores lockfiles and pins the version', async () => {
      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result).toEqual({ status: 'success', message: 'Switched to v1.2.0', warnings: [], tag: 'v1.2.0' })
      expect(ctx.git.checkoutDetached).toHaveBeenCalledWith(TEST_REPO, 'v1.2.0', { timeoutMs: 20_000 })
      expect(ctx.plugins.restore).toHaveBeenCalledTimes(1)
      expect(ctx.tools.restore).toHaveBeenCalledTimes(1)
      expect(ctx.session.state.versionMode).toBe('pinned')
      expect(ctx.session.state.pinnedVersion).toBe('v1.2.0')
      expect(ctx.session.state.currentTag).toBe('v1.2.0')
      expect(ctx.session.state.isSwitchingVersion).toBe(false)
    })

    it('refuses to switch with uncommitted changes', async () => {
      ctx.git.changedPaths.mockResolvedValue(['init.lua'])

      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result).toEqual({ status: 'error', message: DIRTY_TREE_MESSAGE, warnings: [] })
      expect(ctx.git.checkoutDetached).not.toHaveBeenCalled()
      expect(ctx.git.listTags).not.toHaveBeenCalled()
    })

    it('switches when only lockfiles changed', async () => {
      ctx.git.changedPaths.mockResolvedValue(['lazy-lock.json'])

      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result.status).toBe('success')
      expect(ctx.git.checkoutPaths).toHaveBeenCalledWith(TEST_REPO, ['lazy-lock.json'], expect.anything())
    })

    it('lists the five newest tags when the version does not exist', async () => {
      const result = await VersionOperation.switchToVersion(ctx, 'v9.9.9')

      expect(result.status).toBe('error')
      expect(result.message).toBe('Version v9.9.9 not found. Available: v1.6.0, v1.5.0, v1.4.0, v1.3.0, v1.2.0')
      expect(ctx.git.checkoutDetached).not.toHaveBeenCalled()
    })

    it('reports a failed status check', async () => {
      ctx.git.changedPaths.mockRejectedValue(new Error('status failed'))

      expect((await VersionOperation.switchToVersion(ctx, 'v1.2.0')).message).toBe(
        'Failed to check for changes: status failed'
      )
    })

    it('reports a failed tag listing', async () => {
      ctx.git.listTags.mockRejectedValue(new Error('boom'))

      expect((await VersionOperation.switchToVersion(ctx, 'v1.2.0')).message).toBe('Failed to fetch versions: boom')
    })

    it('reports a failed checkout without restoring anything', async () => {
      ctx.git.checkoutDetached.mockRejectedValue(new Error("error: pathspec 'v1.2.0' did not match"))

      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result.message).toBe("Failed to checkout v1.2.0: error: pathspec 'v1.2.0' did not match")
      expect(ctx.plugins.restore).not.toHaveBeenCalled()
      expect(ctx.session.state.pinnedVersion).toBeNull()
    })

    it('returns in-progress while another switch runs', async () => {
      ctx.session.patch({ isSwitchingVersion: true })

      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result).toEqual({ status: 'in-progress', message: 'Version switch already in progress', warnings: [] })
    })

    it('turns restore failures into warnings', async () => {
      ctx.plugins.restore.mockResolvedValue({ ok: false, output: 'Error: lazy.nvim failed\n' })
      ctx.tools.restore.mockRejectedValue(new Error('spawn nvim ENOENT'))

      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result.status).toBe('success')
      expect(result.warnings).toEqual([
        'Warning: Failed to restore plugins: Error: lazy.nvim failed. Run :Lazy restore manually.',
        'Warning: Failed to restore tools: spawn nvim ENOENT. Run :MasonLockRestore manually.'
      ])
    })

    it('warns when the plugin manager is missing', async () => {
      ctx.plugins.isAvailable.mockResolvedValue(false)

      const result = await VersionOperation.switchToVersion(ctx, 'v1.2.0')

      expect(result.warnings).toEqual(['Warning: fake-plugins not available. Run :Lazy restore manually.'])
      expect(ctx.plugins.restore).not.toHaveBeenCalled()
    })
  })

  describe('switchToLatest', () => {
    it('checks out the newest tag and follows latest', async () => {
      ctx.session.patch({ versionMode: 'pinned', pinnedVersion: 'v1.0.0' })

      const result = await VersionOperation.switchToLatest(ctx)

      expect(result.tag).toBe('v1.6.0')
      expect(ctx.git.checkoutDetached).toHaveBeenCalledWith(TEST_REPO, 'v1.6.0', expect.anything())
      expect(ctx.session.state.versionMode).toBe('latest')
      expect(ctx.session.state.pinnedVersion).toBeNull()
      expect(ctx.session.state.currentTag).toBe('v1.6.0')
    })

    it('fails without release tags', async () => {
      ctx.git.listTags.mockResolvedValue([])

      expect(await VersionOperation.switchToLatest(ctx)).toEqual({
        status: 'error',
        message: 'No release tags found',
        warnings: []
      })
    })
  })

  describe('getAvailableVersions', () => {
    it('returns tags newest first with commit dates and release metadata', async () => {
      ctx.git.listTags.mockResolvedValue([
        { name: 'v1.0.0', timestamp: 100 },
        { name: 'v1.1.0', timestamp: 200 }
      ])
      ctx.git.commitInfo.mockImplementation(async (_dir, ref) => info(ref))
      const release: GitHubRelease = {
        tag: 'v1.1.0',
        name: 'Faster startup',
        body: 'Lazy-load everything',
        prerelease: false,
        draft: false,
        htmlUrl: 'https://github.com/octo/dotfiles/releases/tag/v1.1.0',
        publishedAt: '2024-03-05T12:00:00Z',
        author: 'octocat'
      }
      ctx.session.patch({ githubReleases: { 'v1.1.0': release } })

      const versions = await VersionOperation.getAvailableVersions(ctx)

      expect(versions.map((version) => version.name)).toEqual(['v1.1.0', 'v1.0.0'])
      expect(versions[0]).toEqual({
        name: 'v1.1.0',
        commit: info('v1.1.0'),
        date: '2024-03-05',
        githubMetadata: {
          title: 'Faster startup',
          body: 'Lazy-load everything',
          prerelease: false,
          htmlUrl: 'https://github.com/octo/dotfiles/releases/tag/v1.1.0',
          publishedAt: '2024-03-05T12:00:00Z'
        }
      })
      expect(versions[1]).toEqual({ name: 'v1.0.0', commit: info('v1.0.0'), date: '2024-03-05' })
    })

    it('looks up tag commits one at a time', async () => {
      let running = 0
      let peak = 0
      ctx.git.commitInfo.mockImplementation(async (_dir, ref) => {
        running += 1
        peak = Math.max(peak, running)
        await Promise.resolve()
        running -= 1
        return info(ref)
      })

      const versions = await VersionOperation.getAvailableVersions(ctx)

      expect(versions).toHaveLength(TAGS.length)
      expect(ctx.git.commitInfo).toHaveBeenCalledTimes(TAGS.length)
      expect(peak).toBe(1)
    })

    it('completes from the last listing', async () => {
      expect(VersionOperation.completions(ctx, 'v1')).toEqual([])

      await VersionOperation.getAvailableVersions(ctx)

      expect(VersionOperation.completions(ctx, 'v1.5')).toEqual(['v1.5.0'])
      expect(VersionOperation.completions(ctx)).toHaveLength(7)
    })
  })

  describe('detectVersionMode', () => {
    it('pins the version HEAD is tagged with', async () => {
      ctx.git.describeTag.mockResolvedValue('v1.3.0')

      const resolved = await VersionOperation.detectVersionMode(ctx)

      expect(resolved).toEqual({ currentTag: 'v1.3.0', versionMode: 'pinned', pinnedVersion: 'v1.3.0' })
      expect(ctx.session.state.currentTag).toBe('v1.3.0')
    })

    it('follows latest off every tag', async () => {
      const resolved = await VersionOperation.detectVersionMode(ctx)

      expect(resolved).toEqual({ currentTag: null, versionMode: 'latest', pinnedVersion: null })
    })
  })

  describe('loadReleasePosition', () => {
    it('places HEAD between releases', async () => {
      ctx.git.isDetachedHead.mockResolvedValue(true)
      ctx.git.describeTag.mockImplementation(async (_dir, _ref, options) => {
        if (options.exact) {
          throw new Error('fatal: no tag exactly matches')
        }
        return 'v1.4.0'
      })
      ctx.git.countCommits.mockResolvedValue(2)
      ctx.git.log.mockResolvedValue([
        { hash: 'def5678', message: 'Tweak keymaps', author: 'Test User', date: '1 hour ago' }
      ])
      ctx.git.commitInfo.mockResolvedValue(info('v1.4.0'))

      await VersionOperation.loadReleasePosition(ctx)

      const state = ctx.session.state
      expect(state.isDetachedHead).toBe(true)
      expect(state.currentRelease).toBe('v1.4.0')
      expect(state.latestRelease).toBe('v1.6.0')
      expect(state.releasesSinceCurrent).toEqual(['v1.6.0', 'v1.5.0'])
      expect(state.releasesBeforeCurrent).toEqual(['v1.3.0', 'v1.2.0', 'v1.1.0', 'v1.0.0'])
      expect(state.hasNewRelease).toBe(true)
      expect(state.commitsSinceRelease).toBe(2)
      expect(state.commitsSinceReleaseList).toHaveLength(1)
      expect(state.releaseCommit).toEqual(info('v1.4.0'))
      expect(ctx.git.countCommits).toHaveBeenCalledWith(TEST_REPO, 'v1.4.0..HEAD', expect.anything())
    })

    it('counts no commits when HEAD sits on the release', async () => {
      ctx.git.describeTag.mockResolvedValue('v1.6.0')

      await VersionOperation.loadReleasePosition(ctx)

      expect(ctx.session.state.hasNewRelease).toBe(false)
      expect(ctx.session.state.commitsSinceRelease).toBe(0)
      expect(ctx.git.countCommits).not.toHaveBeenCalled()
    })

    it('limits older releases to maxReleaseItems', async () => {
      ctx = createTestContext({ maxReleaseItems: 2 })
      ctx.git.listTags.mockResolvedValue(TAGS)
      ctx.git.describeTag.mockResolvedValue('v1.6.0')

      await VersionOperation.loadReleasePosition(ctx)

      expect(ctx.session.state.releasesBeforeCurrent).toEqual(['v1.5.0', 'v1.4.0'])
    })
  })
})
