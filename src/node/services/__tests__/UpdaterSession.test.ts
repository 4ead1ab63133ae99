import { describe, expect, it, vi } from 'vitest'
import { HEAD_MOVING_FLAGS, UpdaterSession, WORKING_TREE_FLAGS } from '../UpdaterSession'

describe('UpdaterSession', () => {
  it('starts from the initial state', () => {
    const session = new UpdaterSession()

    expect(session.state.branch).toBe('unknown')
    expect(session.state.versionMode).toBe('latest')
    expect(session.state.lastCheckTime).toBeNull()
    expect(session.isBusy('isUpdating')).toBe(false)
  })

  it('patches without touching other fields', () => {
    const session = new UpdaterSession()
    session.patch({ branch: 'main', behindCount: 3 })
    session.patch({ aheadCount: 1 })

    expect(session.state.branch).toBe('main')
    expect(session.state.behindCount).toBe(3)
    expect(session.state.aheadCount).toBe(1)
  })

  it('hands out snapshots detached from the session', () => {
    const session = new UpdaterSession()
    session.patch({ commitsInBranch: { abc1234: true } })

    const snapshot = session.snapshot()
    snapshot.commitsInBranch.abc1234 = false
    snapshot.branch = 'changed'

    expect(session.state.commitsInBranch).toEqual({ abc1234: true })
    expect(session.state.branch).toBe('unknown')
  })

  describe('withExclusiveFlag', () => {
    it('sets the flag while running and clears it afterwards', async () => {
      const session = new UpdaterSession()
      let seen = false

      const result = await session.withExclusiveFlag('isUpdating', [], 'busy', async () => {
        seen = session.isBusy('isUpdating')
        return 'done'
      })

      expect(result).toBe('done')
      expect(seen).toBe(true)
      expect(session.isBusy('isUpdating')).toBe(false)
    })

    it('returns the busy value without running when the flag is set', async () => {
      const session = new UpdaterSession()
      let inner: string | null = null

      await session.withExclusiveFlag('isRefreshing', [], 'busy', async () => {
        inner = await session.withExclusiveFlag('isRefreshing', [], 'busy', async () => 'ran')
        return 'outer'
      })

      expect(inner).toBe('busy')
    })

    it('returns the busy value while a blocker is set', async () => {
      const session = new UpdaterSession()
      const run = vi.fn(async () => 'ran')

      const inner = await session.withExclusiveFlag('isRefreshing', [], 'busy', async () =>
        session.withExclusiveFlag('isUpdating', WORKING_TREE_FLAGS, 'busy', run)
      )

      expect(inner).toBe('busy')
      expect(run).not.toHaveBeenCalled()
      expect(session.isBusy('isUpdating')).toBe(false)
    })

    it('runs when only flags outside the blockers are set', async () => {
      const session = new UpdaterSession()

      const inner = await session.withExclusiveFlag('isInstallingPlugins', [], 'busy', async () =>
        session.withExclusiveFlag('isRefreshing', HEAD_MOVING_FLAGS, 'busy', async () => 'ran')
      )

      expect(inner).toBe('ran')
    })

    it('clears the flag when run throws', async () => {
      const session = new UpdaterSession()

      await expect(
        session.withExclusiveFlag('isSwitchingVersion', WORKING_TREE_FLAGS, 'busy', async () => {
          throw new Error('boom')
        })
      ).rejects.toThrow('boom')
      expect(session.isBusy('isSwitchingVersion')).toBe(false)
    })
  })

  it('reports whether any of several flags is set', () => {
    const session = new UpdaterSession()
    expect(session.isAnyBusy(HEAD_MOVING_FLAGS)).toBe(false)

    session.patch({ isSwitchingVersion: true })

    expect(session.isAnyBusy(HEAD_MOVING_FLAGS)).toBe(true)
    expect(session.isAnyBusy(['isRefreshing', 'isInstallingPlugins'])).toBe(false)
  })

  it('clears the recently-updated markers', () => {
    const session = new UpdaterSession()
    session.patch({ recentlyUpdatedRepo: true, recentlyUpdatedPlugins: true })

    session.clearRecentUpdates()

    expect(session.state.recentlyUpdatedRepo).toBe(false)
    expect(session.state.recentlyUpdatedPlugins).toBe(false)
  })
})
