import { describe, expect, it } from 'vitest'
import { FakeProcessRunner, TEST_REPO, processResult } from '../../../../__tests__/fakes'
import { ProcessError, SpawnError } from '../../../../shared/errors'
import { GhCliReleaseSource } from '../GhCliReleaseSource'

describe('GhCliReleaseSource', () => {
  describe('isAvailable', () => {
    it('is true when gh runs', async () => {
      const runner = new FakeProcessRunner()
      runner.run.mockResolvedValue(processResult('gh version 2.40.0'))

      expect(await new GhCliReleaseSource(runner, TEST_REPO).isAvailable()).toBe(true)
      expect(runner.run).toHaveBeenCalledWith('gh', ['--version'], expect.objectContaining({ cwd: TEST_REPO }))
    })

    it('is false when gh is not installed', async () => {
      const runner = new FakeProcessRunner()
      runner.run.mockRejectedValue(new SpawnError('spawn gh ENOENT', 'gh'))

      expect(await new GhCliReleaseSource(runner, TEST_REPO).isAvailable()).toBe(false)
    })

    it('rethrows other failures', async () => {
      const runner = new FakeProcessRunner()
      runner.run.mockRejectedValue(new Error('boom'))

      await expect(new GhCliReleaseSource(runner, TEST_REPO).isAvailable()).rejects.toThrow('boom')
    })
  })

  describe('listReleases', () => {
    it('parses gh api output', async () => {
      const runner = new FakeProcessRunner()
      runner.run.mockResolvedValue(
        processResult(JSON.stringify([{ tag_name: 'v2.0.0', name: 'Two', draft: true }]))
      )
      const source = new GhCliReleaseSource(runner, TEST_REPO)

      const releases = await source.listReleases('octo', 'dotfiles')

      expect(runner.run).toHaveBeenCalledWith(
        'gh',
        ['api', 'repos/octo/dotfiles/releases'],
        expect.objectContaining({ cwd: TEST_REPO })
      )
      expect(releases).toHaveLength(1)
      expect(releases[0]?.tag).toBe('v2.0.0')
      expect(releases[0]?.name).toBe('Two')
      expect(releases[0]?.draft).toBe(true)
    })

    it('throws a ProcessError on a non-zero exit', async () => {
      const runner = new FakeProcessRunner()
      runner.run.mockResolvedValue(processResult('', 1, 'HTTP 401: Bad credentials\n'))
      const source = new GhCliReleaseSource(runner, TEST_REPO)

      const error = await source.listReleases('octo', 'dotfiles').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ProcessError)
      if (error instanceof ProcessError) {
        expect(error.message).toBe('gh api repos/octo/dotfiles/releases exited with 1')
        expect(error.stderr).toBe('HTTP 401: Bad credentials')
      }
    })

    it('throws when the output is not JSON', async () => {
      const runner = new FakeProcessRunner()
      runner.run.mockResolvedValue(processResult('not json'))
      const source = new GhCliReleaseSource(runner, TEST_REPO)

      await expect(source.listReleases('octo', 'dotfiles')).rejects.toThrow('Could not parse gh api output')
    })
  })
})
