/**
 * SimpleGitAdapter Tests
 *
 * simple-git is mocked; these check argument shapes and output parsing.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest'

const git = vi.hoisted(() => ({
  listConfig: vi.fn(),
  revparse: vi.fn(),
  listRemote: vi.fn(),
  raw: vi.fn()
}))

vi.mock('simple-git', () => ({
  default: vi.fn(() => git)
}))

vi.mock('@shared/logger', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}))

import simpleGit from 'simple-git'
import { GitOperationError } from '../../../shared/errors'
import { getGitAdapter } from '../factory'
import { SimpleGitAdapter } from '../SimpleGitAdapter'

const SHA = 'a'.repeat(40)

describe('SimpleGitAdapter', () => {
  let adapter: SimpleGitAdapter

  beforeEach(() => {
    vi.clearAllMocks()
    adapter = new SimpleGitAdapter()
  })

  describe('listConfig', () => {
    it('keeps keys under the prefix and takes the last of repeated values', async () => {
      git.listConfig.mockResolvedValue({
        all: {
          'user.name': 'Alice',
          'tracker.url': 'https://tracker.example.com',
          'tracker.repository': ['first', 'second']
        }
      })

      const values = await adapter.listConfig('/repo', 'tracker.')

      expect(simpleGit).toHaveBeenCalledWith('/repo')
      expect(values).toEqual({
        'tracker.url': 'https://tracker.example.com',
        'tracker.repository': 'second'
      })
    })

    it('wraps failures in GitOperationError', async () => {
      git.listConfig.mockRejectedValue(new Error('not a git repository'))

      const error = await adapter.listConfig('/repo', 'tracker.').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(GitOperationError)
      expect(error).toMatchObject({
        operation: 'listConfig',
        message: '[SimpleGitAdapter] listConfig failed: not a git repository'
      })
    })
  })

  describe('resolveRef', () => {
    it('returns the trimmed SHA', async () => {
      git.revparse.mockResolvedValue(`${SHA}\n`)

      await expect(adapter.resolveRef('/repo', 'refs/heads/main')).resolves.toBe(SHA)
      expect(git.revparse).toHaveBeenCalledWith([
        '--verify',
        '--quiet',
        'refs/heads/main^{commit}'
      ])
    })

    it('returns null for refs that do not resolve', async () => {
      git.revparse.mockRejectedValue(new Error('fatal: Needed a single revision'))

      await expect(adapter.resolveRef('/repo', 'refs/heads/gone')).resolves.toBeNull()
    })
  })

  describe('lsRemote', () => {
    it('parses tab-separated output', async () => {
      git.listRemote.mockResolvedValue(`${SHA}\trefs/heads/main\n${'b'.repeat(40)}\trefs/heads/main-2\n`)

      const refs = await adapter.lsRemote('/repo', 'origin', 'refs/heads/main')

      expect(git.listRemote).toHaveBeenCalledWith(['origin', 'refs/heads/main'])
      expect(refs).toEqual([
        { ref: 'refs/heads/main', sha: SHA },
        { ref: 'refs/heads/main-2', sha: 'b'.repeat(40) }
      ])
    })

    it('returns an empty list when nothing matches', async () => {
      git.listRemote.mockResolvedValue('')

      await expect(adapter.lsRemote('/repo', 'origin', 'refs/heads/none')).resolves.toEqual([])
    })
  })

  describe('fetchInto', () => {
    it('force-fetches the ref into the local branch', async () => {
      git.raw.mockResolvedValue('From origin\n')

      await expect(
        adapter.fetchInto('/repo', 'origin', 'refs/heads/main', 'mirror/main')
      ).resolves.toBe('From origin\n')
      expect(git.raw).toHaveBeenCalledWith([
        'fetch',
        '--force',
        'origin',
        'refs/heads/main:refs/heads/mirror/main'
      ])
    })

    it('wraps failures in GitOperationError', async () => {
      git.raw.mockRejectedValue(new Error('could not read from remote'))

      await expect(
        adapter.fetchInto('/repo', 'origin', 'refs/heads/main', 'mirror/main')
      ).rejects.toThrow('[SimpleGitAdapter] fetchInto failed: could not read from remote')
    })
  })
})

describe('getGitAdapter', () => {
  it('returns one shared simple-git adapter', () => {
    const adapter = getGitAdapter()

    expect(adapter).toBeInstanceOf(SimpleGitAdapter)
    expect(getGitAdapter()).toBe(adapter)
  })
})
