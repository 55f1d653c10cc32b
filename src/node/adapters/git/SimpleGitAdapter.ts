/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git, which drives the native Git
 * CLI under the hood.
 */

import { log } from '@shared/logger'
import simpleGit, { type SimpleGit } from 'simple-git'
import { GitOperationError } from '../../shared/errors'
import type { GitAdapter, RemoteRef } from './interface'

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir: string): SimpleGit {
    return simpleGit(dir)
  }

  async listConfig(dir: string, prefix: string): Promise<Record<string, string>> {
    try {
      const git = this.createGit(dir)
      const result = await git.listConfig()
      const values: Record<string, string> = {}

      for (const [key, value] of Object.entries(result.all)) {
        if (!key.startsWith(prefix)) continue
        // Multi-valued keys come back as arrays; the last one wins, as in git
        values[key] = Array.isArray(value) ? (value[value.length - 1] ?? '') : value
      }

      return values
    } catch (error) {
      throw this.createError('listConfig', error)
    }
  }

  async resolveRef(dir: string, ref: string): Promise<string | null> {
    try {
      const git = this.createGit(dir)
      const result = await git.revparse(['--verify', '--quiet', `${ref}^{commit}`])
      return result.trim() || null
    } catch (error) {
      log.debug(`[SimpleGitAdapter] rev-parse failed for ${ref}:`, error)
      return null
    }
  }

  async lsRemote(dir: string, remote: string, ref: string): Promise<RemoteRef[]> {
    try {
      const git = this.createGit(dir)
      const output = await git.listRemote([remote, ref])
      const refs: RemoteRef[] = []

      // Format: sha + tab + refname
      for (const line of output.trim().split('\n')) {
        if (!line) continue
        const [sha, refName] = line.split('\t')
        if (sha && refName) {
          refs.push({ ref: refName, sha })
        }
      }

      return refs
    } catch (error) {
      throw this.createError('lsRemote', error)
    }
  }

  async fetchInto(dir: string, remote: string, ref: string, branch: string): Promise<string> {
    try {
      const git = this.createGit(dir)
      return await git.raw(['fetch', '--force', remote, `${ref}:refs/heads/${branch}`])
    } catch (error) {
      throw this.createError('fetchInto', error)
    }
  }

  private createError(operation: string, originalError: unknown): GitOperationError {
    const message = originalError instanceof Error ? originalError.message : String(originalError)
    return new GitOperationError(
      `[SimpleGitAdapter] ${operation} failed: ${message}`,
      operation,
      originalError
    )
  }
}
