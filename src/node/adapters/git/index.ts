/**
 * Git Adapter Module
 *
 * Usage:
 * ```typescript
 * import { getGitAdapter } from './adapters/git'
 *
 * const git = getGitAdapter()
 * const sha = await git.resolveRef(repoPath, 'refs/heads/main')
 * ```
 */

export { getGitAdapter } from './factory'

export type { GitAdapter, RemoteRef } from './interface'

export { SimpleGitAdapter } from './SimpleGitAdapter'

export { createGitFetchJob, qualifyRef } from './GitFetchJob'
export { parseRefChangeLine, readRefChanges, resolveRefChange } from './RefChangeSource'
