/**
 * Default update job: mirror the remote ref into the tracked local branch.
 * Fetches from the locator the branch was registered with. The logged value
 * is the one ls-remote advertised before the fetch.
 */

import type { LogEntry, TrackedBranch } from '@shared/types'
import type { UpdateJob } from '../../services/UpdateScheduler'
import type { GitAdapter } from './interface'

export function qualifyRef(name: string): string {
  return name.startsWith('refs/') ? name : `refs/heads/${name}`
}

export function createGitFetchJob(git: GitAdapter, repoPath: string): UpdateJob {
  return async (branch: TrackedBranch): Promise<LogEntry> => {
    const ref = qualifyRef(branch.name)
    const advertised = await git.lsRemote(repoPath, branch.url, ref)
    const match = advertised.find((entry) => entry.ref === ref)

    if (!match) {
      return {
        value: null,
        hookOutput: `${ref} not found in ${branch.url}`,
        successful: false
      }
    }

    try {
      const output = await git.fetchInto(repoPath, branch.url, ref, branch.branch)
      return {
        value: match.sha,
        hookOutput: output.trim() || `Updated ${branch.branch} to ${match.sha}.`,
        successful: true
      }
    } catch (error) {
      return {
        value: match.sha,
        hookOutput: error instanceof Error ? error.message : String(error),
        successful: false
      }
    }
  }
}
