/**
 * Git Adapter Interface
 *
 * The git operations the notifier and the update jobs rely on. Business
 * logic talks to this interface so it can be exercised without a real
 * repository.
 */

/**
 * One line of `git ls-remote` output.
 */
export type RemoteRef = {
  ref: string
  sha: string
}

export interface GitAdapter {
  /**
   * Adapter name for logging/debugging
   */
  readonly name: string

  /**
   * Config values whose key starts with `prefix` (keys as git reports
   * them, i.e. lowercased section and variable names). Multi-valued keys
   * yield their last value.
   */
  listConfig(dir: string, prefix: string): Promise<Record<string, string>>

  /**
   * Resolves a ref to a commit SHA, or null if it does not exist.
   */
  resolveRef(dir: string, ref: string): Promise<string | null>

  /**
   * Refs advertised by `remote` matching `ref`.
   */
  lsRemote(dir: string, remote: string, ref: string): Promise<RemoteRef[]>

  /**
   * Force-fetches `ref` from `remote` into the local branch. Returns git's
   * combined output.
   */
  fetchInto(dir: string, remote: string, ref: string, branch: string): Promise<string>
}
