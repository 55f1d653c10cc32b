/**
 * Git Adapter Factory
 *
 * Single place where the git backend is chosen and cached.
 */

import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

let cachedAdapter: GitAdapter | null = null

export function getGitAdapter(): GitAdapter {
  if (!cachedAdapter) {
    cachedAdapter = new SimpleGitAdapter()
  }
  return cachedAdapter
}
