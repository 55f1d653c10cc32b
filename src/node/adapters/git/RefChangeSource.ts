/**
 * RefChangeSource - Where the notifier learns which refs changed
 *
 * A post-receive style hook feeds `<old> <new> <ref>` lines on stdin; when
 * run by hand, refs are named on the command line and resolved locally.
 */

import type { Readable } from 'stream'
import { createInterface } from 'readline'
import { NULL_VALUE, type RefChange } from '@shared/types'
import { ValidationError } from '../../shared/errors'
import type { GitAdapter } from './interface'

const SHA_PATTERN = /^[0-9a-f]{40}$/

function toValue(sha: string): string | null {
  return sha === NULL_VALUE ? null : sha
}

/**
 * Parses one `<old> <new> <ref>` line.
 */
export function parseRefChangeLine(line: string): RefChange {
  const parts = line.trim().split(/\s+/)
  if (parts.length !== 3) {
    throw new ValidationError(`Malformed ref update line: "${line}"`, 'line')
  }

  const [oldValue, newValue, ref] = parts
  if (!SHA_PATTERN.test(oldValue) || !SHA_PATTERN.test(newValue)) {
    throw new ValidationError(`Invalid object name in ref update line: "${line}"`, 'line')
  }

  return { ref, oldValue: toValue(oldValue), newValue: toValue(newValue) }
}

/**
 * Yields one RefChange per non-blank input line.
 */
export async function* readRefChanges(input: Readable): AsyncGenerator<RefChange> {
  const lines = createInterface({ input, crlfDelay: Infinity })

  for await (const line of lines) {
    if (!line.trim()) continue
    yield parseRefChangeLine(line)
  }
}

/**
 * Builds a RefChange for a ref named on the command line. `sha` defaults
 * to the ref's current local value; a ref that does not resolve is
 * reported as deleted.
 */
export async function resolveRefChange(
  git: GitAdapter,
  repoPath: string,
  ref: string,
  sha?: string
): Promise<RefChange> {
  if (sha !== undefined && !SHA_PATTERN.test(sha)) {
    throw new ValidationError(`Invalid object name for ${ref}: "${sha}"`, 'sha')
  }

  const newValue = sha ?? (await git.resolveRef(repoPath, ref))
  return { ref, oldValue: null, newValue: newValue === null ? null : toValue(newValue) }
}
