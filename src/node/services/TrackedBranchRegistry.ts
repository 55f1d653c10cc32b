/**
 * TrackedBranchRegistry - Server-side state of tracked branches
 *
 * Owns every TrackedBranch and LogEntry. Callers get snapshots; state only
 * changes through the methods below. Flag transitions are check-and-set
 * within a single synchronous call, so concurrent triggers for the same
 * branch cannot both schedule an update.
 *
 * Lifecycle of one update:
 *   idle --triggerUpdate--> pending --beginUpdate--> updating --completeUpdate--> idle
 */

import { log } from '@shared/logger'
import type {
  LogEntry,
  NormalizedIdentity,
  ReviewSummary,
  TrackedBranch
} from '@shared/types'
import { IdentityNormalizer } from '../domain/IdentityNormalizer'
import { ValidationError } from '../shared/errors'

export type TrackedBranchDefinition = {
  /** Remote repository locator; normalized on registration */
  remote: string
  /** Remote ref name; normalized on registration */
  name: string
  /** Local branch the remote ref is mirrored into */
  branch: string
  review?: ReviewSummary
  disabled?: boolean
}

export type TriggerResult =
  | { triggered: true }
  | { triggered: false; reason: 'not_found' | 'disabled' | 'pending' | 'updating' }

/**
 * Performs updates asynchronously. `schedule` must not wait for the update.
 */
export interface UpdateScheduler {
  schedule(branch: TrackedBranch): void
}

/**
 * What the update endpoint needs from the registry.
 */
export interface TrackedBranchLookup {
  lookup(identity: NormalizedIdentity): TrackedBranch | null
  getLogEntry(branch: TrackedBranch, value: string): LogEntry | null
  triggerUpdate(branch: TrackedBranch): TriggerResult
}

type StoredBranch = {
  id: number
  url: string
  remote: string
  name: string
  branch: string
  review?: ReviewSummary
  disabled: boolean
  pending: boolean
  updating: boolean
  log: LogEntry[]
}

function snapshot(stored: StoredBranch): TrackedBranch {
  return {
    ...stored,
    review: stored.review ? { ...stored.review } : undefined,
    log: [...stored.log]
  }
}

export class TrackedBranchRegistry implements TrackedBranchLookup {
  private readonly branches = new Map<number, StoredBranch>()
  private readonly idsByKey = new Map<string, number>()
  private nextId = 1
  private scheduler: UpdateScheduler | null = null

  /**
   * Sets where triggered updates are handed off to.
   */
  setScheduler(scheduler: UpdateScheduler): void {
    this.scheduler = scheduler
  }

  register(definition: TrackedBranchDefinition): TrackedBranch {
    const identity = IdentityNormalizer.normalize(definition.remote, definition.name)
    const key = IdentityNormalizer.toKey(identity)

    if (this.idsByKey.has(key)) {
      throw new ValidationError(
        `${identity.remote} ${identity.name} is already tracked`,
        'remote'
      )
    }

    const stored: StoredBranch = {
      id: this.nextId++,
      url: definition.remote,
      remote: identity.remote,
      name: identity.name,
      branch: definition.branch,
      review: definition.review ? { ...definition.review } : undefined,
      disabled: definition.disabled ?? false,
      pending: false,
      updating: false,
      log: []
    }

    this.branches.set(stored.id, stored)
    this.idsByKey.set(key, stored.id)
    return snapshot(stored)
  }

  list(): TrackedBranch[] {
    return [...this.branches.values()].map(snapshot)
  }

  get(id: number): TrackedBranch | null {
    const stored = this.branches.get(id)
    return stored ? snapshot(stored) : null
  }

  lookup(identity: NormalizedIdentity): TrackedBranch | null {
    const id = this.idsByKey.get(IdentityNormalizer.toKey(identity))
    return id === undefined ? null : this.get(id)
  }

  /**
   * Latest completed attempt for exactly this target value.
   */
  getLogEntry(branch: TrackedBranch, value: string): LogEntry | null {
    const entries = this.branches.get(branch.id)?.log ?? []
    for (let index = entries.length - 1; index >= 0; index--) {
      if (entries[index].value === value) {
        return entries[index]
      }
    }
    return null
  }

  /**
   * Marks the branch pending and hands it to the scheduler, unless it is
   * disabled or an update is already pending or running.
   */
  triggerUpdate(branch: TrackedBranch): TriggerResult {
    const stored = this.branches.get(branch.id)
    if (!stored) return { triggered: false, reason: 'not_found' }
    if (stored.disabled) return { triggered: false, reason: 'disabled' }
    if (stored.pending) return { triggered: false, reason: 'pending' }
    if (stored.updating) return { triggered: false, reason: 'updating' }

    stored.pending = true

    if (this.scheduler) {
      this.scheduler.schedule(snapshot(stored))
    } else {
      log.warn(`[TrackedBranchRegistry] No scheduler set; ${stored.branch} stays pending`)
    }

    return { triggered: true }
  }

  /**
   * pending -> updating. Returns false if the branch was not pending.
   */
  beginUpdate(id: number): boolean {
    const stored = this.branches.get(id)
    if (!stored || !stored.pending) {
      return false
    }

    stored.pending = false
    stored.updating = true
    return true
  }

  /**
   * updating -> idle, recording the attempt.
   */
  completeUpdate(id: number, entry: LogEntry): void {
    const stored = this.branches.get(id)
    if (!stored) {
      throw new ValidationError(`Unknown tracked branch ${id}`, 'id')
    }

    stored.updating = false
    stored.log.push({ ...entry })
  }

  setDisabled(id: number, disabled: boolean): void {
    const stored = this.branches.get(id)
    if (!stored) {
      throw new ValidationError(`Unknown tracked branch ${id}`, 'id')
    }

    stored.disabled = disabled
  }
}
