/**
 * NotifyOperation - Tells the tracking service about updated refs
 *
 * For each ref: send one triggering request, then (for branches attached to
 * a review) poll until the update's log entry shows up, the job disappears,
 * or the update deadline passes. Refs are handled one at a time.
 *
 * Fatal for a ref: a timeout on the triggering request, a rejected request,
 * and transport or protocol failures. Timeouts while polling are not.
 */

import {
  NULL_VALUE,
  type NormalizedIdentity,
  type OkResponse,
  type RefChange,
  type ReviewSummary,
  type UpdateRequest
} from '@shared/types'
import type { UpdateSender } from '../adapters/tracker/UpdateRequestClient'
import { IdentityNormalizer } from '../domain/IdentityNormalizer'
import type { ProgressLog } from '../services/ProgressLog'
import { POLL_INTERVAL_MS, TRIGGER_GRACE_MS } from '../shared/constants'
import { ServerRejectedError, TransportTimeoutError } from '../shared/errors'

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms))
}

export type CycleOutcome =
  | { kind: 'untracked' }
  | { kind: 'disabled' }
  | { kind: 'ongoing' }
  | { kind: 'pending' }
  /** Triggered for a branch without a review; not waited for */
  | { kind: 'scheduled' }
  /** Tracked, but nothing was reported as happening */
  | { kind: 'idle' }
  | { kind: 'completed'; hookOutput: string; successful: boolean }
  | { kind: 'completed-without-output' }
  | { kind: 'timeout' }

export type NotifyOptions = {
  /** Remote locator of this repository, as the service knows it */
  repository: string
  connectionTimeoutMs: number
  updateTimeoutMs: number
  username?: string
  /** Send the locator as-is and ask the service not to transform it */
  disableRemoteTransform?: boolean
  /** Keep processing the remaining refs after a fatal failure */
  continueOnFailure?: boolean
}

export type NotifyDependencies = {
  sender: UpdateSender
  progress: ProgressLog
  clock?: Clock
}

export type RefFailure = {
  change: RefChange
  error: Error
}

export type BatchResult = {
  outcomes: Array<{ change: RefChange; outcome: CycleOutcome }>
  failures: RefFailure[]
  /** True if a failure stopped the batch before every ref was seen */
  aborted: boolean
}

export function formatReview(review: ReviewSummary): string {
  return `r/${review.id} "${review.summary}"`
}

export class NotifyOperation {
  private readonly sender: UpdateSender
  private readonly progress: ProgressLog
  private readonly clock: Clock

  constructor(
    deps: NotifyDependencies,
    private readonly options: NotifyOptions
  ) {
    this.sender = deps.sender
    this.progress = deps.progress
    this.clock = deps.clock ?? systemClock
  }

  /**
   * Processes refs in order. Unless `continueOnFailure` is set, the first
   * fatal failure stops the batch and later refs are never sent.
   */
  async notifyAll(changes: Iterable<RefChange> | AsyncIterable<RefChange>): Promise<BatchResult> {
    const result: BatchResult = { outcomes: [], failures: [], aborted: false }

    for await (const change of changes) {
      try {
        const outcome = await this.notifyRef(change)
        result.outcomes.push({ change, outcome })
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error))
        this.progress.error(`${change.ref}: ${failure.message}`)
        this.progress.debug('Exception:')
        this.progress.debug(failure.stack ?? failure.message)
        result.failures.push({ change, error: failure })

        if (!this.options.continueOnFailure) {
          result.aborted = true
          break
        }
      }
    }

    return result
  }

  /**
   * Runs one trigger-then-poll cycle for a single ref.
   */
  async notifyRef(change: RefChange): Promise<CycleOutcome> {
    const identity = this.resolveIdentity(change.ref)
    const value = change.newValue ?? NULL_VALUE

    const cycleStart = this.clock.now()
    const connectDeadline = cycleStart + this.options.connectionTimeoutMs

    let response: OkResponse
    try {
      response = await this.exchange(
        this.buildRequest(identity, value, true),
        connectDeadline - this.clock.now() + TRIGGER_GRACE_MS
      )
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        const seconds = Math.round(this.options.connectionTimeoutMs / 1000)
        this.progress.error(`Timeout (${seconds}s) while notifying tracker!`)
      }
      throw error
    }

    if (response.review !== undefined) {
      this.progress.progress(`Review: ${formatReview(response.review)}`)
    } else if (response.branch !== undefined) {
      this.progress.progress(`Tracked branch: ${response.branch}`)
    } else {
      this.progress.debug('Nothing to update!')
      return { kind: 'untracked' }
    }

    if (response.disabled !== undefined) {
      this.progress.progress('Tracking is disabled!')
      return { kind: 'disabled' }
    }
    if (response.update_ongoing !== undefined) {
      this.progress.progress('Update already in progress.')
      return { kind: 'ongoing' }
    }
    if (response.update_pending !== undefined) {
      this.progress.progress('Update already scheduled.')
      return { kind: 'pending' }
    }
    if (response.update_triggered === undefined) {
      return { kind: 'idle' }
    }
    if (response.review === undefined) {
      this.progress.progress('Update scheduled.')
      return { kind: 'scheduled' }
    }

    this.progress.progress('Update triggered; waiting for it to complete...')
    return this.poll(identity, value, cycleStart + this.options.updateTimeoutMs)
  }

  private async poll(
    identity: NormalizedIdentity,
    value: string,
    overallDeadline: number
  ): Promise<CycleOutcome> {
    await this.clock.sleep(POLL_INTERVAL_MS)

    while (this.clock.now() < overallDeadline) {
      let response: OkResponse
      try {
        response = await this.exchange(
          this.buildRequest(identity, value, false),
          overallDeadline - this.clock.now()
        )
      } catch (error) {
        if (error instanceof TransportTimeoutError) {
          break
        }
        throw error
      }

      if (response.hook_output !== undefined) {
        const successful = response.update_successful === true
        if (!successful) {
          this.progress.error('Tracker rejected the update!')
        }
        this.progress.hook(response.hook_output)
        return { kind: 'completed', hookOutput: response.hook_output, successful }
      }

      if (response.update_ongoing === undefined && response.update_pending === undefined) {
        this.progress.progress('Update completed without output.')
        return { kind: 'completed-without-output' }
      }

      const remaining = overallDeadline - this.clock.now()
      if (remaining > 0) {
        await this.clock.sleep(Math.min(POLL_INTERVAL_MS, remaining))
      }
    }

    this.progress.progress('Timeout while waiting for update to complete.')
    return { kind: 'timeout' }
  }

  private resolveIdentity(ref: string): NormalizedIdentity {
    if (this.options.disableRemoteTransform) {
      return {
        remote: this.options.repository,
        name: IdentityNormalizer.normalizeName(ref)
      }
    }
    return IdentityNormalizer.normalize(this.options.repository, ref)
  }

  private buildRequest(identity: NormalizedIdentity, value: string, trigger: boolean): UpdateRequest {
    const request: UpdateRequest = { remote: identity.remote, name: identity.name, value }
    if (trigger) {
      request.trigger = true
    }
    if (this.options.username) {
      request.username = this.options.username
    }
    if (this.options.disableRemoteTransform) {
      request.disable_remote_transform = true
    }
    return request
  }

  /**
   * One exchange; a rejected request becomes a ServerRejectedError.
   */
  private async exchange(request: UpdateRequest, timeoutMs: number): Promise<OkResponse> {
    this.progress.debugJson(request)
    const result = await this.sender.send(request, timeoutMs)

    if (result.status === 'rejected') {
      throw new ServerRejectedError(result.message)
    }

    this.progress.debugJson(result.response)
    return result.response
  }
}
