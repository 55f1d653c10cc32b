/**
 * JobQueueScheduler - Runs tracked-branch updates in the background
 *
 * A scheduled branch starts on a later tick, so the request that triggered
 * it can observe the pending state. The registry guarantees at most one job
 * per branch, so a branch triggered again the moment its update completes
 * gets a job of its own.
 */

import { log } from '@shared/logger'
import type { LogEntry, TrackedBranch } from '@shared/types'
import type { TrackedBranchRegistry, UpdateScheduler } from './TrackedBranchRegistry'

/**
 * Brings one tracked branch up to date and reports what happened.
 */
export type UpdateJob = (branch: TrackedBranch) => Promise<LogEntry>

export class JobQueueScheduler implements UpdateScheduler {
  private readonly running = new Set<Promise<void>>()

  constructor(
    private readonly registry: TrackedBranchRegistry,
    private readonly job: UpdateJob
  ) {}

  schedule(branch: TrackedBranch): void {
    const run: Promise<void> = this.run(branch)
      .catch((error) => {
        log.error(`[JobQueueScheduler] Update of ${branch.branch} failed to record:`, error)
      })
      .finally(() => {
        this.running.delete(run)
      })

    this.running.add(run)
  }

  /** Number of jobs currently scheduled or running */
  get size(): number {
    return this.running.size
  }

  /**
   * Resolves once every job scheduled so far has finished.
   */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running])
    }
  }

  private async run(branch: TrackedBranch): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve))

    if (!this.registry.beginUpdate(branch.id)) {
      log.warn(`[JobQueueScheduler] ${branch.branch} is no longer pending; skipping`)
      return
    }

    log.info(`[JobQueueScheduler] Updating ${branch.branch} from ${branch.remote} ${branch.name}`)

    let entry: LogEntry
    try {
      entry = await this.job(branch)
    } catch (error) {
      log.error(`[JobQueueScheduler] Update of ${branch.branch} threw:`, error)
      entry = {
        value: null,
        hookOutput: error instanceof Error ? error.message : String(error),
        successful: false
      }
    }

    this.registry.completeUpdate(branch.id, entry)
    const outcome = entry.successful ? 'updated' : 'failed'
    log.info(`[JobQueueScheduler] ${branch.branch} ${outcome} at ${entry.value ?? 'unknown value'}`)
  }
}
