export { notifyFailure, SendmailNotifier } from './FailureNotifier'
export type { FailureNotifier, SendmailNotifierOptions } from './FailureNotifier'
export { ProgressLog } from './ProgressLog'
export type { LineWriter, ProgressLogOptions } from './ProgressLog'
export { TrackedBranchRegistry } from './TrackedBranchRegistry'
export type {
  TrackedBranchDefinition,
  TrackedBranchLookup,
  TriggerResult,
  UpdateScheduler
} from './TrackedBranchRegistry'
export { JobQueueScheduler } from './UpdateScheduler'
export type { UpdateJob } from './UpdateScheduler'
