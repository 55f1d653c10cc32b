export { HookRunOperation } from './HookRunOperation'
export type { HookRunDependencies, HookRunInput } from './HookRunOperation'
export { formatReview, NotifyOperation, systemClock } from './NotifyOperation'
export type {
  BatchResult,
  Clock,
  CycleOutcome,
  NotifyDependencies,
  NotifyOptions,
  RefFailure
} from './NotifyOperation'
