import { z } from 'zod'

/** Ref value used on the wire for a missing commit (created or deleted refs). */
export const NULL_VALUE = '0'.repeat(40)

export const refValueSchema = z.string().regex(/^[0-9a-f]{40}$/, 'Expected a 40 character hex SHA')

/**
 * One updated ref, as reported by the invoking hook.
 * `null` stands for "no commit" on either side.
 */
export type RefChange = {
  readonly ref: string
  readonly oldValue: string | null
  readonly newValue: string | null
}

/**
 * Canonical key of a tracked branch.
 */
export type NormalizedIdentity = {
  remote: string
  name: string
}

export type ReviewSummary = {
  id: number
  summary: string
}

// ============================================================================
// Wire format
// ============================================================================

export const updateRequestSchema = z.object({
  remote: z.string().min(1),
  name: z.string().min(1),
  value: refValueSchema,
  trigger: z.boolean().optional(),
  username: z.string().optional(),
  disable_remote_transform: z.boolean().optional()
})

export type UpdateRequest = z.infer<typeof updateRequestSchema>

export const reviewSummarySchema = z.object({
  id: z.number().int(),
  summary: z.string()
})

/**
 * Successful reply. Apart from `update_successful`, a field's presence is
 * what carries meaning; absent means "not currently true".
 */
export const okResponseSchema = z.object({
  status: z.literal('ok'),
  branch: z.string().optional(),
  review: reviewSummarySchema.optional(),
  update_ongoing: z.unknown().optional(),
  disabled: z.unknown().optional(),
  update_pending: z.unknown().optional(),
  update_triggered: z.unknown().optional(),
  hook_output: z.string().optional(),
  update_successful: z.boolean().optional(),
  debug: z.string().optional()
})

export const errorResponseSchema = z.object({
  status: z.literal('error'),
  error: z.string()
})

export const updateResponseSchema = z.discriminatedUnion('status', [
  okResponseSchema,
  errorResponseSchema
])

export type OkResponse = z.infer<typeof okResponseSchema>
export type ErrorResponse = z.infer<typeof errorResponseSchema>
export type UpdateResponse = z.infer<typeof updateResponseSchema>

// ============================================================================
// Server-side entities
// ============================================================================

/**
 * Record of one completed update attempt for a specific target value.
 * `value` is null when the attempt never learned which value it targeted;
 * such entries are never returned for a lookup by value.
 */
export type LogEntry = {
  readonly value: string | null
  readonly hookOutput: string
  readonly successful: boolean
}

/**
 * Snapshot of a tracked branch as held by the registry.
 */
export type TrackedBranch = {
  readonly id: number
  /** Locator as registered; where updates are fetched from */
  readonly url: string
  readonly remote: string
  readonly name: string
  /** Local branch the remote ref is mirrored into */
  readonly branch: string
  readonly review?: ReviewSummary
  readonly disabled: boolean
  readonly pending: boolean
  readonly updating: boolean
  readonly log: readonly LogEntry[]
}
