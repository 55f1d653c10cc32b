/**
 * Update Handler - Decides the reply to one update request
 *
 * Pure with respect to transport: takes the decoded body and the registry,
 * returns either a success payload or an error message. The HTTP layer
 * only frames the result.
 */

import { log } from '@shared/logger'
import {
  updateRequestSchema,
  type NormalizedIdentity,
  type OkResponse,
  type UpdateRequest,
  type UpdateResponse
} from '@shared/types'
import { IdentityNormalizer } from '../domain/IdentityNormalizer'
import type { TrackedBranchLookup } from '../services/TrackedBranchRegistry'

export type HandlerResult = { ok: true; response: OkResponse } | { ok: false; error: string }

function resolveIdentity(request: UpdateRequest): NormalizedIdentity {
  if (request.disable_remote_transform) {
    return {
      remote: request.remote,
      name: IdentityNormalizer.normalizeName(request.name)
    }
  }
  return IdentityNormalizer.normalize(request.remote, request.name)
}

export function handleUpdateRequest(body: unknown, registry: TrackedBranchLookup): HandlerResult {
  const parsed = updateRequestSchema.safeParse(body)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    return { ok: false, error: `Invalid request: ${where}${issue.message}` }
  }

  const request = parsed.data
  const identity = resolveIdentity(request)

  try {
    const response: OkResponse = {
      status: 'ok',
      debug: JSON.stringify([identity.remote, identity.name])
    }

    const tracked = registry.lookup(identity)
    if (!tracked) {
      return { ok: true, response }
    }

    response.branch = tracked.branch
    if (tracked.review) {
      response.review = { id: tracked.review.id, summary: tracked.review.summary }
    }

    if (tracked.updating) {
      response.update_ongoing = true
    }

    if (tracked.disabled) {
      response.disabled = true
    } else if (tracked.pending) {
      response.update_pending = true
    } else if (request.trigger) {
      const result = registry.triggerUpdate(tracked)
      if (result.triggered) {
        response.update_triggered = true
        log.info(
          `[UpdateHandler] Update of ${tracked.branch} triggered` +
            (request.username ? ` by ${request.username}` : '')
        )
      } else if (result.reason === 'pending') {
        response.update_pending = true
      } else if (result.reason === 'updating') {
        response.update_ongoing = true
      }
    }

    const entry = registry.getLogEntry(tracked, request.value)
    if (entry) {
      response.hook_output = entry.hookOutput
      response.update_successful = entry.successful
    }

    return { ok: true, response }
  } catch (error) {
    log.error('[UpdateHandler] Failed to handle update request:', error)
    return { ok: false, error: error instanceof Error ? error.message : String(error) }
  }
}

/**
 * Frames a handler result as a wire response.
 */
export function toWireResponse(result: HandlerResult): UpdateResponse {
  return result.ok ? result.response : { status: 'error', error: result.error }
}
