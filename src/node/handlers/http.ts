/**
 * HTTP Handlers - Thin routing layer over the update handler
 *
 * The update endpoint always answers 200; failures are carried in the
 * body's `status` field.
 */

import { Hono } from 'hono'
import { log } from '@shared/logger'
import type { UpdateResponse } from '@shared/types'
import type { TrackedBranchLookup } from '../services/TrackedBranchRegistry'
import { UPDATE_ENDPOINT_PATH } from '../shared/constants'
import { handleUpdateRequest, toWireResponse } from './update-tracked-branch'

export function createTrackerApp(registry: TrackedBranchLookup): Hono {
  const app = new Hono()

  app.get('/health', (c) => c.json({ status: 'ok' }))

  app.post(`/${UPDATE_ENDPOINT_PATH}`, async (c) => {
    let body: unknown
    try {
      body = JSON.parse(await c.req.text())
    } catch {
      const reply: UpdateResponse = { status: 'error', error: 'Request body is not valid JSON' }
      return c.json(reply)
    }

    const result = handleUpdateRequest(body, registry)
    if (!result.ok) {
      log.warn(`[TrackerApp] Rejected update request: ${result.error}`)
    }

    return c.json(toWireResponse(result))
  })

  return app
}
