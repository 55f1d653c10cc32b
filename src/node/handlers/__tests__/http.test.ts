import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('@shared/logger', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}))

import { log } from '@shared/logger'
import { TrackedBranchRegistry } from '../../services/TrackedBranchRegistry'
import { createTrackerApp } from '../http'

const VALUE = 'f'.repeat(40)

function post(body: string): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body
  }
}

describe('createTrackerApp', () => {
  let registry: TrackedBranchRegistry

  beforeEach(() => {
    vi.clearAllMocks()
    registry = new TrackedBranchRegistry()
    registry.setScheduler({ schedule: vi.fn() })
    registry.register({
      remote: 'git.example.com:~alice/project.git',
      name: 'main',
      branch: 'mirror/main',
      review: { id: 3, summary: 'Mirror' }
    })
  })

  it('answers update requests with 200 and the ok payload', async () => {
    const app = createTrackerApp(registry)

    const res = await app.request(
      '/tracked-branch/update',
      post(
        JSON.stringify({
          remote: 'git.example.com:~alice/project',
          name: 'refs/heads/main',
          value: VALUE,
          trigger: true
        })
      )
    )

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      status: 'ok',
      debug: '["git.example.com:~alice/project.git","main"]',
      branch: 'mirror/main',
      review: { id: 3, summary: 'Mirror' },
      update_triggered: true
    })
  })

  it('answers invalid JSON with an error body and status 200', async () => {
    const app = createTrackerApp(registry)

    const res = await app.request('/tracked-branch/update', post('{not json'))

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      status: 'error',
      error: 'Request body is not valid JSON'
    })
  })

  it('logs rejected requests', async () => {
    const app = createTrackerApp(registry)

    const res = await app.request('/tracked-branch/update', post(JSON.stringify({ remote: 'x' })))
    const body: unknown = await res.json()

    expect(body).toMatchObject({ status: 'error' })
    expect(log.warn).toHaveBeenCalledTimes(1)
  })

  it('serves a health check', async () => {
    const res = await createTrackerApp(registry).request('/health')

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok' })
  })
})
