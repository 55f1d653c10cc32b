import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('@shared/logger', () => ({
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}))

import type { LogEntry, NormalizedIdentity, TrackedBranch } from '@shared/types'
import {
  TrackedBranchRegistry,
  type TrackedBranchLookup,
  type TriggerResult
} from '../../services/TrackedBranchRegistry'
import { handleUpdateRequest, toWireResponse } from '../update-tracked-branch'

const VALUE = 'e'.repeat(40)
const REMOTE = 'ssh://git.example.com/home/alice/project'
const NORMALIZED = 'git.example.com:~alice/project.git'

describe('handleUpdateRequest', () => {
  let registry: TrackedBranchRegistry

  beforeEach(() => {
    vi.clearAllMocks()
    registry = new TrackedBranchRegistry()
    registry.setScheduler({ schedule: vi.fn() })
  })

  it('answers untracked identities with only the debug field', () => {
    const result = handleUpdateRequest(
      { remote: REMOTE, name: 'refs/heads/main', value: VALUE },
      registry
    )

    expect(result).toEqual({
      ok: true,
      response: { status: 'ok', debug: JSON.stringify([NORMALIZED, 'main']) }
    })
  })

  it('reports the tracked branch and review', () => {
    registry.register({
      remote: NORMALIZED,
      name: 'main',
      branch: 'mirror/main',
      review: { id: 12, summary: 'Mirror main' }
    })

    const result = handleUpdateRequest(
      { remote: REMOTE, name: 'refs/heads/main', value: VALUE },
      registry
    )

    expect(result).toEqual({
      ok: true,
      response: {
        status: 'ok',
        debug: JSON.stringify([NORMALIZED, 'main']),
        branch: 'mirror/main',
        review: { id: 12, summary: 'Mirror main' }
      }
    })
  })

  it('triggers an update when asked to', () => {
    const tracked = registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })

    const result = handleUpdateRequest(
      { remote: REMOTE, name: 'refs/heads/main', value: VALUE, trigger: true, username: 'alice' },
      registry
    )

    expect(result.ok && result.response.update_triggered).toBe(true)
    expect(registry.get(tracked.id)?.pending).toBe(true)
  })

  it('does not trigger without the trigger flag', () => {
    const tracked = registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })

    const result = handleUpdateRequest(
      { remote: REMOTE, name: 'refs/heads/main', value: VALUE },
      registry
    )

    expect(result.ok && result.response.update_triggered).toBeUndefined()
    expect(registry.get(tracked.id)?.pending).toBe(false)
  })

  it('reports pending instead of triggering again', () => {
    const tracked = registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })
    registry.triggerUpdate(tracked)

    const result = handleUpdateRequest(
      { remote: NORMALIZED, name: 'main', value: VALUE, trigger: true },
      registry
    )

    expect(result.ok && result.response).toMatchObject({ update_pending: true })
    expect(result.ok && result.response.update_triggered).toBeUndefined()
  })

  it('puts disabled ahead of pending', () => {
    const tracked = registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })
    registry.triggerUpdate(tracked)
    registry.setDisabled(tracked.id, true)

    const result = handleUpdateRequest(
      { remote: NORMALIZED, name: 'main', value: VALUE, trigger: true },
      registry
    )

    expect(result.ok && result.response).toMatchObject({ disabled: true })
    expect(result.ok && result.response.update_pending).toBeUndefined()
  })

  it('reports an ongoing update without triggering another', () => {
    const tracked = registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })
    registry.triggerUpdate(tracked)
    registry.beginUpdate(tracked.id)

    const result = handleUpdateRequest(
      { remote: NORMALIZED, name: 'main', value: VALUE, trigger: true },
      registry
    )

    expect(result.ok && result.response).toMatchObject({ update_ongoing: true })
    expect(result.ok && result.response.update_triggered).toBeUndefined()
  })

  it('includes the log entry for the requested value', () => {
    const tracked = registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })
    registry.completeUpdate(tracked.id, { value: VALUE, hookOutput: 'fetched', successful: false })

    const result = handleUpdateRequest(
      { remote: NORMALIZED, name: 'main', value: VALUE },
      registry
    )

    expect(result.ok && result.response).toMatchObject({
      hook_output: 'fetched',
      update_successful: false
    })
  })

  it('keeps the remote as sent when transformation is disabled', () => {
    registry.register({ remote: NORMALIZED, name: 'main', branch: 'mirror/main' })

    const result = handleUpdateRequest(
      { remote: REMOTE, name: 'refs/heads/main', value: VALUE, disable_remote_transform: true },
      registry
    )

    expect(result).toEqual({
      ok: true,
      response: { status: 'ok', debug: JSON.stringify([REMOTE, 'main']) }
    })
  })

  it('rejects a malformed value', () => {
    const result = handleUpdateRequest({ remote: REMOTE, name: 'main', value: 'HEAD' }, registry)

    expect(result).toEqual({
      ok: false,
      error: 'Invalid request: value: Expected a 40 character hex SHA'
    })
  })

  it('rejects a body that is not an object', () => {
    const result = handleUpdateRequest('hello', registry)

    expect(result.ok).toBe(false)
    expect(!result.ok && result.error).toMatch(/^Invalid request: /)
  })

  it('turns registry failures into an error result', () => {
    const failing: TrackedBranchLookup = {
      lookup: (_identity: NormalizedIdentity): TrackedBranch | null => {
        throw new Error('registry unavailable')
      },
      getLogEntry: (): LogEntry | null => null,
      triggerUpdate: (): TriggerResult => ({ triggered: true })
    }

    expect(
      handleUpdateRequest({ remote: REMOTE, name: 'main', value: VALUE }, failing)
    ).toEqual({ ok: false, error: 'registry unavailable' })
  })
})

describe('toWireResponse', () => {
  it('frames errors with status "error"', () => {
    expect(toWireResponse({ ok: false, error: 'nope' })).toEqual({ status: 'error', error: 'nope' })
  })

  it('passes the ok response through', () => {
    expect(toWireResponse({ ok: true, response: { status: 'ok', branch: 'b' } })).toEqual({
      status: 'ok',
      branch: 'b'
    })
  })
})
