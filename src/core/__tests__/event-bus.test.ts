/**
 * Unit tests for TypedEventBus and WorkcellEvents type safety.
 *
 * Covers:
 *  - Emit/subscribe with correct payload type
 *  - Unsubscribe removes handler; once() fires a single time
 *  - Multiple handlers for same event all invoked
 *  - Event dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { WorkcellEvents } from '../event-bus.types.js'

function makeHandler<K extends keyof WorkcellEvents>(
  _event: K
): (payload: WorkcellEvents[K]) => void {
  return vi.fn()
}

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes handler when matching event is emitted', () => {
    const handler = makeHandler('workflow:completed')
    bus.on('workflow:completed', handler)

    bus.emit('workflow:completed', { runId: 'run-1' })

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith({ runId: 'run-1' })
  })

  it('does not invoke handler for a different event', () => {
    const handler = makeHandler('workflow:completed')
    bus.on('workflow:completed', handler)

    bus.emit('workflow:resumed', { runId: 'run-1', phase: 'Review' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('passes the exact payload object through', () => {
    const handler = makeHandler('dispatch:complete')
    bus.on('dispatch:complete', handler)

    const payload: WorkcellEvents['dispatch:complete'] = {
      family: 'gemini',
      success: false,
      errorKind: 'BackendInvocationFailed',
      durationMs: 12,
    }
    bus.emit('dispatch:complete', payload)

    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('off() removes only the given handler', () => {
    const removed = makeHandler('review:joined')
    const kept = makeHandler('review:joined')
    bus.on('review:joined', removed)
    bus.on('review:joined', kept)

    bus.off('review:joined', removed)
    bus.emit('review:joined', { tasks: ['QA', 'Security'], failed: [] })

    expect(removed).not.toHaveBeenCalled()
    expect(kept).toHaveBeenCalledOnce()
  })

  it('off() is a no-op when the handler was never registered', () => {
    expect(() => {
      bus.off('workflow:completed', makeHandler('workflow:completed'))
    }).not.toThrow()
  })

  it('once() handlers run for a single emit', () => {
    const handler = makeHandler('workflow:completed')
    bus.once('workflow:completed', handler)

    bus.emit('workflow:completed', { runId: 'run-1' })
    bus.emit('workflow:completed', { runId: 'run-2' })

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith({ runId: 'run-1' })
  })

  it('invokes handlers in registration order', () => {
    const order: string[] = []
    bus.on('dispatch:substituted', () => order.push('first'))
    bus.on('dispatch:substituted', () => order.push('second'))

    bus.emit('dispatch:substituted', { requested: 'codex', used: 'claude' })

    expect(order).toEqual(['first', 'second'])
  })

  it('dispatches synchronously: the handler has run when emit() returns', () => {
    let seen: number | null = null
    bus.on('refinement:cycle', ({ cycle }) => {
      seen = cycle
    })

    bus.emit('refinement:cycle', { cycle: 3, score: 8, threshold: 7, confident: true })

    expect(seen).toBe(3)
  })

  it('emit() with no handlers does nothing', () => {
    expect(() => {
      bus.emit('workflow:phase-started', { runId: 'run-1', phase: 'Planning' })
    }).not.toThrow()
  })
})

describe('createEventBus', () => {
  it('returns a working bus', () => {
    const bus = createEventBus()
    const handler = makeHandler('workflow:started')
    bus.on('workflow:started', handler)

    bus.emit('workflow:started', { runId: 'run-1', goal: 'g', phase: 'Planning' })

    expect(handler).toHaveBeenCalledOnce()
  })
})
