/**
 * TypedEventBus: in-process pub/sub over Node's EventEmitter.
 *
 * Dispatch is synchronous; every handler has run when emit() returns.
 * Event names and payloads come from the `WorkcellEvents` map.
 */

import { EventEmitter } from 'node:events'
import type { WorkcellEvents } from './event-bus.types.js'

export type WorkcellEventName = keyof WorkcellEvents

export type WorkcellEventHandler<K extends WorkcellEventName> = (payload: WorkcellEvents[K]) => void

export interface TypedEventBus {
  emit<K extends WorkcellEventName>(event: K, payload: WorkcellEvents[K]): void
  on<K extends WorkcellEventName>(event: K, handler: WorkcellEventHandler<K>): void
  /** Handler runs for the next emit only */
  once<K extends WorkcellEventName>(event: K, handler: WorkcellEventHandler<K>): void
  /** No-op when the handler was never registered */
  off<K extends WorkcellEventName>(event: K, handler: WorkcellEventHandler<K>): void
}

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('workflow:phase-completed', ({ phase, nextPhase }) => {
 *   console.log(`${phase} -> ${nextPhase}`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  emit<K extends WorkcellEventName>(event: K, payload: WorkcellEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends WorkcellEventName>(event: K, handler: WorkcellEventHandler<K>): void {
    this._emitter.on(event, handler)
  }

  once<K extends WorkcellEventName>(event: K, handler: WorkcellEventHandler<K>): void {
    this._emitter.once(event, handler)
  }

  off<K extends WorkcellEventName>(event: K, handler: WorkcellEventHandler<K>): void {
    this._emitter.off(event, handler)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
