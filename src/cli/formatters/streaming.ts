/**
 * NDJSON event emitter for machine-readable CLI output.
 *
 * Each line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { StatusSnapshot } from '../types/status.js'

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "status:snapshot")
 */
export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

export function emitStatusSnapshot(snapshot: StatusSnapshot): void {
  emitEvent('status:snapshot', snapshot)
}
