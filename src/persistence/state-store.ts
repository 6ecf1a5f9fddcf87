/**
 * StateStore — durable checkpoint of the single in-progress workflow run.
 */

import { join } from 'node:path'
import type { WorkflowState } from '../core/types.js'
import type { StateBackend } from '../modules/config/config-schema.js'
import { FileStateStore } from './file-state-store.js'
import { SqliteStateStore } from './sqlite-state-store.js'

export interface StateStore {
  /**
   * Read the checkpoint. `null` means no run has been started (Idle).
   * @throws {StateCorruptedError} when the record exists but is not a valid state
   * @throws {StatePersistenceError} on I/O failure
   */
  load(): Promise<WorkflowState | null>

  /**
   * Replace the checkpoint. Either the previous or the new record survives a crash.
   * @throws {StatePersistenceError} on I/O failure
   */
  save(state: WorkflowState): Promise<void>

  /** Remove the checkpoint so the next load reports Idle */
  clear(): Promise<void>

  /** Release any open handles */
  close(): void
}

/**
 * Build the store for the configured backend under `stateDir`.
 */
export function createStateStore(backend: StateBackend, stateDir: string): StateStore {
  if (backend === 'sqlite') {
    return new SqliteStateStore(join(stateDir, 'state.db'))
  }
  return new FileStateStore(join(stateDir, 'workflow-state.json'))
}
