/**
 * SqliteStateStore — checkpoint kept in a single-row table.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { WorkflowState } from '../core/types.js'
import { StateCorruptedError, StatePersistenceError, errorMessage } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'
import { DatabaseWrapper } from './database.js'
import { STATE_MIGRATIONS } from './migrations/index.js'
import { parseWorkflowState } from './schemas/workflow-state.js'
import type { StateStore } from './state-store.js'

const logger = createLogger('persistence:sqlite-state')

const CheckpointRowSchema = z.object({ state_json: z.string() })

export class SqliteStateStore implements StateStore {
  private readonly _wrapper: DatabaseWrapper

  /** @param databasePath - file path, or ':memory:' */
  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath, STATE_MIGRATIONS)
  }

  async load(): Promise<WorkflowState | null> {
    const row: unknown = this._withDb('read', (db) =>
      db.prepare('SELECT state_json FROM workflow_checkpoint WHERE id = 1').get()
    )
    if (row === undefined) return null

    const parsedRow = CheckpointRowSchema.safeParse(row)
    if (!parsedRow.success) {
      throw new StateCorruptedError('Checkpoint row is malformed', { path: this._wrapper.path })
    }

    let document: unknown
    try {
      document = JSON.parse(parsedRow.data.state_json)
    } catch (err) {
      throw new StateCorruptedError(`Checkpoint is not valid JSON: ${errorMessage(err)}`, {
        path: this._wrapper.path,
      })
    }

    const parsed = parseWorkflowState(document)
    if (!parsed.success) {
      throw new StateCorruptedError(`Checkpoint is invalid: ${parsed.message}`, { path: this._wrapper.path })
    }
    return parsed.data
  }

  async save(state: WorkflowState): Promise<void> {
    this._withDb('write', (db) => {
      const upsert = db.prepare(`
        INSERT INTO workflow_checkpoint (id, run_id, state_json, updated_at)
        VALUES (1, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          run_id = excluded.run_id,
          state_json = excluded.state_json,
          updated_at = excluded.updated_at
      `)
      db.transaction(() => {
        upsert.run(state.runId, JSON.stringify(state), state.updatedAt)
      })()
    })
    logger.debug({ phase: state.phase }, 'Checkpoint written')
  }

  async clear(): Promise<void> {
    this._withDb('clear', (db) => {
      db.prepare('DELETE FROM workflow_checkpoint').run()
    })
  }

  close(): void {
    this._wrapper.close()
  }

  private _withDb<T>(action: string, fn: (db: DatabaseWrapper['db']) => T): T {
    try {
      if (!this._wrapper.isOpen) {
        if (this._wrapper.path !== ':memory:') {
          mkdirSync(dirname(this._wrapper.path), { recursive: true })
        }
        this._wrapper.open()
      }
      return fn(this._wrapper.db)
    } catch (err) {
      throw new StatePersistenceError(`Checkpoint ${action} failed: ${errorMessage(err)}`, {
        path: this._wrapper.path,
      })
    }
  }
}
