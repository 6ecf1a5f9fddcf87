/**
 * Migration 001 (checkpoint database): the single-row workflow checkpoint.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const workflowCheckpointMigration: Migration = {
  version: 1,
  name: '001-workflow-checkpoint',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS workflow_checkpoint (
        id         INTEGER PRIMARY KEY CHECK (id = 1),
        run_id     TEXT NOT NULL,
        state_json TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `)
  },
}
