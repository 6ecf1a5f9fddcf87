/**
 * Migration runner for the SQLite persistence layer.
 *
 * Each database (checkpoint, memory) carries its own ordered migration set and
 * its own `schema_migrations` tracking table.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { workflowCheckpointMigration } from './001-workflow-checkpoint.js'
import { memoryDocumentsMigration } from './001-memory-documents.js'

const logger = createLogger('persistence:migrations')

// ---------------------------------------------------------------------------
// Migration interface
// ---------------------------------------------------------------------------

export interface Migration {
  /** Unique version number within its set */
  version: number
  name: string
  /** Execute the migration — must be idempotent */
  up(db: BetterSqlite3Database): void
}

export const STATE_MIGRATIONS: readonly Migration[] = [workflowCheckpointMigration]

export const MEMORY_MIGRATIONS: readonly Migration[] = [memoryDocumentsMigration]

const VersionRowsSchema = z.array(z.object({ version: z.number().int() }))

// ---------------------------------------------------------------------------
// Migration runner
// ---------------------------------------------------------------------------

/**
 * Ensure `schema_migrations` exists and apply pending migrations in version order.
 * Safe to call multiple times — already-applied migrations are skipped.
 */
export function runMigrations(db: BetterSqlite3Database, migrations: readonly Migration[]): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>(
    VersionRowsSchema.parse(db.prepare('SELECT version FROM schema_migrations').all()).map(
      (row) => row.version,
    ),
  )

  const pending = migrations
    .filter((m) => !appliedVersions.has(m.version))
    .sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return
  }

  const insertMigration = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')

  for (const migration of pending) {
    // Run the migration and record it atomically
    const applyMigration = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    applyMigration()
    logger.debug({ version: migration.version, name: migration.name }, 'Migration applied')
  }
}
