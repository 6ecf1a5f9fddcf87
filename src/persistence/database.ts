/**
 * DatabaseWrapper — thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Apply the migration set the owning store was built with
 *  - Expose the raw BetterSqlite3.Database instance to the store
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { runMigrations } from './migrations/index.js'
import type { Migration } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

const JournalModeRowsSchema = z.array(z.object({ journal_mode: z.string() }))

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string
  private readonly _migrations: readonly Migration[]

  constructor(databasePath: string, migrations: readonly Migration[] = []) {
    this._path = databasePath
    this._migrations = migrations
  }

  /**
   * Open the database, apply PRAGMAs and pending migrations.
   * Idempotent — calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    const db = new BetterSqlite3(this._path)

    const walResult = JournalModeRowsSchema.safeParse(db.pragma('journal_mode = WAL'))
    const journalMode = walResult.success ? walResult.data[0]?.journal_mode : undefined
    if (journalMode !== 'wal') {
      // In-memory databases report "memory"
      logger.debug({ journalMode }, 'WAL journal mode not in effect')
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')

    if (this._migrations.length > 0) {
      runMigrations(db, this._migrations)
    }
    this._db = db
  }

  /**
   * Close the database. Idempotent — calling close() when already closed is a no-op.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * Return the raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }

  get path(): string {
    return this._path
  }
}
