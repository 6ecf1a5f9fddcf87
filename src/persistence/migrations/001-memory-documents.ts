/**
 * Migration 001 (memory database): stored run documents.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const memoryDocumentsMigration: Migration = {
  version: 1,
  name: '001-memory-documents',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_documents (
        id            TEXT PRIMARY KEY,
        collection    TEXT NOT NULL,
        text          TEXT NOT NULL,
        metadata_json TEXT NOT NULL DEFAULT '{}',
        created_at    TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at    TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_memory_documents_collection
        ON memory_documents(collection);
    `)
  },
}
