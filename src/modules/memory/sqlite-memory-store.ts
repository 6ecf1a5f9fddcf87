/**
 * SqliteMemoryStore — run memories kept in SQLite, ranked by term-frequency
 * cosine similarity at query time.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { z } from 'zod'
import { DatabaseWrapper } from '../../persistence/database.js'
import { MEMORY_MIGRATIONS } from '../../persistence/migrations/index.js'
import { createLogger } from '../../utils/logger.js'
import { cosineSimilarity, termVector } from './term-vector.js'
import { DEFAULT_QUERY_RESULTS } from './types.js'
import type { MemoryMatch, MemoryMetadata, MemoryStore } from './types.js'

const logger = createLogger('memory')

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]))

const DocumentRowsSchema = z.array(
  z.object({
    id: z.string(),
    text: z.string(),
    metadata_json: z.string(),
  })
)

function parseMetadata(json: string): MemoryMetadata {
  try {
    const parsed = MetadataSchema.safeParse(JSON.parse(json))
    return parsed.success ? parsed.data : {}
  } catch {
    return {}
  }
}

export interface SqliteMemoryStoreOptions {
  /** File path, or ':memory:' */
  databasePath: string
  collection: string
}

export class SqliteMemoryStore implements MemoryStore {
  readonly enabled = true
  readonly collection: string

  private readonly _wrapper: DatabaseWrapper

  constructor(options: SqliteMemoryStoreOptions) {
    this.collection = options.collection
    this._wrapper = new DatabaseWrapper(options.databasePath, MEMORY_MIGRATIONS)
  }

  async addMemory(text: string, metadata: MemoryMetadata, id: string): Promise<void> {
    const db = this._open()
    db.prepare(`
      INSERT INTO memory_documents (id, collection, text, metadata_json)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        collection = excluded.collection,
        text = excluded.text,
        metadata_json = excluded.metadata_json,
        updated_at = datetime('now')
    `).run(id, this.collection, text, JSON.stringify(metadata))
    logger.info({ id, collection: this.collection }, 'Memory stored')
  }

  async queryMemory(text: string, n = DEFAULT_QUERY_RESULTS): Promise<string[]> {
    const matches = await this.search(text, n)
    return matches.map((match) => match.text)
  }

  async search(text: string, n = DEFAULT_QUERY_RESULTS): Promise<MemoryMatch[]> {
    if (n <= 0) return []

    const db = this._open()
    const rows = DocumentRowsSchema.parse(
      db
        .prepare('SELECT id, text, metadata_json FROM memory_documents WHERE collection = ? ORDER BY rowid')
        .all(this.collection)
    )

    const query = termVector(text)
    const matches: MemoryMatch[] = []
    for (const row of rows) {
      const score = cosineSimilarity(query, termVector(row.text))
      if (score > 0) {
        matches.push({ id: row.id, text: row.text, metadata: parseMetadata(row.metadata_json), score })
      }
    }

    // Array.prototype.sort is stable: equal scores keep insertion order
    matches.sort((a, b) => b.score - a.score)
    const top = matches.slice(0, n)
    logger.debug({ query: text.slice(0, 50), found: top.length }, 'Memory queried')
    return top
  }

  close(): void {
    this._wrapper.close()
  }

  private _open(): DatabaseWrapper['db'] {
    if (!this._wrapper.isOpen) {
      if (this._wrapper.path !== ':memory:') {
        mkdirSync(dirname(this._wrapper.path), { recursive: true })
      }
      this._wrapper.open()
    }
    return this._wrapper.db
  }
}
