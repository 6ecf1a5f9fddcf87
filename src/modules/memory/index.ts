import { join } from 'node:path'
import type { MemoryConfig } from '../config/config-schema.js'
import { DisabledMemoryStore } from './disabled-memory-store.js'
import { SqliteMemoryStore } from './sqlite-memory-store.js'
import type { MemoryStore } from './types.js'

export type { MemoryMatch, MemoryMetadata, MemoryStore } from './types.js'
export { DEFAULT_QUERY_RESULTS } from './types.js'
export { DisabledMemoryStore } from './disabled-memory-store.js'
export { SqliteMemoryStore } from './sqlite-memory-store.js'
export type { SqliteMemoryStoreOptions } from './sqlite-memory-store.js'
export { cosineSimilarity, termVector, tokenize } from './term-vector.js'

/**
 * The configured store: SQLite at `<stateDir>/memory.db` when enabled,
 * otherwise the no-op store.
 */
export function createMemoryStore(config: MemoryConfig, stateDir: string): MemoryStore {
  if (!config.enabled) return new DisabledMemoryStore()
  return new SqliteMemoryStore({ databasePath: join(stateDir, 'memory.db'), collection: config.collection })
}
