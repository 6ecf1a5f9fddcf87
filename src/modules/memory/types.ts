/**
 * Types for the long-term run memory.
 */

export type MemoryMetadata = Readonly<Record<string, string | number | boolean>>

export interface MemoryMatch {
  id: string
  text: string
  metadata: MemoryMetadata
  /** Cosine similarity in (0, 1] */
  score: number
}

export interface MemoryStore {
  /** False for the no-op store; callers may skip building documents */
  readonly enabled: boolean

  /** Store `text` under `id`, replacing any document with the same id */
  addMemory(text: string, metadata: MemoryMetadata, id: string): Promise<void>

  /** Texts of up to `n` stored documents most similar to `text`, best first */
  queryMemory(text: string, n?: number): Promise<string[]>

  /** Same ranking as `queryMemory`, with ids, metadata and scores */
  search(text: string, n?: number): Promise<MemoryMatch[]>

  close(): void
}

export const DEFAULT_QUERY_RESULTS = 3
