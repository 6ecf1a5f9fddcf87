import type { MemoryMatch, MemoryMetadata, MemoryStore } from './types.js'

/**
 * Stand-in used when memory is turned off. Stores nothing, finds nothing.
 */
export class DisabledMemoryStore implements MemoryStore {
  readonly enabled = false

  addMemory(_text: string, _metadata: MemoryMetadata, _id: string): Promise<void> {
    return Promise.resolve()
  }

  queryMemory(_text: string, _n?: number): Promise<string[]> {
    return Promise.resolve([])
  }

  search(_text: string, _n?: number): Promise<MemoryMatch[]> {
    return Promise.resolve([])
  }

  close(): void {
    // Nothing to release
  }
}
