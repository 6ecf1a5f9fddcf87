import type { InteractionLedger, LedgerChannel, LedgerEntry } from './types.js'

/**
 * In-process ledger that keeps entries in an array. Used by tests and by
 * embedders that do not want files written.
 */
export class InMemoryInteractionLedger implements InteractionLedger {
  readonly entries: LedgerEntry[] = []

  record(entry: LedgerEntry): Promise<void> {
    this.entries.push({ ...entry, timestamp: entry.timestamp ?? new Date().toISOString() })
    return Promise.resolve()
  }

  forChannel(channel: LedgerChannel): LedgerEntry[] {
    return this.entries.filter((entry) => entry.channel === channel)
  }
}
