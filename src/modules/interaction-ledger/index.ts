/**
 * interaction-ledger module — public API exports.
 */

export type { InteractionLedger, LedgerChannel, LedgerEntry } from './types.js'
export {
  MarkdownInteractionLedger,
  formatLedgerEntry,
  ledgerHeader,
  DEFAULT_SNIPPET_LENGTH,
} from './markdown-ledger.js'
export type { MarkdownLedgerOptions } from './markdown-ledger.js'
export { InMemoryInteractionLedger } from './memory-ledger.js'
