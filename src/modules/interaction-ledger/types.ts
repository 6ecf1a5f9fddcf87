/**
 * Types for the InteractionLedger — the append-only audit log of capability
 * invocations and tool runs. Never read back by the workflow.
 */

import type { CapabilityFamily } from '../../core/types.js'

/** One ledger document exists per channel */
export type LedgerChannel = CapabilityFamily | 'static-analysis' | 'test-runner'

/**
 * A single recorded interaction.
 */
export interface LedgerEntry {
  channel: LedgerChannel
  success: boolean
  /** Recovered error kind when the interaction failed */
  errorKind?: string
  /** Full prompt or tool input; truncated when stored */
  prompt: string
  /** Full response, tool output or error text; truncated when stored */
  response: string
  /** ISO timestamp (default: now) */
  timestamp?: string
}

/**
 * Append-only sink for interaction records.
 *
 * Implementations must not throw from `record()`: a failed write is an
 * observability loss, not a workflow failure.
 */
export interface InteractionLedger {
  record(entry: LedgerEntry): Promise<void>
}
