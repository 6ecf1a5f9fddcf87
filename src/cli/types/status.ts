/**
 * Types for the `workcell status` command.
 */

import type { ArtifactSlot, FeedbackEntry, WorkflowPhase } from '../../core/types.js'

// ---------------------------------------------------------------------------
// StatusSnapshot
// ---------------------------------------------------------------------------

/**
 * Read-only view of the checkpoint, serialised in JSON output.
 * `runId` is null when no run has been started.
 */
export interface StatusSnapshot {
  runId: string | null
  phase: WorkflowPhase
  goal: string
  /** Artifact slots holding text, in pipeline order */
  filledSlots: ArtifactSlot[]
  pendingFeedback: FeedbackEntry[]
  updatedAt: string | null
}
