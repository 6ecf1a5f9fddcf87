/**
 * WorkcellEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "workflow:phase-completed")
 */

import type { CapabilityFamily, WorkflowPhase, WorkPhase } from './types.js'
import type { DispatchErrorKind } from '../modules/capability-dispatch/types.js'

/**
 * Complete typed map of all events emitted on the event bus.
 * Use `keyof WorkcellEvents` to constrain event keys.
 */
export interface WorkcellEvents {
  // -------------------------------------------------------------------------
  // Workflow lifecycle
  // -------------------------------------------------------------------------

  /** A fresh run left Idle */
  'workflow:started': { runId: string; goal: string; phase: WorkflowPhase }

  /** A checkpointed run was picked up instead of starting a new one */
  'workflow:resumed': { runId: string; phase: WorkflowPhase }

  /** Phase handler is about to run */
  'workflow:phase-started': { runId: string; phase: WorkPhase }

  /** Phase handler finished and the checkpoint for the next phase was written */
  'workflow:phase-completed': {
    runId: string
    phase: WorkPhase
    nextPhase: WorkflowPhase
    durationMs: number
  }

  /** Run reached Completed for the first time in this process */
  'workflow:completed': { runId: string }

  // -------------------------------------------------------------------------
  // Dispatcher
  // -------------------------------------------------------------------------

  /** Preferred family unavailable; another one answered instead */
  'dispatch:substituted': { requested: CapabilityFamily; used: CapabilityFamily }

  /** A capability invocation finished (either way) */
  'dispatch:complete': {
    family: CapabilityFamily
    success: boolean
    errorKind?: DispatchErrorKind
    durationMs: number
  }

  // -------------------------------------------------------------------------
  // Refinement loop
  // -------------------------------------------------------------------------

  /** One draft/critique/revise/confidence cycle finished */
  'refinement:cycle': {
    cycle: number
    score: number | null
    threshold: number
    confident: boolean
  }

  // -------------------------------------------------------------------------
  // Review fan-out
  // -------------------------------------------------------------------------

  /** All fan-out tasks joined */
  'review:joined': { tasks: string[]; failed: string[] }
}
