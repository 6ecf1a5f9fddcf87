/**
 * Types for the WorkflowEngine (resumable phase state machine).
 */

import type { Artifacts, FeedbackEntry, WorkflowPhase, WorkflowState, WorkPhase } from '../../core/types.js'

/**
 * What a phase handler produced. Artifacts are merged into the state;
 * `pendingFeedback`, when present, replaces the queue.
 */
export interface PhaseOutcome {
  artifacts: Artifacts
  pendingFeedback?: FeedbackEntry[]
}

export type PhaseHandler = (state: Readonly<WorkflowState>) => Promise<PhaseOutcome>

export interface PhaseDefinition {
  phase: WorkPhase
  next: WorkflowPhase
  run: PhaseHandler
}

export type PhaseTable = Readonly<Record<WorkPhase, PhaseDefinition>>

export interface WorkflowEngine {
  /**
   * Idle: record `goal` and enter the first phase (checkpointed).
   * Otherwise `goal` is ignored and the checkpointed run is resumed.
   * @throws {WorkflowNotStartedError} when Idle and `goal` is blank
   */
  start(goal: string): Promise<WorkflowState>

  /**
   * Execute the current phase, move to the next one and checkpoint.
   * At Completed this only performs the one-time memory export.
   * @throws {WorkflowNotStartedError} when Idle
   * @throws {StatePersistenceError} when the checkpoint cannot be written
   */
  advance(): Promise<WorkflowState>

  /** `start(goal)` then `advance()` until Completed */
  run(goal: string): Promise<WorkflowState>

  /** Discard the checkpoint and return to Idle */
  reset(): Promise<void>

  /** Current state, loading the checkpoint on first use */
  getState(): Promise<WorkflowState>
}
