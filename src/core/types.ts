/**
 * Core type definitions for workcell.
 * Shared across the engine, dispatcher, refinement loop and persistence layer.
 */

// ---------------------------------------------------------------------------
// Capability families
// ---------------------------------------------------------------------------

/** Fixed global preference order of backend families */
export const CAPABILITY_FAMILIES = ['claude', 'codex', 'gemini'] as const

/** A class of backend able to satisfy a generateText request */
export type CapabilityFamily = (typeof CAPABILITY_FAMILIES)[number]

// ---------------------------------------------------------------------------
// Workflow phases
// ---------------------------------------------------------------------------

/** Phases that do work, in execution order */
export const WORK_PHASES = [
  'Planning',
  'Generation',
  'Review',
  'Feedback',
  'Repair',
  'Verification',
  'Finalization',
] as const

export type WorkPhase = (typeof WORK_PHASES)[number]

/** All phases, including the Idle / Completed markers */
export const WORKFLOW_PHASES = ['Idle', ...WORK_PHASES, 'Completed'] as const

export type WorkflowPhase = (typeof WORKFLOW_PHASES)[number]

// ---------------------------------------------------------------------------
// Artifacts and feedback
// ---------------------------------------------------------------------------

export const ARTIFACT_SLOTS = [
  'architecture-plan',
  'database-plan',
  'ui-plan',
  'full-plan',
  'generated-code',
  'qa-feedback',
  'security-feedback',
  'fixed-code',
  'verification-report',
  'documentation',
] as const

/** Named slot holding one text artifact */
export type ArtifactSlot = (typeof ARTIFACT_SLOTS)[number]

export type Artifacts = Partial<Record<ArtifactSlot, string>>

/** Who produced a feedback entry */
export type FeedbackSource = 'QA' | 'Security' | 'Human Operator'

export interface FeedbackEntry {
  source: FeedbackSource
  feedback: string
}

// ---------------------------------------------------------------------------
// WorkflowState
// ---------------------------------------------------------------------------

/**
 * The single persisted aggregate. Mutated once per phase by the engine and
 * checkpointed after every mutation.
 */
export interface WorkflowState {
  /** Identifier for this run; stable across resumes */
  runId: string
  /** Natural-language goal the run was started with ('' while Idle) */
  goal: string
  phase: WorkflowPhase
  artifacts: Artifacts
  /** Feedback awaiting consumption by the Repair phase */
  pendingFeedback: FeedbackEntry[]
  /** ISO timestamp of the last checkpoint */
  updatedAt: string
}

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

/**
 * Environment-shaped lookup used for credentials and WORKCELL_* overrides.
 * `process.env` satisfies it; tests pass a plain object.
 */
export type CredentialSource = Readonly<Record<string, string | undefined>>
