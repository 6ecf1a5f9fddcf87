/**
 * Zod schema for the persisted workflow checkpoint.
 */

import { z } from 'zod'
import { ARTIFACT_SLOTS, WORKFLOW_PHASES } from '../../core/types.js'
import type { WorkflowState } from '../../core/types.js'

export const WorkflowPhaseEnum = z.enum(WORKFLOW_PHASES)

export const ArtifactSlotEnum = z.enum(ARTIFACT_SLOTS)

export const FeedbackEntrySchema = z.object({
  source: z.enum(['QA', 'Security', 'Human Operator']),
  feedback: z.string(),
})

export const WorkflowStateSchema = z
  .object({
    runId: z.string().min(1),
    goal: z.string(),
    phase: WorkflowPhaseEnum,
    artifacts: z.record(ArtifactSlotEnum, z.string()),
    pendingFeedback: z.array(FeedbackEntrySchema),
    updatedAt: z.string(),
  })
  .strict()

export type ParsedWorkflowState =
  | { success: true; data: WorkflowState }
  | { success: false; message: string }

/** Validate an untyped checkpoint document */
export function parseWorkflowState(value: unknown): ParsedWorkflowState {
  const result = WorkflowStateSchema.safeParse(value)
  if (result.success) return { success: true, data: result.data }
  return {
    success: false,
    message: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
  }
}
