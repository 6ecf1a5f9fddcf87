export type {
  PhaseDefinition,
  PhaseHandler,
  PhaseOutcome,
  PhaseTable,
  WorkflowEngine,
} from './types.js'
export {
  FEEDBACK_QUESTION,
  createPhaseTable,
  nextPhase,
  pendingFindingsText,
  repairInput,
} from './phases.js'
export type { PhaseDeps } from './phases.js'
export { WorkflowEngineImpl, createWorkflowEngine, memoryIdForRun } from './workflow-engine-impl.js'
export type { WorkflowEngineDeps } from './workflow-engine-impl.js'
