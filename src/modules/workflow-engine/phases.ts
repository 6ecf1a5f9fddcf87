/**
 * The phase table: one handler per work phase, in fixed order.
 */

import { WORKFLOW_PHASES } from '../../core/types.js'
import type { FeedbackEntry, WorkflowPhase, WorkPhase } from '../../core/types.js'
import type { OperatorPrompt } from '../operator-gate/types.js'
import { isApproval } from '../operator-gate/types.js'
import type { ReviewCoordinator } from '../review-coordinator/types.js'
import type { WorkerSet } from '../workers/capability.js'
import { createLogger } from '../../utils/logger.js'
import type { PhaseDefinition, PhaseHandler, PhaseTable } from './types.js'

const logger = createLogger('workflow-engine:phases')

export const FEEDBACK_QUESTION = "Type 'approve' to continue, or type your additional feedback: "

export interface PhaseDeps {
  workers: WorkerSet
  reviewCoordinator: ReviewCoordinator
  operator: OperatorPrompt
}

/** The phase after `phase` in the fixed order */
export function nextPhase(phase: WorkPhase): WorkflowPhase {
  const index = WORKFLOW_PHASES.indexOf(phase)
  return WORKFLOW_PHASES[index + 1] ?? 'Completed'
}

/** Input for the Repair phase: the generated code followed by every pending finding */
export function repairInput(code: string, feedback: readonly FeedbackEntry[]): string {
  const findings = feedback.map((entry) => `[${entry.source}]\n${entry.feedback}`).join('\n\n')
  return `Original Code:\n${code}\n\nReview Feedback:\n${findings}`
}

/** Text shown to the operator before the Feedback question */
export function pendingFindingsText(qa: string, security: string): string {
  return [
    '--- PENDING REVIEW FEEDBACK ---',
    '',
    '[--- QA Feedback ---]',
    qa,
    '',
    '[--- Security Feedback ---]',
    security,
    '',
    '-------------------------------',
    '',
    'Please review the feedback. You can approve it or add your own.',
  ].join('\n')
}

export function createPhaseTable(deps: PhaseDeps): PhaseTable {
  const { workers, reviewCoordinator, operator } = deps

  const planning: PhaseHandler = async (state) => {
    const architecturePlan = await workers.architect.execute(state.goal)
    const databasePlan = await workers.database.execute(architecturePlan)
    const uiPlan = await workers['ui-designer'].execute(architecturePlan)
    return {
      artifacts: {
        'architecture-plan': architecturePlan,
        'database-plan': databasePlan,
        'ui-plan': uiPlan,
        'full-plan': `${architecturePlan}\n\n${databasePlan}\n\n${uiPlan}`,
      },
    }
  }

  const generation: PhaseHandler = async (state) => ({
    artifacts: { 'generated-code': await workers.coder.execute(state.artifacts['full-plan'] ?? '') },
  })

  const review: PhaseHandler = async (state) => {
    const code = state.artifacts['generated-code'] ?? ''
    const results = await reviewCoordinator.runParallel({
      QA: { capability: workers.qa, input: code },
      Security: { capability: workers.security, input: code },
    })
    return {
      artifacts: {
        'qa-feedback': results.get('QA') ?? '',
        'security-feedback': results.get('Security') ?? '',
      },
    }
  }

  const feedback: PhaseHandler = async (state) => {
    const qa = state.artifacts['qa-feedback'] ?? ''
    const security = state.artifacts['security-feedback'] ?? ''
    operator.display(pendingFindingsText(qa, security))
    const answer = await operator.ask(FEEDBACK_QUESTION)

    const pendingFeedback: FeedbackEntry[] = [
      { source: 'QA', feedback: qa },
      { source: 'Security', feedback: security },
    ]
    if (isApproval(answer)) {
      logger.info('Operator approved the automated findings')
    } else {
      pendingFeedback.push({ source: 'Human Operator', feedback: answer })
      logger.info('Operator added feedback')
    }
    return { artifacts: {}, pendingFeedback }
  }

  const repair: PhaseHandler = async (state) => {
    const fixed = await workers.coder.execute(
      repairInput(state.artifacts['generated-code'] ?? '', state.pendingFeedback)
    )
    return { artifacts: { 'fixed-code': fixed }, pendingFeedback: [] }
  }

  const verification: PhaseHandler = async (state) => ({
    artifacts: { 'verification-report': await workers.qa.execute(state.artifacts['fixed-code'] ?? '') },
  })

  const finalization: PhaseHandler = async (state) => ({
    artifacts: { documentation: await workers.documentation.execute(state.artifacts['fixed-code'] ?? '') },
  })

  const define = (phase: WorkPhase, run: PhaseHandler): PhaseDefinition => ({
    phase,
    next: nextPhase(phase),
    run,
  })

  return {
    Planning: define('Planning', planning),
    Generation: define('Generation', generation),
    Review: define('Review', review),
    Feedback: define('Feedback', feedback),
    Repair: define('Repair', repair),
    Verification: define('Verification', verification),
    Finalization: define('Finalization', finalization),
  }
}
