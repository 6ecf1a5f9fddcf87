/**
 * WorkflowEngineImpl — drives the phase table one phase at a time and
 * checkpoints after every phase.
 *
 * Resumption: the checkpoint names the next phase to execute, so a restart
 * re-enters exactly that phase. A crash mid-phase re-runs the whole phase.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { WorkflowState } from '../../core/types.js'
import { WorkflowNotStartedError, errorMessage } from '../../core/errors.js'
import type { StateStore } from '../../persistence/state-store.js'
import type { MemoryStore } from '../memory/types.js'
import { createLogger } from '../../utils/logger.js'
import { generateId } from '../../utils/helpers.js'
import { createPhaseTable } from './phases.js'
import type { PhaseDeps } from './phases.js'
import type { PhaseTable, WorkflowEngine } from './types.js'

const logger = createLogger('workflow-engine')

export interface WorkflowEngineDeps extends PhaseDeps {
  stateStore: StateStore
  /** Omit to skip the completion export */
  memory?: MemoryStore
  eventBus?: TypedEventBus
  /** Clock for checkpoint timestamps */
  now?: () => Date
}

/** Document id of a run's memory export; stable across processes */
export function memoryIdForRun(runId: string): string {
  return `run-${runId}`
}

export class WorkflowEngineImpl implements WorkflowEngine {
  private readonly _store: StateStore
  private readonly _memory: MemoryStore | undefined
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date
  private readonly _phases: PhaseTable

  private _state: WorkflowState | null = null
  private _completionHandled = false

  constructor(deps: WorkflowEngineDeps) {
    this._store = deps.stateStore
    this._memory = deps.memory
    this._eventBus = deps.eventBus
    this._now = deps.now ?? (() => new Date())
    this._phases = createPhaseTable(deps)
  }

  async getState(): Promise<WorkflowState> {
    if (this._state === null) {
      const loaded = await this._store.load()
      this._state = loaded ?? this._idleState()
      if (loaded !== null) {
        logger.info({ runId: loaded.runId, phase: loaded.phase }, 'Checkpoint loaded')
      }
    }
    return this._state
  }

  async start(goal: string): Promise<WorkflowState> {
    const state = await this.getState()

    if (state.phase !== 'Idle') {
      logger.info({ runId: state.runId, phase: state.phase }, 'Resuming run from checkpoint')
      this._eventBus?.emit('workflow:resumed', { runId: state.runId, phase: state.phase })
      return state
    }

    if (goal.trim() === '') {
      throw new WorkflowNotStartedError('A goal is required to start a new run')
    }

    const started = await this._checkpoint({ ...state, goal, phase: 'Planning' })
    logger.info({ runId: started.runId, goal }, 'Run started')
    this._eventBus?.emit('workflow:started', { runId: started.runId, goal, phase: started.phase })
    return started
  }

  async advance(): Promise<WorkflowState> {
    const state = await this.getState()

    if (state.phase === 'Idle') {
      throw new WorkflowNotStartedError()
    }
    if (state.phase === 'Completed') {
      await this._handleCompletion(state)
      return state
    }

    const definition = this._phases[state.phase]
    const startedAt = Date.now()
    logger.info({ runId: state.runId, phase: definition.phase }, 'Phase started')
    this._eventBus?.emit('workflow:phase-started', { runId: state.runId, phase: definition.phase })

    const outcome = await definition.run(state)

    const next = await this._checkpoint({
      ...state,
      phase: definition.next,
      artifacts: { ...state.artifacts, ...outcome.artifacts },
      pendingFeedback: outcome.pendingFeedback ?? state.pendingFeedback,
    })

    const durationMs = Date.now() - startedAt
    logger.info(
      { runId: next.runId, phase: definition.phase, nextPhase: next.phase, durationMs },
      'Phase completed'
    )
    this._eventBus?.emit('workflow:phase-completed', {
      runId: next.runId,
      phase: definition.phase,
      nextPhase: next.phase,
      durationMs,
    })

    if (next.phase === 'Completed') {
      await this._handleCompletion(next)
    }
    return next
  }

  async run(goal: string): Promise<WorkflowState> {
    let state = await this.start(goal)
    while (state.phase !== 'Completed') {
      state = await this.advance()
    }
    await this._handleCompletion(state)
    return state
  }

  async reset(): Promise<void> {
    await this._store.clear()
    this._state = this._idleState()
    this._completionHandled = false
    logger.info('Checkpoint discarded; workflow is Idle')
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _idleState(): WorkflowState {
    return {
      runId: generateId(),
      goal: '',
      phase: 'Idle',
      artifacts: {},
      pendingFeedback: [],
      updatedAt: this._now().toISOString(),
    }
  }

  /** Persist first; the in-memory state only moves once the checkpoint is durable */
  private async _checkpoint(state: WorkflowState): Promise<WorkflowState> {
    const stamped: WorkflowState = { ...state, updatedAt: this._now().toISOString() }
    await this._store.save(stamped)
    this._state = stamped
    logger.debug({ runId: stamped.runId, phase: stamped.phase }, 'Checkpoint written')
    return stamped
  }

  private async _handleCompletion(state: WorkflowState): Promise<void> {
    if (this._completionHandled) return
    this._completionHandled = true

    await this._exportToMemory(state)
    logger.info({ runId: state.runId }, 'Workflow finished')
    this._eventBus?.emit('workflow:completed', { runId: state.runId })
  }

  private async _exportToMemory(state: WorkflowState): Promise<void> {
    if (this._memory === undefined || !this._memory.enabled) return

    const { artifacts } = state
    const document = [artifacts['full-plan'], artifacts['fixed-code'], artifacts.documentation]
      .map((part) => part ?? '')
      .join('\n\n')
    const id = memoryIdForRun(state.runId)

    try {
      await this._memory.addMemory(document, { goal: state.goal, runId: state.runId }, id)
      logger.info({ id }, 'Run exported to memory')
    } catch (err) {
      logger.warn({ id, err: errorMessage(err) }, 'Memory export failed; continuing')
    }
  }
}

export function createWorkflowEngine(deps: WorkflowEngineDeps): WorkflowEngine {
  return new WorkflowEngineImpl(deps)
}
