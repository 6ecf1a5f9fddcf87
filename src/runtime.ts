/**
 * Composition root: builds every collaborator from one loaded configuration
 * and hands them to the WorkflowEngine by reference.
 */

import { join } from 'node:path'
import { createDefaultBackendRegistry } from './adapters/backend-registry.js'
import type { TextGenerator } from './adapters/types.js'
import { createEventBus } from './core/event-bus.js'
import type { TypedEventBus } from './core/event-bus.js'
import type { CredentialSource } from './core/types.js'
import { createCapabilityDispatcher } from './modules/capability-dispatch/dispatcher-impl.js'
import type { CapabilityDispatcher } from './modules/capability-dispatch/types.js'
import type { WorkcellConfig } from './modules/config/config-schema.js'
import { MarkdownInteractionLedger } from './modules/interaction-ledger/markdown-ledger.js'
import type { InteractionLedger } from './modules/interaction-ledger/types.js'
import { createMemoryStore } from './modules/memory/index.js'
import type { MemoryStore } from './modules/memory/types.js'
import type { OperatorPrompt } from './modules/operator-gate/types.js'
import { createRefinementController } from './modules/refinement/refinement-controller-impl.js'
import { createReviewCoordinator } from './modules/review-coordinator/review-coordinator-impl.js'
import { CommandStaticAnalyzer } from './modules/tools/static-analyzer.js'
import { CommandTestRunner } from './modules/tools/test-runner.js'
import { createWorkerSet } from './modules/workers/worker-set.js'
import { createWorkflowEngine } from './modules/workflow-engine/workflow-engine-impl.js'
import type { WorkflowEngine } from './modules/workflow-engine/types.js'
import { createStateStore } from './persistence/state-store.js'
import type { StateStore } from './persistence/state-store.js'
import { setLogLevel } from './utils/logger.js'

export interface WorkcellRuntimeOptions {
  config: WorkcellConfig
  /** Absolute directory for the checkpoint, ledger and memory */
  stateDir: string
  credentials: CredentialSource
  operator: OperatorPrompt
  /** Replaces the AI SDK call in every backend (tests, embedding) */
  generateText?: TextGenerator
  ledger?: InteractionLedger
  stateStore?: StateStore
  memory?: MemoryStore
  eventBus?: TypedEventBus
}

export interface WorkcellRuntime {
  readonly eventBus: TypedEventBus
  readonly dispatcher: CapabilityDispatcher
  readonly engine: WorkflowEngine
  readonly stateStore: StateStore
  readonly memory: MemoryStore
  /** Release database handles */
  close(): void
}

export function createWorkcellRuntime(options: WorkcellRuntimeOptions): WorkcellRuntime {
  const { config, stateDir, credentials, operator } = options
  const language = config.project.language
  setLogLevel(config.global.log_level)

  const eventBus = options.eventBus ?? createEventBus()
  const ledger =
    options.ledger ??
    new MarkdownInteractionLedger({
      directory: join(stateDir, 'ledger'),
      snippetLength: config.ledger.snippet_length,
    })

  const registry = createDefaultBackendRegistry(
    options.generateText === undefined ? {} : { generateText: options.generateText }
  )
  const dispatcher = createCapabilityDispatcher({
    registry,
    providers: config.providers,
    credentials,
    ledger,
    eventBus,
  })

  const { static_analysis: staticAnalysis, test_runner: testRunner } = config.tools
  const refinement = createRefinementController({
    dispatcher,
    ledger,
    analyzer: staticAnalysis.enabled ? new CommandStaticAnalyzer(staticAnalysis) : undefined,
    policy: {
      maxCycles: config.refinement.max_cycles,
      critiqueRounds: config.refinement.critique_rounds,
      confidenceBase: config.refinement.confidence_base,
      confidenceStepPeriod: config.refinement.confidence_step_period,
    },
    language,
    eventBus,
  })

  const workers = createWorkerSet({
    dispatcher,
    refinement,
    ledger,
    testRunner: testRunner.enabled ? new CommandTestRunner(testRunner) : undefined,
    language,
  })

  const stateStore = options.stateStore ?? createStateStore(config.global.state_backend, stateDir)
  const memory = options.memory ?? createMemoryStore(config.memory, stateDir)

  const engine = createWorkflowEngine({
    stateStore,
    memory,
    eventBus,
    workers,
    reviewCoordinator: createReviewCoordinator({ eventBus }),
    operator,
  })

  return {
    eventBus,
    dispatcher,
    engine,
    stateStore,
    memory,
    close() {
      stateStore.close()
      memory.close()
    },
  }
}
