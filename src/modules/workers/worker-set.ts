import type { CapabilityDispatcher } from '../capability-dispatch/types.js'
import type { InteractionLedger } from '../interaction-ledger/types.js'
import type { RefinementController } from '../refinement/types.js'
import type { TestRunner } from '../tools/test-runner.js'
import type { WorkerSet } from './capability.js'
import { CoderWorker } from './coder-worker.js'
import { PromptWorker } from './prompt-worker.js'
import {
  architecturePrompt,
  databasePrompt,
  documentationPrompt,
  securityReviewPrompt,
  uiDesignPrompt,
} from './prompts.js'
import { QaWorker } from './qa-worker.js'

export interface WorkerSetDeps {
  dispatcher: CapabilityDispatcher
  refinement: RefinementController
  ledger: InteractionLedger
  /** Omit to skip running generated tests */
  testRunner?: TestRunner
  /** Language the workers write and review (default: Python) */
  language?: string
}

/**
 * Build every worker role once, at startup.
 */
export function createWorkerSet(deps: WorkerSetDeps): WorkerSet {
  const { dispatcher } = deps
  const language = deps.language ?? 'Python'

  return {
    architect: new PromptWorker('architect', 'claude', dispatcher, architecturePrompt),
    database: new PromptWorker('database', 'gemini', dispatcher, databasePrompt),
    'ui-designer': new PromptWorker('ui-designer', 'claude', dispatcher, uiDesignPrompt),
    coder: new CoderWorker(deps.refinement),
    qa: new QaWorker({
      dispatcher,
      ledger: deps.ledger,
      testRunner: deps.testRunner,
      language,
    }),
    security: new PromptWorker('security', 'gemini', dispatcher, (code) =>
      securityReviewPrompt(code, language)
    ),
    documentation: new PromptWorker('documentation', 'claude', dispatcher, (code) =>
      documentationPrompt(code, language)
    ),
  }
}
