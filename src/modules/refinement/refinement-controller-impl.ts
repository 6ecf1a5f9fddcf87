/**
 * RefinementControllerImpl — bounded self-critique loop.
 *
 * Per cycle: fixed critique rounds (each replaces the reasoning), one revise
 * call, an optional static-analysis pass with at most one correction call,
 * then a confidence check against a non-decreasing threshold. The draft is
 * produced once, before the first cycle.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { CapabilityFamily } from '../../core/types.js'
import { isErrorText } from '../capability-dispatch/types.js'
import type { CapabilityDispatcher } from '../capability-dispatch/types.js'
import type { InteractionLedger } from '../interaction-ledger/types.js'
import type { StaticAnalyzer, StaticAnalysisReport } from '../tools/static-analyzer.js'
import { createLogger } from '../../utils/logger.js'
import { confidenceThreshold, parseConfidence } from './confidence.js'
import type { ConfidencePolicy } from './confidence.js'
import {
  INITIAL_REASONING,
  confidencePrompt,
  correctionPrompt,
  critiquePrompt,
  draftPrompt,
  revisePrompt,
} from './prompts.js'
import { DEFAULT_REFINEMENT_POLICY } from './types.js'
import type {
  RefineOptions,
  RefinementController,
  RefinementPolicy,
  RefinementResult,
} from './types.js'

const logger = createLogger('refinement')

/** Family asked for every refinement call unless overridden */
export const DEFAULT_REFINEMENT_FAMILY: CapabilityFamily = 'codex'

export interface RefinementControllerDeps {
  dispatcher: CapabilityDispatcher
  ledger: InteractionLedger
  /** Omit to skip static analysis */
  analyzer?: StaticAnalyzer
  policy?: RefinementPolicy
  /** Language named in prompts (default: Python) */
  language?: string
  eventBus?: TypedEventBus
}

export class RefinementControllerImpl implements RefinementController {
  private readonly _dispatcher: CapabilityDispatcher
  private readonly _ledger: InteractionLedger
  private readonly _analyzer: StaticAnalyzer | undefined
  private readonly _policy: RefinementPolicy
  private readonly _language: string
  private readonly _eventBus: TypedEventBus | undefined

  constructor(deps: RefinementControllerDeps) {
    this._dispatcher = deps.dispatcher
    this._ledger = deps.ledger
    this._analyzer = deps.analyzer
    this._policy = deps.policy ?? DEFAULT_REFINEMENT_POLICY
    this._language = deps.language ?? 'Python'
    this._eventBus = deps.eventBus
  }

  async refineText(specification: string, options?: RefineOptions): Promise<string> {
    const result = await this.refine(specification, options)
    return result.artifact
  }

  async refine(specification: string, options: RefineOptions = {}): Promise<RefinementResult> {
    const family = options.family ?? DEFAULT_REFINEMENT_FAMILY
    const invoke = (prompt: string): Promise<string> => this._dispatcher.invoke(family, prompt)
    const confidencePolicy: ConfidencePolicy = {
      base: this._policy.confidenceBase,
      stepPeriod: this._policy.confidenceStepPeriod,
    }
    const lang = this._language

    logger.info({ maxCycles: this._policy.maxCycles, family }, 'Refinement started')
    let draft = await invoke(draftPrompt(specification, lang))
    let lastScore: number | null = null

    for (let cycle = 0; cycle < this._policy.maxCycles; cycle++) {
      logger.debug({ cycle: cycle + 1, maxCycles: this._policy.maxCycles }, 'Refinement cycle')

      let reasoning = INITIAL_REASONING
      for (let round = 0; round < this._policy.critiqueRounds; round++) {
        reasoning = await invoke(critiquePrompt(specification, draft, reasoning, lang))
      }

      draft = await invoke(revisePrompt(specification, draft, reasoning, lang))

      if (this._analyzer !== undefined) {
        const report = await this._analyzer.analyze(draft)
        await this._recordAnalysis(draft, report)
        if (report.status === 'issues') {
          logger.info({ cycle: cycle + 1 }, 'Static analysis found issues; requesting one correction')
          draft = await invoke(correctionPrompt(specification, draft, report.text, lang))
        }
      }

      const scorePrompt = confidencePrompt(draft, lang)
      const scoreText = await invoke(scorePrompt)
      const score = parseConfidence(scoreText)
      const threshold = confidenceThreshold(cycle, confidencePolicy)
      const confident = score !== null && score >= threshold
      lastScore = score

      if (score === null) {
        logger.warn({ cycle: cycle + 1 }, 'Could not parse confidence score; treating as not confident')
        // A failed call is already in the ledger as BackendInvocationFailed
        if (!isErrorText(scoreText)) await this._recordUnparseableConfidence(family, scorePrompt, scoreText)
      } else {
        logger.info({ cycle: cycle + 1, score, threshold, confident }, 'Confidence checked')
      }
      this._eventBus?.emit('refinement:cycle', { cycle: cycle + 1, score, threshold, confident })

      if (confident) {
        return { artifact: draft, cycles: cycle + 1, confident: true, lastScore }
      }
    }

    logger.warn({ maxCycles: this._policy.maxCycles, lastScore }, 'Cycle limit reached; returning last draft')
    return { artifact: draft, cycles: this._policy.maxCycles, confident: false, lastScore }
  }

  private async _recordUnparseableConfidence(
    requested: CapabilityFamily,
    prompt: string,
    response: string
  ): Promise<void> {
    const available = this._dispatcher.availableFamilies()
    const channel = available.includes(requested) ? requested : (available[0] ?? requested)
    await this._ledger.record({ channel, success: false, errorKind: 'ConfidenceUnparseable', prompt, response })
  }

  private async _recordAnalysis(draft: string, report: StaticAnalysisReport): Promise<void> {
    let response: string
    switch (report.status) {
      case 'declined':
        response = 'Declined: input is not source text.'
        break
      case 'clean':
        response = 'No issues reported.'
        break
      case 'issues':
      case 'unavailable':
        response = report.text
        break
    }
    await this._ledger.record({
      channel: 'static-analysis',
      success: report.status !== 'unavailable',
      ...(report.status === 'unavailable' ? { errorKind: 'ToolUnavailableOrTimedOut' } : {}),
      prompt: draft,
      response,
    })
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createRefinementController(deps: RefinementControllerDeps): RefinementController {
  return new RefinementControllerImpl(deps)
}
