/**
 * QA worker: critique, unit-test generation and test execution in one report.
 */

import type { CapabilityFamily } from '../../core/types.js'
import type { CapabilityDispatcher } from '../capability-dispatch/types.js'
import { isErrorText } from '../capability-dispatch/types.js'
import type { InteractionLedger } from '../interaction-ledger/types.js'
import type { TestRunner, TestRunResult } from '../tools/test-runner.js'
import { createLogger } from '../../utils/logger.js'
import type { Capability } from './capability.js'
import { qaCritiquePrompt, testGenerationPrompt } from './prompts.js'

const logger = createLogger('workers:qa')

export interface QaWorkerDeps {
  dispatcher: CapabilityDispatcher
  ledger: InteractionLedger
  /** Omit to skip test execution */
  testRunner?: TestRunner
  language?: string
  family?: CapabilityFamily
}

export class QaWorker implements Capability {
  readonly role = 'qa' as const
  readonly family: CapabilityFamily

  private readonly _dispatcher: CapabilityDispatcher
  private readonly _ledger: InteractionLedger
  private readonly _testRunner: TestRunner | undefined
  private readonly _language: string

  constructor(deps: QaWorkerDeps) {
    this._dispatcher = deps.dispatcher
    this._ledger = deps.ledger
    this._testRunner = deps.testRunner
    this._language = deps.language ?? 'Python'
    this.family = deps.family ?? 'gemini'
  }

  async execute(code: string): Promise<string> {
    logger.info('Performing QA cycle: critique, test generation and execution')

    const critique = await this._dispatcher.invoke(this.family, qaCritiquePrompt(code, this._language))
    const unitTests = await this._dispatcher.invoke(this.family, testGenerationPrompt(code, this._language))

    const execution = await this._runTests(unitTests)
    const fence = this._language.toLowerCase()

    const sections = [
      `--- QA Critique ---\n${critique}`,
      `--- Generated Unit Tests ---\n\`\`\`${fence}\n${unitTests}\n\`\`\``,
    ]
    if (execution === null) {
      sections.push('--- Test Execution Results ---\n**Result:** SKIPPED')
    } else {
      sections.push(
        '--- Test Execution Results ---\n' +
          `**Result:** ${execution.passed ? 'PASSED' : 'FAILED'}\n\n` +
          `**Output:**\n\`\`\`\n${execution.output}\n\`\`\``
      )
    }
    logger.info(
      { result: execution === null ? 'skipped' : execution.passed ? 'passed' : 'failed' },
      'QA cycle complete'
    )
    return sections.join('\n\n')
  }

  private async _runTests(unitTests: string): Promise<TestRunResult | null> {
    if (this._testRunner === undefined) return null
    // A failed generation call leaves nothing runnable
    if (isErrorText(unitTests)) {
      return { passed: false, output: 'No tests were generated.' }
    }
    const result = await this._testRunner.run(unitTests)
    await this._ledger.record({
      channel: 'test-runner',
      success: result.passed,
      prompt: unitTests,
      response: result.output,
    })
    return result
  }
}
