/**
 * Execution of generated unit tests through an external test command.
 * Fails closed: anything other than a clean run with the success marker is a failure.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../core/errors.js'
import type { TestRunnerConfig } from '../config/config-schema.js'
import { runProcess } from './process-runner.js'
import type { ProcessRunner } from './process-runner.js'
import { stripCodeFences } from './source-text.js'
import { withTempSource } from './temp-source.js'

const logger = createLogger('tools:test-runner')

export interface TestRunResult {
  passed: boolean
  /** stdout and stderr, or a fixed message when the run could not complete */
  output: string
}

export interface TestRunner {
  run(testSource: string): Promise<TestRunResult>
}

export class CommandTestRunner implements TestRunner {
  private readonly _config: TestRunnerConfig
  private readonly _run: ProcessRunner

  constructor(config: TestRunnerConfig, run: ProcessRunner = runProcess) {
    this._config = config
    this._run = run
  }

  async run(testSource: string): Promise<TestRunResult> {
    const {
      command,
      args,
      file_extension: ext,
      timeout_ms: timeoutMs,
      success_marker: marker,
    } = this._config

    logger.info({ command }, 'Executing generated unit tests')
    try {
      const result = await withTempSource(stripCodeFences(testSource), `test_generated${ext}`, (dir, fileName) =>
        this._run(command, [...args, fileName], { cwd: dir, timeoutMs })
      )

      if (result.missing) {
        logger.error({ command }, 'Test runtime not found')
        return { passed: false, output: `\`${command}\` not found. Please ensure it is on the PATH.` }
      }
      if (result.timedOut) {
        logger.error({ command, timeoutMs }, 'Test execution timed out')
        return {
          passed: false,
          output: `Test execution timed out after ${String(timeoutMs / 1000)} seconds.`,
        }
      }

      const output = `${result.stdout}\n${result.stderr}`
      const passed = result.code === 0 && output.includes(marker)
      if (passed) {
        logger.info('Unit tests passed')
      } else {
        logger.warn({ code: result.code }, 'Unit tests failed or had errors')
      }
      return { passed, output }
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Test execution could not start')
      return { passed: false, output: `Test execution failed: ${errorMessage(err)}` }
    }
  }
}
