/**
 * Static analysis of generated source through an external linter command.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../core/errors.js'
import { isErrorText } from '../capability-dispatch/types.js'
import type { StaticAnalysisConfig } from '../config/config-schema.js'
import { runProcess } from './process-runner.js'
import type { ProcessRunner } from './process-runner.js'
import { stripCodeFences } from './source-text.js'
import { withTempSource } from './temp-source.js'

const logger = createLogger('tools:static-analysis')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Outcome of one analysis request.
 *  - `declined`: input was not source (empty or an ERROR payload); nothing ran
 *  - `clean`: tool ran and reported nothing
 *  - `issues`: tool reported findings (in `text`)
 *  - `unavailable`: tool missing or timed out (fixed message in `text`)
 */
export type StaticAnalysisReport =
  | { status: 'declined' }
  | { status: 'clean' }
  | { status: 'issues'; text: string }
  | { status: 'unavailable'; text: string }

export interface StaticAnalyzer {
  analyze(source: string): Promise<StaticAnalysisReport>
}

// ---------------------------------------------------------------------------
// CommandStaticAnalyzer
// ---------------------------------------------------------------------------

export class CommandStaticAnalyzer implements StaticAnalyzer {
  private readonly _config: StaticAnalysisConfig
  private readonly _run: ProcessRunner

  constructor(config: StaticAnalysisConfig, run: ProcessRunner = runProcess) {
    this._config = config
    this._run = run
  }

  /**
   * Issues text, or null when there is nothing to fix. An unavailable tool
   * yields its fixed message.
   */
  async check(source: string): Promise<string | null> {
    const report = await this.analyze(source)
    return report.status === 'issues' || report.status === 'unavailable' ? report.text : null
  }

  async analyze(source: string): Promise<StaticAnalysisReport> {
    const code = stripCodeFences(source)
    if (code === '' || isErrorText(source)) {
      logger.debug('Static analysis declined: input is not source text')
      return { status: 'declined' }
    }

    const { command, args, file_extension: ext, timeout_ms: timeoutMs } = this._config
    try {
      const result = await withTempSource(code, `generated${ext}`, (dir, fileName) =>
        this._run(command, [...args, fileName], { cwd: dir, timeoutMs })
      )

      if (result.missing) {
        logger.warn({ command }, 'Static analysis tool not found')
        return { status: 'unavailable', text: `Static analysis unavailable: \`${command}\` not found.` }
      }
      if (result.timedOut) {
        logger.warn({ command, timeoutMs }, 'Static analysis timed out')
        return {
          status: 'unavailable',
          text: `Static analysis unavailable: timed out after ${String(timeoutMs)}ms.`,
        }
      }
      if (result.code === 0) {
        return { status: 'clean' }
      }

      const output = [result.stdout, result.stderr].map((s) => s.trim()).filter((s) => s !== '').join('\n')
      logger.info({ command, code: result.code }, 'Static analysis reported issues')
      return {
        status: 'issues',
        text: output !== '' ? output : `${command} exited with code ${String(result.code)}`,
      }
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Static analysis could not run')
      return { status: 'unavailable', text: `Static analysis unavailable: ${errorMessage(err)}` }
    }
  }
}
