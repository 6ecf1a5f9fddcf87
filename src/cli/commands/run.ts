/**
 * `workcell run` command
 *
 * Starts a new run for a goal, or resumes the checkpointed one, and drives it
 * to completion.
 *
 * Usage:
 *   workcell run "build a todo API"       Start a run (or resume one in progress)
 *   workcell run                          Resume the run in progress
 *   workcell run --fresh "new goal"       Discard the checkpoint first
 *
 * Exit codes:
 *   0 - Run completed
 *   1 - Error (configuration, no backend, persistence, operator input closed)
 *   2 - Usage error (no goal and nothing to resume)
 */

import type { Command } from 'commander'
import type { TextGenerator } from '../../adapters/types.js'
import { ConfigurationMissingError, errorMessage } from '../../core/errors.js'
import type { CredentialSource, WorkflowState } from '../../core/types.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { ReadlineOperatorPrompt } from '../../modules/operator-gate/readline-operator-prompt.js'
import type { OperatorPrompt } from '../../modules/operator-gate/types.js'
import { createWorkcellRuntime } from '../../runtime.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('run-cmd')

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1
export const RUN_EXIT_USAGE = 2

export const COMPLETION_MESSAGE = 'Workflow complete. Run with --fresh to start a new goal.'

export interface RunActionOptions {
  goal: string
  fresh: boolean
  projectRoot: string
  /** Environment used for config overrides and credentials (default: process.env) */
  env?: CredentialSource
  globalConfigDir?: string
  operator?: OperatorPrompt
  generateText?: TextGenerator
}

/**
 * Render the parts of a finished run the operator reads on the terminal.
 */
export function renderRunSummary(state: WorkflowState): string {
  return [
    '--- Verification Report ---',
    state.artifacts['verification-report'] ?? '',
    '',
    '--- Documentation ---',
    state.artifacts.documentation ?? '',
    '',
    COMPLETION_MESSAGE,
  ].join('\n')
}

/**
 * Core action for the run command. Returns the exit code.
 */
export async function runRunAction(options: RunActionOptions): Promise<number> {
  const goal = options.goal.trim()

  let config: ConfigSystem
  try {
    config = createConfigSystem({
      projectRoot: options.projectRoot,
      env: options.env,
      globalConfigDir: options.globalConfigDir,
    })
    await config.load()
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    logger.error({ err }, 'Configuration could not be loaded')
    return RUN_EXIT_ERROR
  }

  const runtime = createWorkcellRuntime({
    config: config.getConfig(),
    stateDir: config.getStateDir(),
    credentials: config.credentials,
    operator: options.operator ?? new ReadlineOperatorPrompt(),
    generateText: options.generateText,
  })

  try {
    runtime.dispatcher.assertConfigured()

    if (options.fresh) {
      await runtime.engine.reset()
    }

    const current = await runtime.engine.getState()
    if (current.phase === 'Idle' && goal === '') {
      process.stderr.write('Error: A goal is required when no run is in progress.\n')
      return RUN_EXIT_USAGE
    }
    if (current.phase !== 'Idle' && goal !== '') {
      process.stderr.write(
        `Resuming run ${current.runId} at ${current.phase}; the new goal is ignored (use --fresh to replace it).\n`
      )
    }

    const finished = await runtime.engine.run(goal)
    process.stdout.write(renderRunSummary(finished) + '\n')
    return RUN_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigurationMissingError) {
      process.stderr.write(`Error: ${err.message}\n`)
    } else {
      process.stderr.write(`Error: ${errorMessage(err)}\n`)
      logger.error({ err }, 'Run failed')
    }
    return RUN_EXIT_ERROR
  } finally {
    runtime.close()
  }
}

/**
 * Register the `workcell run` command with the CLI program.
 */
export function registerRunCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd()
): void {
  program
    .command('run [goal...]')
    .description('Start a run for a goal, or resume the run in progress')
    .option('--fresh', 'Discard any checkpointed run before starting', false)
    .option('--project-root <path>', 'Project root directory', projectRoot)
    .action(async (goalWords: string[], opts: { fresh: boolean; projectRoot: string }) => {
      const exitCode = await runRunAction({
        goal: goalWords.join(' '),
        fresh: opts.fresh,
        projectRoot: opts.projectRoot,
      })
      process.exitCode = exitCode
    })
}
