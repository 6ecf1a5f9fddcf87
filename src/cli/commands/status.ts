/**
 * `workcell status` command
 *
 * Displays the checkpointed state of the run in progress.
 *
 * Usage:
 *   workcell status                        Human-readable report
 *   workcell status --output-format json   Single NDJSON snapshot
 *
 * Exit codes:
 *   0 - Success (including "no run in progress")
 *   1 - Error (configuration, unreadable or corrupted checkpoint)
 *   2 - Usage error (unknown output format)
 */

import type { Command } from 'commander'
import { ARTIFACT_SLOTS } from '../../core/types.js'
import type { CredentialSource, WorkflowState } from '../../core/types.js'
import { errorMessage } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createStateStore } from '../../persistence/state-store.js'
import type { StateStore } from '../../persistence/state-store.js'
import { emitStatusSnapshot } from '../formatters/streaming.js'
import { renderStatusHuman } from '../formatters/status-formatter.js'
import type { StatusSnapshot } from '../types/status.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('status-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const STATUS_EXIT_SUCCESS = 0
export const STATUS_EXIT_ERROR = 1
export const STATUS_EXIT_USAGE = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StatusOutputFormat = 'human' | 'json'

export interface StatusActionOptions {
  outputFormat: string
  projectRoot: string
  env?: CredentialSource
  globalConfigDir?: string
}

function isOutputFormat(value: string): value is StatusOutputFormat {
  return value === 'human' || value === 'json'
}

// ---------------------------------------------------------------------------
// toStatusSnapshot
// ---------------------------------------------------------------------------

/**
 * Project a checkpoint (or its absence) onto the status view.
 */
export function toStatusSnapshot(state: WorkflowState | null): StatusSnapshot {
  if (state === null) {
    return {
      runId: null,
      phase: 'Idle',
      goal: '',
      filledSlots: [],
      pendingFeedback: [],
      updatedAt: null,
    }
  }
  return {
    runId: state.runId,
    phase: state.phase,
    goal: state.goal,
    filledSlots: ARTIFACT_SLOTS.filter((slot) => state.artifacts[slot] !== undefined),
    pendingFeedback: state.pendingFeedback,
    updatedAt: state.updatedAt,
  }
}

// ---------------------------------------------------------------------------
// runStatusAction — testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the status command. Reads the checkpoint without writing it.
 * Returns the exit code.
 */
export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const { outputFormat } = options

  if (!isOutputFormat(outputFormat)) {
    process.stderr.write(`Error: Unknown output format "${outputFormat}" (expected human or json)\n`)
    return STATUS_EXIT_USAGE
  }

  let store: StateStore | null = null

  try {
    const config = createConfigSystem({
      projectRoot: options.projectRoot,
      env: options.env,
      globalConfigDir: options.globalConfigDir,
    })
    await config.load()

    store = createStateStore(config.getConfig().global.state_backend, config.getStateDir())
    const snapshot = toStatusSnapshot(await store.load())

    if (outputFormat === 'json') {
      emitStatusSnapshot(snapshot)
    } else {
      process.stdout.write(renderStatusHuman(snapshot) + '\n')
    }
    return STATUS_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    logger.error({ err }, 'runStatusAction failed')
    return STATUS_EXIT_ERROR
  } finally {
    store?.close()
  }
}

// ---------------------------------------------------------------------------
// registerStatusCommand
// ---------------------------------------------------------------------------

/**
 * Register the `workcell status` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param _version    - Current package version (unused)
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerStatusCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd()
): void {
  program
    .command('status')
    .description('Show the checkpointed state of the run in progress')
    .option('--output-format <format>', 'Output format: human (default) or json (NDJSON)', 'human')
    .option('--project-root <path>', 'Project root directory', projectRoot)
    .action(async (opts: { outputFormat: string; projectRoot: string }) => {
      const exitCode = await runStatusAction({
        outputFormat: opts.outputFormat,
        projectRoot: opts.projectRoot,
      })
      process.exitCode = exitCode
    })
}
