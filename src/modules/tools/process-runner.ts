/**
 * Bounded subprocess execution for external tools.
 *
 * Commands are executed via child_process.spawn with an argument vector (no
 * shell). A run that outlives its timeout is killed with SIGKILL.
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('tools')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessRunOptions {
  cwd?: string
  timeoutMs: number
  env?: NodeJS.ProcessEnv
}

export interface ProcessResult {
  stdout: string
  stderr: string
  /** Exit code; null when the process was killed or never started */
  code: number | null
  timedOut: boolean
  /** The binary could not be found */
  missing: boolean
}

/** Signature shared by the default runner and test doubles */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: ProcessRunOptions
) => Promise<ProcessResult>

// ---------------------------------------------------------------------------
// runProcess
// ---------------------------------------------------------------------------

/**
 * Spawn `command` with `args` and collect its output.
 * Never rejects: spawn failures are reported through `missing` / `stderr`.
 */
export const runProcess: ProcessRunner = (command, args, options) => {
  return new Promise((resolve) => {
    logger.debug({ command, args, cwd: options.cwd, timeoutMs: options.timeoutMs }, 'runProcess')

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false

    const finish = (result: Omit<ProcessResult, 'stdout' | 'stderr' | 'timedOut'>): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      resolve({ stdout, stderr, timedOut, ...result })
    }

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    const timer = setTimeout(() => {
      timedOut = true
      logger.warn({ command, timeoutMs: options.timeoutMs }, 'Process timed out; killing')
      proc.kill('SIGKILL')
    }, options.timeoutMs)

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code) => {
      finish({ code: timedOut ? null : code, missing: false })
    })

    proc.on('error', (err) => {
      const missing = 'code' in err && err.code === 'ENOENT'
      if (!missing) stderr += err.message
      finish({ code: null, missing })
    })
  })
}
