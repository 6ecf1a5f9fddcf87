/**
 * `workcell memory` command group
 *
 * Usage:
 *   workcell memory query "<text>" [-n <count>]   List stored runs most similar to text
 *
 * Exit codes:
 *   0 - Success (including an empty result or disabled memory)
 *   1 - Error (configuration, database)
 *   2 - Usage error (invalid count)
 */

import type { Command } from 'commander'
import { errorMessage } from '../../core/errors.js'
import type { CredentialSource } from '../../core/types.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createMemoryStore, DEFAULT_QUERY_RESULTS } from '../../modules/memory/index.js'
import type { MemoryMatch, MemoryStore } from '../../modules/memory/index.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('memory-cmd')

export const MEMORY_EXIT_SUCCESS = 0
export const MEMORY_EXIT_ERROR = 1
export const MEMORY_EXIT_USAGE = 2

export interface MemoryQueryActionOptions {
  text: string
  count: string | number
  projectRoot: string
  env?: CredentialSource
  globalConfigDir?: string
}

/**
 * One block per match: header line with score and goal, then the stored text.
 */
export function renderMemoryMatches(matches: MemoryMatch[]): string {
  if (matches.length === 0) return 'No matching memories.'
  return matches
    .map((match, index) => {
      const goal = match.metadata['goal']
      const header = `${String(index + 1)}. ${match.id}  score: ${match.score.toFixed(3)}`
      return [typeof goal === 'string' ? `${header}  goal: ${goal}` : header, match.text].join('\n')
    })
    .join('\n\n')
}

export async function runMemoryQueryAction(options: MemoryQueryActionOptions): Promise<number> {
  const count = typeof options.count === 'number' ? options.count : Number(options.count)
  if (!Number.isInteger(count) || count < 1) {
    process.stderr.write(`Error: -n must be a positive integer, got "${String(options.count)}"\n`)
    return MEMORY_EXIT_USAGE
  }

  let store: MemoryStore | null = null

  try {
    const config = createConfigSystem({
      projectRoot: options.projectRoot,
      env: options.env,
      globalConfigDir: options.globalConfigDir,
    })
    await config.load()

    store = createMemoryStore(config.getConfig().memory, config.getStateDir())
    if (!store.enabled) {
      process.stdout.write('Memory is disabled. Set memory.enabled: true in .workcell/config.yaml.\n')
      return MEMORY_EXIT_SUCCESS
    }

    const matches = await store.search(options.text, count)
    process.stdout.write(renderMemoryMatches(matches) + '\n')
    return MEMORY_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    logger.error({ err }, 'runMemoryQueryAction failed')
    return MEMORY_EXIT_ERROR
  } finally {
    store?.close()
  }
}

/**
 * Register the `workcell memory` command group with the CLI program.
 */
export function registerMemoryCommand(
  program: Command,
  _version = '0.0.0',
  projectRoot = process.cwd()
): void {
  const memoryCmd = program.command('memory').description('Inspect the memory of completed runs')

  memoryCmd
    .command('query <text>')
    .description('List stored runs most similar to the text')
    .option('-n, --count <count>', 'Maximum number of results', String(DEFAULT_QUERY_RESULTS))
    .option('--project-root <path>', 'Project root directory', projectRoot)
    .action(async (text: string, opts: { count: string; projectRoot: string }) => {
      const exitCode = await runMemoryQueryAction({
        text,
        count: opts.count,
        projectRoot: opts.projectRoot,
      })
      process.exitCode = exitCode
    })
}
