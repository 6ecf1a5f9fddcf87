import { ERROR_TEXT_PREFIX } from '../capability-dispatch/types.js'
import {
  ConfigurationMissingError,
  StatePersistenceError,
  errorMessage,
} from '../../core/errors.js'

/** A named deferred computation */
export type FanOutTasks = Readonly<Record<string, () => Promise<string>>>

/** Errors that halt the run instead of becoming a task's error text */
function isHaltingError(reason: unknown): boolean {
  return reason instanceof ConfigurationMissingError || reason instanceof StatePersistenceError
}

/**
 * Run all tasks concurrently and join on every one of them.
 * Rejections become `ERROR: Task '<name>' failed: <message>` in that task's slot,
 * except halting errors: the first of those is rethrown once every task has settled.
 */
export async function fanOut(tasks: FanOutTasks): Promise<Map<string, string>> {
  const entries = Object.entries(tasks)
  const settled = await Promise.allSettled(entries.map(async ([, run]) => run()))

  for (const outcome of settled) {
    if (outcome.status === 'rejected' && isHaltingError(outcome.reason)) throw outcome.reason
  }

  const results = new Map<string, string>()
  entries.forEach(([name], index) => {
    const outcome = settled[index]
    if (outcome === undefined) return
    results.set(
      name,
      outcome.status === 'fulfilled'
        ? outcome.value
        : `${ERROR_TEXT_PREFIX} Task '${name}' failed: ${errorMessage(outcome.reason)}`
    )
  })
  return results
}
