/**
 * Types for the ReviewCoordinator (concurrent fan-out with a blocking join).
 */

import type { Capability } from '../workers/capability.js'

/** One independent review: which worker to run and what to give it */
export interface ReviewTask {
  capability: Capability
  input: string
}

export interface ReviewCoordinator {
  /**
   * Start every task together and wait for all of them.
   * A task that rejects yields error text in its own slot; siblings are unaffected.
   * The result is keyed by task name, in the order the tasks were given.
   */
  runParallel(tasks: Readonly<Record<string, ReviewTask>>): Promise<Map<string, string>>
}
