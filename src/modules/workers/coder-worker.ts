import type { RefinementController } from '../refinement/types.js'
import { createLogger } from '../../utils/logger.js'
import type { Capability } from './capability.js'

const logger = createLogger('workers')

/**
 * Code generation through the refinement loop. Used for the first
 * implementation and for repairs.
 */
export class CoderWorker implements Capability {
  readonly role = 'coder' as const

  private readonly _refinement: RefinementController

  constructor(refinement: RefinementController) {
    this._refinement = refinement
  }

  async execute(input: string): Promise<string> {
    const result = await this._refinement.refine(input)
    logger.info(
      { cycles: result.cycles, confident: result.confident, lastScore: result.lastScore },
      'Code generation finished'
    )
    return result.artifact
  }
}
