import type { CapabilityFamily } from '../../core/types.js'
import type { CapabilityDispatcher } from '../capability-dispatch/types.js'
import { createLogger } from '../../utils/logger.js'
import type { Capability, WorkerRole } from './capability.js'

const logger = createLogger('workers')

/**
 * A worker that renders one prompt from its input and sends it to its
 * preferred family.
 */
export class PromptWorker implements Capability {
  readonly role: WorkerRole
  readonly family: CapabilityFamily

  private readonly _dispatcher: CapabilityDispatcher
  private readonly _buildPrompt: (input: string) => string

  constructor(
    role: WorkerRole,
    family: CapabilityFamily,
    dispatcher: CapabilityDispatcher,
    buildPrompt: (input: string) => string
  ) {
    this.role = role
    this.family = family
    this._dispatcher = dispatcher
    this._buildPrompt = buildPrompt
  }

  async execute(input: string): Promise<string> {
    logger.info({ role: this.role, family: this.family }, 'Worker started')
    const output = await this._dispatcher.invoke(this.family, this._buildPrompt(input))
    logger.debug({ role: this.role, outputLength: output.length }, 'Worker finished')
    return output
  }
}
