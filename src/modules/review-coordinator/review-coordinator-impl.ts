/**
 * ReviewCoordinatorImpl — runs independent review workers concurrently.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger } from '../../utils/logger.js'
import { isErrorText } from '../capability-dispatch/types.js'
import { fanOut } from './fan-out.js'
import type { ReviewCoordinator, ReviewTask } from './types.js'

const logger = createLogger('review-coordinator')

export interface ReviewCoordinatorOptions {
  eventBus?: TypedEventBus
}

export class ReviewCoordinatorImpl implements ReviewCoordinator {
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: ReviewCoordinatorOptions = {}) {
    this._eventBus = options.eventBus
  }

  async runParallel(tasks: Readonly<Record<string, ReviewTask>>): Promise<Map<string, string>> {
    const names = Object.keys(tasks)
    logger.info({ tasks: names }, 'Fanning out review tasks')

    const deferred: Record<string, () => Promise<string>> = {}
    for (const [name, task] of Object.entries(tasks)) {
      deferred[name] = () => task.capability.execute(task.input)
    }
    const results = await fanOut(deferred)

    const failed = [...results].filter(([, text]) => isErrorText(text)).map(([name]) => name)
    if (failed.length > 0) {
      logger.warn({ failed }, 'Some review tasks returned error text')
    }
    logger.info({ tasks: names }, 'Review tasks joined')
    this._eventBus?.emit('review:joined', { tasks: names, failed })
    return results
  }
}

export function createReviewCoordinator(options: ReviewCoordinatorOptions = {}): ReviewCoordinator {
  return new ReviewCoordinatorImpl(options)
}
