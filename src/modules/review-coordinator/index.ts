export type { ReviewCoordinator, ReviewTask } from './types.js'
export { fanOut } from './fan-out.js'
export type { FanOutTasks } from './fan-out.js'
export { ReviewCoordinatorImpl, createReviewCoordinator } from './review-coordinator-impl.js'
export type { ReviewCoordinatorOptions } from './review-coordinator-impl.js'
