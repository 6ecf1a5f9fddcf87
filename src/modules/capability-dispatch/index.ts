/**
 * capability-dispatch module — public API exports.
 */

export type {
  CapabilityDispatcher,
  DispatchOutcome,
  DispatchErrorKind,
} from './types.js'
export { ERROR_TEXT_PREFIX, isErrorText } from './types.js'
export { CapabilityDispatcherImpl, createCapabilityDispatcher } from './dispatcher-impl.js'
export type { CapabilityDispatcherDeps } from './dispatcher-impl.js'
