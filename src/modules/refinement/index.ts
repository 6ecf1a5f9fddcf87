/**
 * refinement module — public API exports.
 */

export type {
  RefinementController,
  RefinementPolicy,
  RefinementResult,
  RefineOptions,
} from './types.js'
export { DEFAULT_REFINEMENT_POLICY } from './types.js'
export {
  RefinementControllerImpl,
  createRefinementController,
  DEFAULT_REFINEMENT_FAMILY,
} from './refinement-controller-impl.js'
export type { RefinementControllerDeps } from './refinement-controller-impl.js'
export { confidenceThreshold, parseConfidence, DEFAULT_CONFIDENCE_POLICY } from './confidence.js'
export type { ConfidencePolicy } from './confidence.js'
