/**
 * Types for the RefinementController (bounded draft → critique → revise →
 * confidence loop).
 */

import type { CapabilityFamily } from '../../core/types.js'

export interface RefinementPolicy {
  /** Upper bound on cycles; the loop always stops here */
  maxCycles: number
  /** Critique rounds per cycle; only the last round's reasoning survives */
  critiqueRounds: number
  /** Confidence threshold at cycle 0 */
  confidenceBase: number
  /** Threshold rises by one every this many cycles */
  confidenceStepPeriod: number
}

export const DEFAULT_REFINEMENT_POLICY: RefinementPolicy = {
  maxCycles: 16,
  critiqueRounds: 6,
  confidenceBase: 7,
  confidenceStepPeriod: 4,
}

export interface RefineOptions {
  /** Override the preferred family for this run (default: codex) */
  family?: CapabilityFamily
}

export interface RefinementResult {
  /** Final draft text */
  artifact: string
  /** Cycles executed (1..maxCycles) */
  cycles: number
  /** Whether the last confidence check met its threshold */
  confident: boolean
  /** Last parsed score; null when the response held no digits */
  lastScore: number | null
}

/**
 * Converges a text artifact against a specification through bounded
 * self-critique.
 */
export interface RefinementController {
  refine(specification: string, options?: RefineOptions): Promise<RefinementResult>
  /** `refine(...)` reduced to the final artifact text */
  refineText(specification: string, options?: RefineOptions): Promise<string>
}
