/**
 * Confidence scoring for the refinement loop.
 */

export interface ConfidencePolicy {
  /** Threshold at cycle 0 */
  base: number
  /** Threshold rises by one every `stepPeriod` cycles */
  stepPeriod: number
}

export const DEFAULT_CONFIDENCE_POLICY: ConfidencePolicy = { base: 7, stepPeriod: 4 }

/**
 * Minimum score that ends the loop at `cycle` (0-based).
 * Non-decreasing in `cycle`.
 */
export function confidenceThreshold(
  cycle: number,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): number {
  return policy.base + Math.floor(cycle / policy.stepPeriod)
}

/**
 * Integer value of the first run of digits in `text`, or null when there is none.
 * A null score never satisfies a threshold.
 */
export function parseConfidence(text: string): number | null {
  const match = /\d+/.exec(text)
  return match === null ? null : parseInt(match[0], 10)
}
