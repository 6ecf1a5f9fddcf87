/**
 * The human side of the Feedback phase.
 */

export interface OperatorPrompt {
  /** Show text to the operator */
  display(text: string): void
  /**
   * Block until the operator answers `question`. There is no timeout.
   * @throws {OperatorInputClosedError} when input ends before an answer arrives
   */
  ask(question: string): Promise<string>
}

/** Answer that accepts the automated findings as they are */
export const APPROVE_SENTINEL = 'approve'

/** Trimmed, case-insensitive comparison with the approve sentinel */
export function isApproval(answer: string): boolean {
  return answer.trim().toLowerCase() === APPROVE_SENTINEL
}
