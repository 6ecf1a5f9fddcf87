/**
 * Types for the CapabilityDispatcher.
 *
 * Failures are recovered inside the dispatcher and returned as a tagged
 * outcome; only "no backend at all" escapes as an exception.
 */

import type { CapabilityFamily } from '../../core/types.js'

/** Recovered failure kinds reported in the ledger */
export type DispatchErrorKind = 'BackendInvocationFailed' | 'ModelNotConfigured'

/** Prefix marking text that stands in for a failed capability call */
export const ERROR_TEXT_PREFIX = 'ERROR:'

/**
 * Result of one capability invocation.
 * `family` is the family actually used, which may differ from the one requested.
 */
export type DispatchOutcome =
  | { ok: true; family: CapabilityFamily; text: string }
  | { ok: false; family: CapabilityFamily; errorKind: DispatchErrorKind; text: string }

/**
 * Picks a backend for a logical capability request and invokes it.
 */
export interface CapabilityDispatcher {
  /**
   * Invoke the preferred family, or silently the first available one in
   * preference order. Failed calls come back as `ERROR: ...` text.
   * @throws {NoBackendAvailableError} when no family has a usable credential
   */
  invoke(preferred: CapabilityFamily, prompt: string): Promise<string>

  /**
   * Same selection as `invoke`, returning the tagged outcome.
   * @throws {NoBackendAvailableError} when no family has a usable credential
   */
  dispatch(preferred: CapabilityFamily, prompt: string): Promise<DispatchOutcome>

  /** Families whose credential is currently present, in preference order */
  availableFamilies(): CapabilityFamily[]

  /**
   * Fail fast at startup.
   * @throws {ConfigurationMissingError} when no family is available
   */
  assertConfigured(): void
}

/** Whether a worker output is the stand-in text of a failed call */
export function isErrorText(text: string): boolean {
  return text.trimStart().startsWith(ERROR_TEXT_PREFIX)
}
