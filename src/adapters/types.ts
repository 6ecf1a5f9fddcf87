/**
 * Type definitions for the capability backend subsystem
 * All backend types are defined here for consistency and reuse
 */

import type { LanguageModel } from 'ai'
import type { CapabilityFamily } from '../core/types.js'

// Re-export for convenience
export type { CapabilityFamily }

/**
 * A single text-generation request handed to a backend.
 * The credential travels with the request; backends hold no client state.
 */
export interface GenerateRequest {
  /** Full prompt text */
  prompt: string
  /** Provider model identifier (e.g. "gpt-4o") */
  modelId: string
  /** Credential read from the environment at dispatch time */
  apiKey: string
  /** Upper bound on generated tokens */
  maxOutputTokens: number
}

/**
 * Arguments for the underlying text generator.
 * Mirrors the subset of the AI SDK `generateText` call the backends use.
 */
export interface TextGenerationArgs {
  model: LanguageModel
  prompt: string
  maxTokens: number
}

/**
 * Function that turns a language model and prompt into text.
 * Injectable so tests never reach a provider.
 */
export type TextGenerator = (args: TextGenerationArgs) => Promise<string>

/**
 * A backend able to satisfy generateText requests for one capability family.
 */
export interface CapabilityBackend {
  /** Capability family served by this backend */
  readonly family: CapabilityFamily
  /**
   * Human-readable display name.
   * @example "Anthropic Claude"
   */
  readonly displayName: string

  /**
   * Generate text for the prompt.
   * Provider errors propagate; the dispatcher converts them.
   */
  generate(request: GenerateRequest): Promise<string>
}
