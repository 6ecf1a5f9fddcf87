/**
 * BackendRegistry — central registry for CapabilityBackend instances.
 *
 * Holds at most one backend per capability family. Which of them is usable at
 * a given moment is decided by the dispatcher from the current credentials.
 */

import type { CapabilityFamily } from '../core/types.js'
import type { CapabilityBackend } from './types.js'
import type { AiSdkBackendOptions } from './ai-sdk-backend.js'
import { AnthropicBackend } from './anthropic-backend.js'
import { OpenAIBackend } from './openai-backend.js'
import { GoogleBackend } from './google-backend.js'

/**
 * BackendRegistry manages the set of known backends.
 *
 * Usage:
 * ```typescript
 * const registry = createDefaultBackendRegistry()
 * const codex = registry.get('codex')
 * ```
 */
export class BackendRegistry {
  private readonly _backends = new Map<CapabilityFamily, CapabilityBackend>()

  /**
   * Register a backend under its family.
   * Overwrites any existing backend for the same family.
   */
  register(backend: CapabilityBackend): void {
    this._backends.set(backend.family, backend)
  }

  /**
   * Retrieve the backend for a family.
   * @returns The backend, or undefined if none is registered
   */
  get(family: CapabilityFamily): CapabilityBackend | undefined {
    return this._backends.get(family)
  }

  /**
   * Return all registered backends as an array.
   */
  getAll(): CapabilityBackend[] {
    return Array.from(this._backends.values())
  }
}

/**
 * Registry holding the three built-in AI SDK backends.
 */
export function createDefaultBackendRegistry(options: AiSdkBackendOptions = {}): BackendRegistry {
  const registry = new BackendRegistry()
  registry.register(new AnthropicBackend(options))
  registry.register(new OpenAIBackend(options))
  registry.register(new GoogleBackend(options))
  return registry
}
