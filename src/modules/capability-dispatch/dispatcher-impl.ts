/**
 * CapabilityDispatcherImpl — concrete implementation of CapabilityDispatcher.
 *
 * Availability is derived from the credential source on every call and never
 * cached. Every attempt that reaches a backend is recorded in the ledger under
 * the family actually used.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  BackendInvocationError,
  ConfigurationMissingError,
  NoBackendAvailableError,
  errorMessage,
} from '../../core/errors.js'
import { CAPABILITY_FAMILIES } from '../../core/types.js'
import type { CapabilityFamily, CredentialSource } from '../../core/types.js'
import type { BackendRegistry } from '../../adapters/backend-registry.js'
import { resolveCredential } from '../../adapters/credentials.js'
import type { ProvidersConfig } from '../config/config-schema.js'
import type { InteractionLedger } from '../interaction-ledger/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import { ERROR_TEXT_PREFIX } from './types.js'
import type { CapabilityDispatcher, DispatchErrorKind, DispatchOutcome } from './types.js'

const logger = createLogger('capability-dispatch')

export interface CapabilityDispatcherDeps {
  registry: BackendRegistry
  providers: ProvidersConfig
  credentials: CredentialSource
  ledger: InteractionLedger
  eventBus?: TypedEventBus
}

export class CapabilityDispatcherImpl implements CapabilityDispatcher {
  private readonly _registry: BackendRegistry
  private readonly _providers: ProvidersConfig
  private readonly _credentials: CredentialSource
  private readonly _ledger: InteractionLedger
  private readonly _eventBus: TypedEventBus | undefined

  constructor(deps: CapabilityDispatcherDeps) {
    this._registry = deps.registry
    this._providers = deps.providers
    this._credentials = deps.credentials
    this._ledger = deps.ledger
    this._eventBus = deps.eventBus
  }

  // ---------------------------------------------------------------------------
  // CapabilityDispatcher interface
  // ---------------------------------------------------------------------------

  availableFamilies(): CapabilityFamily[] {
    return CAPABILITY_FAMILIES.filter(
      (family) => this._registry.get(family) !== undefined && this._credentialFor(family) !== null
    )
  }

  assertConfigured(): void {
    if (this.availableFamilies().length === 0) {
      throw new ConfigurationMissingError(undefined, {
        checked: CAPABILITY_FAMILIES.map((family) => this._providers[family].api_key_env),
      })
    }
  }

  async invoke(preferred: CapabilityFamily, prompt: string): Promise<string> {
    const outcome = await this.dispatch(preferred, prompt)
    return outcome.text
  }

  async dispatch(preferred: CapabilityFamily, prompt: string): Promise<DispatchOutcome> {
    const family = this._select(preferred)
    const startedAt = Date.now()
    const outcome = await this._invokeFamily(family, prompt)

    await this._ledger.record({
      channel: family,
      success: outcome.ok,
      ...(outcome.ok ? {} : { errorKind: outcome.errorKind }),
      prompt,
      response: outcome.text,
    })

    this._eventBus?.emit('dispatch:complete', {
      family,
      success: outcome.ok,
      ...(outcome.ok ? {} : { errorKind: outcome.errorKind }),
      durationMs: Date.now() - startedAt,
    })
    return outcome
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _credentialFor(family: CapabilityFamily): string | null {
    return resolveCredential(this._credentials, this._providers[family].api_key_env)
  }

  private _select(preferred: CapabilityFamily): CapabilityFamily {
    const available = this.availableFamilies()
    if (available.includes(preferred)) return preferred

    const substitute = available[0]
    if (substitute === undefined) {
      throw new NoBackendAvailableError(preferred)
    }
    logger.warn({ requested: preferred, used: substitute }, 'Preferred backend unavailable; substituting')
    this._eventBus?.emit('dispatch:substituted', { requested: preferred, used: substitute })
    return substitute
  }

  private async _invokeFamily(family: CapabilityFamily, prompt: string): Promise<DispatchOutcome> {
    const provider = this._providers[family]
    const backend = this._registry.get(family)
    const apiKey = this._credentialFor(family)

    if (provider.model.trim() === '') {
      logger.error({ family }, 'No model configured for backend')
      return failure(family, 'ModelNotConfigured', `Model '${family}' is not configured.`)
    }
    // Both were checked by _select; they can only vanish if the environment changed in between
    if (backend === undefined || apiKey === null) {
      return failure(family, 'BackendInvocationFailed', `Backend '${family}' became unavailable.`)
    }

    try {
      const text = await backend.generate({
        prompt,
        modelId: provider.model,
        apiKey,
        maxOutputTokens: provider.max_output_tokens,
      })
      logger.debug({ family, responseLength: text.length }, 'Backend call succeeded')
      return { ok: true, family, text }
    } catch (err) {
      const wrapped = new BackendInvocationError(maskSecrets(errorMessage(err), [apiKey]), {
        family,
        modelId: provider.model,
      })
      logger.error({ family, err: wrapped.toJSON() }, 'Backend call failed')
      return failure(family, 'BackendInvocationFailed', wrapped.message)
    }
  }
}

function failure(family: CapabilityFamily, errorKind: DispatchErrorKind, message: string): DispatchOutcome {
  return { ok: false, family, errorKind, text: `${ERROR_TEXT_PREFIX} ${message}` }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new CapabilityDispatcher.
 */
export function createCapabilityDispatcher(deps: CapabilityDispatcherDeps): CapabilityDispatcher {
  return new CapabilityDispatcherImpl(deps)
}
