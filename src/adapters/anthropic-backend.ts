import { createAnthropic } from '@ai-sdk/anthropic'
import type { LanguageModel } from 'ai'
import { AiSdkBackend } from './ai-sdk-backend.js'

/**
 * Claude family backend (Anthropic Messages API).
 */
export class AnthropicBackend extends AiSdkBackend {
  readonly family = 'claude' as const
  readonly displayName = 'Anthropic Claude'

  createModel(modelId: string, apiKey: string): LanguageModel {
    return createAnthropic({ apiKey })(modelId)
  }
}
