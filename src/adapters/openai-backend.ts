import { createOpenAI } from '@ai-sdk/openai'
import type { LanguageModel } from 'ai'
import { AiSdkBackend } from './ai-sdk-backend.js'

/**
 * Codex family backend (OpenAI). Preferred for code generation and the
 * refinement loop.
 */
export class OpenAIBackend extends AiSdkBackend {
  readonly family = 'codex' as const
  readonly displayName = 'OpenAI Codex'

  createModel(modelId: string, apiKey: string): LanguageModel {
    return createOpenAI({ apiKey })(modelId)
  }
}
