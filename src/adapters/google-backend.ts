import { createGoogleGenerativeAI } from '@ai-sdk/google'
import type { LanguageModel } from 'ai'
import { AiSdkBackend } from './ai-sdk-backend.js'

/**
 * Gemini family backend (Google Generative AI).
 */
export class GoogleBackend extends AiSdkBackend {
  readonly family = 'gemini' as const
  readonly displayName = 'Google Gemini'

  createModel(modelId: string, apiKey: string): LanguageModel {
    return createGoogleGenerativeAI({ apiKey })(modelId)
  }
}
