/**
 * Shared base for backends built on the Vercel AI SDK.
 *
 * Subclasses only decide how a provider client turns a model id and key into
 * a LanguageModel. The client is created per call so a credential rotated in
 * the environment is picked up without a restart.
 */

import { generateText } from 'ai'
import type { LanguageModel } from 'ai'
import { createLogger } from '../utils/logger.js'
import type {
  CapabilityBackend,
  CapabilityFamily,
  GenerateRequest,
  TextGenerator,
} from './types.js'

const logger = createLogger('adapters')

/** Default generator: one non-streaming AI SDK call */
export const aiSdkGenerateText: TextGenerator = async ({ model, prompt, maxTokens }) => {
  const result = await generateText({ model, prompt, maxTokens })
  return result.text
}

export interface AiSdkBackendOptions {
  /** Replace the AI SDK call (tests) */
  generateText?: TextGenerator
}

export abstract class AiSdkBackend implements CapabilityBackend {
  abstract readonly family: CapabilityFamily
  abstract readonly displayName: string

  private readonly _generateText: TextGenerator

  constructor(options: AiSdkBackendOptions = {}) {
    this._generateText = options.generateText ?? aiSdkGenerateText
  }

  /**
   * Build the provider's LanguageModel for this call.
   */
  abstract createModel(modelId: string, apiKey: string): LanguageModel

  async generate(request: GenerateRequest): Promise<string> {
    const model = this.createModel(request.modelId, request.apiKey)
    logger.debug(
      { family: this.family, modelId: request.modelId, promptLength: request.prompt.length },
      'Invoking backend'
    )
    return this._generateText({
      model,
      prompt: request.prompt,
      maxTokens: request.maxOutputTokens,
    })
  }
}
