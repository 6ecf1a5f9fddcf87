/**
 * Barrel exports for capability backends.
 */

export type {
  CapabilityBackend,
  GenerateRequest,
  TextGenerator,
  TextGenerationArgs,
} from './types.js'
export { AiSdkBackend, aiSdkGenerateText } from './ai-sdk-backend.js'
export type { AiSdkBackendOptions } from './ai-sdk-backend.js'
export { AnthropicBackend } from './anthropic-backend.js'
export { OpenAIBackend } from './openai-backend.js'
export { GoogleBackend } from './google-backend.js'
export { BackendRegistry, createDefaultBackendRegistry } from './backend-registry.js'
export { isPlaceholderCredential, resolveCredential } from './credentials.js'
