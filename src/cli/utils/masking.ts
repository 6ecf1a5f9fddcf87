/**
 * Credential masking for log records, backend error text and displayed config.
 */

import { isPlainObject } from '../../utils/helpers.js'

/** Placeholder shown instead of a credential */
export const MASKED_VALUE = '***'

/** Shortest exact credential value worth scrubbing; shorter ones would hit ordinary words */
const MIN_KNOWN_SECRET_LENGTH = 8

/** Key shapes issued by the three supported providers */
const PROVIDER_KEY_PATTERNS: readonly RegExp[] = [
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  /sk-[A-Za-z0-9_-]{20,}/g,
  /AIza[A-Za-z0-9_-]{35,}/g,
]

/**
 * Fields pino replaces with `[Redacted]`. The backends pass the credential
 * as `apiKey`; config and env dumps carry the rest.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  '*.apiKey',
  'api_key',
  '*.api_key',
  'credential',
  '*.credential',
  'env.ANTHROPIC_API_KEY',
  'env.OPENAI_API_KEY',
  'env.GOOGLE_API_KEY',
  'env.GOOGLE_GENERATIVE_AI_API_KEY',
]

/** Object keys whose values `deepMask` hides */
const CREDENTIAL_KEYS: ReadonlySet<string> = new Set(['apiKey', 'api_key', 'api_key_env', 'credential'])

/**
 * Replace provider-key-shaped substrings, and any of `knownSecrets` verbatim,
 * with `***`.
 */
export function maskSecrets(input: string, knownSecrets: readonly string[] = []): string {
  let result = input
  for (const secret of knownSecrets) {
    if (secret.length >= MIN_KNOWN_SECRET_LENGTH) {
      result = result.split(secret).join(MASKED_VALUE)
    }
  }
  for (const pattern of PROVIDER_KEY_PATTERNS) {
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

/**
 * Copy of `value` with credential fields replaced by `***`, at any depth.
 * Arrays and plain objects are copied; other values are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(deepMask)
  if (!isPlainObject(value)) return value
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, CREDENTIAL_KEYS.has(key) ? MASKED_VALUE : deepMask(entry)])
  )
}
