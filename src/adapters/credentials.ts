/**
 * Credential presence checks for capability backends.
 *
 * A credential counts as present only when its environment variable holds a
 * value that does not look like a template placeholder.
 */

import type { CredentialSource } from '../core/types.js'

const PLACEHOLDER_MARKERS = ['your', 'placeholder', 'changeme', 'replace'] as const

/**
 * Whether `value` is empty or reads like an unfilled template value
 * ("sk-ant-...", "<api-key>", "your-key-here", "xxxx", "****").
 */
export function isPlaceholderCredential(value: string): boolean {
  const trimmed = value.trim()
  if (trimmed === '') return true
  if (trimmed.endsWith('...')) return true
  if (trimmed.includes('<')) return true
  const lower = trimmed.toLowerCase()
  if (PLACEHOLDER_MARKERS.some((marker) => lower.includes(marker))) return true
  return /^[x*]+$/i.test(trimmed)
}

/**
 * Read the credential named by `envVar`.
 * @returns the trimmed value, or null when missing or a placeholder
 */
export function resolveCredential(env: CredentialSource, envVar: string): string | null {
  const raw = env[envVar]
  if (raw === undefined || isPlaceholderCredential(raw)) return null
  return raw.trim()
}
