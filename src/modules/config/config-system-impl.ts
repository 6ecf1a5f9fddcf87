/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.workcell/config.yaml)
 *     → project config      (./.workcell/config.yaml)
 *     → environment vars    (WORKCELL_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'node:fs/promises'
import { isAbsolute, join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, errorMessage } from '../../core/errors.js'
import type { CredentialSource } from '../../core/types.js'
import {
  WorkcellConfigSchema,
  PartialWorkcellConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type WorkcellConfig,
  type PartialWorkcellConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of WORKCELL_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  WORKCELL_LOG_LEVEL: 'global.log_level',
  WORKCELL_STATE_DIR: 'global.state_dir',
  WORKCELL_STATE_BACKEND: 'global.state_backend',
  WORKCELL_MAX_CYCLES: 'refinement.max_cycles',
  WORKCELL_CRITIQUE_ROUNDS: 'refinement.critique_rounds',
  WORKCELL_CLAUDE_MODEL: 'providers.claude.model',
  WORKCELL_CODEX_MODEL: 'providers.codex.model',
  WORKCELL_GEMINI_MODEL: 'providers.gemini.model',
  WORKCELL_STATIC_ANALYSIS_ENABLED: 'tools.static_analysis.enabled',
  WORKCELL_TEST_RUNNER_ENABLED: 'tools.test_runner.enabled',
  WORKCELL_MEMORY_ENABLED: 'memory.enabled',
  WORKCELL_PROJECT_LANGUAGE: 'project.language',
}

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: CredentialSource): PartialWorkcellConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    setByPath(overrides, configPath, coerceEnvValue(rawValue))
  }

  const parsed = PartialWorkcellConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Set `path` on `target` in place, creating intermediate objects as needed.
 */
function setByPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.')
  const lastKey = parts.pop()
  if (lastKey === undefined) return

  let cursor = target
  for (const part of parts) {
    const next = cursor[part]
    if (isPlainObject(next)) {
      cursor = next
    } else {
      const created: Record<string, unknown> = {}
      cursor[part] = created
      cursor = created
    }
  }
  cursor[lastKey] = value
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  readonly projectRoot: string
  readonly credentials: CredentialSource

  private _config: WorkcellConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialWorkcellConfig

  constructor(options: ConfigSystemOptions = {}) {
    this.projectRoot = resolve(options.projectRoot ?? process.cwd())
    this.credentials = options.env ?? process.env
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : join(this.projectRoot, '.workcell')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.workcell')
    this._cliOverrides = options.cliOverrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, then 3. project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const fileConfig = await this._loadYamlFile(join(dir, 'config.yaml'))
      if (fileConfig !== null) {
        merged = deepMerge(merged, fileConfig)
      }
    }

    // 4. Environment variable overrides
    const envOverrides = readEnvOverrides(this.credentials)
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    // 5. CLI flag overrides
    if (Object.keys(this._cliOverrides).length > 0) {
      merged = deepMerge(merged, this._cliOverrides)
    }

    // 6. Validate the merged config
    const result = WorkcellConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug({ projectRoot: this.projectRoot }, 'Configuration loaded successfully')
  }

  getConfig(): WorkcellConfig {
    if (this._config === null) {
      throw new ConfigError(
        'Configuration has not been loaded. Call load() before getConfig().',
        {}
      )
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): WorkcellConfig {
    // Masked values are still strings, so the masked tree validates
    return WorkcellConfigSchema.parse(deepMask(this.getConfig()))
  }

  getStateDir(): string {
    const stateDir = this.getConfig().global.state_dir
    return isAbsolute(stateDir) ? stateDir : join(this.projectRoot, stateDir)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialWorkcellConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, {
        filePath,
      })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (typeof version === 'string' && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
        throw new ConfigError(
          `Unsupported config_format_version "${version}" in ${filePath} (supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')})`,
          { filePath, version }
        )
      }
    }

    const result = PartialWorkcellConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }

    logger.debug({ filePath }, 'Config file applied')
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ projectRoot: '/path/to/project' })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
