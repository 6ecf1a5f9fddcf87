/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { CredentialSource } from '../../core/types.js'
import type { WorkcellConfig, PartialWorkcellConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for initializing the config system.
 */
export interface ConfigSystemOptions {
  /** Root of the project being worked on (default: cwd) */
  projectRoot?: string
  /** Path to the project-level .workcell/ directory (default: <projectRoot>/.workcell) */
  projectConfigDir?: string
  /** Path to the global user-level .workcell/ directory (default: ~/.workcell) */
  globalConfigDir?: string
  /**
   * Values that override every other layer.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialWorkcellConfig
  /** Environment for WORKCELL_* overrides and credential lookup (default: process.env) */
  env?: CredentialSource
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated workcell configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   * @throws {ConfigError} when a config file is unreadable or invalid.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): WorkcellConfig

  /**
   * Return a single value by dot-notation key (e.g. "global.log_level").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Return the merged config with all credential fields masked.
   * Safe to display in CLI output or logs.
   */
  getMasked(): WorkcellConfig

  /** Absolute path of the state directory (checkpoint, ledger, memory) */
  getStateDir(): string

  /** Absolute project root */
  readonly projectRoot: string

  /** Environment consulted for credentials on every availability check */
  readonly credentials: CredentialSource

  /**
   * Whether load() has been called and succeeded.
   */
  readonly isLoaded: boolean
}
