/**
 * Zod validation schemas for the workcell configuration system.
 *
 * Defines schemas for all config sections:
 *  - provider config (claude, codex, gemini)
 *  - global settings
 *  - refinement policy, tools, memory, ledger, project
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Provider-level schema
// ---------------------------------------------------------------------------

/** Per-provider configuration */
export const ProviderConfigSchema = z
  .object({
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
    /** Model identifier sent to the provider; empty means not configured */
    model: z.string(),
    max_output_tokens: z.number().int().positive(),
  })
  .strict()

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>

/** Map of all known providers */
export const ProvidersSchema = z
  .object({
    claude: ProviderConfigSchema,
    codex: ProviderConfigSchema,
    gemini: ProviderConfigSchema,
  })
  .strict()

export type ProvidersConfig = z.infer<typeof ProvidersSchema>

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const StateBackendSchema = z.enum(['file', 'sqlite'])
export type StateBackend = z.infer<typeof StateBackendSchema>

export const GlobalSettingsSchema = z
  .object({
    /** Unset keeps the level derived from LOG_LEVEL and NODE_ENV */
    log_level: LogLevelSchema.optional(),
    /** Directory holding the checkpoint, ledger and memory database (relative to project root) */
    state_dir: z.string().min(1),
    state_backend: StateBackendSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Refinement policy
// ---------------------------------------------------------------------------

export const RefinementConfigSchema = z
  .object({
    max_cycles: z.number().int().min(1),
    critique_rounds: z.number().int().min(1),
    /** Confidence threshold at cycle 0 */
    confidence_base: z.number().int().min(0),
    /** Threshold rises by one every this many cycles */
    confidence_step_period: z.number().int().min(1),
  })
  .strict()

export type RefinementConfig = z.infer<typeof RefinementConfigSchema>

// ---------------------------------------------------------------------------
// External tools
// ---------------------------------------------------------------------------

export const StaticAnalysisConfigSchema = z
  .object({
    enabled: z.boolean(),
    command: z.string().min(1),
    args: z.array(z.string()),
    file_extension: z.string(),
    timeout_ms: z.number().int().positive(),
  })
  .strict()

export type StaticAnalysisConfig = z.infer<typeof StaticAnalysisConfigSchema>

export const TestRunnerConfigSchema = z
  .object({
    enabled: z.boolean(),
    command: z.string().min(1),
    args: z.array(z.string()),
    file_extension: z.string(),
    timeout_ms: z.number().int().positive(),
    /** Text that must appear in the combined output for a run to count as passed */
    success_marker: z.string(),
  })
  .strict()

export type TestRunnerConfig = z.infer<typeof TestRunnerConfigSchema>

export const ToolsConfigSchema = z
  .object({
    static_analysis: StaticAnalysisConfigSchema,
    test_runner: TestRunnerConfigSchema,
  })
  .strict()

export type ToolsConfig = z.infer<typeof ToolsConfigSchema>

// ---------------------------------------------------------------------------
// Memory, ledger, project
// ---------------------------------------------------------------------------

export const MemoryConfigSchema = z
  .object({
    enabled: z.boolean(),
    collection: z.string().min(1),
  })
  .strict()

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>

export const LedgerConfigSchema = z
  .object({
    snippet_length: z.number().int().positive(),
  })
  .strict()

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>

export const ProjectConfigSchema = z
  .object({
    /** Language the workers are asked to write */
    language: z.string().min(1),
  })
  .strict()

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this release can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = [CURRENT_CONFIG_FORMAT_VERSION]

export const WorkcellConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION),
    global: GlobalSettingsSchema,
    providers: ProvidersSchema,
    refinement: RefinementConfigSchema,
    tools: ToolsConfigSchema,
    memory: MemoryConfigSchema,
    ledger: LedgerConfigSchema,
    project: ProjectConfigSchema,
  })
  .strict()

export type WorkcellConfig = z.infer<typeof WorkcellConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env overlay and CLI overrides before merging)
// ---------------------------------------------------------------------------

export const PartialWorkcellConfigSchema = z
  .object({
    config_format_version: z.literal(CURRENT_CONFIG_FORMAT_VERSION).optional(),
    global: GlobalSettingsSchema.partial().optional(),
    providers: z
      .object({
        claude: ProviderConfigSchema.partial().optional(),
        codex: ProviderConfigSchema.partial().optional(),
        gemini: ProviderConfigSchema.partial().optional(),
      })
      .strict()
      .optional(),
    refinement: RefinementConfigSchema.partial().optional(),
    tools: z
      .object({
        static_analysis: StaticAnalysisConfigSchema.partial().optional(),
        test_runner: TestRunnerConfigSchema.partial().optional(),
      })
      .strict()
      .optional(),
    memory: MemoryConfigSchema.partial().optional(),
    ledger: LedgerConfigSchema.partial().optional(),
    project: ProjectConfigSchema.partial().optional(),
  })
  .strict()

export type PartialWorkcellConfig = z.infer<typeof PartialWorkcellConfigSchema>
