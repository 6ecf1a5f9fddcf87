/**
 * Built-in default values for the workcell configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import { CURRENT_CONFIG_FORMAT_VERSION } from './config-schema.js'
import type {
  WorkcellConfig,
  ProviderConfig,
  GlobalSettings,
  RefinementConfig,
  ToolsConfig,
} from './config-schema.js'

// ---------------------------------------------------------------------------
// Per-provider defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CLAUDE_PROVIDER: ProviderConfig = {
  api_key_env: 'ANTHROPIC_API_KEY',
  model: 'claude-3-5-sonnet-latest',
  max_output_tokens: 4000,
}

export const DEFAULT_CODEX_PROVIDER: ProviderConfig = {
  api_key_env: 'OPENAI_API_KEY',
  model: 'gpt-4o',
  max_output_tokens: 4000,
}

export const DEFAULT_GEMINI_PROVIDER: ProviderConfig = {
  api_key_env: 'GOOGLE_API_KEY',
  model: 'gemini-1.5-pro',
  max_output_tokens: 4000,
}

// ---------------------------------------------------------------------------
// Global settings defaults
// ---------------------------------------------------------------------------

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  state_dir: '.workcell',
  state_backend: 'file',
}

// ---------------------------------------------------------------------------
// Refinement and tools
// ---------------------------------------------------------------------------

export const DEFAULT_REFINEMENT: RefinementConfig = {
  max_cycles: 16,
  critique_rounds: 6,
  confidence_base: 7,
  confidence_step_period: 4,
}

export const DEFAULT_TOOLS: ToolsConfig = {
  static_analysis: {
    enabled: false,
    command: 'python3',
    args: ['-m', 'pyflakes'],
    file_extension: '.py',
    timeout_ms: 30_000,
  },
  test_runner: {
    enabled: true,
    command: 'python3',
    args: ['-m', 'unittest'],
    file_extension: '.py',
    timeout_ms: 30_000,
    success_marker: 'OK',
  },
}

// ---------------------------------------------------------------------------
// Full default config
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: WorkcellConfig = {
  config_format_version: CURRENT_CONFIG_FORMAT_VERSION,
  global: DEFAULT_GLOBAL_SETTINGS,
  providers: {
    claude: DEFAULT_CLAUDE_PROVIDER,
    codex: DEFAULT_CODEX_PROVIDER,
    gemini: DEFAULT_GEMINI_PROVIDER,
  },
  refinement: DEFAULT_REFINEMENT,
  tools: DEFAULT_TOOLS,
  memory: {
    enabled: false,
    collection: 'workcell_memory',
  },
  ledger: {
    snippet_length: 500,
  },
  project: {
    language: 'Python',
  },
}
