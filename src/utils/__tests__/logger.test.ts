/**
 * Unit tests for src/utils/logger.ts — level resolution and redaction.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, deepMask, maskSecrets } from '../../cli/utils/masking.js'
import { createLogger, childLogger, setLogLevel } from '../logger.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Synchronous in-memory pino logger with the same redaction as createLogger */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino({ name, level: 'trace', redact: PINO_REDACT_PATHS }, stream)
  return { logger, getLines: () => lines }
}

function firstLine(lines: string[]): Record<string, unknown> {
  const parsed: unknown = JSON.parse(lines[0] ?? 'null')
  expect(parsed).toBeTypeOf('object')
  return typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {}
}

let savedEnv: NodeJS.ProcessEnv

beforeEach(() => {
  savedEnv = { ...process.env }
})

afterEach(() => {
  process.env = savedEnv
})

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('honours an explicit level', () => {
    expect(createLogger('explicit', { level: 'error', pretty: false }).level).toBe('error')
  })

  it('uses LOG_LEVEL when set', () => {
    process.env.LOG_LEVEL = 'warn'
    expect(createLogger('env-level', { pretty: false }).level).toBe('warn')
  })

  it('uses info in production', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'production'
    expect(createLogger('prod-level', { pretty: false }).level).toBe('info')
  })

  it('uses warn when no environment hint is present', () => {
    delete process.env.LOG_LEVEL
    delete process.env.NODE_ENV
    expect(createLogger('cli-level', { pretty: false }).level).toBe('warn')
  })
})

describe('childLogger', () => {
  it('returns a distinct logger carrying the parent level', () => {
    const parent = createLogger('parent-module', { level: 'info', pretty: false })
    const child = childLogger(parent, { runId: 'run-1' })
    expect(child).not.toBe(parent)
    expect(child.level).toBe('info')
  })
})

// ---------------------------------------------------------------------------
// setLogLevel
// ---------------------------------------------------------------------------

describe('setLogLevel', () => {
  afterEach(() => {
    delete process.env.LOG_LEVEL
    setLogLevel('silent')
  })

  it('keeps warn for plain CLI use when the default config sets no level', () => {
    delete process.env.LOG_LEVEL
    delete process.env.NODE_ENV
    const log = createLogger('cli-default', { pretty: false })

    setLogLevel(DEFAULT_CONFIG.global.log_level)

    expect(DEFAULT_CONFIG.global.log_level).toBeUndefined()
    expect(log.level).toBe('warn')
    expect(createLogger('cli-default-later', { pretty: false }).level).toBe('warn')
  })

  it('applies the configured level to loggers created with the default level', () => {
    delete process.env.LOG_LEVEL
    const defaulted = createLogger('defaulted', { pretty: false })
    const pinned = createLogger('pinned', { level: 'fatal', pretty: false })

    setLogLevel('error')

    expect(defaulted.level).toBe('error')
    expect(pinned.level).toBe('fatal')
    expect(createLogger('later', { pretty: false }).level).toBe('error')
  })

  it('leaves loggers alone while LOG_LEVEL is set', () => {
    process.env.LOG_LEVEL = 'debug'
    const log = createLogger('env-wins', { pretty: false })

    setLogLevel('error')

    expect(log.level).toBe('debug')
  })
})

// ---------------------------------------------------------------------------
// Redaction and masking
// ---------------------------------------------------------------------------

describe('Pino redaction', () => {
  it('redacts apiKey fields', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ apiKey: 'test-secret' }, 'call')

    expect(firstLine(getLines())['apiKey']).toBe('[Redacted]')
  })

  it('redacts nested credential fields', () => {
    const { logger, getLines } = createCapturingLogger('redact-nested')

    logger.info({ request: { credential: 'test-secret' } }, 'call')

    expect(firstLine(getLines())['request']).toEqual({ credential: '[Redacted]' })
  })
})

describe('maskSecrets', () => {
  it('masks an API-key-shaped token inside a message', () => {
    expect(maskSecrets('invalid key sk-test-secret-00000000000000 for provider')).toBe(
      'invalid key *** for provider'
    )
  })

  it('returns input unchanged when no secret is present', () => {
    expect(maskSecrets('no secrets here')).toBe('no secrets here')
  })
})

describe('deepMask', () => {
  it('replaces credential fields and keeps the rest', () => {
    expect(deepMask({ providers: { claude: { api_key_env: 'ANTHROPIC_API_KEY', model: 'm' } } })).toEqual({
      providers: { claude: { api_key_env: '***', model: 'm' } },
    })
  })
})
