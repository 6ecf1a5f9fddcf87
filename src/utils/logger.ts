/**
 * Structured logging for workcell.
 * pino writes JSON lines; pino-pretty is only attached in development.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

const createdLoggers = new Set<pino.Logger>()
let configuredLevel: string | undefined

/** Level from LOG_LEVEL, else the configured level, else derived from NODE_ENV */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Interactive CLI runs share stdout with the operator prompt
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger instance.
 * Log output goes to stderr so stdout stays reserved for run output.
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  // pino-pretty is a devDependency
  const instance = pretty
    ? pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            destination: 2,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino(baseOptions, pino.destination(2))

  if (options.level === undefined) createdLoggers.add(instance)
  return instance
}

/**
 * Apply the configured log level to every logger created with the default
 * level. LOG_LEVEL in the environment still wins; an unset level changes nothing.
 */
export function setLogLevel(level: string | undefined): void {
  if (level === undefined) return
  configuredLevel = level
  if (process.env.LOG_LEVEL) return
  for (const instance of createdLoggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('workcell')

/** Create a child logger with additional context */
export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
