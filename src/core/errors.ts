/**
 * Error definitions for workcell
 * Provides the structured error hierarchy for engine, dispatcher and persistence
 */

/** Base error class for all workcell errors */
export class WorkcellError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'WorkcellError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorkcellError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or cannot be read */
export class ConfigError extends WorkcellError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when no backend has a usable credential */
export class ConfigurationMissingError extends WorkcellError {
  constructor(
    message = 'No capability backend is configured: set at least one provider credential',
    context: Record<string, unknown> = {},
    code = 'CONFIGURATION_MISSING'
  ) {
    super(message, code, context)
    this.name = 'ConfigurationMissingError'
  }
}

/** Error thrown by the dispatcher when zero backends are available at invoke time */
export class NoBackendAvailableError extends ConfigurationMissingError {
  constructor(preferredFamily: string) {
    super(
      `No capability backend available (requested: ${preferredFamily})`,
      { preferredFamily },
      'NO_BACKEND_AVAILABLE'
    )
    this.name = 'NoBackendAvailableError'
  }
}

/** Error raised by a backend call; recovered inside the dispatcher */
export class BackendInvocationError extends WorkcellError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'BACKEND_INVOCATION_FAILED', context)
    this.name = 'BackendInvocationError'
  }
}

/** Error thrown when the workflow checkpoint cannot be written or read */
export class StatePersistenceError extends WorkcellError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STATE_PERSISTENCE_FAILED', context)
    this.name = 'StatePersistenceError'
  }
}

/** Error thrown when a checkpoint exists but its content is not a valid state */
export class StateCorruptedError extends WorkcellError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STATE_CORRUPTED', context)
    this.name = 'StateCorruptedError'
  }
}

/** Error thrown when a run is advanced before it has a goal */
export class WorkflowNotStartedError extends WorkcellError {
  constructor(message = 'No run in progress: start one with a goal', context: Record<string, unknown> = {}) {
    super(message, 'WORKFLOW_NOT_STARTED', context)
    this.name = 'WorkflowNotStartedError'
  }
}

/** Error thrown when operator input ends while the Feedback gate is waiting */
export class OperatorInputClosedError extends WorkcellError {
  constructor(message = 'Operator input closed before an answer was given', context: Record<string, unknown> = {}) {
    super(message, 'OPERATOR_INPUT_CLOSED', context)
    this.name = 'OperatorInputClosedError'
  }
}

/** Render any thrown value as a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
