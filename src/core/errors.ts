/**
 * Error definitions for Lattice
 * Provides structured error hierarchy for all orchestrator operations
 */

/** Base error class for all Lattice errors */
export class LatticeError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'LatticeError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LatticeError)
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

/** Error thrown when an axis set cannot be expanded (empty axis, bad placeholder) */
export class InvalidAxisSetError extends LatticeError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'INVALID_AXIS_SET') {
    super(message, code, context)
    this.name = 'InvalidAxisSetError'
  }
}

/** Error thrown when an exclusion rule is empty or names an unknown axis */
export class InvalidExclusionRuleError extends InvalidAxisSetError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context, 'INVALID_EXCLUSION_RULE')
    this.name = 'InvalidExclusionRuleError'
  }
}

/** Error thrown when the task runner cannot start a step invocation at all */
export class StepInvocationError extends LatticeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STEP_INVOCATION_ERROR', context)
    this.name = 'StepInvocationError'
  }
}

/** Error thrown by a history store that cannot answer a lookup */
export class SkipHistoryUnavailableError extends LatticeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SKIP_HISTORY_UNAVAILABLE', context)
    this.name = 'SkipHistoryUnavailableError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends LatticeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a pipeline definition file cannot be read, parsed or validated */
export class PipelineDefinitionError extends LatticeError {
  public readonly errors: string[]

  constructor(message: string, errors: string[] = [], context: Record<string, unknown> = {}) {
    super(message, 'PIPELINE_DEFINITION_ERROR', { ...context, errors })
    this.name = 'PipelineDefinitionError'
    this.errors = errors
  }
}

/** Error thrown when a step `if:` gate expression cannot be compiled */
export class InvalidGateExpressionError extends LatticeError {
  constructor(expression: string, reason: string) {
    super(`Invalid gate expression "${expression}": ${reason}`, 'INVALID_GATE_EXPRESSION', {
      expression,
    })
    this.name = 'InvalidGateExpressionError'
  }
}

/** Error thrown when a job state machine is asked for an illegal transition */
export class InvalidStateTransitionError extends LatticeError {
  constructor(jobId: string, from: string, to: string) {
    super(`Invalid job state transition for "${jobId}": ${from} -> ${to}`, 'INVALID_STATE_TRANSITION', {
      jobId,
      from,
      to,
    })
    this.name = 'InvalidStateTransitionError'
  }
}

/** True for errors that must abort a run before any job starts */
export function isConfigurationError(err: unknown): err is LatticeError {
  return (
    err instanceof InvalidAxisSetError ||
    err instanceof ConfigError ||
    err instanceof PipelineDefinitionError ||
    err instanceof InvalidGateExpressionError
  )
}
