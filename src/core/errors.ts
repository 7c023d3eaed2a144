/**
 * Error definitions for Waypoint
 * Provides structured error hierarchy for all pipeline operations
 */

/** Machine-readable error codes surfaced by the pipeline */
export const ErrorKind = {
  PreconditionMissing: 'PRECONDITION_MISSING',
  RetryBudgetExhausted: 'RETRY_BUDGET_EXHAUSTED',
  CheckTimedOut: 'CHECK_TIMED_OUT',
  CheckUnavailable: 'CHECK_UNAVAILABLE',
  NotFound: 'NOT_FOUND',
  InvalidTransition: 'INVALID_TRANSITION',
  GateCancelled: 'GATE_CANCELLED',
  Release: 'RELEASE_ERROR',
  Config: 'CONFIG_ERROR',
} as const

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind]

/** Base error class for all Waypoint errors */
export class WaypointError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'WaypointError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WaypointError)
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

/** A stage cannot run because an input it depends on is missing */
export class PreconditionMissingError extends WaypointError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorKind.PreconditionMissing, context)
    this.name = 'PreconditionMissingError'
  }
}

/** Too many blocking verdicts; the work item has been aborted */
export class RetryBudgetExhaustedError extends WaypointError {
  constructor(
    workItemId: string,
    retryCount: number,
    maxRetries: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Retry budget exhausted for ${workItemId}: ${String(retryCount)} blocking verdicts, max_retries=${String(maxRetries)}`,
      ErrorKind.RetryBudgetExhausted,
      { workItemId, retryCount, maxRetries, ...context }
    )
    this.name = 'RetryBudgetExhaustedError'
  }
}

/** A capability check did not finish within its timeout */
export class CheckTimedOutError extends WaypointError {
  constructor(checkId: string, timeoutMs: number) {
    super(
      `Check "${checkId}" timed out after ${String(timeoutMs)}ms`,
      ErrorKind.CheckTimedOut,
      { checkId, timeoutMs }
    )
    this.name = 'CheckTimedOutError'
  }
}

/** A capability check could not run (missing tool, unknown id, crash) */
export class CheckUnavailableError extends WaypointError {
  constructor(checkId: string, reason: string, context: Record<string, unknown> = {}) {
    super(`Check "${checkId}" unavailable: ${reason}`, ErrorKind.CheckUnavailable, {
      checkId,
      reason,
      ...context,
    })
    this.name = 'CheckUnavailableError'
  }
}

/** A work item or artifact does not exist */
export class NotFoundError extends WaypointError {
  constructor(what: string, id: string) {
    super(`${what} not found: ${id}`, ErrorKind.NotFound, { what, id })
    this.name = 'NotFoundError'
  }
}

/** Attempted transition is not an allowed edge (always a usage error) */
export class InvalidTransitionError extends WaypointError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorKind.InvalidTransition, context)
    this.name = 'InvalidTransitionError'
  }
}

/** A gate evaluation was cancelled before its verdict was recorded */
export class GateCancelledError extends WaypointError {
  constructor(workItemId: string, stage: string, reason: string) {
    super(`Gate evaluation for ${workItemId} (${stage}) cancelled: ${reason}`, ErrorKind.GateCancelled, {
      workItemId,
      stage,
      reason,
    })
    this.name = 'GateCancelledError'
  }
}

/** The release packager failed to produce a reviewable change set */
export class ReleaseError extends WaypointError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorKind.Release, context)
    this.name = 'ReleaseError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends WaypointError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorKind.Config, context)
    this.name = 'ConfigError'
  }
}
