/**
 * errors.ts
 *
 * Error classes raised by the engine itself. Errors thrown by caller fetch
 * functions are stored on query state as they are and never wrapped.
 */

export class QueryEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A key, option or configuration value failed validation. */
export class QueryArgumentError extends QueryEngineError {}

/** Raised for self-dependencies and edges that would close a cycle. */
export class DependencyCycleError extends QueryArgumentError {
  constructor(
    message: string,
    readonly child: string,
    readonly parent: string,
  ) {
    super(message)
  }
}

/**
 * Thrown when a fetch is refused because its circuit is open. The only error
 * kind that is never retried; `fetch()` rethrows it after storing it in state.
 */
export class CircuitBreakerOpenError extends QueryEngineError {
  constructor(
    message: string,
    readonly circuitScope: string,
  ) {
    super(message)
  }
}

/** Raised when a cancelled token is checked. */
export class CancelledError extends QueryEngineError {
  constructor(message = 'Operation was cancelled') {
    super(message)
  }
}

/** Wraps a failure raised inside a task-pool task; `cause` is the original error. */
export class TaskExecutionError extends QueryEngineError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}
