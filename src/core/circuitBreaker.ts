/**
 * circuitBreaker.ts
 *
 * Per-scope failure isolation.
 *
 *   closed   --(failureCount >= failureThreshold)-->            open
 *   open     --(resetTimeout elapsed, on next allowRequest)-->  halfOpen
 *   halfOpen --(successCount >= successThreshold)-->            closed
 *   halfOpen --(any failure)-->                                 open
 *
 * Entering halfOpen zeroes both counters. In halfOpen only as many trial requests are
 * let through as are still needed to reach successThreshold; with the default
 * threshold of 1 that is exactly one trial request per reset cycle.
 *
 * Time is read from Date.now() so fake timers drive the transitions in tests.
 */

import { silentLogger, type Logger } from './logger'
import { circuitBreakerOptionsSchema, parseOrThrow } from './validation'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CircuitState = 'closed' | 'open' | 'halfOpen'

/** Any error class; matched with instanceof, so subclasses count too. */
export type ErrorType = abstract new (...args: never[]) => unknown

export interface CircuitBreakerOptions {
  /** Consecutive failures that open a closed circuit. Default 5. */
  failureThreshold?: number
  /** How long an open circuit refuses requests, in ms. Default 60 000. */
  resetTimeout?: number
  /** Successful trial requests needed to close a half-open circuit. Default 1. */
  successThreshold?: number
  /** Errors of these types are neither counted nor allowed to open the circuit. */
  ignoredErrorTypes?: ReadonlyArray<ErrorType>
}

export interface CircuitStats {
  failureCount: number
  successCount: number
  lastFailureTimestamp: number | null
}

export interface CircuitOpenEvent {
  circuitId: string
  openedAt: number
}

export interface CircuitBreakerHooks {
  /** Called once per transition into `open`. */
  onOpen?: (event: CircuitOpenEvent) => void
  logger?: Logger
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS = {
  failureThreshold: 5,
  resetTimeout: 60_000,
  successThreshold: 1,
  ignoredErrorTypes: [],
} as const satisfies Required<CircuitBreakerOptions>

// ---------------------------------------------------------------------------
// CircuitBreaker
// ---------------------------------------------------------------------------

export class CircuitBreaker {
  readonly circuitId: string
  readonly options: Readonly<Required<CircuitBreakerOptions>>

  #state: CircuitState = 'closed'
  #failureCount = 0
  #successCount = 0
  #lastFailureTimestamp: number | null = null
  /** Half-open trial requests let through whose outcome is not recorded yet. */
  #trialsInFlight = 0
  #onOpen?: (event: CircuitOpenEvent) => void
  #logger: Logger

  constructor(circuitId: string, options: CircuitBreakerOptions = {}, hooks: CircuitBreakerHooks = {}) {
    parseOrThrow(circuitBreakerOptionsSchema, options, `circuit breaker options for '${circuitId}'`)
    this.circuitId = circuitId
    this.options = { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...options }
    this.#onOpen = hooks.onOpen
    this.#logger = hooks.logger ?? silentLogger
  }

  get state(): CircuitState {
    return this.#state
  }

  get stats(): CircuitStats {
    return {
      failureCount: this.#failureCount,
      successCount: this.#successCount,
      lastFailureTimestamp: this.#lastFailureTimestamp,
    }
  }

  // -------------------------------------------------------------------------
  // Gate
  // -------------------------------------------------------------------------

  /**
   * Whether a request may proceed now. May move `open` to `halfOpen`.
   * Every `true` from a half-open circuit must be followed by exactly one
   * recordSuccess(), recordFailure() or releaseTrial().
   */
  allowRequest(): boolean {
    switch (this.#state) {
      case 'closed':
        return true

      case 'open': {
        const openedAt = this.#lastFailureTimestamp ?? 0
        if (Date.now() < openedAt + this.options.resetTimeout) return false
        this.#transition('halfOpen')
        this.#resetCounters()
        this.#trialsInFlight = 1
        return true
      }

      case 'halfOpen':
        if (this.#successCount + this.#trialsInFlight >= this.options.successThreshold) {
          return false
        }
        this.#trialsInFlight++
        return true
    }
  }

  // -------------------------------------------------------------------------
  // Outcomes
  // -------------------------------------------------------------------------

  recordSuccess(): void {
    switch (this.#state) {
      case 'halfOpen':
        this.#trialsInFlight = Math.max(0, this.#trialsInFlight - 1)
        this.#successCount++
        if (this.#successCount >= this.options.successThreshold) {
          this.#transition('closed')
          this.#resetCounters()
        }
        return

      case 'closed':
        this.#failureCount = 0
        return

      case 'open':
        // A response that started before the circuit opened; no effect.
        return
    }
  }

  /**
   * Count a failure unless `error` is of an ignored type.
   *
   * @returns Whether the failure was counted.
   */
  recordFailure(error?: unknown): boolean {
    if (error !== undefined && this.isIgnoredError(error)) return false

    const now = Date.now()
    this.#failureCount++
    this.#lastFailureTimestamp = now

    if (this.#state === 'closed' && this.#failureCount >= this.options.failureThreshold) {
      this.#open(now)
    } else if (this.#state === 'halfOpen') {
      this.#trialsInFlight = 0
      this.#open(now)
    }
    return true
  }

  /** Give back a half-open trial request that was cancelled before it settled. */
  releaseTrial(): void {
    if (this.#state === 'halfOpen') {
      this.#trialsInFlight = Math.max(0, this.#trialsInFlight - 1)
    }
  }

  isIgnoredError(error: unknown): boolean {
    return this.options.ignoredErrorTypes.some((type) => error instanceof type)
  }

  /** Back to `closed` with zeroed stats. */
  reset(): void {
    this.#state = 'closed'
    this.#resetCounters()
    this.#lastFailureTimestamp = null
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  #open(now: number): void {
    this.#transition('open')
    this.#onOpen?.({ circuitId: this.circuitId, openedAt: now })
  }

  #transition(next: CircuitState): void {
    if (next === this.#state) return
    const message = `[circuit] ${this.circuitId}: ${this.#state} -> ${next}`
    if (next === 'open') {
      this.#logger.warn(message, { stats: this.stats })
    } else {
      this.#logger.info(message)
    }
    this.#state = next
  }

  #resetCounters(): void {
    this.#failureCount = 0
    this.#successCount = 0
    this.#trialsInFlight = 0
  }
}
