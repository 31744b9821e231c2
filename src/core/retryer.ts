/**
 * retryer.ts
 *
 * Runs one fetch sequence: the first attempt, exponential-backoff retries,
 * circuit-breaker consultation and cancellation. Callers `await
 * retryer.promise` for the final value or the final rejection.
 *
 * - The public `promise` is created in the constructor so handlers can be
 *   attached before start().
 * - The recursive #run() performs one attempt and schedules the next.
 * - The token is checked at every `await` boundary. Cancelling it rejects
 *   `promise` with CancelledError right away and wakes a pending backoff
 *   sleep; a late result from the fetch function is discarded.
 * - CircuitBreakerOpenError and CancelledError are never retried.
 */

import type { CancellationToken } from './cancellationToken'
import type { CircuitBreaker } from './circuitBreaker'
import { CancelledError, CircuitBreakerOpenError } from './errors'
import { silentLogger, type Logger } from './logger'
import type { RetryPolicy } from './types'

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 3,
  initialDelay: 1000,
  multiplier: 2,
  maxDelay: 30_000,
}

/**
 * Expand the `retry` query option into a full policy.
 *
 * - `false` -> no retries
 * - `true` / undefined -> the default policy
 * - a number -> default policy with that many retries
 * - an object -> default policy with those fields overridden
 */
export function resolveRetryPolicy(retry: boolean | number | Partial<RetryPolicy> | undefined): RetryPolicy {
  if (retry === undefined || retry === true) return { ...DEFAULT_RETRY_POLICY }
  if (retry === false) return { ...DEFAULT_RETRY_POLICY, maxRetries: 0 }
  if (typeof retry === 'number') return { ...DEFAULT_RETRY_POLICY, maxRetries: retry }
  return { ...DEFAULT_RETRY_POLICY, ...retry }
}

/** Delay before retry number `retryAttempt` (1-based). */
export function retryDelay(policy: RetryPolicy, retryAttempt: number): number {
  return Math.min(policy.initialDelay * policy.multiplier ** (retryAttempt - 1), policy.maxDelay)
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface RetryerConfig<TData> {
  /** One attempt. Receives the token of the whole sequence. */
  fn: (token: CancellationToken) => TData | Promise<TData>
  token: CancellationToken
  policy: RetryPolicy
  /** Consulted before every attempt and told about every outcome. */
  circuitBreaker?: CircuitBreaker
  /** Called after each failed attempt that will be retried. */
  onFail?: (failureCount: number, error: unknown, delay: number) => void
  logger?: Logger
  /** Used in log lines, normally the query hash. */
  label?: string
}

type RetryerStatus = 'idle' | 'running' | 'cancelled' | 'rejected' | 'resolved'

// ---------------------------------------------------------------------------
// Retryer
// ---------------------------------------------------------------------------

export class Retryer<TData = unknown> {
  readonly promise: Promise<TData>

  #resolve: (data: TData) => void
  #reject: (error: unknown) => void

  #status: RetryerStatus = 'idle'
  #failureCount = 0
  #config: RetryerConfig<TData>
  #logger: Logger
  #wake?: () => void
  #detachToken: () => void

  constructor(config: RetryerConfig<TData>) {
    this.#config = config
    this.#logger = config.logger ?? silentLogger

    let resolve: (data: TData) => void = () => {}
    let reject: (error: unknown) => void = () => {}
    this.promise = new Promise<TData>((res, rej) => {
      resolve = res
      reject = rej
    })
    this.#resolve = resolve
    this.#reject = reject

    this.#detachToken = config.token.onCancel(() => this.#onCancel())
  }

  status(): RetryerStatus {
    return this.#status
  }

  failureCount(): number {
    return this.#failureCount
  }

  /** Begin the sequence. Returns `promise`. */
  start(): Promise<TData> {
    if (this.#status === 'idle') {
      this.#status = 'running'
      this.#run().catch((error: unknown) => {
        if (this.#status === 'running') this.#fail(error)
      })
    }
    return this.promise
  }

  // ---------------------------------------------------------------------------
  // Core loop
  // ---------------------------------------------------------------------------

  async #run(): Promise<void> {
    if (this.#status !== 'running') return

    const breaker = this.#config.circuitBreaker
    if (breaker && !breaker.allowRequest()) {
      this.#fail(
        new CircuitBreakerOpenError(`Circuit '${breaker.circuitId}' is open`, breaker.circuitId),
      )
      return
    }

    let data: TData
    try {
      data = await this.#config.fn(this.#config.token)
    } catch (error) {
      if (this.#isCancelled() || error instanceof CancelledError) {
        breaker?.releaseTrial()
        if (this.#status === 'running') this.#fail(error)
        return
      }
      breaker?.recordFailure(error)
      this.#failureCount++

      if (this.#failureCount > this.#config.policy.maxRetries) {
        this.#fail(error)
        return
      }

      const delay = retryDelay(this.#config.policy, this.#failureCount)
      this.#logger.debug(
        `[retry] ${this.#config.label ?? 'fetch'} attempt ${this.#failureCount} failed, retrying in ${delay}ms`,
      )
      this.#config.onFail?.(this.#failureCount, error, delay)

      await this.#sleep(delay)
      await this.#run()
      return
    }

    if (this.#isCancelled()) {
      breaker?.releaseTrial()
      return
    }

    breaker?.recordSuccess()
    this.#status = 'resolved'
    this.#detachToken()
    this.#resolve(data)
  }

  /** Read through a call so checks after an await see writes made by #onCancel. */
  #isCancelled(): boolean {
    return this.#status === 'cancelled'
  }

  #fail(error: unknown): void {
    this.#status = 'rejected'
    this.#detachToken()
    this.#reject(error)
  }

  #onCancel(): void {
    if (this.#status === 'resolved' || this.#status === 'rejected') return
    this.#status = 'cancelled'
    this.#wake?.()
    this.#reject(new CancelledError())
  }

  /** Backoff sleep that cancellation ends early. */
  #sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timeoutId = setTimeout(() => {
        this.#wake = undefined
        resolve()
      }, ms)
      this.#wake = () => {
        clearTimeout(timeoutId)
        this.#wake = undefined
        resolve()
      }
    })
  }
}
