/**
 * circuitBreakerRegistry.ts
 *
 * Get-or-create store of CircuitBreakers keyed by scope. Queries that name
 * the same scope share one breaker and so one failure budget.
 *
 * Open-circuit callbacks registered here fire for every breaker's open
 * transition. Each callback runs on its own; one that throws is logged and
 * the rest still run.
 */

import {
  CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitOpenEvent,
  type CircuitState,
} from './circuitBreaker'
import { silentLogger, type Logger } from './logger'

export type CircuitOpenCallback = (event: CircuitOpenEvent) => void

export class CircuitBreakerRegistry {
  #breakers = new Map<string, CircuitBreaker>()
  #callbacks = new Set<CircuitOpenCallback>()
  #logger: Logger

  constructor(config: { logger?: Logger } = {}) {
    this.#logger = config.logger ?? silentLogger
  }

  /**
   * Return the breaker for `scope`, creating it on first use. `options` only
   * apply at creation; later calls get the existing breaker unchanged.
   */
  getOrCreate(scope: string, options: CircuitBreakerOptions = {}): CircuitBreaker {
    let breaker = this.#breakers.get(scope)
    if (!breaker) {
      breaker = new CircuitBreaker(scope, options, {
        onOpen: (event) => this.#notifyOpen(event),
        logger: this.#logger,
      })
      this.#breakers.set(scope, breaker)
    }
    return breaker
  }

  get(scope: string): CircuitBreaker | undefined {
    return this.#breakers.get(scope)
  }

  has(scope: string): boolean {
    return this.#breakers.has(scope)
  }

  get size(): number {
    return this.#breakers.size
  }

  /** Current state of every breaker, by scope. */
  states(): Record<string, CircuitState> {
    return Object.fromEntries([...this.#breakers].map(([scope, breaker]) => [scope, breaker.state]))
  }

  /** Restore `closed` with zeroed stats. Unknown scopes are ignored. */
  reset(scope: string): void {
    this.#breakers.get(scope)?.reset()
  }

  clearAll(): void {
    this.#breakers.clear()
  }

  // -------------------------------------------------------------------------
  // Open-event callbacks
  // -------------------------------------------------------------------------

  /** @returns A function that unregisters the callback. */
  onCircuitOpen(callback: CircuitOpenCallback): () => void {
    this.#callbacks.add(callback)
    return () => {
      this.#callbacks.delete(callback)
    }
  }

  clearCallbacks(): void {
    this.#callbacks.clear()
  }

  get callbackCount(): number {
    return this.#callbacks.size
  }

  #notifyOpen(event: CircuitOpenEvent): void {
    for (const callback of [...this.#callbacks]) {
      try {
        callback(event)
      } catch (error) {
        this.#logger.error(`[circuit] open callback failed for ${event.circuitId}`, { error })
      }
    }
  }
}
