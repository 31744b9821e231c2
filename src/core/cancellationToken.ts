/**
 * cancellationToken.ts
 *
 * Cooperative cancellation. Every fetch attempt runs under its own token;
 * a newer fetch or dispose() cancels it. Fetch functions check the token (or
 * pass `signal` to their I/O) but are never forcibly interrupted.
 *
 * Tokens form a tree: cancelling a parent cancels every child created from
 * it, while cancelling a child leaves the parent untouched. A child whose
 * work has finished calls release() so the parent stops holding it.
 */

import { CancelledError } from './errors'

export class CancellationToken {
  /** Resolves once, when the token is cancelled. Never rejects. */
  readonly cancelled: Promise<void>

  #isCancelled = false
  #listeners = new Set<() => void>()
  #controller = new AbortController()
  #resolveCancelled: () => void
  #detachFromParent?: () => void

  constructor() {
    let resolve: () => void = () => {}
    this.cancelled = new Promise<void>((res) => {
      resolve = res
    })
    this.#resolveCancelled = resolve
  }

  get isCancelled(): boolean {
    return this.#isCancelled
  }

  /** Aborts when the token is cancelled. */
  get signal(): AbortSignal {
    return this.#controller.signal
  }

  throwIfCancelled(): void {
    if (this.#isCancelled) {
      throw new CancelledError()
    }
  }

  /**
   * Run `callback` on cancellation, or right away if already cancelled.
   *
   * @returns A function that unregisters the callback.
   */
  onCancel(callback: () => void): () => void {
    if (this.#isCancelled) {
      callback()
      return () => {}
    }
    this.#listeners.add(callback)
    return () => {
      this.#listeners.delete(callback)
    }
  }

  /**
   * Mark the token cancelled. Idempotent.
   *
   * Every registered callback runs even if an earlier one throws; the
   * collected failures are rethrown afterwards as one AggregateError.
   */
  cancel(): void {
    if (this.#isCancelled) return
    this.#isCancelled = true
    this.#controller.abort(new CancelledError())
    this.#resolveCancelled()

    const listeners = [...this.#listeners]
    this.#listeners.clear()
    const failures: unknown[] = []
    for (const listener of listeners) {
      try {
        listener()
      } catch (error) {
        failures.push(error)
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, 'Cancellation callbacks failed')
    }
  }

  /**
   * Unlink from the parent token. Afterwards cancelling the parent no longer
   * reaches this one; cancelling it directly still works. Idempotent.
   */
  release(): void {
    this.#detachFromParent?.()
    this.#detachFromParent = undefined
  }

  /** A token cancelled together with this one, but cancellable on its own. */
  createChild(): CancellationToken {
    const child = new CancellationToken()
    child.#detachFromParent = this.onCancel(() => child.cancel())
    child.onCancel(() => child.release())
    return child
  }
}
