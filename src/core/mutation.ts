/**
 * mutation.ts
 *
 * A single write operation and its state machine.
 *
 * Unlike a query, a mutation caches nothing: every mutate() call runs the
 * mutation function afresh through a Retryer and publishes the outcome to
 * subscribers. Writes have side effects, so there are no retries unless the
 * `retry` option asks for them.
 *
 * With `queueWhenOffline`, a call made while NetworkStatus reports offline
 * does not run. It becomes an OfflineQueueManager entry of type
 * `mutationType`, replayed later by the handler registered for that type,
 * and the state is flagged `isQueued`.
 */

import { CancellationToken } from './cancellationToken'
import type { Logger } from './logger'
import type { NetworkStatus } from './networkStatus'
import type { OfflineQueueManager } from './offlineQueue'
import { invokeCallback } from './query'
import { Retryer, resolveRetryPolicy } from './retryer'
import { Subscribable } from './subscribable'
import type { MutationFunction, MutationOptions, MutationState } from './types'
import { mutationOptionsSchema, parseOrThrow } from './validation'

// ---------------------------------------------------------------------------
// Actions and reducer
// ---------------------------------------------------------------------------

export type MutationAction<TData, TVariables> =
  | { type: 'loading'; variables: TVariables; submittedAt: number }
  | { type: 'queued'; variables: TVariables; submittedAt: number }
  | { type: 'failed'; failureCount: number }
  | { type: 'success'; data: TData }
  | { type: 'error'; error: unknown }
  | { type: 'reset' }

function getDefaultState<TData, TVariables>(): MutationState<TData, TVariables> {
  return {
    status: 'idle',
    data: undefined,
    error: null,
    variables: undefined,
    isQueued: false,
    failureCount: 0,
    submittedAt: 0,
  }
}

function reducer<TData, TVariables>(
  state: MutationState<TData, TVariables>,
  action: MutationAction<TData, TVariables>,
): MutationState<TData, TVariables> {
  switch (action.type) {
    case 'loading':
      return {
        ...getDefaultState<TData, TVariables>(),
        status: 'loading',
        variables: action.variables,
        submittedAt: action.submittedAt,
      }
    case 'queued':
      return {
        ...getDefaultState<TData, TVariables>(),
        variables: action.variables,
        submittedAt: action.submittedAt,
        isQueued: true,
      }
    case 'failed':
      return { ...state, failureCount: action.failureCount }
    case 'success':
      return { ...state, status: 'success', data: action.data, error: null }
    case 'error':
      return { ...state, status: 'error', error: action.error }
    case 'reset':
      return getDefaultState()
  }
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/** The collaborators a Mutation needs from its QueryClient. */
export interface MutationEnvironment {
  networkStatus: NetworkStatus
  offlineQueue: OfflineQueueManager
  logger: Logger
  /** Called once, when the mutation is disposed. */
  onDispose?: () => void
}

export interface MutationConfig<TData, TVariables> {
  mutationFn: MutationFunction<TData, TVariables>
  options: MutationOptions<TData, TVariables>
  env: MutationEnvironment
}

export type MutationListener<TData, TVariables> = (state: MutationState<TData, TVariables>) => void

// ---------------------------------------------------------------------------
// Mutation
// ---------------------------------------------------------------------------

export class Mutation<TData = unknown, TVariables = unknown> extends Subscribable<
  MutationListener<TData, TVariables>
> {
  state: MutationState<TData, TVariables> = getDefaultState()
  readonly options: MutationOptions<TData, TVariables>

  #mutationFn: MutationFunction<TData, TVariables>
  #env: MutationEnvironment
  #token?: CancellationToken
  #disposed = false

  /** @throws QueryArgumentError for invalid options. */
  constructor(config: MutationConfig<TData, TVariables>) {
    super()
    parseOrThrow(mutationOptionsSchema, config.options, 'mutation options')
    this.#mutationFn = config.mutationFn
    this.options = config.options
    this.#env = config.env
  }

  get isDisposed(): boolean {
    return this.#disposed
  }

  get isLoading(): boolean {
    return this.state.status === 'loading'
  }

  /**
   * Run the mutation. A call still in flight is superseded: its outcome is
   * dropped and its promise rejects with CancelledError.
   *
   * While offline with `queueWhenOffline` set, the call is enqueued instead
   * and the promise resolves with undefined once the entry is stored.
   *
   * @throws Whatever the mutation function threw on its last attempt.
   */
  async mutate(variables: TVariables): Promise<TData | undefined> {
    if (this.#disposed) {
      this.#env.logger.warn('[mutation] mutate() on a disposed mutation')
      return undefined
    }

    const { mutationType, queueWhenOffline } = this.options
    if (queueWhenOffline && mutationType !== undefined && !this.#env.networkStatus.isOnline) {
      await this.#enqueue(mutationType, variables)
      return undefined
    }

    return this.#run(variables)
  }

  /** Drop any call in flight and return to idle. */
  reset(): void {
    this.#token?.cancel()
    this.#token = undefined
    this.#dispatch({ type: 'reset' })
  }

  /** Cancel any call in flight and drop every subscriber. Idempotent. */
  dispose(): void {
    if (this.#disposed) return
    this.#token?.cancel()
    this.#token = undefined
    this.#disposed = true
    this.listeners.clear()
    this.#env.onDispose?.()
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  async #run(variables: TVariables): Promise<TData> {
    const { logger } = this.#env
    const label = `mutation ${this.options.mutationType ?? 'anonymous'}`

    this.#token?.cancel()
    const token = new CancellationToken()
    this.#token = token
    this.#dispatch({ type: 'loading', variables, submittedAt: Date.now() })

    const retryer = new Retryer<TData>({
      fn: (attemptToken) => this.#mutationFn(variables, attemptToken),
      token,
      policy: resolveRetryPolicy(this.options.retry ?? false),
      logger,
      label,
      onFail: (failureCount) => {
        if (!token.isCancelled) this.#dispatch({ type: 'failed', failureCount })
      },
    })

    let data: TData
    try {
      data = await retryer.start()
    } catch (error) {
      // Superseded, reset or disposed: the newer state stands.
      if (token.isCancelled) throw error
      this.#token = undefined
      this.#dispatch({ type: 'error', error })
      logger.warn(`[mutation] ${label} failed`, { error, failureCount: retryer.failureCount() })

      const { onError, onSettled } = this.options
      if (onError) invokeCallback(logger, 'onError', () => onError(error, variables))
      if (onSettled) invokeCallback(logger, 'onSettled', () => onSettled(undefined, error, variables))
      throw error
    }

    this.#token = undefined
    this.#dispatch({ type: 'success', data })
    logger.debug(`[mutation] ${label} succeeded`)

    const { onSuccess, onSettled } = this.options
    if (onSuccess) invokeCallback(logger, 'onSuccess', () => onSuccess(data, variables))
    if (onSettled) invokeCallback(logger, 'onSettled', () => onSettled(data, null, variables))
    return data
  }

  async #enqueue(mutationType: string, variables: TVariables): Promise<void> {
    const { offlineQueue, logger } = this.#env
    const entry = await offlineQueue.enqueue(this.options.mutationKey ?? mutationType, mutationType, variables, {
      priority: this.options.priority,
    })
    this.#dispatch({ type: 'queued', variables, submittedAt: entry.createdAt })
    logger.debug(`[mutation] ${mutationType} queued while offline`, { id: entry.id })

    const { onQueued } = this.options
    if (onQueued) invokeCallback(logger, 'onQueued', () => onQueued(variables))
  }

  #dispatch(action: MutationAction<TData, TVariables>): void {
    this.state = reducer(this.state, action)
    const state = this.state
    this.listeners.forEach((listener) => listener(state))
  }
}
