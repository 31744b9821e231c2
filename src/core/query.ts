/**
 * query.ts
 *
 * The state machine for a single query key.
 *
 * A Query instance:
 * - Holds the state for one key (data, error, status, isFetching)
 * - Owns the fetch/retry lifecycle via a Retryer, under a fresh
 *   CancellationToken per fetch
 * - Reads and writes the CacheStore entry for its key, retaining it while
 *   referenced
 * - Notifies its subscribers and the registry on every transition
 * - Disposes itself once unreferenced for `disposeDelay`
 *
 * Deduplication: a fetch() while another is in flight returns the pending
 * result. forceRefetch cancels the older token instead, and only the newest
 * attempt commits (last writer wins).
 *
 * The registry and environment interfaces are declared here, not in the
 * files that implement them, so query.ts never imports queryRegistry.ts or
 * queryClient.ts.
 */

import type {
  QueryFunction,
  QueryHash,
  QueryKey,
  QueryOptions,
  QueryState,
  QueryStatus,
  BaseQueryOptions,
} from './types'
import { Removable, DEFAULT_DISPOSE_DELAY } from './removable'
import { Retryer, resolveRetryPolicy } from './retryer'
import { CancellationToken } from './cancellationToken'
import type { CacheStore, CacheSetOptions, DataGuard } from './cacheStore'
import type { CircuitBreaker } from './circuitBreaker'
import type { CircuitBreakerRegistry } from './circuitBreakerRegistry'
import type { DependencyManager } from './dependencyManager'
import type { NetworkStatus } from './networkStatus'
import type { TaskPool } from './taskPool'
import type { Logger } from './logger'
import { createErrorContext, reportToAll, type ErrorReporter } from './errorReporter'
import { CircuitBreakerOpenError, isCancelledError } from './errors'
import { parseOrThrow, queryOptionsSchema, validateQueryKey } from './validation'
import type { ZodType, ZodTypeDef } from 'zod'

// ---------------------------------------------------------------------------
// Break-circular-dependency interfaces
// ---------------------------------------------------------------------------

/** What the registry and the client need from either query kind. */
export interface RegisteredQuery {
  readonly kind: 'query' | 'infinite'
  readonly queryKey: QueryKey
  readonly queryHash: QueryHash
  readonly isDisposed: boolean
  readonly referenceCount: number
  readonly isFetching: boolean
  cancel(): void
  invalidate(): void
  refetch(): Promise<unknown>
  dispose(): void
}

export type QueryRegistryEvent =
  | { type: 'added'; query: RegisteredQuery }
  | { type: 'removed'; query: RegisteredQuery }
  | { type: 'updated'; query: RegisteredQuery }

export interface QueryRegistryInterface {
  get(queryHash: QueryHash): RegisteredQuery | undefined
  notify(event: QueryRegistryEvent): void
  remove(query: RegisteredQuery): void
}

/** Collaborators a query runs against, owned by the QueryClient. */
export interface QueryEnvironment {
  registry: QueryRegistryInterface
  cacheStore: CacheStore
  circuitBreakers: CircuitBreakerRegistry
  dependencies: DependencyManager
  taskPool: TaskPool
  networkStatus: NetworkStatus
  logger: Logger
  errorReporters: ReadonlySet<ErrorReporter>
}

// ---------------------------------------------------------------------------
// Shared helpers (also used by InfiniteQuery)
// ---------------------------------------------------------------------------

/** Breaker for this query's scope, or undefined when breaking is off. */
export function resolveCircuitBreaker(
  env: QueryEnvironment,
  options: BaseQueryOptions,
  queryHash: QueryHash,
): CircuitBreaker | undefined {
  if (!options.circuitBreaker && options.circuitBreakerScope === undefined) return undefined
  return env.circuitBreakers.getOrCreate(options.circuitBreakerScope ?? queryHash, options.circuitBreaker)
}

export function cacheSetOptions(options: BaseQueryOptions): CacheSetOptions {
  return {
    staleTime: options.staleTime,
    cacheTime: options.cacheTime,
    isSecure: options.isSecure,
    maxAge: options.maxAge,
  }
}

/** Validate a key and option bag at construction time. */
export function validateQueryInput(queryKey: QueryKey, options: object): void {
  validateQueryKey(queryKey)
  parseOrThrow(queryOptionsSchema, options, 'query options')
}

export function schemaGuard<T>(schema: ZodType<T, ZodTypeDef, unknown> | undefined): DataGuard<T> | undefined {
  if (!schema) return undefined
  return (value: unknown): value is T => schema.safeParse(value).success
}

/** Forward a surfaced failure to every reporter without awaiting them. */
export function reportFailure(
  env: QueryEnvironment,
  input: { queryKey: QueryKey; queryHash: QueryHash; error: unknown; failureCount: number; options: BaseQueryOptions },
): void {
  if (env.errorReporters.size === 0) return
  const context = createErrorContext({
    ...input,
    staleTime: input.options.staleTime ?? env.cacheStore.defaultStaleTime,
    isOnline: env.networkStatus.isOnline,
  })
  reportToAll(env.errorReporters, context, env.logger).catch((error: unknown) => {
    env.logger.error(`[report] delivery failed for ${input.queryHash}`, { error })
  })
}

/** Run a user callback; a throw is logged and goes no further. */
export function invokeCallback(logger: Logger, label: string, callback: () => void): void {
  try {
    callback()
  } catch (error) {
    logger.error(`[callback] ${label} threw`, { error })
  }
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export interface QueryMetrics {
  fetchCount: number
  successCount: number
  errorCount: number
  lastDuration: number | undefined
  averageDuration: number
  /** Durations of the most recent settled fetches, oldest first. */
  durations: number[]
}

const METRICS_HISTORY = 100

export class QueryFetchMetrics {
  #fetchCount = 0
  #successCount = 0
  #errorCount = 0
  #durations: number[] = []

  recordStart(): void {
    this.#fetchCount++
  }

  recordSettled(duration: number, ok: boolean): void {
    if (ok) this.#successCount++
    else this.#errorCount++
    this.#durations.push(duration)
    if (this.#durations.length > METRICS_HISTORY) this.#durations.shift()
  }

  snapshot(): QueryMetrics {
    const total = this.#durations.reduce((sum, duration) => sum + duration, 0)
    return {
      fetchCount: this.#fetchCount,
      successCount: this.#successCount,
      errorCount: this.#errorCount,
      lastDuration: this.#durations[this.#durations.length - 1],
      averageDuration: this.#durations.length ? total / this.#durations.length : 0,
      durations: [...this.#durations],
    }
  }
}

// ---------------------------------------------------------------------------
// Handles
// ---------------------------------------------------------------------------

/** Ownership of one reference. release() is idempotent. */
export interface QueryHandle<TQuery> {
  readonly query: TQuery
  release(): void
}

// ---------------------------------------------------------------------------
// Constructor config
// ---------------------------------------------------------------------------

export interface QueryConfig<TData> {
  env: QueryEnvironment
  queryKey: QueryKey
  queryHash: QueryHash
  queryFn: QueryFunction<TData>
  options: QueryOptions<TData>
}

export interface FetchOptions {
  /** Start a new fetch even if one is in flight or cached data is fresh. */
  forceRefetch?: boolean
  /** Rethrow fetch errors instead of resolving with the previous data. */
  throwOnError?: boolean
}

// ---------------------------------------------------------------------------
// State-machine actions
// ---------------------------------------------------------------------------

export type QueryAction<TData> =
  | { type: 'fetch' }
  | { type: 'success'; data: TData; updatedAt: number; manual?: boolean }
  | { type: 'error'; error: unknown }
  | { type: 'failed'; failureCount: number }
  | { type: 'cancel'; status: QueryStatus }
  | { type: 'invalidate' }

// ---------------------------------------------------------------------------
// Reducer (pure)
// ---------------------------------------------------------------------------

function reducer<TData>(state: QueryState<TData>, action: QueryAction<TData>): QueryState<TData> {
  switch (action.type) {
    case 'fetch':
      // Prior data stays visible during a background refetch.
      return { ...state, status: 'loading', isFetching: true, failureCount: 0 }

    case 'success':
      return {
        ...state,
        status: 'success',
        data: action.data,
        dataUpdatedAt: action.updatedAt,
        error: null,
        failureCount: 0,
        isInvalidated: false,
        // setData() during a fetch leaves the fetch running.
        isFetching: action.manual ? state.isFetching : false,
      }

    case 'error':
      return {
        ...state,
        status: 'error',
        error: action.error,
        errorUpdatedAt: Date.now(),
        isFetching: false,
      }

    case 'failed':
      return { ...state, failureCount: action.failureCount }

    case 'cancel':
      return { ...state, status: action.status, isFetching: false }

    case 'invalidate':
      return { ...state, isInvalidated: true }
  }
}

function getDefaultState<TData>(data: TData | undefined, updatedAt: number): QueryState<TData> {
  return {
    status: data === undefined ? 'idle' : 'success',
    data,
    error: null,
    isFetching: false,
    dataUpdatedAt: data === undefined ? 0 : updatedAt,
    errorUpdatedAt: 0,
    failureCount: 0,
    isInvalidated: false,
  }
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

interface InFlightFetch<TData> {
  token: CancellationToken
  promise: Promise<TData>
}

type QueryListener<TData> = (state: QueryState<TData>) => void

/**
 * Lifecycle:
 *  1. Created by QueryClient.getQuery(), seeded from the cache store if it
 *     holds a valid value for the key
 *  2. addListener()/acquire() pins it; the first reference may fetch
 *  3. fetch() runs a Retryer; transitions go through #dispatch
 *  4. The last removeListener() arms the disposal timer
 *  5. The timer fires -> dispose() -> removed from the registry
 */
export class Query<TData = unknown> extends Removable<QueryListener<TData>> implements RegisteredQuery {
  readonly kind = 'query'
  readonly queryKey: QueryKey
  readonly queryHash: QueryHash
  readonly options: QueryOptions<TData>
  state: QueryState<TData>

  #env: QueryEnvironment
  #queryFn: QueryFunction<TData>
  #guard?: DataGuard<TData>
  #lifetime = new CancellationToken()
  #inFlight?: InFlightFetch<TData>
  #statusBeforeFetch: QueryStatus = 'idle'
  #referenceCount = 0
  #owners = new Set<string>()
  #disposed = false
  #metrics = new QueryFetchMetrics()

  constructor(config: QueryConfig<TData>) {
    super()
    validateQueryInput(config.queryKey, config.options)
    this.#env = config.env
    this.queryKey = config.queryKey
    this.queryHash = config.queryHash
    this.#queryFn = config.queryFn
    this.options = config.options
    this.#guard = schemaGuard(config.options.schema)
    this.disposeDelay = config.options.disposeDelay ?? DEFAULT_DISPOSE_DELAY
    // Unreferenced from birth: disposed unless someone acquires it.
    this.scheduleDisposal()

    const cached = this.#env.cacheStore.get(this.queryKey, this.#guard)
    this.state = getDefaultState(cached?.data, cached?.fetchedAt ?? 0)
    if (cached?.isInvalidated) this.state = { ...this.state, isInvalidated: true }
  }

  // -------------------------------------------------------------------------
  // Derived state
  // -------------------------------------------------------------------------

  get isDisposed(): boolean {
    return this.#disposed
  }

  get referenceCount(): number {
    return this.#referenceCount
  }

  get isFetching(): boolean {
    return this.state.isFetching
  }

  get hasData(): boolean {
    return this.state.data !== undefined
  }

  get hasError(): boolean {
    return this.state.status === 'error'
  }

  /** True when the next read should refetch. */
  get isStale(): boolean {
    return (
      this.state.data === undefined ||
      this.state.isInvalidated ||
      !this.#env.cacheStore.isFresh(this.queryKey)
    )
  }

  get metrics(): QueryMetrics {
    return this.#metrics.snapshot()
  }

  // -------------------------------------------------------------------------
  // References
  // -------------------------------------------------------------------------

  /**
   * Take a reference. With `ownerId`, repeated calls by the same owner count
   * once. The first reference cancels pending disposal, retains the cache
   * entry and fetches if the query is idle or stale.
   */
  addListener(ownerId?: string): void {
    if (this.#disposed) {
      this.#env.logger.warn(`[query] addListener on disposed query ${this.queryHash}`)
      return
    }
    if (ownerId !== undefined) {
      if (this.#owners.has(ownerId)) return
      this.#owners.add(ownerId)
    }

    this.#referenceCount++
    if (this.#referenceCount !== 1) return

    this.clearDisposalTimer()
    this.#env.cacheStore.retain(this.queryKey)
    if (this.#shouldFetchOnMount()) {
      this.fetch().catch((error: unknown) => {
        this.#env.logger.debug(`[fetch] ${this.queryHash} mount fetch rejected`, { error })
      })
    }
  }

  /**
   * Drop a reference. A no-op at zero, or for an `ownerId` that holds none.
   * The last one arms the disposal timer.
   */
  removeListener(ownerId?: string): void {
    if (ownerId !== undefined && !this.#owners.delete(ownerId)) return
    if (this.#referenceCount === 0) return

    this.#referenceCount--
    if (this.#referenceCount === 0 && !this.#disposed) {
      this.#env.cacheStore.release(this.queryKey)
      this.scheduleDisposal()
    }
  }

  acquire(ownerId?: string): QueryHandle<Query<TData>> {
    this.addListener(ownerId)
    let released = false
    return {
      query: this,
      release: () => {
        if (released) return
        released = true
        this.removeListener(ownerId)
      },
    }
  }

  // -------------------------------------------------------------------------
  // Fetch
  // -------------------------------------------------------------------------

  /**
   * Resolve the data for this key.
   *
   * - disabled or disposed: resolves with the current data, no call
   * - fetch in flight: shares it, unless `forceRefetch`
   * - fresh cache entry: served from the cache store, unless `forceRefetch`
   * - otherwise runs the fetch function with retries
   *
   * Fetch errors are stored in state and the promise resolves with the
   * previous data; `throwOnError` rethrows them. CircuitBreakerOpenError is
   * always rethrown.
   */
  fetch(options: FetchOptions = {}): Promise<TData | undefined> {
    if (this.#disposed || this.options.enabled === false) {
      return Promise.resolve(this.state.data)
    }

    if (this.#inFlight && !options.forceRefetch) {
      return this.#settle(this.#inFlight.promise, options)
    }

    if (!options.forceRefetch && !this.state.isInvalidated) {
      const cached = this.#readFresh()
      if (cached !== undefined) return Promise.resolve(cached)
    }

    return this.#settle(this.#startFetch().promise, options)
  }

  /** Fetch regardless of freshness, superseding any fetch in flight. */
  refetch(options: Omit<FetchOptions, 'forceRefetch'> = {}): Promise<TData | undefined> {
    return this.fetch({ ...options, forceRefetch: true })
  }

  // -------------------------------------------------------------------------
  // Manual writes
  // -------------------------------------------------------------------------

  /** Write `data` to state and the cache store without fetching. */
  setData(data: TData): TData {
    this.#env.cacheStore.set(this.queryKey, data, cacheSetOptions(this.options))
    this.#dispatch({ type: 'success', data, updatedAt: Date.now(), manual: true })
    return data
  }

  /** Optimistic update; same as setData(). */
  updateFromCache(data: TData): void {
    this.setData(data)
  }

  /** Mark state and cache entry stale. Idempotent. */
  invalidate(): void {
    this.#env.cacheStore.invalidate(this.queryKey)
    if (!this.state.isInvalidated) {
      this.#dispatch({ type: 'invalidate' })
    }
  }

  // -------------------------------------------------------------------------
  // Cancellation and disposal
  // -------------------------------------------------------------------------

  /** Cancel the fetch in flight, keeping the query. No-op when idle. */
  cancel(): void {
    const inFlight = this.#inFlight
    if (!inFlight) return
    this.#inFlight = undefined
    inFlight.token.cancel()
    this.#env.logger.debug(`[fetch] ${this.queryHash} cancelled`)
    this.#dispatch({ type: 'cancel', status: this.#statusBeforeFetch })
  }

  /**
   * Cancel work, cancel direct dependents and leave the registry.
   * Idempotent.
   */
  dispose(): void {
    if (this.#disposed) return
    this.cancel()
    this.#disposed = true
    this.clearDisposalTimer()
    this.#lifetime.cancel()

    if (this.#referenceCount > 0) {
      this.#referenceCount = 0
      this.#owners.clear()
      this.#env.cacheStore.release(this.queryKey)
    }

    const { dependencies, registry } = this.#env
    dependencies.notifyParentDisposed(this.queryHash, (child) => registry.get(child)?.cancel())
    dependencies.unregister(this.queryHash)
    registry.remove(this)
    this.listeners.clear()
    this.#env.logger.debug(`[query] ${this.queryHash} disposed`)
  }

  protected optionalRemove(): void {
    if (this.#referenceCount > 0) return
    // An unreferenced fetch (e.g. a prefetch) keeps the query alive until it settles.
    if (this.state.isFetching) {
      this.scheduleDisposal()
      return
    }
    this.dispose()
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  #shouldFetchOnMount(): boolean {
    if (this.options.enabled === false) return false
    return this.state.status === 'idle' || this.options.refetchOnMount === true || this.isStale
  }

  #readFresh(): TData | undefined {
    const { cacheStore } = this.#env
    if (!cacheStore.isFresh(this.queryKey)) return undefined
    const entry = cacheStore.get(this.queryKey, this.#guard)
    if (!entry) return undefined
    if (this.state.data !== entry.data || this.state.status !== 'success') {
      this.#dispatch({ type: 'success', data: entry.data, updatedAt: entry.fetchedAt })
    }
    return entry.data
  }

  #startFetch(): InFlightFetch<TData> {
    const previous = this.#inFlight
    if (previous) {
      // Superseded: its result must not commit.
      previous.token.cancel()
    } else {
      this.#statusBeforeFetch = this.state.status
    }

    const token = this.#lifetime.createChild()
    const { logger, taskPool } = this.#env
    const startedAt = Date.now()
    this.#metrics.recordStart()
    logger.debug(`[fetch] ${this.queryHash} started`)
    this.#dispatch({ type: 'fetch' })

    const retryer = new Retryer<TData>({
      fn: (attemptToken) =>
        this.#queryFn({
          queryKey: this.queryKey,
          token: attemptToken,
          signal: attemptToken.signal,
          meta: this.options.meta,
        }),
      token,
      policy: resolveRetryPolicy(this.options.retry),
      circuitBreaker: resolveCircuitBreaker(this.#env, this.options, this.queryHash),
      logger,
      label: this.queryHash,
      onFail: (failureCount) => {
        if (!token.isCancelled) this.#dispatch({ type: 'failed', failureCount })
      },
    })

    const select = this.options.select
    const promise = retryer
      .start()
      .then((raw) => (select ? taskPool.execute(select, raw) : raw))
      .then((data) => {
        token.throwIfCancelled()
        this.#commit(token, data, startedAt)
        return data
      })
      .catch((error: unknown) => {
        // Also reached when committing throws, so the fetch never stays pending.
        this.#fail(token, error, retryer.failureCount(), startedAt)
        throw error
      })

    const inFlight = { token, promise }
    this.#inFlight = inFlight
    return inFlight
  }

  #commit(token: CancellationToken, data: TData, startedAt: number): void {
    token.release()
    if (this.#inFlight?.token === token) this.#inFlight = undefined
    const duration = Date.now() - startedAt
    const { cacheStore, logger } = this.#env

    cacheStore.set(this.queryKey, data, cacheSetOptions(this.options))
    cacheStore.metrics.recordFetchTime(duration)
    this.#metrics.recordSettled(duration, true)
    this.#dispatch({ type: 'success', data, updatedAt: Date.now() })
    logger.debug(`[fetch] ${this.queryHash} succeeded in ${duration}ms`)

    const { onSuccess, onSettled } = this.options
    if (onSuccess) invokeCallback(logger, 'onSuccess', () => onSuccess(data))
    if (onSettled) invokeCallback(logger, 'onSettled', onSettled)
  }

  #fail(token: CancellationToken, error: unknown, failureCount: number, startedAt: number): void {
    token.release()
    // Superseded or cancelled: cancel() already reverted state.
    if (token.isCancelled) return
    if (this.#inFlight?.token === token) this.#inFlight = undefined

    const { logger } = this.#env
    this.#metrics.recordSettled(Date.now() - startedAt, false)
    this.#dispatch({ type: 'error', error })
    logger.warn(`[fetch] ${this.queryHash} failed`, { error, failureCount })

    reportFailure(this.#env, {
      queryKey: this.queryKey,
      queryHash: this.queryHash,
      error,
      failureCount,
      options: this.options,
    })

    const { onError, onSettled } = this.options
    if (onError) invokeCallback(logger, 'onError', () => onError(error))
    if (onSettled) invokeCallback(logger, 'onSettled', onSettled)
  }

  /** Map one caller's view of a fetch outcome. */
  #settle(promise: Promise<TData>, options: FetchOptions): Promise<TData | undefined> {
    return promise.catch(async (error: unknown): Promise<TData | undefined> => {
      if (isCancelledError(error)) {
        // Superseded by a newer fetch: follow it.
        if (this.#inFlight && this.#inFlight.promise !== promise) {
          return this.#settle(this.#inFlight.promise, options)
        }
        if (options.throwOnError) throw error
        return this.state.data
      }
      if (error instanceof CircuitBreakerOpenError || options.throwOnError) throw error
      return this.state.data
    })
  }

  /** Apply an action, then notify subscribers and the registry. */
  #dispatch(action: QueryAction<TData>): void {
    this.state = reducer(this.state, action)
    const state = this.state
    this.listeners.forEach((listener) => listener(state))
    if (!this.#disposed) {
      this.#env.registry.notify({ type: 'updated', query: this })
    }
  }
}
