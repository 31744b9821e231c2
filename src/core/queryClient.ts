/**
 * queryClient.ts
 *
 * The public facade of the engine.
 *
 * A QueryClient owns one registry of live queries (exactly one per key) and
 * the collaborators they share: the CacheStore, the CircuitBreakerRegistry,
 * the DependencyManager, the task pool and the error reporters. It is a
 * plain object passed to whoever needs it; nothing here is global except
 * the default NetworkStatus and OfflineQueueManager instances, which a
 * config can replace.
 *
 * Pattern: Facade. Fetching and state transitions live in Query and
 * InfiniteQuery; this file only creates, finds and fans out to them.
 */

import { CacheStore, type CacheInfo, type CacheStoreConfig, type DataGuard } from './cacheStore'
import { CircuitBreakerRegistry } from './circuitBreakerRegistry'
import { DependencyManager } from './dependencyManager'
import { networkStatus as defaultNetworkStatus, type NetworkStatus } from './networkStatus'
import { offlineQueueManager, type OfflineQueueManager } from './offlineQueue'
import { TaskPool } from './taskPool'
import type { ErrorReporter } from './errorReporter'
import { QueryArgumentError } from './errors'
import { silentLogger, type Logger } from './logger'
import { DEFAULT_DISPOSE_DELAY } from './removable'
import { Query, cacheSetOptions, type QueryEnvironment, type RegisteredQuery } from './query'
import { InfiniteQuery } from './infiniteQuery'
import { Mutation } from './mutation'
import { QueryRegistry, matchesQuery, type QueryRegistryListener } from './queryRegistry'
import { hashQueryKey } from './utils'
import { validateDuration, validateQueryKey } from './validation'
import type {
  BaseQueryOptions,
  DefaultQueryOptions,
  InfiniteQueryFunction,
  InfiniteQueryOptions,
  MutationFunction,
  MutationOptions,
  QueryFilters,
  QueryFunction,
  QueryHash,
  QueryKey,
  QueryOptions,
  QueryState,
} from './types'

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface QueryClientConfig {
  /** A ready CacheStore, or the config to build one. */
  cache?: CacheStore | CacheStoreConfig
  /** Merged under every query's own options. */
  defaultOptions?: DefaultQueryOptions
  circuitBreakers?: CircuitBreakerRegistry
  dependencies?: DependencyManager
  offlineQueue?: OfflineQueueManager
  networkStatus?: NetworkStatus
  taskPool?: TaskPool
  logger?: Logger
  errorReporters?: ErrorReporter[]
  /** Default delay between a query losing its last listener and disposal. */
  disposeDelay?: number
}

/** One entry of prefetchQueries(). */
export interface PrefetchConfig<TData = unknown> {
  queryKey: QueryKey
  queryFn: QueryFunction<TData>
  options?: QueryOptions<TData>
}

// ---------------------------------------------------------------------------
// QueryClient
// ---------------------------------------------------------------------------

export class QueryClient {
  readonly #registry = new QueryRegistry()
  readonly #mutations = new Set<{ dispose(): void }>()
  readonly #cache: CacheStore
  readonly #circuitBreakers: CircuitBreakerRegistry
  readonly #dependencies: DependencyManager
  readonly #offlineQueue: OfflineQueueManager
  readonly #networkStatus: NetworkStatus
  readonly #taskPool: TaskPool
  readonly #logger: Logger
  readonly #errorReporters: Set<ErrorReporter>
  readonly #env: QueryEnvironment
  readonly #ownsCache: boolean
  readonly #ownsTaskPool: boolean
  #defaultOptions: DefaultQueryOptions
  #disposeDelay: number

  /** Reference count for mount()/unmount(), so nested providers share one wiring. */
  #mountCount = 0
  #disconnectOffline?: () => void
  #teardownNetwork?: () => void

  constructor(config: QueryClientConfig = {}) {
    this.#disposeDelay = config.disposeDelay ?? DEFAULT_DISPOSE_DELAY
    validateDuration(this.#disposeDelay, 'disposeDelay')

    this.#logger = config.logger ?? silentLogger
    this.#ownsCache = !(config.cache instanceof CacheStore)
    this.#cache =
      config.cache instanceof CacheStore
        ? config.cache
        : new CacheStore({ logger: this.#logger, ...config.cache })
    this.#circuitBreakers = config.circuitBreakers ?? new CircuitBreakerRegistry({ logger: this.#logger })
    this.#dependencies = config.dependencies ?? new DependencyManager({ logger: this.#logger })
    this.#networkStatus = config.networkStatus ?? defaultNetworkStatus
    this.#offlineQueue = config.offlineQueue ?? offlineQueueManager
    this.#ownsTaskPool = config.taskPool === undefined
    this.#taskPool = config.taskPool ?? new TaskPool({ logger: this.#logger })
    this.#errorReporters = new Set(config.errorReporters)
    this.#defaultOptions = config.defaultOptions ?? {}

    this.#env = {
      registry: this.#registry,
      cacheStore: this.#cache,
      circuitBreakers: this.#circuitBreakers,
      dependencies: this.#dependencies,
      taskPool: this.#taskPool,
      networkStatus: this.#networkStatus,
      logger: this.#logger,
      errorReporters: this.#errorReporters,
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Wire network status to offline replay. Reference-counted so that nested
   * providers sharing one client do not double-subscribe.
   */
  mount(): void {
    this.#mountCount++
    if (this.#mountCount !== 1) return

    this.#disconnectOffline = this.#offlineQueue.connect(this.#networkStatus)
    this.#teardownNetwork = this.#networkStatus.setup()
  }

  unmount(): void {
    if (this.#mountCount === 0) return
    this.#mountCount--
    if (this.#mountCount > 0) return

    this.#disconnectOffline?.()
    this.#teardownNetwork?.()
    this.#disconnectOffline = undefined
    this.#teardownNetwork = undefined
  }

  get isMounted(): boolean {
    return this.#mountCount > 0
  }

  /**
   * Dispose every query and mutation and stop all timers. Collaborators passed in through
   * the config are left running; ones the client created are shut down.
   */
  dispose(): void {
    this.#mountCount = Math.min(this.#mountCount, 1)
    this.unmount()
    this.#registry.clear()
    Array.from(this.#mutations).forEach((mutation) => mutation.dispose())
    this.#dependencies.clear()
    if (this.#ownsCache) this.#cache.dispose()
    if (this.#ownsTaskPool) this.#taskPool.dispose()
    this.#logger.debug('[client] disposed')
  }

  // -------------------------------------------------------------------------
  // Collaborators
  // -------------------------------------------------------------------------

  get cache(): CacheStore {
    return this.#cache
  }

  get circuitBreakers(): CircuitBreakerRegistry {
    return this.#circuitBreakers
  }

  get dependencies(): DependencyManager {
    return this.#dependencies
  }

  get offlineQueue(): OfflineQueueManager {
    return this.#offlineQueue
  }

  get networkStatus(): NetworkStatus {
    return this.#networkStatus
  }

  get taskPool(): TaskPool {
    return this.#taskPool
  }

  get registry(): QueryRegistry {
    return this.#registry
  }

  // -------------------------------------------------------------------------
  // Options
  // -------------------------------------------------------------------------

  getDefaultOptions(): DefaultQueryOptions {
    return this.#defaultOptions
  }

  setDefaultOptions(options: DefaultQueryOptions): void {
    this.#defaultOptions = options
  }

  /** Client defaults under `options`; `options` win. */
  defaultQueryOptions<TOptions extends BaseQueryOptions>(options: TOptions): TOptions {
    return { disposeDelay: this.#disposeDelay, ...this.#defaultOptions, ...options }
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * The query for `queryKey`, created on first use. Later calls with the
   * same key return the same instance, whatever `queryFn` and `options`
   * they pass, until it is disposed.
   *
   * @throws QueryArgumentError if the key is held by an infinite query, or
   *   for invalid keys and options.
   * @throws DependencyCycleError if `dependsOn` would close a cycle.
   */
  getQuery<TData = unknown>(
    queryKey: QueryKey,
    queryFn: QueryFunction<TData>,
    options: QueryOptions<TData> = {},
  ): Query<TData> {
    validateQueryKey(queryKey)
    const queryHash = hashQueryKey(queryKey)
    const existing = this.#registry.getQuery<TData>(queryHash)
    if (existing && !existing.isDisposed) return existing
    this.#assertKindFree(queryHash, 'query')

    const query = new Query<TData>({
      env: this.#env,
      queryKey,
      queryHash,
      queryFn,
      options: this.defaultQueryOptions(options),
    })
    this.#register(query, query.options.dependsOn)
    return query
  }

  getInfiniteQuery<TPage = unknown, TParam = unknown>(
    queryKey: QueryKey,
    queryFn: InfiniteQueryFunction<TPage, TParam>,
    options: InfiniteQueryOptions<TPage, TParam>,
  ): InfiniteQuery<TPage, TParam> {
    validateQueryKey(queryKey)
    const queryHash = hashQueryKey(queryKey)
    const existing = this.#registry.getInfiniteQuery<TPage, TParam>(queryHash)
    if (existing && !existing.isDisposed) return existing
    this.#assertKindFree(queryHash, 'infinite')

    const query = new InfiniteQuery<TPage, TParam>({
      env: this.#env,
      queryKey,
      queryHash,
      queryFn,
      options: this.defaultQueryOptions(options),
    })
    this.#register(query, query.options.dependsOn)
    return query
  }

  /** The live query for `queryKey`, without creating one. */
  getQueryByKey<TData = unknown>(queryKey: QueryKey): Query<TData> | undefined {
    return this.#registry.getQuery<TData>(hashQueryKey(queryKey))
  }

  getInfiniteQueryByKey<TPage = unknown, TParam = unknown>(
    queryKey: QueryKey,
  ): InfiniteQuery<TPage, TParam> | undefined {
    return this.#registry.getInfiniteQuery<TPage, TParam>(hashQueryKey(queryKey))
  }

  hasQuery(queryKey: QueryKey): boolean {
    const query = this.#registry.get(hashQueryKey(queryKey))
    return query !== undefined && !query.isDisposed
  }

  get queryCount(): number {
    return this.#registry.size
  }

  getQueryState<TData = unknown>(queryKey: QueryKey): QueryState<TData> | undefined {
    return this.getQueryByKey<TData>(queryKey)?.state
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /**
   * A new Mutation bound to this client's network status and offline queue.
   * Unlike queries, mutations are not shared: each call returns a fresh one,
   * tracked until it is disposed.
   *
   * @throws QueryArgumentError for invalid options.
   */
  createMutation<TData = unknown, TVariables = unknown>(
    mutationFn: MutationFunction<TData, TVariables>,
    options: MutationOptions<TData, TVariables> = {},
  ): Mutation<TData, TVariables> {
    const mutation: Mutation<TData, TVariables> = new Mutation({
      mutationFn,
      options,
      env: {
        networkStatus: this.#networkStatus,
        offlineQueue: this.#offlineQueue,
        logger: this.#logger,
        onDispose: () => this.#mutations.delete(mutation),
      },
    })
    this.#mutations.add(mutation)
    return mutation
  }

  get mutationCount(): number {
    return this.#mutations.size
  }

  // -------------------------------------------------------------------------
  // Prefetching
  // -------------------------------------------------------------------------

  /**
   * Populate the cache for `queryKey` unless it already holds fresh data.
   * The query is left unreferenced and disposes after its delay; the cache
   * entry stays for its cacheTime.
   *
   * @throws whatever the fetch finally failed with.
   */
  async prefetchQuery<TData = unknown>(
    queryKey: QueryKey,
    queryFn: QueryFunction<TData>,
    options: QueryOptions<TData> = {},
  ): Promise<void> {
    if (this.#cache.isFresh(queryKey)) {
      this.#logger.debug(`[prefetch] ${hashQueryKey(queryKey)} is fresh, skipped`)
      return
    }
    const query = this.getQuery(queryKey, queryFn, options)
    await query.fetch({ throwOnError: true })
  }

  /**
   * Prefetch several keys in parallel. A failure of one does not stop the
   * others; each outcome is returned in input order.
   */
  async prefetchQueries(configs: ReadonlyArray<PrefetchConfig>): Promise<PromiseSettledResult<void>[]> {
    const results = await Promise.allSettled(
      configs.map(({ queryKey, queryFn, options }) => this.prefetchQuery(queryKey, queryFn, options)),
    )
    const failed = results.filter((result) => result.status === 'rejected').length
    if (failed > 0) {
      this.#logger.warn(`[prefetch] ${failed} of ${configs.length} prefetches failed`)
    }
    return results
  }

  // -------------------------------------------------------------------------
  // Invalidation
  // -------------------------------------------------------------------------

  /**
   * Mark `queryKey` and every query that transitively depends on it stale.
   * Those currently referenced refetch; the promise settles once they have.
   */
  async invalidateQuery(queryKey: QueryKey): Promise<void> {
    await this.#invalidateTree(hashQueryKey(queryKey))
  }

  /**
   * Invalidate every query and cache entry matching `filters`. Without
   * filters, everything.
   *
   * @returns The hashes that were invalidated.
   */
  async invalidateQueries(filters: QueryFilters = {}): Promise<QueryHash[]> {
    const matched = new Set<QueryHash>(
      this.#registry.findAll(filters).map((query) => query.queryHash),
    )
    this.#cache
      .invalidateWhere((queryKey) => matchesQuery({ queryKey, queryHash: hashQueryKey(queryKey) }, filters))
      .forEach((hash) => matched.add(hash))

    await Promise.all([...matched].map((hash) => this.#invalidateTree(hash)))
    return [...matched]
  }

  // -------------------------------------------------------------------------
  // Direct data access
  // -------------------------------------------------------------------------

  /**
   * Write `data` for `queryKey` without fetching. A live query is updated
   * too, so its subscribers see the value immediately.
   */
  setQueryData<TData>(queryKey: QueryKey, data: TData, options: BaseQueryOptions = {}): void {
    const query = this.getQueryByKey<TData>(queryKey)
    if (query && !query.isDisposed) {
      query.setData(data)
      return
    }
    this.#cache.set(queryKey, data, cacheSetOptions(this.defaultQueryOptions(options)))
  }

  /** Cached data for `queryKey`. Pass `guard` to validate the stored value. */
  getQueryData<TData = unknown>(queryKey: QueryKey, guard?: DataGuard<TData>): TData | undefined {
    return this.#cache.getData(queryKey, guard)
  }

  // -------------------------------------------------------------------------
  // Removal and cancellation
  // -------------------------------------------------------------------------

  /**
   * Dispose the query for `queryKey` and drop its cache entry.
   *
   * @returns Whether there was anything to remove.
   */
  removeQuery(queryKey: QueryKey): boolean {
    const queryHash = hashQueryKey(queryKey)
    const query = this.#registry.get(queryHash)
    query?.dispose()
    this.#dependencies.unregister(queryHash)
    const removedEntry = this.#cache.remove(queryKey)
    return query !== undefined || removedEntry
  }

  /** Cancel the fetch in flight for `queryKey`, if any. */
  cancelQuery(queryKey: QueryKey): void {
    this.#registry.get(hashQueryKey(queryKey))?.cancel()
  }

  /** Dispose every query and empty the cache store. */
  clear(): void {
    this.#registry.clear()
    this.#dependencies.clear()
    this.#cache.clear()
  }

  // -------------------------------------------------------------------------
  // Cache inspection
  // -------------------------------------------------------------------------

  /** Drop every `isSecure` cache entry. Call on app backgrounding and shutdown. */
  clearSecureCache(): number {
    return this.#cache.clearSecureEntries()
  }

  getCacheInfo(): CacheInfo {
    return this.#cache.info()
  }

  getCacheKeys(): QueryHash[] {
    return this.#cache.keys()
  }

  // -------------------------------------------------------------------------
  // Error reporters and events
  // -------------------------------------------------------------------------

  addErrorReporter(reporter: ErrorReporter): () => void {
    this.#errorReporters.add(reporter)
    return () => this.removeErrorReporter(reporter)
  }

  removeErrorReporter(reporter: ErrorReporter): void {
    this.#errorReporters.delete(reporter)
  }

  get errorReporterCount(): number {
    return this.#errorReporters.size
  }

  /** Registry events: `added`, `removed` and `updated`. */
  subscribe(listener: QueryRegistryListener): () => void {
    return this.#registry.subscribe(listener)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  async #invalidateTree(queryHash: QueryHash): Promise<void> {
    const descendants = this.#dependencies.getAllDescendants(queryHash)
    if (descendants.length > 0) {
      this.#logger.debug(`[deps] invalidating ${descendants.length} dependents of ${queryHash}`)
    }

    const refetches: Promise<unknown>[] = []
    for (const hash of [queryHash, ...descendants]) {
      this.#cache.invalidateByHash(hash)
      const query = this.#registry.get(hash)
      if (!query || query.isDisposed) continue
      query.invalidate()
      if (query.referenceCount > 0) refetches.push(query.refetch())
    }

    await this.#settleAll(refetches, `invalidate ${queryHash}`)
  }

  #assertKindFree(queryHash: QueryHash, kind: RegisteredQuery['kind']): void {
    const other = this.#registry.get(queryHash)
    if (other && !other.isDisposed && other.kind !== kind) {
      throw new QueryArgumentError(`Key '${queryHash}' is already held by a query of kind '${other.kind}'`)
    }
  }

  #register(query: RegisteredQuery, dependsOn: QueryKey | undefined): void {
    if (dependsOn !== undefined) {
      try {
        validateQueryKey(dependsOn)
        this.#dependencies.registerDependency(query.queryHash, hashQueryKey(dependsOn))
      } catch (error) {
        query.dispose()
        throw error
      }
    }
    this.#registry.add(query)
  }

  async #settleAll(promises: Promise<unknown>[], label: string): Promise<void> {
    const results = await Promise.allSettled(promises)
    results.forEach((result) => {
      if (result.status === 'rejected') {
        this.#logger.warn(`[client] ${label}: refetch failed`, { error: result.reason })
      }
    })
  }
}
