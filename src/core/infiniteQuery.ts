/**
 * infiniteQuery.ts
 *
 * Paginated variant of Query. State is an ordered list of page slots, each
 * with its own status. A slot is appended (or prepended) in `loading` before
 * its fetch starts and filled in place when the fetch settles, so a failing
 * page never removes or blocks its neighbors.
 *
 * Every page fetch runs through the same Retryer, circuit breaker and token
 * tree as a plain Query; the breaker scope is per query, not per page.
 *
 * With `maxPages`, appending drops the oldest page and prepending drops the
 * newest. A dropped slot that is still loading has its fetch cancelled.
 */

import type {
  InfiniteData,
  InfiniteQueryFunction,
  InfiniteQueryOptions,
  InfiniteQueryState,
  Page,
  QueryHash,
  QueryKey,
} from './types'
import { Removable, DEFAULT_DISPOSE_DELAY } from './removable'
import { Retryer, resolveRetryPolicy } from './retryer'
import { CancellationToken } from './cancellationToken'
import { CircuitBreakerOpenError, QueryArgumentError, isCancelledError } from './errors'
import {
  QueryFetchMetrics,
  cacheSetOptions,
  invokeCallback,
  reportFailure,
  resolveCircuitBreaker,
  validateQueryInput,
  type FetchOptions,
  type QueryEnvironment,
  type QueryHandle,
  type QueryMetrics,
  type RegisteredQuery,
} from './query'

export interface InfiniteQueryConfig<TPage, TParam> {
  env: QueryEnvironment
  queryKey: QueryKey
  queryHash: QueryHash
  queryFn: InfiniteQueryFunction<TPage, TParam>
  options: InfiniteQueryOptions<TPage, TParam>
}

export type PageFetchOptions = Omit<FetchOptions, 'forceRefetch'>

type FetchKind = 'forward' | 'backward' | 'refetch'

interface PageFetch<TPage> {
  token: CancellationToken
  kind: FetchKind
  promise: Promise<TPage>
}

type InfiniteQueryListener<TPage, TParam> = (state: InfiniteQueryState<TPage, TParam>) => void

/** Data of every settled page, in order. */
function settledData<TPage, TParam>(pages: ReadonlyArray<Page<TPage, TParam>>): InfiniteData<TPage, TParam> {
  const data: TPage[] = []
  const pageParams: TParam[] = []
  for (const page of pages) {
    if (page.data === undefined) continue
    data.push(page.data)
    pageParams.push(page.param)
  }
  return { pages: data, pageParams }
}

function getDefaultState<TPage, TParam>(): InfiniteQueryState<TPage, TParam> {
  return {
    status: 'idle',
    pages: [],
    error: null,
    isFetching: false,
    isFetchingNextPage: false,
    isFetchingPreviousPage: false,
    dataUpdatedAt: 0,
  }
}

export class InfiniteQuery<TPage = unknown, TParam = unknown>
  extends Removable<InfiniteQueryListener<TPage, TParam>>
  implements RegisteredQuery
{
  readonly kind = 'infinite'
  readonly queryKey: QueryKey
  readonly queryHash: QueryHash
  readonly options: InfiniteQueryOptions<TPage, TParam>
  state: InfiniteQueryState<TPage, TParam> = getDefaultState()

  #env: QueryEnvironment
  #queryFn: InfiniteQueryFunction<TPage, TParam>
  #lifetime = new CancellationToken()
  #fetches = new Map<number, PageFetch<TPage>>()
  #nextPageId = 0
  #referenceCount = 0
  #owners = new Set<string>()
  #disposed = false
  #metrics = new QueryFetchMetrics()

  constructor(config: InfiniteQueryConfig<TPage, TParam>) {
    super()
    validateQueryInput(config.queryKey, config.options)
    this.#env = config.env
    this.queryKey = config.queryKey
    this.queryHash = config.queryHash
    this.#queryFn = config.queryFn
    this.options = config.options
    this.disposeDelay = config.options.disposeDelay ?? DEFAULT_DISPOSE_DELAY
    // Unreferenced from birth: disposed unless someone acquires it.
    this.scheduleDisposal()
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

  get pages(): ReadonlyArray<Page<TPage, TParam>> {
    return this.state.pages
  }

  get hasError(): boolean {
    return this.state.status === 'error'
  }

  /** True when no page has been fetched yet or getNextPageParam yields a parameter. */
  get hasNextPage(): boolean {
    return this.#nextParam() !== undefined
  }

  get hasPreviousPage(): boolean {
    return this.state.pages.length > 0 && this.#previousParam() !== undefined
  }

  get metrics(): QueryMetrics {
    return this.#metrics.snapshot()
  }

  /** Data of every settled page, in order, as written to the cache store. */
  get data(): InfiniteData<TPage, TParam> {
    return settledData(this.state.pages)
  }

  /** True with no settled page, or when the cache entry is invalidated or past staleTime. */
  get isStale(): boolean {
    return this.data.pages.length === 0 || !this.#env.cacheStore.isFresh(this.queryKey)
  }

  // -------------------------------------------------------------------------
  // References
  // -------------------------------------------------------------------------

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
      this.refetch().catch((error: unknown) => {
        this.#env.logger.debug(`[fetch] ${this.queryHash} mount fetch rejected`, { error })
      })
    }
  }

  removeListener(ownerId?: string): void {
    if (ownerId !== undefined && !this.#owners.delete(ownerId)) return
    if (this.#referenceCount === 0) return

    this.#referenceCount--
    if (this.#referenceCount === 0 && !this.#disposed) {
      this.#env.cacheStore.release(this.queryKey)
      this.scheduleDisposal()
    }
  }

  acquire(ownerId?: string): QueryHandle<InfiniteQuery<TPage, TParam>> {
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
  // Page fetches
  // -------------------------------------------------------------------------

  /**
   * Append a page. Without `param`, the parameter comes from
   * getNextPageParam (or initialPageParam for the first page), and a forward
   * fetch already in flight is shared instead of starting another.
   *
   * Resolves with the page data, or undefined when there is no next page or
   * the fetch failed (the error is on the page slot and in `state.error`).
   */
  fetchNextPage(param?: TParam, options: PageFetchOptions = {}): Promise<TPage | undefined> {
    if (this.#disposed || this.options.enabled === false) return Promise.resolve(undefined)

    if (param === undefined) {
      const pending = this.#pendingOfKind('forward')
      if (pending) return this.#settle(pending.promise, options)
    }

    const nextParam = param ?? this.#nextParam()
    if (nextParam === undefined) return Promise.resolve(undefined)

    const slot = this.#createSlot(nextParam)
    let pages = [...this.state.pages, slot]
    const maxPages = this.options.maxPages
    if (maxPages !== undefined && pages.length > maxPages) {
      const dropped = pages.slice(0, pages.length - maxPages)
      pages = pages.slice(pages.length - maxPages)
      this.#dropSlots(dropped)
    }

    return this.#fetchPage(slot, pages, 'forward', options)
  }

  /** Prepend a page, mirroring fetchNextPage(). Needs getPreviousPageParam unless `param` is given. */
  fetchPreviousPage(param?: TParam, options: PageFetchOptions = {}): Promise<TPage | undefined> {
    if (this.#disposed || this.options.enabled === false) return Promise.resolve(undefined)

    if (param === undefined) {
      const pending = this.#pendingOfKind('backward')
      if (pending) return this.#settle(pending.promise, options)
    }

    const previousParam = param ?? this.#previousParam()
    if (previousParam === undefined) return Promise.resolve(undefined)

    const slot = this.#createSlot(previousParam)
    let pages = [slot, ...this.state.pages]
    const maxPages = this.options.maxPages
    if (maxPages !== undefined && pages.length > maxPages) {
      const dropped = pages.slice(maxPages)
      pages = pages.slice(0, maxPages)
      this.#dropSlots(dropped)
    }

    return this.#fetchPage(slot, pages, 'backward', options)
  }

  /** Refetch the page at `index` in place, keeping its data visible meanwhile. */
  refetchPage(index: number, options: PageFetchOptions = {}): Promise<TPage | undefined> {
    const slot = this.state.pages[index]
    if (slot === undefined) {
      return Promise.reject(
        new QueryArgumentError(`No page at index ${index} (${this.state.pages.length} pages)`),
      )
    }
    const pending = this.#fetches.get(slot.id)
    if (pending) return this.#settle(pending.promise, options)

    const loading: Page<TPage, TParam> = { ...slot, status: 'loading' }
    const pages = this.state.pages.map((page) => (page.id === slot.id ? loading : page))
    return this.#fetchPage(loading, pages, 'refetch', options)
  }

  /** Refetch every page, or the first one when there are none. */
  async refetch(): Promise<void> {
    if (this.state.pages.length === 0) {
      await this.fetchNextPage()
      return
    }
    await Promise.all(this.state.pages.map((_page, index) => this.refetchPage(index)))
  }

  /** Cancel all page fetches and start over with no pages. */
  reset(): void {
    this.#cancelAll()
    this.#env.cacheStore.remove(this.queryKey)
    this.#commitState([], { error: null, dataUpdatedAt: 0 })
  }

  // -------------------------------------------------------------------------
  // Invalidation, cancellation, disposal
  // -------------------------------------------------------------------------

  invalidate(): void {
    this.#env.cacheStore.invalidate(this.queryKey)
  }

  /**
   * Cancel every page fetch in flight. New slots that were loading are
   * removed; slots being refetched keep their previous data.
   */
  cancel(): void {
    if (this.#fetches.size === 0) return
    const cancelled = new Set(this.#fetches.keys())
    this.#cancelAll()
    const pages = this.state.pages.flatMap((page): Page<TPage, TParam>[] => {
      if (!cancelled.has(page.id)) return [page]
      if (page.data === undefined) return []
      return [{ ...page, status: 'success' }]
    })
    this.#env.logger.debug(`[fetch] ${this.queryHash} page fetches cancelled`)
    this.#commitState(pages, {})
  }

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
    return this.state.pages.length === 0 || this.options.refetchOnMount === true || this.isStale
  }

  #nextParam(): TParam | undefined {
    const pages = this.state.pages
    if (pages.length === 0) return this.options.initialPageParam
    const last = pages[pages.length - 1]
    return this.options.getNextPageParam(pages, last?.data) ?? undefined
  }

  #previousParam(): TParam | undefined {
    const getPreviousPageParam = this.options.getPreviousPageParam
    if (!getPreviousPageParam) return undefined
    const pages = this.state.pages
    return getPreviousPageParam(pages, pages[0]?.data) ?? undefined
  }

  #createSlot(param: TParam): Page<TPage, TParam> {
    return { id: this.#nextPageId++, param, status: 'loading', fetchedAt: 0 }
  }

  #pendingOfKind(kind: FetchKind): PageFetch<TPage> | undefined {
    for (const pending of this.#fetches.values()) {
      if (pending.kind === kind) return pending
    }
    return undefined
  }

  #dropSlots(dropped: ReadonlyArray<Page<TPage, TParam>>): void {
    for (const page of dropped) {
      const pending = this.#fetches.get(page.id)
      if (pending) {
        this.#fetches.delete(page.id)
        pending.token.cancel()
      }
    }
    if (dropped.length > 0) {
      this.#env.logger.debug(`[fetch] ${this.queryHash} dropped ${dropped.length} page(s) over maxPages`)
    }
  }

  #cancelAll(): void {
    const pending = [...this.#fetches.values()]
    this.#fetches.clear()
    pending.forEach(({ token }) => token.cancel())
  }

  #fetchPage(
    slot: Page<TPage, TParam>,
    pages: Array<Page<TPage, TParam>>,
    kind: FetchKind,
    options: PageFetchOptions,
  ): Promise<TPage | undefined> {
    const token = this.#lifetime.createChild()
    const { logger } = this.#env
    const startedAt = Date.now()
    const param = slot.param
    this.#metrics.recordStart()
    logger.debug(`[fetch] ${this.queryHash} page ${String(param)} started`)

    const retryer = new Retryer<TPage>({
      fn: (attemptToken) =>
        this.#queryFn({
          queryKey: this.queryKey,
          token: attemptToken,
          signal: attemptToken.signal,
          meta: this.options.meta,
          pageParam: param,
          direction: kind === 'backward' ? 'backward' : 'forward',
        }),
      token,
      policy: resolveRetryPolicy(this.options.retry),
      circuitBreaker: resolveCircuitBreaker(this.#env, this.options, this.queryHash),
      logger,
      label: `${this.queryHash} page ${String(param)}`,
    })

    const promise = retryer
      .start()
      .then((data) => {
        token.throwIfCancelled()
        this.#pageSucceeded(slot.id, token, data, startedAt)
        return data
      })
      .catch((error: unknown) => {
        this.#pageFailed(slot.id, token, error, retryer.failureCount(), startedAt)
        throw error
      })

    this.#fetches.set(slot.id, { token, kind, promise })
    this.#commitState(pages, {})
    return this.#settle(promise, options)
  }

  #pageSucceeded(slotId: number, token: CancellationToken, data: TPage, startedAt: number): void {
    token.release()
    if (this.#fetches.get(slotId)?.token === token) this.#fetches.delete(slotId)
    const now = Date.now()
    const duration = now - startedAt

    const pages = this.#replaceSlot(slotId, (page) => ({
      ...page,
      status: 'success',
      data,
      error: undefined,
      fetchedAt: now,
    }))
    // Store first: if it throws, the slot is still loading and fails normally.
    if (pages) this.#env.cacheStore.set(this.queryKey, settledData(pages), cacheSetOptions(this.options))
    this.#metrics.recordSettled(duration, true)
    this.#env.cacheStore.metrics.recordFetchTime(duration)
    if (!pages) return

    this.#commitState(pages, { error: null, dataUpdatedAt: now })
    this.#env.logger.debug(`[fetch] ${this.queryHash} page succeeded in ${duration}ms`)

    const { onSuccess, onSettled } = this.options
    if (onSuccess) invokeCallback(this.#env.logger, 'onSuccess', () => onSuccess(data))
    if (onSettled) invokeCallback(this.#env.logger, 'onSettled', onSettled)
  }

  #pageFailed(
    slotId: number,
    token: CancellationToken,
    error: unknown,
    failureCount: number,
    startedAt: number,
  ): void {
    token.release()
    if (token.isCancelled) return
    if (this.#fetches.get(slotId)?.token === token) this.#fetches.delete(slotId)
    this.#metrics.recordSettled(Date.now() - startedAt, false)

    const pages = this.#replaceSlot(slotId, (page) => ({ ...page, status: 'error', error }))
    if (!pages) return

    this.#commitState(pages, { error })
    this.#env.logger.warn(`[fetch] ${this.queryHash} page failed`, { error, failureCount })
    reportFailure(this.#env, {
      queryKey: this.queryKey,
      queryHash: this.queryHash,
      error,
      failureCount,
      options: this.options,
    })

    const { onError, onSettled } = this.options
    if (onError) invokeCallback(this.#env.logger, 'onError', () => onError(error))
    if (onSettled) invokeCallback(this.#env.logger, 'onSettled', onSettled)
  }

  /** Pages with the slot `slotId` replaced, or undefined if it was dropped. */
  #replaceSlot(
    slotId: number,
    update: (page: Page<TPage, TParam>) => Page<TPage, TParam>,
  ): Array<Page<TPage, TParam>> | undefined {
    if (!this.state.pages.some((page) => page.id === slotId)) return undefined
    return this.state.pages.map((page) => (page.id === slotId ? update(page) : page))
  }

  #settle(promise: Promise<TPage>, options: PageFetchOptions): Promise<TPage | undefined> {
    return promise.catch(async (error: unknown): Promise<TPage | undefined> => {
      if (isCancelledError(error)) {
        if (options.throwOnError) throw error
        return undefined
      }
      if (error instanceof CircuitBreakerOpenError || options.throwOnError) throw error
      return undefined
    })
  }

  #commitState(
    pages: Array<Page<TPage, TParam>>,
    patch: Partial<Pick<InfiniteQueryState<TPage, TParam>, 'error' | 'dataUpdatedAt'>>,
  ): void {
    const kinds = [...this.#fetches.values()].map((pending) => pending.kind)
    const error = 'error' in patch ? patch.error : this.state.error
    const isFetching = kinds.length > 0
    const hasError = error !== null && error !== undefined

    this.state = {
      status: isFetching ? 'loading' : hasError ? 'error' : pages.length > 0 ? 'success' : 'idle',
      pages,
      error: error ?? null,
      isFetching,
      isFetchingNextPage: kinds.includes('forward'),
      isFetchingPreviousPage: kinds.includes('backward'),
      dataUpdatedAt: patch.dataUpdatedAt ?? this.state.dataUpdatedAt,
    }

    const state = this.state
    this.listeners.forEach((listener) => listener(state))
    if (!this.#disposed) {
      this.#env.registry.notify({ type: 'updated', query: this })
    }
  }
}
