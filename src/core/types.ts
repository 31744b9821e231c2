/**
 * types.ts
 *
 * Shared type definitions for the query engine. Runtime code lives elsewhere;
 * this file only declares shapes so every layer can import it without cycles.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import type { CancellationToken } from './cancellationToken'
import type { CircuitBreakerOptions } from './circuitBreaker'

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/**
 * Identifies one cacheable fetch. Either a plain string (`'user:42'`) or a
 * structured tuple (`['users', { page: 2 }]`). Equality is structural: two
 * keys are the same when their hashes match.
 */
export type QueryKey = string | ReadonlyArray<unknown>

/** Stable string form of a QueryKey, produced by hashQueryKey(). */
export type QueryHash = string

/** Arbitrary caller-defined metadata attached to a query. */
export type QueryMeta = Record<string, unknown>

// ---------------------------------------------------------------------------
// Fetch functions
// ---------------------------------------------------------------------------

/** Passed to every fetch function invocation. */
export interface QueryFunctionContext<TQueryKey extends QueryKey = QueryKey> {
  queryKey: TQueryKey
  /** Cancelled when a newer fetch supersedes this one or the query is disposed. */
  token: CancellationToken
  /** Aborts together with `token`, for fetch implementations that take a signal. */
  signal: AbortSignal
  meta: QueryMeta | undefined
}

export type QueryFunction<TData, TQueryKey extends QueryKey = QueryKey> = (
  context: QueryFunctionContext<TQueryKey>,
) => TData | Promise<TData>

export interface InfiniteQueryFunctionContext<TParam, TQueryKey extends QueryKey = QueryKey>
  extends QueryFunctionContext<TQueryKey> {
  pageParam: TParam
  direction: 'forward' | 'backward'
}

export type InfiniteQueryFunction<TPage, TParam, TQueryKey extends QueryKey = QueryKey> = (
  context: InfiniteQueryFunctionContext<TParam, TQueryKey>,
) => TPage | Promise<TPage>

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

/**
 * Exponential backoff. The delay before retry `n` (1-based) is
 * `min(initialDelay * multiplier ** (n - 1), maxDelay)`.
 */
export interface RetryPolicy {
  maxRetries: number
  initialDelay: number
  multiplier: number
  maxDelay: number
}

// ---------------------------------------------------------------------------
// Query options
// ---------------------------------------------------------------------------

export interface BaseQueryOptions {
  /** When false the query stays idle and never calls its fetch function. */
  enabled?: boolean
  /** How long fetched data counts as fresh, in ms. */
  staleTime?: number
  /** How long an unreferenced cache entry survives before collection, in ms. */
  cacheTime?: number
  /** `false` disables retries, a number sets maxRetries, an object overrides parts of the policy. */
  retry?: boolean | number | Partial<RetryPolicy>
  /** Enables circuit breaking for this query. */
  circuitBreaker?: CircuitBreakerOptions
  /** Breaker scope shared across queries hitting the same backend. Defaults to the key hash. */
  circuitBreakerScope?: string
  /** Keeps the cached value out of persistence and logs; requires maxAge. */
  isSecure?: boolean
  /** Hard expiry for the cached value, in ms from the write. */
  maxAge?: number
  /** Fetch on every first listener even if cached data is fresh. */
  refetchOnMount?: boolean
  /** Key of a parent query; disposing the parent cancels this query. */
  dependsOn?: QueryKey
  /** Delay between the last listener leaving and disposal. */
  disposeDelay?: number
  meta?: QueryMeta
  /** Receives whatever the fetch function threw, unchanged. */
  onError?: (error: unknown) => void
  onSettled?: () => void
}

export interface QueryOptions<TData = unknown> extends BaseQueryOptions {
  /** Validates values read back from the cache store. */
  schema?: ZodType<TData, ZodTypeDef, unknown>
  /** Transform applied to the raw fetch result on the task pool before commit. */
  select?: (raw: TData) => TData
  onSuccess?: (data: TData) => void
}

export interface InfiniteQueryOptions<TPage = unknown, TParam = unknown> extends BaseQueryOptions {
  initialPageParam: TParam
  /** Returns the parameter of the page after `lastPage`, or null/undefined when there is none. */
  getNextPageParam: (pages: ReadonlyArray<Page<TPage, TParam>>, lastPage: TPage | undefined) => TParam | null | undefined
  getPreviousPageParam?: (pages: ReadonlyArray<Page<TPage, TParam>>, firstPage: TPage | undefined) => TParam | null | undefined
  /** Upper bound on retained pages; the page at the opposite end is dropped on overflow. */
  maxPages?: number
  onSuccess?: (page: TPage) => void
}

/** Defaults applied under every query created through a QueryClient. */
export type DefaultQueryOptions = BaseQueryOptions

// ---------------------------------------------------------------------------
// Query state
// ---------------------------------------------------------------------------

export type QueryStatus = 'idle' | 'loading' | 'success' | 'error'

export interface QueryState<TData = unknown> {
  status: QueryStatus
  data: TData | undefined
  error: unknown
  /** True for the whole duration of a fetch, including background refetches. */
  isFetching: boolean
  /** Timestamp (ms) of the last successful commit, 0 if none. */
  dataUpdatedAt: number
  errorUpdatedAt: number
  /** Failed attempts in the current fetch, reset on success. */
  failureCount: number
  isInvalidated: boolean
}

// ---------------------------------------------------------------------------
// Infinite query state
// ---------------------------------------------------------------------------

export type PageStatus = 'loading' | 'success' | 'error'

export interface Page<TPage, TParam> {
  /** Stable identity so a settling fetch finds its slot after neighbors shift. */
  readonly id: number
  param: TParam
  status: PageStatus
  data?: TPage
  error?: unknown
  fetchedAt: number
}

export interface InfiniteQueryState<TPage = unknown, TParam = unknown> {
  status: QueryStatus
  pages: ReadonlyArray<Page<TPage, TParam>>
  /** Error of the most recent failed page fetch, cleared by the next success. */
  error: unknown
  isFetching: boolean
  isFetchingNextPage: boolean
  isFetchingPreviousPage: boolean
  dataUpdatedAt: number
}

/** What an InfiniteQuery writes into the cache store. */
export interface InfiniteData<TPage, TParam> {
  pages: TPage[]
  pageParams: TParam[]
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export interface QueryFilters {
  /** Element-prefix match unless `exact` is set. */
  queryKey?: QueryKey
  exact?: boolean
  predicate?: (query: { queryKey: QueryKey; queryHash: QueryHash }) => boolean
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

export type MutationFunction<TData, TVariables> = (
  variables: TVariables,
  token: CancellationToken,
) => TData | Promise<TData>

export type MutationStatus = 'idle' | 'loading' | 'success' | 'error'

export interface MutationState<TData = unknown, TVariables = unknown> {
  status: MutationStatus
  data: TData | undefined
  error: unknown
  /** Variables of the most recent mutate() call. */
  variables: TVariables | undefined
  /** Set when the last call went to the offline queue instead of running. Status stays 'idle'. */
  isQueued: boolean
  /** Failed attempts in the current run. */
  failureCount: number
  /** Timestamp (ms) of the most recent mutate() call, 0 if none. */
  submittedAt: number
}

export interface MutationOptions<TData = unknown, TVariables = unknown> {
  /** Entry type for queued calls. The offline queue replays them through the handler registered under it. */
  mutationType?: string
  /** Key recorded on queued entries. Defaults to `mutationType`. */
  mutationKey?: QueryKey
  /** While offline, enqueue calls instead of running them. Requires `mutationType`. */
  queueWhenOffline?: boolean
  /** Replay priority of queued calls; higher replays first. */
  priority?: number
  /** Same shape as the query option, but mutations do not retry unless asked to. */
  retry?: boolean | number | Partial<RetryPolicy>
  onQueued?: (variables: TVariables) => void
  onSuccess?: (data: TData, variables: TVariables) => void
  onError?: (error: unknown, variables: TVariables) => void
  onSettled?: (data: TData | undefined, error: unknown, variables: TVariables) => void
}
