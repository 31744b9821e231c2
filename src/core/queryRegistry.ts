/**
 * queryRegistry.ts
 *
 * The per-client map of live Query and InfiniteQuery objects, one per key
 * hash. QueryClient is the only caller that creates entries; queries remove
 * themselves on dispose.
 *
 * Subscribers receive `added`, `removed` and `updated` events. `updated`
 * fires on every state transition of any registered query.
 */

import type { QueryFilters, QueryHash } from './types'
import { Subscribable } from './subscribable'
import { matchesQueryKey } from './utils'
import { Query } from './query'
import { InfiniteQuery } from './infiniteQuery'
import type { QueryRegistryEvent, QueryRegistryInterface, RegisteredQuery } from './query'

export type QueryRegistryListener = (event: QueryRegistryEvent) => void

// ---------------------------------------------------------------------------
// matchesQuery (pure filter)
// ---------------------------------------------------------------------------

export function matchesQuery(
  query: Pick<RegisteredQuery, 'queryKey' | 'queryHash'>,
  filters: QueryFilters,
): boolean {
  const { queryKey, exact = false, predicate } = filters

  if (queryKey !== undefined && !matchesQueryKey(query.queryKey, queryKey, exact)) {
    return false
  }
  if (predicate && !predicate({ queryKey: query.queryKey, queryHash: query.queryHash })) {
    return false
  }
  return true
}

// ---------------------------------------------------------------------------
// QueryRegistry
// ---------------------------------------------------------------------------

export class QueryRegistry
  extends Subscribable<QueryRegistryListener>
  implements QueryRegistryInterface
{
  #queries = new Map<QueryHash, RegisteredQuery>()

  add(query: RegisteredQuery): void {
    const existing = this.#queries.get(query.queryHash)
    if (existing === query) return
    existing?.dispose()
    this.#queries.set(query.queryHash, query)
    this.notify({ type: 'added', query })
  }

  get(queryHash: QueryHash): RegisteredQuery | undefined {
    return this.#queries.get(queryHash)
  }

  /**
   * The plain query under `queryHash`. The cast is safe by construction:
   * QueryClient stores exactly one Query per hash, created with the data
   * type its caller asked for.
   */
  getQuery<TData>(queryHash: QueryHash): Query<TData> | undefined {
    const query = this.#queries.get(queryHash)
    return query instanceof Query ? (query as Query<TData>) : undefined
  }

  /** Same contract as getQuery(), for infinite queries. */
  getInfiniteQuery<TPage, TParam>(queryHash: QueryHash): InfiniteQuery<TPage, TParam> | undefined {
    const query = this.#queries.get(queryHash)
    return query instanceof InfiniteQuery ? (query as InfiniteQuery<TPage, TParam>) : undefined
  }

  getAll(): RegisteredQuery[] {
    return [...this.#queries.values()]
  }

  find(filters: QueryFilters): RegisteredQuery | undefined {
    return this.getAll().find((query) => matchesQuery(query, { exact: true, ...filters }))
  }

  findAll(filters: QueryFilters = {}): RegisteredQuery[] {
    return this.getAll().filter((query) => matchesQuery(query, filters))
  }

  get size(): number {
    return this.#queries.size
  }

  /** Forget `query` if it is still the one registered under its hash. */
  remove(query: RegisteredQuery): void {
    if (this.#queries.get(query.queryHash) !== query) return
    this.#queries.delete(query.queryHash)
    this.notify({ type: 'removed', query })
  }

  /** Dispose every registered query. */
  clear(): void {
    this.getAll().forEach((query) => query.dispose())
    this.#queries.clear()
  }

  notify(event: QueryRegistryEvent): void {
    this.listeners.forEach((listener) => listener(event))
  }
}
