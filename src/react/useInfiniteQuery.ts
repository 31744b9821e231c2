import { useEffect, useSyncExternalStore } from 'react'
import type {
  InfiniteData,
  InfiniteQuery,
  InfiniteQueryFunction,
  InfiniteQueryOptions,
  InfiniteQueryState,
  QueryKey,
} from '@core/index'
import { useQueryClient } from './useQueryClient'

export interface UseInfiniteQueryResult<TPage, TParam> extends InfiniteQueryState<TPage, TParam> {
  data: InfiniteData<TPage, TParam>
  hasNextPage: boolean
  hasPreviousPage: boolean
  fetchNextPage: InfiniteQuery<TPage, TParam>['fetchNextPage']
  fetchPreviousPage: InfiniteQuery<TPage, TParam>['fetchPreviousPage']
  refetchPage: InfiniteQuery<TPage, TParam>['refetchPage']
}

export function useInfiniteQuery<TPage = unknown, TParam = unknown>(
  queryKey: QueryKey,
  queryFn: InfiniteQueryFunction<TPage, TParam>,
  options: InfiniteQueryOptions<TPage, TParam>,
): UseInfiniteQueryResult<TPage, TParam> {
  const client = useQueryClient()
  const query = client.getInfiniteQuery(queryKey, queryFn, options)

  useEffect(() => {
    const handle = query.acquire()
    return () => handle.release()
  }, [query])

  const state = useSyncExternalStore(
    query.subscribe,
    () => query.state,
    () => query.state,
  )

  return {
    ...state,
    data: query.data,
    hasNextPage: query.hasNextPage,
    hasPreviousPage: query.hasPreviousPage,
    fetchNextPage: (param, fetchOptions) => query.fetchNextPage(param, fetchOptions),
    fetchPreviousPage: (param, fetchOptions) => query.fetchPreviousPage(param, fetchOptions),
    refetchPage: (index, fetchOptions) => query.refetchPage(index, fetchOptions),
  }
}
