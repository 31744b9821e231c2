import { useEffect, useSyncExternalStore } from 'react'
import type { Query, QueryFunction, QueryKey, QueryOptions, QueryState } from '@core/index'
import { useQueryClient } from './useQueryClient'

export interface UseQueryResult<TData> extends QueryState<TData> {
  /** First load: fetching with nothing to show yet. */
  isLoading: boolean
  refetch: Query<TData>['refetch']
}

/**
 * Subscribe a component to the query for `queryKey`. The component holds a
 * reference (and so keeps the query alive) from mount until unmount.
 */
export function useQuery<TData = unknown>(
  queryKey: QueryKey,
  queryFn: QueryFunction<TData>,
  options: QueryOptions<TData> = {},
): UseQueryResult<TData> {
  const client = useQueryClient()

  // Same instance on every render while it lives; a disposed query is
  // replaced by a fresh one on the next render.
  const query = client.getQuery(queryKey, queryFn, options)

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
    isLoading: state.isFetching && state.data === undefined,
    refetch: (options) => query.refetch(options),
  }
}
