/**
 * React adapter barrel exports.
 *
 * A thin binding over the framework-agnostic core: a provider that mounts
 * the client, and hooks that hold a query reference for a component's
 * lifetime.
 */
export { QueryClientProvider, QueryClientContext } from './QueryClientProvider'
export { useQueryClient } from './useQueryClient'
export { useQuery } from './useQuery'
export type { UseQueryResult } from './useQuery'
export { useInfiniteQuery } from './useInfiniteQuery'
export type { UseInfiniteQueryResult } from './useInfiniteQuery'
