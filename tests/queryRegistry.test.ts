import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { QueryClient } from '../src/core/queryClient'
import { NetworkStatus } from '../src/core/networkStatus'
import { OfflineQueueManager } from '../src/core/offlineQueue'
import { matchesQuery } from '../src/core/queryRegistry'

let client: QueryClient

beforeEach(() => {
  client = new QueryClient({ networkStatus: new NetworkStatus(), offlineQueue: new OfflineQueueManager() })
})

afterEach(() => {
  client.dispose()
})

describe('matchesQuery', () => {
  const query = { queryKey: ['todos', { done: false }], queryHash: '["todos",{"done":false}]' }

  it('matches by key prefix unless exact', () => {
    expect(matchesQuery(query, { queryKey: ['todos'] })).toBe(true)
    expect(matchesQuery(query, { queryKey: ['todos'], exact: true })).toBe(false)
    expect(matchesQuery(query, { queryKey: ['posts'] })).toBe(false)
  })

  it('requires the predicate to pass as well', () => {
    expect(matchesQuery(query, { queryKey: ['todos'], predicate: () => false })).toBe(false)
    expect(matchesQuery(query, {})).toBe(true)
  })
})

describe('QueryRegistry', () => {
  it('finds the exact key by default and all prefixed keys with findAll', () => {
    const list = client.getQuery(['todos'], async () => [], { enabled: false })
    const item = client.getQuery(['todos', 1], async () => ({}), { enabled: false })

    expect(client.registry.find({ queryKey: ['todos'] })).toBe(list)
    expect(client.registry.findAll({ queryKey: ['todos'] })).toEqual([list, item])
    expect(client.registry.size).toBe(2)
  })

  it('tells the query kinds apart', () => {
    client.getInfiniteQuery('feed', async () => 'page', {
      initialPageParam: 0,
      getNextPageParam: () => undefined,
    })

    expect(client.registry.getQuery('feed')).toBeUndefined()
    expect(client.registry.getInfiniteQuery('feed')?.kind).toBe('infinite')
  })

  it('forgets a disposed query and reports it', () => {
    const listener = vi.fn()
    client.subscribe(listener)
    const query = client.getQuery('k', async () => 1, { enabled: false })

    query.dispose()

    expect(client.registry.get('k')).toBeUndefined()
    expect(listener).toHaveBeenLastCalledWith({ type: 'removed', query })
  })

  it('clear() disposes every query', () => {
    const query = client.getQuery('k', async () => 1, { enabled: false })
    client.registry.clear()
    expect(query.isDisposed).toBe(true)
    expect(client.registry.size).toBe(0)
  })
})
