// @vitest-environment jsdom
import { Component, type ReactNode } from 'react'
import { act } from 'react-dom/test-utils'
import { createRoot, type Root } from 'react-dom/client'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { NetworkStatus, OfflineQueueManager, QueryClient } from '@core/index'
import {
  QueryClientProvider,
  useInfiniteQuery,
  useQuery,
  useQueryClient,
  type UseInfiniteQueryResult,
} from '@react/index'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true })

let client: QueryClient
let container: HTMLDivElement
let root: Root

async function render(node: ReactNode): Promise<void> {
  await act(async () => {
    root.render(<QueryClientProvider client={client}>{node}</QueryClientProvider>)
  })
}

/** Let fetch promise chains settle and React commit the result. */
async function flush(): Promise<void> {
  await act(async () => {
    await new Promise((resolve) => setTimeout(resolve, 0))
  })
}

class ErrorBoundary extends Component<{ children: ReactNode }, { message: string | null }> {
  override state: { message: string | null } = { message: null }

  static getDerivedStateFromError(error: unknown) {
    return { message: error instanceof Error ? error.message : String(error) }
  }

  override render() {
    return this.state.message ?? this.props.children
  }
}

beforeEach(() => {
  client = new QueryClient({ networkStatus: new NetworkStatus(), offlineQueue: new OfflineQueueManager() })
  container = document.createElement('div')
  document.body.appendChild(container)
  root = createRoot(container)
})

afterEach(() => {
  act(() => root.unmount())
  container.remove()
  client.dispose()
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('QueryClientProvider', () => {
  it('mounts the client while rendered', async () => {
    await render(<span>child</span>)
    expect(client.isMounted).toBe(true)
    expect(container.textContent).toBe('child')

    act(() => root.unmount())
    expect(client.isMounted).toBe(false)
  })
})

describe('useQueryClient', () => {
  it('throws outside a provider', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    function Orphan() {
      useQueryClient()
      return null
    }

    await act(async () => {
      root.render(
        <ErrorBoundary>
          <Orphan />
        </ErrorBoundary>,
      )
    })

    expect(container.textContent).toBe('useQueryClient must be used within a QueryClientProvider')
  })
})

describe('useQuery', () => {
  function User({ queryFn }: { queryFn: () => Promise<string> }) {
    const { data, isLoading } = useQuery('user', queryFn)
    return <p>{isLoading ? 'loading' : data}</p>
  }

  it('shows loading, then the fetched data', async () => {
    let resolve: (value: string) => void = () => {}
    const queryFn = () =>
      new Promise<string>((r) => {
        resolve = r
      })

    await render(<User queryFn={queryFn} />)
    await flush()
    expect(container.textContent).toBe('loading')

    resolve('Ada')
    await flush()

    expect(container.textContent).toBe('Ada')
  })

  it('shares one fetch between components on the same key', async () => {
    const queryFn = vi.fn(async () => 'Ada')

    await render(
      <>
        <User queryFn={queryFn} />
        <User queryFn={queryFn} />
      </>,
    )
    await flush()

    expect(queryFn).toHaveBeenCalledTimes(1)
    expect(container.textContent).toBe('AdaAda')
    expect(client.getQueryByKey('user')?.referenceCount).toBe(2)
  })

  it('releases its reference on unmount', async () => {
    await render(<User queryFn={async () => 'Ada'} />)
    await flush()
    const query = client.getQueryByKey('user')

    act(() => root.unmount())

    expect(query?.referenceCount).toBe(0)
    expect(query?.isDisposed).toBe(false)
  })

  it('refetches through the returned function', async () => {
    let version = 0
    const latest: { refetch?: () => Promise<unknown> } = {}
    function Versioned() {
      const result = useQuery('version', async () => `v${++version}`, { staleTime: 60_000 })
      latest.refetch = () => result.refetch()
      return <p>{result.data}</p>
    }

    await render(<Versioned />)
    await flush()
    expect(container.textContent).toBe('v1')

    await act(async () => {
      await latest.refetch?.()
    })

    expect(container.textContent).toBe('v2')
  })
})

describe('useInfiniteQuery', () => {
  it('renders the first page and appends on fetchNextPage', async () => {
    const latest: { feed?: UseInfiniteQueryResult<string, number> } = {}
    function Feed() {
      const feed = useInfiniteQuery<string, number>('feed', async ({ pageParam }) => `page-${pageParam};`, {
        initialPageParam: 1,
        getNextPageParam: (pages) => (pages[pages.length - 1]?.param ?? 0) + 1,
      })
      latest.feed = feed
      return <p>{feed.data.pages.join('')}</p>
    }

    await render(<Feed />)
    await flush()
    expect(container.textContent).toBe('page-1;')
    expect(latest.feed?.hasNextPage).toBe(true)

    await act(async () => {
      await latest.feed?.fetchNextPage()
    })

    expect(container.textContent).toBe('page-1;page-2;')
    expect(latest.feed?.data.pageParams).toEqual([1, 2])
    expect(latest.feed?.isFetchingNextPage).toBe(false)
  })
})
