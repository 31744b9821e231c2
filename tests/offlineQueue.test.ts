import { describe, it, expect, vi, beforeEach } from 'vitest'
import { OfflineQueueManager, type OfflineMutationEntry } from '../src/core/offlineQueue'
import { NetworkStatus } from '../src/core/networkStatus'
import { MemoryStorage } from '../src/core/persistence'
import { QueryArgumentError } from '../src/core/errors'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createQueue(initial: OfflineMutationEntry[] = [], networkStatus?: NetworkStatus) {
  const storage = new MemoryStorage<OfflineMutationEntry>(initial)
  const queue = new OfflineQueueManager({ storage, networkStatus })
  return { queue, storage }
}

function storedEntry(overrides: Partial<OfflineMutationEntry>): OfflineMutationEntry {
  return {
    id: 'entry-1',
    key: 'todo:1',
    mutationType: 'update',
    variables: null,
    createdAt: 0,
    attempts: 0,
    priority: 0,
    ...overrides,
  }
}

beforeEach(() => {
  vi.useFakeTimers()
  vi.setSystemTime(1_000)
})

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('OfflineQueueManager', () => {
  // -----------------------------------------------------------------------
  // Queue changes
  // -----------------------------------------------------------------------

  describe('enqueue / remove', () => {
    it('publishes a snapshot after each change', async () => {
      const { queue } = createQueue()
      const lengths: number[] = []
      queue.subscribe((entries) => lengths.push(entries.length))

      const entry = await queue.enqueue(['todo', 1], 'update', { done: true })
      await queue.remove(entry.id)

      expect(lengths).toEqual([1, 0])
    })

    it('fills in the entry fields', async () => {
      const { queue } = createQueue()
      const entry = await queue.enqueue(['todo', 1], 'update', { done: true }, { priority: 2 })

      expect(entry).toMatchObject({
        key: '["todo",1]',
        mutationType: 'update',
        variables: { done: true },
        createdAt: 1_000,
        attempts: 0,
        priority: 2,
      })
      expect(entry.id).toMatch(/^[0-9a-f-]{36}$/)
    })

    it('persists before notifying', async () => {
      const { queue, storage } = createQueue()
      const savedAtNotify: number[] = []
      queue.subscribe(() => savedAtNotify.push(storage.saveCount))

      await queue.enqueue('todo:1', 'create', {})

      expect(savedAtNotify).toEqual([1])
      expect(storage.peek()).toHaveLength(1)
    })

    it('keeps the queue unchanged when saving fails', async () => {
      const { queue, storage } = createQueue()
      const handler = vi.fn()
      queue.registerHandler('create', handler)
      const listener = vi.fn()
      queue.subscribe(listener)
      vi.spyOn(storage, 'save').mockRejectedValueOnce(new Error('disk full'))

      await expect(queue.enqueue('todo:1', 'create', {})).rejects.toThrow('disk full')

      expect(queue.length).toBe(0)
      expect(listener).not.toHaveBeenCalled()
      await queue.processQueue()
      expect(handler).not.toHaveBeenCalled()
    })

    it('returns false when removing an unknown id', async () => {
      const { queue } = createQueue()
      await expect(queue.remove('nope')).resolves.toBe(false)
    })

    it('rejects an empty key', async () => {
      const { queue } = createQueue()
      await expect(queue.enqueue('', 'create', {})).rejects.toBeInstanceOf(QueryArgumentError)
    })

    it('groups entries by type in stats()', async () => {
      const { queue } = createQueue()
      await queue.enqueue('a', 'create', {})
      await queue.enqueue('b', 'create', {})
      await queue.enqueue('c', 'delete', {})

      expect(queue.stats()).toEqual({
        total: 3,
        pendingRetry: 0,
        exhausted: 0,
        byType: { create: 2, delete: 1 },
      })
      expect(queue.getEntriesByType('delete')).toHaveLength(1)
    })
  })

  // -----------------------------------------------------------------------
  // Replay
  // -----------------------------------------------------------------------

  describe('processQueue', () => {
    it('replays in FIFO order and empties the queue', async () => {
      const { queue } = createQueue()
      const replayed: unknown[] = []
      queue.registerHandler('update', (variables) => {
        replayed.push(variables)
      })

      await queue.enqueue('todo:1', 'update', 'first')
      vi.setSystemTime(2_000)
      await queue.enqueue('todo:1', 'update', 'second')

      const result = await queue.processQueue()

      expect(replayed).toEqual(['first', 'second'])
      expect(result).toEqual({ succeeded: 2, failed: 0, skipped: 0, discarded: 0 })
      expect(queue.length).toBe(0)
    })

    it('replays higher priority first', async () => {
      const { queue } = createQueue()
      const replayed: unknown[] = []
      queue.registerHandler('update', (variables) => {
        replayed.push(variables)
      })

      await queue.enqueue('k', 'update', 'low')
      await queue.enqueue('k', 'update', 'high', { priority: 5 })

      await queue.processQueue()

      expect(replayed).toEqual(['high', 'low'])
    })

    it('keeps failed entries with a bumped attempt count', async () => {
      const { queue } = createQueue()
      queue.registerHandler('update', () => Promise.reject(new Error('server said no')))
      const entry = await queue.enqueue('k', 'update', {})

      const result = await queue.processQueue()

      expect(result.failed).toBe(1)
      expect(queue.entries).toEqual([{ ...entry, attempts: 1, lastError: 'server said no' }])
      expect(queue.stats().pendingRetry).toBe(1)
    })

    it('skips entries that reached maxAttempts', async () => {
      const { queue } = createQueue([storedEntry({ attempts: 5 })])
      await queue.load()
      const handler = vi.fn()
      queue.registerHandler('update', handler)

      const result = await queue.processQueue()

      expect(result.skipped).toBe(1)
      expect(handler).not.toHaveBeenCalled()
      expect(queue.stats().exhausted).toBe(1)
    })

    it('discards entries without a handler', async () => {
      const { queue } = createQueue()
      await queue.enqueue('k', 'unknown-type', {})

      const result = await queue.processQueue()

      expect(result.discarded).toBe(1)
      expect(queue.length).toBe(0)
    })

    it('stops when the network drops mid-replay', async () => {
      const network = new NetworkStatus()
      const { queue } = createQueue([], network)
      const handler = vi.fn(() => network.setOnline(false))
      queue.registerHandler('update', handler)
      await queue.enqueue('a', 'update', 1)
      await queue.enqueue('b', 'update', 2)

      const result = await queue.processQueue()

      expect(handler).toHaveBeenCalledTimes(1)
      expect(result.succeeded).toBe(1)
      expect(queue.length).toBe(1)
    })

    it('shares one run between concurrent callers', async () => {
      const { queue } = createQueue()
      queue.registerHandler('update', vi.fn())
      await queue.enqueue('a', 'update', 1)

      const first = queue.processQueue()
      const second = queue.processQueue()

      expect(second).toBe(first)
      expect(queue.isProcessing).toBe(true)
      await first
      expect(queue.isProcessing).toBe(false)
    })

    it('processByType replays only the named type', async () => {
      const { queue } = createQueue()
      queue.registerHandler('create', vi.fn())
      queue.registerHandler('delete', vi.fn())
      await queue.enqueue('a', 'create', 1)
      await queue.enqueue('b', 'delete', 2)

      await queue.processByType('delete')

      expect(queue.entries.map((entry) => entry.mutationType)).toEqual(['create'])
    })
  })

  // -----------------------------------------------------------------------
  // Handlers, connectivity and loading
  // -----------------------------------------------------------------------

  it('unregistering a handler only removes that handler', () => {
    const { queue } = createQueue()
    const unregister = queue.registerHandler('update', vi.fn())
    queue.registerHandler('update', vi.fn())
    unregister()
    expect(queue.hasHandler('update')).toBe(true)
  })

  it('replays when the network comes back', async () => {
    const network = new NetworkStatus(false)
    const { queue } = createQueue()
    const handler = vi.fn()
    queue.registerHandler('update', handler)
    await queue.enqueue('k', 'update', 'queued')
    const disconnect = queue.connect(network)

    network.setOnline(true)
    await queue.processQueue()

    expect(handler).toHaveBeenCalledWith('queued', expect.objectContaining({ mutationType: 'update' }))
    expect(queue.length).toBe(0)
    disconnect()
  })

  it('load() restores valid entries and drops malformed ones', async () => {
    const { queue } = createQueue([
      storedEntry({ id: 'good', variables: { done: true } }),
      storedEntry({ id: '' }),
    ])
    const listener = vi.fn()
    queue.subscribe(listener)

    await queue.load()

    expect(queue.entries.map((entry) => entry.id)).toEqual(['good'])
    expect(queue.entries[0]?.variables).toEqual({ done: true })
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('clear() empties the queue and storage', async () => {
    const { queue, storage } = createQueue()
    await queue.enqueue('k', 'update', 1)
    await queue.clear()
    expect(queue.length).toBe(0)
    expect(storage.peek()).toEqual([])
  })
})
