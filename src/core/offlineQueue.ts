/**
 * offlineQueue.ts
 *
 * Durable queue of mutations attempted while offline, replayed when
 * connectivity returns.
 *
 * Every change (enqueue, remove, failed replay, clear, load) is persisted
 * through the PersistenceAdapter first and then published to subscribers as
 * a fresh snapshot of the whole list. Subscribing does not replay the current
 * list.
 *
 * Replay order is priority (higher first), then FIFO by createdAt. Each
 * mutationType needs a handler registered with registerHandler(); a failed
 * replay bumps `attempts`, records `lastError` and leaves the entry queued.
 */

import { Subscribable } from './subscribable'
import { MemoryStorage, type PersistenceAdapter } from './persistence'
import type { NetworkStatus } from './networkStatus'
import { silentLogger, type Logger } from './logger'
import type { QueryKey } from './types'
import { hashQueryKey, toError } from './utils'
import { offlineMutationEntrySchema, validateQueryKey } from './validation'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OfflineMutationEntry {
  readonly id: string
  /** Hash of the query key the mutation targets. */
  readonly key: string
  readonly mutationType: string
  readonly variables: unknown
  readonly createdAt: number
  readonly attempts: number
  readonly lastError?: string
  readonly priority: number
}

export type MutationHandler = (variables: unknown, entry: OfflineMutationEntry) => unknown

type OfflineQueueListener = (entries: ReadonlyArray<OfflineMutationEntry>) => void

export interface OfflineQueueConfig {
  storage?: PersistenceAdapter<OfflineMutationEntry>
  logger?: Logger
  /** Entries that failed this many times are skipped by replay. Default 5. */
  maxAttempts?: number
  /** Replay stops early while this reports offline. */
  networkStatus?: NetworkStatus
}

export interface ReplayResult {
  succeeded: number
  failed: number
  /** Entries at maxAttempts, left queued. */
  skipped: number
  /** Entries dropped because no handler was registered for their type. */
  discarded: number
}

export interface OfflineQueueStats {
  total: number
  pendingRetry: number
  exhausted: number
  byType: Record<string, number>
}

export const DEFAULT_MAX_ATTEMPTS = 5

// ---------------------------------------------------------------------------
// OfflineQueueManager
// ---------------------------------------------------------------------------

export class OfflineQueueManager extends Subscribable<OfflineQueueListener> {
  readonly maxAttempts: number

  #entries: OfflineMutationEntry[] = []
  #handlers = new Map<string, MutationHandler>()
  #storage: PersistenceAdapter<OfflineMutationEntry>
  #logger: Logger
  #networkStatus?: NetworkStatus
  #replay: Promise<ReplayResult> | null = null

  constructor(config: OfflineQueueConfig = {}) {
    super()
    this.#storage = config.storage ?? new MemoryStorage<OfflineMutationEntry>()
    this.#logger = config.logger ?? silentLogger
    this.maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.#networkStatus = config.networkStatus
  }

  get entries(): ReadonlyArray<OfflineMutationEntry> {
    return this.#entries
  }

  get length(): number {
    return this.#entries.length
  }

  get isProcessing(): boolean {
    return this.#replay !== null
  }

  // -------------------------------------------------------------------------
  // Queue mutation
  // -------------------------------------------------------------------------

  async enqueue(
    key: QueryKey,
    mutationType: string,
    variables: unknown,
    options: { priority?: number } = {},
  ): Promise<OfflineMutationEntry> {
    validateQueryKey(key)
    const entry: OfflineMutationEntry = {
      id: crypto.randomUUID(),
      key: hashQueryKey(key),
      mutationType,
      variables,
      createdAt: Date.now(),
      attempts: 0,
      priority: options.priority ?? 0,
    }
    await this.#commit([...this.#entries, entry])
    this.#logger.info(`[offline] queued ${mutationType} for ${entry.key}`, { id: entry.id })
    return entry
  }

  /** @returns False if no entry had that id. */
  async remove(id: string): Promise<boolean> {
    if (!this.#entries.some((entry) => entry.id === id)) return false
    await this.#commit(this.#entries.filter((entry) => entry.id !== id))
    return true
  }

  async clear(): Promise<void> {
    await this.#commit([])
  }

  /**
   * Replace the in-memory queue with what storage holds. Records that fail
   * validation are dropped with a warning.
   */
  async load(): Promise<void> {
    const records = await this.#storage.load()
    const loaded: OfflineMutationEntry[] = []
    for (const record of records) {
      const parsed = offlineMutationEntrySchema.safeParse(record)
      if (parsed.success) {
        loaded.push({ ...parsed.data, variables: parsed.data.variables })
      } else {
        this.#logger.warn('[offline] dropped malformed queue entry')
      }
    }
    this.#entries = loaded
    this.#emit()
  }

  getEntriesByType(mutationType: string): OfflineMutationEntry[] {
    return this.#entries.filter((entry) => entry.mutationType === mutationType)
  }

  stats(): OfflineQueueStats {
    const byType: Record<string, number> = {}
    for (const entry of this.#entries) {
      byType[entry.mutationType] = (byType[entry.mutationType] ?? 0) + 1
    }
    return {
      total: this.#entries.length,
      pendingRetry: this.#entries.filter((e) => e.attempts > 0 && e.attempts < this.maxAttempts).length,
      exhausted: this.#entries.filter((e) => e.attempts >= this.maxAttempts).length,
      byType,
    }
  }

  // -------------------------------------------------------------------------
  // Handlers
  // -------------------------------------------------------------------------

  /** @returns A function that unregisters the handler. */
  registerHandler(mutationType: string, handler: MutationHandler): () => void {
    this.#handlers.set(mutationType, handler)
    return () => {
      if (this.#handlers.get(mutationType) === handler) {
        this.#handlers.delete(mutationType)
      }
    }
  }

  hasHandler(mutationType: string): boolean {
    return this.#handlers.has(mutationType)
  }

  // -------------------------------------------------------------------------
  // Replay
  // -------------------------------------------------------------------------

  /**
   * Replay queued mutations. Concurrent calls share the run in progress.
   */
  processQueue(): Promise<ReplayResult> {
    return this.#runExclusive(() => true)
  }

  /** Replay only entries of one mutation type. */
  processByType(mutationType: string): Promise<ReplayResult> {
    return this.#runExclusive((entry) => entry.mutationType === mutationType)
  }

  /**
   * Replay whenever `status` flips from offline to online.
   *
   * @returns A function that stops listening.
   */
  connect(status: NetworkStatus): () => void {
    this.#networkStatus = status
    return status.subscribe((online) => {
      if (!online) return
      this.processQueue().catch((error: unknown) => {
        this.#logger.error('[offline] replay failed', { error })
      })
    })
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  #runExclusive(filter: (entry: OfflineMutationEntry) => boolean): Promise<ReplayResult> {
    if (this.#replay) return this.#replay
    this.#replay = this.#replayEntries(filter).finally(() => {
      this.#replay = null
    })
    return this.#replay
  }

  async #replayEntries(filter: (entry: OfflineMutationEntry) => boolean): Promise<ReplayResult> {
    const result: ReplayResult = { succeeded: 0, failed: 0, skipped: 0, discarded: 0 }
    const ordered = this.#entries
      .filter(filter)
      .sort((a, b) => b.priority - a.priority || a.createdAt - b.createdAt)

    if (ordered.length > 0) {
      this.#logger.info(`[offline] replaying ${ordered.length} queued mutations`)
    }

    for (const entry of ordered) {
      if (this.#networkStatus && !this.#networkStatus.isOnline) break
      // Removed by someone else while an earlier entry was replaying.
      if (!this.#entries.some((current) => current.id === entry.id)) continue

      if (entry.attempts >= this.maxAttempts) {
        result.skipped++
        continue
      }

      const handler = this.#handlers.get(entry.mutationType)
      if (!handler) {
        this.#logger.warn(`[offline] no handler for ${entry.mutationType}, discarding ${entry.id}`)
        await this.remove(entry.id)
        result.discarded++
        continue
      }

      try {
        await handler(entry.variables, entry)
        await this.remove(entry.id)
        result.succeeded++
      } catch (error) {
        const message = toError(error).message
        this.#logger.warn(`[offline] replay of ${entry.mutationType} failed`, {
          id: entry.id,
          attempts: entry.attempts + 1,
          error: message,
        })
        await this.#commit(
          this.#entries.map((current) =>
            current.id === entry.id
              ? { ...current, attempts: current.attempts + 1, lastError: message }
              : current,
          ),
        )
        result.failed++
      }
    }

    return result
  }

  /** Persist `next`, then adopt and publish it. A failed save leaves the queue as it was. */
  async #commit(next: OfflineMutationEntry[]): Promise<void> {
    await this.#storage.save(next)
    this.#entries = next
    this.#emit()
  }

  #emit(): void {
    const snapshot = [...this.#entries]
    this.listeners.forEach((listener) => listener(snapshot))
  }
}

/** Process-wide default queue, backed by in-memory storage. */
export const offlineQueueManager = new OfflineQueueManager()
