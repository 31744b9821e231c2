/**
 * cacheStore.ts
 *
 * Key/value store shared by every Query of a QueryClient. Independent of any
 * single Query: entries outlive the Query objects that wrote them until their
 * cacheTime runs out while unreferenced, they expire, or they are evicted.
 *
 * Responsibilities:
 * - freshness (staleTime) and hard expiry (maxAge) per entry
 * - capacity bounds by entry count and estimated byte size, enforced on every
 *   set() with an LRU, LFU or FIFO victim order
 * - reference counts: a retained key is never evicted or collected
 * - hit/miss/eviction counters in `metrics`
 * - optional persistence of non-secure entries
 *
 * Expiry is checked lazily: get() on an expired entry removes it and reports
 * a miss. There is no background sweep for maxAge.
 */

import { Subscribable } from './subscribable'
import { CacheMetrics, type CacheMetricsSnapshot } from './cacheMetrics'
import {
  createCacheEntry,
  describeEntry,
  isExpired,
  isFresh,
  withAccess,
  type CacheEntry,
  type CacheEntryInfo,
} from './cacheEntry'
import { rankForEviction, type EvictionPolicy } from './evictionPolicy'
import { silentLogger, type Logger } from './logger'
import type { PersistenceAdapter } from './persistence'
import type { QueryHash, QueryKey } from './types'
import { estimateSize, hashQueryKey, isValidTimeout, matchesQueryKey } from './utils'
import {
  cacheStoreConfigSchema,
  parseOrThrow,
  persistedCacheEntrySchema,
  validateDuration,
  validateQueryKey,
  type PersistedCacheEntry,
} from './validation'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CacheStoreConfig {
  maxEntries?: number
  /** Upper bound on the summed estimated size of all entries, in bytes. */
  maxCacheSize?: number
  evictionPolicy?: EvictionPolicy
  defaultStaleTime?: number
  defaultCacheTime?: number
  /** Receives snapshots of non-secure entries after every change. */
  persister?: PersistenceAdapter<PersistedCacheEntry>
  logger?: Logger
}

export interface CacheSetOptions {
  staleTime?: number
  cacheTime?: number
  isSecure?: boolean
  maxAge?: number
}

/** Narrows a cached value read back from the store. */
export type DataGuard<T> = (value: unknown) => value is T

export type CacheStoreEvent =
  | { type: 'added'; key: QueryHash }
  | { type: 'updated'; key: QueryHash }
  | { type: 'removed'; key: QueryHash; reason: 'manual' | 'expired' | 'collected' }
  | { type: 'evicted'; key: QueryHash; policy: EvictionPolicy }
  | { type: 'cleared' }

export type CacheStoreListener = (event: CacheStoreEvent) => void

export interface CacheInfo {
  entryCount: number
  size: number
  maxEntries: number
  maxCacheSize: number
  evictionPolicy: EvictionPolicy
  metrics: CacheMetricsSnapshot
}

export const DEFAULT_CACHE_CONFIG = {
  maxEntries: 1000,
  maxCacheSize: 50 * 1024 * 1024,
  evictionPolicy: 'lru',
  defaultStaleTime: 0,
  defaultCacheTime: 5 * 60 * 1000,
} as const satisfies Required<Omit<CacheStoreConfig, 'persister' | 'logger'>>

// ---------------------------------------------------------------------------
// CacheStore
// ---------------------------------------------------------------------------

export class CacheStore extends Subscribable<CacheStoreListener> {
  readonly metrics = new CacheMetrics()
  readonly maxEntries: number
  readonly maxCacheSize: number
  readonly evictionPolicy: EvictionPolicy
  readonly defaultStaleTime: number
  readonly defaultCacheTime: number

  #entries = new Map<QueryHash, CacheEntry>()
  #queryKeys = new Map<QueryHash, QueryKey>()
  #references = new Map<QueryHash, number>()
  #gcTimers = new Map<QueryHash, ReturnType<typeof setTimeout>>()
  #size = 0
  #seq = 0
  #persister?: PersistenceAdapter<PersistedCacheEntry>
  #logger: Logger

  constructor(config: CacheStoreConfig = {}) {
    super()
    parseOrThrow(cacheStoreConfigSchema, config, 'cache store config')
    this.maxEntries = config.maxEntries ?? DEFAULT_CACHE_CONFIG.maxEntries
    this.maxCacheSize = config.maxCacheSize ?? DEFAULT_CACHE_CONFIG.maxCacheSize
    this.evictionPolicy = config.evictionPolicy ?? DEFAULT_CACHE_CONFIG.evictionPolicy
    this.defaultStaleTime = config.defaultStaleTime ?? DEFAULT_CACHE_CONFIG.defaultStaleTime
    this.defaultCacheTime = config.defaultCacheTime ?? DEFAULT_CACHE_CONFIG.defaultCacheTime
    this.#persister = config.persister
    this.#logger = config.logger ?? silentLogger
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * Look up the entry for `key`, recording a hit or a miss.
   *
   * An expired entry is removed and reported as a miss. With a `guard`, a
   * value that fails it is reported as a miss and left in place; without
   * one the caller vouches for `T`, the same contract as writing with set<T>.
   */
  get<T = unknown>(key: QueryKey, guard?: DataGuard<T>): CacheEntry<T> | undefined {
    const hash = hashQueryKey(key)
    const entry = this.#entries.get(hash)
    const now = Date.now()

    if (!entry) {
      this.metrics.recordMiss()
      return undefined
    }

    if (isExpired(entry, now)) {
      this.#delete(hash, 'expired')
      this.metrics.recordMiss()
      return undefined
    }

    const accessed = withAccess(entry, now, ++this.#seq)

    if (guard) {
      const data = accessed.data
      if (!guard(data)) {
        this.#logger.warn(`[cache] value for ${hash} failed validation`)
        this.metrics.recordMiss()
        return undefined
      }
      this.#entries.set(hash, accessed)
      this.metrics.recordHit()
      return { ...accessed, data }
    }

    this.#entries.set(hash, accessed)
    this.metrics.recordHit()
    // Cast is safe by contract: values under this hash were written as T.
    return accessed as CacheEntry<T>
  }

  /** The data under `key`, or undefined. Counts towards hit/miss metrics. */
  getData<T = unknown>(key: QueryKey, guard?: DataGuard<T>): T | undefined {
    return this.get(key, guard)?.data
  }

  /** True if a live (unexpired) entry exists. Does not touch metrics. */
  has(key: QueryKey): boolean {
    const entry = this.#entries.get(hashQueryKey(key))
    return entry !== undefined && !isExpired(entry, Date.now())
  }

  /** True if `key` holds data that can be served without refetching. Does not touch metrics. */
  isFresh(key: QueryKey): boolean {
    const entry = this.#entries.get(hashQueryKey(key))
    return entry !== undefined && isFresh(entry, Date.now())
  }

  /** Metadata for `key` without its data. Does not touch metrics. */
  inspect(key: QueryKey): CacheEntryInfo | undefined {
    const hash = hashQueryKey(key)
    const entry = this.#entries.get(hash)
    if (!entry) return undefined
    return describeEntry(entry, Date.now(), this.referenceCount(key))
  }

  keys(): QueryHash[] {
    return [...this.#entries.keys()]
  }

  get entryCount(): number {
    return this.#entries.size
  }

  /** Summed estimated size of all entries, in bytes. */
  get size(): number {
    return this.#size
  }

  info(): CacheInfo {
    return {
      entryCount: this.entryCount,
      size: this.#size,
      maxEntries: this.maxEntries,
      maxCacheSize: this.maxCacheSize,
      evictionPolicy: this.evictionPolicy,
      metrics: this.metrics.snapshot(),
    }
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Write `data` under `key`, replacing any previous entry, then evict down
   * to capacity. The entry just written is never chosen as a victim.
   */
  set<T>(key: QueryKey, data: T, options: CacheSetOptions = {}): void {
    validateQueryKey(key)
    if (options.maxAge !== undefined) validateDuration(options.maxAge, 'maxAge')

    const hash = hashQueryKey(key)
    const previous = this.#entries.get(hash)
    if (previous) this.#size -= previous.size

    const entry = createCacheEntry({
      data,
      now: Date.now(),
      staleTime: options.staleTime ?? this.defaultStaleTime,
      cacheTime: options.cacheTime ?? this.defaultCacheTime,
      isSecure: options.isSecure ?? false,
      maxAge: options.maxAge,
      size: estimateSize(data),
      seq: ++this.#seq,
    })

    this.#entries.set(hash, entry)
    this.#queryKeys.set(hash, key)
    this.#size += entry.size
    this.#emit({ type: previous ? 'updated' : 'added', key: hash })

    if (this.referenceCount(key) === 0) {
      this.#scheduleGc(hash)
    }

    this.#enforceCapacity(hash)

    if (!entry.isSecure || previous?.isSecure === false) {
      this.#persist()
    }
  }

  /** Alias of set() for symmetry with getData(). */
  setData<T>(key: QueryKey, data: T, options?: CacheSetOptions): void {
    this.set(key, data, options)
  }

  remove(key: QueryKey): boolean {
    return this.#delete(hashQueryKey(key), 'manual')
  }

  /** Drop every entry and reset the metrics. */
  clear(): void {
    this.#gcTimers.forEach((timer) => clearTimeout(timer))
    this.#gcTimers.clear()
    this.#entries.clear()
    this.#queryKeys.clear()
    this.#size = 0
    this.metrics.reset()
    this.#emit({ type: 'cleared' })
    this.#persist()
  }

  /**
   * Remove every `isSecure` entry and nothing else. Meant for app
   * backgrounding and shutdown hooks.
   *
   * @returns How many entries were removed.
   */
  clearSecureEntries(): number {
    const secure = [...this.#entries].filter(([, entry]) => entry.isSecure)
    secure.forEach(([hash]) => this.#delete(hash, 'manual'))
    if (secure.length > 0) {
      this.#logger.info(`[cache] cleared ${secure.length} secure entries`)
    }
    return secure.length
  }

  /** Remove every expired entry. get() does this lazily per key. */
  removeExpired(): number {
    const now = Date.now()
    const expired = [...this.#entries].filter(([, entry]) => isExpired(entry, now))
    expired.forEach(([hash]) => this.#delete(hash, 'expired'))
    return expired.length
  }

  // -------------------------------------------------------------------------
  // Invalidation
  // -------------------------------------------------------------------------

  /** Mark the entry stale so the next read refetches. Data stays servable. */
  invalidate(key: QueryKey): void {
    this.invalidateByHash(hashQueryKey(key))
  }

  /** invalidate() for a key that has already been hashed. */
  invalidateByHash(hash: QueryHash): void {
    const entry = this.#entries.get(hash)
    if (entry && !entry.isInvalidated) {
      this.#entries.set(hash, { ...entry, isInvalidated: true })
      this.#emit({ type: 'updated', key: hash })
    }
  }

  /** @returns The hashes that were invalidated. */
  invalidateWhere(predicate: (queryKey: QueryKey, info: CacheEntryInfo) => boolean): QueryHash[] {
    const now = Date.now()
    const matched: QueryHash[] = []
    for (const [hash, entry] of this.#entries) {
      const queryKey = this.#queryKeys.get(hash) ?? hash
      if (predicate(queryKey, describeEntry(entry, now, this.#references.get(hash) ?? 0))) {
        matched.push(hash)
      }
    }
    matched.forEach((hash) => this.invalidateByHash(hash))
    return matched
  }

  invalidateWithPrefix(prefix: QueryKey): QueryHash[] {
    return this.invalidateWhere((queryKey) => matchesQueryKey(queryKey, prefix, false))
  }

  // -------------------------------------------------------------------------
  // Reference counting
  // -------------------------------------------------------------------------

  /** Pin `key`: it will not be evicted or collected until released. */
  retain(key: QueryKey): void {
    const hash = hashQueryKey(key)
    this.#references.set(hash, (this.#references.get(hash) ?? 0) + 1)
    this.#clearGcTimer(hash)
  }

  /** Undo one retain(). Releasing an unretained key is a no-op. */
  release(key: QueryKey): void {
    const hash = hashQueryKey(key)
    const count = this.#references.get(hash) ?? 0
    if (count <= 1) {
      this.#references.delete(hash)
      if (count === 1 && this.#entries.has(hash)) {
        this.#scheduleGc(hash)
      }
      return
    }
    this.#references.set(hash, count - 1)
  }

  referenceCount(key: QueryKey): number {
    return this.#references.get(hashQueryKey(key)) ?? 0
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Load persisted entries written by a previous process. Expired and
   * malformed records are skipped; existing in-memory entries win.
   *
   * @returns How many entries were restored.
   */
  async hydrate(): Promise<number> {
    if (!this.#persister) return 0
    const records = await this.#persister.load()
    const now = Date.now()
    let restored = 0

    for (const record of records) {
      const parsed = persistedCacheEntrySchema.safeParse(record)
      if (!parsed.success) {
        this.#logger.warn('[cache] dropped malformed persisted entry')
        continue
      }
      const { queryKey, data, fetchedAt, staleTime, cacheTime, expiresAt } = parsed.data
      const key = hashQueryKey(queryKey)
      if (this.#entries.has(key) || (expiresAt !== undefined && now > expiresAt)) continue

      const entry: CacheEntry = {
        ...createCacheEntry({
          data,
          now: fetchedAt,
          staleTime,
          cacheTime,
          isSecure: false,
          maxAge: undefined,
          size: estimateSize(data),
          seq: ++this.#seq,
        }),
        expiresAt,
      }
      this.#entries.set(key, entry)
      this.#queryKeys.set(key, queryKey)
      this.#size += entry.size
      this.#scheduleGc(key)
      restored++
    }

    this.#enforceCapacity()
    return restored
  }

  /** Stop all collection timers. Entries stay in memory. */
  dispose(): void {
    this.#gcTimers.forEach((timer) => clearTimeout(timer))
    this.#gcTimers.clear()
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  #delete(hash: QueryHash, reason: 'manual' | 'expired' | 'collected'): boolean {
    const entry = this.#entries.get(hash)
    if (!entry) return false
    this.#entries.delete(hash)
    this.#queryKeys.delete(hash)
    this.#size -= entry.size
    this.#clearGcTimer(hash)
    this.#emit({ type: 'removed', key: hash, reason })
    if (!entry.isSecure) this.#persist()
    return true
  }

  #enforceCapacity(protectedHash?: QueryHash): void {
    if (this.#entries.size <= this.maxEntries && this.#size <= this.maxCacheSize) return

    const candidates = [...this.#entries].filter(
      ([hash]) => hash !== protectedHash && !this.#references.has(hash),
    )
    const ranked = rankForEviction(this.evictionPolicy, candidates)

    for (const [hash, entry] of ranked) {
      if (this.#entries.size <= this.maxEntries && this.#size <= this.maxCacheSize) break
      this.#entries.delete(hash)
      this.#queryKeys.delete(hash)
      this.#size -= entry.size
      this.#clearGcTimer(hash)
      this.metrics.recordEviction()
      this.#logger.debug(`[cache] evicted ${hash} (${this.evictionPolicy})`)
      this.#emit({ type: 'evicted', key: hash, policy: this.evictionPolicy })
    }
  }

  #scheduleGc(hash: QueryHash): void {
    this.#clearGcTimer(hash)
    const entry = this.#entries.get(hash)
    if (!entry || !isValidTimeout(entry.cacheTime)) return
    this.#gcTimers.set(
      hash,
      setTimeout(() => {
        this.#gcTimers.delete(hash)
        if (!this.#references.has(hash)) {
          this.#logger.debug(`[cache] collected ${hash}`)
          this.#delete(hash, 'collected')
        }
      }, entry.cacheTime),
    )
  }

  #clearGcTimer(hash: QueryHash): void {
    const timer = this.#gcTimers.get(hash)
    if (timer !== undefined) {
      clearTimeout(timer)
      this.#gcTimers.delete(hash)
    }
  }

  #persist(): void {
    const persister = this.#persister
    if (!persister) return
    const records: PersistedCacheEntry[] = []
    for (const [hash, entry] of this.#entries) {
      if (entry.isSecure) continue
      records.push({
        key: hash,
        queryKey: this.#queryKeys.get(hash) ?? hash,
        data: entry.data,
        fetchedAt: entry.fetchedAt,
        staleTime: entry.staleTime,
        cacheTime: entry.cacheTime,
        expiresAt: entry.expiresAt,
      })
    }
    persister.save(records).catch((error: unknown) => {
      this.#logger.error('[cache] persisting entries failed', { error })
    })
  }

  #emit(event: CacheStoreEvent): void {
    this.listeners.forEach((listener) => listener(event))
  }
}
