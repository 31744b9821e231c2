/**
 * cacheEntry.ts
 *
 * The immutable record the CacheStore keeps per key, plus the pure
 * freshness and expiry rules. Entries are replaced, never mutated: an access
 * produces a new entry with bumped counters.
 */

export interface CacheEntry<T = unknown> {
  readonly data: T
  /** When the data was written (ms). Freshness is measured from here. */
  readonly fetchedAt: number
  readonly staleTime: number
  readonly cacheTime: number
  readonly isSecure: boolean
  /** Hard expiry, present only when the write carried a maxAge. */
  readonly expiresAt: number | undefined
  /** Set by invalidate(); an invalidated entry is stale regardless of age. */
  readonly isInvalidated: boolean
  readonly lastAccessedAt: number
  readonly accessCount: number
  /** Estimated footprint in bytes. */
  readonly size: number
  /**
   * Logical clocks for eviction ordering. Millisecond timestamps collide
   * when several writes land in the same tick; sequence numbers do not.
   */
  readonly insertSeq: number
  readonly accessSeq: number
}

export interface CacheEntryInit<T> {
  data: T
  now: number
  staleTime: number
  cacheTime: number
  isSecure: boolean
  maxAge: number | undefined
  size: number
  seq: number
}

export function createCacheEntry<T>(init: CacheEntryInit<T>): CacheEntry<T> {
  return {
    data: init.data,
    fetchedAt: init.now,
    staleTime: init.staleTime,
    cacheTime: init.cacheTime,
    isSecure: init.isSecure,
    expiresAt: init.maxAge !== undefined ? init.now + init.maxAge : undefined,
    isInvalidated: false,
    lastAccessedAt: init.now,
    accessCount: 1,
    size: init.size,
    insertSeq: init.seq,
    accessSeq: init.seq,
  }
}

export function withAccess<T>(entry: CacheEntry<T>, now: number, seq: number): CacheEntry<T> {
  return {
    ...entry,
    lastAccessedAt: now,
    accessCount: entry.accessCount + 1,
    accessSeq: seq,
  }
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return entry.expiresAt !== undefined && now > entry.expiresAt
}

/** Fresh entries are served without refetching. An expired entry is never fresh. */
export function isFresh(entry: CacheEntry, now: number): boolean {
  if (entry.isInvalidated || isExpired(entry, now)) return false
  return now < entry.fetchedAt + entry.staleTime
}

export function isStale(entry: CacheEntry, now: number): boolean {
  return !isFresh(entry, now)
}

/** Metadata view of an entry, safe to log for secure keys too. */
export interface CacheEntryInfo {
  fetchedAt: number
  staleTime: number
  cacheTime: number
  isSecure: boolean
  expiresAt: number | undefined
  isStale: boolean
  isInvalidated: boolean
  accessCount: number
  lastAccessedAt: number
  size: number
  referenceCount: number
}

export function describeEntry(entry: CacheEntry, now: number, referenceCount: number): CacheEntryInfo {
  return {
    fetchedAt: entry.fetchedAt,
    staleTime: entry.staleTime,
    cacheTime: entry.cacheTime,
    isSecure: entry.isSecure,
    expiresAt: entry.expiresAt,
    isStale: isStale(entry, now),
    isInvalidated: entry.isInvalidated,
    accessCount: entry.accessCount,
    lastAccessedAt: entry.lastAccessedAt,
    size: entry.size,
    referenceCount,
  }
}
