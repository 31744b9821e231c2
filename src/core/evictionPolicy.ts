/**
 * evictionPolicy.ts
 *
 * Victim ordering for the CacheStore. Each policy is a comparator that sorts
 * the entry most deserving of eviction first.
 */

import type { CacheEntry } from './cacheEntry'
import type { QueryHash } from './types'

export type EvictionPolicy = 'lru' | 'lfu' | 'fifo'

type Candidate = readonly [QueryHash, CacheEntry]

type Comparator = (a: CacheEntry, b: CacheEntry) => number

const comparators: Record<EvictionPolicy, Comparator> = {
  // Least recently accessed first.
  lru: (a, b) => a.accessSeq - b.accessSeq,
  // Least frequently accessed first; recency breaks ties.
  lfu: (a, b) => a.accessCount - b.accessCount || a.accessSeq - b.accessSeq,
  // Oldest insertion first.
  fifo: (a, b) => a.insertSeq - b.insertSeq,
}

/**
 * Order `candidates` so the first element is the next to evict.
 * The input array is left untouched.
 */
export function rankForEviction(
  policy: EvictionPolicy,
  candidates: ReadonlyArray<Candidate>,
): Candidate[] {
  const compare = comparators[policy]
  return [...candidates].sort(([, a], [, b]) => compare(a, b))
}
