/**
 * utils.ts
 *
 * Pure helpers shared across the core. Nothing here imports runtime code from
 * other project files.
 */

import type { QueryKey, QueryHash } from './types'

// ---------------------------------------------------------------------------
// Environment Detection
// ---------------------------------------------------------------------------

/** True when no `window` global exists (Node.js, workers, SSR). */
export const isServer = typeof window === 'undefined'

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Returns true if `value` is a finite, non-negative number usable as a
 * setTimeout duration. Infinity means "never" and is rejected here.
 */
export function isValidTimeout(value: unknown): value is number {
  return typeof value === 'number' && value >= 0 && value !== Infinity
}

// ---------------------------------------------------------------------------
// Query Key Hashing
// ---------------------------------------------------------------------------

/**
 * Produces a stable string from a query key.
 *
 * String keys hash to themselves, except those starting with '[' or '"',
 * which are JSON-quoted so no string collides with a tuple's hash. Tuple keys
 * are serialised as JSON with plain-object keys sorted, so `{ a: 1, b: 2 }`
 * and `{ b: 2, a: 1 }` produce the same hash.
 *
 * @example
 * hashQueryKey('user:42')                        // => 'user:42'
 * hashQueryKey('["users"]')                      // => '"[\"users\"]"'
 * hashQueryKey(['users', { role: 'admin', page: 1 }])
 * // => '["users",{"page":1,"role":"admin"}]'
 */
export function hashQueryKey(queryKey: QueryKey): QueryHash {
  if (typeof queryKey === 'string') {
    return queryKey.startsWith('[') || queryKey.startsWith('"') ? JSON.stringify(queryKey) : queryKey
  }
  return JSON.stringify(queryKey, (_key, val: unknown) => {
    if (isPlainObject(val)) {
      return Object.keys(val)
        .sort()
        .reduce<Record<string, unknown>>((result, key) => {
          result[key] = val[key]
          return result
        }, {})
    }
    return val
  })
}

// ---------------------------------------------------------------------------
// Object Helpers
// ---------------------------------------------------------------------------

/**
 * Returns true when `val` was created via `{}` or `Object.create(null)`, as
 * opposed to a class instance, array, or null.
 */
export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (typeof val !== 'object' || val === null) return false
  const prototype = Object.getPrototypeOf(val) as unknown
  return (
    prototype === Object.prototype ||
    prototype === null ||
    Object.getPrototypeOf(prototype) === null
  )
}

// ---------------------------------------------------------------------------
// Query Key Matching
// ---------------------------------------------------------------------------

function toSegments(queryKey: QueryKey): ReadonlyArray<unknown> {
  return typeof queryKey === 'string' ? [queryKey] : queryKey
}

/**
 * Determines whether `queryKey` matches `target`.
 *
 * Exact mode compares hashes. Partial mode compares tuples element by element
 * (`queryKey` may have extra trailing elements); when both keys are strings
 * it falls back to a string prefix check, so `'user:'` matches `'user:42'`.
 *
 * @example
 * matchesQueryKey(['users', 1], ['users'], false)  // true
 * matchesQueryKey('user:42', 'user:', false)       // true
 * matchesQueryKey(['users', 1], ['users'], true)   // false
 */
export function matchesQueryKey(
  queryKey: QueryKey,
  target: QueryKey,
  exact: boolean,
): boolean {
  if (exact) {
    return hashQueryKey(queryKey) === hashQueryKey(target)
  }
  if (typeof queryKey === 'string' && typeof target === 'string') {
    return queryKey.startsWith(target)
  }
  const segments = toSegments(queryKey)
  const targetSegments = toSegments(target)
  if (segments.length < targetSegments.length) return false
  return targetSegments.every(
    (element, index) =>
      hashQueryKey([element]) === hashQueryKey([segments[index]]),
  )
}

// ---------------------------------------------------------------------------
// Size estimation
// ---------------------------------------------------------------------------

/**
 * Rough in-memory footprint of a value, in bytes. Strings count two bytes per
 * UTF-16 unit; containers add a fixed overhead plus their contents. Used only
 * to bound the cache store, so precision is not a goal.
 */
export function estimateSize(value: unknown, seen: WeakSet<object> = new WeakSet()): number {
  if (value === null || value === undefined) return 8
  switch (typeof value) {
    case 'string':
      return value.length * 2
    case 'number':
    case 'bigint':
      return 8
    case 'boolean':
      return 1
    case 'object':
      // A container already on the current path counts as a reference.
      if (seen.has(value)) return 8
      if (Array.isArray(value)) {
        seen.add(value)
        const size = value.reduce<number>((total, item) => total + estimateSize(item, seen), 8)
        seen.delete(value)
        return size
      }
      if (isPlainObject(value)) {
        seen.add(value)
        const size = Object.entries(value).reduce<number>(
          (total, [key, item]) => total + key.length * 2 + estimateSize(item, seen),
          16,
        )
        seen.delete(value)
        return size
      }
      return 64
    default:
      return 64
  }
}

// ---------------------------------------------------------------------------
// Functional Utilities
// ---------------------------------------------------------------------------

/** Normalises anything thrown into an Error instance. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(typeof value === 'string' ? value : JSON.stringify(value))
}
