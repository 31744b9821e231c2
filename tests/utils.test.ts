import { describe, it, expect } from 'vitest'
import {
  hashQueryKey,
  matchesQueryKey,
  isValidTimeout,
  isPlainObject,
  estimateSize,
  toError,
  isServer,
} from '../src/core/utils'

// ---------------------------------------------------------------------------
// hashQueryKey
// ---------------------------------------------------------------------------

describe('hashQueryKey', () => {
  it('hashes a string key to itself', () => {
    expect(hashQueryKey('user:42')).toBe('user:42')
  })

  it('serialises tuple keys as JSON', () => {
    expect(hashQueryKey(['users', 1, true, null])).toBe('["users",1,true,null]')
  })

  it('sorts plain object keys at every depth', () => {
    const first = hashQueryKey(['users', { role: 'admin', filter: { b: 1, a: 2 } }])
    const second = hashQueryKey(['users', { filter: { a: 2, b: 1 }, role: 'admin' }])
    expect(first).toBe(second)
    expect(first).toBe('["users",{"filter":{"a":2,"b":1},"role":"admin"}]')
  })

  it('keeps insertion order for class instances', () => {
    class Point {
      y = 2
      x = 1
    }
    expect(hashQueryKey([new Point()])).toBe('[{"y":2,"x":1}]')
  })

  it('quotes strings that look like a tuple hash', () => {
    expect(hashQueryKey('["users",1]')).toBe('"[\\"users\\",1]"')
    expect(hashQueryKey('["users",1]')).not.toBe(hashQueryKey(['users', 1]))
    expect(hashQueryKey('"users"')).toBe('"\\"users\\""')
  })

  it('distinguishes the string key from the single-element tuple', () => {
    expect(hashQueryKey('users')).not.toBe(hashQueryKey(['users']))
  })
})

// ---------------------------------------------------------------------------
// matchesQueryKey
// ---------------------------------------------------------------------------

describe('matchesQueryKey', () => {
  it('matches tuples by leading elements in partial mode', () => {
    expect(matchesQueryKey(['users', 1, 'posts'], ['users', 1], false)).toBe(true)
    expect(matchesQueryKey(['users', 2], ['users', 1], false)).toBe(false)
    expect(matchesQueryKey(['users'], ['users', 1], false)).toBe(false)
  })

  it('matches string keys by prefix in partial mode', () => {
    expect(matchesQueryKey('user:42', 'user:', false)).toBe(true)
    expect(matchesQueryKey('team:1', 'user:', false)).toBe(false)
  })

  it('treats a string key as a one-element tuple against a tuple target', () => {
    expect(matchesQueryKey('users', ['users'], false)).toBe(true)
  })

  it('requires equal hashes in exact mode', () => {
    expect(matchesQueryKey(['users', { a: 1, b: 2 }], ['users', { b: 2, a: 1 }], true)).toBe(true)
    expect(matchesQueryKey(['users', 1], ['users'], true)).toBe(false)
  })

  it('compares object elements structurally', () => {
    expect(matchesQueryKey(['list', { page: 1 }, 'x'], ['list', { page: 1 }], false)).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// isValidTimeout / isPlainObject
// ---------------------------------------------------------------------------

describe('isValidTimeout', () => {
  it('accepts zero and positive finite numbers', () => {
    expect(isValidTimeout(0)).toBe(true)
    expect(isValidTimeout(250)).toBe(true)
  })

  it('rejects Infinity, negatives and non-numbers', () => {
    expect(isValidTimeout(Infinity)).toBe(false)
    expect(isValidTimeout(-1)).toBe(false)
    expect(isValidTimeout('10')).toBe(false)
    expect(isValidTimeout(undefined)).toBe(false)
  })
})

describe('isPlainObject', () => {
  it('recognises literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
  })

  it('rejects arrays, null, primitives and class instances', () => {
    class Box {}
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject(3)).toBe(false)
    expect(isPlainObject(new Box())).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// estimateSize
// ---------------------------------------------------------------------------

describe('estimateSize', () => {
  it('counts two bytes per string unit', () => {
    expect(estimateSize('abcd')).toBe(8)
  })

  it('uses fixed sizes for scalars', () => {
    expect(estimateSize(42)).toBe(8)
    expect(estimateSize(true)).toBe(1)
    expect(estimateSize(null)).toBe(8)
  })

  it('adds container overhead to the contents', () => {
    // 8 overhead + 8 + 8
    expect(estimateSize([1, 2])).toBe(24)
    // 16 overhead + key 'ab' (4) + 'xy' (4)
    expect(estimateSize({ ab: 'xy' })).toBe(24)
  })

  it('charges a flat amount for other objects', () => {
    expect(estimateSize(new Date(0))).toBe(64)
  })

  it('charges a reference for a container met again on its own path', () => {
    const node: Record<string, unknown> = { id: 1 }
    node.self = node

    // 16 overhead + 'id' (4) + 8, then 'self' (8) + 8 for the revisit.
    expect(estimateSize(node)).toBe(44)
  })
})

// ---------------------------------------------------------------------------
// toError / isServer
// ---------------------------------------------------------------------------

describe('toError', () => {
  it('returns Error instances unchanged', () => {
    const error = new TypeError('bad')
    expect(toError(error)).toBe(error)
  })

  it('wraps strings and other values', () => {
    expect(toError('boom').message).toBe('boom')
    expect(toError({ code: 7 }).message).toBe('{"code":7}')
  })
})

describe('isServer', () => {
  it('is true under the node environment', () => {
    expect(isServer).toBe(true)
  })
})
