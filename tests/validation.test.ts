import { describe, it, expect } from 'vitest'
import {
  parseOrThrow,
  queryOptionsSchema,
  cacheStoreConfigSchema,
  offlineMutationEntrySchema,
  validateQueryKey,
  validateDuration,
  MAX_KEY_LENGTH,
} from '../src/core/validation'
import { QueryArgumentError } from '../src/core/errors'

// ---------------------------------------------------------------------------
// Query keys
// ---------------------------------------------------------------------------

describe('validateQueryKey', () => {
  it('accepts strings and non-empty tuples', () => {
    expect(() => validateQueryKey('user:1')).not.toThrow()
    expect(() => validateQueryKey(['user', 1])).not.toThrow()
  })

  it('rejects empty keys', () => {
    expect(() => validateQueryKey('')).toThrow(QueryArgumentError)
    expect(() => validateQueryKey([])).toThrow(QueryArgumentError)
  })

  it('rejects strings longer than the maximum', () => {
    expect(() => validateQueryKey('k'.repeat(MAX_KEY_LENGTH))).not.toThrow()
    expect(() => validateQueryKey('k'.repeat(MAX_KEY_LENGTH + 1))).toThrow(
      /Invalid query key/,
    )
  })
})

describe('validateDuration', () => {
  it('names the offending value in the message', () => {
    expect(() => validateDuration(-5, 'staleTime')).toThrow(/^Invalid staleTime: /)
  })

  it('accepts zero', () => {
    expect(() => validateDuration(0, 'cacheTime')).not.toThrow()
  })
})

// ---------------------------------------------------------------------------
// Option bags
// ---------------------------------------------------------------------------

describe('queryOptionsSchema', () => {
  it('requires maxAge for secure queries', () => {
    expect(() => parseOrThrow(queryOptionsSchema, { isSecure: true }, 'query options')).toThrow(
      'Invalid query options: maxAge: maxAge is required when isSecure is true',
    )
    expect(() =>
      parseOrThrow(queryOptionsSchema, { isSecure: true, maxAge: 1000 }, 'query options'),
    ).not.toThrow()
  })

  it('keeps unknown keys such as callbacks', () => {
    const onSuccess = (): void => {}
    const parsed = parseOrThrow(queryOptionsSchema, { onSuccess, staleTime: 10 }, 'query options')
    expect(parsed).toMatchObject({ onSuccess, staleTime: 10 })
  })

  it('rejects negative staleTime and zero maxPages', () => {
    expect(() => parseOrThrow(queryOptionsSchema, { staleTime: -1 }, 'query options')).toThrow(
      QueryArgumentError,
    )
    expect(() => parseOrThrow(queryOptionsSchema, { maxPages: 0 }, 'query options')).toThrow(
      QueryArgumentError,
    )
  })

  it('accepts every retry shape', () => {
    for (const retry of [false, 2, { maxRetries: 1, initialDelay: 10 }]) {
      expect(() => parseOrThrow(queryOptionsSchema, { retry }, 'query options')).not.toThrow()
    }
  })
})

describe('cacheStoreConfigSchema', () => {
  it('rejects unknown eviction policies', () => {
    expect(() =>
      parseOrThrow(cacheStoreConfigSchema, { evictionPolicy: 'random' }, 'cache config'),
    ).toThrow(QueryArgumentError)
  })

  it('rejects a zero entry limit', () => {
    expect(() => parseOrThrow(cacheStoreConfigSchema, { maxEntries: 0 }, 'cache config')).toThrow(
      /maxEntries/,
    )
  })
})

// ---------------------------------------------------------------------------
// Persisted entries
// ---------------------------------------------------------------------------

describe('offlineMutationEntrySchema', () => {
  it('defaults priority to 0', () => {
    const entry = parseOrThrow(
      offlineMutationEntrySchema,
      {
        id: 'a',
        key: 'todo:1',
        mutationType: 'update',
        variables: { done: true },
        createdAt: 1,
        attempts: 0,
      },
      'offline entry',
    )
    expect(entry.priority).toBe(0)
  })

  it('rejects entries without a mutation type', () => {
    expect(() =>
      parseOrThrow(
        offlineMutationEntrySchema,
        { id: 'a', key: 'k', variables: null, createdAt: 1, attempts: 0 },
        'offline entry',
      ),
    ).toThrow(QueryArgumentError)
  })
})
