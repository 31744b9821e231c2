import { describe, it, expect, vi } from 'vitest'
import { z } from 'zod'
import {
  createErrorContext,
  reportToAll,
  sanitizeOptions,
  type ErrorContext,
  type ErrorReporter,
} from '../src/core/errorReporter'
import type { Logger } from '../src/core/logger'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger
}

function createContext(): ErrorContext {
  return createErrorContext({
    queryKey: ['user', 1],
    queryHash: '["user",1]',
    error: new Error('boom'),
    failureCount: 3,
    options: { staleTime: 10 },
    staleTime: 10,
    isOnline: true,
  })
}

// ---------------------------------------------------------------------------
// sanitizeOptions
// ---------------------------------------------------------------------------

describe('sanitizeOptions', () => {
  it('drops callbacks and schemas', () => {
    const sanitized = sanitizeOptions({
      staleTime: 100,
      onError: () => {},
      select: (value: number) => value,
      schema: z.number(),
    })
    expect(sanitized).toEqual({ staleTime: 100 })
  })

  it('redacts sensitive-looking meta fields', () => {
    const sanitized = sanitizeOptions({
      meta: { authToken: 'test-secret', apiKey: 'placeholder', page: 2, Password: 'x' },
    })
    expect(sanitized).toEqual({
      meta: { authToken: '[redacted]', apiKey: '[redacted]', page: 2, Password: '[redacted]' },
    })
  })

  it('drops error classes from breaker options', () => {
    const sanitized = sanitizeOptions({
      circuitBreaker: { failureThreshold: 2, ignoredErrorTypes: [TypeError] },
    })
    expect(sanitized).toEqual({ circuitBreaker: { failureThreshold: 2 } })
  })
})

// ---------------------------------------------------------------------------
// createErrorContext
// ---------------------------------------------------------------------------

describe('createErrorContext', () => {
  it('counts retries as failures after the first', () => {
    const context = createContext()
    expect(context.retryCount).toBe(2)
    expect(context.stack).toContain('boom')
    expect(context.sanitizedOptions).toEqual({ staleTime: 10 })
  })

  it('never reports a negative retry count', () => {
    const context = createErrorContext({
      queryKey: 'k',
      queryHash: 'k',
      error: 'plain string',
      failureCount: 0,
      options: {},
      staleTime: 0,
      isOnline: false,
    })
    expect(context.retryCount).toBe(0)
    expect(context.error).toBe('plain string')
  })
})

// ---------------------------------------------------------------------------
// reportToAll
// ---------------------------------------------------------------------------

describe('reportToAll', () => {
  it('delivers to every reporter even when some fail', async () => {
    const logger = createLogger()
    const received: ErrorContext[] = []
    const reporters: ErrorReporter[] = [
      {
        report: () => {
          throw new Error('sync failure')
        },
      },
      { report: () => Promise.reject(new Error('async failure')) },
      { report: (context) => void received.push(context) },
    ]
    const context = createContext()

    await reportToAll(reporters, context, logger)

    expect(received).toEqual([context])
    expect(logger.error).toHaveBeenCalledTimes(2)
    expect(logger.error).toHaveBeenCalledWith(
      '[report] error reporter failed for ["user",1]',
      expect.objectContaining({ error: expect.any(Error) }),
    )
  })

  it('resolves with no reporters', async () => {
    await expect(reportToAll([], createContext(), createLogger())).resolves.toBeUndefined()
  })
})
