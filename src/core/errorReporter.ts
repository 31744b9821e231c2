/**
 * errorReporter.ts
 *
 * Hand-off of final query failures to crash/telemetry collaborators.
 * Reporters receive the same ErrorContext; one that throws or rejects is
 * logged and does not keep the others from running.
 */

import type { Logger } from './logger'
import type { QueryHash, QueryKey } from './types'
import { toError } from './utils'

export interface ErrorContext {
  queryKey: QueryKey
  queryHash: QueryHash
  error: unknown
  stack: string | undefined
  /** Attempts that failed before the error was surfaced, minus the first. */
  retryCount: number
  staleTime: number
  isOnline: boolean
  sanitizedOptions: Record<string, unknown>
}

export interface ErrorReporter {
  report(context: ErrorContext): void | Promise<void>
}

const SENSITIVE_META_KEY = /auth|token|password|secret|cookie|key/i

/**
 * Reduce query options to serialisable, non-sensitive values: callbacks and
 * schemas are dropped, sensitive-looking meta fields are redacted.
 */
export function sanitizeOptions(options: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {}
  const entries: Array<[string, unknown]> = Object.entries(options)
  for (const [name, value] of entries) {
    if (typeof value === 'function' || name === 'schema') continue
    if ((name === 'meta' || name === 'circuitBreaker') && isRecord(value)) {
      sanitized[name] = sanitizeRecord(value)
      continue
    }
    sanitized[name] = value
  }
  return sanitized
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function sanitizeRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record)) {
    if (key === 'ignoredErrorTypes' || typeof value === 'function') continue
    result[key] = SENSITIVE_META_KEY.test(key) ? '[redacted]' : value
  }
  return result
}

export function createErrorContext(input: {
  queryKey: QueryKey
  queryHash: QueryHash
  error: unknown
  failureCount: number
  options: object
  staleTime: number
  isOnline: boolean
}): ErrorContext {
  return {
    queryKey: input.queryKey,
    queryHash: input.queryHash,
    error: input.error,
    stack: toError(input.error).stack,
    retryCount: Math.max(0, input.failureCount - 1),
    staleTime: input.staleTime,
    isOnline: input.isOnline,
    sanitizedOptions: sanitizeOptions(input.options),
  }
}

/** Deliver `context` to every reporter. Resolves once all have settled. */
export async function reportToAll(
  reporters: Iterable<ErrorReporter>,
  context: ErrorContext,
  logger: Logger,
): Promise<void> {
  const deliveries = [...reporters].map(async (reporter) => {
    try {
      await reporter.report(context)
    } catch (error) {
      logger.error(`[report] error reporter failed for ${context.queryHash}`, { error })
    }
  })
  await Promise.all(deliveries)
}
