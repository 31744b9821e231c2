/**
 * validation.ts
 *
 * zod schemas for everything that crosses the public API boundary: keys,
 * durations, option bags, configuration and persisted offline entries.
 * Failures surface as QueryArgumentError with the zod issues flattened into
 * the message.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod'
import { QueryArgumentError } from './errors'
import type { QueryKey } from './types'

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const MAX_KEY_LENGTH = 255

export const queryKeySchema = z.union([
  z.string().min(1, 'Query key cannot be empty').max(MAX_KEY_LENGTH),
  z.array(z.unknown()).min(1, 'Query key tuple cannot be empty').readonly(),
])

export const durationSchema = z.number().nonnegative()

const positiveInt = z.number().int().positive()

// ---------------------------------------------------------------------------
// Option bags
// ---------------------------------------------------------------------------

export const retryPolicySchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  initialDelay: durationSchema,
  multiplier: z.number().positive(),
  maxDelay: durationSchema,
})

const retryOptionSchema = z.union([z.boolean(), z.number().int().nonnegative(), retryPolicySchema.partial()])

export const circuitBreakerOptionsSchema = z
  .object({
    failureThreshold: positiveInt.optional(),
    resetTimeout: durationSchema.optional(),
    successThreshold: positiveInt.optional(),
  })
  .passthrough()

export const queryOptionsSchema = z
  .object({
    enabled: z.boolean().optional(),
    staleTime: durationSchema.optional(),
    cacheTime: durationSchema.optional(),
    retry: retryOptionSchema.optional(),
    circuitBreaker: circuitBreakerOptionsSchema.optional(),
    circuitBreakerScope: z.string().min(1).optional(),
    isSecure: z.boolean().optional(),
    maxAge: durationSchema.optional(),
    disposeDelay: durationSchema.optional(),
    maxPages: positiveInt.optional(),
  })
  .passthrough()
  .refine((options) => !options.isSecure || options.maxAge !== undefined, {
    message: 'maxAge is required when isSecure is true',
    path: ['maxAge'],
  })

export const mutationOptionsSchema = z
  .object({
    mutationType: z.string().min(1).optional(),
    mutationKey: queryKeySchema.optional(),
    queueWhenOffline: z.boolean().optional(),
    priority: z.number().int().optional(),
    retry: retryOptionSchema.optional(),
  })
  .passthrough()
  .refine((options) => !options.queueWhenOffline || options.mutationType !== undefined, {
    message: 'mutationType is required when queueWhenOffline is true',
    path: ['mutationType'],
  })

export const cacheStoreConfigSchema = z
  .object({
    maxEntries: positiveInt.optional(),
    maxCacheSize: positiveInt.optional(),
    evictionPolicy: z.enum(['lru', 'lfu', 'fifo']).optional(),
    defaultStaleTime: durationSchema.optional(),
    defaultCacheTime: durationSchema.optional(),
  })
  .passthrough()

export const taskPoolConfigSchema = z
  .object({
    size: positiveInt.optional(),
  })
  .passthrough()

// ---------------------------------------------------------------------------
// Persisted offline entries
// ---------------------------------------------------------------------------

export const offlineMutationEntrySchema = z.object({
  id: z.string().min(1),
  key: z.string().min(1),
  mutationType: z.string().min(1),
  variables: z.unknown(),
  createdAt: z.number(),
  attempts: z.number().int().nonnegative(),
  lastError: z.string().optional(),
  priority: z.number().int().default(0),
})

// ---------------------------------------------------------------------------
// Persisted cache entries
// ---------------------------------------------------------------------------

export const persistedCacheEntrySchema = z.object({
  key: z.string().min(1),
  queryKey: queryKeySchema,
  data: z.unknown(),
  fetchedAt: z.number(),
  staleTime: durationSchema,
  cacheTime: durationSchema,
  expiresAt: z.number().optional(),
})

export type PersistedCacheEntry = z.infer<typeof persistedCacheEntrySchema>

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Render zod issues as `path: message` pairs joined with semicolons. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Parse `value` with `schema`, throwing QueryArgumentError on failure.
 *
 * @example
 * const config = parseOrThrow(cacheStoreConfigSchema, input, 'cache config')
 */
export function parseOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  label: string,
): T {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new QueryArgumentError(`Invalid ${label}: ${formatIssues(result.error)}`)
  }
  return result.data
}

export function validateQueryKey(queryKey: QueryKey): void {
  parseOrThrow(queryKeySchema, queryKey, 'query key')
}

export function validateDuration(value: number, name: string): void {
  parseOrThrow(durationSchema, value, name)
}
