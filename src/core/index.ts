/**
 * index.ts: barrel export for the core module.
 *
 * Files are listed in dependency order (lowest-level first).
 */

// Shared types (no runtime code)
export * from './types'

// Errors, validation, logging
export * from './errors'
export * from './validation'
export * from './logger'

// Pure utility functions
export * from './utils'

// Observer base class and the disposal-timer base for queries
export * from './subscribable'
export * from './removable'

// Cancellation and retries
export * from './cancellationToken'
export * from './retryer'

// Cache store and its parts
export * from './cacheEntry'
export * from './cacheMetrics'
export * from './evictionPolicy'
export * from './persistence'
export * from './cacheStore'

// Failure isolation and the dependency graph
export * from './circuitBreaker'
export * from './circuitBreakerRegistry'
export * from './dependencyManager'

// Connectivity and offline mutations
export * from './networkStatus'
export * from './offlineQueue'

// CPU-bound work and error reporting
export * from './taskPool'
export * from './errorReporter'

// Query and mutation state machines, and the query registry
export * from './query'
export * from './infiniteQuery'
export * from './queryRegistry'
export * from './mutation'

// Public API facade
export { QueryClient } from './queryClient'
export type { QueryClientConfig, PrefetchConfig } from './queryClient'
