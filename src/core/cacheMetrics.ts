/**
 * cacheMetrics.ts
 *
 * Counters owned by the CacheStore. External collaborators read them through
 * snapshot(); nothing in the engine depends on them for correctness.
 */

const MAX_FETCH_SAMPLES = 1000

export interface CacheMetricsSnapshot {
  hits: number
  misses: number
  evictions: number
  hitRate: number
  fetchCount: number
  averageFetchTime: number
  p95FetchTime: number
}

export class CacheMetrics {
  hits = 0
  misses = 0
  evictions = 0
  #fetchTimes: number[] = []

  recordHit(): void {
    this.hits++
  }

  recordMiss(): void {
    this.misses++
  }

  recordEviction(count = 1): void {
    this.evictions += count
  }

  /** Keeps the most recent 1000 durations. */
  recordFetchTime(durationMs: number): void {
    this.#fetchTimes.push(durationMs)
    if (this.#fetchTimes.length > MAX_FETCH_SAMPLES) {
      this.#fetchTimes.shift()
    }
  }

  get hitRate(): number {
    const total = this.hits + this.misses
    return total === 0 ? 0 : this.hits / total
  }

  get averageFetchTime(): number {
    if (this.#fetchTimes.length === 0) return 0
    const sum = this.#fetchTimes.reduce((total, time) => total + time, 0)
    return sum / this.#fetchTimes.length
  }

  /** Nearest-rank 95th percentile of the recorded fetch durations. */
  get p95FetchTime(): number {
    if (this.#fetchTimes.length === 0) return 0
    const sorted = [...this.#fetchTimes].sort((a, b) => a - b)
    const rank = Math.ceil(0.95 * sorted.length) - 1
    return sorted[Math.max(rank, 0)] ?? 0
  }

  snapshot(): CacheMetricsSnapshot {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: this.hitRate,
      fetchCount: this.#fetchTimes.length,
      averageFetchTime: this.averageFetchTime,
      p95FetchTime: this.p95FetchTime,
    }
  }

  reset(): void {
    this.hits = 0
    this.misses = 0
    this.evictions = 0
    this.#fetchTimes = []
  }
}
