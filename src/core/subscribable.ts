/**
 * subscribable.ts
 *
 * Base class for every observable object in the engine: Query and
 * InfiniteQuery (state stream), CacheStore (entry events), QueryRegistry,
 * NetworkStatus and OfflineQueueManager.
 *
 * Listeners live in a Set, so subscribing the same function twice registers
 * it once. subscribe() hands back the matching unsubscribe function.
 */
export class Subscribable<TListener extends (...args: never[]) => void = () => void> {
  protected listeners: Set<TListener>

  constructor() {
    this.listeners = new Set<TListener>()
    // Stable reference for useSyncExternalStore and other adapters.
    this.subscribe = this.subscribe.bind(this)
  }

  /**
   * Register a listener. Listeners are called synchronously, once per
   * emitted event, in the order the events are produced.
   *
   * @returns An unsubscribe function; calling it more than once is harmless.
   */
  subscribe(listener: TListener): () => void {
    this.listeners.add(listener)

    return () => {
      this.listeners.delete(listener)
    }
  }

  hasListeners(): boolean {
    return this.listeners.size > 0
  }
}
