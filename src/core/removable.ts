/**
 * removable.ts
 *
 * Base class for objects that dispose themselves after an idle period.
 *
 * Who extends this:
 *   - Query         removed from the QueryClient registry once its last
 *                   listener has been gone for `disposeDelay`
 *   - InfiniteQuery same lifecycle, page list instead of a single value
 *
 * Lifecycle:
 *   1. Reference count drops to zero -> subclass calls scheduleDisposal()
 *   2. disposeDelay ms later -> optionalRemove()
 *   3. optionalRemove() re-checks that nobody re-acquired in the meantime
 *   4. A new listener before the timer fires -> clearDisposalTimer()
 *
 * Disposal removes the Query object only. The CacheStore entry it wrote has
 * its own cacheTime and may outlive it.
 */

import { Subscribable } from './subscribable'
import { isValidTimeout } from './utils'

export const DEFAULT_DISPOSE_DELAY = 5000

export abstract class Removable<
  TListener extends (...args: never[]) => void = () => void,
> extends Subscribable<TListener> {
  /** Delay between losing the last listener and disposal, in ms. Infinity keeps it forever. */
  disposeDelay: number = DEFAULT_DISPOSE_DELAY

  #disposalTimeout?: ReturnType<typeof setTimeout>

  /** (Re)start the disposal countdown. */
  protected scheduleDisposal(): void {
    this.clearDisposalTimer()
    if (isValidTimeout(this.disposeDelay)) {
      this.#disposalTimeout = setTimeout(() => {
        this.#disposalTimeout = undefined
        this.optionalRemove()
      }, this.disposeDelay)
    }
  }

  protected clearDisposalTimer(): void {
    if (this.#disposalTimeout !== undefined) {
      clearTimeout(this.#disposalTimeout)
      this.#disposalTimeout = undefined
    }
  }

  /**
   * Called by the disposal timer. Implementations check that the object is
   * still unreferenced before disposing it.
   */
  protected abstract optionalRemove(): void
}
