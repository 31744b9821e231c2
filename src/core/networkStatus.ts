/**
 * networkStatus.ts
 *
 * Observable online/offline flag. Something outside the engine (browser
 * events, a platform connectivity API, a test) calls setOnline(); the
 * OfflineQueueManager listens for the false -> true edge to replay.
 *
 * Consecutive identical values are not republished.
 */

import { Subscribable } from './subscribable'
import { isServer } from './utils'

type NetworkListener = (online: boolean) => void

/**
 * Custom connectivity wiring. Receives a setter to call on every change and
 * returns a cleanup function.
 */
type SetupFn = (setOnline: (online: boolean) => void) => () => void

export class NetworkStatus extends Subscribable<NetworkListener> {
  #online: boolean
  #cleanup?: () => void

  constructor(initialOnline = true) {
    super()
    this.#online = initialOnline
  }

  /**
   * Wire a connectivity source. Without `setupFn`, browser `online` and
   * `offline` window events are used; in Node.js nothing is wired.
   *
   * @returns A cleanup function that removes the listener(s).
   */
  setup(setupFn?: SetupFn): () => void {
    this.#cleanup?.()
    this.#cleanup = undefined

    if (setupFn) {
      this.#cleanup = setupFn((online) => this.setOnline(online))
      return this.#cleanup
    }

    if (!isServer) {
      const onlineListener = (): void => this.setOnline(true)
      const offlineListener = (): void => this.setOnline(false)

      window.addEventListener('online', onlineListener, false)
      window.addEventListener('offline', offlineListener, false)

      this.#cleanup = (): void => {
        window.removeEventListener('online', onlineListener, false)
        window.removeEventListener('offline', offlineListener, false)
      }
    }

    return this.#cleanup ?? (() => {})
  }

  get isOnline(): boolean {
    return this.#online
  }

  setOnline(online: boolean): void {
    if (online === this.#online) return
    this.#online = online
    this.listeners.forEach((listener) => {
      listener(online)
    })
  }
}

/** Shared default instance. Tests and multi-tenant hosts create their own. */
export const networkStatus = new NetworkStatus()
