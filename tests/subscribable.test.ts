import { describe, it, expect, vi } from 'vitest'
import { Subscribable } from '../src/core/subscribable'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class Counter extends Subscribable<(value: number) => void> {
  #value = 0

  increment(): void {
    this.#value += 1
    this.listeners.forEach((listener) => listener(this.#value))
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Subscribable', () => {
  it('delivers every emitted value to each listener in order', () => {
    const counter = new Counter()
    const seen: number[] = []
    counter.subscribe((value) => seen.push(value))

    counter.increment()
    counter.increment()

    expect(seen).toEqual([1, 2])
  })

  it('registers the same function once', () => {
    const counter = new Counter()
    const listener = vi.fn()
    counter.subscribe(listener)
    counter.subscribe(listener)

    counter.increment()

    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('stops delivering after unsubscribe and tolerates repeated calls', () => {
    const counter = new Counter()
    const listener = vi.fn()
    const unsubscribe = counter.subscribe(listener)

    unsubscribe()
    unsubscribe()
    counter.increment()

    expect(listener).not.toHaveBeenCalled()
    expect(counter.hasListeners()).toBe(false)
  })

  it('keeps other listeners when one unsubscribes', () => {
    const counter = new Counter()
    const kept = vi.fn()
    counter.subscribe(kept)
    const unsubscribe = counter.subscribe(vi.fn())

    unsubscribe()
    counter.increment()

    expect(counter.hasListeners()).toBe(true)
    expect(kept).toHaveBeenCalledWith(1)
  })

  it('keeps subscribe bound when detached', () => {
    const counter = new Counter()
    const { subscribe } = counter
    const listener = vi.fn()
    subscribe(listener)

    counter.increment()

    expect(listener).toHaveBeenCalledWith(1)
  })
})
