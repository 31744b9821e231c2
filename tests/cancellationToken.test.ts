import { describe, it, expect, vi } from 'vitest'
import { CancellationToken } from '../src/core/cancellationToken'
import { CancelledError, isCancelledError } from '../src/core/errors'

describe('CancellationToken', () => {
  it('starts uncancelled', () => {
    const token = new CancellationToken()
    expect(token.isCancelled).toBe(false)
    expect(token.signal.aborted).toBe(false)
    expect(() => token.throwIfCancelled()).not.toThrow()
  })

  it('cancels once and notifies callbacks once', async () => {
    const token = new CancellationToken()
    const callback = vi.fn()
    token.onCancel(callback)

    token.cancel()
    token.cancel()

    expect(callback).toHaveBeenCalledTimes(1)
    expect(token.isCancelled).toBe(true)
    expect(token.signal.aborted).toBe(true)
    await expect(token.cancelled).resolves.toBeUndefined()
  })

  it('throws CancelledError once cancelled', () => {
    const token = new CancellationToken()
    token.cancel()

    let caught: unknown
    try {
      token.throwIfCancelled()
    } catch (error) {
      caught = error
    }
    expect(isCancelledError(caught)).toBe(true)
    expect(caught).toBeInstanceOf(CancelledError)
  })

  it('runs late callbacks immediately', () => {
    const token = new CancellationToken()
    token.cancel()
    const callback = vi.fn()
    token.onCancel(callback)
    expect(callback).toHaveBeenCalledTimes(1)
  })

  it('skips callbacks that were unregistered', () => {
    const token = new CancellationToken()
    const callback = vi.fn()
    const unregister = token.onCancel(callback)
    unregister()
    token.cancel()
    expect(callback).not.toHaveBeenCalled()
  })

  it('runs every callback even when one throws', () => {
    const token = new CancellationToken()
    const after = vi.fn()
    token.onCancel(() => {
      throw new Error('listener failed')
    })
    token.onCancel(after)

    expect(() => token.cancel()).toThrow(AggregateError)
    expect(after).toHaveBeenCalledTimes(1)
    expect(token.isCancelled).toBe(true)
  })

  // -----------------------------------------------------------------------
  // Children
  // -----------------------------------------------------------------------

  describe('createChild', () => {
    it('cancels children with the parent', () => {
      const parent = new CancellationToken()
      const child = parent.createChild()
      const grandchild = child.createChild()

      parent.cancel()

      expect(child.isCancelled).toBe(true)
      expect(grandchild.isCancelled).toBe(true)
    })

    it('leaves the parent alone when a child is cancelled', () => {
      const parent = new CancellationToken()
      const child = parent.createChild()
      const sibling = parent.createChild()

      child.cancel()

      expect(parent.isCancelled).toBe(false)
      expect(sibling.isCancelled).toBe(false)
    })

    it('creates an already-cancelled child from a cancelled parent', () => {
      const parent = new CancellationToken()
      parent.cancel()
      expect(parent.createChild().isCancelled).toBe(true)
    })

    it('release() detaches a child from its parent', () => {
      const parent = new CancellationToken()
      const child = parent.createChild()
      const grandchild = child.createChild()

      child.release()
      child.release()
      parent.cancel()

      expect(child.isCancelled).toBe(false)
      expect(grandchild.isCancelled).toBe(false)
      child.cancel()
      expect(grandchild.isCancelled).toBe(true)
    })
  })
})
