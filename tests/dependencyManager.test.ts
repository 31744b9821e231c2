import { describe, it, expect, vi } from 'vitest'
import { DependencyManager } from '../src/core/dependencyManager'
import { DependencyCycleError } from '../src/core/errors'

describe('DependencyManager', () => {
  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  describe('registerDependency', () => {
    it('records the edge in both directions', () => {
      const deps = new DependencyManager()
      deps.registerDependency('posts', 'user')

      expect(deps.getParent('posts')).toBe('user')
      expect(deps.getChildren('user')).toEqual(['posts'])
      expect(deps.hasParent('posts')).toBe(true)
      expect(deps.hasChildren('user')).toBe(true)
      expect(deps.relationshipCount).toBe(1)
    })

    it('rejects a self-dependency', () => {
      const deps = new DependencyManager()
      expect(() => deps.registerDependency('a', 'a')).toThrow(DependencyCycleError)
      expect(deps.relationshipCount).toBe(0)
    })

    it('rejects a direct cycle', () => {
      const deps = new DependencyManager()
      deps.registerDependency('b', 'a')
      expect(() => deps.registerDependency('a', 'b')).toThrow(
        "Dependency 'a' -> 'b' would create a cycle",
      )
    })

    it('rejects a three-node cycle and leaves the graph unchanged', () => {
      const deps = new DependencyManager()
      deps.registerDependency('b', 'a')
      deps.registerDependency('c', 'b')

      let caught: unknown
      try {
        deps.registerDependency('a', 'c')
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(DependencyCycleError)
      expect(caught).toMatchObject({ child: 'a', parent: 'c' })
      expect(deps.hasParent('a')).toBe(false)
      expect(deps.relationshipCount).toBe(2)
    })

    it('moves a child that already has a parent', () => {
      const deps = new DependencyManager()
      deps.registerDependency('child', 'first')
      deps.registerDependency('child', 'second')

      expect(deps.getParent('child')).toBe('second')
      expect(deps.hasChildren('first')).toBe(false)
      expect(deps.relationshipCount).toBe(1)
    })
  })

  // -----------------------------------------------------------------------
  // Traversal
  // -----------------------------------------------------------------------

  describe('getAllDescendants', () => {
    it('walks the subtree depth-first', () => {
      const deps = new DependencyManager()
      deps.registerDependency('b', 'a')
      deps.registerDependency('c', 'b')
      deps.registerDependency('d', 'a')

      expect(deps.getAllDescendants('a')).toEqual(['b', 'c', 'd'])
      expect(deps.getAllDescendants('c')).toEqual([])
    })
  })

  // -----------------------------------------------------------------------
  // Removal and notification
  // -----------------------------------------------------------------------

  describe('unregister', () => {
    it('orphans the children of a removed node', () => {
      const deps = new DependencyManager()
      deps.registerDependency('b', 'a')
      deps.registerDependency('c', 'b')

      deps.unregister('b')

      expect(deps.hasChildren('a')).toBe(false)
      expect(deps.hasParent('c')).toBe(false)
      expect(deps.relationshipCount).toBe(0)
    })

    it('ignores unknown nodes', () => {
      const deps = new DependencyManager()
      expect(() => deps.unregister('nothing')).not.toThrow()
    })
  })

  describe('notifyParentDisposed', () => {
    it('visits direct children even when the callback unregisters them', () => {
      const deps = new DependencyManager()
      deps.registerDependency('b', 'a')
      deps.registerDependency('c', 'a')
      deps.registerDependency('x', 'b')
      const visited: string[] = []

      deps.notifyParentDisposed('a', (child) => {
        visited.push(child)
        deps.unregister(child)
      })

      expect(visited).toEqual(['b', 'c'])
      expect(deps.hasChildren('a')).toBe(false)
    })

    it('notifyAllDescendantsDisposed reaches grandchildren', () => {
      const deps = new DependencyManager()
      deps.registerDependency('b', 'a')
      deps.registerDependency('c', 'b')
      const onDescendant = vi.fn()

      deps.notifyAllDescendantsDisposed('a', onDescendant)

      expect(onDescendant.mock.calls).toEqual([['b'], ['c']])
    })
  })

  it('clear() drops every edge', () => {
    const deps = new DependencyManager()
    deps.registerDependency('b', 'a')
    deps.clear()
    expect(deps.relationshipCount).toBe(0)
    expect(deps.getChildren('a')).toEqual([])
  })
})
