/**
 * dependencyManager.ts
 *
 * Directed acyclic graph of parent -> child query relationships, keyed by
 * query hash. A child has at most one parent; a parent any number of
 * children. Registration rejects self-edges and any edge that would close a
 * cycle, so the graph stays acyclic by construction.
 */

import { DependencyCycleError } from './errors'
import { silentLogger, type Logger } from './logger'
import type { QueryHash } from './types'

export class DependencyManager {
  #children = new Map<QueryHash, Set<QueryHash>>()
  #parents = new Map<QueryHash, QueryHash>()
  #logger: Logger

  constructor(config: { logger?: Logger } = {}) {
    this.#logger = config.logger ?? silentLogger
  }

  /**
   * Make `child` depend on `parent`. A child that already has a parent is
   * moved: the old edge is removed in the same call.
   *
   * @throws DependencyCycleError for `child === parent` or when `child` is
   *   already an ancestor of `parent`.
   */
  registerDependency(child: QueryHash, parent: QueryHash): void {
    if (child === parent) {
      throw new DependencyCycleError(`Query '${child}' cannot depend on itself`, child, parent)
    }

    // Walking up from the new parent must not reach the child.
    let ancestor: QueryHash | undefined = parent
    while (ancestor !== undefined) {
      if (ancestor === child) {
        throw new DependencyCycleError(
          `Dependency '${child}' -> '${parent}' would create a cycle`,
          child,
          parent,
        )
      }
      ancestor = this.#parents.get(ancestor)
    }

    this.#detachFromParent(child)

    let siblings = this.#children.get(parent)
    if (!siblings) {
      siblings = new Set()
      this.#children.set(parent, siblings)
    }
    siblings.add(child)
    this.#parents.set(child, parent)
  }

  /**
   * Remove `node` as both child and parent. Its former children are
   * orphaned and keep no parent.
   */
  unregister(node: QueryHash): void {
    this.#detachFromParent(node)
    const children = this.#children.get(node)
    if (children) {
      children.forEach((child) => this.#parents.delete(child))
      this.#children.delete(node)
    }
  }

  getParent(node: QueryHash): QueryHash | undefined {
    return this.#parents.get(node)
  }

  getChildren(node: QueryHash): QueryHash[] {
    return [...(this.#children.get(node) ?? [])]
  }

  /** Every transitive descendant of `node`, depth-first, without duplicates. */
  getAllDescendants(node: QueryHash): QueryHash[] {
    const result: QueryHash[] = []
    const seen = new Set<QueryHash>()
    const visit = (current: QueryHash): void => {
      for (const child of this.#children.get(current) ?? []) {
        if (seen.has(child)) continue
        seen.add(child)
        result.push(child)
        visit(child)
      }
    }
    visit(node)
    return result
  }

  hasChildren(node: QueryHash): boolean {
    return (this.#children.get(node)?.size ?? 0) > 0
  }

  hasParent(node: QueryHash): boolean {
    return this.#parents.has(node)
  }

  /** Number of parent -> child edges. */
  get relationshipCount(): number {
    return this.#parents.size
  }

  /**
   * Invoke `onChild` for each direct child of `parent`. Iterates over a
   * snapshot, so `onChild` may unregister nodes.
   */
  notifyParentDisposed(parent: QueryHash, onChild: (child: QueryHash) => void): void {
    const children = this.getChildren(parent)
    if (children.length > 0) {
      this.#logger.debug(`[deps] ${parent} disposed, notifying ${children.length} children`)
    }
    children.forEach((child) => onChild(child))
  }

  /** Like notifyParentDisposed() but for the whole subtree. */
  notifyAllDescendantsDisposed(parent: QueryHash, onDescendant: (descendant: QueryHash) => void): void {
    this.getAllDescendants(parent).forEach((descendant) => onDescendant(descendant))
  }

  clear(): void {
    this.#children.clear()
    this.#parents.clear()
  }

  #detachFromParent(child: QueryHash): void {
    const previous = this.#parents.get(child)
    if (previous === undefined) return
    const siblings = this.#children.get(previous)
    siblings?.delete(child)
    if (siblings?.size === 0) this.#children.delete(previous)
    this.#parents.delete(child)
  }
}
