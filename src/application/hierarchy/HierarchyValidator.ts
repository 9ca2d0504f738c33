/**
 * Hierarchy Validator
 *
 * Guards parent links of a single-parent forest: no self links, no cycles,
 * no links across tenants, no links under inactive nodes and, when a depth
 * bound is configured, no chains longer than that bound. Also provides the
 * breadth-first and upward traversals used for display.
 */

import type { EdgeCandidate, HierarchyGuard, HierarchyNode, HierarchyStore } from "../../domain/hierarchy/Hierarchy"
import {
  ActiveDescendantsError,
  CycleError,
  DepthExceededError,
  InactiveNodeError,
  NotFoundError,
  TenantMismatchError,
} from "../../shared/errors"

export interface HierarchyValidatorOptions {
  // name used in error messages, e.g. "Department"
  entity: string
  // plural used when deactivation is blocked, e.g. "sub-departments"
  dependents: string
  // longest allowed chain of links from any node to its root; null for no bound
  maxDepth: number | null
}

export class HierarchyValidator {
  constructor(
    private store: HierarchyStore,
    private options: HierarchyValidatorOptions
  ) {}

  /**
   * Checks that `child` may hang under `parentId` and returns the observed
   * chain so the write can be made conditional on it.
   */
  async validateEdge(child: EdgeCandidate, parentId: number): Promise<HierarchyGuard> {
    const { entity } = this.options

    if (child.id !== null && child.id === parentId) {
      throw new CycleError(child.id, parentId)
    }

    const parent = await this.store.findNode(parentId)
    if (!parent) {
      throw new NotFoundError(entity, parentId)
    }
    if (!parent.isActive) {
      throw new InactiveNodeError(entity, parentId)
    }
    if (parent.companyId !== child.companyId || parent.businessGroupId !== child.businessGroupId) {
      throw new TenantMismatchError(`${entity} ${parentId} belongs to another company`, {
        parentId,
        parentCompanyId: parent.companyId,
        companyId: child.companyId,
      })
    }

    const chain = await this.walkUp(parent, child.id)

    if (this.options.maxDepth !== null) {
      const { maxDepth } = this.options
      // the child sits chain.length links below its root
      const height = child.id === null ? 0 : await this.subtreeHeight(child.id, maxDepth)
      const resultingDepth = chain.length + height
      if (resultingDepth > maxDepth) {
        throw new DepthExceededError(maxDepth, resultingDepth)
      }
    }

    return {
      parentId,
      chain: chain.map((node) => ({ id: node.id, parentId: node.parentId })),
    }
  }

  /**
   * Node ids below `nodeId`, breadth first. Each call starts a fresh walk.
   */
  async *descendants(nodeId: number): AsyncGenerator<number> {
    const visited = new Set<number>([nodeId])
    let frontier = [nodeId]

    while (frontier.length > 0) {
      const next: number[] = []
      for (const id of frontier) {
        for (const childId of await this.store.findChildIds(id)) {
          if (visited.has(childId)) {
            continue
          }
          visited.add(childId)
          next.push(childId)
          yield childId
        }
      }
      frontier = next
    }
  }

  async collectDescendants(nodeId: number): Promise<number[]> {
    const ids: number[] = []
    for await (const id of this.descendants(nodeId)) {
      ids.push(id)
    }
    return ids
  }

  /**
   * `nodeId` followed by its ancestors up to the root.
   */
  async ancestorPath(nodeId: number): Promise<number[]> {
    const node = await this.store.findNode(nodeId)
    if (!node) {
      throw new NotFoundError(this.options.entity, nodeId)
    }

    const path = [node.id]
    const visited = new Set<number>(path)
    let parentId = node.parentId

    while (parentId !== null && !visited.has(parentId)) {
      const parent = await this.store.findNode(parentId)
      if (!parent) {
        break
      }
      path.push(parent.id)
      visited.add(parent.id)
      parentId = parent.parentId
    }

    if (parentId !== null && visited.has(parentId)) {
      console.warn(`[Hierarchy] ${this.options.entity} ${nodeId} has a cyclic ancestry at ${parentId}`)
    }

    return path
  }

  async assertDeactivatable(nodeId: number): Promise<void> {
    if (await this.store.hasActiveChildren(nodeId)) {
      throw new ActiveDescendantsError(this.options.entity, nodeId, this.options.dependents)
    }
  }

  private async walkUp(parent: HierarchyNode, childId: number | null): Promise<HierarchyNode[]> {
    const chain: HierarchyNode[] = []
    const visited = new Set<number>()
    let current: HierarchyNode | null = parent

    while (current) {
      if (childId !== null && current.id === childId) {
        throw new CycleError(childId, parent.id)
      }
      if (visited.has(current.id)) {
        // the stored data already loops above the parent
        throw new CycleError(current.id, parent.id)
      }
      visited.add(current.id)
      chain.push(current)

      if (current.parentId === null) {
        break
      }
      current = await this.store.findNode(current.parentId)
    }

    return chain
  }

  // levels below `rootId`, counting stops once `limit` is exceeded
  private async subtreeHeight(rootId: number, limit: number): Promise<number> {
    const visited = new Set<number>([rootId])
    let frontier = [rootId]
    let height = 0

    while (frontier.length > 0 && height <= limit) {
      const next: number[] = []
      for (const id of frontier) {
        for (const childId of await this.store.findChildIds(id)) {
          if (!visited.has(childId)) {
            visited.add(childId)
            next.push(childId)
          }
        }
      }
      if (next.length === 0) {
        break
      }
      height++
      frontier = next
    }

    return height
  }
}
