/**
 * Hierarchy Domain
 *
 * Department trees (parent department) and reporting lines (supervisor) are
 * both single-parent forests scoped to one company. The validator only
 * needs this narrow view of either of them.
 */

export interface HierarchyNode {
  id: number
  parentId: number | null
  businessGroupId: number
  companyId: number
  isActive: boolean
}

export interface HierarchyStore {
  findNode(id: number): Promise<HierarchyNode | null>
  findChildIds(parentId: number): Promise<number[]>
  hasActiveChildren(parentId: number): Promise<boolean>
}

/**
 * A node about to be linked under a parent. `id` is null while the node is
 * still being created.
 */
export interface EdgeCandidate {
  id: number | null
  businessGroupId: number
  companyId: number
}

export interface GuardLink {
  id: number
  parentId: number | null
}

/**
 * The upward chain observed while validating an edge, parent first. The
 * repository re-checks every link in the same transaction as the write, so
 * a concurrent re-parenting anywhere on the chain aborts the write.
 */
export interface HierarchyGuard {
  parentId: number
  chain: GuardLink[]
}
