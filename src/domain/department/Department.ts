/**
 * Department Domain Entity
 *
 * Departments form a tree per company. A department without a branch is a
 * corporate department.
 */

import type { FilterableRecord, RecordPredicate } from "../access/Access"
import type { HierarchyGuard, HierarchyNode, HierarchyStore } from "../hierarchy/Hierarchy"
import type { TargetCoordinates } from "../../shared/types"

export interface Department {
  id: number
  businessGroupId: number
  companyId: number
  branchId: number | null
  parentId: number | null
  code: string
  name: string
  description: string | null
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

export interface CreateDepartmentInput {
  companyId: number
  branchId?: number | null
  parentId?: number | null
  code: string
  name: string
  description?: string | null
}

// undefined leaves a field as it is, null clears it
export interface UpdateDepartmentInput {
  branchId?: number | null
  parentId?: number | null
  code?: string
  name?: string
  description?: string | null
}

export interface NewDepartment {
  businessGroupId: number
  companyId: number
  branchId: number | null
  parentId: number | null
  code: string
  name: string
  description: string | null
}

export interface DepartmentChanges {
  branchId: number | null
  parentId: number | null
  code: string
  name: string
  description: string | null
}

export interface DepartmentRepository extends HierarchyStore {
  findById(id: number): Promise<Department | null>
  findByIds(ids: readonly number[]): Promise<Department[]>
  findChildren(parentId: number, filter: RecordPredicate): Promise<Department[]>
  findMatching(filter: RecordPredicate): Promise<Department[]>
  hasActiveEmployees(departmentId: number): Promise<boolean>
  // code is unique per company; a taken code fails with UniquenessConflictError
  create(input: NewDepartment, guard: HierarchyGuard | null): Promise<Department>
  update(existing: Department, changes: DepartmentChanges, guard: HierarchyGuard | null): Promise<Department>
  // fails with ActiveDescendantsError when a sub-department or employee was attached meanwhile
  deactivate(department: Department): Promise<void>
}

export function departmentNode(department: Department): HierarchyNode {
  return {
    id: department.id,
    parentId: department.parentId,
    businessGroupId: department.businessGroupId,
    companyId: department.companyId,
    isActive: department.isActive,
  }
}

export function departmentCoordinates(department: Department): TargetCoordinates {
  return {
    businessGroupId: department.businessGroupId,
    companyId: department.companyId,
    branchId: department.branchId,
    departmentId: department.id,
  }
}

export function departmentRecord(department: Department): FilterableRecord {
  return {
    id: department.id,
    parentId: department.parentId,
    businessGroupId: department.businessGroupId,
    companyId: department.companyId,
    branchId: department.branchId,
    departmentId: department.id,
    isActive: department.isActive,
  }
}
