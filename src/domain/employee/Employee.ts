/**
 * Employee Domain Entity
 *
 * Employees report to at most one supervisor in the same company. An
 * employee may be linked to a login user, which is what self-only roles are
 * allowed to see.
 */

import type { FilterableRecord, RecordPredicate } from "../access/Access"
import type { HierarchyGuard, HierarchyNode, HierarchyStore } from "../hierarchy/Hierarchy"
import type { TargetCoordinates } from "../../shared/types"

export interface Employee {
  id: number
  businessGroupId: number
  companyId: number
  branchId: number | null
  departmentId: number | null
  supervisorId: number | null
  userId: number | null
  employeeCode: string
  displayName: string
  email: string | null
  hireDate: string | null
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

export interface CreateEmployeeInput {
  businessGroupId: number
  companyId: number
  branchId?: number | null
  departmentId?: number | null
  supervisorId?: number | null
  userId?: number | null
  employeeCode: string
  displayName: string
  email?: string | null
  hireDate?: string | null
}

// undefined leaves a field as it is, null clears it
export interface UpdateEmployeeInput {
  branchId?: number | null
  departmentId?: number | null
  supervisorId?: number | null
  userId?: number | null
  employeeCode?: string
  displayName?: string
  email?: string | null
  hireDate?: string | null
}

export interface NewEmployee {
  businessGroupId: number
  companyId: number
  branchId: number | null
  departmentId: number | null
  supervisorId: number | null
  userId: number | null
  employeeCode: string
  displayName: string
  email: string | null
  hireDate: string | null
}

export type EmployeeChanges = Omit<NewEmployee, "businessGroupId" | "companyId">

export interface EmployeeRepository extends HierarchyStore {
  findById(id: number): Promise<Employee | null>
  findByIds(ids: readonly number[]): Promise<Employee[]>
  findSubordinates(supervisorId: number, filter: RecordPredicate): Promise<Employee[]>
  findMatching(filter: RecordPredicate): Promise<Employee[]>
  // employee code is unique per company; a taken code fails with UniquenessConflictError
  create(input: NewEmployee, guard: HierarchyGuard | null): Promise<Employee>
  update(existing: Employee, changes: EmployeeChanges, guard: HierarchyGuard | null): Promise<Employee>
  // fails with ActiveDescendantsError when a subordinate was attached meanwhile
  deactivate(employee: Employee): Promise<void>
}

export interface TeamNode {
  employee: Employee
  subordinates: TeamNode[]
}

export function employeeNode(employee: Employee): HierarchyNode {
  return {
    id: employee.id,
    parentId: employee.supervisorId,
    businessGroupId: employee.businessGroupId,
    companyId: employee.companyId,
    isActive: employee.isActive,
  }
}

export function employeeCoordinates(employee: Employee): TargetCoordinates {
  return {
    businessGroupId: employee.businessGroupId,
    companyId: employee.companyId,
    branchId: employee.branchId,
    departmentId: employee.departmentId,
    ownerUserId: employee.userId,
  }
}

export function employeeRecord(employee: Employee): FilterableRecord {
  return {
    id: employee.id,
    parentId: employee.supervisorId,
    businessGroupId: employee.businessGroupId,
    companyId: employee.companyId,
    branchId: employee.branchId,
    departmentId: employee.departmentId,
    ownerUserId: employee.userId,
    isActive: employee.isActive,
  }
}
