/**
 * Department Service
 *
 * Department tree management and the hierarchy display operations
 * (children, path to the corporate root, subtree).
 */

import type {
  CreateDepartmentInput,
  Department,
  DepartmentChanges,
  DepartmentRepository,
  UpdateDepartmentInput,
} from "../../domain/department/Department"
import { departmentCoordinates, departmentRecord } from "../../domain/department/Department"
import type { Branch, Company, OrganizationRepository } from "../../domain/organization/Organization"
import type { HierarchyGuard } from "../../domain/hierarchy/Hierarchy"
import type { RecordPredicate } from "../../domain/access/Access"
import type { Principal, ResourceRequest, TargetCoordinates } from "../../shared/types"
import {
  ActiveDescendantsError,
  InactiveNodeError,
  NotFoundError,
  TenantMismatchError,
  ValidationError,
} from "../../shared/errors"
import type { HierarchyValidator } from "../hierarchy/HierarchyValidator"
import type { AuthorizationService } from "../access/AuthorizationService"
import { matches, restrict } from "../access/AccessFilter"

const MAX_CODE_LENGTH = 50
const MAX_NAME_LENGTH = 200

export class DepartmentService {
  constructor(
    private departmentRepository: DepartmentRepository,
    private organizationRepository: OrganizationRepository,
    private hierarchy: HierarchyValidator,
    private authorization: AuthorizationService
  ) {}

  async createDepartment(
    principal: Principal,
    input: CreateDepartmentInput,
    request?: ResourceRequest
  ): Promise<Department> {
    const code = this.validateCode(input.code)
    const name = this.validateName(input.name)

    const company = await this.requireActiveCompany(input.companyId)
    const branchId = input.branchId ?? null
    if (branchId !== null) {
      await this.requireBranchOf(company, branchId)
    }
    const parentId = input.parentId ?? null

    // a new department is reached through its parent
    await this.authorization.assertAuthorized(
      principal,
      "create",
      { businessGroupId: company.businessGroupId, companyId: company.id, branchId, departmentId: parentId },
      request
    )

    const guard =
      parentId === null
        ? null
        : await this.hierarchy.validateEdge(
            { id: null, businessGroupId: company.businessGroupId, companyId: company.id },
            parentId
          )

    const department = await this.departmentRepository.create(
      {
        businessGroupId: company.businessGroupId,
        companyId: company.id,
        branchId,
        parentId,
        code,
        name,
        description: input.description ?? null,
      },
      guard
    )

    console.log(`[Departments] Department ${department.id} created by user ${principal.userId}`)
    return department
  }

  async updateDepartment(
    principal: Principal,
    id: number,
    updates: UpdateDepartmentInput,
    request?: ResourceRequest
  ): Promise<Department> {
    const existing = await this.requireDepartment(id)
    await this.authorization.assertAuthorized(principal, "update", departmentCoordinates(existing), request)

    const changes: DepartmentChanges = {
      branchId: updates.branchId === undefined ? existing.branchId : updates.branchId,
      parentId: updates.parentId === undefined ? existing.parentId : updates.parentId,
      code: updates.code === undefined ? existing.code : this.validateCode(updates.code),
      name: updates.name === undefined ? existing.name : this.validateName(updates.name),
      description: updates.description === undefined ? existing.description : updates.description,
    }

    if (changes.branchId !== existing.branchId && changes.branchId !== null) {
      const company = await this.requireActiveCompany(existing.companyId)
      await this.requireBranchOf(company, changes.branchId)
    }

    let guard: HierarchyGuard | null = null
    if (changes.parentId !== existing.parentId && changes.parentId !== null) {
      guard = await this.hierarchy.validateEdge(
        { id: existing.id, businessGroupId: existing.businessGroupId, companyId: existing.companyId },
        changes.parentId
      )
    }

    if (changes.branchId !== existing.branchId || changes.parentId !== existing.parentId) {
      // moving a department must also land it inside the caller's reach
      const destination: TargetCoordinates = {
        businessGroupId: existing.businessGroupId,
        companyId: existing.companyId,
        branchId: changes.branchId,
        departmentId: changes.parentId,
      }
      await this.authorization.assertAuthorized(principal, "update", destination, request)
    }

    const department = await this.departmentRepository.update(existing, changes, guard)
    console.log(`[Departments] Department ${id} updated by user ${principal.userId}`)
    return department
  }

  async deactivateDepartment(principal: Principal, id: number, request?: ResourceRequest): Promise<void> {
    const existing = await this.requireDepartment(id)
    await this.authorization.assertAuthorized(principal, "delete", departmentCoordinates(existing), request)

    if (!existing.isActive) {
      return
    }

    await this.hierarchy.assertDeactivatable(id)
    if (await this.departmentRepository.hasActiveEmployees(id)) {
      throw new ActiveDescendantsError("Department", id, "employees")
    }

    await this.departmentRepository.deactivate(existing)
    console.log(`[Departments] Department ${id} deactivated by user ${principal.userId}`)
  }

  async getDepartment(principal: Principal, id: number, request?: ResourceRequest): Promise<Department> {
    const department = await this.requireDepartment(id)
    await this.authorization.assertAuthorized(principal, "read", departmentCoordinates(department), request)
    return department
  }

  async listDepartments(
    principal: Principal,
    filter?: RecordPredicate,
    request?: ResourceRequest
  ): Promise<Department[]> {
    const predicate = await this.authorization.listFilter(principal, request)
    const departments = await this.departmentRepository.findMatching(restrict(predicate, filter))
    return departments.sort((a, b) => a.code.localeCompare(b.code))
  }

  async getChildren(principal: Principal, id: number, request?: ResourceRequest): Promise<Department[]> {
    await this.getDepartment(principal, id, request)
    const predicate = await this.authorization.listFilter(principal, request)
    const children = await this.departmentRepository.findChildren(id, predicate)
    return children.sort((a, b) => a.code.localeCompare(b.code))
  }

  /**
   * The department followed by its ancestors up to the corporate root,
   * leaving out ancestors the caller cannot read.
   */
  async getHierarchyPath(principal: Principal, id: number, request?: ResourceRequest): Promise<Department[]> {
    await this.getDepartment(principal, id, request)
    const predicate = await this.authorization.listFilter(principal, request)

    const path = await this.hierarchy.ancestorPath(id)
    const byId = new Map((await this.departmentRepository.findByIds(path)).map((d) => [d.id, d]))

    const departments: Department[] = []
    for (const departmentId of path) {
      const department = byId.get(departmentId)
      if (department && matches(predicate, departmentRecord(department))) {
        departments.push(department)
      }
    }
    return departments
  }

  /**
   * Every readable department below `id`, breadth first.
   */
  async getSubtree(principal: Principal, id: number, request?: ResourceRequest): Promise<Department[]> {
    await this.getDepartment(principal, id, request)
    const predicate = await this.authorization.listFilter(principal, request)

    const ids = await this.hierarchy.collectDescendants(id)
    const byId = new Map((await this.departmentRepository.findByIds(ids)).map((d) => [d.id, d]))

    return ids.flatMap((departmentId) => {
      const department = byId.get(departmentId)
      return department && matches(predicate, departmentRecord(department)) ? [department] : []
    })
  }

  private async requireDepartment(id: number): Promise<Department> {
    const department = await this.departmentRepository.findById(id)
    if (!department) {
      throw new NotFoundError("Department", id)
    }
    return department
  }

  private async requireActiveCompany(companyId: number): Promise<Company> {
    const company = await this.organizationRepository.findCompany(companyId)
    if (!company) {
      throw new NotFoundError("Company", companyId)
    }
    if (!company.isActive) {
      throw new InactiveNodeError("Company", companyId)
    }
    return company
  }

  private async requireBranchOf(company: Company, branchId: number): Promise<Branch> {
    const branch = await this.organizationRepository.findBranch(branchId)
    if (!branch) {
      throw new NotFoundError("Branch", branchId)
    }
    if (branch.companyId !== company.id) {
      throw new TenantMismatchError(`Branch ${branchId} does not belong to company ${company.id}`, {
        branchId,
        companyId: company.id,
      })
    }
    if (!branch.isActive) {
      throw new InactiveNodeError("Branch", branchId)
    }
    return branch
  }

  private validateCode(code: string): string {
    const trimmed = code.trim()
    if (!trimmed) {
      throw new ValidationError("Department code is required", "code")
    }
    if (trimmed.length > MAX_CODE_LENGTH) {
      throw new ValidationError(`Department code must be at most ${MAX_CODE_LENGTH} characters`, "code")
    }
    return trimmed
  }

  private validateName(name: string): string {
    const trimmed = name.trim()
    if (!trimmed) {
      throw new ValidationError("Department name is required", "name")
    }
    if (trimmed.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`Department name must be at most ${MAX_NAME_LENGTH} characters`, "name")
    }
    return trimmed
  }
}
