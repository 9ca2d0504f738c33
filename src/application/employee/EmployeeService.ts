/**
 * Employee Service
 *
 * Employee records and reporting lines. The supervisor relation is a
 * hierarchy in its own right, validated like the department tree but
 * without a depth bound by default.
 */

import type {
  CreateEmployeeInput,
  Employee,
  EmployeeChanges,
  EmployeeRepository,
  TeamNode,
  UpdateEmployeeInput,
} from "../../domain/employee/Employee"
import { employeeCoordinates, employeeRecord } from "../../domain/employee/Employee"
import type { DepartmentRepository } from "../../domain/department/Department"
import type { OrganizationRepository } from "../../domain/organization/Organization"
import type { HierarchyGuard } from "../../domain/hierarchy/Hierarchy"
import type { RecordPredicate } from "../../domain/access/Access"
import type { Principal, ResourceRequest, TargetCoordinates } from "../../shared/types"
import { InactiveNodeError, NotFoundError, TenantMismatchError, ValidationError } from "../../shared/errors"
import type { HierarchyValidator } from "../hierarchy/HierarchyValidator"
import type { AuthorizationService } from "../access/AuthorizationService"
import { matches, restrict } from "../access/AccessFilter"

const EMPLOYEE_CODE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,49}$/
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/
const HIRE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

interface Placement {
  branchId: number | null
  departmentId: number | null
}

export class EmployeeService {
  constructor(
    private employeeRepository: EmployeeRepository,
    private departmentRepository: DepartmentRepository,
    private organizationRepository: OrganizationRepository,
    private hierarchy: HierarchyValidator,
    private authorization: AuthorizationService
  ) {}

  async createEmployee(principal: Principal, input: CreateEmployeeInput, request?: ResourceRequest): Promise<Employee> {
    const employeeCode = this.validateCode(input.employeeCode)
    const displayName = this.validateDisplayName(input.displayName)
    const email = this.validateEmail(input.email ?? null)
    const hireDate = this.validateHireDate(input.hireDate ?? null)

    const group = await this.organizationRepository.findBusinessGroup(input.businessGroupId)
    if (!group) {
      throw new NotFoundError("Business group", input.businessGroupId)
    }
    if (!group.isActive) {
      throw new InactiveNodeError("Business group", group.id)
    }

    const company = await this.organizationRepository.findCompany(input.companyId)
    if (!company) {
      throw new NotFoundError("Company", input.companyId)
    }
    if (company.businessGroupId !== group.id) {
      throw new TenantMismatchError(`Company ${company.id} does not belong to business group ${group.id}`, {
        companyId: company.id,
        businessGroupId: group.id,
      })
    }
    if (!company.isActive) {
      throw new InactiveNodeError("Company", company.id)
    }

    const placement = await this.validatePlacement(company.id, {
      branchId: input.branchId ?? null,
      departmentId: input.departmentId ?? null,
    })
    const supervisorId = input.supervisorId ?? null
    const userId = input.userId ?? null

    await this.authorization.assertAuthorized(
      principal,
      "create",
      { businessGroupId: group.id, companyId: company.id, ...placement, ownerUserId: userId },
      request
    )

    const guard =
      supervisorId === null
        ? null
        : await this.hierarchy.validateEdge(
            { id: null, businessGroupId: group.id, companyId: company.id },
            supervisorId
          )

    const employee = await this.employeeRepository.create(
      {
        businessGroupId: group.id,
        companyId: company.id,
        ...placement,
        supervisorId,
        userId,
        employeeCode,
        displayName,
        email,
        hireDate,
      },
      guard
    )

    console.log(`[Employees] Employee ${employee.id} created by user ${principal.userId}`)
    return employee
  }

  async updateEmployee(
    principal: Principal,
    id: number,
    updates: UpdateEmployeeInput,
    request?: ResourceRequest
  ): Promise<Employee> {
    const existing = await this.requireEmployee(id)
    await this.authorization.assertAuthorized(principal, "update", employeeCoordinates(existing), request)

    const changes: EmployeeChanges = {
      branchId: updates.branchId === undefined ? existing.branchId : updates.branchId,
      departmentId: updates.departmentId === undefined ? existing.departmentId : updates.departmentId,
      supervisorId: updates.supervisorId === undefined ? existing.supervisorId : updates.supervisorId,
      userId: updates.userId === undefined ? existing.userId : updates.userId,
      employeeCode:
        updates.employeeCode === undefined ? existing.employeeCode : this.validateCode(updates.employeeCode),
      displayName:
        updates.displayName === undefined ? existing.displayName : this.validateDisplayName(updates.displayName),
      email: updates.email === undefined ? existing.email : this.validateEmail(updates.email),
      hireDate: updates.hireDate === undefined ? existing.hireDate : this.validateHireDate(updates.hireDate),
    }

    const moved =
      changes.branchId !== existing.branchId ||
      changes.departmentId !== existing.departmentId ||
      changes.userId !== existing.userId

    if (moved) {
      await this.validatePlacement(existing.companyId, changes)
      const destination: TargetCoordinates = {
        businessGroupId: existing.businessGroupId,
        companyId: existing.companyId,
        branchId: changes.branchId,
        departmentId: changes.departmentId,
        ownerUserId: changes.userId,
      }
      await this.authorization.assertAuthorized(principal, "update", destination, request)
    }

    let guard: HierarchyGuard | null = null
    if (changes.supervisorId !== existing.supervisorId && changes.supervisorId !== null) {
      guard = await this.hierarchy.validateEdge(
        { id: existing.id, businessGroupId: existing.businessGroupId, companyId: existing.companyId },
        changes.supervisorId
      )
    }

    const employee = await this.employeeRepository.update(existing, changes, guard)
    console.log(`[Employees] Employee ${id} updated by user ${principal.userId}`)
    return employee
  }

  async deactivateEmployee(principal: Principal, id: number, request?: ResourceRequest): Promise<void> {
    const existing = await this.requireEmployee(id)
    await this.authorization.assertAuthorized(principal, "delete", employeeCoordinates(existing), request)

    if (!existing.isActive) {
      return
    }

    await this.hierarchy.assertDeactivatable(id)
    await this.employeeRepository.deactivate(existing)
    console.log(`[Employees] Employee ${id} deactivated by user ${principal.userId}`)
  }

  async getEmployee(principal: Principal, id: number, request?: ResourceRequest): Promise<Employee> {
    const employee = await this.requireEmployee(id)
    await this.authorization.assertAuthorized(principal, "read", employeeCoordinates(employee), request)
    return employee
  }

  async listEmployees(principal: Principal, filter?: RecordPredicate, request?: ResourceRequest): Promise<Employee[]> {
    const predicate = await this.authorization.listFilter(principal, request)
    const employees = await this.employeeRepository.findMatching(restrict(predicate, filter))
    return employees.sort((a, b) => a.employeeCode.localeCompare(b.employeeCode))
  }

  async getSubordinates(principal: Principal, id: number, request?: ResourceRequest): Promise<Employee[]> {
    await this.getEmployee(principal, id, request)
    const predicate = await this.authorization.listFilter(principal, request)
    const subordinates = await this.employeeRepository.findSubordinates(id, predicate)
    return subordinates.sort((a, b) => a.employeeCode.localeCompare(b.employeeCode))
  }

  /**
   * The employee followed by every supervisor above, leaving out the ones
   * the caller cannot read.
   */
  async getSupervisorChain(principal: Principal, id: number, request?: ResourceRequest): Promise<Employee[]> {
    await this.getEmployee(principal, id, request)
    const predicate = await this.authorization.listFilter(principal, request)

    const path = await this.hierarchy.ancestorPath(id)
    const byId = new Map((await this.employeeRepository.findByIds(path)).map((e) => [e.id, e]))

    const chain: Employee[] = []
    for (const employeeId of path) {
      const employee = byId.get(employeeId)
      if (employee && matches(predicate, employeeRecord(employee))) {
        chain.push(employee)
      }
    }
    return chain
  }

  /**
   * Nested reporting tree below an employee. A subordinate the caller
   * cannot read is left out together with everyone reporting to them.
   */
  async getTeamTree(principal: Principal, id: number, request?: ResourceRequest): Promise<TeamNode> {
    const root = await this.getEmployee(principal, id, request)
    const predicate = await this.authorization.listFilter(principal, request)

    const ids = await this.hierarchy.collectDescendants(id)
    const members = await this.employeeRepository.findByIds(ids)

    const bySupervisor = new Map<number, Employee[]>()
    for (const member of members) {
      if (member.supervisorId === null || !matches(predicate, employeeRecord(member))) {
        continue
      }
      const siblings = bySupervisor.get(member.supervisorId) ?? []
      siblings.push(member)
      bySupervisor.set(member.supervisorId, siblings)
    }

    const visited = new Set<number>()
    const build = (employee: Employee): TeamNode => {
      visited.add(employee.id)
      const subordinates = (bySupervisor.get(employee.id) ?? [])
        .filter((member) => !visited.has(member.id))
        .sort((a, b) => a.employeeCode.localeCompare(b.employeeCode))
      return { employee, subordinates: subordinates.map(build) }
    }

    return build(root)
  }

  private async requireEmployee(id: number): Promise<Employee> {
    const employee = await this.employeeRepository.findById(id)
    if (!employee) {
      throw new NotFoundError("Employee", id)
    }
    return employee
  }

  private async validatePlacement(companyId: number, placement: Placement): Promise<Placement> {
    if (placement.branchId !== null) {
      const branch = await this.organizationRepository.findBranch(placement.branchId)
      if (!branch) {
        throw new NotFoundError("Branch", placement.branchId)
      }
      if (branch.companyId !== companyId) {
        throw new TenantMismatchError(`Branch ${branch.id} does not belong to company ${companyId}`, {
          branchId: branch.id,
          companyId,
        })
      }
      if (!branch.isActive) {
        throw new InactiveNodeError("Branch", branch.id)
      }
    }

    if (placement.departmentId !== null) {
      const department = await this.departmentRepository.findById(placement.departmentId)
      if (!department) {
        throw new NotFoundError("Department", placement.departmentId)
      }
      if (department.companyId !== companyId) {
        throw new TenantMismatchError(`Department ${department.id} does not belong to company ${companyId}`, {
          departmentId: department.id,
          companyId,
        })
      }
      if (!department.isActive) {
        throw new InactiveNodeError("Department", department.id)
      }
    }

    return { branchId: placement.branchId, departmentId: placement.departmentId }
  }

  private validateCode(code: string): string {
    const trimmed = code.trim()
    if (!EMPLOYEE_CODE_PATTERN.test(trimmed)) {
      throw new ValidationError(
        "Employee code must be 1-50 letters, digits, dots, dashes or underscores",
        "employeeCode"
      )
    }
    return trimmed
  }

  private validateDisplayName(displayName: string): string {
    const trimmed = displayName.trim()
    if (!trimmed) {
      throw new ValidationError("Display name is required", "displayName")
    }
    return trimmed
  }

  private validateEmail(email: string | null): string | null {
    if (email === null) {
      return null
    }
    const trimmed = email.trim().toLowerCase()
    if (!EMAIL_PATTERN.test(trimmed)) {
      throw new ValidationError("Invalid email address", "email")
    }
    return trimmed
  }

  private validateHireDate(hireDate: string | null): string | null {
    if (hireDate === null) {
      return null
    }
    if (!HIRE_DATE_PATTERN.test(hireDate) || Number.isNaN(Date.parse(hireDate))) {
      throw new ValidationError("Hire date must be a YYYY-MM-DD date", "hireDate")
    }
    return hireDate
  }
}
