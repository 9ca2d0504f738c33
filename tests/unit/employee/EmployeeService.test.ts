/**
 * EmployeeService Unit Tests
 */

import type { CreateEmployeeInput } from "../../../src/domain/employee/Employee"
import {
  ActiveDescendantsError,
  AuthorizationDeniedError,
  CycleError,
  InactiveNodeError,
  TenantMismatchError,
  UniquenessConflictError,
  ValidationError,
} from "../../../src/shared/errors"
import { ADMIN, COLLABORATOR, MANAGER, buildServices, principal, type ServiceStack } from "../../fakes/services"

const admin = principal(1, ADMIN)

describe("EmployeeService", () => {
  let stack: ServiceStack

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined)
    jest.spyOn(console, "warn").mockImplementation(() => undefined)
    stack = buildServices()
    const { ledger } = stack
    ledger.addBusinessGroup(1)
    ledger.addBusinessGroup(2)
    ledger.addCompany(10, 1)
    ledger.addCompany(20, 2)
    ledger.addBranch(30, 10)
    ledger.addDepartment(101, 10)
    ledger.addDepartment(201, 20)
    // E1 supervises E2 supervises E3
    ledger.addEmployee(1, 10, { branchId: 30 })
    ledger.addEmployee(2, 10, { supervisorId: 1, userId: 42 })
    ledger.addEmployee(3, 10, { supervisorId: 2, branchId: 30 })
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  describe("createEmployee", () => {
    it("should create an employee reporting to a supervisor", async () => {
      const employee = await stack.employeeService.createEmployee(admin, {
        businessGroupId: 1,
        companyId: 10,
        branchId: 30,
        departmentId: 101,
        supervisorId: 1,
        employeeCode: " emp-9 ",
        displayName: "Ana Lima",
        email: " Ana.Lima@Example.COM ",
        hireDate: "2024-03-01",
      })

      expect(employee).toMatchObject({
        id: 1000,
        businessGroupId: 1,
        companyId: 10,
        branchId: 30,
        departmentId: 101,
        supervisorId: 1,
        userId: null,
        employeeCode: "emp-9",
        displayName: "Ana Lima",
        email: "ana.lima@example.com",
        hireDate: "2024-03-01",
      })
    })

    it("should reject a company outside the business group", async () => {
      await expect(
        stack.employeeService.createEmployee(admin, {
          businessGroupId: 1,
          companyId: 20,
          employeeCode: "E9",
          displayName: "X",
        })
      ).rejects.toThrow(TenantMismatchError)
    })

    it("should reject a code already used in the company regardless of case", async () => {
      await expect(
        stack.employeeService.createEmployee(admin, {
          businessGroupId: 1,
          companyId: 10,
          employeeCode: "e1",
          displayName: "X",
        })
      ).rejects.toThrow(UniquenessConflictError)
    })

    const invalidFields: Array<[string, Partial<CreateEmployeeInput>]> = [
      ["employee code", { employeeCode: "-E9" }],
      ["email", { email: "not-an-email" }],
      ["hire date", { hireDate: "2024/03/01" }],
      ["display name", { displayName: " " }],
    ]

    it.each(invalidFields)("should reject an invalid %s", async (_field, override) => {
      await expect(
        stack.employeeService.createEmployee(admin, {
          businessGroupId: 1,
          companyId: 10,
          employeeCode: "E9",
          displayName: "X",
          ...override,
        })
      ).rejects.toThrow(ValidationError)
    })

    it("should reject a department of another company", async () => {
      await expect(
        stack.employeeService.createEmployee(admin, {
          businessGroupId: 1,
          companyId: 10,
          departmentId: 201,
          employeeCode: "E9",
          displayName: "X",
        })
      ).rejects.toThrow(TenantMismatchError)
    })

    it("should reject an inactive department", async () => {
      stack.ledger.addDepartment(102, 10, { isActive: false })

      await expect(
        stack.employeeService.createEmployee(admin, {
          businessGroupId: 1,
          companyId: 10,
          departmentId: 102,
          employeeCode: "E9",
          displayName: "X",
        })
      ).rejects.toThrow(InactiveNodeError)
    })

    it("should reject a supervisor in another company", async () => {
      stack.ledger.addEmployee(4, 20)

      await expect(
        stack.employeeService.createEmployee(admin, {
          businessGroupId: 1,
          companyId: 10,
          supervisorId: 4,
          employeeCode: "E9",
          displayName: "X",
        })
      ).rejects.toThrow(TenantMismatchError)
    })
  })

  describe("updateEmployee", () => {
    it("should reject making E3 the supervisor of E1", async () => {
      await expect(stack.employeeService.updateEmployee(admin, 1, { supervisorId: 3 })).rejects.toThrow(CycleError)
      expect(stack.ledger.employeeRows.get(1)?.supervisorId).toBeNull()
    })

    it("should re-assign a supervisor", async () => {
      const employee = await stack.employeeService.updateEmployee(admin, 3, { supervisorId: 1 })

      expect(employee.supervisorId).toBe(1)
    })

    it("should reject moving an employee out of the caller's branch", async () => {
      const manager = principal(5, MANAGER, [{ type: "branch", id: 30, companyId: 10 }])

      await expect(stack.employeeService.updateEmployee(manager, 3, { branchId: null })).rejects.toThrow(
        AuthorizationDeniedError
      )
    })

    it("should reject a code taken by another employee", async () => {
      await expect(stack.employeeService.updateEmployee(admin, 3, { employeeCode: "E2" })).rejects.toThrow(
        UniquenessConflictError
      )
    })
  })

  describe("deactivateEmployee", () => {
    it("should reject an employee with active subordinates", async () => {
      const error = await stack.employeeService.deactivateEmployee(admin, 2).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ActiveDescendantsError)
      expect(error).toMatchObject({ details: { id: 2, dependents: "subordinates" } })
    })

    it("should deactivate an employee without subordinates", async () => {
      await stack.employeeService.deactivateEmployee(admin, 3)

      expect(stack.ledger.employeeRows.get(3)?.isActive).toBe(false)
    })
  })

  describe("self access", () => {
    const self = principal(42, COLLABORATOR)

    it("should read the employee linked to the caller", async () => {
      await expect(stack.employeeService.getEmployee(self, 2)).resolves.toMatchObject({ id: 2 })
    })

    it("should deny any other employee", async () => {
      await expect(stack.employeeService.getEmployee(self, 3)).rejects.toThrow(AuthorizationDeniedError)
    })

    it("should list only the linked employee", async () => {
      const employees = await stack.employeeService.listEmployees(self)

      expect(employees.map((e) => e.id)).toEqual([2])
    })
  })

  describe("reporting lines", () => {
    it("should return direct subordinates", async () => {
      const subordinates = await stack.employeeService.getSubordinates(admin, 1)

      expect(subordinates.map((e) => e.id)).toEqual([2])
    })

    it("should return the supervisor chain", async () => {
      const chain = await stack.employeeService.getSupervisorChain(admin, 3)

      expect(chain.map((e) => e.id)).toEqual([3, 2, 1])
    })

    it("should build the nested team tree", async () => {
      stack.ledger.addEmployee(4, 10, { supervisorId: 1 })

      const tree = await stack.employeeService.getTeamTree(admin, 1)

      expect(tree.employee.id).toBe(1)
      expect(tree.subordinates.map((node) => node.employee.id)).toEqual([2, 4])
      expect(tree.subordinates[0].subordinates.map((node) => node.employee.id)).toEqual([3])
      expect(tree.subordinates[1].subordinates).toEqual([])
    })

    it("should drop an unreadable subordinate together with their team", async () => {
      const manager = principal(5, MANAGER, [{ type: "branch", id: 30, companyId: 10 }])

      const tree = await stack.employeeService.getTeamTree(manager, 1)

      expect(tree.employee.id).toBe(1)
      expect(tree.subordinates).toEqual([])
    })
  })
})
