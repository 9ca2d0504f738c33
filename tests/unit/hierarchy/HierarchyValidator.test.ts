/**
 * HierarchyValidator Unit Tests
 */

import { HierarchyValidator } from "../../../src/application/hierarchy/HierarchyValidator"
import {
  ActiveDescendantsError,
  CycleError,
  DepthExceededError,
  InactiveNodeError,
  NotFoundError,
  TenantMismatchError,
} from "../../../src/shared/errors"
import { InMemoryLedger } from "../../fakes/InMemoryLedger"

describe("HierarchyValidator", () => {
  let ledger: InMemoryLedger
  let departments: HierarchyValidator
  let reporting: HierarchyValidator

  beforeEach(() => {
    ledger = new InMemoryLedger()
    ledger.addBusinessGroup(1)
    ledger.addBusinessGroup(2)
    ledger.addCompany(10, 1)
    ledger.addCompany(20, 2)

    // D1 -> D2 -> D3, D1 -> D4
    ledger.addDepartment(101, 10)
    ledger.addDepartment(102, 10, { parentId: 101 })
    ledger.addDepartment(103, 10, { parentId: 102 })
    ledger.addDepartment(104, 10, { parentId: 101 })
    ledger.addDepartment(201, 20)

    departments = new HierarchyValidator(ledger.departments, {
      entity: "Department",
      dependents: "sub-departments",
      maxDepth: 5,
    })
    reporting = new HierarchyValidator(ledger.employees, {
      entity: "Employee",
      dependents: "subordinates",
      maxDepth: null,
    })
  })

  describe("validateEdge", () => {
    it("should reject linking a department under its own sub-department", async () => {
      const error = await departments
        .validateEdge({ id: 101, businessGroupId: 1, companyId: 10 }, 102)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(CycleError)
      expect(error).toMatchObject({ code: "CYCLE", details: { childId: 101, parentId: 102 } })
    })

    it("should reject a cycle through a deeper descendant", async () => {
      await expect(
        departments.validateEdge({ id: 101, businessGroupId: 1, companyId: 10 }, 103)
      ).rejects.toThrow(CycleError)
    })

    it("should reject a self link", async () => {
      await expect(
        departments.validateEdge({ id: 102, businessGroupId: 1, companyId: 10 }, 102)
      ).rejects.toThrow(CycleError)
    })

    it("should reject a supervisor loop E1 -> E2 -> E3 -> E1", async () => {
      ledger.addEmployee(1, 10)
      ledger.addEmployee(2, 10, { supervisorId: 1 })
      ledger.addEmployee(3, 10, { supervisorId: 2 })

      await expect(
        reporting.validateEdge({ id: 1, businessGroupId: 1, companyId: 10 }, 3)
      ).rejects.toThrow(CycleError)
    })

    it("should reject a parent in another company", async () => {
      const error = await departments
        .validateEdge({ id: 102, businessGroupId: 1, companyId: 10 }, 201)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TenantMismatchError)
      expect(error).toMatchObject({ details: { parentId: 201, parentCompanyId: 20, companyId: 10 } })
    })

    it("should reject a missing parent", async () => {
      await expect(
        departments.validateEdge({ id: null, businessGroupId: 1, companyId: 10 }, 999)
      ).rejects.toThrow(NotFoundError)
    })

    it("should reject an inactive parent", async () => {
      ledger.addDepartment(105, 10, { isActive: false })

      await expect(
        departments.validateEdge({ id: null, businessGroupId: 1, companyId: 10 }, 105)
      ).rejects.toThrow(InactiveNodeError)
    })

    it("should return the walked chain as a guard", async () => {
      const guard = await departments.validateEdge({ id: null, businessGroupId: 1, companyId: 10 }, 103)

      expect(guard).toEqual({
        parentId: 103,
        chain: [
          { id: 103, parentId: 102 },
          { id: 102, parentId: 101 },
          { id: 101, parentId: null },
        ],
      })
    })

    it("should allow a new department exactly five links below the root", async () => {
      // 101 -> 102 -> 103 -> 106 -> 107; a child of 107 is five links down
      ledger.addDepartment(106, 10, { parentId: 103 })
      ledger.addDepartment(107, 10, { parentId: 106 })

      const guard = await departments.validateEdge({ id: null, businessGroupId: 1, companyId: 10 }, 107)

      expect(guard.chain).toHaveLength(5)
    })

    it("should reject a new department six links below the root", async () => {
      ledger.addDepartment(106, 10, { parentId: 103 })
      ledger.addDepartment(107, 10, { parentId: 106 })
      ledger.addDepartment(108, 10, { parentId: 107 })

      const error = await departments
        .validateEdge({ id: null, businessGroupId: 1, companyId: 10 }, 108)
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(DepthExceededError)
      expect(error).toMatchObject({ details: { maxDepth: 5, resultingDepth: 6 } })
    })

    it("should count the height of a moved subtree", async () => {
      // 102 carries 103 below it; under 109 (four links down) 103 would sit six links down
      ledger.addDepartment(105, 10)
      ledger.addDepartment(106, 10, { parentId: 105 })
      ledger.addDepartment(107, 10, { parentId: 106 })
      ledger.addDepartment(108, 10, { parentId: 107 })
      ledger.addDepartment(109, 10, { parentId: 108 })

      const error = await departments
        .validateEdge({ id: 102, businessGroupId: 1, companyId: 10 }, 109)
        .catch((e: unknown) => e)

      expect(error).toMatchObject({ details: { maxDepth: 5, resultingDepth: 6 } })
    })

    it("should not bound reporting lines without a configured depth", async () => {
      for (let id = 1; id <= 10; id++) {
        ledger.addEmployee(id, 10, { supervisorId: id === 1 ? null : id - 1 })
      }

      const guard = await reporting.validateEdge({ id: null, businessGroupId: 1, companyId: 10 }, 10)

      expect(guard.chain).toHaveLength(10)
    })
  })

  describe("descendants", () => {
    it("should yield descendants breadth first", async () => {
      const ids: number[] = []
      for await (const id of departments.descendants(101)) {
        ids.push(id)
      }

      expect(ids).toEqual([102, 104, 103])
    })

    it("should start a fresh walk on every call", async () => {
      const first = await departments.collectDescendants(101)
      const second = await departments.collectDescendants(101)

      expect(second).toEqual(first)
    })

    it("should stop on looping data", async () => {
      ledger.addDepartment(301, 10, { parentId: 302 })
      ledger.addDepartment(302, 10, { parentId: 301 })

      expect(await departments.collectDescendants(301)).toEqual([302])
    })

    it("should yield nothing for a leaf", async () => {
      expect(await departments.collectDescendants(103)).toEqual([])
    })
  })

  describe("ancestorPath", () => {
    it("should return the node followed by its ancestors", async () => {
      expect(await departments.ancestorPath(103)).toEqual([103, 102, 101])
    })

    it("should return only the node for a root", async () => {
      expect(await departments.ancestorPath(101)).toEqual([101])
    })

    it("should throw NotFoundError for an unknown node", async () => {
      await expect(departments.ancestorPath(999)).rejects.toThrow(NotFoundError)
    })

    it("should stop at a loop in stored data", async () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined)
      ledger.addDepartment(301, 10, { parentId: 302 })
      ledger.addDepartment(302, 10, { parentId: 301 })

      expect(await departments.ancestorPath(301)).toEqual([301, 302])
      expect(warn).toHaveBeenCalledWith("[Hierarchy] Department 301 has a cyclic ancestry at 301")
      warn.mockRestore()
    })
  })

  describe("assertDeactivatable", () => {
    it("should reject a node with active children", async () => {
      const error = await departments.assertDeactivatable(101).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ActiveDescendantsError)
      expect(error).toMatchObject({ details: { id: 101, dependents: "sub-departments" } })
    })

    it("should accept a node whose children are all inactive", async () => {
      ledger.addDepartment(104, 10, { parentId: 101, isActive: false })
      ledger.addDepartment(102, 10, { parentId: 101, isActive: false })

      await expect(departments.assertDeactivatable(101)).resolves.toBeUndefined()
    })
  })
})
