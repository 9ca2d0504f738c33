/**
 * AuthorizationService Unit Tests
 */

import { AuthorizationDeniedError, NotFoundError } from "../../../src/shared/errors"
import { ADMIN, COLLABORATOR, MANAGER, SUPERVISOR, buildServices, principal, type ServiceStack } from "../../fakes/services"

describe("AuthorizationService", () => {
  let stack: ServiceStack

  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined)
    stack = buildServices()
    const { ledger } = stack
    ledger.addBusinessGroup(1)
    ledger.addCompany(10, 1)
    ledger.addCompany(20, 1)
    ledger.addDepartment(101, 10)
    ledger.addDepartment(102, 10, { parentId: 101 })
    ledger.addDepartment(103, 10, { parentId: 102 })
    ledger.addDepartment(201, 20)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  describe("check", () => {
    it("should resolve the department path of the target", async () => {
      const scoped = principal(7, SUPERVISOR, [{ type: "department", id: 101, companyId: 10 }])

      expect(await stack.authorization.check(scoped, "update", { companyId: 10, departmentId: 103 })).toEqual({
        decision: "allow",
        decidedBy: "role",
      })
      expect(await stack.authorization.authorize(scoped, "update", { companyId: 20, departmentId: 201 })).toBe("deny")
    })

    it("should let an explicit deny win over a role that allows", async () => {
      stack.ledger.grantRows.push({
        userId: 1,
        resourcePath: "/api/v1/departments",
        method: "DELETE",
        allow: false,
        updatedBy: null,
        updatedAt: new Date(),
      })

      const result = await stack.authorization.check(principal(1, ADMIN), "delete", { companyId: 10 }, {
        resourcePath: "/api/v1/departments/101",
        method: "DELETE",
      })

      expect(result).toEqual({ decision: "deny", decidedBy: "override" })
    })

    it("should let an explicit allow win over a role that denies", async () => {
      stack.ledger.grantRows.push({
        userId: 42,
        resourcePath: "/api/v1/employees/5",
        method: "PUT",
        allow: true,
        updatedBy: null,
        updatedAt: new Date(),
      })

      const result = await stack.authorization.check(principal(42, COLLABORATOR), "update", { companyId: 20 }, {
        resourcePath: "/api/v1/employees/5",
        method: "PUT",
      })

      expect(result).toEqual({ decision: "allow", decidedBy: "override" })
    })

    it("should ignore grants without a request", async () => {
      stack.ledger.grantRows.push({
        userId: 42,
        resourcePath: "/api/v1/employees",
        method: "PUT",
        allow: true,
        updatedBy: null,
        updatedAt: new Date(),
      })

      expect(await stack.authorization.authorize(principal(42, COLLABORATOR), "update", { companyId: 20 })).toBe("deny")
    })

    it("should reject a target in an unknown department", async () => {
      await expect(
        stack.authorization.check(principal(1, ADMIN), "read", { companyId: 10, departmentId: 999 })
      ).rejects.toThrow(NotFoundError)
    })
  })

  describe("assertAuthorized", () => {
    it("should throw AuthorizationDeniedError naming the deciding layer", async () => {
      const error = await stack.authorization
        .assertAuthorized(principal(5, MANAGER, [{ type: "company", id: 10, companyId: 10 }]), "read", { companyId: 20 })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(AuthorizationDeniedError)
      expect(error).toMatchObject({ statusCode: 403, details: { action: "read", decidedBy: "scope" } })
    })
  })

  describe("listFilter", () => {
    it("should expand department scopes to their subtree", async () => {
      const scoped = principal(1, ADMIN, [{ type: "department", id: 102, companyId: 10 }])

      expect(await stack.authorization.listFilter(scoped)).toEqual({
        kind: "in",
        field: "departmentId",
        values: [102, 103],
      })
    })

    it("should deny a role without read", async () => {
      const scoped = principal(7, SUPERVISOR, [{ type: "department", id: 101, companyId: 10 }])

      await expect(stack.authorization.listFilter(scoped)).rejects.toMatchObject({ details: { decidedBy: "role" } })
    })

    it("should deny a principal that reaches nothing", async () => {
      await expect(stack.authorization.listFilter(principal(5, MANAGER))).rejects.toMatchObject({
        details: { decidedBy: "scope" },
      })
    })

    it("should apply an explicit deny on the listing", async () => {
      stack.ledger.grantRows.push({
        userId: 1,
        resourcePath: "/api/v1/departments",
        method: "GET",
        allow: false,
        updatedBy: null,
        updatedAt: new Date(),
      })

      await expect(
        stack.authorization.listFilter(principal(1, ADMIN), { resourcePath: "/api/v1/departments", method: "GET" })
      ).rejects.toMatchObject({ details: { decidedBy: "override" } })
    })

    it("should let an explicit allow list without widening the rows", async () => {
      stack.ledger.grantRows.push({
        userId: 7,
        resourcePath: "/api/v1/departments",
        method: "GET",
        allow: true,
        updatedBy: null,
        updatedAt: new Date(),
      })
      const scoped = principal(7, SUPERVISOR, [{ type: "department", id: 103, companyId: 10 }])

      expect(
        await stack.authorization.listFilter(scoped, { resourcePath: "/api/v1/departments", method: "GET" })
      ).toEqual({ kind: "in", field: "departmentId", values: [103] })
    })
  })
})
