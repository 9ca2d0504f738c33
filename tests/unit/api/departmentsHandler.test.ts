/**
 * Departments handler tests
 */

import { getContainer } from "../../../src/interfaces/api/container"
import {
  createDepartmentHandler,
  getDepartmentHandler,
  getDepartmentHierarchyPathHandler,
  listDepartmentsHandler,
  updateDepartmentHandler,
} from "../../../src/interfaces/api/departments/departmentsHandler"
import { apiEvent } from "../../fakes/apiEvent"
import { MANAGER, SUPERVISOR, buildServices, type ServiceStack } from "../../fakes/services"

jest.mock("../../../src/interfaces/api/container", () => ({
  getContainer: jest.fn(),
}))

describe("departments handlers", () => {
  let stack: ServiceStack

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined)
    jest.spyOn(console, "warn").mockImplementation(() => undefined)
    jest.spyOn(console, "error").mockImplementation(() => undefined)

    stack = buildServices()
    const { ledger } = stack
    ledger.addBusinessGroup(1)
    ledger.addCompany(10, 1)
    ledger.addCompany(20, 1)
    ledger.addDepartment(101, 10)
    ledger.addDepartment(102, 10, { parentId: 101 })
    ledger.addDepartment(201, 20)
    ledger.scopeRows.push({
      userId: 5,
      scopeType: "company",
      scopeId: 10,
      businessGroupId: 1,
      companyId: 10,
      createdBy: 1,
      createdAt: new Date(),
    })

    jest.mocked(getContainer).mockReturnValue(stack)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it("should list the departments the caller can read", async () => {
    const response = await listDepartmentsHandler(
      apiEvent({ method: "GET", path: "/api/v1/departments", caller: { userId: 5, roleLevel: MANAGER } })
    )

    expect(response.statusCode).toBe(200)
    const body: { departments: Array<{ id: number }> } = JSON.parse(response.body)
    expect(body.departments.map((d) => d.id)).toEqual([101, 102])
  })

  it("should apply query string filters", async () => {
    const response = await listDepartmentsHandler(
      apiEvent({ method: "GET", path: "/api/v1/departments", queryStringParameters: { companyId: "20" } })
    )

    const body: { departments: Array<{ id: number }> } = JSON.parse(response.body)
    expect(body.departments.map((d) => d.id)).toEqual([201])
  })

  it("should answer 401 without an authenticated caller", async () => {
    const response = await listDepartmentsHandler(apiEvent({ method: "GET", path: "/api/v1/departments", caller: null }))

    expect(response.statusCode).toBe(401)
    expect(JSON.parse(response.body)).toEqual({ error: "Unauthorized", code: "AUTHENTICATION_ERROR" })
  })

  it("should answer 403 for a department outside the caller's scope", async () => {
    const response = await getDepartmentHandler(
      apiEvent({
        method: "GET",
        path: "/api/v1/departments/201",
        pathParameters: { id: "201" },
        caller: { userId: 5, roleLevel: MANAGER },
      })
    )

    expect(response.statusCode).toBe(403)
    expect(JSON.parse(response.body)).toMatchObject({ code: "AUTHORIZATION_DENIED", details: { decidedBy: "scope" } })
  })

  it("should answer 403 when a role without read lists departments", async () => {
    const response = await listDepartmentsHandler(
      apiEvent({ method: "GET", path: "/api/v1/departments", caller: { userId: 6, roleLevel: SUPERVISOR } })
    )

    expect(response.statusCode).toBe(403)
  })

  it("should create a department from a valid body", async () => {
    const response = await createDepartmentHandler(
      apiEvent({
        method: "POST",
        path: "/api/v1/departments",
        body: { companyId: 10, parentId: 102, code: "AUD", name: "Audit" },
      })
    )

    expect(response.statusCode).toBe(201)
    expect(JSON.parse(response.body)).toMatchObject({ department: { id: 1000, parentId: 102, code: "AUD" } })
  })

  it("should answer 400 for an invalid body", async () => {
    const response = await createDepartmentHandler(
      apiEvent({ method: "POST", path: "/api/v1/departments", body: { companyId: 10, name: "Audit" } })
    )

    expect(response.statusCode).toBe(400)
    expect(JSON.parse(response.body)).toMatchObject({ code: "VALIDATION_ERROR" })
  })

  it("should answer 422 for a cycle", async () => {
    const response = await updateDepartmentHandler(
      apiEvent({
        method: "PATCH",
        path: "/api/v1/departments/101",
        pathParameters: { id: "101" },
        body: { parentId: 102 },
      })
    )

    expect(response.statusCode).toBe(422)
    expect(JSON.parse(response.body)).toMatchObject({ code: "CYCLE", details: { childId: 101, parentId: 102 } })
  })

  it("should answer 400 for a malformed id", async () => {
    const response = await getDepartmentHandler(
      apiEvent({ method: "GET", path: "/api/v1/departments/abc", pathParameters: { id: "abc" } })
    )

    expect(response.statusCode).toBe(400)
  })

  it("should return the hierarchy path", async () => {
    const response = await getDepartmentHierarchyPathHandler(
      apiEvent({ method: "GET", path: "/api/v1/departments/102/hierarchy-path", pathParameters: { id: "102" } })
    )

    const body: { path: Array<{ id: number }> } = JSON.parse(response.body)
    expect(body.path.map((d) => d.id)).toEqual([102, 101])
  })

  it("should hide unexpected errors behind a 500", async () => {
    jest.mocked(getContainer).mockImplementation(() => {
      throw new Error("connection reset")
    })

    const response = await listDepartmentsHandler(apiEvent({ method: "GET", path: "/api/v1/departments" }))

    expect(response.statusCode).toBe(500)
    expect(JSON.parse(response.body)).toEqual({ error: "Internal server error", code: "INTERNAL_ERROR" })
  })
})
