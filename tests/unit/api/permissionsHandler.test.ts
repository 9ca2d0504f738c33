/**
 * Permissions handler tests
 */

import { getContainer } from "../../../src/interfaces/api/container"
import {
  getPermissionsHandler,
  grantPermissionHandler,
  replacePermissionsHandler,
  revokePermissionHandler,
} from "../../../src/interfaces/api/permissions/permissionsHandler"
import { apiEvent } from "../../fakes/apiEvent"
import { COLLABORATOR, SUPERVISOR, buildServices, type ServiceStack } from "../../fakes/services"

jest.mock("../../../src/interfaces/api/container", () => ({
  getContainer: jest.fn(),
}))

const PATH = "/api/v1/users/7/permissions"

describe("permissions handlers", () => {
  let stack: ServiceStack

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined)
    jest.spyOn(console, "warn").mockImplementation(() => undefined)

    stack = buildServices()
    stack.ledger.addUser(7, COLLABORATOR)
    jest.mocked(getContainer).mockReturnValue(stack)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it("should replace every grant and answer with the permission map", async () => {
    stack.ledger.grantRows.push({
      userId: 7,
      resourcePath: "/api/v1/departments",
      method: "GET",
      allow: true,
      updatedBy: 1,
      updatedAt: new Date(),
    })

    const response = await replacePermissionsHandler(
      apiEvent({
        method: "PUT",
        path: PATH,
        pathParameters: { userId: "7" },
        body: { permissions: { "/api/v1/employees/": { get: true, DELETE: false } } },
      })
    )

    expect(response.statusCode).toBe(200)
    expect(JSON.parse(response.body)).toEqual({
      userId: 7,
      roleLevel: COLLABORATOR,
      permissions: { "/api/v1/employees": { GET: true, DELETE: false } },
    })
    expect(stack.ledger.grantRows.map((g) => `${g.method} ${g.resourcePath}`)).toEqual([
      "GET /api/v1/employees",
      "DELETE /api/v1/employees",
    ])
  })

  it("should reject a replacement with a bad path without touching existing grants", async () => {
    stack.ledger.grantRows.push({
      userId: 7,
      resourcePath: "/api/v1/departments",
      method: "GET",
      allow: true,
      updatedBy: 1,
      updatedAt: new Date(),
    })

    const response = await replacePermissionsHandler(
      apiEvent({
        method: "PUT",
        path: PATH,
        pathParameters: { userId: "7" },
        body: { permissions: { "/api/v1/employees": { GET: true }, "/admin": { GET: true } } },
      })
    )

    expect(response.statusCode).toBe(400)
    expect(JSON.parse(response.body)).toEqual({
      error: "Invalid resource path: /admin",
      code: "VALIDATION_ERROR",
      details: { field: "resourcePath" },
    })
    expect(stack.ledger.grantRows).toHaveLength(1)
  })

  it("should set a single grant", async () => {
    const response = await grantPermissionHandler(
      apiEvent({
        method: "POST",
        path: PATH,
        pathParameters: { userId: "7" },
        body: { resourcePath: "/api/v1/employees", method: "PATCH", allow: false },
      })
    )

    expect(response.statusCode).toBe(200)
    expect(JSON.parse(response.body)).toMatchObject({
      grant: { userId: 7, resourcePath: "/api/v1/employees", method: "PATCH", allow: false, updatedBy: 1 },
    })
  })

  it("should answer 400 for an unknown method", async () => {
    const response = await grantPermissionHandler(
      apiEvent({
        method: "POST",
        path: PATH,
        pathParameters: { userId: "7" },
        body: { resourcePath: "/api/v1/employees", method: "FETCH", allow: true },
      })
    )

    expect(response.statusCode).toBe(400)
    expect(stack.ledger.grantRows).toEqual([])
  })

  it("should require path and method to revoke", async () => {
    const response = await revokePermissionHandler(
      apiEvent({
        method: "DELETE",
        path: PATH,
        pathParameters: { userId: "7" },
        queryStringParameters: { path: "/api/v1/employees" },
      })
    )

    expect(response.statusCode).toBe(400)
    expect(JSON.parse(response.body)).toMatchObject({ error: "path and method query parameters are required" })
  })

  it("should answer 404 when revoking a grant that does not exist", async () => {
    const response = await revokePermissionHandler(
      apiEvent({
        method: "DELETE",
        path: PATH,
        pathParameters: { userId: "7" },
        queryStringParameters: { path: "/api/v1/employees", method: "delete" },
      })
    )

    expect(response.statusCode).toBe(404)
    expect(JSON.parse(response.body)).toMatchObject({ error: "Permission grant DELETE /api/v1/employees not found" })
  })

  it("should let users read their own permissions", async () => {
    const response = await getPermissionsHandler(
      apiEvent({
        method: "GET",
        path: PATH,
        pathParameters: { userId: "7" },
        caller: { userId: 7, roleLevel: COLLABORATOR },
      })
    )

    expect(response.statusCode).toBe(200)
    expect(JSON.parse(response.body)).toEqual({ userId: 7, roleLevel: COLLABORATOR, permissions: {} })
  })

  it("should answer 403 when the caller lacks administrative capability", async () => {
    const response = await grantPermissionHandler(
      apiEvent({
        method: "POST",
        path: PATH,
        pathParameters: { userId: "7" },
        body: { resourcePath: "/api/v1/employees", method: "GET", allow: true },
        caller: { userId: 3, roleLevel: SUPERVISOR },
      })
    )

    expect(response.statusCode).toBe(403)
    expect(JSON.parse(response.body)).toMatchObject({
      error: "Managing permissions requires administrative capability",
    })
  })
})
