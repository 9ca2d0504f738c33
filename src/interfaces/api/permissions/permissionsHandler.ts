/**
 * User Permissions API Handlers (Lambda Functions)
 *
 * GET    /api/v1/users/{userId}/permissions                 - Permission map
 * PUT    /api/v1/users/{userId}/permissions                 - Replace every grant
 * POST   /api/v1/users/{userId}/permissions                 - Set one grant
 * DELETE /api/v1/users/{userId}/permissions?path=&method=   - Revoke one grant
 */

import { z } from "zod"
import { HTTP_METHODS } from "../../../shared/types"
import { ValidationError } from "../../../shared/errors"
import { getContainer } from "../container"
import {
  jsonResponse,
  parseBody,
  pathId,
  resolvePrincipal,
  resourceRequest,
  withErrorHandling,
} from "../shared/http"

const TAG = "Permissions"

const ReplacePermissionsSchema = z.object({
  permissions: z.record(z.string(), z.record(z.string(), z.boolean())),
})

const GrantPermissionSchema = z.object({
  resourcePath: z.string().min(1),
  method: z.enum(HTTP_METHODS),
  allow: z.boolean(),
})

export const getPermissionsHandler = withErrorHandling(TAG, async (event) => {
  const { permissionService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const permissions = await permissionService.getUserPermissions(principal, pathId(event, "userId"))
  return jsonResponse(200, permissions)
})

export const replacePermissionsHandler = withErrorHandling(TAG, async (event) => {
  const { permissionService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const { permissions } = parseBody(event, ReplacePermissionsSchema)
  const result = await permissionService.replacePermissions(
    principal,
    pathId(event, "userId"),
    permissions,
    resourceRequest(event)
  )
  return jsonResponse(200, result)
})

export const grantPermissionHandler = withErrorHandling(TAG, async (event) => {
  const { permissionService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, GrantPermissionSchema)
  const grant = await permissionService.grantPermission(
    principal,
    pathId(event, "userId"),
    input,
    resourceRequest(event)
  )
  return jsonResponse(200, { grant })
})

export const revokePermissionHandler = withErrorHandling(TAG, async (event) => {
  const { permissionService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)

  const path = event.queryStringParameters?.path
  const method = event.queryStringParameters?.method
  if (!path || !method) {
    throw new ValidationError("path and method query parameters are required")
  }

  await permissionService.revokePermission(principal, pathId(event, "userId"), path, method, resourceRequest(event))
  return jsonResponse(200, { success: true })
})
