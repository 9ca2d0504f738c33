/**
 * User Scopes API Handlers (Lambda Functions)
 *
 * GET    /api/v1/users/{userId}/scopes                        - List a user's scopes
 * POST   /api/v1/users/{userId}/scopes                        - Assign a scope
 * DELETE /api/v1/users/{userId}/scopes/{scopeType}/{scopeId}  - Revoke a scope
 */

import { z } from "zod"
import { SCOPE_TYPES, isScopeType } from "../../../shared/types"
import { ValidationError } from "../../../shared/errors"
import { getContainer } from "../container"
import {
  jsonResponse,
  parseBody,
  pathId,
  pathParameter,
  resolvePrincipal,
  resourceRequest,
  withErrorHandling,
} from "../shared/http"

const TAG = "Scopes"

const AssignScopeSchema = z.object({
  scopeType: z.enum(SCOPE_TYPES),
  scopeId: z.number().int().positive(),
})

export const listScopesHandler = withErrorHandling(TAG, async (event) => {
  const { scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const scopes = await scopeService.listScopes(principal, pathId(event, "userId"))
  return jsonResponse(200, { scopes })
})

export const assignScopeHandler = withErrorHandling(TAG, async (event) => {
  const { scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, AssignScopeSchema)
  const scope = await scopeService.assignScope(
    principal,
    { userId: pathId(event, "userId"), ...input },
    resourceRequest(event)
  )
  return jsonResponse(201, { scope })
})

export const revokeScopeHandler = withErrorHandling(TAG, async (event) => {
  const { scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)

  const scopeType = pathParameter(event, "scopeType")
  if (!isScopeType(scopeType)) {
    throw new ValidationError(`Unknown scope type ${scopeType}`, "scopeType")
  }

  await scopeService.revokeScope(
    principal,
    pathId(event, "userId"),
    scopeType,
    pathId(event, "scopeId"),
    resourceRequest(event)
  )
  return jsonResponse(200, { success: true })
})
