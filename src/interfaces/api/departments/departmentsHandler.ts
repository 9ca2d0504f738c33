/**
 * Departments API Handlers (Lambda Functions)
 *
 * GET    /api/v1/departments                      - List readable departments
 * POST   /api/v1/departments                      - Create department
 * GET    /api/v1/departments/{id}                 - Get department
 * PATCH  /api/v1/departments/{id}                 - Update (including re-parenting)
 * DELETE /api/v1/departments/{id}                 - Deactivate
 * GET    /api/v1/departments/{id}/children        - Direct sub-departments
 * GET    /api/v1/departments/{id}/hierarchy-path  - Path up to the corporate root
 * GET    /api/v1/departments/{id}/subtree         - Every department below
 */

import { z } from "zod"
import { getContainer } from "../container"
import {
  jsonResponse,
  listFilter,
  parseBody,
  pathId,
  resolvePrincipal,
  resourceRequest,
  withErrorHandling,
} from "../shared/http"

const TAG = "Departments"

const id = z.number().int().positive()

const CreateDepartmentSchema = z.object({
  companyId: id,
  branchId: id.nullable().optional(),
  parentId: id.nullable().optional(),
  code: z.string().min(1),
  name: z.string().min(1),
  description: z.string().nullable().optional(),
})

const UpdateDepartmentSchema = z.object({
  branchId: id.nullable().optional(),
  parentId: id.nullable().optional(),
  code: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  description: z.string().nullable().optional(),
})

export const listDepartmentsHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const departments = await departmentService.listDepartments(principal, listFilter(event), resourceRequest(event))
  return jsonResponse(200, { departments })
})

export const createDepartmentHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, CreateDepartmentSchema)
  const department = await departmentService.createDepartment(principal, input, resourceRequest(event))
  return jsonResponse(201, { department })
})

export const getDepartmentHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const department = await departmentService.getDepartment(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { department })
})

export const updateDepartmentHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const updates = parseBody(event, UpdateDepartmentSchema)
  const department = await departmentService.updateDepartment(
    principal,
    pathId(event, "id"),
    updates,
    resourceRequest(event)
  )
  return jsonResponse(200, { department })
})

export const deactivateDepartmentHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  await departmentService.deactivateDepartment(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { success: true })
})

export const getDepartmentChildrenHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const children = await departmentService.getChildren(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { children })
})

export const getDepartmentHierarchyPathHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const path = await departmentService.getHierarchyPath(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { path })
})

export const getDepartmentSubtreeHandler = withErrorHandling(TAG, async (event) => {
  const { departmentService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const departments = await departmentService.getSubtree(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { departments })
})
