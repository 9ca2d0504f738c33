/**
 * Employees API Handlers (Lambda Functions)
 *
 * GET    /api/v1/employees                        - List readable employees
 * POST   /api/v1/employees                        - Create employee
 * GET    /api/v1/employees/{id}                   - Get employee
 * PATCH  /api/v1/employees/{id}                   - Update (including supervisor)
 * DELETE /api/v1/employees/{id}                   - Deactivate
 * GET    /api/v1/employees/{id}/subordinates      - Direct reports
 * GET    /api/v1/employees/{id}/supervisor-chain  - Reporting line upwards
 * GET    /api/v1/employees/{id}/team-tree         - Nested reporting tree
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

const TAG = "Employees"

const id = z.number().int().positive()

const CreateEmployeeSchema = z.object({
  businessGroupId: id,
  companyId: id,
  branchId: id.nullable().optional(),
  departmentId: id.nullable().optional(),
  supervisorId: id.nullable().optional(),
  userId: id.nullable().optional(),
  employeeCode: z.string().min(1),
  displayName: z.string().min(1),
  email: z.string().nullable().optional(),
  hireDate: z.string().nullable().optional(),
})

const UpdateEmployeeSchema = z.object({
  branchId: id.nullable().optional(),
  departmentId: id.nullable().optional(),
  supervisorId: id.nullable().optional(),
  userId: id.nullable().optional(),
  employeeCode: z.string().min(1).optional(),
  displayName: z.string().min(1).optional(),
  email: z.string().nullable().optional(),
  hireDate: z.string().nullable().optional(),
})

export const listEmployeesHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const employees = await employeeService.listEmployees(principal, listFilter(event), resourceRequest(event))
  return jsonResponse(200, { employees })
})

export const createEmployeeHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, CreateEmployeeSchema)
  const employee = await employeeService.createEmployee(principal, input, resourceRequest(event))
  return jsonResponse(201, { employee })
})

export const getEmployeeHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const employee = await employeeService.getEmployee(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { employee })
})

export const updateEmployeeHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const updates = parseBody(event, UpdateEmployeeSchema)
  const employee = await employeeService.updateEmployee(principal, pathId(event, "id"), updates, resourceRequest(event))
  return jsonResponse(200, { employee })
})

export const deactivateEmployeeHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  await employeeService.deactivateEmployee(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { success: true })
})

export const getSubordinatesHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const subordinates = await employeeService.getSubordinates(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { subordinates })
})

export const getSupervisorChainHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const chain = await employeeService.getSupervisorChain(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { chain })
})

export const getTeamTreeHandler = withErrorHandling(TAG, async (event) => {
  const { employeeService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const team = await employeeService.getTeamTree(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { team })
})
