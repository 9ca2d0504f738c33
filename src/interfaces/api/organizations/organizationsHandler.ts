/**
 * Organizations API Handlers (Lambda Functions)
 *
 * GET    /api/v1/business-groups        - List readable business groups
 * POST   /api/v1/business-groups        - Create business group
 * GET    /api/v1/business-groups/{id}   - Get business group
 * DELETE /api/v1/business-groups/{id}   - Deactivate business group
 * (same routes under /api/v1/companies and /api/v1/branches)
 */

import { z } from "zod"
import type { OrganizationNodeKind } from "../../../domain/organization/Organization"
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

const TAG = "Organizations"

const CreateBusinessGroupSchema = z.object({
  code: z.string().min(1).max(50),
  name: z.string().min(1).max(200),
})

const CreateCompanySchema = z.object({
  businessGroupId: z.number().int().positive(),
  code: z.string().min(1).max(50),
  name: z.string().min(1).max(200),
  legalName: z.string().max(300).nullable().optional(),
})

const CreateBranchSchema = z.object({
  companyId: z.number().int().positive(),
  code: z.string().min(1).max(50),
  name: z.string().min(1).max(200),
  isHeadquarters: z.boolean().optional(),
})

export const listBusinessGroupsHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const businessGroups = await organizationService.listBusinessGroups(
    principal,
    listFilter(event),
    resourceRequest(event)
  )
  return jsonResponse(200, { businessGroups })
})

export const createBusinessGroupHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, CreateBusinessGroupSchema)
  const businessGroup = await organizationService.createBusinessGroup(principal, input, resourceRequest(event))
  return jsonResponse(201, { businessGroup })
})

export const getBusinessGroupHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const businessGroup = await organizationService.getBusinessGroup(
    principal,
    pathId(event, "id"),
    resourceRequest(event)
  )
  return jsonResponse(200, { businessGroup })
})

export const listCompaniesHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const companies = await organizationService.listCompanies(principal, listFilter(event), resourceRequest(event))
  return jsonResponse(200, { companies })
})

export const createCompanyHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, CreateCompanySchema)
  const company = await organizationService.createCompany(principal, input, resourceRequest(event))
  return jsonResponse(201, { company })
})

export const getCompanyHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const company = await organizationService.getCompany(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { company })
})

export const listBranchesHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const branches = await organizationService.listBranches(principal, listFilter(event), resourceRequest(event))
  return jsonResponse(200, { branches })
})

export const createBranchHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const input = parseBody(event, CreateBranchSchema)
  const branch = await organizationService.createBranch(principal, input, resourceRequest(event))
  return jsonResponse(201, { branch })
})

export const getBranchHandler = withErrorHandling(TAG, async (event) => {
  const { organizationService, scopeService } = getContainer()
  const principal = await resolvePrincipal(event, scopeService)
  const branch = await organizationService.getBranch(principal, pathId(event, "id"), resourceRequest(event))
  return jsonResponse(200, { branch })
})

function deactivateHandler(kind: OrganizationNodeKind) {
  return withErrorHandling(TAG, async (event) => {
    const { organizationService, scopeService } = getContainer()
    const principal = await resolvePrincipal(event, scopeService)
    await organizationService.deactivate(principal, kind, pathId(event, "id"), resourceRequest(event))
    return jsonResponse(200, { success: true })
  })
}

export const deactivateBusinessGroupHandler = deactivateHandler("business_group")
export const deactivateCompanyHandler = deactivateHandler("company")
export const deactivateBranchHandler = deactivateHandler("branch")
