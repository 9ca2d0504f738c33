/**
 * Organization Service
 *
 * Business groups, companies and branches. Every operation is authorized
 * against the node's own coordinates; lists are restricted by the access
 * filter.
 */

import type {
  Branch,
  BusinessGroup,
  Company,
  CreateBranchInput,
  CreateBusinessGroupInput,
  CreateCompanyInput,
  OrganizationNodeKind,
  OrganizationRepository,
} from "../../domain/organization/Organization"
import {
  NODE_DEPENDENTS,
  NODE_LABELS,
  branchCoordinates,
  businessGroupCoordinates,
  companyCoordinates,
} from "../../domain/organization/Organization"
import type { RecordPredicate } from "../../domain/access/Access"
import type { Principal, ResourceRequest, TargetCoordinates } from "../../shared/types"
import { ActiveDescendantsError, InactiveNodeError, NotFoundError, ValidationError } from "../../shared/errors"
import type { AuthorizationService } from "../access/AuthorizationService"
import { restrict } from "../access/AccessFilter"

export class OrganizationService {
  constructor(
    private organizationRepository: OrganizationRepository,
    private authorization: AuthorizationService
  ) {}

  async createBusinessGroup(
    principal: Principal,
    input: CreateBusinessGroupInput,
    request?: ResourceRequest
  ): Promise<BusinessGroup> {
    this.requireCodeAndName(input.code, input.name)
    await this.authorization.assertAuthorized(principal, "create", {}, request)

    const group = await this.organizationRepository.createBusinessGroup({
      code: input.code.trim(),
      name: input.name.trim(),
    })
    console.log(`[Organization] Business group ${group.id} created by user ${principal.userId}`)
    return group
  }

  async createCompany(principal: Principal, input: CreateCompanyInput, request?: ResourceRequest): Promise<Company> {
    this.requireCodeAndName(input.code, input.name)

    const group = await this.organizationRepository.findBusinessGroup(input.businessGroupId)
    if (!group) {
      throw new NotFoundError("Business group", input.businessGroupId)
    }
    if (!group.isActive) {
      throw new InactiveNodeError("Business group", group.id)
    }

    await this.authorization.assertAuthorized(principal, "create", businessGroupCoordinates(group), request)

    const company = await this.organizationRepository.createCompany({
      businessGroupId: group.id,
      code: input.code.trim(),
      name: input.name.trim(),
      legalName: input.legalName ?? null,
    })
    console.log(`[Organization] Company ${company.id} created by user ${principal.userId}`)
    return company
  }

  async createBranch(principal: Principal, input: CreateBranchInput, request?: ResourceRequest): Promise<Branch> {
    this.requireCodeAndName(input.code, input.name)

    const company = await this.organizationRepository.findCompany(input.companyId)
    if (!company) {
      throw new NotFoundError("Company", input.companyId)
    }
    if (!company.isActive) {
      throw new InactiveNodeError("Company", company.id)
    }

    await this.authorization.assertAuthorized(principal, "create", companyCoordinates(company), request)

    const branch = await this.organizationRepository.createBranch({
      businessGroupId: company.businessGroupId,
      companyId: company.id,
      code: input.code.trim(),
      name: input.name.trim(),
      isHeadquarters: input.isHeadquarters ?? false,
    })
    console.log(`[Organization] Branch ${branch.id} created by user ${principal.userId}`)
    return branch
  }

  async getBusinessGroup(principal: Principal, id: number, request?: ResourceRequest): Promise<BusinessGroup> {
    const group = await this.organizationRepository.findBusinessGroup(id)
    if (!group) {
      throw new NotFoundError("Business group", id)
    }
    await this.authorization.assertAuthorized(principal, "read", businessGroupCoordinates(group), request)
    return group
  }

  async getCompany(principal: Principal, id: number, request?: ResourceRequest): Promise<Company> {
    const company = await this.organizationRepository.findCompany(id)
    if (!company) {
      throw new NotFoundError("Company", id)
    }
    await this.authorization.assertAuthorized(principal, "read", companyCoordinates(company), request)
    return company
  }

  async getBranch(principal: Principal, id: number, request?: ResourceRequest): Promise<Branch> {
    const branch = await this.organizationRepository.findBranch(id)
    if (!branch) {
      throw new NotFoundError("Branch", id)
    }
    await this.authorization.assertAuthorized(principal, "read", branchCoordinates(branch), request)
    return branch
  }

  async listBusinessGroups(
    principal: Principal,
    filter?: RecordPredicate,
    request?: ResourceRequest
  ): Promise<BusinessGroup[]> {
    const predicate = await this.authorization.listFilter(principal, request)
    const groups = await this.organizationRepository.listBusinessGroups(restrict(predicate, filter))
    return groups.sort((a, b) => a.name.localeCompare(b.name))
  }

  async listCompanies(principal: Principal, filter?: RecordPredicate, request?: ResourceRequest): Promise<Company[]> {
    const predicate = await this.authorization.listFilter(principal, request)
    const companies = await this.organizationRepository.listCompanies(restrict(predicate, filter))
    return companies.sort((a, b) => a.name.localeCompare(b.name))
  }

  async listBranches(principal: Principal, filter?: RecordPredicate, request?: ResourceRequest): Promise<Branch[]> {
    const predicate = await this.authorization.listFilter(principal, request)
    const branches = await this.organizationRepository.listBranches(restrict(predicate, filter))
    return branches.sort((a, b) => a.name.localeCompare(b.name))
  }

  async deactivate(
    principal: Principal,
    kind: OrganizationNodeKind,
    id: number,
    request?: ResourceRequest
  ): Promise<void> {
    const coordinates = await this.coordinatesOf(kind, id)
    await this.authorization.assertAuthorized(principal, "delete", coordinates, request)

    if (await this.organizationRepository.hasActiveChildren(kind, id)) {
      throw new ActiveDescendantsError(NODE_LABELS[kind], id, NODE_DEPENDENTS[kind])
    }

    await this.organizationRepository.deactivate(kind, id)
    console.log(`[Organization] ${NODE_LABELS[kind]} ${id} deactivated by user ${principal.userId}`)
  }

  private async coordinatesOf(kind: OrganizationNodeKind, id: number): Promise<TargetCoordinates> {
    switch (kind) {
      case "business_group": {
        const group = await this.organizationRepository.findBusinessGroup(id)
        if (!group) {
          throw new NotFoundError("Business group", id)
        }
        return businessGroupCoordinates(group)
      }
      case "company": {
        const company = await this.organizationRepository.findCompany(id)
        if (!company) {
          throw new NotFoundError("Company", id)
        }
        return companyCoordinates(company)
      }
      case "branch": {
        const branch = await this.organizationRepository.findBranch(id)
        if (!branch) {
          throw new NotFoundError("Branch", id)
        }
        return branchCoordinates(branch)
      }
    }
  }

  private requireCodeAndName(code: string, name: string): void {
    if (!code || !code.trim()) {
      throw new ValidationError("Code is required", "code")
    }
    if (!name || !name.trim()) {
      throw new ValidationError("Name is required", "name")
    }
  }
}
