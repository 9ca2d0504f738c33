/**
 * Organization Domain Entities
 *
 * Business groups own companies, companies own branches. A branch may be the
 * company's headquarters; there is at most one per company.
 */

import type { RecordPredicate, FilterableRecord } from "../access/Access"
import type { TargetCoordinates } from "../../shared/types"

export type OrganizationNodeKind = "business_group" | "company" | "branch"

export const NODE_LABELS: Record<OrganizationNodeKind, string> = {
  business_group: "Business group",
  company: "Company",
  branch: "Branch",
}

// records that keep a node from being deactivated while active
export const NODE_DEPENDENTS: Record<OrganizationNodeKind, string> = {
  business_group: "companies",
  company: "branches, departments or employees",
  branch: "departments or employees",
}

export interface BusinessGroup {
  id: number
  code: string
  name: string
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

export interface Company {
  id: number
  businessGroupId: number
  code: string
  name: string
  legalName: string | null
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

export interface Branch {
  id: number
  businessGroupId: number
  companyId: number
  code: string
  name: string
  isHeadquarters: boolean
  isActive: boolean
  createdAt: Date
  updatedAt: Date
}

export interface CreateBusinessGroupInput {
  code: string
  name: string
}

export interface CreateCompanyInput {
  businessGroupId: number
  code: string
  name: string
  legalName?: string | null
}

export interface CreateBranchInput {
  companyId: number
  code: string
  name: string
  isHeadquarters?: boolean
}

export interface NewBranch {
  businessGroupId: number
  companyId: number
  code: string
  name: string
  isHeadquarters: boolean
}

export interface OrganizationRepository {
  findBusinessGroup(id: number): Promise<BusinessGroup | null>
  findCompany(id: number): Promise<Company | null>
  findBranch(id: number): Promise<Branch | null>
  listBusinessGroups(filter: RecordPredicate): Promise<BusinessGroup[]>
  listCompanies(filter: RecordPredicate): Promise<Company[]>
  listBranches(filter: RecordPredicate): Promise<Branch[]>
  createBusinessGroup(input: CreateBusinessGroupInput): Promise<BusinessGroup>
  createCompany(input: CreateCompanyInput): Promise<Company>
  // a second headquarters for the company fails with UniquenessConflictError
  createBranch(input: NewBranch): Promise<Branch>
  hasActiveChildren(kind: OrganizationNodeKind, id: number): Promise<boolean>
  // fails with ActiveDescendantsError when a dependent was attached meanwhile
  deactivate(kind: OrganizationNodeKind, id: number): Promise<void>
}

export function businessGroupCoordinates(group: BusinessGroup): TargetCoordinates {
  return { businessGroupId: group.id }
}

export function companyCoordinates(company: Company): TargetCoordinates {
  return { businessGroupId: company.businessGroupId, companyId: company.id }
}

export function branchCoordinates(branch: Branch): TargetCoordinates {
  return { businessGroupId: branch.businessGroupId, companyId: branch.companyId, branchId: branch.id }
}

export function businessGroupRecord(group: BusinessGroup): FilterableRecord {
  return { id: group.id, businessGroupId: group.id, isActive: group.isActive }
}

export function companyRecord(company: Company): FilterableRecord {
  return {
    id: company.id,
    businessGroupId: company.businessGroupId,
    companyId: company.id,
    isActive: company.isActive,
  }
}

export function branchRecord(branch: Branch): FilterableRecord {
  return {
    id: branch.id,
    businessGroupId: branch.businessGroupId,
    companyId: branch.companyId,
    branchId: branch.id,
    isActive: branch.isActive,
  }
}
