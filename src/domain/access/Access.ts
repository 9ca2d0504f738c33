/**
 * Access Domain
 *
 * Scope assignments, per-user permission grants and the record predicates
 * produced by the access filter.
 */

import type { HttpMethod, OrgCoordinates, ScopeType } from "../../shared/types"

export type FilterField =
  | "id"
  | "parentId"
  | "businessGroupId"
  | "companyId"
  | "branchId"
  | "departmentId"
  | "ownerUserId"
  | "isActive"

export type FilterValue = number | boolean | null

/**
 * Storage-independent predicate over record coordinates. Repositories
 * compile it to their own query language.
 */
export type RecordPredicate =
  | { kind: "all" }
  | { kind: "none" }
  | { kind: "eq"; field: FilterField; value: FilterValue }
  | { kind: "in"; field: FilterField; values: readonly number[] }
  | { kind: "present"; field: FilterField }
  | { kind: "and"; clauses: readonly RecordPredicate[] }
  | { kind: "or"; clauses: readonly RecordPredicate[] }

export type FilterableRecord = Partial<Record<FilterField, FilterValue>>

export interface UserScope {
  userId: number
  scopeType: ScopeType
  scopeId: number
  businessGroupId: number | null
  companyId: number | null
  createdBy: number | null
  createdAt: Date
}

export interface NewUserScope {
  userId: number
  scopeType: ScopeType
  scopeId: number
  businessGroupId: number | null
  companyId: number | null
  createdBy: number | null
}

export interface UserScopeRepository {
  findByUser(userId: number): Promise<UserScope[]>
  // rejects an existing (user, type, id) with UniquenessConflictError
  create(scope: NewUserScope): Promise<UserScope>
  // rejects a missing assignment with NotFoundError
  delete(userId: number, scopeType: ScopeType, scopeId: number): Promise<void>
}

export interface PermissionGrant {
  userId: number
  resourcePath: string
  method: HttpMethod
  allow: boolean
  updatedBy: number | null
  updatedAt: Date
}

export interface GrantInput {
  resourcePath: string
  method: HttpMethod
  allow: boolean
}

export interface PermissionGrantRepository {
  findGrant(userId: number, resourcePath: string, method: HttpMethod): Promise<PermissionGrant | null>
  findByUser(userId: number): Promise<PermissionGrant[]>
  // fails with ValidationError when a new grant would exceed maxGrants
  upsert(userId: number, grant: GrantInput, updatedBy: number | null, maxGrants: number): Promise<PermissionGrant>
  delete(userId: number, resourcePath: string, method: HttpMethod): Promise<void>
  // replaces every grant of the user in one transaction
  replaceAll(userId: number, grants: GrantInput[], updatedBy: number | null): Promise<PermissionGrant[]>
}

/**
 * A login account. Authentication happens upstream; this is only the part
 * authorization needs, including where the user sits in the organization.
 */
export interface UserAccount extends OrgCoordinates {
  id: number
  roleLevel: number
  isActive: boolean
}

export interface UserDirectory {
  findUser(id: number): Promise<UserAccount | null>
}
