/**
 * Shared Types
 */

export const SCOPE_TYPES = ["business_group", "company", "branch", "department"] as const

export type ScopeType = (typeof SCOPE_TYPES)[number]

export const ACTIONS = ["read", "create", "update", "delete"] as const

export type Action = (typeof ACTIONS)[number]

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const

export type HttpMethod = (typeof HTTP_METHODS)[number]

/**
 * Organizational coordinates of a record. Absent fields mean the record
 * does not hang below that level (a corporate department has no branch).
 */
export interface OrgCoordinates {
  businessGroupId?: number | null
  companyId?: number | null
  branchId?: number | null
  departmentId?: number | null
}

export interface TargetCoordinates extends OrgCoordinates {
  // user the record is linked to, used for self-access
  ownerUserId?: number | null
}

export interface Scope {
  type: ScopeType
  id: number
  // owning company of a branch or department scope
  companyId: number | null
}

/**
 * The authenticated caller. Lower role levels carry more authority.
 */
export interface Principal {
  userId: number
  roleLevel: number
  scopes: readonly Scope[]
}

export interface ResourceRequest {
  resourcePath: string
  method: HttpMethod
}

export type Decision = "allow" | "deny"

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value)
}

export function isScopeType(value: string): value is ScopeType {
  return SCOPE_TYPES.some((scopeType) => scopeType === value)
}
