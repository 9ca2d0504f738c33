/**
 * Access Filter
 *
 * Turns a principal into a predicate over record coordinates for list
 * queries. The predicate admits exactly the records the scope resolver would
 * allow the principal to read, given the same department subtrees.
 */

import type { FilterableRecord, RecordPredicate } from "../../domain/access/Access"
import type { RolePolicy, RolePolicyTable } from "../../shared/rbac/rbac"
import type { Principal, Scope } from "../../shared/types"
import { effectiveScopes } from "./ScopeResolver"

export const ALL: RecordPredicate = { kind: "all" }
export const NONE: RecordPredicate = { kind: "none" }

export function and(...clauses: RecordPredicate[]): RecordPredicate {
  return { kind: "and", clauses }
}

export function or(...clauses: RecordPredicate[]): RecordPredicate {
  return { kind: "or", clauses }
}

/**
 * Authorization predicate AND caller filter. The caller filter can only
 * narrow the result.
 */
export function restrict(authorization: RecordPredicate, caller?: RecordPredicate | null): RecordPredicate {
  if (!caller || caller.kind === "all") {
    return authorization
  }
  if (authorization.kind === "all") {
    return caller
  }
  return and(authorization, caller)
}

export function matches(predicate: RecordPredicate, record: FilterableRecord): boolean {
  switch (predicate.kind) {
    case "all":
      return true
    case "none":
      return false
    case "eq": {
      const value = record[predicate.field] ?? null
      return value === predicate.value
    }
    case "in": {
      const value = record[predicate.field]
      return typeof value === "number" && predicate.values.includes(value)
    }
    case "present":
      return (record[predicate.field] ?? null) !== null
    case "and":
      return predicate.clauses.every((clause) => matches(clause, record))
    case "or":
      return predicate.clauses.some((clause) => matches(clause, record))
  }
}

export function scopePredicate(
  scope: Scope,
  role: RolePolicy,
  subtrees: ReadonlyMap<number, readonly number[]>
): RecordPredicate {
  switch (scope.type) {
    case "business_group":
      return { kind: "eq", field: "businessGroupId", value: scope.id }
    case "company":
      return { kind: "eq", field: "companyId", value: scope.id }
    case "branch": {
      const inBranch: RecordPredicate = { kind: "eq", field: "branchId", value: scope.id }
      if (!role.branchScopeCoversCorporate || scope.companyId === null) {
        return inBranch
      }
      return or(
        inBranch,
        and(
          { kind: "eq", field: "companyId", value: scope.companyId },
          { kind: "eq", field: "branchId", value: null },
          { kind: "present", field: "departmentId" }
        )
      )
    }
    case "department": {
      const subtree = subtrees.get(scope.id) ?? []
      const values = subtree.includes(scope.id) ? [...subtree] : [scope.id, ...subtree]
      return { kind: "in", field: "departmentId", values }
    }
  }
}

export class AccessFilter {
  constructor(private roles: RolePolicyTable) {}

  /**
   * `subtrees` maps each department scope id to the ids below it. Missing
   * entries restrict a department scope to the department itself.
   */
  buildFilter(principal: Principal, subtrees: ReadonlyMap<number, readonly number[]> = new Map()): RecordPredicate {
    const role = this.roles.get(principal.roleLevel)
    if (!role) {
      return NONE
    }

    if (principal.scopes.length > 0) {
      const scopes = effectiveScopes(principal, role)
      if (scopes.length === 0) {
        return NONE
      }
      const predicates = scopes.map((scope) => scopePredicate(scope, role, subtrees))
      return predicates.length === 1 ? predicates[0] : or(...predicates)
    }

    if (role.unrestricted) {
      return ALL
    }
    if (role.selfOnly) {
      return { kind: "eq", field: "ownerUserId", value: principal.userId }
    }
    return NONE
  }
}
