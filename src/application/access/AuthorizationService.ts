/**
 * Authorization Service
 *
 * Entry point the other services use. Point operations run the full chain
 * (permission override, scope, role default); list operations get the
 * access filter predicate.
 */

import type { RecordPredicate } from "../../domain/access/Access"
import type { RolePolicyTable } from "../../shared/rbac/rbac"
import type { Action, Decision, Principal, ResourceRequest, TargetCoordinates } from "../../shared/types"
import { AuthorizationDeniedError } from "../../shared/errors"
import type { HierarchyValidator } from "../hierarchy/HierarchyValidator"
import type { AccessFilter } from "./AccessFilter"
import { overrideLayer, type PermissionOverride } from "./PermissionOverride"
import { resolveChain, type ChainResult, type ResolvedTarget, type ScopeResolver } from "./ScopeResolver"

export class AuthorizationService {
  constructor(
    private scopeResolver: ScopeResolver,
    private accessFilter: AccessFilter,
    private permissionOverride: PermissionOverride,
    private departmentHierarchy: HierarchyValidator,
    private roles: RolePolicyTable
  ) {}

  async check(
    principal: Principal,
    action: Action,
    target: TargetCoordinates,
    request?: ResourceRequest
  ): Promise<ChainResult> {
    const override = request
      ? await this.permissionOverride.lookup(principal.userId, request.resourcePath, request.method)
      : null
    const resolved = await this.resolveTarget(target)

    return resolveChain([overrideLayer, this.scopeResolver.scopeLayer, this.scopeResolver.roleLayer], {
      principal,
      action,
      target: resolved,
      override,
    })
  }

  async authorize(
    principal: Principal,
    action: Action,
    target: TargetCoordinates,
    request?: ResourceRequest
  ): Promise<Decision> {
    const result = await this.check(principal, action, target, request)
    return result.decision
  }

  async assertAuthorized(
    principal: Principal,
    action: Action,
    target: TargetCoordinates,
    request?: ResourceRequest
  ): Promise<void> {
    const result = await this.check(principal, action, target, request)
    if (result.decision === "allow") {
      return
    }

    console.warn(
      `[Authorization] Denied ${action} for user ${principal.userId} (role ${principal.roleLevel}) by ${result.decidedBy}`
    )
    throw new AuthorizationDeniedError(`Not allowed to ${action} this resource`, {
      action,
      decidedBy: result.decidedBy,
    })
  }

  /**
   * Predicate for a list request. Denies instead of returning a predicate
   * that admits nothing.
   */
  async listFilter(principal: Principal, request?: ResourceRequest): Promise<RecordPredicate> {
    const override = request
      ? await this.permissionOverride.lookup(principal.userId, request.resourcePath, request.method)
      : null

    if (override === false) {
      console.warn(`[Authorization] Listing denied for user ${principal.userId} by override`)
      throw new AuthorizationDeniedError("Not allowed to list this resource", { decidedBy: "override" })
    }
    if (override !== true && !this.roles.hasPermission(principal.roleLevel, "read")) {
      console.warn(`[Authorization] Listing denied for user ${principal.userId} (role ${principal.roleLevel})`)
      throw new AuthorizationDeniedError("Not allowed to list this resource", { decidedBy: "role" })
    }

    const predicate = this.accessFilter.buildFilter(principal, await this.departmentSubtrees(principal))
    if (predicate.kind === "none") {
      console.warn(`[Authorization] User ${principal.userId} has no reachable records`)
      throw new AuthorizationDeniedError("No organizational scope grants access", { decidedBy: "scope" })
    }
    return predicate
  }

  async resolveTarget(target: TargetCoordinates): Promise<ResolvedTarget> {
    const departmentId = target.departmentId ?? null
    const departmentPath = departmentId === null ? [] : await this.departmentHierarchy.ancestorPath(departmentId)
    return { ...target, departmentPath }
  }

  private async departmentSubtrees(principal: Principal): Promise<Map<number, number[]>> {
    const subtrees = new Map<number, number[]>()
    for (const scope of principal.scopes) {
      if (scope.type === "department" && !subtrees.has(scope.id)) {
        subtrees.set(scope.id, [scope.id, ...(await this.departmentHierarchy.collectDescendants(scope.id))])
      }
    }
    return subtrees
  }
}
