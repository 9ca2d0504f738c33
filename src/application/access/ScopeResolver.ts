/**
 * Scope Resolver
 *
 * Decides whether a principal may perform an action on a target record from
 * the role table and the principal's scope assignments. Decisions are made
 * by an ordered chain of layers where the first layer that does not abstain
 * wins; when every layer abstains the answer is deny.
 */

import type { RolePolicy, RolePolicyTable } from "../../shared/rbac/rbac"
import type { Action, Decision, Principal, Scope, TargetCoordinates } from "../../shared/types"

export type Verdict = Decision | "abstain"

/**
 * Target coordinates plus the target's department and every department
 * above it, nearest first.
 */
export interface ResolvedTarget extends TargetCoordinates {
  departmentPath: readonly number[]
}

export interface AccessRequest {
  principal: Principal
  action: Action
  target: ResolvedTarget
  // explicit per-user grant for the request, null when none applies
  override: boolean | null
}

export interface AccessLayer {
  readonly name: string
  resolve(request: AccessRequest): Verdict
}

export interface ChainResult {
  decision: Decision
  decidedBy: string
}

export function resolveChain(layers: readonly AccessLayer[], request: AccessRequest): ChainResult {
  for (const layer of layers) {
    const verdict = layer.resolve(request)
    if (verdict !== "abstain") {
      return { decision: verdict, decidedBy: layer.name }
    }
  }
  return { decision: "deny", decidedBy: "default" }
}

export function toResolvedTarget(target: TargetCoordinates | ResolvedTarget): ResolvedTarget {
  if ("departmentPath" in target) {
    return target
  }
  const departmentId = target.departmentId ?? null
  return { ...target, departmentPath: departmentId === null ? [] : [departmentId] }
}

/**
 * Scopes a role may actually use. A scope of a type the role no longer
 * permits still narrows the principal but grants nothing.
 */
export function effectiveScopes(principal: Principal, role: RolePolicy): Scope[] {
  return principal.scopes.filter((scope) => role.scopeTypes.includes(scope.type))
}

export function scopeContains(scope: Scope, target: ResolvedTarget, role: RolePolicy): boolean {
  switch (scope.type) {
    case "business_group":
      return target.businessGroupId === scope.id
    case "company":
      return target.companyId === scope.id
    case "branch":
      if (target.branchId === scope.id) {
        return true
      }
      return (
        role.branchScopeCoversCorporate &&
        scope.companyId !== null &&
        target.companyId === scope.companyId &&
        (target.branchId ?? null) === null &&
        target.departmentPath.length > 0
      )
    case "department":
      return target.departmentPath.includes(scope.id)
  }
}

export class ScopeResolver {
  readonly scopeLayer: AccessLayer
  readonly roleLayer: AccessLayer

  constructor(private roles: RolePolicyTable) {
    this.scopeLayer = {
      name: "scope",
      resolve: (request) => this.resolveScope(request),
    }
    this.roleLayer = {
      name: "role",
      resolve: (request) => this.resolveRole(request),
    }
  }

  authorize(principal: Principal, action: Action, target: TargetCoordinates | ResolvedTarget): Decision {
    return this.decide(principal, action, target).decision
  }

  decide(principal: Principal, action: Action, target: TargetCoordinates | ResolvedTarget): ChainResult {
    return resolveChain([this.scopeLayer, this.roleLayer], {
      principal,
      action,
      target: toResolvedTarget(target),
      override: null,
    })
  }

  // narrows: denies targets outside the principal's reach, never allows
  private resolveScope({ principal, target }: AccessRequest): Verdict {
    const role = this.roles.get(principal.roleLevel)
    if (!role) {
      return "deny"
    }

    if (principal.scopes.length > 0) {
      const contained = effectiveScopes(principal, role).some((scope) => scopeContains(scope, target, role))
      return contained ? "abstain" : "deny"
    }

    if (role.selfOnly) {
      return target.ownerUserId === principal.userId ? "abstain" : "deny"
    }

    return "abstain"
  }

  // runs after the scope layer has narrowed the target
  private resolveRole({ principal, action }: AccessRequest): Verdict {
    const role = this.roles.get(principal.roleLevel)
    if (!role || !role.actions.includes(action)) {
      return "deny"
    }
    if (principal.scopes.length > 0 || role.unrestricted || role.selfOnly) {
      return "allow"
    }
    return "deny"
  }
}
