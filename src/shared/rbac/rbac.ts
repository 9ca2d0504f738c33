/**
 * Role-Based Access Control (RBAC)
 *
 * Declarative role table: which actions a role level may perform and which
 * scope types it may be assigned. Loaded once from configuration, so adding
 * a tier never touches resolver code.
 */

import type { Action, ScopeType } from "../types"
import { AuthorizationDeniedError } from "../errors"

export interface RolePolicy {
  level: number
  name: string
  actions: readonly Action[]
  scopeTypes: readonly ScopeType[]
  // may see everything when no scope narrows it
  unrestricted: boolean
  // authorized only on records linked to the caller's own user
  selfOnly: boolean
  // a branch scope also covers the owning company's corporate departments
  branchScopeCoversCorporate: boolean
}

export interface AccessPolicy {
  adminCapabilityMaxLevel: number
  roles: readonly RolePolicy[]
}

export class RolePolicyTable {
  private readonly byLevel: ReadonlyMap<number, RolePolicy>

  constructor(private readonly policy: AccessPolicy) {
    this.byLevel = new Map(policy.roles.map((role) => [role.level, role]))
  }

  get(level: number): RolePolicy | null {
    return this.byLevel.get(level) ?? null
  }

  roles(): readonly RolePolicy[] {
    return [...this.policy.roles].sort((a, b) => a.level - b.level)
  }

  hasPermission(level: number, action: Action): boolean {
    const role = this.get(level)
    return role !== null && role.actions.includes(action)
  }

  requirePermission(level: number, action: Action): void {
    if (!this.hasPermission(level, action)) {
      throw new AuthorizationDeniedError(`Role level ${level} does not have permission to ${action}`)
    }
  }

  allowsScopeType(level: number, scopeType: ScopeType): boolean {
    const role = this.get(level)
    return role !== null && role.scopeTypes.includes(scopeType)
  }

  /**
   * Assigning scopes and permission grants needs at least this much authority.
   */
  hasAdministrativeCapability(level: number): boolean {
    return this.get(level) !== null && level <= this.policy.adminCapabilityMaxLevel
  }
}
