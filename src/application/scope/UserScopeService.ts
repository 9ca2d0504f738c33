/**
 * User Scope Service
 *
 * Assigns and revokes organizational scopes and loads the scopes of an
 * authenticated caller. Assigning is itself authorized: the actor needs
 * administrative capability and must reach the scope node.
 */

import type { UserAccount, UserDirectory, UserScope, UserScopeRepository } from "../../domain/access/Access"
import type { DepartmentRepository } from "../../domain/department/Department"
import type { OrganizationRepository } from "../../domain/organization/Organization"
import {
  branchCoordinates,
  businessGroupCoordinates,
  companyCoordinates,
} from "../../domain/organization/Organization"
import { departmentCoordinates } from "../../domain/department/Department"
import type { RolePolicyTable } from "../../shared/rbac/rbac"
import type { Principal, ResourceRequest, ScopeType, TargetCoordinates } from "../../shared/types"
import { AuthorizationDeniedError, InactiveNodeError, NotFoundError, ValidationError } from "../../shared/errors"
import type { AuthorizationService } from "../access/AuthorizationService"

export interface AssignScopeInput {
  userId: number
  scopeType: ScopeType
  scopeId: number
}

interface ScopeNode {
  label: string
  isActive: boolean
  coordinates: TargetCoordinates
}

export class UserScopeService {
  constructor(
    private scopeRepository: UserScopeRepository,
    private organizationRepository: OrganizationRepository,
    private departmentRepository: DepartmentRepository,
    private userDirectory: UserDirectory,
    private authorization: AuthorizationService,
    private roles: RolePolicyTable
  ) {}

  /**
   * Builds the principal for an authenticated user from the scopes on record.
   */
  async loadPrincipal(userId: number, roleLevel: number): Promise<Principal> {
    const scopes = await this.scopeRepository.findByUser(userId)
    return {
      userId,
      roleLevel,
      scopes: scopes.map((scope) => ({
        type: scope.scopeType,
        id: scope.scopeId,
        companyId: scope.companyId,
      })),
    }
  }

  async listScopes(actor: Principal, userId: number): Promise<UserScope[]> {
    if (actor.userId !== userId) {
      this.requireAdministrativeCapability(actor)
    }
    return this.scopeRepository.findByUser(userId)
  }

  async assignScope(actor: Principal, input: AssignScopeInput, request?: ResourceRequest): Promise<UserScope> {
    this.requireAdministrativeCapability(actor)
    const user = await this.requireGrantee(actor, input.userId)
    if (!user.isActive) {
      throw new InactiveNodeError("User", user.id)
    }

    if (!this.roles.allowsScopeType(user.roleLevel, input.scopeType)) {
      const role = this.roles.get(user.roleLevel)
      throw new ValidationError(
        `Role ${role ? role.name : user.roleLevel} cannot be assigned a ${input.scopeType} scope`,
        "scopeType"
      )
    }

    const node = await this.resolveNode(input.scopeType, input.scopeId)
    if (!node.isActive) {
      throw new InactiveNodeError(node.label, input.scopeId)
    }

    await this.authorization.assertAuthorized(actor, "create", node.coordinates, request)

    const scope = await this.scopeRepository.create({
      userId: user.id,
      scopeType: input.scopeType,
      scopeId: input.scopeId,
      businessGroupId: node.coordinates.businessGroupId ?? null,
      companyId: node.coordinates.companyId ?? null,
      createdBy: actor.userId,
    })

    console.log(
      `[Scopes] ${input.scopeType} ${input.scopeId} assigned to user ${user.id} by user ${actor.userId}`
    )
    return scope
  }

  async revokeScope(
    actor: Principal,
    userId: number,
    scopeType: ScopeType,
    scopeId: number,
    request?: ResourceRequest
  ): Promise<void> {
    this.requireAdministrativeCapability(actor)
    await this.requireGrantee(actor, userId)

    const node = await this.resolveNode(scopeType, scopeId)
    await this.authorization.assertAuthorized(actor, "delete", node.coordinates, request)

    await this.scopeRepository.delete(userId, scopeType, scopeId)
    console.log(`[Scopes] ${scopeType} ${scopeId} revoked from user ${userId} by user ${actor.userId}`)
  }

  private requireAdministrativeCapability(actor: Principal): void {
    if (!this.roles.hasAdministrativeCapability(actor.roleLevel)) {
      console.warn(`[Scopes] User ${actor.userId} (role ${actor.roleLevel}) lacks administrative capability`)
      throw new AuthorizationDeniedError("Managing scopes requires administrative capability")
    }
  }

  // an actor can never manage a user who holds more authority
  private async requireGrantee(actor: Principal, userId: number): Promise<UserAccount> {
    const user = await this.userDirectory.findUser(userId)
    if (!user) {
      throw new NotFoundError("User", userId)
    }
    if (user.roleLevel < actor.roleLevel) {
      throw new AuthorizationDeniedError("Cannot manage a user with a higher role", { userId })
    }
    return user
  }

  private async resolveNode(scopeType: ScopeType, scopeId: number): Promise<ScopeNode> {
    switch (scopeType) {
      case "business_group": {
        const group = await this.organizationRepository.findBusinessGroup(scopeId)
        if (!group) {
          throw new NotFoundError("Business group", scopeId)
        }
        return { label: "Business group", isActive: group.isActive, coordinates: businessGroupCoordinates(group) }
      }
      case "company": {
        const company = await this.organizationRepository.findCompany(scopeId)
        if (!company) {
          throw new NotFoundError("Company", scopeId)
        }
        return { label: "Company", isActive: company.isActive, coordinates: companyCoordinates(company) }
      }
      case "branch": {
        const branch = await this.organizationRepository.findBranch(scopeId)
        if (!branch) {
          throw new NotFoundError("Branch", scopeId)
        }
        return { label: "Branch", isActive: branch.isActive, coordinates: branchCoordinates(branch) }
      }
      case "department": {
        const department = await this.departmentRepository.findById(scopeId)
        if (!department) {
          throw new NotFoundError("Department", scopeId)
        }
        return {
          label: "Department",
          isActive: department.isActive,
          coordinates: departmentCoordinates(department),
        }
      }
    }
  }
}
