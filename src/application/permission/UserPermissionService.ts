/**
 * User Permission Service
 *
 * Administration of per-user permission grants: read the permission map,
 * grant or revoke a single entry, or replace the whole set at once.
 */

import type {
  GrantInput,
  PermissionGrant,
  PermissionGrantRepository,
  UserAccount,
  UserDirectory,
} from "../../domain/access/Access"
import type { RolePolicyTable } from "../../shared/rbac/rbac"
import type { HttpMethod, Principal, ResourceRequest } from "../../shared/types"
import { isHttpMethod } from "../../shared/types"
import { AuthorizationDeniedError, NotFoundError, ValidationError } from "../../shared/errors"
import type { AuthorizationService } from "../access/AuthorizationService"
import { trimTrailingSlash } from "../access/PermissionOverride"

export type MethodGrants = Partial<Record<HttpMethod, boolean>>

export interface PermissionMap {
  userId: number
  roleLevel: number
  permissions: Record<string, MethodGrants>
}

// a full replacement (deletes, puts and the version bump) fits one DynamoDB transaction
export const MAX_GRANTS_PER_USER = 49

export function toPermissionMap(user: UserAccount, grants: readonly PermissionGrant[]): PermissionMap {
  const permissions: Record<string, MethodGrants> = {}
  for (const grant of grants) {
    const methods = permissions[grant.resourcePath] ?? {}
    methods[grant.method] = grant.allow
    permissions[grant.resourcePath] = methods
  }
  return { userId: user.id, roleLevel: user.roleLevel, permissions }
}

export class UserPermissionService {
  constructor(
    private grantRepository: PermissionGrantRepository,
    private userDirectory: UserDirectory,
    private authorization: AuthorizationService,
    private roles: RolePolicyTable
  ) {}

  async getUserPermissions(actor: Principal, userId: number): Promise<PermissionMap> {
    const user = await this.requireUser(userId)
    if (actor.userId !== userId) {
      await this.requireManageable(actor, user)
    }
    const grants = await this.grantRepository.findByUser(userId)
    return toPermissionMap(user, grants)
  }

  async grantPermission(
    actor: Principal,
    userId: number,
    input: GrantInput,
    request?: ResourceRequest
  ): Promise<PermissionGrant> {
    const grant = this.validateGrant(input.resourcePath, input.method, input.allow)
    const user = await this.requireUser(userId)
    await this.requireGrantAuthor(actor, user, grant.allow, request)

    const saved = await this.grantRepository.upsert(userId, grant, actor.userId, MAX_GRANTS_PER_USER)
    console.log(
      `[Permissions] ${grant.method} ${grant.resourcePath} set to ${grant.allow ? "allow" : "deny"} for user ${userId} by user ${actor.userId}`
    )
    return saved
  }

  async revokePermission(
    actor: Principal,
    userId: number,
    resourcePath: string,
    method: string,
    request?: ResourceRequest
  ): Promise<void> {
    const grant = this.validateGrant(resourcePath, method, false)
    const user = await this.requireUser(userId)
    await this.requireGrantAuthor(actor, user, false, request)

    await this.grantRepository.delete(userId, grant.resourcePath, grant.method)
    console.log(`[Permissions] ${grant.method} ${grant.resourcePath} revoked for user ${userId} by user ${actor.userId}`)
  }

  /**
   * Replaces every grant of the user. Either the whole set is stored or
   * nothing changes.
   */
  async replacePermissions(
    actor: Principal,
    userId: number,
    permissions: Record<string, Record<string, boolean>>,
    request?: ResourceRequest
  ): Promise<PermissionMap> {
    const grants = this.validatePermissionSet(permissions)
    const user = await this.requireUser(userId)
    await this.requireGrantAuthor(
      actor,
      user,
      grants.some((grant) => grant.allow),
      request
    )

    const saved = await this.grantRepository.replaceAll(userId, grants, actor.userId)
    console.log(`[Permissions] Replaced ${saved.length} grants for user ${userId} by user ${actor.userId}`)
    return toPermissionMap(user, saved)
  }

  private validatePermissionSet(permissions: Record<string, Record<string, boolean>>): GrantInput[] {
    const grants: GrantInput[] = []
    const seen = new Set<string>()

    for (const [resourcePath, methods] of Object.entries(permissions)) {
      for (const [method, allow] of Object.entries(methods)) {
        const grant = this.validateGrant(resourcePath, method, allow)
        const key = `${grant.method} ${grant.resourcePath}`
        if (seen.has(key)) {
          throw new ValidationError(`Duplicate grant for ${key}`, "permissions")
        }
        seen.add(key)
        grants.push(grant)
      }
    }

    if (grants.length > MAX_GRANTS_PER_USER) {
      throw new ValidationError(`A user can hold at most ${MAX_GRANTS_PER_USER} grants`, "permissions")
    }
    return grants
  }

  private validateGrant(resourcePath: string, method: string, allow: boolean): GrantInput {
    const path = trimTrailingSlash(resourcePath.trim())
    if (!path.startsWith("/api/")) {
      throw new ValidationError(`Invalid resource path: ${resourcePath}`, "resourcePath")
    }
    const normalizedMethod = method.toUpperCase()
    if (!isHttpMethod(normalizedMethod)) {
      throw new ValidationError(`Invalid method: ${method}`, "method")
    }
    if (typeof allow !== "boolean") {
      throw new ValidationError(`Grant for ${normalizedMethod} ${path} must be true or false`, "allow")
    }
    return { resourcePath: path, method: normalizedMethod, allow }
  }

  private async requireUser(userId: number): Promise<UserAccount> {
    const user = await this.userDirectory.findUser(userId)
    if (!user) {
      throw new NotFoundError("User", userId)
    }
    return user
  }

  /**
   * Grants bypass scope checks. They can only be changed on users of a
   * lower role than the actor, and an allow only comes from an unrestricted
   * role that holds no scope.
   */
  private async requireGrantAuthor(
    actor: Principal,
    user: UserAccount,
    allows: boolean,
    request?: ResourceRequest
  ): Promise<void> {
    if (actor.userId === user.id) {
      console.warn(`[Permissions] User ${actor.userId} tried to change their own grants`)
      throw new AuthorizationDeniedError("Cannot change your own permission grants")
    }
    await this.requireManageable(actor, user, request)
    if (user.roleLevel <= actor.roleLevel) {
      throw new AuthorizationDeniedError("Grants can only be changed for a user with a lower role", { userId: user.id })
    }
    const role = this.roles.get(actor.roleLevel)
    if (allows && !(role?.unrestricted && actor.scopes.length === 0)) {
      console.warn(`[Permissions] User ${actor.userId} (role ${actor.roleLevel}) cannot author allow grants`)
      throw new AuthorizationDeniedError("Only an unrestricted role without scopes can grant access", {
        userId: user.id,
      })
    }
  }

  private async requireManageable(actor: Principal, user: UserAccount, request?: ResourceRequest): Promise<void> {
    if (!this.roles.hasAdministrativeCapability(actor.roleLevel)) {
      console.warn(`[Permissions] User ${actor.userId} (role ${actor.roleLevel}) lacks administrative capability`)
      throw new AuthorizationDeniedError("Managing permissions requires administrative capability")
    }
    if (user.roleLevel < actor.roleLevel) {
      throw new AuthorizationDeniedError("Cannot manage a user with a higher role", { userId: user.id })
    }
    await this.authorization.assertAuthorized(
      actor,
      "update",
      {
        businessGroupId: user.businessGroupId,
        companyId: user.companyId,
        branchId: user.branchId,
        departmentId: user.departmentId,
        ownerUserId: user.id,
      },
      request
    )
  }
}
