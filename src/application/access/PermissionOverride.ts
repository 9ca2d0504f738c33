/**
 * Permission Override
 *
 * Per-user allow/deny grants keyed by (resource path, method). A grant is
 * authoritative: when one applies it decides the request on its own.
 *
 * Lookup order:
 *   1. grant for the exact path (trailing slash removed) and method
 *   2. grant for the base path, e.g. /api/v1/employees for /api/v1/employees/12
 *   3. none
 */

import type { PermissionGrant, PermissionGrantRepository } from "../../domain/access/Access"
import type { HttpMethod } from "../../shared/types"
import type { AccessLayer } from "./ScopeResolver"

export const DEFAULT_BASE_SEGMENTS = 4

export function trimTrailingSlash(path: string): string {
  const trimmed = path.replace(/\/+$/, "")
  return trimmed === "" ? "/" : trimmed
}

/**
 * Keeps the first `baseSegments` segments of a path, counting the empty
 * segment before the leading slash: "/api/v1/employees/12/photo" becomes
 * "/api/v1/employees" with the default of 4.
 */
export function normalizeResourcePath(path: string, baseSegments: number = DEFAULT_BASE_SEGMENTS): string {
  const trimmed = trimTrailingSlash(path)
  const parts = trimmed.split("/")
  if (parts.length <= baseSegments) {
    return trimmed
  }
  return parts.slice(0, baseSegments).join("/")
}

/**
 * Same lookup order over grants that are already loaded.
 */
export function resolveGrant(
  grants: readonly PermissionGrant[],
  resourcePath: string,
  method: HttpMethod,
  baseSegments: number = DEFAULT_BASE_SEGMENTS
): boolean | null {
  const exactPath = trimTrailingSlash(resourcePath)
  const exact = grants.find((grant) => grant.resourcePath === exactPath && grant.method === method)
  if (exact) {
    return exact.allow
  }

  const basePath = normalizeResourcePath(exactPath, baseSegments)
  if (basePath !== exactPath) {
    const base = grants.find((grant) => grant.resourcePath === basePath && grant.method === method)
    if (base) {
      return base.allow
    }
  }

  return null
}

export const overrideLayer: AccessLayer = {
  name: "override",
  resolve: ({ override }) => {
    if (override === null) {
      return "abstain"
    }
    return override ? "allow" : "deny"
  },
}

export class PermissionOverride {
  constructor(
    private grantRepository: PermissionGrantRepository,
    private baseSegments: number = DEFAULT_BASE_SEGMENTS
  ) {}

  async lookup(userId: number, resourcePath: string, method: HttpMethod): Promise<boolean | null> {
    const exactPath = trimTrailingSlash(resourcePath)
    const exact = await this.grantRepository.findGrant(userId, exactPath, method)
    if (exact) {
      return exact.allow
    }

    const basePath = normalizeResourcePath(exactPath, this.baseSegments)
    if (basePath === exactPath) {
      return null
    }

    const base = await this.grantRepository.findGrant(userId, basePath, method)
    return base ? base.allow : null
  }
}
