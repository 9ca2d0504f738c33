/**
 * Application configuration
 *
 * Environment and role policy are validated once at start-up. A malformed
 * policy stops the process instead of silently granting or denying access.
 */

import { readFileSync } from "fs"
import { z } from "zod"
import bundledPolicy from "../../../config/role-policy.json"
import { ACTIONS, SCOPE_TYPES } from "../types"
import type { AccessPolicy } from "../rbac/rbac"
import { ConfigurationError } from "../errors"

const EnvSchema = z.object({
  ORGANIZATION_TABLE: z.string().min(1).default("organization"),
  ACCESS_CONTROL_TABLE: z.string().min(1).default("access-control"),
  USERS_TABLE: z.string().min(1).default("config"),
  ROLE_POLICY_PATH: z.string().min(1).optional(),
  DEPARTMENT_MAX_DEPTH: z.coerce.number().int().positive().default(5),
  EMPLOYEE_MAX_DEPTH: z.coerce.number().int().positive().optional(),
  PERMISSION_BASE_SEGMENTS: z.coerce.number().int().min(2).default(4),
})

const RolePolicySchema = z.object({
  level: z.number().int(),
  name: z.string().min(1),
  actions: z.array(z.enum(ACTIONS)),
  scopeTypes: z.array(z.enum(SCOPE_TYPES)),
  unrestricted: z.boolean(),
  selfOnly: z.boolean(),
  branchScopeCoversCorporate: z.boolean().default(false),
})

const AccessPolicySchema = z
  .object({
    adminCapabilityMaxLevel: z.number().int(),
    roles: z.array(RolePolicySchema).min(1),
  })
  .superRefine((policy, ctx) => {
    const levels = new Set<number>()
    for (const role of policy.roles) {
      if (levels.has(role.level)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate role level ${role.level}` })
      }
      levels.add(role.level)
      if (role.unrestricted && role.selfOnly) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Role ${role.name} cannot be both unrestricted and self-only`,
        })
      }
    }
  })

export interface AppConfig {
  organizationTable: string
  accessControlTable: string
  usersTable: string
  departmentMaxDepth: number
  employeeMaxDepth: number | null
  permissionBaseSegments: number
  accessPolicy: AccessPolicy
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ")
}

export function parseAccessPolicy(raw: unknown): AccessPolicy {
  const result = AccessPolicySchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(`Invalid role policy: ${describeIssues(result.error)}`)
  }
  return result.data
}

function readPolicyFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot read role policy from ${path}: ${reason}`)
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(result.error)}`)
  }
  const parsed = result.data
  const rawPolicy = parsed.ROLE_POLICY_PATH ? readPolicyFile(parsed.ROLE_POLICY_PATH) : bundledPolicy

  return {
    organizationTable: parsed.ORGANIZATION_TABLE,
    accessControlTable: parsed.ACCESS_CONTROL_TABLE,
    usersTable: parsed.USERS_TABLE,
    departmentMaxDepth: parsed.DEPARTMENT_MAX_DEPTH,
    employeeMaxDepth: parsed.EMPLOYEE_MAX_DEPTH ?? null,
    permissionBaseSegments: parsed.PERMISSION_BASE_SEGMENTS,
    accessPolicy: parseAccessPolicy(rawPolicy),
  }
}

let cachedConfig: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig()
  }
  return cachedConfig
}
