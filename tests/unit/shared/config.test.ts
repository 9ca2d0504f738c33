/**
 * Configuration tests
 */

import { loadConfig, parseAccessPolicy } from "../../../src/shared/config"
import { ConfigurationError } from "../../../src/shared/errors"

const role = {
  level: 1,
  name: "admin",
  actions: ["read"],
  scopeTypes: [],
  unrestricted: true,
  selfOnly: false,
}

describe("loadConfig", () => {
  it("should apply defaults to an empty environment", () => {
    const config = loadConfig({})

    expect(config).toMatchObject({
      organizationTable: "organization",
      accessControlTable: "access-control",
      usersTable: "config",
      departmentMaxDepth: 5,
      employeeMaxDepth: null,
      permissionBaseSegments: 4,
    })
    expect(config.accessPolicy.adminCapabilityMaxLevel).toBe(2)
    expect(config.accessPolicy.roles).toHaveLength(5)
  })

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      ORGANIZATION_TABLE: "org-test",
      DEPARTMENT_MAX_DEPTH: "7",
      EMPLOYEE_MAX_DEPTH: "12",
      PERMISSION_BASE_SEGMENTS: "3",
    })

    expect(config.organizationTable).toBe("org-test")
    expect(config.departmentMaxDepth).toBe(7)
    expect(config.employeeMaxDepth).toBe(12)
    expect(config.permissionBaseSegments).toBe(3)
  })

  it("should reject an invalid depth", () => {
    expect(() => loadConfig({ DEPARTMENT_MAX_DEPTH: "0" })).toThrow(ConfigurationError)
    expect(() => loadConfig({ DEPARTMENT_MAX_DEPTH: "0" })).toThrow(/^Invalid environment: DEPARTMENT_MAX_DEPTH/)
  })

  it("should fail when the policy file cannot be read", () => {
    expect(() => loadConfig({ ROLE_POLICY_PATH: "/nonexistent/role-policy.json" })).toThrow(
      /^Cannot read role policy from \/nonexistent\/role-policy\.json/
    )
  })
})

describe("parseAccessPolicy", () => {
  it("should default branchScopeCoversCorporate to false", () => {
    const policy = parseAccessPolicy({ adminCapabilityMaxLevel: 1, roles: [role] })

    expect(policy.roles[0].branchScopeCoversCorporate).toBe(false)
  })

  it("should reject duplicate role levels", () => {
    const raw = { adminCapabilityMaxLevel: 1, roles: [role, { ...role, name: "root" }] }

    expect(() => parseAccessPolicy(raw)).toThrow(ConfigurationError)
    expect(() => parseAccessPolicy(raw)).toThrow("Invalid role policy: (root): Duplicate role level 1")
  })

  it("should reject a role that is both unrestricted and self-only", () => {
    const raw = { adminCapabilityMaxLevel: 1, roles: [{ ...role, selfOnly: true }] }

    expect(() => parseAccessPolicy(raw)).toThrow("Role admin cannot be both unrestricted and self-only")
  })

  it("should reject unknown actions", () => {
    const raw = { adminCapabilityMaxLevel: 1, roles: [{ ...role, actions: ["approve"] }] }

    expect(() => parseAccessPolicy(raw)).toThrow(/^Invalid role policy: roles\.0\.actions\.0/)
  })

  it("should require at least one role", () => {
    expect(() => parseAccessPolicy({ adminCapabilityMaxLevel: 1, roles: [] })).toThrow(ConfigurationError)
  })
})
