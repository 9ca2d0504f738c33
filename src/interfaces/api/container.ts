/**
 * Service wiring for the Lambda handlers
 *
 * Built once per container on first use, so a cold start pays for config
 * validation and client setup a single time.
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { getConfig, type AppConfig } from "../../shared/config"
import { RolePolicyTable } from "../../shared/rbac/rbac"
import { DynamoDBOrganizationRepository } from "../../infrastructure/dynamodb/repositories/OrganizationRepository"
import { DynamoDBDepartmentRepository } from "../../infrastructure/dynamodb/repositories/DepartmentRepository"
import { DynamoDBEmployeeRepository } from "../../infrastructure/dynamodb/repositories/EmployeeRepository"
import { DynamoDBUserScopeRepository } from "../../infrastructure/dynamodb/repositories/UserScopeRepository"
import { DynamoDBPermissionGrantRepository } from "../../infrastructure/dynamodb/repositories/PermissionGrantRepository"
import { DynamoDBUserDirectory } from "../../infrastructure/dynamodb/repositories/UserDirectory"
import { HierarchyValidator } from "../../application/hierarchy/HierarchyValidator"
import { ScopeResolver } from "../../application/access/ScopeResolver"
import { AccessFilter } from "../../application/access/AccessFilter"
import { PermissionOverride } from "../../application/access/PermissionOverride"
import { AuthorizationService } from "../../application/access/AuthorizationService"
import { OrganizationService } from "../../application/organization/OrganizationService"
import { DepartmentService } from "../../application/department/DepartmentService"
import { EmployeeService } from "../../application/employee/EmployeeService"
import { UserScopeService } from "../../application/scope/UserScopeService"
import { UserPermissionService } from "../../application/permission/UserPermissionService"

export interface Container {
  organizationService: OrganizationService
  departmentService: DepartmentService
  employeeService: EmployeeService
  scopeService: UserScopeService
  permissionService: UserPermissionService
}

export function createContainer(config: AppConfig, client: DynamoDBDocumentClient): Container {
  const roles = new RolePolicyTable(config.accessPolicy)

  const organizationRepository = new DynamoDBOrganizationRepository(client, config.organizationTable)
  const departmentRepository = new DynamoDBDepartmentRepository(client, config.organizationTable)
  const employeeRepository = new DynamoDBEmployeeRepository(client, config.organizationTable)
  const scopeRepository = new DynamoDBUserScopeRepository(client, config.accessControlTable)
  const grantRepository = new DynamoDBPermissionGrantRepository(client, config.accessControlTable)
  const userDirectory = new DynamoDBUserDirectory(client, config.usersTable)

  const departmentHierarchy = new HierarchyValidator(departmentRepository, {
    entity: "Department",
    dependents: "sub-departments",
    maxDepth: config.departmentMaxDepth,
  })
  const reportingHierarchy = new HierarchyValidator(employeeRepository, {
    entity: "Employee",
    dependents: "subordinates",
    maxDepth: config.employeeMaxDepth,
  })

  const authorization = new AuthorizationService(
    new ScopeResolver(roles),
    new AccessFilter(roles),
    new PermissionOverride(grantRepository, config.permissionBaseSegments),
    departmentHierarchy,
    roles
  )

  return {
    organizationService: new OrganizationService(organizationRepository, authorization),
    departmentService: new DepartmentService(
      departmentRepository,
      organizationRepository,
      departmentHierarchy,
      authorization
    ),
    employeeService: new EmployeeService(
      employeeRepository,
      departmentRepository,
      organizationRepository,
      reportingHierarchy,
      authorization
    ),
    scopeService: new UserScopeService(
      scopeRepository,
      organizationRepository,
      departmentRepository,
      userDirectory,
      authorization,
      roles
    ),
    permissionService: new UserPermissionService(grantRepository, userDirectory, authorization, roles),
  }
}

let container: Container | null = null

export function getContainer(): Container {
  if (!container) {
    const client = DynamoDBDocumentClient.from(new DynamoDBClient({}), {
      marshallOptions: { removeUndefinedValues: true },
    })
    container = createContainer(getConfig(), client)
  }
  return container
}
