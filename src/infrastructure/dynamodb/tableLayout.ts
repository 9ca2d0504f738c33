/**
 * Single-table layout of the organization table and the access-control
 * table: partition names, index names and the attribute each filterable
 * field is stored under.
 */

import type { AttributeMap } from "./filterExpression"

export const Partition = {
  businessGroup: "BUSINESS_GROUP",
  company: "COMPANY",
  branch: "BRANCH",
  department: "DEPARTMENT",
  employee: "EMPLOYEE",
  user: "USER",
} as const

export const Sentinel = {
  businessGroupCode: "BUSINESS_GROUP_CODE",
  companyCode: "COMPANY_CODE",
  branchCode: "BRANCH_CODE",
  headquarters: "HEADQUARTERS",
  departmentCode: "DEPARTMENT_CODE",
  employeeCode: "EMPLOYEE_CODE",
  dependents: "DEPENDENTS",
} as const

// GSI1: hierarchy parent, GSI2: department membership of employees
export const PARENT_INDEX = "parent-index"
export const DEPARTMENT_INDEX = "department-index"

export function departmentParentKey(parentId: number): string {
  return `DEPARTMENT_PARENT#${parentId}`
}

export function supervisorKey(supervisorId: number): string {
  return `SUPERVISOR#${supervisorId}`
}

export function employeeDepartmentKey(departmentId: number): string {
  return `EMPLOYEE_DEPARTMENT#${departmentId}`
}

export function userPartition(userId: number): string {
  return `USER#${userId}`
}

export const BUSINESS_GROUP_ATTRIBUTES: AttributeMap = {
  id: "business_group_id",
  businessGroupId: "business_group_id",
  isActive: "is_active",
}

export const COMPANY_ATTRIBUTES: AttributeMap = {
  id: "company_id",
  businessGroupId: "business_group_id",
  companyId: "company_id",
  isActive: "is_active",
}

export const BRANCH_ATTRIBUTES: AttributeMap = {
  id: "branch_id",
  businessGroupId: "business_group_id",
  companyId: "company_id",
  branchId: "branch_id",
  isActive: "is_active",
}

export const DEPARTMENT_ATTRIBUTES: AttributeMap = {
  id: "department_id",
  parentId: "parent_id",
  businessGroupId: "business_group_id",
  companyId: "company_id",
  branchId: "branch_id",
  departmentId: "department_id",
  isActive: "is_active",
}

export const EMPLOYEE_ATTRIBUTES: AttributeMap = {
  id: "employee_id",
  parentId: "supervisor_id",
  businessGroupId: "business_group_id",
  companyId: "company_id",
  branchId: "branch_id",
  departmentId: "department_id",
  ownerUserId: "user_id",
  isActive: "is_active",
}
