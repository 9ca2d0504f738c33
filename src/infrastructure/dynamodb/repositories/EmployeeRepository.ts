/**
 * DynamoDB Employee Repository Implementation
 *
 * Employees live in the organization table under PK "EMPLOYEE".
 * parent-index lists the direct reports of a supervisor, department-index
 * the members of a department. An EMPLOYEE_CODE item reserves each
 * (company, employee code) pair.
 */

import { GetCommand } from "@aws-sdk/lib-dynamodb"
import type { Employee, EmployeeChanges, EmployeeRepository, NewEmployee } from "../../../domain/employee/Employee"
import { employeeNode } from "../../../domain/employee/Employee"
import type { HierarchyGuard, HierarchyNode } from "../../../domain/hierarchy/Hierarchy"
import type { RecordPredicate } from "../../../domain/access/Access"
import { ActiveDescendantsError, ConcurrentModificationError, UniquenessConflictError } from "../../../shared/errors"
import { attach, detach, markInactive, nodeRef, reattach, requireNoDependents, type NodeRef } from "../dependents"
import { applyFilter, compileFilter } from "../filterExpression"
import {
  compact,
  readBoolean,
  readDate,
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readString,
  type DocumentClient,
  type Item,
} from "../items"
import { batchGetAll, queryAll, queryAny } from "../pagination"
import { nextId } from "../sequence"
import {
  EMPLOYEE_ATTRIBUTES,
  PARENT_INDEX,
  Partition,
  Sentinel,
  employeeDepartmentKey,
  supervisorKey,
} from "../tableLayout"
import { guardChecks, writeTransaction, type TransactItem } from "../transactions"

export class DynamoDBEmployeeRepository implements EmployeeRepository {
  private client: DocumentClient
  private tableName: string

  constructor(client: DocumentClient, tableName: string = "organization") {
    this.client = client
    this.tableName = tableName
  }

  async findById(id: number): Promise<Employee | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: Partition.employee, SK: id.toString() },
      })
    )

    if (!response.Item) {
      return null
    }
    return this.mapItemToEmployee(response.Item)
  }

  async findByIds(ids: readonly number[]): Promise<Employee[]> {
    const keys = [...new Set(ids)].map((id) => ({ PK: Partition.employee, SK: id.toString() }))
    const items = await batchGetAll(this.client, this.tableName, keys)
    return items.map((item) => this.mapItemToEmployee(item))
  }

  async findNode(id: number): Promise<HierarchyNode | null> {
    const employee = await this.findById(id)
    return employee ? employeeNode(employee) : null
  }

  async findChildIds(parentId: number): Promise<number[]> {
    const items = await queryAll(this.client, {
      TableName: this.tableName,
      IndexName: PARENT_INDEX,
      KeyConditionExpression: "GSI1PK = :supervisor",
      ExpressionAttributeValues: { ":supervisor": supervisorKey(parentId) },
    })
    return items.map((item) => readNumber(item, "employee_id"))
  }

  async hasActiveChildren(parentId: number): Promise<boolean> {
    return queryAny(this.client, {
      TableName: this.tableName,
      IndexName: PARENT_INDEX,
      KeyConditionExpression: "GSI1PK = :supervisor",
      FilterExpression: "is_active = :active",
      ExpressionAttributeValues: { ":supervisor": supervisorKey(parentId), ":active": true },
    })
  }

  async findSubordinates(supervisorId: number, filter: RecordPredicate): Promise<Employee[]> {
    const compiled = compileFilter(filter, EMPLOYEE_ATTRIBUTES)
    if (!compiled) {
      return []
    }
    const items = await queryAll(
      this.client,
      applyFilter(
        {
          TableName: this.tableName,
          IndexName: PARENT_INDEX,
          KeyConditionExpression: "GSI1PK = :supervisor",
          ExpressionAttributeValues: { ":supervisor": supervisorKey(supervisorId) },
        },
        compiled
      )
    )
    return items.map((item) => this.mapItemToEmployee(item))
  }

  async findMatching(filter: RecordPredicate): Promise<Employee[]> {
    const compiled = compileFilter(filter, EMPLOYEE_ATTRIBUTES)
    if (!compiled) {
      return []
    }
    const items = await queryAll(
      this.client,
      applyFilter(
        {
          TableName: this.tableName,
          KeyConditionExpression: "PK = :pk",
          ExpressionAttributeValues: { ":pk": Partition.employee },
        },
        compiled
      )
    )
    return items.map((item) => this.mapItemToEmployee(item))
  }

  async create(input: NewEmployee, guard: HierarchyGuard | null): Promise<Employee> {
    const id = await nextId(this.client, this.tableName, Partition.employee)
    const now = new Date()
    const employee: Employee = { id, ...input, isActive: true, createdAt: now, updatedAt: now }

    await writeTransaction(
      this.client,
      [
        {
          Put: {
            TableName: this.tableName,
            Item: this.mapEmployeeToItem(employee),
            ConditionExpression: "attribute_not_exists(PK)",
          },
        },
        this.reserveCode(employee),
        ...guardChecks(this.tableName, Partition.employee, "supervisor_id", guard),
        ...attach(this.tableName, this.dependencyNodes(employee), [this.guardedSupervisor(guard)]),
      ],
      (index) =>
        index === 1
          ? new UniquenessConflictError("Employee", "employeeCode", employee.employeeCode)
          : new ConcurrentModificationError("The reporting line changed while the employee was being created")
    )

    return employee
  }

  async update(existing: Employee, changes: EmployeeChanges, guard: HierarchyGuard | null): Promise<Employee> {
    const updated: Employee = { ...existing, ...changes, updatedAt: new Date() }
    const codeChanged = changes.employeeCode.toUpperCase() !== existing.employeeCode.toUpperCase()

    const items: TransactItem[] = [
      {
        Put: {
          TableName: this.tableName,
          Item: this.mapEmployeeToItem(updated),
          ConditionExpression: "updated_at = :expected",
          ExpressionAttributeValues: { ":expected": existing.updatedAt.toISOString() },
        },
      },
    ]
    if (codeChanged) {
      items.push(
        { Delete: { TableName: this.tableName, Key: this.codeKey(existing.companyId, existing.employeeCode) } },
        this.reserveCode(updated)
      )
    }
    items.push(...guardChecks(this.tableName, Partition.employee, "supervisor_id", guard))
    if (existing.isActive) {
      items.push(
        ...reattach(
          this.tableName,
          this.dependencyNodes(existing),
          this.dependencyNodes(updated),
          [this.guardedSupervisor(guard)]
        )
      )
    }

    await writeTransaction(this.client, items, (index) =>
      codeChanged && index === 2
        ? new UniquenessConflictError("Employee", "employeeCode", updated.employeeCode)
        : new ConcurrentModificationError(`Employee ${existing.id} changed while it was being updated`)
    )

    return updated
  }

  async deactivate(employee: Employee): Promise<void> {
    const self = { partition: Partition.employee, id: employee.id }

    await writeTransaction(
      this.client,
      [
        markInactive(this.tableName, self),
        requireNoDependents(this.tableName, self),
        ...detach(this.tableName, this.dependencyNodes(employee)),
      ],
      (index) =>
        index === 1
          ? new ActiveDescendantsError("Employee", employee.id, "subordinates")
          : new ConcurrentModificationError(`Employee ${employee.id} changed while it was being deactivated`)
    )
  }

  // an active employee counts against its company, branch, department and supervisor
  private dependencyNodes(employee: Employee): Array<NodeRef | null> {
    return [
      nodeRef(Partition.company, employee.companyId),
      nodeRef(Partition.branch, employee.branchId),
      nodeRef(Partition.department, employee.departmentId),
      nodeRef(Partition.employee, employee.supervisorId),
    ]
  }

  private guardedSupervisor(guard: HierarchyGuard | null): NodeRef | null {
    return guard ? { partition: Partition.employee, id: guard.parentId } : null
  }

  private codeKey(companyId: number, employeeCode: string): Item {
    return { PK: Sentinel.employeeCode, SK: `${companyId}#${employeeCode.toUpperCase()}` }
  }

  private reserveCode(employee: Employee): TransactItem {
    return {
      Put: {
        TableName: this.tableName,
        Item: { ...this.codeKey(employee.companyId, employee.employeeCode), employee_id: employee.id },
        ConditionExpression: "attribute_not_exists(PK)",
      },
    }
  }

  private mapItemToEmployee(item: Item): Employee {
    return {
      id: readNumber(item, "employee_id"),
      businessGroupId: readNumber(item, "business_group_id"),
      companyId: readNumber(item, "company_id"),
      branchId: readOptionalNumber(item, "branch_id"),
      departmentId: readOptionalNumber(item, "department_id"),
      supervisorId: readOptionalNumber(item, "supervisor_id"),
      userId: readOptionalNumber(item, "user_id"),
      employeeCode: readString(item, "employee_code"),
      displayName: readString(item, "display_name"),
      email: readOptionalString(item, "email"),
      hireDate: readOptionalString(item, "hire_date"),
      isActive: readBoolean(item, "is_active", true),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapEmployeeToItem(employee: Employee): Item {
    return compact({
      PK: Partition.employee,
      SK: employee.id.toString(),
      GSI1PK: employee.supervisorId === null ? null : supervisorKey(employee.supervisorId),
      GSI1SK: employee.supervisorId === null ? null : `EMPLOYEE#${employee.id}`,
      GSI2PK: employee.departmentId === null ? null : employeeDepartmentKey(employee.departmentId),
      GSI2SK: employee.departmentId === null ? null : `EMPLOYEE#${employee.id}`,
      employee_id: employee.id,
      business_group_id: employee.businessGroupId,
      company_id: employee.companyId,
      branch_id: employee.branchId,
      department_id: employee.departmentId,
      supervisor_id: employee.supervisorId,
      user_id: employee.userId,
      employee_code: employee.employeeCode,
      display_name: employee.displayName,
      email: employee.email,
      hire_date: employee.hireDate,
      is_active: employee.isActive,
      created_at: employee.createdAt.toISOString(),
      updated_at: employee.updatedAt.toISOString(),
    })
  }
}
