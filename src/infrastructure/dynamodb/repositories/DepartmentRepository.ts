/**
 * DynamoDB Department Repository Implementation
 *
 * Departments live in the organization table under PK "DEPARTMENT". The
 * parent-index GSI lists the children of a department; a DEPARTMENT_CODE
 * item reserves each (company, code) pair. An active department counts as a
 * dependent of its company, its branch and its parent department.
 */

import { GetCommand } from "@aws-sdk/lib-dynamodb"
import type {
  Department,
  DepartmentChanges,
  DepartmentRepository,
  NewDepartment,
} from "../../../domain/department/Department"
import { departmentNode } from "../../../domain/department/Department"
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
  DEPARTMENT_ATTRIBUTES,
  DEPARTMENT_INDEX,
  PARENT_INDEX,
  Partition,
  Sentinel,
  departmentParentKey,
  employeeDepartmentKey,
} from "../tableLayout"
import { guardChecks, writeTransaction, type TransactItem } from "../transactions"

export class DynamoDBDepartmentRepository implements DepartmentRepository {
  private client: DocumentClient
  private tableName: string

  constructor(client: DocumentClient, tableName: string = "organization") {
    this.client = client
    this.tableName = tableName
  }

  async findById(id: number): Promise<Department | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: Partition.department, SK: id.toString() },
      })
    )

    if (!response.Item) {
      return null
    }
    return this.mapItemToDepartment(response.Item)
  }

  async findByIds(ids: readonly number[]): Promise<Department[]> {
    const keys = [...new Set(ids)].map((id) => ({ PK: Partition.department, SK: id.toString() }))
    const items = await batchGetAll(this.client, this.tableName, keys)
    return items.map((item) => this.mapItemToDepartment(item))
  }

  async findNode(id: number): Promise<HierarchyNode | null> {
    const department = await this.findById(id)
    return department ? departmentNode(department) : null
  }

  async findChildIds(parentId: number): Promise<number[]> {
    const items = await queryAll(this.client, {
      TableName: this.tableName,
      IndexName: PARENT_INDEX,
      KeyConditionExpression: "GSI1PK = :parent",
      ExpressionAttributeValues: { ":parent": departmentParentKey(parentId) },
    })
    return items.map((item) => readNumber(item, "department_id"))
  }

  async hasActiveChildren(parentId: number): Promise<boolean> {
    return queryAny(this.client, {
      TableName: this.tableName,
      IndexName: PARENT_INDEX,
      KeyConditionExpression: "GSI1PK = :parent",
      FilterExpression: "is_active = :active",
      ExpressionAttributeValues: { ":parent": departmentParentKey(parentId), ":active": true },
    })
  }

  async hasActiveEmployees(departmentId: number): Promise<boolean> {
    return queryAny(this.client, {
      TableName: this.tableName,
      IndexName: DEPARTMENT_INDEX,
      KeyConditionExpression: "GSI2PK = :department",
      FilterExpression: "is_active = :active",
      ExpressionAttributeValues: { ":department": employeeDepartmentKey(departmentId), ":active": true },
    })
  }

  async findChildren(parentId: number, filter: RecordPredicate): Promise<Department[]> {
    const compiled = compileFilter(filter, DEPARTMENT_ATTRIBUTES)
    if (!compiled) {
      return []
    }
    const items = await queryAll(
      this.client,
      applyFilter(
        {
          TableName: this.tableName,
          IndexName: PARENT_INDEX,
          KeyConditionExpression: "GSI1PK = :parent",
          ExpressionAttributeValues: { ":parent": departmentParentKey(parentId) },
        },
        compiled
      )
    )
    return items.map((item) => this.mapItemToDepartment(item))
  }

  async findMatching(filter: RecordPredicate): Promise<Department[]> {
    const compiled = compileFilter(filter, DEPARTMENT_ATTRIBUTES)
    if (!compiled) {
      return []
    }
    const items = await queryAll(
      this.client,
      applyFilter(
        {
          TableName: this.tableName,
          KeyConditionExpression: "PK = :pk",
          ExpressionAttributeValues: { ":pk": Partition.department },
        },
        compiled
      )
    )
    return items.map((item) => this.mapItemToDepartment(item))
  }

  async create(input: NewDepartment, guard: HierarchyGuard | null): Promise<Department> {
    const id = await nextId(this.client, this.tableName, Partition.department)
    const now = new Date()
    const department: Department = { id, ...input, isActive: true, createdAt: now, updatedAt: now }

    await writeTransaction(
      this.client,
      [
        {
          Put: {
            TableName: this.tableName,
            Item: this.mapDepartmentToItem(department),
            ConditionExpression: "attribute_not_exists(PK)",
          },
        },
        this.reserveCode(department),
        ...guardChecks(this.tableName, Partition.department, "parent_id", guard),
        ...attach(this.tableName, this.dependencyNodes(department), [this.guardedParent(guard)]),
      ],
      (index) =>
        index === 1
          ? new UniquenessConflictError("Department", "code", department.code)
          : new ConcurrentModificationError("The department hierarchy changed while the department was being created")
    )

    return department
  }

  async update(existing: Department, changes: DepartmentChanges, guard: HierarchyGuard | null): Promise<Department> {
    const updated: Department = { ...existing, ...changes, updatedAt: new Date() }
    const codeChanged = changes.code.toUpperCase() !== existing.code.toUpperCase()

    const items: TransactItem[] = [
      {
        Put: {
          TableName: this.tableName,
          Item: this.mapDepartmentToItem(updated),
          ConditionExpression: "updated_at = :expected",
          ExpressionAttributeValues: { ":expected": existing.updatedAt.toISOString() },
        },
      },
    ]
    if (codeChanged) {
      items.push(
        { Delete: { TableName: this.tableName, Key: this.codeKey(existing.companyId, existing.code) } },
        this.reserveCode(updated)
      )
    }
    items.push(...guardChecks(this.tableName, Partition.department, "parent_id", guard))
    if (existing.isActive) {
      items.push(
        ...reattach(
          this.tableName,
          this.dependencyNodes(existing),
          this.dependencyNodes(updated),
          [this.guardedParent(guard)]
        )
      )
    }

    await writeTransaction(this.client, items, (index) =>
      codeChanged && index === 2
        ? new UniquenessConflictError("Department", "code", updated.code)
        : new ConcurrentModificationError(`Department ${existing.id} changed while it was being updated`)
    )

    return updated
  }

  /**
   * Fails with ActiveDescendantsError when a sub-department or employee was
   * attached after the caller's own check.
   */
  async deactivate(department: Department): Promise<void> {
    const self = { partition: Partition.department, id: department.id }

    await writeTransaction(
      this.client,
      [
        markInactive(this.tableName, self),
        requireNoDependents(this.tableName, self),
        ...detach(this.tableName, this.dependencyNodes(department)),
      ],
      (index) =>
        index === 1
          ? new ActiveDescendantsError("Department", department.id, "sub-departments or employees")
          : new ConcurrentModificationError(`Department ${department.id} changed while it was being deactivated`)
    )
  }

  private dependencyNodes(department: Department): Array<NodeRef | null> {
    return [
      nodeRef(Partition.company, department.companyId),
      nodeRef(Partition.branch, department.branchId),
      nodeRef(Partition.department, department.parentId),
    ]
  }

  private guardedParent(guard: HierarchyGuard | null): NodeRef | null {
    return guard ? { partition: Partition.department, id: guard.parentId } : null
  }

  private codeKey(companyId: number, code: string): Item {
    return { PK: Sentinel.departmentCode, SK: `${companyId}#${code.toUpperCase()}` }
  }

  private reserveCode(department: Department): TransactItem {
    return {
      Put: {
        TableName: this.tableName,
        Item: { ...this.codeKey(department.companyId, department.code), department_id: department.id },
        ConditionExpression: "attribute_not_exists(PK)",
      },
    }
  }

  private mapItemToDepartment(item: Item): Department {
    return {
      id: readNumber(item, "department_id"),
      businessGroupId: readNumber(item, "business_group_id"),
      companyId: readNumber(item, "company_id"),
      branchId: readOptionalNumber(item, "branch_id"),
      parentId: readOptionalNumber(item, "parent_id"),
      code: readString(item, "code"),
      name: readString(item, "name"),
      description: readOptionalString(item, "description"),
      isActive: readBoolean(item, "is_active", true),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapDepartmentToItem(department: Department): Item {
    return compact({
      PK: Partition.department,
      SK: department.id.toString(),
      GSI1PK: department.parentId === null ? null : departmentParentKey(department.parentId),
      GSI1SK: department.parentId === null ? null : `DEPARTMENT#${department.id}`,
      department_id: department.id,
      business_group_id: department.businessGroupId,
      company_id: department.companyId,
      branch_id: department.branchId,
      parent_id: department.parentId,
      code: department.code,
      name: department.name,
      description: department.description,
      is_active: department.isActive,
      created_at: department.createdAt.toISOString(),
      updated_at: department.updatedAt.toISOString(),
    })
  }
}
