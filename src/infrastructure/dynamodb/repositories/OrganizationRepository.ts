/**
 * DynamoDB Organization Repository Implementation
 *
 * Business groups, companies and branches in the organization table, one
 * partition per kind. Codes are reserved with sentinel items, and a
 * HEADQUARTERS item per company holds the id of its headquarters branch.
 * An active company counts as a dependent of its business group, an active
 * branch as one of its company.
 */

import { GetCommand } from "@aws-sdk/lib-dynamodb"
import type {
  Branch,
  BusinessGroup,
  Company,
  CreateBusinessGroupInput,
  CreateCompanyInput,
  NewBranch,
  OrganizationNodeKind,
  OrganizationRepository,
} from "../../../domain/organization/Organization"
import { NODE_DEPENDENTS, NODE_LABELS } from "../../../domain/organization/Organization"
import type { FilterField, RecordPredicate } from "../../../domain/access/Access"
import {
  ActiveDescendantsError,
  ConcurrentModificationError,
  InactiveNodeError,
  NotFoundError,
  UniquenessConflictError,
} from "../../../shared/errors"
import { attach, detach, markInactive, nodeRef, requireNoDependents, type NodeRef } from "../dependents"
import { applyFilter, compileFilter, type AttributeMap } from "../filterExpression"
import { compact, readBoolean, readDate, readNumber, readOptionalString, readString, type DocumentClient, type Item } from "../items"
import { queryAll, queryAny } from "../pagination"
import { nextId } from "../sequence"
import {
  BRANCH_ATTRIBUTES,
  BUSINESS_GROUP_ATTRIBUTES,
  COMPANY_ATTRIBUTES,
  DEPARTMENT_ATTRIBUTES,
  EMPLOYEE_ATTRIBUTES,
  Partition,
  Sentinel,
} from "../tableLayout"
import { writeTransaction, type TransactItem } from "../transactions"

interface ChildPartition {
  partition: string
  attributes: AttributeMap
}

const PARTITIONS: Record<OrganizationNodeKind, string> = {
  business_group: Partition.businessGroup,
  company: Partition.company,
  branch: Partition.branch,
}

// partitions holding the children of each kind, and the field linking them
const CHILDREN: Record<OrganizationNodeKind, { field: FilterField; partitions: ChildPartition[] }> = {
  business_group: {
    field: "businessGroupId",
    partitions: [{ partition: Partition.company, attributes: COMPANY_ATTRIBUTES }],
  },
  company: {
    field: "companyId",
    partitions: [
      { partition: Partition.branch, attributes: BRANCH_ATTRIBUTES },
      { partition: Partition.department, attributes: DEPARTMENT_ATTRIBUTES },
      { partition: Partition.employee, attributes: EMPLOYEE_ATTRIBUTES },
    ],
  },
  branch: {
    field: "branchId",
    partitions: [
      { partition: Partition.department, attributes: DEPARTMENT_ATTRIBUTES },
      { partition: Partition.employee, attributes: EMPLOYEE_ATTRIBUTES },
    ],
  },
}

export class DynamoDBOrganizationRepository implements OrganizationRepository {
  private client: DocumentClient
  private tableName: string

  constructor(client: DocumentClient, tableName: string = "organization") {
    this.client = client
    this.tableName = tableName
  }

  async findBusinessGroup(id: number): Promise<BusinessGroup | null> {
    const item = await this.getItem(Partition.businessGroup, id)
    return item ? this.mapItemToBusinessGroup(item) : null
  }

  async findCompany(id: number): Promise<Company | null> {
    const item = await this.getItem(Partition.company, id)
    return item ? this.mapItemToCompany(item) : null
  }

  async findBranch(id: number): Promise<Branch | null> {
    const item = await this.getItem(Partition.branch, id)
    return item ? this.mapItemToBranch(item) : null
  }

  async listBusinessGroups(filter: RecordPredicate): Promise<BusinessGroup[]> {
    const items = await this.queryPartition(Partition.businessGroup, BUSINESS_GROUP_ATTRIBUTES, filter)
    return items.map((item) => this.mapItemToBusinessGroup(item))
  }

  async listCompanies(filter: RecordPredicate): Promise<Company[]> {
    const items = await this.queryPartition(Partition.company, COMPANY_ATTRIBUTES, filter)
    return items.map((item) => this.mapItemToCompany(item))
  }

  async listBranches(filter: RecordPredicate): Promise<Branch[]> {
    const items = await this.queryPartition(Partition.branch, BRANCH_ATTRIBUTES, filter)
    return items.map((item) => this.mapItemToBranch(item))
  }

  async createBusinessGroup(input: CreateBusinessGroupInput): Promise<BusinessGroup> {
    const id = await nextId(this.client, this.tableName, Partition.businessGroup)
    const now = new Date()
    const group: BusinessGroup = { id, code: input.code, name: input.name, isActive: true, createdAt: now, updatedAt: now }

    await writeTransaction(
      this.client,
      [
        this.putNew(this.mapBusinessGroupToItem(group)),
        this.putNew({ PK: Sentinel.businessGroupCode, SK: group.code.toUpperCase(), business_group_id: id }),
      ],
      () => new UniquenessConflictError("Business group", "code", group.code)
    )

    return group
  }

  async createCompany(input: CreateCompanyInput): Promise<Company> {
    const id = await nextId(this.client, this.tableName, Partition.company)
    const now = new Date()
    const company: Company = {
      id,
      businessGroupId: input.businessGroupId,
      code: input.code,
      name: input.name,
      legalName: input.legalName ?? null,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    }

    await writeTransaction(
      this.client,
      [
        this.putNew(this.mapCompanyToItem(company)),
        this.putNew({
          PK: Sentinel.companyCode,
          SK: `${company.businessGroupId}#${company.code.toUpperCase()}`,
          company_id: id,
        }),
        ...attach(this.tableName, [nodeRef(Partition.businessGroup, company.businessGroupId)]),
      ],
      (index) =>
        index === 1
          ? new UniquenessConflictError("Company", "code", company.code)
          : new InactiveNodeError("Business group", company.businessGroupId)
    )

    return company
  }

  async createBranch(input: NewBranch): Promise<Branch> {
    const id = await nextId(this.client, this.tableName, Partition.branch)
    const now = new Date()
    const branch: Branch = { id, ...input, isActive: true, createdAt: now, updatedAt: now }

    const items: TransactItem[] = [
      this.putNew(this.mapBranchToItem(branch)),
      this.putNew({ PK: Sentinel.branchCode, SK: `${branch.companyId}#${branch.code.toUpperCase()}`, branch_id: id }),
    ]
    if (branch.isHeadquarters) {
      items.push(this.putNew({ PK: Sentinel.headquarters, SK: branch.companyId.toString(), branch_id: id }))
    }
    const attachedAt = items.length
    items.push(...attach(this.tableName, [nodeRef(Partition.company, branch.companyId)]))

    await writeTransaction(this.client, items, (index) => {
      if (index >= attachedAt) {
        return new InactiveNodeError("Company", branch.companyId)
      }
      return index === 2
        ? new UniquenessConflictError("Branch", "headquarters of company", branch.companyId)
        : new UniquenessConflictError("Branch", "code", branch.code)
    })

    return branch
  }

  async hasActiveChildren(kind: OrganizationNodeKind, id: number): Promise<boolean> {
    const { field, partitions } = CHILDREN[kind]
    const predicate: RecordPredicate = {
      kind: "and",
      clauses: [
        { kind: "eq", field, value: id },
        { kind: "eq", field: "isActive", value: true },
      ],
    }

    for (const { partition, attributes } of partitions) {
      const compiled = compileFilter(predicate, attributes)
      if (!compiled) {
        continue
      }
      const found = await queryAny(
        this.client,
        applyFilter(
          {
            TableName: this.tableName,
            KeyConditionExpression: "PK = :pk",
            ExpressionAttributeValues: { ":pk": partition },
          },
          compiled
        )
      )
      if (found) {
        return true
      }
    }
    return false
  }

  async deactivate(kind: OrganizationNodeKind, id: number): Promise<void> {
    const partition = PARTITIONS[kind]
    const item = await this.getItem(partition, id)
    if (!item) {
      throw new NotFoundError(NODE_LABELS[kind], id)
    }
    if (!readBoolean(item, "is_active", true)) {
      return
    }

    const self = { partition, id }
    const items: TransactItem[] = [
      markInactive(this.tableName, self),
      requireNoDependents(this.tableName, self),
      ...detach(this.tableName, this.dependencyNodes(kind, item)),
    ]
    if (kind === "branch" && readBoolean(item, "is_headquarters")) {
      // frees the company's headquarters slot together with the branch
      items.push({
        Delete: {
          TableName: this.tableName,
          Key: { PK: Sentinel.headquarters, SK: readNumber(item, "company_id").toString() },
          ConditionExpression: "branch_id = :branch",
          ExpressionAttributeValues: { ":branch": id },
        },
      })
    }

    await writeTransaction(this.client, items, (index) =>
      index === 1
        ? new ActiveDescendantsError(NODE_LABELS[kind], id, NODE_DEPENDENTS[kind])
        : new ConcurrentModificationError(`${NODE_LABELS[kind]} ${id} changed while it was being deactivated`)
    )
  }

  private dependencyNodes(kind: OrganizationNodeKind, item: Item): Array<NodeRef | null> {
    switch (kind) {
      case "business_group":
        return []
      case "company":
        return [nodeRef(Partition.businessGroup, readNumber(item, "business_group_id"))]
      case "branch":
        return [nodeRef(Partition.company, readNumber(item, "company_id"))]
    }
  }

  private async getItem(partition: string, id: number): Promise<Item | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: partition, SK: id.toString() },
      })
    )
    return response.Item ?? null
  }

  private async queryPartition(partition: string, attributes: AttributeMap, filter: RecordPredicate): Promise<Item[]> {
    const compiled = compileFilter(filter, attributes)
    if (!compiled) {
      return []
    }
    return queryAll(
      this.client,
      applyFilter(
        {
          TableName: this.tableName,
          KeyConditionExpression: "PK = :pk",
          ExpressionAttributeValues: { ":pk": partition },
        },
        compiled
      )
    )
  }

  private putNew(item: Item): TransactItem {
    return {
      Put: {
        TableName: this.tableName,
        Item: item,
        ConditionExpression: "attribute_not_exists(PK)",
      },
    }
  }

  private mapItemToBusinessGroup(item: Item): BusinessGroup {
    return {
      id: readNumber(item, "business_group_id"),
      code: readString(item, "code"),
      name: readString(item, "name"),
      isActive: readBoolean(item, "is_active", true),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapItemToCompany(item: Item): Company {
    return {
      id: readNumber(item, "company_id"),
      businessGroupId: readNumber(item, "business_group_id"),
      code: readString(item, "code"),
      name: readString(item, "name"),
      legalName: readOptionalString(item, "legal_name"),
      isActive: readBoolean(item, "is_active", true),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapItemToBranch(item: Item): Branch {
    return {
      id: readNumber(item, "branch_id"),
      businessGroupId: readNumber(item, "business_group_id"),
      companyId: readNumber(item, "company_id"),
      code: readString(item, "code"),
      name: readString(item, "name"),
      isHeadquarters: readBoolean(item, "is_headquarters"),
      isActive: readBoolean(item, "is_active", true),
      createdAt: readDate(item, "created_at"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapBusinessGroupToItem(group: BusinessGroup): Item {
    return {
      PK: Partition.businessGroup,
      SK: group.id.toString(),
      business_group_id: group.id,
      code: group.code,
      name: group.name,
      is_active: group.isActive,
      created_at: group.createdAt.toISOString(),
      updated_at: group.updatedAt.toISOString(),
    }
  }

  private mapCompanyToItem(company: Company): Item {
    return compact({
      PK: Partition.company,
      SK: company.id.toString(),
      company_id: company.id,
      business_group_id: company.businessGroupId,
      code: company.code,
      name: company.name,
      legal_name: company.legalName,
      is_active: company.isActive,
      created_at: company.createdAt.toISOString(),
      updated_at: company.updatedAt.toISOString(),
    })
  }

  private mapBranchToItem(branch: Branch): Item {
    return {
      PK: Partition.branch,
      SK: branch.id.toString(),
      branch_id: branch.id,
      business_group_id: branch.businessGroupId,
      company_id: branch.companyId,
      code: branch.code,
      name: branch.name,
      is_headquarters: branch.isHeadquarters,
      is_active: branch.isActive,
      created_at: branch.createdAt.toISOString(),
      updated_at: branch.updatedAt.toISOString(),
    }
  }
}
