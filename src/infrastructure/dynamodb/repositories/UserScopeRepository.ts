/**
 * DynamoDB User Scope Repository Implementation
 *
 * Scope assignments in the access-control table:
 * PK "USER#<userId>", SK "SCOPE#<scopeType>#<scopeId>".
 */

import { DeleteCommand, PutCommand } from "@aws-sdk/lib-dynamodb"
import type { NewUserScope, UserScope, UserScopeRepository } from "../../../domain/access/Access"
import type { ScopeType } from "../../../shared/types"
import { isScopeType } from "../../../shared/types"
import { AppError, NotFoundError, UniquenessConflictError } from "../../../shared/errors"
import { compact, readDate, readNumber, readOptionalNumber, readString, type DocumentClient, type Item } from "../items"
import { queryAll } from "../pagination"
import { userPartition } from "../tableLayout"
import { isConditionalCheckFailure } from "../transactions"

function scopeSortKey(scopeType: ScopeType, scopeId: number): string {
  return `SCOPE#${scopeType}#${scopeId}`
}

export class DynamoDBUserScopeRepository implements UserScopeRepository {
  private client: DocumentClient
  private tableName: string

  constructor(client: DocumentClient, tableName: string = "access-control") {
    this.client = client
    this.tableName = tableName
  }

  async findByUser(userId: number): Promise<UserScope[]> {
    const items = await queryAll(this.client, {
      TableName: this.tableName,
      KeyConditionExpression: "PK = :pk AND begins_with(SK, :prefix)",
      ExpressionAttributeValues: { ":pk": userPartition(userId), ":prefix": "SCOPE#" },
    })
    return items.map((item) => this.mapItemToScope(item))
  }

  async create(scope: NewUserScope): Promise<UserScope> {
    const created: UserScope = { ...scope, createdAt: new Date() }

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: this.mapScopeToItem(created),
          ConditionExpression: "attribute_not_exists(SK)",
        })
      )
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new UniquenessConflictError("Scope", "assignment", `${scope.scopeType}:${scope.scopeId}`)
      }
      throw error
    }

    return created
  }

  async delete(userId: number, scopeType: ScopeType, scopeId: number): Promise<void> {
    try {
      await this.client.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { PK: userPartition(userId), SK: scopeSortKey(scopeType, scopeId) },
          ConditionExpression: "attribute_exists(SK)",
        })
      )
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundError(`Scope ${scopeType}`, scopeId)
      }
      throw error
    }
  }

  private mapItemToScope(item: Item): UserScope {
    const scopeType = readString(item, "scope_type")
    if (!isScopeType(scopeType)) {
      throw new AppError(`Unknown scope type ${scopeType}`, 500, "INVALID_ITEM")
    }
    return {
      userId: readNumber(item, "user_id"),
      scopeType,
      scopeId: readNumber(item, "scope_id"),
      businessGroupId: readOptionalNumber(item, "business_group_id"),
      companyId: readOptionalNumber(item, "company_id"),
      createdBy: readOptionalNumber(item, "created_by"),
      createdAt: readDate(item, "created_at"),
    }
  }

  private mapScopeToItem(scope: UserScope): Item {
    return compact({
      PK: userPartition(scope.userId),
      SK: scopeSortKey(scope.scopeType, scope.scopeId),
      user_id: scope.userId,
      scope_type: scope.scopeType,
      scope_id: scope.scopeId,
      business_group_id: scope.businessGroupId,
      company_id: scope.companyId,
      created_by: scope.createdBy,
      created_at: scope.createdAt.toISOString(),
    })
  }
}
