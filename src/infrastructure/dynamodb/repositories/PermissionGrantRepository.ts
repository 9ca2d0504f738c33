/**
 * DynamoDB Permission Grant Repository Implementation
 *
 * Grants in the access-control table: PK "USER#<userId>",
 * SK "GRANT#<METHOD>#<path>". Every write also bumps the user's
 * GRANTS#VERSION item, which a bulk replacement checks to stay atomic
 * against concurrent single-grant writes. The same item counts the user's
 * grants so the per-user limit holds under concurrent inserts.
 */

import { GetCommand } from "@aws-sdk/lib-dynamodb"
import type { GrantInput, PermissionGrant, PermissionGrantRepository } from "../../../domain/access/Access"
import type { HttpMethod } from "../../../shared/types"
import { isHttpMethod } from "../../../shared/types"
import { AppError, ConcurrentModificationError, NotFoundError, ValidationError } from "../../../shared/errors"
import { compact, readBoolean, readDate, readNumber, readOptionalNumber, readString, type DocumentClient, type Item } from "../items"
import { queryAll } from "../pagination"
import { userPartition } from "../tableLayout"
import { writeTransaction, type TransactItem } from "../transactions"

const VERSION_SORT_KEY = "GRANTS#VERSION"

function grantSortKey(method: HttpMethod, resourcePath: string): string {
  return `GRANT#${method}#${resourcePath}`
}

export class DynamoDBPermissionGrantRepository implements PermissionGrantRepository {
  private client: DocumentClient
  private tableName: string

  constructor(client: DocumentClient, tableName: string = "access-control") {
    this.client = client
    this.tableName = tableName
  }

  async findGrant(userId: number, resourcePath: string, method: HttpMethod): Promise<PermissionGrant | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: userPartition(userId), SK: grantSortKey(method, resourcePath) },
      })
    )
    return response.Item ? this.mapItemToGrant(response.Item) : null
  }

  async findByUser(userId: number): Promise<PermissionGrant[]> {
    const items = await queryAll(this.client, {
      TableName: this.tableName,
      KeyConditionExpression: "PK = :pk AND begins_with(SK, :prefix)",
      ExpressionAttributeValues: { ":pk": userPartition(userId), ":prefix": "GRANT#" },
    })
    return items.map((item) => this.mapItemToGrant(item))
  }

  async upsert(userId: number, grant: GrantInput, updatedBy: number | null, maxGrants: number): Promise<PermissionGrant> {
    const saved: PermissionGrant = { userId, ...grant, updatedBy, updatedAt: new Date() }
    const existing = await this.findGrant(userId, grant.resourcePath, grant.method)

    if (existing) {
      await writeTransaction(
        this.client,
        [
          {
            Put: {
              TableName: this.tableName,
              Item: this.mapGrantToItem(saved),
              ConditionExpression: "attribute_exists(SK)",
            },
          },
          this.bumpVersion(userId, 0),
        ],
        () => new ConcurrentModificationError(`Permissions of user ${userId} changed concurrently`)
      )
      return saved
    }

    await writeTransaction(
      this.client,
      [
        {
          Put: {
            TableName: this.tableName,
            Item: this.mapGrantToItem(saved),
            ConditionExpression: "attribute_not_exists(SK)",
          },
        },
        {
          Update: {
            TableName: this.tableName,
            Key: { PK: userPartition(userId), SK: VERSION_SORT_KEY },
            UpdateExpression: "ADD #version :one, #count :one",
            ConditionExpression: "attribute_not_exists(#count) OR #count < :max",
            ExpressionAttributeNames: { "#version": "version", "#count": "grant_count" },
            ExpressionAttributeValues: { ":one": 1, ":max": maxGrants },
          },
        },
      ],
      (index) =>
        index === 1
          ? new ValidationError(`A user can hold at most ${maxGrants} grants`, "permissions")
          : new ConcurrentModificationError(`Permissions of user ${userId} changed concurrently`)
    )

    return saved
  }

  async delete(userId: number, resourcePath: string, method: HttpMethod): Promise<void> {
    await writeTransaction(
      this.client,
      [
        {
          Delete: {
            TableName: this.tableName,
            Key: { PK: userPartition(userId), SK: grantSortKey(method, resourcePath) },
            ConditionExpression: "attribute_exists(SK)",
          },
        },
        this.bumpVersion(userId, -1),
      ],
      (index) =>
        index === 0
          ? new NotFoundError(`Permission grant ${method} ${resourcePath}`)
          : new ConcurrentModificationError(`Permissions of user ${userId} changed concurrently`)
    )
  }

  async replaceAll(userId: number, grants: GrantInput[], updatedBy: number | null): Promise<PermissionGrant[]> {
    const observedVersion = await this.readVersion(userId)
    const existing = await this.findByUser(userId)
    const now = new Date()

    const saved = grants.map((grant): PermissionGrant => ({ userId, ...grant, updatedBy, updatedAt: now }))
    const keep = new Set(saved.map((grant) => grantSortKey(grant.method, grant.resourcePath)))

    const items: TransactItem[] = [
      {
        Update: {
          TableName: this.tableName,
          Key: { PK: userPartition(userId), SK: VERSION_SORT_KEY },
          UpdateExpression: "SET #version = :next, #count = :count",
          ConditionExpression: observedVersion === null ? "attribute_not_exists(#version)" : "#version = :observed",
          ExpressionAttributeNames: { "#version": "version", "#count": "grant_count" },
          ExpressionAttributeValues:
            observedVersion === null
              ? { ":next": 1, ":count": saved.length }
              : { ":next": observedVersion + 1, ":observed": observedVersion, ":count": saved.length },
        },
      },
    ]

    for (const grant of existing) {
      const sortKey = grantSortKey(grant.method, grant.resourcePath)
      if (!keep.has(sortKey)) {
        items.push({ Delete: { TableName: this.tableName, Key: { PK: userPartition(userId), SK: sortKey } } })
      }
    }
    for (const grant of saved) {
      items.push({ Put: { TableName: this.tableName, Item: this.mapGrantToItem(grant) } })
    }

    await writeTransaction(
      this.client,
      items,
      () => new ConcurrentModificationError(`Permissions of user ${userId} changed during the replacement`)
    )

    console.log(
      `[PermissionGrants] User ${userId}: ${saved.length} grants stored, ${items.length - 1 - saved.length} removed`
    )
    return saved
  }

  private async readVersion(userId: number): Promise<number | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: userPartition(userId), SK: VERSION_SORT_KEY },
        ConsistentRead: true,
      })
    )
    return response.Item ? readOptionalNumber(response.Item, "version") : null
  }

  private bumpVersion(userId: number, countDelta: number): TransactItem {
    if (countDelta === 0) {
      return {
        Update: {
          TableName: this.tableName,
          Key: { PK: userPartition(userId), SK: VERSION_SORT_KEY },
          UpdateExpression: "ADD #version :one",
          ExpressionAttributeNames: { "#version": "version" },
          ExpressionAttributeValues: { ":one": 1 },
        },
      }
    }
    return {
      Update: {
        TableName: this.tableName,
        Key: { PK: userPartition(userId), SK: VERSION_SORT_KEY },
        UpdateExpression: "ADD #version :one, #count :delta",
        ExpressionAttributeNames: { "#version": "version", "#count": "grant_count" },
        ExpressionAttributeValues: { ":one": 1, ":delta": countDelta },
      },
    }
  }

  private mapItemToGrant(item: Item): PermissionGrant {
    const method = readString(item, "method")
    if (!isHttpMethod(method)) {
      throw new AppError(`Unknown method ${method}`, 500, "INVALID_ITEM")
    }
    return {
      userId: readNumber(item, "user_id"),
      resourcePath: readString(item, "resource_path"),
      method,
      allow: readBoolean(item, "allow"),
      updatedBy: readOptionalNumber(item, "updated_by"),
      updatedAt: readDate(item, "updated_at"),
    }
  }

  private mapGrantToItem(grant: PermissionGrant): Item {
    return compact({
      PK: userPartition(grant.userId),
      SK: grantSortKey(grant.method, grant.resourcePath),
      user_id: grant.userId,
      resource_path: grant.resourcePath,
      method: grant.method,
      allow: grant.allow,
      updated_by: grant.updatedBy,
      updated_at: grant.updatedAt.toISOString(),
    })
  }
}
