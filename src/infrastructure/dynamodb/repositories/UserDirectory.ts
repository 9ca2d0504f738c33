/**
 * DynamoDB User Directory
 *
 * Read-only view of login accounts in the config table (PK "USER").
 * Accounts are created and authenticated elsewhere.
 */

import { GetCommand } from "@aws-sdk/lib-dynamodb"
import type { UserAccount, UserDirectory } from "../../../domain/access/Access"
import { readBoolean, readNumber, readOptionalNumber, type DocumentClient, type Item } from "../items"
import { Partition } from "../tableLayout"

export class DynamoDBUserDirectory implements UserDirectory {
  private client: DocumentClient
  private tableName: string

  constructor(client: DocumentClient, tableName: string = "config") {
    this.client = client
    this.tableName = tableName
  }

  async findUser(id: number): Promise<UserAccount | null> {
    const response = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { PK: Partition.user, SK: id.toString() },
      })
    )
    return response.Item ? this.mapItemToUser(response.Item) : null
  }

  private mapItemToUser(item: Item): UserAccount {
    return {
      id: readNumber(item, "SK"),
      roleLevel: readNumber(item, "role_level"),
      isActive: readBoolean(item, "is_active", true),
      businessGroupId: readOptionalNumber(item, "business_group_id"),
      companyId: readOptionalNumber(item, "company_id"),
      branchId: readOptionalNumber(item, "branch_id"),
      departmentId: readOptionalNumber(item, "department_id"),
    }
  }
}
