/**
 * Query helpers that follow LastEvaluatedKey.
 */

import { BatchGetCommand, QueryCommand } from "@aws-sdk/lib-dynamodb"
import type { QueryCommandInput } from "@aws-sdk/lib-dynamodb"
import type { Item, DocumentClient } from "./items"

const BATCH_GET_LIMIT = 100

export async function queryAll(client: DocumentClient, input: QueryCommandInput): Promise<Item[]> {
  const items: Item[] = []
  let exclusiveStartKey: Item | undefined

  do {
    const response = await client.send(new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }))
    items.push(...(response.Items ?? []))
    exclusiveStartKey = response.LastEvaluatedKey
  } while (exclusiveStartKey)

  return items
}

/**
 * Stops at the first page that returns a match. Limit is not used because
 * DynamoDB applies it before the filter expression.
 */
export async function queryAny(client: DocumentClient, input: QueryCommandInput): Promise<boolean> {
  let exclusiveStartKey: Item | undefined

  do {
    const response = await client.send(new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }))
    if (response.Items && response.Items.length > 0) {
      return true
    }
    exclusiveStartKey = response.LastEvaluatedKey
  } while (exclusiveStartKey)

  return false
}

export async function batchGetAll(
  client: DocumentClient,
  tableName: string,
  keys: readonly Item[]
): Promise<Item[]> {
  const items: Item[] = []

  for (let start = 0; start < keys.length; start += BATCH_GET_LIMIT) {
    let pending: Item[] = keys.slice(start, start + BATCH_GET_LIMIT)

    while (pending.length > 0) {
      const response = await client.send(
        new BatchGetCommand({ RequestItems: { [tableName]: { Keys: pending } } })
      )
      items.push(...(response.Responses?.[tableName] ?? []))
      pending = response.UnprocessedKeys?.[tableName]?.Keys ?? []
    }
  }

  return items
}
