/**
 * Transaction helpers
 *
 * Writes that must be atomic go through TransactWriteItems. When DynamoDB
 * cancels a transaction the reason list tells which item's condition
 * failed; callers map that index to a domain error.
 */

import { TransactWriteCommand } from "@aws-sdk/lib-dynamodb"
import type { TransactWriteCommandInput } from "@aws-sdk/lib-dynamodb"
import type { HierarchyGuard } from "../../domain/hierarchy/Hierarchy"
import { ConcurrentModificationError, ValidationError } from "../../shared/errors"
import type { DocumentClient } from "./items"

export type TransactItem = NonNullable<TransactWriteCommandInput["TransactItems"]>[number]

export const MAX_TRANSACTION_ITEMS = 100

function errorName(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "name" in error && typeof error.name === "string") {
    return error.name
  }
  return null
}

export function isConditionalCheckFailure(error: unknown): boolean {
  return errorName(error) === "ConditionalCheckFailedException"
}

/**
 * Reason codes of a cancelled transaction, one per item, or null when the
 * error is not a cancellation.
 */
export function cancellationReasons(error: unknown): string[] | null {
  if (errorName(error) !== "TransactionCanceledException") {
    return null
  }
  if (typeof error !== "object" || error === null || !("CancellationReasons" in error)) {
    return []
  }
  const reasons: unknown = error.CancellationReasons
  if (!Array.isArray(reasons)) {
    return []
  }
  return reasons.map((reason: unknown) =>
    typeof reason === "object" && reason !== null && "Code" in reason && typeof reason.Code === "string"
      ? reason.Code
      : "None"
  )
}

export async function writeTransaction(
  client: DocumentClient,
  items: TransactItem[],
  onConditionFailed: (index: number) => Error
): Promise<void> {
  if (items.length > MAX_TRANSACTION_ITEMS) {
    throw new ValidationError(`A single change cannot touch more than ${MAX_TRANSACTION_ITEMS} records`)
  }

  try {
    await client.send(new TransactWriteCommand({ TransactItems: items }))
  } catch (error) {
    const reasons = cancellationReasons(error)
    if (reasons === null) {
      throw error
    }

    const failedIndex = reasons.indexOf("ConditionalCheckFailed")
    if (failedIndex >= 0) {
      throw onConditionFailed(failedIndex)
    }
    if (reasons.includes("TransactionConflict")) {
      throw new ConcurrentModificationError()
    }
    throw error
  }
}

/**
 * One condition check per link of the validated chain: each ancestor must
 * still be active and still hang under the same parent.
 */
export function guardChecks(
  tableName: string,
  partition: string,
  parentAttribute: string,
  guard: HierarchyGuard | null
): TransactItem[] {
  if (!guard) {
    return []
  }

  return guard.chain.map((link) => ({
    ConditionCheck: {
      TableName: tableName,
      Key: { PK: partition, SK: String(link.id) },
      ConditionExpression:
        link.parentId === null
          ? "#active = :active AND attribute_not_exists(#parent)"
          : "#active = :active AND #parent = :parent",
      ExpressionAttributeNames: { "#active": "is_active", "#parent": parentAttribute },
      ExpressionAttributeValues:
        link.parentId === null ? { ":active": true } : { ":active": true, ":parent": link.parentId },
    },
  }))
}
