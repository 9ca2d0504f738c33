/**
 * Numeric id allocation through an atomic counter item.
 */

import { UpdateCommand } from "@aws-sdk/lib-dynamodb"
import { AppError } from "../../shared/errors"
import type { DocumentClient } from "./items"

export async function nextId(client: DocumentClient, tableName: string, sequence: string): Promise<number> {
  const response = await client.send(
    new UpdateCommand({
      TableName: tableName,
      Key: { PK: "SEQUENCE", SK: sequence },
      UpdateExpression: "ADD #value :one",
      ExpressionAttributeNames: { "#value": "value" },
      ExpressionAttributeValues: { ":one": 1 },
      ReturnValues: "UPDATED_NEW",
    })
  )

  const value: unknown = response.Attributes?.value
  if (typeof value !== "number") {
    throw new AppError(`Sequence ${sequence} did not return a value`, 500, "SEQUENCE_ERROR")
  }
  return value
}
