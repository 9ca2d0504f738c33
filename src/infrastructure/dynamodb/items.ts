/**
 * Typed readers for document client items.
 */

import type { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb"
import { AppError } from "../../shared/errors"

export type Item = Record<string, unknown>

function invalid(key: string, expected: string): AppError {
  return new AppError(`Item attribute ${key} is not ${expected}`, 500, "INVALID_ITEM")
}

export function readNumber(item: Item, key: string): number {
  const value = item[key]
  if (typeof value === "number") {
    return value
  }
  if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
    return Number(value)
  }
  throw invalid(key, "a number")
}

export function readOptionalNumber(item: Item, key: string): number | null {
  const value = item[key]
  return value === undefined || value === null ? null : readNumber(item, key)
}

export function readString(item: Item, key: string): string {
  const value = item[key]
  if (typeof value !== "string") {
    throw invalid(key, "a string")
  }
  return value
}

export function readOptionalString(item: Item, key: string): string | null {
  const value = item[key]
  return value === undefined || value === null ? null : readString(item, key)
}

export function readBoolean(item: Item, key: string, fallback: boolean = false): boolean {
  const value = item[key]
  if (value === undefined || value === null) {
    return fallback
  }
  if (typeof value !== "boolean") {
    throw invalid(key, "a boolean")
  }
  return value
}

export function readDate(item: Item, key: string): Date {
  const date = new Date(readString(item, key))
  if (Number.isNaN(date.getTime())) {
    throw invalid(key, "an ISO date")
  }
  return date
}

/**
 * Copies only the attributes that hold a value; null fields are left out of
 * the stored item.
 */
export function compact(attributes: Record<string, unknown>): Item {
  const item: Item = {}
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== null && value !== undefined) {
      item[key] = value
    }
  }
  return item
}

/**
 * The part of the document client the repositories use.
 */
export type DocumentClient = Pick<DynamoDBDocumentClient, "send">
