/**
 * HTTP helpers shared by the API handlers
 *
 * The caller is authenticated upstream by the API Gateway authorizer, which
 * puts userId and roleLevel into the request context.
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda"
import { z } from "zod"
import type { RecordPredicate } from "../../../domain/access/Access"
import type { Principal, ResourceRequest } from "../../../shared/types"
import { isHttpMethod } from "../../../shared/types"
import { AppError, AuthenticationError, ValidationError } from "../../../shared/errors"

export type Handler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>

export interface PrincipalLoader {
  loadPrincipal(userId: number, roleLevel: number): Promise<Principal>
}

const JSON_HEADERS = { "Content-Type": "application/json" }

export function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(body),
  }
}

export function errorResponse(error: unknown, tag: string): APIGatewayProxyResult {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`[${tag}] ${error.code}:`, error)
    }
    return jsonResponse(error.statusCode, { error: error.message, code: error.code, details: error.details })
  }

  console.error(`[${tag}] Unexpected error:`, error)
  return jsonResponse(500, { error: "Internal server error", code: "INTERNAL_ERROR" })
}

export function withErrorHandling(tag: string, handler: Handler): Handler {
  return async (event) => {
    try {
      return await handler(event)
    } catch (error) {
      return errorResponse(error, tag)
    }
  }
}

function toInteger(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return parseInt(value, 10)
  }
  return null
}

export async function resolvePrincipal(event: APIGatewayProxyEvent, loader: PrincipalLoader): Promise<Principal> {
  const authorizer = event.requestContext?.authorizer
  const userId = toInteger(authorizer?.userId)
  const roleLevel = toInteger(authorizer?.roleLevel)

  if (userId === null || roleLevel === null) {
    throw new AuthenticationError()
  }
  return loader.loadPrincipal(userId, roleLevel)
}

export function resourceRequest(event: APIGatewayProxyEvent): ResourceRequest {
  const method = event.httpMethod.toUpperCase()
  if (!isHttpMethod(method)) {
    throw new ValidationError(`Unsupported method ${event.httpMethod}`)
  }
  return { resourcePath: event.path, method }
}

export function pathId(event: APIGatewayProxyEvent, name: string): number {
  const id = toInteger(event.pathParameters?.[name])
  if (id === null) {
    throw new ValidationError(`Invalid ${name}`, name)
  }
  return id
}

export function pathParameter(event: APIGatewayProxyEvent, name: string): string {
  const value = event.pathParameters?.[name]
  if (!value) {
    throw new ValidationError(`Missing ${name}`, name)
  }
  return decodeURIComponent(value)
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ")
}

export function parseBody<S extends z.ZodTypeAny>(event: APIGatewayProxyEvent, schema: S): z.infer<S> {
  if (!event.body) {
    throw new ValidationError("Request body is required")
  }

  let raw: unknown
  try {
    raw = JSON.parse(event.body)
  } catch {
    throw new ValidationError("Request body is not valid JSON")
  }

  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error))
  }
  return result.data
}

const optionalId = z.coerce.number().int().positive().optional()

const ListQuerySchema = z.object({
  businessGroupId: optionalId,
  companyId: optionalId,
  branchId: optionalId,
  departmentId: optionalId,
  isActive: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
})

/**
 * Caller filter from query string parameters. It is ANDed with the
 * authorization predicate by the services.
 */
export function listFilter(event: APIGatewayProxyEvent): RecordPredicate | undefined {
  const result = ListQuerySchema.safeParse(event.queryStringParameters ?? {})
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error))
  }

  const query = result.data
  const clauses: RecordPredicate[] = []
  for (const field of ["businessGroupId", "companyId", "branchId", "departmentId"] as const) {
    const value = query[field]
    if (value !== undefined) {
      clauses.push({ kind: "eq", field, value })
    }
  }
  if (query.isActive !== undefined) {
    clauses.push({ kind: "eq", field: "isActive", value: query.isActive })
  }

  if (clauses.length === 0) {
    return undefined
  }
  return clauses.length === 1 ? clauses[0] : { kind: "and", clauses }
}
