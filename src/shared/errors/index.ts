/**
 * Shared Error Classes
 *
 * Every error carries a stable code so callers can tell the kinds apart
 * without parsing messages.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = "INTERNAL_ERROR",
    public details?: Record<string, unknown>
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 400, "VALIDATION_ERROR", field ? { field } : undefined)
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = "Unauthorized") {
    super(message, 401, "AUTHENTICATION_ERROR")
  }
}

export class AuthorizationDeniedError extends AppError {
  constructor(message: string = "Forbidden", details?: Record<string, unknown>) {
    super(message, 403, "AUTHORIZATION_DENIED", details)
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource", id?: number) {
    super(
      id === undefined ? `${resource} not found` : `${resource} ${id} not found`,
      404,
      "NOT_FOUND",
      id === undefined ? undefined : { id }
    )
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: string = "CONFLICT", details?: Record<string, unknown>) {
    super(message, 409, code, details)
  }
}

export class UniquenessConflictError extends ConflictError {
  constructor(entity: string, field: string, value: string | number) {
    super(`${entity} with ${field} '${value}' already exists`, "UNIQUENESS_CONFLICT", {
      entity,
      field,
      value,
    })
  }
}

export class ConcurrentModificationError extends ConflictError {
  constructor(message: string = "The record changed while it was being updated") {
    super(message, "CONCURRENT_MODIFICATION")
  }
}

export class ActiveDescendantsError extends ConflictError {
  constructor(entity: string, id: number, dependents: string) {
    super(`${entity} ${id} cannot be deactivated while it has active ${dependents}`, "ACTIVE_DESCENDANTS", {
      id,
      dependents,
    })
  }
}

export class CycleError extends AppError {
  constructor(childId: number, parentId: number) {
    super(`Linking ${childId} under ${parentId} would create a cycle`, 422, "CYCLE", {
      childId,
      parentId,
    })
  }
}

export class TenantMismatchError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 422, "TENANT_MISMATCH", details)
  }
}

export class DepthExceededError extends AppError {
  constructor(maxDepth: number, resultingDepth: number) {
    super(`Hierarchy cannot exceed ${maxDepth} levels (would reach ${resultingDepth})`, 422, "DEPTH_EXCEEDED", {
      maxDepth,
      resultingDepth,
    })
  }
}

export class InactiveNodeError extends AppError {
  constructor(entity: string, id: number) {
    super(`${entity} ${id} is not active`, 422, "INACTIVE_NODE", { id })
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, "CONFIGURATION_ERROR")
  }
}
