export type AuthenticationErrorCode =
  | "INVALID_CREDENTIALS"
  | "EXPIRED_TOKEN"
  | "INVALID_TOKEN"
  | "TOKEN_REUSED"
  | "MISSING_BEARER";

export type AuthorizationErrorCode = "PERMISSION_DENIED" | "TENANT_MISMATCH";

export type LifecycleErrorCode = "INVALID_TRANSITION" | "QUOTA_EXCEEDED" | "LEASE_EXPIRED";

export type ErrorCode =
  | AuthenticationErrorCode
  | AuthorizationErrorCode
  | LifecycleErrorCode
  | "NOT_FOUND"
  | "TENANT_NOT_FOUND"
  | "INVITATION_NOT_FOUND"
  | "DUPLICATE_TENANT"
  | "DUPLICATE_USER"
  | "DUPLICATE_AGENT"
  | "AGENT_LIMIT_REACHED"
  | "LAST_OWNER"
  | "INVITATION_EXPIRED"
  | "INVITATION_CONSUMED"
  | "VALIDATION_FAILED";

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly status: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised for every failed authentication step. Callers only ever see a
 * generic "Authentication failed"; the code is kept for logs and audit.
 */
export class AuthenticationError extends AppError {
  constructor(code: AuthenticationErrorCode, message: string) {
    super(code, message, 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(code: AuthorizationErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 403, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found", code: "NOT_FOUND" | "TENANT_NOT_FOUND" | "INVITATION_NOT_FOUND" = "NOT_FOUND") {
    super(code, message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(
    code: "DUPLICATE_TENANT" | "DUPLICATE_USER" | "DUPLICATE_AGENT" | "AGENT_LIMIT_REACHED" | "LAST_OWNER",
    message: string
  ) {
    super(code, message, 409);
  }
}

export class GoneError extends AppError {
  constructor(code: "INVITATION_EXPIRED" | "INVITATION_CONSUMED", message: string) {
    super(code, message, 410);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, issues?: unknown[]) {
    super("VALIDATION_FAILED", message, 400, issues ? { issues } : undefined);
  }
}

export class LifecycleError extends AppError {
  constructor(code: LifecycleErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 409, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
