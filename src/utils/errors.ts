/**
 * Typed failures raised by the ownership guard and the lifecycle coordinator.
 *
 * Operational errors are expected outcomes the caller can recover from and
 * are sent to the client as-is. Non-operational errors (integrity faults,
 * failed cascades) mean the stores disagree and are logged as severe; the
 * client only sees a generic message.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly isOperational: boolean = true,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Caller is not the owner, or not ADMIN for an admin-only operation. */
export class UnauthorizedError extends AppError {
  constructor(message: string, code = "UNAUTHORIZED", details?: Record<string, unknown>) {
    super(message, 401, code, true, details);
    this.name = "UnauthorizedError";
  }
}

/** Structurally disallowed, whoever asks (e.g. deleting ADMIN). */
export class ForbiddenError extends AppError {
  constructor(message: string, code = "FORBIDDEN", details?: Record<string, unknown>) {
    super(message, 403, code, true, details);
    this.name = "ForbiddenError";
  }
}

export class ResourceNotFoundError extends AppError {
  constructor(message: string, code = "RESOURCE_NOT_FOUND", details?: Record<string, unknown>) {
    super(message, 404, code, true, details);
    this.name = "ResourceNotFoundError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = "CONFLICT", details?: Record<string, unknown>) {
    super(message, 409, code, true, details);
    this.name = "ConflictError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = "VALIDATION_FAILED", details?: Record<string, unknown>) {
    super(message, 400, code, true, details);
    this.name = "ValidationError";
  }
}

/** Blob directory and image metadata disagree (zero or several blob files for one row). */
export class IntegrityError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, "INTEGRITY_FAULT", false, details);
    this.name = "IntegrityError";
  }
}

export interface CascadeFailure {
  imageId: string;
  reason: string;
}

/**
 * A user deletion stopped part way. Images listed in `failures` still have
 * their metadata row and the user record is kept, so the call can be retried.
 */
export class CascadeError extends AppError {
  constructor(
    public readonly userId: string,
    public readonly failures: CascadeFailure[]
  ) {
    super(
      `Deleting user ${userId} left ${failures.length} image(s) in place`,
      500,
      "CASCADE_INCOMPLETE",
      false,
      { userId, failures }
    );
    this.name = "CascadeError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Node filesystem errors carry a string `code` such as ENOENT or EEXIST. */
export const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === code;
