/**
 * Error types thrown by services and route handlers, and the mapping from
 * any thrown value to the `{ error, code, details? }` JSON body.
 */

import { NextResponse } from "next/server";
import { QueryFailedError } from "typeorm";
import { ZodError } from "zod";
import { logger, toError } from "./logger";

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = "AppError";
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

/** 400: bad input, unknown categories, malformed body */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION_ERROR", 400, details);
    this.name = "ValidationError";
  }
}

/** 401: missing, malformed or expired bearer token; wrong credentials */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, "AUTHENTICATION_ERROR", 401);
    this.name = "AuthenticationError";
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = "Access forbidden") {
    super(message, "AUTHORIZATION_ERROR", 403);
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string | number) {
    super(id !== undefined ? `${resource} not found: ${id}` : `${resource} not found`, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

/** 409: a cafe with the same name and city, or an email already registered */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFLICT", 409, details);
    this.name = "ConflictError";
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, "DATABASE_ERROR", 500, details);
    this.name = "DatabaseError";
  }
}

// better-sqlite3 reports SQLITE_CONSTRAINT_*, pg reports SQLSTATE
const UNIQUE_VIOLATION_CODES = new Set(["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY", "23505"]);
const FOREIGN_KEY_VIOLATION_CODES = new Set(["SQLITE_CONSTRAINT_FOREIGNKEY", "23503"]);

function driverErrorCode(error: QueryFailedError): string | undefined {
  const driverError: unknown = error.driverError;
  if (
    driverError &&
    typeof driverError === "object" &&
    "code" in driverError &&
    typeof driverError.code === "string"
  ) {
    return driverError.code;
  }
  return undefined;
}

function isNamed(value: unknown, name: string): boolean {
  return typeof value === "object" && value !== null && "name" in value && value.name === name;
}

export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ValidationError(
      "Validation failed",
      error.errors.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }

  if (error instanceof QueryFailedError) {
    const code = driverErrorCode(error);
    if (code && UNIQUE_VIOLATION_CODES.has(code)) {
      return new ConflictError("Resource already exists");
    }
    if (code && FOREIGN_KEY_VIOLATION_CODES.has(code)) {
      return new ValidationError("Invalid reference");
    }
    return new DatabaseError(`Database error: ${error.message}`, { code });
  }

  // JSON.parse failures may come from another realm, so match by name
  if (isNamed(error, "SyntaxError")) {
    return new ValidationError("Request body must be valid JSON");
  }

  if (error instanceof Error) {
    return new AppError(error.message, "INTERNAL_ERROR", 500);
  }

  return new AppError("An unexpected error occurred", "UNKNOWN_ERROR", 500);
}

export function handleAPIError(error: unknown): NextResponse {
  const appError = normalizeError(error);
  const context = { code: appError.code, statusCode: appError.statusCode };

  if (appError.statusCode >= 500) {
    logger.error(appError.message, toError(error), context);
  } else {
    logger.warn(appError.message, context);
  }

  return NextResponse.json(appError.toJSON(), { status: appError.statusCode });
}

/**
 * Wrap a route handler so anything it throws becomes a JSON error response.
 */
export function withErrorHandling<T extends unknown[]>(
  handler: (...args: T) => Promise<NextResponse>
) {
  return async (...args: T): Promise<NextResponse> => {
    try {
      return await handler(...args);
    } catch (error) {
      return handleAPIError(error);
    }
  };
}

export function assertExists<T>(
  value: T | null | undefined,
  resource: string,
  id?: string | number
): asserts value is T {
  if (value === null || value === undefined) {
    throw new NotFoundError(resource, id);
  }
}
