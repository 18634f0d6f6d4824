import { ZodError } from "zod";

/**
 * Errors carry the HTTP status the error handler in index.ts answers with.
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, status: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, "VALIDATION_FAILED", details);
  }

  static fromZod(error: ZodError, label = "request"): ValidationError {
    return new ValidationError(`Invalid ${label}`, error.flatten());
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND");
  }
}

// network, auth and quota failures of a Google API
export class UpstreamServiceError extends AppError {
  readonly service: string;

  constructor(service: string, message: string, details?: unknown) {
    super(`${service}: ${message}`, 502, "UPSTREAM_FAILED", details);
    this.service = service;
  }
}

export class UnparseableResponseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 502, "UNPARSEABLE_RESPONSE", details);
  }
}

export class ServiceNotConfiguredError extends AppError {
  constructor(service: string) {
    super(`${service} is not configured`, 503, "SERVICE_NOT_CONFIGURED");
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
