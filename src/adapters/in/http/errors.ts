import type { ErrorStatusCode } from "../../../domain/models/errors.ts";

/**
 * API error class for HTTP responses
 */
export class ApiError extends Error {
  status: ErrorStatusCode;
  details?: Record<string, unknown>;

  constructor(message: string, status: ErrorStatusCode = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }
}

/**
 * Common interface for API error responses
 * @template E - Type of error details
 */
export interface ApiErrorResponse<E = Record<string, unknown>> {
  status: "error";
  message: string;
  error?: E;
}

export function createErrorResponse<E = Record<string, unknown>>(
  message: string,
  error?: E,
): ApiErrorResponse<E> {
  return {
    status: "error",
    message,
    error,
  };
}
