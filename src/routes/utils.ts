/**
 * Shared route utilities
 */

import type { ZodError } from "zod";

export type ErrorType =
  | "validation_error"
  | "secrets_file_error"
  | "not_found"
  | "internal_error";

export interface ErrorResponse {
  error: {
    message: string;
    type: ErrorType;
    details?: Array<{ path: string; message: string }>;
  };
}

export function errorResponse(
  message: string,
  type: ErrorType,
  details?: ErrorResponse["error"]["details"],
): ErrorResponse {
  return details ? { error: { message, type, details } } : { error: { message, type } };
}

/**
 * Flattens zod issues into path/message pairs
 */
export function validationDetails(error: ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}
