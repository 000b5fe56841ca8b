/**
 * Error body shared by every endpoint.
 */

import type { FieldError } from './errors';

export interface ErrorResponse {
  detail: string;
  code?: string;
  errors?: FieldError[];
}

/**
 * Creates a standardized error response
 */
export function createErrorResponse(
  detail: string,
  errors?: FieldError[],
  code?: string
): ErrorResponse {
  return {
    detail,
    ...(code && { code }),
    ...(errors && errors.length > 0 && { errors }),
  };
}
