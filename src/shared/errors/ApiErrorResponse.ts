/**
 * Standard API error response format used across all services.
 *
 * @example
 * {
 *   "type": "VALIDATION_ERROR",
 *   "message": "Validation failed for 1 field",
 *   "fieldErrors": [
 *     { "field": "amount", "message": "Amount must be positive", "rejectedValue": -100 }
 *   ]
 * }
 */

/**
 * Error type categorization.
 *
 * - INVALID_REQUEST     400 malformed request data
 * - VALIDATION_ERROR    400 field validation failed, see fieldErrors
 * - NOT_FOUND           404 resource does not exist
 * - APPLICATION_ERROR   422 business rule violation, see code
 * - SERVICE_UNAVAILABLE 503 downstream service failure
 * - INTERNAL_ERROR      500 unexpected server error
 */
export const ApiErrorType = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  APPLICATION_ERROR: 'APPLICATION_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ApiErrorType = (typeof ApiErrorType)[keyof typeof ApiErrorType];

/**
 * Field-level validation error
 */
export interface FieldError {
  field: string;
  message: string;
  rejectedValue: unknown;
}

export interface ApiErrorResponse {
  type: ApiErrorType;
  message: string;
  code?: string;
  fieldErrors?: FieldError[];
}

export function fieldError(field: string, message: string, rejectedValue: unknown): FieldError {
  return { field, message, rejectedValue };
}

/**
 * Create error response object.
 * Absent code and fieldErrors are left out so they do not appear in the JSON body.
 */
export function buildApiErrorResponse(
  type: ApiErrorType,
  message: string,
  code?: string,
  fieldErrors?: FieldError[]
): ApiErrorResponse {
  const response: ApiErrorResponse = { type, message };
  if (code !== undefined) {
    response.code = code;
  }
  if (fieldErrors !== undefined) {
    response.fieldErrors = fieldErrors;
  }
  return response;
}
