/**
 * Error body shared by every endpoint. Clients read `message`, and `errors` for
 * field-level validation problems.
 */

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldError[];
  code?: string;
}

export function createErrorResponse(message: string, errors?: FieldError[], code?: string): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}
