export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'TOO_MANY_REQUESTS'
  | 'INTERNAL_ERROR';

/** Field name → messages, as returned to the client for validation failures. */
export type FieldErrors = Record<string, string[]>;

export class ApiError extends Error {
  statusCode: number;
  code: ErrorCode;
  isOperational: boolean;
  details?: FieldErrors;

  constructor(
    statusCode: number,
    message: string,
    code: ErrorCode = 'INTERNAL_ERROR',
    details?: FieldErrors,
    isOperational = true,
    stack = ''
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    if (details) {
      this.details = details;
    }
    if (stack) {
      this.stack = stack;
    } else {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  static validation(message: string, details?: FieldErrors): ApiError {
    return new ApiError(400, message, 'VALIDATION_ERROR', details);
  }

  /** Shorthand for a single-field validation failure. */
  static invalidField(field: string, message: string): ApiError {
    return ApiError.validation(message, { [field]: [message] });
  }

  static unauthorized(message = 'Authentication required'): ApiError {
    return new ApiError(401, message, 'UNAUTHORIZED');
  }

  static forbidden(message = 'You do not have permission to perform this action'): ApiError {
    return new ApiError(403, message, 'FORBIDDEN');
  }

  static notFound(message = 'Resource not found'): ApiError {
    return new ApiError(404, message, 'NOT_FOUND');
  }

  static conflict(message: string): ApiError {
    return new ApiError(409, message, 'CONFLICT');
  }

  static tooManyRequests(message = 'Too many requests, please try again later'): ApiError {
    return new ApiError(429, message, 'TOO_MANY_REQUESTS');
  }

  static internal(message = 'Internal Server Error'): ApiError {
    return new ApiError(500, message, 'INTERNAL_ERROR', undefined, false);
  }
}
