/**
* Unified Error Handling Package
*
* Error classes, error codes, and helpers shared by the API routes and the
* excuse pipeline.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Validation issues etc., development only
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_RANGE: 'INVALID_RANGE',
  REQUIRED_FIELD: 'REQUIRED_FIELD',
  UNSUPPORTED_MEDIA_TYPE: 'UNSUPPORTED_MEDIA_TYPE',

  // Resource Errors
  NOT_FOUND: 'NOT_FOUND',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  TIMEOUT_ERROR: 'TIMEOUT_ERROR',

  // External API Errors
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',

  // Size Errors
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape returned by API endpoints.
 */
export interface ErrorResponse {
  error: string;
  code: string;
  /** Hidden outside development */
  details?: unknown;
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    statusCode: number = getStatusCodeForErrorCode(code),
    details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    };
  }

  /**
  * Client-facing serialization; details only in development.
  */
  toClientJSON(requestId?: string): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(shouldExposeErrorDetails() && this.details !== undefined && { details: this.details }),
      ...(requestId !== undefined && { requestId }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', details?: unknown) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, details);
  }

  /**
  * Create ValidationError from Zod issues. The first issue's message becomes
  * the error message; all issues go to details.
  */
  static fromZodIssues(issues: ReadonlyArray<{ path: PropertyKey[]; message: string; code: string }>): ValidationError {
    const normalized = issues.map(issue => ({
      path: issue.path.map(segment => (typeof segment === 'number' ? segment : String(segment))),
      message: issue.message,
      code: issue.code,
    }));
    return new ValidationError(normalized[0]?.message ?? 'Validation failed', normalized);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode = ErrorCodes.SERVICE_UNAVAILABLE,
    options?: { cause?: unknown }
  ) {
    super(message, code, 503, undefined, options);
  }
}

/**
* A remote service answered, but not with something usable.
*/
export class ExternalServiceError extends AppError {
  public readonly upstreamStatus: number | undefined;

  constructor(message: string, upstreamStatus?: number, options?: { cause?: unknown }) {
    super(message, ErrorCodes.EXTERNAL_API_ERROR, 502, undefined, options);
    this.upstreamStatus = upstreamStatus;
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(message, ErrorCodes.TIMEOUT_ERROR, 504, undefined, options);
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export interface ZodIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

/**
* Extract Zod issues from a validation error safely
*/
export function extractZodIssues(error: unknown): ZodIssue[] {
  if (!error || typeof error !== 'object' || !('issues' in error) || !Array.isArray(error.issues)) {
    return [];
  }

  return error.issues.map((issue: Partial<ZodIssue>) => ({
    path: issue.path || [],
    message: issue.message || 'Invalid value',
    code: issue.code || 'invalid_type',
  }));
}

/**
* Get HTTP status code for error code
*/
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case ErrorCodes.VALIDATION_ERROR:
    case ErrorCodes.INVALID_INPUT:
    case ErrorCodes.INVALID_RANGE:
    case ErrorCodes.REQUIRED_FIELD:
      return 400;
    case ErrorCodes.NOT_FOUND:
      return 404;
    case ErrorCodes.PAYLOAD_TOO_LARGE:
      return 413;
    case ErrorCodes.UNSUPPORTED_MEDIA_TYPE:
      return 415;
    case ErrorCodes.EXTERNAL_API_ERROR:
      return 502;
    case ErrorCodes.SERVICE_UNAVAILABLE:
    case ErrorCodes.CONFIGURATION_ERROR:
      return 503;
    case ErrorCodes.TIMEOUT_ERROR:
      return 504;
    case ErrorCodes.INTERNAL_ERROR:
    default:
      return 500;
  }
}

/**
* Detailed error info is exposed only in development
*/
export function shouldExposeErrorDetails(): boolean {
  return process.env['NODE_ENV'] === 'development';
}
