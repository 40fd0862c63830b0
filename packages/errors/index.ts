import { getLogger } from '@kernel/logger';

const logger = getLogger('errors');

/**
* Unified Error Handling Package
*
* Standardized error classes, error codes, and response helpers shared by the
* URL validator, the external service clients, and the summarize flow.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details, development only
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_URL: 'INVALID_URL',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // External API Errors
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  SUMMARIZATION_FAILED: 'SUMMARIZATION_FAILED',
  NOTE_SERVICE_FAILED: 'NOTE_SERVICE_FAILED',
  SECRET_STORE_ERROR: 'SECRET_STORE_ERROR',
  NOTIFICATION_FAILED: 'NOTIFICATION_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape.
 */
export interface ErrorResponse {
  /** Human-readable error message */
  error: string;
  /** Machine-readable error code from ErrorCodes */
  code: ErrorCode;
  /** Additional error details - hidden outside development */
  details?: unknown;
}

/** Client-facing message for errors that are not AppErrors */
export const INTERNAL_ERROR_MESSAGE = 'Internal server error. Check function logs for details.';

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
    options?: { cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
  * Get sanitized version for client exposure.
  * Details are included only in development.
  */
  toClientJSON(): ErrorResponse {
    const isDevelopment = process.env['NODE_ENV'] === 'development';

    return {
      error: this.message,
      code: this.code,
      ...(isDevelopment && this.details !== undefined && { details: this.details }),
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
  * Create ValidationError from Zod error issues
  */
  static fromZodIssues(issues: Array<{ path: PropertyKey[]; message: string; code: string }>): ValidationError {
    return new ValidationError(
      `Validation failed: ${issues.map(i => `${i.path.map(String).join('.') || '(root)'}: ${i.message}`).join(', ')}`,
      issues.map(issue => ({
        path: issue.path.map(String),
        message: issue.message,
        code: issue.code,
      })),
    );
  }
}

/**
* Missing or invalid deployment configuration discovered at run time.
*/
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, 500, details);
  }
}

/**
* The single rejection kind of the YouTube URL validator and of the
* request-body check that gates it. The message is user-facing.
*/
export class InvalidYouTubeUrlError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.INVALID_URL, 400, details);
  }
}

/**
* Failure of a collaborator reached over the network.
* The original error is kept as `cause` and never serialized to clients.
*/
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(
    service: string,
    message: string,
    code: ErrorCode = ErrorCodes.EXTERNAL_API_ERROR,
    cause?: Error,
    details?: unknown
  ) {
    super(message, code, 500, details, cause ? { cause } : undefined);
    this.service = service;
  }
}

export class SummarizationError extends ExternalServiceError {
  constructor(message: string, cause?: Error, details?: unknown) {
    super('gemini', message, ErrorCodes.SUMMARIZATION_FAILED, cause, details);
  }
}

export class NoteServiceError extends ExternalServiceError {
  constructor(message: string, cause?: Error, details?: unknown) {
    super('notion', message, ErrorCodes.NOTE_SERVICE_FAILED, cause, details);
  }
}

export class SecretStoreError extends ExternalServiceError {
  constructor(message: string, cause?: Error) {
    super('secrets', message, ErrorCodes.SECRET_STORE_ERROR, cause);
  }
}

export class NotificationError extends ExternalServiceError {
  constructor(message: string, cause?: Error) {
    super('email', message, ErrorCodes.NOTIFICATION_FAILED, cause);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
* Sanitize error for client response.
* Non-AppError messages never reach the client.
*/
export function sanitizeErrorForClient(error: unknown): ErrorResponse {
  if (error instanceof AppError) {
    return error.toClientJSON();
  }

  logger.error('Internal error', toError(error));

  return {
    error: INTERNAL_ERROR_MESSAGE,
    code: ErrorCodes.INTERNAL_ERROR,
  };
}

/**
* Get HTTP status code for error code
*/
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case ErrorCodes.VALIDATION_ERROR:
    case ErrorCodes.INVALID_URL:
      return 400;
    case ErrorCodes.CONFIGURATION_ERROR:
    case ErrorCodes.INTERNAL_ERROR:
    case ErrorCodes.EXTERNAL_API_ERROR:
    case ErrorCodes.SUMMARIZATION_FAILED:
    case ErrorCodes.NOTE_SERVICE_FAILED:
    case ErrorCodes.SECRET_STORE_ERROR:
    case ErrorCodes.NOTIFICATION_FAILED:
    default:
      return 500;
  }
}

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize an unknown catch parameter into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
