/**
 * Error handling utilities for the cipher API.
 *
 * Provides centralized error handling with:
 * - Classification of errors into client (4xx) and server (5xx) errors
 * - Conversion of CipherErrors into structured API errors
 * - Structured error logging with request context
 * - Redaction of message text from logged details
 *
 * Error details never carry message text or whole settings lines.
 */

import type { NextFunction, Request, Response } from 'express';
import { isCipherError } from './cipher-error';
import {
  APIErrorCode,
  createAPIError,
  getHttpStatusForError,
  isAPIErrorCode,
  sendErrorResponse,
  type APIError,
} from './response.formatter';

/**
 * Error context information for structured logging.
 */
export interface ErrorContext {
  /** Request ID for tracing */
  requestId?: string;
  /** HTTP method (GET, POST, etc.) */
  method: string;
  /** Request path */
  path: string;
  /** Operation being performed */
  operation?: string;
  /** Additional context-specific data */
  metadata?: Record<string, unknown>;
  /** ISO timestamp when error occurred */
  timestamp: string;
}

/**
 * Error classification for determining logging levels.
 */
export enum ErrorClass {
  /** Client errors (4xx) - validation and cipher input errors */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) - internal failures, configuration defects */
  SERVER_ERROR = 'SERVER_ERROR',
}

/**
 * Keys whose values may carry plaintext or ciphertext.
 */
const REDACTED_KEYS = ['message', 'input', 'output', 'plaintext', 'text'];

/**
 * Classifies an API error code by the status code it maps to.
 *
 * @param errorCode - API error code to classify
 * @returns CLIENT_ERROR for 4xx codes, SERVER_ERROR otherwise
 */
export function classifyError(errorCode: APIErrorCode): ErrorClass {
  const status = getHttpStatusForError(errorCode);
  return status >= 400 && status < 500
    ? ErrorClass.CLIENT_ERROR
    : ErrorClass.SERVER_ERROR;
}

/**
 * Generates a request ID with the given prefix.
 *
 * @example
 * ```typescript
 * createRequestId('convert'); // 'convert_1728950400000_k3j9x2a'
 * ```
 */
export function createRequestId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Extracts error context from an Express request for structured logging.
 *
 * @param req - Express request object
 * @param requestId - Request ID for tracing
 * @param operation - Operation being performed (optional)
 * @param metadata - Additional context data (optional)
 * @returns Structured error context for logging
 */
export function extractErrorContext(
  req: Request,
  requestId?: string,
  operation?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  return {
    requestId,
    method: req.method,
    path: req.path,
    operation,
    metadata,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Replaces values under message-bearing keys with '[REDACTED]'.
 *
 * @param details - Error details object
 * @returns Sanitized copy of the details
 */
export function sanitizeErrorDetails(
  details: Record<string, unknown>
): Record<string, unknown> {
  const sanitized = { ...details };

  for (const key of Object.keys(sanitized)) {
    if (REDACTED_KEYS.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
    }
  }

  return sanitized;
}

/**
 * Converts any thrown value into an APIError.
 *
 * - CipherErrors keep their code, message and (sanitized) details
 * - Errors with a known API error code keep it
 * - Everything else becomes INTERNAL_ERROR
 *
 * @param error - Thrown value
 * @returns APIError suitable for sendErrorResponse
 */
export function toAPIError(error: unknown): APIError {
  if (isCipherError(error)) {
    return createAPIError(
      error.code,
      error.message,
      sanitizeErrorDetails(error.details)
    );
  }

  if (error instanceof Error) {
    const code =
      'code' in error && isAPIErrorCode(error.code)
        ? error.code
        : APIErrorCode.INTERNAL_ERROR;
    return createAPIError(
      code,
      code === APIErrorCode.INTERNAL_ERROR
        ? 'An unexpected error occurred'
        : error.message
    );
  }

  return createAPIError(
    APIErrorCode.INTERNAL_ERROR,
    'An unexpected error occurred'
  );
}

/**
 * Logs an error with structured context information.
 *
 * - Client errors (4xx): logged at info level with request details
 * - Server errors (5xx): logged at error level with the stack trace
 *
 * @param error - Error object or message
 * @param context - Error context information
 * @param errorCode - API error code for classification
 */
export function logError(
  error: unknown,
  context: ErrorContext,
  errorCode: APIErrorCode
): void {
  const errorClass = classifyError(errorCode);
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;

  const logData = {
    errorCode,
    errorClass,
    message: errorMessage,
    context,
    ...(errorClass === ErrorClass.SERVER_ERROR && errorStack
      ? { stack: errorStack }
      : {}),
  };

  if (errorClass === ErrorClass.CLIENT_ERROR) {
    // eslint-disable-next-line no-console
    console.log('[CLIENT_ERROR]', JSON.stringify(logData, null, 2));
  } else {
    // eslint-disable-next-line no-console
    console.error('[SERVER_ERROR]', JSON.stringify(logData, null, 2));
  }
}

/**
 * Logs a failed endpoint call and sends the matching error response.
 *
 * @param error - Thrown value
 * @param req - Express request object
 * @param res - Express response object
 * @param requestId - Request ID for tracing
 * @param operation - Operation being performed
 */
export function handleEndpointError(
  error: unknown,
  req: Request,
  res: Response,
  requestId: string,
  operation: string
): void {
  const apiError = toAPIError(error);
  logError(
    error,
    extractErrorContext(req, requestId, operation, apiError.details),
    apiError.code
  );
  sendErrorResponse(res, apiError, apiError.code, requestId);
}

/**
 * Failure raised by body-parser while reading a request body.
 */
interface BodyParserError extends Error {
  status: number;
  type?: unknown;
}

/**
 * body-parser marks its own failures with a 4xx `status`.
 */
function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

function toBodyParserAPIError(error: BodyParserError): APIError {
  if (error.type === 'entity.too.large') {
    return createAPIError(
      APIErrorCode.INPUT_TOO_LONG,
      'Request body exceeds the size limit'
    );
  }
  if (error instanceof SyntaxError) {
    return createAPIError(APIErrorCode.INVALID_TYPE, 'Request body is not valid JSON');
  }
  return createAPIError(APIErrorCode.INVALID_TYPE, error.message, {
    status: error.status,
  });
}

/**
 * Express error handling middleware for centralized error processing.
 *
 * Catches errors from earlier middleware and sends a formatted error
 * response. Body parsing failures (malformed JSON, oversized bodies,
 * unsupported charsets) are client errors. Register it last.
 *
 * @param error - Error object
 * @param req - Express request object
 * @param res - Express response object
 * @param next - Express next function
 */
export function errorHandlingMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void {
  const requestId = createRequestId('error');
  const apiError = isBodyParserError(error)
    ? toBodyParserAPIError(error)
    : toAPIError(error);

  logError(error, extractErrorContext(req, requestId), apiError.code);
  sendErrorResponse(res, apiError, apiError.code, requestId);
}
