/**
 * Response formatter utility for the cipher API endpoints.
 *
 * Provides standardized response formatting for:
 * - Success responses with consistent structure
 * - Error responses with structured error codes
 * - HTTP status code mapping for validation, cipher and server errors
 * - Response timestamps and request tracing
 */

import type { Response } from 'express';
import { APIErrorCode as ValidationErrorCode } from '../validation/api.validation';
import { CipherErrorCode } from './cipher-error';

/**
 * Additional API error codes specific to HTTP operations.
 */
export enum AdditionalAPIErrorCode {
  /** Route does not exist */
  NOT_FOUND = 'NOT_FOUND',
  /** Internal server error or unexpected failure */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  /** Service temporarily unavailable */
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

// Combine all error codes for complete coverage
export const APIErrorCode = {
  MISSING_PARAMETER: ValidationErrorCode.MISSING_PARAMETER,
  INVALID_TYPE: ValidationErrorCode.INVALID_TYPE,
  INVALID_ROTORS: ValidationErrorCode.INVALID_ROTORS,
  INPUT_TOO_LONG: ValidationErrorCode.INPUT_TOO_LONG,
  INVALID_SYMBOL: CipherErrorCode.INVALID_SYMBOL,
  INDEX_OUT_OF_RANGE: CipherErrorCode.INDEX_OUT_OF_RANGE,
  UNKNOWN_ROTOR_NAME: CipherErrorCode.UNKNOWN_ROTOR_NAME,
  INVALID_LENGTH: CipherErrorCode.INVALID_LENGTH,
  INVALID_OPERATION: CipherErrorCode.INVALID_OPERATION,
  MALFORMED_CYCLE: CipherErrorCode.MALFORMED_CYCLE,
  MALFORMED_ALPHABET: CipherErrorCode.MALFORMED_ALPHABET,
  INVALID_CONFIGURATION: CipherErrorCode.INVALID_CONFIGURATION,
  NOT_FOUND: AdditionalAPIErrorCode.NOT_FOUND,
  INTERNAL_ERROR: AdditionalAPIErrorCode.INTERNAL_ERROR,
  SERVICE_UNAVAILABLE: AdditionalAPIErrorCode.SERVICE_UNAVAILABLE,
} as const;

export type APIErrorCode =
  | ValidationErrorCode
  | CipherErrorCode
  | AdditionalAPIErrorCode;

/**
 * Structured API error information.
 */
export interface APIError {
  /** Machine-readable error code for client handling */
  code: APIErrorCode;
  /** Human-readable error message */
  message: string;
  /** Optional additional error context and details */
  details?: {
    /** Field name that caused the error (for validation errors) */
    field?: string;
    /** Expected format or value */
    expected?: string;
    /** Actual value received */
    received?: unknown;
    [key: string]: unknown;
  };
}

/**
 * Error response data structure.
 */
export interface ErrorResponseData extends ResponseMeta {
  /** Structured error information */
  error: APIError;
}

/**
 * HTTP status code mapping for different error types.
 */
const ERROR_STATUS_MAP: Record<APIErrorCode, number> = {
  // 400 Bad Request - request shape and cipher input errors
  [APIErrorCode.MISSING_PARAMETER]: 400,
  [APIErrorCode.INVALID_TYPE]: 400,
  [APIErrorCode.INVALID_ROTORS]: 400,
  [APIErrorCode.INVALID_SYMBOL]: 400,
  [APIErrorCode.UNKNOWN_ROTOR_NAME]: 400,
  [APIErrorCode.INVALID_LENGTH]: 400,
  [APIErrorCode.INVALID_OPERATION]: 400,
  [APIErrorCode.MALFORMED_CYCLE]: 400,
  [APIErrorCode.INVALID_CONFIGURATION]: 400,

  // 404 Not Found
  [APIErrorCode.NOT_FOUND]: 404,

  // 413 Payload Too Large
  [APIErrorCode.INPUT_TOO_LONG]: 413,

  // 500 Internal Server Error - defects upstream of the request
  [APIErrorCode.INDEX_OUT_OF_RANGE]: 500,
  [APIErrorCode.MALFORMED_ALPHABET]: 500,
  [APIErrorCode.INTERNAL_ERROR]: 500,

  // 503 Service Unavailable
  [APIErrorCode.SERVICE_UNAVAILABLE]: 503,
};

/**
 * Fields every response carries next to its data.
 */
export interface ResponseMeta {
  /** Unix timestamp when response was generated */
  timestamp: number;
  /** Optional request ID for tracing */
  requestId?: string;
}

/**
 * Formats a successful API response with consistent structure.
 *
 * Data fields are spread into the response root, next to a timestamp and
 * an optional request ID.
 *
 * @param data - Response data to include
 * @param requestId - Optional request ID for tracing
 * @returns Formatted success response
 *
 * @example
 * ```typescript
 * const response = formatSuccessResponse({ output: 'BDZGO' });
 * // Returns: { output: 'BDZGO', timestamp: 1728950400000 }
 * ```
 */
export function formatSuccessResponse<T extends object>(
  data: T,
  requestId?: string
): T & ResponseMeta {
  const meta: ResponseMeta = requestId
    ? { timestamp: Date.now(), requestId }
    : { timestamp: Date.now() };

  return { ...data, ...meta };
}

/**
 * Formats an error API response with consistent structure.
 *
 * Handles multiple input types:
 * - APIError objects (used as-is)
 * - Error objects (converted to APIError)
 * - String messages (converted to APIError)
 * - Unknown types (converted to generic internal error)
 *
 * @param error - Error information (APIError, Error, string, or unknown)
 * @param defaultCode - Default error code for non-APIError inputs
 * @param requestId - Optional request ID for tracing
 * @returns Formatted error response
 */
export function formatErrorResponse(
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): ErrorResponseData {
  let apiError: APIError;

  if (isAPIError(error)) {
    apiError = error;
  } else if (error instanceof Error) {
    apiError = {
      code: defaultCode,
      message: error.message || 'An unexpected error occurred',
    };
  } else if (typeof error === 'string') {
    apiError = {
      code: defaultCode,
      message: error || 'An unexpected error occurred',
    };
  } else {
    apiError = {
      code: APIErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    };
  }

  const response: ErrorResponseData = {
    error: apiError,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * Gets the appropriate HTTP status code for an API error code.
 *
 * @param errorCode - API error code to map
 * @returns HTTP status code (defaults to 500 for unknown codes)
 *
 * @example
 * ```typescript
 * getHttpStatusForError(APIErrorCode.UNKNOWN_ROTOR_NAME); // 400
 * getHttpStatusForError(APIErrorCode.INTERNAL_ERROR); // 500
 * ```
 */
export function getHttpStatusForError(errorCode: APIErrorCode): number {
  return ERROR_STATUS_MAP[errorCode] || 500;
}

export function isAPIErrorCode(code: unknown): code is APIErrorCode {
  return (
    typeof code === 'string' &&
    Object.values<string>(APIErrorCode).includes(code)
  );
}

/**
 * Type guard to check if an object is an APIError.
 * Error instances are excluded so they go through the Error branch.
 */
function isAPIError(error: unknown): error is APIError {
  return (
    typeof error === 'object' &&
    error !== null &&
    !(error instanceof Error) &&
    'code' in error &&
    'message' in error &&
    isAPIErrorCode(error.code) &&
    typeof error.message === 'string'
  );
}

/**
 * Creates a standardized API error object.
 *
 * @param code - Error code
 * @param message - Error message
 * @param details - Optional error details
 * @returns APIError object
 *
 * @example
 * ```typescript
 * const error = createAPIError(
 *   APIErrorCode.UNKNOWN_ROTOR_NAME,
 *   'Unknown rotor name: IX',
 *   { name: 'IX' }
 * );
 * ```
 */
export function createAPIError(
  code: APIErrorCode,
  message: string,
  details?: APIError['details']
): APIError {
  const error: APIError = { code, message };

  if (details) {
    error.details = details;
  }

  return error;
}

/**
 * Sends a formatted success response via Express.
 *
 * @param res - Express response object
 * @param data - Response data
 * @param requestId - Optional request ID
 */
export function sendSuccessResponse<T extends object>(
  res: Response,
  data: T,
  requestId?: string
): void {
  const response = formatSuccessResponse(data, requestId);
  res.json(response);
}

/**
 * Sends a formatted error response via Express, with the status code
 * mapped from the error code.
 *
 * @param res - Express response object
 * @param error - Error information
 * @param defaultCode - Default error code for non-APIError inputs
 * @param requestId - Optional request ID
 *
 * @example
 * ```typescript
 * const apiError = createAPIError(APIErrorCode.INVALID_SYMBOL, "Symbol '1' is not in the alphabet");
 * sendErrorResponse(res, apiError);
 * // Sends 400 status with formatted error response
 * ```
 */
export function sendErrorResponse(
  res: Response,
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): void {
  const response = formatErrorResponse(error, defaultCode, requestId);
  const statusCode = getHttpStatusForError(response.error.code);

  res.status(statusCode).json(response);
}
