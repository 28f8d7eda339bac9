/**
 * Input validation module for the cipher API endpoints.
 *
 * Provides validation for:
 * - Required string fields (setting, message, transcript input)
 * - Rotor name arrays (non-empty arrays of non-empty strings)
 * - Message and transcript size limits
 * - Field-level errors carrying API error codes
 *
 * Only the shape of a request is checked here. Whether rotor names exist,
 * symbols belong to the alphabet, or settings have the right length is
 * decided by the cipher services, which raise CipherErrors.
 */

import type { ConversionRequest } from '../services/transcript.service';

/**
 * Maximum length of a single message, in characters.
 */
export const MAX_MESSAGE_LENGTH = 10000;

/**
 * Maximum length of a transcript, in characters.
 */
export const MAX_TRANSCRIPT_LENGTH = 100000;

/**
 * Maximum number of rotor names in one request.
 */
export const MAX_ROTORS_PER_REQUEST = 32;

/**
 * Enumeration of API validation error codes.
 */
export enum APIErrorCode {
  /** Required parameter is missing from the request */
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  /** Parameter has wrong type (e.g., string instead of array) */
  INVALID_TYPE = 'INVALID_TYPE',
  /** Rotor list is empty, too long or contains empty names */
  INVALID_ROTORS = 'INVALID_ROTORS',
  /** Message or transcript exceeds the size limit */
  INPUT_TOO_LONG = 'INPUT_TOO_LONG',
}

/**
 * Detailed validation error information.
 */
export interface ValidationError {
  /** Machine-readable error code */
  code: APIErrorCode;
  /** Human-readable error message */
  message: string;
  /** Field name that caused the validation error */
  field: string;
  /** Additional context about the error (optional) */
  details?: {
    /** Expected format or value */
    expected?: string;
    /** Actual value received */
    received?: unknown;
    [key: string]: unknown;
  };
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed (true) or failed (false) */
  isValid: boolean;
  /** Array of validation errors (empty if isValid is true) */
  errors: ValidationError[];
}

/**
 * Validation result carrying the validated value when valid.
 */
export interface ParsedRequest<T> extends ValidationResult {
  value?: T;
}

/**
 * Validates that a field is a string of at most maxLength characters.
 *
 * @param value - Value to validate
 * @param fieldName - Name of the field being validated
 * @param maxLength - Upper bound on the string length
 * @returns ValidationResult with success status and any errors
 *
 * @example
 * ```typescript
 * const result = validateString(req.body.setting, 'setting');
 * if (!result.isValid) {
 *   console.error('Setting validation failed:', result.errors);
 * }
 * ```
 */
export function validateString(
  value: unknown,
  fieldName: string,
  maxLength: number = MAX_MESSAGE_LENGTH
): ValidationResult {
  if (value === undefined || value === null) {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.MISSING_PARAMETER,
          message: `${fieldName} is required`,
          field: fieldName,
          details: { expected: 'string', received: value },
        },
      ],
    };
  }

  if (typeof value !== 'string') {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.INVALID_TYPE,
          message: `${fieldName} must be a string`,
          field: fieldName,
          details: { expected: 'string', received: typeof value },
        },
      ],
    };
  }

  if (value.length > maxLength) {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.INPUT_TOO_LONG,
          message: `${fieldName} must be at most ${maxLength} characters`,
          field: fieldName,
          details: { maxAllowed: maxLength, received: value.length },
        },
      ],
    };
  }

  return { isValid: true, errors: [] };
}

/**
 * Validates a list of rotor names.
 *
 * @param rotors - Value to validate
 * @param fieldName - Name of the field being validated
 * @returns ValidationResult with success status and any errors
 */
export function validateRotorNames(
  rotors: unknown,
  fieldName: string = 'rotors'
): ValidationResult {
  if (rotors === undefined || rotors === null) {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.MISSING_PARAMETER,
          message: `${fieldName} is required`,
          field: fieldName,
          details: { expected: 'array of rotor names', received: rotors },
        },
      ],
    };
  }

  if (!Array.isArray(rotors)) {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.INVALID_TYPE,
          message: `${fieldName} must be an array`,
          field: fieldName,
          details: {
            expected: 'array of rotor names',
            received: typeof rotors,
          },
        },
      ],
    };
  }

  if (rotors.length === 0 || rotors.length > MAX_ROTORS_PER_REQUEST) {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.INVALID_ROTORS,
          message: `${fieldName} must contain between 1 and ${MAX_ROTORS_PER_REQUEST} names`,
          field: fieldName,
          details: { received: rotors.length },
        },
      ],
    };
  }

  const errors: ValidationError[] = [];
  rotors.forEach((name: unknown, index: number) => {
    if (typeof name !== 'string' || name.trim().length === 0) {
      errors.push({
        code: APIErrorCode.INVALID_ROTORS,
        message: `${fieldName}[${index}] must be a non-empty string`,
        field: `${fieldName}[${index}]`,
        details: { expected: 'non-empty string', received: name },
      });
    }
  });

  return { isValid: errors.length === 0, errors };
}

/**
 * Validates multiple fields at once and combines results.
 *
 * @param validations - Array of validation functions to execute
 * @returns Combined ValidationResult with all errors
 *
 * @example
 * ```typescript
 * const result = validateMultiple([
 *   () => validateRotorNames(body.rotors),
 *   () => validateString(body.setting, 'setting'),
 * ]);
 * ```
 */
export function validateMultiple(
  validations: Array<() => ValidationResult>
): ValidationResult {
  const allErrors: ValidationError[] = [];
  let isValid = true;

  for (const validation of validations) {
    const result = validation();
    if (!result.isValid) {
      isValid = false;
      allErrors.push(...result.errors);
    }
  }

  return {
    isValid,
    errors: allErrors,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a POST /api/convert body and returns the typed request.
 *
 * @param body - Parsed JSON body
 * @returns ParsedRequest with the ConversionRequest when valid
 *
 * @example
 * ```typescript
 * const result = validateConvertRequest({
 *   rotors: ['B', 'Beta', 'I', 'II', 'III'],
 *   setting: 'AAAA',
 *   message: 'HELLO',
 * });
 * // result.value.plugboard === ''
 * ```
 */
export function validateConvertRequest(
  body: unknown
): ParsedRequest<ConversionRequest> {
  if (!isRecord(body)) {
    return {
      isValid: false,
      errors: [
        {
          code: APIErrorCode.INVALID_TYPE,
          message: 'Request body must be a JSON object',
          field: 'body',
          details: { expected: 'object', received: typeof body },
        },
      ],
    };
  }

  const { rotors, setting, plugboard, message } = body;
  const result = validateMultiple([
    () => validateRotorNames(rotors, 'rotors'),
    () => validateString(setting, 'setting', MAX_ROTORS_PER_REQUEST),
    () =>
      plugboard === undefined
        ? { isValid: true, errors: [] }
        : validateString(plugboard, 'plugboard'),
    () => validateString(message, 'message', MAX_MESSAGE_LENGTH),
  ]);

  if (
    !result.isValid ||
    !Array.isArray(rotors) ||
    typeof setting !== 'string' ||
    typeof message !== 'string'
  ) {
    return result;
  }

  return {
    ...result,
    value: {
      rotors: rotors.filter((name): name is string => typeof name === 'string'),
      setting,
      plugboard: typeof plugboard === 'string' ? plugboard : '',
      message,
    },
  };
}

/**
 * Validates a POST /api/transcript body.
 *
 * @param body - Parsed JSON body
 * @returns ParsedRequest with the transcript input when valid
 */
export function validateTranscriptRequest(
  body: unknown
): ParsedRequest<string> {
  const input = isRecord(body) ? body.input : undefined;
  const result = validateString(input, 'input', MAX_TRANSCRIPT_LENGTH);
  if (!result.isValid || typeof input !== 'string') {
    return result;
  }
  return { ...result, value: input };
}
