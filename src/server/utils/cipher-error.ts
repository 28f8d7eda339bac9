/**
 * Error type shared by the cipher engine and its configuration layer.
 *
 * Every failure raised by the alphabet, permutation, rotor, machine, catalog
 * and transcript modules is a CipherError carrying a machine-readable code.
 * The HTTP error handler maps these codes onto status codes, and the CLI
 * prints the message.
 */

/**
 * Enumeration of cipher error codes.
 */
export enum CipherErrorCode {
  /** A character outside the configured alphabet was supplied */
  INVALID_SYMBOL = 'INVALID_SYMBOL',
  /** An index fell outside [0, size) */
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  /** A rotor name is absent from the catalog */
  UNKNOWN_ROTOR_NAME = 'UNKNOWN_ROTOR_NAME',
  /** A rotor list or setting string has the wrong length */
  INVALID_LENGTH = 'INVALID_LENGTH',
  /** The operation violates a rotor variant's or machine's capability */
  INVALID_OPERATION = 'INVALID_OPERATION',
  /** A cycle specification is syntactically or semantically invalid */
  MALFORMED_CYCLE = 'MALFORMED_CYCLE',
  /** An alphabet is empty, repeats a symbol or uses a reserved character */
  MALFORMED_ALPHABET = 'MALFORMED_ALPHABET',
  /** A catalog, rotor arrangement or settings line is invalid */
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
}

export class CipherError extends Error {
  readonly code: CipherErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: CipherErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'CipherError';
    this.code = code;
    this.details = details;
  }
}

export function isCipherError(error: unknown): error is CipherError {
  return error instanceof CipherError;
}
