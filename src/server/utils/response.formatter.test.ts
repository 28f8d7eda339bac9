/**
 * Unit tests for response formatter utility.
 *
 * Tests comprehensive response formatting functionality including:
 * - Success response structure consistency
 * - Error response formatting with various error codes
 * - HTTP status code mapping correctness
 * - Response timestamp and request tracing
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  formatSuccessResponse,
  formatErrorResponse,
  getHttpStatusForError,
  isAPIErrorCode,
  createAPIError,
  sendErrorResponse,
  sendSuccessResponse,
  APIErrorCode,
  type APIError,
} from './response.formatter';
import { mockResponse } from '../__tests__/express-mocks';

describe('Response Formatter', () => {
  beforeEach(() => {
    vi.useRealTimers();
  });

  describe('formatSuccessResponse', () => {
    it('should spread data next to a timestamp', () => {
      const testData = { output: 'BDZGO', finalSetting: 'AAAF' };
      const response = formatSuccessResponse(testData);

      expect(response).toEqual({
        ...testData,
        timestamp: expect.any(Number),
      });
      expect(response.timestamp).toBeGreaterThan(0);
      expect(response.timestamp).toBeLessThanOrEqual(Date.now());
    });

    it('should include the request ID when given', () => {
      const response = formatSuccessResponse({ ok: true }, 'convert_1');
      expect(response.requestId).toBe('convert_1');
    });

    it('should omit the request ID otherwise', () => {
      expect('requestId' in formatSuccessResponse({ ok: true })).toBe(false);
    });

    it('should use a fixed clock when one is installed', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
      expect(formatSuccessResponse({}).timestamp).toBe(
        Date.parse('2026-01-02T03:04:05.000Z')
      );
    });

    it('should not modify original data objects', () => {
      const data = { output: 'ABC' };
      formatSuccessResponse(data, 'id');
      expect(data).toEqual({ output: 'ABC' });
    });
  });

  describe('formatErrorResponse', () => {
    it('should use an APIError as-is', () => {
      const apiError: APIError = {
        code: APIErrorCode.UNKNOWN_ROTOR_NAME,
        message: 'Unknown rotor name: IX',
        details: { name: 'IX' },
      };
      const response = formatErrorResponse(apiError, APIErrorCode.INTERNAL_ERROR, 'r1');

      expect(response).toEqual({
        error: apiError,
        timestamp: expect.any(Number),
        requestId: 'r1',
      });
    });

    it('should convert Error objects with the default code', () => {
      const response = formatErrorResponse(
        new Error('Setting must be 4 symbols long, got 3'),
        APIErrorCode.INVALID_LENGTH
      );
      expect(response.error).toEqual({
        code: APIErrorCode.INVALID_LENGTH,
        message: 'Setting must be 4 symbols long, got 3',
      });
    });

    it('should convert string errors with the default code', () => {
      expect(formatErrorResponse('bad request', APIErrorCode.INVALID_TYPE).error).toEqual({
        code: APIErrorCode.INVALID_TYPE,
        message: 'bad request',
      });
    });

    it('should fall back to a generic message', () => {
      expect(formatErrorResponse('').error.message).toBe('An unexpected error occurred');
      expect(formatErrorResponse(new Error('')).error.message).toBe(
        'An unexpected error occurred'
      );
    });

    it('should treat unknown values as internal errors', () => {
      [null, undefined, 42, { code: 'NOPE', message: 'x' }].forEach(value => {
        expect(formatErrorResponse(value, APIErrorCode.INVALID_TYPE).error).toEqual({
          code: APIErrorCode.INTERNAL_ERROR,
          message: 'An unexpected error occurred',
        });
      });
    });
  });

  describe('getHttpStatusForError', () => {
    it('should return 400 for request and cipher input errors', () => {
      [
        APIErrorCode.MISSING_PARAMETER,
        APIErrorCode.INVALID_TYPE,
        APIErrorCode.INVALID_ROTORS,
        APIErrorCode.INVALID_SYMBOL,
        APIErrorCode.UNKNOWN_ROTOR_NAME,
        APIErrorCode.INVALID_LENGTH,
        APIErrorCode.INVALID_OPERATION,
        APIErrorCode.MALFORMED_CYCLE,
        APIErrorCode.INVALID_CONFIGURATION,
      ].forEach(code => {
        expect(getHttpStatusForError(code)).toBe(400);
      });
    });

    it('should return 404 for unknown routes', () => {
      expect(getHttpStatusForError(APIErrorCode.NOT_FOUND)).toBe(404);
    });

    it('should return 413 for oversized input', () => {
      expect(getHttpStatusForError(APIErrorCode.INPUT_TOO_LONG)).toBe(413);
    });

    it('should return 500 for defects upstream of the request', () => {
      expect(getHttpStatusForError(APIErrorCode.INDEX_OUT_OF_RANGE)).toBe(500);
      expect(getHttpStatusForError(APIErrorCode.MALFORMED_ALPHABET)).toBe(500);
      expect(getHttpStatusForError(APIErrorCode.INTERNAL_ERROR)).toBe(500);
    });

    it('should return 503 when the service is unavailable', () => {
      expect(getHttpStatusForError(APIErrorCode.SERVICE_UNAVAILABLE)).toBe(503);
    });

    it('should map every defined code', () => {
      Object.values(APIErrorCode).forEach(code => {
        expect(getHttpStatusForError(code)).toBeGreaterThanOrEqual(400);
      });
    });
  });

  describe('isAPIErrorCode', () => {
    it('should accept defined codes only', () => {
      expect(isAPIErrorCode('MALFORMED_CYCLE')).toBe(true);
      expect(isAPIErrorCode('NOT_A_CODE')).toBe(false);
      expect(isAPIErrorCode(400)).toBe(false);
    });
  });

  describe('createAPIError', () => {
    it('should include details only when given', () => {
      expect(createAPIError(APIErrorCode.NOT_FOUND, 'gone')).toEqual({
        code: APIErrorCode.NOT_FOUND,
        message: 'gone',
      });
      expect(
        createAPIError(APIErrorCode.NOT_FOUND, 'gone', { path: '/x' }).details
      ).toEqual({ path: '/x' });
    });
  });

  describe('send helpers', () => {
    it('should send success responses with status 200', () => {
      const recorder = mockResponse();
      sendSuccessResponse(recorder.res, { output: 'X' }, 'r2');
      expect(recorder.statusCode).toBe(200);
      expect(recorder.body).toEqual({
        output: 'X',
        timestamp: expect.any(Number),
        requestId: 'r2',
      });
    });

    it('should send error responses with the mapped status', () => {
      const recorder = mockResponse();
      sendErrorResponse(
        recorder.res,
        createAPIError(APIErrorCode.INPUT_TOO_LONG, 'message too long')
      );
      expect(recorder.statusCode).toBe(413);
      expect(recorder.body).toMatchObject({
        error: { code: APIErrorCode.INPUT_TOO_LONG, message: 'message too long' },
      });
    });
  });
});
