/**
 * /api/convert endpoint implementation
 *
 * Converts a single message with a freshly configured machine:
 * - Request shape validation (rotors, setting, optional plugboard, message)
 * - Arrangement, plugboard and setting checks by the transcript service
 * - Conversion and five-letter grouping of the output
 * - Structured error responses for every CipherError code
 *
 * Each request builds its own Machine from the shared, immutable catalog,
 * so concurrent requests never see each other's rotor positions.
 */

import type { Request, Response } from 'express';
import type { MachineConfig } from '../types/rotor.types';
import type { MachineOptions } from '../services/machine.service';
import {
  runConversion,
  type ConversionResult,
} from '../services/transcript.service';
import { validateConvertRequest } from '../validation/api.validation';
import {
  sendSuccessResponse,
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from '../utils/response.formatter';
import {
  createRequestId,
  handleEndpointError,
} from '../utils/error-handler';

/**
 * Response structure for /api/convert endpoint
 */
export type ConvertResponse = ConversionResult;

/**
 * Handles POST /api/convert requests
 *
 * 1. Validate the request body shape
 * 2. Build a machine and apply rotors, setting and plugboard
 * 3. Convert the normalized message
 * 4. Return output, grouped output and the final rotor setting
 *
 * @param req - Express request with a JSON body
 * @param res - Express response object
 * @param config - Machine configuration loaded at startup
 * @param options - Machine options (trace sink)
 */
export function handleConvert(
  req: Request,
  res: Response,
  config: MachineConfig,
  options: MachineOptions = {}
): void {
  const requestId = createRequestId('convert');

  const validation = validateConvertRequest(req.body);
  if (!validation.isValid || validation.value === undefined) {
    const [first] = validation.errors;
    const code = first?.code ?? APIErrorCode.INVALID_TYPE;
    const apiError = createAPIError(
      code,
      first?.message ?? 'Invalid request body',
      { field: first?.field, errors: validation.errors }
    );
    return sendErrorResponse(res, apiError, code, requestId);
  }

  try {
    const startTime = Date.now();
    const result: ConvertResponse = runConversion(
      config,
      validation.value,
      options
    );

    console.log(
      JSON.stringify({
        operation: 'convert',
        requestId,
        rotors: validation.value.rotors,
        length: result.output.length,
        duration: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      })
    );

    sendSuccessResponse(res, result, requestId);
  } catch (error) {
    handleEndpointError(error, req, res, requestId, 'convert');
  }
}
