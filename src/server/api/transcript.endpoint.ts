/**
 * /api/transcript endpoint implementation
 *
 * Runs a whole transcript (settings lines and message lines) through
 * processTranscript and returns the output text. A failing line aborts the
 * request; no partial output is returned.
 */

import type { Request, Response } from 'express';
import type { MachineConfig } from '../types/rotor.types';
import type { MachineOptions } from '../services/machine.service';
import { processTranscript } from '../services/transcript.service';
import { validateTranscriptRequest } from '../validation/api.validation';
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
 * Response structure for /api/transcript endpoint
 */
export interface TranscriptResponse {
  /** Converted transcript, one output line per message or blank line */
  output: string;
}

/**
 * Handles POST /api/transcript requests
 *
 * @param req - Express request with `{ input: string }` body
 * @param res - Express response object
 * @param config - Machine configuration loaded at startup
 * @param options - Machine options (trace sink)
 */
export function handleTranscript(
  req: Request,
  res: Response,
  config: MachineConfig,
  options: MachineOptions = {}
): void {
  const requestId = createRequestId('transcript');

  const validation = validateTranscriptRequest(req.body);
  if (!validation.isValid || validation.value === undefined) {
    const [first] = validation.errors;
    const code = first?.code ?? APIErrorCode.INVALID_TYPE;
    const apiError = createAPIError(
      code,
      first?.message ?? 'Invalid request body',
      { field: 'input', errors: validation.errors }
    );
    return sendErrorResponse(res, apiError, code, requestId);
  }

  try {
    const response: TranscriptResponse = {
      output: processTranscript(config, validation.value, options),
    };

    console.log(
      JSON.stringify({
        operation: 'transcript',
        requestId,
        inputLength: validation.value.length,
        outputLength: response.output.length,
        timestamp: new Date().toISOString(),
      })
    );

    sendSuccessResponse(res, response, requestId);
  } catch (error) {
    handleEndpointError(error, req, res, requestId, 'transcript');
  }
}
