/**
 * API Router for the cipher endpoints
 *
 * Central router that handles all client-facing endpoints with middleware for:
 * - Request and response logging
 * - Error handling and response formatting
 *
 * Endpoints:
 * - GET /api/catalog - Describe the loaded rotor catalog
 * - POST /api/convert - Convert one message
 * - POST /api/transcript - Process a transcript of settings and message lines
 */

import express, { Request, Response, NextFunction } from 'express';
import type { MachineConfig } from '../types/rotor.types';
import type { MachineOptions } from '../services/machine.service';
import { handleCatalog } from './catalog.endpoint';
import { handleConvert } from './convert.endpoint';
import { handleTranscript } from './transcript.endpoint';
import {
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from '../utils/response.formatter';

export const API_ROUTES = [
  'GET /api/health',
  'GET /api/catalog',
  'POST /api/convert',
  'POST /api/transcript',
];

/**
 * Creates and configures the API router with all endpoints and middleware.
 *
 * @param config - Machine configuration shared by every request
 * @param options - Machine options passed to every machine built
 * @returns Configured Express router
 */
export function createAPIRouter(
  config: MachineConfig,
  options: MachineOptions = {}
): express.Router {
  const router = express.Router();

  // Request logging middleware
  router.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    console.log(`API Request: ${req.method} ${req.path}`, {
      timestamp: new Date().toISOString(),
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    });

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      console.log(
        `API Response: ${req.method} ${req.path} - ${res.statusCode}`,
        {
          duration: `${duration}ms`,
          timestamp: new Date().toISOString(),
        }
      );
    });

    next();
  });

  router.get('/catalog', (req: Request, res: Response) => {
    handleCatalog(req, res, config);
  });

  router.post('/convert', (req: Request, res: Response) => {
    handleConvert(req, res, config, options);
  });

  router.post('/transcript', (req: Request, res: Response) => {
    handleTranscript(req, res, config, options);
  });

  // Unknown API routes
  router.use((req: Request, res: Response) => {
    const apiError = createAPIError(
      APIErrorCode.NOT_FOUND,
      `API route not found: ${req.method} ${req.path}`,
      {
        method: req.method,
        path: req.path,
        availableRoutes: API_ROUTES,
      }
    );
    sendErrorResponse(res, apiError, APIErrorCode.NOT_FOUND);
  });

  return router;
}
