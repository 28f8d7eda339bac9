/**
 * /api/catalog endpoint implementation
 *
 * Describes the loaded catalog: alphabet, slot and pawl counts, and every
 * rotor with its type and notches. Wirings are not exposed.
 */

import type { Request, Response } from 'express';
import type { MachineConfig } from '../types/rotor.types';
import {
  describeCatalog,
  type CatalogSummary,
} from '../services/catalog.service';
import { sendSuccessResponse } from '../utils/response.formatter';
import { createRequestId } from '../utils/error-handler';

export type CatalogResponse = CatalogSummary;

/**
 * Handles GET /api/catalog requests. The catalog never changes while the
 * server runs, so the response may be cached.
 */
export function handleCatalog(
  _req: Request,
  res: Response,
  config: MachineConfig
): void {
  const requestId = createRequestId('catalog');
  const response: CatalogResponse = describeCatalog(config);

  res.set('Cache-Control', 'public, max-age=300');
  sendSuccessResponse(res, response, requestId);
}
