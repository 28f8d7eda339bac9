// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import type { Server } from 'http';
import type { MachineConfig } from './types/rotor.types';
import type { MachineOptions } from './services/machine.service';
import { loadMachineConfig } from './services/catalog.service';
import { createAPIRouter } from './api/router';
import { loadServerConfig, type ServerConfig } from './utils/env.config';
import { createConsoleTraceSink } from './utils/trace';
import { errorHandlingMiddleware } from './utils/error-handler';
import {
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from './utils/response.formatter';

/**
 * Builds the Express application around a loaded catalog.
 *
 * @param config - Machine configuration shared by every request
 * @param options - Machine options, e.g. a trace sink
 */
export function createApp(
  config: MachineConfig,
  options: MachineOptions = {}
): express.Express {
  const app = express();

  // Middleware to parse JSON bodies
  app.use(express.json({ limit: '256kb' }));

  // Health check endpoint - validates server is running
  app.get('/api/health', (_req, res) => {
    res.json({
      ok: true,
      ts: Date.now(),
    });
  });

  // Mount API router for client-facing endpoints
  app.use('/api', createAPIRouter(config, options));

  // Error handling for unknown routes
  app.use((req, res) => {
    const apiError = createAPIError(
      APIErrorCode.NOT_FOUND,
      `Route not found: ${req.method} ${req.url}`
    );
    sendErrorResponse(res, apiError, APIErrorCode.NOT_FOUND);
  });

  app.use(errorHandlingMiddleware);

  return app;
}

/**
 * Validates the environment, loads the catalog and starts listening.
 * Configuration errors terminate the process with status 1.
 */
export function startServer(
  env: NodeJS.ProcessEnv = process.env
): Server {
  let serverConfig: ServerConfig;
  let machineConfig: MachineConfig;

  try {
    serverConfig = loadServerConfig(env);
    machineConfig = loadMachineConfig(serverConfig.catalogPath);
    // eslint-disable-next-line no-console
    console.log('✓ Configuration validation passed');
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(
      '✗ Configuration error:',
      error instanceof Error ? error.message : error
    );
    // eslint-disable-next-line no-console
    console.error('Server cannot start without required configuration.');
    process.exit(1);
  }

  const options: MachineOptions = serverConfig.traceEnabled
    ? { trace: createConsoleTraceSink() }
    : {};
  const app = createApp(machineConfig, options);

  return app.listen(serverConfig.port, () => {
    // eslint-disable-next-line no-console
    console.log(
      `Server listening on port ${serverConfig.port} (${serverConfig.nodeEnv})`
    );
  });
}

if (require.main === module) {
  startServer();
}
