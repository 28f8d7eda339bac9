/**
 * Server configuration from environment variables.
 *
 * Environment:
 *   PORT                = HTTP port (default: 3000)
 *   ROTOR_CATALOG_PATH  = catalog file, .conf or .yaml (default: config/catalog.yaml)
 *   ROTOR_TRACE         = 'true' to log every converted symbol to stderr
 *   NODE_ENV            = development | production | test
 */

export const DEFAULT_PORT = 3000;
export const DEFAULT_CATALOG_PATH = 'config/catalog.yaml';

export interface ServerConfig {
  port: number;
  catalogPath: string;
  traceEnabled: boolean;
  nodeEnv: string;
}

/**
 * Reads and validates the server configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {Error} If PORT is not an integer between 1 and 65535
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const rawPort = env.PORT?.trim();
  let port = DEFAULT_PORT;
  if (rawPort) {
    if (!/^\d+$/.test(rawPort)) {
      throw new Error(`PORT must be an integer, got '${rawPort}'`);
    }
    port = Number.parseInt(rawPort, 10);
    if (port < 1 || port > 65535) {
      throw new Error(`PORT must be between 1 and 65535, got ${port}`);
    }
  }

  const catalogPath = env.ROTOR_CATALOG_PATH?.trim() || DEFAULT_CATALOG_PATH;

  return {
    port,
    catalogPath,
    traceEnabled: env.ROTOR_TRACE === 'true',
    nodeEnv: env.NODE_ENV || 'development',
  };
}
